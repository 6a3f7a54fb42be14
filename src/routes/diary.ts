import { Hono } from 'hono'
import { z } from 'zod'
import type { AppEnv } from '../types/app'
import { parseJsonBody, parseQuery } from '../lib/body'
import {
  createDiaryEntry,
  deleteDiaryEntry,
  getActiveProject,
  getDiaryEntry,
  getProject,
  listDiaryEntries,
  updateDiaryEntry,
} from '../lib/db'
import { toDiaryEntryDto } from '../lib/dto'
import { fail, ok } from '../lib/response'

const titleSchema = z.string().trim().min(1).max(255)
const textSchema = z.string().max(20_000)
const photosSchema = z.array(z.string().trim().min(1).max(512)).max(20)

const listQuerySchema = z.object({
  projectId: z.coerce.number().int().positive().optional(),
})

const createEntrySchema = z.object({
  projectId: z.number().int().positive().optional(),
  title: titleSchema,
  text: textSchema,
  photos: photosSchema.optional(),
})

const patchEntrySchema = z
  .object({
    title: titleSchema.optional(),
    text: textSchema.optional(),
    photos: photosSchema.optional(),
  })
  .refine((patch) => patch.title != null || patch.text != null || patch.photos != null, {
    message: 'Nothing to update',
  })

function parseEntryId(raw: string) {
  const id = Number(raw)
  return Number.isInteger(id) && id > 0 ? id : null
}

export const diaryRoutes = new Hono<AppEnv>()

diaryRoutes.get('/', async (c) => {
  const query = parseQuery(c, listQuerySchema)
  if (!query.ok) {
    return fail(c, 'VALIDATION_ERROR', query.message, 400, { details: query.details })
  }

  const project =
    query.data.projectId != null ? await getProject(c.env.DB, query.data.projectId) : await getActiveProject(c.env.DB)
  if (!project) {
    return query.data.projectId != null
      ? fail(c, 'PROJECT_NOT_FOUND', 'Project not found', 404)
      : fail(c, 'NO_ACTIVE_PROJECT', 'No active project', 404)
  }

  const entries = await listDiaryEntries(c.env.DB, project.id)
  return ok(c, { projectId: project.id, entries: entries.map(toDiaryEntryDto) })
})

diaryRoutes.post('/', async (c) => {
  const parsed = await parseJsonBody(c, createEntrySchema)
  if (!parsed.ok) {
    return fail(c, 'VALIDATION_ERROR', parsed.message, 400, { details: parsed.details })
  }

  const project =
    parsed.data.projectId != null ? await getProject(c.env.DB, parsed.data.projectId) : await getActiveProject(c.env.DB)
  if (!project) {
    return parsed.data.projectId != null
      ? fail(c, 'PROJECT_NOT_FOUND', 'Project not found', 404)
      : fail(c, 'NO_ACTIVE_PROJECT', 'No active project', 404)
  }

  const entry = await createDiaryEntry(c.env.DB, {
    projectId: project.id,
    title: parsed.data.title,
    text: parsed.data.text,
    photos: parsed.data.photos,
    createdAt: Date.now(),
  })
  return ok(c, toDiaryEntryDto(entry), 201)
})

diaryRoutes.get('/:id', async (c) => {
  const entryId = parseEntryId(c.req.param('id'))
  if (entryId == null) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid diary entry id', 400)
  }

  const entry = await getDiaryEntry(c.env.DB, entryId)
  if (!entry) {
    return fail(c, 'DIARY_ENTRY_NOT_FOUND', 'Diary entry not found', 404)
  }
  return ok(c, toDiaryEntryDto(entry))
})

diaryRoutes.patch('/:id', async (c) => {
  const entryId = parseEntryId(c.req.param('id'))
  if (entryId == null) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid diary entry id', 400)
  }

  const parsed = await parseJsonBody(c, patchEntrySchema)
  if (!parsed.ok) {
    return fail(c, 'VALIDATION_ERROR', parsed.message, 400, { details: parsed.details })
  }

  const entry = await updateDiaryEntry(c.env.DB, entryId, parsed.data, Date.now())
  if (!entry) {
    return fail(c, 'DIARY_ENTRY_NOT_FOUND', 'Diary entry not found', 404)
  }
  return ok(c, toDiaryEntryDto(entry))
})

diaryRoutes.delete('/:id', async (c) => {
  const entryId = parseEntryId(c.req.param('id'))
  if (entryId == null) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid diary entry id', 400)
  }

  const deleted = await deleteDiaryEntry(c.env.DB, entryId)
  if (!deleted) {
    return fail(c, 'DIARY_ENTRY_NOT_FOUND', 'Diary entry not found', 404)
  }
  return ok(c, { id: entryId, deleted: true })
})
