import { Hono } from 'hono'
import { z } from 'zod'
import type { AppEnv } from '../types/app'
import { parseJsonBody, parseQuery } from '../lib/body'
import {
  archiveProject,
  createProject,
  endActiveProjects,
  endProject,
  getActiveProject,
  getProject,
  listProjects,
  updateProject,
} from '../lib/db'
import { MIN_TIMELAPSE_INTERVAL_SEC } from '../lib/devices'
import { toProjectDto } from '../lib/dto'
import { fail, ok } from '../lib/response'

const intervalSchema = z.number().int().min(MIN_TIMELAPSE_INTERVAL_SEC)

const createProjectSchema = z.object({
  name: z.string().trim().min(1).max(255),
  notes: z.string().max(10_000).optional(),
  timelapseEnabled: z.boolean().optional().default(true),
  timelapseIntervalSec: intervalSchema.optional(),
})

const patchProjectSchema = z.object({
  name: z.string().trim().min(1).max(255).optional(),
  notes: z.string().max(10_000).optional(),
  timelapseEnabled: z.boolean().optional(),
  timelapseIntervalSec: intervalSchema.optional(),
})

const listQuerySchema = z.object({
  status: z.enum(['active', 'completed', 'archived']).optional(),
})

function parseProjectId(raw: string) {
  const id = Number(raw)
  return Number.isInteger(id) && id > 0 ? id : null
}

export const projectRoutes = new Hono<AppEnv>()

projectRoutes.get('/', async (c) => {
  const query = parseQuery(c, listQuerySchema)
  if (!query.ok) {
    return fail(c, 'VALIDATION_ERROR', query.message, 400, { details: query.details })
  }
  const projects = await listProjects(c.env.DB, query.data.status)
  return ok(c, projects.map(toProjectDto))
})

projectRoutes.get('/active', async (c) => {
  const project = await getActiveProject(c.env.DB)
  if (!project) {
    return fail(c, 'NO_ACTIVE_PROJECT', 'No active project', 404)
  }
  return ok(c, toProjectDto(project))
})

projectRoutes.get('/:id', async (c) => {
  const projectId = parseProjectId(c.req.param('id'))
  if (projectId == null) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid project id', 400)
  }

  const project = await getProject(c.env.DB, projectId)
  if (!project) {
    return fail(c, 'PROJECT_NOT_FOUND', 'Project not found', 404)
  }
  return ok(c, toProjectDto(project))
})

projectRoutes.post('/', async (c) => {
  const parsed = await parseJsonBody(c, createProjectSchema)
  if (!parsed.ok) {
    return fail(c, 'VALIDATION_ERROR', parsed.message, 400, { details: parsed.details })
  }

  const now = Date.now()
  const endedIds = await endActiveProjects(c.env.DB, now)
  for (const endedId of endedIds) {
    c.env.ENGINE.stopProjectTimelapse(endedId)
  }

  const project = await createProject(c.env.DB, {
    name: parsed.data.name,
    notes: parsed.data.notes,
    timelapseEnabled: parsed.data.timelapseEnabled,
    timelapseIntervalSec: parsed.data.timelapseIntervalSec,
    startedAt: now,
  })
  if (project.timelapseEnabled) {
    c.env.ENGINE.startProjectTimelapse(project)
  }

  return ok(c, toProjectDto(project), 201)
})

projectRoutes.patch('/:id', async (c) => {
  const projectId = parseProjectId(c.req.param('id'))
  if (projectId == null) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid project id', 400)
  }

  const existing = await getProject(c.env.DB, projectId)
  if (!existing) {
    return fail(c, 'PROJECT_NOT_FOUND', 'Project not found', 404)
  }

  const parsed = await parseJsonBody(c, patchProjectSchema)
  if (!parsed.ok) {
    return fail(c, 'VALIDATION_ERROR', parsed.message, 400, { details: parsed.details })
  }

  const updated = await updateProject(c.env.DB, projectId, parsed.data)
  if (!updated) {
    return fail(c, 'PROJECT_NOT_FOUND', 'Project not found', 404)
  }

  if (updated.status === 'active' && updated.timelapseEnabled !== existing.timelapseEnabled) {
    if (updated.timelapseEnabled) {
      c.env.ENGINE.startProjectTimelapse(updated)
    } else {
      c.env.ENGINE.stopProjectTimelapse(updated.id)
    }
  }

  return ok(c, toProjectDto(updated))
})

projectRoutes.post('/:id/end', async (c) => {
  const projectId = parseProjectId(c.req.param('id'))
  if (projectId == null) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid project id', 400)
  }

  const existing = await getProject(c.env.DB, projectId)
  if (!existing) {
    return fail(c, 'PROJECT_NOT_FOUND', 'Project not found', 404)
  }

  await endProject(c.env.DB, projectId, Date.now())
  c.env.ENGINE.stopProjectTimelapse(projectId)

  const project = await getProject(c.env.DB, projectId)
  return ok(c, project ? toProjectDto(project) : null)
})

projectRoutes.post('/:id/archive', async (c) => {
  const projectId = parseProjectId(c.req.param('id'))
  if (projectId == null) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid project id', 400)
  }

  const archived = await archiveProject(c.env.DB, projectId, Date.now())
  if (!archived) {
    return fail(c, 'PROJECT_NOT_FOUND', 'Project not found', 404)
  }
  c.env.ENGINE.stopProjectTimelapse(projectId)

  const project = await getProject(c.env.DB, projectId)
  return ok(c, project ? toProjectDto(project) : null)
})
