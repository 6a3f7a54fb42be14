import { readFile } from 'node:fs/promises'
import { Hono } from 'hono'
import { z } from 'zod'
import type { AppEnv } from '../types/app'
import { parseJsonBody, parseQuery } from '../lib/body'
import {
  countTimelapseImages,
  getActiveProject,
  getProject,
  listTimelapseImagePaths,
  listTimelapseImages,
} from '../lib/db'
import { toTimelapseImageDto, toTimelapseVideoDto } from '../lib/dto'
import { fail, ok } from '../lib/response'
import { isMissingPath } from '../lib/timelapse-video'

const imagesQuerySchema = z.object({
  projectId: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
})

const generateSchema = z.object({
  projectId: z.number().int().positive().optional(),
  fps: z.number().int().min(1).max(120).optional(),
})

export const timelapseRoutes = new Hono<AppEnv>()

timelapseRoutes.get('/images', async (c) => {
  const query = parseQuery(c, imagesQuerySchema)
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

  const [images, total] = await Promise.all([
    listTimelapseImages(c.env.DB, project.id, query.data.limit),
    countTimelapseImages(c.env.DB, project.id),
  ])

  return ok(c, {
    projectId: project.id,
    total,
    images: images.map(toTimelapseImageDto),
  })
})

timelapseRoutes.post('/generate', async (c) => {
  const parsed = await parseJsonBody(c, generateSchema)
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

  const videos = c.env.VIDEOS
  if (videos.isBuilding(project.id)) {
    return fail(c, 'VIDEO_BUILD_IN_PROGRESS', 'A video is already being built for this project', 409)
  }

  const filepaths = await listTimelapseImagePaths(c.env.DB, project.id)
  if (filepaths.length === 0) {
    return fail(c, 'NO_TIMELAPSE_IMAGES', 'No time-lapse images for this project', 400)
  }

  const fps = parsed.data.fps ?? videos.defaultFps
  const now = Date.now()
  void videos.build(project.id, filepaths, fps, now).catch((error: unknown) => {
    console.error(`[video] Build for project ${project.id} failed`, error)
  })

  return ok(
    c,
    {
      projectId: project.id,
      imageCount: filepaths.length,
      fps,
      filename: videos.videoFileName(project.id, now),
    },
    202,
  )
})

timelapseRoutes.get('/videos', async (c) => {
  const videos = await c.env.VIDEOS.list()
  return ok(c, videos.map(toTimelapseVideoDto))
})

timelapseRoutes.get('/videos/:filename', async (c) => {
  const filename = c.req.param('filename')
  const filepath = c.env.VIDEOS.resolve(filename)
  if (!filepath) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid video file name', 400)
  }

  let video: Uint8Array<ArrayBuffer>
  try {
    video = new Uint8Array(await readFile(filepath))
  } catch (error) {
    if (isMissingPath(error)) {
      return fail(c, 'VIDEO_NOT_FOUND', 'Video not found', 404)
    }
    throw error
  }

  return c.body(video, 200, {
    'Content-Type': 'video/mp4',
    'Content-Disposition': `attachment; filename="${filename}"`,
  })
})
