import { Hono } from 'hono'
import { z } from 'zod'
import type { AppEnv } from '../types/app'
import { parseQuery } from '../lib/body'
import { getLatestSensorLog, getSensorStats, listSensorLogs } from '../lib/db'
import { toReadingDto, toSensorLogDto } from '../lib/dto'
import { fail, ok } from '../lib/response'

const HOUR_MS = 60 * 60 * 1000

const historyQuerySchema = z.object({
  hours: z.coerce.number().positive().max(24 * 365).default(24),
  limit: z.coerce.number().int().min(1).max(5000).default(500),
  projectId: z.coerce.number().int().positive().optional(),
})

const statsQuerySchema = z.object({
  hours: z.coerce.number().positive().max(24 * 365).default(24),
  projectId: z.coerce.number().int().positive().optional(),
})

export const sensorRoutes = new Hono<AppEnv>()

sensorRoutes.get('/current', async (c) => {
  const live = c.env.ENGINE.getLatestReading()
  if (live) {
    return ok(c, { source: 'live', reading: toReadingDto(live) })
  }

  const logged = await getLatestSensorLog(c.env.DB)
  if (logged) {
    return ok(c, { source: 'log', reading: toSensorLogDto(logged) })
  }
  return ok(c, { source: null, reading: null })
})

sensorRoutes.get('/history', async (c) => {
  const query = parseQuery(c, historyQuerySchema)
  if (!query.ok) {
    return fail(c, 'VALIDATION_ERROR', query.message, 400, { details: query.details })
  }

  const rows = await listSensorLogs(c.env.DB, {
    projectId: query.data.projectId,
    since: Date.now() - query.data.hours * HOUR_MS,
    limit: query.data.limit,
  })
  return ok(c, rows.map(toSensorLogDto))
})

sensorRoutes.get('/stats', async (c) => {
  const query = parseQuery(c, statsQuerySchema)
  if (!query.ok) {
    return fail(c, 'VALIDATION_ERROR', query.message, 400, { details: query.details })
  }

  const stats = await getSensorStats(c.env.DB, {
    projectId: query.data.projectId,
    since: Date.now() - query.data.hours * HOUR_MS,
  })
  return ok(c, { hours: query.data.hours, ...stats })
})
