import { Hono } from 'hono'
import type { AppEnv } from '../types/app'
import { getActiveProject, getStoredDeviceStates } from '../lib/db'
import { toDeviceStateDtos, toProjectDto, toReadingDto } from '../lib/dto'
import { ok } from '../lib/response'

export const statusRoutes = new Hono<AppEnv>()

statusRoutes.get('/', async (c) => {
  const engine = c.env.ENGINE
  const reading = engine.getLatestReading()
  const [project, persistedStates] = await Promise.all([
    getActiveProject(c.env.DB),
    getStoredDeviceStates(c.env.DB),
  ])

  return ok(c, {
    engine: engine.getHealth(),
    timezone: c.env.TIMEZONE,
    devices: toDeviceStateDtos(engine.getDeviceStates()),
    // last state each device was commanded to, kept across restarts
    persistedStates,
    reading: reading ? toReadingDto(reading) : null,
    activeProject: project ? toProjectDto(project) : null,
  })
})
