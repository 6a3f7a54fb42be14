import { Hono } from 'hono'
import { z } from 'zod'
import type { AppEnv } from '../types/app'
import type { AlertConfig, DeviceConfig } from '../types/grow'
import { parseJsonBody } from '../lib/body'
import {
  DEVICE_MODES,
  getAlertSettings,
  getAllDeviceSettings,
  getDeviceSettings,
  saveAlertSettings,
  saveDeviceSettings,
  thresholdsSchema,
} from '../lib/db'
import { DEVICE_NAMES, getDefaultDeviceSettings, isDeviceName } from '../lib/devices'
import { toDeviceSettingsDto } from '../lib/dto'
import { fail, ok } from '../lib/response'
import { parseScheduleRule } from '../lib/rules'

const deviceSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  mode: z.enum(DEVICE_MODES).optional(),
  schedule: z.array(z.unknown()).optional(),
  thresholds: thresholdsSchema.optional(),
})

const nullableBound = z.number().finite().nullable()

const alertSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  tempMin: nullableBound.optional(),
  tempMax: nullableBound.optional(),
  humidityMin: nullableBound.optional(),
  humidityMax: nullableBound.optional(),
  notificationIntervalSec: z.number().int().min(0).optional(),
})

/** Index and reason of each schedule entry that would be skipped at evaluation. */
export function findInvalidScheduleEntries(schedule: unknown[]) {
  const invalid: Array<{ index: number; message: string }> = []
  schedule.forEach((entry, index) => {
    const parsed = parseScheduleRule(entry)
    if (!parsed.ok) {
      invalid.push({ index, message: parsed.message })
    }
  })
  return invalid
}

function invertedBounds(config: AlertConfig) {
  const problems: string[] = []
  if (config.tempMin != null && config.tempMax != null && config.tempMin >= config.tempMax) {
    problems.push('tempMin must be below tempMax')
  }
  if (config.humidityMin != null && config.humidityMax != null && config.humidityMin >= config.humidityMax) {
    problems.push('humidityMin must be below humidityMax')
  }
  return problems
}

export const settingsRoutes = new Hono<AppEnv>()

settingsRoutes.get('/devices', async (c) => {
  const stored = await getAllDeviceSettings(c.env.DB)
  const deviceNames = Array.from(new Set<string>([...DEVICE_NAMES, ...Object.keys(stored)]))
  return ok(
    c,
    deviceNames.map((deviceName) =>
      toDeviceSettingsDto(deviceName, stored[deviceName] ?? getDefaultDeviceSettings(deviceName)),
    ),
  )
})

settingsRoutes.get('/devices/:name', async (c) => {
  const deviceName = c.req.param('name')
  const stored = await getDeviceSettings(c.env.DB, deviceName)
  if (!stored && !isDeviceName(deviceName)) {
    return fail(c, 'DEVICE_NOT_FOUND', 'Device not found', 404)
  }
  return ok(c, toDeviceSettingsDto(deviceName, stored ?? getDefaultDeviceSettings(deviceName)))
})

settingsRoutes.put('/devices/:name', async (c) => {
  const deviceName = c.req.param('name')
  const stored = await getDeviceSettings(c.env.DB, deviceName)
  if (!stored && !isDeviceName(deviceName)) {
    return fail(c, 'DEVICE_NOT_FOUND', 'Device not found', 404)
  }

  const parsed = await parseJsonBody(c, deviceSettingsSchema)
  if (!parsed.ok) {
    return fail(c, 'VALIDATION_ERROR', parsed.message, 400, { details: parsed.details })
  }

  const current = stored ?? getDefaultDeviceSettings(deviceName)
  const next: DeviceConfig = {
    enabled: parsed.data.enabled ?? current.enabled,
    mode: parsed.data.mode ?? current.mode,
    schedule: parsed.data.schedule ?? current.schedule,
    thresholds: parsed.data.thresholds ?? current.thresholds,
  }

  const invalidEntries = findInvalidScheduleEntries(next.schedule)
  if (invalidEntries.length > 0) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid schedule entries', 400, { schedule: invalidEntries })
  }

  await saveDeviceSettings(c.env.DB, deviceName, next)
  return ok(c, toDeviceSettingsDto(deviceName, next))
})

settingsRoutes.get('/alerts', async (c) => {
  return ok(c, await getAlertSettings(c.env.DB))
})

settingsRoutes.put('/alerts', async (c) => {
  const parsed = await parseJsonBody(c, alertSettingsSchema)
  if (!parsed.ok) {
    return fail(c, 'VALIDATION_ERROR', parsed.message, 400, { details: parsed.details })
  }

  const current = await getAlertSettings(c.env.DB)
  const next: AlertConfig = {
    enabled: parsed.data.enabled ?? current.enabled,
    tempMin: parsed.data.tempMin !== undefined ? parsed.data.tempMin : current.tempMin,
    tempMax: parsed.data.tempMax !== undefined ? parsed.data.tempMax : current.tempMax,
    humidityMin: parsed.data.humidityMin !== undefined ? parsed.data.humidityMin : current.humidityMin,
    humidityMax: parsed.data.humidityMax !== undefined ? parsed.data.humidityMax : current.humidityMax,
    notificationIntervalSec: parsed.data.notificationIntervalSec ?? current.notificationIntervalSec,
  }

  const problems = invertedBounds(next)
  if (problems.length > 0) {
    return fail(c, 'VALIDATION_ERROR', 'Invalid alert bounds', 400, { problems })
  }

  await saveAlertSettings(c.env.DB, next)
  return ok(c, next)
})
