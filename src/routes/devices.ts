import { Hono } from 'hono'
import { z } from 'zod'
import type { AppEnv } from '../types/app'
import { parseJsonBody } from '../lib/body'
import { toDeviceStateDto, toDeviceStateDtos } from '../lib/dto'
import type { DeviceControlResult } from '../lib/engine'
import { fail, failFromError, ok } from '../lib/response'

const controlSchema = z.object({
  action: z.enum(['ON', 'OFF']),
})

export const deviceRoutes = new Hono<AppEnv>()

deviceRoutes.get('/', (c) => {
  return ok(c, toDeviceStateDtos(c.env.ENGINE.getDeviceStates()))
})

deviceRoutes.get('/:name', (c) => {
  const deviceName = c.req.param('name')
  const engine = c.env.ENGINE
  if (!engine.hasDevice(deviceName)) {
    return fail(c, 'DEVICE_NOT_FOUND', 'Device not found', 404)
  }
  return ok(c, toDeviceStateDto(deviceName, engine.getDeviceStates()[deviceName] ?? null))
})

deviceRoutes.post('/:name/control', async (c) => {
  const deviceName = c.req.param('name')
  if (!c.env.ENGINE.hasDevice(deviceName)) {
    return fail(c, 'DEVICE_NOT_FOUND', 'Device not found', 404)
  }

  const parsed = await parseJsonBody(c, controlSchema)
  if (!parsed.ok) {
    return fail(c, 'VALIDATION_ERROR', parsed.message, 400, { details: parsed.details })
  }

  let result: DeviceControlResult
  try {
    result =
      parsed.data.action === 'ON'
        ? await c.env.ENGINE.turnOn(deviceName)
        : await c.env.ENGINE.turnOff(deviceName)
  } catch (error) {
    return failFromError(c, error)
  }

  if (!result.ok) {
    return fail(c, 'DEVICE_CONTROL_FAILED', `Could not switch ${deviceName} ${parsed.data.action}`, 502)
  }
  return ok(c, toDeviceStateDto(deviceName, result.state))
})

deviceRoutes.post('/:name/toggle', async (c) => {
  const deviceName = c.req.param('name')

  let result: DeviceControlResult
  try {
    result = await c.env.ENGINE.toggle(deviceName)
  } catch (error) {
    return failFromError(c, error)
  }

  if (!result.ok) {
    return fail(c, 'DEVICE_CONTROL_FAILED', `Could not toggle ${deviceName}`, 502)
  }
  return ok(c, toDeviceStateDto(deviceName, result.state))
})
