import { Hono } from 'hono'
import type { AppEnv } from '../types/app'
import { fail, ok } from '../lib/response'

export const cameraRoutes = new Hono<AppEnv>()

cameraRoutes.post('/capture', async (c) => {
  const filepath = await c.env.ENGINE.capturePhoto()
  if (!filepath) {
    return fail(c, 'CAMERA_UNAVAILABLE', 'Camera unavailable', 503)
  }
  return ok(c, { filepath, capturedAt: new Date().toISOString() }, 201)
})
