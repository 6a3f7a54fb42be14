import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { cameraRoutes } from './routes/camera'
import { deviceRoutes } from './routes/devices'
import { diaryRoutes } from './routes/diary'
import { openApiRoutes } from './routes/openapi'
import { projectRoutes } from './routes/projects'
import { sensorRoutes } from './routes/sensors'
import { settingsRoutes } from './routes/settings'
import { statusRoutes } from './routes/status'
import { timelapseRoutes } from './routes/timelapse'
import { requestIdMiddleware } from './middleware/request-id'
import { fail, ok } from './lib/response'
import type { AppEnv } from './types/app'

export function createApp() {
  const app = new Hono<AppEnv>()

  app.use('*', requestIdMiddleware)
  app.use(
    '/api/*',
    cors({
      origin: (origin, c) => {
        const configuredOrigins = (c.env.CORS_ORIGINS ?? '')
          .split(',')
          .map((item: string) => item.trim())
          .filter(Boolean)
        const allowedOrigins =
          configuredOrigins.length > 0 ? configuredOrigins : ['http://127.0.0.1:5173', 'http://localhost:5173']

        if (!origin) {
          return allowedOrigins[0] ?? 'http://127.0.0.1:5173'
        }

        return allowedOrigins.includes(origin) ? origin : ''
      },
      allowHeaders: ['Content-Type', 'X-Request-Id'],
      allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      exposeHeaders: ['X-Request-Id'],
      maxAge: 600,
    }),
  )

  app.onError((error, c) => {
    console.error('[server] Unhandled error', error)
    return fail(c, 'INTERNAL_ERROR', 'Internal server error', 500)
  })

  app.notFound((c) => {
    return fail(c, 'NOT_FOUND', `No route for ${c.req.method} ${c.req.path}`, 404)
  })

  app.get('/', (c) => {
    return ok(c, {
      name: 'growtent-backend',
      status: 'ok',
    })
  })

  app.route('/api/v1/status', statusRoutes)
  app.route('/api/v1/devices', deviceRoutes)
  app.route('/api/v1/settings', settingsRoutes)
  app.route('/api/v1/projects', projectRoutes)
  app.route('/api/v1/sensors', sensorRoutes)
  app.route('/api/v1/timelapse', timelapseRoutes)
  app.route('/api/v1/diary', diaryRoutes)
  app.route('/api/v1/camera', cameraRoutes)
  app.route('/api/v1', openApiRoutes)

  return app
}
