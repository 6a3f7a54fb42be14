import { Hono } from 'hono'
import type { AppEnv } from '../types/app'

export const openApiRoutes = new Hono<AppEnv>()

openApiRoutes.get('/openapi.json', (c) => {
  const spec = {
    openapi: '3.1.0',
    info: {
      title: 'Grow Tent Controller API',
      version: 'v1',
      description: 'Device control, projects, sensor history and time-lapse for a single grow tent',
    },
    servers: [{ url: '/' }],
    paths: {
      '/api/v1/status': { get: { summary: 'Engine health, device states, latest reading and active project' } },
      '/api/v1/devices': { get: { summary: 'List relay states' } },
      '/api/v1/devices/{name}': { get: { summary: 'Get one relay state' } },
      '/api/v1/devices/{name}/control': { post: { summary: 'Switch a device ON or OFF' } },
      '/api/v1/devices/{name}/toggle': { post: { summary: 'Toggle a device' } },
      '/api/v1/settings/devices': { get: { summary: 'List device automation settings' } },
      '/api/v1/settings/devices/{name}': {
        get: { summary: 'Get device automation settings' },
        put: { summary: 'Update device mode, schedule and thresholds' },
      },
      '/api/v1/settings/alerts': {
        get: { summary: 'Get alert bounds' },
        put: { summary: 'Update alert bounds' },
      },
      '/api/v1/projects': {
        get: { summary: 'List projects' },
        post: { summary: 'Start a project (ends the active one)' },
      },
      '/api/v1/projects/active': { get: { summary: 'Get the active project' } },
      '/api/v1/projects/{id}': {
        get: { summary: 'Get project detail' },
        patch: { summary: 'Update project name, notes and time-lapse' },
      },
      '/api/v1/projects/{id}/end': { post: { summary: 'Complete a project' } },
      '/api/v1/projects/{id}/archive': { post: { summary: 'Archive a project' } },
      '/api/v1/sensors/current': { get: { summary: 'Latest reading' } },
      '/api/v1/sensors/history': { get: { summary: 'Logged readings' } },
      '/api/v1/sensors/stats': { get: { summary: 'Min, max and average of logged readings' } },
      '/api/v1/timelapse/images': { get: { summary: 'Time-lapse images of a project' } },
      '/api/v1/timelapse/generate': { post: { summary: 'Assemble a project time-lapse video' } },
      '/api/v1/timelapse/videos': { get: { summary: 'List assembled videos' } },
      '/api/v1/timelapse/videos/{filename}': { get: { summary: 'Download a video' } },
      '/api/v1/diary': {
        get: { summary: 'Diary entries of a project' },
        post: { summary: 'Add a diary entry' },
      },
      '/api/v1/diary/{id}': {
        get: { summary: 'Get a diary entry' },
        patch: { summary: 'Edit a diary entry' },
        delete: { summary: 'Delete a diary entry' },
      },
      '/api/v1/camera/capture': { post: { summary: 'Take a photo now' } },
      '/api/v1/openapi.json': { get: { summary: 'OpenAPI document' } },
    },
  }

  return c.json(spec)
})
