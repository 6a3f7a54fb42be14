import type { ControlLoop } from '../lib/engine'
import type { TimelapseVideoBuilder } from '../lib/timelapse-video'
import type { AppDatabase } from './db'

export type EnvBindings = {
  DB: AppDatabase
  ENGINE: ControlLoop
  VIDEOS: TimelapseVideoBuilder
  TIMEZONE: string
  CORS_ORIGINS?: string
}

export type AppVariables = {
  requestId: string
}

export type AppEnv = {
  Bindings: EnvBindings
  Variables: AppVariables
}

export type ApiErrorCode =
  | 'VALIDATION_ERROR'
  | 'DEVICE_NOT_FOUND'
  | 'PROJECT_NOT_FOUND'
  | 'NO_ACTIVE_PROJECT'
  | 'DEVICE_CONTROL_FAILED'
  | 'CAMERA_UNAVAILABLE'
  | 'DIARY_ENTRY_NOT_FOUND'
  | 'NO_TIMELAPSE_IMAGES'
  | 'VIDEO_BUILD_IN_PROGRESS'
  | 'VIDEO_NOT_FOUND'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR'
