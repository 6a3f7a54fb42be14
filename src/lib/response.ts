import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import type { ApiErrorCode, AppEnv } from '../types/app'

type Meta = {
  requestId: string
  timestamp: string
  version: 'v1'
}

function getMeta(c: Context<AppEnv>): Meta {
  return {
    requestId: c.get('requestId') ?? crypto.randomUUID(),
    timestamp: new Date().toISOString(),
    version: 'v1',
  }
}

export function buildSuccessEnvelope<T>(c: Context<AppEnv>, data: T) {
  return {
    success: true,
    data,
    error: null,
    meta: getMeta(c),
  }
}

export function buildErrorEnvelope(
  c: Context<AppEnv>,
  code: ApiErrorCode,
  message: string,
  details: Record<string, unknown> = {},
) {
  return {
    success: false,
    data: null,
    error: {
      code,
      message,
      details,
    },
    meta: getMeta(c),
  }
}

export function ok<T>(c: Context<AppEnv>, data: T, status: ContentfulStatusCode = 200) {
  return c.json(buildSuccessEnvelope(c, data), status)
}

export function fail(
  c: Context<AppEnv>,
  code: ApiErrorCode,
  message: string,
  status: ContentfulStatusCode = 400,
  details: Record<string, unknown> = {},
) {
  return c.json(buildErrorEnvelope(c, code, message, details), status)
}

const KNOWN_ERRORS = {
  DEVICE_NOT_FOUND: { status: 404, message: 'Device not found' },
  PROJECT_NOT_FOUND: { status: 404, message: 'Project not found' },
  NO_ACTIVE_PROJECT: { status: 404, message: 'No active project' },
  DEVICE_CONTROL_FAILED: { status: 502, message: 'Device command could not be delivered' },
  CAMERA_UNAVAILABLE: { status: 503, message: 'Camera unavailable' },
} as const satisfies Partial<Record<ApiErrorCode, { status: ContentfulStatusCode; message: string }>>

type KnownErrorCode = keyof typeof KNOWN_ERRORS

function isKnownErrorCode(value: string): value is KnownErrorCode {
  return Object.hasOwn(KNOWN_ERRORS, value)
}

/** Maps an `Error` whose message is a known error code; anything else is rethrown. */
export function failFromError(c: Context<AppEnv>, error: unknown) {
  const code = error instanceof Error ? error.message : ''
  if (!isKnownErrorCode(code)) {
    throw error
  }
  const known = KNOWN_ERRORS[code]
  return fail(c, code, known.message, known.status)
}
