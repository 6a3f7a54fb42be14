import { resolve } from 'node:path'
import type { ControlLoopOptions } from './engine'
import type { MariaDbRuntimeConfig } from './db-mariadb'
import { parseRelayChannelMap } from './tasmota'
import { isValidTimezone } from './time-of-day'

export type HardwareMode = 'simulated' | 'tasmota'

export type DatabaseRuntimeConfig =
  | { driver: 'sqlite'; path: string }
  | { driver: 'mariadb'; mariadb: MariaDbRuntimeConfig }

export type ServerRuntimeConfig = {
  port: number
  timezone: string
  dataDir: string
  corsOrigins: string[]
  database: DatabaseRuntimeConfig
  engine: ControlLoopOptions
  hardware: {
    mode: HardwareMode
    mqtt: {
      url: string
      username?: string
      password?: string
      clientIdPrefix: string
      connectTimeoutMs: number
    }
    tasmotaTopic: string
    sensorTopic: string
    relayChannels: Record<string, string>
    sensorMaxAgeMs: number
    camera: {
      enabled: boolean
      command: string
      width: number
      height: number
      timeoutMs: number
    }
  }
  telegram: {
    botToken?: string
    chatId?: string
    pollingEnabled: boolean
  }
  dailyReport: {
    enabled: boolean
    cron: string
  }
  video: {
    command: string
    defaultFps: number
    timeoutMs: number
  }
}

function readRequired(env: NodeJS.ProcessEnv, key: string) {
  const value = env[key]?.trim()
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`)
  }
  return value
}

function readOptional(env: NodeJS.ProcessEnv, key: string) {
  const value = env[key]?.trim()
  return value ? value : undefined
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number) {
  const raw = env[key]
  if (!raw) return fallback
  const parsed = Number(raw)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback
  }
  return parsed
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback: boolean) {
  const raw = env[key]
  if (!raw) return fallback
  const normalized = raw.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true
  }
  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false
  }
  return fallback
}

function readTimezone(env: NodeJS.ProcessEnv) {
  const timezone = env.TIMEZONE?.trim() || 'UTC'
  if (!isValidTimezone(timezone)) {
    throw new Error(`Invalid TIMEZONE: ${timezone}`)
  }
  return timezone
}

function readHardwareMode(env: NodeJS.ProcessEnv): HardwareMode {
  const raw = env.HARDWARE_MODE?.trim().toLowerCase()
  if (!raw || raw === 'simulated') {
    return 'simulated'
  }
  if (raw === 'tasmota') {
    return 'tasmota'
  }
  throw new Error(`Invalid HARDWARE_MODE: ${raw}`)
}

function readDatabase(env: NodeJS.ProcessEnv, dataDir: string): DatabaseRuntimeConfig {
  const driver = env.DB_DRIVER?.trim().toLowerCase() || 'sqlite'
  if (driver === 'sqlite') {
    return { driver: 'sqlite', path: env.SQLITE_PATH?.trim() || resolve(dataDir, 'growtent.db') }
  }
  if (driver === 'mariadb') {
    return {
      driver: 'mariadb',
      mariadb: {
        host: env.DB_HOST?.trim() || '127.0.0.1',
        port: readNumber(env, 'DB_PORT', 3306),
        user: readRequired(env, 'DB_USER'),
        password: env.DB_PASSWORD ?? '',
        database: readRequired(env, 'DB_NAME'),
        connectionLimit: readNumber(env, 'DB_CONNECTION_LIMIT', 10),
      },
    }
  }
  throw new Error(`Invalid DB_DRIVER: ${driver}`)
}

export function loadServerRuntimeConfig(env: NodeJS.ProcessEnv): ServerRuntimeConfig {
  const timezone = readTimezone(env)
  const dataDir = resolve(env.DATA_DIR?.trim() || './data')
  const hardwareMode = readHardwareMode(env)
  const tasmotaTopic = hardwareMode === 'tasmota' ? readRequired(env, 'TASMOTA_TOPIC') : env.TASMOTA_TOPIC?.trim() || 'growtent'

  return {
    port: readNumber(env, 'PORT', 8787),
    timezone,
    dataDir,
    corsOrigins: (env.CORS_ORIGINS ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean),
    database: readDatabase(env, dataDir),
    engine: {
      timezone,
      dataDir,
      sensorReadIntervalMs: readNumber(env, 'SENSOR_READ_INTERVAL_SEC', 30) * 1000,
      dataLogIntervalMs: readNumber(env, 'DATA_LOG_INTERVAL_SEC', 60) * 1000,
      alertCheckIntervalMs: readNumber(env, 'ALERT_CHECK_INTERVAL_SEC', 60) * 1000,
      maxConsecutiveFailures: readNumber(env, 'ENGINE_MAX_CONSECUTIVE_FAILURES', 10),
      backoffMs: readNumber(env, 'ENGINE_BACKOFF_SEC', 60) * 1000,
      stopTimeoutMs: readNumber(env, 'ENGINE_STOP_TIMEOUT_SEC', 10) * 1000,
    },
    hardware: {
      mode: hardwareMode,
      mqtt: {
        url: hardwareMode === 'tasmota' ? readRequired(env, 'MQTT_URL') : env.MQTT_URL?.trim() || 'mqtt://127.0.0.1:1883',
        username: readOptional(env, 'MQTT_USERNAME'),
        password: readOptional(env, 'MQTT_PASSWORD'),
        clientIdPrefix: env.MQTT_CLIENT_ID_PREFIX?.trim() || 'growtent',
        connectTimeoutMs: readNumber(env, 'MQTT_CONNECT_TIMEOUT_SEC', 10) * 1000,
      },
      tasmotaTopic,
      sensorTopic: env.TASMOTA_SENSOR_TOPIC?.trim() || tasmotaTopic,
      relayChannels: parseRelayChannelMap(env.RELAY_CHANNELS),
      sensorMaxAgeMs: readNumber(env, 'SENSOR_MAX_AGE_SEC', 120) * 1000,
      camera: {
        enabled: readBoolean(env, 'CAMERA_ENABLED', hardwareMode === 'tasmota'),
        command: env.CAMERA_COMMAND?.trim() || 'rpicam-still',
        width: readNumber(env, 'CAMERA_WIDTH', 1920),
        height: readNumber(env, 'CAMERA_HEIGHT', 1080),
        timeoutMs: readNumber(env, 'CAMERA_TIMEOUT_SEC', 30) * 1000,
      },
    },
    telegram: {
      botToken: readOptional(env, 'TELEGRAM_BOT_TOKEN'),
      chatId: readOptional(env, 'TELEGRAM_CHAT_ID'),
      pollingEnabled: readBoolean(env, 'TELEGRAM_POLLING_ENABLED', true),
    },
    dailyReport: {
      enabled: readBoolean(env, 'DAILY_REPORT_ENABLED', true),
      cron: env.DAILY_REPORT_CRON?.trim() || '0 8 * * *',
    },
    video: {
      command: env.FFMPEG_COMMAND?.trim() || 'ffmpeg',
      defaultFps: readNumber(env, 'TIMELAPSE_FPS', 30),
      timeoutMs: readNumber(env, 'VIDEO_TIMEOUT_SEC', 600) * 1000,
    },
  }
}
