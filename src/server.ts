import { serve } from '@hono/node-server'
import { createApp } from './app'
import { TelegramBotPoller } from './lib/bot'
import { seedDefaultSettings } from './lib/db'
import { createMariaDatabase, createMariaPool } from './lib/db-mariadb'
import { createSqliteDatabase } from './lib/db-sqlite'
import { ControlLoop } from './lib/engine'
import { CommandCamera } from './lib/hardware/camera'
import { SimulatedActuator, SimulatedCamera, SimulatedSensor } from './lib/hardware/simulated'
import { TasmotaRelayActuator, TasmotaSensorSource, createMqttTransport } from './lib/hardware/tasmota'
import type { MqttTransport } from './lib/hardware/tasmota'
import type { Actuator, Capturer, SensorSource } from './lib/hardware/types'
import { ConsoleNotifier, TelegramClient, TelegramNotifier } from './lib/notify'
import type { NotificationSink } from './lib/notify'
import { DailyReportScheduler } from './lib/report'
import { loadServerRuntimeConfig } from './lib/runtime-env'
import type { ServerRuntimeConfig } from './lib/runtime-env'
import { ensureSchema } from './lib/schema'
import { TimelapseVideoBuilder } from './lib/timelapse-video'
import { createDbStore } from './lib/store'
import type { AppDatabase } from './types/db'
import type { EnvBindings } from './types/app'

type Hardware = {
  actuator: Actuator
  sensor: SensorSource
  camera: Capturer
  transport: MqttTransport | null
}

function openDatabase(config: ServerRuntimeConfig): AppDatabase {
  if (config.database.driver === 'mariadb') {
    return createMariaDatabase(createMariaPool(config.database.mariadb))
  }
  return createSqliteDatabase(config.database.path)
}

function createHardware(config: ServerRuntimeConfig): Hardware {
  const { hardware } = config
  const camera: Capturer = hardware.camera.enabled
    ? new CommandCamera({
        command: hardware.camera.command,
        width: hardware.camera.width,
        height: hardware.camera.height,
        timeoutMs: hardware.camera.timeoutMs,
      })
    : new SimulatedCamera()

  if (hardware.mode === 'simulated') {
    return {
      actuator: new SimulatedActuator(),
      sensor: new SimulatedSensor(),
      camera,
      transport: null,
    }
  }

  const transport = createMqttTransport(hardware.mqtt)
  return {
    actuator: new TasmotaRelayActuator(transport, {
      deviceTopic: hardware.tasmotaTopic,
      channels: hardware.relayChannels,
      connectTimeoutMs: hardware.mqtt.connectTimeoutMs,
    }),
    sensor: new TasmotaSensorSource(transport, {
      deviceTopic: hardware.sensorTopic,
      maxAgeMs: hardware.sensorMaxAgeMs,
      connectTimeoutMs: hardware.mqtt.connectTimeoutMs,
    }),
    camera,
    transport,
  }
}

async function startEngine(
  config: ServerRuntimeConfig,
  db: AppDatabase,
  hardware: Hardware,
  notifier: NotificationSink,
) {
  const store = createDbStore(db)
  const { actuator, sensor, camera } = hardware
  const engine = new ControlLoop({ actuator, sensor, camera, store, notifier }, config.engine)
  try {
    await engine.start()
    return engine
  } catch (error) {
    console.error('[server] Relay board unavailable; falling back to simulated relays', error)
  }

  const fallback = new ControlLoop({ actuator: new SimulatedActuator(), sensor, camera, store, notifier }, config.engine)
  await fallback.start()
  return fallback
}

async function main() {
  const config = loadServerRuntimeConfig(process.env)
  const db = openDatabase(config)
  await ensureSchema(db)
  await seedDefaultSettings(db)

  const telegram =
    config.telegram.botToken && config.telegram.chatId
      ? { client: new TelegramClient({ token: config.telegram.botToken }), chatId: config.telegram.chatId }
      : null
  const notifier: NotificationSink = telegram
    ? new TelegramNotifier(telegram.client, telegram.chatId)
    : new ConsoleNotifier()
  if (!telegram) {
    console.warn('[server] TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID missing; alerts go to the console')
  }

  const hardware = createHardware(config)
  const engine = await startEngine(config, db, hardware, notifier)

  const bot =
    telegram && config.telegram.pollingEnabled
      ? new TelegramBotPoller(telegram.client, { chatId: telegram.chatId, db, engine })
      : null
  bot?.start()

  const report = config.dailyReport.enabled
    ? new DailyReportScheduler({ db, notifier, cron: config.dailyReport.cron, timezone: config.timezone })
    : null
  report?.start()

  const videos = new TimelapseVideoBuilder({ dataDir: config.dataDir, timezone: config.timezone, ...config.video })

  const bindings: EnvBindings = {
    DB: db,
    ENGINE: engine,
    VIDEOS: videos,
    TIMEZONE: config.timezone,
    CORS_ORIGINS: config.corsOrigins.join(','),
  }
  const app = createApp()
  const server = serve({
    port: config.port,
    fetch: (request) => app.fetch(request, bindings),
  })

  console.log(`[server] Running on http://127.0.0.1:${config.port} (hardware=${config.hardware.mode}, tz=${config.timezone})`)

  let shuttingDown = false
  const shutdown = async () => {
    if (shuttingDown) {
      return
    }
    shuttingDown = true
    console.log('[server] Shutting down')

    report?.stop()
    await bot?.stop()
    await engine.stop()
    await hardware.transport?.end()

    await new Promise<void>((resolveShutdown) => {
      server.close(() => resolveShutdown())
    })
    await db.close()
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown()
  })
  process.on('SIGTERM', () => {
    void shutdown()
  })
}

void main().catch((error) => {
  console.error('[server] Fatal error while starting server', error)
  process.exit(1)
})
