import type { AppDatabase } from '../types/db'
import type { AlertConfig } from '../types/grow'
import { getActiveProject, getAlertSettings, getSystemSetting, setSystemSetting } from './db'
import { getDeviceDisplayName, isDeviceName } from './devices'
import type { ControlLoop } from './engine'
import { interruptibleSleep } from './engine'
import type { TelegramClient, TelegramUpdate } from './notify'
import { DAY_MS } from './time-of-day'

export type BotEngine = Pick<
  ControlLoop,
  'getHealth' | 'getDeviceStates' | 'getLatestReading' | 'turnOn' | 'turnOff' | 'capturePhoto' | 'hasDevice'
>

export type BotCommandContext = {
  engine: BotEngine
  db: AppDatabase
  now: number
}

export type BotReply =
  | { kind: 'text'; text: string }
  | { kind: 'photo'; filepath: string; caption: string }

export type ParsedBotCommand = {
  command: string
  args: string[]
}

const HELP_TEXT = [
  '🌱 Grow tent bot',
  '',
  '/status - current readings and project',
  '/devices - relay states',
  '/on <device> - switch a device on',
  '/off <device> - switch a device off',
  '/alerts - alert bounds',
  '/photo - take a photo',
].join('\n')

/** `/cmd@botname arg` -> `{ command: 'cmd', args: ['arg'] }`; null for plain text. */
export function parseBotCommand(text: string): ParsedBotCommand | null {
  const trimmed = text.trim()
  if (!trimmed.startsWith('/')) {
    return null
  }

  const [head, ...args] = trimmed.split(/\s+/)
  const command = head.slice(1).split('@')[0].toLowerCase()
  if (!command) {
    return null
  }
  return { command, args }
}

function text(value: string): BotReply {
  return { kind: 'text', text: value }
}

function formatState(state: boolean | null) {
  if (state == null) return 'unknown'
  return state ? 'ON' : 'OFF'
}

function formatRange(min: number | null, max: number | null, unit: string) {
  const low = min == null ? 'not set' : `${min}${unit}`
  const high = max == null ? 'not set' : `${max}${unit}`
  return `min ${low}, max ${high}`
}

async function statusReply(ctx: BotCommandContext) {
  const health = ctx.engine.getHealth()
  const reading = ctx.engine.getLatestReading()
  const project = await getActiveProject(ctx.db)

  const lines = ['🌱 Grow tent status', `Engine: ${health.state}`]
  if (reading) {
    lines.push(
      `Temperature: ${reading.temperature.toFixed(1)}°C`,
      `Humidity: ${reading.humidity.toFixed(1)}%`,
      `Pressure: ${reading.pressure.toFixed(1)} hPa`,
      `Gas: ${reading.gasResistance.toFixed(0)} Ω`,
    )
  } else {
    lines.push('No sensor data yet')
  }

  if (project) {
    const day = Math.floor((ctx.now - project.startedAt) / DAY_MS) + 1
    lines.push(`Project: ${project.name} (day ${day})`)
  } else {
    lines.push('Project: none')
  }
  return text(lines.join('\n'))
}

function devicesReply(ctx: BotCommandContext) {
  const states = ctx.engine.getDeviceStates()
  const lines = Object.entries(states).map(
    ([deviceName, state]) => `${getDeviceDisplayName(deviceName)}: ${formatState(state)}`,
  )
  return text(['🔌 Devices', ...lines].join('\n'))
}

async function switchReply(ctx: BotCommandContext, args: string[], on: boolean) {
  const action = on ? 'ON' : 'OFF'
  const deviceName = args[0]?.toLowerCase()
  if (!deviceName) {
    return text(`Usage: /${on ? 'on' : 'off'} <device>`)
  }
  if (!isDeviceName(deviceName) || !ctx.engine.hasDevice(deviceName)) {
    return text(`Unknown device: ${deviceName}`)
  }

  const result = on ? await ctx.engine.turnOn(deviceName) : await ctx.engine.turnOff(deviceName)
  const displayName = getDeviceDisplayName(deviceName)
  return text(result.ok ? `✅ ${displayName} turned ${action}` : `❌ Failed to turn ${action} ${displayName}`)
}

function alertsReply(config: AlertConfig) {
  return text(
    [
      `🔔 Alerts ${config.enabled ? 'enabled' : 'disabled'}`,
      `Temperature: ${formatRange(config.tempMin, config.tempMax, '°C')}`,
      `Humidity: ${formatRange(config.humidityMin, config.humidityMax, '%')}`,
      `Repeat every ${config.notificationIntervalSec}s`,
    ].join('\n'),
  )
}

async function photoReply(ctx: BotCommandContext): Promise<BotReply> {
  const filepath = await ctx.engine.capturePhoto()
  if (!filepath) {
    return text('📷 Camera unavailable')
  }
  return { kind: 'photo', filepath, caption: '📷 Grow tent snapshot' }
}

/** Answers one chat message; null when the message is not a command. */
export async function handleBotCommand(message: string, ctx: BotCommandContext): Promise<BotReply | null> {
  const parsed = parseBotCommand(message)
  if (!parsed) {
    return null
  }

  switch (parsed.command) {
    case 'start':
    case 'help':
      return text(HELP_TEXT)
    case 'status':
      return statusReply(ctx)
    case 'devices':
      return devicesReply(ctx)
    case 'on':
      return switchReply(ctx, parsed.args, true)
    case 'off':
      return switchReply(ctx, parsed.args, false)
    case 'alerts':
      return alertsReply(await getAlertSettings(ctx.db))
    case 'photo':
      return photoReply(ctx)
    default:
      return text('Unknown command. Send /help for the list.')
  }
}

const UPDATE_OFFSET_KEY = 'telegram_update_offset'

export type TelegramBotPollerOptions = {
  chatId: string
  db: AppDatabase
  engine: BotEngine
  pollTimeoutSec?: number
  retryDelayMs?: number
  clock?: () => number
}

/** Long-polls `getUpdates` and answers commands from the configured chat only. */
export class TelegramBotPoller {
  private abort: AbortController | null = null
  private loop: Promise<void> | null = null

  constructor(
    private readonly client: TelegramClient,
    private readonly options: TelegramBotPollerOptions,
  ) {}

  start() {
    if (this.abort) {
      console.warn('[bot] Poller already running')
      return
    }
    this.abort = new AbortController()
    this.loop = this.run(this.abort.signal)
    console.log('[bot] Telegram polling started')
  }

  async stop() {
    if (!this.abort) {
      return
    }
    this.abort.abort()
    await this.loop
    this.abort = null
    this.loop = null
    console.log('[bot] Telegram polling stopped')
  }

  async handleUpdate(update: TelegramUpdate) {
    const message = update.message
    if (!message?.text) {
      return
    }
    if (String(message.chat.id) !== this.options.chatId) {
      console.warn(`[bot] Ignoring message from chat ${message.chat.id}`)
      return
    }

    const reply = await handleBotCommand(message.text, {
      engine: this.options.engine,
      db: this.options.db,
      now: (this.options.clock ?? Date.now)(),
    })
    if (!reply) {
      return
    }

    if (reply.kind === 'photo') {
      await this.client.sendPhoto(this.options.chatId, reply.filepath, reply.caption)
    } else {
      await this.client.sendMessage(this.options.chatId, reply.text)
    }
  }

  private async run(signal: AbortSignal) {
    let offset: number | null = null

    while (!signal.aborted) {
      try {
        if (offset == null) {
          offset = Number(await getSystemSetting(this.options.db, UPDATE_OFFSET_KEY)) || 0
        }

        const updates = await this.client.getUpdates(offset, this.options.pollTimeoutSec ?? 25, signal)
        for (const update of updates) {
          offset = update.update_id + 1
          try {
            await this.handleUpdate(update)
          } catch (error) {
            console.error(`[bot] Failed to handle update ${update.update_id}`, error)
          }
        }
        if (updates.length > 0) {
          await setSystemSetting(this.options.db, UPDATE_OFFSET_KEY, String(offset))
        }
      } catch (error) {
        if (signal.aborted) {
          break
        }
        console.error('[bot] Polling failed', error)
        await interruptibleSleep(this.options.retryDelayMs ?? 5_000, signal)
      }
    }
  }
}
