import { z } from 'zod'
import type { EnvironmentReading } from '../types/grow'
import { DEVICE_NAMES } from './devices'

export type SwitchPower = 'ON' | 'OFF'

export type PowerUpdate = {
  channel: string
  power: SwitchPower
}

export type TasmotaMessage =
  | { type: 'power'; updates: PowerUpdate[] }
  | { type: 'sensor'; reading: EnvironmentReading }
  | { type: 'lwt'; online: boolean }

export type PublishTarget = {
  topic: string
  payload: string
}

const TASMOTA_COMMAND_CHANNEL_PATTERN = /^POWER(?:[1-9]\d?)?$/

/** `POWER` and `POWER1` address the same relay. */
export function normalizeTasmotaCommandChannel(value: unknown) {
  if (typeof value !== 'string') {
    return null
  }

  const normalized = value.trim().toUpperCase()
  if (!TASMOTA_COMMAND_CHANNEL_PATTERN.test(normalized)) {
    return null
  }

  return normalized === 'POWER' ? 'POWER1' : normalized
}

export function normalizeTasmotaSwitchValue(value: unknown): SwitchPower | null {
  if (typeof value === 'string') {
    const normalized = value.trim().toUpperCase()
    if (normalized === 'ON' || normalized === '1') {
      return 'ON'
    }
    if (normalized === 'OFF' || normalized === '0') {
      return 'OFF'
    }
    return null
  }

  if (typeof value === 'number') {
    return value === 0 ? 'OFF' : 'ON'
  }

  if (typeof value === 'boolean') {
    return value ? 'ON' : 'OFF'
  }

  return null
}

export const DEFAULT_RELAY_CHANNELS: Record<string, string> = Object.fromEntries(
  DEVICE_NAMES.map((deviceName, index) => [deviceName, `POWER${index + 1}`]),
)

/**
 * Parses `device:POWERn` pairs separated by commas. Malformed pairs are
 * dropped with a warning; an empty result falls back to the defaults.
 */
export function parseRelayChannelMap(raw: string | undefined) {
  if (!raw || !raw.trim()) {
    return { ...DEFAULT_RELAY_CHANNELS }
  }

  const channels: Record<string, string> = {}
  for (const pair of raw.split(',')) {
    const [deviceName, channel] = pair.split(':').map((part) => part.trim())
    const normalizedChannel = normalizeTasmotaCommandChannel(channel)
    if (!deviceName || !normalizedChannel) {
      console.warn(`[hardware] Ignoring relay channel mapping "${pair.trim()}"`)
      continue
    }
    channels[deviceName] = normalizedChannel
  }

  return Object.keys(channels).length > 0 ? channels : { ...DEFAULT_RELAY_CHANNELS }
}

export function buildPowerCommand(deviceTopic: string, channel: string, on: boolean): PublishTarget {
  return {
    topic: `cmnd/${deviceTopic}/${channel}`,
    payload: on ? 'ON' : 'OFF',
  }
}

export function getRelaySubscribeTopics(deviceTopic: string) {
  return [`stat/${deviceTopic}/+`, `tele/${deviceTopic}/STATE`, `tele/${deviceTopic}/LWT`]
}

export function getSensorSubscribeTopics(deviceTopic: string) {
  return [`tele/${deviceTopic}/SENSOR`, `stat/${deviceTopic}/STATUS10`]
}

function parseJsonObject(payload: string): Record<string, unknown> | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(payload)
  } catch {
    return null
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null
  }
  return Object.fromEntries(Object.entries(parsed))
}

export function extractPowerUpdates(payload: Record<string, unknown>): PowerUpdate[] {
  const updates: PowerUpdate[] = []
  for (const [key, value] of Object.entries(payload)) {
    const channel = normalizeTasmotaCommandChannel(key)
    const power = normalizeTasmotaSwitchValue(value)
    if (channel && power) {
      updates.push({ channel, power })
    }
  }
  return updates
}

const bme680Schema = z.object({
  Temperature: z.number(),
  Humidity: z.number(),
  Pressure: z.number(),
  Gas: z.number(),
})

const sensorPayloadSchema = z.object({ BME680: bme680Schema })
const statusSensorPayloadSchema = z.object({ StatusSNS: sensorPayloadSchema })

/** Tasmota reports BME680 gas resistance in kΩ. */
export function toEnvironmentReading(bme680: z.infer<typeof bme680Schema>, capturedAt: number): EnvironmentReading {
  return {
    temperature: bme680.Temperature,
    humidity: bme680.Humidity,
    pressure: bme680.Pressure,
    gasResistance: Math.round(bme680.Gas * 1000),
    capturedAt,
  }
}

export function parseSensorPayload(payload: string, capturedAt: number): EnvironmentReading | null {
  const parsed = parseJsonObject(payload)
  if (!parsed) {
    return null
  }

  const tele = sensorPayloadSchema.safeParse(parsed)
  if (tele.success) {
    return toEnvironmentReading(tele.data.BME680, capturedAt)
  }

  const status = statusSensorPayloadSchema.safeParse(parsed)
  if (status.success) {
    return toEnvironmentReading(status.data.StatusSNS.BME680, capturedAt)
  }

  return null
}

/**
 * Classifies a message received for `deviceTopic`. Topics of other devices
 * and payloads without usable data yield null.
 */
export function parseTasmotaMessage(
  deviceTopic: string,
  topic: string,
  payload: string,
  receivedAt: number,
): TasmotaMessage | null {
  const parts = topic.split('/')
  if (parts.length !== 3 || parts[1] !== deviceTopic) {
    return null
  }

  const prefix = parts[0].toLowerCase()
  const suffix = parts[2].toUpperCase()

  if (prefix === 'stat' && TASMOTA_COMMAND_CHANNEL_PATTERN.test(suffix)) {
    const channel = normalizeTasmotaCommandChannel(suffix)
    const power = normalizeTasmotaSwitchValue(payload)
    if (!channel || !power) {
      return null
    }
    return { type: 'power', updates: [{ channel, power }] }
  }

  if ((prefix === 'stat' && suffix === 'RESULT') || (prefix === 'tele' && suffix === 'STATE')) {
    const parsed = parseJsonObject(payload)
    const updates = parsed ? extractPowerUpdates(parsed) : []
    return updates.length > 0 ? { type: 'power', updates } : null
  }

  if ((prefix === 'tele' && suffix === 'SENSOR') || (prefix === 'stat' && suffix === 'STATUS10')) {
    const reading = parseSensorPayload(payload, receivedAt)
    return reading ? { type: 'sensor', reading } : null
  }

  if (prefix === 'tele' && suffix === 'LWT') {
    return { type: 'lwt', online: payload.trim().toLowerCase() === 'online' }
  }

  return null
}
