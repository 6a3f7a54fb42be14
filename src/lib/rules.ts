import { z } from 'zod'
import type {
  DeviceConfig,
  DeviceDecision,
  DeviceThresholds,
  DutyCycleState,
  ScheduleRule,
} from '../types/grow'
import { getThresholdRoles } from './devices'
import type { ThresholdRole } from './devices'
import { DAY_MS, MINUTE_MS, isWithinTimeWindow, parseTimeOfDay, toLocalTimeOfDayMs } from './time-of-day'

export type EvaluationContext = {
  now: number
  timezone: string
  temperature?: number | null
  humidity?: number | null
}

export type DutyCycleStore = Map<string, DutyCycleState>

const positiveMinutes = z.number().finite().positive()

const timeWindowEntrySchema = z.object({
  on: z.string(),
  off: z.string(),
})

const dutyCycleEntrySchema = z.object({
  duration: positiveMinutes,
  interval: positiveMinutes,
})

const pulseAtEntrySchema = z.object({
  time: z.string(),
  duration: positiveMinutes,
})

type RuleParseResult =
  | { ok: true; rule: ScheduleRule }
  | { ok: false; message: string }

function hasKeys(entry: object, keys: string[]) {
  return keys.every((key) => key in entry)
}

/**
 * Stored entries are told apart by their keys, checked in the order
 * on/off, duration/interval, time/duration.
 */
export function parseScheduleRule(entry: unknown): RuleParseResult {
  if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
    return { ok: false, message: 'schedule entry must be an object' }
  }

  if (hasKeys(entry, ['on', 'off'])) {
    const parsed = timeWindowEntrySchema.safeParse(entry)
    if (!parsed.success) {
      return { ok: false, message: 'on/off must be HH:MM strings' }
    }
    const onMinute = parseTimeOfDay(parsed.data.on)
    const offMinute = parseTimeOfDay(parsed.data.off)
    if (onMinute == null || offMinute == null) {
      return { ok: false, message: `invalid time window ${parsed.data.on}-${parsed.data.off}` }
    }
    return { ok: true, rule: { kind: 'time_window', onMinute, offMinute } }
  }

  if (hasKeys(entry, ['duration', 'interval'])) {
    const parsed = dutyCycleEntrySchema.safeParse(entry)
    if (!parsed.success) {
      return { ok: false, message: 'duration/interval must be positive minutes' }
    }
    return {
      ok: true,
      rule: { kind: 'duty_cycle', durationMin: parsed.data.duration, intervalMin: parsed.data.interval },
    }
  }

  if (hasKeys(entry, ['time', 'duration'])) {
    const parsed = pulseAtEntrySchema.safeParse(entry)
    if (!parsed.success) {
      return { ok: false, message: 'time must be HH:MM and duration positive minutes' }
    }
    const atMinute = parseTimeOfDay(parsed.data.time)
    if (atMinute == null) {
      return { ok: false, message: `invalid pulse time ${parsed.data.time}` }
    }
    return { ok: true, rule: { kind: 'pulse_at', atMinute, durationMin: parsed.data.duration } }
  }

  return { ok: false, message: 'unrecognised schedule entry' }
}

/** Timers follow the rule's content, so reordering a schedule keeps each timer with its rule. */
export function dutyCycleKey(deviceName: string, rule: { durationMin: number; intervalMin: number }) {
  return `${deviceName}#${rule.durationMin}/${rule.intervalMin}`
}

/** Keys of the duty-cycle timers `config` currently drives. */
export function activeDutyCycleKeys(deviceName: string, config: DeviceConfig) {
  if (!config.enabled || (config.mode !== 'schedule' && config.mode !== 'auto')) {
    return []
  }

  const keys: string[] = []
  for (const entry of config.schedule) {
    const parsed = parseScheduleRule(entry)
    if (parsed.ok && parsed.rule.kind === 'duty_cycle') {
      keys.push(dutyCycleKey(deviceName, parsed.rule))
    }
  }
  return keys
}

/** Drops timers of rules that were edited away or whose device left schedule control. */
export function pruneDutyCycles(dutyCycles: DutyCycleStore, liveKeys: Iterable<string>) {
  const keep = new Set(liveKeys)
  for (const key of [...dutyCycles.keys()]) {
    if (!keep.has(key)) {
      dutyCycles.delete(key)
    }
  }
}

/**
 * Advances the duty-cycle state for one rule and reports whether the device is
 * inside the on-portion of the current cycle. Cycles restart from the first
 * evaluation after the previous interval elapsed; they are not wall-clock aligned.
 */
export function stepDutyCycle(state: DutyCycleState, rule: { durationMin: number; intervalMin: number }, now: number) {
  const intervalMs = rule.intervalMin * MINUTE_MS
  const durationMs = rule.durationMin * MINUTE_MS

  let startedAt = state.cycleStartedAt
  if (startedAt == null || now - startedAt >= intervalMs) {
    startedAt = now
    state.cycleStartedAt = now
    state.running = true
  }

  if (state.running && now - startedAt < durationMs) {
    return true
  }

  state.running = false
  return false
}

function isPulseActive(timeOfDayMs: number, atMinute: number, durationMin: number) {
  const startMs = atMinute * MINUTE_MS
  const endMs = startMs + durationMin * MINUTE_MS
  if (timeOfDayMs >= startMs && timeOfDayMs < endMs) {
    return true
  }
  // yesterday's pulse still running after midnight
  return timeOfDayMs >= startMs - DAY_MS && timeOfDayMs < endMs - DAY_MS
}

function matchesRule(
  deviceName: string,
  rule: ScheduleRule,
  context: EvaluationContext,
  timeOfDayMs: number | null,
  dutyCycles: DutyCycleStore,
) {
  switch (rule.kind) {
    case 'time_window':
      if (timeOfDayMs == null) return false
      return isWithinTimeWindow(timeOfDayMs, rule.onMinute * MINUTE_MS, rule.offMinute * MINUTE_MS)
    case 'pulse_at':
      if (timeOfDayMs == null) return false
      return isPulseActive(timeOfDayMs, rule.atMinute, rule.durationMin)
    case 'duty_cycle': {
      const key = dutyCycleKey(deviceName, rule)
      let state = dutyCycles.get(key)
      if (!state) {
        state = { cycleStartedAt: null, running: false }
        dutyCycles.set(key, state)
      }
      return stepDutyCycle(state, rule, context.now)
    }
    default: {
      const exhaustive: never = rule
      return exhaustive
    }
  }
}

/**
 * True when any schedule entry matches. Every entry is evaluated, so duty-cycle
 * timers advance even when an earlier entry already matched.
 */
export function evaluateSchedule(
  deviceName: string,
  schedule: unknown[],
  context: EvaluationContext,
  dutyCycles: DutyCycleStore,
) {
  if (schedule.length === 0) {
    return false
  }

  const timeOfDayMs = toLocalTimeOfDayMs(context.now, context.timezone)
  if (timeOfDayMs == null) {
    console.warn(`[rules] Cannot resolve time of day in timezone ${context.timezone}; time rules skipped`)
  }

  let matched = false
  schedule.forEach((entry, index) => {
    const parsed = parseScheduleRule(entry)
    if (!parsed.ok) {
      console.warn(`[rules] Skipping schedule entry ${index} for ${deviceName}: ${parsed.message}`)
      return
    }
    if (matchesRule(deviceName, parsed.rule, context, timeOfDayMs, dutyCycles)) {
      matched = true
    }
  })
  return matched
}

function crossesThreshold(role: ThresholdRole, value: number, threshold: number) {
  return role === 'shed' ? value >= threshold : value <= threshold
}

function readThreshold(thresholds: DeviceThresholds, key: keyof DeviceThresholds) {
  const value = thresholds[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

export function evaluateThresholds(deviceName: string, thresholds: DeviceThresholds, context: EvaluationContext) {
  const roles = getThresholdRoles(deviceName)

  const tempThreshold = readThreshold(thresholds, 'temp_threshold')
  if (roles.temperature && tempThreshold != null && context.temperature != null) {
    if (crossesThreshold(roles.temperature, context.temperature, tempThreshold)) {
      return true
    }
  }

  const humidityThreshold = readThreshold(thresholds, 'humidity_threshold')
  if (roles.humidity && humidityThreshold != null && context.humidity != null) {
    if (crossesThreshold(roles.humidity, context.humidity, humidityThreshold)) {
      return true
    }
  }

  return false
}

export function evaluateDevice(
  deviceName: string,
  config: DeviceConfig,
  context: EvaluationContext,
  dutyCycles: DutyCycleStore,
): DeviceDecision {
  if (!config.enabled) {
    return 'OFF'
  }

  switch (config.mode) {
    case 'manual':
      return 'NO_OPINION'
    case 'schedule':
      return evaluateSchedule(deviceName, config.schedule, context, dutyCycles) ? 'ON' : 'OFF'
    case 'threshold':
      return evaluateThresholds(deviceName, config.thresholds, context) ? 'ON' : 'OFF'
    case 'auto': {
      const scheduleOn = evaluateSchedule(deviceName, config.schedule, context, dutyCycles)
      const thresholdOn = evaluateThresholds(deviceName, config.thresholds, context)
      return scheduleOn || thresholdOn ? 'ON' : 'OFF'
    }
    default: {
      const exhaustive: never = config.mode
      return exhaustive
    }
  }
}
