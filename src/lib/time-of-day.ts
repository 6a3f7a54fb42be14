export const MINUTE_MS = 60_000
export const DAY_MS = 24 * 60 * MINUTE_MS

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})$/

const formatterByTimezone = new Map<string, Intl.DateTimeFormat>()

function getFormatter(timezone: string) {
  let formatter = formatterByTimezone.get(timezone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-GB', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    })
    formatterByTimezone.set(timezone, formatter)
  }
  return formatter
}

export function isValidTimezone(tz: string) {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz }).format(new Date())
    return true
  } catch {
    return false
  }
}

type LocalParts = {
  year: string
  month: string
  day: string
  hour: number
  minute: number
  second: number
}

function toLocalParts(epochMs: number, timezone: string): LocalParts | null {
  try {
    const parts = getFormatter(timezone).formatToParts(new Date(epochMs))
    const read = (type: Intl.DateTimeFormatPartTypes) => parts.find((part) => part.type === type)?.value ?? ''
    const hour = Number(read('hour'))
    const minute = Number(read('minute'))
    const second = Number(read('second'))
    if (!Number.isInteger(hour) || !Number.isInteger(minute) || !Number.isInteger(second)) {
      return null
    }
    return {
      year: read('year'),
      month: read('month'),
      day: read('day'),
      hour,
      minute,
      second,
    }
  } catch {
    return null
  }
}

/**
 * Milliseconds elapsed since local midnight in `timezone`, or null when the
 * timezone cannot be resolved.
 */
export function toLocalTimeOfDayMs(epochMs: number, timezone: string): number | null {
  const parts = toLocalParts(epochMs, timezone)
  if (!parts) {
    return null
  }
  const subSecond = ((epochMs % 1000) + 1000) % 1000
  return ((parts.hour * 60 + parts.minute) * 60 + parts.second) * 1000 + subSecond
}

export function startOfLocalDay(epochMs: number, timezone: string): number | null {
  const timeOfDay = toLocalTimeOfDayMs(epochMs, timezone)
  if (timeOfDay == null) {
    return null
  }
  return epochMs - timeOfDay
}

/** `HH:MM` -> minutes after midnight, or null when the string is not a valid time. */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim())
  if (!match) {
    return null
  }
  const hour = Number(match[1])
  const minute = Number(match[2])
  if (hour > 23 || minute > 59) {
    return null
  }
  return hour * 60 + minute
}

/** Half-open `[start, end)`; a window with `start > end` wraps past midnight. */
export function isWithinTimeWindow(timeOfDayMs: number, startMs: number, endMs: number) {
  if (startMs <= endMs) {
    return timeOfDayMs >= startMs && timeOfDayMs < endMs
  }
  return timeOfDayMs >= startMs || timeOfDayMs < endMs
}

/** `YYYYMMDD_HHMMSS` in local time, used for capture file names. */
export function formatFileStamp(epochMs: number, timezone: string) {
  const parts = toLocalParts(epochMs, timezone)
  if (!parts) {
    return new Date(epochMs).toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15)
  }
  const pad = (value: number) => String(value).padStart(2, '0')
  return `${parts.year}${parts.month}${parts.day}_${pad(parts.hour)}${pad(parts.minute)}${pad(parts.second)}`
}

export function formatLocalDate(epochMs: number, timezone: string) {
  const parts = toLocalParts(epochMs, timezone)
  if (!parts) {
    return new Date(epochMs).toISOString().slice(0, 10)
  }
  return `${parts.year}-${parts.month}-${parts.day}`
}
