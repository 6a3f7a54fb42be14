import { describe, expect, it } from 'vitest'
import {
  formatFileStamp,
  formatLocalDate,
  isValidTimezone,
  isWithinTimeWindow,
  parseTimeOfDay,
  startOfLocalDay,
  toLocalTimeOfDayMs,
} from '../src/lib/time-of-day'

describe('time of day helpers', () => {
  it('measures milliseconds since local midnight', () => {
    expect(toLocalTimeOfDayMs(Date.UTC(2026, 0, 15, 13, 45, 30, 250), 'UTC')).toBe(49_530_250)
    expect(toLocalTimeOfDayMs(Date.UTC(2026, 0, 15, 20, 0), 'Asia/Tokyo')).toBe(5 * 60 * 60 * 1000)
  })

  it('returns null for an unknown timezone', () => {
    expect(toLocalTimeOfDayMs(Date.UTC(2026, 0, 15), 'Mars/Olympus')).toBeNull()
    expect(isValidTimezone('Mars/Olympus')).toBe(false)
    expect(isValidTimezone('Europe/Berlin')).toBe(true)
  })

  it('finds the start of the local day', () => {
    expect(startOfLocalDay(Date.UTC(2026, 0, 15, 13, 45), 'UTC')).toBe(Date.UTC(2026, 0, 15))
    expect(startOfLocalDay(Date.UTC(2026, 0, 15, 20, 0), 'Asia/Tokyo')).toBe(Date.UTC(2026, 0, 15, 15, 0))
  })

  it('parses HH:MM strings', () => {
    expect(parseTimeOfDay('06:00')).toBe(360)
    expect(parseTimeOfDay(' 07:30 ')).toBe(450)
    expect(parseTimeOfDay('23:59')).toBe(1439)
    expect(parseTimeOfDay('24:00')).toBeNull()
    expect(parseTimeOfDay('07:60')).toBeNull()
    expect(parseTimeOfDay('07:5')).toBeNull()
  })

  it('treats windows as half-open and wraps overnight ones', () => {
    expect(isWithinTimeWindow(100, 100, 200)).toBe(true)
    expect(isWithinTimeWindow(200, 100, 200)).toBe(false)
    expect(isWithinTimeWindow(250, 200, 100)).toBe(true)
    expect(isWithinTimeWindow(50, 200, 100)).toBe(true)
    expect(isWithinTimeWindow(150, 200, 100)).toBe(false)
  })

  it('formats local stamps for file names and reports', () => {
    expect(formatFileStamp(Date.UTC(2026, 2, 4, 5, 6, 7), 'UTC')).toBe('20260304_050607')
    expect(formatFileStamp(Date.UTC(2026, 0, 15, 20, 0, 0), 'Asia/Tokyo')).toBe('20260116_050000')
    expect(formatLocalDate(Date.UTC(2026, 0, 15, 20, 0), 'Asia/Tokyo')).toBe('2026-01-16')
  })
})
