import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createProject, logSensorReading, saveTimelapseImage } from '../src/lib/db'
import { createSqliteDatabase } from '../src/lib/db-sqlite'
import { DailyReportScheduler, buildDailyReport, computeNextReportAt } from '../src/lib/report'
import { ensureSchema } from '../src/lib/schema'
import type { AppDatabase } from '../src/types/db'
import { NOON, createFakeNotifier, makeReading } from './fakes'

const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS

describe('daily report schedule', () => {
  it('computes the next occurrence in the configured timezone', () => {
    expect(computeNextReportAt({ cron: '0 8 * * *', timezone: 'UTC', fromDate: new Date(NOON) })).toBe(
      Date.UTC(2026, 0, 16, 8, 0, 0),
    )
    // 08:00 in Tokyo is 23:00 UTC the day before
    expect(computeNextReportAt({ cron: '0 8 * * *', timezone: 'Asia/Tokyo', fromDate: new Date(NOON) })).toBe(
      Date.UTC(2026, 0, 15, 23, 0, 0),
    )
  })

  it('throws for an invalid timezone or cron', () => {
    expect(() => computeNextReportAt({ cron: '0 8 * * *', timezone: 'Mars/Olympus' })).toThrowError(
      'REPORT_INVALID_TIMEZONE',
    )
    expect(() => computeNextReportAt({ cron: 'every morning', timezone: 'UTC' })).toThrowError('REPORT_INVALID_CRON')
  })

  it('keeps the local report hour stable across a DST transition', () => {
    const timezone = 'America/New_York'
    const firstRun = computeNextReportAt({
      cron: '0 8 * * *',
      timezone,
      fromDate: new Date('2025-03-08T12:30:00.000Z'),
    })
    const secondRun = computeNextReportAt({ cron: '0 8 * * *', timezone, fromDate: new Date(firstRun + HOUR_MS) })

    const toLocalHour = (ts: number) =>
      Number(
        new Intl.DateTimeFormat('en-US', { timeZone: timezone, hour: '2-digit', hour12: false }).format(new Date(ts)),
      )

    expect(toLocalHour(firstRun)).toBe(8)
    expect(toLocalHour(secondRun)).toBe(8)
    expect(secondRun - firstRun).toBe(23 * HOUR_MS)
  })
})

describe('daily report content', () => {
  let db: AppDatabase

  beforeEach(async () => {
    db = createSqliteDatabase(':memory:')
    await ensureSchema(db)
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(async () => {
    await db.close()
  })

  async function seedProject() {
    const project = await createProject(db, { name: 'Basil', startedAt: NOON - 3 * DAY_MS })
    // yesterday, and an unscoped reading, are left out
    await logSensorReading(db, makeReading(10, 90, NOON - 13 * HOUR_MS), project.id)
    await logSensorReading(db, makeReading(40, 20, NOON - HOUR_MS), null)
    await logSensorReading(db, makeReading(20, 50, NOON - 2 * HOUR_MS), project.id)
    await logSensorReading(db, makeReading(26, 70, NOON - HOUR_MS), project.id)
    await saveTimelapseImage(db, { projectId: project.id, capturedAt: NOON - DAY_MS, filepath: '/data/a.jpg' })
    await saveTimelapseImage(db, { projectId: project.id, capturedAt: NOON - HOUR_MS, filepath: '/data/b.jpg' })
    return project
  }

  it('summarises the active project since local midnight', async () => {
    await seedProject()

    await expect(buildDailyReport(db, NOON, 'UTC')).resolves.toBe(
      [
        '📊 Daily report 2026-01-15',
        'Project: Basil (day 4)',
        'Temperature: min 20.0°C, max 26.0°C, avg 23.0°C',
        'Humidity: min 50.0%, max 70.0%, avg 60.0%',
        'Readings: 2',
        'Time-lapse images: 2',
      ].join('\n'),
    )
  })

  it('has nothing to say without a project or readings', async () => {
    await expect(buildDailyReport(db, NOON, 'UTC')).resolves.toBeNull()

    await createProject(db, { name: 'Mint', startedAt: NOON })
    await expect(buildDailyReport(db, NOON, 'UTC')).resolves.toBeNull()
  })

  it('sends the report through the notifier', async () => {
    await seedProject()
    const notifier = createFakeNotifier()
    const scheduler = new DailyReportScheduler({ db, notifier, cron: '0 8 * * *', timezone: 'UTC', clock: () => NOON })

    await expect(scheduler.runNow()).resolves.toBe(true)
    expect(notifier.send).toHaveBeenCalledTimes(1)
    expect(notifier.send.mock.calls[0][0].split('\n')[0]).toBe('📊 Daily report 2026-01-15')
  })

  it('skips sending when there is nothing to report', async () => {
    const notifier = createFakeNotifier()
    const scheduler = new DailyReportScheduler({ db, notifier, cron: '0 8 * * *', timezone: 'UTC', clock: () => NOON })

    await expect(scheduler.runNow()).resolves.toBe(false)
    expect(notifier.send).not.toHaveBeenCalled()
  })

  describe('timer', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('fires at the next cron occurrence', async () => {
      await seedProject()
      const notifier = createFakeNotifier()
      const scheduler = new DailyReportScheduler({ db, notifier, cron: '0 13 * * *', timezone: 'UTC', clock: () => NOON })

      scheduler.start()
      await vi.advanceTimersByTimeAsync(HOUR_MS - 1)
      expect(notifier.send).not.toHaveBeenCalled()

      await vi.advanceTimersByTimeAsync(1)
      await vi.waitFor(() => expect(notifier.send).toHaveBeenCalledTimes(1))
      scheduler.stop()
    })

    it('does not fire once stopped', async () => {
      await seedProject()
      const notifier = createFakeNotifier()
      const scheduler = new DailyReportScheduler({ db, notifier, cron: '0 13 * * *', timezone: 'UTC', clock: () => NOON })

      scheduler.start()
      scheduler.stop()
      await vi.advanceTimersByTimeAsync(2 * HOUR_MS)

      expect(notifier.send).not.toHaveBeenCalled()
    })
  })
})
