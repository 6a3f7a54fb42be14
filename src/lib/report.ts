import { CronExpressionParser } from 'cron-parser'
import type { AppDatabase } from '../types/db'
import { countTimelapseImages, getActiveProject, getSensorStats } from './db'
import type { MetricStats } from './db'
import type { NotificationSink } from './notify'
import { DAY_MS, formatLocalDate, isValidTimezone, startOfLocalDay } from './time-of-day'

export function computeNextReportAt(input: { cron: string; timezone: string; fromDate?: Date }) {
  if (!isValidTimezone(input.timezone)) {
    throw new Error('REPORT_INVALID_TIMEZONE')
  }

  let parser
  try {
    parser = CronExpressionParser.parse(input.cron, {
      currentDate: input.fromDate ?? new Date(),
      tz: input.timezone,
    })
  } catch {
    throw new Error('REPORT_INVALID_CRON')
  }

  return parser.next().toDate().getTime()
}

function formatMetric(label: string, stats: MetricStats | null, unit: string) {
  if (!stats) {
    return `${label}: no data`
  }
  return `${label}: min ${stats.min.toFixed(1)}${unit}, max ${stats.max.toFixed(1)}${unit}, avg ${stats.avg.toFixed(1)}${unit}`
}

/**
 * Summary of the active project since local midnight. Null when there is no
 * active project or nothing was logged today.
 */
export async function buildDailyReport(db: AppDatabase, now: number, timezone: string) {
  const project = await getActiveProject(db)
  if (!project) {
    return null
  }

  const since = startOfLocalDay(now, timezone) ?? now - DAY_MS
  const stats = await getSensorStats(db, { projectId: project.id, since })
  if (stats.count === 0) {
    return null
  }

  const imageCount = await countTimelapseImages(db, project.id)
  const day = Math.floor((now - project.startedAt) / DAY_MS) + 1

  return [
    `📊 Daily report ${formatLocalDate(now, timezone)}`,
    `Project: ${project.name} (day ${day})`,
    formatMetric('Temperature', stats.temperature, '°C'),
    formatMetric('Humidity', stats.humidity, '%'),
    `Readings: ${stats.count}`,
    `Time-lapse images: ${imageCount}`,
  ].join('\n')
}

export type DailyReportSchedulerOptions = {
  db: AppDatabase
  notifier: NotificationSink
  cron: string
  timezone: string
  clock?: () => number
}

/** Re-arms a single timer for each next cron occurrence. */
export class DailyReportScheduler {
  private timer: NodeJS.Timeout | null = null
  private running = false

  constructor(private readonly options: DailyReportSchedulerOptions) {}

  start() {
    if (this.running) {
      console.warn('[report] Scheduler already running')
      return
    }
    this.running = true
    this.arm()
  }

  stop() {
    this.running = false
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }

  async runNow() {
    const report = await buildDailyReport(this.options.db, this.now(), this.options.timezone)
    if (!report) {
      console.log('[report] Nothing to report')
      return false
    }
    await this.options.notifier.send(report)
    console.log('[report] Daily report sent')
    return true
  }

  private now() {
    return (this.options.clock ?? Date.now)()
  }

  private arm() {
    if (!this.running) {
      return
    }

    const nextAt = computeNextReportAt({
      cron: this.options.cron,
      timezone: this.options.timezone,
      fromDate: new Date(this.now()),
    })
    console.log(`[report] Next daily report at ${new Date(nextAt).toISOString()}`)

    this.timer = setTimeout(() => {
      this.timer = null
      void this.runNow()
        .catch((error) => {
          console.error('[report] Daily report failed', error)
        })
        .finally(() => {
          this.arm()
        })
    }, Math.max(0, nextAt - this.now()))
  }
}
