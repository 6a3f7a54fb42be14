import { z } from 'zod'
import type { AppDatabase } from '../types/db'
import type {
  AlertConfig,
  DeviceConfig,
  DeviceMode,
  DiaryEntry,
  EnvironmentReading,
  Project,
  ProjectStatus,
  SensorLogRow,
  TimelapseImage,
} from '../types/grow'
import {
  DEFAULT_ALERT_SETTINGS,
  DEFAULT_TIMELAPSE_INTERVAL_SEC,
  DEVICE_NAMES,
  MIN_TIMELAPSE_INTERVAL_SEC,
  getDefaultDeviceSettings,
} from './devices'

export const DEVICE_MODES = ['schedule', 'threshold', 'auto', 'manual'] as const satisfies readonly DeviceMode[]

const PROJECT_STATUSES = ['active', 'completed', 'archived'] as const satisfies readonly ProjectStatus[]

export const thresholdsSchema = z.object({
  temp_threshold: z.number().finite().optional(),
  humidity_threshold: z.number().finite().optional(),
})

export function isDeviceMode(value: string): value is DeviceMode {
  return (DEVICE_MODES as readonly string[]).includes(value)
}

function isProjectStatus(value: string): value is ProjectStatus {
  return (PROJECT_STATUSES as readonly string[]).includes(value)
}

function insertIgnore(db: AppDatabase) {
  return db.dialect === 'mariadb' ? 'INSERT IGNORE' : 'INSERT OR IGNORE'
}

function onConflictUpdate(db: AppDatabase, keyColumn: string, columns: string[]) {
  if (db.dialect === 'mariadb') {
    return `ON DUPLICATE KEY UPDATE ${columns.map((column) => `${column} = VALUES(${column})`).join(', ')}`
  }
  return `ON CONFLICT(${keyColumn}) DO UPDATE SET ${columns.map((column) => `${column} = excluded.${column}`).join(', ')}`
}

function parseStoredJson(raw: string | null): unknown {
  if (raw == null) return null
  try {
    return JSON.parse(raw)
  } catch {
    return null
  }
}

function toNullableNumber(value: number | null | undefined) {
  return value == null ? null : Number(value)
}

// ---------------------------------------------------------------------------
// projects

type ProjectRow = {
  id: number
  name: string
  notes: string | null
  status: string
  started_at: number
  ended_at: number | null
  timelapse_enabled: number
  timelapse_interval_sec: number
  timelapse_last_capture_at: number | null
}

const PROJECT_COLUMNS = `id, name, notes, status, started_at, ended_at,
  timelapse_enabled, timelapse_interval_sec, timelapse_last_capture_at`

function toProject(row: ProjectRow): Project {
  return {
    id: Number(row.id),
    name: row.name,
    notes: row.notes ?? '',
    status: isProjectStatus(row.status) ? row.status : 'completed',
    startedAt: Number(row.started_at),
    endedAt: toNullableNumber(row.ended_at),
    timelapseEnabled: Number(row.timelapse_enabled) === 1,
    timelapseIntervalSec: Number(row.timelapse_interval_sec),
    timelapseLastCaptureAt: toNullableNumber(row.timelapse_last_capture_at),
  }
}

export type CreateProjectInput = {
  name: string
  notes?: string
  timelapseEnabled?: boolean
  timelapseIntervalSec?: number
  startedAt: number
}

export async function createProject(db: AppDatabase, input: CreateProjectInput) {
  const nowIso = new Date().toISOString()
  const intervalSec = Math.max(MIN_TIMELAPSE_INTERVAL_SEC, input.timelapseIntervalSec ?? DEFAULT_TIMELAPSE_INTERVAL_SEC)
  const inserted = await db
    .prepare(
      `INSERT INTO projects
       (name, notes, status, started_at, ended_at, timelapse_enabled, timelapse_interval_sec,
        timelapse_last_capture_at, created_at, updated_at)
       VALUES (?, ?, 'active', ?, NULL, ?, ?, NULL, ?, ?)`,
    )
    .bind(
      input.name,
      input.notes ?? '',
      input.startedAt,
      input.timelapseEnabled === false ? 0 : 1,
      intervalSec,
      nowIso,
      nowIso,
    )
    .run()

  const project = await getProject(db, Number(inserted.meta.last_row_id))
  if (!project) {
    throw new Error('PROJECT_NOT_FOUND')
  }
  return project
}

export async function getProject(db: AppDatabase, id: number) {
  const row = await db
    .prepare(`SELECT ${PROJECT_COLUMNS} FROM projects WHERE id = ? LIMIT 1`)
    .bind(id)
    .first<ProjectRow>()
  return row ? toProject(row) : null
}

export async function listProjects(db: AppDatabase, status?: ProjectStatus) {
  const statement = status
    ? db
        .prepare(`SELECT ${PROJECT_COLUMNS} FROM projects WHERE status = ? ORDER BY started_at DESC, id DESC`)
        .bind(status)
    : db.prepare(`SELECT ${PROJECT_COLUMNS} FROM projects ORDER BY started_at DESC, id DESC`)
  const result = await statement.all<ProjectRow>()
  return result.results.map(toProject)
}

export async function getActiveProject(db: AppDatabase) {
  const row = await db
    .prepare(
      `SELECT ${PROJECT_COLUMNS} FROM projects
       WHERE status = 'active'
       ORDER BY started_at DESC, id DESC
       LIMIT 1`,
    )
    .first<ProjectRow>()
  return row ? toProject(row) : null
}

export async function listProjectsNeedingTimelapse(db: AppDatabase) {
  const result = await db
    .prepare(
      `SELECT ${PROJECT_COLUMNS} FROM projects
       WHERE status = 'active' AND timelapse_enabled = 1
       ORDER BY id ASC`,
    )
    .all<ProjectRow>()
  return result.results.map(toProject)
}

export type ProjectPatch = {
  name?: string
  notes?: string
  timelapseEnabled?: boolean
  timelapseIntervalSec?: number
}

export async function updateProject(db: AppDatabase, id: number, patch: ProjectPatch) {
  await db
    .prepare(
      `UPDATE projects
       SET name = COALESCE(?, name),
           notes = COALESCE(?, notes),
           timelapse_enabled = COALESCE(?, timelapse_enabled),
           timelapse_interval_sec = COALESCE(?, timelapse_interval_sec),
           updated_at = ?
       WHERE id = ?`,
    )
    .bind(
      patch.name ?? null,
      patch.notes ?? null,
      patch.timelapseEnabled == null ? null : patch.timelapseEnabled ? 1 : 0,
      patch.timelapseIntervalSec == null ? null : Math.max(MIN_TIMELAPSE_INTERVAL_SEC, patch.timelapseIntervalSec),
      new Date().toISOString(),
      id,
    )
    .run()
  return getProject(db, id)
}

export async function endProject(db: AppDatabase, id: number, endedAt: number) {
  const result = await db
    .prepare(
      `UPDATE projects
       SET status = 'completed', ended_at = ?, updated_at = ?
       WHERE id = ? AND status = 'active'`,
    )
    .bind(endedAt, new Date().toISOString(), id)
    .run()
  return result.meta.changes > 0
}

/** Completes every active project and returns the ids that were ended. */
export async function endActiveProjects(db: AppDatabase, endedAt: number) {
  const active = await listProjects(db, 'active')
  for (const project of active) {
    await endProject(db, project.id, endedAt)
  }
  return active.map((project) => project.id)
}

export async function archiveProject(db: AppDatabase, id: number, archivedAt: number) {
  const result = await db
    .prepare(
      `UPDATE projects
       SET status = 'archived', ended_at = COALESCE(ended_at, ?), updated_at = ?
       WHERE id = ?`,
    )
    .bind(archivedAt, new Date().toISOString(), id)
    .run()
  return result.meta.changes > 0
}

export async function updateTimelapseCapture(db: AppDatabase, projectId: number, capturedAt: number) {
  return db
    .prepare('UPDATE projects SET timelapse_last_capture_at = ?, updated_at = ? WHERE id = ?')
    .bind(capturedAt, new Date().toISOString(), projectId)
    .run()
}

// ---------------------------------------------------------------------------
// diary

const diaryPhotosSchema = z.array(z.string())

type DiaryEntryRow = {
  id: number
  project_id: number
  title: string
  body: string
  photos_json: string | null
  created_at: number
  updated_at: number
}

const DIARY_COLUMNS = 'id, project_id, title, body, photos_json, created_at, updated_at'

function toDiaryEntry(row: DiaryEntryRow): DiaryEntry {
  const photos = diaryPhotosSchema.safeParse(parseStoredJson(row.photos_json))
  return {
    id: Number(row.id),
    projectId: Number(row.project_id),
    title: row.title,
    text: row.body,
    photos: photos.success ? photos.data : [],
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  }
}

export type CreateDiaryEntryInput = {
  projectId: number
  title: string
  text: string
  photos?: string[]
  createdAt: number
}

export async function createDiaryEntry(db: AppDatabase, input: CreateDiaryEntryInput) {
  const inserted = await db
    .prepare(
      `INSERT INTO diary_entries (project_id, title, body, photos_json, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .bind(
      input.projectId,
      input.title,
      input.text,
      JSON.stringify(input.photos ?? []),
      input.createdAt,
      input.createdAt,
    )
    .run()

  const entry = await getDiaryEntry(db, Number(inserted.meta.last_row_id))
  if (!entry) {
    throw new Error('DIARY_ENTRY_NOT_FOUND')
  }
  return entry
}

export async function getDiaryEntry(db: AppDatabase, id: number) {
  const row = await db
    .prepare(`SELECT ${DIARY_COLUMNS} FROM diary_entries WHERE id = ? LIMIT 1`)
    .bind(id)
    .first<DiaryEntryRow>()
  return row ? toDiaryEntry(row) : null
}

/** Newest first. */
export async function listDiaryEntries(db: AppDatabase, projectId: number) {
  const result = await db
    .prepare(
      `SELECT ${DIARY_COLUMNS} FROM diary_entries
       WHERE project_id = ?
       ORDER BY created_at DESC, id DESC`,
    )
    .bind(projectId)
    .all<DiaryEntryRow>()
  return result.results.map(toDiaryEntry)
}

export type DiaryEntryPatch = {
  title?: string
  text?: string
  photos?: string[]
}

export async function updateDiaryEntry(db: AppDatabase, id: number, patch: DiaryEntryPatch, updatedAt: number) {
  const result = await db
    .prepare(
      `UPDATE diary_entries
       SET title = COALESCE(?, title),
           body = COALESCE(?, body),
           photos_json = COALESCE(?, photos_json),
           updated_at = ?
       WHERE id = ?`,
    )
    .bind(
      patch.title ?? null,
      patch.text ?? null,
      patch.photos == null ? null : JSON.stringify(patch.photos),
      updatedAt,
      id,
    )
    .run()
  return result.meta.changes > 0 ? getDiaryEntry(db, id) : null
}

export async function deleteDiaryEntry(db: AppDatabase, id: number) {
  const result = await db.prepare('DELETE FROM diary_entries WHERE id = ?').bind(id).run()
  return result.meta.changes > 0
}

// ---------------------------------------------------------------------------
// sensor logs

type SensorLogDbRow = {
  id: number
  project_id: number | null
  captured_at: number
  temperature: number | null
  humidity: number | null
  pressure: number | null
  gas_resistance: number | null
}

function toSensorLog(row: SensorLogDbRow): SensorLogRow {
  return {
    id: Number(row.id),
    projectId: toNullableNumber(row.project_id),
    capturedAt: Number(row.captured_at),
    temperature: toNullableNumber(row.temperature),
    humidity: toNullableNumber(row.humidity),
    pressure: toNullableNumber(row.pressure),
    gasResistance: toNullableNumber(row.gas_resistance),
  }
}

export async function logSensorReading(db: AppDatabase, reading: EnvironmentReading, projectId: number | null) {
  const inserted = await db
    .prepare(
      `INSERT INTO sensor_logs (project_id, captured_at, temperature, humidity, pressure, gas_resistance)
       VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .bind(
      projectId,
      reading.capturedAt,
      reading.temperature,
      reading.humidity,
      reading.pressure,
      reading.gasResistance,
    )
    .run()
  return Number(inserted.meta.last_row_id)
}

export async function getLatestSensorLog(db: AppDatabase) {
  const row = await db
    .prepare(
      `SELECT id, project_id, captured_at, temperature, humidity, pressure, gas_resistance
       FROM sensor_logs
       ORDER BY captured_at DESC, id DESC
       LIMIT 1`,
    )
    .first<SensorLogDbRow>()
  return row ? toSensorLog(row) : null
}

export type SensorLogQuery = {
  projectId?: number | null
  since?: number
  limit: number
}

/** Newest first. */
export async function listSensorLogs(db: AppDatabase, query: SensorLogQuery) {
  const projectId = query.projectId ?? null
  const result = await db
    .prepare(
      `SELECT id, project_id, captured_at, temperature, humidity, pressure, gas_resistance
       FROM sensor_logs
       WHERE captured_at >= ? AND (? IS NULL OR project_id = ?)
       ORDER BY captured_at DESC, id DESC
       LIMIT ?`,
    )
    .bind(query.since ?? 0, projectId, projectId, query.limit)
    .all<SensorLogDbRow>()
  return result.results.map(toSensorLog)
}

export type MetricStats = {
  min: number
  max: number
  avg: number
}

export type SensorStats = {
  count: number
  temperature: MetricStats | null
  humidity: MetricStats | null
}

type SensorStatsRow = {
  sample_count: number
  temp_min: number | null
  temp_max: number | null
  temp_avg: number | null
  humidity_min: number | null
  humidity_max: number | null
  humidity_avg: number | null
}

function toMetricStats(min: number | null, max: number | null, avg: number | null): MetricStats | null {
  if (min == null || max == null || avg == null) {
    return null
  }
  return { min: Number(min), max: Number(max), avg: Number(avg) }
}

export async function getSensorStats(db: AppDatabase, query: { projectId?: number | null; since: number }) {
  const projectId = query.projectId ?? null
  const row = await db
    .prepare(
      `SELECT COUNT(*) AS sample_count,
              MIN(temperature) AS temp_min, MAX(temperature) AS temp_max, AVG(temperature) AS temp_avg,
              MIN(humidity) AS humidity_min, MAX(humidity) AS humidity_max, AVG(humidity) AS humidity_avg
       FROM sensor_logs
       WHERE captured_at >= ? AND (? IS NULL OR project_id = ?)`,
    )
    .bind(query.since, projectId, projectId)
    .first<SensorStatsRow>()

  const stats: SensorStats = {
    count: Number(row?.sample_count ?? 0),
    temperature: row ? toMetricStats(row.temp_min, row.temp_max, row.temp_avg) : null,
    humidity: row ? toMetricStats(row.humidity_min, row.humidity_max, row.humidity_avg) : null,
  }
  return stats
}

// ---------------------------------------------------------------------------
// device settings and states

type DeviceSettingsRow = {
  device_name: string
  mode: string
  enabled: number
  schedule_json: string | null
  thresholds_json: string | null
}

function toDeviceConfig(row: DeviceSettingsRow): DeviceConfig {
  let mode: DeviceMode = 'manual'
  if (isDeviceMode(row.mode)) {
    mode = row.mode
  } else {
    console.warn(`[db] Unknown mode "${row.mode}" stored for ${row.device_name}; treating as manual`)
  }

  const storedSchedule = parseStoredJson(row.schedule_json)
  let schedule: unknown[] = []
  if (Array.isArray(storedSchedule)) {
    schedule = storedSchedule
  } else if (storedSchedule != null) {
    console.warn(`[db] Ignoring non-array schedule stored for ${row.device_name}`)
  }

  const parsedThresholds = thresholdsSchema.safeParse(parseStoredJson(row.thresholds_json) ?? {})
  if (!parsedThresholds.success) {
    console.warn(`[db] Ignoring invalid thresholds stored for ${row.device_name}`)
  }

  return {
    enabled: Number(row.enabled) === 1,
    mode,
    schedule,
    thresholds: parsedThresholds.success ? parsedThresholds.data : {},
  }
}

const DEVICE_SETTINGS_COLUMNS = 'device_name, mode, enabled, schedule_json, thresholds_json'

export async function getDeviceSettings(db: AppDatabase, deviceName: string) {
  const row = await db
    .prepare(`SELECT ${DEVICE_SETTINGS_COLUMNS} FROM device_settings WHERE device_name = ? LIMIT 1`)
    .bind(deviceName)
    .first<DeviceSettingsRow>()
  return row ? toDeviceConfig(row) : null
}

export async function getAllDeviceSettings(db: AppDatabase) {
  const result = await db
    .prepare(`SELECT ${DEVICE_SETTINGS_COLUMNS} FROM device_settings ORDER BY device_name ASC`)
    .all<DeviceSettingsRow>()

  const settings: Record<string, DeviceConfig> = {}
  for (const row of result.results) {
    settings[row.device_name] = toDeviceConfig(row)
  }
  return settings
}

export async function saveDeviceSettings(db: AppDatabase, deviceName: string, config: DeviceConfig) {
  return db
    .prepare(
      `INSERT INTO device_settings (device_name, mode, enabled, schedule_json, thresholds_json, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ${onConflictUpdate(db, 'device_name', ['mode', 'enabled', 'schedule_json', 'thresholds_json', 'updated_at'])}`,
    )
    .bind(
      deviceName,
      config.mode,
      config.enabled ? 1 : 0,
      JSON.stringify(config.schedule),
      JSON.stringify(config.thresholds),
      new Date().toISOString(),
    )
    .run()
}

export async function getStoredDeviceStates(db: AppDatabase) {
  const result = await db
    .prepare('SELECT device_name, state FROM device_states ORDER BY device_name ASC')
    .all<{ device_name: string; state: number }>()

  const states: Record<string, boolean> = {}
  for (const row of result.results) {
    states[row.device_name] = Number(row.state) === 1
  }
  return states
}

export async function updateDeviceState(db: AppDatabase, deviceName: string, on: boolean, updatedAt: number) {
  return db
    .prepare(
      `INSERT INTO device_states (device_name, state, updated_at)
       VALUES (?, ?, ?)
       ${onConflictUpdate(db, 'device_name', ['state', 'updated_at'])}`,
    )
    .bind(deviceName, on ? 1 : 0, updatedAt)
    .run()
}

// ---------------------------------------------------------------------------
// alert settings

type AlertSettingsRow = {
  enabled: number
  temp_min: number | null
  temp_max: number | null
  humidity_min: number | null
  humidity_max: number | null
  notification_interval_sec: number
}

export async function getAlertSettings(db: AppDatabase): Promise<AlertConfig> {
  const row = await db
    .prepare(
      `SELECT enabled, temp_min, temp_max, humidity_min, humidity_max, notification_interval_sec
       FROM alert_settings WHERE id = 1 LIMIT 1`,
    )
    .first<AlertSettingsRow>()

  if (!row) {
    return { ...DEFAULT_ALERT_SETTINGS }
  }

  return {
    enabled: Number(row.enabled) === 1,
    tempMin: toNullableNumber(row.temp_min),
    tempMax: toNullableNumber(row.temp_max),
    humidityMin: toNullableNumber(row.humidity_min),
    humidityMax: toNullableNumber(row.humidity_max),
    notificationIntervalSec: Number(row.notification_interval_sec),
  }
}

function bindAlertSettings(config: AlertConfig) {
  return [
    config.enabled ? 1 : 0,
    config.tempMin,
    config.tempMax,
    config.humidityMin,
    config.humidityMax,
    config.notificationIntervalSec,
    new Date().toISOString(),
  ]
}

export async function saveAlertSettings(db: AppDatabase, config: AlertConfig) {
  return db
    .prepare(
      `INSERT INTO alert_settings
       (id, enabled, temp_min, temp_max, humidity_min, humidity_max, notification_interval_sec, updated_at)
       VALUES (1, ?, ?, ?, ?, ?, ?, ?)
       ${onConflictUpdate(db, 'id', [
         'enabled',
         'temp_min',
         'temp_max',
         'humidity_min',
         'humidity_max',
         'notification_interval_sec',
         'updated_at',
       ])}`,
    )
    .bind(...bindAlertSettings(config))
    .run()
}

// ---------------------------------------------------------------------------
// time-lapse images

type TimelapseImageRow = {
  id: number
  project_id: number | null
  captured_at: number
  filepath: string
}

function toTimelapseImage(row: TimelapseImageRow): TimelapseImage {
  return {
    id: Number(row.id),
    projectId: toNullableNumber(row.project_id),
    capturedAt: Number(row.captured_at),
    filepath: row.filepath,
  }
}

export async function saveTimelapseImage(
  db: AppDatabase,
  input: { projectId: number | null; capturedAt: number; filepath: string },
): Promise<TimelapseImage> {
  const inserted = await db
    .prepare('INSERT INTO timelapse_images (project_id, captured_at, filepath) VALUES (?, ?, ?)')
    .bind(input.projectId, input.capturedAt, input.filepath)
    .run()
  return {
    id: Number(inserted.meta.last_row_id),
    projectId: input.projectId,
    capturedAt: input.capturedAt,
    filepath: input.filepath,
  }
}

/** Newest first. */
export async function listTimelapseImages(db: AppDatabase, projectId: number, limit: number) {
  const result = await db
    .prepare(
      `SELECT id, project_id, captured_at, filepath
       FROM timelapse_images
       WHERE project_id = ?
       ORDER BY captured_at DESC, id DESC
       LIMIT ?`,
    )
    .bind(projectId, limit)
    .all<TimelapseImageRow>()
  return result.results.map(toTimelapseImage)
}

/** Oldest first, the order frames are assembled into a video. */
export async function listTimelapseImagePaths(db: AppDatabase, projectId: number) {
  const result = await db
    .prepare(
      `SELECT filepath FROM timelapse_images
       WHERE project_id = ?
       ORDER BY captured_at ASC, id ASC`,
    )
    .bind(projectId)
    .all<{ filepath: string }>()
  return result.results.map((row) => row.filepath)
}

export async function countTimelapseImages(db: AppDatabase, projectId: number, since = 0) {
  const row = await db
    .prepare('SELECT COUNT(*) AS image_count FROM timelapse_images WHERE project_id = ? AND captured_at >= ?')
    .bind(projectId, since)
    .first<{ image_count: number }>()
  return Number(row?.image_count ?? 0)
}

// ---------------------------------------------------------------------------
// system settings

export async function getSystemSetting(db: AppDatabase, key: string) {
  const row = await db
    .prepare('SELECT setting_value FROM system_settings WHERE setting_key = ? LIMIT 1')
    .bind(key)
    .first<{ setting_value: string }>()
  return row?.setting_value ?? null
}

export async function setSystemSetting(db: AppDatabase, key: string, value: string) {
  return db
    .prepare(
      `INSERT INTO system_settings (setting_key, setting_value, updated_at)
       VALUES (?, ?, ?)
       ${onConflictUpdate(db, 'setting_key', ['setting_value', 'updated_at'])}`,
    )
    .bind(key, value, new Date().toISOString())
    .run()
}

// ---------------------------------------------------------------------------
// seeding

/** Inserts built-in device and alert settings that are not stored yet. */
export async function seedDefaultSettings(db: AppDatabase) {
  const nowIso = new Date().toISOString()
  for (const deviceName of DEVICE_NAMES) {
    const defaults = getDefaultDeviceSettings(deviceName)
    await db
      .prepare(
        `${insertIgnore(db)} INTO device_settings
         (device_name, mode, enabled, schedule_json, thresholds_json, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .bind(
        deviceName,
        defaults.mode,
        defaults.enabled ? 1 : 0,
        JSON.stringify(defaults.schedule),
        JSON.stringify(defaults.thresholds),
        nowIso,
      )
      .run()
  }

  await db
    .prepare(
      `${insertIgnore(db)} INTO alert_settings
       (id, enabled, temp_min, temp_max, humidity_min, humidity_max, notification_interval_sec, updated_at)
       VALUES (1, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .bind(...bindAlertSettings(DEFAULT_ALERT_SETTINGS))
    .run()
}
