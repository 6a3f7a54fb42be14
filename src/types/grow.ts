export type DeviceMode = 'schedule' | 'threshold' | 'auto' | 'manual'

export type DeviceDecision = 'ON' | 'OFF' | 'NO_OPINION'

export type TimeWindowRule = {
  kind: 'time_window'
  onMinute: number
  offMinute: number
}

export type DutyCycleRule = {
  kind: 'duty_cycle'
  durationMin: number
  intervalMin: number
}

export type PulseAtRule = {
  kind: 'pulse_at'
  atMinute: number
  durationMin: number
}

export type ScheduleRule = TimeWindowRule | DutyCycleRule | PulseAtRule

export type DeviceThresholds = {
  temp_threshold?: number
  humidity_threshold?: number
}

/**
 * Persisted per-device configuration. `schedule` keeps the raw JSON entries
 * exactly as stored; they are parsed into {@link ScheduleRule} at evaluation
 * time so a single malformed entry cannot hide the others.
 */
export type DeviceConfig = {
  enabled: boolean
  mode: DeviceMode
  schedule: unknown[]
  thresholds: DeviceThresholds
}

export type EnvironmentReading = {
  temperature: number
  humidity: number
  pressure: number
  gasResistance: number
  capturedAt: number
}

export type ProjectStatus = 'active' | 'completed' | 'archived'

export type Project = {
  id: number
  name: string
  notes: string
  status: ProjectStatus
  startedAt: number
  endedAt: number | null
  timelapseEnabled: boolean
  timelapseIntervalSec: number
  timelapseLastCaptureAt: number | null
}

export type AlertConfig = {
  enabled: boolean
  tempMin: number | null
  tempMax: number | null
  humidityMin: number | null
  humidityMax: number | null
  notificationIntervalSec: number
}

export type AlertKey = 'temp_low' | 'temp_high' | 'humidity_low' | 'humidity_high'

export type AlertCondition = {
  key: AlertKey
  message: string
}

export type TimelapseImage = {
  id: number
  projectId: number | null
  capturedAt: number
  filepath: string
}

export type DiaryEntry = {
  id: number
  projectId: number
  title: string
  text: string
  photos: string[]
  createdAt: number
  updatedAt: number
}

export type SensorLogRow = {
  id: number
  projectId: number | null
  capturedAt: number
  temperature: number | null
  humidity: number | null
  pressure: number | null
  gasResistance: number | null
}

export type DutyCycleState = {
  cycleStartedAt: number | null
  running: boolean
}
