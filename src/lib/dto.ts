import type { DeviceConfig, DiaryEntry, EnvironmentReading, Project, SensorLogRow, TimelapseImage } from '../types/grow'
import type { TimelapseVideo } from './timelapse-video'
import { getDeviceDisplayName } from './devices'

function toIso(epochMs: number) {
  return new Date(epochMs).toISOString()
}

function toIsoOrNull(epochMs: number | null) {
  return epochMs == null ? null : toIso(epochMs)
}

export function toDeviceStateDto(deviceName: string, state: boolean | null) {
  return {
    name: deviceName,
    displayName: getDeviceDisplayName(deviceName),
    state: state == null ? 'UNKNOWN' : state ? 'ON' : 'OFF',
  }
}

export function toDeviceStateDtos(states: Record<string, boolean | null>) {
  return Object.entries(states).map(([deviceName, state]) => toDeviceStateDto(deviceName, state))
}

export function toDeviceSettingsDto(deviceName: string, config: DeviceConfig) {
  return {
    name: deviceName,
    displayName: getDeviceDisplayName(deviceName),
    enabled: config.enabled,
    mode: config.mode,
    schedule: config.schedule,
    thresholds: config.thresholds,
  }
}

export function toReadingDto(reading: EnvironmentReading) {
  return {
    temperature: reading.temperature,
    humidity: reading.humidity,
    pressure: reading.pressure,
    gasResistance: reading.gasResistance,
    capturedAt: toIso(reading.capturedAt),
  }
}

export function toSensorLogDto(row: SensorLogRow) {
  return {
    id: row.id,
    projectId: row.projectId,
    temperature: row.temperature,
    humidity: row.humidity,
    pressure: row.pressure,
    gasResistance: row.gasResistance,
    capturedAt: toIso(row.capturedAt),
  }
}

export function toProjectDto(project: Project) {
  return {
    id: project.id,
    name: project.name,
    notes: project.notes,
    status: project.status,
    startedAt: toIso(project.startedAt),
    endedAt: toIsoOrNull(project.endedAt),
    timelapseEnabled: project.timelapseEnabled,
    timelapseIntervalSec: project.timelapseIntervalSec,
    timelapseLastCaptureAt: toIsoOrNull(project.timelapseLastCaptureAt),
  }
}

export function toTimelapseImageDto(image: TimelapseImage) {
  return {
    id: image.id,
    projectId: image.projectId,
    filepath: image.filepath,
    capturedAt: toIso(image.capturedAt),
  }
}

export function toTimelapseVideoDto(video: TimelapseVideo) {
  return {
    filename: video.filename,
    size: video.size,
    createdAt: toIso(video.createdAt),
  }
}

export function toDiaryEntryDto(entry: DiaryEntry) {
  return {
    id: entry.id,
    projectId: entry.projectId,
    title: entry.title,
    text: entry.text,
    photos: entry.photos,
    createdAt: toIso(entry.createdAt),
    updatedAt: toIso(entry.updatedAt),
  }
}
