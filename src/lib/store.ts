import type { AppDatabase } from '../types/db'
import type { AlertConfig, DeviceConfig, EnvironmentReading, Project, TimelapseImage } from '../types/grow'
import {
  getActiveProject,
  getAlertSettings,
  getAllDeviceSettings,
  listProjectsNeedingTimelapse,
  logSensorReading,
  saveTimelapseImage,
  updateDeviceState,
  updateTimelapseCapture,
} from './db'

/** Persistence operations the control loop depends on. */
export interface GrowStore {
  getActiveProject(): Promise<Project | null>
  listProjectsNeedingTimelapse(): Promise<Project[]>
  getAllDeviceSettings(): Promise<Record<string, DeviceConfig>>
  getAlertSettings(): Promise<AlertConfig>
  logSensorReading(reading: EnvironmentReading, projectId: number | null): Promise<number>
  updateDeviceState(deviceName: string, on: boolean, updatedAt: number): Promise<void>
  saveTimelapseImage(input: { projectId: number | null; capturedAt: number; filepath: string }): Promise<TimelapseImage>
  updateTimelapseCapture(projectId: number, capturedAt: number): Promise<void>
}

export function createDbStore(db: AppDatabase): GrowStore {
  return {
    getActiveProject: () => getActiveProject(db),
    listProjectsNeedingTimelapse: () => listProjectsNeedingTimelapse(db),
    getAllDeviceSettings: () => getAllDeviceSettings(db),
    getAlertSettings: () => getAlertSettings(db),
    logSensorReading: (reading, projectId) => logSensorReading(db, reading, projectId),
    updateDeviceState: async (deviceName, on, updatedAt) => {
      await updateDeviceState(db, deviceName, on, updatedAt)
    },
    saveTimelapseImage: (input) => saveTimelapseImage(db, input),
    updateTimelapseCapture: async (projectId, capturedAt) => {
      await updateTimelapseCapture(db, projectId, capturedAt)
    },
  }
}
