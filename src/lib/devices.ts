import type { AlertConfig, DeviceConfig } from '../types/grow'

export const DEVICE_NAMES = [
  'lights',
  'air_pump',
  'nutrient_pump',
  'circulatory_fan_1',
  'circulatory_fan_2',
  'exhaust_fan',
  'humidifier',
  'heater',
  'dehumidifier',
] as const

export type DeviceName = (typeof DEVICE_NAMES)[number]

const DISPLAY_NAMES: Record<DeviceName, string> = {
  lights: 'Lights',
  air_pump: 'Air Pump',
  nutrient_pump: 'Nutrient Pump',
  circulatory_fan_1: 'Circulatory Fan 1',
  circulatory_fan_2: 'Circulatory Fan 2',
  exhaust_fan: 'Exhaust Fan',
  humidifier: 'Humidifier',
  heater: 'Heater',
  dehumidifier: 'Dehumidifier',
}

export function isDeviceName(value: string): value is DeviceName {
  return (DEVICE_NAMES as readonly string[]).includes(value)
}

export function getDeviceDisplayName(deviceName: string) {
  if (isDeviceName(deviceName)) {
    return DISPLAY_NAMES[deviceName]
  }
  return deviceName
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

/**
 * How a device reacts to a threshold. `shed` devices remove an excess and
 * switch on at or above the threshold; `compensate` devices make up a deficit
 * and switch on at or below it.
 */
export type ThresholdRole = 'shed' | 'compensate'

export type ThresholdRoles = {
  temperature?: ThresholdRole
  humidity?: ThresholdRole
}

const THRESHOLD_ROLES: Partial<Record<DeviceName, ThresholdRoles>> = {
  exhaust_fan: { temperature: 'shed', humidity: 'shed' },
  dehumidifier: { temperature: 'shed', humidity: 'shed' },
  heater: { temperature: 'compensate' },
  humidifier: { humidity: 'compensate' },
}

export function getThresholdRoles(deviceName: string): ThresholdRoles {
  if (!isDeviceName(deviceName)) {
    return {}
  }
  return THRESHOLD_ROLES[deviceName] ?? {}
}

export const DEFAULT_DEVICE_SETTINGS: Record<DeviceName, DeviceConfig> = {
  lights: {
    enabled: true,
    mode: 'schedule',
    schedule: [{ on: '06:00', off: '22:00' }],
    thresholds: {},
  },
  exhaust_fan: {
    enabled: true,
    mode: 'auto',
    schedule: [{ duration: 15, interval: 60 }],
    thresholds: { temp_threshold: 28, humidity_threshold: 75 },
  },
  circulatory_fan_1: {
    enabled: true,
    mode: 'schedule',
    schedule: [{ on: '00:00', off: '23:59' }],
    thresholds: {},
  },
  circulatory_fan_2: {
    enabled: true,
    mode: 'schedule',
    schedule: [{ on: '00:00', off: '23:59' }],
    thresholds: {},
  },
  humidifier: {
    enabled: true,
    mode: 'threshold',
    schedule: [],
    thresholds: { humidity_threshold: 50 },
  },
  dehumidifier: {
    enabled: true,
    mode: 'threshold',
    schedule: [],
    thresholds: { humidity_threshold: 70 },
  },
  heater: {
    enabled: true,
    mode: 'threshold',
    schedule: [],
    thresholds: { temp_threshold: 18 },
  },
  nutrient_pump: {
    enabled: true,
    mode: 'schedule',
    schedule: [
      { time: '08:00', duration: 5 },
      { time: '20:00', duration: 5 },
    ],
    thresholds: {},
  },
  air_pump: {
    enabled: true,
    mode: 'schedule',
    schedule: [{ on: '00:00', off: '23:59' }],
    thresholds: {},
  },
}

export const MANUAL_DEVICE_SETTINGS: DeviceConfig = {
  enabled: true,
  mode: 'manual',
  schedule: [],
  thresholds: {},
}

export function getDefaultDeviceSettings(deviceName: string): DeviceConfig {
  if (isDeviceName(deviceName)) {
    return DEFAULT_DEVICE_SETTINGS[deviceName]
  }
  return MANUAL_DEVICE_SETTINGS
}

export const DEFAULT_ALERT_SETTINGS: AlertConfig = {
  enabled: true,
  tempMin: 15,
  tempMax: 32,
  humidityMin: 40,
  humidityMax: 80,
  notificationIntervalSec: 300,
}

export const MIN_TIMELAPSE_INTERVAL_SEC = 30
export const DEFAULT_TIMELAPSE_INTERVAL_SEC = 300
