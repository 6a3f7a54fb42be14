import type { EnvironmentReading } from '../../types/grow'

export type DeviceStates = Record<string, boolean | null>

export interface Actuator {
  readonly kind: string
  open(): Promise<void>
  /** Turns every device off and releases the hardware. */
  close(): Promise<void>
  /** Resolves false when the command could not be delivered. */
  set(deviceName: string, on: boolean): Promise<boolean>
  /** Cached state; null when unknown. */
  get(deviceName: string): boolean | null
  has(deviceName: string): boolean
  states(): DeviceStates
}

export interface SensorSource {
  readonly kind: string
  open(): Promise<void>
  close(): Promise<void>
  read(): Promise<EnvironmentReading | null>
}

export interface Capturer {
  readonly kind: string
  open(): Promise<void>
  close(): Promise<void>
  /** Resolves the written path, or null when nothing was captured. */
  capture(filepath: string): Promise<string | null>
}
