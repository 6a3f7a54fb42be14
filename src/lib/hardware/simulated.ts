import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { EnvironmentReading } from '../../types/grow'
import { DEVICE_NAMES } from '../devices'
import { DAY_MS } from '../time-of-day'
import type { Actuator, Capturer, DeviceStates, SensorSource } from './types'

export class SimulatedActuator implements Actuator {
  readonly kind = 'simulated'
  private readonly cache = new Map<string, boolean | null>()

  constructor(deviceNames: readonly string[] = DEVICE_NAMES) {
    for (const deviceName of deviceNames) {
      this.cache.set(deviceName, null)
    }
  }

  async open() {
    for (const deviceName of this.cache.keys()) {
      this.cache.set(deviceName, false)
    }
    console.log(`[hardware] Simulated relay board ready with ${this.cache.size} channels`)
  }

  async close() {
    for (const deviceName of this.cache.keys()) {
      this.cache.set(deviceName, false)
    }
  }

  async set(deviceName: string, on: boolean) {
    if (!this.cache.has(deviceName)) {
      return false
    }
    this.cache.set(deviceName, on)
    return true
  }

  get(deviceName: string) {
    return this.cache.get(deviceName) ?? null
  }

  has(deviceName: string) {
    return this.cache.has(deviceName)
  }

  states(): DeviceStates {
    return Object.fromEntries(this.cache)
  }
}

function round2(value: number) {
  return Math.round(value * 100) / 100
}

/**
 * Produces a smooth daily cycle derived from the clock alone: warmest and
 * driest at 12:00 UTC, coolest and most humid at 00:00 UTC.
 */
export function simulateReading(now: number): EnvironmentReading {
  const dayFraction = (((now % DAY_MS) + DAY_MS) % DAY_MS) / DAY_MS
  const wave = -Math.cos(2 * Math.PI * dayFraction)
  return {
    temperature: round2(23 + 3 * wave),
    humidity: round2(60 - 8 * wave),
    pressure: round2(1013.25 + 0.5 * wave),
    gasResistance: Math.round(50_000 + 5_000 * wave),
    capturedAt: now,
  }
}

export class SimulatedSensor implements SensorSource {
  readonly kind = 'simulated'

  constructor(private readonly clock: () => number = Date.now) {}

  async open() {
    console.log('[hardware] Simulated BME680 ready')
  }

  async close() {}

  async read() {
    return simulateReading(this.clock())
  }
}

// 1x1 white JPEG
const PLACEHOLDER_JPEG = Buffer.from(
  '/9j/4AAQSkZJRgABAQEASABIAAD/2wBDAP//////////////////////////////////////////////////////////////////////////////////////wgALCAABAAEBAREA/8QAFBABAAAAAAAAAAAAAAAAAAAAAP/aAAgBAQABPxA=',
  'base64',
)

export class SimulatedCamera implements Capturer {
  readonly kind = 'simulated'

  async open() {
    console.log('[hardware] Simulated camera ready')
  }

  async close() {}

  async capture(filepath: string) {
    await mkdir(dirname(filepath), { recursive: true })
    await writeFile(filepath, PLACEHOLDER_JPEG)
    return filepath
  }
}
