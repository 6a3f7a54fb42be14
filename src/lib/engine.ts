import { join } from 'node:path'
import { setTimeout as delay } from 'node:timers/promises'
import type { EnvironmentReading } from '../types/grow'
import { AlertThrottler } from './alerts'
import { CaptureCadenceTracker } from './capture-cadence'
import type { CadenceProject } from './capture-cadence'
import { getDefaultDeviceSettings } from './devices'
import type { Actuator, Capturer, DeviceStates, SensorSource } from './hardware/types'
import type { NotificationSink } from './notify'
import { activeDutyCycleKeys, evaluateDevice, pruneDutyCycles } from './rules'
import type { DutyCycleStore } from './rules'
import type { GrowStore } from './store'
import { formatFileStamp } from './time-of-day'

export type ControlLoopState = 'stopped' | 'running'

export type ComponentStatus = 'ok' | 'unavailable' | 'stopped'

export type ControlLoopHealth = {
  state: ControlLoopState
  components: {
    actuator: ComponentStatus
    sensor: ComponentStatus
    camera: ComponentStatus
  }
  hardware: {
    actuator: string
    sensor: string
    camera: string
  }
  lastTickAt: number | null
  lastTickDurationMs: number | null
  consecutiveFailures: number
  lastError: string | null
}

export type DeviceControlResult = {
  ok: boolean
  state: boolean | null
}

export type ControlLoopOptions = {
  timezone: string
  dataDir: string
  sensorReadIntervalMs: number
  dataLogIntervalMs: number
  alertCheckIntervalMs: number
  maxConsecutiveFailures: number
  backoffMs: number
  stopTimeoutMs: number
}

export const DEFAULT_CONTROL_LOOP_OPTIONS: ControlLoopOptions = {
  timezone: 'UTC',
  dataDir: './data',
  sensorReadIntervalMs: 30_000,
  dataLogIntervalMs: 60_000,
  alertCheckIntervalMs: 60_000,
  maxConsecutiveFailures: 10,
  backoffMs: 60_000,
  stopTimeoutMs: 10_000,
}

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>

export type ControlLoopDeps = {
  store: GrowStore
  actuator: Actuator
  sensor: SensorSource
  camera: Capturer
  notifier: NotificationSink
  clock?: () => number
  sleep?: SleepFn
}

type ComponentName = 'sensor' | 'camera'

/** Resolves early, without error, when `signal` aborts. */
export const interruptibleSleep: SleepFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal })
  } catch (error) {
    if (!signal.aborted) {
      throw error
    }
  }
}

async function settlesWithin(promise: Promise<unknown>, ms: number) {
  const timeout = new AbortController()
  try {
    return await Promise.race([promise.then(() => true), delay(ms, false, { signal: timeout.signal })])
  } finally {
    timeout.abort()
  }
}

function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error)
}

export function timelapseImagePath(dataDir: string, projectId: number, capturedAt: number, timezone: string) {
  return join(dataDir, 'projects', String(projectId), 'timelapse', `timelapse_${formatFileStamp(capturedAt, timezone)}.jpg`)
}

/**
 * Polls the sensor, drives the relays from the stored device rules, raises
 * throttled alerts and takes time-lapse captures. One instance owns all
 * in-memory timing state; the HTTP API and the chat bot switch devices through
 * the same instance so the state cache stays coherent.
 */
export class ControlLoop {
  private state: ControlLoopState = 'stopped'
  private readonly components: ControlLoopHealth['components'] = {
    actuator: 'stopped',
    sensor: 'stopped',
    camera: 'stopped',
  }

  private readonly options: ControlLoopOptions
  private readonly clock: () => number
  private readonly sleep: SleepFn

  private readonly dutyCycles: DutyCycleStore = new Map()
  private readonly throttler = new AlertThrottler()
  private readonly captures = new CaptureCadenceTracker()
  private timersRestored = false

  private latestReading: EnvironmentReading | null = null
  private lastLoggedAt: number | null = null
  private lastAlertCheckAt: number | null = null

  private lastTickAt: number | null = null
  private lastTickDurationMs: number | null = null
  private consecutiveFailures = 0
  private lastError: string | null = null

  private starting: Promise<void> | null = null
  private run = new AbortController()
  private loop: Promise<void> | null = null

  constructor(
    private readonly deps: ControlLoopDeps,
    options: Partial<ControlLoopOptions> = {},
  ) {
    this.options = { ...DEFAULT_CONTROL_LOOP_OPTIONS, ...options }
    this.clock = deps.clock ?? Date.now
    this.sleep = deps.sleep ?? interruptibleSleep
  }

  async start() {
    if (this.starting) {
      console.warn('[engine] Control loop already starting')
      await this.starting
      return
    }
    if (this.state === 'running') {
      console.warn('[engine] Control loop already running')
      return
    }

    this.starting = this.openRun()
    try {
      await this.starting
    } finally {
      this.starting = null
    }
  }

  private async openRun() {
    if (this.loop) {
      // a tick left running by a timed-out stop must end before a new run begins
      const finished = await settlesWithin(this.loop, this.options.stopTimeoutMs)
      if (!finished) {
        throw new Error('ENGINE_BUSY: previous tick still running')
      }
      this.loop = null
    }

    // no fallback here: the caller decides what to do without relays
    await this.deps.actuator.open()
    this.components.actuator = 'ok'
    await this.openComponent('sensor', () => this.deps.sensor.open())
    await this.openComponent('camera', () => this.deps.camera.open())

    const run = new AbortController()
    this.run = run
    this.state = 'running'
    this.loop = this.runLoop(run.signal)
    console.log(
      `[engine] Control loop started (actuator=${this.deps.actuator.kind}, sensor=${this.components.sensor}, camera=${this.components.camera})`,
    )
  }

  async stop() {
    if (this.state === 'stopped') {
      console.warn('[engine] Control loop already stopped')
      return
    }

    this.run.abort()

    if (this.loop) {
      const finished = await settlesWithin(this.loop, this.options.stopTimeoutMs)
      if (finished) {
        this.loop = null
      } else {
        // kept so the next start waits for it
        console.warn(`[engine] In-flight tick still running after ${this.options.stopTimeoutMs}ms; closing anyway`)
      }
    }

    await this.closeQuietly('actuator', () => this.deps.actuator.close())
    await this.closeQuietly('camera', () => this.deps.camera.close())
    await this.closeQuietly('sensor', () => this.deps.sensor.close())

    this.state = 'stopped'
    this.components.actuator = 'stopped'
    this.components.sensor = 'stopped'
    this.components.camera = 'stopped'
    console.log('[engine] Control loop stopped')
  }

  /**
   * Runs one control pass. Resolves false when every attempted step failed.
   */
  async tick() {
    const startedAt = this.clock()
    const outcomes: boolean[] = []

    const reading = await this.readSensor(outcomes)
    if (reading) {
      if (this.isDue(this.lastLoggedAt, this.options.dataLogIntervalMs, startedAt)) {
        outcomes.push(await this.runStep('log reading', () => this.logReading(reading, startedAt)))
      }
      outcomes.push(await this.runStep('device control', () => this.controlDevices(reading, startedAt)))
      if (this.isDue(this.lastAlertCheckAt, this.options.alertCheckIntervalMs, startedAt)) {
        outcomes.push(await this.runStep('alerts', () => this.checkAlerts(reading, startedAt)))
      }
    }

    if (this.components.camera !== 'unavailable') {
      outcomes.push(await this.runStep('time-lapse', () => this.captureTimelapse(startedAt)))
    }

    this.lastTickAt = startedAt
    this.lastTickDurationMs = this.clock() - startedAt
    return outcomes.length === 0 || outcomes.some(Boolean)
  }

  async turnOn(deviceName: string) {
    return this.setDevice(deviceName, true)
  }

  async turnOff(deviceName: string) {
    return this.setDevice(deviceName, false)
  }

  async toggle(deviceName: string) {
    this.assertDevice(deviceName)
    return this.setDevice(deviceName, !(this.deps.actuator.get(deviceName) ?? false))
  }

  hasDevice(deviceName: string) {
    return this.deps.actuator.has(deviceName)
  }

  getDeviceStates(): DeviceStates {
    return this.deps.actuator.states()
  }

  getLatestReading() {
    return this.latestReading
  }

  async capturePhoto(filepath?: string) {
    if (this.components.camera === 'unavailable') {
      return null
    }

    const now = this.clock()
    const target = filepath ?? join(this.options.dataDir, 'photos', `photo_${formatFileStamp(now, this.options.timezone)}.jpg`)
    try {
      return await this.deps.camera.capture(target)
    } catch (error) {
      console.error('[engine] Manual capture failed', error)
      return null
    }
  }

  /** Seeds the project's timer from its last persisted capture, or due at once without one. */
  startProjectTimelapse(project: CadenceProject) {
    this.captures.start(project, this.clock())
  }

  stopProjectTimelapse(projectId: number) {
    this.captures.forget(projectId)
  }

  getHealth(): ControlLoopHealth {
    return {
      state: this.state,
      components: { ...this.components },
      hardware: {
        actuator: this.deps.actuator.kind,
        sensor: this.deps.sensor.kind,
        camera: this.deps.camera.kind,
      },
      lastTickAt: this.lastTickAt,
      lastTickDurationMs: this.lastTickDurationMs,
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError,
    }
  }

  private async runLoop(signal: AbortSignal) {
    while (!signal.aborted) {
      let failed: boolean
      try {
        failed = !(await this.tick())
      } catch (error) {
        failed = true
        this.lastError = describeError(error)
        console.error('[engine] Tick failed', error)
      }

      if (signal.aborted) {
        break
      }

      this.consecutiveFailures = failed ? this.consecutiveFailures + 1 : 0
      if (this.consecutiveFailures >= this.options.maxConsecutiveFailures) {
        console.error(
          `[engine] ${this.consecutiveFailures} consecutive failed ticks; backing off for ${this.options.backoffMs}ms`,
        )
        await this.sleep(this.options.backoffMs, signal)
        this.consecutiveFailures = 0
        continue
      }

      await this.sleep(this.options.sensorReadIntervalMs, signal)
    }
  }

  private async readSensor(outcomes: boolean[]) {
    if (this.components.sensor === 'unavailable') {
      return null
    }

    try {
      const reading = await this.deps.sensor.read()
      if (!reading) {
        // not a failed step: only thrown errors count towards backoff
        console.warn('[engine] No sensor data available')
        return null
      }
      this.latestReading = reading
      outcomes.push(true)
      return reading
    } catch (error) {
      this.lastError = describeError(error)
      console.error('[engine] Sensor read failed', error)
      outcomes.push(false)
      return null
    }
  }

  private async runStep(name: string, step: () => Promise<void>) {
    try {
      await step()
      return true
    } catch (error) {
      this.lastError = `${name}: ${describeError(error)}`
      console.error(`[engine] Step "${name}" failed`, error)
      return false
    }
  }

  private isDue(last: number | null, intervalMs: number, now: number) {
    return last == null || now - last >= intervalMs
  }

  private async logReading(reading: EnvironmentReading, now: number) {
    const activeProject = await this.deps.store.getActiveProject()
    await this.deps.store.logSensorReading(reading, activeProject?.id ?? null)
    this.lastLoggedAt = now
  }

  private async controlDevices(reading: EnvironmentReading, now: number) {
    const settings = await this.deps.store.getAllDeviceSettings()
    const context = {
      now,
      timezone: this.options.timezone,
      temperature: reading.temperature,
      humidity: reading.humidity,
    }

    for (const deviceName of Object.keys(this.deps.actuator.states())) {
      try {
        const config = settings[deviceName] ?? getDefaultDeviceSettings(deviceName)
        const decision = evaluateDevice(deviceName, config, context, this.dutyCycles)
        if (decision === 'NO_OPINION') {
          continue
        }

        const desired = decision === 'ON'
        if (this.deps.actuator.get(deviceName) === desired) {
          continue
        }

        const delivered = await this.deps.actuator.set(deviceName, desired)
        if (!delivered) {
          console.warn(`[engine] Could not switch ${deviceName} ${decision}`)
          continue
        }
        await this.deps.store.updateDeviceState(deviceName, desired, now)
        console.log(`[engine] ${deviceName} -> ${decision} (${config.mode})`)
      } catch (error) {
        this.lastError = `${deviceName}: ${describeError(error)}`
        console.error(`[engine] Control of ${deviceName} failed`, error)
      }
    }

    pruneDutyCycles(
      this.dutyCycles,
      Object.keys(this.deps.actuator.states()).flatMap((deviceName) =>
        activeDutyCycleKeys(deviceName, settings[deviceName] ?? getDefaultDeviceSettings(deviceName)),
      ),
    )
  }

  private async checkAlerts(reading: EnvironmentReading, now: number) {
    const config = await this.deps.store.getAlertSettings()
    const fired = this.throttler.check(reading, config, now)
    this.lastAlertCheckAt = now

    for (const condition of fired) {
      console.warn(`[engine] Alert ${condition.key}: ${condition.message}`)
      try {
        await this.deps.notifier.send(`⚠️ ${condition.message}`)
      } catch (error) {
        console.error(`[engine] Failed to deliver alert ${condition.key}`, error)
      }
    }
  }

  private async captureTimelapse(now: number) {
    const projects = await this.deps.store.listProjectsNeedingTimelapse()
    if (!this.timersRestored) {
      this.captures.restore(projects, now)
      this.timersRestored = true
    }
    this.captures.retain(projects.map((project) => project.id))

    for (const project of projects) {
      try {
        if (!this.captures.due(project, now)) {
          continue
        }

        const filepath = timelapseImagePath(this.options.dataDir, project.id, now, this.options.timezone)
        const captured = await this.deps.camera.capture(filepath)
        if (!captured) {
          console.warn(`[engine] Time-lapse capture for project ${project.id} produced no image`)
          continue
        }

        this.captures.record(project.id, now)
        await this.deps.store.saveTimelapseImage({ projectId: project.id, capturedAt: now, filepath: captured })
        await this.deps.store.updateTimelapseCapture(project.id, now)
        console.log(`[engine] Time-lapse image saved for project ${project.id}: ${captured}`)
      } catch (error) {
        this.lastError = `project ${project.id}: ${describeError(error)}`
        console.error(`[engine] Time-lapse for project ${project.id} failed`, error)
      }
    }
  }

  private assertDevice(deviceName: string) {
    if (!this.deps.actuator.has(deviceName)) {
      throw new Error('DEVICE_NOT_FOUND')
    }
  }

  private async setDevice(deviceName: string, on: boolean): Promise<DeviceControlResult> {
    this.assertDevice(deviceName)
    const delivered = await this.deps.actuator.set(deviceName, on)
    if (delivered) {
      await this.deps.store.updateDeviceState(deviceName, on, this.clock())
    }
    return { ok: delivered, state: this.deps.actuator.get(deviceName) }
  }

  private async openComponent(name: ComponentName, open: () => Promise<void>) {
    try {
      await open()
      this.components[name] = 'ok'
    } catch (error) {
      this.components[name] = 'unavailable'
      console.error(`[engine] ${name} unavailable; running degraded`, error)
    }
  }

  private async closeQuietly(name: 'actuator' | ComponentName, close: () => Promise<void>) {
    try {
      await close()
    } catch (error) {
      console.error(`[engine] Failed to close ${name}`, error)
    }
  }
}
