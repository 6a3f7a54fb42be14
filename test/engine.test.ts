import { join } from 'node:path'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { saveDeviceSettings } from '../src/lib/db'
import { createSqliteDatabase } from '../src/lib/db-sqlite'
import { ControlLoop, timelapseImagePath } from '../src/lib/engine'
import type { ControlLoopDeps } from '../src/lib/engine'
import { ensureSchema } from '../src/lib/schema'
import { createDbStore } from '../src/lib/store'
import type { DeviceConfig } from '../src/types/grow'
import {
  FakeActuator,
  NOON,
  createFakeCamera,
  createFakeNotifier,
  createFakeSensor,
  createFakeStore,
  makeProject,
  makeReading,
  waitForAbort,
} from './fakes'

const DATA_DIR = '/var/lib/growtent-test'

const autoExhaust: DeviceConfig = {
  enabled: true,
  mode: 'auto',
  schedule: [],
  thresholds: { temp_threshold: 28 },
}

const manualLights: DeviceConfig = { enabled: true, mode: 'manual', schedule: [], thresholds: {} }

function createLoop(deps: Partial<ControlLoopDeps> & Pick<ControlLoopDeps, 'store'>, clock: () => number = () => NOON) {
  return new ControlLoop(
    {
      actuator: new FakeActuator(),
      sensor: createFakeSensor(makeReading(24, 60)),
      camera: createFakeCamera(),
      notifier: createFakeNotifier(),
      clock,
      sleep: waitForAbort,
      ...deps,
    },
    { timezone: 'UTC', dataDir: DATA_DIR },
  )
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

describe('control loop device control', () => {
  it('switches the exhaust fan on above its temperature threshold', async () => {
    const { store, states } = createFakeStore({ settings: { exhaust_fan: autoExhaust } })
    const actuator = new FakeActuator({ exhaust_fan: false })
    const loop = createLoop({ store, actuator, sensor: createFakeSensor(makeReading(30, 60)) })

    await expect(loop.tick()).resolves.toBe(true)

    expect(actuator.set).toHaveBeenCalledWith('exhaust_fan', true)
    expect(store.updateDeviceState).toHaveBeenCalledWith('exhaust_fan', true, NOON)
    expect(states.get('exhaust_fan')).toBe(true)
  })

  it('persists the new state as 1 in the database', async () => {
    const db = createSqliteDatabase(':memory:')
    await ensureSchema(db)
    await saveDeviceSettings(db, 'exhaust_fan', autoExhaust)
    const actuator = new FakeActuator({ exhaust_fan: false })
    const loop = createLoop({ store: createDbStore(db), actuator, sensor: createFakeSensor(makeReading(30, 60)) })

    await loop.tick()

    const row = await db
      .prepare('SELECT state, updated_at FROM device_states WHERE device_name = ?')
      .bind('exhaust_fan')
      .first<{ state: number; updated_at: number }>()
    expect(row).toEqual({ state: 1, updated_at: NOON })
    await db.close()
  })

  it('never touches a manual device', async () => {
    const { store } = createFakeStore({ settings: { lights: manualLights } })
    const actuator = new FakeActuator({ lights: true })
    const loop = createLoop({ store, actuator })

    await loop.tick()

    expect(actuator.set).not.toHaveBeenCalled()
    expect(store.updateDeviceState).not.toHaveBeenCalled()
  })

  it('leaves a device alone when it is already in the wanted state', async () => {
    const { store } = createFakeStore({ settings: { exhaust_fan: autoExhaust } })
    const actuator = new FakeActuator({ exhaust_fan: true })
    const loop = createLoop({ store, actuator, sensor: createFakeSensor(makeReading(30, 60)) })

    await loop.tick()

    expect(actuator.set).not.toHaveBeenCalled()
  })

  it('falls back to the built-in defaults for devices without stored settings', async () => {
    const { store } = createFakeStore()
    const actuator = new FakeActuator({ heater: false, lights: null })
    const loop = createLoop({ store, actuator, sensor: createFakeSensor(makeReading(15, 60)) })

    await loop.tick()

    // heater below 18°C, lights inside 06:00-22:00
    expect(actuator.set).toHaveBeenCalledWith('heater', true)
    expect(actuator.set).toHaveBeenCalledWith('lights', true)
  })

  it('does not persist a state the actuator could not deliver', async () => {
    const { store } = createFakeStore({ settings: { exhaust_fan: autoExhaust } })
    const actuator = new FakeActuator({ exhaust_fan: false })
    actuator.set.mockResolvedValueOnce(false)
    const loop = createLoop({ store, actuator, sensor: createFakeSensor(makeReading(30, 60)) })

    await loop.tick()

    expect(actuator.set).toHaveBeenCalledTimes(1)
    expect(store.updateDeviceState).not.toHaveBeenCalled()
  })

  it('keeps controlling other devices when one of them fails', async () => {
    const exhaustOnHumidity: DeviceConfig = { ...autoExhaust, thresholds: { humidity_threshold: 75 } }
    const { store } = createFakeStore({ settings: { exhaust_fan: exhaustOnHumidity } })
    const actuator = new FakeActuator({ heater: false, exhaust_fan: false })
    actuator.set.mockRejectedValueOnce(new Error('relay stuck'))
    const loop = createLoop({ store, actuator, sensor: createFakeSensor(makeReading(15, 80)) })

    await expect(loop.tick()).resolves.toBe(true)
    expect(actuator.set).toHaveBeenNthCalledWith(1, 'heater', true)
    expect(actuator.set).toHaveBeenNthCalledWith(2, 'exhaust_fan', true)
    expect(store.updateDeviceState).toHaveBeenCalledTimes(1)
    expect(store.updateDeviceState).toHaveBeenCalledWith('exhaust_fan', true, NOON)
    expect(loop.getHealth().lastError).toBe('heater: relay stuck')
  })
})

describe('control loop logging and alerts', () => {
  it('logs the first reading at once and then every data log interval', async () => {
    let now = NOON
    const project = makeProject({ id: 7, timelapseEnabled: false })
    const { store, logs } = createFakeStore({ projects: [project] })
    const loop = createLoop({ store }, () => now)

    await loop.tick()
    now += 30_000
    await loop.tick()
    now += 30_000
    await loop.tick()

    expect(logs).toHaveLength(2)
    expect(logs[0]?.projectId).toBe(7)
  })

  it('sends a breached bound once per notification interval', async () => {
    let now = NOON
    const { store } = createFakeStore()
    const notifier = createFakeNotifier()
    const loop = createLoop({ store, notifier, sensor: createFakeSensor(makeReading(33, 60)) }, () => now)

    await loop.tick()
    now += 60_000
    await loop.tick()
    now += 250_000
    await loop.tick()

    expect(notifier.send).toHaveBeenCalledTimes(2)
    expect(notifier.send).toHaveBeenNthCalledWith(1, '⚠️ Temperature too HIGH: 33.0°C (max: 32.0°C)')
  })

  it('keeps running when an alert cannot be delivered', async () => {
    const { store } = createFakeStore()
    const notifier = createFakeNotifier()
    notifier.send.mockRejectedValueOnce(new Error('offline'))
    const loop = createLoop({ store, notifier, sensor: createFakeSensor(makeReading(33, 60)) })

    await expect(loop.tick()).resolves.toBe(true)
  })

  it('does not back off while the sensor merely has no data', async () => {
    const { store } = createFakeStore()
    const camera = createFakeCamera()
    camera.open.mockRejectedValueOnce(new Error('no camera'))
    const sleep = vi.fn(waitForAbort)
    const loop = new ControlLoop(
      { store, actuator: new FakeActuator(), sensor: createFakeSensor(null), camera, notifier: createFakeNotifier(), clock: () => NOON, sleep },
      { timezone: 'UTC', dataDir: DATA_DIR, sensorReadIntervalMs: 1_000, maxConsecutiveFailures: 1, backoffMs: 5_000 },
    )

    await loop.start()
    await vi.waitFor(() => expect(sleep).toHaveBeenCalled())

    expect(sleep).toHaveBeenCalledWith(1_000, expect.any(AbortSignal))
    expect(loop.getHealth().consecutiveFailures).toBe(0)
    await loop.stop()
  })

  it('skips logging, control and alerts without a reading', async () => {
    const { store, logs } = createFakeStore({ settings: { exhaust_fan: autoExhaust } })
    const actuator = new FakeActuator({ exhaust_fan: false })
    const camera = createFakeCamera()
    const loop = createLoop({ store, actuator, camera, sensor: createFakeSensor(null) })

    // the time-lapse step still runs and succeeds
    await expect(loop.tick()).resolves.toBe(true)
    expect(logs).toHaveLength(0)
    expect(actuator.set).not.toHaveBeenCalled()
    expect(store.getAlertSettings).not.toHaveBeenCalled()
    expect(loop.getLatestReading()).toBeNull()
  })

  it('records the sensor error as the last error', async () => {
    const { store } = createFakeStore()
    const sensor = createFakeSensor(null)
    sensor.read.mockRejectedValueOnce(new Error('I2C bus timeout'))
    const loop = createLoop({ store, sensor })

    await loop.tick()
    expect(loop.getHealth().lastError).toBe('I2C bus timeout')
  })
})

describe('control loop duty-cycle timers', () => {
  it('starts a fresh cycle after a device leaves and re-enters schedule control', async () => {
    let now = NOON
    const dutyFan: DeviceConfig = { enabled: true, mode: 'schedule', schedule: [{ duration: 15, interval: 60 }], thresholds: {} }
    const settings: Record<string, DeviceConfig> = { exhaust_fan: dutyFan }
    const { store } = createFakeStore({ settings })
    const actuator = new FakeActuator({ exhaust_fan: false })
    const loop = createLoop({ store, actuator }, () => now)

    await loop.tick()
    expect(actuator.get('exhaust_fan')).toBe(true)

    now = NOON + 20 * 60_000
    await loop.tick()
    expect(actuator.get('exhaust_fan')).toBe(false)

    settings.exhaust_fan = { ...dutyFan, mode: 'manual' }
    await loop.tick()
    settings.exhaust_fan = dutyFan
    now = NOON + 21 * 60_000
    await loop.tick()
    expect(actuator.get('exhaust_fan')).toBe(true)
  })
})

describe('control loop time-lapse', () => {
  it('captures for a new project at once and persists the image', async () => {
    let now = NOON
    const project = makeProject({ id: 3 })
    const { store, images } = createFakeStore({ projects: [project] })
    const camera = createFakeCamera()
    const loop = createLoop({ store, camera }, () => now)

    await loop.tick()
    now += 60_000
    await loop.tick()

    const expectedPath = timelapseImagePath(DATA_DIR, 3, NOON, 'UTC')
    expect(expectedPath).toBe(join(DATA_DIR, 'projects', '3', 'timelapse', 'timelapse_20260115_120000.jpg'))
    expect(camera.capture).toHaveBeenCalledTimes(1)
    expect(images).toEqual([{ id: 1, projectId: 3, capturedAt: NOON, filepath: expectedPath }])
    expect(project.timelapseLastCaptureAt).toBe(NOON)
  })

  it('retries on the next tick when the camera produced nothing', async () => {
    let now = NOON
    const { store, images } = createFakeStore({ projects: [makeProject()] })
    const camera = createFakeCamera()
    camera.capture.mockResolvedValueOnce(null)
    const loop = createLoop({ store, camera }, () => now)

    await loop.tick()
    now += 30_000
    await loop.tick()

    expect(camera.capture).toHaveBeenCalledTimes(2)
    expect(images).toHaveLength(1)
    expect(images[0]?.capturedAt).toBe(NOON + 30_000)
  })

  it('resumes from the persisted last capture', async () => {
    const project = makeProject({ timelapseLastCaptureAt: NOON - 100_000 })
    const { store } = createFakeStore({ projects: [project] })
    const camera = createFakeCamera()
    const loop = createLoop({ store, camera })

    await loop.tick()
    expect(camera.capture).not.toHaveBeenCalled()
  })

  it('re-seeds a restarted timer from the persisted last capture', async () => {
    let now = NOON
    const project = makeProject()
    const { store } = createFakeStore({ projects: [project] })
    const camera = createFakeCamera()
    const loop = createLoop({ store, camera }, () => now)

    await loop.tick()
    now += 10_000
    loop.stopProjectTimelapse(project.id)
    loop.startProjectTimelapse(project)
    await loop.tick()
    expect(camera.capture).toHaveBeenCalledTimes(1)

    now = NOON + 300_000
    await loop.tick()
    expect(camera.capture).toHaveBeenCalledTimes(2)
  })

  it('captures at once for a started project that never captured', async () => {
    const project = makeProject({ id: 5 })
    const { store } = createFakeStore({ projects: [project] })
    const camera = createFakeCamera()
    const loop = createLoop({ store, camera })

    loop.startProjectTimelapse(project)
    await loop.tick()
    expect(camera.capture).toHaveBeenCalledTimes(1)
  })
})

describe('control loop lifecycle', () => {
  it('starts, runs a tick and stops cleanly', async () => {
    const { store, logs } = createFakeStore()
    const actuator = new FakeActuator({ lights: false })
    const sensor = createFakeSensor(makeReading(24, 60))
    const camera = createFakeCamera()
    const sleep = vi.fn(waitForAbort)
    const loop = createLoop({ store, actuator, sensor, camera, sleep })

    await loop.start()
    expect(loop.getHealth().state).toBe('running')
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledWith(30_000, expect.any(AbortSignal)))
    expect(logs).toHaveLength(1)

    await loop.start()
    expect(actuator.open).toHaveBeenCalledTimes(1)

    await loop.stop()
    expect(actuator.close).toHaveBeenCalledTimes(1)
    expect(camera.close).toHaveBeenCalledTimes(1)
    expect(sensor.close).toHaveBeenCalledTimes(1)
    expect(loop.getHealth()).toMatchObject({
      state: 'stopped',
      components: { actuator: 'stopped', sensor: 'stopped', camera: 'stopped' },
      consecutiveFailures: 0,
    })

    await loop.stop()
    expect(actuator.close).toHaveBeenCalledTimes(1)
  })

  it('rejects start when the actuator cannot be opened', async () => {
    const { store } = createFakeStore()
    const actuator = new FakeActuator()
    actuator.open.mockRejectedValueOnce(new Error('MQTT_CONNECT_TIMEOUT'))
    const loop = createLoop({ store, actuator })

    await expect(loop.start()).rejects.toThrow('MQTT_CONNECT_TIMEOUT')
    expect(loop.getHealth().state).toBe('stopped')
  })

  it('runs degraded without sensor and camera', async () => {
    const { store } = createFakeStore({ projects: [makeProject()] })
    const sensor = createFakeSensor(makeReading(24, 60))
    sensor.open.mockRejectedValueOnce(new Error('no BME680'))
    const camera = createFakeCamera()
    camera.open.mockRejectedValueOnce(new Error('no camera'))
    const sleep = vi.fn(waitForAbort)
    const loop = createLoop({ store, sensor, camera, sleep })

    await loop.start()
    await vi.waitFor(() => expect(sleep).toHaveBeenCalled())

    expect(loop.getHealth().components).toEqual({ actuator: 'ok', sensor: 'unavailable', camera: 'unavailable' })
    expect(sensor.read).not.toHaveBeenCalled()
    expect(camera.capture).not.toHaveBeenCalled()
    await expect(loop.capturePhoto()).resolves.toBeNull()
    await loop.stop()
  })

  it('backs off after too many consecutive failed ticks', async () => {
    const { store } = createFakeStore()
    const sensor = createFakeSensor(null)
    sensor.read.mockRejectedValue(new Error('I2C bus timeout'))
    const camera = createFakeCamera()
    camera.open.mockRejectedValueOnce(new Error('no camera'))
    const sleeps: number[] = []
    const sleep = vi.fn(async (ms: number, signal: AbortSignal) => {
      sleeps.push(ms)
      if (sleeps.length >= 3) {
        await waitForAbort(ms, signal)
      }
    })
    const loop = new ControlLoop(
      { store, actuator: new FakeActuator(), sensor, camera, notifier: createFakeNotifier(), clock: () => NOON, sleep },
      { timezone: 'UTC', dataDir: DATA_DIR, sensorReadIntervalMs: 1_000, maxConsecutiveFailures: 2, backoffMs: 5_000 },
    )

    await loop.start()
    await vi.waitFor(() => expect(sleeps).toHaveLength(3))

    expect(sleeps).toEqual([1_000, 5_000, 1_000])
    expect(loop.getHealth().consecutiveFailures).toBe(1)
    await loop.stop()
  })
})

describe('control loop start and stop races', () => {
  function createHangingSensor() {
    const state = { reads: 0, inFlight: 0, maxInFlight: 0, release: () => {} }
    const sensor = createFakeSensor(makeReading(24, 60))
    sensor.read.mockImplementation(async () => {
      state.reads += 1
      state.inFlight += 1
      state.maxInFlight = Math.max(state.maxInFlight, state.inFlight)
      if (state.reads === 1) {
        await new Promise<void>((resolve) => {
          state.release = resolve
        })
      }
      state.inFlight -= 1
      return makeReading(24, 60)
    })
    return { sensor, state }
  }

  function createRaceLoop(sensor: ControlLoopDeps['sensor']) {
    const { store } = createFakeStore()
    return new ControlLoop(
      {
        store,
        actuator: new FakeActuator(),
        sensor,
        camera: createFakeCamera(),
        notifier: createFakeNotifier(),
        clock: () => NOON,
        sleep: waitForAbort,
      },
      { timezone: 'UTC', dataDir: DATA_DIR, stopTimeoutMs: 20 },
    )
  }

  it('opens the hardware once when started twice at the same time', async () => {
    const { store } = createFakeStore()
    const actuator = new FakeActuator({ lights: false })
    const sensor = createFakeSensor(makeReading(24, 60))
    const loop = createLoop({ store, actuator, sensor })

    await Promise.all([loop.start(), loop.start()])

    expect(actuator.open).toHaveBeenCalledTimes(1)
    expect(sensor.open).toHaveBeenCalledTimes(1)
    expect(sensor.read).toHaveBeenCalledTimes(1)
    expect(loop.getHealth().state).toBe('running')
    await loop.stop()
  })

  it('waits for a tick left behind by a timed-out stop before running again', async () => {
    const { sensor, state } = createHangingSensor()
    const loop = createRaceLoop(sensor)

    await loop.start()
    await loop.stop()
    expect(loop.getHealth().state).toBe('stopped')

    const restarted = loop.start()
    state.release()
    await restarted

    expect(state.reads).toBe(2)
    expect(state.maxInFlight).toBe(1)
    await loop.stop()
  })

  it('refuses to start while the previous tick is still running', async () => {
    const { sensor, state } = createHangingSensor()
    const loop = createRaceLoop(sensor)

    await loop.start()
    await loop.stop()

    await expect(loop.start()).rejects.toThrow('ENGINE_BUSY: previous tick still running')
    expect(loop.getHealth().state).toBe('stopped')

    state.release()
    await loop.start()
    expect(state.reads).toBe(2)
    expect(state.maxInFlight).toBe(1)
    await loop.stop()
  })
})

describe('control loop accessors', () => {
  it('switches devices on demand and persists the state', async () => {
    const { store, states } = createFakeStore()
    const actuator = new FakeActuator({ lights: false })
    const loop = createLoop({ store, actuator })

    await expect(loop.turnOn('lights')).resolves.toEqual({ ok: true, state: true })
    await expect(loop.toggle('lights')).resolves.toEqual({ ok: true, state: false })
    expect(states.get('lights')).toBe(false)
    expect(loop.getDeviceStates()).toEqual({ lights: false })
  })

  it('reports a failed switch with the unchanged state', async () => {
    const { store } = createFakeStore()
    const actuator = new FakeActuator({ lights: false })
    actuator.set.mockResolvedValueOnce(false)
    const loop = createLoop({ store, actuator })

    await expect(loop.turnOn('lights')).resolves.toEqual({ ok: false, state: false })
    expect(store.updateDeviceState).not.toHaveBeenCalled()
  })

  it('rejects unknown devices', async () => {
    const { store } = createFakeStore()
    const loop = createLoop({ store, actuator: new FakeActuator({ lights: false }) })

    await expect(loop.turnOff('disco_ball')).rejects.toThrow('DEVICE_NOT_FOUND')
    await expect(loop.toggle('disco_ball')).rejects.toThrow('DEVICE_NOT_FOUND')
    expect(loop.hasDevice('disco_ball')).toBe(false)
  })

  it('takes a manual photo under the data directory', async () => {
    const { store } = createFakeStore()
    const camera = createFakeCamera()
    const loop = createLoop({ store, camera })

    await expect(loop.capturePhoto()).resolves.toBe(join(DATA_DIR, 'photos', 'photo_20260115_120000.jpg'))
    await expect(loop.capturePhoto('/tmp/snap.jpg')).resolves.toBe('/tmp/snap.jpg')
  })

  it('exposes hardware kinds in the health report', () => {
    const { store } = createFakeStore()
    const loop = createLoop({ store })

    expect(loop.getHealth()).toEqual({
      state: 'stopped',
      components: { actuator: 'stopped', sensor: 'stopped', camera: 'stopped' },
      hardware: { actuator: 'fake', sensor: 'fake', camera: 'fake' },
      lastTickAt: null,
      lastTickDurationMs: null,
      consecutiveFailures: 0,
      lastError: null,
    })
  })
})
