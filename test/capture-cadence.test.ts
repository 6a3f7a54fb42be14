import { describe, expect, it } from 'vitest'
import { CaptureCadenceTracker, effectiveIntervalMs } from '../src/lib/capture-cadence'

const NOW = 1_800_000_000_000

function project(id: number, timelapseIntervalSec = 300, timelapseLastCaptureAt: number | null = null) {
  return { id, timelapseIntervalSec, timelapseLastCaptureAt }
}

describe('capture cadence', () => {
  it('captures a new project at once and then every interval', () => {
    const tracker = new CaptureCadenceTracker()
    const fresh = project(1)

    expect(tracker.due(fresh, NOW)).toBe(true)
    tracker.record(1, NOW)
    expect(tracker.due(fresh, NOW + 299_000)).toBe(false)
    expect(tracker.due(fresh, NOW + 300_000)).toBe(true)
  })

  it('floors the interval at 30 seconds', () => {
    expect(effectiveIntervalMs({ timelapseIntervalSec: 10 })).toBe(30_000)
    expect(effectiveIntervalMs({ timelapseIntervalSec: 600 })).toBe(600_000)

    const tracker = new CaptureCadenceTracker()
    tracker.record(1, NOW)
    expect(tracker.due(project(1, 10), NOW + 10_000)).toBe(false)
    expect(tracker.due(project(1, 10), NOW + 30_000)).toBe(true)
  })

  it('restores timers from the last persisted capture', () => {
    const tracker = new CaptureCadenceTracker()
    const persisted = project(2, 300, NOW - 100_000)

    tracker.restore([persisted], NOW)
    expect(tracker.getLastCaptureAt(2)).toBe(NOW - 100_000)
    expect(tracker.due(persisted, NOW)).toBe(false)
    expect(tracker.due(persisted, NOW + 200_000)).toBe(true)
  })

  it('drops timers of projects that no longer need time-lapse', () => {
    const tracker = new CaptureCadenceTracker()
    tracker.record(1, NOW)
    tracker.record(2, NOW)

    tracker.retain([2])
    expect(tracker.has(1)).toBe(false)
    expect(tracker.has(2)).toBe(true)

    // re-activation seeds fresh
    expect(tracker.due(project(1), NOW + 1_000)).toBe(true)
  })

  it('starts a timer that is due immediately', () => {
    const tracker = new CaptureCadenceTracker()
    tracker.record(3, NOW)

    tracker.start(project(3), NOW + 1_000)
    expect(tracker.getLastCaptureAt(3)).toBe(NOW + 1_000 - 300_000)
    expect(tracker.due(project(3), NOW + 1_000)).toBe(true)

    tracker.forget(3)
    expect(tracker.has(3)).toBe(false)
  })

  it('restarts a timer from the persisted last capture', () => {
    const tracker = new CaptureCadenceTracker()
    tracker.record(4, NOW)

    tracker.start(project(4, 300, NOW), NOW + 1_000)
    expect(tracker.getLastCaptureAt(4)).toBe(NOW)
    expect(tracker.due(project(4, 300, NOW), NOW + 1_000)).toBe(false)
    expect(tracker.due(project(4, 300, NOW), NOW + 300_000)).toBe(true)
  })
})
