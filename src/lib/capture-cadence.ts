import type { Project } from '../types/grow'
import { MIN_TIMELAPSE_INTERVAL_SEC } from './devices'

export type CadenceProject = Pick<Project, 'id' | 'timelapseIntervalSec' | 'timelapseLastCaptureAt'>

export function effectiveIntervalMs(project: Pick<Project, 'timelapseIntervalSec'>) {
  return Math.max(MIN_TIMELAPSE_INTERVAL_SEC, project.timelapseIntervalSec) * 1000
}

/**
 * Per-project time-lapse timers. Entries are seeded from the persisted last
 * capture, or backdated by one interval so a new project captures at once.
 */
export class CaptureCadenceTracker {
  private readonly lastCaptureAt = new Map<number, number>()

  restore(projects: CadenceProject[], now: number) {
    for (const project of projects) {
      this.seed(project, now)
    }
  }

  due(project: CadenceProject, now: number) {
    const last = this.lastCaptureAt.get(project.id) ?? this.seed(project, now)
    return now - last >= effectiveIntervalMs(project)
  }

  record(projectId: number, now: number) {
    this.lastCaptureAt.set(projectId, now)
  }

  /** (Re)seeds a timer by the same rule as first observation. */
  start(project: CadenceProject, now: number) {
    this.seed(project, now)
  }

  forget(projectId: number) {
    this.lastCaptureAt.delete(projectId)
  }

  /** Drops timers of projects that no longer need time-lapse. */
  retain(projectIds: number[]) {
    const keep = new Set(projectIds)
    for (const projectId of [...this.lastCaptureAt.keys()]) {
      if (!keep.has(projectId)) {
        this.lastCaptureAt.delete(projectId)
      }
    }
  }

  has(projectId: number) {
    return this.lastCaptureAt.has(projectId)
  }

  getLastCaptureAt(projectId: number) {
    return this.lastCaptureAt.get(projectId) ?? null
  }

  private seed(project: CadenceProject, now: number) {
    const seeded = project.timelapseLastCaptureAt ?? now - effectiveIntervalMs(project)
    this.lastCaptureAt.set(project.id, seeded)
    return seeded
  }
}
