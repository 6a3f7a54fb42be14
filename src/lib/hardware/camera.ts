import { execFile } from 'node:child_process'
import { access, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { promisify } from 'node:util'
import type { Capturer } from './types'

const execFileAsync = promisify(execFile)

export type CommandCameraOptions = {
  command: string
  width: number
  height: number
  timeoutMs?: number
}

export function buildCaptureArgs(options: Pick<CommandCameraOptions, 'width' | 'height'>, filepath: string) {
  return ['-n', '-t', '1', '--width', String(options.width), '--height', String(options.height), '-o', filepath]
}

/** Still capture through `rpicam-still` or a CLI taking the same arguments. */
export class CommandCamera implements Capturer {
  readonly kind = 'command'

  constructor(private readonly options: CommandCameraOptions) {}

  async open() {
    await execFileAsync(this.options.command, ['--version'], { timeout: 10_000 })
    console.log(`[hardware] Camera command ${this.options.command} available`)
  }

  async close() {}

  async capture(filepath: string) {
    await mkdir(dirname(filepath), { recursive: true })
    try {
      await execFileAsync(this.options.command, buildCaptureArgs(this.options, filepath), {
        timeout: this.options.timeoutMs ?? 30_000,
      })
      await access(filepath)
      return filepath
    } catch (error) {
      console.error(`[hardware] Capture to ${filepath} failed`, error)
      return null
    }
  }
}
