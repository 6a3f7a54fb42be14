import { execFile } from 'node:child_process'
import { mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { promisify } from 'node:util'
import { formatFileStamp } from './time-of-day'

const execFileAsync = promisify(execFile)

const VIDEO_FILE_PATTERN = /^timelapse_project\d+_\d{8}_\d{6}\.mp4$/

export type RunCommand = (command: string, args: string[], timeoutMs: number) => Promise<void>

export type TimelapseVideoOptions = {
  dataDir: string
  timezone: string
  command: string
  defaultFps: number
  timeoutMs: number
}

export type TimelapseVideo = {
  filename: string
  size: number
  createdAt: number
}

async function runCommand(command: string, args: string[], timeoutMs: number) {
  await execFileAsync(command, args, { timeout: timeoutMs, maxBuffer: 16 * 1024 * 1024 })
}

export function isMissingPath(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/** ffmpeg concat demuxer input: one `file '<absolute path>'` line per frame. */
export function buildConcatList(filepaths: string[]) {
  return filepaths.map((filepath) => `file '${resolve(filepath).replaceAll("'", "'\\''")}'\n`).join('')
}

export function buildFfmpegArgs(listPath: string, fps: number, outputPath: string) {
  return ['-f', 'concat', '-safe', '0', '-i', listPath, '-vf', `fps=${fps}`, '-pix_fmt', 'yuv420p', '-y', outputPath]
}

export function isVideoFileName(filename: string) {
  return VIDEO_FILE_PATTERN.test(filename)
}

/**
 * Assembles a project's time-lapse frames into an MP4 under `<dataDir>/videos`.
 * One build per project runs at a time.
 */
export class TimelapseVideoBuilder {
  private readonly building = new Set<number>()

  constructor(
    private readonly options: TimelapseVideoOptions,
    private readonly run: RunCommand = runCommand,
  ) {}

  get defaultFps() {
    return this.options.defaultFps
  }

  get videosDir() {
    return join(this.options.dataDir, 'videos')
  }

  isBuilding(projectId: number) {
    return this.building.has(projectId)
  }

  videoFileName(projectId: number, now: number) {
    return `timelapse_project${projectId}_${formatFileStamp(now, this.options.timezone)}.mp4`
  }

  async build(projectId: number, filepaths: string[], fps: number, now: number) {
    if (filepaths.length === 0) {
      throw new Error('NO_TIMELAPSE_IMAGES')
    }
    if (this.building.has(projectId)) {
      throw new Error('VIDEO_BUILD_IN_PROGRESS')
    }

    this.building.add(projectId)
    const filename = this.videoFileName(projectId, now)
    const listPath = join(this.videosDir, `.${filename}.txt`)
    try {
      await mkdir(this.videosDir, { recursive: true })
      await writeFile(listPath, buildConcatList(filepaths), 'utf8')
      await this.run(this.options.command, buildFfmpegArgs(listPath, fps, join(this.videosDir, filename)), this.options.timeoutMs)
      console.log(`[video] Built ${filename} from ${filepaths.length} frames at ${fps} fps`)
      return filename
    } finally {
      this.building.delete(projectId)
      await rm(listPath, { force: true })
    }
  }

  /** Newest first. */
  async list(): Promise<TimelapseVideo[]> {
    let entries: string[]
    try {
      entries = await readdir(this.videosDir)
    } catch (error) {
      if (isMissingPath(error)) {
        return []
      }
      throw error
    }

    const videos = await Promise.all(
      entries.filter(isVideoFileName).map(async (filename) => {
        const info = await stat(join(this.videosDir, filename))
        return { filename, size: info.size, createdAt: Math.floor(info.mtimeMs) }
      }),
    )
    return videos.sort((a, b) => b.createdAt - a.createdAt || b.filename.localeCompare(a.filename))
  }

  /** Absolute path of a listed video, or null for a name outside the videos directory. */
  resolve(filename: string) {
    return isVideoFileName(filename) ? join(this.videosDir, filename) : null
  }
}
