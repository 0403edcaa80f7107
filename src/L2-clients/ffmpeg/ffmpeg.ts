import { fluentFfmpeg } from '../../L1-infra/ffmpeg/ffmpeg.js'
import type { FfmpegCommand, FfmpegCommandOptions } from '../../L1-infra/ffmpeg/ffmpeg.js'
import { createModuleRequire, execCommand, isExecError } from '../../L1-infra/process/process.js'
import type { ExecResult } from '../../L1-infra/process/process.js'
import { fileExistsSync } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AppConfig } from '../../L1-infra/config/environment.js'
import { ToolExecutionError } from '../../L0-pure/errors/errors.js'

const require = createModuleRequire(import.meta.url)

export type BinarySource = 'config' | 'installer package' | 'system PATH'

export interface ResolvedBinary {
  path: string
  source: BinarySource
}

/** Binary path exported by an installer package, when the package and its binary are present. */
function installerPath(pkg: string): string | undefined {
  try {
    const mod: unknown = require(pkg)
    if (typeof mod === 'object' && mod !== null && 'path' in mod && typeof mod.path === 'string' && fileExistsSync(mod.path)) {
      return mod.path
    }
  } catch (err: unknown) {
    logger.debug(`${pkg} not available: ${err instanceof Error ? err.message : String(err)}`)
  }
  return undefined
}

function resolveBinary(explicit: string, pkg: string, fallback: string): ResolvedBinary {
  if (explicit) return { path: explicit, source: 'config' }
  const fromPackage = installerPath(pkg)
  if (fromPackage) return { path: fromPackage, source: 'installer package' }
  return { path: fallback, source: 'system PATH' }
}

/** Resolve ffmpeg: explicit config → @ffmpeg-installer/ffmpeg → `ffmpeg` on PATH. */
export function resolveFFmpegPath(config: AppConfig): ResolvedBinary {
  return resolveBinary(config.FFMPEG_PATH, '@ffmpeg-installer/ffmpeg', 'ffmpeg')
}

/** Resolve ffprobe: explicit config → @ffprobe-installer/ffprobe → `ffprobe` on PATH. */
export function resolveFFprobePath(config: AppConfig): ResolvedBinary {
  return resolveBinary(config.FFPROBE_PATH, '@ffprobe-installer/ffprobe', 'ffprobe')
}

export function getFFmpegPath(config: AppConfig): string {
  const { path, source } = resolveFFmpegPath(config)
  logger.debug(`FFmpeg: using ${path} (${source})`)
  return path
}

export function getFFprobePath(config: AppConfig): string {
  const { path, source } = resolveFFprobePath(config)
  logger.debug(`FFprobe: using ${path} (${source})`)
  return path
}

/** Create a pre-configured fluent-ffmpeg instance honouring the configured tool timeout. */
export function createFFmpeg(config: AppConfig): FfmpegCommand {
  const options: FfmpegCommandOptions = config.TOOL_TIMEOUT > 0 ? { timeout: config.TOOL_TIMEOUT } : {}
  const cmd = fluentFfmpeg(options)
  cmd.setFfmpegPath(getFFmpegPath(config))
  cmd.setFfprobePath(getFFprobePath(config))
  return cmd
}

/** Turn fluent-ffmpeg's error message into an exit code / reason pair. */
export function describeFfmpegFailure(message: string): { exitCode: number | null; reason?: string } {
  const exited = /exited with code (\d+)/.exec(message)
  if (exited) return { exitCode: Number(exited[1]) }
  const timedOut = /ran into a timeout \((\d+)s\)/.exec(message)
  if (timedOut) return { exitCode: null, reason: `timed out after ${timedOut[1]}s` }
  const killed = /killed with signal (\w+)/.exec(message)
  if (killed) return { exitCode: null, reason: `killed by ${killed[1]}` }
  return { exitCode: null, reason: message }
}

/**
 * Run a configured ffmpeg command to completion. `label` names the step in logs.
 * Failures reject with {@link ToolExecutionError} carrying the command line and stderr.
 */
export function runFFmpeg(command: FfmpegCommand, label: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let commandLine = ''
    command
      .on('start', (line: string) => {
        commandLine = line
        logger.debug(`[${label}] ${line}`)
      })
      .on('end', () => {
        logger.debug(`[${label}] done`)
        resolve()
      })
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        const { exitCode, reason } = describeFfmpegFailure(err.message)
        reject(new ToolExecutionError(
          { tool: 'ffmpeg', command: commandLine || label, exitCode, stderr: stderr ?? '', reason },
          { cause: err },
        ))
      })
      .run()
  })
}

/**
 * Run ffprobe with `args` and return its output. Read-only; every call is bounded
 * by the configured timeout.
 */
export async function runFFprobe(config: AppConfig, args: string[]): Promise<ExecResult> {
  const bin = getFFprobePath(config)
  const command = [bin, ...args].join(' ')
  logger.debug(`[ffprobe] ${command}`)
  try {
    return await execCommand(bin, args, {
      timeout: config.TOOL_TIMEOUT * 1000,
      maxBuffer: 16 * 1024 * 1024,
    })
  } catch (err: unknown) {
    if (!isExecError(err)) throw err
    const exitCode = typeof err.code === 'number' ? err.code : null
    let reason: string | undefined
    if (err.killed && config.TOOL_TIMEOUT > 0) reason = `timed out after ${config.TOOL_TIMEOUT}s`
    else if (typeof err.code === 'string') reason = err.code
    else if (err.signal) reason = `killed by ${err.signal}`
    throw new ToolExecutionError({ tool: 'ffprobe', command, exitCode, stderr: err.stderr, reason }, { cause: err })
  }
}
