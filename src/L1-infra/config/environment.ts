import dotenv from 'dotenv'
import { join } from '../paths/paths.js'
import { fileExistsSync } from '../fileSystem/fileSystem.js'
import { ValidationError } from '../../L0-pure/errors/errors.js'

/** Load `.env` from the working directory, if there is one. Existing env vars win. */
export function loadEnvFile(envPath: string = join(process.cwd(), '.env')): void {
  if (fileExistsSync(envPath)) {
    dotenv.config({ path: envPath })
  }
}

export interface AppConfig {
  /** Explicit ffmpeg binary, or '' to resolve from the installer package / PATH */
  FFMPEG_PATH: string
  FFPROBE_PATH: string
  /** Per-invocation limit for every ffmpeg/ffprobe call, in seconds; 0 = unbounded */
  TOOL_TIMEOUT: number
  /** Mirror logs to this file, or '' for console only */
  LOG_FILE: string
  VERBOSE: boolean
}

export interface CLIOptions {
  ffmpeg?: string
  ffprobe?: string
  timeout?: string
  logFile?: string
  verbose?: boolean
}

/** Parse a timeout in seconds. Empty means unbounded. */
export function parseTimeout(raw: string | undefined, source: string): number {
  if (raw === undefined || raw.trim() === '') return 0
  const value = Number(raw)
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${source} must be a non-negative number of seconds, got "${raw}"`)
  }
  return value
}

/** Merge CLI options → env vars → defaults. */
export function initConfig(cli: CLIOptions = {}): AppConfig {
  const timeout = cli.timeout !== undefined
    ? parseTimeout(cli.timeout, '--timeout')
    : parseTimeout(process.env.TCAP_TOOL_TIMEOUT, 'TCAP_TOOL_TIMEOUT')

  return {
    FFMPEG_PATH: cli.ffmpeg || process.env.FFMPEG_PATH || '',
    FFPROBE_PATH: cli.ffprobe || process.env.FFPROBE_PATH || '',
    TOOL_TIMEOUT: timeout,
    LOG_FILE: cli.logFile || process.env.TCAP_LOG_FILE || '',
    VERBOSE: cli.verbose ?? false,
  }
}
