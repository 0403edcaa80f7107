import { Command, CommanderError } from '../L1-infra/cli/cli.js'
import { initConfig, loadEnvFile } from '../L1-infra/config/environment.js'
import type { AppConfig, CLIOptions } from '../L1-infra/config/environment.js'
import logger, { attachLogFile, setVerbose } from '../L1-infra/logger/configLogger.js'
import { readTextFileSync } from '../L1-infra/fileSystem/fileSystem.js'
import { join, projectRoot } from '../L1-infra/paths/paths.js'
import {
  DEFAULT_AUDIO_BITRATE,
  DEFAULT_CRF,
  DEFAULT_DURATION,
  processAppend,
} from '../L6-pipeline/pipeline.js'
import type { AppendJob } from '../L6-pipeline/pipeline.js'
import { runInfo } from './commands/info.js'
import { TcapError, ValidationError, isToolExecutionError } from '../L0-pure/errors/errors.js'
import type { AppendStrategy } from '../types/index.js'

/** Version from the package manifest beside the sources. */
export function readVersion(): string {
  const pkg: unknown = JSON.parse(readTextFileSync(join(projectRoot(), 'package.json')))
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return 'unknown'
}

interface ProgramOptions {
  pair?: string
  video?: string
  thumb?: string
  out?: string
  duration: string
  crf: string
  audioBitrate: string
  inplace?: boolean
  copyOnly?: boolean
  copyConcat: boolean
  timeout?: string
  ffmpeg?: string
  ffprobe?: string
  verbose?: boolean
  logFile?: string
  info?: boolean
}

function parseNumber(raw: string, flag: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ValidationError(`${flag} expects a number, got "${raw}"`)
  }
  return value
}

export function strategyFromFlags(copyOnly: boolean, copyConcat: boolean): AppendStrategy {
  if (copyOnly && !copyConcat) {
    throw new ValidationError('--copy-only cannot be combined with --no-copy-concat')
  }
  if (copyOnly) return 'copy'
  return copyConcat ? 'auto' : 'reencode'
}

export function toAppendJob(opts: ProgramOptions): AppendJob {
  return {
    pair: opts.pair,
    video: opts.video,
    thumb: opts.thumb,
    out: opts.out,
    duration: parseNumber(opts.duration, '--duration'),
    crf: parseNumber(opts.crf, '--crf'),
    audioBitrate: opts.audioBitrate,
    inplace: opts.inplace ?? false,
    strategy: strategyFromFlags(opts.copyOnly ?? false, opts.copyConcat),
  }
}

function toConfig(opts: ProgramOptions): AppConfig {
  const cliOptions: CLIOptions = {
    ffmpeg: opts.ffmpeg,
    ffprobe: opts.ffprobe,
    timeout: opts.timeout,
    logFile: opts.logFile,
    verbose: opts.verbose,
  }
  const config = initConfig(cliOptions)
  if (config.VERBOSE) setVerbose()
  if (config.LOG_FILE) attachLogFile(config.LOG_FILE)
  return config
}

export function createProgram(version: string): Command {
  const program = new Command()

  program
    .name('tcap')
    .description('Append a still image to the end of a video (default 0.3s) so it can be picked as the thumbnail.')
    .version(version, '-V, --version')
    .option('--pair <video>', 'Pair mode: the image is inferred as <stem>.png (then .jpg, .jpeg, .webp)')
    .option('-v, --video <path>', 'Explicit video path (use with -t/--thumb)')
    .option('-t, --thumb <path>', 'Explicit image path (required with -v/--video)')
    .option('-o, --out <path>', 'Output path (default: <stem>_thumb<ext> next to the video)')
    .option('-d, --duration <seconds>', 'Still duration in seconds', String(DEFAULT_DURATION))
    .option('--crf <n>', 'CRF for x264/x265 encodes, 0-51 (lower = higher quality)', String(DEFAULT_CRF))
    .option('--audio-bitrate <rate>', 'AAC bitrate for encoded audio', DEFAULT_AUDIO_BITRATE)
    .option('--inplace', 'Replace the source video atomically instead of writing a new file')
    .option('--copy-only', 'Require the stream-copy route; fail instead of re-encoding')
    .option('--no-copy-concat', 'Skip the stream-copy route and always re-encode')
    .option('--timeout <seconds>', 'Limit for each ffmpeg/ffprobe call, 0 = none (default: env TCAP_TOOL_TIMEOUT)')
    .option('--ffmpeg <path>', 'ffmpeg binary (default: env FFMPEG_PATH, bundled, then PATH)')
    .option('--ffprobe <path>', 'ffprobe binary (default: env FFPROBE_PATH, bundled, then PATH)')
    .option('--verbose', 'Verbose logging')
    .option('--log-file <path>', 'Also write logs to this file (default: env TCAP_LOG_FILE)')
    .option('--info', 'Show install details and tool versions, then exit')
    .exitOverride()
    .action(async () => {
      const opts = program.opts<ProgramOptions>()
      const config = toConfig(opts)

      if (opts.info) {
        runInfo(version, config)
        return
      }
      if (!opts.pair && !opts.video) {
        program.outputHelp()
        return
      }

      const outcome = await processAppend(toAppendJob(opts), config)
      console.log(outcome.inplace
        ? `[tcap] Updated in place: ${outcome.destination}`
        : `[tcap] Done: ${outcome.destination}`)
    })

  return program
}

/** Print the one-line diagnostic for `err` and return the exit code. */
export function reportFailure(err: unknown): number {
  if (isToolExecutionError(err)) {
    const tail = err.stderrTail()
    if (tail) logger.error(`${err.tool} stderr:\n${tail}`)
  } else if (err instanceof Error && !(err instanceof TcapError) && err.stack) {
    // Not one of ours: keep the stack for --verbose runs
    logger.debug(err.stack)
  }
  const message = err instanceof Error ? err.message : String(err)
  console.error(`[tcap] ERROR: ${message}`)
  return 1
}

/** Run the CLI and resolve to the process exit code. */
export async function runCli(argv: string[] = process.argv): Promise<number> {
  loadEnvFile()
  const program = createProgram(readVersion())
  try {
    await program.parseAsync(argv)
    return 0
  } catch (err: unknown) {
    // commander has already printed its own message (or the help/version text)
    if (err instanceof CommanderError) return err.exitCode
    return reportFailure(err)
  }
}
