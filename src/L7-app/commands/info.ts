import { spawnCommand } from '../../L1-infra/process/process.js'
import { projectRoot, resolve } from '../../L1-infra/paths/paths.js'
import type { AppConfig } from '../../L1-infra/config/environment.js'
import { resolveFFmpegPath, resolveFFprobePath } from '../../L2-clients/ffmpeg/ffmpeg.js'
import type { ResolvedBinary } from '../../L2-clients/ffmpeg/ffmpeg.js'

export function parseVersionFromOutput(output: string): string {
  const match = output.match(/version\s+n?(\d+\.\d+(?:\.\d+)?)/) ?? output.match(/(\d+\.\d+(?:\.\d+)?)/)
  return match ? match[1] : 'unknown'
}

/** `<path> (<source>, <version>)`, or `not found` when the binary does not run. */
export function describeBinary(binary: ResolvedBinary): string {
  const result = spawnCommand(binary.path, ['-version'], { timeout: 10_000 })
  if (result.error || result.status !== 0) {
    return `${binary.path} (${binary.source}, not found)`
  }
  return `${binary.path} (${binary.source}, ${parseVersionFromOutput(result.stdout)})`
}

/** Lines printed by `--info`: version, install location and external tools. */
export function collectInfo(version: string, config: AppConfig): string[] {
  const entry = process.argv[1] ? resolve(process.argv[1]) : 'unknown'
  return [
    `[tcap] Version: ${version}`,
    `[tcap] Entry point: ${entry}`,
    `[tcap] Install dir: ${projectRoot()}`,
    `[tcap] Node.js: ${process.version}`,
    `[tcap] ffmpeg: ${describeBinary(resolveFFmpegPath(config))}`,
    `[tcap] ffprobe: ${describeBinary(resolveFFprobePath(config))}`,
  ]
}

export function runInfo(version: string, config: AppConfig): void {
  for (const line of collectInfo(version, config)) {
    console.log(line)
  }
}
