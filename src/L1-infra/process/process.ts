import { execFile as nodeExecFile, spawnSync as nodeSpawnSync } from 'child_process'
import type { ExecFileOptions, SpawnSyncReturns, SpawnSyncOptionsWithStringEncoding } from 'child_process'
import { createRequire } from 'module'

export type { ExecFileOptions }

export interface ExecResult {
  stdout: string
  stderr: string
}

/** Rejection of {@link execCommand}: the execFile error plus captured output. */
export interface ExecError extends Error {
  code?: number | string | null
  killed?: boolean
  signal?: NodeJS.Signals | null
  stdout: string
  stderr: string
}

export function isExecError(err: unknown): err is ExecError {
  return err instanceof Error && 'stdout' in err && 'stderr' in err
}

/**
 * Execute a command asynchronously via execFile.
 * Returns promise of { stdout, stderr }.
 */
export function execCommand(
  cmd: string,
  args: string[],
  opts: ExecFileOptions = {},
): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    nodeExecFile(cmd, args, { ...opts, encoding: 'utf-8' }, (error, stdout, stderr) => {
      if (error) {
        reject(Object.assign(error, { stdout, stderr }))
      } else {
        resolve({ stdout, stderr })
      }
    })
  })
}

/**
 * Spawn a command synchronously. Returns full result including status.
 */
export function spawnCommand(
  cmd: string,
  args: string[],
  opts?: Omit<SpawnSyncOptionsWithStringEncoding, 'encoding'>,
): SpawnSyncReturns<string> {
  return nodeSpawnSync(cmd, args, { ...opts, encoding: 'utf-8' })
}

/**
 * Create a require function for ESM modules to use CommonJS require().
 * Usage: const require = createModuleRequire(import.meta.url)
 */
export function createModuleRequire(metaUrl: string): NodeRequire {
  return createRequire(metaUrl)
}
