import {
  promises as fsp,
  existsSync,
  readFileSync,
  rmSync,
} from 'fs'
import type { Stats } from 'fs'
import { randomBytes } from 'crypto'
import tmp from 'tmp'
import { join, dirname, parse, resolve } from '../paths/paths.js'

// Enable graceful cleanup of all tmp resources on process exit
tmp.setGracefulCleanup()

export type { Stats }

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

// ── Reads ──────────────────────────────────────────────────────

/** Sync read of a UTF-8 text file. Throws "File not found: <path>" on ENOENT. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Check if file/dir exists (async, using stat). */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.stat(filePath)
    return true
  } catch {
    return false
  }
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

/** Get file stats. Throws "File not found: <path>" on ENOENT. */
export async function getFileStats(filePath: string): Promise<Stats> {
  try {
    return await fsp.stat(filePath)
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

// ── Writes ─────────────────────────────────────────────────────

/** Write a UTF-8 text file. Creates parent dirs. */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, content, { encoding: 'utf-8', mode: 0o600 })
}

/** Remove file (ignores ENOENT). */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fsp.unlink(filePath)
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) return
    throw err
  }
}

/** Remove directory. */
export async function removeDirectory(
  dirPath: string,
  opts?: { recursive?: boolean; force?: boolean },
): Promise<void> {
  try {
    await fsp.rm(dirPath, { recursive: opts?.recursive ?? false, force: opts?.force ?? false })
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) return
    throw err
  }
}

/**
 * Rename `src` over `dest` in a single step. Both must be on the same
 * filesystem: EXDEV is reported, never turned into copy+delete.
 */
export async function replaceFile(src: string, dest: string): Promise<void> {
  try {
    await fsp.rename(src, dest)
  } catch (err: unknown) {
    if (hasErrorCode(err, 'EXDEV')) {
      throw new Error(`Cannot atomically replace ${dest}: ${src} is on a different filesystem`)
    }
    throw err
  }
}

// ── Temp Dir ───────────────────────────────────────────────────

/** Create a temporary directory with the given prefix. Caller is responsible for cleanup. */
export async function makeTempDir(prefix: string): Promise<string> {
  return new Promise((resolvePath, reject) => {
    // unsafeCleanup lets the exit hook remove the directory even when it still holds files
    tmp.dir({ prefix, mode: 0o700, unsafeCleanup: true }, (err, path) => {
      if (err) reject(err)
      else resolvePath(path)
    })
  })
}

/** Run fn inside a temp directory, auto-cleanup on completion or error. */
export async function withTempDir<T>(prefix: string, fn: (tempDir: string) => Promise<T>): Promise<T> {
  const tempDir = await makeTempDir(prefix)
  try {
    return await fn(tempDir)
  } finally {
    await removeDirectory(tempDir, { recursive: true, force: true })
  }
}

// ── Sibling staging files ──────────────────────────────────────
// tmp only creates files under the OS temp dir, so files that must sit next
// to their target are created and tracked here.

const pendingSiblings = new Set<string>()

process.once('exit', () => {
  for (const filePath of pendingSiblings) {
    try {
      rmSync(filePath, { force: true })
    } catch (err: unknown) {
      // the logger may already be closed during exit
      process.stderr.write(`Could not remove ${filePath}: ${err instanceof Error ? err.message : String(err)}\n`)
    }
  }
})

/**
 * Create an empty file `<stem>_tmp_<random><ext>` in the same directory as
 * `targetPath`. The file is removed on process exit unless released first.
 */
export async function createSiblingTempFile(targetPath: string): Promise<string> {
  const { dir, name, ext } = parse(resolve(targetPath))
  const filePath = join(dir, `${name}_tmp_${randomBytes(6).toString('hex')}${ext}`)
  const handle = await fsp.open(filePath, 'wx', 0o644)
  await handle.close()
  pendingSiblings.add(filePath)
  return filePath
}

/** Stop tracking a sibling temp file (after it was renamed or removed). */
export function releaseSiblingTempFile(filePath: string): void {
  pendingSiblings.delete(filePath)
}
