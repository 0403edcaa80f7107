/**
 * Quote a path for FFmpeg's concat demuxer: wrap it in single quotes and turn
 * every embedded `'` into `'\''` (close quote, escaped quote, reopen).
 */
export function quoteConcatPath(filePath: string): string {
  return `'${filePath.replace(/'/g, "'\\''")}'`
}

/** Render a concat list file: one `file '<path>'` line per input, in order. */
export function buildConcatList(paths: readonly string[]): string {
  if (paths.length === 0) {
    throw new Error('Concat list needs at least one input')
  }
  return paths.map((p) => `file ${quoteConcatPath(p)}`).join('\n') + '\n'
}
