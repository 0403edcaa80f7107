import type { Rational } from '../../types/index.js'

export const DEFAULT_FRAME_RATE: Rational = { num: 30, den: 1 }
export const MIN_PLAUSIBLE_FPS = 1.0
export const MAX_PLAUSIBLE_FPS = 360.0

/**
 * Parse an ffprobe rational such as `30000/1001`, `16:9` or a bare `25`.
 * Returns null for anything that is not two finite integers with a non-zero
 * denominator, so `0/0` is unparsable rather than a division by zero.
 */
export function parseRational(raw: string | undefined | null, separator: '/' | ':' = '/'): Rational | null {
  if (raw === undefined || raw === null) return null
  const text = raw.trim()
  if (!text) return null

  const parts = text.split(separator)
  if (parts.length > 2) return null
  const num = Number(parts[0])
  const den = parts.length === 2 ? Number(parts[1]) : 1
  if (!Number.isInteger(num) || !Number.isInteger(den) || den === 0) return null
  return { num, den }
}

export function rationalToFloat(value: Rational): number {
  return value.num / value.den
}

export function formatRational(value: Rational, separator: '/' | ':' = '/'): string {
  return `${value.num}${separator}${value.den}`
}

export interface NormalizedFrameRate {
  frameRate: Rational
  fps: number
  /** True when the raw value was unusable and 30/1 was substituted */
  fallback: boolean
}

/**
 * Normalize a probed frame rate. Missing, unparsable, non-positive or
 * implausible values (outside [1, 360] fps) become 30/1.
 */
export function normalizeFrameRate(raw: string | undefined | null): NormalizedFrameRate {
  const parsed = parseRational(raw)
  if (parsed) {
    const fps = rationalToFloat(parsed)
    if (Number.isFinite(fps) && fps >= MIN_PLAUSIBLE_FPS && fps <= MAX_PLAUSIBLE_FPS) {
      return { frameRate: parsed, fps, fallback: false }
    }
  }
  return { frameRate: DEFAULT_FRAME_RATE, fps: rationalToFloat(DEFAULT_FRAME_RATE), fallback: true }
}

/**
 * Parse a sample aspect ratio (`1:1`, `4:3`). ffprobe reports `0:1` when the
 * ratio is unknown; that and any other unusable value map to square pixels.
 */
export function normalizeSampleAspectRatio(raw: string | undefined | null): Rational {
  const parsed = parseRational(raw, ':')
  if (!parsed || parsed.num <= 0 || parsed.den <= 0) return { num: 1, den: 1 }
  return parsed
}

/** Time bases are only trusted when both terms are positive. */
export function parseTimeBase(raw: string | undefined | null): Rational | null {
  const parsed = parseRational(raw)
  if (!parsed || parsed.num <= 0 || parsed.den <= 0) return null
  return parsed
}
