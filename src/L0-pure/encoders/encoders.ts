import { UnsupportedCodecError } from '../errors/errors.js'
import type { EncoderSettings } from '../../types/index.js'

// ── Video ────────────────────────────────────────────────────────────────────

interface VideoEncoderProfile {
  encoder: string
  interFrame: boolean
  /** Source profile name (as ffprobe prints it, lowercased) → encoder profile */
  profiles: Record<string, string>
  /** ffprobe's numeric level → encoder level string */
  level: (level: number) => string | undefined
  quality: (crf: number) => string[]
  /** Codec-specific options for a closed GOP of `frames`, plus the level */
  gop: (frames: number, level: string | undefined) => string[]
}

/** H.264 levels are reported ×10 (41 → 4.1); 9 is level 1b and is not passed through. */
function h264Level(level: number): string | undefined {
  if (!Number.isInteger(level) || level < 10 || level > 62) return undefined
  return `${Math.floor(level / 10)}.${level % 10}`
}

/** HEVC levels are reported ×30 (123 → 4.1). */
function hevcLevel(level: number): string | undefined {
  if (!Number.isInteger(level) || level < 30 || level > 186) return undefined
  return (level / 30).toFixed(1)
}

/**
 * Source codec → encoder able to produce a still that stream-copy
 * concatenates onto it. Keys are ffprobe `codec_name` values.
 */
const VIDEO_ENCODERS: Record<string, VideoEncoderProfile> = {
  h264: {
    encoder: 'libx264',
    interFrame: true,
    profiles: {
      'baseline': 'baseline',
      'constrained baseline': 'baseline',
      'main': 'main',
      'high': 'high',
      'high 10': 'high10',
      'high 4:2:2': 'high422',
      'high 4:4:4 predictive': 'high444',
    },
    level: h264Level,
    quality: (crf) => ['-crf', String(crf), '-preset', 'medium'],
    gop: (frames, level) => [
      '-g', String(frames),
      '-keyint_min', String(frames),
      '-sc_threshold', '0',
      ...(level ? ['-level:v', level] : []),
    ],
  },
  hevc: {
    encoder: 'libx265',
    interFrame: true,
    profiles: {
      'main': 'main',
      'main 10': 'main10',
    },
    level: hevcLevel,
    quality: (crf) => ['-crf', String(crf), '-preset', 'medium'],
    gop: (frames, level) => [
      '-x265-params',
      [`keyint=${frames}`, `min-keyint=${frames}`, 'scenecut=0', ...(level ? [`level-idc=${level}`] : [])].join(':'),
    ],
  },
  prores: {
    encoder: 'prores_ks',
    interFrame: false,
    profiles: {
      'proxy': '0',
      'lt': '1',
      'standard': '2',
      'hq': '3',
      '4444': '4',
      '4444 xq': '5',
    },
    level: () => undefined,
    quality: () => [],
    gop: () => [],
  },
}

/** Video codecs the still synthesizer can reproduce, i.e. the fast-path allow-list. */
export const FAST_PATH_VIDEO_CODECS: readonly string[] = Object.keys(VIDEO_ENCODERS)

export interface VideoEncoderRequest {
  codecName: string
  profile?: string
  level?: number
  crf: number
  /** GOP length for inter-frame encoders */
  gopFrames: number
}

/**
 * Resolve the encoder for a still that must match `codecName`.
 * An unknown codec is a hard error: a guessed encoder would break the
 * stream-copy concatenation without any visible failure.
 */
export function resolveVideoEncoder(request: VideoEncoderRequest): EncoderSettings {
  const entry = Object.hasOwn(VIDEO_ENCODERS, request.codecName) ? VIDEO_ENCODERS[request.codecName] : undefined
  if (!entry) {
    throw new UnsupportedCodecError(request.codecName, 'video', `supported: ${FAST_PATH_VIDEO_CODECS.join(', ')}`)
  }

  const profile = request.profile ? entry.profiles[request.profile.trim().toLowerCase()] : undefined
  const level = request.level !== undefined ? entry.level(request.level) : undefined

  const codecArgs = [
    ...entry.quality(request.crf),
    ...(profile ? ['-profile:v', profile] : []),
    ...(entry.interFrame ? entry.gop(request.gopFrames, level) : []),
  ]

  return {
    encoder: entry.encoder,
    interFrame: entry.interFrame,
    codecArgs,
    ...(profile ? { profile } : {}),
    ...(level ? { level } : {}),
  }
}

// ── Audio ────────────────────────────────────────────────────────────────────

interface AudioEncoderProfile {
  encoder: string
  lossy: boolean
  pcm: boolean
}

const AUDIO_ENCODERS: Record<string, AudioEncoderProfile> = {
  aac: { encoder: 'aac', lossy: true, pcm: false },
  pcm_s16le: { encoder: 'pcm_s16le', lossy: false, pcm: true },
  pcm_s24le: { encoder: 'pcm_s24le', lossy: false, pcm: true },
}

/** Audio codecs whose silent filler can be encoded to concatenate by stream copy. */
export const FAST_PATH_AUDIO_CODECS: readonly string[] = Object.keys(AUDIO_ENCODERS)

export function isPcmCodec(codecName: string): boolean {
  return Object.hasOwn(AUDIO_ENCODERS, codecName) && AUDIO_ENCODERS[codecName].pcm
}

export function resolveAudioEncoder(codecName: string, bitrate: string): { encoder: string; bitrate?: string } {
  const entry = Object.hasOwn(AUDIO_ENCODERS, codecName) ? AUDIO_ENCODERS[codecName] : undefined
  if (!entry) {
    throw new UnsupportedCodecError(codecName, 'audio', `supported: ${FAST_PATH_AUDIO_CODECS.join(', ')}`)
  }
  return entry.lossy ? { encoder: entry.encoder, bitrate } : { encoder: entry.encoder }
}
