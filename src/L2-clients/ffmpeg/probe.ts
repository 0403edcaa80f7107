import { runFFprobe } from './ffmpeg.js'
import { fileExists } from '../../L1-infra/fileSystem/fileSystem.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import type { AppConfig } from '../../L1-infra/config/environment.js'
import { ProbeError } from '../../L0-pure/errors/errors.js'
import { normalizeFrameRate, normalizeSampleAspectRatio, parseTimeBase } from '../../L0-pure/rational/rational.js'
import type { AudioProbe, ColorMetadata, DurationSource, SourceProbe, VideoInfo } from '../../types/index.js'

const VIDEO_FIELDS = [
  'codec_name', 'profile', 'level', 'width', 'height', 'pix_fmt', 'sample_aspect_ratio',
  'avg_frame_rate', 'time_base', 'duration', 'nb_frames',
  'color_primaries', 'color_transfer', 'color_space', 'color_range',
].join(',')

const AUDIO_FIELDS = 'codec_name,profile,sample_rate,channels,channel_layout'

const DEFAULT_PIXEL_FORMAT = 'yuv420p'
const DEFAULT_SAMPLE_RATE = 48000

// ── JSON field extraction ──────────────────────────────────────

type JsonObject = Record<string, unknown>

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Non-empty string field; ffprobe's `unknown` counts as absent. */
function readString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key]
  if (typeof value !== 'string') return undefined
  const text = value.trim()
  return text && text !== 'unknown' ? text : undefined
}

/** Numeric field; ffprobe prints some numbers (duration, nb_frames) as strings. */
function readNumber(obj: JsonObject, key: string): number | undefined {
  const value = obj[key]
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

function parseJson(stdout: string, videoPath: string): JsonObject {
  let parsed: unknown
  try {
    parsed = JSON.parse(stdout || '{}')
  } catch (err: unknown) {
    throw new ProbeError(`Malformed ffprobe output for ${videoPath}`, videoPath, { cause: err })
  }
  if (!isJsonObject(parsed)) {
    throw new ProbeError(`Malformed ffprobe output for ${videoPath}`, videoPath)
  }
  return parsed
}

/** First entry of the `streams` array, or undefined when there is none. */
function firstStream(data: JsonObject): JsonObject | undefined {
  const streams = data.streams
  if (!Array.isArray(streams) || streams.length === 0) return undefined
  const [first]: unknown[] = streams
  return isJsonObject(first) ? first : undefined
}

function requireDimension(stream: JsonObject, key: 'width' | 'height', videoPath: string): number {
  const value = readNumber(stream, key)
  if (value === undefined || !Number.isInteger(value) || value <= 0) {
    throw new ProbeError(`Invalid ${key} in ${videoPath}: ${String(stream[key])}`, videoPath)
  }
  return value
}

// ── Duration ───────────────────────────────────────────────────

/** Container-level duration, queried only when the stream does not report one. */
async function probeContainerDuration(videoPath: string, config: AppConfig): Promise<number | undefined> {
  try {
    const { stdout } = await runFFprobe(config, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'json',
      videoPath,
    ])
    const data = parseJson(stdout, videoPath)
    return isJsonObject(data.format) ? readNumber(data.format, 'duration') : undefined
  } catch (err: unknown) {
    logger.warn(`Container duration query failed for ${sanitizeForLog(videoPath)}: ${err instanceof Error ? err.message : String(err)}`)
    return undefined
  }
}

async function resolveDuration(
  stream: JsonObject,
  fps: number,
  videoPath: string,
  config: AppConfig,
): Promise<{ duration: number; durationSource: DurationSource }> {
  const streamDuration = readNumber(stream, 'duration')
  if (streamDuration !== undefined && streamDuration > 0) {
    return { duration: streamDuration, durationSource: 'stream' }
  }

  const containerDuration = await probeContainerDuration(videoPath, config)
  if (containerDuration !== undefined && containerDuration > 0) {
    return { duration: containerDuration, durationSource: 'container' }
  }

  const frames = readNumber(stream, 'nb_frames')
  if (frames !== undefined && frames > 0) {
    return { duration: frames / fps, durationSource: 'frame-count' }
  }

  logger.warn(`No duration reported for ${sanitizeForLog(videoPath)}; using 0`)
  return { duration: 0, durationSource: 'unknown' }
}

// ── Public API ─────────────────────────────────────────────────

export type VideoStreamInfo = Omit<VideoInfo, 'hasAudio'>

/**
 * Probe the first video stream of `videoPath`.
 *
 * @throws ProbeError when the file is missing, has no video stream or ffprobe output is unusable
 * @throws ToolExecutionError when ffprobe exits non-zero
 */
export async function probeVideoStream(videoPath: string, config: AppConfig): Promise<VideoStreamInfo> {
  if (!(await fileExists(videoPath))) {
    throw new ProbeError(`Input video not found: ${videoPath}`, videoPath)
  }

  const { stdout } = await runFFprobe(config, [
    '-v', 'error',
    '-select_streams', 'v:0',
    '-show_entries', `stream=${VIDEO_FIELDS}`,
    '-of', 'json',
    videoPath,
  ])

  const stream = firstStream(parseJson(stdout, videoPath))
  if (!stream) {
    throw new ProbeError(`No video stream found in ${videoPath}`, videoPath)
  }

  const width = requireDimension(stream, 'width', videoPath)
  const height = requireDimension(stream, 'height', videoPath)

  const rawRate = readString(stream, 'avg_frame_rate')
  const { frameRate, fps, fallback } = normalizeFrameRate(rawRate)
  if (fallback) {
    logger.warn(`Unusable frame rate "${rawRate ?? 'missing'}" in ${sanitizeForLog(videoPath)}; assuming 30 fps`)
  }

  const { duration, durationSource } = await resolveDuration(stream, fps, videoPath, config)

  const level = readNumber(stream, 'level')
  const profile = readString(stream, 'profile')
  const color: ColorMetadata = {}
  const primaries = readString(stream, 'color_primaries')
  const transfer = readString(stream, 'color_transfer')
  const space = readString(stream, 'color_space')
  const range = readString(stream, 'color_range')
  if (primaries) color.primaries = primaries
  if (transfer) color.transfer = transfer
  if (space) color.space = space
  if (range) color.range = range

  return {
    width,
    height,
    frameRate,
    fps,
    duration,
    durationSource,
    codecName: readString(stream, 'codec_name') ?? 'unknown',
    ...(profile ? { profile } : {}),
    // ffprobe prints -99 for an unknown level
    ...(level !== undefined && level > 0 ? { level } : {}),
    pixelFormat: readString(stream, 'pix_fmt') ?? DEFAULT_PIXEL_FORMAT,
    sampleAspectRatio: normalizeSampleAspectRatio(readString(stream, 'sample_aspect_ratio')),
    timeBase: parseTimeBase(readString(stream, 'time_base')),
    color,
  }
}

/** Layout name for a channel count when ffprobe leaves `channel_layout` empty. */
export function layoutForChannels(channels: number): string {
  if (channels === 1) return 'mono'
  if (channels === 2) return 'stereo'
  return `${channels}c`
}

/**
 * Probe the first audio stream. Never throws: a failed query or a file
 * without audio both come back as `{ kind: 'absent' }`.
 */
export async function probeAudioStream(videoPath: string, config: AppConfig): Promise<AudioProbe> {
  let stream: JsonObject | undefined
  try {
    const { stdout } = await runFFprobe(config, [
      '-v', 'error',
      '-select_streams', 'a:0',
      '-show_entries', `stream=${AUDIO_FIELDS}`,
      '-of', 'json',
      videoPath,
    ])
    stream = firstStream(parseJson(stdout, videoPath))
  } catch (err: unknown) {
    const reason = `audio probe failed: ${err instanceof Error ? err.message : String(err)}`
    logger.warn(`${reason}; treating ${sanitizeForLog(videoPath)} as silent`)
    return { kind: 'absent', reason }
  }

  if (!stream) return { kind: 'absent', reason: 'no audio stream' }

  const channels = readNumber(stream, 'channels') ?? 2
  const profile = readString(stream, 'profile')
  return {
    kind: 'present',
    audio: {
      codecName: readString(stream, 'codec_name') ?? 'unknown',
      ...(profile ? { profile } : {}),
      sampleRate: readNumber(stream, 'sample_rate') ?? DEFAULT_SAMPLE_RATE,
      channels,
      channelLayout: readString(stream, 'channel_layout') ?? layoutForChannels(channels),
    },
  }
}

/** Probe video then audio. The returned snapshot is frozen. */
export async function probeSource(videoPath: string, config: AppConfig): Promise<SourceProbe> {
  const stream = await probeVideoStream(videoPath, config)
  const audio = await probeAudioStream(videoPath, config)
  const video: VideoInfo = Object.freeze({ ...stream, hasAudio: audio.kind === 'present' })

  logger.info(
    `Probed ${sanitizeForLog(videoPath)}: ${video.codecName} ${video.width}x${video.height} @ ${video.fps.toFixed(3)} fps, ` +
    `${video.duration.toFixed(3)}s (${video.durationSource}), ` +
    (audio.kind === 'present' ? `${audio.audio.codecName} ${audio.audio.sampleRate} Hz ${audio.audio.channelLayout}` : 'no audio'),
  )
  return { video, audio }
}
