import { createFFmpeg, runFFmpeg } from './ffmpeg.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AppConfig } from '../../L1-infra/config/environment.js'
import { resolveAudioEncoder, resolveVideoEncoder } from '../../L0-pure/encoders/encoders.js'
import { isMovFamily } from '../../L0-pure/containers/containers.js'
import { formatRational } from '../../L0-pure/rational/rational.js'
import type {
  AppendOptions,
  AudioProbe,
  ColorMetadata,
  ContainerExtension,
  StillAudioTarget,
  StillClipSpec,
  VideoInfo,
} from '../../types/index.js'

/** Number of frames the still occupies: `round(fps × duration)`, never less than 1. */
export function stillFrameCount(fps: number, duration: number): number {
  return Math.max(1, Math.round(fps * duration))
}

/** Seconds with microsecond precision, the way FFmpeg duration options take them. */
export function formatSeconds(seconds: number): string {
  return seconds.toFixed(6)
}

/**
 * Derive the encode parameters of the appended still from the probed source.
 *
 * @throws UnsupportedCodecError when no encoder reproduces the source codec
 */
export function buildStillClipSpec(
  video: VideoInfo,
  audio: AudioProbe,
  options: Pick<AppendOptions, 'duration' | 'crf' | 'audioBitrate'>,
  container: ContainerExtension,
): StillClipSpec {
  const frameCount = stillFrameCount(video.fps, options.duration)
  const encoder = resolveVideoEncoder({
    codecName: video.codecName,
    profile: video.profile,
    level: video.level,
    crf: options.crf,
    gopFrames: frameCount,
  })

  // A 1/N time base becomes the mov track timescale so both segments tick alike
  const timescale = isMovFamily(container) && video.timeBase?.num === 1 ? video.timeBase.den : null

  let audioTarget: StillAudioTarget | null = null
  if (audio.kind === 'present') {
    const { encoder: audioEncoder, bitrate } = resolveAudioEncoder(audio.audio.codecName, options.audioBitrate)
    audioTarget = {
      encoder: audioEncoder,
      sampleRate: audio.audio.sampleRate,
      channelLayout: audio.audio.channelLayout,
      ...(bitrate ? { bitrate } : {}),
    }
  }

  return {
    width: video.width,
    height: video.height,
    frameRate: video.frameRate,
    fps: video.fps,
    duration: options.duration,
    frameCount,
    pixelFormat: video.pixelFormat,
    sampleAspectRatio: video.sampleAspectRatio,
    encoder,
    color: video.color,
    timescale,
    container,
    audio: audioTarget,
  }
}

/** Exact length of the encoded still, which is a whole number of frames. */
export function stillClipSeconds(spec: Pick<StillClipSpec, 'frameCount' | 'frameRate'>): number {
  return (spec.frameCount * spec.frameRate.den) / spec.frameRate.num
}

function colorArgs(color: ColorMetadata): string[] {
  return [
    ...(color.primaries ? ['-color_primaries', color.primaries] : []),
    ...(color.transfer ? ['-color_trc', color.transfer] : []),
    ...(color.space ? ['-colorspace', color.space] : []),
    ...(color.range ? ['-color_range', color.range] : []),
  ]
}

/** Output options of the still's video encode, in command-line order. */
export function stillVideoOutputOptions(spec: StillClipSpec): string[] {
  const rate = formatRational(spec.frameRate)
  const filters = [
    `scale=${spec.width}:${spec.height}`,
    `setsar=${formatRational(spec.sampleAspectRatio)}`,
    `format=${spec.pixelFormat}`,
  ].join(',')

  return [
    '-vf', filters,
    '-r', rate,
    '-frames:v', String(spec.frameCount),
    '-an',
    '-c:v', spec.encoder.encoder,
    ...spec.encoder.codecArgs,
    '-pix_fmt', spec.pixelFormat,
    ...colorArgs(spec.color),
    ...(spec.timescale !== null ? ['-video_track_timescale', String(spec.timescale)] : []),
  ]
}

/** Encode `imagePath` as a video-only clip described by `spec`. */
export async function synthesizeStillVideo(
  imagePath: string,
  spec: StillClipSpec,
  outputPath: string,
  config: AppConfig,
): Promise<string> {
  logger.info(
    `Encoding ${spec.frameCount}-frame still (${spec.encoder.encoder}, ${spec.width}x${spec.height}, ` +
    `${formatRational(spec.frameRate)} fps${spec.timescale !== null ? `, timescale ${spec.timescale}` : ''})`,
  )

  const command = createFFmpeg(config)
    .input(imagePath)
    .inputOptions(['-loop', '1', '-framerate', formatRational(spec.frameRate)])
    .outputOptions(stillVideoOutputOptions(spec))
    .output(outputPath)

  await runFFmpeg(command, 'still-video')
  return outputPath
}

/**
 * Encode silence in the source's audio codec, sample rate and layout,
 * exactly as long as the still video.
 */
export async function synthesizeSilentAudio(
  spec: StillClipSpec,
  outputPath: string,
  config: AppConfig,
): Promise<string> {
  if (!spec.audio) {
    throw new Error('Silent audio requested for a still without an audio target')
  }
  const { encoder, sampleRate, channelLayout, bitrate } = spec.audio
  logger.info(`Encoding ${formatSeconds(stillClipSeconds(spec))}s of silence (${encoder}, ${sampleRate} Hz, ${channelLayout})`)

  const command = createFFmpeg(config)
    .input(`anullsrc=r=${sampleRate}:cl=${channelLayout}`)
    .inputOptions(['-f', 'lavfi'])
    .outputOptions([
      '-t', formatSeconds(stillClipSeconds(spec)),
      '-vn',
      '-c:a', encoder,
      ...(bitrate ? ['-b:a', bitrate] : []),
      '-ar', String(sampleRate),
    ])
    .output(outputPath)

  await runFFmpeg(command, 'still-audio')
  return outputPath
}
