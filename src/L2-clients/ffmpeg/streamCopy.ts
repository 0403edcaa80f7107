import { createFFmpeg, runFFmpeg } from './ffmpeg.js'
import { formatSeconds } from './stillClip.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AppConfig } from '../../L1-infra/config/environment.js'

export interface CopyOptions {
  /** Force this mov track timescale on the video track */
  timescale?: number | null
  /** Move the moov atom to the front (mov/mp4 outputs) */
  faststart?: boolean
}

function muxerOptions(options: CopyOptions): string[] {
  return [
    ...(options.timescale ? ['-video_track_timescale', String(options.timescale)] : []),
    ...(options.faststart ? ['-movflags', '+faststart'] : []),
  ]
}

/** Copy the first video stream of `sourcePath` into its own file, bit for bit. */
export async function extractVideoStream(
  sourcePath: string,
  outputPath: string,
  config: AppConfig,
  options: CopyOptions = {},
): Promise<string> {
  logger.debug(`Extracting video stream: ${sourcePath} → ${outputPath}`)
  const command = createFFmpeg(config)
    .input(sourcePath)
    .outputOptions(['-map', '0:v:0', '-c', 'copy', ...muxerOptions(options)])
    .output(outputPath)
  await runFFmpeg(command, 'extract-video')
  return outputPath
}

/** Copy the first audio stream of `sourcePath` into its own file, bit for bit. */
export async function extractAudioStream(
  sourcePath: string,
  outputPath: string,
  config: AppConfig,
): Promise<string> {
  logger.debug(`Extracting audio stream: ${sourcePath} → ${outputPath}`)
  const command = createFFmpeg(config)
    .input(sourcePath)
    .outputOptions(['-map', '0:a:0', '-c', 'copy'])
    .output(outputPath)
  await runFFmpeg(command, 'extract-audio')
  return outputPath
}

/**
 * Join the files named in a concat list without re-encoding. Every listed
 * file must carry the same codec parameters.
 */
export async function concatCopy(
  listPath: string,
  outputPath: string,
  config: AppConfig,
  options: CopyOptions = {},
): Promise<string> {
  logger.debug(`Concatenating (stream copy) ${listPath} → ${outputPath}`)
  const command = createFFmpeg(config)
    .input(listPath)
    .inputOptions(['-f', 'concat', '-safe', '0'])
    .outputOptions(['-map', '0', '-c', 'copy', ...muxerOptions(options)])
    .output(outputPath)
  await runFFmpeg(command, 'concat-copy')
  return outputPath
}

export interface MuxOptions extends CopyOptions {
  /** Expected length of the joined video in seconds; 0 or absent when unknown */
  duration?: number
}

/**
 * Mux a video-only and an audio-only file together, copying both tracks.
 *
 * Encoder priming and padding in the joined audio can outrun the video, so the
 * output is cut at `duration`, or at the shorter stream when that is unknown.
 */
export async function muxStreams(
  videoPath: string,
  audioPath: string,
  outputPath: string,
  config: AppConfig,
  options: MuxOptions = {},
): Promise<string> {
  logger.debug(`Muxing ${videoPath} + ${audioPath} → ${outputPath}`)
  const bound = options.duration && options.duration > 0
    ? ['-t', formatSeconds(options.duration)]
    : ['-shortest']
  const command = createFFmpeg(config)
    .input(videoPath)
    .input(audioPath)
    .outputOptions(['-map', '0:v:0', '-map', '1:a:0', '-c', 'copy', ...bound, ...muxerOptions(options)])
    .output(outputPath)
  await runFFmpeg(command, 'mux')
  return outputPath
}
