import { createFFmpeg, runFFmpeg } from './ffmpeg.js'
import { formatSeconds, stillClipSeconds, stillFrameCount } from './stillClip.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AppConfig } from '../../L1-infra/config/environment.js'
import { formatRational } from '../../L0-pure/rational/rational.js'
import { isMovFamily } from '../../L0-pure/containers/containers.js'
import type { AppendOptions, AudioProbe, ContainerExtension, VideoInfo } from '../../types/index.js'

export interface ReencodePlan {
  /** Length of the appended still in seconds (whole frames) */
  stillSeconds: number
  filterGraph: string
  outputOptions: string[]
}

/**
 * Build the single filter graph that decodes source and image, conforms the
 * still to the source geometry and frame rate, concatenates at frame level
 * and re-encodes everything with libx264 + AAC.
 */
export function buildReencodePlan(
  video: VideoInfo,
  audio: AudioProbe,
  options: Pick<AppendOptions, 'duration' | 'crf' | 'audioBitrate'>,
  container: ContainerExtension,
): ReencodePlan {
  const stillSeconds = stillClipSeconds({
    frameCount: stillFrameCount(video.fps, options.duration),
    frameRate: video.frameRate,
  })
  const sar = formatRational(video.sampleAspectRatio)
  const still = formatSeconds(stillSeconds)

  const chains = [
    `[0:v]format=yuv420p,setsar=${sar},setpts=PTS-STARTPTS[v0]`,
    `[1:v]scale=${video.width}:${video.height},setsar=${sar},fps=${formatRational(video.frameRate)},` +
      `format=yuv420p,trim=duration=${still},setpts=PTS-STARTPTS[v1]`,
  ]

  if (audio.kind === 'present') {
    const { sampleRate, channelLayout } = audio.audio
    const format = `aresample=${sampleRate},aformat=channel_layouts=${channelLayout}`
    // apad without an upper bound never ends, so only pad when the length is known
    const fit = video.duration > 0 ? `,apad,atrim=duration=${formatSeconds(video.duration)}` : ''
    chains.push(
      `[0:a]${format}${fit},asetpts=PTS-STARTPTS[a0]`,
      `anullsrc=r=${sampleRate}:cl=${channelLayout},atrim=duration=${still},asetpts=PTS-STARTPTS[a1]`,
      '[v0][a0][v1][a1]concat=n=2:v=1:a=1[v][a]',
    )
  } else {
    chains.push('[v0][v1]concat=n=2:v=1:a=0[v]')
  }

  const outputOptions = [
    '-filter_complex', chains.join(';'),
    '-map', '[v]',
    ...(audio.kind === 'present' ? ['-map', '[a]'] : []),
    '-c:v', 'libx264',
    '-pix_fmt', 'yuv420p',
    '-profile:v', 'high',
    '-level', '4.1',
    '-crf', String(options.crf),
    '-preset', 'medium',
    ...(audio.kind === 'present' ? ['-c:a', 'aac', '-b:a', options.audioBitrate] : []),
    ...(isMovFamily(container) ? ['-movflags', '+faststart'] : []),
  ]

  return { stillSeconds, filterGraph: chains.join(';'), outputOptions }
}

/** Re-encode `videoPath` with `imagePath` appended into `outputPath`. */
export async function reencodeWithStill(
  videoPath: string,
  imagePath: string,
  outputPath: string,
  plan: ReencodePlan,
  config: AppConfig,
): Promise<string> {
  logger.info(`Re-encoding source with ${formatSeconds(plan.stillSeconds)}s still (libx264)`)
  const command = createFFmpeg(config)
    .input(videoPath)
    .input(imagePath)
    .inputOptions(['-loop', '1', '-t', formatSeconds(plan.stillSeconds)])
    .outputOptions(plan.outputOptions)
    .output(outputPath)
  await runFFmpeg(command, 'reencode')
  return outputPath
}
