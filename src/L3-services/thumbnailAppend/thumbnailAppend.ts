import { probeSource } from '../../L2-clients/ffmpeg/probe.js'
import { buildStillClipSpec, stillClipSeconds, synthesizeSilentAudio, synthesizeStillVideo } from '../../L2-clients/ffmpeg/stillClip.js'
import { concatCopy, extractAudioStream, extractVideoStream, muxStreams } from '../../L2-clients/ffmpeg/streamCopy.js'
import { buildReencodePlan, reencodeWithStill } from '../../L2-clients/ffmpeg/reencode.js'
import { withTempDir, writeTextFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AppConfig } from '../../L1-infra/config/environment.js'
import { decideCompatibility } from '../../L0-pure/compatibility/compatibility.js'
import { buildConcatList } from '../../L0-pure/concatList/concatList.js'
import { containerOf, isMovFamily } from '../../L0-pure/containers/containers.js'
import { UnsupportedCodecError, ValidationError } from '../../L0-pure/errors/errors.js'
import type {
  AppendRequest,
  AppendResult,
  AppendRoute,
  AppendStrategy,
  AudioProbe,
  CompatibilityDecision,
  ContainerExtension,
  VideoInfo,
} from '../../types/index.js'

/**
 * Pick the route for a run. `copy` turns a blocked gate into an error;
 * nothing ever switches route after a failure.
 */
export function chooseRoute(strategy: AppendStrategy, decision: CompatibilityDecision): AppendRoute {
  if (strategy === 'reencode') return 'reencode'
  if (decision.fastPath) return 'stream-copy'
  if (strategy === 'copy') {
    throw new UnsupportedCodecError(decision.blocker.codec, decision.blocker.stream, decision.reason)
  }
  return 'reencode'
}

/**
 * Stream-copy route: the source bitstreams are copied untouched and only the
 * still (plus matching silence) is encoded.
 */
export async function appendByStreamCopy(
  request: AppendRequest,
  video: VideoInfo,
  audio: AudioProbe,
  container: ContainerExtension,
  config: AppConfig,
): Promise<void> {
  const spec = buildStillClipSpec(video, audio, request, container)
  const copyOptions = { timescale: spec.timescale }
  const faststart = isMovFamily(container)

  await withTempDir('tcap-', async (workDir) => {
    const stillVideo = await synthesizeStillVideo(request.imagePath, spec, join(workDir, `still_video${container}`), config)
    const sourceVideo = await extractVideoStream(request.videoPath, join(workDir, `source_video${container}`), config, copyOptions)

    const videoList = join(workDir, 'video_concat.txt')
    await writeTextFile(videoList, buildConcatList([sourceVideo, stillVideo]))

    if (audio.kind === 'absent') {
      await concatCopy(videoList, request.outputPath, config, { ...copyOptions, faststart })
      return
    }

    const joinedVideo = await concatCopy(videoList, join(workDir, `joined_video${container}`), config, copyOptions)

    const sourceAudio = await extractAudioStream(request.videoPath, join(workDir, `source_audio${container}`), config)
    const stillAudio = await synthesizeSilentAudio(spec, join(workDir, `still_audio${container}`), config)
    const audioList = join(workDir, 'audio_concat.txt')
    await writeTextFile(audioList, buildConcatList([sourceAudio, stillAudio]))
    const joinedAudio = await concatCopy(audioList, join(workDir, `joined_audio${container}`), config)

    await muxStreams(joinedVideo, joinedAudio, request.outputPath, config, {
      ...copyOptions,
      faststart,
      duration: video.duration > 0 ? video.duration + stillClipSeconds(spec) : 0,
    })
  })
}

/** Fallback route: decode source and still, re-encode them as one stream. */
export async function appendByReencode(
  request: AppendRequest,
  video: VideoInfo,
  audio: AudioProbe,
  container: ContainerExtension,
  config: AppConfig,
): Promise<void> {
  const plan = buildReencodePlan(video, audio, request, container)
  await reencodeWithStill(request.videoPath, request.imagePath, request.outputPath, plan, config)
}

/**
 * Append the still to the source: probe, decide, then run exactly one route
 * into `request.outputPath`.
 */
export async function appendThumbnail(request: AppendRequest, config: AppConfig): Promise<AppendResult> {
  const container = containerOf(request.outputPath)
  if (!container) {
    throw new ValidationError(`Unsupported output container: ${request.outputPath}`)
  }

  const { video, audio } = await probeSource(request.videoPath, config)
  const decision = decideCompatibility(video, audio, container)
  const route = chooseRoute(request.strategy, decision)

  if (route === 'stream-copy') {
    logger.info(`Stream-copy append: ${decision.reason}`)
    await appendByStreamCopy(request, video, audio, container, config)
  } else {
    logger.info(
      request.strategy === 'reencode'
        ? 'Re-encode requested'
        : `Falling back to re-encode: ${decision.reason}`,
    )
    await appendByReencode(request, video, audio, container, config)
  }

  return { outputPath: request.outputPath, route, decision, video }
}
