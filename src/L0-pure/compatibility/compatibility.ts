import { FAST_PATH_AUDIO_CODECS, FAST_PATH_VIDEO_CODECS, isPcmCodec } from '../encoders/encoders.js'
import { carriesPcmAudio, carriesProres } from '../containers/containers.js'
import type { AudioProbe, CompatibilityDecision, ContainerExtension, VideoInfo } from '../../types/index.js'

const AAC_FILLER_PROFILE = 'LC'

function freezeDecision(decision: CompatibilityDecision): CompatibilityDecision {
  if (!decision.fastPath) Object.freeze(decision.blocker)
  return Object.freeze(decision)
}

/**
 * Decide whether the source can take the stream-copy route.
 *
 * Explicit allow-list only: the video codec must be one the still synthesizer
 * reproduces, and the audio (if any) must be a codec whose silent filler can be
 * encoded to match (AAC only in its LC profile). PCM audio and ProRes video are refused for MP4-family
 * outputs, which cannot hold them.
 */
export function decideCompatibility(
  video: VideoInfo,
  audio: AudioProbe,
  container: ContainerExtension,
): CompatibilityDecision {
  if (!FAST_PATH_VIDEO_CODECS.includes(video.codecName)) {
    return freezeDecision({
      fastPath: false,
      reason: `video codec ${video.codecName} is not in the stream-copy allow-list (${FAST_PATH_VIDEO_CODECS.join(', ')})`,
      blocker: { stream: 'video', codec: video.codecName },
    })
  }

  if (video.codecName === 'prores' && !carriesProres(container)) {
    return freezeDecision({
      fastPath: false,
      reason: `prores video cannot be stream-copied into ${container}`,
      blocker: { stream: 'video', codec: video.codecName },
    })
  }

  if (audio.kind === 'absent') {
    return freezeDecision({ fastPath: true, reason: `${video.codecName} video without audio` })
  }

  const audioCodec = audio.audio.codecName
  if (!FAST_PATH_AUDIO_CODECS.includes(audioCodec)) {
    return freezeDecision({
      fastPath: false,
      reason: `audio codec ${audioCodec} is not in the stream-copy allow-list (${FAST_PATH_AUDIO_CODECS.join(', ')})`,
      blocker: { stream: 'audio', codec: audioCodec },
    })
  }

  // The silent filler comes from the native aac encoder, which only writes LC.
  if (audioCodec === 'aac' && audio.audio.profile !== AAC_FILLER_PROFILE) {
    return freezeDecision({
      fastPath: false,
      reason: `aac profile ${audio.audio.profile ?? 'unknown'} does not match the ${AAC_FILLER_PROFILE} silent filler`,
      blocker: { stream: 'audio', codec: audioCodec },
    })
  }

  if (isPcmCodec(audioCodec) && !carriesPcmAudio(container)) {
    return freezeDecision({
      fastPath: false,
      reason: `${audioCodec} audio cannot be stream-copied into ${container}`,
      blocker: { stream: 'audio', codec: audioCodec },
    })
  }

  return freezeDecision({ fastPath: true, reason: `${video.codecName} video with ${audioCodec} audio` })
}
