/**
 * Type definitions for the tcap append pipeline.
 *
 * Domain types covering probed stream metadata, the fast-path decision, the
 * still clip parameters and the request/result of one append run.
 *
 * ### Time convention
 * All `duration` fields are in **seconds** (floating-point, e.g. 0.3). Frame
 * rates and time bases are kept as integer rationals so they can be handed to
 * FFmpeg without rounding.
 */

// ============================================================================
// PRIMITIVES
// ============================================================================

/** An integer fraction such as `30000/1001` (frame rate) or `1/15360` (time base). */
export interface Rational {
  num: number
  den: number
}

/** Supported source/output container extensions, lowercase with the dot. */
export type ContainerExtension = '.mp4' | '.m4v' | '.mov' | '.mkv'

// ============================================================================
// PROBE RESULTS
// ============================================================================

/** Colour tags copied from the source so the still is not shifted in colour. */
export interface ColorMetadata {
  primaries?: string
  transfer?: string
  space?: string
  range?: string
}

/** Where {@link VideoInfo.duration} came from. */
export type DurationSource = 'stream' | 'container' | 'frame-count' | 'unknown'

/**
 * Read-only snapshot of the source's first video stream.
 *
 * `width`/`height` are always positive integers (the probe fails otherwise).
 * `fps` falls back to 30 when the probed rate is unusable, and `duration`
 * falls back to 0 when nothing reports it.
 */
export interface VideoInfo {
  readonly width: number
  readonly height: number
  readonly frameRate: Rational
  readonly fps: number
  readonly duration: number
  readonly durationSource: DurationSource
  readonly hasAudio: boolean
  readonly codecName: string
  readonly profile?: string
  readonly level?: number
  readonly pixelFormat: string
  readonly sampleAspectRatio: Rational
  readonly timeBase: Rational | null
  readonly color: ColorMetadata
}

export interface AudioInfo {
  readonly codecName: string
  /** ffprobe's profile name, e.g. `LC` or `HE-AAC` */
  readonly profile?: string
  readonly sampleRate: number
  readonly channels: number
  readonly channelLayout: string
}

/** Audio is either there or it is not; absence is a valid state, not an error. */
export type AudioProbe =
  | { readonly kind: 'present'; readonly audio: AudioInfo }
  | { readonly kind: 'absent'; readonly reason: string }

export interface SourceProbe {
  video: VideoInfo
  audio: AudioProbe
}

// ============================================================================
// FAST-PATH DECISION
// ============================================================================

export interface CompatibilityBlocker {
  stream: 'video' | 'audio'
  codec: string
}

export type CompatibilityDecision =
  | { readonly fastPath: true; readonly reason: string }
  | { readonly fastPath: false; readonly reason: string; readonly blocker: CompatibilityBlocker }

// ============================================================================
// STILL CLIP
// ============================================================================

/** Encoder configuration resolved from the source codec. */
export interface EncoderSettings {
  /** FFmpeg encoder name, e.g. `libx264` */
  encoder: string
  /** Inter-frame codecs get a forced GOP spanning the whole still */
  interFrame: boolean
  /** Codec-specific output options: quality, profile, level and GOP */
  codecArgs: string[]
  /** Encoder-specific profile value, when the source profile maps to one */
  profile?: string
  /** Encoder-specific level value, when known */
  level?: string
}

export interface StillAudioTarget {
  encoder: string
  sampleRate: number
  channelLayout: string
  /** Only for lossy encoders */
  bitrate?: string
}

/**
 * Everything needed to encode the appended still so it concatenates cleanly
 * onto the source. Derived from the probe and discarded after encoding.
 */
export interface StillClipSpec {
  width: number
  height: number
  frameRate: Rational
  fps: number
  duration: number
  /** `round(fps * duration)`, at least 1; also the GOP length */
  frameCount: number
  pixelFormat: string
  sampleAspectRatio: Rational
  encoder: EncoderSettings
  color: ColorMetadata
  /** Track timescale to force (the N of a `1/N` source time base), or null to keep the encoder default */
  timescale: number | null
  container: ContainerExtension
  audio: StillAudioTarget | null
}

// ============================================================================
// APPEND REQUEST / RESULT
// ============================================================================

/**
 * - `auto`: the compatibility gate chooses
 * - `copy`: stream copy only; an incompatible source is an error
 * - `reencode`: always re-encode source and still together
 */
export type AppendStrategy = 'auto' | 'copy' | 'reencode'

export type AppendRoute = 'stream-copy' | 'reencode'

export interface AppendOptions {
  /** Still duration in seconds */
  duration: number
  /** CRF for the encoders that take one */
  crf: number
  /** AAC bitrate for encoded audio, e.g. `192k` */
  audioBitrate: string
  strategy: AppendStrategy
}

export interface AppendRequest extends AppendOptions {
  videoPath: string
  imagePath: string
  /** Where the finished file is written (a staging path when run through the atomic writer) */
  outputPath: string
}

export interface AppendResult {
  outputPath: string
  route: AppendRoute
  decision: CompatibilityDecision
  video: VideoInfo
}
