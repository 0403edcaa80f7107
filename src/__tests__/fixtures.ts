import type { AppConfig } from '../L1-infra/config/environment.js'
import type { AudioInfo, AudioProbe, VideoInfo } from '../types/index.js'

/** 10s 1080p30 H.264 source, the usual shape of a screen recording. */
export function makeVideoInfo(overrides: Partial<VideoInfo> = {}): VideoInfo {
  return {
    width: 1920,
    height: 1080,
    frameRate: { num: 30, den: 1 },
    fps: 30,
    duration: 10,
    durationSource: 'stream',
    hasAudio: true,
    codecName: 'h264',
    profile: 'High',
    level: 41,
    pixelFormat: 'yuv420p',
    sampleAspectRatio: { num: 1, den: 1 },
    timeBase: { num: 1, den: 15360 },
    color: {},
    ...overrides,
  }
}

export function makeAudio(overrides: Partial<AudioInfo> = {}): AudioProbe {
  return {
    kind: 'present',
    audio: {
      codecName: 'aac',
      profile: 'LC',
      sampleRate: 48000,
      channels: 2,
      channelLayout: 'stereo',
      ...overrides,
    },
  }
}

export const NO_AUDIO: AudioProbe = { kind: 'absent', reason: 'no audio stream' }

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg',
    FFPROBE_PATH: '/opt/ffmpeg/bin/ffprobe',
    TOOL_TIMEOUT: 0,
    LOG_FILE: '',
    VERBOSE: false,
    ...overrides,
  }
}
