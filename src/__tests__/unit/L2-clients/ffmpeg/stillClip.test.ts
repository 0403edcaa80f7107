import { describe, it, expect, vi, beforeEach } from 'vitest'

// L2 tests: only mock external packages and Node.js builtins

const mockFfmpegFactory = vi.hoisted(() => vi.fn())
vi.mock('fluent-ffmpeg', () => ({ default: (...args: unknown[]) => mockFfmpegFactory(...args) }))

import {
  buildStillClipSpec,
  formatSeconds,
  stillClipSeconds,
  stillFrameCount,
  stillVideoOutputOptions,
  synthesizeSilentAudio,
  synthesizeStillVideo,
} from '../../../../L2-clients/ffmpeg/stillClip.js'
import { ToolExecutionError, UnsupportedCodecError } from '../../../../L0-pure/errors/errors.js'
import { createChainableCmd } from '../../../ffmpegMocks.js'
import { NO_AUDIO, makeAudio, makeConfig, makeVideoInfo } from '../../../fixtures.js'

const OPTIONS = { duration: 0.3, crf: 18, audioBitrate: '192k' }

const H264_ARGS = [
  '-crf', '18', '-preset', 'medium',
  '-profile:v', 'high',
  '-g', '9', '-keyint_min', '9', '-sc_threshold', '0', '-level:v', '4.1',
]

beforeEach(() => {
  mockFfmpegFactory.mockReset()
})

describe('stillFrameCount', () => {
  it('rounds fps × duration', () => {
    expect(stillFrameCount(30, 0.3)).toBe(9)
    expect(stillFrameCount(30000 / 1001, 0.3)).toBe(9)
    expect(stillFrameCount(25, 0.5)).toBe(13)
  })

  it('never goes below one frame', () => {
    expect(stillFrameCount(30, 0.01)).toBe(1)
  })
})

describe('stillClipSeconds', () => {
  it('is a whole number of frames', () => {
    expect(formatSeconds(stillClipSeconds({ frameCount: 9, frameRate: { num: 30, den: 1 } }))).toBe('0.300000')
    expect(formatSeconds(stillClipSeconds({ frameCount: 9, frameRate: { num: 30000, den: 1001 } }))).toBe('0.300300')
  })
})

describe('buildStillClipSpec', () => {
  it('matches the source stream', () => {
    const spec = buildStillClipSpec(makeVideoInfo(), makeAudio(), OPTIONS, '.mp4')

    expect(spec).toEqual({
      width: 1920,
      height: 1080,
      frameRate: { num: 30, den: 1 },
      fps: 30,
      duration: 0.3,
      frameCount: 9,
      pixelFormat: 'yuv420p',
      sampleAspectRatio: { num: 1, den: 1 },
      encoder: { encoder: 'libx264', interFrame: true, codecArgs: H264_ARGS, profile: 'high', level: '4.1' },
      color: {},
      timescale: 15360,
      container: '.mp4',
      audio: { encoder: 'aac', sampleRate: 48000, channelLayout: 'stereo', bitrate: '192k' },
    })
  })

  it('leaves the timescale alone outside the mov family', () => {
    expect(buildStillClipSpec(makeVideoInfo(), makeAudio(), OPTIONS, '.mkv').timescale).toBeNull()
  })

  it('leaves the timescale alone for a time base that is not 1/N', () => {
    const video = makeVideoInfo({ timeBase: { num: 1001, den: 30000 } })
    expect(buildStillClipSpec(video, makeAudio(), OPTIONS, '.mov').timescale).toBeNull()
  })

  it('has no audio target for a silent source', () => {
    expect(buildStillClipSpec(makeVideoInfo({ hasAudio: false }), NO_AUDIO, OPTIONS, '.mp4').audio).toBeNull()
  })

  it('drops the bitrate for PCM audio', () => {
    const spec = buildStillClipSpec(makeVideoInfo(), makeAudio({ codecName: 'pcm_s16le' }), OPTIONS, '.mov')
    expect(spec.audio).toEqual({ encoder: 'pcm_s16le', sampleRate: 48000, channelLayout: 'stereo' })
  })

  it('refuses a codec it cannot reproduce', () => {
    expect(() => buildStillClipSpec(makeVideoInfo({ codecName: 'vp9' }), makeAudio(), OPTIONS, '.mkv'))
      .toThrow(UnsupportedCodecError)
  })
})

describe('stillVideoOutputOptions', () => {
  it('lists the encode options in order', () => {
    const spec = buildStillClipSpec(makeVideoInfo(), makeAudio(), OPTIONS, '.mp4')

    expect(stillVideoOutputOptions(spec)).toEqual([
      '-vf', 'scale=1920:1080,setsar=1/1,format=yuv420p',
      '-r', '30/1',
      '-frames:v', '9',
      '-an',
      '-c:v', 'libx264',
      ...H264_ARGS,
      '-pix_fmt', 'yuv420p',
      '-video_track_timescale', '15360',
    ])
  })

  it('copies colour tags and the sample aspect ratio', () => {
    const video = makeVideoInfo({
      sampleAspectRatio: { num: 4, den: 3 },
      color: { primaries: 'bt709', range: 'tv' },
    })
    const options = stillVideoOutputOptions(buildStillClipSpec(video, NO_AUDIO, OPTIONS, '.mkv'))

    expect(options[1]).toBe('scale=1920:1080,setsar=4/3,format=yuv420p')
    expect(options.slice(-6)).toEqual(['-pix_fmt', 'yuv420p', '-color_primaries', 'bt709', '-color_range', 'tv'])
  })
})

describe('synthesizeStillVideo', () => {
  it('loops the image at the source rate', async () => {
    const cmd = createChainableCmd()
    mockFfmpegFactory.mockReturnValue(cmd)
    const spec = buildStillClipSpec(makeVideoInfo(), makeAudio(), OPTIONS, '.mp4')

    const result = await synthesizeStillVideo('/work/thumb.png', spec, '/tmp/w/still_video.mp4', makeConfig())

    expect(result).toBe('/tmp/w/still_video.mp4')
    expect(cmd.setFfmpegPath).toHaveBeenCalledWith('/opt/ffmpeg/bin/ffmpeg')
    expect(cmd.input).toHaveBeenCalledWith('/work/thumb.png')
    expect(cmd.inputOptions).toHaveBeenCalledWith(['-loop', '1', '-framerate', '30/1'])
    expect(cmd.outputOptions).toHaveBeenCalledWith(stillVideoOutputOptions(spec))
    expect(cmd.output).toHaveBeenCalledWith('/tmp/w/still_video.mp4')
  })

  it('rejects with ToolExecutionError when ffmpeg fails', async () => {
    mockFfmpegFactory.mockReturnValue(createChainableCmd({
      error: new Error('ffmpeg exited with code 1: Unknown encoder'),
      stderr: 'Unknown encoder libx264',
      commandLine: 'ffmpeg -loop 1 -i /work/thumb.png',
    }))
    const spec = buildStillClipSpec(makeVideoInfo(), makeAudio(), OPTIONS, '.mp4')

    const failure = synthesizeStillVideo('/work/thumb.png', spec, '/tmp/w/still_video.mp4', makeConfig())
    await expect(failure).rejects.toThrow(ToolExecutionError)
    await expect(failure).rejects.toThrow('ffmpeg failed (exit code 1): ffmpeg -loop 1 -i /work/thumb.png')
  })
})

describe('synthesizeSilentAudio', () => {
  it('encodes silence as long as the still', async () => {
    const cmd = createChainableCmd()
    mockFfmpegFactory.mockReturnValue(cmd)
    const spec = buildStillClipSpec(makeVideoInfo(), makeAudio(), OPTIONS, '.mp4')

    await synthesizeSilentAudio(spec, '/tmp/w/still_audio.mp4', makeConfig())

    expect(cmd.input).toHaveBeenCalledWith('anullsrc=r=48000:cl=stereo')
    expect(cmd.inputOptions).toHaveBeenCalledWith(['-f', 'lavfi'])
    expect(cmd.outputOptions).toHaveBeenCalledWith([
      '-t', '0.300000', '-vn', '-c:a', 'aac', '-b:a', '192k', '-ar', '48000',
    ])
  })

  it('refuses a still clip without an audio target', async () => {
    const spec = buildStillClipSpec(makeVideoInfo({ hasAudio: false }), NO_AUDIO, OPTIONS, '.mp4')
    await expect(synthesizeSilentAudio(spec, '/tmp/w/still_audio.mp4', makeConfig())).rejects.toThrow(
      'Silent audio requested for a still without an audio target',
    )
    expect(mockFfmpegFactory).not.toHaveBeenCalled()
  })
})
