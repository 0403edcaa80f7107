import { describe, it, expect, vi, beforeEach } from 'vitest'

// L2 tests: only mock external packages and Node.js builtins

const mockFfmpegFactory = vi.hoisted(() => vi.fn())
vi.mock('fluent-ffmpeg', () => ({ default: (...args: unknown[]) => mockFfmpegFactory(...args) }))

import { buildReencodePlan, reencodeWithStill } from '../../../../L2-clients/ffmpeg/reencode.js'
import { argsOf, createChainableCmd, flagValue } from '../../../ffmpegMocks.js'
import { NO_AUDIO, makeAudio, makeConfig, makeVideoInfo } from '../../../fixtures.js'

const OPTIONS = { duration: 0.3, crf: 18, audioBitrate: '192k' }

beforeEach(() => {
  mockFfmpegFactory.mockReset()
})

describe('buildReencodePlan', () => {
  it('builds one graph for video and audio', () => {
    const plan = buildReencodePlan(makeVideoInfo(), makeAudio(), OPTIONS, '.mp4')

    expect(plan.stillSeconds).toBeCloseTo(0.3, 9)
    expect(plan.filterGraph.split(';')).toEqual([
      '[0:v]format=yuv420p,setsar=1/1,setpts=PTS-STARTPTS[v0]',
      '[1:v]scale=1920:1080,setsar=1/1,fps=30/1,format=yuv420p,trim=duration=0.300000,setpts=PTS-STARTPTS[v1]',
      '[0:a]aresample=48000,aformat=channel_layouts=stereo,apad,atrim=duration=10.000000,asetpts=PTS-STARTPTS[a0]',
      'anullsrc=r=48000:cl=stereo,atrim=duration=0.300000,asetpts=PTS-STARTPTS[a1]',
      '[v0][a0][v1][a1]concat=n=2:v=1:a=1[v][a]',
    ])
    expect(plan.outputOptions).toEqual([
      '-filter_complex', plan.filterGraph,
      '-map', '[v]',
      '-map', '[a]',
      '-c:v', 'libx264',
      '-pix_fmt', 'yuv420p',
      '-profile:v', 'high',
      '-level', '4.1',
      '-crf', '18',
      '-preset', 'medium',
      '-c:a', 'aac',
      '-b:a', '192k',
      '-movflags', '+faststart',
    ])
  })

  it('skips padding when the source duration is unknown', () => {
    const video = makeVideoInfo({ duration: 0, durationSource: 'unknown' })
    const plan = buildReencodePlan(video, makeAudio(), OPTIONS, '.mkv')

    expect(plan.filterGraph.split(';')[2]).toBe(
      '[0:a]aresample=48000,aformat=channel_layouts=stereo,asetpts=PTS-STARTPTS[a0]',
    )
  })

  it('builds a video-only graph for a silent source', () => {
    const plan = buildReencodePlan(makeVideoInfo({ hasAudio: false }), NO_AUDIO, OPTIONS, '.mkv')

    expect(plan.filterGraph.split(';')[2]).toBe('[v0][v1]concat=n=2:v=1:a=0[v]')
    expect(plan.outputOptions).not.toContain('-c:a')
    expect(plan.outputOptions).not.toContain('[a]')
    expect(plan.outputOptions).not.toContain('-movflags')
  })

  it('conforms the still to the source rate and aspect', () => {
    const video = makeVideoInfo({
      width: 1280,
      height: 720,
      frameRate: { num: 30000, den: 1001 },
      fps: 30000 / 1001,
      sampleAspectRatio: { num: 4, den: 3 },
    })
    const plan = buildReencodePlan(video, NO_AUDIO, OPTIONS, '.mov')

    expect(plan.filterGraph.split(';')[1]).toBe(
      '[1:v]scale=1280:720,setsar=4/3,fps=30000/1001,format=yuv420p,trim=duration=0.300300,setpts=PTS-STARTPTS[v1]',
    )
  })
})

describe('reencodeWithStill', () => {
  it('feeds the source then the looped image', async () => {
    const cmd = createChainableCmd()
    mockFfmpegFactory.mockReturnValue(cmd)
    const plan = buildReencodePlan(makeVideoInfo(), makeAudio(), OPTIONS, '.mp4')

    const result = await reencodeWithStill('/videos/talk.mp4', '/videos/talk.png', '/videos/talk_thumb.mp4', plan, makeConfig())

    expect(result).toBe('/videos/talk_thumb.mp4')
    expect(cmd.input).toHaveBeenNthCalledWith(1, '/videos/talk.mp4')
    expect(cmd.input).toHaveBeenNthCalledWith(2, '/videos/talk.png')
    expect(cmd.inputOptions).toHaveBeenCalledWith(['-loop', '1', '-t', '0.300000'])
    expect(flagValue(argsOf(cmd.outputOptions), '-filter_complex')).toBe(plan.filterGraph)
  })

  it('passes the configured timeout to fluent-ffmpeg', async () => {
    mockFfmpegFactory.mockReturnValue(createChainableCmd())
    const plan = buildReencodePlan(makeVideoInfo(), NO_AUDIO, OPTIONS, '.mkv')

    await reencodeWithStill('/videos/talk.mkv', '/videos/talk.png', '/videos/talk_thumb.mkv', plan, makeConfig({ TOOL_TIMEOUT: 120 }))

    expect(mockFfmpegFactory).toHaveBeenCalledWith({ timeout: 120 })
  })
})
