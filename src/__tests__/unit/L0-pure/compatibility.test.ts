import { describe, it, expect } from 'vitest'
import { decideCompatibility } from '../../../L0-pure/compatibility/compatibility.js'
import { NO_AUDIO, makeAudio, makeVideoInfo } from '../../fixtures.js'

describe('decideCompatibility', () => {
  it('allows h264 with aac in mp4', () => {
    expect(decideCompatibility(makeVideoInfo(), makeAudio(), '.mp4')).toEqual({
      fastPath: true,
      reason: 'h264 video with aac audio',
    })
  })

  it('allows a video-only source', () => {
    expect(decideCompatibility(makeVideoInfo({ codecName: 'hevc', hasAudio: false }), NO_AUDIO, '.mkv')).toEqual({
      fastPath: true,
      reason: 'hevc video without audio',
    })
  })

  it('blocks a video codec outside the allow-list', () => {
    expect(decideCompatibility(makeVideoInfo({ codecName: 'vp9' }), makeAudio(), '.mkv')).toEqual({
      fastPath: false,
      reason: 'video codec vp9 is not in the stream-copy allow-list (h264, hevc, prores)',
      blocker: { stream: 'video', codec: 'vp9' },
    })
  })

  it('blocks an audio codec outside the allow-list', () => {
    const decision = decideCompatibility(makeVideoInfo(), makeAudio({ codecName: 'opus' }), '.mkv')
    expect(decision).toEqual({
      fastPath: false,
      reason: 'audio codec opus is not in the stream-copy allow-list (aac, pcm_s16le, pcm_s24le)',
      blocker: { stream: 'audio', codec: 'opus' },
    })
  })

  it('blocks AAC outside the LC profile', () => {
    const decision = decideCompatibility(makeVideoInfo(), makeAudio({ profile: 'HE-AAC' }), '.mp4')
    expect(decision).toEqual({
      fastPath: false,
      reason: 'aac profile HE-AAC does not match the LC silent filler',
      blocker: { stream: 'audio', codec: 'aac' },
    })
    expect(decideCompatibility(makeVideoInfo(), makeAudio({ profile: 'HE-AACv2' }), '.mov').fastPath).toBe(false)
  })

  it('blocks AAC whose profile is not reported', () => {
    const decision = decideCompatibility(makeVideoInfo(), makeAudio({ profile: undefined }), '.mp4')
    expect(decision.fastPath).toBe(false)
    expect(decision.reason).toBe('aac profile unknown does not match the LC silent filler')
  })

  it('blocks PCM audio in mp4 but allows it in mov', () => {
    const pcm = makeAudio({ codecName: 'pcm_s16le' })
    expect(decideCompatibility(makeVideoInfo(), pcm, '.mp4')).toEqual({
      fastPath: false,
      reason: 'pcm_s16le audio cannot be stream-copied into .mp4',
      blocker: { stream: 'audio', codec: 'pcm_s16le' },
    })
    expect(decideCompatibility(makeVideoInfo(), pcm, '.mov').fastPath).toBe(true)
  })

  it('blocks ProRes into mp4', () => {
    const decision = decideCompatibility(makeVideoInfo({ codecName: 'prores' }), NO_AUDIO, '.mp4')
    expect(decision.fastPath).toBe(false)
    expect(decision.reason).toBe('prores video cannot be stream-copied into .mp4')
  })

  it('returns a frozen decision', () => {
    const decision = decideCompatibility(makeVideoInfo({ codecName: 'vp9' }), makeAudio(), '.mkv')
    expect(Object.isFrozen(decision)).toBe(true)
    if (!decision.fastPath) expect(Object.isFrozen(decision.blocker)).toBe(true)
  })

  it('is a pure function of its inputs', () => {
    const video = makeVideoInfo()
    const audio = makeAudio()
    expect(decideCompatibility(video, audio, '.mp4')).toEqual(decideCompatibility(video, audio, '.mp4'))
    expect(video).toEqual(makeVideoInfo())
  })
})
