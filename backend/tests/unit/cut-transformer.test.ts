/**
 * Tests for applying J- and L-cuts
 *
 * Coverage:
 * - applyCuts (J and L edits, feasibility, dry run)
 * - assertCutOptions
 *
 * Properties:
 * - Video clips are never modified
 * - Audio duration is conserved across an applied pair
 * - The feasibility gate is exact
 * - Boundaries are decided independently
 */

import { describe, it, expect } from '@jest/globals'
import { detectBoundaries } from '../../src/cuts/boundary-detector'
import { InvalidCutOptionsError } from '../../src/cuts/cuts.errors'
import { CutOptions, DetectedBoundary } from '../../src/cuts/cuts.types'
import { applyCuts, assertCutOptions } from '../../src/cuts/cut-transformer'
import { clipEnd } from '../../src/timeline/timeline.model'
import { ClipSpec, createTestTimeline } from '../helpers/timeline-factory'

const twoShots: ClipSpec[] = [
  { start: 0, duration: 100 },
  { start: 100, duration: 100, in: 200 },
]

function run(audio: ClipSpec[], options: CutOptions, sourceLength?: number) {
  const fixture = createTestTimeline(twoShots, audio, sourceLength)
  const detected = detectBoundaries(fixture.timeline)
  return { ...fixture, detected, result: applyCuts(fixture.timeline, detected, options) }
}

describe('applyCuts', () => {
  describe('J-cut', () => {
    it('moves the audio edit earlier by the offset', () => {
      const { result, audio } = run(
        [
          { start: 0, duration: 100, in: 0, name: 'host' },
          { start: 100, duration: 100, in: 200, name: 'guest' },
        ],
        { mode: 'J', offsetFrames: 8 },
      )

      expect(result.results).toHaveLength(1)
      expect(result.results[0].outcome).toBe('applied')
      expect(result.results[0].reason).toBe('J-cut: audio edit moved from frame 100 to 92')

      const a = result.timeline.clips[audio[0]]
      const b = result.timeline.clips[audio[1]]
      expect(a).toMatchObject({ timelineStart: 0, duration: 92, sourceIn: 0, sourceOut: 92 })
      expect(b).toMatchObject({ timelineStart: 92, duration: 108, sourceIn: 192, sourceOut: 300 })
      expect(clipEnd(a)).toBe(b.timelineStart)
    })

    it('needs the full offset of source before the incoming clip', () => {
      const atLimit = run(
        [
          { start: 0, duration: 100 },
          { start: 100, duration: 100, in: 8 },
        ],
        { mode: 'J', offsetFrames: 8 },
      )
      expect(atLimit.result.results[0].outcome).toBe('applied')
      expect(atLimit.result.timeline.clips[atLimit.audio[1]].sourceIn).toBe(0)

      const short = run(
        [
          { start: 0, duration: 100 },
          { start: 100, duration: 100, in: 7, name: 'guest' },
        ],
        { mode: 'J', offsetFrames: 8 },
      )
      expect(short.result.results[0]).toMatchObject({
        outcome: 'skipped-infeasible',
        reason: 'clip B (guest) needs 1 more frame of source handle before its in-point',
      })
    })

    it('keeps at least one frame of the outgoing clip', () => {
      const { result } = run(
        [
          { start: 92, duration: 8, name: 'short' },
          { start: 100, duration: 100, in: 200 },
        ],
        { mode: 'J', offsetFrames: 8 },
      )

      expect(result.results[0]).toMatchObject({
        outcome: 'skipped-infeasible',
        reason: 'clip A (short) is 8 frames long; trimming 8 frames would leave 0 (minimum duration is 1 frame)',
      })
    })
  })

  describe('L-cut', () => {
    it('moves the audio edit later by the offset', () => {
      const { result, audio } = run(
        [
          { start: 0, duration: 100, in: 0 },
          { start: 100, duration: 100, in: 200 },
        ],
        { mode: 'L', offsetFrames: 8 },
      )

      expect(result.results[0].reason).toBe('L-cut: audio edit moved from frame 100 to 108')
      expect(result.timeline.clips[audio[0]]).toMatchObject({ duration: 108, sourceOut: 108 })
      expect(result.timeline.clips[audio[1]]).toMatchObject({
        timelineStart: 108,
        duration: 92,
        sourceIn: 208,
        sourceOut: 300,
      })
    })

    it('skips a cut whose incoming clip is shorter than the offset', () => {
      const { result, timeline } = run(
        [
          { start: 0, duration: 100 },
          { start: 100, duration: 5, name: 'sting' },
        ],
        { mode: 'L', offsetFrames: 8 },
      )

      expect(result.results[0].outcome).toBe('skipped-infeasible')
      expect(result.results[0].reason).toBe(
        'clip B (sting) is 5 frames long; trimming 8 frames would leave -3 (minimum duration is 1 frame)',
      )
      expect(result.timeline.clips).toEqual(timeline.clips)
    })

    it('needs the full offset of source after the outgoing clip', () => {
      const atLimit = run(
        [
          { start: 0, duration: 100, in: 0, media: 'host' },
          { start: 100, duration: 100, in: 0, media: 'guest' },
        ],
        { mode: 'L', offsetFrames: 8 },
        108,
      )
      expect(atLimit.result.results[0].outcome).toBe('applied')

      const short = run(
        [
          { start: 0, duration: 100, in: 0, media: 'host', name: 'host' },
          { start: 100, duration: 100, in: 0, media: 'guest' },
        ],
        { mode: 'L', offsetFrames: 8 },
        107,
      )
      expect(short.result.results[0]).toMatchObject({
        outcome: 'skipped-infeasible',
        reason: 'clip A (host) needs 1 more frame of source handle after its out-point',
      })
    })
  })

  it('never touches video clips', () => {
    const { result, timeline, video } = run(
      [
        { start: 0, duration: 100 },
        { start: 100, duration: 100, in: 200 },
      ],
      { mode: 'J', offsetFrames: 10 },
    )

    for (const handle of video) {
      expect(result.timeline.clips[handle]).toBe(timeline.clips[handle])
    }
  })

  it.each(['J', 'L'] as const)('conserves the combined audio duration of an applied %s-cut pair', (mode) => {
    const { result, timeline, audio } = run(
      [
        { start: 0, duration: 100 },
        { start: 100, duration: 100, in: 200 },
      ],
      { mode, offsetFrames: 30 },
    )

    expect(result.results[0].outcome).toBe('applied')
    const total = (clips: typeof timeline.clips) => clips[audio[0]].duration + clips[audio[1]].duration
    expect(total(result.timeline.clips)).toBe(total(timeline.clips))
  })

  it.each(['J', 'L'] as const)('keeps the audio track free of overlaps after a %s-cut', (mode) => {
    const { result, audio } = run(
      [
        { start: 0, duration: 100 },
        { start: 100, duration: 100, in: 200 },
        { start: 200, duration: 50, in: 400 },
      ],
      { mode, offsetFrames: 12 },
    )

    const clips = audio.map((handle) => result.timeline.clips[handle])
    expect(result.results.map((entry) => entry.outcome)).toEqual(['applied'])
    expect(clipEnd(clips[0])).toBe(clips[1].timelineStart)
    expect(clipEnd(clips[1])).toBeLessThanOrEqual(clips[2].timelineStart)
    expect(clipEnd(clips[1])).toBe(200)
  })

  it('names the whole handle shortage', () => {
    const { result } = run(
      [
        { start: 0, duration: 100 },
        { start: 100, duration: 100, in: 3, name: 'guest' },
      ],
      { mode: 'J', offsetFrames: 8 },
    )

    expect(result.results[0].reason).toBe(
      'clip B (guest) needs 5 more frames of source handle before its in-point',
    )
  })

  it('reports ineligible boundaries with the detection reason', () => {
    const { result, timeline } = run(
      [
        { start: 0, duration: 98 },
        { start: 100, duration: 100 },
      ],
      { mode: 'J', offsetFrames: 8 },
    )

    expect(result.results).toEqual([
      expect.objectContaining({ outcome: 'skipped-ineligible', reason: 'audio gap' }),
    ])
    expect(result.timeline).toBe(timeline)
  })

  it('computes the same results without editing on a dry run', () => {
    const audio: ClipSpec[] = [
      { start: 0, duration: 100 },
      { start: 100, duration: 100, in: 200 },
    ]
    const applied = run(audio, { mode: 'J', offsetFrames: 8 })
    const dryRun = run(audio, { mode: 'J', offsetFrames: 8, dryRun: true })

    expect(dryRun.result.timeline).toBe(dryRun.timeline)
    expect(dryRun.result.results).toEqual(applied.result.results)
  })

  it('decides each boundary on its own', () => {
    const video: ClipSpec[] = [
      { start: 0, duration: 100 },
      { start: 100, duration: 100 },
      { start: 200, duration: 100 },
    ]
    const audio: ClipSpec[] = [
      { start: 0, duration: 100 },
      { start: 100, duration: 100, in: 50 },
      { start: 200, duration: 100, in: 50 },
    ]
    const { timeline, audio: handles } = createTestTimeline(video, audio)
    const detected = detectBoundaries(timeline)
    const options: CutOptions = { mode: 'J', offsetFrames: 20 }

    const together = applyCuts(timeline, detected, options)
    const first = applyCuts(timeline, [detected[0]], options)
    const second = applyCuts(timeline, [detected[1]], options)

    expect(together.results).toEqual([...first.results, ...second.results])
    // the middle clip starts earlier and ends earlier, keeping its length
    expect(together.timeline.clips[handles[1]]).toMatchObject({
      timelineStart: 80,
      duration: 100,
      sourceIn: 30,
      sourceOut: 130,
    })
    expect(together.timeline.clips[handles[2]]).toMatchObject({ timelineStart: 180, sourceIn: 30 })
  })

  it('sorts results by frame', () => {
    const { timeline } = createTestTimeline(
      [
        { start: 0, duration: 100 },
        { start: 100, duration: 100 },
        { start: 200, duration: 100 },
      ],
      [
        { start: 0, duration: 100 },
        { start: 100, duration: 100, in: 50 },
        { start: 200, duration: 100, in: 50 },
      ],
    )
    const detected = detectBoundaries(timeline)

    const result = applyCuts(timeline, [...detected].reverse(), { mode: 'J', offsetFrames: 5 })

    expect(result.results.map((entry) => entry.boundary.frame)).toEqual([100, 200])
  })

  it('fails a boundary whose handles do not point at audio clips', () => {
    const { timeline, video, audio } = createTestTimeline(twoShots, [
      { start: 0, duration: 100 },
      { start: 100, duration: 100 },
    ])
    const corrupt: DetectedBoundary = {
      boundary: { frame: 100, videoA: video[0], videoB: video[1], audioA: video[0], audioB: audio[1] },
      eligible: true,
    }

    const result = applyCuts(timeline, [corrupt], { mode: 'J', offsetFrames: 8 })

    expect(result.results[0]).toMatchObject({
      outcome: 'failed',
      reason: 'clip 0 (video-1) is not on the audio track',
    })
    expect(result.timeline).toBe(timeline)
  })

  it('fails a boundary whose audio clips do not meet at the cut', () => {
    const { timeline, video, audio } = createTestTimeline(twoShots, [
      { start: 0, duration: 90 },
      { start: 100, duration: 100 },
    ])
    const corrupt: DetectedBoundary = {
      boundary: { frame: 100, videoA: video[0], videoB: video[1], audioA: audio[0], audioB: audio[1] },
      eligible: true,
    }

    const result = applyCuts(timeline, [corrupt], { mode: 'L', offsetFrames: 8 })

    expect(result.results[0]).toMatchObject({
      outcome: 'failed',
      reason: `audio clips ${audio[0]} and ${audio[1]} do not meet at frame 100`,
    })
  })
})

describe('assertCutOptions', () => {
  it.each([0, -4, 2.5])('rejects offset %p', (offsetFrames) => {
    expect(() => assertCutOptions({ mode: 'J', offsetFrames })).toThrow(InvalidCutOptionsError)
  })

  it('names the offset it rejected', () => {
    expect(() => applyCuts(createTestTimeline([], []).timeline, [], { mode: 'L', offsetFrames: 0 })).toThrow(
      'Offset must be a positive integer frame count, got 0',
    )
  })

  it('rejects an unknown mode coming from untyped input', () => {
    const options: CutOptions = JSON.parse('{ "mode": "X", "offsetFrames": 4 }')
    expect(() => assertCutOptions(options)).toThrow("Cut mode must be 'J' or 'L', got 'X'")
  })
})
