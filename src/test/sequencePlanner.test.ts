import { describe, it, expect } from 'vitest'
import {
  orderByEnergyCurve,
  optimizeKeyTransitions,
  refineOrder,
  suggestPlaylistOrder,
  sequenceByCompatibility,
} from '../planning/SequencePlanner'
import type { NoteName, TrackFeatureSet } from '../types'
import { createMockTrack, meanEnergy } from './factories'

const track = (reference: string, energy: number, bpm = 128, root: NoteName = 'C'): TrackFeatureSet =>
  createMockTrack({
    reference,
    energy: meanEnergy(energy),
    tempo: { bpm, confidence: 1 },
    key: { root, mode: 'major', confidence: 1 },
  })

const refs = (tracks: readonly TrackFeatureSet[]) => tracks.map((t) => t.reference)

describe('orderByEnergyCurve', () => {
  const tracks = [track('c', 0.3), track('a', 0.1), track('e', 0.5), track('b', 0.2), track('d', 0.4)]

  it('should sort ascending for build and its build_up alias', () => {
    expect(refs(orderByEnergyCurve(tracks, 'build'))).toEqual(['a', 'b', 'c', 'd', 'e'])
    expect(refs(orderByEnergyCurve(tracks, 'build_up'))).toEqual(['a', 'b', 'c', 'd', 'e'])
  })

  it('should interleave loud and quiet halves for wave', () => {
    expect(refs(orderByEnergyCurve(tracks, 'wave'))).toEqual(['e', 'a', 'd', 'b', 'c'])
  })

  it('should rise then fall for peak_middle', () => {
    expect(refs(orderByEnergyCurve(tracks, 'peak_middle'))).toEqual(['a', 'b', 'e', 'd', 'c'])
  })

  it('should keep the input order for constant and unknown curves', () => {
    expect(refs(orderByEnergyCurve(tracks, 'constant'))).toEqual(['c', 'a', 'e', 'b', 'd'])
    expect(refs(orderByEnergyCurve(tracks, 'zigzag'))).toEqual(['c', 'a', 'e', 'b', 'd'])
  })

  it('should return an empty order for no tracks', () => {
    expect(orderByEnergyCurve([], 'wave')).toEqual([])
  })

  it('should not mutate the input', () => {
    orderByEnergyCurve(tracks, 'build')
    expect(refs(tracks)).toEqual(['c', 'a', 'e', 'b', 'd'])
  })
})

describe('optimizeKeyTransitions', () => {
  it('should follow compatible roots and fall back to the next track', () => {
    const tracks = [track('t1', 0.5, 128, 'C'), track('t2', 0.5, 128, 'D#'), track('t3', 0.5, 128, 'G'), track('t4', 0.5, 128, 'E')]
    expect(refs(optimizeKeyTransitions(tracks))).toEqual(['t1', 't3', 't4', 't2'])
  })
})

describe('refineOrder', () => {
  const tracks = [
    track('t1', 0.5, 130, 'C'),
    track('t2', 0.5, 120, 'D#'),
    track('t3', 0.5, 125, 'G'),
    track('t4', 0.5, 128, 'E'),
  ]

  it('should apply passes in the given order', () => {
    expect(refs(refineOrder(tracks, ['key', 'tempo']))).toEqual(['t2', 't3', 't4', 't1'])
    expect(refs(refineOrder(tracks, ['tempo', 'key']))).toEqual(['t2', 't1', 't3', 't4'])
  })

  it('should leave the order alone with no passes', () => {
    expect(refs(refineOrder(tracks, []))).toEqual(['t1', 't2', 't3', 't4'])
  })
})

describe('suggestPlaylistOrder', () => {
  it('should build up energy by default', () => {
    const tracks = [track('mid', 0.3), track('low', 0.1), track('high', 0.5)]
    expect(refs(suggestPlaylistOrder(tracks))).toEqual(['low', 'mid', 'high'])
  })
})

describe('sequenceByCompatibility', () => {
  const four = [track('t0', 0.5), track('t1', 0.5), track('t2', 0.5), track('t3', 0.5)]

  it('should greedily follow the best edge', () => {
    const matrix = [
      [null, 50, 80, 80],
      [10, null, 10, 10],
      [20, 30, null, 60],
      [5, undefined, 5, null],
    ]

    const result = sequenceByCompatibility(four, matrix)
    expect(refs(result.tracks)).toEqual(['t0', 't2', 't3', 't1'])
    expect(result.transitionScores).toEqual([80, 60, 0])
    expect(result.averageScore).toBeCloseTo(140 / 3, 10)
  })

  it('should break ties toward the lowest index', () => {
    const zeros = four.map(() => four.map(() => 0))
    const result = sequenceByCompatibility(four, zeros)
    expect(refs(result.tracks)).toEqual(['t0', 't1', 't2', 't3'])
    expect(result.averageScore).toBe(0)
  })

  it('should score with the default scorer when no matrix is given', () => {
    const tracks = [
      createMockTrack({ reference: 't1', energy: meanEnergy(0.5) }),
      createMockTrack({
        reference: 't3',
        tempo: { bpm: 90, confidence: 1 },
        key: { root: 'F#', mode: 'minor', confidence: 1 },
        energy: meanEnergy(0.1),
      }),
      createMockTrack({ reference: 't2', energy: meanEnergy(0.52) }),
    ]

    expect(refs(sequenceByCompatibility(tracks).tracks)).toEqual(['t1', 't2', 't3'])
  })

  it('should handle zero and one track', () => {
    expect(sequenceByCompatibility([])).toEqual({ tracks: [], transitionScores: [], averageScore: 0 })

    const single = sequenceByCompatibility([four[0]])
    expect(refs(single.tracks)).toEqual(['t0'])
    expect(single.transitionScores).toEqual([])
    expect(single.averageScore).toBe(100)
  })
})
