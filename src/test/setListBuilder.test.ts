import { describe, it, expect } from 'vitest'
import { buildSetList, createSetList, createEnergyBasedSet } from '../planning/SetListBuilder'
import { InvalidInputError } from '../utils/errors'
import type { TrackFeatureSet } from '../types'
import { createMockTrack, meanEnergy } from './factories'

const track = (reference: string, duration: number, energy = 0.5): TrackFeatureSet =>
  createMockTrack({ reference, duration, energy: meanEnergy(energy) })

const refs = (tracks: readonly TrackFeatureSet[]) => tracks.map((t) => t.reference)

describe('buildSetList', () => {
  const sequence = [track('a', 200), track('b', 180), track('c', 300), track('d', 100)]

  it('should take the longest prefix that fits', () => {
    const set = buildSetList(sequence, 500)
    expect(refs(set.tracks)).toEqual(['a', 'b'])
    expect(set.totalDuration).toBe(380)
  })

  it('should include a track that fills the budget exactly', () => {
    const set = buildSetList(sequence, 380)
    expect(refs(set.tracks)).toEqual(['a', 'b'])
  })

  it('should return an empty set for a zero budget or an oversized first track', () => {
    expect(buildSetList(sequence, 0)).toEqual({ tracks: [], totalDuration: 0 })
    expect(buildSetList(sequence, 150)).toEqual({ tracks: [], totalDuration: 0 })
  })

  it('should reject a negative budget', () => {
    expect(() => buildSetList(sequence, -1)).toThrow(InvalidInputError)
  })
})

describe('createSetList', () => {
  it('should order by energy and cut to the duration in minutes', () => {
    const tracks = [track('mid', 600, 0.3), track('low', 600, 0.1), track('high', 600, 0.5)]
    const set = createSetList(tracks, { durationMinutes: 20 })
    expect(refs(set.tracks)).toEqual(['low', 'mid'])
    expect(set.totalDuration).toBe(1200)
  })

  it('should default to an hour', () => {
    const tracks = Array.from({ length: 20 }, (_, i) => track(`t${i}`, 240))
    expect(createSetList(tracks).tracks).toHaveLength(15)
  })
})

describe('createEnergyBasedSet', () => {
  it('should peak in the middle by default', () => {
    const tracks = [track('c', 300, 0.3), track('a', 300, 0.1), track('d', 300, 0.4), track('b', 300, 0.2)]
    const set = createEnergyBasedSet(tracks, 15)
    expect(refs(set.tracks)).toEqual(['a', 'b', 'd'])
    expect(set.totalDuration).toBe(900)
  })

  it('should accept another profile', () => {
    const tracks = [track('c', 300, 0.3), track('a', 300, 0.1), track('b', 300, 0.2)]
    expect(refs(createEnergyBasedSet(tracks, 60, 'build').tracks)).toEqual(['a', 'b', 'c'])
  })
})
