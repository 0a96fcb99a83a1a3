import { describe, it, expect, vi } from 'vitest'
import { analyzeBatch, summarizeTrack, summarizeLibrary, planLibrarySet } from '../store/analyzeBatch'
import { createLibraryStore, requireTracks } from '../store/libraryStore'
import { EmptyInputError, ExtractionError } from '../utils/errors'
import type { TrackFeatureSet } from '../types'
import { createMockTrack, energyProfile } from './factories'

const createExtractor = () =>
  vi.fn(async (reference: string): Promise<TrackFeatureSet> => {
    if (reference.includes('bad')) {
      throw new ExtractionError(reference, 'service responded with 500')
    }
    return createMockTrack({ reference })
  })

const createLogger = () => ({ log: vi.fn(), warn: vi.fn() })

const references = ['crate/a.mp3', 'crate/bad.mp3', 'crate/c.mp3']

describe('analyzeBatch', () => {
  it('should keep going past a failed track', async () => {
    const store = createLibraryStore()
    const logger = createLogger()

    const report = await analyzeBatch(references, createExtractor(), store, { logger })

    expect(report.succeeded).toEqual(['crate/a.mp3', 'crate/c.mp3'])
    expect(report.failed).toEqual(['crate/bad.mp3'])
    expect(report.entries.map((e) => e.ok)).toEqual([true, false, true])
    expect(store.getState().getTracks().map((t) => t.reference)).toEqual(['crate/a.mp3', 'crate/c.mp3'])
  })

  it('should log progress, failures and a summary', async () => {
    const logger = createLogger()

    await analyzeBatch(references, createExtractor(), createLibraryStore(), { logger })

    expect(logger.log).toHaveBeenNthCalledWith(1, '[analyzeBatch] Analyzing 1/3: a.mp3')
    expect(logger.log).toHaveBeenLastCalledWith('[analyzeBatch] Analysis complete: 2 succeeded, 1 failed')
    expect(logger.warn).toHaveBeenCalledWith(
      '[analyzeBatch] Error analyzing crate/bad.mp3: Feature extraction failed for crate/bad.mp3: service responded with 500'
    )
  })

  it('should record failures in the store', async () => {
    const store = createLibraryStore()

    await analyzeBatch(references, createExtractor(), store, { logger: createLogger() })

    const failure = store.getState().report.find((entry) => !entry.ok)
    expect(failure).toMatchObject({ reference: 'crate/bad.mp3', ok: false })
  })

  it('should reuse cached features on a second run', async () => {
    const store = createLibraryStore()
    const extractFeatures = createExtractor()
    const logger = createLogger()

    await analyzeBatch(references, extractFeatures, store, { logger })
    const report = await analyzeBatch(references, extractFeatures, store, { logger })

    // Only the failed track is requested again
    expect(extractFeatures).toHaveBeenCalledTimes(4)
    expect(extractFeatures).toHaveBeenLastCalledWith('crate/bad.mp3')
    expect(report.succeeded).toEqual(['crate/a.mp3', 'crate/c.mp3'])
  })

  it('should propagate unexpected errors', async () => {
    const extractFeatures = vi.fn(async (): Promise<TrackFeatureSet> => {
      throw new TypeError('boom')
    })

    await expect(
      analyzeBatch(['crate/a.mp3'], extractFeatures, createLibraryStore(), { logger: createLogger() })
    ).rejects.toThrow(TypeError)
  })
})

describe('library layer', () => {
  it('should refuse to plan an empty library', () => {
    const store = createLibraryStore()
    expect(() => requireTracks(store)).toThrow(EmptyInputError)
    expect(() => planLibrarySet(store)).toThrow('No tracks analyzed. Run analyzeBatch() first.')
    expect(() => summarizeLibrary(store)).toThrow(EmptyInputError)
  })

  it('should plan a set from analysed tracks', () => {
    const store = createLibraryStore()
    store.getState().cacheFeatures(createMockTrack({ reference: 'crate/a.mp3', duration: 1800 }))
    store.getState().cacheFeatures(createMockTrack({ reference: 'crate/b.mp3', duration: 1800 }))
    store.getState().cacheFeatures(createMockTrack({ reference: 'crate/c.mp3', duration: 1800 }))

    const set = planLibrarySet(store)
    expect(set.tracks.map((t) => t.reference)).toEqual(['crate/a.mp3', 'crate/b.mp3'])
    expect(set.totalDuration).toBe(3600)
  })

  it('should clear the store', () => {
    const store = createLibraryStore()
    store.getState().cacheFeatures(createMockTrack())
    store.getState().clear()
    expect(store.getState().getTracks()).toEqual([])
    expect(store.getState().report).toEqual([])
  })
})

describe('summarizeTrack', () => {
  it('should summarise one track', () => {
    const track = createMockTrack({
      reference: 'crate/sets/a.mp3',
      energy: energyProfile([
        { time: 0, rms: 0.25 },
        { time: 1, rms: 0.75 },
      ]),
      drops: [60, 120],
    })

    expect(summarizeTrack(track)).toEqual({
      reference: 'crate/sets/a.mp3',
      fileName: 'a.mp3',
      duration: 240,
      bpm: 128,
      bpmConfidence: 0.9,
      key: 'C major',
      keyConfidence: 0.8,
      meanEnergy: 0.5,
      maxEnergy: 0.75,
      energyStd: 0.25,
      beatCount: 0,
      sectionCount: 0,
      dropCount: 2,
    })
  })
})
