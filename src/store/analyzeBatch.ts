import type { BatchReport, SetList, TrackFeatureSet, TrackSummary } from '../types';
import { createSetList, type SetListOptions } from '../planning/SetListBuilder';
import { ExtractionError, InvalidInputError } from '../utils/errors';
import { formatKey } from '../utils/keys';
import { requireTracks, type LibraryStore } from './libraryStore';

export type FeatureExtractor = (reference: string) => Promise<TrackFeatureSet>;

export interface AnalyzeBatchOptions {
  logger?: Pick<Console, 'log' | 'warn'>;
}

const baseName = (reference: string): string => reference.split(/[\\/]/).pop() ?? reference;

/**
 * Extract features for every reference, one at a time.
 *
 * A track that fails extraction or validation is reported and skipped; the
 * rest of the batch carries on. Anything else is a bug and propagates.
 */
export const analyzeBatch = async (
  references: readonly string[],
  extractFeatures: FeatureExtractor,
  store: LibraryStore,
  { logger = console }: AnalyzeBatchOptions = {}
): Promise<BatchReport> => {
  const report: BatchReport = { succeeded: [], failed: [], entries: [] };
  const { getState } = store;

  for (const [i, reference] of references.entries()) {
    if (getState().getFeatures(reference)) {
      report.succeeded.push(reference);
      report.entries.push({ reference, ok: true });
      continue;
    }

    logger.log(`[analyzeBatch] Analyzing ${i + 1}/${references.length}: ${baseName(reference)}`);

    try {
      const features = await extractFeatures(reference);
      getState().cacheFeatures(features);
      report.succeeded.push(reference);
      report.entries.push({ reference, ok: true });
    } catch (error) {
      if (!(error instanceof ExtractionError || error instanceof InvalidInputError)) {
        throw error;
      }
      logger.warn(`[analyzeBatch] Error analyzing ${reference}: ${error.message}`);
      getState().recordFailure(reference, error);
      report.failed.push(reference);
      report.entries.push({ reference, ok: false, error });
    }
  }

  logger.log(
    `[analyzeBatch] Analysis complete: ${report.succeeded.length} succeeded, ${report.failed.length} failed`
  );
  return report;
};

/**
 * One summary row per analysed track
 */
export const summarizeTrack = (features: TrackFeatureSet): TrackSummary => ({
  reference: features.reference,
  fileName: baseName(features.reference),
  duration: features.duration,
  bpm: features.tempo.bpm,
  bpmConfidence: features.tempo.confidence,
  key: formatKey(features.key),
  keyConfidence: features.key.confidence,
  meanEnergy: features.energy.mean,
  maxEnergy: features.energy.max,
  energyStd: features.energy.std,
  beatCount: features.beats.length,
  sectionCount: features.sections.length,
  dropCount: features.drops.length,
});

export const summarizeLibrary = (store: LibraryStore): TrackSummary[] =>
  requireTracks(store).map(summarizeTrack);

/**
 * Set list from everything analysed so far
 */
export const planLibrarySet = (store: LibraryStore, options: SetListOptions = {}): SetList =>
  createSetList(requireTracks(store), options);
