/**
 * Mixing decisions for DJ sets.
 *
 * The core (compatibility, planning, analysis) is pure and synchronous over
 * immutable TrackFeatureSets. The feature client and the library store are
 * the collaborators around it that fetch and hold those feature sets.
 */

export type * from './types';

export { DEFAULT_MIX_POLICY, resolvePolicy } from './config';
export type {
  MixPolicy,
  MixPolicyOverrides,
  CompatibilityPolicy,
  CuePolicy,
  LoopPolicy,
  ZonePolicy,
  TransitionPolicy,
} from './config';

// Errors
export {
  MixEngineError,
  InvalidInputError,
  EmptyInputError,
  ExtractionError,
  isMixEngineError,
} from './utils/errors';

// Compatibility
export {
  calculateTempoCompatibility,
  calculateKeyCompatibility,
  calculateEnergyCompatibility,
  describeCompatibility,
  createCompatibilityScorer,
  scoreCompatibility,
  buildCompatibilityMatrix,
  listPairScores,
} from './utils/compatibility';
export {
  parseKey,
  parseRoot,
  formatKey,
  shortKeyName,
  toCamelot,
  getCompatibleRoots,
  describeCompatibleKeys,
  NOTE_NAMES,
} from './utils/keys';
export { validateTrackFeatures } from './utils/validation';
export { generateDjNotes, energyLevel } from './utils/djNotes';

// Per-track analysis and transitions
export * from './analysis';

// Set planning
export * from './planning';

// Collaborators
export {
  createFeatureClient,
  normalizeFeaturePayload,
  DEFAULT_ONSET_SENSITIVITY,
} from './api/featureClient';
export type { FeatureClient, FeatureClientOptions, FeaturePayload } from './api/featureClient';
export { createLibraryStore, requireTracks } from './store/libraryStore';
export type { LibraryStore, LibraryStoreState } from './store/libraryStore';
export { analyzeBatch, summarizeTrack, summarizeLibrary, planLibrarySet } from './store/analyzeBatch';
export type { FeatureExtractor, AnalyzeBatchOptions } from './store/analyzeBatch';
