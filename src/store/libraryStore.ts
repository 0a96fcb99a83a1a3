import { createStore } from 'zustand/vanilla';
import type { BatchEntry, TrackFeatureSet } from '../types';
import { EmptyInputError } from '../utils/errors';

/**
 * Analysed tracks for one session. Each caller creates its own store;
 * the planning core never sees it, only the tracks taken out of it.
 */
interface LibraryState {
  featureCache: Map<string, TrackFeatureSet>;
  references: string[]; // analysis order
  report: BatchEntry[];
}

interface LibraryActions {
  cacheFeatures: (features: TrackFeatureSet) => void;
  recordFailure: (reference: string, error: Error) => void;
  getFeatures: (reference: string) => TrackFeatureSet | undefined;
  getTracks: () => TrackFeatureSet[];
  clear: () => void;
}

export type LibraryStoreState = LibraryState & LibraryActions;

const initialState = (): LibraryState => ({
  featureCache: new Map(),
  references: [],
  report: [],
});

export const createLibraryStore = () =>
  createStore<LibraryStoreState>()((set, get) => ({
    ...initialState(),

    cacheFeatures: (features) =>
      set((state) => {
        const featureCache = new Map(state.featureCache);
        featureCache.set(features.reference, features);
        const references = state.references.includes(features.reference)
          ? state.references
          : [...state.references, features.reference];
        return {
          featureCache,
          references,
          report: [...state.report, { reference: features.reference, ok: true }],
        };
      }),

    recordFailure: (reference, error) =>
      set((state) => ({
        report: [...state.report, { reference, ok: false, error }],
      })),

    getFeatures: (reference) => get().featureCache.get(reference),

    getTracks: () => {
      const { featureCache, references } = get();
      return references.flatMap((reference) => {
        const features = featureCache.get(reference);
        return features ? [features] : [];
      });
    },

    clear: () => set(initialState()),
  }));

export type LibraryStore = ReturnType<typeof createLibraryStore>;

/**
 * Tracks in analysis order; planning without any is an error at this layer
 */
export const requireTracks = (store: LibraryStore): TrackFeatureSet[] => {
  const tracks = store.getState().getTracks();
  if (tracks.length === 0) {
    throw new EmptyInputError();
  }
  return tracks;
};
