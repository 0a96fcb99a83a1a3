/**
 * SequencePlanner - Orders tracks for a set
 *
 * Two independent strategies:
 * - Energy curves (build, wave, peak_middle, constant), optionally refined
 *   by key and tempo passes applied in the order the caller lists them
 * - A greedy walk over the compatibility graph
 *
 * Zero tracks give an empty sequence, never an error.
 */

import type {
  CompatibilitySequence,
  EnergyCurve,
  RefinementPass,
  ScoreMatrix,
  TrackFeatureSet,
} from '../types';
import { buildCompatibilityMatrix, edgeScore } from '../utils/compatibility';
import { getCompatibleRoots } from '../utils/keys';
import { median } from '../utils/stats';

const byEnergyAscending = (a: TrackFeatureSet, b: TrackFeatureSet): number =>
  a.energy.mean - b.energy.mean;

const byEnergyDescending = (a: TrackFeatureSet, b: TrackFeatureSet): number =>
  b.energy.mean - a.energy.mean;

/**
 * Split at the median mean energy: strictly above goes high (loudest
 * first), the rest goes low (quietest first). Pairs are interleaved
 * high/low; whatever is left of the high tail, then the low tail, follows.
 */
export const orderWave = (tracks: readonly TrackFeatureSet[]): TrackFeatureSet[] => {
  const cut = median(tracks.map((t) => t.energy.mean));
  const high = tracks.filter((t) => t.energy.mean > cut).sort(byEnergyDescending);
  const low = tracks.filter((t) => t.energy.mean <= cut).sort(byEnergyAscending);

  const pairs = Math.min(high.length, low.length);
  const order: TrackFeatureSet[] = [];
  for (let i = 0; i < pairs; i++) {
    order.push(high[i], low[i]);
  }
  return [...order, ...high.slice(pairs), ...low.slice(pairs)];
};

/**
 * Quietest half rising, then the rest falling: one peak in the middle
 */
export const orderPeakMiddle = (tracks: readonly TrackFeatureSet[]): TrackFeatureSet[] => {
  const sorted = [...tracks].sort(byEnergyAscending);
  const midPoint = Math.floor(sorted.length / 2);
  return [...sorted.slice(0, midPoint), ...sorted.slice(midPoint).sort(byEnergyDescending)];
};

/**
 * Reorder by an energy curve. Unknown curve names keep the input order.
 */
export const orderByEnergyCurve = (
  tracks: readonly TrackFeatureSet[],
  curve: EnergyCurve | string
): TrackFeatureSet[] => {
  switch (curve) {
    case 'build':
    case 'build_up':
      return [...tracks].sort(byEnergyAscending);
    case 'wave':
      return orderWave(tracks);
    case 'peak_middle':
      return orderPeakMiddle(tracks);
    default:
      return [...tracks];
  }
};

/**
 * Walk from the first track, each time taking the first remaining track
 * whose root note is compatible with the current one, or simply the first
 * remaining track when none is.
 */
export const optimizeKeyTransitions = (
  tracks: readonly TrackFeatureSet[]
): TrackFeatureSet[] => {
  if (tracks.length < 2) return [...tracks];

  const remaining = [...tracks];
  let current = remaining.shift();
  const order: TrackFeatureSet[] = [];

  while (current) {
    order.push(current);
    const compatible = getCompatibleRoots(current.key.root);
    const nextIndex = remaining.findIndex((t) => compatible.includes(t.key.root));
    current = remaining.splice(nextIndex === -1 ? 0 : nextIndex, 1)[0];
  }

  return order;
};

export const optimizeTempoTransitions = (
  tracks: readonly TrackFeatureSet[]
): TrackFeatureSet[] => [...tracks].sort((a, b) => a.tempo.bpm - b.tempo.bpm);

/**
 * Apply refinement passes in exactly the given order; key-then-tempo
 * and tempo-then-key give different sequences.
 */
export const refineOrder = (
  tracks: readonly TrackFeatureSet[],
  passes: readonly RefinementPass[]
): TrackFeatureSet[] =>
  passes.reduce<TrackFeatureSet[]>(
    (order, pass) =>
      pass === 'key' ? optimizeKeyTransitions(order) : optimizeTempoTransitions(order),
    [...tracks]
  );

export const DEFAULT_REFINEMENT_PASSES: readonly RefinementPass[] = ['key', 'tempo'];

export interface PlaylistOrderOptions {
  energyCurve?: EnergyCurve | string;
  passes?: readonly RefinementPass[];
}

/**
 * Suggest a playlist order: energy curve first, then the refinement passes
 */
export const suggestPlaylistOrder = (
  tracks: readonly TrackFeatureSet[],
  { energyCurve = 'build', passes = DEFAULT_REFINEMENT_PASSES }: PlaylistOrderOptions = {}
): TrackFeatureSet[] => refineOrder(orderByEnergyCurve(tracks, energyCurve), passes);

/**
 * Greedy nearest-neighbour walk over the compatibility graph.
 *
 * Starts at tracks[0] and always moves along the highest-scoring edge to an
 * unplaced track; ties go to the lowest original index and a missing edge
 * scores 0. This is a heuristic, not an optimal Hamiltonian path.
 */
export const sequenceByCompatibility = (
  tracks: readonly TrackFeatureSet[],
  matrix: ScoreMatrix = buildCompatibilityMatrix(tracks)
): CompatibilitySequence => {
  if (tracks.length === 0) return { tracks: [], transitionScores: [], averageScore: 0 };
  if (tracks.length === 1) return { tracks: [tracks[0]], transitionScores: [], averageScore: 100 };

  // Original indices, kept in ascending order so a strict '>' breaks ties low
  const remaining = tracks.map((_, i) => i).slice(1);
  const order: number[] = [0];
  const transitionScores: number[] = [];
  let current = 0;

  // Greedily select best next track
  while (remaining.length > 0) {
    let bestPosition = 0;
    let bestScore = -Infinity;

    for (let p = 0; p < remaining.length; p++) {
      const score = edgeScore(matrix, current, remaining[p]);
      if (score > bestScore) {
        bestScore = score;
        bestPosition = p;
      }
    }

    current = remaining.splice(bestPosition, 1)[0];
    order.push(current);
    transitionScores.push(bestScore);
  }

  const total = transitionScores.reduce((sum, s) => sum + s, 0);

  return {
    tracks: order.map((i) => tracks[i]),
    transitionScores,
    averageScore: total / transitionScores.length,
  };
};
