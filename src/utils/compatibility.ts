/**
 * Compatibility Scoring - Calculates mix compatibility between tracks
 *
 * Factors considered:
 * 1. Tempo closeness: every BPM of difference costs 2 points
 * 2. Key match: identical key, same root in another mode, anything else
 * 3. Energy continuity: relative difference of mean RMS energy
 *
 * The key score is a deliberately coarse heuristic, not harmonic-mixing
 * theory; see utils/keys for the Camelot helpers.
 *
 * Every function here is pure, so scores may be memoized per ordered pair.
 */

import type {
  CompatibilityScore,
  CompatibilityScorer,
  MusicalKey,
  ScoreMatrix,
  TrackFeatureSet,
} from '../types';
import { DEFAULT_MIX_POLICY, type CompatibilityPolicy, type MixPolicy } from '../config';
import { clamp } from './stats';
import { assertScorable } from './validation';

/**
 * Calculate tempo compatibility score (0-100)
 *
 * A 50 BPM difference already drives the score to zero.
 */
export const calculateTempoCompatibility = (
  bpmA: number,
  bpmB: number,
  penaltyPerBpm: number = DEFAULT_MIX_POLICY.compatibility.tempoPenaltyPerBpm
): number => clamp(100 - penaltyPerBpm * Math.abs(bpmA - bpmB), 0, 100);

/**
 * Calculate key compatibility score (0-100)
 *
 * Identical key: 100
 * Same root note, different mode: 80
 * Otherwise: 50
 */
export const calculateKeyCompatibility = (
  keyA: MusicalKey,
  keyB: MusicalKey,
  scores: CompatibilityPolicy['keyScores'] = DEFAULT_MIX_POLICY.compatibility.keyScores
): number => {
  if (keyA.root === keyB.root && keyA.mode === keyB.mode) return scores.identical;
  if (keyA.root === keyB.root) return scores.sameRoot;
  return scores.other;
};

/**
 * Calculate energy compatibility score (0-100)
 *
 * The larger mean is the denominator; two silent tracks are a perfect match
 * and a non-positive denominator otherwise scores 0.
 */
export const calculateEnergyCompatibility = (meanA: number, meanB: number): number => {
  if (meanA === 0 && meanB === 0) return 100;
  const denominator = Math.max(meanA, meanB);
  if (!(denominator > 0)) return 0;
  return clamp(100 - (100 * Math.abs(meanA - meanB)) / denominator, 0, 100);
};

/**
 * Recommendation text for an overall score
 */
export const describeCompatibility = (overall: number): string => {
  if (overall >= 80) {
    return 'Excellent compatibility! These tracks should mix very well.';
  } else if (overall >= 60) {
    return 'Good compatibility. These tracks should mix well with some adjustments.';
  } else if (overall >= 40) {
    return 'Moderate compatibility. Consider tempo matching or key adjustment.';
  }
  return 'Low compatibility. These tracks may be challenging to mix.';
};

/**
 * Build a scorer bound to a policy. Callers that need different weights
 * build their own scorer instead of passing weights per call.
 */
export const createCompatibilityScorer = (
  policy: Pick<MixPolicy, 'compatibility'> = DEFAULT_MIX_POLICY
): CompatibilityScorer => {
  const { weights, tempoPenaltyPerBpm, keyScores } = policy.compatibility;

  return (trackA, trackB) => {
    assertScorable(trackA);
    assertScorable(trackB);

    const tempo = calculateTempoCompatibility(trackA.tempo.bpm, trackB.tempo.bpm, tempoPenaltyPerBpm);
    const key = calculateKeyCompatibility(trackA.key, trackB.key, keyScores);
    const energy = calculateEnergyCompatibility(trackA.energy.mean, trackB.energy.mean);
    const overall = clamp(
      tempo * weights.tempo + key * weights.key + energy * weights.energy,
      0,
      100
    );

    return {
      from: trackA.reference,
      to: trackB.reference,
      tempo,
      key,
      energy,
      overall,
      tempoDifference: Math.abs(trackA.tempo.bpm - trackB.tempo.bpm),
      recommendation: describeCompatibility(overall),
    };
  };
};

/**
 * Score a transition from trackA into trackB with the fixed weights
 * (tempo 0.4, key 0.3, energy 0.3)
 */
export const scoreCompatibility: CompatibilityScorer = createCompatibilityScorer();

/**
 * Complete directed matrix of overall scores; the diagonal is null
 */
export const buildCompatibilityMatrix = (
  tracks: readonly TrackFeatureSet[],
  scorer: CompatibilityScorer = scoreCompatibility
): (number | null)[][] =>
  tracks.map((from, i) =>
    tracks.map((to, j) => (i === j ? null : scorer(from, to).overall))
  );

/**
 * Every ordered pair's full breakdown, in row-major order
 */
export const listPairScores = (
  tracks: readonly TrackFeatureSet[],
  scorer: CompatibilityScorer = scoreCompatibility
): CompatibilityScore[] => {
  const scores: CompatibilityScore[] = [];
  tracks.forEach((from, i) => {
    tracks.forEach((to, j) => {
      if (i !== j) scores.push(scorer(from, to));
    });
  });
  return scores;
};

/**
 * Look up an edge; a missing edge counts as 0, which is still a valid score
 */
export const edgeScore = (matrix: ScoreMatrix, from: number, to: number): number =>
  matrix[from]?.[to] ?? 0;
