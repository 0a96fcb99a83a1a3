/**
 * CuePointDetector - Ranks a track's onsets as candidate cue points
 *
 * 1. Pair each onset with its nearest beat
 * 2. Classify: BeatSync (on the grid), StrongOnset (top 20% strength), Onset
 * 3. Rank by strength, strongest first
 * 4. Keep a cue only if it is more than 2 s from every cue already kept
 *    (rejected cues are dropped, never merged)
 * 5. Return at most 20
 *
 * Onset sensitivity is applied upstream by the feature service; this stage
 * only sees the onsets that survived it.
 */

import type { CueCategory, CuePoint, TimedStrength } from '../types';
import { DEFAULT_MIX_POLICY, type CuePolicy } from '../config';
import { percentile } from '../utils/stats';

/**
 * Nearest beat by absolute time distance; the earlier beat wins a tie
 */
export const findNearestBeat = (
  time: number,
  beats: readonly TimedStrength[]
): { beat: number; distance: number } | null => {
  let best: { beat: number; distance: number } | null = null;
  for (const { time: beat } of beats) {
    const distance = Math.abs(time - beat);
    if (!best || distance < best.distance) {
      best = { beat, distance };
    }
  }
  return best;
};

export const classifyOnset = (
  strength: number,
  beatDistance: number | null,
  strongThreshold: number,
  policy: CuePolicy = DEFAULT_MIX_POLICY.cues
): CueCategory => {
  if (beatDistance !== null && beatDistance < policy.beatSyncWindow) return 'BeatSync';
  if (strength > strongThreshold) return 'StrongOnset';
  return 'Onset';
};

/**
 * Greedy min-distance filter over an already ranked list
 */
export const spaceCuePoints = (ranked: readonly CuePoint[], minSpacing: number): CuePoint[] => {
  const kept: CuePoint[] = [];
  for (const cue of ranked) {
    if (kept.every((existing) => Math.abs(cue.time - existing.time) > minSpacing)) {
      kept.push(cue);
    }
  }
  return kept;
};

export const detectCuePoints = (
  onsets: readonly TimedStrength[],
  beats: readonly TimedStrength[],
  policy: CuePolicy = DEFAULT_MIX_POLICY.cues
): CuePoint[] => {
  if (onsets.length === 0) return [];

  const strongThreshold = percentile(
    onsets.map((o) => o.strength),
    policy.strongOnsetPercentile
  );

  const candidates: CuePoint[] = onsets.map((onset) => {
    const nearest = findNearestBeat(onset.time, beats);
    const beatDistance = nearest ? nearest.distance : null;
    return {
      time: onset.time,
      category: classifyOnset(onset.strength, beatDistance, strongThreshold, policy),
      strength: onset.strength,
      nearestBeat: nearest ? nearest.beat : null,
      beatDistance,
    };
  });

  // Array.prototype.sort is stable: equal strengths keep time order
  candidates.sort((a, b) => b.strength - a.strength);

  return spaceCuePoints(candidates, policy.minSpacing).slice(0, policy.limit);
};
