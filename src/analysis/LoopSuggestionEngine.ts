/**
 * LoopSuggestionEngine - Suggests stable, non-overlapping loop spans
 *
 * Two candidate pools:
 * - Sections whose length falls inside [minDuration, maxDuration]
 * - Beat spans of exactly 4, 8, 16 or 32 beats inside the same bounds
 *
 * Candidates are ranked by energy stability (1 - coefficient of variation, floored at 0)
 * and accepted greedily when they do not intersect an accepted loop.
 */

import type { EnergySample, LoopCandidate, Section, TimedStrength } from '../types';
import { DEFAULT_MIX_POLICY, type LoopPolicy } from '../config';
import { energyInSpan, energyStability, mean } from '../utils/stats';
import { assertDurationBounds } from '../utils/validation';

export interface LoopBounds {
  minDuration: number;
  maxDuration: number;
}

const withinBounds = (duration: number, { minDuration, maxDuration }: LoopBounds): boolean =>
  duration >= minDuration && duration <= maxDuration;

const measureSpan = (
  energy: readonly EnergySample[],
  start: number,
  end: number
): Pick<LoopCandidate, 'energyStability' | 'meanEnergy'> => {
  const values = energyInSpan(energy, start, end);
  return { energyStability: energyStability(values), meanEnergy: mean(values) };
};

export const sectionLoopCandidates = (
  sections: readonly Section[],
  energy: readonly EnergySample[],
  bounds: LoopBounds
): LoopCandidate[] =>
  sections
    .filter((section) => withinBounds(section.end - section.start, bounds))
    .map((section): LoopCandidate => ({
      start: section.start,
      end: section.end,
      duration: section.end - section.start,
      source: { kind: 'section', label: section.label },
      label: `Section: ${section.label}`,
      ...measureSpan(energy, section.start, section.end),
    }));

/**
 * Only spans whose beat count is a phrase length can qualify, so instead of
 * every (i, j) pair this visits j = i + n for each phrase length n. The
 * candidates and their order are the same as the full pairwise scan.
 */
export const beatLoopCandidates = (
  beats: readonly TimedStrength[],
  energy: readonly EnergySample[],
  bounds: LoopBounds,
  phraseLengths: readonly number[] = DEFAULT_MIX_POLICY.loops.phraseLengths
): LoopCandidate[] => {
  const lengths = [...phraseLengths].sort((a, b) => a - b);
  const candidates: LoopCandidate[] = [];

  for (let i = 0; i < beats.length - 1; i++) {
    for (const beatCount of lengths) {
      const j = i + beatCount;
      if (j >= beats.length) break;

      const start = beats[i].time;
      const end = beats[j].time;
      const duration = end - start;
      if (!withinBounds(duration, bounds)) continue;

      candidates.push({
        start,
        end,
        duration,
        source: { kind: 'beats', beatCount },
        label: `Beat Loop: ${beatCount} beats`,
        ...measureSpan(energy, start, end),
      });
    }
  }

  return candidates;
};

const overlaps = (a: LoopCandidate, b: LoopCandidate): boolean =>
  a.start < b.end && a.end > b.start;

/**
 * Greedy interval selection over a ranked list
 */
export const selectNonOverlapping = (
  ranked: readonly LoopCandidate[],
  limit: number
): LoopCandidate[] => {
  const accepted: LoopCandidate[] = [];
  for (const candidate of ranked) {
    if (accepted.length >= limit) break;
    if (!accepted.some((existing) => overlaps(candidate, existing))) {
      accepted.push(candidate);
    }
  }
  return accepted;
};

export const suggestLoops = (
  input: {
    sections: readonly Section[];
    beats: readonly TimedStrength[];
    energy: readonly EnergySample[];
  },
  bounds: Partial<LoopBounds> = {},
  policy: LoopPolicy = DEFAULT_MIX_POLICY.loops
): LoopCandidate[] => {
  const resolved: LoopBounds = {
    minDuration: bounds.minDuration ?? policy.minDuration,
    maxDuration: bounds.maxDuration ?? policy.maxDuration,
  };
  assertDurationBounds(resolved.minDuration, resolved.maxDuration);

  const pool = [
    ...sectionLoopCandidates(input.sections, input.energy, resolved),
    ...beatLoopCandidates(input.beats, input.energy, resolved, policy.phraseLengths),
  ];
  // Silent spans go last, even behind live spans at the 0 floor
  pool.sort(
    (a, b) =>
      b.energyStability - a.energyStability || Number(b.meanEnergy > 0) - Number(a.meanEnergy > 0)
  );

  return selectNonOverlapping(pool, policy.limit);
};
