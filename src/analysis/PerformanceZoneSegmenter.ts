/**
 * PerformanceZoneSegmenter - Buckets sections into five performance zones
 *
 * A section belongs to the zone whose window contains its start time:
 * intro [0, 0.2), build [0.2, 0.4), drop [0.4, 0.7), breakdown [0.7, 0.9),
 * outro [0.9, 1.0] of the track's duration. Each zone keeps its
 * highest-energy section.
 *
 * This is position-based: "drop" means a section in the middle of the
 * track, not an acoustically detected bass drop.
 */

import type { EnergySample, PerformanceZone, PerformanceZones, Section, ZoneId } from '../types';
import { DEFAULT_MIX_POLICY, type ZonePolicy } from '../config';
import { energyInSpan, mean, standardDeviation } from '../utils/stats';

export const ZONE_IDS: readonly ZoneId[] = ['intro', 'build', 'drop', 'breakdown', 'outro'];

const emptyZone = (): PerformanceZone => ({ start: 0, end: 0, energy: 0, complexity: 0 });

export const createEmptyZones = (): PerformanceZones => ({
  intro: emptyZone(),
  build: emptyZone(),
  drop: emptyZone(),
  breakdown: emptyZone(),
  outro: emptyZone(),
});

export const zoneForStart = (
  start: number,
  duration: number,
  policy: ZonePolicy = DEFAULT_MIX_POLICY.zones
): ZoneId => {
  if (start < duration * policy.buildStart) return 'intro';
  if (start < duration * policy.dropStart) return 'build';
  if (start < duration * policy.breakdownStart) return 'drop';
  if (start < duration * policy.outroStart) return 'breakdown';
  return 'outro';
};

export const segmentPerformanceZones = (
  input: {
    sections: readonly Section[];
    energy: readonly EnergySample[];
    duration: number;
  },
  policy: ZonePolicy = DEFAULT_MIX_POLICY.zones
): PerformanceZones => {
  const zones = createEmptyZones();

  for (const section of input.sections) {
    const values = energyInSpan(input.energy, section.start, section.end);
    const energy = mean(values);
    const zone = zoneForStart(section.start, input.duration, policy);

    // Strictly greater: the earlier section keeps a tie, silent sections never win
    if (energy > zones[zone].energy) {
      zones[zone] = {
        start: section.start,
        end: section.end,
        energy,
        complexity: standardDeviation(values),
      };
    }
  }

  return zones;
};
