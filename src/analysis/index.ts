import type { CuePoint, LoopCandidate, PerformanceZones, TrackFeatureSet } from '../types';
import { DEFAULT_MIX_POLICY, type MixPolicy } from '../config';
import { detectCuePoints } from './CuePointDetector';
import { suggestLoops, type LoopBounds } from './LoopSuggestionEngine';
import { segmentPerformanceZones } from './PerformanceZoneSegmenter';

export {
  detectCuePoints,
  findNearestBeat,
  classifyOnset,
  spaceCuePoints,
} from './CuePointDetector';
export {
  suggestLoops,
  sectionLoopCandidates,
  beatLoopCandidates,
  selectNonOverlapping,
} from './LoopSuggestionEngine';
export type { LoopBounds } from './LoopSuggestionEngine';
export {
  segmentPerformanceZones,
  zoneForStart,
  createEmptyZones,
  ZONE_IDS,
} from './PerformanceZoneSegmenter';
export {
  rollingMean,
  findExitPoints,
  findEntryPoints,
  findMixPoints,
  findEnergyPeak,
  calculateTempoMatch,
  suggestMixPoints,
  mixingTips,
} from './TransitionPlanner';

export interface TrackAnnotations {
  cuePoints: CuePoint[];
  loops: LoopCandidate[];
  zones: PerformanceZones;
}

/**
 * All per-track annotations at once. Tracks are independent of each other,
 * so a batch may annotate them in any order.
 */
export const annotateTrack = (
  track: TrackFeatureSet,
  options: { loopBounds?: Partial<LoopBounds>; policy?: MixPolicy } = {}
): TrackAnnotations => {
  const policy = options.policy ?? DEFAULT_MIX_POLICY;
  return {
    cuePoints: detectCuePoints(track.onsets, track.beats, policy.cues),
    loops: suggestLoops(
      { sections: track.sections, beats: track.beats, energy: track.energy.samples },
      options.loopBounds,
      policy.loops
    ),
    zones: segmentPerformanceZones(
      { sections: track.sections, energy: track.energy.samples, duration: track.duration },
      policy.zones
    ),
  };
};
