// Feature Types (produced by the feature-extraction service)
export type NoteName =
  | 'C'
  | 'C#'
  | 'D'
  | 'D#'
  | 'E'
  | 'F'
  | 'F#'
  | 'G'
  | 'G#'
  | 'A'
  | 'A#'
  | 'B';

export type KeyMode = 'major' | 'minor';

export interface MusicalKey {
  root: NoteName;
  mode: KeyMode;
}

export interface TimedStrength {
  time: number; // seconds
  strength: number;
}

export interface EnergySample {
  time: number; // seconds, strictly increasing
  rms: number;
}

export interface EnergyProfile {
  samples: readonly EnergySample[];
  mean: number;
  max: number;
  std: number;
}

export interface Section {
  label: string; // e.g. "Intro", "Chorus", "Section 7"
  start: number;
  end: number;
}

export interface TrackFeatureSet {
  reference: string; // path or id
  duration: number; // seconds
  tempo: { bpm: number; confidence: number };
  key: MusicalKey & { confidence: number };
  energy: EnergyProfile;
  beats: readonly TimedStrength[];
  sections: readonly Section[];
  onsets: readonly TimedStrength[];
  drops: readonly number[]; // timestamps of energy breakdowns
}

// Compatibility
export interface CompatibilityScore {
  from: string;
  to: string;
  tempo: number; // 0-100
  key: number; // 0-100
  energy: number; // 0-100
  overall: number; // 0-100
  tempoDifference: number; // |ΔBPM|
  recommendation: string;
}

export type CompatibilityScorer = (a: TrackFeatureSet, b: TrackFeatureSet) => CompatibilityScore;

/** Directed overall scores; `matrix[i][j]` scores a transition from track i into track j. */
export type ScoreMatrix = ReadonlyArray<ReadonlyArray<number | null | undefined>>;

// Cue Points
export type CueCategory = 'BeatSync' | 'StrongOnset' | 'Onset';

export interface CuePoint {
  time: number;
  category: CueCategory;
  strength: number;
  nearestBeat: number | null; // null when the track has no beat grid
  beatDistance: number | null;
}

// Loops
export type LoopSource =
  | { kind: 'section'; label: string }
  | { kind: 'beats'; beatCount: number };

export interface LoopCandidate {
  start: number;
  end: number;
  duration: number;
  source: LoopSource;
  label: string; // "Section: Chorus", "Beat Loop: 8 beats"
  energyStability: number;
  meanEnergy: number;
}

// Performance Zones
export type ZoneId = 'intro' | 'build' | 'drop' | 'breakdown' | 'outro';

export interface PerformanceZone {
  start: number;
  end: number;
  energy: number;
  complexity: number; // energy standard deviation
}

export type PerformanceZones = Record<ZoneId, PerformanceZone>;

// Sequencing
export type EnergyCurve = 'build' | 'build_up' | 'wave' | 'peak_middle' | 'constant';

export type RefinementPass = 'key' | 'tempo';

export interface CompatibilitySequence {
  tracks: TrackFeatureSet[];
  transitionScores: number[]; // score of the edge into tracks[i + 1]
  averageScore: number;
}

export interface SetList {
  tracks: TrackFeatureSet[];
  totalDuration: number; // seconds
}

// Transitions
export type TempoRelation = 'same' | 'double' | 'half';

export interface TempoMatch {
  required: boolean; // tempo gap above the sync threshold
  relation: TempoRelation | null; // null when no relation fits the adjustment limit
  rate: number; // playback rate applied to the incoming track
  targetBpm: number; // incoming tempo at that rate
}

export interface MixSuggestion {
  exitPoints: number[]; // in the outgoing track
  entryPoints: number[]; // in the incoming track
  recommendedMixDuration: number; // seconds
  tempoSyncRequired: boolean;
  tempoMatch: TempoMatch;
}

// Library
export interface TrackSummary {
  reference: string;
  fileName: string;
  duration: number;
  bpm: number;
  bpmConfidence: number;
  key: string;
  keyConfidence: number;
  meanEnergy: number;
  maxEnergy: number;
  energyStd: number;
  beatCount: number;
  sectionCount: number;
  dropCount: number;
}

export type BatchEntry =
  | { reference: string; ok: true }
  | { reference: string; ok: false; error: Error };

export interface BatchReport {
  succeeded: string[];
  failed: string[];
  entries: BatchEntry[];
}
