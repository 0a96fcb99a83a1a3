/**
 * Mix policy - the heuristic constants every decision depends on.
 *
 * These values are policy, not derived from anything: changing one changes
 * observable results (cue spacing, zone boundaries, scoring weights).
 * Callers override them with `resolvePolicy`, never by mutating the defaults.
 */

export interface CompatibilityPolicy {
  weights: { tempo: number; key: number; energy: number };
  tempoPenaltyPerBpm: number; // score lost per BPM of difference
  keyScores: { identical: number; sameRoot: number; other: number };
}

export interface CuePolicy {
  beatSyncWindow: number; // seconds
  strongOnsetPercentile: number; // 0-100
  minSpacing: number; // seconds between kept cues
  limit: number;
}

export interface LoopPolicy {
  phraseLengths: readonly number[]; // beats
  limit: number;
  minDuration: number; // seconds
  maxDuration: number;
}

export interface ZonePolicy {
  // Fractions of track duration where build, drop, breakdown and outro begin
  buildStart: number;
  dropStart: number;
  breakdownStart: number;
  outroStart: number;
}

export interface TransitionPolicy {
  rollingWindow: number; // energy samples
  exitThreshold: number; // fraction of rolling mean
  entryThreshold: number;
  edgeGuard: number; // seconds kept clear at the start (exits) and end (entries)
  maxPoints: number;
  tempoSyncThreshold: number; // BPM
  maxMixDuration: number; // seconds
  mixDurationFraction: number; // of the outgoing track's duration
  maxTempoAdjustment: number; // 0.08 = 8%
}

export interface MixPolicy {
  compatibility: CompatibilityPolicy;
  cues: CuePolicy;
  loops: LoopPolicy;
  zones: ZonePolicy;
  transitions: TransitionPolicy;
}

export type MixPolicyOverrides = {
  [K in keyof MixPolicy]?: Partial<MixPolicy[K]>;
};

export const DEFAULT_MIX_POLICY: Readonly<MixPolicy> = Object.freeze({
  compatibility: {
    weights: { tempo: 0.4, key: 0.3, energy: 0.3 },
    tempoPenaltyPerBpm: 2,
    keyScores: { identical: 100, sameRoot: 80, other: 50 },
  },
  cues: {
    beatSyncWindow: 0.1,
    strongOnsetPercentile: 80,
    minSpacing: 2.0,
    limit: 20,
  },
  loops: {
    phraseLengths: [4, 8, 16, 32],
    limit: 10,
    minDuration: 4.0,
    maxDuration: 16.0,
  },
  zones: {
    buildStart: 0.2,
    dropStart: 0.4,
    breakdownStart: 0.7,
    outroStart: 0.9,
  },
  transitions: {
    rollingWindow: 20,
    exitThreshold: 0.8,
    entryThreshold: 1.2,
    edgeGuard: 30,
    maxPoints: 5,
    tempoSyncThreshold: 5,
    maxMixDuration: 16,
    mixDurationFraction: 0.1,
    maxTempoAdjustment: 0.08,
  },
});

/**
 * Merge overrides onto the defaults, one level deep.
 */
export const resolvePolicy = (
  overrides: MixPolicyOverrides = {},
  base: Readonly<MixPolicy> = DEFAULT_MIX_POLICY
): MixPolicy => ({
  compatibility: { ...base.compatibility, ...overrides.compatibility },
  cues: { ...base.cues, ...overrides.cues },
  loops: { ...base.loops, ...overrides.loops },
  zones: { ...base.zones, ...overrides.zones },
  transitions: { ...base.transitions, ...overrides.transitions },
});
