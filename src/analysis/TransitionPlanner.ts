/**
 * TransitionPlanner - Finds where to leave one track and enter the next
 *
 * Key mixing principles:
 * - Leave the outgoing track in an energy valley (well after its intro)
 * - Enter the incoming track on an energy peak (well before its outro)
 * - Keep the blend short: at most 16 s or 10% of the outgoing track
 * - Sync tempo when the BPMs are more than 5 apart
 */

import type {
  CompatibilityScore,
  MixSuggestion,
  TempoMatch,
  TempoRelation,
  TrackFeatureSet,
} from '../types';
import { DEFAULT_MIX_POLICY, type TransitionPolicy } from '../config';

/**
 * Centred moving average with zero padding; output has the input's length.
 * For an even window the extra sample is taken from the left.
 */
export const rollingMean = (values: readonly number[], window: number): number[] => {
  const offset = (window - 1) >> 1;
  return values.map((_, k) => {
    const from = Math.max(0, k + offset - (window - 1));
    const to = Math.min(values.length - 1, k + offset);
    let sum = 0;
    for (let i = from; i <= to; i++) sum += values[i];
    return sum / window;
  });
};

/**
 * Energy valleys after the intro guard: good places to start leaving a track
 */
export const findExitPoints = (
  track: TrackFeatureSet,
  policy: TransitionPolicy = DEFAULT_MIX_POLICY.transitions
): number[] => {
  const samples = track.energy.samples;
  const averages = rollingMean(samples.map((s) => s.rms), policy.rollingWindow);
  return samples
    .filter((s, i) => s.rms < averages[i] * policy.exitThreshold && s.time > policy.edgeGuard)
    .map((s) => s.time)
    .slice(0, policy.maxPoints);
};

/**
 * Energy peaks before the outro guard: good places to bring a track in
 */
export const findEntryPoints = (
  track: TrackFeatureSet,
  policy: TransitionPolicy = DEFAULT_MIX_POLICY.transitions
): number[] => {
  const samples = track.energy.samples;
  const averages = rollingMean(samples.map((s) => s.rms), policy.rollingWindow);
  const latest = track.duration - policy.edgeGuard;
  return samples
    .filter((s, i) => s.rms > averages[i] * policy.entryThreshold && s.time < latest)
    .map((s) => s.time)
    .slice(0, policy.maxPoints);
};

export const findMixPoints = (
  track: TrackFeatureSet,
  policy: TransitionPolicy = DEFAULT_MIX_POLICY.transitions
): number[] => findExitPoints(track, policy).slice(0, 3);

/**
 * Time of the loudest energy sample
 */
export const findEnergyPeak = (track: TrackFeatureSet): number | null => {
  let peak: { time: number; rms: number } | null = null;
  for (const sample of track.energy.samples) {
    if (!peak || sample.rms > peak.rms) peak = sample;
  }
  return peak ? peak.time : null;
};

// An incoming beat heard as one, two or half an outgoing beat
const TEMPO_RELATIONS: readonly { relation: TempoRelation; multiple: number }[] = [
  { relation: 'same', multiple: 1 },
  { relation: 'double', multiple: 2 },
  { relation: 'half', multiple: 0.5 },
];

/**
 * Playback rate that puts the incoming track on the outgoing track's grid.
 *
 * Within the sync threshold the incoming track plays as is. Beyond it, the
 * relation needing the smallest rate change inside maxTempoAdjustment wins;
 * when none fits, the track plays as is and `relation` is null.
 */
export const calculateTempoMatch = (
  outgoing: TrackFeatureSet,
  incoming: TrackFeatureSet,
  policy: TransitionPolicy = DEFAULT_MIX_POLICY.transitions
): TempoMatch => {
  const from = outgoing.tempo.bpm;
  const to = incoming.tempo.bpm;
  const required = Math.abs(from - to) > policy.tempoSyncThreshold;
  if (!required) {
    return { required, relation: 'same', rate: 1, targetBpm: to };
  }

  let best: { relation: TempoRelation; rate: number } | null = null;
  for (const { relation, multiple } of TEMPO_RELATIONS) {
    const rate = from / (to * multiple);
    const change = Math.abs(rate - 1);
    if (change <= policy.maxTempoAdjustment && (!best || change < Math.abs(best.rate - 1))) {
      best = { relation, rate };
    }
  }

  if (!best) {
    return { required, relation: null, rate: 1, targetBpm: to };
  }
  return { required, relation: best.relation, rate: best.rate, targetBpm: to * best.rate };
};

export const suggestMixPoints = (
  outgoing: TrackFeatureSet,
  incoming: TrackFeatureSet,
  policy: TransitionPolicy = DEFAULT_MIX_POLICY.transitions
): MixSuggestion => {
  const tempoMatch = calculateTempoMatch(outgoing, incoming, policy);
  return {
    exitPoints: findExitPoints(outgoing, policy),
    entryPoints: findEntryPoints(incoming, policy),
    recommendedMixDuration: Math.min(
      policy.maxMixDuration,
      outgoing.duration * policy.mixDurationFraction
    ),
    tempoSyncRequired: tempoMatch.required,
    tempoMatch,
  };
};

/**
 * Mixing strategy for a scored pair
 */
export const mixingTips = (
  score: CompatibilityScore,
  outgoing: TrackFeatureSet,
  incoming: TrackFeatureSet
): string[] => {
  const tips: string[] = [];

  if (score.tempoDifference > 10) {
    tips.push('Use pitch shifting to match BPMs');
    tips.push('Consider using sync features on your DJ equipment');
  } else if (score.tempoDifference > 5) {
    tips.push('Use tempo adjustment for smooth transition');
    tips.push('Monitor BPM drift during the mix');
  } else {
    tips.push('BPMs are well-matched for natural mixing');
  }

  if (score.key < 70) {
    tips.push('Consider harmonic mixing techniques');
    tips.push('Use key detection to find compatible sections');
  }

  if (Math.abs(outgoing.energy.mean - incoming.energy.mean) > 0.1) {
    tips.push('Use EQ to balance energy levels');
    tips.push('Consider using filters during transition');
  }

  return tips;
};
