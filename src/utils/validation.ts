import type { TrackFeatureSet, TimedStrength } from '../types';
import { InvalidInputError } from './errors';

const requirePositive = (field: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(field, `expected a positive number, got ${value}`);
  }
};

const requireUnitInterval = (field: string, value: number): void => {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidInputError(field, `expected a value in [0, 1], got ${value}`);
  }
};

const requireNonNegative = (field: string, value: number): void => {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(field, `expected a non-negative number, got ${value}`);
  }
};

/**
 * The checks every scorer runs before touching a track: a track must have
 * a positive duration, a positive tempo and a non-negative mean energy.
 */
export const assertScorable = (track: TrackFeatureSet): void => {
  requirePositive(`${track.reference}.duration`, track.duration);
  requirePositive(`${track.reference}.tempo.bpm`, track.tempo.bpm);
  requireNonNegative(`${track.reference}.energy.mean`, track.energy.mean);
};

const checkSeries = (
  field: string,
  series: readonly { time: number }[],
  duration: number,
  strict: boolean
): void => {
  let previous = -Infinity;
  series.forEach((point, i) => {
    if (!Number.isFinite(point.time) || point.time < 0 || point.time > duration) {
      throw new InvalidInputError(`${field}[${i}]`, `time ${point.time} outside [0, ${duration}]`);
    }
    if (strict ? point.time <= previous : point.time < previous) {
      throw new InvalidInputError(`${field}[${i}]`, 'timestamps must be in time order');
    }
    previous = point.time;
  });
};

const checkStrengths = (field: string, series: readonly TimedStrength[]): void => {
  series.forEach((point, i) => {
    if (!Number.isFinite(point.strength)) {
      throw new InvalidInputError(`${field}[${i}]`, 'strength must be finite');
    }
  });
};

/**
 * Full structural validation of a feature set as received from the
 * extraction service. Throws InvalidInputError naming the first bad field.
 */
export const validateTrackFeatures = (track: TrackFeatureSet): TrackFeatureSet => {
  if (!track.reference) {
    throw new InvalidInputError('reference', 'a track reference is required');
  }
  assertScorable(track);
  requireUnitInterval(`${track.reference}.tempo.confidence`, track.tempo.confidence);
  requireUnitInterval(`${track.reference}.key.confidence`, track.key.confidence);

  requireNonNegative(`${track.reference}.energy.max`, track.energy.max);
  requireNonNegative(`${track.reference}.energy.std`, track.energy.std);

  const { duration } = track;
  checkSeries(`${track.reference}.energy.samples`, track.energy.samples, duration, true);
  track.energy.samples.forEach((sample, i) => {
    requireNonNegative(`${track.reference}.energy.samples[${i}].rms`, sample.rms);
  });
  checkSeries(`${track.reference}.beats`, track.beats, duration, false);
  checkSeries(`${track.reference}.onsets`, track.onsets, duration, false);
  checkStrengths(`${track.reference}.beats`, track.beats);
  checkStrengths(`${track.reference}.onsets`, track.onsets);

  let previousEnd = -Infinity;
  track.sections.forEach((section, i) => {
    const field = `${track.reference}.sections[${i}]`;
    if (!(section.start >= 0 && section.start < section.end && section.end <= duration)) {
      throw new InvalidInputError(field, `span [${section.start}, ${section.end}] is not inside [0, ${duration}]`);
    }
    if (section.start < previousEnd) {
      throw new InvalidInputError(field, 'sections must be ordered and non-overlapping');
    }
    previousEnd = section.end;
  });

  track.drops.forEach((drop, i) => {
    if (!Number.isFinite(drop) || drop < 0 || drop > duration) {
      throw new InvalidInputError(`${track.reference}.drops[${i}]`, `time ${drop} outside [0, ${duration}]`);
    }
  });

  return track;
};

/**
 * Loop bounds and set budgets come straight from callers
 */
export const assertDurationBounds = (minDuration: number, maxDuration: number): void => {
  if (!Number.isFinite(minDuration) || minDuration < 0) {
    throw new InvalidInputError('minDuration', `expected a non-negative number, got ${minDuration}`);
  }
  if (!Number.isFinite(maxDuration) || maxDuration < minDuration) {
    throw new InvalidInputError('maxDuration', `must be at least minDuration (${minDuration}), got ${maxDuration}`);
  }
};

export const assertBudget = (budgetSeconds: number): void => {
  if (!Number.isFinite(budgetSeconds) || budgetSeconds < 0) {
    throw new InvalidInputError('budget', `expected a non-negative number of seconds, got ${budgetSeconds}`);
  }
};
