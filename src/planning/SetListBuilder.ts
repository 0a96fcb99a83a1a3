/**
 * SetListBuilder - Cuts a planned order down to a duration budget
 *
 * Strict greedy prefix: tracks are taken in order until the next one would
 * overrun the budget. No later, shorter track is pulled forward.
 */

import type { EnergyCurve, SetList, TrackFeatureSet } from '../types';
import { assertBudget } from '../utils/validation';
import { suggestPlaylistOrder, orderByEnergyCurve, type PlaylistOrderOptions } from './SequencePlanner';

export const buildSetList = (
  sequence: readonly TrackFeatureSet[],
  budgetSeconds: number
): SetList => {
  assertBudget(budgetSeconds);

  const tracks: TrackFeatureSet[] = [];
  let totalDuration = 0;

  for (const track of sequence) {
    if (totalDuration + track.duration > budgetSeconds) break;
    tracks.push(track);
    totalDuration += track.duration;
  }

  return { tracks, totalDuration };
};

export interface SetListOptions extends PlaylistOrderOptions {
  durationMinutes?: number;
}

/**
 * Suggested playlist order (energy curve plus refinement passes), cut to length
 */
export const createSetList = (
  tracks: readonly TrackFeatureSet[],
  { durationMinutes = 60, ...orderOptions }: SetListOptions = {}
): SetList => buildSetList(suggestPlaylistOrder(tracks, orderOptions), durationMinutes * 60);

/**
 * Energy profile only, no key or tempo refinement, cut to length
 */
export const createEnergyBasedSet = (
  tracks: readonly TrackFeatureSet[],
  durationMinutes = 60,
  profile: EnergyCurve | string = 'peak_middle'
): SetList => buildSetList(orderByEnergyCurve(tracks, profile), durationMinutes * 60);
