export {
  orderByEnergyCurve,
  orderWave,
  orderPeakMiddle,
  optimizeKeyTransitions,
  optimizeTempoTransitions,
  refineOrder,
  suggestPlaylistOrder,
  sequenceByCompatibility,
  DEFAULT_REFINEMENT_PASSES,
} from './SequencePlanner';
export type { PlaylistOrderOptions } from './SequencePlanner';
export { buildSetList, createSetList, createEnergyBasedSet } from './SetListBuilder';
export type { SetListOptions } from './SetListBuilder';
