import type { TrackFeatureSet, ZoneId } from '../types';
import { annotateTrack, findEnergyPeak, findMixPoints, ZONE_IDS, type TrackAnnotations } from '../analysis';
import { DEFAULT_MIX_POLICY, type MixPolicy } from '../config';
import { describeCompatibleKeys, formatKey, toCamelot } from './keys';

const ZONE_TITLES: Record<ZoneId, string> = {
  intro: 'Intro',
  build: 'Build',
  drop: 'Drop',
  breakdown: 'Breakdown',
  outro: 'Outro',
};

export const energyLevel = (meanEnergy: number): 'High' | 'Medium' | 'Low' => {
  if (meanEnergy > 0.1) return 'High';
  if (meanEnergy > 0.05) return 'Medium';
  return 'Low';
};

const seconds = (value: number): string => `${value.toFixed(1)}s`;

/**
 * Plain-text performance sheet for one track
 */
export const generateDjNotes = (
  track: TrackFeatureSet,
  options: { annotations?: TrackAnnotations; policy?: MixPolicy } = {}
): string => {
  const policy = options.policy ?? DEFAULT_MIX_POLICY;
  const { cuePoints, loops, zones } = options.annotations ?? annotateTrack(track, { policy });
  const peak = findEnergyPeak(track);
  const mixPoints = findMixPoints(track, policy.transitions);

  const lines: string[] = [
    'DJ PERFORMANCE NOTES',
    `Track: ${track.reference}`,
    '='.repeat(50),
    '',
    'TRACK INFO:',
    `- BPM: ${track.tempo.bpm.toFixed(1)}`,
    `- Key: ${formatKey(track.key)} (${toCamelot(track.key)})`,
    `- Duration: ${seconds(track.duration)}`,
    `- Energy Level: ${energyLevel(track.energy.mean)}`,
    '',
    'TOP CUE POINTS:',
    ...cuePoints
      .slice(0, 5)
      .map((cue, i) => `${i + 1}. ${seconds(cue.time)} - ${cue.category} (Strength: ${cue.strength.toFixed(2)})`),
    '',
    'LOOP SUGGESTIONS:',
    ...loops
      .slice(0, 3)
      .flatMap((loop, i) => [
        `${i + 1}. ${seconds(loop.start)} - ${seconds(loop.end)} (${seconds(loop.duration)})`,
        `   Type: ${loop.label}`,
      ]),
    '',
    'PERFORMANCE ZONES:',
    ...ZONE_IDS.map(
      (id) => `- ${ZONE_TITLES[id]}: ${seconds(zones[id].start)} - ${seconds(zones[id].end)}`
    ),
    '',
    'MIXING TIPS:',
    `- Use ${track.tempo.bpm.toFixed(1)} BPM for tempo matching`,
    `- Key: ${formatKey(track.key)} - compatible with ${describeCompatibleKeys(track.key)}`,
    `- Energy peaks at ${peak === null ? 'n/a' : seconds(peak)}`,
    `- Best mixing points: ${mixPoints.length > 0 ? mixPoints.map(seconds).join(', ') : 'none found'}`,
  ];

  return lines.join('\n');
};
