/**
 * Musical key helpers
 *
 * Camelot Wheel:
 * - Each key maps to a number (1-12) and letter (A/B for minor/major)
 * - Compatible keys: same number, +/-1 number, same number opposite letter
 *
 * Keys are stored with sharp root names; flats are folded in when parsing.
 */

import { Key, Note } from 'tonal';
import type { KeyMode, MusicalKey, NoteName } from '../types';
import { InvalidInputError } from './errors';

export const NOTE_NAMES: readonly NoteName[] = [
  'C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B',
];

const FLAT_TO_SHARP: Record<string, NoteName> = {
  Db: 'C#',
  Eb: 'D#',
  Gb: 'F#',
  Ab: 'G#',
  Bb: 'A#',
};

// Camelot wheel mapping: mode -> root -> [number, letter]
const CAMELOT_MAP: Record<KeyMode, Record<NoteName, [number, 'A' | 'B']>> = {
  minor: {
    'A': [8, 'A'], 'A#': [3, 'A'], 'B': [10, 'A'], 'C': [5, 'A'],
    'C#': [12, 'A'], 'D': [7, 'A'], 'D#': [2, 'A'], 'E': [9, 'A'],
    'F': [4, 'A'], 'F#': [11, 'A'], 'G': [6, 'A'], 'G#': [1, 'A'],
  },
  major: {
    'A': [11, 'B'], 'A#': [6, 'B'], 'B': [1, 'B'], 'C': [8, 'B'],
    'C#': [3, 'B'], 'D': [10, 'B'], 'D#': [5, 'B'], 'E': [12, 'B'],
    'F': [7, 'B'], 'F#': [4, 'B'], 'G': [9, 'B'], 'G#': [2, 'B'],
  },
};

// Root -> itself, its fourth, its fifth and its relative minor root
const COMPATIBLE_ROOTS: Record<NoteName, readonly NoteName[]> = {
  'C': ['C', 'F', 'G', 'A'],
  'C#': ['C#', 'F#', 'G#', 'A#'],
  'D': ['D', 'G', 'A', 'B'],
  'D#': ['D#', 'G#', 'A#', 'C'],
  'E': ['E', 'A', 'B', 'C#'],
  'F': ['F', 'A#', 'C', 'D'],
  'F#': ['F#', 'B', 'C#', 'D#'],
  'G': ['G', 'C', 'D', 'E'],
  'G#': ['G#', 'C#', 'D#', 'F'],
  'A': ['A', 'D', 'E', 'F#'],
  'A#': ['A#', 'D#', 'F', 'G'],
  'B': ['B', 'E', 'F#', 'G#'],
};

const isNoteName = (value: string): value is NoteName =>
  (NOTE_NAMES as readonly string[]).includes(value);

export const parseRoot = (value: string): NoteName | null => {
  const trimmed = value.trim();
  if (isNoteName(trimmed)) return trimmed;
  return FLAT_TO_SHARP[trimmed] ?? null;
};

/**
 * Parse "C major", "F# minor", "Bb minor", "Am" or "C"
 */
export const parseKey = (value: string): MusicalKey => {
  const [rootPart = '', modePart] = value.trim().split(/\s+/);
  const shorthandMinor = modePart === undefined && rootPart.length > 1 && rootPart.endsWith('m');
  const root = parseRoot(shorthandMinor ? rootPart.slice(0, -1) : rootPart);
  if (!root) {
    throw new InvalidInputError('key', `unknown root note in "${value}"`);
  }

  if (shorthandMinor) return { root, mode: 'minor' };
  if (modePart === undefined || modePart.toLowerCase() === 'major') return { root, mode: 'major' };
  if (modePart.toLowerCase() === 'minor') return { root, mode: 'minor' };
  throw new InvalidInputError('key', `unknown mode in "${value}"`);
};

export const formatKey = (key: MusicalKey): string => `${key.root} ${key.mode}`;

/** Short form: "C", "Am" */
export const shortKeyName = (key: MusicalKey): string =>
  key.mode === 'minor' ? `${key.root}m` : key.root;

/**
 * Get Camelot notation for a key
 */
export const toCamelot = (key: MusicalKey): string => {
  const [number, letter] = CAMELOT_MAP[key.mode][key.root];
  return `${number}${letter}`;
};

export const getCompatibleRoots = (root: NoteName): readonly NoteName[] => COMPATIBLE_ROOTS[root];

// tonal spells by interval (E#, F##, Bb); fold back onto the sharp names kept here
const toNoteName = (spelled: string): NoteName => {
  const simple = Note.simplify(spelled);
  const root = parseRoot(simple.includes('b') ? Note.enharmonic(simple) : simple);
  if (!root) {
    throw new InvalidInputError('key', `cannot respell "${spelled}"`);
  }
  return root;
};

/**
 * Keys a track mixes into cleanly: its fourth, its fifth and its relative major/minor.
 * e.g. C major -> "F, G, Am"
 */
export const describeCompatibleKeys = (key: MusicalKey): string => {
  const fourth: MusicalKey = { root: toNoteName(Note.transpose(key.root, '4P')), mode: key.mode };
  const fifth: MusicalKey = { root: toNoteName(Note.transpose(key.root, '5P')), mode: key.mode };
  const relative: MusicalKey =
    key.mode === 'major'
      ? { root: toNoteName(Key.majorKey(key.root).minorRelative), mode: 'minor' }
      : { root: toNoteName(Key.minorKey(key.root).relativeMajor), mode: 'major' };
  return [fourth, fifth, relative].map(shortKeyName).join(', ');
};
