import axios, { isAxiosError, type AxiosAdapter } from 'axios';
import type { EnergySample, Section, TimedStrength, TrackFeatureSet } from '../types';
import { ExtractionError, InvalidInputError } from '../utils/errors';
import { parseKey } from '../utils/keys';
import { mean, standardDeviation } from '../utils/stats';
import { validateTrackFeatures } from '../utils/validation';

/**
 * Wire format of POST /tracks/analyze. Series come as parallel arrays,
 * the way the analysis service computes them.
 */
export interface FeaturePayload {
  reference: string;
  duration: number;
  tempo: { bpm: number; confidence: number };
  key: { name: string; confidence: number }; // "C major", "F# minor"
  energy: { times: number[]; rms: number[] };
  beats: { times: number[]; strengths: number[] };
  onsets: { times: number[]; strengths: number[] };
  sections: [string, number, number][];
  drops: number[];
}

export interface FeatureClientOptions {
  baseURL: string;
  timeout?: number; // ms
  onsetSensitivity?: number; // 0-1, higher keeps fewer onsets
  adapter?: AxiosAdapter;
  logger?: Pick<Console, 'warn'>;
}

export interface FeatureClient {
  extractFeatures: (reference: string) => Promise<TrackFeatureSet>;
}

export const DEFAULT_ONSET_SENSITIVITY = 0.7;

// Payload parsing
const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readRecord = (value: unknown, field: string): Record<string, unknown> => {
  if (!isRecord(value)) throw new InvalidInputError(field, 'expected an object');
  return value;
};

const readNumber = (value: unknown, field: string): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(field, 'expected a finite number');
  }
  return value;
};

const readString = (value: unknown, field: string): string => {
  if (typeof value !== 'string') throw new InvalidInputError(field, 'expected a string');
  return value;
};

const readNumbers = (value: unknown, field: string): number[] => {
  if (!Array.isArray(value)) throw new InvalidInputError(field, 'expected an array');
  return value.map((item, i) => readNumber(item, `${field}[${i}]`));
};

const readParallel = (
  value: unknown,
  field: string,
  valueKey: 'rms' | 'strengths'
): { times: number[]; values: number[] } => {
  const record = readRecord(value, field);
  const times = readNumbers(record.times, `${field}.times`);
  const values = readNumbers(record[valueKey], `${field}.${valueKey}`);
  if (times.length !== values.length) {
    throw new InvalidInputError(field, `times and ${valueKey} differ in length`);
  }
  return { times, values };
};

const readTimedStrengths = (value: unknown, field: string): TimedStrength[] => {
  const { times, values } = readParallel(value, field, 'strengths');
  return times.map((time, i) => ({ time, strength: values[i] }));
};

const readSections = (value: unknown): Section[] => {
  if (!Array.isArray(value)) throw new InvalidInputError('sections', 'expected an array');
  return value.map((item, i) => {
    if (!Array.isArray(item) || item.length !== 3) {
      throw new InvalidInputError(`sections[${i}]`, 'expected [label, start, end]');
    }
    return {
      label: readString(item[0], `sections[${i}].label`),
      start: readNumber(item[1], `sections[${i}].start`),
      end: readNumber(item[2], `sections[${i}].end`),
    };
  });
};

const freezeFeatures = (track: TrackFeatureSet): TrackFeatureSet => {
  track.energy.samples.forEach((s) => Object.freeze(s));
  track.beats.forEach((b) => Object.freeze(b));
  track.onsets.forEach((o) => Object.freeze(o));
  track.sections.forEach((s) => Object.freeze(s));
  Object.freeze(track.energy.samples);
  Object.freeze(track.beats);
  Object.freeze(track.onsets);
  Object.freeze(track.sections);
  Object.freeze(track.drops);
  Object.freeze(track.tempo);
  Object.freeze(track.key);
  Object.freeze(track.energy);
  return Object.freeze(track);
};

/**
 * Turn a service payload into a validated, frozen TrackFeatureSet.
 * Energy summaries (mean, max, population std) are derived here.
 */
export const normalizeFeaturePayload = (payload: unknown): TrackFeatureSet => {
  const body = readRecord(payload, 'payload');
  const tempo = readRecord(body.tempo, 'tempo');
  const key = readRecord(body.key, 'key');

  const energy = readParallel(body.energy, 'energy', 'rms');
  const samples: EnergySample[] = energy.times.map((time, i) => ({ time, rms: energy.values[i] }));

  const track: TrackFeatureSet = {
    reference: readString(body.reference, 'reference'),
    duration: readNumber(body.duration, 'duration'),
    tempo: {
      bpm: readNumber(tempo.bpm, 'tempo.bpm'),
      confidence: readNumber(tempo.confidence, 'tempo.confidence'),
    },
    key: {
      ...parseKey(readString(key.name, 'key.name')),
      confidence: readNumber(key.confidence, 'key.confidence'),
    },
    energy: {
      samples,
      mean: mean(energy.values),
      max: energy.values.reduce((max, rms) => Math.max(max, rms), 0),
      std: standardDeviation(energy.values),
    },
    beats: readTimedStrengths(body.beats, 'beats'),
    onsets: readTimedStrengths(body.onsets, 'onsets'),
    sections: readSections(body.sections),
    drops: readNumbers(body.drops, 'drops'),
  };

  return freezeFeatures(validateTrackFeatures(track));
};

/**
 * Client for the feature-extraction service. Failures surface as
 * ExtractionError and are never retried here.
 */
export const createFeatureClient = ({
  baseURL,
  timeout = 120_000,
  onsetSensitivity = DEFAULT_ONSET_SENSITIVITY,
  adapter,
  logger = console,
}: FeatureClientOptions): FeatureClient => {
  if (!Number.isFinite(onsetSensitivity) || onsetSensitivity < 0 || onsetSensitivity > 1) {
    throw new InvalidInputError('onsetSensitivity', `expected a value in [0, 1], got ${onsetSensitivity}`);
  }

  const api = axios.create({ baseURL, timeout, adapter });

  // Log failed requests before they reach the caller
  api.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
      if (isAxiosError(error)) {
        logger.warn(
          `[featureClient] ${error.config?.method?.toUpperCase() ?? 'REQUEST'} ${error.config?.url ?? ''} failed:`,
          error.response?.status ?? error.code ?? error.message
        );
      }
      return Promise.reject(error);
    }
  );

  const extractFeatures = async (reference: string): Promise<TrackFeatureSet> => {
    let payload: unknown;
    try {
      const response = await api.post<FeaturePayload>('/tracks/analyze', {
        reference,
        onsetSensitivity,
      });
      payload = response.data;
    } catch (error) {
      const message = isAxiosError(error)
        ? error.response
          ? `service responded with ${error.response.status}`
          : error.message
        : String(error);
      throw new ExtractionError(reference, message, { cause: error });
    }

    try {
      return normalizeFeaturePayload(payload);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionError(reference, `malformed features (${message})`, { cause: error });
    }
  };

  return { extractFeatures };
};
