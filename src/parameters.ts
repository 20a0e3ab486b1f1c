// --- Parameter defaults, validation and loading ---

import type { ParameterSet, ParameterSource } from './types';
import { DEFAULT_PARAMETERS } from './constants';
import { Logger } from './logger';

const log = Logger.create('Parameters');

export class ParameterValidationError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, message: string) {
    super(message);
    this.name = 'ParameterValidationError';
    this.field = field;
    this.value = value;
  }
}

type NumericField = keyof ParameterSet;

const PARAMETER_FIELDS: readonly NumericField[] = [
  'waveSpeed', 'waveAngle',
  'waveMultiplierMin', 'waveMultiplierMax',
  'waveAmplitudeMin', 'waveAmplitudeMax',
  'hueMin', 'hueMax',
  'saturationMin', 'saturationMax',
  'brightnessMin', 'brightnessMax',
  'animationFPS', 'animationDurationSeconds',
];

const CHANNEL_RANGES: ReadonlyArray<readonly [NumericField, number, number]> = [
  ['hueMin', 0, 360],
  ['hueMax', 0, 360],
  ['saturationMin', 0, 255],
  ['saturationMax', 0, 255],
  ['brightnessMin', 0, 255],
  ['brightnessMax', 0, 255],
];

const POSITIVE_INTEGER_FIELDS: readonly NumericField[] = ['animationFPS', 'animationDurationSeconds'];

/** Throws ParameterValidationError on the first invalid field */
export function validateParameterSet(params: ParameterSet): void {
  for (const field of PARAMETER_FIELDS) {
    const value = params[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ParameterValidationError(field, value, `${field} must be a finite number. Got: ${String(value)}`);
    }
  }

  for (const field of POSITIVE_INTEGER_FIELDS) {
    const value = params[field];
    if (!Number.isInteger(value) || value <= 0) {
      throw new ParameterValidationError(field, value, `${field} must be a positive integer. Got: ${value}`);
    }
  }

  for (const [field, low, high] of CHANNEL_RANGES) {
    const value = params[field];
    if (value < low || value > high) {
      throw new ParameterValidationError(field, value, `${field} must be between ${low} and ${high}. Got: ${value}`);
    }
  }
}

/** Defaults merged with overrides; the angle is folded into [0, 360) */
export function createParameterSet(overrides: Partial<ParameterSet> = {}): Readonly<ParameterSet> {
  const merged: ParameterSet = { ...DEFAULT_PARAMETERS, ...overrides };
  validateParameterSet(merged);
  return Object.freeze({ ...merged, waveAngle: foldAngle(merged.waveAngle) });
}

function foldAngle(degrees: number): number {
  const folded = degrees % 360;
  return folded < 0 ? folded + 360 : folded;
}

// ─── Nested document shape ───

export interface ParameterDocument {
  animation: {
    fps: number;
    duration: number;
    waveSpeed: number;
    waveAngle: number;
    waveMultiplierMin: number;
    waveMultiplierMax: number;
  };
  colors: {
    hueMin: number;
    hueMax: number;
    saturationMin: number;
    saturationMax: number;
    brightnessMin: number;
    brightnessMax: number;
    waveAmplitudeMin: number;
    waveAmplitudeMax: number;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface ReadRule {
  key: string;
  field: NumericField;
  range?: readonly [number, number];
  positiveInteger?: boolean;
}

const ANIMATION_RULES: readonly ReadRule[] = [
  { key: 'fps', field: 'animationFPS', positiveInteger: true },
  { key: 'duration', field: 'animationDurationSeconds', positiveInteger: true },
  { key: 'waveSpeed', field: 'waveSpeed' },
  { key: 'waveAngle', field: 'waveAngle' },
  { key: 'waveMultiplierMin', field: 'waveMultiplierMin' },
  { key: 'waveMultiplierMax', field: 'waveMultiplierMax' },
];

const COLOR_RULES: readonly ReadRule[] = [
  { key: 'hueMin', field: 'hueMin', range: [0, 360] },
  { key: 'hueMax', field: 'hueMax', range: [0, 360] },
  { key: 'saturationMin', field: 'saturationMin', range: [0, 255] },
  { key: 'saturationMax', field: 'saturationMax', range: [0, 255] },
  { key: 'brightnessMin', field: 'brightnessMin', range: [0, 255] },
  { key: 'brightnessMax', field: 'brightnessMax', range: [0, 255] },
  { key: 'waveAmplitudeMin', field: 'waveAmplitudeMin' },
  { key: 'waveAmplitudeMax', field: 'waveAmplitudeMax' },
];

function readSection(section: unknown, rules: readonly ReadRule[], target: ParameterSet): void {
  if (section === undefined) return;
  if (!isRecord(section)) {
    log.warn('Ignoring non-object parameter section', section);
    return;
  }
  for (const rule of rules) {
    if (!(rule.key in section)) continue;
    const value = section[rule.key];
    const fallback = target[rule.field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      log.warn(`${rule.key} must be a finite number, using default: ${fallback}`);
      continue;
    }
    if (rule.positiveInteger && (!Number.isInteger(value) || value <= 0)) {
      log.warn(`${rule.key} must be a positive integer, using default: ${fallback}`);
      continue;
    }
    if (rule.range && (value < rule.range[0] || value > rule.range[1])) {
      log.warn(`${rule.key} must be between ${rule.range[0]} and ${rule.range[1]}, using default: ${fallback}`);
      continue;
    }
    target[rule.field] = value;
  }
}

function swapIfInverted(params: ParameterSet, minField: NumericField, maxField: NumericField): void {
  if (params[minField] > params[maxField]) {
    log.warn(`${minField} > ${maxField}, swapping values`);
    const min = params[minField];
    params[minField] = params[maxField];
    params[maxField] = min;
  }
}

/**
 * Tolerant loader: missing keys keep defaults, invalid values fall back
 * to the default with a warning, inverted ranges are swapped.
 */
export function parseParameterSet(input: unknown): Readonly<ParameterSet> {
  if (!isRecord(input)) {
    throw new ParameterValidationError('(root)', input, 'Parameter document must be an object');
  }

  const params: ParameterSet = { ...DEFAULT_PARAMETERS };
  readSection(input.animation, ANIMATION_RULES, params);
  readSection(input.colors, COLOR_RULES, params);

  swapIfInverted(params, 'waveMultiplierMin', 'waveMultiplierMax');
  swapIfInverted(params, 'saturationMin', 'saturationMax');
  swapIfInverted(params, 'brightnessMin', 'brightnessMax');

  return createParameterSet(params);
}

export function serializeParameterSet(params: ParameterSet): ParameterDocument {
  return {
    animation: {
      fps: params.animationFPS,
      duration: params.animationDurationSeconds,
      waveSpeed: params.waveSpeed,
      waveAngle: params.waveAngle,
      waveMultiplierMin: params.waveMultiplierMin,
      waveMultiplierMax: params.waveMultiplierMax,
    },
    colors: {
      hueMin: params.hueMin,
      hueMax: params.hueMax,
      saturationMin: params.saturationMin,
      saturationMax: params.saturationMax,
      brightnessMin: params.brightnessMin,
      brightnessMax: params.brightnessMax,
      waveAmplitudeMin: params.waveAmplitudeMin,
      waveAmplitudeMax: params.waveAmplitudeMax,
    },
  };
}

/** Resolve a ParameterSource to the bundle for this query */
export function resolveParameters(source: ParameterSource): ParameterSet {
  return typeof source === 'function' ? source() : source;
}
