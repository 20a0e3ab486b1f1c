// ─── Built-in wave strategies ───
// Pure (frameIndex, x, y, time, params) → brightness functions, mapped into
// [brightnessMin, brightnessMax]. x and y arrive normalized to 0-1.

import type { NoiseSource, ParameterSet, WaveEvaluator, WaveStrategy, WaveType } from './types';
import {
  NOISE_DEFAULT_SCALE,
  NOISE_DEFAULT_SPEED,
  NOISE_INPUT_HIGH,
  NOISE_INPUT_LOW,
  STRATEGY_SPATIAL_CYCLES,
  STRATEGY_TIME_SCALE,
} from './constants';
import { TWO_PI, constrain, mapRange, wrapUnit } from './mathUtils';
import { defaultNoise } from './noise';

/** Diagonal sweep shared by every mathematical preset */
export function computePhase(frameIndex: number, x: number, y: number, params: ParameterSet): number {
  return frameIndex * params.waveSpeed * STRATEGY_TIME_SCALE
    + x * TWO_PI * STRATEGY_SPATIAL_CYCLES
    + y * TWO_PI * STRATEGY_SPATIAL_CYCLES;
}

/** Wrap a user function as a strategy; its output is not range-checked */
export function defineWaveStrategy(
  name: string,
  evaluate: WaveEvaluator,
  description: string = 'Custom wave function',
): WaveStrategy {
  return Object.freeze({ name, description, evaluate });
}

export const sineWave: WaveStrategy = defineWaveStrategy(
  'Sine',
  (frameIndex, x, y, _time, params) =>
    mapRange(Math.sin(computePhase(frameIndex, x, y, params)), -1, 1, params.brightnessMin, params.brightnessMax),
  'Smooth sinusoidal oscillation',
);

export const tangentWave: WaveStrategy = defineWaveStrategy(
  'Tangent',
  (frameIndex, x, y, _time, params) => {
    const raw = mapRange(
      Math.tan(computePhase(frameIndex, x, y, params)), -1, 1,
      params.brightnessMin, params.brightnessMax,
    );
    return constrain(raw, params.brightnessMin, params.brightnessMax);
  },
  'Sharp, angular tangent oscillation',
);

export const squareWave: WaveStrategy = defineWaveStrategy(
  'Square',
  (frameIndex, x, y, _time, params) =>
    Math.sin(computePhase(frameIndex, x, y, params)) >= 0 ? params.brightnessMax : params.brightnessMin,
  'Binary on/off square wave',
);

export const triangleWave: WaveStrategy = defineWaveStrategy(
  'Triangle',
  (frameIndex, x, y, _time, params) => {
    const t = wrapUnit(computePhase(frameIndex, x, y, params) / TWO_PI);
    const tri = t < 0.5 ? 4 * t - 1 : 3 - 4 * t; // -1 → +1 → -1
    return mapRange(tri, -1, 1, params.brightnessMin, params.brightnessMax);
  },
  'Linear ramp up then down',
);

export const sawtoothWave: WaveStrategy = defineWaveStrategy(
  'Sawtooth',
  (frameIndex, x, y, _time, params) => {
    const t = wrapUnit(computePhase(frameIndex, x, y, params) / TWO_PI);
    return mapRange(t, 0, 1, params.brightnessMin, params.brightnessMax);
  },
  'Linear ramp with sharp drop',
);

const WAVE_STRATEGIES: Record<WaveType, WaveStrategy> = {
  sine: sineWave,
  tangent: tangentWave,
  square: squareWave,
  triangle: triangleWave,
  sawtooth: sawtoothWave,
};

export function getWaveStrategy(type: WaveType): WaveStrategy {
  return WAVE_STRATEGIES[type];
}

/**
 * Two octaves of coherent noise (0.7 / 0.3), the second at 2.5× spatial
 * frequency offset by 100 and 1.5× temporal rate. Sampled at
 * (x·scale, y·scale, frameIndex·0.01·speed).
 */
export function noiseWaveStrategy(
  source: NoiseSource = defaultNoise,
  scale: number = NOISE_DEFAULT_SCALE,
  speed: number = NOISE_DEFAULT_SPEED,
): WaveStrategy {
  return defineWaveStrategy(
    'Noise',
    (frameIndex, x, y, _time, params) => {
      const nx = x * scale;
      const ny = y * scale;
      const nt = frameIndex * 0.01 * speed;
      const n1 = source(nx, ny, nt);
      const n2 = source(nx * 2.5 + 100, ny * 2.5 + 100, nt * 1.5);
      const n = n1 * 0.7 + n2 * 0.3;
      return mapRange(n, NOISE_INPUT_LOW, NOISE_INPUT_HIGH, params.brightnessMin, params.brightnessMax);
    },
    'Organic coherent-noise patterns',
  );
}
