// ─── Wave Field Constants ───
// Parameter defaults and trail tuning values

import type { BlendMode, ParameterSet, WaveType } from './types';

export const DEFAULT_PARAMETERS: Readonly<ParameterSet> = Object.freeze({
  waveSpeed: 1,
  waveAngle: 45,
  waveMultiplierMin: 0,
  waveMultiplierMax: 2,
  waveAmplitudeMin: -200,
  waveAmplitudeMax: 200,
  hueMin: 0,
  hueMax: 0,
  saturationMin: 0,
  saturationMax: 0,
  brightnessMin: 50,
  brightnessMax: 255,
  animationFPS: 30,
  animationDurationSeconds: 18,
});

export const WAVE_TYPES: readonly WaveType[] = ['sine', 'tangent', 'square', 'triangle', 'sawtooth'];

export const BLEND_MODES: readonly BlendMode[] = ['ADD', 'MAX', 'AVERAGE'];

// Saturation is pushed 30° off the wave direction and runs on its own
// time/space scales so it never moves in lockstep with brightness.
export const SATURATION_ANGLE_OFFSET = 30;
export const SATURATION_TIME_SCALE = 0.7;
export const SATURATION_SPACE_SCALE = 1.3;
export const HUE_TIME_SCALE = 0.3;
export const HUE_SPACE_SCALE = 0.5;

/** Shared phase for the built-in strategies: frame·speed·0.05 + (x + y)·2π·3 */
export const STRATEGY_TIME_SCALE = 0.05;
export const STRATEGY_SPATIAL_CYCLES = 3;

export const NOISE_DEFAULT_SCALE = 3.0;
export const NOISE_DEFAULT_SPEED = 0.8;
// Octave-blended noise rarely reaches 0 or 1, so map from a narrower window
export const NOISE_INPUT_LOW = 0.15;
export const NOISE_INPUT_HIGH = 0.85;

export const TRAIL_DEFAULT_FADE = 0.7;
export const TRAIL_DEFAULT_BLEND: BlendMode = 'ADD';
export const TRAIL_DEFAULT_WAVE_AMPLITUDE = 3.0;
export const TRAIL_DEFAULT_WAVE_FREQUENCY = 0.3;
export const TRAIL_WAVE_TIME_STEP = 0.2;
export const TRAIL_DEFAULT_TARGET_FPS = 60;
export const TRAIL_DEFAULT_AUDIO_MIN = 2;
/** Frame-rate reactive mode never stretches the trail beyond 3× */
export const TRAIL_MAX_STRETCH = 3.0;
export const FRAMERATE_HISTORY_WEIGHT = 0.9;
export const FRAMERATE_SAMPLE_WEIGHT = 0.1;
export const CHANNEL_MAX = 255;
