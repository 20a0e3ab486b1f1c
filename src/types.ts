// ─── Wave Field Types ───
// Shared type definitions for the engine, strategies and trail buffer

export interface ParameterSet {
  waveSpeed: number;
  /** Degrees, 0 = horizontal, 90 = vertical */
  waveAngle: number;
  waveMultiplierMin: number;
  waveMultiplierMax: number;
  waveAmplitudeMin: number;
  waveAmplitudeMax: number;
  hueMin: number;   // 0-360
  hueMax: number;
  saturationMin: number;  // 0-255
  saturationMax: number;
  brightnessMin: number;  // 0-255
  brightnessMax: number;
  animationFPS: number;
  animationDurationSeconds: number;
}

/** Either a parameter bundle or a getter polled on every query */
export type ParameterSource = ParameterSet | (() => ParameterSet);

/**
 * Brightness for one lattice cell. x and y are normalized to 0-1,
 * time runs 0 → 1 over the configured animation duration.
 */
export type WaveEvaluator = (
  frameIndex: number,
  x: number,
  y: number,
  time: number,
  params: ParameterSet,
) => number;

export interface WaveStrategy {
  readonly name: string;
  readonly description: string;
  readonly evaluate: WaveEvaluator;
}

export type WaveType = 'sine' | 'tangent' | 'square' | 'triangle' | 'sawtooth';

/** Coherent noise sampled at a 3-D point, returns 0-1 */
export type NoiseSource = (x: number, y: number, z: number) => number;

export type BlendMode = 'ADD' | 'MAX' | 'AVERAGE';

/** Per-cell channel reader used by TrailBuffer.capture */
export type CellSampler = (x: number, y: number) => number;

export interface HSBFrame {
  hue: Float64Array;
  saturation: Float64Array;
  brightness: Float64Array;
}

export interface TemporalWave {
  amplitude: number;
  frequency: number;
}

export interface FrameRateReading {
  fps: number;
  degraded: boolean;
}
