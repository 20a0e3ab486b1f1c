export type {
  BlendMode,
  CellSampler,
  FrameRateReading,
  HSBFrame,
  NoiseSource,
  ParameterSet,
  ParameterSource,
  TemporalWave,
  WaveEvaluator,
  WaveStrategy,
  WaveType,
} from './types';
export { BLEND_MODES, DEFAULT_PARAMETERS, WAVE_TYPES } from './constants';
export { WaveFieldEngine } from './WaveFieldEngine';
export type { UpdateMemo } from './WaveFieldEngine';
export {
  computePhase,
  defineWaveStrategy,
  getWaveStrategy,
  noiseWaveStrategy,
  sawtoothWave,
  sineWave,
  squareWave,
  tangentWave,
  triangleWave,
} from './waveStrategies';
export { createSeededRandom, createSimplexNoise } from './noise';
export { TrailBuffer } from './TrailBuffer';
export { WaveFieldDriver } from './WaveFieldDriver';
export type { DriverFrame, WaveFieldDriverOptions } from './WaveFieldDriver';
export {
  ParameterValidationError,
  createParameterSet,
  parseParameterSet,
  serializeParameterSet,
  validateParameterSet,
} from './parameters';
export type { ParameterDocument } from './parameters';
export { createParameterStore, getParameters } from './parameterStore';
export type { ParameterStore, ParameterStoreState } from './parameterStore';
export { FrameRateSampler } from './frameRate';
export { FrameRateMonitor } from './components/FrameRateMonitor';
export { Logger } from './logger';
export type { LogEntry, LogLevel } from './logger';
