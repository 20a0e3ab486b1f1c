import type { ParameterSet, ParameterSource, WaveStrategy } from './types';
import {
  HUE_SPACE_SCALE,
  HUE_TIME_SCALE,
  SATURATION_ANGLE_OFFSET,
  SATURATION_SPACE_SCALE,
  SATURATION_TIME_SCALE,
} from './constants';
import { constrain, mapRange, norm, radians } from './mathUtils';
import { resolveParameters } from './parameters';
import { Logger } from './logger';

const log = Logger.create('WaveFieldEngine');

/** Keys of the last update (NaN before the first); a query only recomputes when either differs */
export interface UpdateMemo {
  lastUpdateFrame: number;
  lastWaveSpeed: number;
}

/**
 * Per-cell hue, saturation and brightness for one animation frame.
 *
 * All three channels share one phase construction
 * (temporal term + spatial dot-product · waveMultiplier) but use different
 * shaping functions and offsets: tangent for brightness, sine for hue and
 * saturation.
 */
export class WaveFieldEngine {
  private readonly params: ParameterSource;
  private strategy: WaveStrategy | null = null;

  // Derived once per frame from sin(radians(frameIndex))
  private waveMultiplier = 0;
  private memo: UpdateMemo = { lastUpdateFrame: NaN, lastWaveSpeed: NaN };
  private autoUpdate = true;

  constructor(params: ParameterSource) {
    this.params = params;
  }

  /**
   * Recompute the wave multiplier for a frame. waveSpeed is only a memo key;
   * the multiplier depends on frameIndex alone.
   */
  update(frameIndex: number, waveSpeed: number): void {
    const p = resolveParameters(this.params);
    this.waveMultiplier = mapRange(
      Math.sin(radians(frameIndex)), -1, 1,
      p.waveMultiplierMin, p.waveMultiplierMax,
    );
    this.memo = { lastUpdateFrame: frameIndex, lastWaveSpeed: waveSpeed };
  }

  private ensureUpdated(frameIndex: number, waveSpeed: number): void {
    if (this.autoUpdate && (frameIndex !== this.memo.lastUpdateFrame || waveSpeed !== this.memo.lastWaveSpeed)) {
      this.update(frameIndex, waveSpeed);
    }
  }

  /** When off, queries never call update() on their own */
  setAutoUpdate(enabled: boolean): void {
    this.autoUpdate = enabled;
  }

  isAutoUpdate(): boolean {
    return this.autoUpdate;
  }

  getUpdateMemo(): Readonly<UpdateMemo> {
    return this.memo;
  }

  /** tan(x + y) mapped into the amplitude range and normalized back to 0-1 */
  calculateAmplitude(x: number, y: number): number {
    const p = resolveParameters(this.params);
    const aMin = p.waveAmplitudeMin;
    const aMax = p.waveAmplitudeMax;
    if (aMin === aMax) return 0;
    const a = mapRange(Math.tan(radians(x + y)), -1, 1, aMin, aMax);
    // tan is unbounded, keep the normalized value inside 0-1
    return constrain(norm(a, aMin, aMax), 0, 1);
  }

  /** Brightness in [brightnessMin, brightnessMax] */
  calculateColor(frameIndex: number, x: number, y: number, amplitude: number): number {
    const p = resolveParameters(this.params);
    this.ensureUpdated(frameIndex, p.waveSpeed);
    const angle = radians(p.waveAngle);
    const spatial = (x * Math.cos(angle) + y * Math.sin(angle)) * this.waveMultiplier;
    const input = frameIndex * p.waveSpeed + spatial * amplitude;
    const value = mapRange(Math.tan(radians(input)), -1, 1, p.brightnessMin, p.brightnessMax);
    // Clamp rather than renormalize: near the asymptotes tan jumps
    return constrain(value, p.brightnessMin, p.brightnessMax);
  }

  /**
   * Brightness through the installed strategy, or the default tangent
   * field when none is installed.
   */
  calculateColorCustom(frameIndex: number, x: number, y: number, tilesX: number, tilesY: number): number {
    const strategy = this.strategy;
    if (strategy) {
      const p = resolveParameters(this.params);
      const time = frameIndex / (p.animationFPS * p.animationDurationSeconds);
      return strategy.evaluate(frameIndex, x / tilesX, y / tilesY, time, p);
    }
    return this.calculateColor(frameIndex, x, y, this.calculateAmplitude(x, y));
  }

  /** Saturation; a fixed value when saturationMin === saturationMax */
  calculateSaturation(frameIndex: number, x: number, y: number, _tilesX: number, _tilesY: number): number {
    const p = resolveParameters(this.params);
    const sMin = p.saturationMin;
    const sMax = p.saturationMax;
    if (sMin === sMax) return sMin;

    this.ensureUpdated(frameIndex, p.waveSpeed);
    const angle = radians(p.waveAngle + SATURATION_ANGLE_OFFSET);
    const spatial = x * Math.cos(angle) + y * Math.sin(angle);
    const input = frameIndex * p.waveSpeed * SATURATION_TIME_SCALE
      + spatial * this.waveMultiplier * SATURATION_SPACE_SCALE;
    return this.shapeSine(input, sMin, sMax);
  }

  /** Hue; a fixed value when hueMin === hueMax */
  calculateHue(frameIndex: number, x: number, y: number, _tilesX: number, _tilesY: number): number {
    const p = resolveParameters(this.params);
    const hMin = p.hueMin;
    const hMax = p.hueMax;
    if (hMin === hMax) return hMin;

    this.ensureUpdated(frameIndex, p.waveSpeed);
    const angle = radians(p.waveAngle);
    const spatial = x * Math.cos(angle) + y * Math.sin(angle);
    const input = frameIndex * p.waveSpeed * HUE_TIME_SCALE
      + spatial * this.waveMultiplier * HUE_SPACE_SCALE;
    return this.shapeSine(input, hMin, hMax);
  }

  private shapeSine(inputDegrees: number, low: number, high: number): number {
    const value = mapRange(Math.sin(radians(inputDegrees)), -1, 1, low, high);
    return constrain(value, Math.min(low, high), Math.max(low, high));
  }

  setCustomWaveFunction(strategy: WaveStrategy | null): void {
    this.strategy = strategy;
    if (strategy) {
      log.debug(`Strategy installed: ${strategy.name}`);
    } else {
      log.debug('Strategy removed, using default tangent field');
    }
  }

  getCustomWaveFunction(): WaveStrategy | null {
    return this.strategy;
  }

  getWaveMultiplier(): number {
    return this.waveMultiplier;
  }

  /** Drop the installed strategy */
  reset(): void {
    this.setCustomWaveFunction(null);
  }

  /** Current parameter bundle as seen by the next query */
  getParameters(): ParameterSet {
    return resolveParameters(this.params);
  }
}
