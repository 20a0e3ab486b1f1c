import type { BlendMode, CellSampler, HSBFrame, TemporalWave } from './types';
import type { WaveFieldEngine } from './WaveFieldEngine';
import {
  CHANNEL_MAX,
  FRAMERATE_HISTORY_WEIGHT,
  FRAMERATE_SAMPLE_WEIGHT,
  TRAIL_DEFAULT_AUDIO_MIN,
  TRAIL_DEFAULT_BLEND,
  TRAIL_DEFAULT_FADE,
  TRAIL_DEFAULT_TARGET_FPS,
  TRAIL_DEFAULT_WAVE_AMPLITUDE,
  TRAIL_DEFAULT_WAVE_FREQUENCY,
  TRAIL_MAX_STRETCH,
  TRAIL_WAVE_TIME_STEP,
} from './constants';
import { constrain, lerp } from './mathUtils';
import { Logger } from './logger';

const log = Logger.create('TrailBuffer');

/** One captured frame: three parallel channels of cols*rows cells */
interface Slot {
  brightness: Float64Array;
  hue: Float64Array;
  saturation: Float64Array;
}

/**
 * Fixed-capacity ring of past frames, composited into one output frame
 * with exponential fade, a blend mode and an optional reactive length.
 *
 * Slot for age t (0 = most recent): (head - 1 - t + 2·maxLength) mod maxLength.
 */
export class TrailBuffer {
  readonly cols: number;
  readonly rows: number;
  readonly maxLength: number;

  // Ring buffer, allocated once
  private readonly slots: Slot[];
  private head = 0;     // next write position
  private filled = 0;   // slots holding data

  private _trailLength: number;
  private _fadeDecay = TRAIL_DEFAULT_FADE;
  private _blendMode: BlendMode = TRAIL_DEFAULT_BLEND;

  // Per-cell temporal displacement
  private temporalWave: TemporalWave | null = null;

  // Frame-rate reactive: slower real frame rate → longer trail
  private framerateReactive = false;
  private targetFPS = TRAIL_DEFAULT_TARGET_FPS;
  private framerateSmooth = TRAIL_DEFAULT_TARGET_FPS;

  // Audio reactive: level fed by the host every tick
  private audioReactive = false;
  private _audioLevel = 0;
  private audioMinTrail = TRAIL_DEFAULT_AUDIO_MIN;
  private audioMaxTrail: number;

  constructor(cols: number, rows: number, maxLength: number) {
    this.cols = cols;
    this.rows = rows;
    // A length-1 trail is just the current frame, so never go below that
    this.maxLength = Math.max(1, Math.floor(maxLength) || 0);
    this._trailLength = this.maxLength;
    this.audioMaxTrail = this.maxLength;

    const cells = cols * rows;
    this.slots = [];
    for (let i = 0; i < this.maxLength; i++) {
      this.slots.push({
        brightness: new Float64Array(cells),
        hue: new Float64Array(cells),
        saturation: new Float64Array(cells),
      });
    }
    if (maxLength !== this.maxLength) {
      log.debug(`Trail capacity ${maxLength} clamped to ${this.maxLength}`);
    }
  }

  // ─── Capture ───

  /**
   * Sample all three channels for every cell of a cols×rows lattice into
   * the slot at head. Cells outside the buffer's own grid are ignored;
   * cells the lattice does not reach are stored as zero.
   */
  capture(
    brightnessOf: CellSampler,
    hueOf: CellSampler,
    saturationOf: CellSampler,
    cols: number = this.cols,
    rows: number = this.rows,
  ): void {
    const slot = this.resetSlot();
    const maxCol = Math.min(cols, this.cols);
    const maxRow = Math.min(rows, this.rows);

    for (let y = 0; y < maxRow; y++) {
      const rowIdx = y * this.cols;
      for (let x = 0; x < maxCol; x++) {
        const idx = rowIdx + x;
        slot.brightness[idx] = brightnessOf(x, y);
        slot.hue[idx] = hueOf(x, y);
        slot.saturation[idx] = saturationOf(x, y);
      }
    }

    this.advance();
  }

  /** Copy precomputed brightness values (row-major); hue and saturation are zeroed */
  captureRaw(values: ArrayLike<number>): void {
    const slot = this.resetSlot();
    const n = Math.min(values.length, this.cols * this.rows);
    for (let i = 0; i < n; i++) slot.brightness[i] = values[i];
    this.advance();
  }

  /** Capture all three channels straight from an engine's per-cell queries */
  captureFromEngine(engine: WaveFieldEngine, frameIndex: number): void {
    const { cols, rows } = this;
    this.capture(
      (x, y) => engine.calculateColorCustom(frameIndex, x, y, cols, rows),
      (x, y) => engine.calculateHue(frameIndex, x, y, cols, rows),
      (x, y) => engine.calculateSaturation(frameIndex, x, y, cols, rows),
    );
  }

  /** Slot at head with every channel zeroed */
  private resetSlot(): Slot {
    const slot = this.slots[this.head];
    slot.brightness.fill(0);
    slot.hue.fill(0);
    slot.saturation.fill(0);
    return slot;
  }

  private advance(): void {
    this.head = (this.head + 1) % this.maxLength;
    if (this.filled < this.maxLength) this.filled++;
  }

  private slotIndexForAge(age: number): number {
    return (this.head - 1 - age + this.maxLength * 2) % this.maxLength;
  }

  /** Age actually sampled for a cell at trail step t */
  private displacedAge(cellIdx: number, t: number): number {
    const wave = this.temporalWave;
    if (!wave) return t;
    const col = cellIdx % this.cols;
    const row = (cellIdx - col) / this.cols;
    const offset = Math.round(Math.sin((col + row) * wave.frequency + t * TRAIL_WAVE_TIME_STEP) * wave.amplitude);
    return t + offset;
  }

  // ─── Compositing ───

  /** Brightness grid [row][col], each value clamped to 0-255 */
  composite(): Float64Array[] {
    const result: Float64Array[] = [];
    for (let j = 0; j < this.rows; j++) result.push(new Float64Array(this.cols));
    if (this.filled === 0) return result;

    const len = this.effectiveTrailLength();
    const cells = this.cols * this.rows;
    const accum = new Float64Array(cells);
    const counts = new Uint32Array(cells);
    const mode = this._blendMode;

    for (let t = 0; t < len && t < this.filled; t++) {
      const weight = Math.pow(this._fadeDecay, t);

      for (let c = 0; c < cells; c++) {
        const age = this.displacedAge(c, t);
        if (age < 0 || age >= this.filled) continue;
        const val = this.slots[this.slotIndexForAge(age)].brightness[c] * weight;

        switch (mode) {
          case 'MAX':
            accum[c] = Math.max(accum[c], val);
            break;
          case 'AVERAGE':
            accum[c] += val;
            counts[c]++;
            break;
          case 'ADD':
            accum[c] += val;
            break;
        }
      }
    }

    for (let j = 0; j < this.rows; j++) {
      const row = result[j];
      for (let i = 0; i < this.cols; i++) {
        const idx = j * this.cols + i;
        let v = accum[idx];
        if (mode === 'AVERAGE' && counts[idx] > 0) v /= counts[idx];
        row[i] = constrain(v, 0, CHANNEL_MAX);
      }
    }
    return result;
  }

  /**
   * Flat hue / saturation / brightness. Hue and saturation are weighted
   * averages so they stay inside their ranges; brightness is a weighted
   * sum so trails accumulate light.
   */
  compositeHSB(): HSBFrame {
    const cells = this.cols * this.rows;
    const hue = new Float64Array(cells);
    const saturation = new Float64Array(cells);
    const brightness = new Float64Array(cells);
    if (this.filled === 0) return { hue, saturation, brightness };

    const len = this.effectiveTrailLength();
    const wSum = new Float64Array(cells);

    for (let t = 0; t < len && t < this.filled; t++) {
      const weight = Math.pow(this._fadeDecay, t);

      for (let c = 0; c < cells; c++) {
        const age = this.displacedAge(c, t);
        if (age < 0 || age >= this.filled) continue;
        const slot = this.slots[this.slotIndexForAge(age)];

        hue[c] += slot.hue[c] * weight;
        saturation[c] += slot.saturation[c] * weight;
        brightness[c] += slot.brightness[c] * weight;
        wSum[c] += weight;
      }
    }

    for (let c = 0; c < cells; c++) {
      const w = Math.max(0.001, wSum[c]);
      hue[c] /= w;
      saturation[c] /= w;
      brightness[c] = constrain(brightness[c], 0, CHANNEL_MAX);
    }
    return { hue, saturation, brightness };
  }

  // ─── Reactive trail length ───

  effectiveTrailLength(): number {
    let len = this._trailLength;

    if (this.framerateReactive) {
      const ratio = this.targetFPS / Math.max(1, this.framerateSmooth);
      len = Math.round(len * constrain(ratio, 1.0, TRAIL_MAX_STRETCH));
    }

    // Audio overrides the frame-rate stretch when both are on
    if (this.audioReactive) {
      len = Math.round(lerp(this.audioMinTrail, this.audioMaxTrail, this._audioLevel));
    }

    return Math.min(len, this.filled, this.maxLength);
  }

  // ─── Configuration ───

  setTrailLength(n: number): void {
    this._trailLength = constrain(Math.round(n), 1, this.maxLength);
  }

  /** 0 = only the newest frame counts, 1 = no fade */
  setFadeDecay(decay: number): void {
    this._fadeDecay = constrain(decay, 0, 1);
  }

  setBlendMode(mode: BlendMode): void {
    this._blendMode = mode;
  }

  /**
   * Per-cell temporal displacement.
   * @param amplitude max frame offset per cell
   * @param frequency spatial frequency across the grid
   */
  setTemporalWave(amplitude: number = TRAIL_DEFAULT_WAVE_AMPLITUDE, frequency: number = TRAIL_DEFAULT_WAVE_FREQUENCY): void {
    this.temporalWave = { amplitude, frequency };
  }

  disableTemporalWave(): void {
    this.temporalWave = null;
  }

  setFramerateReactive(enabled: boolean, targetFPS: number = TRAIL_DEFAULT_TARGET_FPS): void {
    this.framerateReactive = enabled;
    this.targetFPS = targetFPS;
  }

  /** Exponential moving average of the host's frame rate */
  feedFramerate(fps: number): void {
    this.framerateSmooth = this.framerateSmooth * FRAMERATE_HISTORY_WEIGHT + fps * FRAMERATE_SAMPLE_WEIGHT;
  }

  setAudioReactive(minTrail: number, maxTrail: number): void {
    this.audioReactive = true;
    this.audioMinTrail = Math.max(1, minTrail);
    this.audioMaxTrail = Math.min(maxTrail, this.maxLength);
  }

  disableAudioReactive(): void {
    this.audioReactive = false;
  }

  feedAudioLevel(level: number): void {
    this._audioLevel = constrain(level, 0, 1);
  }

  /** Forget all history; storage is kept */
  clear(): void {
    this.head = 0;
    this.filled = 0;
  }

  // ─── Accessors ───

  get filledFrames(): number {
    return this.filled;
  }

  get isEmpty(): boolean {
    return this.filled === 0;
  }

  get trailLength(): number {
    return this._trailLength;
  }

  get fadeDecay(): number {
    return this._fadeDecay;
  }

  get blendMode(): BlendMode {
    return this._blendMode;
  }

  get smoothedFramerate(): number {
    return this.framerateSmooth;
  }

  get audioLevel(): number {
    return this._audioLevel;
  }
}
