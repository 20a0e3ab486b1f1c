// --- Wave Field Driver ---
// One tick: engine.update → per-cell HSB → trail capture → trail composite.
// Headless; the host decides when to tick and what to do with the frames.

import type { HSBFrame, ParameterSource } from './types';
import type { WaveFieldEngine } from './WaveFieldEngine';
import type { TrailBuffer } from './TrailBuffer';
import { resolveParameters } from './parameters';
import { Logger } from './logger';

const log = Logger.create('WaveFieldDriver');

export interface WaveFieldDriverOptions {
  engine: WaveFieldEngine;
  trail?: TrailBuffer | null;
  cols: number;
  rows: number;
  params: ParameterSource;
}

export interface DriverFrame {
  frameIndex: number;
  current: HSBFrame;
  /** Composite of the trail after this tick's capture, null without a trail */
  trail: HSBFrame | null;
}

export class WaveFieldDriver {
  readonly cols: number;
  readonly rows: number;
  private readonly engine: WaveFieldEngine;
  private readonly trail: TrailBuffer | null;
  private readonly params: ParameterSource;

  // Current-frame channels, reused across ticks
  private readonly hue: Float64Array;
  private readonly saturation: Float64Array;
  private readonly brightness: Float64Array;

  constructor({ engine, trail = null, cols, rows, params }: WaveFieldDriverOptions) {
    if (!Number.isInteger(cols) || !Number.isInteger(rows) || cols <= 0 || rows <= 0) {
      throw new RangeError(`Grid must be positive integers. Got: ${cols}x${rows}`);
    }
    if (trail && (trail.cols !== cols || trail.rows !== rows)) {
      throw new RangeError(
        `Trail grid ${trail.cols}x${trail.rows} does not match driver grid ${cols}x${rows}`,
      );
    }
    this.engine = engine;
    this.trail = trail;
    this.cols = cols;
    this.rows = rows;
    this.params = params;

    const cells = cols * rows;
    this.hue = new Float64Array(cells);
    this.saturation = new Float64Array(cells);
    this.brightness = new Float64Array(cells);
    log.debug(`Driver ready: ${cols}x${rows}${trail ? `, trail ${trail.maxLength}` : ''}`);
  }

  tick(frameIndex: number): DriverFrame {
    const { cols, rows, engine } = this;
    const p = resolveParameters(this.params);
    engine.update(frameIndex, p.waveSpeed);

    for (let y = 0; y < rows; y++) {
      const rowIdx = y * cols;
      for (let x = 0; x < cols; x++) {
        const idx = rowIdx + x;
        this.hue[idx] = engine.calculateHue(frameIndex, x, y, cols, rows);
        this.saturation[idx] = engine.calculateSaturation(frameIndex, x, y, cols, rows);
        this.brightness[idx] = engine.calculateColorCustom(frameIndex, x, y, cols, rows);
      }
    }

    let trailFrame: HSBFrame | null = null;
    if (this.trail) {
      this.trail.capture(
        (x, y) => this.brightness[y * cols + x],
        (x, y) => this.hue[y * cols + x],
        (x, y) => this.saturation[y * cols + x],
        cols,
        rows,
      );
      trailFrame = this.trail.compositeHSB();
    }

    return {
      frameIndex,
      current: {
        hue: this.hue.slice(),
        saturation: this.saturation.slice(),
        brightness: this.brightness.slice(),
      },
      trail: trailFrame,
    };
  }

  /** Tick frames [start, start + count) and return every frame */
  run(start: number, count: number): DriverFrame[] {
    const frames: DriverFrame[] = [];
    for (let i = 0; i < count; i++) {
      frames.push(this.tick(start + i));
    }
    return frames;
  }
}
