import { describe, it, expect, beforeEach } from 'vitest';
import { TrailBuffer } from '../TrailBuffer';
import { WaveFieldEngine } from '../WaveFieldEngine';
import { createParameterSet } from '../parameters';

/** Capture a uniform brightness over the whole grid */
function fill(trail: TrailBuffer, value: number): void {
  trail.captureRaw(new Array<number>(trail.cols * trail.rows).fill(value));
}

describe('TrailBuffer', () => {
  let trail: TrailBuffer;

  beforeEach(() => {
    trail = new TrailBuffer(4, 3, 8);
  });

  // ── Construction ──
  describe('constructor', () => {
    it('starts empty with the full capacity as trail length', () => {
      expect(trail.isEmpty).toBe(true);
      expect(trail.filledFrames).toBe(0);
      expect(trail.trailLength).toBe(8);
      expect(trail.fadeDecay).toBe(0.7);
      expect(trail.blendMode).toBe('ADD');
    });

    it('clamps a capacity below one', () => {
      expect(new TrailBuffer(2, 2, 0).maxLength).toBe(1);
      expect(new TrailBuffer(2, 2, -5).maxLength).toBe(1);
    });

    it('composites an empty buffer to zeros', () => {
      const grid = trail.composite();
      expect(grid).toHaveLength(3);
      for (const row of grid) expect(Array.from(row)).toEqual([0, 0, 0, 0]);

      const hsb = trail.compositeHSB();
      expect(hsb.brightness).toHaveLength(12);
      expect(Array.from(hsb.hue).every((v) => v === 0)).toBe(true);
    });
  });

  // ── Capture ──
  describe('capture', () => {
    it('returns a single frame unchanged', () => {
      trail.setTrailLength(1);
      trail.setFadeDecay(1);
      trail.captureRaw([10, 20, 30, 40, 50, 60, 70, 80, 90, 100, 110, 120]);

      const grid = trail.composite();
      expect(Array.from(grid[0])).toEqual([10, 20, 30, 40]);
      expect(Array.from(grid[2])).toEqual([90, 100, 110, 120]);
    });

    it('samples every cell through the samplers', () => {
      trail.setTrailLength(1);
      trail.capture((x, y) => x + y * 10, () => 0, () => 0);
      const grid = trail.composite();
      expect(Array.from(grid[1])).toEqual([10, 11, 12, 13]);
    });

    it('ignores cells outside its own grid', () => {
      const visited: Array<[number, number]> = [];
      trail.capture((x, y) => {
        visited.push([x, y]);
        return 1;
      }, () => 0, () => 0, 10, 10);
      expect(visited).toHaveLength(12);
      expect(trail.filledFrames).toBe(1);
    });

    it('returns captured values at full precision', () => {
      trail.setTrailLength(1);
      trail.setFadeDecay(1);
      trail.capture(() => 100.3, () => 12.7, () => 33.1);

      expect(trail.composite()[0][0]).toBe(100.3);
      const hsb = trail.compositeHSB();
      expect(hsb.brightness[11]).toBe(100.3);
      expect(hsb.hue[11]).toBe(12.7);
      expect(hsb.saturation[11]).toBe(33.1);
    });

    it('zeroes cells a smaller lattice does not reach', () => {
      const small = new TrailBuffer(4, 3, 1);
      small.capture(() => 100, () => 100, () => 100);
      small.capture(() => 50, () => 50, () => 50, 2, 2);

      const grid = small.composite();
      expect(grid[1][1]).toBe(50);
      expect(grid[2][3]).toBe(0);
      expect(grid[0][2]).toBe(0);
      expect(small.compositeHSB().hue[11]).toBe(0);
    });

    it('clamps brightness into 0-255', () => {
      trail.setTrailLength(1);
      trail.captureRaw([300, -20, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
      const grid = trail.composite();
      expect(grid[0][0]).toBe(255);
      expect(grid[0][1]).toBe(0);
    });

    it('keeps the most recent frames after wrapping', () => {
      trail.setTrailLength(1);
      trail.setFadeDecay(1);
      for (let i = 0; i < 15; i++) fill(trail, i);

      expect(trail.filledFrames).toBe(8);
      expect(trail.composite()[0][0]).toBe(14);
    });
  });

  // ── Blending ──
  describe('blend modes', () => {
    beforeEach(() => {
      trail.setTrailLength(2);
      trail.setFadeDecay(1);
      fill(trail, 50);
      fill(trail, 100);
    });

    it('ADD sums the frames', () => {
      trail.setBlendMode('ADD');
      expect(trail.composite()[0][0]).toBe(150);
    });

    it('MAX keeps the brightest', () => {
      trail.setBlendMode('MAX');
      expect(trail.composite()[0][0]).toBe(100);
    });

    it('AVERAGE divides by the contributing frames', () => {
      trail.setBlendMode('AVERAGE');
      expect(trail.composite()[1][3]).toBe(75);
    });

    it('ADD clamps at 255', () => {
      fill(trail, 200);
      fill(trail, 200);
      expect(trail.composite()[0][0]).toBe(255);
    });
  });

  describe('fade decay', () => {
    it('weights older frames by decay^age', () => {
      trail.setTrailLength(2);
      trail.setFadeDecay(0.5);
      fill(trail, 40);
      fill(trail, 100);
      expect(trail.composite()[0][0]).toBe(120);
    });

    it('applies the weight before MAX', () => {
      trail.setTrailLength(2);
      trail.setFadeDecay(0.5);
      trail.setBlendMode('MAX');
      fill(trail, 240);
      fill(trail, 100);
      expect(trail.composite()[0][0]).toBe(120);
    });

    it('zero decay shows only the newest frame', () => {
      trail.setFadeDecay(0);
      fill(trail, 80);
      fill(trail, 30);
      expect(trail.composite()[0][0]).toBe(30);
    });

    it('clamps the decay into 0-1', () => {
      trail.setFadeDecay(-0.5);
      expect(trail.fadeDecay).toBe(0);
      trail.setFadeDecay(2);
      expect(trail.fadeDecay).toBe(1);
    });
  });

  describe('compositeHSB', () => {
    it('averages hue and saturation by weight and sums brightness', () => {
      trail.setTrailLength(2);
      trail.setFadeDecay(0.5);
      trail.capture(() => 100, () => 100, () => 50);
      trail.capture(() => 100, () => 200, () => 150);

      const hsb = trail.compositeHSB();
      expect(hsb.hue[0]).toBeCloseTo(166.6667, 3);
      expect(hsb.saturation[0]).toBeCloseTo(116.6667, 3);
      expect(hsb.brightness[0]).toBe(150);
    });

    it('clamps summed brightness', () => {
      trail.setFadeDecay(1);
      trail.capture(() => 200, () => 10, () => 10);
      trail.capture(() => 200, () => 10, () => 10);
      const hsb = trail.compositeHSB();
      expect(hsb.brightness[5]).toBe(255);
      expect(hsb.hue[5]).toBe(10);
    });
  });

  // ── Trail length ──
  describe('effectiveTrailLength', () => {
    it('is bounded by the filled frames', () => {
      fill(trail, 1);
      fill(trail, 1);
      fill(trail, 1);
      expect(trail.effectiveTrailLength()).toBe(3);
    });

    it('clamps the configured length', () => {
      trail.setTrailLength(0);
      expect(trail.trailLength).toBe(1);
      trail.setTrailLength(100);
      expect(trail.trailLength).toBe(8);
      trail.setTrailLength(3.4);
      expect(trail.trailLength).toBe(3);
    });
  });

  describe('audio reactive', () => {
    beforeEach(() => {
      for (let i = 0; i < 8; i++) fill(trail, 10);
      trail.setAudioReactive(2, 8);
    });

    it('interpolates between the audio bounds', () => {
      trail.feedAudioLevel(0);
      expect(trail.effectiveTrailLength()).toBe(2);
      trail.feedAudioLevel(0.5);
      expect(trail.effectiveTrailLength()).toBe(5);
      trail.feedAudioLevel(1);
      expect(trail.effectiveTrailLength()).toBe(8);
    });

    it('never shrinks as the level rises', () => {
      let previous = 0;
      for (let level = 0; level <= 1; level += 0.1) {
        trail.feedAudioLevel(level);
        const len = trail.effectiveTrailLength();
        expect(len).toBeGreaterThanOrEqual(previous);
        previous = len;
      }
    });

    it('clamps the fed level', () => {
      trail.feedAudioLevel(2);
      expect(trail.audioLevel).toBe(1);
      trail.feedAudioLevel(-1);
      expect(trail.audioLevel).toBe(0);
    });

    it('overrides the frame-rate stretch', () => {
      trail.setTrailLength(2);
      trail.setFramerateReactive(true, 60);
      for (let i = 0; i < 200; i++) trail.feedFramerate(10);
      trail.feedAudioLevel(0);
      expect(trail.effectiveTrailLength()).toBe(2);

      trail.disableAudioReactive();
      expect(trail.effectiveTrailLength()).toBe(6);
    });
  });

  describe('frame-rate reactive', () => {
    beforeEach(() => {
      for (let i = 0; i < 8; i++) fill(trail, 10);
      trail.setTrailLength(2);
      trail.setFramerateReactive(true, 60);
    });

    it('smooths the fed frame rate', () => {
      expect(trail.smoothedFramerate).toBe(60);
      trail.feedFramerate(30);
      expect(trail.smoothedFramerate).toBeCloseTo(57, 10);
    });

    it('stretches the trail when the host slows down', () => {
      trail.feedFramerate(20);
      expect(trail.effectiveTrailLength()).toBe(2);
      for (let i = 0; i < 100; i++) trail.feedFramerate(20);
      expect(trail.effectiveTrailLength()).toBe(6);
    });

    it('never shortens below the configured length', () => {
      for (let i = 0; i < 100; i++) trail.feedFramerate(120);
      expect(trail.effectiveTrailLength()).toBe(2);
    });

    it('caps the stretch at 3x', () => {
      for (let i = 0; i < 200; i++) trail.feedFramerate(5);
      expect(trail.effectiveTrailLength()).toBe(6);
    });
  });

  // ── Temporal wave ──
  describe('temporal wave', () => {
    let cell: TrailBuffer;

    beforeEach(() => {
      cell = new TrailBuffer(1, 1, 8);
      cell.setFadeDecay(1);
      cell.setTrailLength(2);
    });

    it('displaces the sampled age per step', () => {
      for (const v of [10, 20, 30, 40]) cell.captureRaw([v]);
      expect(cell.composite()[0][0]).toBe(70);

      cell.setTemporalWave(10, 0.3);
      // step 1 samples age 1 + round(sin(0.2) * 10) = 3
      expect(cell.composite()[0][0]).toBe(50);

      cell.disableTemporalWave();
      expect(cell.composite()[0][0]).toBe(70);
    });

    it('skips ages outside the filled history', () => {
      cell.captureRaw([10]);
      cell.captureRaw([20]);
      cell.setTemporalWave(10, 0.3);
      expect(cell.composite()[0][0]).toBe(20);
      cell.setTemporalWave(-10, 0.3);
      expect(cell.composite()[0][0]).toBe(20);
    });

    it('leaves compositing unchanged at zero amplitude', () => {
      for (const v of [10, 20, 30]) cell.captureRaw([v]);
      cell.setTemporalWave(0, 0.3);
      expect(cell.composite()[0][0]).toBe(50);
    });
  });

  // ── Engine capture ──
  describe('captureFromEngine', () => {
    it('stores the engine brightness for every cell', () => {
      const engine = new WaveFieldEngine(createParameterSet());
      trail.setTrailLength(1);
      trail.captureFromEngine(engine, 9);

      expect(trail.composite()[2][1]).toBe(engine.calculateColorCustom(9, 1, 2, 4, 3));
    });

    it('keeps a fixed hue and samples an open saturation range', () => {
      const engine = new WaveFieldEngine(createParameterSet({
        hueMin: 180, hueMax: 180, saturationMin: 0, saturationMax: 255,
      }));
      trail.setTrailLength(1);
      trail.captureFromEngine(engine, 9);

      const hsb = trail.compositeHSB();
      expect(hsb.hue[6]).toBe(180);
      expect(hsb.saturation[6]).toBe(engine.calculateSaturation(9, 2, 1, 4, 3));
    });

    it('samples hue when the hue range is open', () => {
      const engine = new WaveFieldEngine(createParameterSet({ hueMin: 0, hueMax: 360 }));
      trail.setTrailLength(1);
      trail.captureFromEngine(engine, 9);

      expect(trail.compositeHSB().hue[6]).toBe(engine.calculateHue(9, 2, 1, 4, 3));
    });
  });

  // ── Reset ──
  describe('clear', () => {
    it('forgets history and captures again from scratch', () => {
      fill(trail, 90);
      fill(trail, 90);
      trail.clear();
      expect(trail.isEmpty).toBe(true);
      expect(trail.composite()[0][0]).toBe(0);

      trail.setTrailLength(1);
      fill(trail, 33);
      expect(trail.composite()[0][0]).toBe(33);
    });
  });
});
