import { describe, it, expect, beforeEach } from 'vitest';
import {
  ParameterValidationError,
  createParameterSet,
  parseParameterSet,
  serializeParameterSet,
  validateParameterSet,
} from '../parameters';
import { DEFAULT_PARAMETERS } from '../constants';
import { Logger } from '../logger';

describe('parameters', () => {
  beforeEach(() => {
    Logger.clear();
  });

  // ── createParameterSet ──
  describe('createParameterSet', () => {
    it('returns the defaults', () => {
      const p = createParameterSet();
      expect(p).toEqual(DEFAULT_PARAMETERS);
      expect(Object.isFrozen(p)).toBe(true);
    });

    it('folds the angle into [0, 360)', () => {
      expect(createParameterSet({ waveAngle: 370 }).waveAngle).toBe(10);
      expect(createParameterSet({ waveAngle: -30 }).waveAngle).toBe(330);
    });

    it('rejects an out-of-range hue', () => {
      expect(() => createParameterSet({ hueMax: 400 }))
        .toThrow('hueMax must be between 0 and 360. Got: 400');
    });

    it('rejects a non-integer frame rate', () => {
      try {
        createParameterSet({ animationFPS: 2.5 });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ParameterValidationError);
        if (err instanceof ParameterValidationError) {
          expect(err.field).toBe('animationFPS');
          expect(err.value).toBe(2.5);
        }
      }
    });

    it('rejects non-finite numbers', () => {
      expect(() => validateParameterSet({ ...DEFAULT_PARAMETERS, waveSpeed: Number.NaN }))
        .toThrow('waveSpeed must be a finite number. Got: NaN');
    });
  });

  // ── parseParameterSet ──
  describe('parseParameterSet', () => {
    it('keeps defaults for an empty document', () => {
      expect(parseParameterSet({})).toEqual(DEFAULT_PARAMETERS);
    });

    it('reads both sections', () => {
      const p = parseParameterSet({
        animation: { fps: 60, duration: 10, waveSpeed: 2 },
        colors: { hueMin: 10, hueMax: 200, waveAmplitudeMin: -50 },
      });
      expect(p.animationFPS).toBe(60);
      expect(p.animationDurationSeconds).toBe(10);
      expect(p.waveSpeed).toBe(2);
      expect(p.hueMin).toBe(10);
      expect(p.hueMax).toBe(200);
      expect(p.waveAmplitudeMin).toBe(-50);
    });

    it('falls back to the default for an invalid value', () => {
      const p = parseParameterSet({ colors: { hueMax: 500 }, animation: { fps: '30' } });
      expect(p.hueMax).toBe(0);
      expect(p.animationFPS).toBe(30);

      const warnings = Logger.getBuffer('WARN').map((e) => e.message);
      expect(warnings).toContain('hueMax must be between 0 and 360, using default: 0');
      expect(warnings).toContain('fps must be a finite number, using default: 30');
    });

    it('swaps inverted ranges', () => {
      const p = parseParameterSet({ colors: { brightnessMin: 200, brightnessMax: 100 } });
      expect(p.brightnessMin).toBe(100);
      expect(p.brightnessMax).toBe(200);
      expect(Logger.getBuffer('WARN').map((e) => e.message))
        .toEqual(['brightnessMin > brightnessMax, swapping values']);
    });

    it('rejects a non-object document', () => {
      expect(() => parseParameterSet(42)).toThrow(ParameterValidationError);
      expect(() => parseParameterSet(null)).toThrow('Parameter document must be an object');
    });
  });

  // ── serializeParameterSet ──
  describe('serializeParameterSet', () => {
    it('nests the fields and parses back to the same set', () => {
      const p = createParameterSet({ waveSpeed: 3, hueMin: 30, hueMax: 90, brightnessMin: 0 });
      const doc = serializeParameterSet(p);
      expect(doc.animation.fps).toBe(30);
      expect(doc.colors.hueMax).toBe(90);
      expect(parseParameterSet(doc)).toEqual(p);
    });
  });
});
