// --- Scalar helpers shared by the engine, strategies and trail ---

export const TWO_PI = Math.PI * 2;

export function radians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/** Re-map value from [start1, stop1] into [start2, stop2] (no clamping) */
export function mapRange(value: number, start1: number, stop1: number, start2: number, stop2: number): number {
  return start2 + (stop2 - start2) * ((value - start1) / (stop1 - start1));
}

/** Position of value within [start, stop] as 0-1 (unclamped) */
export function norm(value: number, start: number, stop: number): number {
  return mapRange(value, start, stop, 0, 1);
}

export function constrain(value: number, low: number, high: number): number {
  return value < low ? low : value > high ? high : value;
}

export function lerp(start: number, stop: number, amount: number): number {
  return start + (stop - start) * amount;
}

/** Fractional part wrapped into [0, 1), also for negative input */
export function wrapUnit(value: number): number {
  const t = value % 1;
  return t < 0 ? t + 1 : t;
}
