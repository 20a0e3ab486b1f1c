// --- Frame Rate Sampler ---
// Turns frame timestamps into FPS readings and detects sustained drops.
// Readings feed TrailBuffer.feedFramerate so a stuttering host gets longer trails.

import type { FrameRateReading } from './types';

/** FPS threshold below which we degrade (sustained for DEGRADE_WINDOW frames) */
export const DEGRADE_FPS = 30;
/** FPS threshold above which we recover (sustained for RECOVER_WINDOW frames) */
export const RECOVER_FPS = 45;
/** Number of consecutive low-FPS frames before degrading */
export const DEGRADE_WINDOW = 180; // ~3 seconds at 60fps
/** Number of consecutive good-FPS frames before recovering */
export const RECOVER_WINDOW = 300; // ~5 seconds at 60fps
/** Milliseconds between readings */
export const SAMPLE_INTERVAL = 500;

const FRAME_MS = 16.67;

export class FrameRateSampler {
  private lastTime: number;
  private frameCount = 0;
  private lowTime = 0;
  private highTime = 0;
  private degraded = false;

  constructor(now: number) {
    this.lastTime = now;
  }

  /** Count one frame; returns a reading every SAMPLE_INTERVAL ms, else null */
  sample(now: number): FrameRateReading | null {
    this.frameCount++;
    const elapsed = now - this.lastTime;
    if (elapsed < SAMPLE_INTERVAL) return null;

    const fps = (this.frameCount / elapsed) * 1000;
    this.frameCount = 0;
    this.lastTime = now;

    // Track sustained drops/recoveries
    if (fps < DEGRADE_FPS) {
      this.lowTime += elapsed;
      this.highTime = 0;
    } else if (fps > RECOVER_FPS) {
      this.highTime += elapsed;
      this.lowTime = 0;
    } else {
      // In the middle zone - don't change counters rapidly
      this.lowTime = Math.max(0, this.lowTime - elapsed * 0.5);
      this.highTime = Math.max(0, this.highTime - elapsed * 0.5);
    }

    if (!this.degraded && this.lowTime > DEGRADE_WINDOW * FRAME_MS) {
      this.degraded = true;
    } else if (this.degraded && this.highTime > RECOVER_WINDOW * FRAME_MS) {
      this.degraded = false;
    }

    return { fps, degraded: this.degraded };
  }

  get isDegraded(): boolean {
    return this.degraded;
  }
}
