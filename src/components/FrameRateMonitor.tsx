// --- Frame Rate Monitor ---
// Runs a FrameRateSampler on requestAnimationFrame and forwards each reading,
// typically into TrailBuffer.feedFramerate for frame-rate reactive trails.

import { useEffect, useRef, useState, useCallback } from 'react';
import type { ReactNode } from 'react';
import type { FrameRateReading } from '../types';
import { FrameRateSampler } from '../frameRate';

interface FrameRateMonitorProps {
  /** Called with every FPS reading (about twice a second) */
  onSample?: (fps: number) => void;
  /** Called when degradation state changes */
  onDegradationChange?: (degraded: boolean) => void;
  children?: (state: FrameRateReading) => ReactNode;
}

export function FrameRateMonitor({ onSample, onDegradationChange, children }: FrameRateMonitorProps) {
  const [reading, setReading] = useState<FrameRateReading>({ fps: 60, degraded: false });
  const samplerRef = useRef<FrameRateSampler | null>(null);
  const degradedRef = useRef(false);
  const rafRef = useRef(0);

  const onSampleRef = useRef(onSample);
  onSampleRef.current = onSample;
  const onDegradationChangeRef = useRef(onDegradationChange);
  onDegradationChangeRef.current = onDegradationChange;

  const tick = useCallback(() => {
    const now = performance.now();
    if (!samplerRef.current) samplerRef.current = new FrameRateSampler(now);
    const next = samplerRef.current.sample(now);

    if (next) {
      onSampleRef.current?.(next.fps);
      if (next.degraded !== degradedRef.current) {
        degradedRef.current = next.degraded;
        onDegradationChangeRef.current?.(next.degraded);
      }
      setReading(next);
    }

    rafRef.current = requestAnimationFrame(tick);
  }, []);

  useEffect(() => {
    rafRef.current = requestAnimationFrame(tick);
    return () => cancelAnimationFrame(rafRef.current);
  }, [tick]);

  return children ? <>{children(reading)}</> : null;
}
