// @vitest-environment jsdom
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { act, render, screen } from '@testing-library/react';
import { FrameRateMonitor } from '../components/FrameRateMonitor';

describe('FrameRateMonitor', () => {
  let frames: FrameRequestCallback[];
  let now: number;

  /** Run the next queued animation frame at the given time */
  function step(at: number): void {
    now = at;
    const callback = frames.shift();
    if (!callback) throw new Error('No animation frame queued');
    act(() => callback(at));
  }

  beforeEach(() => {
    frames = [];
    now = 0;
    vi.stubGlobal('requestAnimationFrame', vi.fn((cb: FrameRequestCallback) => {
      frames.push(cb);
      return frames.length;
    }));
    vi.stubGlobal('cancelAnimationFrame', vi.fn());
    vi.spyOn(performance, 'now').mockImplementation(() => now);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('renders the initial reading', () => {
    const { unmount } = render(
      <FrameRateMonitor>{(r) => <span>{`${r.fps} fps`}</span>}</FrameRateMonitor>,
    );
    expect(screen.getByText('60 fps')).toBeTruthy();
    unmount();
  });

  it('forwards readings from the animation loop', () => {
    const onSample = vi.fn();
    const { unmount } = render(
      <FrameRateMonitor onSample={onSample}>{(r) => <span>{`${r.fps} fps`}</span>}</FrameRateMonitor>,
    );

    step(0);
    for (let i = 0; i < 13; i++) step(10);
    step(500);

    expect(onSample).toHaveBeenCalledTimes(1);
    expect(onSample).toHaveBeenCalledWith(30);
    expect(screen.getByText('30 fps')).toBeTruthy();
    unmount();
  });

  it('cancels the loop on unmount', () => {
    const { unmount } = render(<FrameRateMonitor />);
    unmount();
    expect(cancelAnimationFrame).toHaveBeenCalled();
  });
});
