export const DEFAULT_FRAME_DELAY_MS = 100;
export const MS_PER_SECOND = 1000;

export type TimedFrame<T> = {
  frame: T;
  delayMs: number;
};

/** Animations often store 0 for "as fast as possible"; treat that as 100 ms. */
export function normalizeDelay(ms: number | undefined): number {
  return ms === undefined || !Number.isFinite(ms) || ms <= 0 ? DEFAULT_FRAME_DELAY_MS : ms;
}

function averageDelay(delays: number[]): number {
  const total = delays.reduce((a, d) => a + d, 0);
  return total / delays.length;
}

/**
 * The requested rate, capped by the source's own average rate. Never drops
 * below 1 so a tick count per frame always exists.
 */
export function effectiveFps(delays: number[], targetFps: number): number {
  if (delays.length === 0) return Math.max(1, Math.floor(targetFps));
  const sourceFps = Math.floor(MS_PER_SECOND / averageDelay(delays.map(normalizeDelay)));
  return Math.max(1, Math.min(Math.floor(targetFps), sourceFps));
}

/**
 * Picks frames at a fixed rate from a variable-delay sequence. Sample `i`
 * lands at `i / fps` seconds and takes the source frame nearest that time on
 * an even grid of average delay.
 */
export function sampleFrames<T>(frames: TimedFrame<T>[], fps: number): T[] {
  if (frames.length === 0) return [];
  const delays = frames.map((f) => normalizeDelay(f.delayMs));
  const totalMs = delays.reduce((a, d) => a + d, 0);
  const avg = totalMs / frames.length;
  // A clip shorter than one sample period still yields its first frame.
  const count = Math.max(1, Math.round((totalMs / MS_PER_SECOND) * fps));
  const out: T[] = [];
  for (let i = 0; i < count; i += 1) {
    const t = i * (MS_PER_SECOND / fps);
    const index = Math.min(Math.round(t / avg), frames.length - 1);
    out.push(frames[index].frame);
  }
  return out;
}
