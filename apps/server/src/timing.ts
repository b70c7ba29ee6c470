import { performance } from "node:perf_hooks";

export interface ScopedTimer {
  release(): number;
}

export function startScopedTimer(
  onRelease: (elapsedMs: number) => void,
  now: () => number = () => performance.now()
): ScopedTimer {
  const startedAt = now();
  let released = false;
  return {
    release: () => {
      const elapsedMs = now() - startedAt;
      if (!released) {
        released = true;
        onRelease(elapsedMs);
      }
      return elapsedMs;
    }
  };
}

export function withTiming<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
  onRelease: (elapsedMs: number) => void,
  now?: () => number
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    const timer = startScopedTimer(onRelease, now);
    try {
      await fn(...args);
    } finally {
      timer.release();
    }
  };
}

export function formatElapsed(elapsedMs: number): string {
  if (elapsedMs < 1000) {
    return `${elapsedMs.toFixed(1)}ms`;
  }
  return `${(elapsedMs / 1000).toFixed(3)}s`;
}
