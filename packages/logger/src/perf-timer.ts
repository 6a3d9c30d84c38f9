/**
 * @fileoverview Performance timing for provider queries.
 * Uses performance.now() for high-resolution measurements.
 */

export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Milliseconds since start, rounded */
  elapsed(): number;

  /** Freezes the timer and returns the final duration */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * Starts a timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const series = await session.queryBars(query);
 * logger.debug('Bars fetched', { duration_ms: timer.stop(), count: series.bars.length });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return Math.round(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return Math.round(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Measures an async function.
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = await measureAsync(() => client.get('/query_stock_basic'));
 * ```
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
