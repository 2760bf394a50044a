import { performance } from "node:perf_hooks";
import { InvalidRepeatCountError } from "./errors.ts";
import type { OperationSummary } from "./types.ts";

export type MeasureOptions = {
  // Untimed, run around every repetition.
  beforeEach?: (repetition: number) => Promise<void> | void;
  afterEach?: (repetition: number) => Promise<void> | void;
  onError?: (error: unknown, repetition: number) => void;
  clock?: () => number;
};

export type Measurement = {
  samples: number[];
  summary: OperationSummary;
};

/**
 * Runs `operation` exactly `repeats` times, one after another, and reduces the
 * elapsed milliseconds to a summary. The first failure is re-thrown as is.
 */
export async function measure(
  operation: () => Promise<unknown>,
  repeats: number,
  options: MeasureOptions = {},
): Promise<Measurement> {
  if (!Number.isInteger(repeats) || repeats <= 0) throw new InvalidRepeatCountError(repeats);
  const clock = options.clock ?? (() => performance.now());

  const samples: number[] = [];
  for (let i = 0; i < repeats; i++) {
    try {
      if (options.beforeEach) await options.beforeEach(i);
      const t0 = clock();
      await operation();
      samples.push(clock() - t0);
      if (options.afterEach) await options.afterEach(i);
    } catch (e) {
      options.onError?.(e, i);
      throw e;
    }
  }
  return { samples, summary: summarise(samples) };
}

export function summarise(samples: readonly number[]): OperationSummary {
  if (samples.length === 0) throw new InvalidRepeatCountError(0);
  const sorted = [...samples].sort((a, b) => a - b);
  const n = sorted.length;
  const mid = Math.floor(n / 2);
  const median = n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  const total = sorted.reduce((acc, x) => acc + x, 0);
  return {
    count: n,
    mean: total / n,
    median,
    min: sorted[0],
    max: sorted[n - 1],
  };
}
