/**
 * Descriptive statistics over a sample sequence.
 *
 * Conventions:
 * - Percentiles use the nearest-rank rule: index `ceil(p/100 * n) - 1` of the
 *   ascending sequence, clamped to the valid range.
 * - Standard deviation is the population formula (divide by n).
 * - Median averages the two middle values when n is even.
 */

import type {
  GasStatistics,
  InvocationSample,
  LatencyStatistics,
  SummaryStatistics,
} from "./types.js";

/**
 * Calculate percentile from sorted array
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return Number.NaN;
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, Math.min(index, sorted.length - 1))] ?? Number.NaN;
}

export function median(sorted: readonly number[]): number {
  const n = sorted.length;
  if (n === 0) return Number.NaN;
  const mid = Math.floor(n / 2);
  const upper = sorted[mid] ?? Number.NaN;
  if (n % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? Number.NaN;
  return (lower + upper) / 2;
}

function mean(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

function latencyStatistics(durations: readonly number[]): LatencyStatistics | null {
  if (durations.length === 0) return null;

  const sorted = sortAscending(durations);
  const avg = mean(durations);
  const variance =
    durations.reduce((acc, d) => acc + Math.pow(d - avg, 2), 0) / durations.length;

  return {
    minMs: sorted[0] ?? Number.NaN,
    maxMs: sorted[sorted.length - 1] ?? Number.NaN,
    meanMs: avg,
    medianMs: median(sorted),
    stdDevMs: Math.sqrt(variance),
    p95Ms: percentile(sorted, 95),
    p99Ms: percentile(sorted, 99),
  };
}

function gasStatistics(gas: readonly number[]): GasStatistics | null {
  if (gas.length === 0) return null;

  const sorted = sortAscending(gas);
  return {
    min: sorted[0] ?? Number.NaN,
    max: sorted[sorted.length - 1] ?? Number.NaN,
    mean: mean(gas),
    median: median(sorted),
  };
}

/**
 * Summarize a sample sequence. Pure: the same input always yields the same
 * output, and an empty input yields null statistics instead of throwing.
 */
export function summarize(samples: readonly InvocationSample[]): SummaryStatistics {
  const total = samples.length;
  const succeeded = samples.filter((s) => s.succeeded).length;
  const gas: number[] = [];
  for (const sample of samples) {
    if (sample.succeeded && sample.gasUsed !== undefined) {
      gas.push(sample.gasUsed);
    }
  }

  const latency = latencyStatistics(samples.map((s) => s.durationMs));
  const throughputTps =
    latency !== null && latency.meanMs > 0 && succeeded > 0 ? 1000 / latency.meanMs : null;

  return {
    total,
    succeeded,
    failed: total - succeeded,
    successRate: total === 0 ? null : succeeded / total,
    latency,
    gas: gasStatistics(gas),
    throughputTps,
  };
}
