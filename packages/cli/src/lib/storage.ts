/**
 * Benchmark result export, loading and comparison
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { isAbsolute, join, resolve } from "node:path";
import type { BenchmarkRun, InvocationSample, SummaryStatistics } from "@contract-bench/sdk";
import type {
  BenchmarkComparison,
  BenchmarkResultFile,
  LatencyComparison,
  MachineInfo,
  ResultSample,
} from "./types.js";
import { ResultFileSchema } from "./types.js";

const RESULT_FORMAT_VERSION = "1.0.0";

export const CSV_COLUMNS = [
  "sequence_index",
  "timestamp",
  "duration_ms",
  "gas_used",
  "succeeded",
  "error",
  "kind",
  "tx_hash",
] as const;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * `benchmark_results_<YYYYMMDD_HHMMSS>` in local time
 */
export function resultBasename(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `benchmark_results_${day}_${time}`;
}

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function buildResultFile(
  run: BenchmarkRun,
  summary: SummaryStatistics,
  machine: MachineInfo,
): BenchmarkResultFile {
  return {
    version: RESULT_FORMAT_VERSION,
    method: run.methodName,
    kind: run.kind,
    params: [...run.params],
    iterations: run.iterations,
    warmup: run.warmup,
    startedAt: run.startedAt,
    completedAt: run.completedAt,
    machine,
    summary,
    samples: [...run.samples],
  };
}

function csvField(value: string | number | boolean | undefined): string {
  if (value === undefined) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * One header line plus one row per sample
 */
export function toCsv(samples: readonly (InvocationSample | ResultSample)[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const s of samples) {
    const row = s.succeeded
      ? [s.sequenceIndex, s.startedAt, s.durationMs, s.gasUsed, true, undefined, s.kind, s.txHash]
      : [s.sequenceIndex, s.startedAt, s.durationMs, undefined, false, s.error, s.kind, undefined];
    lines.push(row.map(csvField).join(","));
  }
  return `${lines.join("\n")}\n`;
}

function toJson(result: BenchmarkResultFile): string {
  return JSON.stringify(
    result,
    (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
    2,
  );
}

export interface ExportOptions {
  outputDir: string;
  /** Timestamp used in the file names. Default: now. */
  date?: Date;
}

/**
 * Write the samples as CSV and the full result (summary included) as JSON.
 * Both files share the same timestamped basename.
 */
export function exportResults(
  result: BenchmarkResultFile,
  options: ExportOptions,
): { csvPath: string; jsonPath: string } {
  ensureDir(options.outputDir);

  const basename = resultBasename(options.date);
  const csvPath = join(options.outputDir, `${basename}.csv`);
  const jsonPath = join(options.outputDir, `${basename}.json`);

  writeFileSync(csvPath, toCsv(result.samples));
  writeFileSync(jsonPath, toJson(result));

  return { csvPath, jsonPath };
}

/**
 * Load and validate a JSON result file
 */
export function loadResults(filepath: string): BenchmarkResultFile {
  const fullPath = isAbsolute(filepath) ? filepath : resolve(filepath);
  const content = readFileSync(fullPath, "utf-8");
  return ResultFileSchema.parse(JSON.parse(content));
}

function round(n: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

/**
 * Calculate if difference is statistically significant
 * Using coefficient of variation (CV) as a simple heuristic
 */
function isSignificant(
  baseline: { meanMs: number; stdDevMs: number },
  comparison: { meanMs: number; stdDevMs: number },
): boolean {
  const diffPercent = Math.abs(((comparison.meanMs - baseline.meanMs) / baseline.meanMs) * 100);
  // Consider significant if diff > 2x the coefficient of variation
  const baselineCV = (baseline.stdDevMs / baseline.meanMs) * 100;
  const comparisonCV = (comparison.stdDevMs / comparison.meanMs) * 100;
  const avgCV = (baselineCV + comparisonCV) / 2;
  return diffPercent > avgCV * 2;
}

/**
 * Compare the latency of two result files
 */
export function compareResults(baselinePath: string, comparisonPath: string): BenchmarkComparison {
  const baseline = loadResults(baselinePath);
  const comparison = loadResults(comparisonPath);
  return compareResultFiles(baseline, comparison, baselinePath, comparisonPath);
}

export function compareResultFiles(
  baseline: BenchmarkResultFile,
  comparison: BenchmarkResultFile,
  baselineLabel: string,
  comparisonLabel: string,
): BenchmarkComparison {
  const base = baseline.summary.latency;
  const comp = comparison.summary.latency;
  if (!base || base.meanMs <= 0) {
    throw new Error(`${baselineLabel} has no latency data`);
  }
  if (!comp || comp.meanMs <= 0) {
    throw new Error(`${comparisonLabel} has no latency data`);
  }

  const pairs: Array<[LatencyComparison["metric"], number, number]> = [
    ["mean", base.meanMs, comp.meanMs],
    ["median", base.medianMs, comp.medianMs],
    ["p95", base.p95Ms, comp.p95Ms],
    ["p99", base.p99Ms, comp.p99Ms],
  ];

  return {
    baseline: baselineLabel,
    comparison: comparisonLabel,
    baselineMethod: baseline.method,
    comparisonMethod: comparison.method,
    metrics: pairs.map(([metric, baselineMs, comparisonMs]) => {
      const diffMs = comparisonMs - baselineMs;
      return {
        metric,
        baselineMs,
        comparisonMs,
        diffMs: round(diffMs),
        diffPercent: baselineMs === 0 ? 0 : round((diffMs / baselineMs) * 100, 1),
        faster: diffMs < 0,
      };
    }),
    significant: isSignificant(base, comp),
  };
}
