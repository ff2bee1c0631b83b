/**
 * Benchmark result file format
 */

import { z } from "zod";

const LatencySchema = z.object({
  minMs: z.number(),
  maxMs: z.number(),
  meanMs: z.number(),
  medianMs: z.number(),
  stdDevMs: z.number(),
  p95Ms: z.number(),
  p99Ms: z.number(),
});

const GasSchema = z.object({
  min: z.number(),
  max: z.number(),
  mean: z.number(),
  median: z.number(),
});

export const SummarySchema = z.object({
  total: z.number().int(),
  succeeded: z.number().int(),
  failed: z.number().int(),
  successRate: z.number().nullable(),
  latency: LatencySchema.nullable(),
  gas: GasSchema.nullable(),
  throughputTps: z.number().nullable(),
});

const SampleBase = {
  sequenceIndex: z.number().int().nonnegative(),
  startedAt: z.string(),
  durationMs: z.number().nonnegative(),
  kind: z.enum(["read", "write"]),
};

export const SampleSchema = z.discriminatedUnion("succeeded", [
  z.object({
    ...SampleBase,
    succeeded: z.literal(true),
    gasUsed: z.number().optional(),
    txHash: z.string().optional(),
    result: z.string().optional(),
  }),
  z.object({
    ...SampleBase,
    succeeded: z.literal(false),
    error: z.string(),
  }),
]);

export const MachineInfoSchema = z.object({
  hostname: z.string(),
  platform: z.string(),
  arch: z.string(),
  osRelease: z.string(),
  cpuModel: z.string(),
  cpuCores: z.number(),
  cpuSpeed: z.number(),
  totalMemoryGB: z.number(),
  nodeVersion: z.string(),
  timestamp: z.string(),
});

export const ResultFileSchema = z.object({
  /** Version of the result file format */
  version: z.string(),
  method: z.string(),
  kind: z.enum(["read", "write"]),
  params: z.array(z.unknown()),
  iterations: z.number().int().positive(),
  warmup: z.number().int().nonnegative(),
  startedAt: z.string(),
  completedAt: z.string(),
  machine: MachineInfoSchema,
  summary: SummarySchema,
  samples: z.array(SampleSchema),
});

export type MachineInfo = z.infer<typeof MachineInfoSchema>;
export type BenchmarkResultFile = z.infer<typeof ResultFileSchema>;
export type ResultSample = z.infer<typeof SampleSchema>;

export interface LatencyComparison {
  metric: "mean" | "median" | "p95" | "p99";
  baselineMs: number;
  comparisonMs: number;
  diffMs: number;
  diffPercent: number;
  faster: boolean;
}

export interface BenchmarkComparison {
  /** Baseline result file */
  baseline: string;
  /** Comparison result file */
  comparison: string;
  baselineMethod: string;
  comparisonMethod: string;
  metrics: LatencyComparison[];
  /** Mean difference exceeds twice the average coefficient of variation */
  significant: boolean;
}
