import type { LatencyStatistics } from "@contract-bench/sdk";
import type { BenchmarkResultFile, MachineInfo } from "./types.js";

export const machine: MachineInfo = {
  hostname: "bench-host",
  platform: "linux",
  arch: "x64",
  osRelease: "6.1.0",
  cpuModel: "Test CPU",
  cpuCores: 8,
  cpuSpeed: 3000,
  totalMemoryGB: 16,
  nodeVersion: "v20.11.0",
  timestamp: "2026-03-01T12:00:00.000Z",
};

export function latency(overrides: Partial<LatencyStatistics> = {}): LatencyStatistics {
  return {
    minMs: 50,
    maxMs: 250,
    meanMs: 100,
    medianMs: 90,
    stdDevMs: 10,
    p95Ms: 150,
    p99Ms: 200,
    ...overrides,
  };
}

export function resultFile(overrides: Partial<BenchmarkResultFile> = {}): BenchmarkResultFile {
  return {
    version: "1.0.0",
    method: "get_count",
    kind: "read",
    params: [],
    iterations: 10,
    warmup: 5,
    startedAt: "2026-03-01T12:00:00.000Z",
    completedAt: "2026-03-01T12:00:02.000Z",
    machine,
    summary: {
      total: 10,
      succeeded: 10,
      failed: 0,
      successRate: 1,
      latency: latency(),
      gas: null,
      throughputTps: 10,
    },
    samples: [],
    ...overrides,
  };
}
