import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { InvocationSample } from "@contract-bench/sdk";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CHART_FILES, generateCharts, renderHistogram, renderTrend } from "./charts.js";

function sample(sequenceIndex: number, durationMs: number, gasUsed?: number): InvocationSample {
  return {
    sequenceIndex,
    startedAt: "2026-03-01T12:00:00.000Z",
    durationMs,
    kind: gasUsed === undefined ? "read" : "write",
    succeeded: true,
    ...(gasUsed !== undefined && { gasUsed }),
  };
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "contract-bench-charts-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("renderHistogram", () => {
  test("produces a standalone SVG document", () => {
    const svg = renderHistogram([10, 12, 12, 15, 20], "Execution time (ms)", "steelblue");
    expect(svg.startsWith("<svg")).toBe(true);
    expect(svg).toContain('xmlns="http://www.w3.org/2000/svg"');
    expect(svg).toContain("Execution time (ms)");
  });
});

describe("renderTrend", () => {
  test("draws a line through the points", () => {
    const svg = renderTrend(
      [
        { sequenceIndex: 0, value: 10 },
        { sequenceIndex: 1, value: 14 },
      ],
      "Execution time (ms)",
    );
    expect(svg.startsWith("<svg")).toBe(true);
    expect(svg).toContain("<path");
  });
});

describe("generateCharts", () => {
  test("writes all three charts when gas was reported", () => {
    const outputDir = join(dir, "charts");
    const paths = generateCharts([sample(0, 10, 21000), sample(1, 12, 23000), sample(2, 11, 22000)], {
      outputDir,
    });

    expect(paths).toEqual([
      join(outputDir, CHART_FILES.latencyDistribution),
      join(outputDir, CHART_FILES.latencyTrend),
      join(outputDir, CHART_FILES.gasDistribution),
    ]);
    for (const path of paths) {
      expect(readFileSync(path, "utf-8").startsWith("<svg")).toBe(true);
    }
  });

  test("skips the gas chart without gas data", () => {
    const paths = generateCharts([sample(0, 10), sample(1, 12)], { outputDir: dir });
    expect(paths).toEqual([join(dir, CHART_FILES.latencyDistribution), join(dir, CHART_FILES.latencyTrend)]);
    expect(existsSync(join(dir, CHART_FILES.gasDistribution))).toBe(false);
  });

  test("writes nothing without samples", () => {
    const outputDir = join(dir, "empty");
    expect(generateCharts([], { outputDir })).toEqual([]);
    expect(existsSync(outputDir)).toBe(false);
  });
});
