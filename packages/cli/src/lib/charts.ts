/**
 * SVG charts derived from a run's samples.
 *
 * Plot renders into a jsdom document; the resulting `<svg>` is written as a
 * standalone file.
 *
 * @module
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import * as Plot from "@observablehq/plot";
import { getLogger } from "@logtape/logtape";
import { JSDOM } from "jsdom";
import type { InvocationSample } from "@contract-bench/sdk";

const logger = getLogger(["contract-bench", "cli", "charts"]);

const SVG_NS = "http://www.w3.org/2000/svg";
const HISTOGRAM_BINS = 30;

export const CHART_FILES = {
  latencyDistribution: "latency_distribution.svg",
  latencyTrend: "latency_trend.svg",
  gasDistribution: "gas_distribution.svg",
} as const;

interface Point {
  sequenceIndex: number;
  value: number;
}

function render(options: Plot.PlotOptions): string {
  const { document } = new JSDOM("").window;
  const chart = Plot.plot({ ...options, document });
  if (!chart.hasAttribute("xmlns")) {
    chart.setAttribute("xmlns", SVG_NS);
  }
  return chart.outerHTML;
}

export function renderHistogram(values: readonly number[], label: string, fill: string): string {
  return render({
    width: 800,
    height: 480,
    marginLeft: 60,
    x: { label },
    y: { label: "Frequency", grid: true },
    marks: [
      Plot.rectY(values, Plot.binX<Plot.RectYOptions>({ y: "count" }, { x: (d: number) => d, thresholds: HISTOGRAM_BINS, fill })),
      Plot.ruleY([0]),
    ],
  });
}

export function renderTrend(points: readonly Point[], label: string): string {
  return render({
    width: 960,
    height: 480,
    marginLeft: 60,
    x: { label: "Execution number" },
    y: { label, grid: true },
    marks: [
      Plot.lineY(points, { x: "sequenceIndex", y: "value", marker: "circle" }),
      Plot.ruleY([0]),
    ],
  });
}

export interface ChartOptions {
  outputDir: string;
}

/**
 * Write the latency histogram, latency trend and gas histogram. Returns the
 * paths written; charts without data are skipped.
 */
export function generateCharts(
  samples: readonly InvocationSample[],
  options: ChartOptions,
): string[] {
  if (samples.length === 0) {
    logger.warn("No samples to visualize");
    return [];
  }

  if (!existsSync(options.outputDir)) {
    mkdirSync(options.outputDir, { recursive: true });
  }

  const written: string[] = [];
  const write = (file: string, svg: string) => {
    const path = join(options.outputDir, file);
    writeFileSync(path, svg);
    written.push(path);
    logger.info("Chart saved", { path });
  };

  const durations = samples.map((s) => s.durationMs);
  write(CHART_FILES.latencyDistribution, renderHistogram(durations, "Execution time (ms)", "steelblue"));
  write(
    CHART_FILES.latencyTrend,
    renderTrend(
      samples.map((s) => ({ sequenceIndex: s.sequenceIndex, value: s.durationMs })),
      "Execution time (ms)",
    ),
  );

  const gas: number[] = [];
  for (const s of samples) {
    if (s.succeeded && s.gasUsed !== undefined) gas.push(s.gasUsed);
  }
  if (gas.length > 0) {
    write(CHART_FILES.gasDistribution, renderHistogram(gas, "Gas used", "orange"));
  } else {
    logger.info("No gas data; skipping gas chart");
  }

  return written;
}
