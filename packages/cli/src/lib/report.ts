import type { BenchmarkComparison, BenchmarkResultFile } from "./types.js";

/**
 * Format milliseconds for display
 */
export function formatMs(ms: number): string {
  if (Math.abs(ms) < 1000) return `${ms.toFixed(2)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export function formatPercent(rate: number | null): string {
  return rate === null ? "n/a" : `${(rate * 100).toFixed(2)}%`;
}

/**
 * Format a single result as a markdown report
 */
export function formatResultMarkdown(result: BenchmarkResultFile): string {
  const { summary, machine } = result;
  const lines: string[] = [
    `# Benchmark: ${result.method} (${result.kind})`,
    "",
    "## Machine Info",
    "",
    "| Property | Value |",
    "|----------|-------|",
    `| Hostname | ${machine.hostname} |`,
    `| Platform | ${machine.platform} ${machine.arch} |`,
    `| CPU | ${machine.cpuModel} |`,
    `| Cores | ${machine.cpuCores} @ ${machine.cpuSpeed}MHz |`,
    `| Memory | ${machine.totalMemoryGB}GB |`,
    `| Node | ${machine.nodeVersion} |`,
    `| Date | ${machine.timestamp} |`,
    "",
    "## Execution Summary",
    "",
    "| Total | Successful | Failed | Success Rate | Warmup |",
    "|-------|------------|--------|--------------|--------|",
    `| ${summary.total} | ${summary.succeeded} | ${summary.failed} | ${formatPercent(summary.successRate)} | ${result.warmup} |`,
    "",
    "## Execution Time",
    "",
  ];

  if (summary.latency) {
    const l = summary.latency;
    lines.push(
      "| Mean | Median | Min | Max | Std Dev | p95 | p99 |",
      "|------|--------|-----|-----|---------|-----|-----|",
      `| ${formatMs(l.meanMs)} | ${formatMs(l.medianMs)} | ${formatMs(l.minMs)} | ${formatMs(l.maxMs)} | ±${formatMs(l.stdDevMs)} | ${formatMs(l.p95Ms)} | ${formatMs(l.p99Ms)} |`,
    );
  } else {
    lines.push("_No samples recorded._");
  }

  lines.push("", "## Gas Usage", "");
  if (summary.gas) {
    const g = summary.gas;
    lines.push(
      "| Mean | Median | Min | Max |",
      "|------|--------|-----|-----|",
      `| ${g.mean.toFixed(0)} | ${g.median.toFixed(0)} | ${g.min} | ${g.max} |`,
    );
  } else {
    lines.push("_No gas data._");
  }

  lines.push("", "## Throughput", "");
  lines.push(
    summary.throughputTps === null
      ? "- **TPS:** n/a"
      : `- **TPS:** ${summary.throughputTps.toFixed(2)}`,
  );

  const errors = new Map<string, number>();
  for (const s of result.samples) {
    if (!s.succeeded) errors.set(s.error, (errors.get(s.error) ?? 0) + 1);
  }
  if (errors.size > 0) {
    lines.push("", "## Errors", "");
    for (const [message, count] of errors) {
      lines.push(`- ❌ ${message} (×${count})`);
    }
  }

  return lines.join("\n");
}

/**
 * Format comparison as a markdown table
 */
export function formatComparisonMarkdown(comparison: BenchmarkComparison): string {
  const lines: string[] = [
    "# Benchmark Comparison",
    "",
    `**Baseline:** \`${comparison.baseline}\` (${comparison.baselineMethod})`,
    `**Comparison:** \`${comparison.comparison}\` (${comparison.comparisonMethod})`,
    "",
    "| Metric | Baseline | Comparison | Diff | Change |",
    "|--------|----------|------------|------|--------|",
  ];

  for (const m of comparison.metrics) {
    const icon = m.faster ? "🟢" : m.diffPercent > 10 ? "🔴" : "🟡";
    const sign = m.diffMs >= 0 ? "+" : "";
    lines.push(
      `| ${m.metric} | ${formatMs(m.baselineMs)} | ${formatMs(m.comparisonMs)} | ${sign}${formatMs(m.diffMs)} | ${icon} ${sign}${m.diffPercent.toFixed(1)}% |`,
    );
  }

  lines.push("");
  lines.push(`**Statistically significant:** ${comparison.significant ? "yes" : "no"}`);

  return lines.join("\n");
}
