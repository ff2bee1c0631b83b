/**
 * Contract benchmark CLI
 *
 * Usage:
 *   contract-bench read <method> [args-json]              # Benchmark a read call
 *   contract-bench write <method> [args-json]             # Benchmark a write call
 *   contract-bench show <result.json>                     # View a saved result
 *   contract-bench compare <baseline> <comparison>        # Compare two results
 */

import {
  BenchmarkDriver,
  checkContractMethod,
  ConfigurationError,
  ConfigurationErrorCode,
  createContractClient,
  errorMessage,
  GenLayerInvocationAdapter,
  type InvocationKind,
} from "@contract-bench/sdk";
import { getLogger } from "@logtape/logtape";
import { generateCharts } from "./lib/charts.js";
import { type Config, loadConfig, parseParams } from "./lib/config.js";
import { getMachineInfo } from "./lib/machine.js";
import { checkEndpoint } from "./lib/preflight.js";
import { formatComparisonMarkdown, formatResultMarkdown } from "./lib/report.js";
import { buildResultFile, compareResults, exportResults, loadResults } from "./lib/storage.js";

const logger = getLogger(["contract-bench", "cli"]);

/** Log progress every this many measured calls. */
const PROGRESS_EVERY = 10;

export function helpText(): string {
  return [
    "",
    "═".repeat(60),
    "  Contract Benchmark",
    "═".repeat(60),
    "",
    "Usage:",
    "  contract-bench read <method> [args-json]",
    "  contract-bench write <method> [args-json]",
    "  contract-bench show <result.json>",
    "  contract-bench compare <baseline.json> <comparison.json>",
    "",
    "Examples:",
    "  contract-bench read get_count",
    `  contract-bench write update_storage '["hello"]'`,
    "",
    "Environment Variables:",
    "  CONTRACT_ADDRESS      Contract to benchmark (required for read/write)",
    "  PRIVATE_KEY           Signing key (required for write)",
    "  GENLAYER_CHAIN        localnet | studionet | testnetAsimov (default: testnetAsimov)",
    "  GENLAYER_RPC_URL      Override the chain's RPC endpoint",
    "  GENLAYER_CHAIN_ID     Expected chain id, checked before the run",
    "  BENCHMARK_ITERATIONS  Number of measured calls (default: 100)",
    "  BENCHMARK_WARMUP      Number of warmup calls (default: 5)",
    "  BENCHMARK_TIMEOUT     Per-call timeout (default: 2 min)",
    "  BENCHMARK_OUTPUT_DIR  Directory for CSV/JSON results (default: .)",
    "  BENCHMARK_CHARTS_DIR  Directory for charts (default: benchmark_charts)",
    "",
  ].join("\n");
}

async function runBenchmark(
  kind: InvocationKind,
  methodName: string,
  argsJson: string | undefined,
  config: Config,
): Promise<void> {
  const contractAddress = config.CONTRACT_ADDRESS;
  if (!contractAddress) {
    throw new ConfigurationError("CONTRACT_ADDRESS is required", ConfigurationErrorCode.INVALID_CONFIG);
  }
  if (kind === "write" && !config.PRIVATE_KEY) {
    throw new ConfigurationError(
      "PRIVATE_KEY is required for write benchmarks",
      ConfigurationErrorCode.MISSING_SIGNER,
    );
  }
  const params = parseParams(argsJson);

  const { client, canWrite, endpoint } = createContractClient({
    chain: config.GENLAYER_CHAIN,
    endpoint: config.GENLAYER_RPC_URL,
    privateKey: config.PRIVATE_KEY,
  });
  await checkEndpoint(endpoint, { expectedChainId: config.GENLAYER_CHAIN_ID });
  await checkContractMethod(client, contractAddress, methodName);

  const adapter = new GenLayerInvocationAdapter({
    client,
    contractAddress,
    canWrite,
    timeoutMs: config.BENCHMARK_TIMEOUT,
  });
  const driver = new BenchmarkDriver({
    adapter,
    onWarmup: (completed, total) => logger.debug("Warmup {completed}/{total} complete", { completed, total }),
    onSample: (_sample, { completed, total }) => {
      if (completed % PROGRESS_EVERY === 0 || completed === total) {
        logger.info("Progress: {completed}/{total} executions complete", { completed, total });
      }
    },
  });

  const { run, summary } = await driver.runAndSummarize({
    methodName,
    params,
    kind,
    iterations: config.BENCHMARK_ITERATIONS,
    warmup: config.BENCHMARK_WARMUP,
  });

  const result = buildResultFile(run, summary, getMachineInfo());
  console.log(`\n${formatResultMarkdown(result)}\n`);

  const { csvPath, jsonPath } = exportResults(result, { outputDir: config.BENCHMARK_OUTPUT_DIR });
  console.log(`✓ Results exported to CSV: ${csvPath}`);
  console.log(`✓ Results exported to JSON: ${jsonPath}`);

  for (const path of generateCharts(run.samples, { outputDir: config.BENCHMARK_CHARTS_DIR })) {
    console.log(`✓ Chart saved: ${path}`);
  }
}

/**
 * Run the CLI with the given arguments and return the process exit code.
 */
export async function runCli(
  args: string[],
  env: Record<string, string | undefined> = process.env,
): Promise<number> {
  const [command, ...rest] = args;

  if (command === undefined || command === "--help" || command === "-h") {
    console.log(helpText());
    return 0;
  }

  try {
    switch (command) {
      case "read":
      case "write": {
        const [method, argsJson] = rest;
        if (!method) {
          console.error(`\n❌ Error: ${command} expects a method name\n`);
          console.log(helpText());
          return 1;
        }
        await runBenchmark(command, method, argsJson, loadConfig(env));
        return 0;
      }
      case "show": {
        const [file] = rest;
        if (!file) {
          console.error("\n❌ Error: show expects a result file\n");
          return 1;
        }
        console.log(`\n${formatResultMarkdown(loadResults(file))}\n`);
        return 0;
      }
      case "compare": {
        const [baseline, comparison] = rest;
        if (!baseline || !comparison) {
          console.error("\n❌ Error: compare expects two result files\n");
          return 1;
        }
        console.log(`\n${formatComparisonMarkdown(compareResults(baseline, comparison))}\n`);
        return 0;
      }
      default: {
        console.error(`\n❌ Error: unknown command "${command}"\n`);
        console.log(helpText());
        return 1;
      }
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error("Configuration error ({code}): {message}", {
        code: error.code,
        message: error.message,
      });
    } else {
      logger.error("Benchmark failed: {message}", { message: errorMessage(error) });
    }
    return 1;
  }
}
