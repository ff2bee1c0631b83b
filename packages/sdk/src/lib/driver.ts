import { ConfigurationError, ConfigurationErrorCode, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { SampleRecorder } from "./recorder.js";
import { summarize } from "./statistics.js";
import type {
  BenchmarkRequest,
  BenchmarkRun,
  ContractArg,
  InvocationAdapter,
  InvocationOutcome,
  InvocationSample,
  SampleProgress,
  SummaryStatistics,
} from "./types.js";

export interface BenchmarkDriverOptions {
  adapter: InvocationAdapter;
  /** Monotonic clock in milliseconds. Default: `performance.now`. */
  now?: () => number;
  /** Wall clock used for sample timestamps. Default: `new Date()`. */
  clock?: () => Date;
  /** Called after each measured call has been recorded. */
  onSample?: (sample: InvocationSample, progress: SampleProgress) => void;
  /** Called after each warmup call. */
  onWarmup?: (completed: number, total: number) => void;
}

/**
 * Drives a benchmark run: warmup calls first (discarded), then `iterations`
 * sequential measured calls. A failing call is recorded as a failed sample
 * and never aborts the run.
 */
export class BenchmarkDriver {
  readonly #adapter: InvocationAdapter;
  readonly #now: () => number;
  readonly #clock: () => Date;
  readonly #onSample: BenchmarkDriverOptions["onSample"];
  readonly #onWarmup: BenchmarkDriverOptions["onWarmup"];

  constructor(options: BenchmarkDriverOptions) {
    this.#adapter = options.adapter;
    this.#now = options.now ?? (() => performance.now());
    this.#clock = options.clock ?? (() => new Date());
    this.#onSample = options.onSample;
    this.#onWarmup = options.onWarmup;
  }

  async run(request: BenchmarkRequest): Promise<BenchmarkRun> {
    const params = [...(request.params ?? [])];
    const warmup = request.warmup ?? 0;
    this.#validate(request, warmup);

    const { methodName, kind, iterations } = request;
    const startedAt = this.#clock().toISOString();
    logger.info("Starting benchmark", { methodName, kind, iterations, warmup });

    for (let i = 0; i < warmup; i++) {
      try {
        await this.#adapter.invoke({ methodName, params, kind });
      } catch (error) {
        logger.debug("Warmup call failed", { methodName, index: i, error: errorMessage(error) });
      }
      this.#onWarmup?.(i + 1, warmup);
    }

    const recorder = new SampleRecorder();
    for (let i = 0; i < iterations; i++) {
      const sample = await this.#measure(i, methodName, params, request.kind);
      recorder.record(sample);
      if (!sample.succeeded) {
        logger.warn("Call failed", { methodName, sequenceIndex: i, error: sample.error });
      }
      this.#onSample?.(sample, { completed: i + 1, total: iterations });
    }

    const samples = recorder.complete();
    logger.info("Benchmark complete", {
      methodName,
      failed: samples.filter((s) => !s.succeeded).length,
    });

    return Object.freeze({
      methodName,
      params: Object.freeze(params),
      kind,
      iterations,
      warmup,
      startedAt,
      completedAt: this.#clock().toISOString(),
      samples,
    });
  }

  /** Run the benchmark and summarize it in one step. */
  async runAndSummarize(
    request: BenchmarkRequest,
  ): Promise<{ run: BenchmarkRun; summary: SummaryStatistics }> {
    const run = await this.run(request);
    return { run, summary: summarize(run.samples) };
  }

  #validate(request: BenchmarkRequest, warmup: number): void {
    if (!Number.isInteger(request.iterations) || request.iterations < 1) {
      throw new ConfigurationError(
        `iterations must be an integer >= 1, got ${request.iterations}`,
        ConfigurationErrorCode.INVALID_ITERATIONS,
      );
    }
    if (!Number.isInteger(warmup) || warmup < 0) {
      throw new ConfigurationError(
        `warmup must be an integer >= 0, got ${warmup}`,
        ConfigurationErrorCode.INVALID_WARMUP,
      );
    }
    if (request.methodName.trim() === "") {
      throw new ConfigurationError("methodName must not be empty", ConfigurationErrorCode.MISSING_METHOD);
    }
    if (request.kind === "write" && !this.#adapter.canWrite) {
      throw new ConfigurationError(
        "A signing account is required for write benchmarks",
        ConfigurationErrorCode.MISSING_SIGNER,
      );
    }
  }

  async #measure(
    sequenceIndex: number,
    methodName: string,
    params: ContractArg[],
    kind: BenchmarkRequest["kind"],
  ): Promise<InvocationSample> {
    const startedAt = this.#clock().toISOString();
    const start = this.#now();

    let outcome: InvocationOutcome;
    try {
      outcome = await this.#adapter.invoke({ methodName, params, kind });
    } catch (error) {
      outcome = { succeeded: false, error: errorMessage(error) };
    }

    const elapsed = Math.max(0, this.#now() - start);
    const hint = outcome.durationMs;
    const durationMs = hint !== undefined && Number.isFinite(hint) ? Math.max(0, hint) : elapsed;
    const base = { sequenceIndex, startedAt, durationMs, kind };

    if (!outcome.succeeded) {
      return { ...base, succeeded: false, error: outcome.error };
    }
    return {
      ...base,
      succeeded: true,
      ...(kind === "write" && outcome.gasUsed !== undefined && { gasUsed: outcome.gasUsed }),
      ...(outcome.txHash !== undefined && { txHash: outcome.txHash }),
      ...(outcome.result !== undefined && { result: outcome.result }),
    };
  }
}
