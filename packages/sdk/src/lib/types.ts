import type { Hex } from "ox";
import type { ValueOf } from "ts-essentials";

/** Whether a call is a read (no transaction, no gas) or a state-changing write. */
export type InvocationKind = ValueOf<typeof InvocationKind>;
export const InvocationKind = {
  read: "read",
  write: "write",
} as const;

/** A value that can be passed as a contract method argument. */
export type ContractArg =
  | string
  | number
  | boolean
  | bigint
  | null
  | ContractArg[]
  | { [key: string]: ContractArg };

export interface InvocationRequest {
  methodName: string;
  params: ContractArg[];
  kind: InvocationKind;
}

interface OutcomeBase {
  /** Elapsed time reported by the adapter. Overrides the driver's own measurement. */
  durationMs?: number;
}

export interface SuccessfulOutcome extends OutcomeBase {
  succeeded: true;
  gasUsed?: number;
  txHash?: Hex.Hex;
  /** Stringified return value of a read call. */
  result?: string;
}

export interface FailedOutcome extends OutcomeBase {
  succeeded: false;
  error: string;
}

export type InvocationOutcome = SuccessfulOutcome | FailedOutcome;

/**
 * Performs a single contract call. Implementations may throw; the driver
 * records a thrown error as a failed sample.
 */
export interface InvocationAdapter {
  /** False when no signing account is available. */
  readonly canWrite: boolean;
  invoke(request: InvocationRequest): Promise<InvocationOutcome>;
}

interface SampleBase {
  /** 0-based position among measured calls. */
  sequenceIndex: number;
  /** ISO-8601 wall-clock time at call start. */
  startedAt: string;
  durationMs: number;
  kind: InvocationKind;
}

export interface SuccessfulSample extends SampleBase {
  succeeded: true;
  gasUsed?: number;
  txHash?: Hex.Hex;
  result?: string;
}

export interface FailedSample extends SampleBase {
  succeeded: false;
  error: string;
}

export type InvocationSample = SuccessfulSample | FailedSample;

export interface BenchmarkRequest {
  methodName: string;
  params?: ContractArg[];
  kind: InvocationKind;
  /** Number of measured calls. Must be at least 1. */
  iterations: number;
  /** Calls made before measuring; their results are discarded. */
  warmup?: number;
}

export interface BenchmarkRun {
  readonly methodName: string;
  readonly params: readonly ContractArg[];
  readonly kind: InvocationKind;
  readonly iterations: number;
  readonly warmup: number;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly samples: readonly InvocationSample[];
}

export interface LatencyStatistics {
  minMs: number;
  maxMs: number;
  meanMs: number;
  medianMs: number;
  /** Population standard deviation. */
  stdDevMs: number;
  p95Ms: number;
  p99Ms: number;
}

export interface GasStatistics {
  min: number;
  max: number;
  mean: number;
  median: number;
}

export interface SummaryStatistics {
  total: number;
  succeeded: number;
  failed: number;
  /** `succeeded / total`, or null when there are no samples. */
  successRate: number | null;
  /** Computed over every sample, failed ones included. */
  latency: LatencyStatistics | null;
  /** Computed over samples that reported gas; null when none did. */
  gas: GasStatistics | null;
  /** Calls per second implied by the mean latency. */
  throughputTps: number | null;
}

export interface SampleProgress {
  completed: number;
  total: number;
}
