import type { ValueOf } from "ts-essentials";

/** Machine-readable codes for problems detected before a run starts. */
export type ConfigurationErrorCode = ValueOf<typeof ConfigurationErrorCode>;
export const ConfigurationErrorCode = {
  INVALID_ITERATIONS: "INVALID_ITERATIONS",
  INVALID_WARMUP: "INVALID_WARMUP",
  MISSING_METHOD: "MISSING_METHOD",
  UNKNOWN_METHOD: "UNKNOWN_METHOD",
  MISSING_SIGNER: "MISSING_SIGNER",
  INVALID_CONFIG: "INVALID_CONFIG",
  CHAIN_MISMATCH: "CHAIN_MISMATCH",
  ENDPOINT_UNREACHABLE: "ENDPOINT_UNREACHABLE",
} as const;

/** Missing or invalid input for the requested operation. Thrown before any invocation. */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;

  constructor(message: string, code: ConfigurationErrorCode = ConfigurationErrorCode.INVALID_CONFIG) {
    super(message);
    this.name = "ConfigurationError";
    this.code = code;
  }
}

/** A sample was appended out of order, or after the recorder was completed. */
export class SampleOrderError extends Error {
  readonly expectedIndex: number;
  readonly receivedIndex: number;

  constructor(message: string, expectedIndex: number, receivedIndex: number) {
    super(message);
    this.name = "SampleOrderError";
    this.expectedIndex = expectedIndex;
    this.receivedIndex = receivedIndex;
  }
}

/** Thrown by adapters when a single call exceeds its time limit. */
export class InvocationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(methodName: string, timeoutMs: number) {
    super(`Call to ${methodName} timed out after ${timeoutMs}ms`);
    this.name = "InvocationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
