import { getLogger } from "@logtape/logtape";
import ms from "ms";
import { Hex } from "ox";
import { UnreachableCaseError } from "ts-essentials";
import { z } from "zod";
import { errorMessage, InvocationTimeoutError } from "./errors.js";
import type {
  ContractArg,
  InvocationAdapter,
  InvocationOutcome,
  InvocationRequest,
} from "./types.js";

const logger = getLogger(["contract-bench", "sdk", "genlayer"]);

/**
 * The subset of a GenLayer client the adapter needs. A `genlayer-js` client
 * satisfies it; tests pass an in-process fake.
 */
export interface ContractClient {
  readContract(args: {
    address: Hex.Hex;
    functionName: string;
    args?: ContractArg[];
  }): Promise<unknown>;
  writeContract(args: {
    address: Hex.Hex;
    functionName: string;
    args?: ContractArg[];
    value: bigint;
  }): Promise<Hex.Hex>;
  waitForTransactionReceipt(args: {
    hash: Hex.Hex;
    interval?: number;
    retries?: number;
  }): Promise<unknown>;
  getContractSchema(address: Hex.Hex): Promise<unknown>;
}

export interface GenLayerAdapterOptions {
  client: ContractClient;
  contractAddress: Hex.Hex;
  /** Whether the client carries a signing account. */
  canWrite: boolean;
  /**
   * Upper bound for one call, receipt wait included. Default: 2 minutes,
   * capped at `MAX_TIMEOUT_MS`.
   */
  timeoutMs?: number;
  /** Receipt polling interval. Default: 3 seconds. */
  receiptPollIntervalMs?: number;
}

/** Largest delay `setTimeout` accepts; longer delays fire immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const gasAmount = z
  .union([z.number(), z.bigint(), z.string().regex(/^(0x[0-9a-fA-F]+|\d+)$/)])
  .transform((value) => Number(value))
  .pipe(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER));

/**
 * The parts of a `GenLayerTransaction` that carry gas. Each consensus round
 * appends a leader receipt; the last one belongs to the accepted execution.
 */
const TransactionSchema = z.object({
  consensus_data: z
    .object({
      leader_receipt: z.array(z.object({ gas_used: gasAmount.optional() }).passthrough()).optional(),
    })
    .passthrough()
    .nullish(),
});

export function parseReceipt(receipt: unknown): { gasUsed?: number } {
  const parsed = TransactionSchema.safeParse(receipt);
  if (!parsed.success) return {};
  const receipts = parsed.data.consensus_data?.leader_receipt ?? [];
  for (let i = receipts.length - 1; i >= 0; i--) {
    const gasUsed = receipts[i]?.gas_used;
    if (gasUsed !== undefined) return { gasUsed };
  }
  return {};
}

/** Render a read result for the sample record. */
export function stringifyResult(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "undefined";
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v === "bigint") return v.toString();
    if (v instanceof Uint8Array) return Hex.fromBytes(v);
    if (v instanceof Map) return Object.fromEntries(v);
    return v;
  });
}

/**
 * Await `call` and fail with `InvocationTimeoutError` if it took longer than
 * `timeoutMs`. An expired call is still awaited before the error is thrown,
 * so the next invocation never overlaps it.
 */
async function withDeadline<T>(call: Promise<T>, timeoutMs: number, methodName: string): Promise<T> {
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    logger.warn("Call exceeded {timeoutMs}ms; waiting for it to settle", { methodName, timeoutMs });
  }, timeoutMs);
  try {
    const value = await call;
    if (expired) throw new InvocationTimeoutError(methodName, timeoutMs);
    return value;
  } catch (err) {
    if (expired) throw new InvocationTimeoutError(methodName, timeoutMs);
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Invokes methods of one GenLayer Intelligent Contract.
 *
 * Reads go through `readContract` and carry no gas. Writes submit a
 * transaction with zero value and poll for its receipt, at most as long as
 * the timeout allows; gas is taken from the leader receipt when present. A
 * successful write without gas is logged as a warning and still counts as a
 * success.
 */
export class GenLayerInvocationAdapter implements InvocationAdapter {
  readonly canWrite: boolean;
  readonly #client: ContractClient;
  readonly #address: Hex.Hex;
  readonly #timeoutMs: number;
  readonly #pollIntervalMs: number;

  constructor(options: GenLayerAdapterOptions) {
    this.#client = options.client;
    this.#address = options.contractAddress;
    this.canWrite = options.canWrite;
    this.#timeoutMs = Math.min(options.timeoutMs ?? ms("2 min"), MAX_TIMEOUT_MS);
    this.#pollIntervalMs = options.receiptPollIntervalMs ?? ms("3s");
  }

  async invoke(request: InvocationRequest): Promise<InvocationOutcome> {
    try {
      return await withDeadline(this.#call(request), this.#timeoutMs, request.methodName);
    } catch (err) {
      return { succeeded: false, error: errorMessage(err) };
    }
  }

  async #call({ methodName, params, kind }: InvocationRequest): Promise<InvocationOutcome> {
    switch (kind) {
      case "read": {
        const result = await this.#client.readContract({
          address: this.#address,
          functionName: methodName,
          args: params,
        });
        return { succeeded: true, result: stringifyResult(result) };
      }
      case "write": {
        if (!this.canWrite) {
          return { succeeded: false, error: "Account required for write operations" };
        }
        const txHash = await this.#client.writeContract({
          address: this.#address,
          functionName: methodName,
          args: params,
          value: 0n,
        });
        const receipt = await this.#client.waitForTransactionReceipt({
          hash: txHash,
          interval: this.#pollIntervalMs,
          retries: Math.max(1, Math.ceil(this.#timeoutMs / this.#pollIntervalMs)),
        });
        const { gasUsed } = parseReceipt(receipt);
        if (gasUsed === undefined) {
          logger.warn("Write succeeded without gas information", { methodName, txHash });
        }
        return {
          succeeded: true,
          txHash,
          ...(gasUsed !== undefined && { gasUsed }),
        };
      }
      default: {
        throw new UnreachableCaseError(kind);
      }
    }
  }
}
