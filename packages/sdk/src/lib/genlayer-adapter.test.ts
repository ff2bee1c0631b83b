import ms from "ms";
import { afterEach, describe, expect, test, vi } from "vitest";
import { BenchmarkDriver } from "./driver.js";
import {
  type ContractClient,
  GenLayerInvocationAdapter,
  MAX_TIMEOUT_MS,
  parseReceipt,
  stringifyResult,
} from "./genlayer-adapter.js";

const CONTRACT = "0x1234567890abcdef1234567890abcdef12345678";
const TX_HASH: `0x${string}` = "0xfeedfacefeedfacefeedfacefeedfacefeedfacefeedfacefeedfacefeedface";

/** Transaction as returned by `waitForTransactionReceipt`, trimmed to the fields that matter here. */
function acceptedTransaction(leaderReceipts: Array<Record<string, unknown>>) {
  return {
    hash: TX_HASH,
    statusName: "ACCEPTED",
    resultName: "AGREE",
    consensus_data: {
      final: true,
      votes: {},
      leader_receipt: leaderReceipts,
      validators: [],
    },
  };
}

function fakeClient(overrides: Partial<ContractClient> = {}): ContractClient {
  return {
    readContract: vi.fn(async () => "42"),
    writeContract: vi.fn(async () => TX_HASH),
    waitForTransactionReceipt: vi.fn(async () =>
      acceptedTransaction([{ execution_result: "SUCCESS", gas_used: 21000 }]),
    ),
    getContractSchema: vi.fn(async () => ({ ctor: { params: [] }, methods: {} })),
    ...overrides,
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

afterEach(() => {
  vi.useRealTimers();
});

describe("parseReceipt", () => {
  test("reads gas from the leader receipt", () => {
    expect(parseReceipt(acceptedTransaction([{ execution_result: "SUCCESS", gas_used: 1234 }]))).toEqual({
      gasUsed: 1234,
    });
  });

  test("uses the last leader receipt that reports gas", () => {
    const transaction = acceptedTransaction([{ gas_used: 900 }, { gas_used: "0x5208" }, {}]);
    expect(parseReceipt(transaction)).toEqual({ gasUsed: 21000 });
  });

  test("accepts bigint and decimal string amounts", () => {
    expect(parseReceipt(acceptedTransaction([{ gas_used: 42n }]))).toEqual({ gasUsed: 42 });
    expect(parseReceipt(acceptedTransaction([{ gas_used: "42" }]))).toEqual({ gasUsed: 42 });
  });

  test("returns nothing for transactions without gas", () => {
    expect(parseReceipt({ hash: TX_HASH, statusName: "ACCEPTED" })).toEqual({});
    expect(parseReceipt({ hash: TX_HASH, consensus_data: null })).toEqual({});
    expect(parseReceipt(acceptedTransaction([]))).toEqual({});
  });

  test("ignores gas fields outside consensus data", () => {
    expect(parseReceipt({ gasUsed: 21000, gas_used: 21000 })).toEqual({});
  });

  test("rejects negative and unsafe amounts", () => {
    expect(parseReceipt(acceptedTransaction([{ gas_used: -5 }]))).toEqual({});
    expect(parseReceipt(acceptedTransaction([{ gas_used: 2n ** 64n }]))).toEqual({});
  });

  test("returns nothing for non-object receipts", () => {
    expect(parseReceipt(null)).toEqual({});
    expect(parseReceipt("0x01")).toEqual({});
  });
});

describe("stringifyResult", () => {
  test("passes strings through", () => {
    expect(stringifyResult("hello")).toBe("hello");
  });

  test("serializes bigints, byte arrays and maps", () => {
    const value = new Map<string, unknown>([
      ["count", 7n],
      ["raw", new Uint8Array([1, 255])],
    ]);
    expect(stringifyResult(value)).toBe('{"count":"7","raw":"0x01ff"}');
  });
});

describe("GenLayerInvocationAdapter", () => {
  test("reads through readContract", async () => {
    const client = fakeClient();
    const adapter = new GenLayerInvocationAdapter({
      client,
      contractAddress: CONTRACT,
      canWrite: false,
    });

    const outcome = await adapter.invoke({ methodName: "get_count", params: [1], kind: "read" });

    expect(outcome).toEqual({ succeeded: true, result: "42" });
    expect(client.readContract).toHaveBeenCalledWith({
      address: CONTRACT,
      functionName: "get_count",
      args: [1],
    });
    expect(client.writeContract).not.toHaveBeenCalled();
  });

  test("writes, waits for the receipt and reports gas", async () => {
    const client = fakeClient();
    const adapter = new GenLayerInvocationAdapter({
      client,
      contractAddress: CONTRACT,
      canWrite: true,
      timeoutMs: 30_000,
      receiptPollIntervalMs: 1_000,
    });

    const outcome = await adapter.invoke({ methodName: "update", params: ["x"], kind: "write" });

    expect(outcome).toEqual({ succeeded: true, txHash: TX_HASH, gasUsed: 21000 });
    expect(client.writeContract).toHaveBeenCalledWith({
      address: CONTRACT,
      functionName: "update",
      args: ["x"],
      value: 0n,
    });
    expect(client.waitForTransactionReceipt).toHaveBeenCalledWith({
      hash: TX_HASH,
      interval: 1_000,
      retries: 30,
    });
  });

  test("reports a successful write without gas", async () => {
    const client = fakeClient({
      waitForTransactionReceipt: vi.fn(async () => acceptedTransaction([{ execution_result: "SUCCESS" }])),
    });
    const adapter = new GenLayerInvocationAdapter({
      client,
      contractAddress: CONTRACT,
      canWrite: true,
    });

    const outcome = await adapter.invoke({ methodName: "update", params: [], kind: "write" });

    expect(outcome).toEqual({ succeeded: true, txHash: TX_HASH });
  });

  test("fails writes without an account", async () => {
    const client = fakeClient();
    const adapter = new GenLayerInvocationAdapter({
      client,
      contractAddress: CONTRACT,
      canWrite: false,
    });

    const outcome = await adapter.invoke({ methodName: "update", params: [], kind: "write" });

    expect(outcome).toEqual({ succeeded: false, error: "Account required for write operations" });
    expect(client.writeContract).not.toHaveBeenCalled();
  });

  test("turns client errors into failed outcomes", async () => {
    const client = fakeClient({
      readContract: vi.fn(async () => {
        throw new Error("method not found");
      }),
    });
    const adapter = new GenLayerInvocationAdapter({
      client,
      contractAddress: CONTRACT,
      canWrite: false,
    });

    const outcome = await adapter.invoke({ methodName: "missing", params: [], kind: "read" });

    expect(outcome).toEqual({ succeeded: false, error: "method not found" });
  });

  test("reports a call that outlives the timeout as failed", async () => {
    vi.useFakeTimers();
    const client = fakeClient({
      readContract: vi.fn(async () => {
        await delay(800);
        return "42";
      }),
    });
    const adapter = new GenLayerInvocationAdapter({
      client,
      contractAddress: CONTRACT,
      canWrite: false,
      timeoutMs: 500,
    });

    const pending = adapter.invoke({ methodName: "slow", params: [], kind: "read" });
    await vi.advanceTimersByTimeAsync(800);

    await expect(pending).resolves.toEqual({
      succeeded: false,
      error: "Call to slow timed out after 500ms",
    });
  });

  test("does not resolve an expired call before it settles", async () => {
    vi.useFakeTimers();
    const client = fakeClient({
      readContract: vi.fn(async () => {
        await delay(800);
        return "42";
      }),
    });
    const adapter = new GenLayerInvocationAdapter({
      client,
      contractAddress: CONTRACT,
      canWrite: false,
      timeoutMs: 500,
    });

    let settled = false;
    const pending = adapter.invoke({ methodName: "slow", params: [], kind: "read" }).then((outcome) => {
      settled = true;
      return outcome;
    });
    await vi.advanceTimersByTimeAsync(600);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(200);
    await pending;
    expect(settled).toBe(true);
  });

  test("never overlaps calls when they time out", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const client = fakeClient({
      readContract: vi.fn(async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(60);
        inFlight--;
        return "42";
      }),
    });
    const adapter = new GenLayerInvocationAdapter({
      client,
      contractAddress: CONTRACT,
      canWrite: false,
      timeoutMs: 10,
    });
    const driver = new BenchmarkDriver({ adapter });

    const run = await driver.run({ methodName: "get_count", kind: "read", iterations: 4 });

    expect(maxInFlight).toBe(1);
    expect(client.readContract).toHaveBeenCalledTimes(4);
    expect(run.samples.map((s) => (s.succeeded ? "ok" : s.error))).toEqual(
      Array.from({ length: 4 }, () => "Call to get_count timed out after 10ms"),
    );
  });

  test("caps the timeout at the largest timer delay", async () => {
    const client = fakeClient({
      readContract: vi.fn(async () => {
        await delay(30);
        return "42";
      }),
      writeContract: vi.fn(async () => TX_HASH),
    });
    const adapter = new GenLayerInvocationAdapter({
      client,
      contractAddress: CONTRACT,
      canWrite: true,
      timeoutMs: ms("30d"),
      receiptPollIntervalMs: 1_000,
    });

    await expect(adapter.invoke({ methodName: "get_count", params: [], kind: "read" })).resolves.toEqual({
      succeeded: true,
      result: "42",
    });

    await adapter.invoke({ methodName: "update", params: [], kind: "write" });
    expect(client.waitForTransactionReceipt).toHaveBeenCalledWith({
      hash: TX_HASH,
      interval: 1_000,
      retries: Math.ceil(MAX_TIMEOUT_MS / 1_000),
    });
  });
});
