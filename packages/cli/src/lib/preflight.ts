import { ConfigurationError, ConfigurationErrorCode, errorMessage } from "@contract-bench/sdk";
import { getLogger } from "@logtape/logtape";
import ky, { type Options as KyOptions } from "ky";
import ms from "ms";
import { Hex } from "ox";
import { z } from "zod";

const logger = getLogger(["contract-bench", "cli", "preflight"]);

const ChainIdResponseSchema = z.union([
  z.object({
    result: z.custom<Hex.Hex>((value) => typeof value === "string" && Hex.validate(value, { strict: true })),
  }),
  z.object({ error: z.object({ message: z.string() }) }),
]);

export interface CheckEndpointOptions {
  /** Fail when the node reports a different chain id. */
  expectedChainId?: number;
  timeoutMs?: number;
  fetch?: KyOptions["fetch"];
}

/**
 * Verify that the RPC endpoint answers `eth_chainId` before any benchmark
 * call is made. Returns the reported chain id.
 */
export async function checkEndpoint(
  endpoint: string,
  options: CheckEndpointOptions = {},
): Promise<number> {
  let response: unknown;
  try {
    response = await ky
      .post(endpoint, {
        json: { jsonrpc: "2.0", id: 1, method: "eth_chainId", params: [] },
        timeout: options.timeoutMs ?? ms("10s"),
        ...(options.fetch && { fetch: options.fetch }),
      })
      .json();
  } catch (err) {
    throw new ConfigurationError(
      `RPC endpoint ${endpoint} is not reachable: ${errorMessage(err)}`,
      ConfigurationErrorCode.ENDPOINT_UNREACHABLE,
    );
  }

  const parsed = ChainIdResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new ConfigurationError(
      `RPC endpoint ${endpoint} returned an unexpected eth_chainId response`,
      ConfigurationErrorCode.ENDPOINT_UNREACHABLE,
    );
  }
  if ("error" in parsed.data) {
    throw new ConfigurationError(
      `RPC endpoint ${endpoint} rejected eth_chainId: ${parsed.data.error.message}`,
      ConfigurationErrorCode.ENDPOINT_UNREACHABLE,
    );
  }

  const chainId = Hex.toNumber(parsed.data.result);
  if (options.expectedChainId !== undefined && chainId !== options.expectedChainId) {
    throw new ConfigurationError(
      `Chain id mismatch: expected ${options.expectedChainId}, endpoint reports ${chainId}`,
      ConfigurationErrorCode.CHAIN_MISMATCH,
    );
  }

  logger.info("RPC endpoint available", { endpoint, chainId });
  return chainId;
}
