import type { Hex } from "ox";
import { z } from "zod";
import { ConfigurationError, ConfigurationErrorCode, errorMessage } from "./errors.js";
import type { ContractClient } from "./genlayer-adapter.js";
import { logger } from "./logger.js";

const SchemaSchema = z.object({
  methods: z.union([z.custom<Map<unknown, unknown>>((value) => value instanceof Map), z.record(z.unknown())]),
});

/**
 * Look up `methodName` in the contract's schema before a run.
 *
 * Throws `ConfigurationError` (`UNKNOWN_METHOD`) when the schema is available
 * and does not list the method. Returns false, after logging a warning, when
 * the schema cannot be retrieved or read; the run proceeds without the check.
 */
export async function checkContractMethod(
  client: Pick<ContractClient, "getContractSchema">,
  address: Hex.Hex,
  methodName: string,
): Promise<boolean> {
  let schema: unknown;
  try {
    schema = await client.getContractSchema(address);
  } catch (err) {
    logger.warn("Could not retrieve contract schema: {error}", { address, error: errorMessage(err) });
    return false;
  }

  const parsed = SchemaSchema.safeParse(schema);
  if (!parsed.success) {
    logger.warn("Contract schema has no method list", { address });
    return false;
  }

  const { methods } = parsed.data;
  const names = methods instanceof Map ? [...methods.keys()].map(String) : Object.keys(methods);
  if (!names.includes(methodName)) {
    throw new ConfigurationError(
      `Contract ${address} has no method "${methodName}" (available: ${names.join(", ") || "none"})`,
      ConfigurationErrorCode.UNKNOWN_METHOD,
    );
  }
  return true;
}
