import {
  type ChainName,
  ConfigurationError,
  ConfigurationErrorCode,
  type ContractArg,
  isChainName,
  MAX_TIMEOUT_MS,
} from "@contract-bench/sdk";
import ms from "ms";
import { Hex } from "ox";
import { z } from "zod";

const hex = z.custom<Hex.Hex>((value) => typeof value === "string" && Hex.validate(value, { strict: true }), {
  message: "Expected a 0x-prefixed hex string",
});

const chainName = z.custom<ChainName>((value) => typeof value === "string" && isChainName(value), {
  message: "Unknown chain (expected localnet, studionet or testnetAsimov)",
});

const duration = z.string().transform((value, ctx) => {
  const parsed = ms(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration "${value}"` });
    return z.NEVER;
  }
  if (parsed > MAX_TIMEOUT_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Duration "${value}" exceeds the maximum of ${MAX_TIMEOUT_MS}ms`,
    });
    return z.NEVER;
  }
  return parsed;
});

export const ConfigSchema = z.object({
  GENLAYER_CHAIN: chainName.default("testnetAsimov"),
  GENLAYER_RPC_URL: z.string().url().optional(),
  GENLAYER_CHAIN_ID: z.coerce.number().int().positive().optional(),
  CONTRACT_ADDRESS: hex.optional(),
  PRIVATE_KEY: hex.optional(),
  BENCHMARK_ITERATIONS: z.coerce.number().int().min(1).default(100),
  BENCHMARK_WARMUP: z.coerce.number().int().min(0).default(5),
  BENCHMARK_TIMEOUT: duration.default("2 min"),
  BENCHMARK_OUTPUT_DIR: z.string().default("."),
  BENCHMARK_CHARTS_DIR: z.string().default("benchmark_charts"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Read configuration from environment variables. Empty values count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`, ConfigurationErrorCode.INVALID_CONFIG);
  }
  return parsed.data;
}

const ContractArgSchema: z.ZodType<ContractArg> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ContractArgSchema),
    z.record(ContractArgSchema),
  ]),
);

/** Parse the optional JSON array of call arguments given on the command line. */
export function parseParams(json: string | undefined): ContractArg[] {
  if (json === undefined || json.trim() === "") return [];

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    throw new ConfigurationError(
      `Arguments must be a JSON array: ${err instanceof Error ? err.message : String(err)}`,
      ConfigurationErrorCode.INVALID_CONFIG,
    );
  }

  const parsed = z.array(ContractArgSchema).safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Arguments must be a JSON array of strings, numbers, booleans, null, arrays or objects",
      ConfigurationErrorCode.INVALID_CONFIG,
    );
  }
  return parsed.data;
}
