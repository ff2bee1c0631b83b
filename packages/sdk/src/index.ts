export { checkContractMethod } from "./lib/contract-schema.js";
export type { BenchmarkDriverOptions } from "./lib/driver.js";
export { BenchmarkDriver } from "./lib/driver.js";
export {
  ConfigurationError,
  ConfigurationErrorCode,
  errorMessage,
  InvocationTimeoutError,
  SampleOrderError,
} from "./lib/errors.js";
export type { ContractClient, GenLayerAdapterOptions } from "./lib/genlayer-adapter.js";
export { GenLayerInvocationAdapter, MAX_TIMEOUT_MS, parseReceipt, stringifyResult } from "./lib/genlayer-adapter.js";
export type { ChainName, GenLayerClientConfig } from "./lib/genlayer-client.js";
export { chains, createContractClient, isChainName } from "./lib/genlayer-client.js";
export { SampleRecorder } from "./lib/recorder.js";
export { median, percentile, summarize } from "./lib/statistics.js";
export * from "./lib/types.js";
