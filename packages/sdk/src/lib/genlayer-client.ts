import { createAccount, createClient } from "genlayer-js";
import { localnet, studionet, testnetAsimov } from "genlayer-js/chains";
import type { Hex } from "ox";
import type { ContractClient } from "./genlayer-adapter.js";

/** Networks a benchmark can target by name. */
export const chains = { localnet, studionet, testnetAsimov };
export type ChainName = keyof typeof chains;

export function isChainName(name: string): name is ChainName {
  return Object.hasOwn(chains, name);
}

export interface GenLayerClientConfig {
  chain: ChainName;
  /** Overrides the chain's default RPC URL. */
  endpoint?: string;
  /** Signing key. Without one the client can only read. */
  privateKey?: Hex.Hex;
}

/** Build a `genlayer-js` client for the configured network. */
export function createContractClient(config: GenLayerClientConfig): {
  client: ContractClient;
  canWrite: boolean;
  endpoint: string;
} {
  const base = chains[config.chain];
  const chain = config.endpoint
    ? { ...base, rpcUrls: { ...base.rpcUrls, default: { http: [config.endpoint] } } }
    : base;
  const endpoint = chain.rpcUrls.default.http[0] ?? "";

  if (config.privateKey) {
    const account = createAccount(config.privateKey);
    return { client: createClient({ chain, account }), canWrite: true, endpoint };
  }
  return { client: createClient({ chain }), canWrite: false, endpoint };
}
