import { ConfigError } from "../utils/errors.js";

export const NETWORKS = ["prd", "testing", "development"] as const;

export type Network = (typeof NETWORKS)[number];

export const DEFAULT_NETWORK: Network = "prd";

/**
 * Canister ids and hosts for one deployment of the signer + trading platform.
 */
export interface NetworkConfig {
  /** Internet Computer API boundary node */
  icHost: string;
  /** Threshold Schnorr signer canister (public keys, signatures, fee schedule) */
  signerCanisterId: string;
  /** Sign-In-With-Bitcoin identity-linking canister */
  siwbCanisterId: string;
  /** ICRC-2 ledger used for signer fee approvals */
  ckbtcLedgerCanisterId: string;
  /** Trading platform REST base URL */
  apiUrl: string;
}

const IC_HOST = "https://ic0.app";
const SIWB_CANISTER_ID = "bcxqa-kqaaa-aaaak-qotba-cai";
const CKBTC_LEDGER_CANISTER_ID = "mxzaz-hqaaa-aaaar-qaada-cai";
const TRADING_API_URL = "https://api.odin.fun/v1";

const NETWORK_CONFIGS: Record<Network, NetworkConfig> = {
  prd: {
    icHost: IC_HOST,
    signerCanisterId: "g7qkb-iiaaa-aaaar-qb3za-cai",
    siwbCanisterId: SIWB_CANISTER_ID,
    ckbtcLedgerCanisterId: CKBTC_LEDGER_CANISTER_ID,
    apiUrl: TRADING_API_URL,
  },
  testing: {
    icHost: IC_HOST,
    signerCanisterId: "ho2u6-qaaaa-aaaar-qb34q-cai",
    siwbCanisterId: SIWB_CANISTER_ID,
    ckbtcLedgerCanisterId: CKBTC_LEDGER_CANISTER_ID,
    apiUrl: TRADING_API_URL,
  },
  development: {
    icHost: IC_HOST,
    signerCanisterId: "ho2u6-qaaaa-aaaar-qb34q-cai",
    siwbCanisterId: SIWB_CANISTER_ID,
    ckbtcLedgerCanisterId: CKBTC_LEDGER_CANISTER_ID,
    apiUrl: TRADING_API_URL,
  },
};

export function isNetwork(value: string): value is Network {
  return (NETWORKS as readonly string[]).includes(value);
}

/**
 * Parse a network name from a flag or env var. Undefined/empty means the default.
 */
export function parseNetwork(value: string | undefined): Network {
  if (value === undefined || value === "") {
    return DEFAULT_NETWORK;
  }
  if (!isNetwork(value)) {
    throw new ConfigError(
      `Unknown network: ${value}. Valid networks: ${NETWORKS.join(", ")}`,
      { network: value }
    );
  }
  return value;
}

/**
 * Network selected by `SIWB_NETWORK`, used when no `--network` flag is given.
 */
export function getEnvNetwork(): Network {
  return parseNetwork(process.env.SIWB_NETWORK);
}

export function getNetworkConfig(network: Network): NetworkConfig {
  return NETWORK_CONFIGS[network];
}

/**
 * Session cache filename suffix: empty for the default network.
 */
export function getNetworkSuffix(network: Network): string {
  return network === DEFAULT_NETWORK ? "" : `_${network}`;
}
