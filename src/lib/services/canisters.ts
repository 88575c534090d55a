import fs from "fs/promises";
import { Actor, HttpAgent, type Identity } from "@dfinity/agent";
import { Ed25519KeyIdentity } from "@dfinity/identity";
import { Principal } from "@dfinity/principal";
import { base64, hex } from "@scure/base";
import { getNetworkConfig, type Network } from "../config/networks.js";
import { icrc2LedgerIdlFactory, type LedgerService } from "../idl/icrc2-ledger.idl.js";
import { signerIdlFactory, type SignerService } from "../idl/signer.idl.js";
import { siwbIdlFactory, type SiwbService } from "../idl/siwb.idl.js";
import { toArrayBuffer } from "../utils/delegation.js";
import { ConfigError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { getSessionDir, resolveWalletPemPath, type AppConfig } from "../utils/storage.js";
import { FeePaymentGate } from "./fee-payment.service.js";
import { RemoteSigner } from "./remote-signer.service.js";
import { SessionCache } from "./session-cache.js";
import { SiwbAuthenticator } from "./siwb.service.js";
import { TradingApi } from "./trading-api.js";

// ============================================================================
// Wallet identity
// ============================================================================

/** PKCS#8 v1 (private key only) and v2 (with public key) headers for Ed25519 */
const ED25519_PKCS8_PREFIXES = [
  hex.decode("302e020100300506032b657004220420"),
  hex.decode("3053020101300506032b657004220420"),
];
const ED25519_SEED_BYTES = 32;

function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
  return prefix.every((byte, i) => bytes[i] === byte);
}

/**
 * Parse an Ed25519 PKCS#8 "PRIVATE KEY" PEM into an identity.
 */
export function parseEd25519Pem(pem: string): Ed25519KeyIdentity {
  const body = pem.replace(/-----(BEGIN|END) PRIVATE KEY-----/g, "").replace(/\s+/g, "");

  let der: Uint8Array;
  try {
    der = base64.decode(body);
  } catch {
    throw new ConfigError("Wallet PEM body is not valid base64");
  }

  const prefix = ED25519_PKCS8_PREFIXES.find((p) => startsWith(der, p));
  if (!prefix || der.length < prefix.length + ED25519_SEED_BYTES) {
    throw new ConfigError("Wallet PEM is not an Ed25519 PKCS#8 private key");
  }

  const seed = der.slice(prefix.length, prefix.length + ED25519_SEED_BYTES);
  return Ed25519KeyIdentity.fromSecretKey(toArrayBuffer(seed));
}

/**
 * Wallet identity that pays signer fees, or null when no PEM file exists.
 */
export async function loadWalletIdentity(pemPath: string): Promise<Ed25519KeyIdentity | null> {
  let pem: string;
  try {
    pem = await fs.readFile(pemPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw new ConfigError(`Cannot read wallet PEM at ${pemPath}`, { cause: String(error) });
  }
  return parseEd25519Pem(pem);
}

// ============================================================================
// Per-task services
// ============================================================================

export interface BotServicesOptions {
  network: Network;
  config: AppConfig;
  logger?: Logger;
  /** Overrides the session directory under the storage root */
  sessionDir?: string;
}

export interface BotServices {
  authenticator: SiwbAuthenticator;
  cache: SessionCache;
  api: TradingApi;
}

function createAgent(host: string, config: AppConfig, identity?: Identity): HttpAgent {
  return HttpAgent.createSync({
    host,
    identity,
    verifyQuerySignatures: config.verifyQuerySignatures,
  });
}

/**
 * Build a fresh set of agents, actors and clients for one unit of work.
 * Nothing here is shared across concurrently running bots.
 */
export async function createBotServices(options: BotServicesOptions): Promise<BotServices> {
  const { network, config } = options;
  const logger = options.logger ?? silentLogger;
  const endpoints = getNetworkConfig(network);

  const wallet = await loadWalletIdentity(resolveWalletPemPath(config));
  if (wallet) {
    logger.debug(`Wallet principal: ${wallet.getPrincipal().toText()}`);
  } else {
    logger.debug("No wallet identity; priced signer calls will fail if a fee is configured");
  }

  const anonymousAgent = createAgent(endpoints.icHost, config);
  const walletAgent = wallet ? createAgent(endpoints.icHost, config, wallet) : null;

  const signerCanisterId = Principal.fromText(endpoints.signerCanisterId);
  const signer = Actor.createActor<SignerService>(signerIdlFactory, {
    agent: walletAgent ?? anonymousAgent,
    canisterId: signerCanisterId,
  });
  const siwb = Actor.createActor<SiwbService>(siwbIdlFactory, {
    agent: anonymousAgent,
    canisterId: endpoints.siwbCanisterId,
  });

  const gate = new FeePaymentGate({
    signer,
    spender: signerCanisterId,
    feeLedger: Principal.fromText(endpoints.ckbtcLedgerCanisterId),
    logger,
    ...(walletAgent
      ? {
          ledgerFor: (ledgerId: Principal): LedgerService =>
            Actor.createActor<LedgerService>(icrc2LedgerIdlFactory, {
              agent: walletAgent,
              canisterId: ledgerId,
            }),
        }
      : {}),
  });

  const api = new TradingApi({ apiUrl: endpoints.apiUrl });

  return {
    authenticator: new SiwbAuthenticator({
      signer: new RemoteSigner(signer, gate, logger),
      siwb,
      api,
      network,
      logger,
    }),
    cache: new SessionCache({
      dir: options.sessionDir ?? getSessionDir(),
      enabled: config.cacheSessions,
      apiFor: () => api,
      logger,
    }),
    api,
  };
}
