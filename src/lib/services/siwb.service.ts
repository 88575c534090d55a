import path from "path";
import { base64, hex } from "@scure/base";
import {
  DelegationChain,
  DelegationIdentity,
  Ed25519KeyIdentity,
} from "@dfinity/identity";
import type { Network } from "../config/networks.js";
import type { LoginDetails, SignedDelegation, SiwbService } from "../idl/siwb.idl.js";
import { computeSighash, deriveAddress, encodeWitness } from "../utils/bip322.js";
import {
  buildDelegationChain,
  deriveBotPrincipal,
  toArrayBuffer,
} from "../utils/delegation.js";
import {
  AddressMismatchError,
  DelegationUnavailableError,
  LoginFailedError,
  RemoteCallError,
} from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { fromVariant, isErr, isOk, tryCatch } from "../utils/result.js";
import type { RemoteSigner } from "./remote-signer.service.js";
import type { SessionCache } from "./session-cache.js";
import type { TradingApi } from "./trading-api.js";

// ============================================================================
// Types
// ============================================================================

interface SessionCore {
  botName: string;
  network: Network;
  bearerToken: string;
  botPrincipalText: string;
  /** P2TR address the bot signed in with */
  address: string;
  savedAtEpochSeconds: number;
  /** BTC deposit address, cached by callers that look it up */
  depositAddress?: string;
}

/**
 * Full session: the delegated identity can sign canister calls as the bot principal.
 */
export interface DelegatedSession extends SessionCore {
  kind: "delegated";
  identity: DelegationIdentity;
  sessionKey: Ed25519KeyIdentity;
  delegationChain: DelegationChain;
}

/**
 * Restored from cache without a usable delegation; good for REST calls only.
 */
export interface TokenOnlySession extends SessionCore {
  kind: "token-only";
}

export type Session = DelegatedSession | TokenOnlySession;

/**
 * States a login moves through after Init, in order. A failure is reported
 * as the state the sequence was trying to reach.
 */
export const LOGIN_STEPS = [
  "PubKeyFetched",
  "AddressVerified",
  "ChallengeReceived",
  "SighashComputed",
  "Signed",
  "WitnessEncoded",
  "SessionKeyGenerated",
  "LoggedIn",
  "DelegationObtained",
  "TokenExchanged",
  "Done",
] as const;

export type LoginStep = (typeof LOGIN_STEPS)[number];

export interface DelegationRetryPolicy {
  attempts: number;
  delayMs: number;
}

export const DEFAULT_DELEGATION_RETRY: DelegationRetryPolicy = {
  attempts: 5,
  delayMs: 2000,
};

export interface SiwbAuthenticatorOptions {
  signer: RemoteSigner;
  siwb: SiwbService;
  api: TradingApi;
  network: Network;
  logger?: Logger;
  delegationRetry?: DelegationRetryPolicy;
  generateSessionKey?: () => Ed25519KeyIdentity;
  /** Milliseconds since the epoch */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Authenticator
// ============================================================================

/**
 * Runs the SIWB challenge → delegation → bearer-token login for one bot.
 *
 * Steps are strictly sequential. Any failure aborts the whole sequence with a
 * LoginFailedError; no partial session is ever returned.
 */
export class SiwbAuthenticator {
  private readonly logger: Logger;
  private readonly delegationRetry: DelegationRetryPolicy;
  private readonly generateSessionKey: () => Ed25519KeyIdentity;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: SiwbAuthenticatorOptions) {
    this.logger = options.logger ?? silentLogger;
    this.delegationRetry = options.delegationRetry ?? DEFAULT_DELEGATION_RETRY;
    this.generateSessionKey = options.generateSessionKey ?? (() => Ed25519KeyIdentity.generate());
    this.now = options.now ?? Date.now;
    this.sleep =
      options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async login(botName: string): Promise<DelegatedSession> {
    const { signer, siwb } = this.options;

    const { pubkeyHex, address } = await this.run("PubKeyFetched", () =>
      signer.getPublicKey(botName)
    );

    await this.run("AddressVerified", () => {
      const derived = deriveAddress(pubkeyHex);
      if (derived !== address) {
        throw new AddressMismatchError(address, derived);
      }
    });
    this.logger.info(`Address: ${address}`);

    const challenge = await this.run("ChallengeReceived", async () => {
      const prepared = fromVariant(await siwb.siwb_prepare_login(address));
      if (isErr(prepared)) {
        throw new RemoteCallError("siwb_prepare_login", prepared.error);
      }
      return prepared.value;
    });

    const { sighash } = await this.run("SighashComputed", () =>
      computeSighash(challenge, pubkeyHex)
    );
    this.logger.debug(`Sighash: ${sighash}`);

    const signatureHex = await this.run("Signed", () =>
      signer.sign(botName, hex.decode(sighash))
    );

    const witness = await this.run("WitnessEncoded", () => encodeWitness(signatureHex));

    const sessionKey = await this.run("SessionKeyGenerated", () => this.generateSessionKey());
    const sessionPubkeyDer = new Uint8Array(sessionKey.getPublicKey().toDer());

    const details = await this.run("LoggedIn", async () => {
      const loggedIn = fromVariant(
        await siwb.siwb_login(witness, address, pubkeyHex, sessionPubkeyDer, {
          Bip322Simple: null,
        })
      );
      if (isErr(loggedIn)) {
        throw new RemoteCallError("siwb_login", loggedIn.error);
      }
      return loggedIn.value;
    });
    this.logExpiration(details);

    const { delegationChain, botPrincipalText } = await this.run(
      "DelegationObtained",
      async () => {
        const signed = await this.fetchDelegation(address, sessionPubkeyDer, details.expiration);
        return {
          delegationChain: buildDelegationChain(signed, details.user_canister_pubkey),
          botPrincipalText: deriveBotPrincipal(details.user_canister_pubkey).toText(),
        };
      }
    );
    this.logger.info(`Bot principal: ${botPrincipalText}`);

    const identity = DelegationIdentity.fromDelegation(sessionKey, delegationChain);

    const bearerToken = await this.run("TokenExchanged", () =>
      this.exchangeToken(identity, delegationChain)
    );
    this.logger.info("Bearer token: obtained");

    await this.run("Done", () => this.verifyToken(bearerToken));

    return {
      kind: "delegated",
      botName,
      network: this.options.network,
      bearerToken,
      botPrincipalText,
      address,
      savedAtEpochSeconds: Math.floor(this.now() / 1000),
      identity,
      sessionKey,
      delegationChain,
    };
  }

  private async run<T>(step: LoginStep, fn: () => T | Promise<T>): Promise<T> {
    this.logger.debug(`-> ${step}`);
    try {
      return await fn();
    } catch (error) {
      throw new LoginFailedError(step, error);
    }
  }

  private logExpiration(details: LoginDetails): void {
    const expiresAtMs = Number(details.expiration / 1_000_000n);
    const hours = (expiresAtMs - this.now()) / 3_600_000;
    this.logger.info(
      `Delegation expires ${new Date(expiresAtMs).toISOString()} (${hours.toFixed(1)}h from now)`
    );
  }

  /**
   * The identity canister may not have the delegation ready right after
   * login; every error is retried up to the policy's attempt count.
   */
  private async fetchDelegation(
    address: string,
    sessionPubkeyDer: Uint8Array,
    expiration: bigint
  ): Promise<SignedDelegation> {
    const { attempts, delayMs } = this.delegationRetry;
    let lastReason = "no attempt made";

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const reply = await tryCatch(() =>
        this.options.siwb.siwb_get_delegation(address, sessionPubkeyDer, expiration)
      );
      if (isOk(reply)) {
        const delegation = fromVariant(reply.value);
        if (isOk(delegation)) {
          return delegation.value;
        }
        lastReason = delegation.error;
      } else {
        lastReason = reply.error.message;
      }

      this.logger.info(`siwb_get_delegation attempt ${attempt}/${attempts} failed: ${lastReason}`);
      if (attempt < attempts) {
        await this.sleep(delayMs);
      }
    }

    throw new DelegationUnavailableError(attempts, lastReason);
  }

  private async exchangeToken(
    identity: DelegationIdentity,
    chain: DelegationChain
  ): Promise<string> {
    const timestamp = String(this.now());
    const signature = await identity.sign(toArrayBuffer(new TextEncoder().encode(timestamp)));

    const token = await this.options.api.exchangeDelegation({
      timestamp,
      signature: base64.encode(new Uint8Array(signature)),
      delegation: JSON.stringify(chain.toJSON()),
    });
    if (isErr(token)) {
      throw token.error;
    }
    return token.value;
  }

  /**
   * Best effort: a rejected verification is logged, never fatal.
   */
  private async verifyToken(bearerToken: string): Promise<void> {
    const verified = await this.options.api.verifyToken(bearerToken);
    if (isErr(verified)) {
      this.logger.warn(`Token verification: ${verified.error.message}`);
    } else {
      this.logger.info(`Token verification: ${verified.value}`);
    }
  }
}

// ============================================================================
// Cache-first entry point
// ============================================================================

export interface SessionContext {
  network: Network;
  cache: SessionCache;
  authenticator: Pick<SiwbAuthenticator, "login">;
  logger?: Logger;
}

/**
 * Cached session when the trading platform still accepts its token,
 * otherwise a fresh login, persisted unless caching is disabled.
 */
export async function getOrCreateSession(
  botName: string,
  context: SessionContext
): Promise<Session> {
  const logger = context.logger ?? silentLogger;

  const cached = await context.cache.load(botName, context.network);
  if (cached) {
    return cached;
  }

  const session = await context.authenticator.login(botName);
  const saved = await context.cache.save(session);
  if (saved) {
    logger.info(`Session saved to ${path.basename(saved)}`);
  }
  return session;
}
