import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { DelegationChain, DelegationIdentity } from "@dfinity/identity";
import { getNetworkSuffix, NETWORKS, type Network } from "../config/networks.js";
import { restoreSessionKey, serializeSessionKey } from "../utils/delegation.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { isErr, tryCatch, tryCatchSync } from "../utils/result.js";
import type { DelegatedSession, Session, TokenOnlySession } from "./siwb.service.js";
import type { TradingApi } from "./trading-api.js";

// ============================================================================
// Persisted record
// ============================================================================

const DelegationChainSchema = z.object({
  publicKey: z.string(),
  delegations: z.array(
    z.object({
      delegation: z.object({
        pubkey: z.string(),
        expiration: z.string(),
        targets: z.array(z.string()).optional(),
      }),
      signature: z.string(),
    })
  ),
});

const SessionRecordSchema = z.object({
  bearerToken: z.string().min(1),
  botPrincipalText: z.string(),
  address: z.string(),
  botName: z.string(),
  network: z.enum(NETWORKS),
  savedAtEpochSeconds: z.number(),
  /** base64 of the session key pair; absent for token-only sessions */
  sessionKeyMaterial: z.string().optional(),
  /** validated separately so a damaged chain degrades instead of missing */
  delegationChain: z.unknown().optional(),
  cachedDepositAddress: z.string().optional(),
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

// ============================================================================
// Session Cache
// ============================================================================

export interface SessionCacheOptions {
  dir: string;
  /** When false, load always misses and save writes nothing */
  enabled: boolean;
  /** Client used to check a cached token is still accepted */
  apiFor: (network: Network) => TradingApi;
  logger?: Logger;
}

/**
 * One JSON file per (bot, network). A cached session is only returned after
 * the trading platform accepts its bearer token; every other outcome is a miss.
 */
export class SessionCache {
  private readonly logger: Logger;

  constructor(private readonly options: SessionCacheOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  /**
   * session_<bot>[_<network>].json, with "/", "\" and spaces in the bot name replaced by "_"
   */
  pathFor(botName: string, network: Network): string {
    const safeName = botName.replace(/[/\\ ]/g, "_");
    return path.join(this.options.dir, `session_${safeName}${getNetworkSuffix(network)}.json`);
  }

  /**
   * Write the session (whole-file rewrite). Returns the file path, or null
   * when caching is disabled.
   */
  async save(session: Session): Promise<string | null> {
    if (!this.options.enabled) {
      return null;
    }

    const record: SessionRecord = {
      bearerToken: session.bearerToken,
      botPrincipalText: session.botPrincipalText,
      address: session.address,
      botName: session.botName,
      network: session.network,
      savedAtEpochSeconds: session.savedAtEpochSeconds,
      ...(session.kind === "delegated"
        ? {
            sessionKeyMaterial: serializeSessionKey(session.sessionKey),
            delegationChain: session.delegationChain.toJSON(),
          }
        : {}),
      ...(session.depositAddress ? { cachedDepositAddress: session.depositAddress } : {}),
    };

    await fs.mkdir(this.options.dir, { recursive: true, mode: 0o700 });

    const filePath = this.pathFor(session.botName, session.network);
    const tempFile = `${filePath}.tmp`;
    // "wx" creates the temp file with owner-only permissions or fails; clear leftovers first
    await fs.rm(tempFile, { force: true });
    await fs.writeFile(tempFile, JSON.stringify(record, null, 2), {
      mode: 0o600,
      flag: "wx",
    });
    await fs.rename(tempFile, filePath);

    return filePath;
  }

  /**
   * Cached session for (bot, network), or null on any miss.
   */
  async load(botName: string, network: Network): Promise<Session | null> {
    if (!this.options.enabled) {
      this.logger.info("Session caching disabled");
      return null;
    }

    const filePath = this.pathFor(botName, network);
    const content = await tryCatch(() => fs.readFile(filePath, "utf8"));
    if (isErr(content)) {
      this.logger.info(`No cached session for bot=${botName}`);
      return null;
    }

    const json = tryCatchSync((): unknown => JSON.parse(content.value));
    const parsed = isErr(json) ? null : SessionRecordSchema.safeParse(json.value);
    if (!parsed?.success) {
      this.logger.info(`Ignoring malformed session file ${path.basename(filePath)}`);
      return null;
    }
    const record = parsed.data;

    // Sanitized names can collide ("a b", "a/b" and "a_b" share a file)
    if (record.botName !== botName || record.network !== network) {
      this.logger.info(
        `Ignoring ${path.basename(filePath)}: saved for bot=${record.botName} network=${record.network}`
      );
      return null;
    }

    const verified = await this.options.apiFor(network).verifyToken(record.bearerToken);
    if (isErr(verified) || verified.value !== 200) {
      const reason = isErr(verified) ? verified.error.message : `status ${verified.value}`;
      this.logger.info(`Cached token rejected (${reason})`);
      return null;
    }

    this.logger.info(`Loaded cached session from ${path.basename(filePath)}`);
    this.logger.info(`Bot principal: ${record.botPrincipalText}`);
    return this.restore(record, network);
  }

  /**
   * Delete the session file. Resolves false when there was none.
   */
  async clear(botName: string, network: Network): Promise<boolean> {
    const filePath = this.pathFor(botName, network);
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return false;
      }
      throw error;
    }
  }

  private restore(record: SessionRecord, network: Network): Session {
    const tokenOnly: TokenOnlySession = {
      kind: "token-only",
      botName: record.botName,
      network,
      bearerToken: record.bearerToken,
      botPrincipalText: record.botPrincipalText,
      address: record.address,
      savedAtEpochSeconds: record.savedAtEpochSeconds,
      ...(record.cachedDepositAddress ? { depositAddress: record.cachedDepositAddress } : {}),
    };

    if (record.sessionKeyMaterial === undefined || record.delegationChain === undefined) {
      return tokenOnly;
    }
    const { sessionKeyMaterial, delegationChain } = record;

    const restored = tryCatchSync(() => {
      const sessionKey = restoreSessionKey(sessionKeyMaterial);
      const chain = DelegationChain.fromJSON(DelegationChainSchema.parse(delegationChain));
      return {
        sessionKey,
        delegationChain: chain,
        identity: DelegationIdentity.fromDelegation(sessionKey, chain),
      };
    });
    if (isErr(restored)) {
      this.logger.warn(`Session partially restored (${restored.error.message})`);
      return tokenOnly;
    }

    const session: DelegatedSession = { ...tokenOnly, ...restored.value, kind: "delegated" };
    return session;
  }
}
