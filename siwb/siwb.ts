#!/usr/bin/env node
/**
 * SIWB login CLI
 * Sign-In-With-Bitcoin for trading bots: BIP-322 helpers, login, cached sessions
 *
 * Usage: siwb-bots <subcommand> [options]
 */

import { Command } from "commander";
import { hex } from "@scure/base";
import { getEnvNetwork, parseNetwork, type Network } from "../src/lib/config/networks.js";
import {
  createBotServices,
  getOrCreateSession,
  type Session,
} from "../src/lib/services/index.js";
import {
  computeSighash,
  decodeWitness,
  deriveAddress,
  encodeWitness,
  taggedHashHex,
} from "../src/lib/utils/bip322.js";
import { printJson, handleError } from "../src/lib/utils/cli.js";
import { formatBotFailures, runPerBot } from "../src/lib/utils/concurrency.js";
import { formatError } from "../src/lib/utils/errors.js";
import { createLogger, withPrefix } from "../src/lib/utils/logger.js";
import { isErr } from "../src/lib/utils/result.js";
import {
  initializeStorage,
  readAppConfig,
  resolveWalletPemPath,
  updateAppConfig,
} from "../src/lib/utils/storage.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function resolveNetwork(flag: string | undefined): Network {
  return flag === undefined ? getEnvNetwork() : parseNetwork(flag);
}

function summarizeSession(session: Session): Record<string, unknown> {
  const summary: Record<string, unknown> = {
    botName: session.botName,
    network: session.network,
    kind: session.kind,
    botPrincipal: session.botPrincipalText,
    address: session.address,
    savedAt: new Date(session.savedAtEpochSeconds * 1000).toISOString(),
  };
  if (session.kind === "delegated") {
    const [first] = session.delegationChain.delegations;
    if (first) {
      summary.delegationExpiresAt = new Date(
        Number(first.delegation.expiration / 1_000_000n)
      ).toISOString();
    }
  }
  if (session.depositAddress) {
    summary.depositAddress = session.depositAddress;
  }
  return summary;
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("siwb")
  .description(
    "Sign-In-With-Bitcoin for trading bots: BIP-322 proofs signed by a remote threshold Schnorr signer, " +
      "exchanged for delegated Internet Computer identities and bearer tokens"
  )
  .version("0.1.0");

// ---------------------------------------------------------------------------
// address
// ---------------------------------------------------------------------------

program
  .command("address")
  .description("Derive the mainnet P2TR (bc1p...) address for a 32-byte x-only public key.")
  .requiredOption("--pubkey <hex>", "x-only public key (64 hex characters)")
  .action((opts: { pubkey: string }) => {
    try {
      printJson({ pubkey: opts.pubkey, address: deriveAddress(opts.pubkey) });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// sighash
// ---------------------------------------------------------------------------

program
  .command("sighash")
  .description(
    "Compute the BIP-322 simple sighash for a message and x-only public key. " +
      "This is the 32-byte digest the remote signer signs during login."
  )
  .requiredOption("--message <text>", "Challenge message")
  .requiredOption("--pubkey <hex>", "x-only public key (64 hex characters)")
  .action((opts: { message: string; pubkey: string }) => {
    try {
      const { sighash, address } = computeSighash(opts.message, opts.pubkey);
      printJson({
        messageHash: taggedHashHex(opts.message),
        sighash,
        address,
      });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// witness
// ---------------------------------------------------------------------------

program
  .command("witness")
  .description("Encode a 64-byte Schnorr signature as a base64 BIP-322 witness.")
  .requiredOption("--signature <hex>", "Schnorr signature (128 hex characters)")
  .action((opts: { signature: string }) => {
    try {
      const witness = encodeWitness(opts.signature);
      printJson({
        witness,
        stack: decodeWitness(witness).map((item) => hex.encode(item)),
      });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// login
// ---------------------------------------------------------------------------

program
  .command("login")
  .description(
    "Get a session for each bot: reuse a cached session while its bearer token is accepted, " +
      "otherwise run the full SIWB login and cache the result. Bots run concurrently; " +
      "one bot failing does not stop the others."
  )
  .requiredOption("--bot <names...>", "Bot names")
  .option("--network <name>", "prd, testing or development (default: $SIWB_NETWORK or prd)")
  .option("--workers <n>", "Maximum bots logging in at once", "5")
  .option("--no-cache", "Neither read nor write cached sessions")
  .option("--verbose", "Log each login step to stderr")
  .action(
    async (opts: {
      bot: string[];
      network?: string;
      workers: string;
      cache: boolean;
      verbose?: boolean;
    }) => {
      try {
        const network = resolveNetwork(opts.network);
        const stored = await readAppConfig();
        const config = { ...stored, cacheSessions: stored.cacheSessions && opts.cache };
        await initializeStorage();

        const loggerOptions = { verbose: opts.verbose };
        const results = await runPerBot(
          async (botName) => {
            const logger = withPrefix(loggerOptions, botName);
            const { authenticator, cache } = await createBotServices({ network, config, logger });
            const session = await getOrCreateSession(botName, {
              network,
              cache,
              authenticator,
              logger,
            });
            return summarizeSession(session);
          },
          opts.bot,
          Number(opts.workers)
        );

        const logger = createLogger(loggerOptions);
        for (const line of formatBotFailures(results)) {
          logger.warn(line);
        }

        printJson({
          network,
          sessions: results.map(([botName, result]) =>
            isErr(result) ? { botName, failed: true, ...formatError(result.error) } : result.value
          ),
        });

        if (results.some(([, result]) => isErr(result))) {
          process.exit(1);
        }
      } catch (error) {
        handleError(error);
      }
    }
  );

// ---------------------------------------------------------------------------
// session
// ---------------------------------------------------------------------------

program
  .command("session")
  .description(
    "Show the cached session for a bot if its bearer token is still accepted. Never logs in."
  )
  .requiredOption("--bot <name>", "Bot name")
  .option("--network <name>", "prd, testing or development (default: $SIWB_NETWORK or prd)")
  .option("--verbose", "Log cache decisions to stderr")
  .action(async (opts: { bot: string; network?: string; verbose?: boolean }) => {
    try {
      const network = resolveNetwork(opts.network);
      const config = await readAppConfig();
      const logger = createLogger({ verbose: opts.verbose });
      const { cache } = await createBotServices({ network, config, logger });

      const session = await cache.load(opts.bot, network);
      printJson(
        session
          ? { found: true, ...summarizeSession(session) }
          : { found: false, botName: opts.bot, network, path: cache.pathFor(opts.bot, network) }
      );
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// logout
// ---------------------------------------------------------------------------

program
  .command("logout")
  .description("Delete the cached session for a bot. The next login runs the full SIWB flow.")
  .requiredOption("--bot <name>", "Bot name")
  .option("--network <name>", "prd, testing or development (default: $SIWB_NETWORK or prd)")
  .action(async (opts: { bot: string; network?: string }) => {
    try {
      const network = resolveNetwork(opts.network);
      const config = await readAppConfig();
      const { cache } = await createBotServices({ network, config });

      const path = cache.pathFor(opts.bot, network);
      const removed = await cache.clear(opts.bot, network);
      printJson({ botName: opts.bot, network, path, removed });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

program
  .command("config")
  .description(
    "Show the settings in ~/.siwb-bots/config.json, or change them when any option is given."
  )
  .option("--cache", "Cache sessions between commands")
  .option("--no-cache", "Never read or write cached sessions")
  .option("--verify-query-signatures", "Verify canister query response signatures")
  .option("--no-verify-query-signatures", "Skip query response signature checks")
  .option("--wallet-pem <path>", "Ed25519 PEM of the wallet identity that pays signer fees")
  .action(
    async (opts: { cache?: boolean; verifyQuerySignatures?: boolean; walletPem?: string }) => {
      try {
        const changed =
          opts.cache !== undefined ||
          opts.verifyQuerySignatures !== undefined ||
          opts.walletPem !== undefined;
        const config = changed
          ? await updateAppConfig({
              cacheSessions: opts.cache,
              verifyQuerySignatures: opts.verifyQuerySignatures,
              walletPemPath: opts.walletPem,
            })
          : await readAppConfig();

        printJson({ ...config, walletPemPath: resolveWalletPemPath(config), updated: changed });
      } catch (error) {
        handleError(error);
      }
    }
  );

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);
