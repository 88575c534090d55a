import fs from "fs/promises";
import path from "path";
import os from "os";
import { z } from "zod";
import { ConfigError } from "./errors.js";

/**
 * Storage directory location: $SIWB_BOTS_HOME, else ~/.siwb-bots/
 */
export function getStorageDir(): string {
  return process.env.SIWB_BOTS_HOME || path.join(os.homedir(), ".siwb-bots");
}

function getConfigFile(): string {
  return path.join(getStorageDir(), "config.json");
}

/**
 * Directory holding session_<bot>[_<network>].json files
 */
export function getSessionDir(): string {
  return path.join(getStorageDir(), "sessions");
}

/**
 * Default location of the fee-paying wallet identity (Ed25519 PKCS#8 PEM)
 */
export function getDefaultWalletPemPath(): string {
  return path.join(getStorageDir(), "wallet", "identity-private.pem");
}

const CURRENT_CONFIG_VERSION = 1;

const AppConfigSchema = z.object({
  version: z.number().int(),
  cacheSessions: z.boolean().default(true),
  verifyQuerySignatures: z.boolean().default(true),
  walletPemPath: z.string().optional(),
});

/**
 * App configuration
 */
export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_APP_CONFIG: AppConfig = {
  version: CURRENT_CONFIG_VERSION,
  cacheSessions: true,
  verifyQuerySignatures: true,
};

/**
 * Initialize storage directory structure
 */
export async function initializeStorage(): Promise<void> {
  await fs.mkdir(getSessionDir(), { recursive: true, mode: 0o700 });
}

/**
 * Read app config. A missing file gives the defaults; an unreadable or
 * invalid one is a ConfigError.
 */
export async function readAppConfig(): Promise<AppConfig> {
  const configFile = getConfigFile();
  let content: string;
  try {
    content = await fs.readFile(configFile, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { ...DEFAULT_APP_CONFIG };
    }
    throw new ConfigError(`Cannot read ${configFile}`, { cause: String(error) });
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    throw new ConfigError(`${configFile} is not valid JSON`);
  }

  const parsed = AppConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${configFile}`, parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}

/**
 * Write app config (atomic write with temp file)
 */
export async function writeAppConfig(config: AppConfig): Promise<void> {
  const configFile = getConfigFile();
  await fs.mkdir(path.dirname(configFile), { recursive: true, mode: 0o700 });
  const tempFile = `${configFile}.tmp`;
  await fs.writeFile(tempFile, JSON.stringify(config, null, 2), {
    mode: 0o600,
  });
  await fs.rename(tempFile, configFile);
}

export type AppConfigUpdate = Partial<Omit<AppConfig, "version">>;

/**
 * Merge the given settings into config.json and return the stored result.
 * Keys left undefined keep their current value.
 */
export async function updateAppConfig(update: AppConfigUpdate): Promise<AppConfig> {
  const config = await readAppConfig();
  const next: AppConfig = {
    ...config,
    version: CURRENT_CONFIG_VERSION,
    cacheSessions: update.cacheSessions ?? config.cacheSessions,
    verifyQuerySignatures: update.verifyQuerySignatures ?? config.verifyQuerySignatures,
  };
  if (update.walletPemPath !== undefined) {
    next.walletPemPath = update.walletPemPath;
  }
  await writeAppConfig(next);
  return next;
}

export function resolveWalletPemPath(config: AppConfig): string {
  return config.walletPemPath ?? getDefaultWalletPemPath();
}
