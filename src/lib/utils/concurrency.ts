import { ConfigError } from "./errors.js";
import { isErr, tryCatch, type Result } from "./result.js";

export const DEFAULT_MAX_WORKERS = 5;

export type BotResult<T> = [botName: string, result: Result<T, Error>];

/**
 * Run `operation` for every bot with at most `maxWorkers` in flight.
 *
 * Results come back in input order, one per distinct name: a repeated name
 * runs once, so a bot never has two logins in flight. A bot whose operation
 * throws gets an error entry; the other bots keep running. The operation
 * should build its own agents and clients per call.
 */
export async function runPerBot<T>(
  operation: (botName: string) => Promise<T>,
  botNames: readonly string[],
  maxWorkers: number = DEFAULT_MAX_WORKERS
): Promise<Array<BotResult<T>>> {
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new ConfigError(`Worker count must be a positive integer, got ${maxWorkers}`);
  }

  const names = [...new Set(botNames)];

  const results = new Array<BotResult<T>>(names.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < names.length) {
      const index = next++;
      const botName = names[index];
      if (botName === undefined) return;
      results[index] = [botName, await tryCatch(() => operation(botName))];
    }
  };

  const poolSize = Math.min(maxWorkers, names.length);
  await Promise.all(Array.from({ length: poolSize }, () => worker()));

  return results;
}

/**
 * One "<bot>: FAILED — <reason>" line per failed bot.
 */
export function formatBotFailures<T>(results: ReadonlyArray<BotResult<T>>): string[] {
  const lines: string[] = [];
  for (const [botName, result] of results) {
    if (isErr(result)) {
      lines.push(`${botName}: FAILED — ${result.error.message}`);
    }
  }
  return lines;
}
