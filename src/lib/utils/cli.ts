/**
 * Shared CLI output helpers.
 */

import { formatError } from "./errors.js";

/**
 * Print any value as formatted JSON to stdout. Bigints are printed as strings.
 */
export function printJson(data: unknown): void {
  console.log(
    JSON.stringify(
      data,
      (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
      2
    )
  );
}

/**
 * Print an error as JSON and exit with code 1.
 *
 * For a SiwbError the output includes structured fields (code, suggestion,
 * details) so callers know what went wrong and what to do next.
 */
export function handleError(error: unknown): never {
  const { message, ...rest } = formatError(error);
  printJson({ error: message, ...rest });
  process.exit(1);
}
