/**
 * Redact sensitive values from strings before logging
 */

const SENSITIVE_KEYS = "bearerToken|token|sessionKeyMaterial|secretKey|privateKey";

const DOUBLE_QUOTED_JSON = new RegExp(`"(${SENSITIVE_KEYS})"\\s*:\\s*"([^"]*)"`, "gi");
const SINGLE_QUOTED_JSON = new RegExp(`'(${SENSITIVE_KEYS})'\\s*:\\s*'([^']*)'`, "gi");
const BEARER_HEADER = /(Bearer\s+)[A-Za-z0-9._~+/=-]+/g;

/**
 * Redacts sensitive values from JSON-like strings and Authorization headers.
 * Matches patterns like "bearerToken":"value" or "Bearer eyJ..." and replaces
 * the value portion with [REDACTED]
 */
export function redactSensitive(input: string): string {
  return input
    .replace(DOUBLE_QUOTED_JSON, '"$1":"[REDACTED]"')
    .replace(SINGLE_QUOTED_JSON, "'$1':'[REDACTED]'")
    .replace(BEARER_HEADER, "$1[REDACTED]");
}
