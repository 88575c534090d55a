import { redactSensitive } from "./redact.js";

/**
 * Base error class for siwb-bots
 */
export class SiwbError extends Error {
  public readonly suggestion: string;

  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
    suggestion?: string
  ) {
    super(message);
    this.name = "SiwbError";
    this.suggestion =
      suggestion ?? "Re-run with --verbose to see which login step failed";
  }
}

/**
 * Error for invalid configuration
 */
export class ConfigError extends SiwbError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIG_ERROR", details, "Check --network and ~/.siwb-bots/config.json");
    this.name = "ConfigError";
  }
}

// ---------------------------------------------------------------------------
// Input validation (local, never retried)
// ---------------------------------------------------------------------------

/**
 * Public key is not 32 bytes of hex (x-only Taproot key)
 */
export class InvalidPublicKeyError extends SiwbError {
  constructor(pubkeyHex: string, reason: string) {
    super(
      `Invalid x-only public key: ${reason}`,
      "INVALID_PUBLIC_KEY",
      { pubkeyHex },
      "Provide a 32-byte x-only public key as 64 hex characters"
    );
    this.name = "InvalidPublicKeyError";
  }
}

/**
 * Schnorr signature is not exactly 64 bytes
 */
export class InvalidSignatureLengthError extends SiwbError {
  constructor(public readonly actualLength: number) {
    super(
      `Expected 64-byte signature, got ${actualLength}`,
      "INVALID_SIGNATURE_LENGTH",
      { actualLength },
      "BIP340 Schnorr signatures are 64 bytes (128 hex characters)"
    );
    this.name = "InvalidSignatureLengthError";
  }
}

/**
 * Message hash handed to the signer is not 32 bytes
 */
export class InvalidMessageHashError extends SiwbError {
  constructor(actualLength: number) {
    super(
      `Expected 32-byte message hash, got ${actualLength}`,
      "INVALID_MESSAGE_HASH",
      { actualLength }
    );
    this.name = "InvalidMessageHashError";
  }
}

// ---------------------------------------------------------------------------
// Remote failures
// ---------------------------------------------------------------------------

/**
 * A canister or REST call failed (error response or transport failure)
 */
export class RemoteCallError extends SiwbError {
  constructor(
    public readonly step: string,
    message: string,
    details?: unknown,
    code = "REMOTE_UNAVAILABLE"
  ) {
    super(`${step} failed: ${message}`, code, details);
    this.name = "RemoteCallError";
  }
}

/**
 * Neither the free nor the priced public key lookup succeeded
 */
export class PublicKeyUnavailableError extends RemoteCallError {
  constructor(botName: string, reason: string) {
    super("getPublicKey", `no public key for bot ${botName}: ${reason}`, { botName }, "PUBLIC_KEY_UNAVAILABLE");
    this.name = "PublicKeyUnavailableError";
  }
}

/**
 * The signed delegation never became available within the retry budget
 */
export class DelegationUnavailableError extends RemoteCallError {
  constructor(attempts: number, lastReason: string) {
    super(
      "siwb_get_delegation",
      `still failing after ${attempts} attempts: ${lastReason}`,
      { attempts },
      "DELEGATION_UNAVAILABLE"
    );
    this.name = "DelegationUnavailableError";
  }
}

/**
 * The trading platform refused to exchange the delegation for a bearer token
 */
export class TokenExchangeFailedError extends RemoteCallError {
  constructor(message: string, public readonly statusCode?: number) {
    super("POST /auth", message, { statusCode }, "TOKEN_EXCHANGE_FAILED");
    this.name = "TokenExchangeFailedError";
  }
}

// ---------------------------------------------------------------------------
// Fee payment
// ---------------------------------------------------------------------------

const FUND_WALLET_SUGGESTION =
  "Fund the wallet identity with ckBTC, then run the whole login again";

/**
 * Base error for signer fee payment problems
 */
export class FeePaymentError extends SiwbError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details, FUND_WALLET_SUGGESTION);
    this.name = "FeePaymentError";
  }
}

/**
 * The signer only accepts fee tokens this client cannot pay with
 */
export class UnsupportedFeeTokenError extends FeePaymentError {
  constructor(available: string[]) {
    super(
      `Signer requires fee payment but no ckBTC fee token is configured. Available: ${available.join(", ")}`,
      "FEE_PAYMENT_UNSUPPORTED_TOKEN",
      { available }
    );
    this.name = "UnsupportedFeeTokenError";
  }
}

/**
 * A fee is required but there is no wallet identity to pay it
 */
export class FeePaymentUnavailableError extends FeePaymentError {
  constructor() {
    super(
      "Fee payment required but no wallet identity is available",
      "FEE_PAYMENT_REQUIRED"
    );
    this.name = "FeePaymentUnavailableError";
  }
}

/**
 * The signer asks for its fee on a ledger other than the configured ckBTC ledger
 */
export class FeeLedgerMismatchError extends FeePaymentError {
  constructor(
    public readonly requested: string,
    public readonly configured: string
  ) {
    super(
      `Signer fee ledger ${requested} is not the configured ckBTC ledger ${configured}`,
      "FEE_PAYMENT_LEDGER_MISMATCH",
      { requested, configured }
    );
    this.name = "FeeLedgerMismatchError";
  }
}

/**
 * The ICRC-2 approve for the fee was rejected
 */
export class FeePaymentFailedError extends FeePaymentError {
  constructor(reason: string, details?: unknown) {
    super(`icrc2_approve for fee payment failed: ${reason}`, "FEE_PAYMENT_FAILED", details);
    this.name = "FeePaymentFailedError";
  }
}

// ---------------------------------------------------------------------------
// Security
// ---------------------------------------------------------------------------

/**
 * Signer-reported address differs from the locally derived P2TR address
 */
export class AddressMismatchError extends SiwbError {
  constructor(
    public readonly reported: string,
    public readonly derived: string
  ) {
    super(
      `P2TR address mismatch: signer reported ${reported}, local derivation gives ${derived}`,
      "ADDRESS_MISMATCH",
      { reported, derived },
      "Do not retry blindly: verify the signer canister id for this network"
    );
    this.name = "AddressMismatchError";
  }
}

/**
 * Terminal failure of a login sequence at a given step
 */
export class LoginFailedError extends SiwbError {
  constructor(
    public readonly step: string,
    public readonly cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `SIWB login failed at ${step}: ${reason}`,
      cause instanceof SiwbError ? cause.code : "LOGIN_FAILED",
      cause instanceof SiwbError ? cause.details : undefined,
      cause instanceof SiwbError ? cause.suggestion : undefined
    );
    this.name = "LoginFailedError";
  }
}

/**
 * Format error for CLI output
 */
export function formatError(error: unknown): {
  message: string;
  code?: string;
  details?: unknown;
  suggestion?: string;
} {
  if (error instanceof SiwbError) {
    return {
      message: redactSensitive(error.message),
      code: error.code,
      details: error.details,
      suggestion: error.suggestion,
    };
  }

  if (error instanceof Error) {
    return { message: redactSensitive(error.message) };
  }

  return { message: "Unknown error occurred" };
}
