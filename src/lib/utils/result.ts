/**
 * Result<T, E>: discriminated union for explicit ok/err returns.
 *
 * Every canister and REST response is decoded into a Result at the call site,
 * so "free lookup failed, fall back to the priced call" is a branch on a value
 * rather than a caught exception.
 *
 * Usage:
 *   const result = fromVariant(await signer.getPublicKeyQuery({ botName }));
 *   if (isOk(result)) {
 *     use(result.value);
 *   } else {
 *     logger.info(describeApiError(result.error));
 *   }
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Represents a successful operation with a value of type T.
 */
export interface OkResult<T> {
  success: true;
  value: T;
}

/**
 * Represents a failed operation with an error of type E.
 */
export interface ErrResult<E> {
  success: false;
  error: E;
}

/**
 * Either an OkResult<T> or an ErrResult<E>; E defaults to Error.
 */
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

/**
 * The `variant { Ok : T; Err : E }` shape every canister in this project returns.
 */
export type CandidResult<T, E> = { Ok: T } | { Err: E };

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): OkResult<T> {
  return { success: true, value };
}

export function err<E = Error>(error: E): ErrResult<E> {
  return { success: false, error };
}

/**
 * Decode a candid Ok/Err variant into a Result.
 *
 * @example
 *   const prepared = fromVariant(await siwb.siwb_prepare_login(address));
 */
export function fromVariant<T, E>(variant: CandidResult<T, E>): Result<T, E> {
  if ("Ok" in variant) {
    return ok(variant.Ok);
  }
  return err(variant.Err);
}

// ============================================================================
// Type Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
  return result.success === true;
}

export function isErr<T, E>(result: Result<T, E>): result is ErrResult<E> {
  return result.success === false;
}

// ============================================================================
// Try-Catch Wrappers
// ============================================================================

/**
 * Run an async function and return a Result instead of throwing.
 *
 * Thrown non-Error values are converted to an Error via String(). Used around
 * agent calls, which reject on transport and certificate failures.
 *
 * @example
 *   const reply = await tryCatch(() => ledger.icrc2_approve(args));
 *   if (isErr(reply)) throw new FeePaymentFailedError(reply.error.message);
 */
export async function tryCatch<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await fn();
    return ok(value);
  } catch (thrown) {
    if (thrown instanceof Error) {
      return err(thrown);
    }
    return err(new Error(String(thrown)));
  }
}

/**
 * Synchronous counterpart of tryCatch.
 *
 * @example
 *   const parsed = tryCatchSync(() => JSON.parse(raw));
 */
export function tryCatchSync<T>(fn: () => T): Result<T, Error> {
  try {
    const value = fn();
    return ok(value);
  } catch (thrown) {
    if (thrown instanceof Error) {
      return err(thrown);
    }
    return err(new Error(String(thrown)));
  }
}
