import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import { z } from "zod";
import { RemoteCallError, TokenExchangeFailedError } from "../utils/errors.js";
import { err, ok, tryCatch, isErr, type Result } from "../utils/result.js";

/**
 * Body of POST /auth: a millisecond timestamp signed by the delegated
 * identity, plus the delegation chain serialized as a JSON string.
 */
export interface DelegationExchangePayload {
  timestamp: string;
  /** base64 signature over the UTF-8 timestamp */
  signature: string;
  delegation: string;
}

const TokenResponseSchema = z.object({
  token: z.string().min(1),
});

const REQUEST_TIMEOUT_MS = 10_000;
const BODY_PREVIEW_CHARS = 200;

/**
 * Parses string bodies as JSON when they are JSON, leaves them as text otherwise.
 */
function safeJsonTransform(data: unknown): unknown {
  if (typeof data !== "string") {
    return data;
  }
  const trimmed = data.trim();
  if (!trimmed) {
    return data;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return data;
  }
}

function preview(data: unknown): string {
  const text = typeof data === "string" ? data : JSON.stringify(data) ?? "";
  return text.slice(0, BODY_PREVIEW_CHARS);
}

export interface TradingApiOptions {
  apiUrl: string;
  /** Transport override (tests answer requests in-process) */
  adapter?: AxiosRequestConfig["adapter"];
}

/**
 * REST client for the trading platform's bearer-token endpoints.
 *
 * Every status is resolved (never thrown) so callers branch on the code.
 */
export class TradingApi {
  private readonly http: AxiosInstance;

  constructor(options: TradingApiOptions) {
    this.http = axios.create({
      baseURL: options.apiUrl,
      timeout: REQUEST_TIMEOUT_MS,
      headers: { Accept: "application/json" },
      transformResponse: [safeJsonTransform],
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  /**
   * POST /auth. Succeeds on 200 or 201 with a non-empty `token` field.
   */
  async exchangeDelegation(
    payload: DelegationExchangePayload
  ): Promise<Result<string, TokenExchangeFailedError>> {
    const reply = await tryCatch(() => this.http.post("/auth", payload));
    if (isErr(reply)) {
      return err(new TokenExchangeFailedError(reply.error.message));
    }

    const { status, data } = reply.value;
    if (status !== 200 && status !== 201) {
      return err(new TokenExchangeFailedError(`${status} ${preview(data)}`, status));
    }

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      return err(new TokenExchangeFailedError(`No token in response: ${preview(data)}`, status));
    }
    return ok(parsed.data.token);
  }

  /**
   * GET /auth with the bearer token. Ok carries the 2xx status.
   */
  async verifyToken(token: string): Promise<Result<number, RemoteCallError>> {
    const reply = await tryCatch(() =>
      this.http.get("/auth", { headers: { Authorization: `Bearer ${token}` } })
    );
    if (isErr(reply)) {
      return err(new RemoteCallError("GET /auth", reply.error.message));
    }

    const { status, data } = reply.value;
    if (status < 200 || status >= 300) {
      return err(new RemoteCallError("GET /auth", `${status} ${preview(data)}`, { statusCode: status }));
    }
    return ok(status);
  }
}
