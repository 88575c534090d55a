import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { base64, hex } from "@scure/base";
import { FeePaymentGate } from "./fee-payment.service.js";
import { RemoteSigner } from "./remote-signer.service.js";
import { SessionCache } from "./session-cache.js";
import {
  getOrCreateSession,
  LOGIN_STEPS,
  SiwbAuthenticator,
  type DelegationRetryPolicy,
} from "./siwb.service.js";
import { TradingApi } from "./trading-api.js";
import { computeSighash, encodeWitness } from "../utils/bip322.js";
import { deriveBotPrincipal } from "../utils/delegation.js";
import { DelegationUnavailableError, LoginFailedError } from "../utils/errors.js";
import {
  CKBTC_LEDGER_PRINCIPAL,
  DELEGATION_EXPIRATION,
  NOW_MS,
  SIGNER_PRINCIPAL,
  TEST_ADDRESS,
  TEST_CHALLENGE,
  TEST_PUBKEY,
  TEST_SIGNATURE,
  TEST_TOKEN,
  USER_CANISTER_PUBKEY,
  createFakeLogger,
  createFakeSigner,
  createFakeSiwb,
  createSessionKey,
  makeDelegatedSession,
  restAdapter,
  tradingPlatform,
  type FakeResponse,
  type RecordedRequest,
} from "../testing/fakes.js";

const AuthBodySchema = z.object({
  timestamp: z.string(),
  signature: z.string(),
  delegation: z.string(),
});

interface SetupOptions {
  platform?: (request: RecordedRequest) => FakeResponse;
  delegationRetry?: DelegationRetryPolicy;
}

function setup(options: SetupOptions = {}) {
  const signer = createFakeSigner([]);
  const siwb = createFakeSiwb();
  const logger = createFakeLogger();
  const requests: RecordedRequest[] = [];
  const api = new TradingApi({
    apiUrl: "https://trading.test/v1",
    adapter: restAdapter(options.platform ?? tradingPlatform(), requests),
  });
  const sleep = vi.fn(async (_ms: number) => {});
  const sessionKey = createSessionKey(3);

  const authenticator = new SiwbAuthenticator({
    signer: new RemoteSigner(signer, new FeePaymentGate({
        signer,
        spender: SIGNER_PRINCIPAL,
        feeLedger: CKBTC_LEDGER_PRINCIPAL,
      })),
    siwb,
    api,
    network: "prd",
    logger,
    generateSessionKey: () => sessionKey,
    now: () => NOW_MS,
    sleep,
    ...(options.delegationRetry ? { delegationRetry: options.delegationRetry } : {}),
  });

  return { signer, siwb, logger, requests, sleep, sessionKey, authenticator };
}

async function loginFailure(authenticator: SiwbAuthenticator): Promise<unknown> {
  try {
    await authenticator.login("bot-1");
  } catch (error) {
    return error;
  }
  throw new Error("login unexpectedly succeeded");
}

describe("SiwbAuthenticator.login", () => {
  it("produces a delegated session", async () => {
    const { authenticator } = setup();

    const session = await authenticator.login("bot-1");

    expect(session).toMatchObject({
      kind: "delegated",
      botName: "bot-1",
      network: "prd",
      bearerToken: TEST_TOKEN,
      address: TEST_ADDRESS,
      savedAtEpochSeconds: 1_700_000_000,
      botPrincipalText: deriveBotPrincipal(USER_CANISTER_PUBKEY).toText(),
    });
    expect(session.identity.getPrincipal().toText()).toBe(session.botPrincipalText);
    expect(session.delegationChain.delegations[0]?.delegation.expiration).toBe(
      DELEGATION_EXPIRATION
    );
  });

  it("signs the BIP-322 sighash of the issued challenge", async () => {
    const { signer, siwb, authenticator } = setup();

    await authenticator.login("bot-1");

    expect(siwb.siwb_prepare_login).toHaveBeenCalledWith(TEST_ADDRESS);
    expect(signer.sign).toHaveBeenCalledWith({
      botName: "bot-1",
      message: hex.decode(computeSighash(TEST_CHALLENGE, TEST_PUBKEY).sighash),
      payment: [],
    });
  });

  it("logs in with the witness and the session key", async () => {
    const { siwb, sessionKey, authenticator } = setup();

    await authenticator.login("bot-1");

    const sessionDer = new Uint8Array(sessionKey.getPublicKey().toDer());
    expect(siwb.siwb_login).toHaveBeenCalledWith(
      encodeWitness(TEST_SIGNATURE),
      TEST_ADDRESS,
      TEST_PUBKEY,
      sessionDer,
      { Bip322Simple: null }
    );
    expect(siwb.siwb_get_delegation).toHaveBeenCalledTimes(1);
    expect(siwb.siwb_get_delegation).toHaveBeenCalledWith(
      TEST_ADDRESS,
      sessionDer,
      DELEGATION_EXPIRATION
    );
  });

  it("exchanges a signed timestamp and the delegation for a token, then verifies it", async () => {
    const { requests, sessionKey, authenticator } = setup();

    await authenticator.login("bot-1");

    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual(["POST /auth", "GET /auth"]);

    const body = AuthBodySchema.parse(requests[0]?.body);
    expect(body.timestamp).toBe("1700000000000");
    expect(base64.decode(body.signature)).toHaveLength(64);

    const delegation: unknown = JSON.parse(body.delegation);
    expect(delegation).toEqual({
      publicKey: "11".repeat(40),
      delegations: [
        {
          delegation: {
            pubkey: hex.encode(new Uint8Array(sessionKey.getPublicKey().toDer())),
            expiration: DELEGATION_EXPIRATION.toString(16),
          },
          signature: "33".repeat(64),
        },
      ],
    });

    expect(requests[1]?.authorization).toBe(`Bearer ${TEST_TOKEN}`);
  });

  it("retries the delegation fetch until it is available", async () => {
    const { siwb, sleep, authenticator } = setup();
    siwb.siwb_get_delegation
      .mockResolvedValueOnce({ Err: "delegation not found" })
      .mockResolvedValueOnce({ Err: "delegation not found" })
      .mockRejectedValueOnce(new Error("replica busy"))
      .mockResolvedValueOnce({ Err: "delegation not found" });

    const session = await authenticator.login("bot-1");

    expect(session.bearerToken).toBe(TEST_TOKEN);
    expect(siwb.siwb_get_delegation).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("gives up after five failed delegation fetches", async () => {
    const { siwb, sleep, requests, authenticator } = setup();
    siwb.siwb_get_delegation.mockResolvedValue({ Err: "delegation not found" });

    const error = await loginFailure(authenticator);

    expect(error).toBeInstanceOf(LoginFailedError);
    expect(error).toMatchObject({
      step: "DelegationObtained",
      code: "DELEGATION_UNAVAILABLE",
      message:
        "SIWB login failed at DelegationObtained: siwb_get_delegation failed: still failing after 5 attempts: delegation not found",
    });
    expect(error).toHaveProperty("cause", expect.any(DelegationUnavailableError));
    expect(siwb.siwb_get_delegation).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(4);
    expect(requests).toHaveLength(0);
  });

  it("follows a custom retry policy", async () => {
    const { siwb, sleep, authenticator } = setup({
      delegationRetry: { attempts: 2, delayMs: 50 },
    });
    siwb.siwb_get_delegation.mockResolvedValue({ Err: "delegation not found" });

    await expect(authenticator.login("bot-1")).rejects.toThrow(LoginFailedError);
    expect(siwb.siwb_get_delegation).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(50);
  });

  it("aborts on an address mismatch before requesting a challenge", async () => {
    const { signer, siwb, authenticator } = setup();
    signer.getPublicKeyQuery.mockResolvedValueOnce({
      Ok: { botName: "bot-1", publicKeyHex: TEST_PUBKEY, address: "bc1pspoofed" },
    });

    const error = await loginFailure(authenticator);

    expect(error).toMatchObject({
      step: "AddressVerified",
      code: "ADDRESS_MISMATCH",
      message: `SIWB login failed at AddressVerified: P2TR address mismatch: signer reported bc1pspoofed, local derivation gives ${TEST_ADDRESS}`,
    });
    expect(siwb.siwb_prepare_login).not.toHaveBeenCalled();
    expect(signer.sign).not.toHaveBeenCalled();
  });

  it("fails when no challenge is issued", async () => {
    const { siwb, authenticator } = setup();
    siwb.siwb_prepare_login.mockResolvedValueOnce({ Err: "rate limited" });

    await expect(loginFailure(authenticator)).resolves.toMatchObject({
      step: "ChallengeReceived",
      message: "SIWB login failed at ChallengeReceived: siwb_prepare_login failed: rate limited",
    });
  });

  it("fails on a malformed signature from the signer", async () => {
    const { signer, siwb, authenticator } = setup();
    signer.sign.mockResolvedValueOnce({ Ok: { botName: "bot-1", signatureHex: "ab".repeat(32) } });

    await expect(loginFailure(authenticator)).resolves.toMatchObject({
      step: "WitnessEncoded",
      code: "INVALID_SIGNATURE_LENGTH",
    });
    expect(siwb.siwb_login).not.toHaveBeenCalled();
  });

  it("fails when the identity canister rejects the login", async () => {
    const { siwb, authenticator } = setup();
    siwb.siwb_login.mockResolvedValueOnce({ Err: "invalid signature" });

    await expect(loginFailure(authenticator)).resolves.toMatchObject({
      step: "LoggedIn",
      message: "SIWB login failed at LoggedIn: siwb_login failed: invalid signature",
    });
    expect(siwb.siwb_get_delegation).not.toHaveBeenCalled();
  });

  it("fails when the token exchange is refused", async () => {
    const { authenticator } = setup({
      platform: () => ({ status: 401, data: { error: "bad delegation" } }),
    });

    await expect(loginFailure(authenticator)).resolves.toMatchObject({
      step: "TokenExchanged",
      code: "TOKEN_EXCHANGE_FAILED",
      message: 'SIWB login failed at TokenExchanged: POST /auth failed: 401 {"error":"bad delegation"}',
    });
  });

  it("treats a failed token verification as a warning", async () => {
    const { logger, authenticator } = setup({ platform: tradingPlatform(500) });

    const session = await authenticator.login("bot-1");

    expect(session.bearerToken).toBe(TEST_TOKEN);
    expect(logger.warn).toHaveBeenCalledWith(
      'Token verification: GET /auth failed: 500 {"ok":false}'
    );
  });

  it("never logs the bearer token", async () => {
    const { logger, authenticator } = setup();

    await authenticator.login("bot-1");

    const lines = [...logger.info.mock.calls, ...logger.debug.mock.calls, ...logger.warn.mock.calls];
    expect(lines.filter(([line]) => line.includes(TEST_TOKEN))).toEqual([]);
  });

  it("names every step after the state it reaches", () => {
    expect(LOGIN_STEPS[0]).toBe("PubKeyFetched");
    expect(LOGIN_STEPS[LOGIN_STEPS.length - 1]).toBe("Done");
    expect(LOGIN_STEPS).toHaveLength(11);
  });
});

describe("getOrCreateSession", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "siwb-session-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function cacheWith(enabled: boolean): SessionCache {
    const api = new TradingApi({
      apiUrl: "https://trading.test/v1",
      adapter: restAdapter(tradingPlatform()),
    });
    return new SessionCache({ dir, enabled, apiFor: () => api });
  }

  it("logs in on a miss and reuses the cached session afterwards", async () => {
    const cache = cacheWith(true);
    const authenticator = { login: vi.fn(async (botName: string) => makeDelegatedSession(botName)) };

    const first = await getOrCreateSession("bot-1", { network: "prd", cache, authenticator });
    const second = await getOrCreateSession("bot-1", { network: "prd", cache, authenticator });

    expect(authenticator.login).toHaveBeenCalledTimes(1);
    await expect(fs.access(cache.pathFor("bot-1", "prd"))).resolves.toBeUndefined();
    expect(second.kind).toBe("delegated");
    expect(second.botPrincipalText).toBe(first.botPrincipalText);
  });

  it("logs in every time when caching is disabled", async () => {
    const cache = cacheWith(false);
    const authenticator = { login: vi.fn(async (botName: string) => makeDelegatedSession(botName)) };

    await getOrCreateSession("bot-1", { network: "prd", cache, authenticator });
    await getOrCreateSession("bot-1", { network: "prd", cache, authenticator });

    expect(authenticator.login).toHaveBeenCalledTimes(2);
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  it("caches nothing when the login fails", async () => {
    const cache = cacheWith(true);
    const authenticator = {
      login: vi.fn(async (_botName: string) => {
        throw new LoginFailedError("Signed", new Error("signer offline"));
      }),
    };

    await expect(
      getOrCreateSession("bot-1", { network: "prd", cache, authenticator })
    ).rejects.toThrow("SIWB login failed at Signed: signer offline");
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });
});
