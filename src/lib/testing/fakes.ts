/**
 * In-process stand-ins for the canisters and the trading platform, shared by the tests.
 */

import { vi } from "vitest";
import type { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import { DelegationIdentity, Ed25519KeyIdentity } from "@dfinity/identity";
import { Principal } from "@dfinity/principal";
import type { Network } from "../config/networks.js";
import type {
  LoginDetails,
  SignedDelegation,
  SignMessageType,
  SiwbService,
} from "../idl/siwb.idl.js";
import type {
  FeeToken,
  FeeTokensRecord,
  OptPayment,
  PublicKeyRecord,
  SignerApiError,
  SignerService,
  SignRecord,
} from "../idl/signer.idl.js";
import type { ApproveArgs, ApproveError, LedgerService } from "../idl/icrc2-ledger.idl.js";
import type { Logger } from "../utils/logger.js";
import type { CandidResult } from "../utils/result.js";
import type { DelegatedSession } from "../services/siwb.service.js";
import { buildDelegationChain, deriveBotPrincipal } from "../utils/delegation.js";

export const TEST_PUBKEY = "cc8a4bc64d897bddc5fbc2f670f7a8ba0b386779106cf1223c6fc5d7cd6fc115";
export const TEST_ADDRESS = "bc1p5cyxnuxmeuwuvkwfem96lqzszd02n6xdcjrs20cac6yqjjwudpxqkedrcr";
export const TEST_SIGNATURE = "ab".repeat(64);
export const TEST_TOKEN = "test-token";

export const SIGNER_PRINCIPAL = Principal.fromText("g7qkb-iiaaa-aaaar-qb3za-cai");
export const CKBTC_LEDGER_PRINCIPAL = Principal.fromText("mxzaz-hqaaa-aaaar-qaada-cai");

/** Stand-in DER key of the identity canister's signature scheme */
export const USER_CANISTER_PUBKEY = new Uint8Array(40).fill(0x11);

/** 2023-11-14T22:13:20Z + 48h, in nanoseconds */
export const DELEGATION_EXPIRATION = 1_700_172_800_000_000_000n;

export const NOW_MS = 1_700_000_000_000;

export interface RecordedRequest {
  method: string;
  url: string;
  authorization: string | undefined;
  body: unknown;
}

export interface FakeResponse {
  status: number;
  data: unknown;
}

/**
 * Axios adapter answering from `handler`; every request is appended to `requests`.
 */
export function restAdapter(
  handler: (request: RecordedRequest) => FakeResponse,
  requests: RecordedRequest[] = []
): AxiosAdapter {
  return async (config: InternalAxiosRequestConfig) => {
    const authorization = config.headers.get("Authorization");
    const request: RecordedRequest = {
      method: (config.method ?? "get").toUpperCase(),
      url: config.url ?? "",
      authorization: typeof authorization === "string" ? authorization : undefined,
      body: typeof config.data === "string" ? JSON.parse(config.data) : undefined,
    };
    requests.push(request);
    const { status, data } = handler(request);
    return { data, status, statusText: String(status), headers: {}, config };
  };
}

/**
 * POST /auth issues TEST_TOKEN; GET /auth answers `verifyStatus`.
 */
export function tradingPlatform(verifyStatus = 200): (request: RecordedRequest) => FakeResponse {
  return (request) => {
    if (request.method === "POST" && request.url === "/auth") {
      return { status: 200, data: { token: TEST_TOKEN } };
    }
    if (request.method === "GET" && request.url === "/auth") {
      return { status: verifyStatus, data: { ok: verifyStatus === 200 } };
    }
    return { status: 404, data: "not found" };
  };
}

export function createSessionKey(fill = 7): Ed25519KeyIdentity {
  return Ed25519KeyIdentity.generate(new Uint8Array(32).fill(fill));
}

export function signedDelegationFor(sessionKey: Ed25519KeyIdentity): SignedDelegation {
  return {
    delegation: {
      pubkey: new Uint8Array(sessionKey.getPublicKey().toDer()),
      expiration: DELEGATION_EXPIRATION,
      targets: [],
    },
    signature: new Uint8Array(64).fill(0x33),
  };
}

export function makeDelegatedSession(
  botName = "bot-1",
  network: Network = "prd"
): DelegatedSession {
  const sessionKey = createSessionKey();
  const delegationChain = buildDelegationChain(
    signedDelegationFor(sessionKey),
    USER_CANISTER_PUBKEY
  );
  return {
    kind: "delegated",
    botName,
    network,
    bearerToken: TEST_TOKEN,
    botPrincipalText: deriveBotPrincipal(USER_CANISTER_PUBKEY).toText(),
    address: TEST_ADDRESS,
    savedAtEpochSeconds: NOW_MS / 1000,
    identity: DelegationIdentity.fromDelegation(sessionKey, delegationChain),
    sessionKey,
    delegationChain,
  };
}

// ---------------------------------------------------------------------------
// Canister fakes
// ---------------------------------------------------------------------------

export function feeToken(tokenName: string, fee: bigint): FeeToken {
  return { tokenName, tokenLedger: CKBTC_LEDGER_PRINCIPAL, fee };
}

export function feeSchedule(feeTokens: FeeToken[]): CandidResult<FeeTokensRecord, SignerApiError> {
  return {
    Ok: {
      canisterId: SIGNER_PRINCIPAL,
      treasury: { treasuryName: "treasury", treasuryPrincipal: SIGNER_PRINCIPAL },
      feeTokens,
      usage: "fees per call",
    },
  };
}

/**
 * Signer that knows one bot key and signs with TEST_SIGNATURE. Each method is a vi.fn.
 */
export function createFakeSigner(feeTokens: FeeToken[] = []) {
  const publicKey: PublicKeyRecord = {
    botName: "bot-1",
    publicKeyHex: TEST_PUBKEY,
    address: TEST_ADDRESS,
  };
  return {
    getPublicKeyQuery: vi.fn(
      async (_arg: { botName: string }): Promise<CandidResult<PublicKeyRecord, SignerApiError>> => ({
        Ok: publicKey,
      })
    ),
    getPublicKey: vi.fn(
      async (_arg: {
        botName: string;
        payment: OptPayment;
      }): Promise<CandidResult<PublicKeyRecord, SignerApiError>> => ({ Ok: publicKey })
    ),
    sign: vi.fn(
      async (arg: {
        botName: string;
        message: Uint8Array;
        payment: OptPayment;
      }): Promise<CandidResult<SignRecord, SignerApiError>> => ({
        Ok: { botName: arg.botName, signatureHex: TEST_SIGNATURE },
      })
    ),
    getFeeTokens: vi.fn(
      async (): Promise<CandidResult<FeeTokensRecord, SignerApiError>> => feeSchedule(feeTokens)
    ),
  } satisfies SignerService;
}

export function createFakeLedger() {
  return {
    icrc2_approve: vi.fn(
      async (_args: ApproveArgs): Promise<CandidResult<bigint, ApproveError>> => ({ Ok: 42n })
    ),
  } satisfies LedgerService;
}

export const TEST_CHALLENGE = [
  "trading.test wants you to sign in with your Bitcoin account:",
  TEST_ADDRESS,
  "",
  "Nonce: 7c1e9a20",
].join("\n");

/**
 * Identity canister that issues TEST_CHALLENGE and delegates to whatever session key logs in.
 */
export function createFakeSiwb() {
  return {
    siwb_prepare_login: vi.fn(
      async (_address: string): Promise<CandidResult<string, string>> => ({ Ok: TEST_CHALLENGE })
    ),
    siwb_login: vi.fn(
      async (
        _signature: string,
        _address: string,
        _publicKey: string,
        _sessionKey: Uint8Array,
        _signMessageType: SignMessageType
      ): Promise<CandidResult<LoginDetails, string>> => ({
        Ok: { expiration: DELEGATION_EXPIRATION, user_canister_pubkey: USER_CANISTER_PUBKEY },
      })
    ),
    siwb_get_delegation: vi.fn(
      async (
        _address: string,
        sessionKey: Uint8Array,
        expiration: bigint
      ): Promise<CandidResult<SignedDelegation, string>> => ({
        Ok: {
          delegation: { pubkey: sessionKey, expiration, targets: [] },
          signature: new Uint8Array(64).fill(0x33),
        },
      })
    ),
  } satisfies SiwbService;
}

export function createFakeLogger() {
  return {
    info: vi.fn((_message: string) => {}),
    debug: vi.fn((_message: string) => {}),
    warn: vi.fn((_message: string) => {}),
  } satisfies Logger;
}
