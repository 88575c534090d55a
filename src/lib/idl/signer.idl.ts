/**
 * Candid interface of the threshold Schnorr signer canister.
 *
 *   getPublicKeyQuery : (record { botName : text }) -> (variant { Ok : PublicKeyRecord; Err : ApiError }) query;
 *   getPublicKey      : (record { botName : text; payment : opt Payment }) -> (variant { Ok : PublicKeyRecord; Err : ApiError });
 *   sign              : (record { botName : text; message : blob; payment : opt Payment }) -> (variant { Ok : SignRecord; Err : ApiError });
 *   getFeeTokens      : () -> (variant { Ok : FeeTokensRecord; Err : ApiError }) query;
 */

import { IDL } from "@dfinity/candid";
import type { Principal } from "@dfinity/principal";
import type { CandidResult } from "../utils/result.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SignerApiError =
  | { Unauthorized: null }
  | { InvalidId: null }
  | { ZeroAddress: null }
  | { FailedOperation: null }
  | { Other: string }
  | { StatusCode: number }
  | { InsuffientCycles: bigint };

export interface PublicKeyRecord {
  botName: string;
  publicKeyHex: string;
  address: string;
}

export interface SignRecord {
  botName: string;
  signatureHex: string;
}

export interface Payment {
  tokenName: string;
  tokenLedger: Principal;
  amount: bigint;
}

export interface FeeToken {
  tokenName: string;
  tokenLedger: Principal;
  fee: bigint;
}

export interface FeeTokensRecord {
  canisterId: Principal;
  treasury: { treasuryName: string; treasuryPrincipal: Principal };
  feeTokens: FeeToken[];
  usage: string;
}

/** candid `opt Payment` */
export type OptPayment = [] | [Payment];

export interface SignerService {
  getPublicKeyQuery(arg: { botName: string }): Promise<CandidResult<PublicKeyRecord, SignerApiError>>;
  getPublicKey(arg: { botName: string; payment: OptPayment }): Promise<CandidResult<PublicKeyRecord, SignerApiError>>;
  sign(arg: {
    botName: string;
    message: Uint8Array;
    payment: OptPayment;
  }): Promise<CandidResult<SignRecord, SignerApiError>>;
  getFeeTokens(): Promise<CandidResult<FeeTokensRecord, SignerApiError>>;
}

/**
 * Render a signer ApiError variant for logs and error messages.
 */
export function describeApiError(error: SignerApiError): string {
  if ("Other" in error) return `Other: ${error.Other}`;
  if ("StatusCode" in error) return `StatusCode: ${error.StatusCode}`;
  if ("InsuffientCycles" in error) return `InsufficientCycles: ${error.InsuffientCycles}`;
  if ("Unauthorized" in error) return "Unauthorized";
  if ("InvalidId" in error) return "InvalidId";
  if ("ZeroAddress" in error) return "ZeroAddress";
  return "FailedOperation";
}

// ---------------------------------------------------------------------------
// IDL
// ---------------------------------------------------------------------------

export const signerIdlFactory: IDL.InterfaceFactory = () => {
  const ApiError = IDL.Variant({
    Unauthorized: IDL.Null,
    InvalidId: IDL.Null,
    ZeroAddress: IDL.Null,
    FailedOperation: IDL.Null,
    Other: IDL.Text,
    StatusCode: IDL.Nat16,
    InsuffientCycles: IDL.Nat,
  });
  const PublicKeyRecord = IDL.Record({
    botName: IDL.Text,
    publicKeyHex: IDL.Text,
    address: IDL.Text,
  });
  const SignRecord = IDL.Record({
    botName: IDL.Text,
    signatureHex: IDL.Text,
  });
  const Payment = IDL.Record({
    tokenName: IDL.Text,
    tokenLedger: IDL.Principal,
    amount: IDL.Nat,
  });
  const FeeToken = IDL.Record({
    tokenName: IDL.Text,
    tokenLedger: IDL.Principal,
    fee: IDL.Nat,
  });
  const FeeTokensRecord = IDL.Record({
    canisterId: IDL.Principal,
    treasury: IDL.Record({
      treasuryName: IDL.Text,
      treasuryPrincipal: IDL.Principal,
    }),
    feeTokens: IDL.Vec(FeeToken),
    usage: IDL.Text,
  });
  const PublicKeyResult = IDL.Variant({ Ok: PublicKeyRecord, Err: ApiError });

  return IDL.Service({
    getPublicKeyQuery: IDL.Func(
      [IDL.Record({ botName: IDL.Text })],
      [PublicKeyResult],
      ["query"]
    ),
    getPublicKey: IDL.Func(
      [IDL.Record({ botName: IDL.Text, payment: IDL.Opt(Payment) })],
      [PublicKeyResult],
      []
    ),
    sign: IDL.Func(
      [
        IDL.Record({
          botName: IDL.Text,
          message: IDL.Vec(IDL.Nat8),
          payment: IDL.Opt(Payment),
        }),
      ],
      [IDL.Variant({ Ok: SignRecord, Err: ApiError })],
      []
    ),
    getFeeTokens: IDL.Func(
      [],
      [IDL.Variant({ Ok: FeeTokensRecord, Err: ApiError })],
      ["query"]
    ),
  });
};
