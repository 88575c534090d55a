/**
 * Candid interface of the Sign-In-With-Bitcoin identity-linking canister.
 */

import { IDL } from "@dfinity/candid";
import type { Principal } from "@dfinity/principal";
import type { CandidResult } from "../utils/result.js";

/** candid `blob` as decoded by the agent */
export type Blob = Uint8Array | number[];

export type SignMessageType = { ECDSA: null } | { Bip322Simple: null };

export interface LoginDetails {
  /** Delegation expiry, nanoseconds since the epoch */
  expiration: bigint;
  /** DER public key of the user canister signature scheme */
  user_canister_pubkey: Blob;
}

export interface SignedDelegation {
  delegation: {
    pubkey: Blob;
    expiration: bigint;
    targets: [] | [Principal[]];
  };
  signature: Blob;
}

export interface SiwbService {
  siwb_prepare_login(address: string): Promise<CandidResult<string, string>>;
  siwb_login(
    signature: string,
    address: string,
    publicKey: string,
    sessionKey: Uint8Array,
    signMessageType: SignMessageType
  ): Promise<CandidResult<LoginDetails, string>>;
  siwb_get_delegation(
    address: string,
    sessionKey: Uint8Array,
    expiration: bigint
  ): Promise<CandidResult<SignedDelegation, string>>;
}

export const siwbIdlFactory: IDL.InterfaceFactory = () => {
  const SignedDelegation = IDL.Record({
    delegation: IDL.Record({
      pubkey: IDL.Vec(IDL.Nat8),
      expiration: IDL.Nat64,
      targets: IDL.Opt(IDL.Vec(IDL.Principal)),
    }),
    signature: IDL.Vec(IDL.Nat8),
  });

  return IDL.Service({
    siwb_prepare_login: IDL.Func(
      [IDL.Text],
      [IDL.Variant({ Ok: IDL.Text, Err: IDL.Text })],
      []
    ),
    siwb_login: IDL.Func(
      [
        IDL.Text,
        IDL.Text,
        IDL.Text,
        IDL.Vec(IDL.Nat8),
        IDL.Variant({ ECDSA: IDL.Null, Bip322Simple: IDL.Null }),
      ],
      [
        IDL.Variant({
          Ok: IDL.Record({
            expiration: IDL.Nat64,
            user_canister_pubkey: IDL.Vec(IDL.Nat8),
          }),
          Err: IDL.Text,
        }),
      ],
      []
    ),
    siwb_get_delegation: IDL.Func(
      [IDL.Text, IDL.Vec(IDL.Nat8), IDL.Nat64],
      [IDL.Variant({ Ok: SignedDelegation, Err: IDL.Text })],
      ["query"]
    ),
  });
};
