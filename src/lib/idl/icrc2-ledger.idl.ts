/**
 * The ICRC-2 `icrc2_approve` method, the only ledger call the authenticator makes.
 */

import { IDL } from "@dfinity/candid";
import type { Principal } from "@dfinity/principal";
import type { CandidResult } from "../utils/result.js";

export interface Account {
  owner: Principal;
  subaccount: [] | [Uint8Array];
}

export interface ApproveArgs {
  spender: Account;
  amount: bigint;
  fee: [] | [bigint];
  memo: [] | [Uint8Array];
  from_subaccount: [] | [Uint8Array];
  created_at_time: [] | [bigint];
  expected_allowance: [] | [bigint];
  expires_at: [] | [bigint];
}

export type ApproveError =
  | { BadFee: { expected_fee: bigint } }
  | { InsufficientFunds: { balance: bigint } }
  | { AllowanceChanged: { current_allowance: bigint } }
  | { Expired: { ledger_time: bigint } }
  | { TooOld: null }
  | { CreatedInFuture: { ledger_time: bigint } }
  | { Duplicate: { duplicate_of: bigint } }
  | { TemporarilyUnavailable: null }
  | { GenericError: { error_code: bigint; message: string } };

export interface LedgerService {
  icrc2_approve(args: ApproveArgs): Promise<CandidResult<bigint, ApproveError>>;
}

export function describeApproveError(error: ApproveError): string {
  if ("BadFee" in error) return `BadFee (expected ${error.BadFee.expected_fee})`;
  if ("InsufficientFunds" in error) {
    return `InsufficientFunds (balance ${error.InsufficientFunds.balance})`;
  }
  if ("AllowanceChanged" in error) {
    return `AllowanceChanged (current ${error.AllowanceChanged.current_allowance})`;
  }
  if ("Expired" in error) return `Expired (ledger time ${error.Expired.ledger_time})`;
  if ("CreatedInFuture" in error) {
    return `CreatedInFuture (ledger time ${error.CreatedInFuture.ledger_time})`;
  }
  if ("Duplicate" in error) return `Duplicate (of block ${error.Duplicate.duplicate_of})`;
  if ("GenericError" in error) {
    return `GenericError ${error.GenericError.error_code}: ${error.GenericError.message}`;
  }
  if ("TooOld" in error) return "TooOld";
  return "TemporarilyUnavailable";
}

export const icrc2LedgerIdlFactory: IDL.InterfaceFactory = () => {
  const Account = IDL.Record({
    owner: IDL.Principal,
    subaccount: IDL.Opt(IDL.Vec(IDL.Nat8)),
  });
  const ApproveArgs = IDL.Record({
    spender: Account,
    amount: IDL.Nat,
    fee: IDL.Opt(IDL.Nat),
    memo: IDL.Opt(IDL.Vec(IDL.Nat8)),
    from_subaccount: IDL.Opt(IDL.Vec(IDL.Nat8)),
    created_at_time: IDL.Opt(IDL.Nat64),
    expected_allowance: IDL.Opt(IDL.Nat),
    expires_at: IDL.Opt(IDL.Nat64),
  });
  const ApproveError = IDL.Variant({
    BadFee: IDL.Record({ expected_fee: IDL.Nat }),
    InsufficientFunds: IDL.Record({ balance: IDL.Nat }),
    AllowanceChanged: IDL.Record({ current_allowance: IDL.Nat }),
    Expired: IDL.Record({ ledger_time: IDL.Nat64 }),
    TooOld: IDL.Null,
    CreatedInFuture: IDL.Record({ ledger_time: IDL.Nat64 }),
    Duplicate: IDL.Record({ duplicate_of: IDL.Nat }),
    TemporarilyUnavailable: IDL.Null,
    GenericError: IDL.Record({ error_code: IDL.Nat, message: IDL.Text }),
  });

  return IDL.Service({
    icrc2_approve: IDL.Func(
      [ApproveArgs],
      [IDL.Variant({ Ok: IDL.Nat, Err: ApproveError })],
      []
    ),
  });
};
