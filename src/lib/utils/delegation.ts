/**
 * Delegated-identity helpers for the SIWB login: bot principal derivation,
 * delegation chain assembly and session key (de)serialization.
 */

import { sha224 } from "@noble/hashes/sha2.js";
import { base64, hex } from "@scure/base";
import { Principal } from "@dfinity/principal";
import {
  DelegationChain,
  Ed25519KeyIdentity,
  type JsonnableDelegationChain,
} from "@dfinity/identity";
import type { Blob, SignedDelegation } from "../idl/siwb.idl.js";

/**
 * Self-describing principal class byte used by the identity canister.
 */
const PRINCIPAL_SUFFIX = 0x02;

function toBytes(blob: Blob): Uint8Array {
  return blob instanceof Uint8Array ? blob : Uint8Array.from(blob);
}

/**
 * Copy bytes into a standalone ArrayBuffer (the agent's signing APIs take ArrayBuffer).
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

/**
 * Bot principal for a user canister public key: sha224(pubkey) || 0x02.
 *
 * This is the identity canister's own rule and not the generic
 * self-authenticating derivation; keep it byte-for-byte.
 */
export function deriveBotPrincipal(userCanisterPubkey: Blob): Principal {
  const digest = sha224(toBytes(userCanisterPubkey));
  const bytes = new Uint8Array(digest.length + 1);
  bytes.set(digest);
  bytes[digest.length] = PRINCIPAL_SUFFIX;
  return Principal.fromUint8Array(bytes);
}

/**
 * JSON form of a single-link delegation chain, as the trading platform and
 * @dfinity/identity both expect it (hex blobs, hex expiration).
 */
export function delegationChainJson(
  signed: SignedDelegation,
  userCanisterPubkey: Blob
): JsonnableDelegationChain {
  const [targets] = signed.delegation.targets;
  return {
    publicKey: hex.encode(toBytes(userCanisterPubkey)),
    delegations: [
      {
        delegation: {
          pubkey: hex.encode(toBytes(signed.delegation.pubkey)),
          expiration: signed.delegation.expiration.toString(16),
          ...(targets ? { targets: targets.map((target) => target.toHex()) } : {}),
        },
        signature: hex.encode(toBytes(signed.signature)),
      },
    ],
  };
}

export function buildDelegationChain(
  signed: SignedDelegation,
  userCanisterPubkey: Blob
): DelegationChain {
  return DelegationChain.fromJSON(delegationChainJson(signed, userCanisterPubkey));
}

/**
 * Serialize an ephemeral session key for the session file (base64 of the
 * identity's JSON key pair).
 */
export function serializeSessionKey(identity: Ed25519KeyIdentity): string {
  return base64.encode(new TextEncoder().encode(JSON.stringify(identity.toJSON())));
}

export function restoreSessionKey(material: string): Ed25519KeyIdentity {
  return Ed25519KeyIdentity.fromJSON(new TextDecoder().decode(base64.decode(material)));
}
