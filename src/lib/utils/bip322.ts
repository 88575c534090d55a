/**
 * BIP-322 "simple" message signing for P2TR key-path spends.
 *
 * The challenge message is committed to through two virtual transactions:
 *
 *   toSpend: version 0, one input (null outpoint, scriptSig = OP_0 PUSH32 <taggedHash(message)>,
 *            sequence 0), one output (0 sats to the signer's P2TR scriptPubKey), locktime 0
 *   toSign:  version 0, one input spending toSpend:0 (sequence 0), one OP_RETURN output, locktime 0
 *
 * The remote signer produces a BIP-340 signature over the BIP-341 key-path sighash of toSign
 * input 0 (SIGHASH_DEFAULT, amount 0); the proof sent to the identity canister is the witness
 * stack holding that signature.
 */

import * as btc from "@scure/btc-signer";
import { sha256 } from "@noble/hashes/sha2.js";
import { base64, hex } from "@scure/base";
import {
  InvalidPublicKeyError,
  InvalidSignatureLengthError,
} from "./errors.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const BIP322_TAG = "BIP0322-signed-message";

/**
 * BIP-341 SIGHASH_DEFAULT: commits to all inputs and outputs, omitted from the signature
 */
export const SIGHASH_DEFAULT = btc.SigHash.DEFAULT;

const SCHNORR_SIGNATURE_BYTES = 64;
const X_ONLY_PUBKEY_BYTES = 32;

const OP_0 = 0x00;
const OP_PUSHBYTES_32 = 0x20;
const OP_RETURN = 0x6a;

// ---------------------------------------------------------------------------
// Byte helpers
// ---------------------------------------------------------------------------

const utf8 = new TextEncoder();

function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const length = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

function uint32LE(n: number): Uint8Array {
  const buf = new Uint8Array(4);
  new DataView(buf.buffer).setUint32(0, n, true);
  return buf;
}

function uint64LE(n: bigint): Uint8Array {
  const buf = new Uint8Array(8);
  new DataView(buf.buffer).setBigUint64(0, n, true);
  return buf;
}

/**
 * Encode a variable-length integer (Bitcoin compact-size format).
 */
export function encodeVarInt(n: number): Uint8Array {
  if (n < 0xfd) {
    return new Uint8Array([n]);
  } else if (n <= 0xffff) {
    const buf = new Uint8Array(3);
    buf[0] = 0xfd;
    buf[1] = n & 0xff;
    buf[2] = (n >> 8) & 0xff;
    return buf;
  } else if (n <= 0xffffffff) {
    const buf = new Uint8Array(5);
    buf[0] = 0xfe;
    new DataView(buf.buffer).setUint32(1, n, true);
    return buf;
  } else {
    throw new RangeError("Value too large for varint encoding");
  }
}

/**
 * Varint length prefix followed by the bytes.
 */
export function encodeVarBytes(bytes: Uint8Array): Uint8Array {
  return concatBytes(encodeVarInt(bytes.length), bytes);
}

function doubleSha256(data: Uint8Array): Uint8Array {
  return sha256(sha256(data));
}

/**
 * BIP-340 tagged hash: SHA256(SHA256(tag) || SHA256(tag) || data)
 */
function bip340TaggedHash(tag: string, ...data: Uint8Array[]): Uint8Array {
  const tagHash = sha256(utf8.encode(tag));
  return sha256(concatBytes(tagHash, tagHash, ...data));
}

// ---------------------------------------------------------------------------
// Public key handling
// ---------------------------------------------------------------------------

function parseXOnlyPubkey(pubkeyHex: string): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = hex.decode(pubkeyHex);
  } catch {
    throw new InvalidPublicKeyError(pubkeyHex, "not valid hex");
  }
  if (bytes.length !== X_ONLY_PUBKEY_BYTES) {
    throw new InvalidPublicKeyError(
      pubkeyHex,
      `expected ${X_ONLY_PUBKEY_BYTES} bytes, got ${bytes.length}`
    );
  }
  return bytes;
}

/**
 * BIP-86 key-path P2TR output (no script tree) for an x-only internal key
 */
function p2trOutput(pubkeyHex: string): { script: Uint8Array; address: string } {
  const internalKey = parseXOnlyPubkey(pubkeyHex);

  let script: Uint8Array;
  let address: string | undefined;
  try {
    ({ script, address } = btc.p2tr(internalKey, undefined, btc.NETWORK));
  } catch {
    throw new InvalidPublicKeyError(pubkeyHex, "not a valid secp256k1 x-coordinate");
  }

  if (!address) {
    throw new InvalidPublicKeyError(pubkeyHex, "failed to generate Taproot address");
  }

  return { script, address };
}

/**
 * Derive the mainnet P2TR address (bc1p...) for a 32-byte x-only public key.
 *
 * @throws InvalidPublicKeyError when the key is not 64 hex characters or not on the curve
 */
export function deriveAddress(pubkeyHex: string): string {
  return p2trOutput(pubkeyHex).address;
}

// ---------------------------------------------------------------------------
// Message hash and virtual transactions
// ---------------------------------------------------------------------------

/**
 * BIP-322 tagged hash of a message (tag "BIP0322-signed-message").
 */
export function taggedHash(message: string): Uint8Array {
  return bip340TaggedHash(BIP322_TAG, utf8.encode(message));
}

export function taggedHashHex(message: string): string {
  return hex.encode(taggedHash(message));
}

/**
 * Serialize the toSpend virtual transaction (legacy, non-witness format).
 */
export function buildToSpend(message: string, scriptPubKey: Uint8Array): Uint8Array {
  const scriptSig = concatBytes(
    new Uint8Array([OP_0, OP_PUSHBYTES_32]),
    taggedHash(message)
  );

  return concatBytes(
    uint32LE(0), // version
    encodeVarInt(1),
    new Uint8Array(32), // null txid
    uint32LE(0xffffffff), // vout
    encodeVarBytes(scriptSig),
    uint32LE(0), // sequence
    encodeVarInt(1),
    uint64LE(0n), // amount
    encodeVarBytes(scriptPubKey),
    uint32LE(0) // locktime
  );
}

/**
 * toSpend txid in display order (byte-reversed double SHA-256), hex.
 */
export function toSpendTxid(message: string, scriptPubKey: Uint8Array): string {
  return hex.encode(doubleSha256(buildToSpend(message, scriptPubKey)).reverse());
}

/**
 * toSign: version 0, spends toSpend:0 with sequence 0, one 0-sat OP_RETURN output, locktime 0.
 */
export function buildToSign(message: string, scriptPubKey: Uint8Array): btc.Transaction {
  const tx = new btc.Transaction({ version: 0, allowUnknownOutputs: true });

  tx.addInput({
    txid: toSpendTxid(message, scriptPubKey),
    index: 0,
    sequence: 0,
    witnessUtxo: { script: scriptPubKey, amount: 0n },
  });
  tx.addOutput({ script: new Uint8Array([OP_RETURN]), amount: 0n });

  return tx;
}

export interface SighashResult {
  /** 32-byte BIP-341 sighash, hex */
  sighash: string;
  /** P2TR address derived from the public key */
  address: string;
}

/**
 * Compute the BIP-341 key-path sighash that proves control of `pubkeyHex` for `message`.
 *
 * Callers must compare the returned address with any independently reported address.
 */
export function computeSighash(message: string, pubkeyHex: string): SighashResult {
  const { script, address } = p2trOutput(pubkeyHex);
  const sighash = buildToSign(message, script).preimageWitnessV1(
    0,
    [script],
    SIGHASH_DEFAULT,
    [0n]
  );

  return { sighash: hex.encode(sighash), address };
}

// ---------------------------------------------------------------------------
// Witness
// ---------------------------------------------------------------------------

/**
 * Encode a 64-byte Schnorr signature as the BIP-322 witness:
 * varint(1) || varint(64) || signature, base64.
 *
 * With SIGHASH_DEFAULT the key-path witness is the bare signature, no sighash byte.
 */
export function encodeWitness(signatureHex: string): string {
  let signature: Uint8Array;
  try {
    signature = hex.decode(signatureHex);
  } catch {
    throw new InvalidSignatureLengthError(Math.floor(signatureHex.length / 2));
  }
  if (signature.length !== SCHNORR_SIGNATURE_BYTES) {
    throw new InvalidSignatureLengthError(signature.length);
  }

  return base64.encode(concatBytes(encodeVarInt(1), encodeVarBytes(signature)));
}

function readVarInt(bytes: Uint8Array, offset: number): { value: number; size: number } {
  const first = bytes[offset];
  if (first === undefined) {
    throw new RangeError("Truncated witness: missing varint");
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (first < 0xfd) return { value: first, size: 1 };
  if (first === 0xfd) return { value: view.getUint16(offset + 1, true), size: 3 };
  if (first === 0xfe) return { value: view.getUint32(offset + 1, true), size: 5 };
  throw new RangeError("Witness varint too large");
}

/**
 * Decode a base64 witness into its stack items.
 */
export function decodeWitness(witnessBase64: string): Uint8Array[] {
  const bytes = base64.decode(witnessBase64);
  const count = readVarInt(bytes, 0);
  let offset = count.size;

  const items: Uint8Array[] = [];
  for (let i = 0; i < count.value; i++) {
    const length = readVarInt(bytes, offset);
    offset += length.size;
    if (offset + length.value > bytes.length) {
      throw new RangeError("Truncated witness: item longer than remaining bytes");
    }
    items.push(bytes.slice(offset, offset + length.value));
    offset += length.value;
  }

  if (offset !== bytes.length) {
    throw new RangeError("Trailing bytes after witness stack");
  }
  return items;
}
