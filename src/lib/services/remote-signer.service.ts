import { hex } from "@scure/base";
import { describeApiError, type SignerService } from "../idl/signer.idl.js";
import {
  InvalidMessageHashError,
  PublicKeyUnavailableError,
  RemoteCallError,
} from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { fromVariant, isErr, isOk, tryCatch } from "../utils/result.js";
import type { FeePaymentGate } from "./fee-payment.service.js";

export interface BotPublicKey {
  /** 32-byte x-only key, hex */
  pubkeyHex: string;
  /** P2TR address as reported by the signer */
  address: string;
}

const MESSAGE_HASH_BYTES = 32;

/**
 * Client for the threshold Schnorr signer canister. Every priced call goes
 * through the fee gate first.
 */
export class RemoteSigner {
  constructor(
    private readonly signer: SignerService,
    private readonly gate: FeePaymentGate,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Free query first; on any error fall back to the priced update call.
   */
  async getPublicKey(botName: string): Promise<BotPublicKey> {
    const query = await tryCatch(() => this.signer.getPublicKeyQuery({ botName }));
    if (isOk(query)) {
      const cached = fromVariant(query.value);
      if (isOk(cached)) {
        return { pubkeyHex: cached.value.publicKeyHex, address: cached.value.address };
      }
      this.logger.info(`Public key not cached (${describeApiError(cached.error)}), calling getPublicKey`);
    } else {
      this.logger.info(`getPublicKeyQuery failed (${query.error.message}), calling getPublicKey`);
    }

    const payment = await this.gate.preparePayment();
    const reply = await tryCatch(() => this.signer.getPublicKey({ botName, payment }));
    if (isErr(reply)) {
      throw new PublicKeyUnavailableError(botName, reply.error.message);
    }
    const priced = fromVariant(reply.value);
    if (isErr(priced)) {
      throw new PublicKeyUnavailableError(botName, describeApiError(priced.error));
    }
    return { pubkeyHex: priced.value.publicKeyHex, address: priced.value.address };
  }

  /**
   * BIP-340 signature over a 32-byte message hash, hex.
   */
  async sign(botName: string, messageHash: Uint8Array): Promise<string> {
    if (messageHash.length !== MESSAGE_HASH_BYTES) {
      throw new InvalidMessageHashError(messageHash.length);
    }

    const payment = await this.gate.preparePayment();
    this.logger.info(`Signing ${hex.encode(messageHash)} via threshold Schnorr`);

    const reply = await tryCatch(() =>
      this.signer.sign({ botName, message: messageHash, payment })
    );
    if (isErr(reply)) {
      throw new RemoteCallError("sign", reply.error.message, { botName });
    }
    const signed = fromVariant(reply.value);
    if (isErr(signed)) {
      throw new RemoteCallError("sign", describeApiError(signed.error), { botName });
    }
    return signed.value.signatureHex;
  }
}
