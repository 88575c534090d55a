import type { Principal } from "@dfinity/principal";
import {
  describeApiError,
  type FeeToken,
  type OptPayment,
  type SignerService,
} from "../idl/signer.idl.js";
import { describeApproveError, type LedgerService } from "../idl/icrc2-ledger.idl.js";
import {
  FeeLedgerMismatchError,
  FeePaymentFailedError,
  FeePaymentUnavailableError,
  RemoteCallError,
  UnsupportedFeeTokenError,
} from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { fromVariant, isErr, tryCatch } from "../utils/result.js";

// ============================================================================
// Constants
// ============================================================================

/** The only fee token kind this client pays with */
export const ACCEPTED_FEE_TOKEN = "ckBTC";

/** ckBTC ledger transfer fee, in satoshis */
export const CKBTC_LEDGER_FEE = 10n;

// ============================================================================
// Types
// ============================================================================

export interface FeePaymentGateOptions {
  signer: SignerService;
  /** Principal the signer collects fees as (the signer canister itself) */
  spender: Principal;
  /** The ckBTC ledger configured for the network; the only ledger an allowance is granted on */
  feeLedger: Principal;
  /**
   * Ledger actor for the wallet identity; absent when no wallet is configured.
   */
  ledgerFor?: (ledgerId: Principal) => LedgerService;
  ledgerTransferFee?: bigint;
  logger?: Logger;
}

// ============================================================================
// Fee Payment Gate
// ============================================================================

/**
 * Pays the signer's fee (if it charges one) ahead of every priced call.
 *
 * With a fee configured the flow is: getFeeTokens, icrc2_approve of
 * fee + ledger fee to the signer, then the priced call carrying
 * `payment = [{ tokenName, tokenLedger, amount: fee }]`.
 */
export class FeePaymentGate {
  private readonly logger: Logger;
  private readonly ledgerTransferFee: bigint;

  constructor(private readonly options: FeePaymentGateOptions) {
    this.logger = options.logger ?? silentLogger;
    this.ledgerTransferFee = options.ledgerTransferFee ?? CKBTC_LEDGER_FEE;
  }

  /**
   * Returns the candid `opt Payment` to attach to the next priced call.
   * An approve is issued only when the signer has a fee token configured.
   */
  async preparePayment(): Promise<OptPayment> {
    const reply = await tryCatch(() => this.options.signer.getFeeTokens());
    if (isErr(reply)) {
      throw new RemoteCallError("getFeeTokens", reply.error.message);
    }
    const schedule = fromVariant(reply.value);
    if (isErr(schedule)) {
      throw new RemoteCallError("getFeeTokens", describeApiError(schedule.error));
    }

    const { feeTokens } = schedule.value;
    if (feeTokens.length === 0) {
      this.logger.info("No fees configured");
      return [];
    }

    const token = feeTokens.find((t) => t.tokenName === ACCEPTED_FEE_TOKEN);
    if (!token) {
      throw new UnsupportedFeeTokenError(feeTokens.map((t) => t.tokenName));
    }
    const { feeLedger } = this.options;
    if (token.tokenLedger.toText() !== feeLedger.toText()) {
      throw new FeeLedgerMismatchError(token.tokenLedger.toText(), feeLedger.toText());
    }
    if (!this.options.ledgerFor) {
      throw new FeePaymentUnavailableError();
    }

    await this.approve(token, this.options.ledgerFor(feeLedger));

    return [{ tokenName: token.tokenName, tokenLedger: token.tokenLedger, amount: token.fee }];
  }

  private async approve(token: FeeToken, ledger: LedgerService): Promise<void> {
    const amount = token.fee + this.ledgerTransferFee;
    this.logger.info(
      `Fee: ${token.fee} sats (${token.tokenName}); approving ${amount} for ${this.options.spender.toText()}`
    );

    const reply = await tryCatch(() =>
      ledger.icrc2_approve({
        spender: { owner: this.options.spender, subaccount: [] },
        amount,
        fee: [],
        memo: [],
        from_subaccount: [],
        created_at_time: [],
        expected_allowance: [],
        expires_at: [],
      })
    );
    if (isErr(reply)) {
      throw new FeePaymentFailedError(reply.error.message);
    }

    const approved = fromVariant(reply.value);
    if (isErr(approved)) {
      throw new FeePaymentFailedError(describeApproveError(approved.error));
    }
    this.logger.info(`Approve OK (block index: ${approved.value})`);
  }
}
