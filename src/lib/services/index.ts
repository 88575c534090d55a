export { createBotServices, loadWalletIdentity, parseEd25519Pem } from "./canisters.js";
export type { BotServices, BotServicesOptions } from "./canisters.js";
export { FeePaymentGate, ACCEPTED_FEE_TOKEN, CKBTC_LEDGER_FEE } from "./fee-payment.service.js";
export type { FeePaymentGateOptions } from "./fee-payment.service.js";
export { RemoteSigner } from "./remote-signer.service.js";
export type { BotPublicKey } from "./remote-signer.service.js";
export { SessionCache } from "./session-cache.js";
export type { SessionCacheOptions, SessionRecord } from "./session-cache.js";
export {
  SiwbAuthenticator,
  getOrCreateSession,
  LOGIN_STEPS,
  DEFAULT_DELEGATION_RETRY,
} from "./siwb.service.js";
export type {
  DelegatedSession,
  TokenOnlySession,
  Session,
  LoginStep,
  DelegationRetryPolicy,
  SiwbAuthenticatorOptions,
  SessionContext,
} from "./siwb.service.js";
export { TradingApi } from "./trading-api.js";
export type { DelegationExchangePayload, TradingApiOptions } from "./trading-api.js";
