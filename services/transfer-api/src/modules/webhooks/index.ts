export {
  parseCallback,
  parseDepositCallback,
  parseWithdrawalCallback,
  type CallbackPhase,
  type DepositCallback,
  type ParsedCallback,
  type WithdrawalCallback
} from './parsers.js';
export { WebhookReconciler, type WebhookOutcome, type WebhookReconcilerDeps } from './reconciler.js';
export {
  verifyDepositCallback,
  verifyWithdrawalCallback,
  type WebhookVerificationResult,
  type WebhookVerifierConfig
} from './verifier.js';
