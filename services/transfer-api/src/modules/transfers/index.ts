export {
  AmountOutOfRangeError,
  CorridorNotSupportedError,
  DepositInitiationError,
  KycProfileRequiredError,
  LimitExceededError,
  TransferNotFoundError
} from './errors.js';
export { commitTransition, requestsWithdrawal, startWithdrawal, type TransitionContext } from './lifecycle.js';
export { TransferRepository } from './repository.js';
export { TransferService, type LimitsOverview, type TransferServiceDeps } from './service.js';
export type {
  AuditEntry,
  AuditRecord,
  CreateTransferInput,
  CreateTransferOutcome,
  CreateTransferResult,
  TransferDetail,
  TransferHistory,
  TransferListFilter,
  TransferPage,
  TransferStore,
  TransferUnitOfWork
} from './types.js';
