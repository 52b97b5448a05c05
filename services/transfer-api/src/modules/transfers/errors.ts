import { ApiError, ERRORS, type LimitScope, type Transfer } from '@mobiremit/domain';

export class CorridorNotSupportedError extends ApiError {
  constructor(sourceCountry: string, destinationCountry: string) {
    super(ERRORS.CORRIDOR_NOT_SUPPORTED, { sourceCountry, destinationCountry }, `No active corridor from ${sourceCountry} to ${destinationCountry}.`);
    this.name = 'CorridorNotSupportedError';
  }
}

export class AmountOutOfRangeError extends ApiError {
  constructor(message: string, bounds: { minAmount: number; maxAmount: number }) {
    super(ERRORS.AMOUNT_OUT_OF_RANGE, bounds, message);
    this.name = 'AmountOutOfRangeError';
  }
}

export class LimitExceededError extends ApiError {
  constructor(message: string, details: { scope: LimitScope; limit: number; remaining: number }) {
    super(ERRORS.LIMIT_EXCEEDED, details, message);
    this.name = 'LimitExceededError';
  }
}

export class KycProfileRequiredError extends ApiError {
  constructor() {
    super(ERRORS.KYC_PROFILE_REQUIRED);
    this.name = 'KycProfileRequiredError';
  }
}

export class TransferNotFoundError extends ApiError {
  constructor(identifier: string) {
    super(ERRORS.TRANSFER_NOT_FOUND, undefined, `Transfer ${identifier} was not found.`);
    this.name = 'TransferNotFoundError';
  }
}

/** The provider definitively refused the deposit. The transfer has been persisted as FAILED. */
export class DepositInitiationError extends ApiError {
  constructor(transfer: Transfer, providerMessage: string) {
    super(
      ERRORS.DEPOSIT_INIT_ERROR,
      { transferId: transfer.transferId, reference: transfer.reference, status: transfer.status },
      `Deposit could not be initiated: ${providerMessage}`
    );
    this.name = 'DepositInitiationError';
  }
}
