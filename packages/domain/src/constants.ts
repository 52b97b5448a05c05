export const SUPPORTED_CURRENCIES = ['XAF', 'XOF', 'USD', 'EUR', 'GBP'] as const;
export type SupportedCurrency = (typeof SUPPORTED_CURRENCIES)[number];

export const DEFAULT_CURRENCY: SupportedCurrency = 'XAF';
export const MIN_TRANSFER_AMOUNT = 100;

export const PROVIDER_NAME = 'awdpay';

export const TRANSFER_REFERENCE_PREFIX = 'TRF-';
export const TRANSFER_REFERENCE_HEX_LENGTH = 12;

export const DEPOSIT_PROMPT_MESSAGE = 'Confirm the payment prompt on your phone to complete the deposit.';
export const DEPOSIT_PROMPT_DELAYED_MESSAGE =
  'The deposit request is being confirmed with the payment provider. Watch your phone for the payment prompt.';
