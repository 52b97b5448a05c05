import type { SupportedCurrency } from './constants.js';

export interface GatewayInfo {
  /** Gateway identifier expected by the payment processor. */
  gatewayName: string;
  /** ISO 3166-1 alpha-2 country code. */
  country: string;
  currency: SupportedCurrency;
}

const GATEWAYS = {
  mtn_cm: { gatewayName: 'mtn', country: 'CM', currency: 'XAF' },
  orange_cm: { gatewayName: 'orange-cm', country: 'CM', currency: 'XAF' },
  mtn_ci: { gatewayName: 'mtn-ci', country: 'CI', currency: 'XOF' },
  orange_ci: { gatewayName: 'orange-ci', country: 'CI', currency: 'XOF' },
  moov_ci: { gatewayName: 'moov-ci', country: 'CI', currency: 'XOF' },
  wave_ci: { gatewayName: 'wave-ci', country: 'CI', currency: 'XOF' },
  orange_sn: { gatewayName: 'orange-sn', country: 'SN', currency: 'XOF' },
  free_sn: { gatewayName: 'free-sn', country: 'SN', currency: 'XOF' },
  wave_sn: { gatewayName: 'wave-sn', country: 'SN', currency: 'XOF' },
  orange_ml: { gatewayName: 'orange-ml', country: 'ML', currency: 'XOF' },
  moov_ml: { gatewayName: 'moov-ml', country: 'ML', currency: 'XOF' },
  orange_bf: { gatewayName: 'orange-bf', country: 'BF', currency: 'XOF' },
  moov_bf: { gatewayName: 'moov-bf', country: 'BF', currency: 'XOF' },
  togocom_tg: { gatewayName: 'togocom-tg', country: 'TG', currency: 'XOF' },
  moov_tg: { gatewayName: 'moov-tg', country: 'TG', currency: 'XOF' },
  mtn_bj: { gatewayName: 'mtn-bj', country: 'BJ', currency: 'XOF' },
  moov_bj: { gatewayName: 'moov-bj', country: 'BJ', currency: 'XOF' }
} as const satisfies Record<string, GatewayInfo>;

export type MobileMoneyProviderCode = keyof typeof GATEWAYS;

export const MOBILE_MONEY_PROVIDER_CODES = Object.keys(GATEWAYS).filter(isMobileMoneyProviderCode);

export function isMobileMoneyProviderCode(code: string): code is MobileMoneyProviderCode {
  return Object.prototype.hasOwnProperty.call(GATEWAYS, code);
}

export class UnsupportedProviderError extends Error {
  readonly code = 'UNSUPPORTED_PROVIDER';

  constructor(readonly providerCode: string) {
    super(`Unsupported mobile money provider: ${providerCode}.`);
    this.name = 'UnsupportedProviderError';
  }
}

export function resolveGateway(code: string): GatewayInfo | null {
  if (!isMobileMoneyProviderCode(code)) {
    return null;
  }
  return { ...GATEWAYS[code] };
}

export function requireGateway(code: string): GatewayInfo {
  const gateway = resolveGateway(code);
  if (!gateway) {
    throw new UnsupportedProviderError(code);
  }
  return gateway;
}

export function listGatewayCodes(): MobileMoneyProviderCode[] {
  return [...MOBILE_MONEY_PROVIDER_CODES];
}
