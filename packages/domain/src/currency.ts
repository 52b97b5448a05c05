import { SUPPORTED_CURRENCIES, type SupportedCurrency } from './constants.js';

export interface CurrencyDefinition {
    code: SupportedCurrency;
    name: string;
    /** Decimal places shown to customers (CFA francs have no minor unit in practice). */
    decimals: number;
}

export const CURRENCIES: Record<SupportedCurrency, CurrencyDefinition> = {
    XAF: { code: 'XAF', name: 'Central African CFA franc', decimals: 0 },
    XOF: { code: 'XOF', name: 'West African CFA franc', decimals: 0 },
    USD: { code: 'USD', name: 'US Dollar', decimals: 2 },
    EUR: { code: 'EUR', name: 'Euro', decimals: 2 },
    GBP: { code: 'GBP', name: 'Pound sterling', decimals: 2 }
};

export function isSupportedCurrency(code: string): code is SupportedCurrency {
    return SUPPORTED_CURRENCIES.some((currency) => currency === code);
}

/**
 * Whole amounts use the currency's display decimals; anything with a
 * fractional part is shown to two places, so `1500.5 XAF` stays `1500.50 XAF`.
 */
export function formatAmount(amount: number, currency: string): string {
    const shown = isSupportedCurrency(currency) ? CURRENCIES[currency].decimals : 2;
    const decimals = Number.isInteger(amount) ? shown : 2;
    return `${amount.toFixed(decimals)} ${currency}`;
}
