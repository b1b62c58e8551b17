/**
 * Currency Constants
 *
 * ISO 4217 currency definitions with symbols, decimal places, and display names.
 * Used for labelling reports and formatting amounts in the text renderer.
 * Amounts are never converted between currencies.
 */

export interface CurrencyDefinition {
  /** ISO 4217 3-letter code */
  code: string;
  /** Currency symbol (e.g., ₽, $, €) */
  symbol: string;
  /** Full name (e.g., "Russian Ruble") */
  name: string;
  /** Number of decimal places (e.g., 2 for RUB, 0 for JPY) */
  decimals: number;
}

export const DEFAULT_CURRENCY = 'RUB';

export const SUPPORTED_CURRENCIES: Record<string, CurrencyDefinition> = {
  RUB: { code: 'RUB', symbol: '₽', name: 'Russian Ruble', decimals: 2 },
  USD: { code: 'USD', symbol: '$', name: 'US Dollar', decimals: 2 },
  EUR: { code: 'EUR', symbol: '€', name: 'Euro', decimals: 2 },
  GBP: { code: 'GBP', symbol: '£', name: 'British Pound', decimals: 2 },
  KZT: { code: 'KZT', symbol: '₸', name: 'Kazakhstani Tenge', decimals: 2 },
  JPY: { code: 'JPY', symbol: '¥', name: 'Japanese Yen', decimals: 0 },
} as const;

/** Get currency symbol for a code, defaulting to the code itself */
export function getCurrencySymbol(code: string): string {
  return SUPPORTED_CURRENCIES[code]?.symbol ?? code;
}

/** Get number of decimal places for a currency (defaults to 2) */
export function getCurrencyDecimals(code: string): number {
  return SUPPORTED_CURRENCIES[code]?.decimals ?? 2;
}

/** Format a numeric amount according to the currency's decimal convention */
export function formatCurrencyAmount(amount: number, currencyCode: string): string {
  const decimals = getCurrencyDecimals(currencyCode);
  const symbol = getCurrencySymbol(currencyCode);
  const sign = amount < 0 ? '-' : '';
  return `${sign}${symbol}${Math.abs(amount).toFixed(decimals)}`;
}

/** Check if a currency code is in the supported list */
export function isKnownCurrency(code: string): boolean {
  return code in SUPPORTED_CURRENCIES;
}
