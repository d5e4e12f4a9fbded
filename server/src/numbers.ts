import { ParseError } from './errors.js';
import type { Currency } from './types.js';

/**
 * First signed decimal in loosely formatted text, after dropping thousands
 * separators: "₩1,234.5원" -> 1234.5, "-3 shares" -> -3.
 */
export function parseNumber(text: string): number {
  const m = text.replace(/,/g, '').match(/[-+]?\d+(?:\.\d+)?/);
  if (!m) throw new ParseError(`number not found: ${text}`);
  return parseFloat(m[0]);
}

export function currencyForSymbol(symbol: string): Currency {
  return symbol.trim().toUpperCase() === 'BTC' ? 'KRW' : 'USD';
}

const MONEY = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function formatMoney(value: number, currency: Currency): string {
  return (currency === 'KRW' ? '₩' : '$') + MONEY.format(value);
}
