import Decimal from 'decimal.js';

export type CurrencyCode = 'BRL' | 'USD';

export const FinDecimal = Decimal.clone({ precision: 34, rounding: Decimal.ROUND_HALF_UP });

export const toDecimal = (value: Decimal.Value): Decimal => new FinDecimal(value);

export const ZERO = toDecimal(0);
export const HUNDRED = toDecimal(100);

export const roundMoney = (value: Decimal): Decimal => value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);

export const roundPercent = (value: Decimal): Decimal => value.toDecimalPlaces(1, Decimal.ROUND_HALF_UP);

const currencyNoise = /[R$US\s]/g;
const nonNumeric = /[^\d.]/g;
const plainDecimal = /^(\d+\.?\d*|\.\d+)$/;

/**
 * Extracts an amount from a human-typed price.
 *
 * "R$ 1.299,00" -> 1299.00, "US$ 49.99" -> 49.99, "1.299" -> 1.299
 */
export const parseMoney = (input: string): Decimal | null => {
  if (!input) {
    return null;
  }

  let cleaned = input.replace(currencyNoise, '');

  if (cleaned.includes(',') && cleaned.includes('.')) {
    cleaned =
      cleaned.lastIndexOf(',') > cleaned.lastIndexOf('.')
        ? cleaned.replace(/\./g, '').replace(',', '.')
        : cleaned.replace(/,/g, '');
  } else if (cleaned.includes(',')) {
    const parts = cleaned.split(',');
    cleaned = parts.length === 2 && parts[1].length === 2 ? cleaned.replace(',', '.') : cleaned.replace(/,/g, '');
  }

  cleaned = cleaned.replace(nonNumeric, '');

  if (!plainDecimal.test(cleaned)) {
    return null;
  }

  return toDecimal(cleaned);
};

const groupThousands = (digits: string, separator: string): string =>
  digits.replace(/\B(?=(\d{3})+(?!\d))/g, separator);

const splitFixed = (value: Decimal, decimals: number) => {
  const fixed = value.toFixed(decimals, Decimal.ROUND_HALF_UP);
  const negative = fixed.startsWith('-');
  const [integer, fraction = ''] = (negative ? fixed.slice(1) : fixed).split('.');
  return { sign: negative ? '-' : '', integer, fraction };
};

export const formatBrl = (value: Decimal): string => {
  const { sign, integer, fraction } = splitFixed(value, 2);
  return `R$ ${sign}${groupThousands(integer, '.')},${fraction}`;
};

export const formatUsd = (value: Decimal): string => {
  const { sign, integer, fraction } = splitFixed(value, 2);
  return `US$ ${sign}${groupThousands(integer, ',')}.${fraction}`;
};

export const formatPercent = (value: Decimal, decimals = 1): string => {
  const { sign, integer, fraction } = splitFixed(value, decimals);
  return decimals > 0 ? `${sign}${integer},${fraction}%` : `${sign}${integer}%`;
};
