import { toDecimal } from './MoneyValue.js';

export const SAFE_COMMITMENT_PCT = toDecimal(30);
export const MODERATE_COMMITMENT_PCT = toDecimal(50);
export const DEFAULT_SAFETY_MARGIN_PCT = toDecimal(10);

// Minimum cash discount that always wins over paying in installments.
export const CASH_DISCOUNT_THRESHOLD_PCT = toDecimal(10);

// Net benefit (in currency units) an interest-free plan must beat the cash discount by.
export const INSTALLMENT_NET_BENEFIT_THRESHOLD = toDecimal(50);

export const SAVE_FIRST_MAX_MONTHS = 6;

export const LONG_PLAN_MIN_INSTALLMENTS = 18;
export const MEDIUM_PLAN_MIN_INSTALLMENTS = 12;

// Stands in for an unbounded percentage or month count.
export const SENTINEL = 999;

export const DEFAULT_ANNUAL_INFLATION_RATE = toDecimal('0.045');

export const ICMS_RATE = toDecimal('0.17');
export const IMPORT_TAX_PREFERENTIAL_RATE = toDecimal('0.20');
export const IMPORT_TAX_STANDARD_RATE = toDecimal('0.60');
export const PREFERENTIAL_THRESHOLD_USD = toDecimal(50);

export const FALLBACK_USD_BRL_RATE = toDecimal('5.50');

export const COMFORTABLE_BUDGET_SHARE = toDecimal('0.30');
export const DEFAULT_MAX_INSTALLMENTS = 24;
