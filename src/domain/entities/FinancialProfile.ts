import type Decimal from 'decimal.js';

export interface FinancialProfile {
  readonly monthlyIncome: Decimal;
  readonly fixedExpenses: Decimal;
  readonly safetyMarginPct: Decimal; // percentage, e.g. 10 for 10%
  readonly totalCommitted: Decimal; // sum of monthly installments already taken on
}
