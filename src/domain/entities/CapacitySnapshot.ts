import type Decimal from 'decimal.js';

export interface CapacitySnapshot {
  readonly monthlyIncome: Decimal;
  readonly fixedExpenses: Decimal;
  readonly safetyMarginPct: Decimal;
  readonly safetyMargin: Decimal;
  readonly freeCashFlow: Decimal;
  readonly currentCommitments: Decimal;
  readonly availableForNew: Decimal;
  readonly safeCapacity: Decimal;
  readonly maxCapacity: Decimal;
}
