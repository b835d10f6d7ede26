import type Decimal from 'decimal.js';
import type { CapacitySnapshot } from '../entities/CapacitySnapshot.js';
import type { FinancialProfile } from '../entities/FinancialProfile.js';
import { DEFAULT_SAFETY_MARGIN_PCT, MODERATE_COMMITMENT_PCT, SAFE_COMMITMENT_PCT } from './FinanceConstants.js';
import { requireNonNegative, requirePercentage } from './InputGuards.js';
import { HUNDRED, ZERO } from './MoneyValue.js';

export interface CapacityInput {
  monthlyIncome: Decimal;
  fixedExpenses: Decimal;
  safetyMarginPct?: Decimal;
  currentCommitments?: Decimal;
}

export const safetyMarginValue = (profile: FinancialProfile): Decimal =>
  profile.monthlyIncome.times(profile.safetyMarginPct).div(HUNDRED);

export const freeCashFlow = (profile: FinancialProfile): Decimal =>
  profile.monthlyIncome.minus(profile.fixedExpenses).minus(safetyMarginValue(profile));

export const availableCash = (profile: FinancialProfile): Decimal => freeCashFlow(profile).minus(profile.totalCommitted);

export const commitmentPercentage = (profile: FinancialProfile): Decimal => {
  const flow = freeCashFlow(profile);
  return flow.gt(0) ? profile.totalCommitted.div(flow).times(HUNDRED) : ZERO;
};

export const isOverCommitted = (profile: FinancialProfile): boolean =>
  profile.totalCommitted.gt(freeCashFlow(profile));

export const validateProfile = (profile: FinancialProfile): FinancialProfile => {
  requireNonNegative('monthlyIncome', profile.monthlyIncome);
  requireNonNegative('fixedExpenses', profile.fixedExpenses);
  requirePercentage('safetyMarginPct', profile.safetyMarginPct);
  requireNonNegative('totalCommitted', profile.totalCommitted);
  return profile;
};

/**
 * Free cash flow and installment headroom for a profile. Negative figures are
 * valid and mean the profile is underfunded or over-committed.
 */
export const computeCapacity = (input: CapacityInput): CapacitySnapshot => {
  const profile = validateProfile({
    monthlyIncome: input.monthlyIncome,
    fixedExpenses: input.fixedExpenses,
    safetyMarginPct: input.safetyMarginPct ?? DEFAULT_SAFETY_MARGIN_PCT,
    totalCommitted: input.currentCommitments ?? ZERO,
  });

  const flow = freeCashFlow(profile);

  return {
    monthlyIncome: profile.monthlyIncome,
    fixedExpenses: profile.fixedExpenses,
    safetyMarginPct: profile.safetyMarginPct,
    safetyMargin: safetyMarginValue(profile),
    freeCashFlow: flow,
    currentCommitments: profile.totalCommitted,
    availableForNew: flow.minus(profile.totalCommitted),
    safeCapacity: flow.times(SAFE_COMMITMENT_PCT).div(HUNDRED),
    maxCapacity: flow.times(MODERATE_COMMITMENT_PCT).div(HUNDRED),
  };
};
