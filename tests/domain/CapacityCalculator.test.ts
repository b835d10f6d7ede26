import { describe, expect, it } from 'vitest';
import { FinancialInputError } from '../../src/domain/errors/FinancialInputError.js';
import {
  availableCash,
  commitmentPercentage,
  computeCapacity,
  freeCashFlow,
  isOverCommitted,
} from '../../src/domain/services/CapacityCalculator.js';
import { toDecimal } from '../../src/domain/services/MoneyValue.js';

describe('computeCapacity', () => {
  it('derives free cash flow and installment headroom', () => {
    const snapshot = computeCapacity({
      monthlyIncome: toDecimal(5000),
      fixedExpenses: toDecimal(2000),
      safetyMarginPct: toDecimal(10),
      currentCommitments: toDecimal(300),
    });

    expect(snapshot.safetyMargin.toFixed(2)).toBe('500.00');
    expect(snapshot.freeCashFlow.toFixed(2)).toBe('2500.00');
    expect(snapshot.availableForNew.toFixed(2)).toBe('2200.00');
    expect(snapshot.safeCapacity.toFixed(2)).toBe('750.00');
    expect(snapshot.maxCapacity.toFixed(2)).toBe('1250.00');
  });

  it('defaults to a 10% margin and no commitments', () => {
    const snapshot = computeCapacity({ monthlyIncome: toDecimal(3000), fixedExpenses: toDecimal(1000) });

    expect(snapshot.safetyMarginPct.toNumber()).toBe(10);
    expect(snapshot.currentCommitments.isZero()).toBe(true);
    expect(snapshot.freeCashFlow.toFixed(2)).toBe('1700.00');
  });

  it('keeps the exact identity for fractional margins', () => {
    const snapshot = computeCapacity({
      monthlyIncome: toDecimal('3333.33'),
      fixedExpenses: toDecimal('1111.11'),
      safetyMarginPct: toDecimal('7.5'),
      currentCommitments: toDecimal('99.99'),
    });

    const expectedFlow = toDecimal('3333.33').minus('1111.11').minus(toDecimal('3333.33').times('7.5').div(100));
    expect(snapshot.freeCashFlow.eq(expectedFlow)).toBe(true);
    expect(snapshot.availableForNew.eq(expectedFlow.minus('99.99'))).toBe(true);
  });

  it('reports negative figures for an underfunded profile instead of failing', () => {
    const snapshot = computeCapacity({
      monthlyIncome: toDecimal(1000),
      fixedExpenses: toDecimal(1500),
      currentCommitments: toDecimal(200),
    });

    expect(snapshot.freeCashFlow.toFixed(2)).toBe('-600.00');
    expect(snapshot.availableForNew.toFixed(2)).toBe('-800.00');
    expect(snapshot.safeCapacity.toFixed(2)).toBe('-180.00');
  });

  it('rejects negative amounts and margins outside 0-100', () => {
    expect(() => computeCapacity({ monthlyIncome: toDecimal(-1), fixedExpenses: toDecimal(0) })).toThrow(
      FinancialInputError,
    );
    expect(() =>
      computeCapacity({ monthlyIncome: toDecimal(1000), fixedExpenses: toDecimal(0), safetyMarginPct: toDecimal(120) }),
    ).toThrow('safetyMarginPct: must be between 0 and 100, received 120');
  });
});

describe('profile metrics', () => {
  const profile = {
    monthlyIncome: toDecimal(4000),
    fixedExpenses: toDecimal(1000),
    safetyMarginPct: toDecimal(10),
    totalCommitted: toDecimal(650),
  };

  it('computes available cash and commitment share', () => {
    expect(freeCashFlow(profile).toFixed(2)).toBe('2600.00');
    expect(availableCash(profile).toFixed(2)).toBe('1950.00');
    expect(commitmentPercentage(profile).toFixed(1)).toBe('25.0');
    expect(isOverCommitted(profile)).toBe(false);
  });

  it('flags over-commitment and avoids dividing by a non-positive flow', () => {
    const strained = { ...profile, fixedExpenses: toDecimal(4000) };

    expect(isOverCommitted(strained)).toBe(true);
    expect(commitmentPercentage(strained).isZero()).toBe(true);
  });
});
