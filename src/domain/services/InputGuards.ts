import type Decimal from 'decimal.js';
import { FinancialInputError } from '../errors/FinancialInputError.js';

export const requireNonNegative = (field: string, value: Decimal): Decimal => {
  if (!value.isFinite() || value.isNegative()) {
    throw new FinancialInputError(field, `must be a non-negative amount, received ${value.toString()}`);
  }

  return value;
};

export const requirePercentage = (field: string, value: Decimal): Decimal => {
  if (!value.isFinite() || value.lt(0) || value.gt(100)) {
    throw new FinancialInputError(field, `must be between 0 and 100, received ${value.toString()}`);
  }

  return value;
};

export const requireInstallmentCount = (field: string, value: number): number => {
  if (!Number.isInteger(value) || value < 1) {
    throw new FinancialInputError(field, `must be a positive integer, received ${value}`);
  }

  return value;
};
