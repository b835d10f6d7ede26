import Decimal from 'decimal.js';
import type { InstallmentQuote, InstallmentSuggestion } from '../entities/InstallmentComparison.js';
import { COMFORTABLE_BUDGET_SHARE, DEFAULT_MAX_INSTALLMENTS } from './FinanceConstants.js';
import { requireInstallmentCount, requireNonNegative } from './InputGuards.js';
import { HUNDRED, ZERO, formatBrl, roundMoney, toDecimal } from './MoneyValue.js';

/**
 * Installment value under the price table (constant payment). A zero rate splits
 * the price evenly.
 */
export const quoteInstallments = (
  totalPrice: Decimal,
  installmentCount: number,
  monthlyInterestRate: Decimal = ZERO,
): InstallmentQuote => {
  requireNonNegative('totalPrice', totalPrice);
  requireInstallmentCount('installmentCount', installmentCount);
  requireNonNegative('monthlyInterestRate', monthlyInterestRate);

  let installmentValue = totalPrice.div(installmentCount);
  let totalWithInterest = totalPrice;

  if (monthlyInterestRate.gt(0)) {
    const compounded = toDecimal(1).plus(monthlyInterestRate).pow(installmentCount);
    installmentValue = totalPrice.times(monthlyInterestRate.times(compounded)).div(compounded.minus(1));
    totalWithInterest = installmentValue.times(installmentCount);
  }

  return {
    originalPrice: totalPrice,
    installmentCount,
    monthlyInterestRatePct: monthlyInterestRate.times(HUNDRED),
    installmentValue: roundMoney(installmentValue),
    totalWithInterest: roundMoney(totalWithInterest),
    interestPaid: roundMoney(totalWithInterest.minus(totalPrice)),
    interestFree: monthlyInterestRate.isZero(),
  };
};

const roundedCount = (value: Decimal): number => Math.max(1, value.toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber());

export const suggestInstallmentCount = (
  itemPrice: Decimal,
  availableBudget: Decimal,
  maxInstallments = DEFAULT_MAX_INSTALLMENTS,
): InstallmentSuggestion => {
  requireNonNegative('itemPrice', itemPrice);
  requireInstallmentCount('maxInstallments', maxInstallments);

  if (availableBudget.lte(0)) {
    return {
      suggestion: 'Sem orçamento disponível',
      minInstallments: null,
      comfortableInstallments: null,
      itemPrice,
      availableBudget,
    };
  }

  const minInstallments = roundedCount(itemPrice.div(availableBudget));
  const comfortablePayment = availableBudget.times(COMFORTABLE_BUDGET_SHARE);
  const comfortable = roundedCount(itemPrice.div(comfortablePayment));
  const comfortableInstallments = Math.min(comfortable, maxInstallments);

  let suggestion: string;
  if (minInstallments > maxInstallments) {
    suggestion = `Este item está acima do seu orçamento. Precisaria de ${minInstallments}x mas o máximo comum é ${maxInstallments}x.`;
  } else if (comfortable <= 12) {
    suggestion = `Ideal: ${comfortable}x (parcela confortável de ${formatBrl(itemPrice.div(comfortable))})`;
  } else {
    suggestion = `Mínimo: ${minInstallments}x | Confortável: ${comfortableInstallments}x`;
  }

  return { suggestion, minInstallments, comfortableInstallments, itemPrice, availableBudget };
};
