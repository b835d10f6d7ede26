import type Decimal from 'decimal.js';
import type { InstallmentComparison, PaymentRecommendation } from '../entities/InstallmentComparison.js';
import { decide, type DecisionRule } from './DecisionTable.js';
import {
  CASH_DISCOUNT_THRESHOLD_PCT,
  DEFAULT_ANNUAL_INFLATION_RATE,
  INSTALLMENT_NET_BENEFIT_THRESHOLD,
} from './FinanceConstants.js';
import { requireInstallmentCount, requireNonNegative } from './InputGuards.js';
import { HUNDRED, ZERO, formatBrl, formatPercent, roundMoney, roundPercent, toDecimal } from './MoneyValue.js';

export interface PaymentPlanInput {
  cashPrice: Decimal;
  installmentPrice: Decimal;
  installmentCount: number;
  interestFree?: boolean;
}

interface PaymentMetrics {
  interestFree: boolean;
  cashDiscount: Decimal;
  cashDiscountPct: Decimal;
  netBenefitInstallment: Decimal;
}

interface PaymentDecision {
  recommendation: PaymentRecommendation;
  recommendationText: string;
  financialBenefit: Decimal;
}

export const monthlyRateFromAnnual = (annualRate: Decimal): Decimal =>
  toDecimal(1).plus(annualRate).pow(toDecimal(1).div(12)).minus(1);

export const cashDiscountPercentage = (cashDiscount: Decimal, installmentPrice: Decimal): Decimal =>
  installmentPrice.gt(0) ? cashDiscount.div(installmentPrice).times(HUNDRED) : ZERO;

/**
 * Present value of `count` equal payments, the first one a month from now.
 * Closed-form annuity: pmt * (1 - (1 + r)^-n) / r, or pmt * n without discounting.
 */
export const presentValueOfInstallments = (monthlyInstallment: Decimal, count: number, monthlyRate: Decimal): Decimal => {
  if (monthlyRate.isZero()) {
    return monthlyInstallment.times(count);
  }

  const discount = toDecimal(1).plus(monthlyRate).pow(-count);
  return monthlyInstallment.times(toDecimal(1).minus(discount)).div(monthlyRate);
};

const paymentRules: ReadonlyArray<DecisionRule<PaymentMetrics, PaymentDecision>> = [
  {
    when: (m) => m.cashDiscountPct.gte(CASH_DISCOUNT_THRESHOLD_PCT),
    then: (m) => ({
      recommendation: 'cash',
      recommendationText: `Pague à vista. Desconto de ${formatPercent(m.cashDiscountPct)} supera o ganho com a inflação.`,
      financialBenefit: m.cashDiscount,
    }),
  },
  {
    when: (m) => m.netBenefitInstallment.gt(INSTALLMENT_NET_BENEFIT_THRESHOLD) && m.interestFree,
    then: (m) => ({
      recommendation: 'installment',
      recommendationText: `Parcele sem juros. A inflação trabalha a seu favor, economia real de ${formatBrl(m.netBenefitInstallment)}.`,
      financialBenefit: m.netBenefitInstallment,
    }),
  },
  {
    when: (m) => !m.interestFree,
    then: (m) => ({
      recommendation: 'cash',
      recommendationText: `Pague à vista para evitar juros. Economia de ${formatBrl(m.cashDiscount)}.`,
      financialBenefit: m.cashDiscount,
    }),
  },
];

const neutralDecision = (): PaymentDecision => ({
  recommendation: 'neutral',
  recommendationText: 'Diferença mínima. Escolha conforme seu fluxo de caixa.',
  financialBenefit: ZERO,
});

export const compareCashVsInstallment = (
  input: PaymentPlanInput,
  annualRate: Decimal = DEFAULT_ANNUAL_INFLATION_RATE,
): InstallmentComparison => {
  const cashPrice = requireNonNegative('cashPrice', input.cashPrice);
  const installmentPrice = requireNonNegative('installmentPrice', input.installmentPrice);
  const installmentCount = requireInstallmentCount('installmentCount', input.installmentCount);
  requireNonNegative('annualRate', annualRate);
  const interestFree = input.interestFree ?? true;

  const cashDiscount = installmentPrice.minus(cashPrice);
  const cashDiscountPct = cashDiscountPercentage(cashDiscount, installmentPrice);
  const monthlyInstallment = installmentPrice.div(installmentCount);

  const presentValue = presentValueOfInstallments(monthlyInstallment, installmentCount, monthlyRateFromAnnual(annualRate));
  const inflationSavings = installmentPrice.minus(presentValue);
  const netBenefitInstallment = inflationSavings.minus(cashDiscount);

  const decision = decide(
    paymentRules,
    neutralDecision,
    { interestFree, cashDiscount, cashDiscountPct, netBenefitInstallment },
  );

  return {
    cashPrice,
    installmentPrice,
    installmentCount,
    interestFree,
    monthlyInstallment: roundMoney(monthlyInstallment),
    cashDiscount: roundMoney(cashDiscount),
    cashDiscountPct: roundPercent(cashDiscountPct),
    presentValue: roundMoney(presentValue),
    inflationSavings: roundMoney(inflationSavings),
    netBenefitInstallment: roundMoney(netBenefitInstallment),
    recommendation: decision.recommendation,
    recommendationText: decision.recommendationText,
    financialBenefit: roundMoney(decision.financialBenefit),
    annualInflationRatePct: annualRate.times(HUNDRED),
  };
};
