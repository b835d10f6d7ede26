import type Decimal from 'decimal.js';
import type { AffordabilityResult, AffordabilityTag, PurchaseItemPrice } from '../entities/Affordability.js';
import type { FinancialProfile } from '../entities/FinancialProfile.js';
import type { RiskLevel } from '../entities/Recommendation.js';
import { freeCashFlow, validateProfile } from './CapacityCalculator.js';
import { decide, type DecisionRule } from './DecisionTable.js';
import {
  CASH_DISCOUNT_THRESHOLD_PCT,
  MODERATE_COMMITMENT_PCT,
  SAFE_COMMITMENT_PCT,
  SAVE_FIRST_MAX_MONTHS,
  SENTINEL,
} from './FinanceConstants.js';
import { requireInstallmentCount, requireNonNegative } from './InputGuards.js';
import { cashDiscountPercentage } from './InstallmentComparator.js';
import { HUNDRED, formatBrl, formatPercent, roundMoney, roundPercent, toDecimal } from './MoneyValue.js';

interface AffordabilityFacts {
  installmentCount: number;
  availableBudget: Decimal;
  monthlyInstallment: Decimal;
  canAffordCash: boolean;
  canAffordInstallment: boolean;
  newCommitmentPct: Decimal;
  installmentAsIncomePct: Decimal;
  cashDiscount: Decimal;
  cashDiscountPct: Decimal;
  monthsToSaveCash: number;
}

interface Classification {
  recommendation: AffordabilityTag;
  strategy: string;
  reason: string;
  riskLevel: RiskLevel;
}

const classificationRules: ReadonlyArray<DecisionRule<AffordabilityFacts, Classification>> = [
  {
    when: (f) => f.canAffordCash && f.cashDiscountPct.gte(CASH_DISCOUNT_THRESHOLD_PCT),
    then: (f) => ({
      recommendation: 'cash_immediate',
      strategy: 'À vista imediato',
      reason: `Você tem fluxo de caixa e o desconto de ${formatPercent(f.cashDiscountPct)} vale a pena. Economia de ${formatBrl(f.cashDiscount)}.`,
      riskLevel: 'low',
    }),
  },
  {
    when: (f) => f.canAffordInstallment && f.newCommitmentPct.lte(SAFE_COMMITMENT_PCT),
    then: (f) => ({
      recommendation: 'installment_safe',
      strategy: `Parcelado em ${f.installmentCount}x`,
      reason: `Parcela de ${formatBrl(f.monthlyInstallment)} compromete apenas ${formatPercent(f.installmentAsIncomePct)} da sua renda. Seguro.`,
      riskLevel: 'low',
    }),
  },
  {
    when: (f) => f.canAffordInstallment && f.newCommitmentPct.lte(MODERATE_COMMITMENT_PCT),
    then: (f) => ({
      recommendation: 'installment_moderate',
      strategy: `Parcelado em ${f.installmentCount}x (atenção)`,
      reason: `Parcela cabe no orçamento, mas você ficará com ${formatPercent(f.newCommitmentPct)} comprometido. Considere esperar.`,
      riskLevel: 'medium',
    }),
  },
  {
    when: (f) => f.canAffordInstallment,
    then: (f) => ({
      recommendation: 'installment_risky',
      strategy: `Parcelado em ${f.installmentCount}x (arriscado)`,
      reason: `A parcela cabe, mas comprometeria ${formatPercent(f.newCommitmentPct)} do seu fluxo livre. Alto risco financeiro.`,
      riskLevel: 'high',
    }),
  },
  {
    when: (f) => f.monthsToSaveCash <= SAVE_FIRST_MAX_MONTHS,
    then: (f) => ({
      recommendation: 'save_first',
      strategy: `Economizar por ${f.monthsToSaveCash} meses`,
      reason: `Não cabe agora, mas economizando ${formatBrl(f.availableBudget)}/mês você compra à vista em ${f.monthsToSaveCash} meses.`,
      riskLevel: 'low',
    }),
  },
];

const notAffordable = (): Classification => ({
  recommendation: 'not_affordable',
  strategy: 'Fora do orçamento atual',
  reason: 'Este item está acima do seu poder de compra. Considere uma alternativa mais barata ou aumente sua renda.',
  riskLevel: 'critical',
});

export const monthsToSave = (price: Decimal, monthlySavings: Decimal): number =>
  monthlySavings.gt(0) ? price.div(monthlySavings).ceil().toNumber() : SENTINEL;

/**
 * Whether a single item fits the profile's budget today, and the safest way to buy it.
 */
export const classifyAffordability = (profile: FinancialProfile, item: PurchaseItemPrice): AffordabilityResult => {
  validateProfile(profile);
  const cashPrice = requireNonNegative('cashPrice', item.cashPrice);
  const installmentPrice = requireNonNegative('installmentPrice', item.installmentPrice);
  const installmentCount = requireInstallmentCount('installmentCount', item.installmentCount);

  const flow = freeCashFlow(profile);
  const availableBudget = flow.minus(profile.totalCommitted);
  const monthlyInstallment = installmentPrice.div(installmentCount);
  const cashDiscount = installmentPrice.minus(cashPrice);

  const facts: AffordabilityFacts = {
    installmentCount,
    availableBudget,
    monthlyInstallment,
    canAffordCash: availableBudget.gte(cashPrice),
    canAffordInstallment: availableBudget.gte(monthlyInstallment),
    newCommitmentPct: flow.gt(0)
      ? profile.totalCommitted.plus(monthlyInstallment).div(flow).times(HUNDRED)
      : toDecimal(SENTINEL),
    installmentAsIncomePct: profile.monthlyIncome.gt(0)
      ? monthlyInstallment.div(profile.monthlyIncome).times(HUNDRED)
      : toDecimal(SENTINEL),
    cashDiscount,
    cashDiscountPct: cashDiscountPercentage(cashDiscount, installmentPrice),
    monthsToSaveCash: monthsToSave(cashPrice, availableBudget),
  };

  const classification = decide(classificationRules, notAffordable, facts);

  return {
    monthlyIncome: profile.monthlyIncome,
    fixedExpenses: profile.fixedExpenses,
    freeCashFlow: flow,
    availableBudget,
    currentCommitments: profile.totalCommitted,
    itemCashPrice: cashPrice,
    itemInstallmentPrice: installmentPrice,
    installmentCount,
    monthlyInstallment: roundMoney(monthlyInstallment),
    canAffordCash: facts.canAffordCash,
    canAffordInstallment: facts.canAffordInstallment,
    newCommitmentPct: roundPercent(facts.newCommitmentPct),
    installmentAsIncomePct: roundPercent(facts.installmentAsIncomePct),
    cashDiscount: roundMoney(cashDiscount),
    cashDiscountPct: roundPercent(facts.cashDiscountPct),
    monthsToSaveCash: facts.monthsToSaveCash,
    ...classification,
  };
};
