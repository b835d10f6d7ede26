import type Decimal from 'decimal.js';
import type { AffordabilityResult } from '../../domain/entities/Affordability.js';
import type { CapacitySnapshot } from '../../domain/entities/CapacitySnapshot.js';
import type { CurrencyQuote, ImportComparison, ImportCostBreakdown } from '../../domain/entities/ImportCost.js';
import type {
  InstallmentComparison,
  InstallmentQuote,
  InstallmentSuggestion,
} from '../../domain/entities/InstallmentComparison.js';
import type { ScoredOffer } from '../../domain/entities/Offer.js';
import type { ProfileSettings, PurchasePlan, PurchasePlanSummary } from '../../domain/entities/PurchasePlan.js';
import type { SmartChoiceResult } from '../../domain/services/SmartChoiceEngine.js';
import type { ImportAnalysis } from '../../application/services/FinanceDecisionService.js';

// Decimals leave the process as fixed-point strings.
const money = (value: Decimal) => value.toFixed(2);
const pct = (value: Decimal) => value.toFixed(1);
const rate = (value: Decimal) => value.toFixed(4);

export const presentCapacity = (snapshot: CapacitySnapshot, currency: string) => ({
  currency,
  monthlyIncome: money(snapshot.monthlyIncome),
  fixedExpenses: money(snapshot.fixedExpenses),
  safetyMarginPct: pct(snapshot.safetyMarginPct),
  safetyMargin: money(snapshot.safetyMargin),
  freeCashFlow: money(snapshot.freeCashFlow),
  currentCommitments: money(snapshot.currentCommitments),
  availableForNew: money(snapshot.availableForNew),
  safeCapacity: money(snapshot.safeCapacity),
  maxCapacity: money(snapshot.maxCapacity),
});

export const presentQuote = (quote: CurrencyQuote & { formatted?: string }) => ({
  pair: 'USD-BRL',
  rate: rate(quote.rate),
  asOf: quote.asOf,
  source: quote.source,
  formatted: quote.formatted,
});

export const presentImportBreakdown = (breakdown: ImportCostBreakdown) => ({
  currency: breakdown.currency,
  priceUsd: money(breakdown.priceUsd),
  shippingUsd: money(breakdown.shippingUsd),
  totalUsd: money(breakdown.totalUsd),
  currencyRate: rate(breakdown.currencyRate),
  rateAsOf: breakdown.rateAsOf,
  baseDomestic: money(breakdown.baseDomestic),
  importTaxRate: pct(breakdown.importTaxRate.times(100)),
  importTax: money(breakdown.importTax),
  subtotal: money(breakdown.subtotal),
  consumptionTaxRate: pct(breakdown.consumptionTaxRate.times(100)),
  consumptionTax: money(breakdown.consumptionTax),
  total: money(breakdown.total),
  preferentialProgram: breakdown.preferentialProgram,
});

export const presentImportComparison = (comparison: ImportComparison) => ({
  importAnalysis: presentImportBreakdown(comparison.importAnalysis),
  domesticPrice: money(comparison.domesticPrice),
  priceDifference: money(comparison.priceDifference),
  percentageDifference: pct(comparison.percentageDifference),
  recommendation: comparison.recommendation,
  recommendationText: comparison.recommendationText,
  savings: money(comparison.savings),
});

export const presentImportAnalysis = (analysis: ImportAnalysis) =>
  analysis.kind === 'breakdown'
    ? { kind: analysis.kind, ...presentImportBreakdown(analysis.breakdown) }
    : { kind: analysis.kind, ...presentImportComparison(analysis.comparison) };

export const presentPayment = (comparison: InstallmentComparison, currency: string) => ({
  currency,
  cashPrice: money(comparison.cashPrice),
  installmentPrice: money(comparison.installmentPrice),
  installmentCount: comparison.installmentCount,
  interestFree: comparison.interestFree,
  monthlyInstallment: money(comparison.monthlyInstallment),
  cashDiscount: money(comparison.cashDiscount),
  cashDiscountPct: pct(comparison.cashDiscountPct),
  presentValue: money(comparison.presentValue),
  inflationSavings: money(comparison.inflationSavings),
  netBenefitInstallment: money(comparison.netBenefitInstallment),
  recommendation: comparison.recommendation,
  recommendationText: comparison.recommendationText,
  financialBenefit: money(comparison.financialBenefit),
  annualInflationRatePct: pct(comparison.annualInflationRatePct),
});

const presentScoredOffer = (offer: ScoredOffer) => ({
  store: offer.store,
  url: offer.url,
  cashPrice: money(offer.cashPrice),
  installmentPrice: money(offer.installmentPrice),
  installmentCount: offer.installmentCount,
  interestFree: offer.interestFree,
  monthlyInstallment: money(offer.monthlyInstallment),
  canAffordCash: offer.canAffordCash,
  canAffordInstallment: offer.canAffordInstallment,
  cashDiscount: money(offer.cashDiscount),
  cashDiscountPct: pct(offer.cashDiscountPct),
  commitmentPct: pct(offer.commitmentPct),
  score: offer.score,
});

export const presentSmartChoice = (result: SmartChoiceResult, currency: string) => {
  const budget = {
    currency,
    availableCash: money(result.availableCash),
    monthlyCapacity: money(result.monthlyCapacity),
  };

  if (result.status === 'no_offers') {
    return { status: result.status, message: result.message, ...budget };
  }

  return {
    status: result.status,
    ...budget,
    bestOffer: presentScoredOffer(result.bestOffer),
    rankedOffers: result.rankedOffers.map(presentScoredOffer),
    recommendation: result.recommendation,
  };
};

export const presentAffordability = (result: AffordabilityResult, currency: string) => ({
  currency,
  monthlyIncome: money(result.monthlyIncome),
  fixedExpenses: money(result.fixedExpenses),
  freeCashFlow: money(result.freeCashFlow),
  availableBudget: money(result.availableBudget),
  currentCommitments: money(result.currentCommitments),
  itemCashPrice: money(result.itemCashPrice),
  itemInstallmentPrice: money(result.itemInstallmentPrice),
  installmentCount: result.installmentCount,
  monthlyInstallment: money(result.monthlyInstallment),
  canAffordCash: result.canAffordCash,
  canAffordInstallment: result.canAffordInstallment,
  newCommitmentPct: pct(result.newCommitmentPct),
  installmentAsIncomePct: pct(result.installmentAsIncomePct),
  cashDiscount: money(result.cashDiscount),
  cashDiscountPct: pct(result.cashDiscountPct),
  monthsToSaveCash: result.monthsToSaveCash,
  recommendation: result.recommendation,
  strategy: result.strategy,
  reason: result.reason,
  riskLevel: result.riskLevel,
});

export const presentInstallmentQuote = (quote: InstallmentQuote, currency: string) => ({
  currency,
  originalPrice: money(quote.originalPrice),
  installmentCount: quote.installmentCount,
  monthlyInterestRatePct: quote.monthlyInterestRatePct.toFixed(2),
  installmentValue: money(quote.installmentValue),
  totalWithInterest: money(quote.totalWithInterest),
  interestPaid: money(quote.interestPaid),
  interestFree: quote.interestFree,
});

export const presentInstallmentSuggestion = (suggestion: InstallmentSuggestion, currency: string) => ({
  currency,
  suggestion: suggestion.suggestion,
  minInstallments: suggestion.minInstallments,
  comfortableInstallments: suggestion.comfortableInstallments,
  itemPrice: money(suggestion.itemPrice),
  availableBudget: money(suggestion.availableBudget),
});

export const presentProfile = (profile: ProfileSettings, currency: string) => ({
  currency,
  monthlyIncome: money(profile.monthlyIncome),
  fixedExpenses: money(profile.fixedExpenses),
  safetyMarginPct: pct(profile.safetyMarginPct),
  updatedAt: profile.updatedAt,
});

export const presentPlanSummary = (summary: PurchasePlanSummary) => ({
  planId: summary.planId,
  name: summary.name,
  itemCount: summary.itemCount,
  totalCashPrice: money(summary.totalCashPrice),
  totalInstallmentPrice: money(summary.totalInstallmentPrice),
  totalMonthlyInstallment: money(summary.totalMonthlyInstallment),
  savingsIfCash: money(summary.savingsIfCash),
  isOverBudget: summary.isOverBudget,
  budgetPercentageUsed: pct(summary.budgetPercentageUsed),
});

export const presentPlan = (plan: PurchasePlan) => ({
  id: plan.id,
  name: plan.name,
  projectType: plan.projectType,
  budget: money(plan.budget),
  createdAt: plan.createdAt,
  items: plan.items.map((item) => ({
    name: item.name,
    store: item.store,
    url: item.url,
    cashPrice: money(item.cashPrice),
    installmentPrice: money(item.installmentPrice),
    installmentCount: item.installmentCount,
    interestFree: item.interestFree,
    quantity: item.quantity,
  })),
});
