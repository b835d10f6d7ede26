import Decimal from 'decimal.js';
import type { Offer, ScoredOffer } from '../entities/Offer.js';
import type { Recommendation, RiskLevel } from '../entities/Recommendation.js';
import { decide, type DecisionRule } from './DecisionTable.js';
import {
  CASH_DISCOUNT_THRESHOLD_PCT,
  LONG_PLAN_MIN_INSTALLMENTS,
  MEDIUM_PLAN_MIN_INSTALLMENTS,
  MODERATE_COMMITMENT_PCT,
  SAFE_COMMITMENT_PCT,
  SENTINEL,
} from './FinanceConstants.js';
import { requireInstallmentCount, requireNonNegative } from './InputGuards.js';
import { cashDiscountPercentage } from './InstallmentComparator.js';
import { FinDecimal, HUNDRED, formatBrl, formatPercent, roundMoney, roundPercent, toDecimal } from './MoneyValue.js';

export interface SmartChoiceInput {
  availableCash: Decimal;
  monthlyCapacity: Decimal;
  offers: Offer[];
}

export type SmartChoiceResult =
  | {
      status: 'ok';
      bestOffer: ScoredOffer;
      rankedOffers: ScoredOffer[];
      recommendation: Recommendation;
      availableCash: Decimal;
      monthlyCapacity: Decimal;
    }
  | {
      status: 'no_offers';
      message: string;
      availableCash: Decimal;
      monthlyCapacity: Decimal;
    };

export const NO_OFFERS_MESSAGE = 'Nenhuma opção de loja fornecida';

// Full-precision figures; rounding happens only when the offer is reported.
export interface OfferMetrics {
  offer: Offer;
  monthlyInstallment: Decimal;
  canAffordCash: boolean;
  canAffordInstallment: boolean;
  cashDiscount: Decimal;
  cashDiscountPct: Decimal;
  commitmentPct: Decimal;
}

interface Evaluation {
  metrics: OfferMetrics;
  scored: ScoredOffer;
}

const hasQualifyingDiscount = (m: OfferMetrics) =>
  m.canAffordCash && m.cashDiscountPct.gte(CASH_DISCOUNT_THRESHOLD_PCT);

const fitsInterestFree = (m: OfferMetrics) => m.canAffordInstallment && m.offer.interestFree;

const scoreRules: ReadonlyArray<DecisionRule<OfferMetrics, Decimal>> = [
  {
    when: hasQualifyingDiscount,
    then: (m) => toDecimal(95).plus(m.cashDiscountPct.times('0.1')),
  },
  {
    when: (m) => fitsInterestFree(m) && m.offer.installmentCount >= LONG_PLAN_MIN_INSTALLMENTS,
    then: (m) => toDecimal(90).minus(m.commitmentPct.times('0.2')),
  },
  {
    when: (m) => fitsInterestFree(m) && m.offer.installmentCount >= MEDIUM_PLAN_MIN_INSTALLMENTS,
    then: (m) => toDecimal(85).minus(m.commitmentPct.times('0.2')),
  },
  {
    when: fitsInterestFree,
    then: (m) => toDecimal(75).minus(m.commitmentPct.times('0.3')),
  },
  {
    when: (m) => m.canAffordCash,
    then: (m) => toDecimal(70).plus(m.cashDiscountPct.times('0.5')),
  },
  {
    when: (m) => m.canAffordInstallment,
    then: (m) => toDecimal(50).minus(m.commitmentPct.times('0.3')),
  },
];

const outOfReachScore = (m: OfferMetrics): Decimal => FinDecimal.max(0, toDecimal(20).minus(m.offer.cashPrice.div(1000)));

/** Heuristic in [0, 100] with one decimal place. */
export const scoreOffer = (metrics: OfferMetrics): number => {
  const raw = decide(scoreRules, outOfReachScore, metrics);
  const clamped = FinDecimal.min(HUNDRED, FinDecimal.max(0, raw));
  return clamped.toDecimalPlaces(1, Decimal.ROUND_HALF_UP).toNumber();
};

export const measureOffer = (offer: Offer, availableCash: Decimal, monthlyCapacity: Decimal): OfferMetrics => {
  requireNonNegative(`${offer.store}.cashPrice`, offer.cashPrice);
  requireNonNegative(`${offer.store}.installmentPrice`, offer.installmentPrice);
  requireInstallmentCount(`${offer.store}.installmentCount`, offer.installmentCount);

  const monthlyInstallment = offer.installmentPrice.div(offer.installmentCount);
  const cashDiscount = offer.installmentPrice.minus(offer.cashPrice);

  return {
    offer,
    monthlyInstallment,
    canAffordCash: availableCash.gte(offer.cashPrice),
    canAffordInstallment: monthlyCapacity.gte(monthlyInstallment),
    cashDiscount,
    cashDiscountPct: cashDiscountPercentage(cashDiscount, offer.installmentPrice),
    commitmentPct: monthlyCapacity.gt(0) ? monthlyInstallment.div(monthlyCapacity).times(HUNDRED) : toDecimal(SENTINEL),
  };
};

const evaluate = (offer: Offer, availableCash: Decimal, monthlyCapacity: Decimal): Evaluation => {
  const metrics = measureOffer(offer, availableCash, monthlyCapacity);

  return {
    metrics,
    scored: {
      ...offer,
      monthlyInstallment: roundMoney(metrics.monthlyInstallment),
      canAffordCash: metrics.canAffordCash,
      canAffordInstallment: metrics.canAffordInstallment,
      cashDiscount: roundMoney(metrics.cashDiscount),
      cashDiscountPct: roundPercent(metrics.cashDiscountPct),
      commitmentPct: roundPercent(metrics.commitmentPct),
      score: scoreOffer(metrics),
    },
  };
};

const commitmentRisk = (commitmentPct: Decimal): RiskLevel => {
  if (commitmentPct.lte(SAFE_COMMITMENT_PCT)) {
    return 'low';
  }

  return commitmentPct.lte(MODERATE_COMMITMENT_PCT) ? 'medium' : 'high';
};

type RecommendationBody = Omit<Recommendation, 'store'>;

const recommendationRules: ReadonlyArray<DecisionRule<OfferMetrics, RecommendationBody>> = [
  {
    when: hasQualifyingDiscount,
    then: (m) => ({
      strategy: 'cash',
      title: 'Pague à Vista!',
      message:
        `Recomendado: ${m.offer.store} à vista por ${formatBrl(m.offer.cashPrice)}. ` +
        `Economia de ${formatBrl(m.cashDiscount)} (${formatPercent(m.cashDiscountPct)} de desconto).`,
      riskLevel: 'low',
    }),
  },
  {
    when: fitsInterestFree,
    then: (m) => ({
      strategy: 'installment',
      title: 'Parcele sem Juros',
      message:
        `Recomendado: ${m.offer.store} em ${m.offer.installmentCount}x de ` +
        `${formatBrl(m.monthlyInstallment)} sem juros. Cabe no seu bolso!`,
      riskLevel: commitmentRisk(roundPercent(m.commitmentPct)),
    }),
  },
  {
    when: (m) => m.canAffordCash,
    then: (m) => ({
      strategy: 'cash',
      title: 'Compra à Vista',
      message: `Você pode comprar na ${m.offer.store} à vista por ${formatBrl(m.offer.cashPrice)}. Sem comprometer seu fluxo mensal.`,
      riskLevel: 'low',
    }),
  },
  {
    when: (m) => m.canAffordInstallment,
    then: (m) => ({
      strategy: 'installment_caution',
      title: 'Parcelamento com Cautela',
      message:
        `${m.offer.store} oferece ${m.offer.installmentCount}x de ${formatBrl(m.monthlyInstallment)}, ` +
        `mas isso compromete ${formatPercent(m.commitmentPct, 0)} do seu fluxo. Avalie com cuidado.`,
      riskLevel: 'high',
    }),
  },
];

const notRecommended = (): RecommendationBody => ({
  strategy: 'not_recommended',
  title: 'Fora do Orçamento',
  message: 'Este produto está acima do seu orçamento atual. Considere economizar ou buscar alternativas mais baratas.',
  riskLevel: 'critical',
});

export const buildRecommendation = (metrics: OfferMetrics): Recommendation => ({
  ...decide(recommendationRules, notRecommended, metrics),
  store: metrics.offer.store,
});

/**
 * Scores every offer against the buyer's lump sum and monthly budget, ranks them
 * (stable on equal scores) and explains the winner.
 */
export const rankOffers = (input: SmartChoiceInput): SmartChoiceResult => {
  const availableCash = input.availableCash;
  const monthlyCapacity = input.monthlyCapacity;

  if (input.offers.length === 0) {
    return { status: 'no_offers', message: NO_OFFERS_MESSAGE, availableCash, monthlyCapacity };
  }

  const ranked = input.offers
    .map((offer) => evaluate(offer, availableCash, monthlyCapacity))
    .sort((a, b) => b.scored.score - a.scored.score);

  const [best] = ranked;

  return {
    status: 'ok',
    bestOffer: best.scored,
    rankedOffers: ranked.map((entry) => entry.scored),
    recommendation: buildRecommendation(best.metrics),
    availableCash,
    monthlyCapacity,
  };
};
