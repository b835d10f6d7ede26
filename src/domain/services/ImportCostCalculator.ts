import type Decimal from 'decimal.js';
import type { CurrencyQuote, ImportComparison, ImportCostBreakdown } from '../entities/ImportCost.js';
import {
  ICMS_RATE,
  IMPORT_TAX_PREFERENTIAL_RATE,
  IMPORT_TAX_STANDARD_RATE,
  PREFERENTIAL_THRESHOLD_USD,
} from './FinanceConstants.js';
import { requireNonNegative } from './InputGuards.js';
import { HUNDRED, ZERO, formatBrl, formatPercent, roundMoney, roundPercent } from './MoneyValue.js';

export interface ImportCostInput {
  priceUsd: Decimal;
  shippingUsd?: Decimal;
  preferentialProgram?: boolean;
}

export const resolveImportTaxRate = (totalUsd: Decimal, preferentialProgram: boolean): Decimal =>
  preferentialProgram && totalUsd.lte(PREFERENTIAL_THRESHOLD_USD) ? IMPORT_TAX_PREFERENTIAL_RATE : IMPORT_TAX_STANDARD_RATE;

/**
 * Landed domestic cost of a foreign purchase: import duty on the converted value,
 * then ICMS on top of the duty-inclusive subtotal. Rounds only the reported fields.
 */
export const calculateImportCost = (input: ImportCostInput, quote: CurrencyQuote): ImportCostBreakdown => {
  const priceUsd = requireNonNegative('priceUsd', input.priceUsd);
  const shippingUsd = requireNonNegative('shippingUsd', input.shippingUsd ?? ZERO);
  const preferentialProgram = input.preferentialProgram ?? true;

  const totalUsd = priceUsd.plus(shippingUsd);
  const baseDomestic = totalUsd.times(quote.rate);
  const importTaxRate = resolveImportTaxRate(totalUsd, preferentialProgram);
  const importTax = baseDomestic.times(importTaxRate);
  const subtotal = baseDomestic.plus(importTax);
  const consumptionTax = subtotal.times(ICMS_RATE);
  const total = subtotal.plus(consumptionTax);

  return {
    currency: 'BRL',
    priceUsd,
    shippingUsd,
    totalUsd,
    currencyRate: quote.rate,
    rateAsOf: quote.asOf,
    baseDomestic: roundMoney(baseDomestic),
    importTaxRate,
    importTax: roundMoney(importTax),
    subtotal: roundMoney(subtotal),
    consumptionTaxRate: ICMS_RATE,
    consumptionTax: roundMoney(consumptionTax),
    total: roundMoney(total),
    preferentialProgram,
  };
};

export const compareAgainstDomesticPrice = (
  domesticPrice: Decimal,
  breakdown: ImportCostBreakdown,
): ImportComparison => {
  requireNonNegative('domesticPrice', domesticPrice);

  const difference = domesticPrice.minus(breakdown.total);
  const percentageDifference = domesticPrice.gt(0) ? difference.div(domesticPrice).times(HUNDRED) : ZERO;

  const base = {
    importAnalysis: breakdown,
    domesticPrice,
    priceDifference: roundMoney(difference),
    percentageDifference: roundPercent(percentageDifference),
  };

  if (difference.gt(0)) {
    return {
      ...base,
      recommendation: 'import',
      savings: roundMoney(difference),
      recommendationText: `Importar é mais barato. Economia de ${formatBrl(difference)} (${formatPercent(percentageDifference)})`,
    };
  }

  if (difference.lt(0)) {
    return {
      ...base,
      recommendation: 'domestic',
      savings: roundMoney(difference.abs()),
      recommendationText: `Comprar no Brasil é mais barato. Economia de ${formatBrl(difference.abs())} (${formatPercent(percentageDifference.abs())})`,
    };
  }

  return {
    ...base,
    recommendation: 'equal',
    savings: ZERO,
    recommendationText: 'Preços equivalentes. Considere o prazo de entrega.',
  };
};
