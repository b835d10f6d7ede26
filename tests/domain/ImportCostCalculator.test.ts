import { describe, expect, it } from 'vitest';
import type { CurrencyQuote } from '../../src/domain/entities/ImportCost.js';
import {
  calculateImportCost,
  compareAgainstDomesticPrice,
  resolveImportTaxRate,
} from '../../src/domain/services/ImportCostCalculator.js';
import { toDecimal } from '../../src/domain/services/MoneyValue.js';

const quote: CurrencyQuote = { rate: toDecimal('5.00'), asOf: '2024-03-01T10:00:00-03:00', source: 'fixed' };

describe('calculateImportCost', () => {
  it('applies the preferential 20% tier up to US$ 50', () => {
    const breakdown = calculateImportCost({ priceUsd: toDecimal(40) }, quote);

    expect(breakdown.importTaxRate.toFixed(2)).toBe('0.20');
    expect(breakdown.baseDomestic.toFixed(2)).toBe('200.00');
    expect(breakdown.importTax.toFixed(2)).toBe('40.00');
    expect(breakdown.subtotal.toFixed(2)).toBe('240.00');
    expect(breakdown.consumptionTax.toFixed(2)).toBe('40.80');
    expect(breakdown.total.toFixed(2)).toBe('280.80');
    expect(breakdown.rateAsOf).toBe('2024-03-01T10:00:00-03:00');
  });

  it('applies the 60% tier above US$ 50', () => {
    const breakdown = calculateImportCost({ priceUsd: toDecimal(100), preferentialProgram: true }, quote);

    expect(breakdown.importTaxRate.toFixed(2)).toBe('0.60');
    expect(breakdown.baseDomestic.toFixed(2)).toBe('500.00');
    expect(breakdown.importTax.toFixed(2)).toBe('300.00');
    expect(breakdown.subtotal.toFixed(2)).toBe('800.00');
    expect(breakdown.consumptionTax.toFixed(2)).toBe('136.00');
    expect(breakdown.total.toFixed(2)).toBe('936.00');
  });

  it('counts shipping toward the threshold', () => {
    const breakdown = calculateImportCost({ priceUsd: toDecimal(45), shippingUsd: toDecimal(10) }, quote);

    expect(breakdown.totalUsd.toFixed(2)).toBe('55.00');
    expect(breakdown.importTaxRate.toFixed(2)).toBe('0.60');
  });

  it('uses the standard tier outside the preferential program', () => {
    expect(resolveImportTaxRate(toDecimal(30), false).toFixed(2)).toBe('0.60');
    expect(resolveImportTaxRate(toDecimal(50), true).toFixed(2)).toBe('0.20');
  });

  it('rounds only the reported figures', () => {
    const breakdown = calculateImportCost(
      { priceUsd: toDecimal('10.01') },
      { rate: toDecimal('5.4321'), asOf: '2024-03-01T10:00:00-03:00', source: 'live' },
    );

    // base 54.375321, tax 10.8750642, subtotal 65.2503852, icms 11.092565484, total 76.342950684
    expect(breakdown.baseDomestic.toFixed(2)).toBe('54.38');
    expect(breakdown.importTax.toFixed(2)).toBe('10.88');
    expect(breakdown.subtotal.toFixed(2)).toBe('65.25');
    expect(breakdown.consumptionTax.toFixed(2)).toBe('11.09');
    expect(breakdown.total.toFixed(2)).toBe('76.34');
  });

  it('rejects negative prices', () => {
    expect(() => calculateImportCost({ priceUsd: toDecimal(-5) }, quote)).toThrow('priceUsd');
  });
});

describe('compareAgainstDomesticPrice', () => {
  const breakdown = calculateImportCost({ priceUsd: toDecimal(40) }, quote);

  it('recommends importing when the domestic price is higher', () => {
    const comparison = compareAgainstDomesticPrice(toDecimal(400), breakdown);

    expect(comparison.recommendation).toBe('import');
    expect(comparison.priceDifference.toFixed(2)).toBe('119.20');
    expect(comparison.savings.toFixed(2)).toBe('119.20');
    expect(comparison.percentageDifference.toFixed(1)).toBe('29.8');
    expect(comparison.recommendationText).toBe('Importar é mais barato. Economia de R$ 119,20 (29,8%)');
  });

  it('recommends buying domestically when importing costs more', () => {
    const comparison = compareAgainstDomesticPrice(toDecimal(250), breakdown);

    expect(comparison.recommendation).toBe('domestic');
    expect(comparison.priceDifference.toFixed(2)).toBe('-30.80');
    expect(comparison.savings.toFixed(2)).toBe('30.80');
    expect(comparison.recommendationText).toBe('Comprar no Brasil é mais barato. Economia de R$ 30,80 (12,3%)');
  });

  it('reports equivalence when prices match', () => {
    const comparison = compareAgainstDomesticPrice(toDecimal('280.80'), breakdown);

    expect(comparison.recommendation).toBe('equal');
    expect(comparison.savings.isZero()).toBe(true);
    expect(comparison.recommendationText).toBe('Preços equivalentes. Considere o prazo de entrega.');
  });
});
