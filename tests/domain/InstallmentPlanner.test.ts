import { describe, expect, it } from 'vitest';
import { quoteInstallments, suggestInstallmentCount } from '../../src/domain/services/InstallmentPlanner.js';
import { toDecimal } from '../../src/domain/services/MoneyValue.js';

describe('quoteInstallments', () => {
  it('splits the price evenly without interest', () => {
    const quote = quoteInstallments(toDecimal(1200), 12);

    expect(quote.installmentValue.toFixed(2)).toBe('100.00');
    expect(quote.totalWithInterest.toFixed(2)).toBe('1200.00');
    expect(quote.interestPaid.toFixed(2)).toBe('0.00');
    expect(quote.interestFree).toBe(true);
  });

  it('applies the constant-payment formula with interest', () => {
    // 1000 * 0.1 * 1.21 / 0.21
    const quote = quoteInstallments(toDecimal(1000), 2, toDecimal('0.1'));

    expect(quote.installmentValue.toFixed(2)).toBe('576.19');
    expect(quote.totalWithInterest.toFixed(2)).toBe('1152.38');
    expect(quote.interestPaid.toFixed(2)).toBe('152.38');
    expect(quote.monthlyInterestRatePct.toNumber()).toBe(10);
    expect(quote.interestFree).toBe(false);
  });

  it('rejects a zero installment count', () => {
    expect(() => quoteInstallments(toDecimal(100), 0)).toThrow('installmentCount: must be a positive integer, received 0');
  });
});

describe('suggestInstallmentCount', () => {
  it('proposes a comfortable plan of up to a year', () => {
    const suggestion = suggestInstallmentCount(toDecimal(3000), toDecimal(1000));

    expect(suggestion.minInstallments).toBe(3);
    expect(suggestion.comfortableInstallments).toBe(10);
    expect(suggestion.suggestion).toBe('Ideal: 10x (parcela confortável de R$ 300,00)');
  });

  it('rounds counts half up', () => {
    const suggestion = suggestInstallmentCount(toDecimal(2500), toDecimal(1000));

    expect(suggestion.minInstallments).toBe(3);
    expect(suggestion.comfortableInstallments).toBe(8);
    expect(suggestion.suggestion).toBe('Ideal: 8x (parcela confortável de R$ 312,50)');
  });

  it('never suggests fewer than one installment', () => {
    const suggestion = suggestInstallmentCount(toDecimal(100), toDecimal(1000));

    expect(suggestion.minInstallments).toBe(1);
    expect(suggestion.suggestion).toBe('Ideal: 1x (parcela confortável de R$ 100,00)');
  });

  it('shows both counts for longer plans', () => {
    const suggestion = suggestInstallmentCount(toDecimal(6000), toDecimal(1000));

    expect(suggestion.suggestion).toBe('Mínimo: 6x | Confortável: 20x');
  });

  it('caps the comfortable count and warns above the maximum', () => {
    const suggestion = suggestInstallmentCount(toDecimal(30000), toDecimal(1000));

    expect(suggestion.minInstallments).toBe(30);
    expect(suggestion.comfortableInstallments).toBe(24);
    expect(suggestion.suggestion).toBe(
      'Este item está acima do seu orçamento. Precisaria de 30x mas o máximo comum é 24x.',
    );
  });

  it('has nothing to suggest without budget', () => {
    const suggestion = suggestInstallmentCount(toDecimal(3000), toDecimal(-10));

    expect(suggestion).toMatchObject({
      suggestion: 'Sem orçamento disponível',
      minInstallments: null,
      comfortableInstallments: null,
    });
  });
});
