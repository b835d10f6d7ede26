import { describe, expect, it } from 'vitest';
import { computeCapacity } from '../../src/domain/services/CapacityCalculator.js';
import { calculateImportCost } from '../../src/domain/services/ImportCostCalculator.js';
import { toDecimal } from '../../src/domain/services/MoneyValue.js';
import { rankOffers } from '../../src/domain/services/SmartChoiceEngine.js';
import {
  presentCapacity,
  presentImportAnalysis,
  presentSmartChoice,
} from '../../src/infrastructure/http/presenters.js';

describe('presenters', () => {
  it('renders capacity figures as fixed-point strings', () => {
    const snapshot = computeCapacity({
      monthlyIncome: toDecimal('4321.5'),
      fixedExpenses: toDecimal(1000),
      safetyMarginPct: toDecimal('12.5'),
    });

    expect(presentCapacity(snapshot, 'BRL')).toEqual({
      currency: 'BRL',
      monthlyIncome: '4321.50',
      fixedExpenses: '1000.00',
      safetyMarginPct: '12.5',
      safetyMargin: '540.19',
      freeCashFlow: '2781.31',
      currentCommitments: '0.00',
      availableForNew: '2781.31',
      safeCapacity: '834.39',
      maxCapacity: '1390.66',
    });
  });

  it('renders tax rates as percentages', () => {
    const breakdown = calculateImportCost(
      { priceUsd: toDecimal(40) },
      { rate: toDecimal(5), asOf: '2024-03-01T10:00:00-03:00', source: 'fixed' },
    );

    const body = presentImportAnalysis({ kind: 'breakdown', breakdown });

    expect(body).toMatchObject({
      kind: 'breakdown',
      currencyRate: '5.0000',
      importTaxRate: '20.0',
      consumptionTaxRate: '17.0',
      total: '280.80',
    });
  });

  it('keeps the budget on an empty ranking', () => {
    const result = rankOffers({ availableCash: toDecimal(-10), monthlyCapacity: toDecimal(0), offers: [] });

    expect(presentSmartChoice(result, 'BRL')).toEqual({
      status: 'no_offers',
      message: 'Nenhuma opção de loja fornecida',
      currency: 'BRL',
      availableCash: '-10.00',
      monthlyCapacity: '0.00',
    });
  });
});
