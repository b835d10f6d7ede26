import type Decimal from 'decimal.js';
import type { AffordabilityResult } from '../../domain/entities/Affordability.js';
import type { CapacitySnapshot } from '../../domain/entities/CapacitySnapshot.js';
import type { CurrencyQuote, ImportComparison, ImportCostBreakdown } from '../../domain/entities/ImportCost.js';
import type {
  InstallmentComparison,
  InstallmentQuote,
  InstallmentSuggestion,
} from '../../domain/entities/InstallmentComparison.js';
import { classifyAffordability } from '../../domain/services/AffordabilityClassifier.js';
import { computeCapacity } from '../../domain/services/CapacityCalculator.js';
import { DEFAULT_ANNUAL_INFLATION_RATE } from '../../domain/services/FinanceConstants.js';
import { calculateImportCost, compareAgainstDomesticPrice } from '../../domain/services/ImportCostCalculator.js';
import { compareCashVsInstallment } from '../../domain/services/InstallmentComparator.js';
import { quoteInstallments, suggestInstallmentCount } from '../../domain/services/InstallmentPlanner.js';
import { parseMoney } from '../../domain/services/MoneyValue.js';
import { rankOffers, type SmartChoiceResult } from '../../domain/services/SmartChoiceEngine.js';
import {
  AffordabilityRequestSchema,
  ImportRequestSchema,
  InstallmentQuoteRequestSchema,
  InstallmentSuggestionRequestSchema,
  ParsePriceRequestSchema,
  PaymentRequestSchema,
  ProfileInputSchema,
  RankOffersRequestSchema,
} from '../dto/FinanceRequestDTO.js';
import type { CurrencyRatePort } from '../ports/CurrencyRatePort.js';

export type ImportAnalysis =
  | { kind: 'breakdown'; breakdown: ImportCostBreakdown }
  | { kind: 'comparison'; comparison: ImportComparison };

export interface FinanceDecisionOptions {
  annualInflationRate?: Decimal;
}

/**
 * Stateless entry points over the decision engine. Every method parses its raw
 * input first, so callers can hand over request bodies as they arrive.
 */
export class FinanceDecisionService {
  private readonly annualInflationRate: Decimal;

  constructor(
    private readonly currencyRates: CurrencyRatePort,
    options: FinanceDecisionOptions = {},
  ) {
    this.annualInflationRate = options.annualInflationRate ?? DEFAULT_ANNUAL_INFLATION_RATE;
  }

  computeCapacity(input: unknown): CapacitySnapshot {
    const profile = ProfileInputSchema.parse(input);
    return computeCapacity(profile);
  }

  async analyzeImport(input: unknown): Promise<ImportAnalysis> {
    const request = ImportRequestSchema.parse(input);
    const quote = await this.currencyRates.getCurrentRate();
    const breakdown = calculateImportCost(request, quote);

    if (request.domesticPrice === undefined) {
      return { kind: 'breakdown', breakdown };
    }

    return { kind: 'comparison', comparison: compareAgainstDomesticPrice(request.domesticPrice, breakdown) };
  }

  analyzePayment(input: unknown): InstallmentComparison {
    const request = PaymentRequestSchema.parse(input);
    return compareCashVsInstallment(request, this.annualInflationRate);
  }

  rankOffers(input: unknown): SmartChoiceResult {
    return rankOffers(RankOffersRequestSchema.parse(input));
  }

  classifyAffordability(input: unknown): AffordabilityResult {
    const { profile, item } = AffordabilityRequestSchema.parse(input);

    return classifyAffordability(
      {
        monthlyIncome: profile.monthlyIncome,
        fixedExpenses: profile.fixedExpenses,
        safetyMarginPct: profile.safetyMarginPct,
        totalCommitted: profile.currentCommitments,
      },
      item,
    );
  }

  async getDollarQuote(): Promise<CurrencyQuote & { formatted: string }> {
    const quote = await this.currencyRates.getCurrentRate();
    return { ...quote, formatted: `R$ ${quote.rate.toFixed(4)}` };
  }

  parsePrice(input: unknown): Decimal | null {
    const { text } = ParsePriceRequestSchema.parse(input);
    return parseMoney(text);
  }

  quoteInstallments(input: unknown): InstallmentQuote {
    const request = InstallmentQuoteRequestSchema.parse(input);
    return quoteInstallments(request.totalPrice, request.installmentCount, request.monthlyInterestRate);
  }

  suggestInstallments(input: unknown): InstallmentSuggestion {
    const request = InstallmentSuggestionRequestSchema.parse(input);
    return suggestInstallmentCount(request.itemPrice, request.availableBudget, request.maxInstallments);
  }
}
