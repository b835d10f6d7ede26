import type Decimal from 'decimal.js';
import type { CurrencyCode } from '../services/MoneyValue.js';

export interface CurrencyQuote {
  rate: Decimal;
  asOf: string; // ISO timestamp
  source: 'live' | 'fallback' | 'fixed';
}

export interface ImportCostBreakdown {
  currency: CurrencyCode;
  priceUsd: Decimal;
  shippingUsd: Decimal;
  totalUsd: Decimal;
  currencyRate: Decimal;
  rateAsOf: string;
  baseDomestic: Decimal;
  importTaxRate: Decimal;
  importTax: Decimal;
  subtotal: Decimal;
  consumptionTaxRate: Decimal;
  consumptionTax: Decimal;
  total: Decimal;
  preferentialProgram: boolean;
}

export type ImportRecommendation = 'import' | 'domestic' | 'equal';

export interface ImportComparison {
  importAnalysis: ImportCostBreakdown;
  domesticPrice: Decimal;
  priceDifference: Decimal;
  percentageDifference: Decimal;
  recommendation: ImportRecommendation;
  recommendationText: string;
  savings: Decimal;
}
