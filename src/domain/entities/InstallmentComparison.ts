import type Decimal from 'decimal.js';

export type PaymentRecommendation = 'cash' | 'installment' | 'neutral';

export interface InstallmentComparison {
  cashPrice: Decimal;
  installmentPrice: Decimal;
  installmentCount: number;
  interestFree: boolean;
  monthlyInstallment: Decimal;
  cashDiscount: Decimal;
  cashDiscountPct: Decimal;
  presentValue: Decimal;
  inflationSavings: Decimal;
  netBenefitInstallment: Decimal;
  recommendation: PaymentRecommendation;
  recommendationText: string;
  financialBenefit: Decimal;
  annualInflationRatePct: Decimal;
}

export interface InstallmentQuote {
  originalPrice: Decimal;
  installmentCount: number;
  monthlyInterestRatePct: Decimal;
  installmentValue: Decimal;
  totalWithInterest: Decimal;
  interestPaid: Decimal;
  interestFree: boolean;
}

export interface InstallmentSuggestion {
  suggestion: string;
  minInstallments: number | null;
  comfortableInstallments: number | null;
  itemPrice: Decimal;
  availableBudget: Decimal;
}
