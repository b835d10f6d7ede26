import type Decimal from 'decimal.js';

export interface Offer {
  store: string;
  cashPrice: Decimal;
  installmentPrice: Decimal;
  installmentCount: number;
  interestFree: boolean;
  url?: string;
}

export interface ScoredOffer extends Offer {
  monthlyInstallment: Decimal;
  canAffordCash: boolean;
  canAffordInstallment: boolean;
  cashDiscount: Decimal;
  cashDiscountPct: Decimal;
  commitmentPct: Decimal;
  score: number; // 0-100, one decimal place
}
