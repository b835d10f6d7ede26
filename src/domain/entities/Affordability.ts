import type Decimal from 'decimal.js';
import type { RiskLevel } from './Recommendation.js';

export type AffordabilityTag =
  | 'cash_immediate'
  | 'installment_safe'
  | 'installment_moderate'
  | 'installment_risky'
  | 'save_first'
  | 'not_affordable';

export interface PurchaseItemPrice {
  cashPrice: Decimal;
  installmentPrice: Decimal;
  installmentCount: number;
}

export interface AffordabilityResult {
  monthlyIncome: Decimal;
  fixedExpenses: Decimal;
  freeCashFlow: Decimal;
  availableBudget: Decimal;
  currentCommitments: Decimal;
  itemCashPrice: Decimal;
  itemInstallmentPrice: Decimal;
  installmentCount: number;
  monthlyInstallment: Decimal;
  canAffordCash: boolean;
  canAffordInstallment: boolean;
  newCommitmentPct: Decimal;
  installmentAsIncomePct: Decimal;
  cashDiscount: Decimal;
  cashDiscountPct: Decimal;
  monthsToSaveCash: number;
  recommendation: AffordabilityTag;
  strategy: string;
  reason: string;
  riskLevel: RiskLevel;
}
