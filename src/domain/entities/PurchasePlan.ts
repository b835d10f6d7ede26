import type Decimal from 'decimal.js';

export const PROJECT_TYPES = ['pc', 'casa', 'eletro', 'moveis', 'eletronicos', 'outro'] as const;

export type ProjectType = (typeof PROJECT_TYPES)[number];

export interface ProfileSettings {
  monthlyIncome: Decimal;
  fixedExpenses: Decimal;
  safetyMarginPct: Decimal;
  updatedAt: string; // ISO timestamp
}

export interface PlannedItem {
  name: string;
  store: string;
  cashPrice: Decimal;
  installmentPrice: Decimal;
  installmentCount: number;
  interestFree: boolean;
  quantity: number;
  url?: string;
}

export interface PurchasePlan {
  id: string;
  userId: string;
  name: string;
  projectType: ProjectType;
  budget: Decimal; // monthly ceiling for this plan; zero means none
  items: PlannedItem[];
  createdAt: string; // ISO timestamp
}

export interface PurchasePlanSummary {
  planId: string;
  name: string;
  itemCount: number;
  totalCashPrice: Decimal;
  totalInstallmentPrice: Decimal;
  totalMonthlyInstallment: Decimal;
  savingsIfCash: Decimal;
  isOverBudget: boolean;
  budgetPercentageUsed: Decimal;
}
