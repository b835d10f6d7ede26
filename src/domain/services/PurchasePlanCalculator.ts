import type Decimal from 'decimal.js';
import type { PlannedItem, PurchasePlan, PurchasePlanSummary } from '../entities/PurchasePlan.js';
import { HUNDRED, ZERO } from './MoneyValue.js';

const sum = (values: Decimal[]): Decimal => values.reduce((total, value) => total.plus(value), ZERO);

export const itemCashTotal = (item: PlannedItem): Decimal => item.cashPrice.times(item.quantity);

export const itemInstallmentTotal = (item: PlannedItem): Decimal => item.installmentPrice.times(item.quantity);

export const itemMonthlyInstallment = (item: PlannedItem): Decimal =>
  item.installmentCount > 0 ? itemInstallmentTotal(item).div(item.installmentCount) : ZERO;

export const planMonthlyInstallment = (plan: PurchasePlan): Decimal => sum(plan.items.map(itemMonthlyInstallment));

export const summarizePlan = (plan: PurchasePlan): PurchasePlanSummary => {
  const totalCashPrice = sum(plan.items.map(itemCashTotal));
  const totalInstallmentPrice = sum(plan.items.map(itemInstallmentTotal));
  const totalMonthlyInstallment = planMonthlyInstallment(plan);
  const hasBudget = plan.budget.gt(0);

  return {
    planId: plan.id,
    name: plan.name,
    itemCount: plan.items.length,
    totalCashPrice,
    totalInstallmentPrice,
    totalMonthlyInstallment,
    savingsIfCash: totalInstallmentPrice.minus(totalCashPrice),
    isOverBudget: hasBudget && totalMonthlyInstallment.gt(plan.budget),
    budgetPercentageUsed: hasBudget ? totalMonthlyInstallment.div(plan.budget).times(HUNDRED) : ZERO,
  };
};

/** Monthly installments already committed across every plan. */
export const totalCommitted = (plans: PurchasePlan[]): Decimal => sum(plans.map(planMonthlyInstallment));
