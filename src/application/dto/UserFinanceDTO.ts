import { z } from 'zod';
import { PROJECT_TYPES } from '../../domain/entities/PurchasePlan.js';
import { AmountSchema, InstallmentCountSchema, PercentageSchema, PositiveIntegerSchema } from './AmountSchema.js';
import { ItemPriceSchema, OfferSchema } from './FinanceRequestDTO.js';

export const UserIdSchema = z.string().trim().min(1, 'userId is required');

export const ProfileSettingsSchema = z.object({
  monthlyIncome: AmountSchema,
  fixedExpenses: AmountSchema,
  safetyMarginPct: PercentageSchema.default(10),
});

export type ProfileSettingsDTO = z.infer<typeof ProfileSettingsSchema>;

export const PlannedItemSchema = z
  .object({
    name: z.string().trim().min(1),
    store: z.string().trim().min(1).default('outro'),
    cashPrice: AmountSchema,
    installmentPrice: AmountSchema.optional(),
    installmentCount: InstallmentCountSchema.default(1),
    interestFree: z.boolean().default(true),
    quantity: PositiveIntegerSchema.default(1),
    url: z.string().url().optional(),
  })
  .transform((item) => ({ ...item, installmentPrice: item.installmentPrice ?? item.cashPrice }));

export const PurchasePlanInputSchema = z.object({
  name: z.string().trim().min(1),
  projectType: z.enum(PROJECT_TYPES).default('outro'),
  budget: AmountSchema.default(0),
  items: z.array(PlannedItemSchema).default([]),
});

export type PurchasePlanInputDTO = z.infer<typeof PurchasePlanInputSchema>;

export const UserSmartChoiceRequestSchema = z.object({
  offers: z.array(OfferSchema),
});

export const UserAffordabilityRequestSchema = ItemPriceSchema;

export const AskAdvisorRequestSchema = z.object({
  question: z.string().trim().min(1, 'Question is required'),
  offers: z.array(OfferSchema).optional(),
});
