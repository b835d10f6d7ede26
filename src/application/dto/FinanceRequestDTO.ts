import { z } from 'zod';
import type { Offer } from '../../domain/entities/Offer.js';
import { AmountSchema, InstallmentCountSchema, PercentageSchema, SignedAmountSchema } from './AmountSchema.js';

export const ProfileInputSchema = z.object({
  monthlyIncome: AmountSchema,
  fixedExpenses: AmountSchema,
  safetyMarginPct: PercentageSchema.default(10),
  currentCommitments: AmountSchema.default(0),
});

export type ProfileInputDTO = z.infer<typeof ProfileInputSchema>;

export const ImportRequestSchema = z.object({
  priceUsd: AmountSchema,
  shippingUsd: AmountSchema.default(0),
  domesticPrice: AmountSchema.optional(),
  preferentialProgram: z.boolean().default(true),
});

export type ImportRequestDTO = z.infer<typeof ImportRequestSchema>;

export const PaymentRequestSchema = z.object({
  cashPrice: AmountSchema,
  installmentPrice: AmountSchema,
  installmentCount: InstallmentCountSchema,
  interestFree: z.boolean().default(true),
});

export type PaymentRequestDTO = z.infer<typeof PaymentRequestSchema>;

export const OfferSchema = z
  .object({
    store: z.string().trim().min(1),
    cashPrice: AmountSchema,
    installmentPrice: AmountSchema.optional(),
    installmentCount: InstallmentCountSchema.default(1),
    interestFree: z.boolean().default(true),
    url: z.string().url().optional(),
  })
  .transform(
    (offer): Offer => ({
      store: offer.store,
      cashPrice: offer.cashPrice,
      installmentPrice: offer.installmentPrice ?? offer.cashPrice,
      installmentCount: offer.installmentCount,
      interestFree: offer.interestFree,
      url: offer.url,
    }),
  );

export const RankOffersRequestSchema = z.object({
  availableCash: SignedAmountSchema,
  monthlyCapacity: SignedAmountSchema,
  offers: z.array(OfferSchema),
});

export type RankOffersRequestDTO = z.infer<typeof RankOffersRequestSchema>;

export const ItemPriceSchema = z
  .object({
    cashPrice: AmountSchema,
    installmentPrice: AmountSchema.optional(),
    installmentCount: InstallmentCountSchema.default(1),
  })
  .transform((item) => ({
    cashPrice: item.cashPrice,
    installmentPrice: item.installmentPrice ?? item.cashPrice,
    installmentCount: item.installmentCount,
  }));

export const AffordabilityRequestSchema = z.object({
  profile: ProfileInputSchema,
  item: ItemPriceSchema,
});

export type AffordabilityRequestDTO = z.infer<typeof AffordabilityRequestSchema>;

export const ParsePriceRequestSchema = z.object({
  text: z.string(),
});

export const InstallmentQuoteRequestSchema = z.object({
  totalPrice: AmountSchema,
  installmentCount: InstallmentCountSchema,
  monthlyInterestRate: AmountSchema.default(0),
});

export const InstallmentSuggestionRequestSchema = z.object({
  itemPrice: AmountSchema,
  availableBudget: SignedAmountSchema,
  maxInstallments: InstallmentCountSchema.default(24),
});
