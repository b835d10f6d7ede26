import { z } from 'zod';
import { parseMoney, toDecimal } from '../../domain/services/MoneyValue.js';

// A minus sign may follow the currency symbol: "-10", "R$ -900,00", "US$ -49.99".
const negativeAmount = /^[R$US\s]*-/;
const wholeNumber = /^\s*\d+\s*$/;

/** Signed decimal from a JSON number or a typed price such as "R$ 1.299,00". */
export const SignedAmountSchema = z.union([z.number().finite(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') {
    return toDecimal(value);
  }

  const parsed = parseMoney(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unrecognised amount "${value}"` });
    return z.NEVER;
  }

  return negativeAmount.test(value) ? parsed.negated() : parsed;
});

export const AmountSchema = SignedAmountSchema.refine((value) => !value.isNegative(), {
  message: 'Amount must not be negative',
});

export const PercentageSchema = AmountSchema.refine((value) => value.lte(100), {
  message: 'Percentage must be between 0 and 100',
});

/** Positive integer from a JSON number or a digit string; booleans and blanks are rejected. */
export const PositiveIntegerSchema = z
  .union([z.number(), z.string().regex(wholeNumber, 'Expected a whole number').transform(Number)])
  .pipe(z.number().int().positive());

export const InstallmentCountSchema = PositiveIntegerSchema;
