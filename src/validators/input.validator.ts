import Decimal from 'decimal.js';
import { z } from 'zod';
import { MONEY } from '@/config/businessRules';
import { ValidationError } from '@/errors';
import { RegisterUserInput } from '@/models';
import { Outcome, ok, fail } from '@/utils/outcome';
import { Money } from '@/utils/money';

function integerDigits(value: string): number {
  const [integerPart = ''] = value.replace(/^[+-]/, '').split(/[.,]/);
  return integerPart.replace(/^0+/, '').length;
}

/**
 * Amount typed at the prompt
 *
 * - Comma or dot as decimal separator ("1500,45" and "1500.45" are equal)
 * - Optional sign: zero and negative values parse, the ledger rejects them
 * - At most MONEY.MAX_INTEGER_DIGITS digits before the separator
 * - Rounded half-up to two fraction digits
 */
export const amountInputSchema = z
  .string()
  .trim()
  .min(1, { message: 'An amount is required' })
  .regex(/^[+-]?(\d+([.,]\d*)?|[.,]\d+)$/, {
    message: 'Invalid amount. Type numbers only (e.g. 1500.45 or 1500,45)',
  })
  .refine((value) => integerDigits(value) <= MONEY.MAX_INTEGER_DIGITS, {
    message: `Amount is too large (at most ${MONEY.MAX_INTEGER_DIGITS} digits before the decimal separator)`,
  })
  .transform((value) =>
    new Money(value.replace(',', '.')).toDecimalPlaces(
      MONEY.FRACTION_DIGITS,
      Decimal.ROUND_HALF_UP
    )
  );

/**
 * Account number typed at the prompt
 */
export const accountNumberInputSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, { message: 'Account number must be a positive integer' })
  .transform((value) => Number(value))
  .refine((value) => Number.isSafeInteger(value) && value > 0, {
    message: 'Account number must be a positive integer',
  });

/**
 * User registration payload
 * Fields are opaque display text; they only have to be non-blank
 */
export const registerUserSchema = z.object({
  fullName: z.string().trim().min(1, { message: 'Full name is required' }),
  birthDate: z.string().trim().min(1, { message: 'Birth date is required' }),
  nationalId: z.string().trim().min(1, { message: 'National id is required' }),
  address: z.string().trim().min(1, { message: 'Address is required' }),
});

export type RegisterUserDTO = z.infer<typeof registerUserSchema>;

function toValidationError(error: z.ZodError, fallback: string): ValidationError {
  return new ValidationError(error.issues[0]?.message ?? fallback, error.issues);
}

export function parseAmount(text: string): Outcome<Decimal, ValidationError> {
  const result = amountInputSchema.safeParse(text);
  if (!result.success) {
    return fail(toValidationError(result.error, 'Invalid amount'));
  }
  return ok(result.data);
}

export function parseAccountNumber(text: string): Outcome<number, ValidationError> {
  const result = accountNumberInputSchema.safeParse(text);
  if (!result.success) {
    return fail(toValidationError(result.error, 'Invalid account number'));
  }
  return ok(result.data);
}

export function parseRegistration(
  input: RegisterUserInput
): Outcome<RegisterUserDTO, ValidationError> {
  const result = registerUserSchema.safeParse(input);
  if (!result.success) {
    return fail(toValidationError(result.error, 'Invalid registration data'));
  }
  return ok(result.data);
}
