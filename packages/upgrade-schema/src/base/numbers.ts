import { z } from 'zod';

const FINITE_NUMBER_MESSAGE = 'Value must be a finite number.';
const NONNEGATIVE_NUMBER_MESSAGE = 'Value must be greater than or equal to 0.';
const POSITIVE_INTEGER_MESSAGE =
  'Value must be a positive integer greater than 0.';
const NONNEGATIVE_INTEGER_MESSAGE =
  'Value must be an integer greater than or equal to 0.';
const PERCENTAGE_RANGE_MESSAGE = 'Value must be between 0 and 1 inclusive.';
const PROBABILITY_RANGE_MESSAGE =
  'Value must be greater than 0 and at most 1.';

const ensureFinite = (value: number, ctx: z.RefinementCtx) => {
  if (!Number.isFinite(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: FINITE_NUMBER_MESSAGE,
    });
    return z.NEVER;
  }

  return value;
};

export const finiteNumberSchema = z.coerce
  .number()
  .transform((value, ctx) => ensureFinite(value, ctx));

export const nonNegativeNumberSchema = finiteNumberSchema.refine(
  (value) => value >= 0,
  {
    message: NONNEGATIVE_NUMBER_MESSAGE,
  },
);

export const positiveIntSchema = finiteNumberSchema
  .refine(Number.isInteger, {
    message: POSITIVE_INTEGER_MESSAGE,
  })
  .refine((value) => value > 0, {
    message: POSITIVE_INTEGER_MESSAGE,
  });

export const nonNegativeIntSchema = finiteNumberSchema.refine(
  (value) => Number.isInteger(value) && value >= 0,
  {
    message: NONNEGATIVE_INTEGER_MESSAGE,
  },
);

export const percentSchema = finiteNumberSchema.refine(
  (value) => value >= 0 && value <= 1,
  {
    message: PERCENTAGE_RANGE_MESSAGE,
  },
);

/**
 * Success probability of an attempt. Zero is rejected: a tier that can never
 * succeed would make every run spin until its safety bound.
 */
export const probabilitySchema = finiteNumberSchema.refine(
  (value) => value > 0 && value <= 1,
  {
    message: PROBABILITY_RANGE_MESSAGE,
  },
);

export const ratioSchema = finiteNumberSchema.refine((value) => value >= 1, {
  message: 'Ratio must be greater than or equal to 1.',
});
