import { z } from 'zod';

const FINITE_NUMBER_MESSAGE = 'Value must be a finite number.';
const INTEGER_MESSAGE = 'Value must be an integer.';
const ITEM_ID_MESSAGE = 'Item ids must be positive integers greater than 0.';

export const OPACITY_MIN = 0;
export const OPACITY_MAX = 255;

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

export const integerSchema = finiteNumberSchema.refine(Number.isInteger, {
  message: INTEGER_MESSAGE,
});

export const itemIdSchema = integerSchema.refine((value) => value > 0, {
  message: ITEM_ID_MESSAGE,
});

export type ItemId = z.infer<typeof itemIdSchema>;
