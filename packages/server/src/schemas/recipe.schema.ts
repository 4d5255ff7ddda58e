import { z } from 'zod';
import { normalizePrice, PRICE_DECIMAL_PLACES, PRICE_MAX_DIGITS } from '../utils/price.js';
import { idListSchema } from './common.schema.js';
import { recipeAttributeRefSchema } from './recipe-attribute.schema.js';

export const priceSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const normalized = normalizePrice(value);
  if (normalized === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Ensure this is a non-negative decimal with at most ${PRICE_MAX_DIGITS} digits and ${PRICE_DECIMAL_PLACES} decimal places`,
    });
    return z.NEVER;
  }
  return normalized;
});

export const MAX_RECIPE_ATTRIBUTES = 500;

const recipeAttributeListSchema = z.array(recipeAttributeRefSchema).max(MAX_RECIPE_ATTRIBUTES);

// Unknown keys (including any attempt to set `user`) are stripped by zod.
export const createRecipeSchema = z.object({
  title: z.string().trim().min(1).max(255),
  time_minutes: z.number().int().nonnegative(),
  price: priceSchema,
  description: z.string().max(10_000).optional(),
  link: z.union([z.string().trim().url().max(255), z.literal('')]).optional(),
  tags: recipeAttributeListSchema.optional(),
  ingredients: recipeAttributeListSchema.optional(),
});

/** PUT: every required field must be present again. */
export const replaceRecipeSchema = createRecipeSchema;

/** PATCH: any subset of fields. */
export const updateRecipeSchema = createRecipeSchema.partial();

export const listRecipesQuerySchema = z.object({
  tags: idListSchema.optional(),
  ingredients: idListSchema.optional(),
});

export type CreateRecipeInput = z.infer<typeof createRecipeSchema>;
export type ReplaceRecipeInput = z.infer<typeof replaceRecipeSchema>;
export type UpdateRecipeInput = z.infer<typeof updateRecipeSchema>;
export type ListRecipesQuery = z.infer<typeof listRecipesQuerySchema>;
