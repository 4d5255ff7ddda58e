import { z } from 'zod';

export const recipeAttributeNameSchema = z.string().trim().min(1).max(255);

/** Inline `{ name }` reference used in recipe payloads. */
export const recipeAttributeRefSchema = z.object({
  name: recipeAttributeNameSchema,
});

export const updateRecipeAttributeSchema = z.object({
  name: recipeAttributeNameSchema,
});

export const listRecipeAttributesQuerySchema = z.object({
  assigned_only: z
    .enum(['0', '1'])
    .optional()
    .transform((value) => value === '1'),
});

export type RecipeAttributeRefInput = z.infer<typeof recipeAttributeRefSchema>;
export type UpdateRecipeAttributeInput = z.infer<typeof updateRecipeAttributeSchema>;
export type ListRecipeAttributesQuery = z.infer<typeof listRecipeAttributesQuerySchema>;
