import { describe, it, expect } from 'vitest';
import {
  listRecipeAttributesQuerySchema,
  updateRecipeAttributeSchema,
} from '../recipe-attribute.schema.js';

describe('listRecipeAttributesQuerySchema', () => {
  it('maps assigned_only=1 to true', () => {
    expect(listRecipeAttributesQuerySchema.parse({ assigned_only: '1' })).toEqual({ assigned_only: true });
  });

  it('defaults to false when absent or 0', () => {
    expect(listRecipeAttributesQuerySchema.parse({})).toEqual({ assigned_only: false });
    expect(listRecipeAttributesQuerySchema.parse({ assigned_only: '0' })).toEqual({ assigned_only: false });
  });

  it('rejects other values', () => {
    expect(listRecipeAttributesQuerySchema.safeParse({ assigned_only: 'yes' }).success).toBe(false);
  });
});

describe('updateRecipeAttributeSchema', () => {
  it('trims the name', () => {
    expect(updateRecipeAttributeSchema.parse({ name: '  Dessert ' })).toEqual({ name: 'Dessert' });
  });

  it('rejects a blank name', () => {
    expect(updateRecipeAttributeSchema.safeParse({ name: '   ' }).success).toBe(false);
  });
});
