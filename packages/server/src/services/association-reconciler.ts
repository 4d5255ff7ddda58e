import type { Recipe } from '../types/index.js';
import type { RecipeAttributeRepository } from '../repositories/index.js';

/**
 * - `full`: afterwards the recipe is linked to exactly the named entities.
 * - `partial`: named entities are added, existing links are never removed.
 */
export type ReconcileMode = 'partial' | 'full';

/**
 * Brings a recipe's links for one entity kind (tags or ingredients) in line
 * with a list of names, creating the owner's entities as needed.
 *
 * Does not open a transaction: callers run it inside the recipe write.
 */
export class AssociationReconciler {
  private attributes: RecipeAttributeRepository;

  constructor(attributes: RecipeAttributeRepository) {
    this.attributes = attributes;
  }

  reconcile(recipe: Pick<Recipe, 'id' | 'user_id'>, names: readonly string[], mode: ReconcileMode): void {
    const resolvedIds = new Set<number>();

    for (const name of names) {
      const attribute = this.attributes.getOrCreate(recipe.user_id, name);
      if (!resolvedIds.has(attribute.id)) {
        this.attributes.link(recipe.id, attribute.id);
        resolvedIds.add(attribute.id);
      }
    }

    if (mode === 'partial') {
      return;
    }

    for (const linkedId of this.attributes.findLinkedIds(recipe.id)) {
      if (!resolvedIds.has(linkedId)) {
        this.attributes.unlink(recipe.id, linkedId);
      }
    }
  }
}
