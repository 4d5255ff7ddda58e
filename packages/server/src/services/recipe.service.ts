import type { Database } from 'better-sqlite3';
import { info, warn } from 'firebase-functions/logger';
import type {
  Recipe,
  RecipeAttribute,
  RecipeAttributeSummary,
  RecipeDetail,
  RecipeFilters,
  RecipeImage,
  RecipeSummary,
} from '../types/index.js';
import { NotFoundError, ValidationError } from '../types/errors.js';
import type {
  CreateRecipeInput,
  ReplaceRecipeInput,
  UpdateRecipeInput,
} from '../schemas/recipe.schema.js';
import type { RecipeAttributeRefInput } from '../schemas/recipe-attribute.schema.js';
import type {
  RecipeRepository,
  TagRepository,
  IngredientRepository,
} from '../repositories/index.js';
import { runInTransaction } from '../db/index.js';
import { AssociationReconciler } from './association-reconciler.js';
import type { ImageStorage } from './image-storage.service.js';

export interface RecipeServiceDeps {
  db: Database;
  recipes: RecipeRepository;
  tags: TagRepository;
  ingredients: IngredientRepository;
  images: ImageStorage;
  /** URL prefix stored image paths are served under, e.g. "/media". */
  mediaUrl: string;
}

function toSummaryRef(attribute: RecipeAttribute): RecipeAttributeSummary {
  return { id: attribute.id, name: attribute.name };
}

function namesOf(refs: RecipeAttributeRefInput[]): string[] {
  return refs.map((ref) => ref.name);
}

/**
 * Recipe commands and queries. Every method takes the requesting user's id;
 * a recipe owned by anyone else is reported as not found.
 */
export class RecipeService {
  private db: Database;
  private recipes: RecipeRepository;
  private tags: TagRepository;
  private ingredients: IngredientRepository;
  private images: ImageStorage;
  private mediaUrl: string;
  private tagReconciler: AssociationReconciler;
  private ingredientReconciler: AssociationReconciler;

  constructor(deps: RecipeServiceDeps) {
    this.db = deps.db;
    this.recipes = deps.recipes;
    this.tags = deps.tags;
    this.ingredients = deps.ingredients;
    this.images = deps.images;
    this.mediaUrl = deps.mediaUrl.replace(/\/+$/, '');
    this.tagReconciler = new AssociationReconciler(deps.tags);
    this.ingredientReconciler = new AssociationReconciler(deps.ingredients);
  }

  list(userId: number, filters: RecipeFilters = {}): RecipeSummary[] {
    const recipes = this.recipes.findAllForUser(userId, filters);
    const recipeIds = recipes.map((recipe) => recipe.id);
    const tagsByRecipe = this.tags.findForRecipes(recipeIds);
    const ingredientsByRecipe = this.ingredients.findForRecipes(recipeIds);

    return recipes.map((recipe) => ({
      id: recipe.id,
      title: recipe.title,
      time_minutes: recipe.time_minutes,
      price: recipe.price,
      link: recipe.link,
      tags: (tagsByRecipe.get(recipe.id) ?? []).map(toSummaryRef),
      ingredients: (ingredientsByRecipe.get(recipe.id) ?? []).map(toSummaryRef),
    }));
  }

  get(userId: number, id: number): RecipeDetail {
    return this.toDetail(this.requireOwned(userId, id));
  }

  create(userId: number, input: CreateRecipeInput): RecipeDetail {
    const recipe = runInTransaction(this.db, () => {
      const created = this.recipes.create(userId, {
        title: input.title,
        time_minutes: input.time_minutes,
        price: input.price,
        description: input.description,
        link: input.link,
      });
      this.reconcileAttributes(created, input);
      return created;
    });

    info('Recipe created', { userId, recipeId: recipe.id });
    return this.toDetail(recipe);
  }

  /** PUT: the schema has already required every mandatory field. */
  replace(userId: number, id: number, input: ReplaceRecipeInput): RecipeDetail {
    return this.applyChanges(userId, id, input);
  }

  /** PATCH: only the fields present in the payload change. */
  update(userId: number, id: number, input: UpdateRecipeInput): RecipeDetail {
    return this.applyChanges(userId, id, input);
  }

  async delete(userId: number, id: number): Promise<void> {
    const recipe = this.requireOwned(userId, id);
    // Link rows cascade; the tags and ingredients themselves stay.
    this.recipes.deleteForUser(userId, id);
    info('Recipe deleted', { userId, recipeId: id });
    if (recipe.image !== null) {
      await this.removeImageFile(recipe.image);
    }
  }

  async uploadImage(userId: number, id: number, file: Buffer | undefined): Promise<RecipeImage> {
    const recipe = this.requireOwned(userId, id);
    if (file === undefined) {
      throw ValidationError.forField('image', 'No file was submitted.');
    }

    const path = await this.images.save(file);
    const updated = this.recipes.update(userId, id, { image: path });
    if (!updated) {
      await this.images.remove(path);
      throw new NotFoundError('Recipe', id);
    }
    if (recipe.image !== null && recipe.image !== path) {
      await this.images.remove(recipe.image);
    }

    return { id: updated.id, image: this.imageUrl(path) };
  }

  /** The row is already gone; a file left behind is logged, not reported. */
  private async removeImageFile(path: string): Promise<void> {
    try {
      await this.images.remove(path);
    } catch (error) {
      warn('Failed to remove recipe image', {
        path,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private applyChanges(userId: number, id: number, input: UpdateRecipeInput): RecipeDetail {
    const recipe = runInTransaction(this.db, () => {
      const updated = this.recipes.update(userId, id, {
        title: input.title,
        time_minutes: input.time_minutes,
        price: input.price,
        description: input.description,
        link: input.link,
      });
      if (!updated) {
        throw new NotFoundError('Recipe', id);
      }
      this.reconcileAttributes(updated, input);
      return updated;
    });

    return this.toDetail(recipe);
  }

  /**
   * A list that is present replaces the recipe's links (an empty list
   * clears them); a missing list leaves them alone.
   */
  private reconcileAttributes(recipe: Recipe, input: UpdateRecipeInput): void {
    if (input.tags !== undefined) {
      this.tagReconciler.reconcile(recipe, namesOf(input.tags), 'full');
    }
    if (input.ingredients !== undefined) {
      this.ingredientReconciler.reconcile(recipe, namesOf(input.ingredients), 'full');
    }
  }

  private requireOwned(userId: number, id: number): Recipe {
    const recipe = this.recipes.findByIdForUser(userId, id);
    if (!recipe) {
      throw new NotFoundError('Recipe', id);
    }
    return recipe;
  }

  private imageUrl(path: string): string {
    return `${this.mediaUrl}/${path}`;
  }

  private toDetail(recipe: Recipe): RecipeDetail {
    return {
      id: recipe.id,
      title: recipe.title,
      time_minutes: recipe.time_minutes,
      price: recipe.price,
      link: recipe.link,
      tags: this.tags.findForRecipe(recipe.id).map(toSummaryRef),
      ingredients: this.ingredients.findForRecipe(recipe.id).map(toSummaryRef),
      description: recipe.description,
      image: recipe.image === null ? null : this.imageUrl(recipe.image),
    };
  }
}
