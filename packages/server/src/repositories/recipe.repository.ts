import type { Database } from 'better-sqlite3';
import type { Recipe, CreateRecipeDTO, UpdateRecipeDTO, RecipeFilters } from '../types/index.js';
import { OwnedRepository, type SqlValue } from './base.repository.js';
import { readNullableString, readNumber, readString } from './row-guards.js';

export class RecipeRepository extends OwnedRepository<Recipe> {
  constructor(db: Database) {
    super(db, 'recipes');
  }

  protected parseEntity(row: Record<string, unknown>): Recipe | null {
    const id = readNumber(row, 'id');
    const userId = readNumber(row, 'user_id');
    const title = readString(row, 'title');
    const timeMinutes = readNumber(row, 'time_minutes');
    const price = readString(row, 'price');
    const description = readString(row, 'description');
    const link = readString(row, 'link');
    const image = readNullableString(row, 'image');
    const createdAt = readString(row, 'created_at');
    const updatedAt = readString(row, 'updated_at');

    if (
      id === null ||
      userId === null ||
      title === null ||
      timeMinutes === null ||
      price === null ||
      description === null ||
      link === null ||
      image === undefined ||
      createdAt === null ||
      updatedAt === null
    ) {
      return null;
    }

    return {
      id,
      user_id: userId,
      title,
      time_minutes: timeMinutes,
      price,
      description,
      link,
      image,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }

  create(userId: number, data: CreateRecipeDTO): Recipe {
    const timestamps = this.createTimestamps();
    const recipe = {
      user_id: userId,
      title: data.title,
      time_minutes: data.time_minutes,
      price: data.price,
      description: data.description ?? '',
      link: data.link ?? '',
      image: null,
      ...timestamps,
    };

    const result = this.db
      .prepare(
        `INSERT INTO recipes (user_id, title, time_minutes, price, description, link, image, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        recipe.user_id,
        recipe.title,
        recipe.time_minutes,
        recipe.price,
        recipe.description,
        recipe.link,
        recipe.image,
        recipe.created_at,
        recipe.updated_at
      );

    return { id: Number(result.lastInsertRowid), ...recipe };
  }

  /**
   * The user's recipes, newest id first. Each filter keeps recipes linked
   * to any of the given ids; when both are given a recipe must match both.
   */
  findAllForUser(userId: number, filters: RecipeFilters = {}): Recipe[] {
    const clauses = ['r.user_id = ?'];
    const params: SqlValue[] = [userId];

    const tagIds = filters.tags ?? [];
    if (tagIds.length > 0) {
      clauses.push(
        `EXISTS (SELECT 1 FROM recipe_tags rt WHERE rt.recipe_id = r.id AND rt.tag_id IN (${tagIds.map(() => '?').join(', ')}))`
      );
      params.push(...tagIds);
    }

    const ingredientIds = filters.ingredients ?? [];
    if (ingredientIds.length > 0) {
      clauses.push(
        `EXISTS (SELECT 1 FROM recipe_ingredients ri WHERE ri.recipe_id = r.id AND ri.ingredient_id IN (${ingredientIds.map(() => '?').join(', ')}))`
      );
      params.push(...ingredientIds);
    }

    const rows = this.db
      .prepare(`SELECT r.* FROM recipes r WHERE ${clauses.join(' AND ')} ORDER BY r.id DESC`)
      .all(...params);
    return this.parseRows(rows);
  }

  update(userId: number, id: number, data: UpdateRecipeDTO): Recipe | null {
    return this.updateForUser(userId, id, {
      title: data.title,
      time_minutes: data.time_minutes,
      price: data.price,
      description: data.description,
      link: data.link,
      image: data.image,
    });
  }
}
