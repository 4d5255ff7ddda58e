import type { Database } from 'better-sqlite3';
import type { RecipeAttribute, RecipeAttributeKind } from '../types/index.js';
import { OwnedRepository } from './base.repository.js';
import { isRecord, readNumber, readString } from './row-guards.js';

interface AttributeTables {
  table: string;
  linkTable: string;
  linkColumn: string;
}

const TABLES: Record<RecipeAttributeKind, AttributeTables> = {
  tag: { table: 'tags', linkTable: 'recipe_tags', linkColumn: 'tag_id' },
  ingredient: { table: 'ingredients', linkTable: 'recipe_ingredients', linkColumn: 'ingredient_id' },
};

export interface FindAttributesOptions {
  /** Only entities linked to at least one recipe. */
  assignedOnly?: boolean;
}

/**
 * Storage for a per-user named entity (tag or ingredient) and its
 * many-to-many link table to recipes.
 */
export class RecipeAttributeRepository extends OwnedRepository<RecipeAttribute> {
  readonly kind: RecipeAttributeKind;
  protected linkTable: string;
  protected linkColumn: string;
  protected includeTimestampOnUpdate = false;

  constructor(db: Database, kind: RecipeAttributeKind) {
    const tables = TABLES[kind];
    super(db, tables.table);
    this.kind = kind;
    this.linkTable = tables.linkTable;
    this.linkColumn = tables.linkColumn;
  }

  protected parseEntity(row: Record<string, unknown>): RecipeAttribute | null {
    const id = readNumber(row, 'id');
    const userId = readNumber(row, 'user_id');
    const name = readString(row, 'name');
    if (id === null || userId === null || name === null) {
      return null;
    }
    return { id, user_id: userId, name };
  }

  findAllForUser(userId: number, options: FindAttributesOptions = {}): RecipeAttribute[] {
    // EXISTS rather than a join so an entity on several recipes is listed once
    const assignedClause = options.assignedOnly
      ? `AND EXISTS (SELECT 1 FROM ${this.linkTable} l WHERE l.${this.linkColumn} = a.id)`
      : '';
    const rows = this.db
      .prepare(
        `SELECT a.* FROM ${this.tableName} a
         WHERE a.user_id = ? ${assignedClause}
         ORDER BY a.name DESC, a.id DESC`
      )
      .all(userId);
    return this.parseRows(rows);
  }

  /** Exact, case-sensitive match on the owner's name. */
  findByName(userId: number, name: string): RecipeAttribute | null {
    const row = this.db
      .prepare(`SELECT * FROM ${this.tableName} WHERE user_id = ? AND name = ?`)
      .get(userId, name);
    return this.parseRow(row);
  }

  /**
   * Return the user's entity with this name, creating it when absent.
   * Safe against a concurrent insert of the same name: the unique
   * constraint turns the second insert into a no-op and the re-read
   * returns the winner's row.
   */
  getOrCreate(userId: number, name: string): RecipeAttribute {
    const existing = this.findByName(userId, name);
    if (existing) {
      return existing;
    }

    this.db
      .prepare(
        `INSERT INTO ${this.tableName} (user_id, name) VALUES (?, ?)
         ON CONFLICT (user_id, name) DO NOTHING`
      )
      .run(userId, name);

    const created = this.findByName(userId, name);
    if (!created) {
      throw new Error(`Failed to create ${this.kind} "${name}" for user ${userId}`);
    }
    return created;
  }

  rename(userId: number, id: number, name: string): RecipeAttribute | null {
    return this.updateForUser(userId, id, { name });
  }

  findForRecipe(recipeId: number): RecipeAttribute[] {
    const rows = this.db
      .prepare(
        `SELECT a.* FROM ${this.tableName} a
         JOIN ${this.linkTable} l ON l.${this.linkColumn} = a.id
         WHERE l.recipe_id = ?
         ORDER BY a.id`
      )
      .all(recipeId);
    return this.parseRows(rows);
  }

  /** Linked entities for several recipes at once, keyed by recipe id. */
  findForRecipes(recipeIds: number[]): Map<number, RecipeAttribute[]> {
    const byRecipe = new Map<number, RecipeAttribute[]>();
    if (recipeIds.length === 0) {
      return byRecipe;
    }

    const placeholders = recipeIds.map(() => '?').join(', ');
    const rows = this.db
      .prepare(
        `SELECT a.*, l.recipe_id AS recipe_id FROM ${this.tableName} a
         JOIN ${this.linkTable} l ON l.${this.linkColumn} = a.id
         WHERE l.recipe_id IN (${placeholders})
         ORDER BY a.id`
      )
      .all(...recipeIds);

    for (const row of rows) {
      const attribute = this.parseRow(row);
      const recipeId = attribute === null ? null : this.readRecipeId(row);
      if (attribute === null || recipeId === null) {
        continue;
      }
      const existing = byRecipe.get(recipeId) ?? [];
      existing.push(attribute);
      byRecipe.set(recipeId, existing);
    }
    return byRecipe;
  }

  private readRecipeId(row: unknown): number | null {
    return isRecord(row) ? readNumber(row, 'recipe_id') : null;
  }

  findLinkedIds(recipeId: number): number[] {
    const ids = this.db
      .prepare(`SELECT ${this.linkColumn} FROM ${this.linkTable} WHERE recipe_id = ?`)
      .pluck()
      .all(recipeId);
    return ids.filter((id): id is number => typeof id === 'number');
  }

  /** Idempotent: linking an already-linked entity is a no-op. */
  link(recipeId: number, attributeId: number): void {
    this.db
      .prepare(`INSERT OR IGNORE INTO ${this.linkTable} (recipe_id, ${this.linkColumn}) VALUES (?, ?)`)
      .run(recipeId, attributeId);
  }

  unlink(recipeId: number, attributeId: number): void {
    this.db
      .prepare(`DELETE FROM ${this.linkTable} WHERE recipe_id = ? AND ${this.linkColumn} = ?`)
      .run(recipeId, attributeId);
  }
}

export class TagRepository extends RecipeAttributeRepository {
  constructor(db: Database) {
    super(db, 'tag');
  }
}

export class IngredientRepository extends RecipeAttributeRepository {
  constructor(db: Database) {
    super(db, 'ingredient');
  }
}
