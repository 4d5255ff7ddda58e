import type { RecipeAttribute } from '../types/index.js';
import { ConflictError, NotFoundError } from '../types/errors.js';
import { isUniqueConstraintError } from '../db/index.js';
import type { RecipeAttributeRepository } from '../repositories/index.js';

export interface ListAttributesOptions {
  assignedOnly?: boolean;
}

/**
 * Read, rename and delete for a user's tags or ingredients. Creation only
 * happens through recipe payloads.
 */
export class RecipeAttributeService {
  private repo: RecipeAttributeRepository;
  readonly displayName: string;

  constructor(repo: RecipeAttributeRepository, displayName: string) {
    this.repo = repo;
    this.displayName = displayName;
  }

  list(userId: number, options: ListAttributesOptions = {}): RecipeAttribute[] {
    return this.repo.findAllForUser(userId, { assignedOnly: options.assignedOnly ?? false });
  }

  get(userId: number, id: number): RecipeAttribute {
    const attribute = this.repo.findByIdForUser(userId, id);
    if (!attribute) {
      throw new NotFoundError(this.displayName, id);
    }
    return attribute;
  }

  rename(userId: number, id: number, name: string): RecipeAttribute {
    const current = this.get(userId, id);
    if (current.name === name) {
      return current;
    }

    const clash = this.repo.findByName(userId, name);
    if (clash) {
      throw this.duplicateName(name);
    }

    try {
      const renamed = this.repo.rename(userId, id, name);
      if (!renamed) {
        throw new NotFoundError(this.displayName, id);
      }
      return renamed;
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw this.duplicateName(name);
      }
      throw error;
    }
  }

  delete(userId: number, id: number): void {
    const deleted = this.repo.deleteForUser(userId, id);
    if (!deleted) {
      throw new NotFoundError(this.displayName, id);
    }
  }

  private duplicateName(name: string): ConflictError {
    return new ConflictError(`${this.displayName} "${name}" already exists`);
  }
}
