// Users
export interface User {
  id: number;
  email: string;
  name: string;
  password_hash: string;
  is_active: boolean;
  is_staff: boolean;
  is_superuser: boolean;
  created_at: string;
  updated_at: string;
}

/** A user as seen by request handlers: everything but the credential hash. */
export type AuthUser = Omit<User, 'password_hash'>;

export interface UserProfile {
  id: number;
  email: string;
  name: string;
}

export interface CreateUserDTO {
  email: string;
  password_hash: string;
  name: string;
  is_staff?: boolean;
  is_superuser?: boolean;
}

export interface UpdateUserDTO {
  email?: string;
  name?: string;
  password_hash?: string;
}

// Auth tokens
export interface AuthToken {
  key: string;
  user_id: number;
  created_at: string;
}

// Tags and ingredients share one shape: a name owned by a user.
export type RecipeAttributeKind = 'tag' | 'ingredient';

export interface RecipeAttribute {
  id: number;
  user_id: number;
  name: string;
}

export interface RecipeAttributeSummary {
  id: number;
  name: string;
}

// Recipes
export interface Recipe {
  id: number;
  user_id: number;
  title: string;
  time_minutes: number;
  /** Exact decimal, always two places ("5.50"). */
  price: string;
  description: string;
  link: string;
  /** Path relative to the media root, or null when no image was uploaded. */
  image: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreateRecipeDTO {
  title: string;
  time_minutes: number;
  price: string;
  description?: string;
  link?: string;
}

export interface UpdateRecipeDTO {
  title?: string;
  time_minutes?: number;
  price?: string;
  description?: string;
  link?: string;
  image?: string | null;
}

export interface RecipeFilters {
  tags?: number[];
  ingredients?: number[];
}
