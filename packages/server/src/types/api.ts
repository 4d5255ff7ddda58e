import type { RecipeAttributeSummary } from './database.js';

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type ApiResponse<T> = ApiSuccess<T> | ApiError;

// Recipe representations returned by the API
export interface RecipeSummary {
  id: number;
  title: string;
  time_minutes: number;
  price: string;
  link: string;
  tags: RecipeAttributeSummary[];
  ingredients: RecipeAttributeSummary[];
}

export interface RecipeDetail extends RecipeSummary {
  description: string;
  /** Public URL of the uploaded image. */
  image: string | null;
}

export interface RecipeImage {
  id: number;
  image: string;
}
