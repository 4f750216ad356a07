export interface Category {
  id: number;
  name: string; // unique
  description: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateCategoryInput {
  name: string;
  description?: string | null;
}

export interface UpdateCategoryInput {
  name?: string;
  description?: string | null;
}

export interface CategoryFilter {
  name: string;
}
