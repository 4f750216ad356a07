// One cart per user
export interface Cart {
  id: number;
  user_id: number;
  created_at: Date;
  updated_at: Date;
}

export interface CreateCartInput {
  user_id: number;
}

export type UpdateCartInput = Record<string, never>;

export interface CartFilter {
  user_id: number;
}
