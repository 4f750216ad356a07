// User <-> Product many-to-many
export interface WishlistEntry {
  id: number;
  user_id: number;
  product_id: number;
  created_at: Date;
}

export interface CreateWishlistInput {
  user_id: number;
  product_id: number;
}

export type UpdateWishlistInput = Record<string, never>;

export interface WishlistFilter {
  user_id: number;
  product_id: number;
}
