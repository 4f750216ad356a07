export interface Review {
  id: number;
  user_id: number;
  product_id: number;
  rating: number; // 1-5
  comment: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateReviewInput {
  user_id: number;
  product_id: number;
  rating: number;
  comment?: string | null;
}

export interface UpdateReviewInput {
  rating?: number;
  comment?: string | null;
}

export interface ReviewFilter {
  user_id: number;
  product_id: number;
}
