export interface Product {
  id: number;
  category_id: number;
  seller_id: number | null; // NULL once the seller account is removed
  name: string;
  description: string | null;
  price: number; // DECIMAL(10, 2)
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface CreateProductInput {
  category_id: number;
  seller_id?: number | null;
  name: string;
  description?: string | null;
  price: number;
  is_active?: boolean; // default: true
}

export interface UpdateProductInput {
  category_id?: number;
  name?: string;
  description?: string | null;
  price?: number;
  is_active?: boolean;
}

export interface ProductFilter {
  category_id: number;
  seller_id: number;
  is_active: boolean;
}
