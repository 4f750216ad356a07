export interface CartItem {
  id: number;
  cart_id: number;
  product_id: number;
  quantity: number;
  created_at: Date;
  updated_at: Date;
}

/** Cart item joined with the product it points at. */
export interface CartItemDetail extends CartItem {
  product_name: string;
  unit_price: number;
}

export interface CreateCartItemInput {
  cart_id: number;
  product_id: number;
  quantity?: number; // default: 1
}

export interface UpdateCartItemInput {
  quantity?: number;
}

export interface CartItemFilter {
  cart_id: number;
  product_id: number;
}
