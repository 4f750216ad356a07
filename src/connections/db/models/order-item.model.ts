export interface OrderItem {
  id: number;
  order_id: number;
  product_id: number;
  quantity: number;
  unit_price: number; // price at purchase
  created_at: Date;
}

export interface CreateOrderItemInput {
  order_id: number;
  product_id: number;
  quantity: number;
  unit_price: number;
}

export interface UpdateOrderItemInput {
  quantity?: number;
}

export interface OrderItemFilter {
  order_id: number;
  product_id: number;
}
