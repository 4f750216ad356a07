export type OrderStatus = 'pending' | 'paid' | 'shipped' | 'delivered' | 'cancelled';

export interface Order {
  id: number;
  user_id: number;
  status: OrderStatus;
  total_amount: number; // DECIMAL(10, 2)
  created_at: Date;
  updated_at: Date;
}

export interface CreateOrderInput {
  user_id: number;
  status?: OrderStatus; // default: 'pending'
  total_amount?: number; // default: 0
}

// Only the status moves after an order is placed
export interface UpdateOrderInput {
  status?: OrderStatus;
}

export interface OrderFilter {
  user_id: number;
  status: OrderStatus;
}
