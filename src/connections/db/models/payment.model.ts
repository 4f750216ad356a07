export type PaymentMethod = 'card' | 'cash_on_delivery' | 'bank_transfer' | 'wallet';
export type PaymentStatus = 'pending' | 'completed' | 'failed' | 'refunded';

// 1:1 with orders
export interface Payment {
  id: number;
  order_id: number;
  amount: number;
  method: PaymentMethod;
  status: PaymentStatus;
  created_at: Date;
  updated_at: Date;
}

export interface CreatePaymentInput {
  order_id: number;
  amount: number;
  method: PaymentMethod;
  status?: PaymentStatus; // default: 'pending'
}

export interface UpdatePaymentInput {
  status?: PaymentStatus;
}

export interface PaymentFilter {
  order_id: number;
  status: PaymentStatus;
}
