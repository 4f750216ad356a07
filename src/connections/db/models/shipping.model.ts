export type ShippingStatus = 'pending' | 'shipped' | 'in_transit' | 'delivered' | 'returned';

// 1:1 with orders
export interface Shipping {
  id: number;
  order_id: number;
  address: string;
  carrier: string | null;
  tracking_number: string | null;
  status: ShippingStatus;
  created_at: Date;
  updated_at: Date;
}

export interface CreateShippingInput {
  order_id: number;
  address: string;
  carrier?: string | null;
  tracking_number?: string | null;
  status?: ShippingStatus; // default: 'pending'
}

export interface UpdateShippingInput {
  carrier?: string | null;
  tracking_number?: string | null;
  status?: ShippingStatus;
}

export interface ShippingFilter {
  order_id: number;
  status: ShippingStatus;
}
