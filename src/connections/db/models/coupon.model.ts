export type DiscountType = 'percentage' | 'fixed';

export interface Coupon {
  id: number;
  code: string; // unique
  discount_type: DiscountType;
  discount_value: number;
  is_active: boolean;
  expires_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateCouponInput {
  code: string;
  discount_type: DiscountType;
  discount_value: number;
  is_active?: boolean; // default: true
  expires_at?: Date | null;
}

export interface UpdateCouponInput {
  discount_type?: DiscountType;
  discount_value?: number;
  is_active?: boolean;
  expires_at?: Date | null;
}

export interface CouponFilter {
  is_active: boolean;
  discount_type: DiscountType;
}
