export interface UserAddress {
  id: number;
  user_id: number;
  line1: string;
  line2: string | null;
  city: string;
  postal_code: string;
  country: string;
  is_default: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface CreateUserAddressInput {
  user_id: number;
  line1: string;
  line2?: string | null;
  city: string;
  postal_code: string;
  country: string;
  is_default?: boolean;
}

export interface UpdateUserAddressInput {
  line1?: string;
  line2?: string | null;
  city?: string;
  postal_code?: string;
  country?: string;
  is_default?: boolean;
}

export interface UserAddressFilter {
  user_id: number;
}
