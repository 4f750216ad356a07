export type UserRole = 'customer' | 'seller';

/** Public view of a user; the password hash never leaves the repository. */
export interface User {
  id: number;
  email: string;
  full_name: string;
  phone: string | null;
  role: UserRole;
  created_at: Date;
  updated_at: Date;
}

export interface UserCredentials {
  id: number;
  email: string;
  password_hash: string;
}

export interface CreateUserInput {
  email: string;
  password: string;
  full_name: string;
  phone?: string | null;
  role?: UserRole; // default: 'customer'
}

export interface UpdateUserInput {
  email?: string;
  password?: string;
  full_name?: string;
  phone?: string | null;
  role?: UserRole;
}

export interface UserFilter {
  role: UserRole;
  email: string;
}
