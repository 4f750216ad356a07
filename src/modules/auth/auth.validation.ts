import { z } from 'zod';

export const registerSchema = z.object({
  email: z.string().trim().email('Invalid email'),
  password: z.string().min(8, 'Password must be at least 8 characters').max(128),
  full_name: z.string().trim().min(1, 'Full name is required').max(255),
  phone: z.string().regex(/^\+?\d{7,15}$/, 'Phone must be 7-15 digits').nullable().optional(),
  role: z.enum(['customer', 'seller']).optional(),
});

export const loginSchema = z.object({
  email: z.string().trim().email('Invalid email'),
  password: z.string().min(1, 'Password is required'),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
