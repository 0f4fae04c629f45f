import { z } from 'zod';

// Validation schemas for the auth module
export const registerSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(50, 'Username must be at most 50 characters'),
  email: z.string().trim().email('Invalid email address'),
  password: z.string().min(6, 'Password must be at least 6 characters'),
});

// Accepted as JSON or as an urlencoded form
export const loginSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export const requestEmailSchema = z.object({
  email: z.string().trim().email('Invalid email address'),
});

export const confirmEmailParamsSchema = z.object({
  token: z.string().min(1, 'Token is required'),
});
