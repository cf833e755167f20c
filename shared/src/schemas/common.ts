import { z } from 'zod';

/** Longest email or name the store accepts. */
export const MAX_FIELD_LENGTH = 128;

/** Email as stored: trimmed and lowercased before it is validated. */
export const emailSchema = z
  .string({ error: 'Email is required' })
  .trim()
  .toLowerCase()
  .max(MAX_FIELD_LENGTH, { error: `Email must be at most ${MAX_FIELD_LENGTH} characters` })
  .email({ error: 'Valid email is required' });

export const nameSchema = z
  .string({ error: 'Name is required' })
  .trim()
  .min(1, { error: 'Name is required' })
  .max(MAX_FIELD_LENGTH, { error: `Name must be at most ${MAX_FIELD_LENGTH} characters` });

export const tokenSchema = z.string({ error: 'Token is required' }).min(1, { error: 'Token is required' });

export const passwordSchema = z.string({ error: 'Password is required' }).min(1, { error: 'Password is required' });
