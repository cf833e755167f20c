import { z } from 'zod';
import { emailSchema, nameSchema, passwordSchema, tokenSchema } from './common.js';

export const registerBodySchema = z.object({
  name: nameSchema,
  email: emailSchema,
  password: passwordSchema,
  marketing_agree: z.boolean().optional().default(false),
});

export const loginBodySchema = z.object({
  email: emailSchema,
  password: passwordSchema,
});

/** Body carrying a single emailed or issued token (register verify, email verify, refresh). */
export const tokenBodySchema = z.object({
  token: tokenSchema,
});

export const forgotPasswordBodySchema = z.object({
  email: emailSchema,
});

export const resetPasswordBodySchema = z.object({
  token: tokenSchema,
  password: passwordSchema,
});

export type RegisterBody = z.infer<typeof registerBodySchema>;
export type LoginBody = z.infer<typeof loginBodySchema>;
export type TokenBody = z.infer<typeof tokenBodySchema>;
export type ForgotPasswordBody = z.infer<typeof forgotPasswordBodySchema>;
export type ResetPasswordBody = z.infer<typeof resetPasswordBodySchema>;

export interface TokenPairResponse {
  access_token: string;
  refresh_token: string;
}
