import { z } from 'zod';
import { emailSchema, nameSchema, passwordSchema } from './common.js';

export const USER_ROLES = ['user', 'admin'] as const;
export type UserRole = (typeof USER_ROLES)[number];

/** Body for PATCH users/me. */
export const userInfoBodySchema = z.object({
  name: nameSchema,
  marketing_agree: z.boolean().optional(),
});

/** Body for PATCH users/me/password. */
export const passwordChangeBodySchema = z.object({
  password: passwordSchema,
  new_password: passwordSchema,
});

/** Body for PATCH users/me/email. */
export const emailChangeBodySchema = z.object({
  password: passwordSchema,
  new_email: emailSchema,
});

/** Params for admin GET users/:user_id. */
export const userIdParamSchema = z.object({
  user_id: z.uuid({ error: 'User id must be a UUID' }),
});

export type UserInfoBody = z.infer<typeof userInfoBodySchema>;
export type PasswordChangeBody = z.infer<typeof passwordChangeBodySchema>;
export type EmailChangeBody = z.infer<typeof emailChangeBodySchema>;
export type UserIdParam = z.infer<typeof userIdParamSchema>;

export interface NewcomerResponse {
  user_id: string;
  name: string;
  email: string;
  created_at: string;
  marketing_agree: boolean;
}

export interface UserResponse extends NewcomerResponse {
  verified_at: string;
  role: UserRole;
}
