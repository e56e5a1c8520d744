import { z } from 'zod';
import { ROLES } from '@voltgate/domain';

/** Username or email; matched case-insensitively by the server. */
export const LoginNameSchema = z
  .string()
  .trim()
  .min(1, 'Username is required')
  .max(255, 'Username must be at most 255 characters');

export const PasswordSchema = z
  .string()
  .min(1, 'Password is required')
  .max(128, 'Password must be at most 128 characters');

export const LoginRequestSchema = z.object({
  username: LoginNameSchema,
  password: PasswordSchema,
});

export const RefreshTokenPairSchema = z.object({
  tokenId: z.string().min(1).max(64),
  secret: z.string().min(1).max(256),
});

export const RefreshRequestSchema = RefreshTokenPairSchema;

export const LogoutRequestSchema = RefreshTokenPairSchema;

export const AuthUserSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  role: z.enum(ROLES),
  chargingStationId: z.string().nullable(),
  nic: z.string().nullable(),
});

export const LoginResponseSchema = z.object({
  accessToken: z.string(),
  refreshToken: RefreshTokenPairSchema,
  user: AuthUserSchema,
});

export const RefreshResponseSchema = z.object({
  accessToken: z.string(),
  refreshToken: RefreshTokenPairSchema,
});

export const AuthFailureResponseSchema = z.object({
  status: z.string(),
  message: z.string(),
});

export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
export type LogoutRequest = z.infer<typeof LogoutRequestSchema>;
export type LoginResponse = z.infer<typeof LoginResponseSchema>;
export type RefreshResponse = z.infer<typeof RefreshResponseSchema>;
export type AuthFailureResponse = z.infer<typeof AuthFailureResponseSchema>;
