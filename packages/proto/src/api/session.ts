import { z } from 'zod';

export const UserIdParamsSchema = z.object({
  userId: z.string().min(1),
});

export const SessionParamsSchema = z.object({
  userId: z.string().min(1),
  tokenId: z.string().min(1),
});

export const NicParamsSchema = z.object({
  nic: z.string().regex(/^(\d{9}[VvXx]|\d{12})$/, 'Invalid NIC format'),
});

export const SessionSchema = z.object({
  tokenId: z.string(),
  familyId: z.string(),
  deviceInfo: z.string(),
  ipAddress: z.string().nullable(),
  createdAt: z.string().datetime(),
  lastUsedAt: z.string().datetime().nullable(),
  expiresAt: z.string().datetime(),
});

export const SessionListResponseSchema = z.object({
  sessions: z.array(SessionSchema),
});

export type Session = z.infer<typeof SessionSchema>;
export type SessionListResponse = z.infer<typeof SessionListResponseSchema>;
