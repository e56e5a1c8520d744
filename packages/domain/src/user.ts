export const ROLES = ['Admin', 'StationUser', 'EVOwner'] as const;

export type Role = (typeof ROLES)[number];

export interface User {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  role: Role;
  isActive: boolean;
  chargingStationId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface EvOwnerProfile {
  nic: string;
  userId: string;
  phone: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export const REVOCATION_REASONS = [
  'logout',
  'logout_all',
  'reuse_detected',
  'session_revoked',
  'session_limit',
  'user_inactive',
  'user_not_found',
] as const;

export type RevocationReason = (typeof REVOCATION_REASONS)[number];

export interface RefreshTokenRecord {
  id: string;
  userId: string;
  /** Public handle returned to the client alongside the secret. */
  tokenId: string;
  tokenHash: string;
  salt: string;
  familyId: string;
  parentTokenId: string | null;
  deviceInfo: string;
  userAgent: string | null;
  ipAddress: string | null;
  createdAt: Date;
  expiresAt: Date;
  lastUsedAt: Date | null;
  isRevoked: boolean;
  revokedAt: Date | null;
  revokedReason: RevocationReason | null;
  isUsed: boolean;
  usedAt: Date | null;
}

export interface ClientContext {
  userAgent?: string | null;
  ipAddress?: string | null;
}

export interface AccessTokenClaims {
  userId: string;
  role: Role;
}

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some((role) => role === value);
}

export function isRevocationReason(value: unknown): value is RevocationReason {
  return typeof value === 'string' && REVOCATION_REASONS.some((reason) => reason === value);
}
