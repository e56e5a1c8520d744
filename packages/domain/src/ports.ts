import {
  type User,
  type EvOwnerProfile,
  type RefreshTokenRecord,
  type RevocationReason,
  type AccessTokenClaims,
} from './user';

// Lookups resolve to null when nothing matches; infrastructure failures reject.

export interface UserRepository {
  /** Case-insensitive match against username or email. */
  findByLogin(login: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
}

export interface EvOwnerRepository {
  findByNic(nic: string): Promise<EvOwnerProfile | null>;
  findByUserId(userId: string): Promise<EvOwnerProfile | null>;
}

export interface RefreshTokenRepository {
  insert(record: RefreshTokenRecord): Promise<void>;
  findByTokenId(tokenId: string): Promise<RefreshTokenRecord | null>;
  /**
   * Flips the record to used only while it is still unused and unrevoked.
   * Resolves to false when another caller got there first.
   */
  markUsed(id: string, at: Date): Promise<boolean>;
  /** Resolves to false when the token was unknown or already revoked. */
  revoke(tokenId: string, reason: RevocationReason, at: Date): Promise<boolean>;
  revokeFamily(familyId: string, reason: RevocationReason, at: Date): Promise<number>;
  revokeAllForUser(userId: string, reason: RevocationReason, at: Date): Promise<number>;
  /** Unrevoked, unused, unexpired records, newest first. */
  listActiveForUser(userId: string, now: Date): Promise<RefreshTokenRecord[]>;
  deleteStale(cutoffs: { expiredBefore: Date; settledBefore: Date }): Promise<number>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface TokenService {
  signAccessToken(claims: AccessTokenClaims): Promise<string>;
  /** Rejects on a bad signature, wrong issuer or audience, or an expired token. */
  verifyAccessToken(token: string): Promise<AccessTokenClaims>;
  /** Checks the signature only; expiry is ignored. Resolves to null when invalid. */
  identifyAccessToken(token: string): Promise<AccessTokenClaims | null>;
  generateTokenId(): string;
  generateRefreshSecret(): string;
  generateSalt(): string;
  hashRefreshSecret(secret: string, salt: string): string;
  verifyRefreshSecret(secret: string, salt: string, expectedHash: string): boolean;
}
