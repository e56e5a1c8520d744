import { describeDevice, isTokenExpired } from './auth';
import { type RefreshTokenRepository, type TokenService } from './ports';
import {
  type ClientContext,
  type RefreshTokenRecord,
  type RevocationReason,
} from './user';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RefreshTokenLedgerDeps {
  refreshTokenRepo: RefreshTokenRepository;
  tokenService: TokenService;
  generateId: () => string;
  now: () => Date;
  refreshTokenTtlDays: number;
  /** Oldest active sessions beyond this count are revoked on login. */
  maxActiveSessionsPerUser: number;
}

export interface IssuedRefreshToken {
  tokenId: string;
  secret: string;
  familyId: string;
  expiresAt: Date;
}

export type ConsumeRejection =
  | 'not_found'
  | 'secret_mismatch'
  | 'revoked'
  | 'expired'
  | 'reuse_detected';

export type ConsumeResult =
  | { ok: true; record: RefreshTokenRecord }
  | { ok: false; reason: ConsumeRejection };

export type RotateResult =
  | { ok: true; userId: string; issued: IssuedRefreshToken }
  | { ok: false; reason: ConsumeRejection };

export interface SessionSummary {
  tokenId: string;
  familyId: string;
  deviceInfo: string;
  ipAddress: string | null;
  createdAt: Date;
  lastUsedAt: Date | null;
  expiresAt: Date;
}

/**
 * Owns every refresh-token record. Records move from unused to used, and from
 * active to revoked, at most once each; a second presentation of a used token
 * revokes its whole family.
 */
export class RefreshTokenLedger {
  constructor(private readonly deps: RefreshTokenLedgerDeps) {}

  async issue(userId: string, context: ClientContext = {}): Promise<IssuedRefreshToken> {
    const issued = await this.insertRecord({
      userId,
      familyId: this.deps.generateId(),
      parentTokenId: null,
      context,
    });
    await this.enforceSessionCap(userId);
    return issued;
  }

  /**
   * Validates a presented token and atomically marks it used. The caller
   * decides whether a successor is issued.
   */
  async consume(tokenId: string, secret: string): Promise<ConsumeResult> {
    const { refreshTokenRepo, tokenService, now } = this.deps;

    const record = await refreshTokenRepo.findByTokenId(tokenId);
    if (!record) return { ok: false, reason: 'not_found' };

    if (!tokenService.verifyRefreshSecret(secret, record.salt, record.tokenHash)) {
      return { ok: false, reason: 'secret_mismatch' };
    }

    const at = now();
    if (record.isRevoked) return { ok: false, reason: 'revoked' };
    if (isTokenExpired(record.expiresAt, at)) return { ok: false, reason: 'expired' };

    if (record.isUsed) {
      await refreshTokenRepo.revokeFamily(record.familyId, 'reuse_detected', at);
      return { ok: false, reason: 'reuse_detected' };
    }

    const won = await refreshTokenRepo.markUsed(record.id, at);
    if (!won) {
      // A concurrent presentation consumed it first.
      await refreshTokenRepo.revokeFamily(record.familyId, 'reuse_detected', at);
      return { ok: false, reason: 'reuse_detected' };
    }

    return { ok: true, record: { ...record, isUsed: true, usedAt: at, lastUsedAt: at } };
  }

  async issueSuccessor(
    consumed: RefreshTokenRecord,
    context: ClientContext = {},
  ): Promise<IssuedRefreshToken> {
    const issued = await this.insertRecord({
      userId: consumed.userId,
      familyId: consumed.familyId,
      parentTokenId: consumed.id,
      context,
    });

    // A family revocation that landed between consume and insert does not
    // cover the new record.
    const parent = await this.deps.refreshTokenRepo.findByTokenId(consumed.tokenId);
    if (parent?.isRevoked) {
      await this.deps.refreshTokenRepo.revoke(
        issued.tokenId,
        parent.revokedReason ?? 'reuse_detected',
        this.deps.now(),
      );
    }
    return issued;
  }

  async rotate(tokenId: string, secret: string, context: ClientContext = {}): Promise<RotateResult> {
    const consumed = await this.consume(tokenId, secret);
    if (!consumed.ok) return consumed;

    const issued = await this.issueSuccessor(consumed.record, context);
    return { ok: true, userId: consumed.record.userId, issued };
  }

  async revoke(tokenId: string, reason: RevocationReason): Promise<boolean> {
    return this.deps.refreshTokenRepo.revoke(tokenId, reason, this.deps.now());
  }

  async revokeFamily(familyId: string, reason: RevocationReason): Promise<number> {
    return this.deps.refreshTokenRepo.revokeFamily(familyId, reason, this.deps.now());
  }

  async revokeAllForUser(userId: string, reason: RevocationReason): Promise<number> {
    return this.deps.refreshTokenRepo.revokeAllForUser(userId, reason, this.deps.now());
  }

  /** Revokes one session, but only when it belongs to the given user. */
  async revokeSession(userId: string, tokenId: string): Promise<boolean> {
    const record = await this.deps.refreshTokenRepo.findByTokenId(tokenId);
    if (!record || record.userId !== userId) return false;
    return this.revoke(tokenId, 'session_revoked');
  }

  /**
   * Verifies the secret before revoking so that knowing a token id alone is
   * not enough to end someone's session.
   */
  async revokeWithSecret(
    tokenId: string,
    secret: string,
    reason: RevocationReason,
  ): Promise<boolean> {
    const record = await this.deps.refreshTokenRepo.findByTokenId(tokenId);
    if (!record) return false;
    if (!this.deps.tokenService.verifyRefreshSecret(secret, record.salt, record.tokenHash)) {
      return false;
    }
    return this.revoke(tokenId, reason);
  }

  async listActiveSessions(userId: string): Promise<SessionSummary[]> {
    const records = await this.deps.refreshTokenRepo.listActiveForUser(userId, this.deps.now());
    return records.map(toSessionSummary);
  }

  /**
   * Deletes records that have expired, plus revoked or used records settled
   * before `olderThan`. Returns the number of records removed.
   */
  async cleanup(olderThan: Date): Promise<number> {
    return this.deps.refreshTokenRepo.deleteStale({
      expiredBefore: this.deps.now(),
      settledBefore: olderThan,
    });
  }

  private async insertRecord(input: {
    userId: string;
    familyId: string;
    parentTokenId: string | null;
    context: ClientContext;
  }): Promise<IssuedRefreshToken> {
    const { refreshTokenRepo, tokenService, generateId, now, refreshTokenTtlDays } = this.deps;

    const createdAt = now();
    const expiresAt = new Date(createdAt.getTime() + refreshTokenTtlDays * DAY_MS);
    const tokenId = tokenService.generateTokenId();
    const secret = tokenService.generateRefreshSecret();
    const salt = tokenService.generateSalt();
    const userAgent = input.context.userAgent ?? null;

    await refreshTokenRepo.insert({
      id: generateId(),
      userId: input.userId,
      tokenId,
      tokenHash: tokenService.hashRefreshSecret(secret, salt),
      salt,
      familyId: input.familyId,
      parentTokenId: input.parentTokenId,
      deviceInfo: describeDevice(userAgent),
      userAgent,
      ipAddress: input.context.ipAddress ?? null,
      createdAt,
      expiresAt,
      lastUsedAt: null,
      isRevoked: false,
      revokedAt: null,
      revokedReason: null,
      isUsed: false,
      usedAt: null,
    });

    return { tokenId, secret, familyId: input.familyId, expiresAt };
  }

  private async enforceSessionCap(userId: string): Promise<void> {
    const { refreshTokenRepo, now, maxActiveSessionsPerUser } = this.deps;
    if (maxActiveSessionsPerUser <= 0) return;

    const active = await refreshTokenRepo.listActiveForUser(userId, now());
    const overflow = active.slice(maxActiveSessionsPerUser);
    for (const record of overflow) {
      await refreshTokenRepo.revoke(record.tokenId, 'session_limit', now());
    }
  }
}

function toSessionSummary(record: RefreshTokenRecord): SessionSummary {
  return {
    tokenId: record.tokenId,
    familyId: record.familyId,
    deviceInfo: record.deviceInfo,
    ipAddress: record.ipAddress,
    createdAt: record.createdAt,
    lastUsedAt: record.lastUsedAt,
    expiresAt: record.expiresAt,
  };
}
