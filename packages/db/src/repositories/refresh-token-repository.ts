import {
  type RefreshTokenRecord,
  type RefreshTokenRepository,
  type RevocationReason,
  isRevocationReason,
} from '@voltgate/domain';
import { type Queryable } from '../client';

export interface RefreshTokenRow {
  id: string;
  user_id: string;
  token_id: string;
  token_hash: string;
  salt: string;
  family_id: string;
  parent_token_id: string | null;
  device_info: string;
  user_agent: string | null;
  ip_address: string | null;
  created_at: Date;
  expires_at: Date;
  last_used_at: Date | null;
  is_revoked: boolean;
  revoked_at: Date | null;
  revoked_reason: string | null;
  is_used: boolean;
  used_at: Date | null;
}

const TOKEN_COLUMNS = `id, user_id, token_id, token_hash, salt, family_id, parent_token_id,
       device_info, user_agent, ip_address, created_at, expires_at, last_used_at,
       is_revoked, revoked_at, revoked_reason, is_used, used_at`;

/**
 * Every mutation is a single conditional statement, so the row-level
 * atomicity of PostgreSQL is the only concurrency control needed.
 */
export class PgRefreshTokenRepository implements RefreshTokenRepository {
  constructor(private readonly db: Queryable) {}

  async insert(record: RefreshTokenRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO refresh_tokens (${TOKEN_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)`,
      [
        record.id,
        record.userId,
        record.tokenId,
        record.tokenHash,
        record.salt,
        record.familyId,
        record.parentTokenId,
        record.deviceInfo,
        record.userAgent,
        record.ipAddress,
        record.createdAt,
        record.expiresAt,
        record.lastUsedAt,
        record.isRevoked,
        record.revokedAt,
        record.revokedReason,
        record.isUsed,
        record.usedAt,
      ],
    );
  }

  async findByTokenId(tokenId: string): Promise<RefreshTokenRecord | null> {
    const result = await this.db.query<RefreshTokenRow>(
      `SELECT ${TOKEN_COLUMNS} FROM refresh_tokens WHERE token_id = $1`,
      [tokenId],
    );
    return result.rows[0] ? mapRefreshRow(result.rows[0]) : null;
  }

  async markUsed(id: string, at: Date): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE refresh_tokens
       SET is_used = TRUE, used_at = $2, last_used_at = $2
       WHERE id = $1 AND is_used = FALSE AND is_revoked = FALSE
       RETURNING id`,
      [id, at],
    );
    return (result.rowCount ?? 0) === 1;
  }

  async revoke(tokenId: string, reason: RevocationReason, at: Date): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE refresh_tokens
       SET is_revoked = TRUE, revoked_at = $3, revoked_reason = $2
       WHERE token_id = $1 AND is_revoked = FALSE`,
      [tokenId, reason, at],
    );
    return (result.rowCount ?? 0) === 1;
  }

  async revokeFamily(familyId: string, reason: RevocationReason, at: Date): Promise<number> {
    const result = await this.db.query(
      `UPDATE refresh_tokens
       SET is_revoked = TRUE, revoked_at = $3, revoked_reason = $2
       WHERE family_id = $1 AND is_revoked = FALSE`,
      [familyId, reason, at],
    );
    return result.rowCount ?? 0;
  }

  async revokeAllForUser(userId: string, reason: RevocationReason, at: Date): Promise<number> {
    const result = await this.db.query(
      `UPDATE refresh_tokens
       SET is_revoked = TRUE, revoked_at = $3, revoked_reason = $2
       WHERE user_id = $1 AND is_revoked = FALSE`,
      [userId, reason, at],
    );
    return result.rowCount ?? 0;
  }

  async listActiveForUser(userId: string, now: Date): Promise<RefreshTokenRecord[]> {
    const result = await this.db.query<RefreshTokenRow>(
      `SELECT ${TOKEN_COLUMNS}
       FROM refresh_tokens
       WHERE user_id = $1 AND is_revoked = FALSE AND is_used = FALSE AND expires_at > $2
       ORDER BY created_at DESC`,
      [userId, now],
    );
    return result.rows.map(mapRefreshRow);
  }

  async deleteStale(cutoffs: { expiredBefore: Date; settledBefore: Date }): Promise<number> {
    const result = await this.db.query(
      `DELETE FROM refresh_tokens
       WHERE expires_at <= $1
          OR (is_revoked = TRUE AND revoked_at < $2)
          OR (is_used = TRUE AND used_at < $2)`,
      [cutoffs.expiredBefore, cutoffs.settledBefore],
    );
    return result.rowCount ?? 0;
  }
}

export function mapRefreshRow(row: RefreshTokenRow): RefreshTokenRecord {
  return {
    id: row.id,
    userId: row.user_id,
    tokenId: row.token_id,
    tokenHash: row.token_hash,
    salt: row.salt,
    familyId: row.family_id,
    parentTokenId: row.parent_token_id,
    deviceInfo: row.device_info,
    userAgent: row.user_agent,
    ipAddress: row.ip_address,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    lastUsedAt: row.last_used_at,
    isRevoked: row.is_revoked,
    revokedAt: row.revoked_at,
    revokedReason: isRevocationReason(row.revoked_reason) ? row.revoked_reason : null,
    isUsed: row.is_used,
    usedAt: row.used_at,
  };
}
