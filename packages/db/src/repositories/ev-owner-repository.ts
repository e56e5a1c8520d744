import { type EvOwnerProfile, type EvOwnerRepository } from '@voltgate/domain';
import { type Queryable } from '../client';

interface EvOwnerRow {
  nic: string;
  user_id: string;
  phone: string | null;
  created_at: Date;
  updated_at: Date;
}

export class PgEvOwnerRepository implements EvOwnerRepository {
  constructor(private readonly db: Queryable) {}

  async findByNic(nic: string): Promise<EvOwnerProfile | null> {
    const result = await this.db.query<EvOwnerRow>(
      `SELECT nic, user_id, phone, created_at, updated_at FROM ev_owners WHERE nic = $1`,
      [nic],
    );
    return result.rows[0] ? mapEvOwnerRow(result.rows[0]) : null;
  }

  async findByUserId(userId: string): Promise<EvOwnerProfile | null> {
    const result = await this.db.query<EvOwnerRow>(
      `SELECT nic, user_id, phone, created_at, updated_at FROM ev_owners WHERE user_id = $1`,
      [userId],
    );
    return result.rows[0] ? mapEvOwnerRow(result.rows[0]) : null;
  }
}

function mapEvOwnerRow(row: EvOwnerRow): EvOwnerProfile {
  return {
    nic: row.nic,
    userId: row.user_id,
    phone: row.phone,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
