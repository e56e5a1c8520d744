import { type User, type UserRepository, isRole } from '@voltgate/domain';
import { type Queryable } from '../client';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  role: string;
  is_active: boolean;
  charging_station_id: string | null;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = `id, username, email, password_hash, role, is_active, charging_station_id,
       created_at, updated_at`;

export class PgUserRepository implements UserRepository {
  constructor(private readonly db: Queryable) {}

  async findByLogin(login: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE LOWER(username) = LOWER($1) OR LOWER(email) = LOWER($1)
       LIMIT 1`,
      [login],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }
}

export function mapUserRow(row: UserRow): User {
  if (!isRole(row.role)) {
    throw new Error(`User ${row.id} has unknown role '${row.role}'`);
  }
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    isActive: row.is_active,
    chargingStationId: row.charging_station_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
