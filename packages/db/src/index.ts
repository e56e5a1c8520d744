export { initPool, closePool, getPool, toPoolConfig, type DatabaseOptions, type Queryable } from './client';
export { runMigrations } from './migrator';
export { PgUserRepository } from './repositories/user-repository';
export { PgEvOwnerRepository } from './repositories/ev-owner-repository';
export { PgRefreshTokenRepository } from './repositories/refresh-token-repository';
