import { Pool } from 'pg';
import { createLogger } from '@voltgate/shared';
import { runMigrations } from './migrator';

const logger = createLogger({ name: 'db:migrate' });

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = new Pool({ connectionString: databaseUrl });
  try {
    const applied = await runMigrations(pool);
    logger.info({ count: applied.length }, 'All migrations applied');
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Migration failed');
  process.exit(1);
});
