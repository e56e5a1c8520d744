import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type Pool } from 'pg';
import { createLogger } from '@voltgate/shared';

const logger = createLogger({ name: 'db:migrate' });

const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

/** Applies pending migrations in file-name order; returns the names applied. */
export async function runMigrations(pool: Pool, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const client = await pool.connect();
  const appliedNow: string[] = [];

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const applied = await client.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name');
    const appliedSet = new Set(applied.rows.map((r) => r.name));

    const files = (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();

    for (const file of files) {
      if (appliedSet.has(file)) continue;

      const sql = await readFile(join(dir, file), 'utf-8');

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
      appliedNow.push(file);
      logger.info({ migration: file }, 'Migration applied');
    }
  } finally {
    client.release();
  }

  return appliedNow;
}
