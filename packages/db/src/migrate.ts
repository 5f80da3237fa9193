import { readdir, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { DbClient } from './client.js';

export const MIGRATIONS_DIR = fileURLToPath(new URL('../migrations/', import.meta.url));

export interface MigrationFile {
  name: string;
  path: string;
}

export interface MigrateResult {
  applied: string[];
  skipped: string[];
}

/**
 * *.sql files in name order (0001_..., 0002_...)
 */
export async function listMigrationFiles(dir: string = MIGRATIONS_DIR): Promise<MigrationFile[]> {
  const entries = await readdir(dir);
  return entries
    .filter((name) => name.endsWith('.sql'))
    .sort()
    .map((name) => ({ name, path: `${dir.replace(/\/$/, '')}/${name}` }));
}

/**
 * Apply pending migrations, each in its own transaction, recording them in
 * schema_migrations. Already-applied files are skipped.
 */
export async function runMigrations(client: DbClient, dir: string = MIGRATIONS_DIR): Promise<MigrateResult> {
  const files = await listMigrationFiles(dir);
  const conn = await client.pool.connect();
  const result: MigrateResult = { applied: [], skipped: [] };

  try {
    await conn.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         name TEXT PRIMARY KEY,
         applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
       )`
    );

    const { rows } = await conn.query<{ name: string }>('SELECT name FROM schema_migrations');
    const done = new Set(rows.map((row) => row.name));

    for (const file of files) {
      if (done.has(file.name)) {
        result.skipped.push(file.name);
        continue;
      }

      const text = await readFile(file.path, 'utf8');
      await conn.query('BEGIN');
      try {
        await conn.query(text);
        await conn.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file.name]);
        await conn.query('COMMIT');
      } catch (error) {
        await conn.query('ROLLBACK');
        throw error;
      }
      console.log(`[migrate] Applied ${file.name}`);
      result.applied.push(file.name);
    }
  } finally {
    conn.release();
  }

  return result;
}
