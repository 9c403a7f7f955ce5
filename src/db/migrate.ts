import fs from 'fs';
import path from 'path';
import { loadConfig } from '../config/env';
import { ConnectionPool, createPool } from '../config/database';

const MIGRATIONS_DIR = path.join(__dirname, '..', '..', 'migrations');

export async function runMigrations(pool: ConnectionPool, migrationsDir = MIGRATIONS_DIR): Promise<string[]> {
  const files = fs.readdirSync(migrationsDir)
    .filter(f => f.endsWith('.sql'))
    .sort();

  console.log(`[Migrate] Found ${files.length} migration file(s)`);

  const client = await pool.connect();
  try {
    for (const file of files) {
      console.log(`[Migrate] Running migration: ${file}`);
      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      await client.query(sql);
      console.log(`[Migrate]   ✓ ${file}`);
    }
  } finally {
    client.release();
  }
  return files;
}

async function main() {
  const pool = createPool(loadConfig().db);
  try {
    await runMigrations(pool);
    console.log('[Migrate] All migrations completed successfully.');
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('[Migrate] Migration failed:', err);
    process.exitCode = 1;
  });
}
