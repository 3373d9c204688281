import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { closePool, getPool } from '../config/database.js';
import { config } from '../config/index.js';

/**
 * Applies every .sql file in the migrations directory in name order.
 * The files are idempotent, so re-running is safe.
 */
async function migrate() {
  const dir = path.resolve(process.cwd(), config.database.migrationsDir);
  const files = (await readdir(dir)).filter((file) => file.endsWith('.sql')).sort();
  const pool = getPool();

  try {
    for (const file of files) {
      const sql = await readFile(path.join(dir, file), 'utf8');
      await pool.query(sql);
      console.log(`✓ Applied ${file}`);
    }
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void migrate();
