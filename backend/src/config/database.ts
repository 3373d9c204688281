import { Pool } from 'pg';
import { config } from './index.js';

let pool: Pool | null = null;

// Lazily created so the memory-store setup never opens a connection.
export function getPool(): Pool {
  if (!pool) {
    if (!config.database.url) {
      throw new Error('DATABASE_URL not configured');
    }
    pool = new Pool({
      connectionString: config.database.url,
      max: config.database.poolSize,
    });
    pool.on('error', (err) => {
      console.error('Postgres pool error:', err);
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
