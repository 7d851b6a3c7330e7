import { readdir, readFile } from 'fs/promises';
import * as path from 'path';
import { Pool } from 'pg';
import { errorMessage, logger } from '@keepsake/shared';

const SQL_DIR = path.join(__dirname, '../sql');

/** Apply every sql/*.sql file in name order. Statements are idempotent. */
export async function migrate(pool: Pool, sqlDir: string = SQL_DIR): Promise<string[]> {
  const files = (await readdir(sqlDir)).filter((f) => f.endsWith('.sql')).sort();
  for (const file of files) {
    const statements = await readFile(path.join(sqlDir, file), 'utf-8');
    logger.info('Applying migration', { file });
    await pool.query(statements);
  }
  return files;
}

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) throw new Error('DATABASE_URL must be set');

  const pool = new Pool({ connectionString });
  try {
    const applied = await migrate(pool);
    logger.info('Migrations applied', { count: applied.length });
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error('Migration failed', { error: errorMessage(err) });
    process.exitCode = 1;
  });
}
