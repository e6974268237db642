/**
 * Database schema setup.
 * Applies schema/init.sql; every statement is IF NOT EXISTS so it is safe to rerun.
 */

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { config, logger } from '@formsift/shared';

const pool = new Pool({
  connectionString: process.env.DATABASE_URL || config.databaseUrl,
});

async function applySchema(): Promise<void> {
  const client = await pool.connect();

  try {
    const schemaPath = path.join(__dirname, '..', 'src', 'schema', 'init.sql');
    logger.info('Applying database schema', { schemaPath });

    await client.query(fs.readFileSync(schemaPath, 'utf-8'));

    const tables = await client.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = 'public' AND table_name IN ('documents', 'extracted_data')`
    );
    logger.info('Database schema applied', { tables: tables.rows.map((r) => r.table_name) });
  } catch (error) {
    logger.error('Schema setup failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

applySchema()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
