/**
 * One-time database schema setup (run when starting from scratch).
 * Runs schema/init.sql to create tables and indexes.
 */

import fs from 'fs';
import path from 'path';
import { config, logger } from '@ledgerline/shared';
import { createPool } from './lib/db';

const pool = createPool();

function findSchema(): string {
  const candidates = [
    // Running from sources
    path.join(__dirname, 'schema', 'init.sql'),
    // Running from dist/services/statement-api/src
    path.join(__dirname, '..', '..', '..', '..', 'services', 'statement-api', 'src', 'schema', 'init.sql'),
  ];
  const found = candidates.find((p) => fs.existsSync(p));
  if (!found) {
    throw new Error(`init.sql not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

async function runInitSchema(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database schema (init.sql)', { database: new URL(config.databaseUrl).host });

    const sql = fs.readFileSync(findSchema(), 'utf-8');
    await client.query(sql);

    logger.info('Database schema complete');
  } catch (error) {
    logger.error('Schema init failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runInitSchema()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
