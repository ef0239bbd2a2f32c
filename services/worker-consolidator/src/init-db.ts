/**
 * One-time database schema setup (run when starting from scratch).
 * Runs schema/init.sql to create the consolidation_runs table.
 */

import fs from 'fs';
import path from 'path';
import { createPool, logger } from '@payroll-consolidator/shared';

const pool = createPool();

function resolveSchemaPath(): string {
  const candidates = [
    // Running from sources
    path.join(__dirname, 'schema', 'init.sql'),
    // Running from dist/services/worker-consolidator/src
    path.join(__dirname, '../../../../services/worker-consolidator/src/schema/init.sql'),
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`init.sql not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

async function runInitSchema(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database schema (init.sql)');

    const sql = fs.readFileSync(resolveSchemaPath(), 'utf-8');
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
