import fs from 'fs/promises';
import path from 'path';
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createPoolFromUrl } from './db/mysqlStore';
import { logger } from './logger';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

async function migrate(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  const schema = await fs.readFile(path.resolve(__dirname, '../sql/schema.sql'), 'utf8');
  const pool = createPoolFromUrl(config.databaseUrl, { multipleStatements: true });
  try {
    await pool.query(schema);
    logger.info('Schema applied');
  } finally {
    await pool.end();
  }
}

migrate().catch(err => {
  logger.error('Migration failed:', err);
  process.exitCode = 1;
});
