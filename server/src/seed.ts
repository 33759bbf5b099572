import path from 'path';
import dotenv from 'dotenv';
import { PasswordHasher } from './auth';
import { loadConfig } from './config';
import { createPoolFromUrl, MysqlStore } from './db/mysqlStore';
import { logger } from './logger';
import { seedDemo } from './services/seed';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

async function seed(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  const pool = createPoolFromUrl(config.databaseUrl);
  try {
    await seedDemo(new MysqlStore(pool), new PasswordHasher(config.bcryptRounds), logger);
  } finally {
    await pool.end();
  }
}

seed().catch(err => {
  logger.error('Seeding failed:', err);
  process.exitCode = 1;
});
