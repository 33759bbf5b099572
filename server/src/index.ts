import path from 'path';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { createPoolFromUrl, MysqlStore } from './db/mysqlStore';
import { logger } from './logger';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

const config = loadConfig();
logger.setLevel(config.logLevel);

const pool = createPoolFromUrl(config.databaseUrl);
const app = createApp({ store: new MysqlStore(pool), config, logger });

app.listen(config.port, () => {
  logger.info(`API listening on http://localhost:${config.port}`);
});
