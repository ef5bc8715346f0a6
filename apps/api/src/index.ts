import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

import { createApp } from './app';
import { loadConfig } from './config';
import { createLogger } from './utils/logger';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

const config = loadConfig();
const logger = createLogger(config);
const app = createApp({ config, logger });

app.listen(config.port, () => {
  logger.info({ port: config.port }, 'SchemaGraph API listening');
});
