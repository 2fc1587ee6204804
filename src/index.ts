import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { getConfig } from './config.js';
import { createLogger } from './logger.js';
import { createDefaultDefender } from './middleware/xss.js';

const logger = createLogger('server');
const config = getConfig();

const defender = createDefaultDefender({
  skipFields: config.xss.skipFields,
  maxMultipartParts: config.xss.maxMultipartParts,
});

const app = createApp(defender, { filterResponses: config.xss.filterResponses });

/**
 * Start server
 */
const port = config.port || 3000;

logger.info({ port, skipFields: [...defender.policy.skipFields] }, 'Starting XSS defender server');

const server = serve({
  fetch: app.fetch,
  port,
}, (info) => {
  logger.info({ port: info.port }, 'XSS defender HTTP server started');
});

// Graceful shutdown
process.on('SIGINT', () => {
  logger.info('Shutting down server');
  server.close();
  process.exit(0);
});

process.on('SIGTERM', () => {
  logger.info('Shutting down server');
  server.close();
  process.exit(0);
});
