import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { createLogger } from './logger.js';
import type { XssDefender } from './middleware/xss.js';
import { echoRoutes } from './routes/echo.js';

const logger = createLogger('app');

export interface AppOptions {
  filterResponses: boolean;
}

/**
 * Build the HTTP application with the XSS filters mounted on /api/*
 */
export function createApp(defender: XssDefender, options: AppOptions): Hono {
  const app = new Hono();

  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }));

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/*', defender.requestFilter());
  if (options.filterResponses) {
    app.use('/api/*', defender.responseFilter());
  }

  app.route('/api/echo', echoRoutes);

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((error, c) => {
    logger.error({ error: error.message, path: c.req.path }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
