import { Hono } from 'hono';
import { createLogger } from '../logger.js';

const logger = createLogger('routes-echo');

type FileSummary = {
  file: string;
  type: string;
  size: number;
};

type EchoEntry = string | FileSummary;

function describeEntry(entry: string | File): EchoEntry {
  if (typeof entry === 'string') {
    return entry;
  }
  return { file: entry.name, type: entry.type, size: entry.size };
}

/**
 * Echo routes - return what the handler received after filtering
 */
export const echoRoutes = new Hono();

/**
 * POST /api/echo/json - Echo a JSON body
 */
echoRoutes.post('/json', async (c) => {
  const body = await c.req.json();
  logger.debug('Echoing JSON body');
  return c.json({ received: body });
});

/**
 * POST /api/echo/form - Echo a urlencoded or multipart form
 */
echoRoutes.post('/form', async (c) => {
  const body = await c.req.parseBody({ all: true });
  const received: Record<string, EchoEntry | EchoEntry[]> = {};

  for (const [key, value] of Object.entries(body)) {
    received[key] = Array.isArray(value) ? value.map(describeEntry) : describeEntry(value);
  }

  logger.debug({ fields: Object.keys(received).length }, 'Echoing form body');
  return c.json({ received });
});

/**
 * GET /api/echo/query - Echo query parameters, all values per key
 */
echoRoutes.get('/query', (c) => {
  return c.json({ received: c.req.queries() });
});
