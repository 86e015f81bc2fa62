import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type Database from 'better-sqlite3';
import { binderConfigSchema, type BinderConfigParsed } from '../config/schema.js';
import { loadConfig } from '../config/loader.js';
import { getDb } from '../db/db.js';
import { createCompileApi } from './compile-api.js';

export const VERSION = '0.1.0';

interface ServerDeps {
  db: Database.Database;
  config: BinderConfigParsed;
}

export function createServer(deps: ServerDeps): Hono {
  const app = new Hono();

  // Health check
  app.get('/health', (c) => c.json({ ok: true, version: VERSION }));

  app.route('/v1', createCompileApi(deps));

  app.onError((err, c) => {
    console.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${err.message}`);
    return c.json({ ok: false, error: { code: 'INTERNAL', message: 'Internal server error' } }, 500);
  });

  return app;
}

export function startServer(deps: ServerDeps): void {
  const app = createServer(deps);
  const port = deps.config.port;

  serve({
    fetch: app.fetch,
    hostname: '127.0.0.1',
    port,
  });

  console.log(`storage-binder listening on http://127.0.0.1:${port}`);
}

/**
 * Load the config at `configPath` (defaults apply when the file does not
 * exist), open the history database and start listening.
 */
export function startFromConfig(configPath: string): void {
  let config: BinderConfigParsed;
  if (existsSync(configPath)) {
    config = loadConfig(configPath);
  } else {
    console.log(`No config file found at ${configPath}, using defaults`);
    config = binderConfigSchema.parse({});
  }

  const db = getDb(resolve(config.db_path));
  startServer({ db, config });
}
