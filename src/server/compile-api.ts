import { Hono } from 'hono';
import type Database from 'better-sqlite3';
import type { BinderConfigParsed } from '../config/schema.js';
import { parseManifest, toManifest } from '../manifest/parser.js';
import { compileManifest } from '../compiler/compiler.js';
import { CompileLog, type CompileStatus } from '../history/log.js';
import { CompilationError, ValidationError } from '../errors.js';
import { ID_STRATEGIES, type IdStrategyName } from '../storage/ids.js';
import type { Manifest } from '../manifest/types.js';

interface CompileApiDeps {
  db: Database.Database;
  config: BinderConfigParsed;
}

function isIdStrategy(value: unknown): value is IdStrategyName {
  return ID_STRATEGIES.some((strategy) => strategy === value);
}

function isCompileStatus(value: string): value is CompileStatus {
  return value === 'success' || value === 'failure';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function createCompileApi(deps: CompileApiDeps): Hono {
  const app = new Hono();
  const compileLog = new CompileLog(deps.db);
  const history = deps.config.history;

  // POST /compile
  app.post('/compile', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ ok: false, error: { code: 'BAD_REQUEST', message: 'Request body must be JSON' } }, 400);
    }

    if (!isRecord(body) || body.manifest === undefined) {
      return c.json({ ok: false, error: { code: 'BAD_REQUEST', message: 'Missing required field: manifest' } }, 400);
    }

    const idStrategy = body.id_strategy ?? deps.config.id_strategy;
    if (!isIdStrategy(idStrategy)) {
      return c.json(
        { ok: false, error: { code: 'BAD_REQUEST', message: `id_strategy must be one of: ${ID_STRATEGIES.join(', ')}` } },
        400,
      );
    }

    const manifestId = typeof body.id === 'string' && body.id ? body.id : 'unnamed';

    let manifest: Manifest;
    try {
      manifest =
        typeof body.manifest === 'string'
          ? parseManifest(body.manifest, manifestId)
          : toManifest(body.manifest, manifestId);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      return c.json({ ok: false, error: { code: err.code, message: err.message, issues: err.issues } }, 400);
    }

    try {
      const snapshot = compileManifest(manifest, { idStrategy });
      if (history.enabled) {
        compileLog.logSuccess(snapshot);
        compileLog.prune(history.limit);
      }
      return c.json({ ok: true, bindings: snapshot.bindings, storages: snapshot.storages });
    } catch (err) {
      if (!(err instanceof CompilationError)) throw err;
      if (history.enabled) {
        compileLog.logFailure(manifest.id, err.errors);
        compileLog.prune(history.limit);
      }
      return c.json(
        {
          ok: false,
          error: { code: err.code, message: err.message, errors: err.errors.map((e) => e.toJSON()) },
        },
        422,
      );
    }
  });

  // GET /compilations
  app.get('/compilations', (c) => {
    const status = c.req.query('status');
    const limit = Number(c.req.query('limit') ?? 50);

    if (status !== undefined && !isCompileStatus(status)) {
      return c.json({ ok: false, error: { code: 'BAD_REQUEST', message: 'status must be success or failure' } }, 400);
    }
    if (!Number.isInteger(limit) || limit <= 0) {
      return c.json({ ok: false, error: { code: 'BAD_REQUEST', message: 'limit must be a positive integer' } }, 400);
    }

    const entries = compileLog.getEntries({
      status,
      manifestId: c.req.query('manifest_id'),
      limit,
    });
    return c.json({ ok: true, entries });
  });

  return app;
}
