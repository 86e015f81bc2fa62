import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { rmSync } from 'node:fs';
import { getDb } from '../db/db.js';
import { CompileLog } from './log.js';
import { compileManifest } from '../compiler/compiler.js';
import { UnknownStorageError, DuplicateStorageError } from '../errors.js';
import { makeTmpDir } from '../test-utils.js';
import type Database from 'better-sqlite3';

describe('CompileLog', () => {
  let tmpDir: string;
  let db: Database.Database;
  let log: CompileLog;

  beforeEach(() => {
    tmpDir = makeTmpDir();
    db = getDb(join(tmpDir, 'test.db'));
    log = new CompileLog(db);
  });

  afterEach(() => {
    db.close();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates the compilations table', () => {
    const cols = db.prepare("PRAGMA table_info('compilations')").all() as { name: string }[];
    expect(cols.map((c) => c.name)).toEqual([
      'id',
      'timestamp',
      'manifest_id',
      'status',
      'storages',
      'bindings_count',
      'errors',
    ]);
  });

  it('logSuccess records storages and the binding count, not the values', () => {
    const snapshot = compileManifest({
      id: 'transcode',
      storages: [{ name: 'minio-local', type: 'minio', auth: { user: 'muser', pass: 'mpass' } }],
      functions: [{ name: 'f', inputs: [{ storage: 'minio-local', path: 'in' }], outputs: [] }],
    });
    log.logSuccess(snapshot);

    const entries = log.getEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0].manifestId).toBe('transcode');
    expect(entries[0].status).toBe('success');
    expect(entries[0].storages).toEqual([{ name: 'minio-local', id: '1', type: 'minio' }]);
    expect(entries[0].bindingsCount).toBe(3);
    expect(entries[0].errors).toEqual([]);

    const raw = db.prepare('SELECT * FROM compilations').get() as Record<string, unknown>;
    expect(JSON.stringify(raw)).not.toContain('mpass');
  });

  it('logFailure records each error with its location', () => {
    log.logFailure('broken', [
      new DuplicateStorageError('dup').at({ storage: 'dup' }),
      new UnknownStorageError('ghost').at({ function: 'f' }),
    ]);

    const [entry] = log.getEntries();
    expect(entry.status).toBe('failure');
    expect(entry.bindingsCount).toBe(0);
    expect(entry.errors).toEqual([
      { code: 'DUPLICATE_STORAGE', message: 'Storage "dup" is declared more than once', storage: 'dup' },
      { code: 'UNKNOWN_STORAGE', message: 'Storage "ghost" is not declared in the manifest', function: 'f' },
    ]);
  });

  it('getEntries filters by status and manifest, newest first', () => {
    log.logFailure('a', []);
    log.logFailure('b', []);
    log.logFailure('a', []);

    const entries = log.getEntries({ manifestId: 'a' });
    expect(entries).toHaveLength(2);
    expect(entries[0].id).toBeGreaterThan(entries[1].id);
    expect(log.getEntries({ status: 'success' })).toEqual([]);
    expect(log.getEntries({ limit: 1 })[0].manifestId).toBe('a');
  });

  it('prune keeps only the newest entries', () => {
    for (const id of ['a', 'b', 'c', 'd']) log.logFailure(id, []);

    expect(log.prune(2)).toBe(2);
    expect(log.getEntries().map((e) => e.manifestId)).toEqual(['d', 'c']);
  });
});
