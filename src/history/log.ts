import type Database from 'better-sqlite3';
import type { CompiledSnapshot, CompiledStorage } from '../compiler/compiler.js';
import type { BinderError } from '../errors.js';

export type CompileStatus = 'success' | 'failure';

export interface CompileEntry {
  id: number;
  timestamp: string;
  manifestId: string;
  status: CompileStatus;
  storages: CompiledStorage[];
  bindingsCount: number;
  errors: Array<ReturnType<BinderError['toJSON']>>;
}

export interface CompileFilters {
  status?: CompileStatus;
  manifestId?: string;
  limit?: number;
}

interface CompileRow {
  id: number;
  timestamp: string;
  manifest_id: string;
  status: CompileStatus;
  storages: string;
  bindings_count: number;
  errors: string;
}

/**
 * Record of compilation runs. Binding values are never stored, only
 * their count, since auth values end up in them.
 */
export class CompileLog {
  constructor(private db: Database.Database) {}

  private insert(
    manifestId: string,
    status: CompileStatus,
    storages: CompiledStorage[],
    bindingsCount: number,
    errors: BinderError[],
  ): void {
    this.db
      .prepare(
        `INSERT INTO compilations (timestamp, manifest_id, status, storages, bindings_count, errors)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        new Date().toISOString(),
        manifestId,
        status,
        JSON.stringify(storages),
        bindingsCount,
        JSON.stringify(errors.map((err) => err.toJSON())),
      );
  }

  logSuccess(snapshot: CompiledSnapshot): void {
    this.insert(snapshot.manifestId, 'success', snapshot.storages, Object.keys(snapshot.bindings).length, []);
  }

  logFailure(manifestId: string, errors: BinderError[]): void {
    this.insert(manifestId, 'failure', [], 0, errors);
  }

  /** Newest first. */
  getEntries(filters?: CompileFilters): CompileEntry[] {
    let query = 'SELECT * FROM compilations WHERE 1=1';
    const params: unknown[] = [];

    if (filters?.status) {
      query += ' AND status = ?';
      params.push(filters.status);
    }

    if (filters?.manifestId) {
      query += ' AND manifest_id = ?';
      params.push(filters.manifestId);
    }

    query += ' ORDER BY id DESC';

    if (filters?.limit) {
      query += ' LIMIT ?';
      params.push(filters.limit);
    }

    const rows = this.db.prepare(query).all(...params) as CompileRow[];

    return rows.map((row) => ({
      id: row.id,
      timestamp: row.timestamp,
      manifestId: row.manifest_id,
      status: row.status,
      storages: JSON.parse(row.storages),
      bindingsCount: row.bindings_count,
      errors: JSON.parse(row.errors),
    }));
  }

  /** Keep only the newest `keep` entries. Returns how many were removed. */
  prune(keep: number): number {
    const result = this.db
      .prepare('DELETE FROM compilations WHERE id NOT IN (SELECT id FROM compilations ORDER BY id DESC LIMIT ?)')
      .run(keep);
    return result.changes;
  }
}
