import type Database from 'better-sqlite3';

const CREATE_COMPILATIONS = `
CREATE TABLE IF NOT EXISTS compilations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  manifest_id TEXT NOT NULL,
  status TEXT NOT NULL,
  storages TEXT NOT NULL DEFAULT '[]',
  bindings_count INTEGER NOT NULL DEFAULT 0,
  errors TEXT NOT NULL DEFAULT '[]'
)`;

const CREATE_COMPILATIONS_INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_compilations_timestamp ON compilations(timestamp)`,
  `CREATE INDEX IF NOT EXISTS idx_compilations_status ON compilations(status)`,
];

export function createTables(db: Database.Database): void {
  db.exec(CREATE_COMPILATIONS);
  for (const sql of CREATE_COMPILATIONS_INDEXES) {
    db.exec(sql);
  }
}
