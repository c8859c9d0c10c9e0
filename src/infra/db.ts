import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { GantryConfig } from '../core/config.js';

export type GantryDb = Database.Database;

export function openDb(cfg: Pick<GantryConfig, 'GANTRY_DB_PATH'>): GantryDb {
  const dbPath = cfg.GANTRY_DB_PATH;
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  // Several processes (HTTP server, MCP server) share the file.
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');

  migrate(db);
  return db;
}

export function migrate(db: GantryDb) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS events (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      type TEXT NOT NULL,
      actor TEXT NOT NULL,
      payload_json TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS file_locks (
      file_path TEXT PRIMARY KEY,
      actor TEXT NOT NULL,
      chunk_id TEXT NOT NULL,
      locked_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      target_path TEXT NOT NULL,
      feature_description TEXT NOT NULL,
      status TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      completed_at INTEGER,
      error_message TEXT,
      total_chunks INTEGER,
      completed_chunks INTEGER NOT NULL DEFAULT 0,
      integration_handles_json TEXT NOT NULL DEFAULT '[]'
    );

    CREATE TABLE IF NOT EXISTS chunks (
      id TEXT PRIMARY KEY,
      task_id TEXT NOT NULL,
      description TEXT NOT NULL,
      status TEXT NOT NULL,
      assigned_worker TEXT,
      files_json TEXT NOT NULL,
      dependencies_json TEXT NOT NULL,
      integration_handle TEXT,
      attempts INTEGER NOT NULL DEFAULT 0,
      last_error TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS progress_events (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      task_id TEXT NOT NULL,
      type TEXT NOT NULL,
      payload_json TEXT NOT NULL,
      message TEXT,
      created_at INTEGER NOT NULL
    );

    -- Performance indexes
    CREATE INDEX IF NOT EXISTS idx_events_type ON events(type);
    CREATE INDEX IF NOT EXISTS idx_events_actor ON events(actor);
    CREATE INDEX IF NOT EXISTS idx_file_locks_owner ON file_locks(actor, chunk_id);
    CREATE INDEX IF NOT EXISTS idx_chunks_task_id ON chunks(task_id);
    CREATE INDEX IF NOT EXISTS idx_chunks_status ON chunks(status);
    CREATE INDEX IF NOT EXISTS idx_tasks_status_created ON tasks(status, created_at);
    CREATE INDEX IF NOT EXISTS idx_progress_task_id ON progress_events(task_id);
  `);
}
