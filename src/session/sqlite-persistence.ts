/**
 * SQLite-backed session persistence.
 *
 * One row per session holding the serialized binding. Writes go through
 * better-sqlite3's synchronous API, so a save has hit the database by the
 * time its promise resolves.
 */

import { mkdirSync } from "fs";
import { dirname } from "path";
import Database from "better-sqlite3";
import type { SessionPersistence, StoredSession } from "./persistence.js";

export interface SqliteSessionPersistenceOptions {
  /** Path to the SQLite database file, or ":memory:" */
  dbPath: string;
}

interface SessionRow {
  id: string;
  binding_json: string;
}

export class SqliteSessionPersistence implements SessionPersistence {
  private readonly db: Database.Database;
  private closed = false;

  constructor(options: SqliteSessionPersistenceOptions) {
    if (options.dbPath !== ":memory:") {
      mkdirSync(dirname(options.dbPath), { recursive: true });
    }

    this.db = new Database(options.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = FULL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        binding_json TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
  }

  public async save(id: string, serialized: string): Promise<void> {
    this.assertOpen();
    this.db
      .prepare(
        `INSERT INTO sessions (id, binding_json, updated_at)
         VALUES (?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           binding_json = excluded.binding_json,
           updated_at = excluded.updated_at`
      )
      .run(id, serialized, new Date().toISOString());
  }

  public async loadAll(): Promise<StoredSession[]> {
    this.assertOpen();
    const rows = this.db
      .prepare<[], SessionRow>("SELECT id, binding_json FROM sessions ORDER BY rowid")
      .all();
    return rows.map((row) => ({ id: row.id, serialized: row.binding_json }));
  }

  public async delete(id: string): Promise<void> {
    this.assertOpen();
    this.db.prepare("DELETE FROM sessions WHERE id = ?").run(id);
  }

  public async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.db.close();
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Session database is closed");
    }
  }
}
