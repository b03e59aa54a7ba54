import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";

const DEFAULT_DB_PATH = join(homedir(), ".chat-ledger", "data.db");

let instance: Database.Database | null = null;

export function getDbPath(): string {
  return process.env.CHAT_LEDGER_DB || DEFAULT_DB_PATH;
}

export function getDb(): Database.Database {
  if (!instance) {
    const dbPath = getDbPath();
    mkdirSync(dirname(dbPath), { recursive: true });
    instance = new Database(dbPath);
    instance.pragma("journal_mode = WAL");
    instance.pragma("foreign_keys = ON");
  }
  return instance;
}

export function closeDb(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}

/** Reset singleton, for testing only */
export function _resetDb(): void {
  instance = null;
}

/** Set a specific database instance, for testing only */
export function _setDb(db: Database.Database): void {
  instance = db;
}

/** Fresh in-memory database with foreign keys on, for tests */
export function openMemoryDb(): Database.Database {
  const db = new Database(":memory:");
  db.pragma("foreign_keys = ON");
  return db;
}
