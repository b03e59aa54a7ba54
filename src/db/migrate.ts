import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type Database from "better-sqlite3";
import { getDb } from "./connection";

// Same relative location from src/db and dist/db
const DEFAULT_MIGRATIONS_DIR = join(__dirname, "..", "..", "migrations");

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function getAppliedMigrations(db: Database.Database): Set<number> {
  const rows = db.prepare<[], { id: number }>("SELECT id FROM migrations").all();
  return new Set(rows.map((r) => r.id));
}

interface MigrationFile {
  id: number;
  name: string;
  path: string;
}

function getMigrationFiles(dir: string): MigrationFile[] {
  let files: string[];
  try {
    files = readdirSync(dir);
  } catch {
    return [];
  }

  return files
    .filter((f) => f.endsWith(".sql"))
    .map((f) => {
      const match = f.match(/^(\d+)-(.+)\.sql$/);
      if (!match) return null;
      return {
        id: Number.parseInt(match[1], 10),
        name: match[2],
        path: join(dir, f),
      };
    })
    .filter((m): m is MigrationFile => m !== null)
    .sort((a, b) => a.id - b.id);
}

/** Apply every migration not yet recorded. Returns the names applied. */
export function runMigrations(db?: Database.Database, migrationsDir?: string): string[] {
  const conn = db ?? getDb();
  const dir = migrationsDir ?? DEFAULT_MIGRATIONS_DIR;
  ensureMigrationsTable(conn);

  const applied = getAppliedMigrations(conn);
  const migrations = getMigrationFiles(dir);
  const newlyApplied: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.id)) continue;

    const sql = readFileSync(migration.path, "utf-8");
    conn.exec("BEGIN");
    try {
      conn.exec(sql);
      conn.prepare("INSERT INTO migrations (id, name) VALUES (?, ?)").run(migration.id, migration.name);
      conn.exec("COMMIT");
    } catch (err) {
      conn.exec("ROLLBACK");
      throw new Error(`Migration ${migration.id}-${migration.name} failed: ${err}`);
    }
    newlyApplied.push(`${migration.id}-${migration.name}`);
  }
  return newlyApplied;
}
