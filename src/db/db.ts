import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export type SqliteDb = Database.Database;

export function openDb(sqlitePath: string): SqliteDb {
  const db = new Database(sqlitePath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}

/** Applies every `*.sql` file in the directory, in name order. Statements must be idempotent. */
export function applyMigrations(db: SqliteDb, migrationsDir: string): string[] {
  const files = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
  for (const file of files) {
    db.exec(fs.readFileSync(path.join(migrationsDir, file), "utf8"));
  }
  return files;
}
