// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

// Mirrors ./schema. There are no migrations; tables are created on open.
const bootstrapSql = `
CREATE TABLE IF NOT EXISTS feeds (
  name TEXT PRIMARY KEY NOT NULL,
  url TEXT NOT NULL,
  created_at INTEGER NOT NULL DEFAULT (unixepoch())
);
CREATE TABLE IF NOT EXISTS seen_entries (
  feed_url TEXT PRIMARY KEY NOT NULL,
  entry_ids TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);
`;

/**
 * Opens (creating if needed) a SQLite store and makes sure its tables exist.
 * The registry and the seen-entry cache each live in their own file; both
 * are opened through here.
 */
export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  mkdirSync(dirname(dbPath), { recursive: true });

  const sqlite = new Database(dbPath);
  try {
    sqlite.pragma("journal_mode = WAL");
    sqlite.exec(bootstrapSql);
  } catch (err) {
    sqlite.close();
    throw err;
  }

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export type DatabaseResult = ReturnType<typeof createDatabase>;
export type AppDatabase = BetterSQLite3Database<typeof schema>;
