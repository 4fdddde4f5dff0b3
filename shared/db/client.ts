import BetterSqlite3 from 'better-sqlite3'
import { drizzle } from 'drizzle-orm/better-sqlite3'
import * as schema from './schema'

export type SqliteConnection = BetterSqlite3.Database

/**
 * Opens (or creates) a SQLite database file.
 * Pass ':memory:' for a throwaway in-process database.
 */
export function openSqlite(filename: string): SqliteConnection {
  const sqlite = new BetterSqlite3(filename)
  sqlite.pragma('foreign_keys = ON')
  return sqlite
}

/**
 * Create a Drizzle database client from a better-sqlite3 connection.
 *
 * @example
 * ```typescript
 * const db = createDb(openSqlite('triangles.db'))
 * const row = db.select().from(configurations).where(eq(configurations.board, 32744)).get()
 * ```
 */
export function createDb(sqlite: SqliteConnection) {
  return drizzle(sqlite, { schema })
}

export type Database = ReturnType<typeof createDb>
