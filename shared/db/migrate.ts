import { sql } from 'drizzle-orm'
import type { Database } from './client'

/**
 * DDL for the tables declared in ./schema.ts.
 * Every statement is guarded so that initialization can run any number of times.
 */
const CREATE_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS configurations (
    board INTEGER PRIMARY KEY NOT NULL,
    feasible INTEGER NOT NULL DEFAULT 1,
    won INTEGER NOT NULL DEFAULT 0
  )`,
  `CREATE INDEX IF NOT EXISTS idx_configurations_won ON configurations (won)`,
  `CREATE TABLE IF NOT EXISTS sequences (
    id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
    configuration INTEGER NOT NULL REFERENCES configurations (board) ON DELETE CASCADE,
    moves TEXT NOT NULL,
    move_count INTEGER NOT NULL,
    created_at INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_sequences_configuration ON sequences (configuration)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_sequences_configuration_moves ON sequences (configuration, moves)`,
  `CREATE TABLE IF NOT EXISTS transformations (
    from_configuration INTEGER NOT NULL REFERENCES configurations (board) ON DELETE CASCADE,
    to_configuration INTEGER NOT NULL REFERENCES configurations (board) ON DELETE CASCADE,
    symmetry TEXT NOT NULL,
    PRIMARY KEY (from_configuration, to_configuration)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_transformations_to ON transformations (to_configuration)`,
  `CREATE TABLE IF NOT EXISTS solve_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
    start_board INTEGER NOT NULL,
    empty_position INTEGER NOT NULL,
    feasible_count INTEGER NOT NULL,
    won_count INTEGER NOT NULL,
    edge_count INTEGER NOT NULL,
    created_at INTEGER NOT NULL
  )`,
]

// Children first, so foreign keys never block a drop.
const DROP_STATEMENTS = [
  'DROP TABLE IF EXISTS transformations',
  'DROP TABLE IF EXISTS sequences',
  'DROP TABLE IF EXISTS solve_runs',
  'DROP TABLE IF EXISTS configurations',
]

export const TABLE_NAMES = ['configurations', 'sequences', 'transformations', 'solve_runs'] as const

export function initializeDatabase(db: Database): void {
  db.transaction((tx) => {
    for (const statement of CREATE_STATEMENTS) {
      tx.run(sql.raw(statement))
    }
  })
}

export function dropDatabase(db: Database): void {
  db.transaction((tx) => {
    for (const statement of DROP_STATEMENTS) {
      tx.run(sql.raw(statement))
    }
  })
}

export function resetDatabase(db: Database): void {
  dropDatabase(db)
  initializeDatabase(db)
}

/**
 * Names of the tables of this schema that exist in the database.
 */
export function listTables(db: Database): string[] {
  const rows = db.all<{ name: string }>(
    sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`
  )
  const known = new Set<string>(TABLE_NAMES)
  return rows.map((row) => row.name).filter((name) => known.has(name))
}
