/**
 * Test utilities for the store and the command line tool
 *
 * Provides an initialized in-memory SQLite database and seed helpers.
 */

import { createDb, openSqlite, type Database, type SqliteConnection } from '../../shared/db/client'
import { initializeDatabase } from '../../shared/db/migrate'
import type { Board } from '../game/triangles'
import { TrianglesRepository } from './repository'

/** Fixed clock for rows that record a creation time */
export const TEST_TIME = 1_700_000_000_000

export interface TestDatabase {
  sqlite: SqliteConnection
  db: Database
  repository: TrianglesRepository
}

export function createTestDatabase(options: { initialize?: boolean } = {}): TestDatabase {
  const sqlite = openSqlite(':memory:')
  const db = createDb(sqlite)
  if (options.initialize ?? true) {
    initializeDatabase(db)
  }
  return { sqlite, db, repository: new TrianglesRepository(db, () => TEST_TIME) }
}

/**
 * Stores a small classified set:
 * 36 (pegs 9 and 12) and its mirror 10 (pegs 11 and 13) are won,
 * 13 (pegs 11, 12 and 14) and 40 (pegs 9 and 11) are lost,
 * and the single-peg boards 1 and 512 finish the two sequences of 36.
 */
export function seedConfigurations(repository: TrianglesRepository): Board[] {
  const seed = [
    { board: 1, won: true },
    { board: 10, won: true },
    { board: 13, won: false },
    { board: 36, won: true },
    { board: 40, won: false },
    { board: 512, won: true },
  ]
  repository.persistConfigurations(seed.map((entry) => ({ ...entry, feasible: true })))
  return seed.map((entry) => entry.board)
}
