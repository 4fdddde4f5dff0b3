/**
 * Persistence for configurations, sequences, symmetry transformations and
 * solve runs. Writes are at most once per key; reads validate JSON columns.
 * Database errors are not caught here.
 */

import { and, asc, count, desc, eq, inArray } from 'drizzle-orm'
import type { Database } from '../../shared/db/client'
import {
  parseSequenceMoves,
  serializeSequenceMoves,
  type MoveTriple,
  type SequenceMoves,
} from '../../shared/db/json-schemas'
import { configurations, sequences, solveRuns, transformations } from '../../shared/db/schema'
import type { Configuration, NewSolveRun, SequenceRow, SolveRun } from '../../shared/db/types'
import { assertBoard, isWinningBoard, type Board, type MoveTemplate } from '../game/triangles'
import type { Transformation } from '../game/symmetry'
import { PERSIST_BATCH_SIZE } from '../lib/constants'
import {
  ConfigurationNotFoundError,
  IllegalMoveError,
  SequenceNotFoundError,
  UnsolvedConfigurationError,
} from '../lib/errorUtils'
import type { ProgressCallback } from '../lib/progress'
import { WinTable } from '../solver/classifier'
import { replaySequence } from '../solver/sequences'

export interface ConfigurationInput {
  board: Board
  feasible: boolean
  won: boolean
}

export interface StoredSequence {
  id: number
  start: Board
  moves: MoveTemplate[]
  moveCount: number
}

export interface ConfigurationCounts {
  total: number
  won: number
}

export type SolveRunInput = Omit<NewSolveRun, 'id' | 'createdAt'>

function toTriples(moves: readonly MoveTemplate[]): SequenceMoves {
  return moves.map((move): MoveTriple => [move.from, move.over, move.to])
}

function fromTriples(triples: SequenceMoves): MoveTemplate[] {
  return triples.map(([from, over, to]) => ({ from, over, to }))
}

function toStoredSequence(row: SequenceRow): StoredSequence {
  return {
    id: row.id,
    start: row.configuration,
    moves: fromTriples(parseSequenceMoves(row.moves)),
    moveCount: row.moveCount,
  }
}

export class TrianglesRepository {
  constructor(
    private readonly db: Database,
    private readonly now: () => number = Date.now
  ) {}

  // ===========================================================================
  // Configurations
  // ===========================================================================

  /**
   * Writes a configuration unless the board is already stored.
   *
   * @returns True if a row was written, false if the board already existed
   */
  persistConfiguration(board: Board, feasible: boolean, won: boolean): boolean {
    const result = this.db
      .insert(configurations)
      .values({ board: assertBoard(board), feasible, won })
      .onConflictDoNothing()
      .run()
    return result.changes > 0
  }

  /**
   * Writes many configurations in one transaction, skipping stored boards.
   *
   * @returns Number of rows written
   */
  persistConfigurations(
    entries: Iterable<ConfigurationInput>,
    options: { onProgress?: ProgressCallback } = {}
  ): number {
    const { onProgress } = options
    const rows = Array.from(entries, ({ board, feasible, won }) => ({
      board: assertBoard(board),
      feasible,
      won,
    }))

    let written = 0
    this.db.transaction((tx) => {
      for (let offset = 0; offset < rows.length; offset += PERSIST_BATCH_SIZE) {
        const batch = rows.slice(offset, offset + PERSIST_BATCH_SIZE)
        written += tx.insert(configurations).values(batch).onConflictDoNothing().run().changes
        onProgress?.({
          phase: 'persist',
          processed: offset + batch.length,
          total: rows.length,
          done: false,
        })
      }
    })

    onProgress?.({ phase: 'persist', processed: rows.length, total: rows.length, done: true })
    return written
  }

  getConfiguration(board: Board): Configuration | undefined {
    return this.db
      .select()
      .from(configurations)
      .where(eq(configurations.board, assertBoard(board)))
      .get()
  }

  /**
   * @throws ConfigurationNotFoundError if the board is not stored
   */
  requireConfiguration(board: Board): Configuration {
    const configuration = this.getConfiguration(board)
    if (!configuration) {
      throw new ConfigurationNotFoundError(board)
    }
    return configuration
  }

  countConfigurations(): ConfigurationCounts {
    const total = this.db.select({ value: count() }).from(configurations).get()
    const won = this.db
      .select({ value: count() })
      .from(configurations)
      .where(eq(configurations.won, true))
      .get()
    return { total: total?.value ?? 0, won: won?.value ?? 0 }
  }

  /** Stored boards in ascending order */
  listConfigurationBoards(): Board[] {
    return this.db
      .select({ board: configurations.board })
      .from(configurations)
      .orderBy(asc(configurations.board))
      .all()
      .map((row) => row.board)
  }

  /**
   * Classification of every stored feasible configuration, usable by the
   * sequence enumerator without re-running the search.
   */
  loadWinTable(): WinTable {
    const rows = this.db
      .select({ board: configurations.board, won: configurations.won })
      .from(configurations)
      .where(eq(configurations.feasible, true))
      .all()
    return WinTable.fromEntries(rows)
  }

  // ===========================================================================
  // Sequences
  // ===========================================================================

  /**
   * Stores a solving sequence for a configuration.
   * Storing the same moves twice returns the id of the first row.
   *
   * @throws ConfigurationNotFoundError if the board or a board along the way is not stored
   * @throws IllegalMoveError if the moves do not solve the board
   * @throws UnsolvedConfigurationError if a board along the way is stored as lost or not feasible
   */
  persistSequence(board: Board, moves: readonly MoveTemplate[]): number {
    this.requireConfiguration(board)

    const boards = replaySequence(board, moves)
    const last = boards[boards.length - 1]
    if (!isWinningBoard(last)) {
      throw new IllegalMoveError('Sequence does not end with a single peg', last, moves.length)
    }
    this.requireWonPath(boards)

    const movesJson = serializeSequenceMoves(toTriples(moves))
    const inserted = this.db
      .insert(sequences)
      .values({
        configuration: board,
        moves: movesJson,
        moveCount: moves.length,
        createdAt: this.now(),
      })
      .onConflictDoNothing()
      .returning({ id: sequences.id })
      .get()
    if (inserted) {
      return inserted.id
    }

    const existing = this.db
      .select({ id: sequences.id })
      .from(sequences)
      .where(and(eq(sequences.configuration, board), eq(sequences.moves, movesJson)))
      .get()
    if (!existing) {
      throw new Error(`Sequence for configuration ${board} was neither inserted nor found`)
    }
    return existing.id
  }

  /**
   * Every board of a sequence, the start included, must be a stored feasible
   * and won configuration.
   */
  private requireWonPath(boards: readonly Board[]): void {
    const rows = this.db
      .select()
      .from(configurations)
      .where(inArray(configurations.board, [...boards]))
      .all()
    const stored = new Map(rows.map((row) => [row.board, row] as const))

    boards.forEach((board, step) => {
      const configuration = stored.get(board)
      if (!configuration) {
        throw new ConfigurationNotFoundError(board)
      }
      if (!configuration.feasible || !configuration.won) {
        throw new UnsolvedConfigurationError(board, step)
      }
    })
  }

  /**
   * Stored sequences of a configuration, oldest first.
   *
   * @throws ConfigurationNotFoundError if the board is not stored
   */
  listSequences(board: Board): StoredSequence[] {
    this.requireConfiguration(board)
    return this.db
      .select()
      .from(sequences)
      .where(eq(sequences.configuration, board))
      .orderBy(asc(sequences.id))
      .all()
      .map(toStoredSequence)
  }

  /**
   * @throws SequenceNotFoundError if no sequence has this id
   */
  getSequence(id: number): StoredSequence {
    const row = this.db.select().from(sequences).where(eq(sequences.id, id)).get()
    if (!row) {
      throw new SequenceNotFoundError(id)
    }
    return toStoredSequence(row)
  }

  // ===========================================================================
  // Transformations
  // ===========================================================================

  /**
   * Writes transformations in one transaction, skipping recorded pairs.
   *
   * @returns Number of rows written
   */
  persistTransformations(list: readonly Transformation[]): number {
    let written = 0
    this.db.transaction((tx) => {
      for (const transformation of list) {
        written += tx
          .insert(transformations)
          .values({
            fromConfiguration: transformation.from,
            toConfiguration: transformation.to,
            symmetry: transformation.symmetry,
          })
          .onConflictDoNothing()
          .run().changes
      }
    })
    return written
  }

  /**
   * Transformations recorded for a board that is an image of an earlier one.
   */
  listTransformationsFrom(board: Board): Transformation[] {
    return this.db
      .select()
      .from(transformations)
      .where(eq(transformations.fromConfiguration, assertBoard(board)))
      .orderBy(asc(transformations.toConfiguration))
      .all()
      .map((row) => ({
        from: row.fromConfiguration,
        to: row.toConfiguration,
        symmetry: row.symmetry,
      }))
  }

  // ===========================================================================
  // Solve Runs
  // ===========================================================================

  recordSolveRun(run: SolveRunInput): number {
    const row = this.db
      .insert(solveRuns)
      .values({ ...run, createdAt: this.now() })
      .returning({ id: solveRuns.id })
      .get()
    if (!row) {
      throw new Error('Solve run was not recorded')
    }
    return row.id
  }

  latestSolveRun(): SolveRun | undefined {
    return this.db.select().from(solveRuns).orderBy(desc(solveRuns.id)).limit(1).get()
  }
}
