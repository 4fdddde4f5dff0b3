/**
 * Command handlers for the `triangles` tool.
 *
 * Handlers are synchronous, write through the injected logger and return a
 * summary of what they did. Errors propagate to the caller.
 */

import type { Database } from '../../shared/db/client'
import { dropDatabase, initializeDatabase, resetDatabase } from '../../shared/db/migrate'
import type { Configuration } from '../../shared/db/types'
import { findTransformations } from '../game/symmetry'
import {
  formatBoard,
  formatMove,
  popcount,
  renderBoard,
  type Board,
  type MoveTemplate,
} from '../game/triangles'
import { PROGRESS_REPORT_INTERVAL } from '../lib/constants'
import { formatCount, formatNumber, formatRatioAsPercent } from '../lib/numberFormatting'
import { ProgressReporter } from '../lib/progress'
import { countSequences, replaySequence, sequencesFor, solve, takeSequences } from '../solver'
import type { TrianglesRepository } from '../store/repository'
import type { ListSequencesOptions, SolveOptions } from './args'

export type Logger = Pick<Console, 'log' | 'error'>

export interface CommandContext {
  db: Database
  repository: TrianglesRepository
  dbFile: string
  logger: Logger
  /** Clock used to throttle progress lines */
  now?: () => number
}

/** Indent of rendered boards under a heading */
const BOARD_INDENT = 3

function describeBoard(board: Board): string {
  return `${board}, ${formatBoard(board)}`
}

// =============================================================================
// db init | drop | reset
// =============================================================================

export function initCommand({ db, dbFile, logger }: CommandContext): void {
  logger.log(`Initializing the database at ${dbFile}`)
  initializeDatabase(db)
}

export function dropCommand({ db, dbFile, logger }: CommandContext): void {
  logger.log(`Dropping all tables in the database at ${dbFile}`)
  dropDatabase(db)
}

export function resetCommand({ db, dbFile, logger }: CommandContext): void {
  logger.log(`Resetting the database at ${dbFile}`)
  resetDatabase(db)
}

// =============================================================================
// solve
// =============================================================================

export interface SolveSummary {
  runId: number
  start: Board
  feasible: number
  won: number
  edges: number
  probes: number
  written: number
}

export function solveCommand(context: CommandContext, options: SolveOptions): SolveSummary {
  const { repository, logger } = context
  const emptyPosition = options['empty-position']
  const reporter = new ProgressReporter(logger, PROGRESS_REPORT_INTERVAL, context.now)

  logger.log(`Finding all feasible solutions with position ${emptyPosition} initially empty`)
  const { start, graph, table } = solve({ emptyPosition, onProgress: reporter.report })
  const won = table.wonCount
  logger.log(
    `Found ${formatNumber(graph.size)} feasible configurations, ` +
      `${formatNumber(won)} won (${formatRatioAsPercent(won, graph.size, 1)})`
  )

  logger.log('Saving results to the database')
  const written = repository.persistConfigurations(
    table.entries().map((entry) => ({ board: entry.board, feasible: true, won: entry.won })),
    { onProgress: reporter.report }
  )
  const runId = repository.recordSolveRun({
    startBoard: start,
    emptyPosition,
    feasibleCount: graph.size,
    wonCount: won,
    edgeCount: graph.edgeCount,
  })
  logger.log(`Saved ${formatCount(written, 'new configuration')} (solve run ${runId})`)

  return {
    runId,
    start,
    feasible: graph.size,
    won,
    edges: graph.edgeCount,
    probes: graph.probes,
    written,
  }
}

// =============================================================================
// view configuration | sequence
// =============================================================================

export function viewConfigurationCommand(
  { repository, logger }: CommandContext,
  board: Board
): Configuration {
  const configuration = repository.requireConfiguration(board)

  logger.log(`Configuration ${board}: ${formatBoard(board)}`)
  logger.log(renderBoard(board, BOARD_INDENT))
  logger.log(
    `${' '.repeat(BOARD_INDENT)}${formatCount(popcount(board), 'peg')}, ` +
      `${configuration.won ? 'won' : 'lost'}${configuration.feasible ? '' : ', not feasible'}`
  )
  return configuration
}

export function viewSequenceCommand({ repository, logger }: CommandContext, id: number): Board[] {
  const sequence = repository.getSequence(id)
  const boards = replaySequence(sequence.start, sequence.moves)

  logger.log(
    `Sequence ${id}: ${formatCount(sequence.moveCount, 'move')} from configuration ${describeBoard(sequence.start)}`
  )
  boards.forEach((board, index) => {
    if (index > 0) {
      logger.log(`Move ${index}: ${formatMove(sequence.moves[index - 1])}`)
    }
    logger.log(`Configuration ${board}: ${formatBoard(board)}`)
    logger.log(renderBoard(board, BOARD_INDENT))
  })
  return boards
}

// =============================================================================
// list sequences
// =============================================================================

export interface ListedSequence {
  id: number
  moves: readonly MoveTemplate[]
}

export interface ListSequencesSummary {
  total: number
  listed: ListedSequence[]
}

/**
 * Enumerates solving sequences from the stored classification, stores the
 * ones it lists and prints their ids. With `stored`, lists the sequences
 * already saved for the configuration instead.
 */
export function listSequencesCommand(
  { repository, logger }: CommandContext,
  board: Board,
  options: ListSequencesOptions
): ListSequencesSummary {
  const stored = repository.listSequences(board)

  for (const transformation of repository.listTransformationsFrom(board)) {
    logger.log(
      `Configuration ${describeBoard(board)} is a transformation ` +
        `(${transformation.symmetry.toLowerCase()}) of configuration ${describeBoard(transformation.to)}`
    )
  }

  let total: number
  let listed: ListedSequence[]
  if (options.stored) {
    total = stored.length
    listed = stored.slice(0, options.limit).map(({ id, moves }) => ({ id, moves }))
  } else {
    const table = repository.loadWinTable()
    total = countSequences(board, table)
    listed = takeSequences(sequencesFor(board, table), options.limit).map((sequence) => ({
      id: repository.persistSequence(board, sequence.moves),
      moves: sequence.moves,
    }))
  }

  logger.log(
    `Listing ${formatNumber(listed.length)} of ` +
      `${formatCount(total, options.stored ? 'stored sequence' : 'sequence')} ` +
      `for configuration ${describeBoard(board)}`
  )
  logger.log(renderBoard(board, BOARD_INDENT))
  for (const { id, moves } of listed) {
    logger.log(`${id} (${formatCount(moves.length, 'move')})`)
  }

  if (total > listed.length) {
    logger.log(`... ${formatNumber(total - listed.length)} more (raise --limit to list them)`)
  }
  return { total, listed }
}

// =============================================================================
// analysis transformations
// =============================================================================

export interface TransformationSummary {
  total: number
  unique: number
  transformations: number
  written: number
}

export function analyzeTransformationsCommand({
  repository,
  logger,
}: CommandContext): TransformationSummary {
  logger.log('Identifying board configurations that are unique for all valid transformations')

  const boards = repository.listConfigurationBoards()
  const { unique, transformations } = findTransformations(boards)
  const written = repository.persistTransformations(transformations)

  logger.log(
    `${formatNumber(boards.length)} configurations reduced to ${formatNumber(unique.length)} unique configurations`
  )
  return {
    total: boards.length,
    unique: unique.length,
    transformations: transformations.length,
    written,
  }
}
