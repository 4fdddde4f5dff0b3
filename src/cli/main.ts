import { z } from 'zod'
import { createDb, openSqlite, type Database } from '../../shared/db/client'
import { UsageError, isValidationError, logError } from '../lib/errorUtils'
import { parseBoardId, parseSequenceId } from '../lib/validation'
import { TrianglesRepository } from '../store/repository'
import {
  listSequencesOptionsSchema,
  parseArgs,
  parseOptions,
  resolveDbFile,
  solveOptionsSchema,
  type OptionValue,
} from './args'
import {
  analyzeTransformationsCommand,
  dropCommand,
  initCommand,
  listSequencesCommand,
  resetCommand,
  solveCommand,
  viewConfigurationCommand,
  viewSequenceCommand,
  type CommandContext,
  type Logger,
} from './commands'

export const USAGE = `Usage: triangles [--dbfile=<path>] <command>

Commands:
  db init | drop | reset              Create, drop or recreate the tables
  solve [--empty-position=14]         Classify every feasible configuration and save it
  view configuration <board>          Show a stored configuration
  view sequence <id>                  Show every board of a stored sequence
  list sequences <board> [--limit=N]  Enumerate, save and list solving sequences
      [--stored]                      List the sequences already saved instead
  analysis transformations            Record symmetric duplicates of stored configurations

Boards are decimal (0-32767) or 15-character binary strings (position 0 first).`

export interface Connection {
  db: Database
  close(): void
}

export interface MainDependencies {
  logger?: Logger
  env?: NodeJS.ProcessEnv
  /** Opens the database; defaults to a better-sqlite3 file connection */
  connect?: (dbFile: string) => Connection
  now?: () => number
}

type CommandHandler = (context: CommandContext) => void

const noOptionsSchema = z.object({})

function connectSqlite(dbFile: string): Connection {
  const sqlite = openSqlite(dbFile)
  return { db: createDb(sqlite), close: () => sqlite.close() }
}

function argumentAt(positionals: readonly string[], index: number, name: string): string {
  const value = positionals[index]
  if (value === undefined) {
    throw new UsageError(`Missing argument <${name}> for "${positionals.slice(0, index).join(' ')}"`)
  }
  return value
}

function expectArity(positionals: readonly string[], count: number): void {
  if (positionals.length > count) {
    throw new UsageError(`Unexpected argument "${positionals[count]}"`)
  }
}

/**
 * Maps the command line onto a handler. Arguments are validated here, before
 * any database is opened.
 */
export function resolveCommand(
  positionals: readonly string[],
  options: Record<string, OptionValue>
): CommandHandler {
  const [group, action] = positionals

  switch (group) {
    case 'db': {
      expectArity(positionals, 2)
      parseOptions(noOptionsSchema, options)
      if (action === 'init') return initCommand
      if (action === 'drop') return dropCommand
      if (action === 'reset') return resetCommand
      break
    }
    case 'solve': {
      expectArity(positionals, 1)
      const solveOptions = parseOptions(solveOptionsSchema, options)
      return (context) => {
        solveCommand(context, solveOptions)
      }
    }
    case 'view': {
      expectArity(positionals, 3)
      parseOptions(noOptionsSchema, options)
      if (action === 'configuration') {
        const board = parseBoardId(argumentAt(positionals, 2, 'board'))
        return (context) => {
          viewConfigurationCommand(context, board)
        }
      }
      if (action === 'sequence') {
        const id = parseSequenceId(argumentAt(positionals, 2, 'id'))
        return (context) => {
          viewSequenceCommand(context, id)
        }
      }
      break
    }
    case 'list': {
      expectArity(positionals, 3)
      if (action === 'sequences') {
        const listOptions = parseOptions(listSequencesOptionsSchema, options)
        const board = parseBoardId(argumentAt(positionals, 2, 'board'))
        return (context) => {
          listSequencesCommand(context, board, listOptions)
        }
      }
      break
    }
    case 'analysis': {
      expectArity(positionals, 2)
      parseOptions(noOptionsSchema, options)
      if (action === 'transformations') {
        return (context) => {
          analyzeTransformationsCommand(context)
        }
      }
      break
    }
  }

  throw new UsageError(`Unknown command "${positionals.join(' ')}"`)
}

/**
 * Runs the tool and returns the process exit code:
 * 0 on success, 2 for bad usage or input, 1 for any other failure.
 */
export function main(argv: readonly string[], dependencies: MainDependencies = {}): number {
  const logger = dependencies.logger ?? console
  const connect = dependencies.connect ?? connectSqlite

  try {
    const { positionals, options } = parseArgs(argv)
    if (options.help === true || positionals[0] === 'help') {
      logger.log(USAGE)
      return 0
    }
    if (positionals.length === 0) {
      logger.error(USAGE)
      return 2
    }

    const handler = resolveCommand(positionals, options)
    const dbFile = resolveDbFile(options, dependencies.env)
    const connection = connect(dbFile)
    try {
      handler({
        db: connection.db,
        repository: new TrianglesRepository(connection.db, dependencies.now),
        dbFile,
        logger,
        now: dependencies.now,
      })
    } finally {
      connection.close()
    }
    return 0
  } catch (err) {
    logError('triangles', err, logger)
    if (err instanceof UsageError) {
      logger.error('Run "triangles help" for usage.')
    }
    return isValidationError(err) ? 2 : 1
  }
}
