/**
 * Error handling utilities
 *
 * Error classes raised by the engine, the solver and the command line tool,
 * plus consistent message extraction for reporting.
 */

/**
 * A value that cannot be a board (outside 0..32767, not an integer, or an
 * unparseable board identifier).
 */
export class InvalidBoardError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidBoardError'
  }
}

/**
 * A position index outside 0..14.
 */
export class InvalidPositionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidPositionError'
  }
}

/**
 * A move that cannot be played on the board it is applied to.
 * Raised only when replaying a stored or supplied sequence; the move engine
 * itself reports illegal moves as null.
 */
export class IllegalMoveError extends Error {
  constructor(
    message: string,
    public readonly board: number,
    public readonly step: number
  ) {
    super(message)
    this.name = 'IllegalMoveError'
  }
}

/**
 * The board is not a known (feasible) configuration.
 */
export class ConfigurationNotFoundError extends Error {
  constructor(public readonly board: number) {
    super(`Configuration ${board}, ${board.toString(2).padStart(15, '0')} not found`)
    this.name = 'ConfigurationNotFoundError'
  }
}

/**
 * A sequence that starts on, passes through or ends on a configuration that is
 * not stored as feasible and won.
 */
export class UnsolvedConfigurationError extends Error {
  constructor(
    public readonly board: number,
    public readonly step: number
  ) {
    super(
      `Configuration ${board}, ${board.toString(2).padStart(15, '0')} reached at step ${step} is not won`
    )
    this.name = 'UnsolvedConfigurationError'
  }
}

export class SequenceNotFoundError extends Error {
  constructor(public readonly sequenceId: number) {
    super(`Sequence ${sequenceId} could not be found`)
    this.name = 'SequenceNotFoundError'
  }
}

/**
 * Bad command line usage (unknown command, missing or malformed argument).
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Extract a user-friendly error message from an unknown error value.
 * Handles Error objects, strings, and objects with a message property.
 *
 * @param err - The error to extract a message from
 * @param fallback - Fallback message if no message can be extracted (default: 'An error occurred')
 *
 * @example
 * try {
 *   repository.getSequence(id)
 * } catch (err) {
 *   logger.error(getErrorMessage(err))
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    return err.message
  }

  return fallback
}

/**
 * Check if an error was caused by bad input rather than a failure of the tool
 */
export function isValidationError(
  err: unknown
): err is InvalidBoardError | InvalidPositionError | UsageError {
  return (
    err instanceof InvalidBoardError ||
    err instanceof InvalidPositionError ||
    err instanceof UsageError
  )
}

/**
 * Log an error with context.
 *
 * @param context - A description of where/what the error occurred
 * @param err - The error to log
 * @param logger - Destination (default: console)
 */
export function logError(
  context: string,
  err: unknown,
  logger: Pick<Console, 'error'> = console
): void {
  logger.error(`[${context}] ${getErrorMessage(err)}`)
}
