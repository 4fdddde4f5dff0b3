/**
 * Input validation utilities
 *
 * Parsing of the identifiers the command line accepts: boards (decimal or
 * 15-character binary) and sequence ids.
 */

import { FULL_BOARD, POSITION_COUNT, type Board } from '../game/triangles'
import { InvalidBoardError, UsageError } from './errorUtils'

// ============================================================================
// VALIDATION CONSTANTS
// ============================================================================

/** Binary board identifier: one character per position, 0 = hole, 1 = peg */
export const BINARY_BOARD_PATTERN = /^[01]{15}$/

/** Decimal identifier (no sign, no exponent) */
export const DECIMAL_PATTERN = /^\d+$/

// ============================================================================
// VALIDATION RESULT TYPES
// ============================================================================

/**
 * Result of a validation check.
 * If valid, error is null. If invalid, error contains the error message.
 */
export interface ValidationResult {
  isValid: boolean
  error: string | null
}

// ============================================================================
// BOARD IDENTIFIERS
// ============================================================================

/**
 * Validates a board identifier.
 *
 * Rules:
 * - A 15-character string of 0s and 1s is read as binary (position 0 first)
 * - Otherwise it must be a decimal integer from 0 to 32767
 *
 * @example
 * validateBoardId('32744')           // { isValid: true, error: null }
 * validateBoardId('111111111101000') // { isValid: true, error: null }
 * validateBoardId('40000')           // { isValid: false, error: 'Board 40000 is out of range...' }
 */
export function validateBoardId(input: string): ValidationResult {
  const value = input.trim()
  if (!value) {
    return { isValid: false, error: 'Board identifier is required' }
  }

  if (BINARY_BOARD_PATTERN.test(value)) {
    return { isValid: true, error: null }
  }

  if (!DECIMAL_PATTERN.test(value)) {
    return {
      isValid: false,
      error: `Board "${value}" must be a decimal number or a ${POSITION_COUNT}-character binary string`,
    }
  }

  if (Number(value) > FULL_BOARD) {
    return {
      isValid: false,
      error: `Board ${value} is out of range (must be 0 through ${FULL_BOARD})`,
    }
  }

  return { isValid: true, error: null }
}

/**
 * Parses a board identifier.
 *
 * @throws InvalidBoardError with the validation message
 *
 * @example
 * parseBoardId('111111111101000') // 32744
 * parseBoardId('32744')           // 32744
 */
export function parseBoardId(input: string): Board {
  const { isValid, error } = validateBoardId(input)
  if (!isValid) {
    throw new InvalidBoardError(error ?? `Invalid board "${input}"`)
  }

  const value = input.trim()
  return BINARY_BOARD_PATTERN.test(value) ? parseInt(value, 2) : Number(value)
}

// ============================================================================
// OTHER IDENTIFIERS
// ============================================================================

/**
 * Parses a stored sequence id (a positive integer).
 *
 * @throws UsageError
 */
export function parseSequenceId(input: string): number {
  const value = input.trim()
  if (!DECIMAL_PATTERN.test(value) || Number(value) < 1 || !Number.isSafeInteger(Number(value))) {
    throw new UsageError(`Sequence id "${value}" must be a positive integer`)
  }
  return Number(value)
}
