/**
 * Triangles Game Engine
 *
 * Topology and move rules for the 15-hole triangular peg-solitaire board.
 * This module contains no I/O and is shared by the solver, the store
 * and the command line tool.
 *
 * Board layout (position indices):
 *
 *    0   1   2   3   4
 *      5   6   7   8
 *        9  10  11
 *         12  13
 *           14
 */

import { InvalidBoardError, InvalidPositionError } from '../lib/errorUtils'

// Board dimensions
export const ROW_COUNT = 5
export const POSITION_COUNT = 15

/** Number of distinct boards (15-bit integers) */
export const BOARD_SPACE = 1 << POSITION_COUNT

/** Board with every hole filled */
export const FULL_BOARD = BOARD_SPACE - 1

export const PEG_GLYPH = '●'
export const HOLE_GLYPH = '○'

// A position is an index 0-14, a board is a 15-bit integer.
// The binary rendering of a board (most significant bit first) lists positions
// 0..14 from left to right, so position p lives in bit (14 - p).
export type Position = number
export type Board = number

/**
 * Triangular coordinate of a position.
 * `row` is the number of holes in the row (5 at the top edge, 1 at the apex),
 * `col` runs from 1 to `row`.
 */
export interface Coordinate {
  row: number
  col: number
}

export interface MoveTemplate {
  from: Position
  over: Position
  to: Position
}

// ============================================================================
// TOPOLOGY
// ============================================================================

/**
 * Index of the first position in a row: rows with more holes come first.
 */
function rowOffset(row: number): number {
  return POSITION_COUNT - (row * (row + 1)) / 2
}

function buildCoordinates(): Coordinate[] {
  const coordinates: Coordinate[] = []
  for (let row = ROW_COUNT; row >= 1; row--) {
    for (let col = 1; col <= row; col++) {
      coordinates.push({ row, col })
    }
  }
  return coordinates
}

const COORDINATES: readonly Coordinate[] = buildCoordinates()

/** All positions in index order */
export const POSITIONS: readonly Position[] = COORDINATES.map((_, index) => index)

/**
 * Neighbor directions as (row delta, col delta), one pair per lattice axis:
 * along a row, towards the apex on the left edge, towards the apex on the right edge.
 */
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [0, -1],
  [-1, 0],
  [1, 0],
  [-1, -1],
  [1, 1],
]

/**
 * Returns the position at a coordinate, or null if the coordinate is off the board.
 */
export function positionAt(row: number, col: number): Position | null {
  if (row < 1 || row > ROW_COUNT || col < 1 || col > row) {
    return null
  }
  return rowOffset(row) + col - 1
}

export function isValidPosition(position: number): boolean {
  return Number.isInteger(position) && position >= 0 && position < POSITION_COUNT
}

export function assertPosition(position: number, name = 'position'): Position {
  if (!isValidPosition(position)) {
    throw new InvalidPositionError(`${name} out of range (must be 0 through ${POSITION_COUNT - 1})`)
  }
  return position
}

export function positionCoordinate(position: Position): Coordinate {
  return COORDINATES[assertPosition(position)]
}

function buildMoveTemplates(): MoveTemplate[] {
  const templates: MoveTemplate[] = []
  for (const from of POSITIONS) {
    const { row, col } = COORDINATES[from]
    for (const [deltaRow, deltaCol] of DIRECTIONS) {
      const over = positionAt(row + deltaRow, col + deltaCol)
      const to = positionAt(row + 2 * deltaRow, col + 2 * deltaCol)
      if (over !== null && to !== null) {
        templates.push({ from, over, to })
      }
    }
  }
  return templates
}

/**
 * Every jump the board allows, ignoring pegs.
 * Ordered by `from` position, then by direction; the order is part of the
 * contract because sequence enumeration follows it.
 */
export const MOVE_TEMPLATES: readonly MoveTemplate[] = Object.freeze(
  buildMoveTemplates().map((template) => Object.freeze(template))
)

/**
 * Builds the template list again from scratch.
 * Used to check that topology construction is deterministic.
 */
export function computeMoveTemplates(): MoveTemplate[] {
  return buildMoveTemplates()
}

// ============================================================================
// BOARDS
// ============================================================================

export function isValidBoard(board: number): boolean {
  return Number.isInteger(board) && board >= 0 && board < BOARD_SPACE
}

/**
 * Fails fast on values that cannot be a board (outside 0..32767 or not an integer).
 */
export function assertBoard(board: number): Board {
  if (!isValidBoard(board)) {
    throw new InvalidBoardError(`Invalid board ${board} (must be an integer 0 through ${FULL_BOARD})`)
  }
  return board
}

export function positionMask(position: Position): number {
  return 1 << (POSITION_COUNT - 1 - position)
}

export function hasPeg(board: Board, position: Position): boolean {
  return (board & positionMask(position)) !== 0
}

/**
 * Number of pegs on the board.
 */
export function popcount(board: Board): number {
  let count = 0
  let rest = board
  while (rest !== 0) {
    rest &= rest - 1
    count++
  }
  return count
}

export function pegPositions(board: Board): Position[] {
  return POSITIONS.filter((position) => hasPeg(board, position))
}

/**
 * Creates a full board with a single empty hole.
 */
export function createStartBoard(emptyPosition: Position): Board {
  return FULL_BOARD & ~positionMask(assertPosition(emptyPosition, 'empty position'))
}

/**
 * Formats a board as its 15-character binary string (position 0 first).
 */
export function formatBoard(board: Board): string {
  return assertBoard(board).toString(2).padStart(POSITION_COUNT, '0')
}

/**
 * Renders the board as a triangular grid of glyphs.
 *
 * @param indent - Number of spaces prepended to every line
 *
 * @example
 * renderBoard(32766)
 * //  ●   ●   ●   ●   ●
 * //    ●   ●   ●   ●
 * //      ●   ●   ●
 * //        ●   ●
 * //          ○
 */
export function renderBoard(board: Board, indent = 0): string {
  assertBoard(board)
  const lines: string[] = []
  for (let row = ROW_COUNT; row >= 1; row--) {
    const glyphs: string[] = []
    for (let col = 1; col <= row; col++) {
      glyphs.push(hasPeg(board, rowOffset(row) + col - 1) ? PEG_GLYPH : HOLE_GLYPH)
    }
    lines.push(' '.repeat(indent + 1 + 2 * (ROW_COUNT - row)) + glyphs.join('   '))
  }
  return lines.join('\n')
}

// ============================================================================
// MOVES
// ============================================================================

/**
 * Applies a move template to a board.
 * Does NOT throw on illegal moves: an illegal move is a normal outcome.
 *
 * @returns The resulting board, or null if `from` or `over` is empty or `to` is occupied
 */
export function applyMove(board: Board, template: MoveTemplate): Board | null {
  const fromMask = positionMask(template.from)
  const overMask = positionMask(template.over)
  const toMask = positionMask(template.to)

  if ((board & fromMask) === 0 || (board & overMask) === 0 || (board & toMask) !== 0) {
    return null
  }

  return (board & ~fromMask & ~overMask) | toMask
}

/**
 * Returns the templates that are legal on the board, in template order.
 */
export function legalMoves(board: Board): MoveTemplate[] {
  return MOVE_TEMPLATES.filter((template) => applyMove(board, template) !== null)
}

/**
 * Checks whether the game is won (exactly one peg remaining).
 */
export function isWinningBoard(board: Board): boolean {
  return popcount(board) === 1
}

export function formatMove(move: MoveTemplate): string {
  return `${move.from} -> ${move.to} (over ${move.over})`
}
