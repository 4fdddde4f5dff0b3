/**
 * Board symmetries
 *
 * The triangle has six symmetries (identity, two rotations, three reflections).
 * Each one permutes the distances of a position to the three sides of the board,
 * which makes the position mapping a one-liner per symmetry.
 */

import {
  POSITIONS,
  ROW_COUNT,
  assertBoard,
  pegPositions,
  positionAt,
  positionCoordinate,
  positionMask,
  type Board,
  type Position,
} from './triangles'

// Distances of a position to the top edge, the left edge and the right edge.
type SideDistances = readonly [number, number, number]

export interface Symmetry {
  name: string
  /** permutation[p] is the position that position p moves to */
  permutation: readonly Position[]
}

export interface Transformation {
  /** Board that was found to be a symmetric image of an earlier board */
  from: Board
  /** Earlier board it maps onto */
  to: Board
  symmetry: string
}

function toDistances(position: Position): SideDistances {
  const { row, col } = positionCoordinate(position)
  return [ROW_COUNT - row, col - 1, row - col]
}

function fromDistances([top, left]: SideDistances): Position {
  const position = positionAt(ROW_COUNT - top, left + 1)
  if (position === null) {
    throw new Error(`No position at side distances ${top}, ${left}`)
  }
  return position
}

function defineSymmetry(
  name: string,
  map: (distances: SideDistances) => SideDistances
): Symmetry {
  return {
    name,
    permutation: POSITIONS.map((position) => fromDistances(map(toDistances(position)))),
  }
}

/**
 * Every symmetry except the identity, in the order transformations are tried.
 */
export const SYMMETRIES: readonly Symmetry[] = [
  defineSymmetry('Reflection', ([a, b, c]) => [a, c, b]),
  defineSymmetry('Clockwise rotation', ([a, b, c]) => [c, a, b]),
  defineSymmetry('Counter-clockwise rotation', ([a, b, c]) => [b, c, a]),
  defineSymmetry('Clockwise rotation and reflection', ([a, b, c]) => [b, a, c]),
  defineSymmetry('Counter-clockwise rotation and reflection', ([a, b, c]) => [c, b, a]),
]

/**
 * Moves every peg of the board to its image under the symmetry.
 */
export function transformBoard(board: Board, symmetry: Symmetry): Board {
  return pegPositions(assertBoard(board)).reduce(
    (transformed, position) => transformed | positionMask(symmetry.permutation[position]),
    0
  )
}

/**
 * Splits boards into unique representatives and transformations.
 *
 * Boards are processed in the given order. A board whose image under some
 * symmetry equals an earlier unique board is recorded as a transformation of
 * it (first matching symmetry wins); otherwise it becomes unique itself.
 */
export function findTransformations(boards: Iterable<Board>): {
  unique: Board[]
  transformations: Transformation[]
} {
  const unique: Board[] = []
  const uniqueSet = new Set<Board>()
  const transformations: Transformation[] = []

  for (const board of boards) {
    const match = SYMMETRIES.map((symmetry) => ({
      symmetry,
      image: transformBoard(board, symmetry),
    })).find(({ image }) => image !== board && uniqueSet.has(image))

    if (match) {
      transformations.push({ from: board, to: match.image, symmetry: match.symmetry.name })
    } else {
      unique.push(board)
      uniqueSet.add(board)
    }
  }

  return { unique, transformations }
}
