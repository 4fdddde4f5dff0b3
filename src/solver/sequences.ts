/**
 * Sequence enumerator
 *
 * Walks the transition graph from a configuration, following only won
 * successors, and produces every move sequence that leaves a single peg.
 */

import {
  MOVE_TEMPLATES,
  applyMove,
  assertBoard,
  formatMove,
  isWinningBoard,
  type Board,
  type MoveTemplate,
} from '../game/triangles'
import { ConfigurationNotFoundError, IllegalMoveError } from '../lib/errorUtils'
import type { WinLookup } from './classifier'
import type { Transition } from './reachability'

export interface Sequence {
  /** Board the sequence starts from */
  start: Board
  /** Moves in play order; empty when `start` already has one peg */
  moves: readonly MoveTemplate[]
}

/**
 * Successors of a board that are themselves won, in move template order.
 */
export function wonSuccessors(board: Board, lookup: WinLookup): Transition[] {
  const transitions: Transition[] = []
  for (const move of MOVE_TEMPLATES) {
    const successor = applyMove(board, move)
    if (successor !== null && lookup.isFeasible(successor) && lookup.isWon(successor)) {
      transitions.push({ move, board: successor })
    }
  }
  return transitions
}

function* walk(start: Board, lookup: WinLookup): Generator<Sequence> {
  if (!lookup.isWon(start)) {
    return
  }

  const moves: MoveTemplate[] = []

  function* visit(board: Board): Generator<Sequence> {
    if (isWinningBoard(board)) {
      yield { start, moves: [...moves] }
      return
    }
    for (const transition of wonSuccessors(board, lookup)) {
      moves.push(transition.move)
      yield* visit(transition.board)
      moves.pop()
    }
  }

  yield* visit(start)
}

/**
 * Lazily enumerates the solving sequences of a configuration.
 *
 * The result can be iterated any number of times; each iteration restarts the
 * walk. Order follows the move template order at every step. A feasible board
 * that is lost produces no sequences.
 *
 * @throws InvalidBoardError if `board` is not a board
 * @throws ConfigurationNotFoundError if `board` is not in the feasible set
 *
 * @example
 * for (const sequence of sequencesFor(32744, table)) {
 *   console.log(sequence.moves.map(formatMove).join(', '))
 * }
 */
export function sequencesFor(board: Board, lookup: WinLookup): Iterable<Sequence> {
  assertBoard(board)
  if (!lookup.isFeasible(board)) {
    throw new ConfigurationNotFoundError(board)
  }
  return {
    [Symbol.iterator]: () => walk(board, lookup),
  }
}

/**
 * Takes at most `limit` sequences from the enumerator.
 */
export function takeSequences(sequences: Iterable<Sequence>, limit: number): Sequence[] {
  const taken: Sequence[] = []
  if (limit <= 0) {
    return taken
  }
  for (const sequence of sequences) {
    taken.push(sequence)
    if (taken.length >= limit) break
  }
  return taken
}

/**
 * Counts the solving sequences of a configuration without producing them.
 * Suffix counts of shared successors are computed once.
 *
 * @throws ConfigurationNotFoundError if `board` is not in the feasible set
 */
export function countSequences(board: Board, lookup: WinLookup): number {
  assertBoard(board)
  if (!lookup.isFeasible(board)) {
    throw new ConfigurationNotFoundError(board)
  }

  const memo = new Map<Board, number>()

  function count(current: Board): number {
    const known = memo.get(current)
    if (known !== undefined) return known

    let total = 0
    if (isWinningBoard(current)) {
      total = 1
    } else if (lookup.isWon(current)) {
      for (const transition of wonSuccessors(current, lookup)) {
        total += count(transition.board)
      }
    }
    memo.set(current, total)
    return total
  }

  return count(board)
}

/**
 * Plays a list of moves from a board.
 *
 * @returns Every board along the way, starting with `start`
 * @throws IllegalMoveError if a move cannot be played on the board before it
 */
export function replaySequence(start: Board, moves: readonly MoveTemplate[]): Board[] {
  const boards: Board[] = [assertBoard(start)]
  let board = start
  moves.forEach((move, step) => {
    const next = applyMove(board, move)
    if (next === null) {
      throw new IllegalMoveError(`Illegal move ${formatMove(move)} at step ${step + 1}`, board, step)
    }
    boards.push(next)
    board = next
  })
  return boards
}
