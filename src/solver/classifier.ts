/**
 * Win classifier
 *
 * Labels every feasible board as won or lost by backward induction over the
 * layered transition graph, starting from the one-peg layer.
 */

import { BOARD_SPACE, assertBoard, type Board } from '../game/triangles'
import { ConfigurationNotFoundError } from '../lib/errorUtils'
import type { ProgressCallback } from '../lib/progress'
import type { StateGraph } from './reachability'

/**
 * Read access to a win/loss classification.
 * Implemented by the in-memory `WinTable`; the store builds one from its rows.
 */
export interface WinLookup {
  isFeasible(board: Board): boolean
  /**
   * @throws InvalidBoardError for values outside 0..32767
   * @throws ConfigurationNotFoundError for boards outside the feasible set
   */
  isWon(board: Board): boolean
}

export interface ClassifiedBoard {
  board: Board
  won: boolean
}

export interface ClassifyOptions {
  onProgress?: ProgressCallback
}

const UNKNOWN = 0
const LOST = 1
const WON = 2

/**
 * Classification of a feasible set, one byte per possible board.
 */
export class WinTable implements WinLookup {
  private constructor(private readonly states: Uint8Array) {}

  /**
   * Builds a table from already classified boards (e.g. rows read back from the store).
   */
  static fromEntries(entries: Iterable<ClassifiedBoard>): WinTable {
    const states = new Uint8Array(BOARD_SPACE)
    for (const { board, won } of entries) {
      states[assertBoard(board)] = won ? WON : LOST
    }
    return new WinTable(states)
  }

  /**
   * Wraps a state array indexed by board: 0 unknown, 1 lost, 2 won.
   *
   * @throws RangeError if the array does not cover every board or holds other values
   */
  static fromStates(states: Uint8Array): WinTable {
    if (states.length !== BOARD_SPACE) {
      throw new RangeError(`Expected ${BOARD_SPACE} board states, got ${states.length}`)
    }
    const invalid = states.findIndex((state) => state > WON)
    if (invalid !== -1) {
      throw new RangeError(`Board ${invalid} has unknown state ${states[invalid]}`)
    }
    return new WinTable(states)
  }

  isFeasible(board: Board): boolean {
    return this.states[assertBoard(board)] !== UNKNOWN
  }

  isWon(board: Board): boolean {
    const state = this.states[assertBoard(board)]
    if (state === UNKNOWN) {
      throw new ConfigurationNotFoundError(board)
    }
    return state === WON
  }

  /** Classified boards in ascending board order */
  entries(): ClassifiedBoard[] {
    const entries: ClassifiedBoard[] = []
    for (let board = 0; board < BOARD_SPACE; board++) {
      const state = this.states[board]
      if (state !== UNKNOWN) {
        entries.push({ board, won: state === WON })
      }
    }
    return entries
  }

  get size(): number {
    return this.states.reduce((count, state) => (state === UNKNOWN ? count : count + 1), 0)
  }

  get wonCount(): number {
    return this.states.reduce((count, state) => (state === WON ? count + 1 : count), 0)
  }
}

/**
 * Classifies every board of the graph.
 *
 * A board is won when it has one peg, or when at least one of its successors
 * is won. Boards with more than one peg and no moves are lost.
 */
export function classify(graph: StateGraph, options: ClassifyOptions = {}): WinTable {
  const { onProgress } = options
  const states = new Uint8Array(BOARD_SPACE)
  let processed = 0

  const pegCounts = graph.layerPegCounts().reverse()
  for (const pegs of pegCounts) {
    // Successors sit in the (pegs - 1) layer, classified on the previous iteration.
    const layer = graph.layer(pegs)
    for (const board of layer) {
      const won =
        pegs === 1 || graph.successors(board).some((transition) => states[transition.board] === WON)
      states[board] = won ? WON : LOST
    }

    processed += layer.length
    onProgress?.({ phase: 'classify', processed, total: graph.size, pegs, done: false })
  }

  onProgress?.({ phase: 'classify', processed, total: graph.size, done: true })
  return WinTable.fromStates(states)
}
