/**
 * Reachability search
 *
 * Forward closure from a start board over the move engine. Every move removes
 * exactly one peg, so the transition graph is a DAG layered by peg count and a
 * breadth-first pass visits it one layer at a time.
 */

import {
  BOARD_SPACE,
  MOVE_TEMPLATES,
  applyMove,
  assertBoard,
  popcount,
  type Board,
  type MoveTemplate,
} from '../game/triangles'
import type { ProgressCallback } from '../lib/progress'

/**
 * An edge of the transition graph: the template played and the board it produces.
 */
export interface Transition {
  move: MoveTemplate
  board: Board
}

export interface DiscoverOptions {
  /** Called once per completed layer, then once with `done: true` */
  onProgress?: ProgressCallback
}

const NO_TRANSITIONS: readonly Transition[] = Object.freeze([])

/**
 * The feasible boards reachable from a start board and the edges between them.
 * Built by `discover`; read-only afterwards.
 */
export class StateGraph {
  constructor(
    readonly start: Board,
    private readonly visited: Uint8Array,
    private readonly edges: ReadonlyMap<Board, readonly Transition[]>,
    private readonly layers: ReadonlyMap<number, readonly Board[]>,
    readonly edgeCount: number,
    readonly probes: number
  ) {}

  /** Number of feasible boards */
  get size(): number {
    return this.edges.size
  }

  has(board: Board): boolean {
    return board >= 0 && board < BOARD_SPACE && this.visited[board] === 1
  }

  /**
   * Outgoing edges of a board, in move template order.
   * Empty for dead ends and for boards outside the graph.
   */
  successors(board: Board): readonly Transition[] {
    return this.edges.get(board) ?? NO_TRANSITIONS
  }

  /**
   * Feasible boards with the given number of pegs, in discovery order.
   */
  layer(pegs: number): readonly Board[] {
    return this.layers.get(pegs) ?? []
  }

  /** Peg counts that have at least one feasible board, largest first */
  layerPegCounts(): number[] {
    return [...this.layers.keys()].sort((a, b) => b - a)
  }

  /** All feasible boards in ascending order */
  boards(): Board[] {
    const boards: Board[] = []
    for (let board = 0; board < BOARD_SPACE; board++) {
      if (this.visited[board] === 1) {
        boards.push(board)
      }
    }
    return boards
  }
}

/**
 * Discovers every board reachable from `start` and the transitions between them.
 *
 * @throws InvalidBoardError if `start` is not a board
 */
export function discover(start: Board, options: DiscoverOptions = {}): StateGraph {
  assertBoard(start)
  const { onProgress } = options

  const visited = new Uint8Array(BOARD_SPACE)
  const edges = new Map<Board, Transition[]>()
  const layers = new Map<number, Board[]>()
  let edgeCount = 0
  let probes = 0

  visited[start] = 1
  let frontier: Board[] = [start]

  while (frontier.length > 0) {
    const pegs = popcount(frontier[0])
    layers.set(pegs, frontier)
    const next: Board[] = []

    for (const board of frontier) {
      const transitions: Transition[] = []
      for (const move of MOVE_TEMPLATES) {
        probes++
        const successor = applyMove(board, move)
        if (successor === null) continue

        transitions.push({ move, board: successor })
        if (visited[successor] === 0) {
          visited[successor] = 1
          next.push(successor)
        }
      }
      edges.set(board, transitions)
      edgeCount += transitions.length
    }

    onProgress?.({
      phase: 'discover',
      processed: edges.size,
      pegs,
      edges: edgeCount,
      probes,
      done: false,
    })
    frontier = next
  }

  onProgress?.({
    phase: 'discover',
    processed: edges.size,
    edges: edgeCount,
    probes,
    done: true,
  })

  return new StateGraph(start, visited, edges, layers, edgeCount, probes)
}
