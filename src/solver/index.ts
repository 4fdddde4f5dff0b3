/**
 * Solver entry point: discover the feasible boards from a start board, then
 * classify them.
 */

import { createStartBoard, type Board, type Position } from '../game/triangles'
import type { ProgressCallback } from '../lib/progress'
import { classify, type WinTable } from './classifier'
import { discover, type StateGraph } from './reachability'

export { classify, WinTable, type ClassifiedBoard, type WinLookup } from './classifier'
export { discover, StateGraph, type Transition } from './reachability'
export {
  countSequences,
  replaySequence,
  sequencesFor,
  takeSequences,
  wonSuccessors,
  type Sequence,
} from './sequences'

export interface SolveOptions {
  /** Hole left empty on the full starting board */
  emptyPosition: Position
  onProgress?: ProgressCallback
}

export interface SolveResult {
  start: Board
  graph: StateGraph
  table: WinTable
}

export function solve({ emptyPosition, onProgress }: SolveOptions): SolveResult {
  const start = createStartBoard(emptyPosition)
  const graph = discover(start, { onProgress })
  const table = classify(graph, { onProgress })
  return { start, graph, table }
}
