import { describe, it, expect } from 'vitest'
import { WinTable, classify } from './classifier'
import { discover } from './reachability'
import { ConfigurationNotFoundError, InvalidBoardError } from '../lib/errorUtils'
import type { ProgressEvent } from '../lib/progress'

describe('classify', () => {
  const graph = discover(32766)
  const table = classify(graph)

  it('classifies every feasible board', () => {
    expect(table.size).toBe(3016)
    expect(table.wonCount).toBe(769)
  })

  it('marks the start board and both openings as won', () => {
    expect(table.isWon(32766)).toBe(true)
    expect(table.isWon(32731)).toBe(true)
    expect(table.isWon(32757)).toBe(true)
    expect(table.isWon(32744)).toBe(true)
  })

  it('marks single-peg boards as won', () => {
    for (const board of graph.layer(1)) {
      expect(table.isWon(board)).toBe(true)
    }
  })

  it('marks boards whose moves only lead to lost boards as lost', () => {
    // pegs at 11, 12, 14: the only jump leaves 9 and 11 stranded
    expect(graph.successors(13).map((transition) => transition.board)).toEqual([40])
    expect(table.isWon(40)).toBe(false)
    expect(table.isWon(13)).toBe(false)
  })

  it('marks every board with a won successor as won', () => {
    for (const { board, won } of table.entries()) {
      if (graph.layer(1).includes(board)) continue
      const anyWon = graph.successors(board).some((transition) => table.isWon(transition.board))
      expect(won).toBe(anyWon)
    }
  })

  it('counts won boards per layer', () => {
    const wonPerLayer = graph
      .layerPegCounts()
      .map((pegs) => graph.layer(pegs).filter((board) => table.isWon(board)).length)
    expect(wonPerLayer).toEqual([1, 2, 8, 24, 70, 120, 158, 158, 116, 62, 28, 12, 6, 4])
  })

  it('classifies the empty 12 start', () => {
    const other = classify(discover(32763))
    expect(other.size).toBe(2377)
    expect(other.wonCount).toBe(550)
  })

  it('reports layers from one peg upwards', () => {
    const events: ProgressEvent[] = []
    classify(graph, { onProgress: (event) => events.push(event) })

    expect(events.length).toBe(15)
    expect(events[0]).toEqual({ phase: 'classify', processed: 4, total: 3016, pegs: 1, done: false })
    expect(events[13]).toEqual({
      phase: 'classify',
      processed: 3016,
      total: 3016,
      pegs: 14,
      done: false,
    })
    expect(events[14]).toEqual({ phase: 'classify', processed: 3016, total: 3016, done: true })
  })
})

describe('WinTable', () => {
  const table = WinTable.fromEntries([
    { board: 36, won: true },
    { board: 1, won: true },
    { board: 40, won: false },
  ])

  it('answers feasibility', () => {
    expect(table.isFeasible(36)).toBe(true)
    expect(table.isFeasible(40)).toBe(true)
    expect(table.isFeasible(32766)).toBe(false)
  })

  it('answers won and lost', () => {
    expect(table.isWon(36)).toBe(true)
    expect(table.isWon(40)).toBe(false)
  })

  it('throws for boards outside the feasible set', () => {
    expect(() => table.isWon(32766)).toThrow(ConfigurationNotFoundError)
    expect(() => table.isWon(32766)).toThrow('Configuration 32766, 111111111111110 not found')
  })

  it('throws for values that are not boards', () => {
    expect(() => table.isFeasible(32768)).toThrow(InvalidBoardError)
    expect(() => table.isWon(-1)).toThrow(InvalidBoardError)
  })

  it('lists entries in ascending order', () => {
    expect(table.entries()).toEqual([
      { board: 1, won: true },
      { board: 36, won: true },
      { board: 40, won: false },
    ])
    expect(table.size).toBe(3)
    expect(table.wonCount).toBe(2)
  })

  it('wraps a full state array', () => {
    const states = new Uint8Array(32768)
    states[1] = 2
    states[40] = 1
    const wrapped = WinTable.fromStates(states)
    expect(wrapped.isWon(1)).toBe(true)
    expect(wrapped.isWon(40)).toBe(false)
    expect(wrapped.size).toBe(2)
  })

  it('rejects state arrays that do not cover every board', () => {
    expect(() => WinTable.fromStates(new Uint8Array(10))).toThrow('Expected 32768 board states, got 10')
  })

  it('rejects unknown state values', () => {
    const states = new Uint8Array(32768)
    states[7] = 3
    expect(() => WinTable.fromStates(states)).toThrow('Board 7 has unknown state 3')
  })
})
