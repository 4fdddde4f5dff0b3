import { describe, it, expect } from 'vitest'
import { classify } from './classifier'
import { discover } from './reachability'
import {
  countSequences,
  replaySequence,
  sequencesFor,
  takeSequences,
  wonSuccessors,
  type Sequence,
} from './sequences'
import { popcount } from '../game/triangles'
import {
  ConfigurationNotFoundError,
  IllegalMoveError,
  InvalidBoardError,
} from '../lib/errorUtils'

const table = classify(discover(32766))

function moveTriples(sequence: Sequence): number[][] {
  return sequence.moves.map((move) => [move.from, move.over, move.to])
}

describe('wonSuccessors', () => {
  it('returns won successors in template order', () => {
    expect(wonSuccessors(32744, table).map((transition) => transition.board)).toEqual([
      24312, 30584, 32204, 32674,
    ])
  })

  it('skips lost successors', () => {
    expect(wonSuccessors(13, table)).toEqual([])
  })
})

describe('sequencesFor', () => {
  it('starts with the first sequence in template order', () => {
    const [first] = takeSequences(sequencesFor(32744, table), 1)
    expect(first.start).toBe(32744)
    expect(moveTriples(first)).toEqual([
      [1, 6, 10],
      [3, 2, 1],
      [0, 1, 2],
      [5, 9, 12],
      [8, 11, 13],
      [2, 7, 11],
      [12, 10, 7],
      [13, 11, 8],
      [4, 8, 11],
      [11, 7, 2],
    ])
  })

  it('ends every sequence with a single peg', () => {
    for (const sequence of takeSequences(sequencesFor(32744, table), 25)) {
      const boards = replaySequence(sequence.start, sequence.moves)
      expect(sequence.moves.length).toBe(10)
      expect(popcount(boards[boards.length - 1])).toBe(1)
    }
  })

  it('can be iterated more than once', () => {
    const sequences = sequencesFor(36, table)
    const first = [...sequences].map(moveTriples)
    const second = [...sequences].map(moveTriples)
    expect(first).toEqual([[[9, 12, 14]], [[12, 9, 5]]])
    expect(second).toEqual(first)
  })

  it('yields one empty sequence for a single peg', () => {
    expect([...sequencesFor(4096, table)]).toEqual([{ start: 4096, moves: [] }])
  })

  it('yields nothing for a lost board', () => {
    expect([...sequencesFor(13, table)]).toEqual([])
  })

  it('throws for boards outside the feasible set', () => {
    expect(() => sequencesFor(32767, table)).toThrow(ConfigurationNotFoundError)
  })

  it('throws for values that are not boards', () => {
    expect(() => sequencesFor(32768, table)).toThrow(InvalidBoardError)
  })

  it('produces every sequence of the corner start', () => {
    let total = 0
    for (const sequence of sequencesFor(32766, table)) {
      expect(sequence.moves.length).toBe(13)
      total++
    }
    expect(total).toBe(29760)
  })
})

describe('takeSequences', () => {
  it('stops at the limit', () => {
    expect(takeSequences(sequencesFor(32744, table), 3).length).toBe(3)
  })

  it('returns fewer when the enumerator runs out', () => {
    expect(takeSequences(sequencesFor(36, table), 10).length).toBe(2)
  })

  it('returns nothing for a limit of zero', () => {
    expect(takeSequences(sequencesFor(36, table), 0)).toEqual([])
  })
})

describe('countSequences', () => {
  it('counts without enumerating', () => {
    expect(countSequences(32766, table)).toBe(29760)
    expect(countSequences(32744, table)).toBe(1402)
    expect(countSequences(32731, table)).toBe(14880)
    expect(countSequences(36, table)).toBe(2)
  })

  it('counts one sequence for a single peg and none for a lost board', () => {
    expect(countSequences(4096, table)).toBe(1)
    expect(countSequences(13, table)).toBe(0)
  })

  it('throws for boards outside the feasible set', () => {
    expect(() => countSequences(32767, table)).toThrow(ConfigurationNotFoundError)
  })
})

describe('won boards and sequences', () => {
  it('has a sequence for a board exactly when it is won', () => {
    for (const { board, won } of table.entries()) {
      expect(countSequences(board, table) > 0).toBe(won)
    }
  })

  it('plays only legal moves through won boards', () => {
    for (const sequence of takeSequences(sequencesFor(32766, table), 50)) {
      for (const board of replaySequence(sequence.start, sequence.moves)) {
        expect(table.isWon(board)).toBe(true)
      }
    }
  })
})

describe('replaySequence', () => {
  it('returns every board including the start', () => {
    expect(
      replaySequence(32766, [
        { from: 9, over: 12, to: 14 },
        { from: 0, over: 5, to: 9 },
      ])
    ).toEqual([32766, 32731, 15867])
  })

  it('returns only the start for no moves', () => {
    expect(replaySequence(32744, [])).toEqual([32744])
  })

  it('throws on an illegal move with the step number', () => {
    const moves = [
      { from: 9, over: 12, to: 14 },
      { from: 9, over: 12, to: 14 },
    ]
    expect(() => replaySequence(32766, moves)).toThrow(IllegalMoveError)
    expect(() => replaySequence(32766, moves)).toThrow('Illegal move 9 -> 14 (over 12) at step 2')
  })

  it('records the board and step of the illegal move', () => {
    try {
      replaySequence(32766, [{ from: 0, over: 1, to: 2 }])
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(IllegalMoveError)
      if (err instanceof IllegalMoveError) {
        expect(err.board).toBe(32766)
        expect(err.step).toBe(0)
      }
    }
  })
})
