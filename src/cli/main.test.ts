import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest'
import { USAGE, main, resolveCommand, type Connection } from './main'
import { renderBoard } from '../game/triangles'
import { UsageError } from '../lib/errorUtils'
import { createTestDatabase, type TestDatabase } from '../store/test-utils'

describe('main', () => {
  let test: TestDatabase
  let lines: string[]
  let errors: string[]
  let close: Mock<() => void>
  let connect: Mock<(dbFile: string) => Connection>

  const logger = {
    log: (line: string) => {
      lines.push(line)
    },
    error: (line: string) => {
      errors.push(line)
    },
  }

  function run(...argv: string[]): number {
    return main(argv, { logger, connect, env: {}, now: () => 0 })
  }

  beforeEach(() => {
    test = createTestDatabase()
    lines = []
    errors = []
    close = vi.fn<() => void>()
    connect = vi.fn<(dbFile: string) => Connection>(() => ({ db: test.db, close }))
  })

  afterEach(() => {
    test.sqlite.close()
  })

  describe('usage', () => {
    it('prints usage and fails without a command', () => {
      expect(run()).toBe(2)
      expect(errors).toEqual([USAGE])
      expect(connect).not.toHaveBeenCalled()
    })

    it('prints usage for help', () => {
      expect(run('help')).toBe(0)
      expect(run('--help')).toBe(0)
      expect(lines).toEqual([USAGE, USAGE])
    })

    it('rejects unknown commands before opening the database', () => {
      expect(run('frobnicate')).toBe(2)
      expect(errors).toEqual(['[triangles] Unknown command "frobnicate"', 'Run "triangles help" for usage.'])
      expect(connect).not.toHaveBeenCalled()
    })

    it('rejects unknown options', () => {
      expect(run('solve', '--limit=3')).toBe(2)
      expect(errors[0]).toBe('[triangles] Unknown option --limit')
    })

    it('rejects extra arguments', () => {
      expect(run('db', 'init', 'now')).toBe(2)
      expect(errors[0]).toBe('[triangles] Unexpected argument "now"')
    })

    it('rejects missing arguments', () => {
      expect(run('view', 'configuration')).toBe(2)
      expect(errors[0]).toBe('[triangles] Missing argument <board> for "view configuration"')
    })

    it('rejects boards out of range without the usage hint', () => {
      expect(run('view', 'configuration', '40000')).toBe(2)
      expect(errors).toEqual(['[triangles] Board 40000 is out of range (must be 0 through 32767)'])
    })

    it('rejects sequence ids that are not positive', () => {
      expect(run('view', 'sequence', '0')).toBe(2)
      expect(errors[0]).toBe('[triangles] Sequence id "0" must be a positive integer')
    })
  })

  describe('database file', () => {
    it('uses the environment when no option is given', () => {
      expect(main(['db', 'init'], { logger, connect, env: { TRIANGLES_DB: 'env.db' } })).toBe(0)
      expect(connect).toHaveBeenCalledWith('env.db')
      expect(lines).toEqual(['Initializing the database at env.db'])
    })

    it('prefers the dbfile option', () => {
      expect(run('--dbfile=option.db', 'db', 'reset')).toBe(0)
      expect(connect).toHaveBeenCalledWith('option.db')
    })

    it('closes the connection after the command', () => {
      run('db', 'init')
      expect(close).toHaveBeenCalledTimes(1)
    })

    it('closes the connection when the command fails', () => {
      expect(run('view', 'configuration', '32766')).toBe(1)
      expect(errors).toEqual(['[triangles] Configuration 32766, 111111111111110 not found'])
      expect(close).toHaveBeenCalledTimes(1)
    })

    it('opens a real connection by default', () => {
      expect(main(['--dbfile=:memory:', 'db', 'init'], { logger, env: {} })).toBe(0)
      expect(lines).toEqual(['Initializing the database at :memory:'])
    })
  })

  describe('commands', () => {
    it('solves, lists and shows a sequence', () => {
      expect(run('solve', '--empty-position=14')).toBe(0)
      expect(lines[0]).toBe('Finding all feasible solutions with position 14 initially empty')

      lines = []
      expect(run('list', 'sequences', '111111111101000', '--limit=1')).toBe(0)
      expect(lines[0]).toBe('Listing 1 of 1,402 sequences for configuration 32744, 111111111101000')
      expect(lines[2]).toBe('1 (10 moves)')

      lines = []
      expect(run('view', 'sequence', '1')).toBe(0)
      expect(lines[0]).toBe('Sequence 1: 10 moves from configuration 32744, 111111111101000')
      expect(lines[3]).toBe('Move 1: 1 -> 10 (over 6)')
    })

    it('lists the stored sequences of a configuration', () => {
      run('solve')
      run('list', 'sequences', '32744', '--limit=2')
      lines = []
      expect(run('list', 'sequences', '32744', '--stored')).toBe(0)
      expect(lines).toEqual([
        'Listing 2 of 2 stored sequences for configuration 32744, 111111111101000',
        renderBoard(32744, 3),
        '1 (10 moves)',
        '2 (10 moves)',
      ])
    })

    it('rejects a value for the stored flag', () => {
      expect(run('list', 'sequences', '32744', '--stored=yes')).toBe(2)
      expect(errors[0]).toBe('[triangles] Invalid option --stored: takes no value')
    })

    it('views a configuration by binary id', () => {
      run('solve')
      lines = []
      expect(run('view', 'configuration', '111111111101000')).toBe(0)
      expect(lines[0]).toBe('Configuration 32744: 111111111101000')
    })

    it('analyzes transformations', () => {
      run('solve')
      lines = []
      expect(run('analysis', 'transformations')).toBe(0)
      expect(lines).toEqual([
        'Identifying board configurations that are unique for all valid transformations',
        '3,016 configurations reduced to 1,544 unique configurations',
      ])
    })

    it('fails on a missing sequence', () => {
      expect(run('view', 'sequence', '5')).toBe(1)
      expect(errors).toEqual(['[triangles] Sequence 5 could not be found'])
    })
  })
})

describe('resolveCommand', () => {
  it('throws UsageError for unknown subcommands', () => {
    expect(() => resolveCommand(['db', 'migrate'], {})).toThrow(UsageError)
    expect(() => resolveCommand(['view', 'board', '1'], {})).toThrow('Unknown command "view board 1"')
  })

  it('validates options of the matched command', () => {
    expect(() => resolveCommand(['list', 'sequences', '36'], { limit: '0' })).toThrow(
      'Invalid option --limit: must be at least 1'
    )
  })
})
