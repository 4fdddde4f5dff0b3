/**
 * Shared constants for the solver and the command line tool
 */

/** Default SQLite database file */
export const DEFAULT_DB_FILE = 'triangles.db'

/** Environment variable that overrides the default database file */
export const DB_FILE_ENV = 'TRIANGLES_DB'

/** Hole left empty on the starting board when none is given */
export const DEFAULT_EMPTY_POSITION = 14

/** Number of sequences `list sequences` enumerates when no limit is given */
export const DEFAULT_SEQUENCE_LIMIT = 100

/**
 * Minimum time between two progress lines (in milliseconds).
 * The final line of a phase is always printed.
 */
export const PROGRESS_REPORT_INTERVAL = 1000

/** Rows written per transaction when persisting configurations */
export const PERSIST_BATCH_SIZE = 1000
