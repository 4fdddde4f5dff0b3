import { sqliteTable, text, integer, index, uniqueIndex, primaryKey } from 'drizzle-orm/sqlite-core'

// =============================================================================
// Configurations Table
// =============================================================================

export const configurations = sqliteTable('configurations', {
  // Board as a 15-bit integer (binary rendering lists positions 0-14)
  board: integer('board').primaryKey(),
  // Reachable from the start board of the solve that wrote it
  feasible: integer('feasible', { mode: 'boolean' }).notNull().default(true),
  // Can be reduced to a single peg
  won: integer('won', { mode: 'boolean' }).notNull().default(false),
}, (table) => [
  index('idx_configurations_won').on(table.won),
])

// =============================================================================
// Sequences Table
// =============================================================================

export const sequences = sqliteTable('sequences', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  configuration: integer('configuration').notNull().references(() => configurations.board, { onDelete: 'cascade' }),
  // JSON array of [from, over, to] triples in play order
  moves: text('moves').notNull().$type<string>(),
  moveCount: integer('move_count').notNull(),
  createdAt: integer('created_at').notNull(),
}, (table) => [
  index('idx_sequences_configuration').on(table.configuration),
  uniqueIndex('idx_sequences_configuration_moves').on(table.configuration, table.moves),
])

// =============================================================================
// Transformations Table
// =============================================================================

export const transformations = sqliteTable('transformations', {
  // Configuration that is a symmetric image of an earlier one
  fromConfiguration: integer('from_configuration').notNull().references(() => configurations.board, { onDelete: 'cascade' }),
  // The earlier (unique) configuration
  toConfiguration: integer('to_configuration').notNull().references(() => configurations.board, { onDelete: 'cascade' }),
  symmetry: text('symmetry').notNull(),
}, (table) => [
  primaryKey({ columns: [table.fromConfiguration, table.toConfiguration] }),
  index('idx_transformations_to').on(table.toConfiguration),
])

// =============================================================================
// Solve Runs Table
// =============================================================================

export const solveRuns = sqliteTable('solve_runs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  startBoard: integer('start_board').notNull(),
  emptyPosition: integer('empty_position').notNull(),
  feasibleCount: integer('feasible_count').notNull(),
  wonCount: integer('won_count').notNull(),
  edgeCount: integer('edge_count').notNull(),
  createdAt: integer('created_at').notNull(),
})
