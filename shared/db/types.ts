import type { InferSelectModel, InferInsertModel } from 'drizzle-orm'
import { configurations, sequences, transformations, solveRuns } from './schema'

// =============================================================================
// Configuration Types
// =============================================================================

export type Configuration = InferSelectModel<typeof configurations>
export type NewConfiguration = InferInsertModel<typeof configurations>

// =============================================================================
// Sequence Types
// =============================================================================

export type SequenceRow = InferSelectModel<typeof sequences>
export type NewSequenceRow = InferInsertModel<typeof sequences>

// =============================================================================
// Transformation & Solve Run Types
// =============================================================================

export type TransformationRow = InferSelectModel<typeof transformations>
export type NewTransformationRow = InferInsertModel<typeof transformations>

export type SolveRun = InferSelectModel<typeof solveRuns>
export type NewSolveRun = InferInsertModel<typeof solveRuns>
