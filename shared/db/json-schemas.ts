import { z } from 'zod'

// =============================================================================
// Sequence Moves Schema
// =============================================================================

const positionSchema = z.number().int().min(0).max(14)

/** One move as a [from, over, to] triple of position indices */
export const moveTripleSchema = z.tuple([positionSchema, positionSchema, positionSchema])

export const sequenceMovesSchema = z.array(moveTripleSchema).max(13)

export type MoveTriple = z.infer<typeof moveTripleSchema>
export type SequenceMoves = z.infer<typeof sequenceMovesSchema>

// =============================================================================
// Parsing Helpers
// =============================================================================

/**
 * Parses the JSON stored in `sequences.moves`.
 * Malformed data is a store failure and is thrown, not replaced by a default.
 */
export function parseSequenceMoves(json: string): SequenceMoves {
  return sequenceMovesSchema.parse(JSON.parse(json))
}

// =============================================================================
// Serialization Helpers
// =============================================================================

export function serializeSequenceMoves(moves: SequenceMoves): string {
  return JSON.stringify(moves)
}
