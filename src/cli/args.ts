import { z } from 'zod'
import {
  DB_FILE_ENV,
  DEFAULT_DB_FILE,
  DEFAULT_EMPTY_POSITION,
  DEFAULT_SEQUENCE_LIMIT,
} from '../lib/constants'
import { UsageError } from '../lib/errorUtils'

export type OptionValue = string | true

export interface ParsedArgs {
  /** Positional words (command, subcommand, arguments) in order */
  positionals: string[]
  /** `--key=value` options; a bare `--flag` maps to true */
  options: Record<string, OptionValue>
}

/**
 * Splits argv into positionals and `--key=value` options.
 * Options may appear anywhere on the line.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = []
  const options: Record<string, OptionValue> = {}

  for (const arg of argv) {
    if (arg.startsWith('--') && arg.length > 2) {
      const separator = arg.indexOf('=')
      if (separator === -1) {
        options[arg.substring(2)] = true
      } else {
        options[arg.substring(2, separator)] = arg.substring(separator + 1)
      }
    } else {
      positionals.push(arg)
    }
  }

  return { positionals, options }
}

// =============================================================================
// Option Schemas
// =============================================================================

const optionText = z.string({ invalid_type_error: 'expects a value (--option=value)' })

const integerOption = optionText
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number)

export const globalOptionsSchema = z.object({
  dbfile: optionText.min(1, 'must not be empty').optional(),
})

export const solveOptionsSchema = z.object({
  'empty-position': integerOption
    .pipe(z.number().max(14, 'must be a position from 0 through 14'))
    .optional()
    .transform((value) => value ?? DEFAULT_EMPTY_POSITION),
})

export const listSequencesOptionsSchema = z.object({
  limit: integerOption
    .pipe(z.number().min(1, 'must be at least 1'))
    .optional()
    .transform((value) => value ?? DEFAULT_SEQUENCE_LIMIT),
  stored: z.literal(true, { errorMap: () => ({ message: 'takes no value' }) }).optional(),
})

export type SolveOptions = z.infer<typeof solveOptionsSchema>
export type ListSequencesOptions = z.infer<typeof listSequencesOptionsSchema>

/**
 * Validates the options a command accepts; global options are ignored here.
 *
 * @throws UsageError naming the first offending option
 */
export function parseOptions<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown> & { shape: z.ZodRawShape },
  options: Record<string, OptionValue>
): Output {
  const accepted = new Set([...Object.keys(schema.shape), ...Object.keys(globalOptionsSchema.shape)])
  const unknown = Object.keys(options).find((key) => !accepted.has(key))
  if (unknown !== undefined) {
    throw new UsageError(`Unknown option --${unknown}`)
  }

  const own: Record<string, OptionValue> = {}
  for (const key of Object.keys(schema.shape)) {
    if (key in options) {
      own[key] = options[key]
    }
  }

  const result = schema.safeParse(own)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new UsageError(`Invalid option --${issue.path.join('.')}: ${issue.message}`)
  }
  return result.data
}

/**
 * Resolves the database file: `--dbfile`, then the environment, then the default.
 */
export function resolveDbFile(
  options: Record<string, OptionValue>,
  env: NodeJS.ProcessEnv = process.env
): string {
  const result = globalOptionsSchema.safeParse({ dbfile: options.dbfile })
  if (!result.success) {
    throw new UsageError(`Invalid option --dbfile: ${result.error.issues[0].message}`)
  }
  return result.data.dbfile ?? env[DB_FILE_ENV] ?? DEFAULT_DB_FILE
}
