/**
 * Progress reporting for long-running solve passes.
 *
 * Producers call a `ProgressCallback` with counters; a `ProgressReporter`
 * turns those into throttled log lines. Reporting never changes results.
 */

import { PROGRESS_REPORT_INTERVAL } from './constants'
import { formatCount, formatNumber } from './numberFormatting'

export type ProgressPhase = 'discover' | 'classify' | 'persist'

export interface ProgressEvent {
  phase: ProgressPhase
  /** Boards handled so far in this phase */
  processed: number
  /** Boards the phase will handle, when known up front */
  total?: number
  /** Peg count of the layer that was just completed */
  pegs?: number
  /** Transition edges recorded so far */
  edges?: number
  /** Move templates tried so far, legal or not */
  probes?: number
  /** True on the last event of the phase */
  done: boolean
}

export type ProgressCallback = (event: ProgressEvent) => void

const PHASE_LABELS: Record<ProgressPhase, string> = {
  discover: 'Discovering boards',
  classify: 'Classifying boards',
  persist: 'Saving configurations',
}

/**
 * Formats a progress event as a single line.
 *
 * @example
 * formatProgress({ phase: 'discover', processed: 3016, edges: 10306, probes: 108576, done: true })
 * // "   Discovering boards: 3,016 boards, 10,306 edges, 108,576 probes"
 */
export function formatProgress(event: ProgressEvent): string {
  const boards =
    event.total === undefined
      ? formatCount(event.processed, 'board')
      : `${formatNumber(event.processed)} / ${formatNumber(event.total)} boards`
  const parts = [boards]
  if (event.edges !== undefined) parts.push(`${formatNumber(event.edges)} edges`)
  if (event.probes !== undefined) parts.push(`${formatNumber(event.probes)} probes`)

  let line = `   ${PHASE_LABELS[event.phase]}: ${parts.join(', ')}`
  if (event.pegs !== undefined && !event.done) {
    line += ` (${event.pegs}-peg layer)`
  }
  return line
}

/**
 * Logs progress events at most once per interval.
 * The first event of a phase and every `done` event are always logged.
 */
export class ProgressReporter {
  private lastReportTime = Number.NEGATIVE_INFINITY
  private linesWritten = 0

  constructor(
    private readonly logger: Pick<Console, 'log'> = console,
    private readonly interval: number = PROGRESS_REPORT_INTERVAL,
    private readonly now: () => number = Date.now
  ) {}

  readonly report: ProgressCallback = (event) => {
    const time = this.now()
    if (!event.done && time - this.lastReportTime < this.interval) {
      return
    }
    this.lastReportTime = event.done ? Number.NEGATIVE_INFINITY : time
    this.linesWritten++
    this.logger.log(formatProgress(event))
  }

  get lines(): number {
    return this.linesWritten
  }
}
