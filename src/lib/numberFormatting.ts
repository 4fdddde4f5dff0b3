/**
 * Shared number formatting utilities
 *
 * Centralizes number formatting for progress lines and solve summaries.
 */

/**
 * Formats an integer with thousands separators.
 *
 * @example
 * formatNumber(108576) // "108,576"
 * formatNumber(42)     // "42"
 */
export function formatNumber(num: number): string {
  return num.toLocaleString('en-US')
}

/**
 * Formats a decimal value as a percentage string.
 *
 * @param value - Decimal value (e.g., 0.75 for 75%)
 * @param decimals - Number of decimal places (default: 0)
 *
 * @example
 * formatPercent(0.753)    // "75%"
 * formatPercent(0.753, 1) // "75.3%"
 */
export function formatPercent(value: number, decimals: number = 0): string {
  return `${(value * 100).toFixed(decimals)}%`
}

/**
 * Formats a ratio as a percentage string.
 *
 * @returns Formatted percentage string, or "0%" if denominator is 0
 *
 * @example
 * formatRatioAsPercent(769, 3016, 1) // "25.5%"
 * formatRatioAsPercent(0, 0)         // "0%"
 */
export function formatRatioAsPercent(
  numerator: number,
  denominator: number,
  decimals: number = 0
): string {
  if (denominator === 0) return '0%'
  return formatPercent(numerator / denominator, decimals)
}

/**
 * Pluralizes a unit for a count.
 *
 * @example
 * formatCount(1, 'move')  // "1 move"
 * formatCount(12, 'move') // "12 moves"
 */
export function formatCount(count: number, unit: string): string {
  return `${formatNumber(count)} ${count === 1 ? unit : `${unit}s`}`
}
