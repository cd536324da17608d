/**
 * Number utilities
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Parse a whole decimal integer, rejecting anything parseInt would silently truncate
 * @returns The integer, or null when text is not an integer
 */
export function parseStrictInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Parse a decimal number ("1.5", "-2", "24")
 * @returns The number, or null when text is not a finite decimal
 */
export function parseStrictNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[-+]?(\d+\.?\d*|\.\d+)$/.test(trimmed)) return null;
  return Number(trimmed);
}
