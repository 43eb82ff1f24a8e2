import { LineError } from '../../shared/interfaces/processing-result.interface';

export const SNIPPET_MAX_LENGTH = 50;

const LEADING_FLOAT = /^[+-]?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/;
const LEADING_INT = /^[+-]?\d+/;

/**
 * Lenient number parsing: only the leading numeric prefix counts, so
 * "19.99USD" reads as 19.99. Returns null when there is no prefix.
 */
export function parseLeadingFloat(raw: string): number | null {
  const match = LEADING_FLOAT.exec(raw.trim());
  if (!match) return null;

  const value = Number(match[0]);
  return Number.isFinite(value) ? value : null;
}

/**
 * Same as parseLeadingFloat for integers: "2.5" reads as 2.
 */
export function parseLeadingInt(raw: string): number | null {
  const match = LEADING_INT.exec(raw.trim());
  if (!match) return null;

  const value = Number.parseInt(match[0], 10);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Round half away from zero. Works on the decimal string so 1.005 rounds
 * to 1.01 instead of 1.
 */
export function roundTo(value: number, decimals: number): number {
  const magnitude = Math.abs(value);
  const text = String(magnitude);
  const rounded = text.includes('e')
    ? Math.round(magnitude * 10 ** decimals) / 10 ** decimals
    : Number(`${Math.round(Number(`${text}e${decimals}`))}e-${decimals}`);
  return value < 0 ? -rounded : rounded;
}

/**
 * `part` as a percentage of `total`, two decimals; 0 when `total` is 0.
 */
export function percentage(part: number, total: number): number {
  return total > 0 ? roundTo((part / total) * 100, 2) : 0;
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function lineError(line: number, reason: string, content: string): LineError {
  return { line, reason, content: truncate(content, SNIPPET_MAX_LENGTH) };
}

/**
 * Splits on LF and drops the CR of CRLF endings.
 */
export function splitLines(content: string): string[] {
  return content.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}
