/**
 * Renders an arbitrary bus value as display text.
 *
 * Strings pass through, absent values become `""`, everything else is
 * JSON. Values JSON cannot encode (cycles, bigint) fall back to
 * `String()`.
 */
export function renderValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export const TRUNCATE_AT = 256;
export const TRUNCATION_MARKER = '…';

/** Cuts `text` to `max` characters and appends the marker when it was longer. */
export function truncate(text: string, max: number = TRUNCATE_AT): string {
  return text.length > max ? text.slice(0, max) + TRUNCATION_MARKER : text;
}

const pad = (n: number): string => String(n).padStart(2, '0');

/** `yyyy-MM-dd HH:mm:ss` in local time. */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
