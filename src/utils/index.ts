/**
 * Utility functions
 */

/**
 * Check for a plain keyed object (not null, not an array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a non-empty string field from a keyed object
 */
export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Uppercase the first character
 */
export function capitalize(text: string): string {
  if (!text) return text;
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Collapse whitespace runs (newlines included) to single spaces and trim
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Truncate a string, adding '...' when it exceeds max length
 */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, max) + '...';
}

/**
 * Describe the top-level shape of a JSON value for error messages
 */
export function describeShape(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (isRecord(value)) {
    const keys = Object.keys(value);
    const shown = keys.slice(0, 5).join(', ');
    return keys.length > 5 ? `object with keys [${shown}, ...]` : `object with keys [${shown}]`;
  }
  return typeof value;
}
