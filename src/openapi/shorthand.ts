import { isPlainObject } from './schema.js';

const RESERVED_WORDS = new Set(['true', 'false', 'null', 'undefined']);

function needsQuotes(value: string): boolean {
  return (
    value === '' ||
    value !== value.trim() ||
    RESERVED_WORDS.has(value) ||
    !Number.isNaN(Number(value)) ||
    /[:,{}[\]"\n]/.test(value)
  );
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return needsQuotes(value) ? JSON.stringify(value) : value;
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => formatValue(item)).join(', ')}]`;
  }
  if (isPlainObject(value)) {
    return `{${formatEntries(value)}}`;
  }
  if (value === undefined) {
    return 'null';
  }
  return String(value);
}

function formatEntries(record: Record<string, unknown>): string {
  return Object.keys(record)
    .sort()
    .map((key) => {
      const value = record[key];
      return isPlainObject(value)
        ? `${key}{${formatEntries(value)}}`
        : `${key}: ${formatValue(value)}`;
    })
    .join(', ');
}

/**
 * Formats a mapping as a one-line CLI shorthand payload, for example
 * `{ name: 'w', size: { h: 2 } }` becomes `name: w, size{h: 2}`.
 */
export function toShorthand(record: Record<string, unknown>): string {
  return formatEntries(record);
}
