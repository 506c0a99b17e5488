/**
 * Cell formatting for the export writers
 */

import { isRecord } from '../utils/type-guards.js';

const NEEDS_QUOTING = /[",\r\n]/;

function quote(text: string): string {
  return `"${text.replace(/"/g, '""')}"`;
}

/**
 * Format one value as a CSV cell.
 * null is empty, booleans and numbers are literal, strings are quoted only
 * when they contain a comma, quote or line break, nested values are JSON in quotes.
 */
export function formatCsvValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  if (typeof value === 'string') {
    return NEEDS_QUOTING.test(value) ? quote(value) : value;
  }
  if (Array.isArray(value) || isRecord(value)) {
    return quote(JSON.stringify(value));
  }
  return quote(String(value));
}

/**
 * One CSV line, including the trailing newline
 */
export function formatCsvLine(values: readonly unknown[]): string {
  return `${values.map(formatCsvValue).join(',')}\n`;
}

/**
 * Replace JSON text with the value it encodes, recursively.
 * Strings that are not JSON are kept as they are.
 */
export function expandStructuredValue(value: unknown): unknown {
  if (typeof value === 'string') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      return value;
    }
    return expandStructuredValue(parsed);
  }

  if (Array.isArray(value)) {
    return value.map(expandStructuredValue);
  }

  if (isRecord(value)) {
    const expanded: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      expanded[key] = expandStructuredValue(entry);
    }
    return expanded;
  }

  return value;
}
