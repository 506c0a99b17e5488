import { join } from 'node:path';
import type { Target } from '../client/types.js';

/**
 * Directory-safe form of a target or group name.
 * Letters, digits and '-' are kept (ASCII letters lowercased); everything else becomes '_'.
 */
export function normalizeName(name: string): string {
  return Array.from(name)
    .map((char) => {
      if (!/^[\p{L}\p{N}-]$/u.test(char)) return '_';
      return /^[A-Z]$/.test(char) ? char.toLowerCase() : char;
    })
    .join('');
}

/**
 * File-name form of a query name, used as a job name.
 * Separators, whitespace and punctuation become '-', leading and trailing '-' are trimmed.
 */
export function sanitizeJobName(name: string): string {
  return Array.from(name)
    .map((char) => (/^[\p{L}\p{N}_-]$/u.test(char) ? char : '-'))
    .join('')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
}

/**
 * Local-time run timestamp: YYYY-MM-DD_HH-MM-SS
 */
export function formatRunTimestamp(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

/**
 * {outputFolder}/{group}/{target}/{runTimestamp}
 */
export function buildOutputDirectory(outputFolder: string, target: Target, runTimestamp: string): string {
  return join(outputFolder, normalizeName(target.group), normalizeName(target.name), runTimestamp);
}

/**
 * Path a writer stages its data at before publishing to `destination`:
 * out/query.csv → out/query.tmp.csv
 */
export function tempPathFor(destination: string, suffix = 'tmp'): string {
  const dot = destination.lastIndexOf('.');
  const slash = Math.max(destination.lastIndexOf('/'), destination.lastIndexOf('\\'));
  if (dot <= slash + 1) {
    return `${destination}.${suffix}`;
  }
  return `${destination.slice(0, dot)}.${suffix}${destination.slice(dot)}`;
}
