/**
 * Flat tabular export of MediaItem reports
 * Fixed columns: Title, Year, Path, Watched, Parts
 */

import fs from 'node:fs';
import path from 'node:path';

import type { MediaItem } from '../shared/types.js';

export const CSV_HEADER = ['Title', 'Year', 'Path', 'Watched', 'Parts'] as const;

export type CsvRow = [title: string, year: string, path: string, watched: string, parts: string];

export const NO_PATH = '(no path)';

export function toRow(item: MediaItem): CsvRow {
  return [
    item.title,
    item.year != null ? String(item.year) : '',
    item.paths.length > 0 ? item.paths.join('; ') : NO_PATH,
    item.watched ? 'yes' : 'no',
    String(item.partCount),
  ];
}

export function toRows(items: readonly MediaItem[]): CsvRow[] {
  return items.map(toRow);
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(rows: readonly CsvRow[]): string {
  const lines: ReadonlyArray<readonly string[]> = [CSV_HEADER, ...rows];
  return lines
    .map((row) => row.map(escapeField).join(','))
    .join('\r\n') + '\r\n';
}

export function writeCsv(filePath: string, rows: readonly CsvRow[]): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, formatCsv(rows), 'utf-8');
  return resolved;
}
