/**
 * CSV export
 *
 * One header row with the schema, one row per record, CRLF line endings
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { ArticleRecord, AttributeSchema } from '../types/index.js';

const LINE_TERMINATOR = '\r\n';

/**
 * Escape CSV field (handle commas, quotes, newlines)
 */
export function escapeCsvField(field: string): string {
  if (!field) return '';

  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }

  return field;
}

export function toCsvRow(values: readonly string[]): string {
  return values.map(escapeCsvField).join(',') + LINE_TERMINATOR;
}

export function toCsv(schema: AttributeSchema, records: readonly ArticleRecord[]): string {
  const rows = [toCsvRow(schema)];

  for (const record of records) {
    rows.push(toCsvRow(schema.map((attribute) => record[attribute] ?? '')));
  }

  return rows.join('');
}

export async function writeCsv(
  path: string,
  schema: AttributeSchema,
  records: readonly ArticleRecord[]
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, toCsv(schema, records), 'utf-8');
}
