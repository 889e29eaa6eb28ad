/**
 * Positional field scans
 *
 * The article header has no tags: the document number comes first, then
 * the publication, the date and the title, each on its own paragraph. Every
 * scan takes a cursor into the paragraph list and returns the value found
 * together with the cursor the next scan starts from.
 */

import { isBlank } from './paragraphs.js';

export interface ScanResult {
  value: string;
  next: number;
}

/**
 * "Dokument 5", "Document 5"
 */
const DOCUMENT_NUMBER = /do[kc]ument (\d+)/i;

/**
 * "5 of 12 documents", "5 von 12 Dokumenten"
 */
const NUMBER_OF_TOTAL = /(\d+) (?:of|von) (?:\d+) do[kc]ument/i;

export function matchDocumentId(paragraph: string): string | null {
  const match = DOCUMENT_NUMBER.exec(paragraph) ?? NUMBER_OF_TOTAL.exec(paragraph);
  return match?.[1] ?? null;
}

/**
 * First paragraph carrying a document number. When none does, the cursor
 * moves past the end and every later scan comes back empty.
 */
export function findDocumentId(paragraphs: readonly string[], cursor = 0): ScanResult {
  for (let i = cursor; i < paragraphs.length; i++) {
    const id = matchDocumentId(paragraphs[i] ?? '');
    if (id !== null) {
      return { value: id, next: i + 1 };
    }
  }

  return { value: '', next: paragraphs.length };
}

/**
 * First non-blank paragraph at or after the cursor, left-trimmed
 */
export function findNextNonBlank(paragraphs: readonly string[], cursor: number): ScanResult {
  for (let i = cursor; i < paragraphs.length; i++) {
    const paragraph = paragraphs[i] ?? '';
    if (!isBlank(paragraph)) {
      return { value: paragraph.trimStart(), next: i + 1 };
    }
  }

  return { value: '', next: paragraphs.length };
}

export const findPublication = findNextNonBlank;
export const findTitle = findNextNonBlank;

/**
 * Raw date paragraph; normalization happens in the caller
 */
export const findRawDate = findNextNonBlank;
