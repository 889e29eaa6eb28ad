/**
 * Field Extractor
 *
 * Builds one record from one document: the four header fields by position,
 * then tagged metadata lines and body text from whatever follows.
 */

import { DEFAULT_EXTRACTION_OPTIONS } from '../config/defaults.js';
import { TEXT_ATTRIBUTE } from '../types/index.js';
import type {
  ArticleRecord,
  AttributeSchema,
  ExtractionReporter,
} from '../types/index.js';
import { normalizeDate } from './date-normalizer.js';
import { isBlank, splitParagraphs } from './paragraphs.js';
import { findDocumentId, findPublication, findRawDate, findTitle } from './positional.js';

/**
 * Capitals or hyphens followed by ": " at the start of a paragraph
 */
const TAG_LINE = /^([A-Z-]+?): /;

export interface RecordOptions {
  minTextLength: number;
  dropCopyrightParagraphs: boolean;
}

export const DEFAULT_RECORD_OPTIONS: RecordOptions = {
  minTextLength: DEFAULT_EXTRACTION_OPTIONS.minTextLength,
  dropCopyrightParagraphs: DEFAULT_EXTRACTION_OPTIONS.dropCopyrightParagraphs,
};

/**
 * Record with every schema attribute set to ''
 */
export function emptyRecord(schema: AttributeSchema): ArticleRecord {
  const record: ArticleRecord = {};
  for (const attribute of schema) {
    record[attribute] = '';
  }
  return record;
}

/**
 * Split a paragraph into tag and value when it is a metadata line
 */
export function matchTagLine(paragraph: string): { tag: string; value: string } | null {
  const line = paragraph.trimStart();
  const match = TAG_LINE.exec(line);

  if (!match || match[1] === undefined) {
    return null;
  }

  return { tag: match[1], value: line.slice(match[0].length) };
}

/**
 * Missing header fields or a short body
 */
export function isAnomalous(record: ArticleRecord, minTextLength: number): boolean {
  const missingCore = !record.ID_DOC && !record.TITLE && !record.DATE;
  return missingCore || (record[TEXT_ATTRIBUTE] ?? '').length < minTextLength;
}

/**
 * Extract a record from one document. Never throws on malformed input:
 * fields that cannot be found stay empty.
 */
export function extractRecord(
  document: string,
  schema: AttributeSchema,
  options: RecordOptions = DEFAULT_RECORD_OPTIONS,
  reporter?: ExtractionReporter,
  index = 0
): ArticleRecord {
  const record = emptyRecord(schema);
  const attributes = new Set(schema);
  const paragraphs = splitParagraphs(document, {
    dropCopyright: options.dropCopyrightParagraphs,
  });

  const id = findDocumentId(paragraphs);
  record.ID_DOC = id.value;

  const publication = findPublication(paragraphs, id.next);
  record.PUBLICATION = publication.value;

  const date = findRawDate(paragraphs, publication.next);
  record.DATE = date.value ? normalizeDate(date.value, reporter) : '';

  const title = findTitle(paragraphs, date.next);
  record.TITLE = title.value;

  const body: string[] = [];

  for (const paragraph of paragraphs.slice(title.next)) {
    if (isBlank(paragraph)) {
      continue;
    }

    const tagLine = matchTagLine(paragraph);
    if (tagLine && tagLine.tag !== TEXT_ATTRIBUTE && attributes.has(tagLine.tag)) {
      record[tagLine.tag] = tagLine.value;
      continue;
    }

    body.push(paragraph.trim());
  }

  record[TEXT_ATTRIBUTE] = body.join(' ');

  if (isAnomalous(record, options.minTextLength)) {
    reporter?.report({
      type: 'document-anomaly',
      index,
      idDoc: record.ID_DOC ?? '',
      title: record.TITLE ?? '',
      date: record.DATE ?? '',
      textLength: (record[TEXT_ATTRIBUTE] ?? '').length,
    });
  }

  return record;
}
