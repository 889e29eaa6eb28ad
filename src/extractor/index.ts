/**
 * Extractor Module
 *
 * Per-document field extraction and date normalization
 */

export {
  extractRecord,
  emptyRecord,
  matchTagLine,
  isAnomalous,
  DEFAULT_RECORD_OPTIONS,
  type RecordOptions,
} from './record.js';

export { parseDate, normalizeDate, type DateParseResult } from './date-normalizer.js';

export {
  splitParagraphs,
  isBlank,
  isCopyrightParagraph,
  COPYRIGHT_PARAGRAPHS,
} from './paragraphs.js';

export {
  findDocumentId,
  findPublication,
  findRawDate,
  findTitle,
  matchDocumentId,
  type ScanResult,
} from './positional.js';
