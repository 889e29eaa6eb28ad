/**
 * Core types for the corpus splitter
 */

/**
 * Attributes present in every schema, in this order, before any discovered tag
 */
export const FIXED_PREFIX = ['ID_DOC', 'PUBLICATION', 'DATE', 'TITLE'] as const;

/**
 * Body attribute, always the last column
 */
export const TEXT_ATTRIBUTE = 'TEXT';

/**
 * Ordered, frozen list of attribute names shared by every record of one corpus
 */
export type AttributeSchema = readonly string[];

/**
 * Extracted field values for one document, keyed by schema attribute
 */
export type ArticleRecord = Record<string, string>;

export interface ExtractionOptions {
  /** Minimum share of documents a tag must appear in (strictly greater) */
  tagThreshold: number;
  /** Tag names that are never treated as metadata */
  tagDenylist: string[];
  /** TEXT shorter than this marks the document as anomalous */
  minTextLength: number;
  /** Drop exact-match copyright boilerplate paragraphs before scanning */
  dropCopyrightParagraphs: boolean;
}

export interface CorpusResult {
  schema: AttributeSchema;
  records: ArticleRecord[];
  documentCount: number;
  anomalies: number;
}

export interface ConvertResult {
  inputPath: string;
  outputPath: string;
  documentCount: number;
  schema: AttributeSchema;
}

/**
 * Diagnostic events emitted by the core
 */
export type DiagnosticEvent =
  | { type: 'segmentation-shortfall'; corpusLength: number }
  | { type: 'schema-discovered'; attributes: AttributeSchema; discoveredTags: string[] }
  | { type: 'date-unparsed'; raw: string }
  | {
      type: 'document-anomaly';
      index: number;
      idDoc: string;
      title: string;
      date: string;
      textLength: number;
      error?: string;
    };

export type DiagnosticType = DiagnosticEvent['type'];

export interface ExtractionReporter {
  report(event: DiagnosticEvent): void;
}
