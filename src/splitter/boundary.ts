/**
 * Boundary Splitter
 *
 * Cuts a concatenated export into one string per article. The copyright
 * footer closing each article is the only recurring terminator; it is told
 * apart from inline copyright text by its indentation of five or more
 * whitespace characters.
 */

import type { ExtractionReporter } from '../types/index.js';

/**
 * Indented copyright footer plus every newline that follows it
 */
export const COPYRIGHT_FOOTER = /\n\s{5,}Copyright .*?\n+/g;

/**
 * Convert CRLF and lone CR line endings to LF
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * Split a corpus into documents, in corpus order.
 *
 * Whatever follows the last footer is trailing matter and is dropped, so a
 * corpus without any footer yields no documents at all.
 */
export function splitDocuments(corpus: string, reporter?: ExtractionReporter): string[] {
  const segments = corpus.split(COPYRIGHT_FOOTER);

  if (segments.length < 2) {
    reporter?.report({ type: 'segmentation-shortfall', corpusLength: corpus.length });
    return [];
  }

  return segments.slice(0, -1);
}
