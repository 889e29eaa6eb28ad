/**
 * Paragraph handling for a single document
 */

/**
 * Boilerplate paragraphs carried by every article
 */
export const COPYRIGHT_PARAGRAPHS: readonly string[] = [
  'Alle Rechte Vorbehalten',
  'All Rights Reserved',
];

export function isBlank(paragraph: string): boolean {
  return paragraph.trim().length === 0;
}

export function isCopyrightParagraph(paragraph: string): boolean {
  return COPYRIGHT_PARAGRAPHS.includes(paragraph.trim());
}

/**
 * Split a document on blank lines and fold hard line breaks into spaces.
 *
 * Paragraph boundaries are exactly "\n\n"; a third newline stays with the
 * following paragraph as a leading space.
 */
export function splitParagraphs(
  document: string,
  options: { dropCopyright: boolean } = { dropCopyright: true }
): string[] {
  const paragraphs = document.split('\n\n').map((paragraph) => paragraph.replace(/\n/g, ' '));

  if (!options.dropCopyright) {
    return paragraphs;
  }

  return paragraphs.filter((paragraph) => !isCopyrightParagraph(paragraph));
}
