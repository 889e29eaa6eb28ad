import { describe, it, expect } from 'vitest';
import { findDocumentId, findNextNonBlank, matchDocumentId } from './positional.js';

describe('matchDocumentId', () => {
  it.each([
    ['Document 5 of 12', '5'],
    ['Dokument 7 von 30', '7'],
    ['                3 of 40 DOCUMENTS', '3'],
    ['5 von 12 Dokumenten', '5'],
  ])('reads the number from %j', (paragraph, expected) => {
    expect(matchDocumentId(paragraph)).toBe(expected);
  });

  it('returns null without a document number', () => {
    expect(matchDocumentId('The Times')).toBeNull();
    expect(matchDocumentId('Documents')).toBeNull();
  });
});

describe('findDocumentId', () => {
  it('returns the first match and the cursor after it', () => {
    expect(findDocumentId(['Cover page', 'Document 4 of 9', 'Document 5 of 9'])).toEqual({
      value: '4',
      next: 2,
    });
  });

  it('moves the cursor past the end when nothing matches', () => {
    expect(findDocumentId(['a', 'b', 'c'])).toEqual({ value: '', next: 3 });
    expect(findDocumentId([])).toEqual({ value: '', next: 0 });
  });
});

describe('findNextNonBlank', () => {
  it('skips blank paragraphs and left-trims the value', () => {
    expect(findNextNonBlank(['a', ' ', '', '  b '], 1)).toEqual({ value: 'b ', next: 4 });
  });

  it('returns an empty value at the end of the list', () => {
    expect(findNextNonBlank(['a', ' '], 1)).toEqual({ value: '', next: 2 });
    expect(findNextNonBlank(['a'], 5)).toEqual({ value: '', next: 1 });
  });
});
