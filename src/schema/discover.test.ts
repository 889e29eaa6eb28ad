import { describe, it, expect } from 'vitest';
import {
  DEFAULT_DISCOVERY_CONFIG,
  buildSchema,
  discoverTags,
  findCandidateTags,
} from './discover.js';
import { DEFAULT_EXTRACTION_OPTIONS } from '../config/defaults.js';

describe('findCandidateTags', () => {
  it('collects line-initial capitalized tags in first-occurrence order', () => {
    const corpus = 'intro\nSECTION: a\nLOAD-DATE: b\nSECTION: c\nLENGTH: d\n';
    expect(findCandidateTags(corpus)).toEqual(['SECTION', 'LOAD-DATE', 'LENGTH']);
  });

  it('requires three characters, a line start and a space after the colon', () => {
    const corpus = 'LENGTH: 1\nAB: x\nUrl: y\nURL:z\n  BYLINE: indented\nGRAPHIC: ok';
    expect(findCandidateTags(corpus)).toEqual(['GRAPHIC']);
  });
});

describe('discoverTags', () => {
  it('keeps tags above the threshold', () => {
    const corpus = '\nLENGTH: 1\nLENGTH: 2\nSECTION: a\n';

    expect(discoverTags(corpus, 5)).toEqual(['LENGTH']);
    expect(discoverTags(corpus, 4)).toEqual(['LENGTH', 'SECTION']);
  });

  it('excludes a tag present in exactly 20% of documents', () => {
    const corpus = '\nBYLINE: x'.repeat(20);
    expect(discoverTags(corpus, 100)).toEqual([]);
  });

  it('includes a tag just above 20% of documents', () => {
    const corpus = '\nBYLINE: x'.repeat(2001);
    expect(discoverTags(corpus, 10000)).toEqual(['BYLINE']);
  });

  it('applies the denylist', () => {
    const corpus = '\nWELT: x\nWELT: y\nLENGTH: 1\nLENGTH: 2';
    expect(discoverTags(corpus, 2)).toEqual(['LENGTH']);
    expect(discoverTags(corpus, 2, { threshold: 0.2, denylist: [] })).toEqual(['WELT', 'LENGTH']);
  });

  it('honors a custom threshold', () => {
    const corpus = '\nLENGTH: 1\nSECTION: a\nSECTION: b';
    expect(discoverTags(corpus, 2, { threshold: 0.5, denylist: [] })).toEqual(['SECTION']);
  });

  it('defaults to the shared extraction options', () => {
    expect(DEFAULT_DISCOVERY_CONFIG).toEqual({
      threshold: DEFAULT_EXTRACTION_OPTIONS.tagThreshold,
      denylist: DEFAULT_EXTRACTION_OPTIONS.tagDenylist,
    });
  });

  it('returns nothing for zero documents', () => {
    expect(discoverTags('\nLENGTH: 1', 0)).toEqual([]);
  });

  it('is deterministic', () => {
    const corpus = '\nZETA: 1\nALPHA: 2\nMIDDLE: 3\n';
    expect(discoverTags(corpus, 1)).toEqual(discoverTags(corpus, 1));
    expect(discoverTags(corpus, 1)).toEqual(['ZETA', 'ALPHA', 'MIDDLE']);
  });
});

describe('buildSchema', () => {
  it('wraps discovered tags between the fixed prefix and TEXT', () => {
    expect(buildSchema(['CATEGORY', 'LENGTH'])).toEqual([
      'ID_DOC',
      'PUBLICATION',
      'DATE',
      'TITLE',
      'CATEGORY',
      'LENGTH',
      'TEXT',
    ]);
  });

  it('does not repeat fixed attributes or TEXT', () => {
    expect(buildSchema(['TITLE', 'TEXT', 'LENGTH', 'LENGTH'])).toEqual([
      'ID_DOC',
      'PUBLICATION',
      'DATE',
      'TITLE',
      'LENGTH',
      'TEXT',
    ]);
  });

  it('returns a frozen schema', () => {
    expect(Object.isFrozen(buildSchema([]))).toBe(true);
    expect(buildSchema([])).toEqual(['ID_DOC', 'PUBLICATION', 'DATE', 'TITLE', 'TEXT']);
  });
});
