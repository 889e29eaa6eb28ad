/**
 * Schema Discoverer
 *
 * Finds the "TAG: value" metadata lines that recur across a corpus and turns
 * them into the ordered attribute list every record is built against.
 */

import { DEFAULT_EXTRACTION_OPTIONS } from '../config/defaults.js';
import { FIXED_PREFIX, TEXT_ATTRIBUTE } from '../types/index.js';
import type { AttributeSchema } from '../types/index.js';

/**
 * Three or more capitals or hyphens at the start of a line, then ": "
 */
const CANDIDATE_TAG = /\n([A-Z-]{3,}?): /g;

export interface DiscoveryConfig {
  threshold: number;
  denylist: readonly string[];
}

export const DEFAULT_DISCOVERY_CONFIG: DiscoveryConfig = {
  threshold: DEFAULT_EXTRACTION_OPTIONS.tagThreshold,
  denylist: DEFAULT_EXTRACTION_OPTIONS.tagDenylist,
};

/**
 * Distinct candidate tags in first-occurrence order
 */
export function findCandidateTags(corpus: string): string[] {
  const seen = new Set<string>();

  for (const match of corpus.matchAll(CANDIDATE_TAG)) {
    const tag = match[1];
    if (tag !== undefined) {
      seen.add(tag);
    }
  }

  return [...seen];
}

/**
 * Non-overlapping occurrences of `needle` anywhere in `text`
 */
function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

/**
 * Tags present in more than `threshold` of the documents, minus the denylist.
 *
 * `documentCount` is the number of documents the splitter produced for the
 * same corpus; with zero documents nothing is discovered.
 */
export function discoverTags(
  corpus: string,
  documentCount: number,
  config: DiscoveryConfig = DEFAULT_DISCOVERY_CONFIG
): string[] {
  if (documentCount <= 0) {
    return [];
  }

  const denied = new Set(config.denylist);

  return findCandidateTags(corpus).filter(
    (tag) =>
      countOccurrences(corpus, `${tag}:`) / documentCount > config.threshold &&
      !denied.has(tag)
  );
}

/**
 * Fixed prefix, discovered tags, then TEXT
 */
export function buildSchema(discoveredTags: readonly string[]): AttributeSchema {
  const attributes: string[] = [...FIXED_PREFIX];

  for (const tag of discoveredTags) {
    if (tag !== TEXT_ATTRIBUTE && !attributes.includes(tag)) {
      attributes.push(tag);
    }
  }

  attributes.push(TEXT_ATTRIBUTE);

  return Object.freeze(attributes);
}
