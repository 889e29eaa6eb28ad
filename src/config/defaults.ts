/**
 * Extraction defaults, shared by the core modules and the config layer
 */

import type { ExtractionOptions } from '../types/index.js';

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  tagThreshold: 0.2,
  tagDenylist: ['WELT'],
  minTextLength: 100,
  dropCopyrightParagraphs: true,
};
