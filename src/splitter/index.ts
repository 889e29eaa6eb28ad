/**
 * Splitter Module
 */

export {
  splitDocuments,
  normalizeLineEndings,
  COPYRIGHT_FOOTER,
} from './boundary.js';
