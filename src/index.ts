#!/usr/bin/env node
/**
 * Corpus Split
 *
 * Converts plain-text news exports into CSV files:
 * 1. Splits each export into articles at the copyright footers
 * 2. Discovers which metadata tags the export carries
 * 3. Extracts the header fields, tags and body of every article
 * 4. Writes one CSV per export, one row per article
 *
 * Usage:
 *   corpus-split [options] <file-or-glob...>
 *
 * Options:
 *   --out-dir=<dir>      Write CSV files to <dir> instead of beside the input
 *   --threshold=<n>      Minimum document share for a tag (default 0.2)
 *   --denylist=<A,B>     Tags never treated as metadata (default WELT)
 *   --min-text=<n>       Body length below which a document is flagged (default 100)
 *   --keep-copyright     Keep "All Rights Reserved" paragraphs in the body
 *   --help               Show this message
 */

import { bootstrap } from './bootstrap.js';

void bootstrap(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
