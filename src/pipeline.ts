/**
 * Main Pipeline
 *
 * Orchestrates the conversion of one export:
 * 1. Split the corpus into documents
 * 2. Discover the metadata tags and freeze the schema
 * 3. Extract one record per document, in corpus order
 * 4. Write the records as CSV
 */

import { readFile } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import { resolveExtractionOptions } from './config/index.js';
import { normalizeLineEndings, splitDocuments } from './splitter/index.js';
import { buildSchema, discoverTags } from './schema/index.js';
import { emptyRecord, extractRecord } from './extractor/index.js';
import { writeCsv } from './export/index.js';
import { silentReporter } from './reporter/index.js';
import type {
  ArticleRecord,
  ConvertResult,
  CorpusResult,
  DiagnosticEvent,
  ExtractionOptions,
  ExtractionReporter,
} from './types/index.js';

/**
 * Convert options
 */
export interface ConvertOptions {
  outputPath?: string;
  outputDir?: string;
  options?: Partial<ExtractionOptions>;
  reporter?: ExtractionReporter;
}

/**
 * Parse a whole corpus into records
 */
export function parseCorpus(
  corpus: string,
  options: Partial<ExtractionOptions> = {},
  reporter: ExtractionReporter = silentReporter
): CorpusResult {
  const resolved = resolveExtractionOptions(options);
  const text = normalizeLineEndings(corpus);

  const documents = splitDocuments(text, reporter);

  const discoveredTags = discoverTags(text, documents.length, {
    threshold: resolved.tagThreshold,
    denylist: resolved.tagDenylist,
  });
  const schema = buildSchema(discoveredTags);
  reporter.report({ type: 'schema-discovered', attributes: schema, discoveredTags });

  let anomalies = 0;
  const counting: ExtractionReporter = {
    report(event: DiagnosticEvent): void {
      if (event.type === 'document-anomaly') {
        anomalies++;
      }
      reporter.report(event);
    },
  };

  const records = documents.map((document, index): ArticleRecord => {
    try {
      return extractRecord(
        document,
        schema,
        {
          minTextLength: resolved.minTextLength,
          dropCopyrightParagraphs: resolved.dropCopyrightParagraphs,
        },
        counting,
        index
      );
    } catch (error) {
      counting.report({
        type: 'document-anomaly',
        index,
        idDoc: '',
        title: '',
        date: '',
        textLength: 0,
        error: error instanceof Error ? error.message : String(error),
      });
      return emptyRecord(schema);
    }
  });

  return { schema, records, documentCount: documents.length, anomalies };
}

/**
 * Output path for an input file: same name with a .csv extension
 */
export function defaultOutputPath(inputPath: string, outputDir?: string): string {
  const extension = extname(inputPath);
  const stem = basename(inputPath, extension);
  return join(outputDir ?? dirname(inputPath), `${stem}.csv`);
}

/**
 * Read an export from disk, parse it and write the CSV
 */
export async function convertFile(
  inputPath: string,
  convertOptions: ConvertOptions = {}
): Promise<ConvertResult> {
  const { options = {}, reporter = silentReporter } = convertOptions;
  const outputPath =
    convertOptions.outputPath ?? defaultOutputPath(inputPath, convertOptions.outputDir);

  if (resolve(outputPath) === resolve(inputPath)) {
    throw new Error(`Refusing to overwrite input file: ${inputPath}`);
  }

  const corpus = await readFile(inputPath, 'utf-8');
  const result = parseCorpus(corpus, options, reporter);

  await writeCsv(outputPath, result.schema, result.records);

  return {
    inputPath,
    outputPath,
    documentCount: result.documentCount,
    schema: result.schema,
  };
}
