/**
 * Command-line handling
 */

import { glob } from 'glob';
import { config, parseList } from './config/index.js';
import { logger, createChildLogger } from './utils/logger.js';
import { convertFile } from './pipeline.js';
import { createLoggerReporter } from './reporter/index.js';
import type { ExtractionOptions } from './types/index.js';

export const USAGE = `Usage: corpus-split [options] <file-or-glob...>

Options:
  --out-dir=<dir>      Write CSV files to <dir> instead of beside the input
  --threshold=<n>      Minimum document share for a tag (default ${config.extraction.tagThreshold})
  --denylist=<A,B>     Tags never treated as metadata (default ${config.extraction.tagDenylist.join(',')})
  --min-text=<n>       Body length below which a document is flagged (default ${config.extraction.minTextLength})
  --keep-copyright     Keep "All Rights Reserved" paragraphs in the body
  --help               Show this message`;

export interface CliArguments {
  patterns: string[];
  outputDir?: string;
  options: Partial<ExtractionOptions>;
  help: boolean;
}

function readValue(arg: string, name: string): string | undefined {
  const prefix = `--${name}=`;
  return arg.startsWith(prefix) ? arg.slice(prefix.length) : undefined;
}

function parseNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new Error(`--${name} expects a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse command line arguments
 */
export function parseArguments(args: readonly string[]): CliArguments {
  const result: CliArguments = { patterns: [], options: {}, help: false };

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      result.help = true;
      continue;
    }
    if (arg === '--keep-copyright') {
      result.options.dropCopyrightParagraphs = false;
      continue;
    }

    const outDir = readValue(arg, 'out-dir');
    const threshold = readValue(arg, 'threshold');
    const denylist = readValue(arg, 'denylist');
    const minText = readValue(arg, 'min-text');

    if (outDir !== undefined) {
      result.outputDir = outDir;
    } else if (threshold !== undefined) {
      result.options.tagThreshold = parseNumber(threshold, 'threshold');
    } else if (denylist !== undefined) {
      result.options.tagDenylist = parseList(denylist);
    } else if (minText !== undefined) {
      result.options.minTextLength = parseNumber(minText, 'min-text');
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      result.patterns.push(arg);
    }
  }

  return result;
}

/**
 * Expand file arguments into a sorted list of distinct files
 */
export async function expandPatterns(patterns: readonly string[]): Promise<string[]> {
  const files = new Set<string>();

  for (const pattern of patterns) {
    const matches = await glob(pattern, { nodir: true, windowsPathsNoEscape: true });
    for (const match of matches) {
      files.add(match);
    }
  }

  return [...files].sort();
}

/**
 * Convert every file the arguments name. Resolves to the process exit code.
 */
export async function run(args: readonly string[]): Promise<number> {
  const cli = parseArguments(args);

  if (cli.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }
  if (cli.patterns.length === 0) {
    process.stderr.write(`${USAGE}\n`);
    return 1;
  }

  const files = await expandPatterns(cli.patterns);
  if (files.length === 0) {
    logger.error({ patterns: cli.patterns }, 'No input files matched');
    process.stderr.write(`${USAGE}\n`);
    return 1;
  }

  const options: Partial<ExtractionOptions> = { ...config.extraction, ...cli.options };
  let failed = 0;

  for (const file of files) {
    const fileLogger = createChildLogger({ file });
    fileLogger.info('Processing file');

    try {
      const result = await convertFile(file, {
        outputDir: cli.outputDir,
        options,
        reporter: createLoggerReporter(fileLogger),
      });

      fileLogger.info(
        { output: result.outputPath, items: result.documentCount },
        `Wrote ${result.documentCount} items`
      );
    } catch (error) {
      failed++;
      logger.error({ error, file }, 'Failed to convert file');
    }
  }

  logger.info({ files: files.length, failed }, 'Done');
  return failed > 0 ? 1 : 0;
}
