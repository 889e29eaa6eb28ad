import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { USAGE, expandPatterns, parseArguments, run } from './cli.js';
import { SCHEMA, buildCorpus } from './__fixtures__/corpus.js';

describe('parseArguments', () => {
  it('reads options and patterns', () => {
    expect(
      parseArguments([
        '--threshold=0.3',
        '--denylist=WELT, TAZ',
        '--min-text=50',
        '--keep-copyright',
        '--out-dir=out',
        'a.txt',
        'b*.txt',
      ])
    ).toEqual({
      patterns: ['a.txt', 'b*.txt'],
      outputDir: 'out',
      options: {
        tagThreshold: 0.3,
        tagDenylist: ['WELT', 'TAZ'],
        minTextLength: 50,
        dropCopyrightParagraphs: false,
      },
      help: false,
    });
  });

  it('recognizes help', () => {
    expect(parseArguments(['--help']).help).toBe(true);
    expect(parseArguments(['-h']).help).toBe(true);
  });

  it('rejects unknown options and bad numbers', () => {
    expect(() => parseArguments(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseArguments(['--threshold=high'])).toThrow('--threshold expects a number, got "high"');
    expect(() => parseArguments(['--min-text='])).toThrow('--min-text expects a number, got ""');
  });
});

describe('with files on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'corpus-split-cli-'));
    await writeFile(join(dir, 'a.txt'), buildCorpus(), 'utf-8');
    await writeFile(join(dir, 'b.txt'), buildCorpus(), 'utf-8');
    await writeFile(join(dir, 'c.csv'), 'not an export', 'utf-8');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('expands wildcards and removes duplicates', async () => {
    const files = await expandPatterns([join(dir, '*.txt'), join(dir, 'a.txt')]);
    expect(files).toEqual([join(dir, 'a.txt'), join(dir, 'b.txt')]);
  });

  it('converts every matching file', async () => {
    const out = join(dir, 'out');

    expect(await run([join(dir, '*.txt'), `--out-dir=${out}`])).toBe(0);

    const csv = await readFile(join(out, 'b.csv'), 'utf-8');
    expect(csv.split('\r\n')[0]).toBe(SCHEMA.join(','));
  });

  it('prints usage to stderr and fails without arguments or matches', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    expect(await run([])).toBe(1);
    expect(await run([join(dir, '*.pdf')])).toBe(1);
    expect(stderr.mock.calls.filter(([chunk]) => chunk === `${USAGE}\n`)).toHaveLength(2);
  });

  it('prints usage to stdout for help', async () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    expect(await run(['--help'])).toBe(0);
    expect(stdout.mock.calls.filter(([chunk]) => chunk === `${USAGE}\n`)).toHaveLength(1);
  });

  it('reports failure when a file cannot be converted', async () => {
    expect(await run([join(dir, 'c.csv')])).toBe(1);
  });
});
