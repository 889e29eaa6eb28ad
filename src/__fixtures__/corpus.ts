/**
 * Synthetic export used by the pipeline and CLI tests
 */

export const BODY =
  'Shares moved sharply after the announcement, and analysts expected further volatility in the coming weeks ahead.';

const FOOTER = '\n\n                 Copyright 2000 The Daily Planet\n\n\n';

export interface ArticleFixture {
  date?: string;
  body?: string;
  extra?: string[];
}

export function article(n: number, total: number, fixture: ArticleFixture = {}): string {
  const paragraphs = [
    `                              ${n} of ${total} DOCUMENTS`,
    '                              The Daily Planet',
    `                              ${fixture.date ?? `${n}. Januar 2000`}`,
    `Headline number ${n}`,
    'SECTION: News',
    'LENGTH: 120 words',
    ...(fixture.extra ?? []),
    fixture.body ?? BODY,
    'LOAD-DATE: January 5, 2000',
    'LANGUAGE: GERMAN',
  ];

  return paragraphs.join('\n\n') + FOOTER;
}

/**
 * Five articles: a one-off BYLINE in the first, an unparseable date in the
 * third, a short body in the fourth, then trailing matter
 */
export function buildCorpus(): string {
  return (
    article(1, 5, { extra: ['BYLINE: Jane Roe'] }) +
    article(2, 5) +
    article(3, 5, { date: 'yesterday' }) +
    article(4, 5, { body: 'Too short.' }) +
    article(5, 5) +
    'End of export\n'
  );
}

export const SCHEMA = [
  'ID_DOC',
  'PUBLICATION',
  'DATE',
  'TITLE',
  'SECTION',
  'LENGTH',
  'LOAD-DATE',
  'LANGUAGE',
  'TEXT',
];
