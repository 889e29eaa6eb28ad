/**
 * Month names recognized by the date normalizer
 *
 * Order matters: it is the alternation order of the date patterns.
 */

export const MONTHS: ReadonlyArray<readonly [name: string, month: number]> = [
  // German
  ['Januar', 1],
  ['Februar', 2],
  ['März', 3],
  ['Maerz', 3],
  ['April', 4],
  ['Mai', 5],
  ['Juni', 6],
  ['Juli', 7],
  ['August', 8],
  ['September', 9],
  ['Oktober', 10],
  ['November', 11],
  ['Dezember', 12],

  // English
  ['January', 1],
  ['February', 2],
  ['March', 3],
  ['May', 5],
  ['June', 6],
  ['July', 7],
  ['October', 10],
  ['December', 12],
];

/**
 * Lowercased month name to month number
 */
export const MONTH_LOOKUP: ReadonlyMap<string, number> = new Map(
  MONTHS.map(([name, month]) => [name.toLowerCase(), month])
);
