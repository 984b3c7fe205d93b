/**
 * Ordered literal substitutions turning deterministic text into a sentence.
 * Order matters: the fourth rule only matches text produced by the first and third.
 */
const NARRATIVE_RULES: ReadonlyArray<readonly [pattern: string, replacement: string]> = [
  ['Include items that match ANY of: (', 'Search for documents containing any of the following: '],
  ['Include items that match ALL of: (', 'Search for documents that must contain all of the following: '],
  ['EXCLUDE items where: (', 'but exclude documents where '],
  [
    'but exclude documents where Search for documents containing any of the following: ',
    'but exclude documents containing any of: ',
  ],
  ['contains "', 'the term "'],
  [': contains the EXACT PHRASE', ' must contain the exact phrase'],
  [': contains ANY of [', ' contains any of ['],
  [': contains ALL of [', ' must contain all of ['],
  ['; ', ', '],
  // Opening parens were consumed above, so every closing one goes.
  [')', ''],
];

/**
 * Converts deterministic text into narrative form.
 *
 * @example
 * normalizeNarrative('Include items that match ANY of: ("Python"; "Java")');
 * // 'Search for documents containing any of the following: "Python", "Java".'
 */
export function normalizeNarrative(deterministicText: string): string {
  let narrative = deterministicText;
  for (const [pattern, replacement] of NARRATIVE_RULES) {
    narrative = narrative.replaceAll(pattern, replacement);
  }

  narrative = narrative.trim();
  if (narrative.length === 0) return '';
  if (!narrative.endsWith('.')) narrative += '.';

  return narrative.charAt(0).toUpperCase() + narrative.slice(1);
}
