const LEET_MAP: Readonly<Record<string, string>> = {
  '@': 'a',
  '4': 'a',
  '0': 'o',
  '1': 'i',
  '!': 'i',
  $: 's',
  '5': 's',
  '7': 't',
  '3': 'e',
};

export interface WordFilter {
  isBanned(word: string): boolean;
  containsBanned(text: string): boolean;
  filterDefinitions(definitions: readonly string[]): string[];
}

/**
 * Folds case, diacritics and common digit/symbol substitutions, then turns
 * every other symbol into a single space.
 */
export function normalizeText(text: string): string {
  if (!text.trim()) return '';
  let out = '';
  for (const ch of text.normalize('NFD')) {
    if (/\p{M}/u.test(ch)) continue;
    let lower = ch.toLowerCase();
    lower = LEET_MAP[lower] ?? lower;
    out += /[\p{L}\p{N}_\s]/u.test(lower) ? lower : ' ';
  }
  return out.replace(/\s+/g, ' ').trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function createWordFilter(banned: Iterable<string>): WordFilter {
  const set = new Set<string>();
  for (const word of banned) {
    const normalized = normalizeText(word);
    if (normalized) set.add(normalized);
  }
  const patterns = [...set].map(
    (word) => new RegExp(`\\b${escapeRegExp(word)}\\b`, 'u'),
  );

  const containsBanned = (text: string): boolean => {
    const normalized = normalizeText(text);
    return patterns.some((pattern) => pattern.test(normalized));
  };

  return {
    isBanned: (word) => set.has(normalizeText(word)),
    containsBanned,
    filterDefinitions: (definitions) =>
      definitions.filter((d) => !containsBanned(d)),
  };
}

export const EMPTY_WORD_FILTER: WordFilter = createWordFilter([]);
