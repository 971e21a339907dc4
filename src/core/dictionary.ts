export interface Dictionary {
  readonly size: number;
  /** Membership test for a word already passed through `normalizeWord`. */
  contains(normalizedWord: string): boolean;
}

/** Lower case with diacritics stripped. */
export function normalizeWord(word: string): string {
  return word.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase().trim();
}

export function parseWordList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function createDictionary(words: Iterable<string>): Dictionary {
  const set = new Set<string>();
  for (const w of words) {
    const normalized = normalizeWord(w);
    if (normalized) set.add(normalized);
  }
  return {
    size: set.size,
    contains: (normalizedWord) => set.has(normalizedWord),
  };
}

export const EMPTY_DICTIONARY: Dictionary = createDictionary([]);
