import { readFile } from 'node:fs/promises';
import {
  EMPTY_DICTIONARY,
  createDictionary,
  parseWordList,
  type Dictionary,
} from '../core/dictionary';
import {
  EMPTY_WORD_FILTER,
  createWordFilter,
  type WordFilter,
} from '../core/wordFilter';

export interface WordList {
  dictionary: Dictionary;
  words: string[];
}

async function readLines(path: string, label: string): Promise<string[] | null> {
  try {
    const text = await readFile(path, 'utf8');
    return parseWordList(text);
  } catch (err) {
    console.warn(`[Words] ${label} unavailable at ${path}.`, err);
    return null;
  }
}

/** Missing or unreadable files give an empty dictionary: nothing ever clears. */
export async function loadWordList(path: string): Promise<WordList> {
  const lines = await readLines(path, 'Word list');
  if (!lines) return { dictionary: EMPTY_DICTIONARY, words: [] };
  const words = lines.map((w) => w.toLowerCase());
  const dictionary = createDictionary(words);
  console.info(`[Words] Loaded ${dictionary.size} words from ${path}.`);
  return { dictionary, words };
}

export async function loadWordFilter(path: string): Promise<WordFilter> {
  const lines = await readLines(path, 'Banned word list');
  return lines ? createWordFilter(lines) : EMPTY_WORD_FILTER;
}
