import { shuffleInPlace, type RandomSource } from '../core/rng';
import type { QuizOutcome } from '../core/types';
import type { WordFilter } from '../core/wordFilter';

export const NO_DEFINITION = 'No definition';
export const MISSING_DECOY = '—';

const DECOY_COUNT = 3;
const MAX_DECOY_ATTEMPTS = 12;

export interface DefinitionSource {
  getDefinitions(word: string): Promise<string[]>;
}

export interface Quiz {
  word: string;
  choices: string[];
  correct: string;
}

export type QuizService = {
  build: (word: string) => Promise<Quiz>;
  outcomeFor: (quiz: Quiz, choice: string) => QuizOutcome;
};

type QuizServiceOptions = {
  definitions: DefinitionSource;
  /** Dictionary words decoys are drawn from. */
  words: readonly string[];
  filter: WordFilter;
  random: RandomSource;
};

export function cleanDefinitions(definitions: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const d of definitions) {
    const cleaned = d.replace(/[[\]']/g, '').trim();
    const key = cleaned.toLowerCase();
    if (!cleaned || seen.has(key)) continue;
    seen.add(key);
    out.push(cleaned);
  }
  return out;
}

export function placeholderQuiz(word: string): Quiz {
  return {
    word: word.toUpperCase(),
    choices: [NO_DEFINITION, ...Array<string>(DECOY_COUNT).fill(MISSING_DECOY)],
    correct: NO_DEFINITION,
  };
}

export function createQuizService(options: QuizServiceOptions): QuizService {
  const { definitions, words, filter, random } = options;

  const safeDefinitions = async (word: string): Promise<string[]> => {
    try {
      const raw = await definitions.getDefinitions(word.toLowerCase());
      return filter.filterDefinitions(cleanDefinitions(raw));
    } catch (err) {
      console.warn(`[Quiz] No definitions for "${word}".`, err);
      return [];
    }
  };

  const build = async (word: string): Promise<Quiz> => {
    const defs = await safeDefinitions(word);
    const correct = defs.length > 0 ? defs[0] : NO_DEFINITION;

    const decoys: string[] = [];
    for (
      let i = 0;
      i < MAX_DECOY_ATTEMPTS && decoys.length < DECOY_COUNT && words.length > 0;
      i++
    ) {
      const candidate = random.choice(words);
      if (filter.isBanned(candidate)) continue;
      const [decoy] = await safeDefinitions(candidate);
      if (!decoy || decoy === correct || decoys.includes(decoy)) continue;
      decoys.push(decoy);
    }
    while (decoys.length < DECOY_COUNT) decoys.push(MISSING_DECOY);

    const choices = [correct, ...decoys];
    shuffleInPlace(choices, random);
    return { word: word.toUpperCase(), choices, correct };
  };

  return {
    build,
    outcomeFor: (quiz, choice) =>
      choice === quiz.correct ? 'correct' : 'incorrect',
  };
}

export function createStaticDefinitionSource(
  entries: Readonly<Record<string, readonly string[]>>,
): DefinitionSource {
  const table = new Map(
    Object.entries(entries).map(([w, defs]) => [w.toLowerCase(), defs]),
  );
  return {
    getDefinitions: async (word) => [...(table.get(word.toLowerCase()) ?? [])],
  };
}
