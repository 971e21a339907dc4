import {
  BASE_WORD_POINTS,
  GRAVITY_LEVEL_FACTOR,
  MIN_GRAVITY_MS,
  QUIZ_EVERY_WORDS,
  WORDS_PER_LEVEL,
  minWordLength,
  noRepeatsActive,
} from './constants';
import { boardCols, boardRows, collapseColumns } from './board';
import { normalizeWord, type Dictionary } from './dictionary';
import type { ComboTracker } from './combo';
import type { Board, RunState, Vec2 } from './types';

export type Orientation = 'horizontal' | 'vertical';

export interface WordCandidate {
  /** Letters as they appear on the board. */
  word: string;
  normalized: string;
  orientation: Orientation;
  cells: Vec2[];
}

export interface ScanOptions {
  minLength: number;
  /** Normalized words that may not qualify again. */
  excluded?: ReadonlySet<string>;
}

export interface PassResult {
  words: WordCandidate[];
  cells: Vec2[];
  points: number;
  /** Words whose removal landed the removed-word total on a quiz boundary. */
  quizWords: string[];
  leveledUp: boolean;
}

export interface CascadeResult {
  passes: PassResult[];
}

function scanLine(
  read: (i: number) => string | null,
  length: number,
  at: (i: number) => Vec2,
  orientation: Orientation,
  dictionary: Dictionary,
  options: ScanOptions,
  out: WordCandidate[],
): void {
  for (let start = 0; start < length; start++) {
    let word = '';
    for (let end = start; end < length; end++) {
      const c = read(end);
      // every longer run from this start also crosses the gap
      if (c == null) break;
      word += c;
      if (word.length < options.minLength) continue;

      const normalized = normalizeWord(word);
      if (!dictionary.contains(normalized)) continue;
      if (options.excluded?.has(normalized)) continue;

      const cells: Vec2[] = [];
      for (let i = start; i <= end; i++) cells.push(at(i));
      out.push({ word, normalized, orientation, cells });
    }
  }
}

/**
 * Every qualifying run, horizontal ones first (by row, then start column)
 * followed by vertical ones (by column, then start row).
 */
export function findCandidates(
  board: Board,
  dictionary: Dictionary,
  options: ScanOptions,
): WordCandidate[] {
  const rows = boardRows(board);
  const cols = boardCols(board);
  const out: WordCandidate[] = [];

  for (let y = 0; y < rows; y++) {
    scanLine(
      (x) => board[y][x],
      cols,
      (x) => [x, y],
      'horizontal',
      dictionary,
      options,
      out,
    );
  }
  for (let x = 0; x < cols; x++) {
    scanLine(
      (y) => board[y][x],
      rows,
      (y) => [x, y],
      'vertical',
      dictionary,
      options,
      out,
    );
  }
  return out;
}

const cellKey = ([x, y]: Vec2): string => `${x},${y}`;

/**
 * Longest words win; equal lengths keep discovery order. A candidate is
 * dropped when it shares a cell with an accepted one, or, with `noRepeats`,
 * when the same word was already accepted in this selection.
 */
export function selectWords(
  candidates: readonly WordCandidate[],
  noRepeats = false,
): WordCandidate[] {
  const sorted = [...candidates].sort((a, b) => b.word.length - a.word.length);
  const claimed = new Set<string>();
  const acceptedWords = new Set<string>();
  const accepted: WordCandidate[] = [];

  for (const candidate of sorted) {
    if (candidate.cells.some((c) => claimed.has(cellKey(c)))) continue;
    if (noRepeats && acceptedWords.has(candidate.normalized)) continue;
    for (const c of candidate.cells) claimed.add(cellKey(c));
    acceptedWords.add(candidate.normalized);
    accepted.push(candidate);
  }
  return accepted;
}

export function scoreWord(
  length: number,
  level: number,
  multiplier: number,
): number {
  return Math.floor(length * BASE_WORD_POINTS * level * multiplier);
}

/**
 * One scan, removal and collapse over the run's board. Updates score,
 * word history and level in place.
 */
export function resolvePass(
  state: RunState,
  dictionary: Dictionary,
  multiplier: number,
): PassResult {
  const level = state.level;
  const noRepeats = noRepeatsActive(level);
  const candidates = findCandidates(state.board, dictionary, {
    minLength: minWordLength(level),
    excluded: noRepeats ? state.foundWords : undefined,
  });
  const words = selectWords(candidates, noRepeats);

  const result: PassResult = {
    words,
    cells: [],
    points: 0,
    quizWords: [],
    leveledUp: false,
  };
  if (words.length === 0) return result;

  for (const w of words) {
    const points = scoreWord(w.word.length, level, multiplier);
    state.score += points;
    result.points += points;
    state.removedWords.push(w.word);
    state.foundWords.add(w.normalized);
    state.wordsFoundSinceLevelUp += 1;
    if (state.removedWords.length % QUIZ_EVERY_WORDS === 0) {
      result.quizWords.push(w.word);
    }
    for (const [x, y] of w.cells) {
      state.board[y][x] = null;
      result.cells.push([x, y]);
    }
  }

  collapseColumns(state.board);

  if (state.wordsFoundSinceLevelUp >= WORDS_PER_LEVEL) {
    state.level += 1;
    state.wordsFoundSinceLevelUp = 0;
    state.gravityIntervalMs = Math.max(
      MIN_GRAVITY_MS,
      Math.floor(state.gravityIntervalMs * GRAVITY_LEVEL_FACTOR),
    );
    result.leveledUp = true;
  }
  return result;
}

/** Repeats passes until one removes nothing; each removing pass feeds the combo. */
export function resolveCascade(
  state: RunState,
  dictionary: Dictionary,
  combo: ComboTracker,
): CascadeResult {
  const passes: PassResult[] = [];
  for (;;) {
    const multiplier = combo.effectiveMultiplier(state.scoreMultiplier);
    const pass = resolvePass(state, dictionary, multiplier);
    if (pass.words.length === 0) break;
    passes.push(pass);
    combo.onClear();
  }
  return { passes };
}
