export const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const VOWELS = 'AEIOU';

export type Letter = string;

export type Vec2 = readonly [number, number];

export type Cell = Letter | null;
export type Board = Cell[][];

export interface Piece {
  /** Local shape; the first offset is the rotation pivot. */
  offsets: Vec2[];
  letters: Letter[];
  /** Absolute board cells, parallel to `offsets` and `letters`. */
  cells: Vec2[];
}

export type GameMode = 'playing' | 'paused' | 'quiz' | 'gameOver';

export type QuizOutcome = 'correct' | 'incorrect' | 'skipped';

export interface ClearedWord {
  word: string;
  cells: Vec2[];
}

export interface GameResult {
  readonly score: number;
  readonly level: number;
  readonly wordsCleared: number;
  readonly removedWordCount: number;
  readonly durationMs: number;
  readonly endedAt: string;
}

export type GameEvent =
  | { type: 'lock'; cells: Vec2[] }
  | { type: 'hold' }
  | { type: 'clear'; words: ClearedWord[]; cellCount: number }
  | { type: 'levelUp'; level: number; gravityIntervalMs: number }
  | { type: 'quizRequested'; word: string }
  | { type: 'quizAnswered'; outcome: QuizOutcome }
  | { type: 'modeChanged'; mode: GameMode }
  | { type: 'restart' }
  | { type: 'gameOver'; result: GameResult };

export interface RunState {
  board: Board;
  active: Piece;
  next: Piece;
  hold: Piece | null;
  holdUsed: boolean;
  score: number;
  level: number;
  /** Base multiplier the combo multiplier is applied on top of. */
  scoreMultiplier: number;
  gravityIntervalMs: number;
  wordsFoundSinceLevelUp: number;
  /** Normalized words cleared this run. */
  foundWords: Set<string>;
  /** Every removed word, as spelled on the board, in removal order. */
  removedWords: string[];
  mode: GameMode;
}

export interface InputFrame {
  /** Signed number of horizontal steps to attempt this frame. */
  moveX: number;
  rotate: boolean;
  softDrop: boolean;
  hardDrop: boolean;
  hold: boolean;
  restart: boolean;
}
