export const COLS = 10;
export const ROWS = 33;

export const SPAWN_X = Math.floor(COLS / 2);
export const SPAWN_Y = 0;

/** Board sentinel for an empty cell in persisted rows. */
export const EMPTY_CELL = '.';

export const DEFAULT_GRAVITY_MS = 600;
export const MIN_GRAVITY_MS = 120;
export const RESTORE_MIN_GRAVITY_MS = 60;
export const GRAVITY_LEVEL_FACTOR = 0.9;
export const DEFAULT_SOFT_DROP_FACTOR = 5;

export const WORDS_PER_LEVEL = 10;
export const BASE_WORD_POINTS = 10;
export const NO_REPEATS_MIN_LENGTH = 5;

export const QUIZ_EVERY_WORDS = 5;
export const QUIZ_CORRECT_BONUS = 50;

export const DEFAULT_COMBO_DECAY_MS = 9000;
export const DEFAULT_COMBO_GROWTH = 0.5;
export const DEFAULT_COMBO_START_MULT = 1.0;
export const DEFAULT_COMBO_MAX_MULT = 4.0;

export const MIN_STARTING_LEVEL = 1;
export const MAX_STARTING_LEVEL = 20;

export const SESSION_PROTOCOL_VERSION = 1;
export const SESSION_FRESHNESS_MS = 10 * 60 * 1000;
export const DEFAULT_AUTOSAVE_MS = 15_000;
export const DEFAULT_SAVE_DEBOUNCE_MS = 1500;
export const DEFAULT_MIN_SAVE_INTERVAL_MS = 30_000;

export const SETTINGS_STORAGE_KEY = 'letterfall.settings';

export function minWordLength(level: number): number {
  return 3 + Math.min(2, Math.floor(level / 10));
}

export function noRepeatsActive(level: number): boolean {
  return minWordLength(level) >= NO_REPEATS_MIN_LENGTH;
}
