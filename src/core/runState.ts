import { DEFAULT_GRAVITY_MS } from './constants';
import { makeBoard } from './board';
import type { Board, Piece, RunState } from './types';

export interface RunStateInit {
  board?: Board;
  active: Piece;
  next: Piece;
  hold?: Piece | null;
  level?: number;
  gravityIntervalMs?: number;
}

export function createRunState(init: RunStateInit): RunState {
  return {
    board: init.board ?? makeBoard(),
    active: init.active,
    next: init.next,
    hold: init.hold ?? null,
    holdUsed: false,
    score: 0,
    level: init.level ?? 1,
    scoreMultiplier: 1,
    gravityIntervalMs: init.gravityIntervalMs ?? DEFAULT_GRAVITY_MS,
    wordsFoundSinceLevelUp: 0,
    foundWords: new Set(),
    removedWords: [],
    mode: 'playing',
  };
}
