import {
  DEFAULT_GRAVITY_MS,
  DEFAULT_SOFT_DROP_FACTOR,
  QUIZ_CORRECT_BONUS,
  minWordLength,
  noRepeatsActive,
} from './constants';
import { boardCols, boardRows, collidesAt, shiftUp } from './board';
import { ComboTracker, type ComboConfig } from './combo';
import { EMPTY_DICTIONARY, type Dictionary } from './dictionary';
import type { PieceGenerator } from './generator';
import {
  canMove,
  dropDistance,
  hardDrop,
  lockPiece,
  move,
  resetToSpawn,
  tryRotate,
} from './piece';
import { LetterPieceGenerator } from './randomGenerator';
import { resolveCascade } from './resolver';
import { SeededRandom, type RandomSource } from './rng';
import { createRunState } from './runState';
import type {
  GameEvent,
  GameMode,
  GameResult,
  InputFrame,
  QuizOutcome,
  RunState,
} from './types';

export interface GameConfig {
  seed: number;
  dictionary?: Dictionary;
  random?: RandomSource;
  generatorFactory?: (random: RandomSource) => PieceGenerator;
  combo?: Partial<ComboConfig>;
  /** Gravity interval a fresh run starts with. */
  gravityMs?: number;
  startingLevel?: number;
  softDropFactor?: number;
  now?: () => number;
}

export type PauseReason = 'user' | 'lifecycle' | 'nav' | 'system' | (string & {});

export class Game {
  readonly state: RunState;
  readonly combo: ComboTracker;

  private dictionary: Dictionary;
  private random: RandomSource;
  private generator: PieceGenerator;
  private now: () => number;

  private gravityMs: number;
  private startingLevel: number;
  private softDropFactor: number;

  private fallAccS = 0;
  private softDrop = false;
  private resolving = false;
  private pauseReasons = new Set<string>();
  private pendingQuiz: string | null = null;
  private events: GameEvent[] = [];
  private runStartedAt: number;
  private result: GameResult | null = null;

  constructor(cfg: GameConfig) {
    this.dictionary = cfg.dictionary ?? EMPTY_DICTIONARY;
    this.random = cfg.random ?? new SeededRandom(cfg.seed);
    const makeGenerator =
      cfg.generatorFactory ?? ((random) => new LetterPieceGenerator(random));
    this.generator = makeGenerator(this.random);
    this.now = cfg.now ?? Date.now;
    this.gravityMs = cfg.gravityMs ?? DEFAULT_GRAVITY_MS;
    this.startingLevel = cfg.startingLevel ?? 1;
    this.softDropFactor = cfg.softDropFactor ?? DEFAULT_SOFT_DROP_FACTOR;
    this.combo = new ComboTracker(cfg.combo);
    this.runStartedAt = this.now();

    this.state = createRunState({
      active: this.generator.next(),
      next: this.generator.next(),
      level: this.startingLevel,
      gravityIntervalMs: this.gravityMs,
    });
  }

  setConfig(
    cfg: Partial<
      Pick<
        GameConfig,
        'dictionary' | 'gravityMs' | 'startingLevel' | 'softDropFactor'
      >
    >,
  ): void {
    if (cfg.dictionary !== undefined) this.dictionary = cfg.dictionary;
    if (cfg.gravityMs !== undefined) this.gravityMs = cfg.gravityMs;
    if (cfg.startingLevel !== undefined) this.startingLevel = cfg.startingLevel;
    if (cfg.softDropFactor !== undefined)
      this.softDropFactor = cfg.softDropFactor;
  }

  get mode(): GameMode {
    return this.state.mode;
  }

  /** True while a lock is being resolved; movement commands are refused. */
  get isResolving(): boolean {
    return this.resolving;
  }

  get minWordLength(): number {
    return minWordLength(this.state.level);
  }

  get noRepeats(): boolean {
    return noRepeatsActive(this.state.level);
  }

  get quizWord(): string | null {
    return this.pendingQuiz;
  }

  get pauseReasonList(): readonly string[] {
    return [...this.pauseReasons];
  }

  get ghostDrop(): number {
    return dropDistance(this.state.board, this.state.active);
  }

  get lastResult(): GameResult | null {
    return this.result;
  }

  drainEvents(): GameEvent[] {
    const out = this.events;
    this.events = [];
    return out;
  }

  step(dtMs: number, input: InputFrame): void {
    if (input.restart) {
      this.restart();
      return;
    }
    if (this.applyInput(input)) return;
    this.tick(dtMs);
  }

  private applyInput(input: InputFrame): boolean {
    if (input.hold) this.hold();
    if (input.rotate) this.rotate();
    if (input.moveX !== 0) this.moveSteps(input.moveX);
    this.setSoftDrop(input.softDrop);
    if (input.hardDrop) {
      this.hardDrop();
      return true;
    }
    return false;
  }

  tick(dtMs: number): void {
    if (this.state.mode !== 'playing' || this.resolving) return;

    this.combo.update(dtMs);
    if (this.state.gravityIntervalMs <= 0) {
      this.state.gravityIntervalMs = DEFAULT_GRAVITY_MS;
    }

    const rate = this.softDrop ? this.softDropFactor : 1;
    this.fallAccS += (dtMs / 1000) * rate;
    const intervalS = this.state.gravityIntervalMs / 1000;

    while (this.fallAccS >= intervalS) {
      this.fallAccS -= intervalS;
      if (!move(this.state.board, this.state.active, 0, 1)) {
        this.lockAndResolve();
        break;
      }
    }
  }

  private get canPlayInput(): boolean {
    return this.state.mode === 'playing' && !this.resolving;
  }

  moveLeft(): boolean {
    return this.canPlayInput && move(this.state.board, this.state.active, -1, 0);
  }

  moveRight(): boolean {
    return this.canPlayInput && move(this.state.board, this.state.active, 1, 0);
  }

  private moveSteps(steps: number): void {
    const dir = steps < 0 ? -1 : 1;
    const count = Number.isFinite(steps) ? Math.abs(Math.trunc(steps)) : Infinity;
    for (let i = 0; i < count; i++) {
      const moved = dir < 0 ? this.moveLeft() : this.moveRight();
      if (!moved) break;
    }
  }

  rotate(): boolean {
    return this.canPlayInput && tryRotate(this.state.board, this.state.active);
  }

  setSoftDrop(enabled: boolean): void {
    this.softDrop = this.state.mode === 'playing' && enabled;
  }

  hardDrop(): number {
    if (!this.canPlayInput) return 0;
    const dropped = hardDrop(this.state.board, this.state.active);
    this.lockAndResolve();
    return dropped;
  }

  hold(): boolean {
    if (!this.canPlayInput || this.state.holdUsed) return false;

    const current = this.state.active;
    if (this.state.hold == null) {
      this.state.active = this.state.next;
      this.state.next = this.generator.next();
    } else {
      this.state.active = this.state.hold;
    }
    this.state.hold = current;
    resetToSpawn(current);
    resetToSpawn(this.state.active);
    this.state.holdUsed = true;
    this.events.push({ type: 'hold' });

    if (!canMove(this.state.board, this.state.active)) this.endRun();
    return true;
  }

  private lockAndResolve(): void {
    this.resolving = true;
    try {
      const cells = this.state.active.cells.slice();
      lockPiece(this.state.board, this.state.active);
      this.events.push({ type: 'lock', cells });

      const { passes } = resolveCascade(
        this.state,
        this.dictionary,
        this.combo,
      );
      for (const pass of passes) {
        this.events.push({
          type: 'clear',
          words: pass.words.map((w) => ({ word: w.word, cells: w.cells })),
          cellCount: pass.cells.length,
        });
        if (pass.quizWords.length > 0) this.requestQuiz(pass.quizWords[0]);
        if (pass.leveledUp) {
          this.events.push({
            type: 'levelUp',
            level: this.state.level,
            gravityIntervalMs: this.state.gravityIntervalMs,
          });
        }
      }

      this.state.active = this.state.next;
      resetToSpawn(this.state.active);
      this.state.next = this.generator.next();
      this.state.holdUsed = false;
      this.fallAccS = 0;

      if (!canMove(this.state.board, this.state.active)) this.endRun();
    } finally {
      this.resolving = false;
    }
  }

  private requestQuiz(word: string): void {
    if (this.pendingQuiz != null || this.state.mode !== 'playing') return;
    this.pendingQuiz = word;
    this.softDrop = false;
    this.setMode('quiz');
    this.events.push({ type: 'quizRequested', word });
  }

  answerQuiz(outcome: QuizOutcome): void {
    if (this.pendingQuiz == null || this.state.mode !== 'quiz') return;
    this.pendingQuiz = null;

    if (outcome === 'correct') {
      this.state.score += QUIZ_CORRECT_BONUS;
    } else if (outcome === 'incorrect') {
      this.injectBottomRow();
    }
    this.events.push({ type: 'quizAnswered', outcome });
    if (this.mode === 'gameOver') return;

    this.setMode(this.pauseReasons.size > 0 ? 'paused' : 'playing');
    this.fallAccS = 0;
  }

  private injectBottomRow(): void {
    const { board } = this.state;
    shiftUp(board);
    const letters = this.generator.next().letters;
    const bottom = boardRows(board) - 1;
    for (let x = 0; x < boardCols(board); x++) {
      board[bottom][x] = this.random.choice(letters);
    }

    // the rising rows can only reach the active piece from below
    if (collidesAt(board, this.state.active.cells)) {
      if (!move(board, this.state.active, 0, -1)) this.endRun();
    }
  }

  addPauseReason(reason: PauseReason): void {
    this.pauseReasons.add(reason);
    if (this.state.mode === 'playing') {
      this.softDrop = false;
      this.setMode('paused');
    }
  }

  removePauseReason(reason: PauseReason): void {
    this.pauseReasons.delete(reason);
    if (this.state.mode === 'paused' && this.pauseReasons.size === 0) {
      this.fallAccS = 0;
      this.setMode('playing');
    }
  }

  pause(reason: PauseReason = 'user'): void {
    this.addPauseReason(reason);
  }

  resume(reason: PauseReason = 'user'): void {
    this.removePauseReason(reason);
  }

  togglePause(): void {
    if (this.state.mode === 'playing') this.pause('user');
    else if (this.state.mode === 'paused') this.resume('user');
  }

  restart(): void {
    const s = this.state;
    s.board.forEach((row) => row.fill(null));
    s.active = this.generator.next();
    s.next = this.generator.next();
    s.hold = null;
    s.holdUsed = false;
    s.score = 0;
    s.level = this.startingLevel;
    s.scoreMultiplier = 1;
    s.gravityIntervalMs = this.gravityMs;
    s.wordsFoundSinceLevelUp = 0;
    s.foundWords.clear();
    s.removedWords.length = 0;

    this.combo.reset();
    this.fallAccS = 0;
    this.softDrop = false;
    this.resolving = false;
    this.pendingQuiz = null;
    this.pauseReasons.clear();
    this.result = null;
    this.runStartedAt = this.now();
    this.events.push({ type: 'restart' });
    this.setMode('playing');
  }

  /**
   * Replaces the run with a restored one. The run comes back paused with no
   * pause reasons, so a single resume request starts it.
   */
  loadState(restored: RunState): void {
    Object.assign(this.state, restored, { mode: this.state.mode });
    this.combo.reset();
    this.fallAccS = 0;
    this.softDrop = false;
    this.resolving = false;
    this.pendingQuiz = null;
    this.pauseReasons.clear();
    this.result = null;
    this.runStartedAt = this.now();
    this.setMode('paused');
  }

  private endRun(): void {
    if (this.state.mode === 'gameOver') return;
    this.softDrop = false;
    this.pendingQuiz = null;
    this.pauseReasons.clear();
    this.setMode('gameOver');

    const endedAt = this.now();
    const result: GameResult = Object.freeze({
      score: this.state.score,
      level: this.state.level,
      wordsCleared: this.state.foundWords.size,
      removedWordCount: this.state.removedWords.length,
      durationMs: Math.max(0, endedAt - this.runStartedAt),
      endedAt: new Date(endedAt).toISOString(),
    });
    this.result = result;
    this.events.push({ type: 'gameOver', result });
  }

  private setMode(mode: GameMode): void {
    if (this.state.mode === mode) return;
    this.state.mode = mode;
    this.events.push({ type: 'modeChanged', mode });
  }
}
