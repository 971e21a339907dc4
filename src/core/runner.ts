import type { Game } from './game';
import type { InputFrame, RunState } from './types';

export interface InputSource {
  sample(state: RunState, dtMs: number): InputFrame;
}

export const EMPTY_INPUT: InputFrame = {
  moveX: 0,
  rotate: false,
  softDrop: false,
  hardDrop: false,
  hold: false,
  restart: false,
};

export const NullInputSource: InputSource = {
  sample: () => EMPTY_INPUT,
};

export interface GameRunnerOptions {
  fixedStepMs: number;
  /** Frames longer than this count as this long. */
  maxElapsedMs?: number;
  /** Time left over past this many steps is dropped. */
  maxStepsPerTick?: number;
  /** Takes over restart frames, so the owner can re-apply its settings first. */
  onRestart?: (game: Game) => void;
}

/**
 * Turns wall-clock frames into fixed engine steps. One input sample per
 * step; a run that ends mid-frame drops the rest of the frame.
 */
export class GameRunner {
  private bankedMs = 0;

  constructor(
    private readonly game: Game,
    private readonly options: GameRunnerOptions,
  ) {}

  get state(): RunState {
    return this.game.state;
  }

  resetTiming(): void {
    this.bankedMs = 0;
  }

  /** Returns how many fixed steps ran. */
  tick(elapsedMs: number, input: InputSource = NullInputSource): number {
    const { fixedStepMs, maxElapsedMs, maxStepsPerTick } = this.options;
    const frame = Math.max(0, Math.min(elapsedMs, maxElapsedMs ?? Infinity));
    this.bankedMs += frame;

    const limit = maxStepsPerTick ?? Infinity;
    let steps = 0;
    while (this.bankedMs >= fixedStepMs && steps < limit) {
      this.bankedMs -= fixedStepMs;
      this.step(input);
      steps++;
      if (this.game.mode === 'gameOver') break;
    }
    if (steps >= limit || this.game.mode === 'gameOver') this.bankedMs = 0;
    return steps;
  }

  step(input: InputSource = NullInputSource): void {
    const { fixedStepMs, onRestart } = this.options;
    const frame = input.sample(this.game.state, fixedStepMs);
    if (frame.restart && onRestart) {
      onRestart(this.game);
      return;
    }
    this.game.step(fixedStepMs, frame);
  }

  /** Steps until `done` holds or `maxSteps` run; returns the steps taken. */
  runUntil(
    done: (state: RunState) => boolean,
    maxSteps = Infinity,
    input: InputSource = NullInputSource,
  ): number {
    let steps = 0;
    while (!done(this.game.state) && steps < maxSteps) {
      this.step(input);
      steps++;
    }
    return steps;
  }
}
