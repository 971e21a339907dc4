import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDictionary } from '../core/dictionary';
import type { PieceGenerator } from '../core/generator';
import { createGameSession } from '../core/gameSession';
import { getDifficulty } from '../core/modes';
import { createPiece } from '../core/piece';
import type { RandomSource } from '../core/rng';
import { EMPTY_INPUT, type InputSource } from '../core/runner';
import {
  DEFAULT_SETTINGS,
  createMemoryStorage,
  loadSettings,
  mergeSettings,
  type Settings,
} from '../core/settings';
import { createSettingsStore } from '../core/settingsStore';
import type { GameEvent, InputFrame, Piece, Vec2 } from '../core/types';
import { createWordFilter, normalizeText } from '../core/wordFilter';
import {
  MISSING_DECOY,
  NO_DEFINITION,
  cleanDefinitions,
  createQuizService,
  createStaticDefinitionSource,
  type DefinitionSource,
  type Quiz,
  type QuizService,
} from '../app/quizService';
import { createResultBus } from '../app/resultBus';
import { createGameRuntime } from '../app/runtime';
import { createSessionService } from '../app/sessionService';
import { createMemorySessionStorage } from '../app/sessionStorage';
import { createFileKeyValueStorage } from '../app/settingsStorage';
import { loadWordFilter, loadWordList } from '../app/wordListService';

/** Always picks the listed indices in turn; ranges and weights take the low end. */
class ScriptedRandom implements RandomSource {
  private i = 0;

  constructor(private picks: number[] = [0]) {}

  choice<T>(items: readonly T[]): T {
    const pick = this.picks[this.i % this.picks.length];
    this.i++;
    return items[pick % items.length];
  }

  rangeInt(minInclusive: number): number {
    return minInclusive;
  }

  weightedChoice<T>(items: readonly T[]): T {
    return items[0];
  }
}

class FixedGenerator implements PieceGenerator {
  constructor(
    private shape: Vec2[],
    private word = 'CAT',
  ) {}

  next(): Piece {
    return createPiece(this.shape, this.word.split(''));
  }
}

const ROW: Vec2[] = [
  [0, 0],
  [1, 0],
  [2, 0],
];
const COLUMN: Vec2[] = [
  [0, 0],
  [0, 1],
  [0, 2],
];

const DEFINITIONS = {
  cat: ["[A] small 'feline'"],
  dog: ['A loyal animal'],
  owl: ['A night bird'],
};

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('Settings', () => {
  it('merges valid fields and keeps the rest', () => {
    const merged = mergeSettings(DEFAULT_SETTINGS, {
      identity: '  Ada ',
      game: { startingLevel: 42, difficulty: 'hard', softDropFactor: 'fast' },
      combo: { maxMult: Infinity, growth: 0.25 },
      session: { debounceMs: null },
    });

    expect(merged.identity).toBe('Ada');
    expect(merged.game).toEqual({
      startingLevel: 20,
      difficulty: 'hard',
      softDropFactor: 5,
    });
    expect(merged.combo).toEqual({
      decayMs: 9000,
      growth: 0.25,
      startMult: 1,
      maxMult: 4,
    });
    expect(merged.session.debounceMs).toBe(1500);
  });

  it('clamps and truncates the starting level', () => {
    const level = (v: number) =>
      mergeSettings(DEFAULT_SETTINGS, { game: { startingLevel: v } }).game
        .startingLevel;
    expect(level(0)).toBe(1);
    expect(level(2.7)).toBe(2);
  });

  it('falls back to defaults for unreadable storage', () => {
    const storage = createMemoryStorage({ 'letterfall.settings': '{oops' });
    expect(loadSettings(storage)).toEqual(DEFAULT_SETTINGS);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('persists applied patches and notifies subscribers', () => {
    const storage = createMemoryStorage();
    const store = createSettingsStore(storage);
    const seen: string[] = [];
    const unsubscribe = store.subscribe((s) => seen.push(s.game.difficulty));

    store.apply({ game: { difficulty: 'casual' } });
    unsubscribe();
    store.apply({ game: { difficulty: 'insane' } });

    expect(seen).toEqual(['casual']);
    expect(loadSettings(storage).game.difficulty).toBe('insane');
  });

  it('maps difficulty names to gravity', () => {
    expect(getDifficulty(' HARD ').gravityMs).toBe(480);
    expect(getDifficulty('unknown').id).toBe('standard');
  });

  describe('file storage', () => {
    let dir = '';

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'letterfall-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('round-trips values through the file', () => {
      const path = join(dir, 'nested', 'settings.json');
      const first = createFileKeyValueStorage(path);
      expect(first.getItem('a')).toBeNull();
      first.setItem('a', '1');
      first.setItem('b', '2');
      first.removeItem('a');

      const second = createFileKeyValueStorage(path);
      expect(second.getItem('a')).toBeNull();
      expect(second.getItem('b')).toBe('2');
    });
  });
});

describe('Word lists', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'letterfall-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a newline separated list', async () => {
    const path = join(dir, 'words.txt');
    await writeFile(path, 'Cat\n\n dog \r\nÉclair\n');

    const { dictionary, words } = await loadWordList(path);
    expect(words).toEqual(['cat', 'dog', 'éclair']);
    expect(dictionary.size).toBe(3);
    expect(dictionary.contains('eclair')).toBe(true);
  });

  it('degrades to empty lists when files are missing', async () => {
    const { dictionary, words } = await loadWordList(join(dir, 'none.txt'));
    expect(words).toEqual([]);
    expect(dictionary.size).toBe(0);

    const filter = await loadWordFilter(join(dir, 'none.txt'));
    expect(filter.isBanned('anything')).toBe(false);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('loads the banned list', async () => {
    const path = join(dir, 'banned.txt');
    await writeFile(path, 'darn\n');
    const filter = await loadWordFilter(path);
    expect(filter.isBanned('D4RN')).toBe(true);
  });
});

describe('Word filter', () => {
  it('folds case, accents and symbol spellings', () => {
    expect(normalizeText('D@rn!t')).toBe('darnit');
    expect(normalizeText('Crème--brûlée')).toBe('creme brulee');
    expect(normalizeText('   ')).toBe('');
  });

  it('matches banned words only as whole words', () => {
    const filter = createWordFilter(['darn']);
    expect(filter.isBanned('D4RN')).toBe(true);
    expect(filter.containsBanned('what a d@rn shame')).toBe(true);
    expect(filter.containsBanned('darnit')).toBe(false);
    expect(
      filter.filterDefinitions(['a darn thing', 'a fine thing']),
    ).toEqual(['a fine thing']);
  });
});

describe('Quiz service', () => {
  const failing: DefinitionSource = {
    getDefinitions: async (word) => {
      throw new Error(`offline: ${word}`);
    },
  };

  it('cleans definitions', () => {
    expect(cleanDefinitions(["[A] small 'feline'", ' ', 'a SMALL feline'])).toEqual([
      'A small feline',
    ]);
  });

  it('builds a question from the first definition and distinct decoys', async () => {
    const quizzes = createQuizService({
      definitions: createStaticDefinitionSource(DEFINITIONS),
      words: ['cat', 'dog', 'darn', 'hex', 'owl'],
      filter: createWordFilter(['darn']),
      random: new ScriptedRandom([0, 2, 3, 1, 4]),
    });

    const quiz = await quizzes.build('cat');
    expect(quiz.word).toBe('CAT');
    expect(quiz.correct).toBe('A small feline');
    expect(quiz.choices).toEqual([
      'A loyal animal',
      'A night bird',
      MISSING_DECOY,
      'A small feline',
    ]);
    expect(quizzes.outcomeFor(quiz, 'A small feline')).toBe('correct');
    expect(quizzes.outcomeFor(quiz, 'A night bird')).toBe('incorrect');
  });

  it('falls back to a placeholder answer', async () => {
    const quizzes = createQuizService({
      definitions: createStaticDefinitionSource({}),
      words: [],
      filter: createWordFilter([]),
      random: new ScriptedRandom(),
    });

    const quiz = await quizzes.build('zzz');
    expect(quiz).toEqual({
      word: 'ZZZ',
      choices: [MISSING_DECOY, MISSING_DECOY, MISSING_DECOY, NO_DEFINITION],
      correct: NO_DEFINITION,
    });
  });

  it('treats a failing lookup as no definitions', async () => {
    const quizzes = createQuizService({
      definitions: failing,
      words: ['hex'],
      filter: createWordFilter([]),
      random: new ScriptedRandom(),
    });

    const quiz = await quizzes.build('hex');
    expect(quiz.correct).toBe(NO_DEFINITION);
    expect(console.warn).toHaveBeenCalledTimes(13);
  });
});

describe('Game runtime', () => {
  const settings: Settings = mergeSettings(DEFAULT_SETTINGS, {
    identity: 'Ada',
  });

  const hardDropLeft: InputFrame = { ...EMPTY_INPUT, moveX: -5, hardDrop: true };

  const onceThen = (first: InputFrame): InputSource => {
    let used = false;
    return {
      sample: () => {
        if (used) return EMPTY_INPUT;
        used = true;
        return first;
      },
    };
  };

  const setup = (
    options: { shape?: Vec2[]; word?: string; quizzes?: QuizService } = {},
  ) => {
    let t = 0;
    const session = createGameSession(settings, {
      seed: 1,
      dictionary: createDictionary(['cat']),
      generatorFactory: () =>
        new FixedGenerator(options.shape ?? ROW, options.word),
      runner: { fixedStepMs: 10, maxElapsedMs: 250, maxStepsPerTick: 10 },
    });
    const storage = createMemorySessionStorage();
    const sessions = createSessionService({
      storage,
      getGame: session.getGame,
      getIdentity: () => settings.identity,
      getSettings: () => settings.session,
      now: () => Date.parse('2026-03-01T12:00:00.000Z') + t,
    });
    const quizzes =
      options.quizzes ??
      createQuizService({
        definitions: createStaticDefinitionSource(DEFINITIONS),
        words: [],
        filter: createWordFilter([]),
        random: new ScriptedRandom(),
      });
    const results = createResultBus();
    const runtime = createGameRuntime({
      session,
      sessions,
      quizzes,
      results,
      clock: () => t,
    });
    const events: GameEvent[] = [];
    runtime.onEvent((e) => events.push(e));
    const advance = (ms: number) => {
      t += ms;
      runtime.tick();
    };
    return { session, sessions, storage, results, runtime, events, advance };
  };

  it('steps the game and forwards events', () => {
    const { session, sessions, runtime, events, advance } = setup();
    runtime.setInputSource(onceThen(hardDropLeft));

    advance(10);

    expect(events.map((e) => e.type)).toEqual(['lock', 'clear']);
    expect(session.getGame().state.score).toBe(30);
    expect(sessions.isDirty()).toBe(true);
  });

  it('clamps the frame delta', () => {
    const { runtime, advance } = setup();
    let samples = 0;
    runtime.setInputSource({
      sample: () => {
        samples++;
        return EMPTY_INPUT;
      },
    });

    advance(5000);
    expect(samples).toBe(10);
    advance(-50);
    expect(samples).toBe(10);
  });

  it('opens a quiz and applies the answer', async () => {
    const { session, runtime, advance } = setup();
    session.getGame().state.removedWords.push('ONE', 'TWO', 'SIX', 'TEN');
    runtime.setInputSource(onceThen(hardDropLeft));
    advance(10);

    await runtime.settled();
    const quiz = runtime.currentQuiz();
    expect(quiz?.word).toBe('CAT');
    expect(quiz?.correct).toBe('A small feline');

    expect(runtime.answerQuiz('A small feline')).toBe('correct');
    expect(session.getGame().state.score).toBe(80);
    expect(session.getGame().mode).toBe('playing');
    expect(runtime.currentQuiz()).toBeNull();
    expect(runtime.answerQuiz('A small feline')).toBeNull();
  });

  it('drops a quiz that was skipped before it was ready', async () => {
    const { session, runtime, advance } = setup();
    session.getGame().state.removedWords.push('ONE', 'TWO', 'SIX', 'TEN');
    runtime.setInputSource(onceThen(hardDropLeft));
    advance(10);

    runtime.skipQuiz();
    await runtime.settled();
    expect(runtime.currentQuiz()).toBeNull();
    expect(session.getGame().mode).toBe('playing');
  });

  it('shows the placeholder when the quiz cannot be built', async () => {
    const broken: QuizService = {
      build: async () => {
        throw new Error('offline');
      },
      outcomeFor: () => 'incorrect',
    };
    const { session, runtime, advance } = setup({ quizzes: broken });
    session.getGame().state.removedWords.push('ONE', 'TWO', 'SIX', 'TEN');
    runtime.setInputSource(onceThen(hardDropLeft));
    advance(10);

    await runtime.settled();
    expect(runtime.currentQuiz()?.correct).toBe(NO_DEFINITION);
  });

  it('shows the placeholder when definitions never arrive', async () => {
    vi.useFakeTimers();
    const stalled: QuizService = {
      build: () => new Promise<Quiz>(() => undefined),
      outcomeFor: () => 'incorrect',
    };
    const { session, runtime, advance } = setup({ quizzes: stalled });
    session.getGame().state.removedWords.push('ONE', 'TWO', 'SIX', 'TEN');
    runtime.setInputSource(onceThen(hardDropLeft));
    advance(10);

    await vi.advanceTimersByTimeAsync(4999);
    expect(runtime.currentQuiz()).toBeNull();

    await vi.advanceTimersByTimeAsync(1);
    await runtime.settled();
    expect(runtime.currentQuiz()?.word).toBe('CAT');
    expect(runtime.currentQuiz()?.correct).toBe(NO_DEFINITION);
    expect(console.warn).toHaveBeenCalledWith(
      '[Quiz] Definitions for "CAT" timed out.',
    );
  });

  it('publishes the result and clears the stored run on game over', async () => {
    const { session, storage, results, runtime, advance } = setup({
      shape: COLUMN,
      word: 'ZZZ',
    });
    runtime.suspend();
    await runtime.settled();
    expect(storage.peek()).not.toBeNull();
    runtime.resume();

    for (let i = 0; i < 11; i++) session.getGame().hardDrop();
    advance(10);
    await runtime.settled();

    expect(session.getGame().mode).toBe('gameOver');
    expect(results.take()?.score).toBe(0);
    expect(results.take()).toBeNull();
    expect(storage.peek()).toBeNull();
  });

  it('pauses on suspend and resumes', () => {
    const { session, runtime, events } = setup();
    runtime.suspend();
    expect(session.getGame().mode).toBe('paused');
    expect(session.getGame().pauseReasonList).toEqual(['lifecycle']);

    runtime.resume();
    expect(session.getGame().mode).toBe('playing');
    expect(events).toEqual([
      { type: 'modeChanged', mode: 'paused' },
      { type: 'modeChanged', mode: 'playing' },
    ]);
  });

  const storedRun = async (score: number) => {
    const first = setup();
    first.session.getGame().state.score = score;
    await first.sessions.save('manual');
    const second = setup();
    const bytes = first.storage.peek();
    if (bytes) await second.storage.write(bytes);
    return second;
  };

  it('restores a stored run and resumes it', async () => {
    const { session, runtime, events } = await storedRun(77);

    expect(await runtime.restore()).toBe(true);
    expect(session.getGame().state.score).toBe(77);
    expect(session.getGame().mode).toBe('playing');
    expect(events).toEqual([
      { type: 'modeChanged', mode: 'paused' },
      { type: 'modeChanged', mode: 'playing' },
    ]);
  });

  it('keeps a restored run paused while suspended', async () => {
    const { session, runtime } = await storedRun(12);
    runtime.suspend();

    expect(await runtime.restore()).toBe(true);
    expect(session.getGame().mode).toBe('paused');
    expect(session.getGame().pauseReasonList).toEqual(['lifecycle']);

    runtime.resume();
    expect(session.getGame().mode).toBe('playing');
  });
});

describe('Game session', () => {
  it('applies difficulty and starting level on restart', () => {
    const restarted: number[] = [];
    const session = createGameSession(
      mergeSettings(DEFAULT_SETTINGS, {
        game: { difficulty: 'hard', startingLevel: 5 },
      }),
      {
        seed: 1,
        generatorFactory: () => new FixedGenerator(ROW),
        onRestart: (game) => restarted.push(game.state.level),
      },
    );
    expect(session.getGame().state.level).toBe(5);
    expect(session.getGame().state.gravityIntervalMs).toBe(480);

    session.setConfig(
      mergeSettings(DEFAULT_SETTINGS, { game: { difficulty: 'insane' } }),
    );
    session.restart();
    expect(session.getGame().state.gravityIntervalMs).toBe(380);
    expect(session.getGame().state.level).toBe(1);
    expect(restarted).toEqual([1]);
    expect(session.getSettings().game.difficulty).toBe('insane');
  });
});
