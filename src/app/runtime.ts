import type { GameSession } from '../core/gameSession';
import { NullInputSource, type InputSource } from '../core/runner';
import type { GameEvent, QuizOutcome } from '../core/types';
import { placeholderQuiz, type Quiz, type QuizService } from './quizService';
import type { ResultBus } from './resultBus';
import type { SessionService } from './sessionService';

const FRAME_MS = 16;
const MAX_FRAME_DT_MS = 100;
const QUIZ_TIMEOUT_MS = 5000;

export type GameRuntime = {
  start: () => void;
  stop: () => void;
  /** One frame: measure elapsed time, step the runner, dispatch events. */
  tick: () => void;
  setInputSource: (source: InputSource) => void;
  onEvent: (listener: (event: GameEvent) => void) => () => void;
  /** Loads the stored run and resumes it unless the host is suspended. */
  restore: () => Promise<boolean>;
  /** Host went to the background: pause and save straight away. */
  suspend: () => void;
  resume: () => void;
  currentQuiz: () => Quiz | null;
  answerQuiz: (choice: string) => QuizOutcome | null;
  skipQuiz: () => void;
  /** Resolves once queued quiz builds and storage work have settled. */
  settled: () => Promise<void>;
};

type GameRuntimeOptions = {
  session: GameSession;
  sessions: SessionService;
  quizzes: QuizService;
  results: ResultBus;
  inputSource?: InputSource;
  clock?: () => number;
  /** A quiz build slower than this shows the placeholder quiz. */
  quizTimeoutMs?: number;
};

export function createGameRuntime(options: GameRuntimeOptions): GameRuntime {
  const { session, sessions, quizzes, results } = options;
  const clock = options.clock ?? (() => performance.now());
  const quizTimeoutMs = options.quizTimeoutMs ?? QUIZ_TIMEOUT_MS;
  let inputSource = options.inputSource ?? NullInputSource;

  const listeners = new Set<(event: GameEvent) => void>();
  const background = new Set<Promise<void>>();
  let timer: ReturnType<typeof setInterval> | null = null;
  let lastFrameAt = clock();
  let quiz: Quiz | null = null;
  let suspended = false;

  const track = (work: Promise<unknown>, label: string) => {
    const done = work.then(
      () => undefined,
      (err: unknown) => {
        console.warn(`[Runtime] ${label} failed.`, err);
      },
    );
    background.add(done);
    void done.finally(() => background.delete(done));
  };

  const buildWithTimeout = (word: string): Promise<Quiz> => {
    let timeout: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<Quiz>((resolve) => {
      timeout = setTimeout(() => {
        console.warn(`[Quiz] Definitions for "${word}" timed out.`);
        resolve(placeholderQuiz(word));
      }, quizTimeoutMs);
    });
    return Promise.race([quizzes.build(word), expired]).finally(() =>
      clearTimeout(timeout),
    );
  };

  const openQuiz = (word: string) => {
    quiz = null;
    const build = buildWithTimeout(word).catch((err: unknown) => {
      console.warn(`[Quiz] Could not build quiz for "${word}".`, err);
      return placeholderQuiz(word);
    });
    track(
      build.then((built) => {
        const game = session.getGame();
        // answered or restarted while the definitions were loading
        if (game.mode !== 'quiz' || game.quizWord !== word) return;
        quiz = built;
      }),
      'Quiz build',
    );
  };

  const handle = (event: GameEvent) => {
    switch (event.type) {
      case 'lock':
      case 'hold':
      case 'clear':
      case 'quizAnswered':
        sessions.markDirty();
        break;
      case 'restart':
        quiz = null;
        track(sessions.clear(), 'Session clear');
        sessions.markDirty();
        break;
      case 'quizRequested':
        openQuiz(event.word);
        break;
      case 'gameOver':
        quiz = null;
        results.set(event.result);
        track(sessions.clear(), 'Session clear');
        break;
      default:
        break;
    }
  };

  const dispatch = () => {
    for (const event of session.getGame().drainEvents()) {
      handle(event);
      for (const listener of listeners) listener(event);
    }
  };

  const tick = () => {
    const now = clock();
    const dt = Math.min(MAX_FRAME_DT_MS, Math.max(0, now - lastFrameAt));
    lastFrameAt = now;
    session.getRunner().tick(dt, inputSource);
    dispatch();
  };

  const answer = (outcome: QuizOutcome) => {
    quiz = null;
    session.getGame().answerQuiz(outcome);
    dispatch();
  };

  return {
    start: () => {
      if (timer) return;
      lastFrameAt = clock();
      session.getRunner().resetTiming();
      timer = setInterval(tick, FRAME_MS);
      sessions.start();
    },
    stop: () => {
      sessions.stop();
      if (!timer) return;
      clearInterval(timer);
      timer = null;
    },
    tick,
    setInputSource: (source) => {
      inputSource = source;
    },
    onEvent: (listener) => {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    restore: async () => {
      const restored = await sessions.tryRestore();
      if (restored) {
        const game = session.getGame();
        if (suspended) game.addPauseReason('lifecycle');
        else game.removePauseReason('restore');
        session.getRunner().resetTiming();
        lastFrameAt = clock();
      }
      dispatch();
      return restored;
    },
    suspend: () => {
      suspended = true;
      session.getGame().addPauseReason('lifecycle');
      dispatch();
      track(sessions.save('suspend'), 'Session save');
    },
    resume: () => {
      suspended = false;
      session.getGame().removePauseReason('lifecycle');
      session.getRunner().resetTiming();
      lastFrameAt = clock();
      dispatch();
    },
    currentQuiz: () => quiz,
    answerQuiz: (choice) => {
      if (!quiz) return null;
      const outcome = quizzes.outcomeFor(quiz, choice);
      answer(outcome);
      return outcome;
    },
    skipQuiz: () => {
      if (session.getGame().mode !== 'quiz') return;
      answer('skipped');
    },
    settled: async () => {
      while (background.size > 0) {
        await Promise.all([...background]);
      }
    },
  };
}
