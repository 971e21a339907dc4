import type { Game } from '../core/game';
import {
  createSnapshot,
  decodeSnapshot,
  encodeSnapshot,
  restoreRunState,
} from '../core/session';
import type { SessionSettings } from '../core/settings';
import type { SessionStorage } from './sessionStorage';

export type SessionService = {
  markDirty: () => void;
  isDirty: () => boolean;
  /** Loads and applies a stored run; only the first call does anything. */
  tryRestore: () => Promise<boolean>;
  save: (reason: string) => Promise<boolean>;
  maybeAutosave: (reason: string) => Promise<boolean>;
  clear: () => Promise<void>;
  start: () => void;
  stop: () => void;
};

type SessionServiceOptions = {
  storage: SessionStorage;
  getGame: () => Game;
  getIdentity: () => string;
  getSettings: () => SessionSettings;
  now?: () => number;
};

export function createSessionService(
  options: SessionServiceOptions,
): SessionService {
  const { storage, getGame, getIdentity, getSettings } = options;
  const now = options.now ?? Date.now;

  let dirty = false;
  let lastDirtyAt = -Infinity;
  let lastSavedAt = -Infinity;
  let restoreAttempted = false;
  let timer: ReturnType<typeof setInterval> | null = null;
  let gate: Promise<void> = Promise.resolve();

  // one storage operation at a time, in call order
  const exclusive = <T>(fn: () => Promise<T>): Promise<T> => {
    const run = gate.then(fn);
    gate = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };

  const identity = () => getIdentity().trim();

  const discard = async (why: string): Promise<void> => {
    console.info(`[Session] Discarding stored session (${why}).`);
    try {
      await storage.clear();
    } catch (err) {
      console.warn('[Session] Could not discard stored session.', err);
    }
  };

  const writeSnapshot = async (reason: string): Promise<boolean> => {
    const game = getGame();
    if (game.mode === 'gameOver') {
      await storage.clear();
      dirty = false;
      return false;
    }
    if (game.isResolving || !identity()) return false;

    const savedAt = now();
    const snapshot = createSnapshot(game.state, {
      identity: identity(),
      savedAt,
    });
    try {
      await storage.write(encodeSnapshot(snapshot));
    } catch (err) {
      console.warn(`[Session] Save failed (${reason}).`, err);
      return false;
    }
    lastSavedAt = savedAt;
    dirty = false;
    console.info(`[Session] Saved (${reason}).`);
    return true;
  };

  const save = (reason: string) => exclusive(() => writeSnapshot(reason));

  const isEligible = (): boolean => {
    const game = getGame();
    if (!dirty || !identity()) return false;
    if (game.isResolving || game.mode === 'quiz' || game.mode === 'gameOver') {
      return false;
    }
    const { debounceMs, minSaveIntervalMs } = getSettings();
    const t = now();
    if (t - lastDirtyAt < debounceMs) return false;
    return t - lastSavedAt >= minSaveIntervalMs;
  };

  const maybeAutosave = async (reason: string): Promise<boolean> => {
    if (!isEligible()) return false;
    return exclusive(async () => {
      // state may have moved on while waiting for the gate
      if (!isEligible()) return false;
      return writeSnapshot(reason);
    });
  };

  const restore = async (): Promise<boolean> => {
    let bytes: Uint8Array | null;
    try {
      bytes = await storage.read();
    } catch (err) {
      console.warn('[Session] Could not read stored session.', err);
      return false;
    }
    if (!bytes) return false;

    const snapshot = decodeSnapshot(bytes);
    if (!snapshot) {
      await discard('corrupt');
      return false;
    }
    const result = restoreRunState(snapshot, {
      identity: identity(),
      now: now(),
      freshnessMs: getSettings().freshnessMs,
    });
    if (!result.ok) {
      await discard(result.reason);
      return false;
    }
    getGame().loadState(result.state);
    dirty = false;
    console.info(`[Session] Restored run saved at ${snapshot.savedAt}.`);
    return true;
  };

  return {
    markDirty: () => {
      dirty = true;
      lastDirtyAt = now();
    },
    isDirty: () => dirty,
    tryRestore: () => {
      if (restoreAttempted) return Promise.resolve(false);
      restoreAttempted = true;
      return exclusive(restore);
    },
    save,
    maybeAutosave,
    clear: () => exclusive(() => storage.clear()),
    start: () => {
      if (timer) return;
      timer = setInterval(() => {
        maybeAutosave('autosave').catch((err: unknown) => {
          console.warn('[Session] Autosave failed.', err);
        });
      }, getSettings().autosaveMs);
    },
    stop: () => {
      if (!timer) return;
      clearInterval(timer);
      timer = null;
    },
  };
}
