import {
  DEFAULT_AUTOSAVE_MS,
  DEFAULT_MIN_SAVE_INTERVAL_MS,
  DEFAULT_SAVE_DEBOUNCE_MS,
  DEFAULT_SOFT_DROP_FACTOR,
  MAX_STARTING_LEVEL,
  MIN_STARTING_LEVEL,
  SESSION_FRESHNESS_MS,
  SETTINGS_STORAGE_KEY,
} from './constants';
import { DEFAULT_COMBO_CONFIG, type ComboConfig } from './combo';
import { isDifficultyId, type DifficultyId } from './modes';

export interface GameSettings {
  startingLevel: number;
  difficulty: DifficultyId;
  softDropFactor: number;
}

export interface SessionSettings {
  autosaveMs: number;
  debounceMs: number;
  minSaveIntervalMs: number;
  freshnessMs: number;
}

export interface Settings {
  /** Player name; saving and restoring need a non-empty one. */
  identity: string;
  game: GameSettings;
  combo: ComboConfig;
  session: SessionSettings;
}

type Loose<T> = { [K in keyof T]?: unknown };

/** Partial settings; mistyped fields fall back to the base value. */
export type SettingsPatch = {
  identity?: unknown;
  game?: Loose<GameSettings>;
  combo?: Loose<ComboConfig>;
  session?: Loose<SessionSettings>;
};

/** localStorage-shaped key/value persistence. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export const DEFAULT_SETTINGS: Settings = {
  identity: '',
  game: {
    startingLevel: MIN_STARTING_LEVEL,
    difficulty: 'standard',
    softDropFactor: DEFAULT_SOFT_DROP_FACTOR,
  },
  combo: { ...DEFAULT_COMBO_CONFIG },
  session: {
    autosaveMs: DEFAULT_AUTOSAVE_MS,
    debounceMs: DEFAULT_SAVE_DEBOUNCE_MS,
    minSaveIntervalMs: DEFAULT_MIN_SAVE_INTERVAL_MS,
    freshnessMs: SESSION_FRESHNESS_MS,
  },
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function num(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function clampLevel(level: number): number {
  return Math.min(
    MAX_STARTING_LEVEL,
    Math.max(MIN_STARTING_LEVEL, Math.trunc(level)),
  );
}

function mergeGame(
  base: GameSettings,
  patch?: Loose<GameSettings>,
): GameSettings {
  const level = num(patch?.startingLevel);
  const difficulty = patch?.difficulty;
  return {
    startingLevel: level === undefined ? base.startingLevel : clampLevel(level),
    difficulty: isDifficultyId(difficulty) ? difficulty : base.difficulty,
    softDropFactor: num(patch?.softDropFactor) ?? base.softDropFactor,
  };
}

function mergeCombo(
  base: ComboConfig,
  patch?: Loose<ComboConfig>,
): ComboConfig {
  return {
    decayMs: num(patch?.decayMs) ?? base.decayMs,
    growth: num(patch?.growth) ?? base.growth,
    startMult: num(patch?.startMult) ?? base.startMult,
    maxMult: num(patch?.maxMult) ?? base.maxMult,
  };
}

function mergeSession(
  base: SessionSettings,
  patch?: Loose<SessionSettings>,
): SessionSettings {
  return {
    autosaveMs: num(patch?.autosaveMs) ?? base.autosaveMs,
    debounceMs: num(patch?.debounceMs) ?? base.debounceMs,
    minSaveIntervalMs: num(patch?.minSaveIntervalMs) ?? base.minSaveIntervalMs,
    freshnessMs: num(patch?.freshnessMs) ?? base.freshnessMs,
  };
}

export function mergeSettings(base: Settings, patch: SettingsPatch): Settings {
  return {
    identity:
      typeof patch.identity === 'string' ? patch.identity.trim() : base.identity,
    game: mergeGame(base.game, patch.game),
    combo: mergeCombo(base.combo, patch.combo),
    session: mergeSession(base.session, patch.session),
  };
}

export function loadSettings(storage: KeyValueStorage): Settings {
  try {
    const raw = storage.getItem(SETTINGS_STORAGE_KEY);
    if (!raw) return DEFAULT_SETTINGS;
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) return DEFAULT_SETTINGS;
    return mergeSettings(DEFAULT_SETTINGS, {
      identity: parsed.identity,
      game: isRecord(parsed.game) ? parsed.game : undefined,
      combo: isRecord(parsed.combo) ? parsed.combo : undefined,
      session: isRecord(parsed.session) ? parsed.session : undefined,
    });
  } catch (err) {
    console.warn('[Settings] Stored settings unreadable, using defaults.', err);
    return DEFAULT_SETTINGS;
  }
}

export function saveSettings(storage: KeyValueStorage, settings: Settings): void {
  try {
    storage.setItem(SETTINGS_STORAGE_KEY, JSON.stringify(settings));
  } catch (err) {
    console.warn('[Settings] Failed to persist settings.', err);
  }
}

export function createMemoryStorage(
  initial: Record<string, string> = {},
): KeyValueStorage {
  const items = new Map(Object.entries(initial));
  return {
    getItem: (key) => items.get(key) ?? null,
    setItem: (key, value) => {
      items.set(key, value);
    },
    removeItem: (key) => {
      items.delete(key);
    },
  };
}
