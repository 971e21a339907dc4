import { Game, type GameConfig } from './game';
import { getDifficulty } from './modes';
import { GameRunner, type GameRunnerOptions } from './runner';
import type { Settings } from './settings';

export type GameSession = {
  getGame: () => Game;
  getRunner: () => GameRunner;
  getSettings: () => Settings;
  setConfig: (settings: Settings) => void;
  restart: () => void;
};

type GameSessionOptions = Omit<
  GameConfig,
  'gravityMs' | 'startingLevel' | 'softDropFactor' | 'combo'
> & {
  runner?: Omit<GameRunnerOptions, 'onRestart'>;
  onRestart?: (game: Game) => void;
};

const DEFAULT_RUNNER_OPTIONS = {
  fixedStepMs: 1000 / 60,
  maxElapsedMs: 250,
  maxStepsPerTick: 10,
};

export function gameConfigFromSettings(
  settings: Settings,
): Pick<GameConfig, 'gravityMs' | 'startingLevel' | 'softDropFactor'> {
  return {
    gravityMs: getDifficulty(settings.game.difficulty).gravityMs,
    startingLevel: settings.game.startingLevel,
    softDropFactor: settings.game.softDropFactor,
  };
}

export function createGameSession(
  settings: Settings,
  options: GameSessionOptions,
): GameSession {
  const { runner: runnerOptions, onRestart, ...gameOptions } = options;
  let currentSettings = settings;

  const game = new Game({
    ...gameOptions,
    ...gameConfigFromSettings(settings),
    combo: settings.combo,
  });

  const restart = () => {
    game.restart();
    onRestart?.(game);
  };

  const runner = new GameRunner(game, {
    ...DEFAULT_RUNNER_OPTIONS,
    ...runnerOptions,
    onRestart: restart,
  });

  return {
    getGame: () => game,
    getRunner: () => runner,
    getSettings: () => currentSettings,
    setConfig: (next) => {
      currentSettings = next;
      game.setConfig(gameConfigFromSettings(next));
    },
    restart,
  };
}
