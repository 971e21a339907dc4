export * from './core/types';
export * from './core/constants';
export * from './core/board';
export * from './core/piece';
export * from './core/rng';
export type { PieceGenerator } from './core/generator';
export * from './core/randomGenerator';
export * from './core/combo';
export * from './core/dictionary';
export * from './core/wordFilter';
export * from './core/resolver';
export * from './core/runState';
export * from './core/game';
export * from './core/session';
export * from './core/runner';
export * from './core/modes';
export * from './core/settings';
export * from './core/settingsStore';
export * from './core/gameSession';
export * from './app/sessionStorage';
export * from './app/sessionService';
export * from './app/settingsStorage';
export * from './app/quizService';
export * from './app/wordListService';
export * from './app/resultBus';
export * from './app/runtime';
