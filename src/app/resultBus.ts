import type { GameResult } from '../core/types';

/** Hands the last finished run to whoever shows the summary. */
export type ResultBus = {
  set: (result: GameResult) => void;
  take: () => GameResult | null;
};

export function createResultBus(): ResultBus {
  let last: GameResult | null = null;
  return {
    set: (result) => {
      last = result;
    },
    take: () => {
      const result = last;
      last = null;
      return result;
    },
  };
}
