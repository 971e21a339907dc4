import {
  DEFAULT_COMBO_DECAY_MS,
  DEFAULT_COMBO_GROWTH,
  DEFAULT_COMBO_MAX_MULT,
  DEFAULT_COMBO_START_MULT,
} from './constants';

export interface ComboConfig {
  decayMs: number;
  growth: number;
  startMult: number;
  maxMult: number;
}

export const DEFAULT_COMBO_CONFIG: ComboConfig = {
  decayMs: DEFAULT_COMBO_DECAY_MS,
  growth: DEFAULT_COMBO_GROWTH,
  startMult: DEFAULT_COMBO_START_MULT,
  maxMult: DEFAULT_COMBO_MAX_MULT,
};

/**
 * Multiplier that grows one step per clear and loses one step for every
 * full decay window without a clear.
 */
export class ComboTracker {
  private readonly cfg: ComboConfig;

  multiplier: number;
  step = 0;
  msSinceLastClear = 0;

  constructor(cfg: Partial<ComboConfig> = {}) {
    this.cfg = { ...DEFAULT_COMBO_CONFIG, ...cfg };
    this.multiplier = this.cfg.startMult;
  }

  get config(): Readonly<ComboConfig> {
    return this.cfg;
  }

  get isActive(): boolean {
    return this.step > 0;
  }

  reset(): void {
    this.multiplier = this.cfg.startMult;
    this.step = 0;
    this.msSinceLastClear = 0;
  }

  onClear(): void {
    const { startMult, growth, maxMult } = this.cfg;
    this.step += 1;
    this.multiplier = Math.min(startMult + growth * (this.step - 1), maxMult);
    this.msSinceLastClear = 0;
  }

  update(dtMs: number): void {
    const { startMult, growth, maxMult, decayMs } = this.cfg;
    this.msSinceLastClear += dtMs;
    if (this.msSinceLastClear > decayMs && this.step > 0) {
      this.step -= 1;
      // capped at maxMult: steps keep counting past the cap
      this.multiplier = Math.min(
        Math.max(startMult + growth * Math.max(0, this.step - 1), startMult),
        maxMult,
      );
      this.msSinceLastClear = 0;
    }
  }

  effectiveMultiplier(baseMult = 1): number {
    return baseMult * this.multiplier;
  }
}
