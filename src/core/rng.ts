export class XorShift32 {
  private s: number;

  constructor(seed: number) {
    // avoid zero state
    this.s = seed | 0 || 0x12345678;
  }

  nextU32(): number {
    // xorshift32
    let x = this.s | 0;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.s = x | 0;
    return this.s >>> 0;
  }

  nextInt(maxExclusive: number): number {
    return this.nextU32() % maxExclusive;
  }

  clone(): XorShift32 {
    const copy = new XorShift32(1);
    copy.s = this.s;
    return copy;
  }
}

export interface RandomSource {
  weightedChoice<T>(items: readonly T[], weights: readonly number[]): T;
  choice<T>(items: readonly T[]): T;
  rangeInt(minInclusive: number, maxExclusive: number): number;
}

export class SeededRandom implements RandomSource {
  private rng: XorShift32;

  constructor(seed: number) {
    this.rng = new XorShift32(seed);
  }

  reset(seed: number): void {
    this.rng = new XorShift32(seed);
  }

  rangeInt(minInclusive: number, maxExclusive: number): number {
    const span = maxExclusive - minInclusive;
    if (span <= 0) {
      throw new Error(`Empty range [${minInclusive}, ${maxExclusive})`);
    }
    return minInclusive + this.rng.nextInt(span);
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error('Cannot choose from an empty list');
    return items[this.rng.nextInt(items.length)];
  }

  weightedChoice<T>(items: readonly T[], weights: readonly number[]): T {
    if (items.length !== weights.length) {
      throw new Error('items and weights length mismatch');
    }
    if (items.length === 0) throw new Error('Cannot choose from an empty list');
    const total = weights.reduce((sum, w) => sum + w, 0);
    const pick = this.rangeInt(0, total);
    let acc = 0;
    for (let i = 0; i < items.length; i++) {
      acc += weights[i];
      if (pick < acc) return items[i];
    }
    return items[items.length - 1];
  }
}

export function shuffleInPlace<T>(arr: T[], rng: RandomSource): void {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rng.rangeInt(0, i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}
