import { createPiece } from './piece';
import type { RandomSource } from './rng';
import type { PieceGenerator } from './generator';
import { VOWELS, type Piece, type Vec2 } from './types';

export const SHAPES: readonly (readonly Vec2[])[] = [
  [
    [0, 0],
    [1, 0],
    [2, 0],
    [3, 0],
  ],
  [
    [0, 0],
    [1, 0],
    [0, 1],
    [1, 1],
  ],
  [
    [0, 0],
    [1, 0],
    [2, 0],
    [2, 1],
  ],
  [
    [0, 1],
    [1, 1],
    [2, 1],
    [2, 0],
  ],
  [
    [0, 0],
    [1, 0],
    [1, 1],
    [2, 1],
  ],
  [
    [0, 1],
    [1, 1],
    [1, 0],
    [2, 0],
  ],
];

// Vowels are drawn far more often so pieces tend to spell something.
export const LETTER_WEIGHTS: Readonly<Record<string, number>> = {
  A: 8,
  E: 8,
  I: 8,
  O: 8,
  U: 8,
  B: 2,
  C: 2,
  D: 3,
  F: 1,
  G: 2,
  H: 2,
  J: 1,
  K: 1,
  L: 3,
  M: 2,
  N: 4,
  P: 2,
  Q: 1,
  R: 4,
  S: 4,
  T: 4,
  V: 1,
  W: 2,
  X: 1,
  Y: 2,
  Z: 1,
};

const WEIGHTED_LETTERS = Object.keys(LETTER_WEIGHTS);
const WEIGHTS = WEIGHTED_LETTERS.map((l) => LETTER_WEIGHTS[l]);
const CONSONANTS = WEIGHTED_LETTERS.filter((l) => !VOWELS.includes(l));

export function isVowel(letter: string): boolean {
  return VOWELS.includes(letter);
}

/**
 * Random shape, weighted letters, and at least one consonant per piece.
 */
export class LetterPieceGenerator implements PieceGenerator {
  constructor(private rng: RandomSource) {}

  next(): Piece {
    const shape = this.rng.choice(SHAPES);
    const letters = shape.map(() =>
      this.rng.weightedChoice(WEIGHTED_LETTERS, WEIGHTS),
    );
    if (letters.every(isVowel)) {
      letters[this.rng.rangeInt(0, letters.length)] =
        this.rng.choice(CONSONANTS);
    }
    return createPiece(shape, letters);
  }
}
