import type { Piece } from './types';

export interface PieceGenerator {
  next(): Piece;
}
