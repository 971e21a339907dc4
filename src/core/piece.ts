import { SPAWN_X, SPAWN_Y } from './constants';
import { collidesAt } from './board';
import type { Board, Letter, Piece, Vec2 } from './types';

/** Translations tried, in order, after a rotation. */
export const WALL_KICKS: readonly Vec2[] = [
  [0, 0],
  [1, 0],
  [-1, 0],
  [0, -1],
];

export function createPiece(
  offsets: readonly Vec2[],
  letters: readonly Letter[],
): Piece {
  if (offsets.length === 0 || offsets.length !== letters.length) {
    throw new Error(
      `Piece needs one letter per cell (${offsets.length} offsets, ${letters.length} letters)`,
    );
  }
  const piece: Piece = {
    offsets: offsets.map(([x, y]) => [x, y]),
    letters: letters.slice(),
    cells: [],
  };
  resetToSpawn(piece);
  return piece;
}

export function clonePiece(piece: Piece): Piece {
  return {
    offsets: piece.offsets.map(([x, y]) => [x, y]),
    letters: piece.letters.slice(),
    cells: piece.cells.map(([x, y]) => [x, y]),
  };
}

export function resetToSpawn(piece: Piece): void {
  piece.cells = piece.offsets.map(([x, y]) => [SPAWN_X + x, SPAWN_Y + y]);
}

export function translate(cells: readonly Vec2[], dx: number, dy: number): Vec2[] {
  return cells.map(([x, y]) => [x + dx, y + dy]);
}

export function canMove(board: Board, piece: Piece, dx = 0, dy = 0): boolean {
  return !collidesAt(board, translate(piece.cells, dx, dy));
}

export function move(board: Board, piece: Piece, dx = 0, dy = 0): boolean {
  if (!canMove(board, piece, dx, dy)) return false;
  piece.cells = translate(piece.cells, dx, dy);
  return true;
}

/** Quarter turn of every cell about the first cell. */
export function rotatedCells(piece: Piece): Vec2[] {
  const [px, py] = piece.cells[0];
  return piece.cells.map(([x, y]) => [px - (y - py), py + (x - px)]);
}

export function tryRotate(board: Board, piece: Piece): boolean {
  const rotated = rotatedCells(piece);
  for (const [kx, ky] of WALL_KICKS) {
    const candidate = translate(rotated, kx, ky);
    if (!collidesAt(board, candidate)) {
      piece.cells = candidate;
      return true;
    }
  }
  return false;
}

export function dropDistance(board: Board, piece: Piece): number {
  let d = 0;
  while (canMove(board, piece, 0, d + 1)) d++;
  return d;
}

/** Drops the piece until it rests and returns how many rows it fell. */
export function hardDrop(board: Board, piece: Piece): number {
  let dropped = 0;
  while (move(board, piece, 0, 1)) dropped++;
  return dropped;
}

export function lockPiece(board: Board, piece: Piece): void {
  if (collidesAt(board, piece.cells)) {
    throw new Error('Cannot lock a piece that overlaps the board edge or a letter');
  }
  piece.cells.forEach(([x, y], i) => {
    board[y][x] = piece.letters[i];
  });
}

export function minCorner(cells: readonly Vec2[]): Vec2 {
  let minX = Infinity;
  let minY = Infinity;
  for (const [x, y] of cells) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
  }
  return [minX, minY];
}
