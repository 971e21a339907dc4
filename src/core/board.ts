import { COLS, ROWS } from './constants';
import type { Board, Cell, Vec2 } from './types';

export function makeBoard(cols = COLS, rows = ROWS): Board {
  return Array.from({ length: rows }, () => Array<Cell>(cols).fill(null));
}

export function boardCols(board: Board): number {
  return board[0]?.length ?? 0;
}

export function boardRows(board: Board): number {
  return board.length;
}

export function isInside(board: Board, x: number, y: number): boolean {
  return x >= 0 && x < boardCols(board) && y >= 0 && y < boardRows(board);
}

export function isOccupied(board: Board, x: number, y: number): boolean {
  return board[y][x] != null;
}

/** True when any cell is off the board or lands on an occupied cell. */
export function collidesAt(board: Board, cells: readonly Vec2[]): boolean {
  for (const [x, y] of cells) {
    if (!isInside(board, x, y)) return true;
    if (isOccupied(board, x, y)) return true;
  }
  return false;
}

export function clearBoard(board: Board): void {
  for (const row of board) row.fill(null);
}

/**
 * Compacts every column downward, keeping the letters' relative order and
 * leaving the vacated cells empty at the top.
 */
export function collapseColumns(board: Board): void {
  const rows = boardRows(board);
  const cols = boardCols(board);
  for (let x = 0; x < cols; x++) {
    const stack: Cell[] = [];
    for (let y = 0; y < rows; y++) {
      const c = board[y][x];
      if (c != null) stack.push(c);
    }
    for (let y = rows - 1; y >= 0; y--) {
      board[y][x] = stack.pop() ?? null;
    }
  }
}

/** Moves every row up by one, dropping the top row and emptying the bottom. */
export function shiftUp(board: Board): void {
  const cols = boardCols(board);
  board.shift();
  board.push(Array<Cell>(cols).fill(null));
}

export function cloneBoard(board: Board): Board {
  return board.map((row) => row.slice());
}
