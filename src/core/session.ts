import {
  COLS,
  EMPTY_CELL,
  SPAWN_X,
  SPAWN_Y,
  RESTORE_MIN_GRAVITY_MS,
  ROWS,
  SESSION_FRESHNESS_MS,
  SESSION_PROTOCOL_VERSION,
} from './constants';
import { collidesAt, makeBoard } from './board';
import { createPiece, minCorner, move } from './piece';
import { createRunState } from './runState';
import type { Board, Piece, RunState, Vec2 } from './types';

export interface PieceSnapshot {
  minX: number;
  minY: number;
  /** Cells relative to (minX, minY), in the piece's own order. */
  offsets: Array<[number, number]>;
  letters: string[];
}

export interface SessionSnapshot {
  version: number;
  savedAt: string;
  identity: string;
  score: number;
  level: number;
  gravityIntervalMs: number;
  wordsFoundSinceLevelUp: number;
  holdUsed: boolean;
  /** One string per row, `EMPTY_CELL` for empty cells. */
  boardRows: string[];
  foundWords: string[];
  removedWords: string[];
  current: PieceSnapshot | null;
  next: PieceSnapshot | null;
  hold: PieceSnapshot | null;
}

export type RestoreFailureReason =
  | 'corrupt'
  | 'version'
  | 'identity'
  | 'stale'
  | 'dimensions'
  | 'missing-piece'
  | 'collision';

export type RestoreResult =
  | { ok: true; state: RunState }
  | { ok: false; reason: RestoreFailureReason };

export interface RestoreOptions {
  identity: string;
  now: number;
  freshnessMs?: number;
  cols?: number;
  rows?: number;
}

export function snapshotPiece(piece: Piece | null): PieceSnapshot | null {
  if (!piece) return null;
  const [minX, minY] = minCorner(piece.cells);
  return {
    minX,
    minY,
    offsets: piece.cells.map(([x, y]) => [x - minX, y - minY]),
    letters: piece.letters.slice(),
  };
}

function encodeBoard(board: Board): string[] {
  return board.map((row) => row.map((c) => c ?? EMPTY_CELL).join(''));
}

export function createSnapshot(
  state: RunState,
  meta: { identity: string; savedAt: number },
): SessionSnapshot {
  return {
    version: SESSION_PROTOCOL_VERSION,
    savedAt: new Date(meta.savedAt).toISOString(),
    identity: meta.identity.trim(),
    score: state.score,
    level: state.level,
    gravityIntervalMs: state.gravityIntervalMs,
    wordsFoundSinceLevelUp: state.wordsFoundSinceLevelUp,
    holdUsed: state.holdUsed,
    boardRows: encodeBoard(state.board),
    foundWords: [...state.foundWords],
    removedWords: state.removedWords.slice(),
    current: snapshotPiece(state.active),
    next: snapshotPiece(state.next),
    hold: snapshotPiece(state.hold),
  };
}

export function encodeSnapshot(snapshot: SessionSnapshot): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(snapshot));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function int(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isInteger(v) ? v : undefined;
}

function strings(v: unknown): string[] | undefined {
  if (!Array.isArray(v)) return undefined;
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== 'string') return undefined;
    out.push(item);
  }
  return out;
}

function decodeOffsets(v: unknown): Array<[number, number]> | undefined {
  if (!Array.isArray(v)) return undefined;
  const out: Array<[number, number]> = [];
  for (const item of v) {
    if (!Array.isArray(item) || item.length !== 2) return undefined;
    const x = int(item[0]);
    const y = int(item[1]);
    // offsets are relative to the min corner
    if (x === undefined || y === undefined || x < 0 || y < 0) return undefined;
    out.push([x, y]);
  }
  return out;
}

/** `undefined` when malformed; `null` when the slot is legitimately empty. */
function decodePiece(v: unknown): PieceSnapshot | null | undefined {
  if (v === null || v === undefined) return null;
  if (!isRecord(v)) return undefined;
  const minX = int(v.minX);
  const minY = int(v.minY);
  const offsets = decodeOffsets(v.offsets);
  const letters = strings(v.letters);
  if (
    minX === undefined ||
    minY === undefined ||
    !offsets ||
    !letters ||
    offsets.length === 0 ||
    offsets.length !== letters.length ||
    letters.some((l) => l.length !== 1 || l === EMPTY_CELL)
  ) {
    return undefined;
  }
  return { minX, minY, offsets, letters };
}

/** Parses stored bytes; anything unreadable or mistyped yields `null`. */
export function decodeSnapshot(bytes: Uint8Array): SessionSnapshot | null {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(bytes));
  } catch {
    return null;
  }
  if (!isRecord(raw)) return null;

  const version = int(raw.version);
  const score = int(raw.score);
  const level = int(raw.level);
  const gravityIntervalMs = int(raw.gravityIntervalMs);
  const wordsFoundSinceLevelUp = int(raw.wordsFoundSinceLevelUp);
  const boardRows = strings(raw.boardRows);
  const foundWords = strings(raw.foundWords ?? []);
  const removedWords = strings(raw.removedWords ?? []);
  const current = decodePiece(raw.current);
  const next = decodePiece(raw.next);
  const hold = decodePiece(raw.hold);

  if (
    version === undefined ||
    typeof raw.savedAt !== 'string' ||
    typeof raw.identity !== 'string' ||
    score === undefined ||
    level === undefined ||
    gravityIntervalMs === undefined ||
    wordsFoundSinceLevelUp === undefined ||
    typeof raw.holdUsed !== 'boolean' ||
    !boardRows ||
    !foundWords ||
    !removedWords ||
    current === undefined ||
    next === undefined ||
    hold === undefined
  ) {
    return null;
  }

  return {
    version,
    savedAt: raw.savedAt,
    identity: raw.identity,
    score,
    level,
    gravityIntervalMs,
    wordsFoundSinceLevelUp,
    holdUsed: raw.holdUsed,
    boardRows,
    foundWords,
    removedWords,
    current,
    next,
    hold,
  };
}

function sameIdentity(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function decodeBoard(rows: readonly string[], cols: number): Board {
  const board = makeBoard(cols, rows.length);
  rows.forEach((row, y) => {
    for (let x = 0; x < cols; x++) {
      const c = row[x];
      board[y][x] = c === EMPTY_CELL ? null : c;
    }
  });
  return board;
}

function fitsAtSpawn(snap: PieceSnapshot, cols: number, rows: number): boolean {
  return snap.offsets.every(([x, y]) => {
    const sx = SPAWN_X + x;
    const sy = SPAWN_Y + y;
    return x >= 0 && y >= 0 && sx < cols && sy < rows;
  });
}

function stepMove(board: Board, piece: Piece, dx: number, dy: number): boolean {
  const sx = Math.sign(dx);
  for (let i = 0; i < Math.abs(dx); i++) {
    if (!move(board, piece, sx, 0)) return false;
  }
  const sy = Math.sign(dy);
  for (let i = 0; i < Math.abs(dy); i++) {
    if (!move(board, piece, 0, sy)) return false;
  }
  return true;
}

/**
 * Rebuilds a piece at spawn and walks it to its saved corner one legal step
 * at a time, horizontally first. A blocked walk leaves the piece where it
 * got to.
 */
export function restorePiece(
  snap: PieceSnapshot | null,
  board: Board,
): Piece | null {
  if (!snap) return null;
  const piece = createPiece(
    snap.offsets.map(([x, y]): Vec2 => [x, y]),
    snap.letters,
  );
  const [curX, curY] = minCorner(piece.cells);
  if (stepMove(board, piece, snap.minX - curX, 0)) {
    stepMove(board, piece, 0, snap.minY - curY);
  }
  return piece;
}

export function restoreRunState(
  snapshot: SessionSnapshot,
  options: RestoreOptions,
): RestoreResult {
  const cols = options.cols ?? COLS;
  const rows = options.rows ?? ROWS;
  const freshnessMs = options.freshnessMs ?? SESSION_FRESHNESS_MS;

  if (snapshot.version !== SESSION_PROTOCOL_VERSION) {
    return { ok: false, reason: 'version' };
  }
  if (!options.identity.trim() || !sameIdentity(snapshot.identity, options.identity)) {
    return { ok: false, reason: 'identity' };
  }
  const savedAt = Date.parse(snapshot.savedAt);
  if (Number.isNaN(savedAt)) return { ok: false, reason: 'corrupt' };
  const age = options.now - savedAt;
  if (age < 0 || age > freshnessMs) return { ok: false, reason: 'stale' };

  if (
    snapshot.boardRows.length !== rows ||
    snapshot.boardRows.some((r) => r.length !== cols)
  ) {
    return { ok: false, reason: 'dimensions' };
  }

  if (snapshot.score < 0 || snapshot.wordsFoundSinceLevelUp < 0) {
    return { ok: false, reason: 'corrupt' };
  }
  const pieces = [snapshot.current, snapshot.next, snapshot.hold];
  if (pieces.some((p) => p !== null && !fitsAtSpawn(p, cols, rows))) {
    return { ok: false, reason: 'corrupt' };
  }

  const board = decodeBoard(snapshot.boardRows, cols);
  const active = restorePiece(snapshot.current, board);
  const next = restorePiece(snapshot.next, board);
  if (!active || !next) return { ok: false, reason: 'missing-piece' };
  if (collidesAt(board, active.cells)) return { ok: false, reason: 'collision' };

  const state = createRunState({
    board,
    active,
    next,
    hold: restorePiece(snapshot.hold, board),
    level: Math.max(1, snapshot.level),
    gravityIntervalMs: Math.max(RESTORE_MIN_GRAVITY_MS, snapshot.gravityIntervalMs),
  });
  state.score = snapshot.score;
  state.wordsFoundSinceLevelUp = snapshot.wordsFoundSinceLevelUp;
  state.holdUsed = snapshot.holdUsed;
  for (const w of snapshot.foundWords) state.foundWords.add(w);
  state.removedWords.push(...snapshot.removedWords);
  state.mode = 'paused';
  return { ok: true, state };
}
