import type { CellState, PlayerId, Position } from "../types.ts";
import { emptyCell } from "./cell.ts";
import { inBounds, toIndex, fromIndex } from "./coords.ts";

/** "moore" = 8 neighbors (orthogonal + diagonal), "orthogonal" = 4. */
export type Adjacency = "moore" | "orthogonal";

export const DEFAULT_ADJACENCY: Adjacency = "moore";

export interface Board {
  size: number;
  /** Row-major, length size * size. */
  cells: CellState[];
  bases: Map<PlayerId, Position>;
  adjacency: Adjacency;
}

const ORTHOGONAL_DELTAS = [
  { dr: -1, dc: 0 },
  { dr: 1, dc: 0 },
  { dr: 0, dc: -1 },
  { dr: 0, dc: 1 },
] as const;

const DIAGONAL_DELTAS = [
  { dr: -1, dc: -1 },
  { dr: -1, dc: 1 },
  { dr: 1, dc: -1 },
  { dr: 1, dc: 1 },
] as const;

const MOORE_DELTAS = [...ORTHOGONAL_DELTAS, ...DIAGONAL_DELTAS];

export function createBoard(size: number, adjacency: Adjacency = DEFAULT_ADJACENCY): Board {
  const n = Math.max(0, Math.floor(size));
  const cells: CellState[] = [];
  for (let i = 0; i < n * n; i++) cells.push(emptyCell());
  return { size: n, cells, bases: new Map(), adjacency };
}

export function cloneBoard(board: Board): Board {
  return {
    size: board.size,
    cells: board.cells.map((c) => ({ owner: c.owner, flag: c.flag })),
    bases: new Map(Array.from(board.bases.entries(), ([id, p]) => [id, { row: p.row, col: p.col }])),
    adjacency: board.adjacency,
  };
}

export function getCell(board: Board, p: Position): CellState {
  if (!inBounds(p, board.size)) return emptyCell();
  return board.cells[toIndex(p, board.size)] ?? emptyCell();
}

/** Mutates; out-of-bounds writes are ignored. */
export function setCell(board: Board, p: Position, cell: CellState): void {
  if (!inBounds(p, board.size)) return;
  board.cells[toIndex(p, board.size)] = { owner: cell.owner, flag: cell.flag };
}

export function isEmptyAt(board: Board, p: Position): boolean {
  return inBounds(p, board.size) && getCell(board, p).owner === null;
}

export function neighbors(board: Board, p: Position): Position[] {
  if (!inBounds(p, board.size)) return [];
  const deltas = board.adjacency === "orthogonal" ? ORTHOGONAL_DELTAS : MOORE_DELTAS;
  const res: Position[] = [];
  for (const { dr, dc } of deltas) {
    const n = { row: p.row + dr, col: p.col + dc };
    if (inBounds(n, board.size)) res.push(n);
  }
  return res;
}

export function isAdjacent(board: Board, a: Position, b: Position): boolean {
  if (!inBounds(a, board.size) || !inBounds(b, board.size)) return false;
  const dr = Math.abs(a.row - b.row);
  const dc = Math.abs(a.col - b.col);
  if (dr === 0 && dc === 0) return false;
  if (board.adjacency === "orthogonal") return dr + dc === 1;
  return dr <= 1 && dc <= 1;
}

export function emptyNeighbors(board: Board, p: Position): Position[] {
  return neighbors(board, p).filter((n) => getCell(board, n).owner === null);
}

export function ownedCells(board: Board, playerId: PlayerId): Position[] {
  const res: Position[] = [];
  for (let i = 0; i < board.cells.length; i++) {
    if (board.cells[i]?.owner === playerId) res.push(fromIndex(i, board.size));
  }
  return res;
}

export function countOwned(board: Board, playerId: PlayerId): number {
  let n = 0;
  for (const c of board.cells) {
    if (c.owner === playerId) n++;
  }
  return n;
}

export function emptyCells(board: Board): Position[] {
  const res: Position[] = [];
  for (let i = 0; i < board.cells.length; i++) {
    if (board.cells[i]?.owner === null) res.push(fromIndex(i, board.size));
  }
  return res;
}
