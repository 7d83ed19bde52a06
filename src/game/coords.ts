import type { Position } from "../types.ts";

export function pos(row: number, col: number): Position {
  return { row, col };
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

export function posKey(p: Position): string {
  return `r${p.row}c${p.col}`;
}

export function parsePosKey(key: string): Position {
  const m = /^r(-?\d+)c(-?\d+)$/.exec(key);
  if (!m) throw new Error(`Invalid position key: ${key}`);
  return { row: Number(m[1]), col: Number(m[2]) };
}

export function inBounds(p: Position, size: number): boolean {
  return Number.isInteger(p.row) && Number.isInteger(p.col) && p.row >= 0 && p.row < size && p.col >= 0 && p.col < size;
}

/** Row-major offset; callers check `inBounds` first. */
export function toIndex(p: Position, size: number): number {
  return p.row * size + p.col;
}

export function fromIndex(index: number, size: number): Position {
  return { row: Math.floor(index / size), col: index % size };
}

export function isEdge(p: Position, size: number): boolean {
  return p.row === 0 || p.row === size - 1 || p.col === 0 || p.col === size - 1;
}

export function isCorner(p: Position, size: number): boolean {
  return (p.row === 0 || p.row === size - 1) && (p.col === 0 || p.col === size - 1);
}
