import type { PlayerId, Position } from "../types.ts";
import type { Board } from "./board.ts";
import type { Move } from "./moveTypes.ts";
import { countOwned, emptyCells, getCell, isEmptyAt, neighbors, ownedCells } from "./board.ts";
import { isAttackableBy } from "./cell.ts";
import { posKey } from "./coords.ts";
import { reachableCells } from "./connectivity.ts";

export function generateLegalMoves(board: Board, playerId: PlayerId): Move[] {
  // Nothing placed yet: any empty cell is a first placement.
  if (countOwned(board, playerId) === 0) {
    return emptyCells(board).map((p): Move => ({ kind: "grow", to: p, from: p }));
  }

  const moves: Move[] = [];
  const seen = new Set<string>();

  for (const from of reachableCells(board, playerId)) {
    for (const to of neighbors(board, from)) {
      let kind: Move["kind"] | null = null;
      if (isEmptyAt(board, to)) kind = "grow";
      else if (isAttackableBy(getCell(board, to), playerId)) kind = "attack";
      if (!kind) continue;

      const key = `${kind}:${posKey(to)}`;
      if (seen.has(key)) continue;
      seen.add(key);
      moves.push({ kind, to, from });
    }
  }

  return moves;
}

export function hasLegalMove(board: Board, playerId: PlayerId): boolean {
  if (countOwned(board, playerId) === 0) return board.cells.some((c) => c.owner === null);
  for (const from of reachableCells(board, playerId)) {
    for (const to of neighbors(board, from)) {
      if (isEmptyAt(board, to) || isAttackableBy(getCell(board, to), playerId)) return true;
    }
  }
  return false;
}

/** Cells the player may turn into permanent blocks. */
export function legalBlockPositions(board: Board, playerId: PlayerId): Position[] {
  return ownedCells(board, playerId);
}
