import type { PlayerId, Position } from "../types.ts";
import type { Board } from "./board.ts";
import { neighbors } from "./board.ts";
import { inBounds, toIndex, fromIndex } from "./coords.ts";

/**
 * Where the connectivity search for a player starts: the base while the player
 * still owns it, otherwise the first owned cell in row-major order.
 * Null when the player owns nothing.
 */
export function connectivityRoot(board: Board, playerId: PlayerId): Position | null {
  const base = board.bases.get(playerId);
  if (base && inBounds(base, board.size) && board.cells[toIndex(base, board.size)]?.owner === playerId) {
    return base;
  }
  const i = board.cells.findIndex((c) => c.owner === playerId);
  return i >= 0 ? fromIndex(i, board.size) : null;
}

type Reach = {
  visited: Uint8Array;
  order: Position[];
};

function bfs(board: Board, playerId: PlayerId): Reach {
  const visited = new Uint8Array(board.size * board.size);
  const order: Position[] = [];
  const root = connectivityRoot(board, playerId);
  if (!root) return { visited, order };

  visited[toIndex(root, board.size)] = 1;
  const queue: Position[] = [root];
  for (let head = 0; head < queue.length; head++) {
    const cur = queue[head];
    order.push(cur);
    for (const n of neighbors(board, cur)) {
      const idx = toIndex(n, board.size);
      if (visited[idx]) continue;
      if (board.cells[idx]?.owner !== playerId) continue;
      visited[idx] = 1;
      queue.push(n);
    }
  }
  return { visited, order };
}

/** Flat row-major mask of the player's legal origins. */
export function reachableMask(board: Board, playerId: PlayerId): Uint8Array {
  return bfs(board, playerId).visited;
}

/** Legal origins in BFS order from the connectivity root. */
export function reachableCells(board: Board, playerId: PlayerId): Position[] {
  return bfs(board, playerId).order;
}

export function isLegalOrigin(board: Board, playerId: PlayerId, p: Position): boolean {
  if (!inBounds(p, board.size)) return false;
  const idx = toIndex(p, board.size);
  if (board.cells[idx]?.owner !== playerId) return false;
  return reachableMask(board, playerId)[idx] === 1;
}
