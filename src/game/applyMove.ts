import type { PlayerId, Position } from "../types.ts";
import type { Board } from "./board.ts";
import type { Move } from "./moveTypes.ts";
import type { TurnState } from "./state.ts";
import { cloneBoard, countOwned, getCell, setCell } from "./board.ts";
import { neutralCell, ownedCell } from "./cell.ts";
import { inBounds, posKey } from "./coords.ts";
import { cloneTurnState, findPlayer } from "./state.ts";

export const MAX_BLOCKS = 2;

/** New board with the target claimed by `playerId`; the receiver is untouched. */
export function applyMoveToBoard(board: Board, move: Move, playerId: PlayerId): Board {
  const next = cloneBoard(board);
  if (!inBounds(move.to, next.size)) return next;
  setCell(next, move.to, ownedCell(playerId));
  return next;
}

/**
 * Next alive player after the current one in roster order. Keeps the current
 * player when nobody is alive.
 */
export function nextPlayerId(state: TurnState): PlayerId {
  const n = state.players.length;
  if (n === 0) return state.currentPlayer;
  const idx = state.players.findIndex((p) => p.id === state.currentPlayer);
  for (let step = 1; step <= n; step++) {
    const candidate = state.players[(idx + step + n) % n];
    if (candidate?.alive) return candidate.id;
  }
  return state.currentPlayer;
}

/** Mutates a state the caller already owns. */
function endTurnInPlace(state: TurnState): void {
  state.currentPlayer = nextPlayerId(state);
  state.movesLeft = state.actionsPerTurn;
}

/** Passes the turn without acting (used for players that cannot move). */
export function skipTurn(state: TurnState): TurnState {
  const next = cloneTurnState(state);
  endTurnInPlace(next);
  return next;
}

export function applyMove(state: TurnState, move: Move): TurnState {
  const next = cloneTurnState(state);
  const mover = next.currentPlayer;
  const previousOwner = getCell(next.board, move.to).owner;

  if (inBounds(move.to, next.board.size)) setCell(next.board, move.to, ownedCell(mover));

  if (move.kind === "attack" && typeof previousOwner === "number" && previousOwner !== mover) {
    const victim = findPlayer(next, previousOwner);
    if (victim) victim.alive = countOwned(next.board, victim.id) > 0;
  }

  next.movesLeft -= 1;
  if (next.movesLeft <= 0) endTurnInPlace(next);
  return next;
}

/**
 * Turns up to two of the acting player's own cells into permanent neutral
 * blocks. Uses up the one-time allowance and ends the turn. A player whose
 * allowance is already spent gets an unchanged copy back.
 */
export function applyBlocks(state: TurnState, positions: readonly Position[]): TurnState {
  const next = cloneTurnState(state);
  const player = findPlayer(next, next.actingPlayer);
  if (!player || player.usedNeutrals) return next;

  const seen = new Set<string>();
  for (const p of positions) {
    if (seen.size >= MAX_BLOCKS) break;
    const key = posKey(p);
    if (seen.has(key)) continue;
    if (getCell(next.board, p).owner !== player.id) continue;
    seen.add(key);
    setCell(next.board, p, neutralCell());
  }

  player.usedNeutrals = true;
  player.alive = countOwned(next.board, player.id) > 0;
  endTurnInPlace(next);
  return next;
}
