import type { PlayerId, Position } from "../types.ts";
import type { Adjacency, Board } from "../game/board.ts";
import type { Player, TurnState } from "../game/state.ts";
import type { SerializedTurnState } from "../ai/aiTypes.ts";
import type { PlayerInfo } from "./protocol.ts";
import { countOwned, createBoard, DEFAULT_ADJACENCY, getCell } from "../game/board.ts";
import { decodeCell, encodeCell, isEmptyCell } from "../game/cell.ts";
import { createTurnState, DEFAULT_ACTIONS_PER_TURN } from "../game/state.ts";

/** What the client knows about the running game. */
export type GameView = {
  gameId: string | null;
  /** Packed cell values, row by row. */
  board: number[][];
  players: PlayerInfo[];
  currentPlayer: PlayerId;
  yourPlayerId: PlayerId;
  movesLeft: number;
};

export function cloneGameView(view: GameView): GameView {
  return {
    ...view,
    board: view.board.map((row) => row.slice()),
    players: view.players.map((p) => ({ ...p, position: { ...p.position } })),
  };
}

/**
 * Boards are square: a ragged or rectangular grid is cut to its smallest
 * dimension.
 */
export function boardFromRows(rows: readonly (readonly number[])[], adjacency: Adjacency = DEFAULT_ADJACENCY): Board {
  const size = rows.reduce((n, row) => Math.min(n, row.length), rows.length);
  const board = createBoard(size, adjacency);
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const cell = decodeCell(rows[row]?.[col] ?? 0);
      board.cells[row * size + col] = cell;
      if (cell.flag === "base" && typeof cell.owner === "number" && !board.bases.has(cell.owner)) {
        board.bases.set(cell.owner, { row, col });
      }
    }
  }
  return board;
}

export function boardToRows(board: Board): number[][] {
  const rows: number[][] = [];
  for (let row = 0; row < board.size; row++) {
    rows.push(board.cells.slice(row * board.size, (row + 1) * board.size).map(encodeCell));
  }
  return rows;
}

/**
 * Engine snapshot of the client's view. Player positions are the bases. A
 * player with no cells counts as alive while their base square is still
 * empty, that is, before their first placement.
 */
export function toTurnState(
  view: GameView,
  opts: { adjacency?: Adjacency; actionsPerTurn?: number; usedNeutrals?: ReadonlySet<PlayerId> } = {}
): TurnState {
  const board = boardFromRows(view.board, opts.adjacency);
  const players: Player[] = view.players.map((info) => {
    const base = { row: info.position.row, col: info.position.col };
    board.bases.set(info.id, base);
    return {
      id: info.id,
      name: info.name,
      base: { ...base },
      alive: countOwned(board, info.id) > 0 || isEmptyCell(getCell(board, base)),
      usedNeutrals: opts.usedNeutrals?.has(info.id) ?? false,
    };
  });

  return createTurnState({
    board,
    players,
    currentPlayer: view.currentPlayer,
    actingPlayer: view.yourPlayerId,
    movesLeft: view.movesLeft > 0 ? view.movesLeft : undefined,
    actionsPerTurn: opts.actionsPerTurn ?? DEFAULT_ACTIONS_PER_TURN,
  });
}

export function serializeTurnState(state: TurnState): SerializedTurnState {
  return {
    size: state.board.size,
    adjacency: state.board.adjacency,
    cells: state.board.cells.map(encodeCell),
    bases: Array.from(state.board.bases.entries(), ([id, p]): [PlayerId, Position] => [id, { row: p.row, col: p.col }]),
    players: state.players.map((p) => ({ ...p, base: { ...p.base } })),
    currentPlayer: state.currentPlayer,
    actingPlayer: state.actingPlayer,
    movesLeft: state.movesLeft,
    actionsPerTurn: state.actionsPerTurn,
  };
}

export function deserializeTurnState(wire: SerializedTurnState): TurnState {
  const board = createBoard(wire.size, wire.adjacency);
  wire.cells.forEach((v, i) => {
    if (i < board.cells.length) board.cells[i] = decodeCell(v);
  });
  for (const [id, p] of wire.bases) board.bases.set(id, { row: p.row, col: p.col });
  return createTurnState({
    board,
    players: wire.players.map((p) => ({ ...p, base: { ...p.base } })),
    currentPlayer: wire.currentPlayer,
    actingPlayer: wire.actingPlayer,
    movesLeft: wire.movesLeft,
    actionsPerTurn: wire.actionsPerTurn,
  });
}
