import type { PlayerId, Position } from "../types.ts";
import type { Board } from "./board.ts";
import { cloneBoard } from "./board.ts";

export const DEFAULT_ACTIONS_PER_TURN = 3;

export interface Player {
  id: PlayerId;
  name: string;
  base: Position;
  alive: boolean;
  /** The one-time pair of blocks has been placed. */
  usedNeutrals: boolean;
}

export interface TurnState {
  board: Board;
  /** Rotation order. */
  players: Player[];
  currentPlayer: PlayerId;
  /** The player this bot controls. */
  actingPlayer: PlayerId;
  /** Actions the current player still has this turn. */
  movesLeft: number;
  actionsPerTurn: number;
}

export function createTurnState(args: {
  board: Board;
  players: Player[];
  currentPlayer: PlayerId;
  actingPlayer: PlayerId;
  movesLeft?: number;
  actionsPerTurn?: number;
}): TurnState {
  const actionsPerTurn = Math.max(1, Math.floor(args.actionsPerTurn ?? DEFAULT_ACTIONS_PER_TURN));
  const movesLeft = args.movesLeft ?? actionsPerTurn;
  return {
    board: args.board,
    players: args.players,
    currentPlayer: args.currentPlayer,
    actingPlayer: args.actingPlayer,
    movesLeft: Math.max(1, Math.floor(movesLeft)),
    actionsPerTurn,
  };
}

export function clonePlayer(p: Player): Player {
  return { ...p, base: { row: p.base.row, col: p.base.col } };
}

export function cloneTurnState(state: TurnState): TurnState {
  return {
    ...state,
    board: cloneBoard(state.board),
    players: state.players.map(clonePlayer),
  };
}

export function findPlayer(state: TurnState, id: PlayerId): Player | undefined {
  return state.players.find((p) => p.id === id);
}

export function actingPlayer(state: TurnState): Player | undefined {
  return findPlayer(state, state.actingPlayer);
}

export function isActingPlayersTurn(state: TurnState): boolean {
  return state.currentPlayer === state.actingPlayer;
}

export function alivePlayers(state: TurnState): Player[] {
  return state.players.filter((p) => p.alive);
}

/** Alive players other than the acting one. */
export function opponents(state: TurnState): Player[] {
  return state.players.filter((p) => p.alive && p.id !== state.actingPlayer);
}
