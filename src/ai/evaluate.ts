import type { PlayerId, Position } from "../types.ts";
import type { Board } from "../game/board.ts";
import type { Move } from "../game/moveTypes.ts";
import type { TurnState } from "../game/state.ts";
import type { HeuristicWeights } from "./aiTypes.ts";
import { emptyNeighbors, isAdjacent, neighbors } from "../game/board.ts";
import { isCorner, isEdge, toIndex, inBounds } from "../game/coords.ts";
import { reachableMask } from "../game/connectivity.ts";
import { actingPlayer, opponents } from "../game/state.ts";

export type FactorName = keyof HeuristicWeights;

/** Unweighted contribution of each factor. */
export type FactorBreakdown = Record<FactorName, number>;

export const MOVE_POINTS = {
  territory: 10,
  corner: 8,
  edge: 5,
  threat: 15,
  connectivity: 3,
  expansionPerEmpty: 4,
  defensive: 2,
} as const;

export const BLOCK_POINTS = {
  pathBlock: 20,
  chokepoint: 15,
  corner: 10,
  perEmptyNeighbor: 3,
  nearOwnBase: -10,
} as const;

export type ScoredMove = {
  move: Move;
  factors: FactorBreakdown;
  score: number;
};

/** Per-decision facts shared by every move evaluated against one snapshot. */
export type EvalContext = {
  board: Board;
  playerId: PlayerId;
  reach: Uint8Array;
  ownBase: Position | null;
  opponentBases: Position[];
};

export function createEvalContext(state: TurnState): EvalContext {
  const playerId = state.actingPlayer;
  const me = actingPlayer(state);
  return {
    board: state.board,
    playerId,
    reach: reachableMask(state.board, playerId),
    ownBase: state.board.bases.get(playerId) ?? me?.base ?? null,
    opponentBases: opponents(state).map((p) => state.board.bases.get(p.id) ?? p.base),
  };
}

function isReachable(ctx: EvalContext, p: Position): boolean {
  return inBounds(p, ctx.board.size) && ctx.reach[toIndex(p, ctx.board.size)] === 1;
}

/** Target lies outside the connected territory but borders it. */
function reconnectsTerritory(ctx: EvalContext, target: Position): boolean {
  if (isReachable(ctx, target)) return false;
  return neighbors(ctx.board, target).some((n) => isReachable(ctx, n));
}

function defendsOrContests(ctx: EvalContext, target: Position): boolean {
  if (ctx.ownBase && isAdjacent(ctx.board, target, ctx.ownBase)) return true;
  return ctx.opponentBases.some((b) => isAdjacent(ctx.board, target, b));
}

export function moveFactors(ctx: EvalContext, move: Move): FactorBreakdown {
  const { board } = ctx;
  const target = move.to;
  let strategic = 0;
  if (isCorner(target, board.size)) strategic = MOVE_POINTS.corner;
  else if (isEdge(target, board.size)) strategic = MOVE_POINTS.edge;

  return {
    territory: MOVE_POINTS.territory,
    strategic,
    threat: move.kind === "attack" ? MOVE_POINTS.threat : 0,
    connectivity: reconnectsTerritory(ctx, target) ? MOVE_POINTS.connectivity : 0,
    expansion: emptyNeighbors(board, target).length * MOVE_POINTS.expansionPerEmpty,
    defensive: defendsOrContests(ctx, target) ? MOVE_POINTS.defensive : 0,
  };
}

export function weightedScore(factors: FactorBreakdown, weights: HeuristicWeights): number {
  return (
    factors.territory * weights.territory +
    factors.strategic * weights.strategic +
    factors.threat * weights.threat +
    factors.connectivity * weights.connectivity +
    factors.expansion * weights.expansion +
    factors.defensive * weights.defensive
  );
}

export function scoreMoves(state: TurnState, moves: readonly Move[], weights: HeuristicWeights): ScoredMove[] {
  const ctx = createEvalContext(state);
  return moves.map((move) => {
    const factors = moveFactors(ctx, move);
    return { move, factors, score: weightedScore(factors, weights) };
  });
}

export function scoreBlockPosition(state: TurnState, p: Position): number {
  const ctx = createEvalContext(state);
  return scoreBlockWithContext(ctx, p);
}

export function scoreBlockWithContext(ctx: EvalContext, p: Position): number {
  const { board } = ctx;
  let score = 0;

  for (const base of ctx.opponentBases) {
    if (isAdjacent(board, p, base)) score += BLOCK_POINTS.pathBlock;
  }

  const edgeNeighbors = neighbors(board, p).filter((n) => isEdge(n, board.size)).length;
  if (edgeNeighbors >= 2) score += BLOCK_POINTS.chokepoint;

  if (isCorner(p, board.size)) score += BLOCK_POINTS.corner;

  score += emptyNeighbors(board, p).length * BLOCK_POINTS.perEmptyNeighbor;

  if (ctx.ownBase && isAdjacent(board, p, ctx.ownBase)) score += BLOCK_POINTS.nearOwnBase;

  return score;
}
