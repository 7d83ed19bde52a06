import type { Position } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Player, TurnState } from "../game/state.ts";
import type { DecisionInfo, HeuristicWeights, Strategy } from "./aiTypes.ts";
import type { ScoredMove } from "./evaluate.ts";
import { DEFAULT_WEIGHTS } from "./aiTypes.ts";
import { createEvalContext, scoreBlockWithContext, scoreMoves } from "./evaluate.ts";
import { generateLegalMoves, legalBlockPositions } from "../game/movegen.ts";
import { posKey } from "../game/coords.ts";
import { actingPlayer } from "../game/state.ts";
import { MAX_BLOCKS } from "../game/applyMove.ts";

/**
 * The acting player when it is their turn, otherwise null. Both strategies
 * answer with an empty result in the null case.
 */
export function playerToDecide(state: TurnState): Player | null {
  if (state.currentPlayer !== state.actingPlayer) return null;
  return actingPlayer(state) ?? null;
}

/**
 * Best-first with a preference for spreading picks over different origin
 * cells: a move whose origin is already used is passed over until K-1
 * distinct origins are in play. Short picks are topped up in score order.
 */
export function selectDiverseMoves(scored: readonly ScoredMove[], count: number): Move[] {
  const k = Math.floor(count);
  if (k <= 0) return [];
  if (scored.length <= k) return scored.map((s) => s.move);

  // Array.prototype.sort is stable, so equal scores keep enumeration order.
  const ordered = scored.slice().sort((a, b) => b.score - a.score);

  const picked = new Set<number>();
  const origins = new Set<string>();
  for (let i = 0; i < ordered.length && picked.size < k; i++) {
    const origin = posKey(ordered[i].move.from);
    if (!origins.has(origin) || origins.size >= k - 1) {
      picked.add(i);
      origins.add(origin);
    }
  }
  for (let i = 0; i < ordered.length && picked.size < k; i++) {
    picked.add(i);
  }

  return Array.from(picked)
    .sort((a, b) => a - b)
    .map((i) => ordered[i].move);
}

export function chooseBlockPositions(state: TurnState): Position[] {
  const me = playerToDecide(state);
  if (!me || me.usedNeutrals) return [];

  const eligible = legalBlockPositions(state.board, me.id);
  if (eligible.length < MAX_BLOCKS) return [];

  const ctx = createEvalContext(state);
  return eligible
    .map((p) => ({ p, score: scoreBlockWithContext(ctx, p) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_BLOCKS)
    .map((s) => s.p);
}

export class HeuristicStrategy implements Strategy {
  readonly kind = "heuristic" as const;
  private readonly weights: HeuristicWeights;
  private info: DecisionInfo | null = null;

  constructor(weights: HeuristicWeights = DEFAULT_WEIGHTS) {
    this.weights = { ...weights };
  }

  get lastInfo(): DecisionInfo | null {
    return this.info;
  }

  decideMoves(state: TurnState, count: number): Move[] {
    const start = performance.now();
    const moves = this.rank(state, count);
    this.info = { strategy: this.kind, moves: moves.length, ms: Math.round(performance.now() - start) };
    return moves;
  }

  decideBlocks(state: TurnState): Position[] {
    return chooseBlockPositions(state);
  }

  /** Highest-scoring single move, or null when there is nothing to play. */
  bestMove(state: TurnState): Move | null {
    return this.rank(state, 1)[0] ?? null;
  }

  private rank(state: TurnState, count: number): Move[] {
    const me = playerToDecide(state);
    if (!me) return [];
    const legal = generateLegalMoves(state.board, me.id);
    if (legal.length === 0) return [];
    return selectDiverseMoves(scoreMoves(state, legal, this.weights), count);
  }
}
