import type { PlayerId, Position } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { TurnState } from "../game/state.ts";
import type { Adjacency } from "../game/board.ts";

export type StrategyKind = "heuristic" | "mcts";

export const STRATEGY_KINDS: readonly StrategyKind[] = ["heuristic", "mcts"];

export interface HeuristicWeights {
  territory: number;
  strategic: number;
  threat: number;
  connectivity: number;
  expansion: number;
  defensive: number;
}

export const DEFAULT_WEIGHTS: Readonly<HeuristicWeights> = {
  territory: 1.0,
  strategic: 0.5,
  threat: 1.5,
  connectivity: 0.3,
  expansion: 0.4,
  defensive: 0.2,
};

export interface SearchOptions {
  /** Iteration cap for a whole turn. */
  iterations: number;
  /** Wall-clock budget for a whole turn. */
  timeBudgetMs: number;
  /** UCT exploration constant. */
  exploration: number;
  /** Rollout length cap in plies. */
  maxDepth: number;
}

export const DEFAULT_SEARCH_OPTIONS: Readonly<SearchOptions> = {
  iterations: 1000,
  timeBudgetMs: 1000,
  exploration: 1.41,
  maxDepth: 50,
};

export type DecisionInfo = {
  strategy: StrategyKind;
  moves: number;
  iterations?: number;
  /** Roots that fell back to the heuristic because nothing was searched. */
  fallbacks?: number;
  ms?: number;
};

/** What both strategies offer the orchestration loop. */
export interface Strategy {
  readonly kind: StrategyKind;
  /** Up to `count` actions for the acting player, in the order to play them. */
  decideMoves(state: TurnState, count: number): Move[];
  /** 0 or 2 cells to turn into permanent blocks. */
  decideBlocks(state: TurnState): Position[];
  readonly lastInfo: DecisionInfo | null;
}

export interface StrategyConfig {
  kind: StrategyKind;
  weights: HeuristicWeights;
  search: SearchOptions;
  /** Rollout seed; random when omitted. */
  seed?: number;
}

// Worker wire form: cells travel packed, bases as entries.
export type SerializedTurnState = {
  size: number;
  adjacency: Adjacency;
  cells: number[];
  bases: [PlayerId, Position][];
  players: TurnState["players"];
  currentPlayer: PlayerId;
  actingPlayer: PlayerId;
  movesLeft: number;
  actionsPerTurn: number;
};

export type AIWorkerRequest =
  | {
      kind: "decideMoves";
      requestId: number;
      config: StrategyConfig;
      state: SerializedTurnState;
      count: number;
    }
  | {
      kind: "decideBlocks";
      requestId: number;
      config: StrategyConfig;
      state: SerializedTurnState;
    };

export type AIWorkerResponse =
  | { kind: "movesResult"; requestId: number; moves: Move[]; info: DecisionInfo | null }
  | { kind: "blocksResult"; requestId: number; positions: Position[] }
  | { kind: "error"; requestId: number; message: string };
