import type { PlayerId, Position } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { TurnState } from "../game/state.ts";
import type { Rng } from "../shared/prng.ts";
import type { DecisionInfo, HeuristicWeights, SearchOptions, Strategy } from "./aiTypes.ts";
import { DEFAULT_SEARCH_OPTIONS, DEFAULT_WEIGHTS } from "./aiTypes.ts";
import { generateLegalMoves, hasLegalMove } from "../game/movegen.ts";
import { applyMove, skipTurn } from "../game/applyMove.ts";
import { alivePlayers, cloneTurnState, findPlayer } from "../game/state.ts";
import { createRng } from "../shared/prng.ts";
import { HeuristicStrategy, playerToDecide } from "./heuristic.ts";

export type SearchNode = {
  state: TurnState;
  parent: SearchNode | null;
  /** Move that led here from the parent; null for a root. */
  move: Move | null;
  /** Index of `move` in the parent's legal move list. */
  moveIndex: number;
  children: SearchNode[];
  untried: Array<{ move: Move; index: number }>;
  visits: number;
  reward: number;
  terminal: boolean;
};

export type TurnSearchResult = {
  moves: Move[];
  iterations: number;
  fallbacks: number;
  ms: number;
  /** Root used for each chosen action. */
  roots: SearchNode[];
};

function canMove(state: TurnState, id: PlayerId): boolean {
  const p = findPlayer(state, id);
  return !!p && p.alive && hasLegalMove(state.board, id);
}

/**
 * Skips players that cannot act. Terminal when at most one player is alive or
 * when no alive player has a move.
 */
function settle(state: TurnState): { state: TurnState; terminal: boolean } {
  if (alivePlayers(state).length <= 1) return { state, terminal: true };
  let cur = state;
  for (let i = 0; i <= cur.players.length; i++) {
    if (canMove(cur, cur.currentPlayer)) return { state: cur, terminal: false };
    cur = skipTurn(cur);
  }
  return { state: cur, terminal: true };
}

function createNode(state: TurnState, parent: SearchNode | null, move: Move | null, moveIndex: number): SearchNode {
  const settled = settle(state);
  const legal = settled.terminal ? [] : generateLegalMoves(settled.state.board, settled.state.currentPlayer);
  return {
    state: settled.state,
    parent,
    move,
    moveIndex,
    children: [],
    untried: legal.map((m, index) => ({ move: m, index })),
    visits: 0,
    reward: 0,
    terminal: settled.terminal,
  };
}

/** Roots carry one visit of their own, so visits - 1 = sum of child visits. */
export function createRoot(state: TurnState, move: Move | null = null, moveIndex = -1): SearchNode {
  const root = createNode(state, null, move, moveIndex);
  root.visits = 1;
  return root;
}

export function uctValue(child: SearchNode, parentVisits: number, exploration: number): number {
  if (child.visits === 0) return Number.POSITIVE_INFINITY;
  return child.reward / child.visits + exploration * Math.sqrt(Math.log(parentVisits) / child.visits);
}

function selectChild(node: SearchNode, exploration: number): SearchNode {
  let best = node.children[0];
  let bestValue = Number.NEGATIVE_INFINITY;
  for (const child of node.children) {
    const v = uctValue(child, node.visits, exploration);
    if (v > bestValue) {
      bestValue = v;
      best = child;
    }
  }
  return best;
}

function expand(node: SearchNode, rng: Rng): SearchNode {
  const slot = rng.below(node.untried.length);
  const [picked] = node.untried.splice(slot, 1);
  const child = createNode(applyMove(node.state, picked.move), node, picked.move, picked.index);
  node.children.push(child);
  return child;
}

/** 1 when `acting` is the only player left alive at the end of a random playout. */
export function rollout(start: TurnState, acting: PlayerId, maxDepth: number, rng: Rng): number {
  let state = start;
  for (let depth = 0; depth < maxDepth; depth++) {
    if (alivePlayers(state).length <= 1) break;
    const current = findPlayer(state, state.currentPlayer);
    const moves = current?.alive ? generateLegalMoves(state.board, state.currentPlayer) : [];
    if (moves.length === 0) {
      if (!state.players.some((p) => canMove(state, p.id))) break;
      state = skipTurn(state);
      continue;
    }
    state = applyMove(state, rng.pick(moves));
  }
  const alive = alivePlayers(state);
  return alive.length === 1 && alive[0].id === acting ? 1 : 0;
}

function backpropagate(from: SearchNode, reward: number): void {
  for (let n: SearchNode | null = from; n; n = n.parent) {
    n.visits += 1;
    n.reward += reward;
  }
}

/** One selection / expansion / simulation / backpropagation pass. */
export function runIteration(root: SearchNode, acting: PlayerId, opts: SearchOptions, rng: Rng): void {
  let node = root;
  while (!node.terminal && node.untried.length === 0 && node.children.length > 0) {
    node = selectChild(node, opts.exploration);
  }
  if (!node.terminal && node.untried.length > 0) {
    node = expand(node, rng);
  }
  const reward = rollout(node.state, acting, opts.maxDepth, rng);
  backpropagate(node, reward);
}

/** Most visited; ties go to the higher mean reward, then enumeration order. */
export function bestChild(node: SearchNode): SearchNode | null {
  let best: SearchNode | null = null;
  for (const c of node.children) {
    if (!best) {
      best = c;
      continue;
    }
    if (c.visits !== best.visits) {
      if (c.visits > best.visits) best = c;
      continue;
    }
    const cMean = c.visits > 0 ? c.reward / c.visits : 0;
    const bMean = best.visits > 0 ? best.reward / best.visits : 0;
    if (cMean > bMean || (cMean === bMean && c.moveIndex < best.moveIndex)) best = c;
  }
  return best;
}

/**
 * Picks up to `count` actions for the acting player. The iteration cap and
 * the time budget cover the whole turn and are shared out evenly over the
 * actions still to choose. After each choice the chosen child becomes the
 * root for the next action.
 */
export function searchTurn(
  state: TurnState,
  count: number,
  opts: SearchOptions,
  rng: Rng,
  fallback: (s: TurnState) => Move | null
): TurnSearchResult {
  const start = performance.now();
  const deadline = start + Math.max(0, opts.timeBudgetMs);
  const iterationCap = Math.max(0, Math.floor(opts.iterations));
  const acting = state.actingPlayer;

  const rootState = cloneTurnState(state);
  rootState.movesLeft = Math.max(1, Math.floor(count));

  let root = createRoot(rootState);
  const roots: SearchNode[] = [];
  const moves: Move[] = [];
  let iterations = 0;
  let fallbacks = 0;

  for (let action = 0; action < count; action++) {
    if (root.terminal || root.state.currentPlayer !== acting) break;
    if (root.untried.length === 0 && root.children.length === 0) break;
    roots.push(root);

    const remaining = count - action;
    const capForAction = iterations + Math.floor((iterationCap - iterations) / remaining);
    const now = performance.now();
    const deadlineForAction = now + Math.max(0, deadline - now) / remaining;

    while (iterations < capForAction && performance.now() < deadlineForAction) {
      runIteration(root, acting, opts, rng);
      iterations++;
    }

    let next = bestChild(root);
    if (!next) {
      const move = fallback(root.state);
      if (!move) break;
      fallbacks++;
      next = createRoot(applyMove(root.state, move), move);
    }
    if (!next.move) break;

    moves.push(next.move);
    next.parent = null;
    if (next.visits === 0) next.visits = 1;
    root = next;
  }

  return { moves, iterations, fallbacks, ms: Math.round(performance.now() - start), roots };
}

export class MctsStrategy implements Strategy {
  readonly kind = "mcts" as const;
  private readonly options: SearchOptions;
  private readonly heuristic: HeuristicStrategy;
  private readonly rng: Rng;
  private info: DecisionInfo | null = null;

  constructor(args: { search?: Partial<SearchOptions>; weights?: HeuristicWeights; rng?: Rng; seed?: number } = {}) {
    this.options = { ...DEFAULT_SEARCH_OPTIONS, ...args.search };
    this.heuristic = new HeuristicStrategy(args.weights ?? DEFAULT_WEIGHTS);
    this.rng = args.rng ?? createRng(args.seed);
  }

  get lastInfo(): DecisionInfo | null {
    return this.info;
  }

  get seed(): number {
    return this.rng.seed;
  }

  decideMoves(state: TurnState, count: number): Move[] {
    const start = performance.now();
    const me = playerToDecide(state);
    const k = Math.floor(count);
    if (!me || k <= 0) {
      this.info = { strategy: this.kind, moves: 0, iterations: 0 };
      return [];
    }

    const legal = generateLegalMoves(state.board, me.id);
    if (legal.length <= k) {
      this.info = { strategy: this.kind, moves: legal.length, iterations: 0, ms: Math.round(performance.now() - start) };
      return legal;
    }

    const res = searchTurn(state, k, this.options, this.rng, (s) => this.heuristic.bestMove(s));
    this.info = {
      strategy: this.kind,
      moves: res.moves.length,
      iterations: res.iterations,
      fallbacks: res.fallbacks,
      ms: res.ms,
    };
    return res.moves;
  }

  /** Blocks are a one-off, low-branching choice: left to the heuristic. */
  decideBlocks(state: TurnState): Position[] {
    return this.heuristic.decideBlocks(state);
  }
}
