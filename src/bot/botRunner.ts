import { setTimeout as delay } from "node:timers/promises";

import type { PlayerId, Position } from "../types.ts";
import type { Adjacency } from "../game/board.ts";
import type { TurnState } from "../game/state.ts";
import type { DecisionInfo } from "../ai/aiTypes.ts";
import type { DecisionRunner } from "../ai/decisionRunner.ts";
import type { GameView } from "../shared/wireState.ts";
import { getCell, neighbors } from "../game/board.ts";
import { MAX_BLOCKS } from "../game/applyMove.ts";
import { actingPlayer } from "../game/state.ts";
import { posKey } from "../game/coords.ts";
import { toTurnState } from "../shared/wireState.ts";

/** The part of the game client the loop drives. */
export interface BotClient {
  getGameView(): GameView | null;
  isMyTurn(): boolean;
  sendMove(to: Position): Promise<void>;
  placeNeutrals(positions: readonly Position[]): Promise<void>;
}

export type BotRunnerOptions = {
  moveDelayMs: number;
  useNeutrals: boolean;
  adjacency: Adjacency;
  actionsPerTurn?: number;
  pollMs?: number;
  /** A view that stays unchanged this long after a plan is planned again. */
  replanAfterMs?: number;
  debug?: boolean;
};

export type LastDecision = {
  at: string;
  gameId: string | null;
  kind: "moves" | "blocks";
  positions: Position[];
  info: DecisionInfo | null;
};

export type RunnerStatus = {
  running: boolean;
  busy: boolean;
  turnsPlayed: number;
  lastDecision: LastDecision | null;
};

const TAG = "[virus-bot]";
export const DEFAULT_POLL_MS = 100;
export const DEFAULT_REPLAN_AFTER_MS = 2000;

/** True when a cell of another player touches the acting player's base. */
export function baseUnderThreat(state: TurnState): boolean {
  const me = actingPlayer(state);
  if (!me) return false;
  const base = state.board.bases.get(me.id) ?? me.base;
  return neighbors(state.board, base).some((p) => {
    const owner = getCell(state.board, p).owner;
    return typeof owner === "number" && owner !== me.id;
  });
}

function viewKey(view: GameView): string {
  return `${view.gameId ?? "-"}|${view.currentPlayer}|${view.movesLeft}|${view.board.map((r) => r.join(",")).join(";")}`;
}

/**
 * Polls the client and plays the bot's turns. A turn is planned once from a
 * snapshot, then its actions are sent one by one until the server says the
 * turn is over.
 */
export class BotRunner {
  private readonly client: BotClient;
  private readonly decisions: DecisionRunner;
  private readonly opts: BotRunnerOptions;
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private turnsPlayed = 0;
  private lastDecision: LastDecision | null = null;
  /**
   * View the last plan was made from. The same view is not planned again
   * until the replan delay has passed; a failed send clears it.
   */
  private lastPlan: { key: string; at: number } | null = null;
  private neutralsGame: string | null = null;
  private usedNeutrals = new Set<PlayerId>();

  constructor(client: BotClient, decisions: DecisionRunner, opts: BotRunnerOptions) {
    this.client = client;
    this.decisions = decisions;
    this.opts = opts;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.opts.pollMs ?? DEFAULT_POLL_MS);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.current) await this.current;
  }

  get status(): RunnerStatus {
    return {
      running: this.timer !== null,
      busy: this.current !== null,
      turnsPlayed: this.turnsPlayed,
      lastDecision: this.lastDecision,
    };
  }

  /** One poll. Resolves once any turn it started is fully sent. */
  tick(): Promise<void> {
    if (this.current) return this.current;
    if (!this.client.isMyTurn()) return Promise.resolve();
    const view = this.client.getGameView();
    if (!view) return Promise.resolve();
    const key = viewKey(view);
    const now = Date.now();
    const replanAfterMs = this.opts.replanAfterMs ?? DEFAULT_REPLAN_AFTER_MS;
    if (this.lastPlan && this.lastPlan.key === key && now - this.lastPlan.at < replanAfterMs) {
      return Promise.resolve();
    }
    this.lastPlan = { key, at: now };

    this.current = this.playTurn(view)
      .catch((err) => {
        // eslint-disable-next-line no-console
        console.error(TAG, "turn failed", err instanceof Error ? err.message : String(err));
      })
      .finally(() => {
        this.current = null;
      });
    return this.current;
  }

  private async playTurn(view: GameView): Promise<void> {
    if (view.gameId !== this.neutralsGame) {
      this.neutralsGame = view.gameId;
      this.usedNeutrals.clear();
    }

    const state = toTurnState(view, {
      adjacency: this.opts.adjacency,
      actionsPerTurn: this.opts.actionsPerTurn,
      usedNeutrals: this.usedNeutrals,
    });
    this.log(`my turn: ${state.movesLeft} action(s) left`);

    if (this.opts.useNeutrals && !this.usedNeutrals.has(state.actingPlayer) && baseUnderThreat(state)) {
      const blocks = await this.decisions.decideBlocks(state);
      if (blocks.length === MAX_BLOCKS) {
        this.record(view, "blocks", blocks);
        this.usedNeutrals.add(state.actingPlayer);
        try {
          await this.client.placeNeutrals(blocks);
          this.log(`placed blocks at ${blocks.map(posKey).join(", ")}`);
          this.turnsPlayed++;
          return;
        } catch (err) {
          this.usedNeutrals.delete(state.actingPlayer);
          // eslint-disable-next-line no-console
          console.error(TAG, err instanceof Error ? err.message : String(err));
        }
      }
    }

    const moves = await this.decisions.decideMoves(state, state.movesLeft);
    this.record(
      view,
      "moves",
      moves.map((m) => m.to)
    );
    if (moves.length === 0) {
      this.log("no legal moves");
      return;
    }

    for (const [i, move] of moves.entries()) {
      if (!this.client.isMyTurn()) {
        this.log("turn ended");
        break;
      }
      if (i > 0 && this.opts.moveDelayMs > 0) await delay(this.opts.moveDelayMs);
      if (!this.client.isMyTurn()) {
        this.log("turn ended");
        break;
      }
      try {
        await this.client.sendMove(move.to);
        this.log(`${move.kind} ${posKey(move.to)} from ${posKey(move.from)}`);
      } catch (err) {
        this.lastPlan = null;
        // eslint-disable-next-line no-console
        console.error(TAG, err instanceof Error ? err.message : String(err));
        break;
      }
    }
    this.turnsPlayed++;
  }

  private record(view: GameView, kind: LastDecision["kind"], positions: Position[]): void {
    this.lastDecision = {
      at: new Date().toISOString(),
      gameId: view.gameId,
      kind,
      positions,
      info: this.decisions.lastInfo,
    };
  }

  private log(msg: string): void {
    if (!this.opts.debug) return;
    // eslint-disable-next-line no-console
    console.log(TAG, msg);
  }
}
