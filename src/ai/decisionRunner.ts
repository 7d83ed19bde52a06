import { Worker } from "node:worker_threads";

import type { Position } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { TurnState } from "../game/state.ts";
import type { AIWorkerRequest, AIWorkerResponse, DecisionInfo, Strategy, StrategyConfig, StrategyKind } from "./aiTypes.ts";
import { HeuristicStrategy } from "./heuristic.ts";
import { serializeTurnState } from "../shared/wireState.ts";

/** Where the orchestration loop gets its decisions from. */
export interface DecisionRunner {
  readonly kind: StrategyKind;
  decideMoves(state: TurnState, count: number): Promise<Move[]>;
  decideBlocks(state: TurnState): Promise<Position[]>;
  readonly lastInfo: DecisionInfo | null;
  close(): Promise<void>;
}

/** Runs the strategy on the calling thread. */
export class InlineDecisionRunner implements DecisionRunner {
  constructor(private readonly strategy: Strategy) {}

  get kind(): StrategyKind {
    return this.strategy.kind;
  }

  get lastInfo(): DecisionInfo | null {
    return this.strategy.lastInfo;
  }

  async decideMoves(state: TurnState, count: number): Promise<Move[]> {
    return this.strategy.decideMoves(state, count);
  }

  async decideBlocks(state: TurnState): Promise<Position[]> {
    return this.strategy.decideBlocks(state);
  }

  async close(): Promise<void> {}
}

type Pending = {
  resolve: (resp: AIWorkerResponse | null) => void;
  timer: NodeJS.Timeout;
};

const TIMEOUT_GRACE_MS = 2000;

/**
 * Runs the strategy on a worker thread so the websocket loop keeps turning.
 * A request that errors or outlives the time budget plus a grace period is
 * answered by the heuristic on the calling thread instead.
 */
export class WorkerDecisionRunner implements DecisionRunner {
  private readonly config: StrategyConfig;
  private readonly timeoutMs: number;
  private readonly fallback: HeuristicStrategy;
  private worker: Worker | null = null;
  private requestId = 1;
  private pending = new Map<number, Pending>();
  private chain: Promise<unknown> = Promise.resolve();
  private info: DecisionInfo | null = null;

  constructor(config: StrategyConfig, opts: { timeoutMs?: number; workerUrl?: URL } = {}) {
    this.config = config;
    this.timeoutMs = opts.timeoutMs ?? config.search.timeBudgetMs + TIMEOUT_GRACE_MS;
    this.fallback = new HeuristicStrategy(config.weights);
    this.ensureWorker(opts.workerUrl ?? new URL("./aiWorker.ts", import.meta.url));
  }

  get kind(): StrategyKind {
    return this.config.kind;
  }

  get lastInfo(): DecisionInfo | null {
    return this.info;
  }

  decideMoves(state: TurnState, count: number): Promise<Move[]> {
    return this.enqueue(async () => {
      const requestId = this.requestId++;
      const resp = await this.request({
        kind: "decideMoves",
        requestId,
        config: this.config,
        state: serializeTurnState(state),
        count,
      });
      if (resp?.kind === "movesResult") {
        this.info = resp.info;
        return resp.moves;
      }
      if (resp?.kind === "error") this.warn(`worker error: ${resp.message}`);
      const moves = this.fallback.decideMoves(state, count);
      this.info = this.fallback.lastInfo;
      return moves;
    });
  }

  decideBlocks(state: TurnState): Promise<Position[]> {
    return this.enqueue(async () => {
      const requestId = this.requestId++;
      const resp = await this.request({ kind: "decideBlocks", requestId, config: this.config, state: serializeTurnState(state) });
      if (resp?.kind === "blocksResult") return resp.positions;
      if (resp?.kind === "error") this.warn(`worker error: ${resp.message}`);
      return this.fallback.decideBlocks(state);
    });
  }

  async close(): Promise<void> {
    this.abandonAll();
    const w = this.worker;
    this.worker = null;
    if (w) await w.terminate();
  }

  private ensureWorker(url: URL): void {
    try {
      // Inherit the loader flags (tsx) so the worker can load TypeScript too.
      const worker = new Worker(url, { execArgv: process.execArgv });
      worker.on("message", (resp: AIWorkerResponse) => this.settle(resp.requestId, resp));
      worker.on("error", (err) => {
        this.warn(`worker failed: ${err.message}`);
        this.worker = null;
        this.abandonAll();
      });
      worker.on("exit", () => {
        this.worker = null;
        this.abandonAll();
      });
      worker.unref();
      this.worker = worker;
    } catch (err) {
      this.warn(`worker unavailable: ${err instanceof Error ? err.message : String(err)}`);
      this.worker = null;
    }
  }

  /** One request at a time. */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task, task);
    this.chain = run.catch(() => undefined);
    return run;
  }

  private request(msg: AIWorkerRequest): Promise<AIWorkerResponse | null> {
    const worker = this.worker;
    if (!worker) return Promise.resolve(null);
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.warn(`request ${msg.requestId} timed out after ${this.timeoutMs}ms, using heuristic`);
        this.settle(msg.requestId, null);
      }, this.timeoutMs);
      this.pending.set(msg.requestId, { resolve, timer });
      worker.postMessage(msg);
    });
  }

  private settle(requestId: number, resp: AIWorkerResponse | null): void {
    const p = this.pending.get(requestId);
    if (!p) return;
    clearTimeout(p.timer);
    this.pending.delete(requestId);
    p.resolve(resp);
  }

  private abandonAll(): void {
    for (const id of Array.from(this.pending.keys())) this.settle(id, null);
  }

  private warn(msg: string): void {
    // eslint-disable-next-line no-console
    console.warn(`[virus-bot] ${msg}`);
  }
}
