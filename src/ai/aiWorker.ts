import { parentPort } from "node:worker_threads";

import type { AIWorkerRequest, AIWorkerResponse, Strategy, StrategyConfig } from "./aiTypes.ts";
import { createStrategy } from "./createStrategy.ts";
import { deserializeTurnState } from "../shared/wireState.ts";

// Strategies are kept between requests so a seeded search keeps its stream.
let cached: { key: string; strategy: Strategy } | null = null;

function strategyFor(config: StrategyConfig): Strategy {
  const key = JSON.stringify(config);
  if (!cached || cached.key !== key) cached = { key, strategy: createStrategy(config) };
  return cached.strategy;
}

function handle(msg: AIWorkerRequest): AIWorkerResponse {
  const strategy = strategyFor(msg.config);
  const state = deserializeTurnState(msg.state);
  if (msg.kind === "decideBlocks") {
    return { kind: "blocksResult", requestId: msg.requestId, positions: strategy.decideBlocks(state) };
  }
  const moves = strategy.decideMoves(state, msg.count);
  return { kind: "movesResult", requestId: msg.requestId, moves, info: strategy.lastInfo };
}

const port = parentPort;
if (port) {
  port.on("message", (msg: AIWorkerRequest) => {
    let resp: AIWorkerResponse;
    try {
      resp = handle(msg);
    } catch (err) {
      resp = { kind: "error", requestId: msg.requestId, message: err instanceof Error ? err.message : String(err) };
    }
    port.postMessage(resp);
  });
}
