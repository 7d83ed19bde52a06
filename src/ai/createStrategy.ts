import type { Strategy, StrategyConfig, StrategyKind } from "./aiTypes.ts";
import { STRATEGY_KINDS } from "./aiTypes.ts";
import { HeuristicStrategy } from "./heuristic.ts";
import { MctsStrategy } from "./search.ts";

export function isStrategyKind(v: unknown): v is StrategyKind {
  return typeof v === "string" && STRATEGY_KINDS.some((k) => k === v);
}

export function createStrategy(config: StrategyConfig): Strategy {
  switch (config.kind) {
    case "heuristic":
      return new HeuristicStrategy(config.weights);
    case "mcts":
      return new MctsStrategy({ search: config.search, weights: config.weights, seed: config.seed });
    default: {
      const exhaustive: never = config.kind;
      throw new Error(`Unknown strategy: ${String(exhaustive)}`);
    }
  }
}
