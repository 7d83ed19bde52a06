import { describe, it, expect } from "vitest";

import { createStrategy, isStrategyKind } from "./createStrategy.ts";
import { DEFAULT_SEARCH_OPTIONS, DEFAULT_WEIGHTS } from "./aiTypes.ts";
import { HeuristicStrategy } from "./heuristic.ts";
import { MctsStrategy } from "./search.ts";

describe("createStrategy", () => {
  it("builds the requested kind", () => {
    const base = { weights: { ...DEFAULT_WEIGHTS }, search: { ...DEFAULT_SEARCH_OPTIONS } };
    expect(createStrategy({ ...base, kind: "heuristic" })).toBeInstanceOf(HeuristicStrategy);
    const mcts = createStrategy({ ...base, kind: "mcts", seed: 12 });
    expect(mcts).toBeInstanceOf(MctsStrategy);
    expect(mcts instanceof MctsStrategy && mcts.seed).toBe(12);
  });

  it("recognises strategy names", () => {
    expect(isStrategyKind("mcts")).toBe(true);
    expect(isStrategyKind("heuristic")).toBe(true);
    expect(isStrategyKind("minimax")).toBe(false);
    expect(isStrategyKind(3)).toBe(false);
  });
});
