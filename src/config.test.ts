import { describe, it, expect } from "vitest";
import {
  DEFAULT_SERVER_URL,
  loadConfig,
  parseAdjacency,
  parseBool,
  parseCliFlags,
  parseDurationMs,
  parseFloatValue,
  parseIntValue,
  parseStrategy,
  strategyConfig,
} from "./config.ts";
import { DEFAULT_SEARCH_OPTIONS, DEFAULT_WEIGHTS } from "./ai/aiTypes.ts";

describe("value parsers", () => {
  it("reads durations", () => {
    expect(parseDurationMs("250ms", 0)).toBe(250);
    expect(parseDurationMs("1.5s", 0)).toBe(1500);
    expect(parseDurationMs("2m", 0)).toBe(120_000);
    expect(parseDurationMs("750", 0)).toBe(750);
    expect(parseDurationMs("soon", 500)).toBe(500);
    expect(parseDurationMs(undefined, 500)).toBe(500);
  });

  it("reads booleans", () => {
    expect(parseBool("yes", false)).toBe(true);
    expect(parseBool("0", true)).toBe(false);
    expect(parseBool("maybe", true)).toBe(true);
    expect(parseBool("", false)).toBe(false);
  });

  it("reads numbers", () => {
    expect(parseIntValue("42", 1)).toBe(42);
    expect(parseIntValue("4.2", 1)).toBe(1);
    expect(parseFloatValue("0.75", 1)).toBe(0.75);
    expect(parseFloatValue("abc", 1)).toBe(1);
  });

  it("falls back to the heuristic for unknown strategies", () => {
    expect(parseStrategy("MCTS")).toBe("mcts");
    expect(parseStrategy("alphabeta")).toBe("heuristic");
    expect(parseStrategy(undefined)).toBe("heuristic");
  });

  it("maps 4 to orthogonal adjacency", () => {
    expect(parseAdjacency("4")).toBe("orthogonal");
    expect(parseAdjacency("8")).toBe("moore");
    expect(parseAdjacency(undefined)).toBe("moore");
  });
});

describe("parseCliFlags", () => {
  it("takes separate and inline values", () => {
    expect(parseCliFlags(["--server", "ws://h/ws?a=b", "--lobby=L1", "--debug", "--create=false"])).toEqual({
      server: "ws://h/ws?a=b",
      lobby: "L1",
      debug: true,
      create: false,
    });
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseCliFlags(["--colour", "red"])).toThrow("Unknown flag: --colour");
    expect(() => parseCliFlags(["--server"])).toThrow("Missing value for --server");
  });
});

describe("loadConfig", () => {
  it("uses the defaults for an empty environment", () => {
    const c = loadConfig({}, []);
    expect(c.serverUrl).toBe(DEFAULT_SERVER_URL);
    expect(c.botName).toBe("VirusBot");
    expect(c.lobbyId).toBe("");
    expect(c.moveDelayMs).toBe(500);
    expect(c.autoAcceptChallenge).toBe(true);
    expect(c.strategy).toBe("heuristic");
    expect(c.search).toEqual(DEFAULT_SEARCH_OPTIONS);
    expect(c.weights).toEqual(DEFAULT_WEIGHTS);
    expect(c.seed).toBeUndefined();
    expect(c.adjacency).toBe("moore");
    expect(c.useNeutrals).toBe(true);
    expect(c.useWorker).toBe(false);
    expect(c.statusPort).toBe(0);
    expect(c.boardSize).toBe(10);
  });

  it("reads the environment", () => {
    const c = loadConfig({
      VIRUSBOT_STRATEGY: "mcts",
      VIRUSBOT_MCTS_ITERATIONS: "300",
      VIRUSBOT_MCTS_TIME_LIMIT: "250ms",
      VIRUSBOT_MCTS_UCT_CONST: "2",
      VIRUSBOT_MCTS_SEED: "99",
      VIRUSBOT_WGT_THREAT: "3",
      VIRUSBOT_MOVE_DELAY: "0",
      VIRUSBOT_AUTO_ACCEPT_CHALLENGE: "false",
      VIRUSBOT_ADJACENCY: "4",
      VIRUSBOT_STATUS_PORT: "8099",
    });
    expect(c.strategy).toBe("mcts");
    expect(c.search).toEqual({ iterations: 300, timeBudgetMs: 250, exploration: 2, maxDepth: 50 });
    expect(c.seed).toBe(99);
    expect(c.weights.threat).toBe(3);
    expect(c.weights.territory).toBe(1);
    expect(c.moveDelayMs).toBe(0);
    expect(c.autoAcceptChallenge).toBe(false);
    expect(c.adjacency).toBe("orthogonal");
    expect(c.statusPort).toBe(8099);
    expect(strategyConfig(c)).toEqual({ kind: "mcts", weights: c.weights, search: c.search, seed: 99 });
  });

  it("lets flags override the environment", () => {
    const c = loadConfig({ VIRUSBOT_SERVER_URL: "ws://env/ws", VIRUSBOT_STRATEGY: "mcts" }, [
      "--server",
      "ws://flag/ws",
      "--strategy",
      "heuristic",
      "--accept=no",
      "--create",
    ]);
    expect(c.serverUrl).toBe("ws://flag/ws");
    expect(c.strategy).toBe("heuristic");
    expect(c.autoAcceptChallenge).toBe(false);
    expect(c.autoCreate).toBe(true);
  });
});
