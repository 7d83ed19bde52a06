import type { Adjacency } from "./game/board.ts";
import type { HeuristicWeights, SearchOptions, StrategyConfig, StrategyKind } from "./ai/aiTypes.ts";
import { DEFAULT_SEARCH_OPTIONS, DEFAULT_WEIGHTS } from "./ai/aiTypes.ts";
import { isStrategyKind } from "./ai/createStrategy.ts";
import { normalizeSeed } from "./shared/prng.ts";

export type BotConfig = {
  serverUrl: string;
  botName: string;
  /** Lobby to join after `welcome`; empty for none. */
  lobbyId: string;
  autoJoin: boolean;
  autoCreate: boolean;
  /** Board size requested when creating a lobby. */
  boardSize: number;
  moveDelayMs: number;
  debug: boolean;
  autoAcceptChallenge: boolean;
  strategy: StrategyKind;
  search: SearchOptions;
  /** Rollout seed; random when undefined. */
  seed: number | undefined;
  weights: HeuristicWeights;
  adjacency: Adjacency;
  useNeutrals: boolean;
  useWorker: boolean;
  /** 0 disables the status endpoint. */
  statusPort: number;
};

export type Env = Record<string, string | undefined>;

export const DEFAULT_SERVER_URL = "ws://localhost:8080/ws";

const DURATION_RE = /^(\d+(?:\.\d+)?)\s*(ms|s|m)?$/i;

/** "250ms", "1.5s", "2m" or a bare number of milliseconds. */
export function parseDurationMs(raw: string | undefined, fallback: number): number {
  const m = raw?.trim().match(DURATION_RE);
  if (!m) return fallback;
  const n = Number(m[1]);
  const unit = (m[2] ?? "ms").toLowerCase();
  const factor = unit === "m" ? 60_000 : unit === "s" ? 1000 : 1;
  return Math.round(n * factor);
}

export function parseBool(raw: string | undefined, fallback: boolean): boolean {
  const v = raw?.trim().toLowerCase();
  if (!v) return fallback;
  if (v === "true" || v === "1" || v === "yes" || v === "on") return true;
  if (v === "false" || v === "0" || v === "no" || v === "off") return false;
  return fallback;
}

export function parseIntValue(raw: string | undefined, fallback: number): number {
  const v = raw?.trim();
  if (!v || !/^-?\d+$/.test(v)) return fallback;
  return Number(v);
}

export function parseFloatValue(raw: string | undefined, fallback: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

export function parseStrategy(raw: string | undefined): StrategyKind {
  const v = raw?.trim().toLowerCase();
  return isStrategyKind(v) ? v : "heuristic";
}

export function parseAdjacency(raw: string | undefined): Adjacency {
  const v = raw?.trim().toLowerCase();
  return v === "4" || v === "orthogonal" ? "orthogonal" : "moore";
}

function text(raw: string | undefined, fallback: string): string {
  const v = raw?.trim();
  return v ? v : fallback;
}

export type CliFlags = {
  server?: string;
  lobby?: string;
  create?: boolean;
  accept?: boolean;
  debug?: boolean;
  strategy?: string;
};

/**
 * Flags take `--name value`, `--name=value` or, for booleans, bare `--name`.
 * Unknown flags are rejected.
 */
export function parseCliFlags(argv: readonly string[]): CliFlags {
  const flags: CliFlags = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("-")) continue;
    const body = arg.replace(/^--?/, "");
    const eq = body.indexOf("=");
    const rawName = eq >= 0 ? body.slice(0, eq) : body;
    const inline: string | undefined = eq >= 0 ? body.slice(eq + 1) : undefined;
    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) throw new Error(`Missing value for --${rawName}`);
      i++;
      return next;
    };
    const bool = (): boolean => (inline === undefined ? true : parseBool(inline, true));

    switch (rawName) {
      case "server":
        flags.server = value();
        break;
      case "lobby":
        flags.lobby = value();
        break;
      case "strategy":
        flags.strategy = value();
        break;
      case "create":
        flags.create = bool();
        break;
      case "accept":
        flags.accept = bool();
        break;
      case "debug":
        flags.debug = bool();
        break;
      default:
        throw new Error(`Unknown flag: ${arg}`);
    }
  }
  return flags;
}

export function loadConfig(env: Env = process.env, argv: readonly string[] = []): BotConfig {
  const seedRaw = env.VIRUSBOT_MCTS_SEED?.trim();
  const config: BotConfig = {
    serverUrl: text(env.VIRUSBOT_SERVER_URL, DEFAULT_SERVER_URL),
    botName: text(env.VIRUSBOT_NAME, "VirusBot"),
    lobbyId: text(env.VIRUSBOT_LOBBY, ""),
    autoJoin: parseBool(env.VIRUSBOT_AUTO_JOIN, false),
    autoCreate: parseBool(env.VIRUSBOT_AUTO_CREATE, false),
    boardSize: parseIntValue(env.VIRUSBOT_BOARD_SIZE, 10),
    moveDelayMs: parseDurationMs(env.VIRUSBOT_MOVE_DELAY, 500),
    debug: parseBool(env.VIRUSBOT_DEBUG, false),
    autoAcceptChallenge: parseBool(env.VIRUSBOT_AUTO_ACCEPT_CHALLENGE, true),
    strategy: parseStrategy(env.VIRUSBOT_STRATEGY),
    search: {
      iterations: parseIntValue(env.VIRUSBOT_MCTS_ITERATIONS, DEFAULT_SEARCH_OPTIONS.iterations),
      timeBudgetMs: parseDurationMs(env.VIRUSBOT_MCTS_TIME_LIMIT, DEFAULT_SEARCH_OPTIONS.timeBudgetMs),
      exploration: parseFloatValue(env.VIRUSBOT_MCTS_UCT_CONST, DEFAULT_SEARCH_OPTIONS.exploration),
      maxDepth: parseIntValue(env.VIRUSBOT_MCTS_MAX_DEPTH, DEFAULT_SEARCH_OPTIONS.maxDepth),
    },
    seed: seedRaw ? normalizeSeed(seedRaw) : undefined,
    weights: {
      territory: parseFloatValue(env.VIRUSBOT_WGT_TERRITORY, DEFAULT_WEIGHTS.territory),
      strategic: parseFloatValue(env.VIRUSBOT_WGT_STRATEGIC, DEFAULT_WEIGHTS.strategic),
      threat: parseFloatValue(env.VIRUSBOT_WGT_THREAT, DEFAULT_WEIGHTS.threat),
      connectivity: parseFloatValue(env.VIRUSBOT_WGT_CONNECTIVITY, DEFAULT_WEIGHTS.connectivity),
      expansion: parseFloatValue(env.VIRUSBOT_WGT_EXPANSION, DEFAULT_WEIGHTS.expansion),
      defensive: parseFloatValue(env.VIRUSBOT_WGT_DEFENSIVE, DEFAULT_WEIGHTS.defensive),
    },
    adjacency: parseAdjacency(env.VIRUSBOT_ADJACENCY),
    useNeutrals: parseBool(env.VIRUSBOT_USE_NEUTRALS, true),
    useWorker: parseBool(env.VIRUSBOT_USE_WORKER, false),
    statusPort: parseIntValue(env.VIRUSBOT_STATUS_PORT, 0),
  };

  const flags = parseCliFlags(argv);
  if (flags.server) config.serverUrl = flags.server;
  if (flags.lobby) config.lobbyId = flags.lobby;
  if (flags.create !== undefined) config.autoCreate = flags.create;
  if (flags.accept !== undefined) config.autoAcceptChallenge = flags.accept;
  if (flags.debug !== undefined) config.debug = flags.debug;
  if (flags.strategy) config.strategy = parseStrategy(flags.strategy);

  return config;
}

export function strategyConfig(config: BotConfig): StrategyConfig {
  return { kind: config.strategy, weights: config.weights, search: config.search, seed: config.seed };
}
