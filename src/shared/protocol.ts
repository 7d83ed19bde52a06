import type { PlayerId, Position } from "../types.ts";

export type UserInfo = {
  id: string;
  name: string;
  status: string;
  lobbyId?: string;
};

export type PlayerInfo = {
  id: PlayerId;
  name: string;
  /** Packed cell value the player's cells carry. */
  symbol: number;
  /** Base position. */
  position: Position;
  isAI?: boolean;
};

export type WelcomeMessage = { type: "welcome"; userId: string; username: string };

export type UsersUpdateMessage = { type: "users_update"; users: UserInfo[] };

export type ChallengeMessage = {
  type: "challenge_received";
  challengeId: string;
  fromUserId: string;
  fromUsername: string;
};

/** Game start carrying the whole board. */
export type GameStartFullMessage = {
  type: "game_start";
  format: "full";
  gameId: string | null;
  board: number[][];
  players: PlayerInfo[];
  currentPlayer: PlayerId;
  yourPlayerId: PlayerId;
};

/** Game start without board data; the board starts empty. */
export type GameStartCompactMessage = {
  type: "game_start";
  format: "compact";
  gameId: string;
  opponentId: string;
  opponentUsername: string;
  yourPlayer: PlayerId;
  rows: number;
  cols: number;
};

export type MoveMadeMessage = {
  type: "move_made";
  gameId: string;
  row: number;
  col: number;
  player: PlayerId;
  movesLeft: number;
};

export type TurnChangeMessage = { type: "turn_change"; gameId: string; player: PlayerId; movesLeft: number };

export type GameEndMessage = { type: "game_end"; winner: PlayerId; eliminated: PlayerId[]; message?: string };

export type ServerMessage =
  | WelcomeMessage
  | UsersUpdateMessage
  | ChallengeMessage
  | GameStartFullMessage
  | GameStartCompactMessage
  | MoveMadeMessage
  | TurnChangeMessage
  | GameEndMessage;

export type ServerMessageType = ServerMessage["type"];

export type ParseResult = { ok: true; message: ServerMessage } | { ok: false; error: string };

export type MoveRequest = { type: "move"; row: number; col: number; gameId: string };
export type PlaceNeutralsRequest = { type: "place_neutrals"; positions: Position[]; gameId: string };
export type AcceptChallengeRequest = { type: "accept_challenge"; challengeId: string };
export type CreateLobbyRequest = { type: "create_lobby"; data: { boardSize: number } };
export type JoinLobbyRequest = { type: "join_lobby"; data: { lobbyId: string } };

export type ClientMessage =
  | MoveRequest
  | PlaceNeutralsRequest
  | AcceptChallengeRequest
  | CreateLobbyRequest
  | JoinLobbyRequest;

type Fields = Record<string, unknown>;

function isRecord(v: unknown): v is Fields {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function str(body: Fields, key: string, fallback = ""): string {
  const v = body[key];
  if (typeof v === "string") return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return fallback;
}

function int(body: Fields, key: string): number | null {
  const v = body[key];
  return typeof v === "number" && Number.isInteger(v) ? v : null;
}

function parsePosition(v: unknown): Position {
  if (!isRecord(v)) return { row: 0, col: 0 };
  return { row: int(v, "row") ?? 0, col: int(v, "col") ?? 0 };
}

function parsePlayer(v: unknown): PlayerInfo | null {
  if (!isRecord(v)) return null;
  const id = int(v, "id");
  if (id === null) return null;
  const out: PlayerInfo = {
    id,
    name: str(v, "name", `Player ${id}`),
    symbol: int(v, "symbol") ?? id,
    position: parsePosition(v.position),
  };
  if (typeof v.isAI === "boolean") out.isAI = v.isAI;
  return out;
}

function parseBoardRows(v: unknown): number[][] | null {
  if (!Array.isArray(v)) return null;
  const rows: number[][] = [];
  for (const row of v) {
    if (!Array.isArray(row)) return null;
    rows.push(row.map((c) => (typeof c === "number" && Number.isInteger(c) ? c : 0)));
  }
  return rows;
}

function parseUsers(v: unknown): UserInfo[] {
  if (!Array.isArray(v)) return [];
  const users: UserInfo[] = [];
  for (const u of v) {
    if (!isRecord(u)) continue;
    const user: UserInfo = { id: str(u, "id"), name: str(u, "name"), status: str(u, "status") };
    const lobbyId = str(u, "lobbyId");
    if (lobbyId) user.lobbyId = lobbyId;
    users.push(user);
  }
  return users;
}

function parseGameStart(body: Fields): ServerMessage | string {
  const rows = int(body, "rows");
  const cols = int(body, "cols");
  const yourPlayer = int(body, "yourPlayer");
  if (rows !== null && rows > 0 && cols !== null && cols > 0 && yourPlayer !== null) {
    return {
      type: "game_start",
      format: "compact",
      gameId: str(body, "gameId"),
      opponentId: str(body, "opponentId"),
      opponentUsername: str(body, "opponentUsername"),
      yourPlayer,
      rows,
      cols,
    };
  }

  const board = parseBoardRows(body.board);
  const yourPlayerId = int(body, "yourPlayerId");
  if (!board || yourPlayerId === null) return "game_start without board or player id";
  const players = Array.isArray(body.players)
    ? body.players.map(parsePlayer).filter((p): p is PlayerInfo => p !== null)
    : [];
  return {
    type: "game_start",
    format: "full",
    gameId: str(body, "gameId") || null,
    board,
    players,
    currentPlayer: int(body, "currentPlayer") ?? yourPlayerId,
    yourPlayerId,
  };
}

/**
 * Validates one decoded frame. Fields are read from the top level, or from a
 * nested `data` object when the server wraps them.
 */
export function parseServerMessage(raw: unknown): ParseResult {
  if (!isRecord(raw)) return { ok: false, error: "message is not an object" };
  const type = raw.type;
  if (typeof type !== "string") return { ok: false, error: "message has no type" };
  const body: Fields = isRecord(raw.data) ? { ...raw.data, ...raw } : raw;

  switch (type) {
    case "welcome":
      return { ok: true, message: { type, userId: str(body, "userId"), username: str(body, "username") } };
    case "users_update":
      return { ok: true, message: { type, users: parseUsers(body.users) } };
    case "challenge_received": {
      const challengeId = str(body, "challengeId");
      if (!challengeId) return { ok: false, error: "challenge_received without challengeId" };
      return {
        ok: true,
        message: { type, challengeId, fromUserId: str(body, "fromUserId"), fromUsername: str(body, "fromUsername") },
      };
    }
    case "game_start": {
      const parsed = parseGameStart(body);
      return typeof parsed === "string" ? { ok: false, error: parsed } : { ok: true, message: parsed };
    }
    case "move_made": {
      const row = int(body, "row");
      const col = int(body, "col");
      const player = int(body, "player");
      if (row === null || col === null || player === null) return { ok: false, error: "move_made without row, col or player" };
      return {
        ok: true,
        message: { type, gameId: str(body, "gameId"), row, col, player, movesLeft: int(body, "movesLeft") ?? 0 },
      };
    }
    case "turn_change": {
      const player = int(body, "player");
      if (player === null) return { ok: false, error: "turn_change without player" };
      return { ok: true, message: { type, gameId: str(body, "gameId"), player, movesLeft: int(body, "movesLeft") ?? 0 } };
    }
    case "game_end": {
      const eliminated = Array.isArray(body.eliminated)
        ? body.eliminated.filter((e): e is number => typeof e === "number" && Number.isInteger(e))
        : [];
      const message: GameEndMessage = { type, winner: int(body, "winner") ?? 0, eliminated };
      const text = str(body, "message");
      if (text) message.message = text;
      return { ok: true, message };
    }
    default:
      return { ok: false, error: `unhandled message type: ${type}` };
  }
}

/** Decodes a text frame; JSON errors come back as a failed result. */
export function decodeFrame(text: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  return parseServerMessage(raw);
}

export function moveRequest(gameId: string, to: Position): MoveRequest {
  return { type: "move", row: to.row, col: to.col, gameId };
}

export function placeNeutralsRequest(gameId: string, positions: readonly Position[]): PlaceNeutralsRequest {
  return { type: "place_neutrals", positions: positions.map((p) => ({ row: p.row, col: p.col })), gameId };
}

export function acceptChallengeRequest(challengeId: string): AcceptChallengeRequest {
  return { type: "accept_challenge", challengeId };
}

export function createLobbyRequest(boardSize: number): CreateLobbyRequest {
  return { type: "create_lobby", data: { boardSize } };
}

export function joinLobbyRequest(lobbyId: string): JoinLobbyRequest {
  return { type: "join_lobby", data: { lobbyId } };
}
