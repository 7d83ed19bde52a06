import WebSocket, { type RawData } from "ws";

import type { PlayerId, Position } from "../types.ts";
import type {
  ChallengeMessage,
  ClientMessage,
  GameEndMessage,
  GameStartCompactMessage,
  GameStartFullMessage,
  MoveMadeMessage,
  ServerMessage,
  TurnChangeMessage,
  UserInfo,
  WelcomeMessage,
} from "../shared/protocol.ts";
import type { GameView } from "../shared/wireState.ts";
import {
  acceptChallengeRequest,
  createLobbyRequest,
  decodeFrame,
  joinLobbyRequest,
  moveRequest,
  placeNeutralsRequest,
} from "../shared/protocol.ts";
import { cloneGameView } from "../shared/wireState.ts";
import { encodeCell, ownedCell } from "../game/cell.ts";
import { DEFAULT_ACTIONS_PER_TURN } from "../game/state.ts";

export type ClientEvent =
  | { type: "connected"; userId: string; username: string }
  | { type: "users_update"; users: UserInfo[] }
  | { type: "challenge"; challengeId: string; fromUsername: string }
  | { type: "game_start"; view: GameView }
  | { type: "move_made"; move: MoveMadeMessage }
  | { type: "turn_change"; player: PlayerId; movesLeft: number }
  | { type: "game_end"; result: GameEndMessage }
  | { type: "disconnected" };

export type ClientListener = (event: ClientEvent) => void;

export type GameClientOptions = {
  serverUrl: string;
  lobbyId?: string;
  autoJoin?: boolean;
  autoCreate?: boolean;
  boardSize?: number;
  autoAcceptChallenge?: boolean;
  actionsPerTurn?: number;
  debug?: boolean;
  listener?: ClientListener;
};

const TAG = "[virus-bot:client]";

/** Next roster entry after `current`, wrapping; `current` itself when unknown. */
export function nextInRoster(roster: readonly PlayerId[], current: PlayerId): PlayerId {
  if (roster.length === 0) return current;
  const idx = roster.indexOf(current);
  if (idx < 0) return roster[0];
  return roster[(idx + 1) % roster.length];
}

/** Empty board with the two placeholder players in opposite corners. */
export function viewFromCompactStart(msg: GameStartCompactMessage, actionsPerTurn: number): GameView {
  const board: number[][] = [];
  for (let r = 0; r < msg.rows; r++) board.push(new Array<number>(msg.cols).fill(0));
  return {
    gameId: msg.gameId || null,
    board,
    players: [
      { id: 1, name: "Player 1", symbol: 1, position: { row: 0, col: 0 }, isAI: true },
      { id: 2, name: "Player 2", symbol: 2, position: { row: msg.rows - 1, col: msg.cols - 1 }, isAI: true },
    ],
    currentPlayer: 1,
    yourPlayerId: msg.yourPlayer,
    movesLeft: actionsPerTurn,
  };
}

export function viewFromFullStart(msg: GameStartFullMessage, actionsPerTurn: number): GameView {
  return {
    gameId: msg.gameId,
    board: msg.board.map((row) => row.slice()),
    players: msg.players.map((p) => ({ ...p, position: { ...p.position } })),
    currentPlayer: msg.currentPlayer,
    yourPlayerId: msg.yourPlayerId,
    movesLeft: actionsPerTurn,
  };
}

/**
 * Websocket connection to the game server. Keeps the latest game view and
 * reports what happens to a single listener.
 */
export class GameClient {
  private readonly opts: GameClientOptions;
  private readonly actionsPerTurn: number;
  private ws: WebSocket | null = null;
  private connected = false;
  private view: GameView | null = null;
  private lastResult: GameEndMessage | null = null;
  private identity: { userId: string; username: string } | null = null;
  private pendingChallenge: string | null = null;

  constructor(opts: GameClientOptions) {
    this.opts = opts;
    this.actionsPerTurn = Math.max(1, opts.actionsPerTurn ?? DEFAULT_ACTIONS_PER_TURN);
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      let opened = false;
      const ws = new WebSocket(this.opts.serverUrl);
      this.ws = ws;

      ws.on("open", () => {
        opened = true;
        this.connected = true;
        this.debug(`connected to ${this.opts.serverUrl}`);
        resolve();
      });
      ws.on("message", (data: RawData) => {
        this.receive(data.toString());
      });
      ws.on("error", (err: Error) => {
        if (!opened) {
          reject(new Error(`failed to connect: ${err.message}`));
          return;
        }
        // eslint-disable-next-line no-console
        console.error(TAG, "socket error", err.message);
      });
      ws.on("close", () => {
        const was = this.connected;
        this.connected = false;
        if (this.ws === ws) this.ws = null;
        if (!opened) reject(new Error("failed to connect: connection closed"));
        if (was) this.emit({ type: "disconnected" });
      });
    });
  }

  async disconnect(): Promise<void> {
    const ws = this.ws;
    if (!ws) return;
    if (ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>((resolve) => {
      ws.once("close", () => resolve());
      ws.close();
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  get userId(): string | null {
    return this.identity?.userId ?? null;
  }

  get username(): string | null {
    return this.identity?.username ?? null;
  }

  get gameId(): string | null {
    return this.view?.gameId ?? null;
  }

  get lastGameResult(): GameEndMessage | null {
    return this.lastResult;
  }

  get lastChallengeId(): string | null {
    return this.pendingChallenge;
  }

  /** A copy; callers may keep it. */
  getGameView(): GameView | null {
    return this.view ? cloneGameView(this.view) : null;
  }

  isMyTurn(): boolean {
    return !!this.view && this.view.currentPlayer === this.view.yourPlayerId;
  }

  /** Handles one text frame. Bad frames are logged in debug mode and dropped. */
  receive(text: string): void {
    const parsed = decodeFrame(text);
    if (!parsed.ok) {
      this.debug(`ignored frame: ${parsed.error}`);
      return;
    }
    this.debug(`<- ${text}`);
    this.handle(parsed.message);
  }

  sendMove(to: Position): Promise<void> {
    return this.send(moveRequest(this.view?.gameId ?? "", to), "move");
  }

  placeNeutrals(positions: readonly Position[]): Promise<void> {
    return this.send(placeNeutralsRequest(this.view?.gameId ?? "", positions), "neutrals");
  }

  acceptChallenge(challengeId: string): Promise<void> {
    return this.send(acceptChallengeRequest(challengeId), "accept challenge");
  }

  createLobby(boardSize: number): Promise<void> {
    return this.send(createLobbyRequest(boardSize), "create lobby");
  }

  joinLobby(lobbyId: string): Promise<void> {
    return this.send(joinLobbyRequest(lobbyId), "join lobby");
  }

  private send(msg: ClientMessage, what: string): Promise<void> {
    const ws = this.ws;
    if (!ws || !this.connected || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`failed to send ${what}: not connected`));
    }
    const data = JSON.stringify(msg);
    this.debug(`-> ${data}`);
    return new Promise((resolve, reject) => {
      ws.send(data, (err) => {
        if (err) reject(new Error(`failed to send ${what}: ${err.message}`));
        else resolve();
      });
    });
  }

  private handle(msg: ServerMessage): void {
    switch (msg.type) {
      case "welcome":
        this.onWelcome(msg);
        return;
      case "users_update":
        this.emit({ type: "users_update", users: msg.users });
        return;
      case "challenge_received":
        this.onChallenge(msg);
        return;
      case "game_start":
        this.view =
          msg.format === "compact"
            ? viewFromCompactStart(msg, this.actionsPerTurn)
            : viewFromFullStart(msg, this.actionsPerTurn);
        this.lastResult = null;
        this.debug(`game started: you are player ${this.view.yourPlayerId} (gameId: ${this.view.gameId ?? "-"})`);
        this.emit({ type: "game_start", view: cloneGameView(this.view) });
        return;
      case "move_made":
        this.onMoveMade(msg);
        return;
      case "turn_change":
        this.onTurnChange(msg);
        return;
      case "game_end":
        this.view = null;
        this.lastResult = msg;
        this.emit({ type: "game_end", result: msg });
        return;
    }
  }

  private onWelcome(msg: WelcomeMessage): void {
    this.identity = { userId: msg.userId, username: msg.username };
    this.debug(`connected as ${msg.username} (ID: ${msg.userId})`);
    this.emit({ type: "connected", userId: msg.userId, username: msg.username });

    if (this.opts.lobbyId) {
      void this.joinLobby(this.opts.lobbyId).catch((err) => this.logError(err));
      return;
    }
    if (this.opts.autoJoin) {
      // eslint-disable-next-line no-console
      console.warn(TAG, "auto-join is on but no lobby id is set");
    }
    if (this.opts.autoCreate) {
      void this.createLobby(this.opts.boardSize ?? 10).catch((err) => this.logError(err));
    }
  }

  private onChallenge(msg: ChallengeMessage): void {
    this.pendingChallenge = msg.challengeId;
    this.emit({ type: "challenge", challengeId: msg.challengeId, fromUsername: msg.fromUsername });
    if (this.opts.autoAcceptChallenge) {
      void this.acceptChallenge(msg.challengeId).catch((err) => this.logError(err));
    }
  }

  private onMoveMade(msg: MoveMadeMessage): void {
    const view = this.view;
    if (view) {
      const row = view.board[msg.row];
      if (msg.row >= 0 && row && msg.col >= 0 && msg.col < row.length) {
        row[msg.col] = encodeCell(ownedCell(msg.player));
      }
      if (msg.gameId) view.gameId = msg.gameId;
      if (msg.movesLeft <= 0) {
        view.currentPlayer = nextInRoster(
          view.players.map((p) => p.id),
          msg.player
        );
        view.movesLeft = this.actionsPerTurn;
      } else {
        view.currentPlayer = msg.player;
        view.movesLeft = msg.movesLeft;
      }
    }
    this.debug(`player ${msg.player} moved to (${msg.row}, ${msg.col}), movesLeft=${msg.movesLeft}`);
    this.emit({ type: "move_made", move: msg });
  }

  private onTurnChange(msg: TurnChangeMessage): void {
    const view = this.view;
    if (!view) {
      this.debug("turn change ignored: no game");
      return;
    }
    view.currentPlayer = msg.player;
    view.movesLeft = msg.movesLeft > 0 ? msg.movesLeft : this.actionsPerTurn;
    if (msg.gameId) view.gameId = msg.gameId;
    this.emit({ type: "turn_change", player: msg.player, movesLeft: view.movesLeft });
  }

  private emit(event: ClientEvent): void {
    try {
      this.opts.listener?.(event);
    } catch (err) {
      this.logError(err);
    }
  }

  private logError(err: unknown): void {
    // eslint-disable-next-line no-console
    console.error(TAG, err instanceof Error ? err.message : String(err));
  }

  private debug(msg: string): void {
    if (!this.opts.debug) return;
    // eslint-disable-next-line no-console
    console.log(TAG, msg);
  }
}
