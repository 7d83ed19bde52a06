import dotenv from "dotenv";
import type { Server } from "node:http";

import { startStatusServer, type BotStatus } from "./app.ts";
import { loadConfig, strategyConfig, type BotConfig } from "../../src/config.ts";
import { createStrategy } from "../../src/ai/createStrategy.ts";
import { InlineDecisionRunner, WorkerDecisionRunner, type DecisionRunner } from "../../src/ai/decisionRunner.ts";
import { GameClient, type ClientEvent } from "../../src/client/gameClient.ts";
import { BotRunner } from "../../src/bot/botRunner.ts";

dotenv.config();

function log(...args: unknown[]): void {
  // eslint-disable-next-line no-console
  console.log("[virus-bot]", ...args);
}

function onClientEvent(config: BotConfig, event: ClientEvent): void {
  switch (event.type) {
    case "connected":
      log(`connected as ${event.username}`);
      if (config.lobbyId) log(`joining lobby ${config.lobbyId}`);
      else if (config.autoCreate) log("creating lobby");
      break;
    case "challenge":
      log(`challenge from ${event.fromUsername}${config.autoAcceptChallenge ? ", accepting" : ""}`);
      break;
    case "game_start":
      log(`game started: player ${event.view.yourPlayerId}, ${event.view.board.length}x${event.view.board[0]?.length ?? 0}`);
      break;
    case "game_end":
      log(`game ended: winner ${event.result.winner}${event.result.message ? ` (${event.result.message})` : ""}`);
      break;
    case "disconnected":
      log("disconnected from server");
      break;
    case "move_made":
    case "turn_change":
    case "users_update":
      break;
  }
}

function statusOf(config: BotConfig, client: GameClient, runner: BotRunner, decisions: DecisionRunner): BotStatus {
  const view = client.getGameView();
  const rs = runner.status;
  return {
    name: config.botName,
    connected: client.isConnected(),
    userId: client.userId,
    username: client.username,
    gameId: view?.gameId ?? null,
    yourPlayerId: view?.yourPlayerId ?? null,
    currentPlayer: view?.currentPlayer ?? null,
    myTurn: client.isMyTurn(),
    movesLeft: view?.movesLeft ?? null,
    strategy: decisions.kind,
    turnsPlayed: rs.turnsPlayed,
    lastDecision: rs.lastDecision,
  };
}

async function main(): Promise<void> {
  const config = loadConfig(process.env, process.argv.slice(2));
  log(`starting ${config.botName} (${config.strategy} strategy)`);
  log(`connecting to ${config.serverUrl}`);

  const decisions: DecisionRunner = config.useWorker
    ? new WorkerDecisionRunner(strategyConfig(config))
    : new InlineDecisionRunner(createStrategy(strategyConfig(config)));

  let statusServer: Server | null = null;
  let stopping: Promise<void> | null = null;

  const client = new GameClient({
    serverUrl: config.serverUrl,
    lobbyId: config.lobbyId,
    autoJoin: config.autoJoin,
    autoCreate: config.autoCreate,
    boardSize: config.boardSize,
    autoAcceptChallenge: config.autoAcceptChallenge,
    debug: config.debug,
    listener: (event) => {
      onClientEvent(config, event);
      if (event.type === "disconnected") requestShutdown("disconnect");
    },
  });

  const runner = new BotRunner(client, decisions, {
    moveDelayMs: config.moveDelayMs,
    useNeutrals: config.useNeutrals,
    adjacency: config.adjacency,
    debug: config.debug,
  });

  async function shutdown(reason: string): Promise<void> {
    log(`${reason}: shutting down`);
    await runner.stop();
    await decisions.close();
    await client.disconnect();
    const s = statusServer;
    if (s) await new Promise<void>((resolve) => s.close(() => resolve()));
  }

  function requestShutdown(reason: string): void {
    if (stopping) return;
    stopping = shutdown(reason).catch((err) => {
      // eslint-disable-next-line no-console
      console.error("[virus-bot] shutdown failed", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => requestShutdown(`received ${signal}`));
  }

  try {
    await client.connect();
  } catch (err) {
    await decisions.close();
    throw err;
  }
  runner.start();

  if (config.statusPort > 0) {
    try {
      const started = await startStatusServer({
        port: config.statusPort,
        debug: config.debug,
        getStatus: () => statusOf(config, client, runner, decisions),
      });
      statusServer = started.server;
      log(`status on ${started.url}/api/status`);
    } catch (err) {
      requestShutdown("status server failed");
      throw err;
    }
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error("[virus-bot] failed to start", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
