import express from "express";
import cors from "cors";
import { createServer, type Server } from "node:http";

import type { StrategyKind } from "../../src/ai/aiTypes.ts";
import type { LastDecision } from "../../src/bot/botRunner.ts";
import type { PlayerId } from "../../src/types.ts";

export type BotStatus = {
  name: string;
  connected: boolean;
  userId: string | null;
  username: string | null;
  gameId: string | null;
  yourPlayerId: PlayerId | null;
  currentPlayer: PlayerId | null;
  myTurn: boolean;
  movesLeft: number | null;
  strategy: StrategyKind;
  turnsPlayed: number;
  lastDecision: LastDecision | null;
};

export type StatusAppOpts = {
  getStatus: () => BotStatus;
  /** Logs every request. */
  debug?: boolean;
};

export function createStatusApp(opts: StatusAppOpts): express.Express {
  const app = express();
  app.use(cors());

  if (opts.debug) {
    app.use((req, _res, next) => {
      // eslint-disable-next-line no-console
      console.log(`[virus-bot:status] ${req.method} ${req.path}`);
      next();
    });
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/status", (_req, res) => {
    try {
      res.json(opts.getStatus());
    } catch (err) {
      const msg = err instanceof Error ? err.message : "Status failed";
      // eslint-disable-next-line no-console
      console.error("[virus-bot:status] status error", msg);
      res.status(500).json({ error: msg });
    }
  });

  return app;
}

export async function startStatusServer(args: StatusAppOpts & { port?: number; host?: string }): Promise<{
  app: express.Express;
  server: Server;
  url: string;
}> {
  const app = createStatusApp(args);
  const port = Number.isFinite(args.port) ? Number(args.port) : 0;
  const host = args.host ?? "127.0.0.1";

  const server = createServer(app);
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null ? address.port : port;
  return { app, server, url: `http://${host}:${actualPort}` };
}
