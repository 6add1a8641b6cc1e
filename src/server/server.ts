import cors from "cors";
import express from "express";
import { createServer } from "http";
import type { Server as HttpServer } from "http";
import { Server as SocketIOServer } from "socket.io";
import { pathToFileURL } from "url";
import { StandardBoardEngine } from "./board.js";
import { loadConfig, type ServerConfig } from "./config.js";
import { loadDictionary } from "./dictionary.js";
import { TileBag } from "./drawPool.js";
import { log } from "./log.js";
import { GameRegistry } from "./registry.js";
import { registerGameRoutes } from "./routes.js";
import { registerSocketHandlers, SocketObserver } from "./socket.js";
import type { BoardEngine, DrawPool } from "./types.js";

interface BackendOptions {
  config?: ServerConfig;
  engine?: BoardEngine;
  createDrawPool?: () => DrawPool;
}

type ExpressApp = ReturnType<typeof express>;

export function initializeBackend(
  app: ExpressApp,
  httpServer: HttpServer,
  options: BackendOptions = {}
) {
  const config = options.config ?? loadConfig();
  app.use(cors());
  app.use(express.json());

  const observer = new SocketObserver();
  const registry = new GameRegistry({
    engine: options.engine ?? new StandardBoardEngine(loadDictionary(config.dictionaryPath)),
    createDrawPool: options.createDrawPool ?? (() => new TileBag()),
    requestTimeoutMs: config.requestTimeoutMs,
    observer
  });

  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: "*",
      methods: ["GET", "POST"]
    }
  });
  observer.attach(io);

  registerGameRoutes(app, registry);
  registerSocketHandlers(io, registry);

  return { io, registry };
}

function scheduleEviction(registry: GameRegistry, ttlMs: number) {
  if (ttlMs <= 0) return;
  const timer = setInterval(() => {
    registry.evictIdle(Date.now(), ttlMs).catch((error: unknown) => {
      console.error("[server] idle eviction failed", error);
    });
  }, Math.min(ttlMs, 60_000));
  timer.unref();
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return pathToFileURL(entry).href === import.meta.url;
}

if (isMainModule()) {
  const config = loadConfig();
  const app = express();
  const httpServer = createServer(app);
  const { registry } = initializeBackend(app, httpServer, { config });
  scheduleEviction(registry, config.gameIdleTtlMs);
  httpServer.listen(config.port, config.host, () => {
    log(`Word game server listening on port ${config.port}`);
  });
}
