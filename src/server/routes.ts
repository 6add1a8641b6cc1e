import type { Express, NextFunction, Request, Response } from "express";
import { httpStatusFor, toGameError } from "./errors.js";
import { log } from "./log.js";
import type { GameRegistry } from "./registry.js";
import {
  isRecord,
  parseGameRef,
  parseJoinRequest,
  parsePlayRequest,
  parseStateRequest,
  toWireState
} from "./requests.js";

function sendError(res: Response, error: unknown) {
  const gameError = toGameError(error);
  if (gameError.code === "Internal") {
    console.error("[server] request failed", error);
  }
  res.status(httpStatusFor(gameError.code)).json({ error: gameError.message, code: gameError.code });
}

// Runs after the routes so body-parser failures get the same JSON error body.
function handleUncaughtError(error: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (isRecord(error) && error.type === "entity.parse.failed") {
    log("rejected malformed JSON body");
    res.status(400).json({ error: "Request body must be valid JSON", code: "InvalidRequest" });
    return;
  }
  sendError(res, error);
}

export function registerGameRoutes(app: Express, registry: GameRegistry) {
  app.get("/api/health", (_req: Request, res: Response) => {
    log("GET /api/health");
    res.json({ status: "ok" });
  });

  app.post("/game/create", async (_req: Request, res: Response) => {
    log("POST /game/create");
    try {
      const game = await registry.create();
      res.status(201).json({ game_id: game.id });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/game/join", async (req: Request, res: Response) => {
    log("POST /game/join", req.body);
    try {
      const { gameId, playerName } = parseJoinRequest(req.body);
      const game = await registry.lookup(gameId);
      const player = await game.addPlayer(playerName);
      res.json({ game_id: game.id, player_id: player.id });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/game/start", async (req: Request, res: Response) => {
    log("POST /game/start", req.body);
    try {
      const { gameId } = parseGameRef(req.body);
      const game = await registry.lookup(gameId);
      await game.start();
      res.status(200).send("OK");
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/game/state", async (req: Request, res: Response) => {
    log("POST /game/state", req.body?.game_id);
    try {
      const { gameId, request } = parseStateRequest(req.body);
      const game = await registry.lookup(gameId);
      const state = await game.request(request);
      res.json(toWireState(state));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/game/play", async (req: Request, res: Response) => {
    log("POST /game/play", req.body?.game_id, req.body?.swap ? "swap" : "play");
    try {
      const { gameId, request } = parsePlayRequest(req.body);
      const game = await registry.lookup(gameId);
      const state = await game.request(request);
      res.json(toWireState(state));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.use(handleUncaughtError);
}
