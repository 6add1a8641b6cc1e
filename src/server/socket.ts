import type { Server as SocketIOServer } from "socket.io";
import type { GameStateResponse, LobbySummary } from "../shared/gameTypes.js";
import { toGameError } from "./errors.js";
import { parseID, type ID } from "./ids.js";
import { log, warn } from "./log.js";
import type { GameRegistry } from "./registry.js";
import { toWireState } from "./requests.js";
import type { GameObserver } from "./types.js";

const gameRoom = (gameId: ID) => `game:${gameId}`;
const playerRoom = (playerId: ID) => `player:${playerId}`;

/**
 * Pushes lobby changes to everyone in a game and each player's own state view
 * to that player only. The player room is private: rack contents never go to
 * the shared game room.
 */
export class SocketObserver implements GameObserver {
  private io: SocketIOServer | null = null;

  attach(io: SocketIOServer) {
    this.io = io;
  }

  lobbyChanged(summary: LobbySummary): void {
    this.io?.to(gameRoom(summary.gameId)).emit("game:lobby", summary);
  }

  stateChanged(playerId: ID, state: GameStateResponse): void {
    this.io?.to(playerRoom(playerId)).emit("game:state", toWireState(state));
  }
}

export function registerSocketHandlers(io: SocketIOServer, registry: GameRegistry) {
  io.on("connection", async (socket) => {
    log("socket connected", socket.id);
    const auth = socket.handshake.auth ?? {};
    try {
      const gameId = parseID(auth.gameId, "gameId");
      const playerId = parseID(auth.playerId, "playerId");
      const game = await registry.lookup(gameId);
      if (!game.hasPlayer(playerId)) {
        socket.emit("game:error", { message: "Player is not part of this game", code: "NotFound" });
        socket.disconnect(true);
        return;
      }
      await socket.join([gameRoom(gameId), playerRoom(playerId)]);
      log("socket joined game", socket.id, gameId);
      socket.emit("game:lobby", game.summary());
    } catch (error) {
      const gameError = toGameError(error);
      warn("socket rejected", socket.id, gameError.message);
      socket.emit("game:error", { message: gameError.message, code: gameError.code });
      socket.disconnect(true);
    }

    socket.on("disconnect", () => {
      log("socket disconnected", socket.id);
    });
  });
}
