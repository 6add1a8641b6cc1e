import { MAX_NAME_LENGTH, MAX_PLAYERS, MIN_PLAYERS, RACK_SIZE } from "../shared/constants.js";
import type { GameStateResponse, LobbySummary, TurnRequest } from "../shared/gameTypes.js";
import { GameError } from "./errors.js";
import { newID, type ID } from "./ids.js";
import { log, warn } from "./log.js";
import { ReplySlot } from "./mailbox.js";
import { Mutex } from "./mutex.js";
import { TurnController } from "./turnController.js";
import type { BoardEngine, DrawPool, GameObserver, JoinedPlayer, Player } from "./types.js";

export interface GameOptions {
  engine: BoardEngine;
  createDrawPool: () => DrawPool;
  requestTimeoutMs: number;
  observer?: GameObserver;
  now?: () => number;
}

type GamePhase = { status: "lobby" } | { status: "active"; controller: TurnController };

/**
 * One game. While in the lobby, `addPlayer` and `start` run under the game's
 * own lock. `start` hands the players' racks, the board and the turn index to
 * a new TurnController; after that the lock is never taken for mutation again
 * and every request goes through the controller's mailbox.
 */
export class Game {
  readonly id: ID;
  readonly createdAt: number;
  lastActivityAt: number;
  private readonly lock = new Mutex();
  private readonly players = new Map<ID, Player>();
  private phase: GamePhase = { status: "lobby" };

  constructor(
    private readonly options: GameOptions,
    id: ID = newID()
  ) {
    this.id = id;
    this.createdAt = this.now();
    this.lastActivityAt = this.createdAt;
  }

  get active(): boolean {
    return this.phase.status === "active";
  }

  get playerCount(): number {
    return this.players.size;
  }

  hasPlayer(playerId: ID): boolean {
    return this.players.has(playerId);
  }

  addPlayer(name: string): Promise<JoinedPlayer> {
    return this.lock.runExclusive(() => {
      if (this.phase.status !== "lobby") {
        throw new GameError("AlreadyStarted", "Game has already started");
      }
      if (this.players.size >= MAX_PLAYERS) {
        throw new GameError("GameFull", "Maximum players reached for game");
      }
      const sanitized = sanitizeName(name);
      if (!sanitized) {
        throw new GameError("InvalidRequest", "Player name cannot be empty");
      }
      const player: Player = {
        id: newID(),
        name: sanitized,
        number: this.players.size,
        tiles: [],
        score: 0,
        replySlot: new ReplySlot()
      };
      this.players.set(player.id, player);
      this.touch();
      log("player joined", this.id, player.number, player.name);
      this.notifyLobby();
      return { id: player.id, name: player.name, number: player.number };
    });
  }

  start(): Promise<void> {
    return this.lock.runExclusive(() => {
      if (this.phase.status !== "lobby") {
        throw new GameError("AlreadyStarted", "Game has already started");
      }
      if (this.players.size < MIN_PLAYERS) {
        throw new GameError("NotEnoughPlayers", "At least two players needed to start game");
      }
      const pool = this.options.createDrawPool();
      const roster = [...this.players.values()];
      roster.forEach((player) => {
        player.tiles = pool.draw(RACK_SIZE);
      });
      const controller = new TurnController({
        gameId: this.id,
        players: roster,
        board: this.options.engine.createBoard(),
        engine: this.options.engine,
        pool,
        requestTimeoutMs: this.options.requestTimeoutMs,
        observer: this.options.observer
      });
      this.phase = { status: "active", controller };
      controller.start();
      this.touch();
      log("game started", this.id, roster.length, "players");
      this.notifyLobby();
    });
  }

  async request(request: TurnRequest): Promise<GameStateResponse> {
    const phase = this.phase;
    if (phase.status !== "active") {
      throw new GameError("NotStarted", "Game has not started yet");
    }
    this.touch();
    return phase.controller.submit(request);
  }

  summary(): LobbySummary {
    const phase = this.phase;
    let status: LobbySummary["status"] = "lobby";
    if (phase.status === "active") {
      status = phase.controller.finished ? "finished" : "active";
    }
    return {
      gameId: this.id,
      status,
      players: [...this.players.values()].map((player) => ({
        name: player.name,
        number: player.number
      }))
    };
  }

  async close(): Promise<void> {
    const phase = this.phase;
    if (phase.status === "active") {
      await phase.controller.stop();
    }
  }

  private touch() {
    this.lastActivityAt = this.now();
  }

  private now(): number {
    return this.options.now?.() ?? Date.now();
  }

  private notifyLobby() {
    try {
      this.options.observer?.lobbyChanged(this.summary());
    } catch (error) {
      warn("lobby push failed", this.id, error);
    }
  }
}

export function sanitizeName(raw: string): string {
  return raw.trim().slice(0, MAX_NAME_LENGTH);
}
