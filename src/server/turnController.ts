import { LETTER_VALUES } from "../shared/constants.js";
import type {
  Board,
  GameStateResponse,
  LastMove,
  PlayRequest,
  SwapRequest,
  TurnRequest
} from "../shared/gameTypes.js";
import { GameError, toGameError } from "./errors.js";
import type { ID } from "./ids.js";
import { log, warn } from "./log.js";
import { Mailbox, type TurnReply } from "./mailbox.js";
import type { BoardEngine, DrawPool, Envelope, GameObserver, Player } from "./types.js";

// Timed-out requests allowed to pile up before the controller stops accepting more.
const MAX_STALLED_TIMEOUTS = 3;

export interface TurnControllerOptions {
  gameId: ID;
  players: Player[];
  board: Board;
  engine: BoardEngine;
  pool: DrawPool;
  requestTimeoutMs: number;
  observer?: GameObserver;
}

/**
 * Exclusive owner of an active game's board, racks, scores and turn index.
 *
 * Callers hand requests in through `submit`; a single loop takes them off the
 * mailbox in arrival order and handles each one to completion before looking
 * at the next, so nothing here needs a lock. Every outcome, rejected or not,
 * goes back to the requesting player's reply slot.
 */
export class TurnController {
  readonly gameId: ID;
  private readonly mailbox = new Mailbox<Envelope>();
  private readonly players: Player[];
  private readonly playersById: Map<ID, Player>;
  private readonly engine: BoardEngine;
  private readonly pool: DrawPool;
  private readonly requestTimeoutMs: number;
  private readonly observer?: GameObserver;

  private board: Board;
  private turnIndex = 0;
  private completed = false;
  private winner?: number;
  private lastMove?: LastMove;
  private nextRequestId = 1;
  private stalledTimeouts = 0;
  private loop?: Promise<void>;

  constructor(options: TurnControllerOptions) {
    this.gameId = options.gameId;
    this.players = [...options.players].sort((a, b) => a.number - b.number);
    this.playersById = new Map(this.players.map((player) => [player.id, player]));
    this.board = options.board;
    this.engine = options.engine;
    this.pool = options.pool;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.observer = options.observer;
  }

  get finished(): boolean {
    return this.completed;
  }

  start() {
    if (this.loop) return;
    this.loop = this.run().catch((error: unknown) => {
      console.error("[server] turn controller stopped unexpectedly", this.gameId, error);
    });
  }

  async stop(): Promise<void> {
    const dropped = this.mailbox.close();
    if (dropped.length) {
      log("turn controller closing with queued requests", this.gameId, dropped.length);
    }
    const closed = new GameError("NotFound", "Game has been closed");
    this.players.forEach((player) => player.replySlot.cancel(closed));
    const loop = this.loop;
    if (!loop) return;

    // A request stuck in a collaborator cannot be interrupted; stop waiting for it.
    let timer: NodeJS.Timeout | undefined;
    const stalled = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        warn("turn controller still busy after close", this.gameId);
        resolve();
      }, this.requestTimeoutMs);
    });
    await Promise.race([loop, stalled]);
    clearTimeout(timer);
  }

  async submit(request: TurnRequest): Promise<GameStateResponse> {
    const player = this.playersById.get(request.playerId);
    if (!player) {
      throw new GameError("NotFound", "No player with that ID in this game");
    }
    if (this.mailbox.isClosed) {
      throw new GameError("NotFound", "Game has been closed");
    }
    if (this.stalledTimeouts >= MAX_STALLED_TIMEOUTS) {
      throw new GameError("Timeout", "Game is not responding");
    }
    const requestId = this.nextRequestId;
    this.nextRequestId += 1;
    const reply = player.replySlot.open(requestId, this.requestTimeoutMs);
    this.mailbox.push({ requestId, request });
    const result = await reply;
    if (!result.success) {
      if (result.error.code === "Timeout") this.stalledTimeouts += 1;
      throw result.error;
    }
    return result.state;
  }

  private async run(): Promise<void> {
    for (;;) {
      const envelope = await this.mailbox.next();
      if (!envelope) return;
      await this.handle(envelope);
    }
  }

  private async handle({ requestId, request }: Envelope): Promise<void> {
    this.stalledTimeouts = 0;
    const player = this.playersById.get(request.playerId);
    if (!player) return;
    if (!player.replySlot.isWaitingFor(requestId)) {
      log("skipping abandoned request", this.gameId, request.kind, player.number);
      return;
    }
    let reply: TurnReply;
    try {
      reply = { success: true, state: await this.apply(player, request) };
    } catch (error) {
      const gameError = toGameError(error);
      if (gameError.code === "Internal") {
        console.error("[server] request failed", this.gameId, request.kind, error);
      }
      reply = { success: false, error: gameError };
    }
    if (!player.replySlot.fill(requestId, reply)) {
      log("reply discarded, caller no longer waiting", this.gameId, request.kind, player.number);
    }
  }

  private async apply(player: Player, request: TurnRequest): Promise<GameStateResponse> {
    switch (request.kind) {
      case "query":
        return this.viewFor(player);
      case "play":
        return this.play(player, request);
      case "swap":
        return this.swap(player, request);
    }
  }

  private async play(player: Player, request: PlayRequest): Promise<GameStateResponse> {
    this.ensureTurn(player);
    if (!request.tiles.length) {
      throw new GameError("IllegalMove", "Select tiles to play.");
    }
    const kept = removeFromRack(player.tiles, request.tiles);
    if (!kept) {
      throw new GameError("InvalidTiles", "You do not hold those tiles.");
    }
    const result = await this.engine.tryPlace(
      this.board,
      request.startPos,
      request.endPos,
      request.tiles,
      request.blanks ?? []
    );
    if (!result.success) {
      throw new GameError("IllegalMove", result.error);
    }

    this.board = result.board;
    player.score += result.score;
    player.tiles = [...kept, ...this.pool.draw(request.tiles.length)];
    this.lastMove = {
      kind: "play",
      playerNumber: player.number,
      words: result.words,
      points: result.score
    };
    this.advanceTurn();
    if (!player.tiles.length && this.pool.remaining() === 0) {
      this.finish(player);
    }
    log("play accepted", this.gameId, player.number, result.words.join(","), result.score);
    this.broadcast();
    return this.viewFor(player);
  }

  private swap(player: Player, request: SwapRequest): GameStateResponse {
    this.ensureTurn(player);
    if (!request.tiles.length) {
      throw new GameError("IllegalMove", "Select tiles to swap.");
    }
    const kept = removeFromRack(player.tiles, request.tiles);
    if (!kept) {
      throw new GameError("InvalidTiles", "You do not hold those tiles.");
    }
    const result = this.pool.exchange(request.tiles);
    if (!result.success) {
      throw new GameError("IllegalMove", result.error);
    }

    player.tiles = [...kept, ...result.tiles];
    this.lastMove = { kind: "swap", playerNumber: player.number, count: request.tiles.length };
    this.advanceTurn();
    log("swap accepted", this.gameId, player.number, request.tiles.length);
    this.broadcast();
    return this.viewFor(player);
  }

  private ensureTurn(player: Player) {
    if (this.completed) {
      throw new GameError("GameOver", "Game is already over");
    }
    if (player.number !== this.turnIndex) {
      throw new GameError("NotYourTurn", "It is not your turn.");
    }
  }

  private advanceTurn() {
    this.turnIndex = (this.turnIndex + 1) % this.players.length;
  }

  private finish(finisher: Player) {
    let bonus = 0;
    this.players.forEach((player) => {
      if (player === finisher) return;
      const penalty = rackValue(player.tiles);
      player.score -= penalty;
      bonus += penalty;
    });
    finisher.score += bonus;
    const top = this.players.reduce((best, player) => (player.score > best.score ? player : best));
    this.winner = top.number;
    this.completed = true;
    log("game finished", this.gameId, "winner", top.number);
  }

  private broadcast() {
    const observer = this.observer;
    if (!observer) return;
    this.players.forEach((player) => {
      try {
        observer.stateChanged(player.id, this.viewFor(player));
      } catch (error) {
        warn("state push failed", this.gameId, player.number, error);
      }
    });
  }

  private viewFor(player: Player): GameStateResponse {
    return {
      gameId: this.gameId,
      playerId: player.id,
      players: this.players.map((entry) => ({
        name: entry.name,
        number: entry.number,
        score: entry.score,
        tileCount: entry.tiles.length
      })),
      board: structuredClone(this.board),
      turn: this.turnIndex,
      tiles: [...player.tiles],
      bagCount: this.pool.remaining(),
      finished: this.completed,
      winner: this.winner,
      lastMove: this.lastMove && structuredClone(this.lastMove)
    };
  }
}

/** Returns the rack without `tiles`, or undefined when the rack does not hold them all. */
export function removeFromRack(rack: string[], tiles: string[]): string[] | undefined {
  const kept = [...rack];
  for (const tile of tiles) {
    const index = kept.indexOf(tile);
    if (index === -1) return undefined;
    kept.splice(index, 1);
  }
  return kept;
}

function rackValue(tiles: string[]): number {
  return tiles.reduce((total, tile) => total + (LETTER_VALUES[tile] ?? 0), 0);
}
