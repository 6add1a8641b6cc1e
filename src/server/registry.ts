import { GameError } from "./errors.js";
import { Game, type GameOptions } from "./game.js";
import type { ID } from "./ids.js";
import { log } from "./log.js";
import { Mutex } from "./mutex.js";

/**
 * Every live game in the process, keyed by id. The registry lock only guards
 * the map itself; it is released before the caller touches the game.
 */
export class GameRegistry {
  private readonly games = new Map<ID, Game>();
  private readonly lock = new Mutex();

  constructor(private readonly options: GameOptions) {}

  get size(): number {
    return this.games.size;
  }

  create(): Promise<Game> {
    const game = new Game(this.options);
    return this.lock.runExclusive(() => {
      this.games.set(game.id, game);
      log("game created", game.id);
      return game;
    });
  }

  lookup(id: ID): Promise<Game> {
    return this.lock.runExclusive(() => {
      const game = this.games.get(id);
      if (!game) {
        throw new GameError("NotFound", "No existing game with that ID");
      }
      return game;
    });
  }

  async remove(id: ID): Promise<boolean> {
    const game = await this.lock.runExclusive(() => {
      const existing = this.games.get(id);
      if (existing) this.games.delete(id);
      return existing;
    });
    if (!game) return false;
    await game.close();
    log("game removed", id);
    return true;
  }

  /** Removes games idle for longer than `ttlMs`; a ttl of 0 keeps everything. */
  async evictIdle(now: number, ttlMs: number): Promise<ID[]> {
    if (ttlMs <= 0) return [];
    const stale = await this.lock.runExclusive(() => {
      const expired = [...this.games.values()].filter((game) => now - game.lastActivityAt > ttlMs);
      expired.forEach((game) => this.games.delete(game.id));
      return expired;
    });
    await Promise.all(stale.map((game) => game.close()));
    if (stale.length) {
      log("evicted idle games", stale.length);
    }
    return stale.map((game) => game.id);
  }
}
