import type { Board, GameStateResponse, LobbySummary, SquareCoordinate } from "../../src/shared/gameTypes.js";
import { TileBag } from "../../src/server/drawPool.js";
import { Game, type GameOptions } from "../../src/server/game.js";
import type { BoardEngine, GameObserver, PlacementResult } from "../../src/server/types.js";

/**
 * Accepts every placement unless told otherwise. Each accepted play appends
 * one row holding the played letters, so the row count equals the number of
 * accepted plays.
 */
export class FakeEngine implements BoardEngine {
  readonly calls: string[][] = [];
  rejectWith?: string;
  throwWith?: string;
  delayMs = 0;
  hang = false;

  createBoard(): Board {
    return [];
  }

  async tryPlace(
    board: Board,
    _startPos: SquareCoordinate,
    _endPos: SquareCoordinate,
    tiles: string[]
  ): Promise<PlacementResult> {
    this.calls.push([...tiles]);
    if (this.hang) {
      await new Promise<void>(() => undefined);
    }
    if (this.delayMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.throwWith) {
      throw new Error(this.throwWith);
    }
    if (this.rejectWith) {
      return { success: false, error: this.rejectWith };
    }
    const row = tiles.map((letter) => ({ premium: "none" as const, tile: { letter, blank: false } }));
    return { success: true, board: [...board, row], score: tiles.length, words: [tiles.join("")] };
  }
}

export class RecordingObserver implements GameObserver {
  readonly lobby: LobbySummary[] = [];
  readonly states: Array<{ playerId: string; state: GameStateResponse }> = [];

  lobbyChanged(summary: LobbySummary): void {
    this.lobby.push(summary);
  }

  stateChanged(playerId: string, state: GameStateResponse): void {
    this.states.push({ playerId, state });
  }
}

/** Bag that always draws the first remaining tile, in the order of `counts`. */
export const orderedBag = (counts: Record<string, number>) => () =>
  new TileBag({ rng: () => 0, counts });

export const ORIGIN: SquareCoordinate = { row: 7, col: 7 };

export function makeGame(overrides: Partial<GameOptions> = {}): Game {
  return new Game({
    engine: new FakeEngine(),
    createDrawPool: orderedBag({ A: 7, B: 7, C: 7, D: 7, E: 20 }),
    requestTimeoutMs: 1000,
    ...overrides
  });
}
