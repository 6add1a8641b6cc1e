import type {
  Board,
  GameStateResponse,
  LobbySummary,
  SquareCoordinate,
  TurnRequest
} from "../shared/gameTypes.js";
import type { ID } from "./ids.js";
import type { ReplySlot } from "./mailbox.js";

export interface Player {
  readonly id: ID;
  readonly name: string;
  readonly number: number;
  tiles: string[];
  score: number;
  readonly replySlot: ReplySlot;
}

export type JoinedPlayer = Pick<Player, "id" | "name" | "number">;

export interface Envelope {
  requestId: number;
  request: TurnRequest;
}

export type PlacementResult =
  | { success: true; board: Board; score: number; words: string[] }
  | { success: false; error: string };

/**
 * Placement legality and scoring. `tryPlace` must not mutate the board it is
 * given; an accepted move returns a new board.
 */
export interface BoardEngine {
  createBoard(): Board;
  tryPlace(
    board: Board,
    startPos: SquareCoordinate,
    endPos: SquareCoordinate,
    tiles: string[],
    blanks: string[]
  ): PlacementResult | Promise<PlacementResult>;
}

export type ExchangeResult = { success: true; tiles: string[] } | { success: false; error: string };

export interface DrawPool {
  draw(count: number): string[];
  exchange(tiles: string[]): ExchangeResult;
  remaining(): number;
}

export interface GameObserver {
  lobbyChanged(summary: LobbySummary): void;
  stateChanged(playerId: ID, state: GameStateResponse): void;
}

export interface Dictionary {
  has(word: string): boolean;
}
