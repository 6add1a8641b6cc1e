export type Premium = "none" | "doubleLetter" | "tripleLetter" | "doubleWord" | "tripleWord";

export interface SquareCoordinate {
  row: number;
  col: number;
}

export interface PlacedTile {
  letter: string;
  blank: boolean;
}

export interface BoardSquare {
  premium: Premium;
  tile?: PlacedTile;
}

export type Board = BoardSquare[][];

export interface PlayerSummary {
  name: string;
  number: number;
  score: number;
  tileCount: number;
}

export type LastMove =
  | { kind: "play"; playerNumber: number; words: string[]; points: number }
  | { kind: "swap"; playerNumber: number; count: number };

export interface GameStateResponse {
  gameId: string;
  playerId: string;
  players: PlayerSummary[];
  board: Board;
  turn: number;
  tiles: string[];
  bagCount: number;
  finished: boolean;
  winner?: number;
  lastMove?: LastMove;
}

export interface LobbySummary {
  gameId: string;
  status: "lobby" | "active" | "finished";
  players: Array<{ name: string; number: number }>;
}

export interface QueryRequest {
  kind: "query";
  playerId: string;
}

export interface PlayRequest {
  kind: "play";
  playerId: string;
  startPos: SquareCoordinate;
  endPos: SquareCoordinate;
  tiles: string[];
  blanks?: string[];
}

export interface SwapRequest {
  kind: "swap";
  playerId: string;
  tiles: string[];
}

export type TurnRequest = QueryRequest | PlayRequest | SwapRequest;
