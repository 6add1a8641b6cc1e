import { BLANK, LETTERS } from "../shared/constants.js";
import type {
  GameStateResponse,
  LastMove,
  PlayRequest,
  QueryRequest,
  SquareCoordinate,
  SwapRequest
} from "../shared/gameTypes.js";
import { GameError } from "./errors.js";
import { parseID, type ID } from "./ids.js";

// Wire format: JSON bodies with snake_case fields.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function bodyOf(raw: unknown): Record<string, unknown> {
  return isRecord(raw) ? raw : {};
}

export function parseGameRef(raw: unknown): { gameId: ID } {
  const body = bodyOf(raw);
  return { gameId: parseID(body.game_id, "game_id") };
}

export function parseJoinRequest(raw: unknown): { gameId: ID; playerName: string } {
  const body = bodyOf(raw);
  const gameId = parseID(body.game_id, "game_id");
  const { player_name: playerName } = body;
  if (!playerName || typeof playerName !== "string") {
    throw new GameError("InvalidRequest", "player_name is required");
  }
  return { gameId, playerName };
}

export function parseStateRequest(raw: unknown): { gameId: ID; request: QueryRequest } {
  const body = bodyOf(raw);
  return {
    gameId: parseID(body.game_id, "game_id"),
    request: { kind: "query", playerId: parseID(body.player_id, "player_id") }
  };
}

export function parsePlayRequest(raw: unknown): {
  gameId: ID;
  request: PlayRequest | SwapRequest;
} {
  const body = bodyOf(raw);
  const gameId = parseID(body.game_id, "game_id");
  const playerId = parseID(body.player_id, "player_id");
  const tiles = parseTiles(body.tiles, "tiles", true);
  if (body.swap === true) {
    return { gameId, request: { kind: "swap", playerId, tiles } };
  }
  const request: PlayRequest = {
    kind: "play",
    playerId,
    startPos: parseCoordinate(body.start_pos, "start_pos"),
    endPos: parseCoordinate(body.end_pos, "end_pos"),
    tiles
  };
  if (body.blanks !== undefined) {
    request.blanks = parseTiles(body.blanks, "blanks", false);
  }
  return { gameId, request };
}

function parseCoordinate(raw: unknown, label: string): SquareCoordinate {
  if (!isRecord(raw)) {
    throw new GameError("InvalidRequest", `${label} must be an object with row and col`);
  }
  const { row, col } = raw;
  if (typeof row !== "number" || typeof col !== "number" || !Number.isInteger(row) || !Number.isInteger(col)) {
    throw new GameError("InvalidRequest", `${label} row and col must be integers`);
  }
  return { row, col };
}

function parseTiles(raw: unknown, label: string, allowBlank: boolean): string[] {
  if (!Array.isArray(raw)) {
    throw new GameError("InvalidRequest", `${label} must be an array of letters`);
  }
  return raw.map((entry: unknown) => {
    const letter = typeof entry === "string" ? entry.trim().toUpperCase() : "";
    const valid = letter.length === 1 && (LETTERS.includes(letter) || (allowBlank && letter === BLANK));
    if (!valid) {
      throw new GameError("InvalidRequest", `${label} contains an invalid tile`);
    }
    return letter;
  });
}

export function toWireState(state: GameStateResponse) {
  return {
    game_id: state.gameId,
    players: state.players.map((player) => ({
      name: player.name,
      number: player.number,
      score: player.score,
      tile_count: player.tileCount
    })),
    board: state.board,
    turn: state.turn,
    tiles: state.tiles,
    bag_count: state.bagCount,
    finished: state.finished,
    winner: state.winner,
    last_move: state.lastMove && toWireLastMove(state.lastMove)
  };
}

function toWireLastMove(move: LastMove) {
  if (move.kind === "swap") {
    return { kind: move.kind, player_number: move.playerNumber, count: move.count };
  }
  return { kind: move.kind, player_number: move.playerNumber, words: move.words, points: move.points };
}
