export type GameErrorCode =
  | "NotFound"
  | "GameFull"
  | "AlreadyStarted"
  | "NotEnoughPlayers"
  | "NotStarted"
  | "NotYourTurn"
  | "IllegalMove"
  | "InvalidTiles"
  | "GameOver"
  | "RequestInFlight"
  | "Timeout"
  | "InvalidRequest"
  | "Internal";

export class GameError extends Error {
  constructor(
    readonly code: GameErrorCode,
    message: string
  ) {
    super(message);
    this.name = "GameError";
  }
}

const STATUS_BY_CODE: Partial<Record<GameErrorCode, number>> = {
  NotFound: 404,
  RequestInFlight: 409,
  Timeout: 504,
  Internal: 500
};

export function httpStatusFor(code: GameErrorCode): number {
  return STATUS_BY_CODE[code] ?? 400;
}

export function toGameError(error: unknown): GameError {
  if (error instanceof GameError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new GameError("Internal", message);
}
