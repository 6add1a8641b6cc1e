import { randomUUID } from "crypto";
import { GameError } from "./errors.js";

export type ID = string;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function newID(): ID {
  return randomUUID();
}

export function parseID(raw: unknown, label = "id"): ID {
  if (typeof raw !== "string" || !UUID_PATTERN.test(raw)) {
    throw new GameError("InvalidRequest", `${label} must be a valid identifier`);
  }
  return raw.toLowerCase();
}
