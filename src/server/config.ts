import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface ServerConfig {
  port: number;
  host: string;
  requestTimeoutMs: number;
  gameIdleTtlMs: number;
  dictionaryPath: string;
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`[server] ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(): ServerConfig {
  return {
    port: readNumber("PORT", 4000),
    host: process.env.HOST || "0.0.0.0",
    requestTimeoutMs: readNumber("REQUEST_TIMEOUT_MS", 10_000),
    // 0 keeps every game for the lifetime of the process
    gameIdleTtlMs: readNumber("GAME_IDLE_TTL_MS", 0),
    dictionaryPath:
      process.env.DICTIONARY_PATH || path.resolve(__dirname, "../../src/server/dictionary.txt")
  };
}
