import { describe, it, expect, beforeAll, afterAll, afterEach } from "vitest";
import express from "express";
import { createServer } from "http";
import type { Server as SocketIOServer } from "socket.io";
import { io as connect, type Socket as ClientSocket } from "socket.io-client";
import type { LobbySummary } from "../../src/shared/gameTypes.js";
import { newID } from "../../src/server/ids.js";
import type { GameRegistry } from "../../src/server/registry.js";
import { initializeBackend } from "../../src/server/server.js";
import { FakeEngine, orderedBag, ORIGIN } from "./helpers.js";

interface PushedState {
  turn: number;
  tiles: string[];
}

let baseUrl = "";
let io: SocketIOServer;
let registry: GameRegistry;
const clients: ClientSocket[] = [];

beforeAll(async () => {
  const app = express();
  const httpServer = createServer(app);
  ({ io, registry } = initializeBackend(app, httpServer, {
    config: {
      port: 0,
      host: "127.0.0.1",
      requestTimeoutMs: 1000,
      gameIdleTtlMs: 0,
      dictionaryPath: "unused.txt"
    },
    engine: new FakeEngine(),
    createDrawPool: orderedBag({ A: 7, B: 7, E: 10 })
  }));
  await new Promise<void>((resolve) => httpServer.listen(0, "127.0.0.1", resolve));
  const address = httpServer.address();
  if (!address || typeof address === "string") throw new Error("server did not bind");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(() => {
  clients.splice(0).forEach((client) => client.disconnect());
});

afterAll(async () => {
  await new Promise<void>((resolve) => io.close(() => resolve()));
});

function openClient(auth: Record<string, string>): ClientSocket {
  const client = connect(baseUrl, {
    auth,
    transports: ["websocket"],
    reconnection: false,
    autoConnect: false
  });
  clients.push(client);
  return client;
}

function nextEvent<T>(client: ClientSocket, event: string): Promise<T> {
  return new Promise((resolve) => {
    client.once(event, (payload: T) => resolve(payload));
  });
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("socket pushes", () => {
  it("sends the lobby on connect and each rack only to its owner", async () => {
    const game = await registry.create();
    const alice = await game.addPlayer("Alice");
    const bob = await game.addPlayer("Bob");
    const aliceClient = openClient({ gameId: game.id, playerId: alice.id });
    const bobClient = openClient({ gameId: game.id, playerId: bob.id });
    const aliceStates: PushedState[] = [];
    const bobStates: PushedState[] = [];
    aliceClient.on("game:state", (state: PushedState) => aliceStates.push(state));
    bobClient.on("game:state", (state: PushedState) => bobStates.push(state));

    const aliceLobby = nextEvent<LobbySummary>(aliceClient, "game:lobby");
    const bobLobby = nextEvent<LobbySummary>(bobClient, "game:lobby");
    aliceClient.connect();
    bobClient.connect();
    expect(await aliceLobby).toEqual({
      gameId: game.id,
      status: "lobby",
      players: [
        { name: "Alice", number: 0 },
        { name: "Bob", number: 1 }
      ]
    });
    await bobLobby;

    const aliceStarted = nextEvent<LobbySummary>(aliceClient, "game:lobby");
    const bobStarted = nextEvent<LobbySummary>(bobClient, "game:lobby");
    await game.start();
    expect((await aliceStarted).status).toBe("active");
    expect((await bobStarted).status).toBe("active");

    const aliceState = nextEvent<PushedState>(aliceClient, "game:state");
    const bobState = nextEvent<PushedState>(bobClient, "game:state");
    await game.request({ kind: "play", playerId: alice.id, startPos: ORIGIN, endPos: ORIGIN, tiles: ["A", "A"] });

    expect(await aliceState).toMatchObject({ turn: 1, tiles: ["A", "A", "A", "A", "A", "E", "E"] });
    expect(await bobState).toMatchObject({ turn: 1, tiles: ["B", "B", "B", "B", "B", "B", "B"] });
    await sleep(20);
    expect(aliceStates).toHaveLength(1);
    expect(bobStates).toHaveLength(1);
    await registry.remove(game.id);
  });

  it("rejects a player who is not in the game", async () => {
    const game = await registry.create();
    await game.addPlayer("Alice");
    const client = openClient({ gameId: game.id, playerId: newID() });

    const error = nextEvent<{ message: string; code: string }>(client, "game:error");
    const closed = nextEvent<string>(client, "disconnect");
    client.connect();

    expect(await error).toEqual({ message: "Player is not part of this game", code: "NotFound" });
    expect(await closed).toBe("io server disconnect");
  });

  it("rejects malformed and unknown game ids", async () => {
    const malformed = openClient({ gameId: "nope", playerId: newID() });
    const malformedError = nextEvent<{ message: string; code: string }>(malformed, "game:error");
    malformed.connect();
    expect(await malformedError).toEqual({
      message: "gameId must be a valid identifier",
      code: "InvalidRequest"
    });

    const unknown = openClient({ gameId: newID(), playerId: newID() });
    const unknownError = nextEvent<{ message: string; code: string }>(unknown, "game:error");
    const closed = nextEvent<string>(unknown, "disconnect");
    unknown.connect();
    expect(await unknownError).toEqual({ message: "No existing game with that ID", code: "NotFound" });
    expect(await closed).toBe("io server disconnect");
  });
});
