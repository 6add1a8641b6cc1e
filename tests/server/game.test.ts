import { describe, it, expect } from "vitest";
import { MAX_NAME_LENGTH } from "../../src/shared/constants.js";
import { GameError } from "../../src/server/errors.js";
import { makeGame, RecordingObserver } from "./helpers.js";

describe("lobby gate", () => {
  it("numbers players by join order and rejects a fifth join", async () => {
    const game = makeGame();
    const names = ["Alice", "Bob", "Carol", "Dave"];
    for (const [index, name] of names.entries()) {
      const player = await game.addPlayer(name);
      expect(player.number).toBe(index);
      expect(player.name).toBe(name);
    }
    await expect(game.addPlayer("Eve")).rejects.toMatchObject({ code: "GameFull" });
    expect(game.playerCount).toBe(4);
  });

  it("admits at most four of many concurrent joins, with distinct numbers", async () => {
    const game = makeGame();
    const results = await Promise.allSettled(
      ["p1", "p2", "p3", "p4", "p5", "p6"].map((name) => game.addPlayer(name))
    );
    const joined = results.flatMap((result) => (result.status === "fulfilled" ? [result.value] : []));
    const rejected = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));

    expect(joined.map((player) => player.number).sort()).toEqual([0, 1, 2, 3]);
    expect(rejected).toHaveLength(2);
    rejected.forEach((reason) => {
      expect(reason).toBeInstanceOf(GameError);
      expect(reason).toMatchObject({ code: "GameFull" });
    });
  });

  it("refuses to start with fewer than two players", async () => {
    const game = makeGame();
    await expect(game.start()).rejects.toMatchObject({ code: "NotEnoughPlayers" });
    await game.addPlayer("Alice");
    await expect(game.start()).rejects.toMatchObject({ code: "NotEnoughPlayers" });
    expect(game.active).toBe(false);
  });

  it("starts exactly once", async () => {
    const game = makeGame();
    await game.addPlayer("Alice");
    await game.addPlayer("Bob");

    const results = await Promise.allSettled([game.start(), game.start()]);

    expect(results[0].status).toBe("fulfilled");
    expect(results[1]).toMatchObject({ status: "rejected", reason: { code: "AlreadyStarted" } });
    expect(game.active).toBe(true);
    await expect(game.start()).rejects.toMatchObject({ code: "AlreadyStarted" });
    await game.close();
  });

  it("rejects joins after the game has started regardless of player count", async () => {
    const game = makeGame();
    await game.addPlayer("Alice");
    await game.addPlayer("Bob");
    await game.start();

    await expect(game.addPlayer("Carol")).rejects.toMatchObject({ code: "AlreadyStarted" });
    expect(game.playerCount).toBe(2);
    await game.close();
  });

  it("trims names, cuts them to the maximum length and refuses blank ones", async () => {
    const game = makeGame();
    const player = await game.addPlayer(`  ${"x".repeat(40)}  `);
    expect(player.name).toBe("x".repeat(MAX_NAME_LENGTH));
    await expect(game.addPlayer("   ")).rejects.toMatchObject({ code: "InvalidRequest" });
    expect(game.playerCount).toBe(1);
  });

  it("rejects turn requests while still in the lobby", async () => {
    const game = makeGame();
    const player = await game.addPlayer("Alice");
    await expect(game.request({ kind: "query", playerId: player.id })).rejects.toMatchObject({
      code: "NotStarted"
    });
  });

  it("reports lobby changes to the observer", async () => {
    const observer = new RecordingObserver();
    const game = makeGame({ observer });
    await game.addPlayer("Alice");
    await game.addPlayer("Bob");
    await game.start();

    expect(observer.lobby.map((summary) => summary.status)).toEqual(["lobby", "lobby", "active"]);
    expect(observer.lobby[2]).toEqual({
      gameId: game.id,
      status: "active",
      players: [
        { name: "Alice", number: 0 },
        { name: "Bob", number: 1 }
      ]
    });
    await game.close();
  });
});
