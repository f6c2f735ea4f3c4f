import { describe, expect, it, test, vi } from "vitest";

import { createHeadlessHarness, flushAsync, type HeadlessTransport } from "./helpers/headless-harness";

const INITIAL_REQUESTS = [
  { type: "SetName", payload: { name: "ada" } },
  { type: "GetProfile", payload: {} },
  { type: "ListMinis", payload: {} },
  { type: "ListMaps", payload: {} },
  { type: "GetGuild", payload: {} },
  { type: "GetFriends", payload: {} },
];

const wireUnit = (overrides: Record<string, unknown> = {}) => ({
  id: 1,
  name: "Knight",
  x: 0,
  y: 0,
  hp: 100,
  maxHp: 100,
  ownerId: 1,
  class: "melee",
  ...overrides,
});

const wireBase = (overrides: Record<string, unknown> = {}) => ({
  ownerId: 1,
  hp: 1000,
  maxHp: 1000,
  x: 280,
  y: 900,
  w: 40,
  h: 40,
  ...overrides,
});

const startMatch = (transport: HeadlessTransport): void => {
  transport.emit("Init", { playerId: 1, hand: null, tick: 0 });
  transport.emit("StateDelta", {
    unitsUpsert: [wireUnit()],
    bases: [wireBase(), wireBase({ ownerId: 2, y: 60 })],
  });
};

describe("GameClientOrchestrator session", () => {
  test("sends the initial requests once per connection, in order", async () => {
    const ready = vi.fn();
    const harness = createHeadlessHarness();
    await harness.orchestrator.boot({ onReady: ready });
    await flushAsync();
    const transport = harness.dialer.succeed();
    await flushAsync();

    harness.orchestrator.tick(0);
    harness.orchestrator.tick(16);

    expect(transport.sentMessages).toEqual(INITIAL_REQUESTS);
    expect(ready).toHaveBeenCalledTimes(1);
    expect(harness.orchestrator.connectionState).toBe("connected");
  });

  test("a rejected stored token leaves the client idle and clears the store", async () => {
    const harness = createHeadlessHarness({
      stored: { token: "expired-token", username: "ada" },
      validation: { valid: false, reason: "token expired or invalid" },
    });

    await harness.boot();
    await flushAsync();
    const frame = harness.orchestrator.tick(16);

    expect(frame.connectionState).toBe("idle");
    expect(frame.status).toBe("Not signed in");
    expect(harness.dialer.dialCount).toBe(0);
    expect(harness.orchestrator.sessionToken).toBeNull();
    expect(await harness.credentials.load()).toEqual({ token: null, username: null });
    expect(harness.logs).toContain("Stored session rejected: token expired or invalid");
  });

  test("waits for a login when nothing is stored", async () => {
    const harness = createHeadlessHarness({ stored: {} });

    await harness.boot();
    await flushAsync();
    expect(harness.orchestrator.connectionState).toBe("idle");
    expect(harness.validator.validatedTokens).toEqual([]);
    expect(harness.logs).toEqual(["No stored session; waiting for login"]);

    await harness.orchestrator.completeLogin(" grace ", "test-token");
    await flushAsync();

    expect(harness.dialer.dialCount).toBe(1);
    expect(harness.orchestrator.playerName).toBe("grace");
    expect(await harness.credentials.load()).toEqual({ token: "test-token", username: "grace" });
  });

  test("an in-memory session token wins over the stored one", async () => {
    const harness = createHeadlessHarness({ configuration: { sessionToken: "memory-token" } });

    await harness.boot();

    expect(harness.validator.validatedTokens).toEqual(["memory-token"]);
    expect(harness.orchestrator.sessionToken).toBe("memory-token");
  });

  test("a rejected configured token keeps the stored credentials", async () => {
    const harness = createHeadlessHarness({
      configuration: { sessionToken: "memory-token" },
      validation: { valid: false, reason: "token expired or invalid" },
    });

    await harness.boot();
    await flushAsync();

    expect(harness.orchestrator.connectionState).toBe("idle");
    expect(harness.dialer.dialCount).toBe(0);
    expect(harness.orchestrator.sessionToken).toBeNull();
    expect(await harness.credentials.load()).toEqual({ token: "test-token", username: "ada" });
    expect(harness.logs).toContain("Configured session rejected: token expired or invalid");
  });

  test("reconnects after the transport closes and repeats the initial requests", async () => {
    const harness = createHeadlessHarness();
    const first = await harness.connect();

    first.simulateDisconnect();
    const failed = harness.orchestrator.tick(0);
    expect(failed.connectionState).toBe("failed");
    expect(failed.status).toBe("Connection failed: connection lost (retrying in 2s)");

    harness.clock.advance(1999);
    harness.orchestrator.tick(0);
    await flushAsync();
    expect(harness.dialer.dialCount).toBe(1);

    harness.clock.advance(1);
    harness.orchestrator.tick(0);
    await flushAsync();
    const second = harness.dialer.succeed();
    await flushAsync();
    harness.orchestrator.tick(0);

    expect(harness.orchestrator.connectionState).toBe("connected");
    expect(second.sentMessages).toEqual(INITIAL_REQUESTS);
    expect(harness.logs).toContain("Session ready (attempt 2)");
  });

  test("a server logout stops the drain and returns to the signed-out state", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    transport.emit("Profile", { playerId: 1, name: "ada", gold: 10 });
    harness.orchestrator.tick(0);

    transport.emit("LoggedOut", null);
    transport.emit("Profile", { playerId: 1, name: "mallory", gold: 99 });
    const frame = harness.orchestrator.tick(0);
    await flushAsync();

    expect(frame.connectionState).toBe("idle");
    expect(frame.profile).toMatchObject({ playerId: null, name: "Player", gold: 0 });
    expect(transport.closeCalls).toBe(1);
    expect(await harness.credentials.load()).toEqual({ token: null, username: null });

    harness.clock.advance(10_000);
    harness.orchestrator.tick(0);
    await flushAsync();
    expect(harness.dialer.dialCount).toBe(1);
  });

  test("logout tells the server and clears the session", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();

    await harness.orchestrator.logout();

    expect(transport.sentTypes.at(-1)).toBe("Logout");
    expect(harness.orchestrator.connectionState).toBe("idle");
    expect(harness.orchestrator.sessionToken).toBeNull();
    expect(await harness.credentials.load()).toEqual({ token: null, username: null });
  });

  test("match commands are dropped while disconnected", () => {
    const harness = createHeadlessHarness();

    expect(harness.orchestrator.pauseGame()).toBe(false);
    expect(harness.orchestrator.surrenderMatch()).toBe(false);
  });

  test("match commands go out over the live transport", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();

    expect(harness.orchestrator.pauseGame()).toBe(true);
    expect(harness.orchestrator.resumeGame()).toBe(true);
    expect(harness.orchestrator.restartMatch()).toBe(true);

    expect(transport.sentTypes.slice(-3)).toEqual(["PauseGame", "ResumeGame", "RestartMatch"]);
  });

  test("pausing freezes the local clock before the server answers", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    startMatch(transport);
    harness.orchestrator.tick(0);

    expect(harness.orchestrator.pauseGame()).toBe(true);
    const paused = harness.orchestrator.tick(100);

    expect(transport.sentTypes.at(-1)).toBe("PauseGame");
    expect(paused.match.paused).toBe(true);
    expect(paused.simulatedMs).toBe(0);

    expect(harness.orchestrator.resumeGame()).toBe(true);
    const resumed = harness.orchestrator.tick(20);

    expect(transport.sentTypes.at(-1)).toBe("ResumeGame");
    expect(resumed.match.paused).toBe(false);
    expect(resumed.simulatedMs).toBe(20);
  });

  test("pause and resume are refused in a PvP room", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    transport.emit("RoomCreated", { roomId: "pvp-1" });
    startMatch(transport);
    harness.orchestrator.tick(0);

    expect(harness.orchestrator.pauseGame()).toBe(false);
    expect(harness.orchestrator.resumeGame()).toBe(false);
    const frame = harness.orchestrator.tick(20);

    expect(transport.sentTypes).toEqual(INITIAL_REQUESTS.map((request) => request.type));
    expect(frame.match.paused).toBe(false);
    expect(frame.simulatedMs).toBe(20);
  });
});

describe("GameClientOrchestrator match", () => {
  it("applies deltas and interpolates on the simulation clock", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    startMatch(transport);
    harness.orchestrator.tick(0);

    transport.emit("StateDelta", { unitsUpsert: [wireUnit({ x: 100 })] });
    const frame = harness.orchestrator.tick(20);

    expect(frame.match.active).toBe(true);
    expect(frame.world.units.get(1)?.targetX).toBe(100);
    expect(frame.world.units.get(1)?.x).toBeCloseTo(20);
    expect(frame.match.timerRemainingSeconds).toBeCloseTo(179.98);
    expect(frame.simulatedMs).toBe(20);
  });

  it("a server pause freezes every time-driven value and ignores deltas", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    startMatch(transport);
    harness.orchestrator.tick(0);

    transport.emit("StateDelta", { unitsUpsert: [wireUnit({ x: 100, hp: 60 })] });
    transport.emit("UnitSpawnEvent", { unitId: 2, unitX: 100, unitY: 200 });
    const hit = harness.orchestrator.tick(20);
    expect(hit.world.spawnAnimations.get(2)?.progress).toBeCloseTo(0.05);
    expect(hit.hpEffects.units.get(1)).toMatchObject({ lastHp: 60, flashRemainingMs: 600 });
    expect(hit.hpEffects.units.get(1)?.ghost.value).toBe(100);

    transport.emit("TimerUpdate", { remainingSeconds: 90, isPaused: true });
    transport.emit("StateDelta", { unitsUpsert: [wireUnit({ x: 300, hp: 10 })] });
    const paused = harness.orchestrator.tick(1000);

    expect(paused.match.paused).toBe(true);
    expect(paused.match.timerRemainingSeconds).toBe(90);
    expect(harness.orchestrator.ignoredDeltaCount).toBe(1);
    expect(paused.simulatedMs).toBe(20);
    expect(paused.world.units.get(1)).toMatchObject({ targetX: 100, hp: 60 });
    expect(paused.world.units.get(1)?.x).toBeCloseTo(20);
    expect(paused.hpEffects.units.get(1)?.flashRemainingMs).toBe(600);
    expect(paused.hpEffects.units.get(1)?.ghost.value).toBe(100);
    expect(paused.world.spawnAnimations.get(2)?.progress).toBeCloseTo(0.05);

    transport.emit("TimerUpdate", { remainingSeconds: 90, isPaused: false });
    const resumed = harness.orchestrator.tick(20);

    expect(resumed.match.paused).toBe(false);
    expect(resumed.world.units.get(1)?.x).toBeCloseTo(36);
    expect(resumed.hpEffects.units.get(1)?.flashRemainingMs).toBe(580);
    expect(resumed.world.spawnAnimations.get(2)?.progress).toBeCloseTo(0.1);
    expect(resumed.match.timerRemainingSeconds).toBeCloseTo(89.98);
  });

  it("leaving the room drops every trace of the match", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    transport.emit("RoomCreated", { roomId: "room-7" });
    startMatch(transport);
    transport.emit("UnitSpawnEvent", { unitId: 1, unitX: 0, unitY: 0 });
    transport.emit("StateDelta", {
      unitsUpsert: [wireUnit({ hp: 40 })],
      projectiles: [{ id: 5, x: 0, y: 0, tx: 0, ty: 500, active: true }],
    });
    const during = harness.orchestrator.tick(20);
    expect(during.hpEffects.units.size).toBe(1);
    expect(during.match.roomId).toBe("room-7");

    harness.orchestrator.leaveRoom();
    const after = harness.orchestrator.tick(0);

    expect(transport.sentTypes.at(-1)).toBe("LeaveRoom");
    expect(harness.worldState.counts()).toEqual({
      units: 0,
      bases: 0,
      projectiles: 0,
      inferredProjectiles: 0,
      spawnAnimations: 0,
    });
    expect(after.hpEffects.units.size).toBe(0);
    expect(after.hpEffects.bases.size).toBe(0);
    expect(after.match).toMatchObject({ roomId: null, active: false, gameOver: false });
  });

  it("reports a malformed payload and keeps draining", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();

    transport.emit("GoldUpdate", { playerId: 1, gold: "lots" });
    transport.emit("Profile", { playerId: 1, name: "ada", pvp_rating: 1500 });
    const frame = harness.orchestrator.tick(0);

    expect(harness.errors.map((error) => error.message)).toEqual([
      "Failed to handle GoldUpdate: GoldUpdate.gold must be a finite number.",
    ]);
    expect(frame.profile.pvpRating).toBe(1500);
  });

  it("tracks gold for the local player only", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    startMatch(transport);

    transport.emit("GoldUpdate", { playerId: 1, gold: 40 });
    transport.emit("GoldUpdate", { playerId: 2, gold: 99 });
    const frame = harness.orchestrator.tick(0);

    expect(frame.match.gold).toBe(40);
  });

  it("flags the end of a match once a base falls", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    startMatch(transport);
    expect(harness.orchestrator.tick(0).match.endActive).toBe(false);

    transport.emit("StateDelta", { bases: [wireBase({ ownerId: 2, y: 60, hp: 0 })] });
    const frame = harness.orchestrator.tick(0);

    expect(frame.match).toMatchObject({ endActive: true, endVictory: true });
  });

  it("mirrors the view in a PvP room when the local base sits at the top", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    transport.emit("RoomCreated", { roomId: "pvp-42" });
    transport.emit("MapDef", { Def: { id: "arena", obstacles: [{ x: 0.4, y: 0.4, width: 0.2, height: 0.2 }] } });
    transport.emit("Init", { playerId: 1 });
    transport.emit("StateDelta", { bases: [wireBase({ y: 60 }), wireBase({ ownerId: 2, y: 900 })] });

    const frame = harness.orchestrator.tick(0);

    expect(frame.view).toEqual({ pvp: true, mirrored: true });
    expect(harness.orchestrator.currentMapDefinition?.id).toBe("arena");
    expect(harness.worldState.isPointInObstacle(300, 500)).toBe(true);
  });

  it("forgets the map on leaving, so the next PvP room does not mirror without one", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    transport.emit("RoomCreated", { roomId: "pvp-42" });
    transport.emit("MapDef", { Def: { id: "arena", obstacles: [{ x: 0.4, y: 0.4, width: 0.2, height: 0.2 }] } });
    transport.emit("Init", { playerId: 1 });
    transport.emit("StateDelta", { bases: [wireBase({ y: 60 }), wireBase({ ownerId: 2, y: 900 })] });
    expect(harness.orchestrator.tick(0).view).toEqual({ pvp: true, mirrored: true });

    harness.orchestrator.leaveRoom();
    expect(harness.orchestrator.currentMapDefinition).toBeNull();
    expect(harness.worldState.isPointInObstacle(300, 500)).toBe(false);

    transport.emit("RoomCreated", { roomId: "pvp-43" });
    transport.emit("Init", { playerId: 1 });
    transport.emit("StateDelta", { bases: [wireBase({ y: 60 }), wireBase({ ownerId: 2, y: 900 })] });

    expect(harness.orchestrator.tick(0).view).toEqual({ pvp: true, mirrored: false });
  });

  it("keeps the normal orientation outside PvP rooms", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();
    transport.emit("RoomCreated", { roomId: "room-1" });
    transport.emit("Init", { playerId: 1 });
    transport.emit("StateDelta", { bases: [wireBase({ y: 60 }), wireBase({ ownerId: 2, y: 900 })] });

    expect(harness.orchestrator.tick(0).view).toEqual({ pvp: false, mirrored: false });
  });

  it("stores the lobby catalogues", async () => {
    const harness = createHeadlessHarness();
    const transport = await harness.connect();

    transport.emit("Minis", { items: [{ name: "Knight", class: "melee", cost: 3 }] });
    transport.emit("Maps", { items: [{ id: "forest", name: "Forest" }] });
    harness.orchestrator.tick(0);

    expect(harness.orchestrator.lobbyState.minis.map((mini) => mini.name)).toEqual(["Knight"]);
    expect(harness.orchestrator.lobbyState.maps.map((map) => map.id)).toEqual(["forest"]);
  });
});
