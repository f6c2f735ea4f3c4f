import { describe, expect, it, test } from "vitest";

import type { BaseState, ProjectileState, StateDelta, UnitState } from "../protocol";
import { InMemoryWorldStateStore } from "../world-state";

const STEP = 0.02;

const unit = (overrides: Partial<UnitState> & { readonly id: number }): UnitState => ({
  name: "Knight",
  x: 0,
  y: 0,
  hp: 100,
  maxHp: 100,
  ownerId: 1,
  facing: 0,
  unitClass: "melee",
  range: 0,
  particle: "",
  ...overrides,
});

const base = (overrides: Partial<BaseState> & { readonly ownerId: number }): BaseState => ({
  hp: 1000,
  maxHp: 1000,
  x: 0,
  y: 0,
  w: 40,
  h: 20,
  ...overrides,
});

const projectile = (overrides: Partial<ProjectileState> & { readonly id: number }): ProjectileState => ({
  x: 0,
  y: 0,
  targetX: 0,
  targetY: 100,
  damage: 10,
  ownerId: 1,
  targetId: 0,
  projectileType: "default",
  active: true,
  ...overrides,
});

const delta = (overrides: Partial<StateDelta>): StateDelta => ({
  tick: 0,
  unitsUpsert: [],
  unitsRemoved: [],
  projectiles: [],
  bases: [],
  ...overrides,
});

const renderedUnit = (store: InMemoryWorldStateStore, id: number) => store.snapshot().units.get(id);

describe("InMemoryWorldStateStore interpolation", () => {
  test("a unit first seen in a delta starts at its server position", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1, x: 120, y: 340 })] }));

    expect(renderedUnit(store, 1)).toMatchObject({ x: 120, y: 340, targetX: 120, targetY: 340 });
  });

  test("moves a fifth of the remaining distance per 20ms step", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1 })] }));
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1, x: 100, hp: 80 })] }));

    expect(renderedUnit(store, 1)).toMatchObject({ x: 0, targetX: 100, hp: 80 });
    store.step(STEP);
    expect(renderedUnit(store, 1)?.x).toBeCloseTo(20);
  });

  it("converges on the target without overshooting and then stays put", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1 })] }));
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1, x: 100, y: -50 })] }));

    for (let index = 0; index < 100; index += 1) {
      store.step(STEP);
      const current = renderedUnit(store, 1);
      expect(current?.x).toBeLessThanOrEqual(100);
      expect(current?.y).toBeGreaterThanOrEqual(-50);
    }

    expect(renderedUnit(store, 1)).toMatchObject({ x: 100, y: -50 });
    store.step(STEP);
    expect(renderedUnit(store, 1)).toMatchObject({ x: 100, y: -50 });
  });

  it("keeps the owner a unit was created with", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1, ownerId: 1 })] }));
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1, ownerId: 2, name: "Archer" })] }));

    expect(renderedUnit(store, 1)).toMatchObject({ ownerId: 1, name: "Archer" });
  });

  it("ignores non-positive step durations", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1 })] }));
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1, x: 100 })] }));

    store.step(0);

    expect(renderedUnit(store, 1)?.x).toBe(0);
  });
});

describe("InMemoryWorldStateStore spawn animations", () => {
  it("drops in from above, suppresses the unit and finishes after 0.4s", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 5 })] }));
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 5, x: 50 })] }));
    store.startSpawnAnimation({ unitId: 5, x: 50, y: 100, name: "Knight", unitClass: "melee", subclass: "", ownerId: 1 });

    expect(store.isSpawnSuppressed(5)).toBe(true);
    expect(store.snapshot().spawnAnimations.get(5)).toMatchObject({ y: 60, scale: 1.4, progress: 0 });

    store.step(0.2);
    const halfway = store.snapshot();
    const animation = halfway.spawnAnimations.get(5);
    expect(animation?.progress).toBe(0.5);
    expect(animation?.y).toBe(95);
    expect(animation?.scale).toBeCloseTo(1.05);
    expect(halfway.units.get(5)?.x).toBe(0);
    expect(halfway.suppressedUnitIds.has(5)).toBe(true);

    store.step(0.2);
    expect(store.isSpawnSuppressed(5)).toBe(false);
    expect(store.counts().spawnAnimations).toBe(0);

    store.step(STEP);
    expect(renderedUnit(store, 5)?.x).toBeCloseTo(10);
  });

  it("removing a unit removes its spawn animation", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 5 })] }));
    store.startSpawnAnimation({ unitId: 5, x: 0, y: 0, name: "", unitClass: "", subclass: "", ownerId: 1 });

    store.applyDelta(delta({ unitsRemoved: [5] }));

    expect(store.counts()).toMatchObject({ units: 0, spawnAnimations: 0 });
  });
});

describe("InMemoryWorldStateStore projectiles", () => {
  it("replaces projectiles only when a delta lists some, keeping active ones", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ projectiles: [projectile({ id: 1 }), projectile({ id: 2, active: false })] }));
    expect([...store.snapshot().projectiles.keys()]).toEqual([1]);

    store.applyDelta(delta({}));
    expect(store.counts().projectiles).toBe(1);

    store.applyDelta(delta({ projectiles: [projectile({ id: 3 })] }));
    expect([...store.snapshot().projectiles.keys()]).toEqual([3]);
  });

  it("flies at 400px/s and disappears on arrival", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ projectiles: [projectile({ id: 1, targetY: 100 })] }));

    store.step(STEP);
    expect(store.snapshot().projectiles.get(1)?.y).toBeCloseTo(8);

    for (let index = 0; index < 11; index += 1) {
      store.step(STEP);
    }
    expect(store.snapshot().projectiles.get(1)?.y).toBeCloseTo(96);

    store.step(STEP);
    expect(store.counts().projectiles).toBe(0);
  });
});

describe("InMemoryWorldStateStore projectile inference", () => {
  const archer = (overrides: Partial<UnitState> = {}): UnitState =>
    unit({ id: 1, name: "Fire Archer", unitClass: "Range", range: 100, ...overrides });

  it("aims ranged units at the nearest living enemy", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(
      delta({
        unitsUpsert: [
          archer(),
          unit({ id: 2, ownerId: 2, y: 80 }),
          unit({ id: 3, ownerId: 2, y: 50 }),
          unit({ id: 4, ownerId: 2, y: 20, hp: 0 }),
          unit({ id: 5, ownerId: 1, y: 15 }),
        ],
      }),
    );

    store.step(STEP);

    expect(store.snapshot().inferredProjectiles).toEqual([
      { unitId: 1, sourceX: 0, sourceY: 0, targetX: 0, targetY: 50, projectileType: "fire" },
    ]);
  });

  it("falls back to the opposing base centre, then the screen centre", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(
      delta({
        unitsUpsert: [archer({ range: 1000, name: "Frost Witch" })],
        bases: [base({ ownerId: 1, x: 500, y: 500 }), base({ ownerId: 2, x: 200, y: 0 })],
      }),
    );
    store.step(STEP);
    expect(store.snapshot().inferredProjectiles[0]).toMatchObject({ targetX: 220, targetY: 10, projectileType: "frost" });

    const lonely = new InMemoryWorldStateStore();
    lonely.applyDelta(delta({ unitsUpsert: [archer({ range: 1000, name: "Scout" })] }));
    lonely.step(STEP);
    expect(lonely.snapshot().inferredProjectiles[0]).toMatchObject({ targetX: 300, targetY: 500, projectileType: "default" });
  });

  it("skips targets out of range or too close, melee units and dead archers", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(
      delta({
        unitsUpsert: [
          archer({ id: 1, range: 30 }),
          archer({ id: 2, x: 300, range: 100, hp: 0 }),
          unit({ id: 3, x: 305, ownerId: 1, range: 100 }),
          unit({ id: 9, ownerId: 2, y: 50 }),
        ],
      }),
    );
    store.step(STEP);
    expect(store.snapshot().inferredProjectiles).toEqual([]);

    const close = new InMemoryWorldStateStore();
    close.applyDelta(delta({ unitsUpsert: [archer(), unit({ id: 9, ownerId: 2, y: 8 })] }));
    close.step(STEP);
    expect(close.snapshot().inferredProjectiles).toEqual([]);
  });

  it("infers nothing while the server streams projectiles", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(
      delta({
        unitsUpsert: [archer(), unit({ id: 2, ownerId: 2, y: 50 })],
        projectiles: [projectile({ id: 7, targetY: 1000 })],
      }),
    );
    store.step(STEP);
    expect(store.snapshot().inferredProjectiles).toEqual([]);
  });
});

describe("InMemoryWorldStateStore lifecycle", () => {
  it("a full snapshot replaces units and bases", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1 })], bases: [base({ ownerId: 1 })] }));

    store.applySnapshot({ tick: 9, units: [unit({ id: 2, x: 40 })], bases: [base({ ownerId: 2 })] });

    const snapshot = store.snapshot();
    expect([...snapshot.units.keys()]).toEqual([2]);
    expect(snapshot.units.get(2)).toMatchObject({ x: 40, targetX: 40 });
    expect([...snapshot.bases.keys()]).toEqual([2]);
  });

  it("upserts bases by owner", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ bases: [base({ ownerId: 1 }), base({ ownerId: 2 })] }));
    store.applyDelta(delta({ bases: [base({ ownerId: 2, hp: 400 })] }));

    expect(store.snapshot().bases.get(2)?.hp).toBe(400);
    expect(store.counts().bases).toBe(2);
  });

  it("reset empties every match map but keeps the map layout", () => {
    const store = new InMemoryWorldStateStore();
    store.setMapLayout({ id: "forest", obstacles: [{ x: 0.1, y: 0.1, width: 0.1, height: 0.1, type: "rock" }], lanes: [] });
    store.applyDelta(
      delta({
        unitsUpsert: [unit({ id: 1, unitClass: "range", range: 900 })],
        bases: [base({ ownerId: 2 })],
        projectiles: [projectile({ id: 1 })],
      }),
    );
    store.startSpawnAnimation({ unitId: 1, x: 0, y: 0, name: "", unitClass: "", subclass: "", ownerId: 1 });

    store.reset();

    expect(store.counts()).toEqual({ units: 0, bases: 0, projectiles: 0, inferredProjectiles: 0, spawnAnimations: 0 });
    expect(store.isPointInObstacle(90, 150)).toBe(true);
  });

  it("tests points against obstacles scaled to the 600x1000 screen", () => {
    const store = new InMemoryWorldStateStore();
    expect(store.isPointInObstacle(90, 150)).toBe(false);

    store.setMapLayout({ id: "forest", obstacles: [{ x: 0.1, y: 0.1, width: 0.1, height: 0.1, type: "" }], lanes: [] });

    expect(store.isPointInObstacle(90, 150)).toBe(true);
    expect(store.isPointInObstacle(10, 10)).toBe(false);
  });

  it("hands out snapshots that later steps do not touch", () => {
    const store = new InMemoryWorldStateStore();
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1 })] }));
    store.applyDelta(delta({ unitsUpsert: [unit({ id: 1, x: 100 })] }));
    const before = store.snapshot();

    store.step(STEP);

    expect(before.units.get(1)?.x).toBe(0);
  });
});
