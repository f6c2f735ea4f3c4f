import type {
  BaseState,
  FullSnapshot,
  MapLane,
  MapObstacle,
  StateDelta,
  UnitSpawnEvent,
  UnitState,
} from "./protocol";
import {
  DEFAULT_PROJECTILE_TYPES,
  resolveProjectileType,
  type ProjectileTypeTable,
} from "./projectile-types";

export const SCREEN_WIDTH = 600;
export const SCREEN_HEIGHT = 1000;

const LERP_RATE_PER_SECOND = 10;
const SNAP_DISTANCE = 0.01;
const PROJECTILE_SPEED = 400;
const PROJECTILE_ARRIVAL_DISTANCE = 5;
const SPAWN_DURATION_SECONDS = 0.4;
const SPAWN_DROP_HEIGHT = 40;
const SPAWN_START_SCALE = 1.4;
const SPAWN_END_SCALE = 1.0;
const INFERRED_MIN_DISTANCE = 10;

type Writable<T> = { -readonly [K in keyof T]: T[K] };

export interface RenderUnit {
  readonly id: number;
  readonly name: string;
  readonly unitClass: string;
  readonly ownerId: number;
  readonly range: number;
  readonly particle: string;
  readonly facing: number;
  readonly hp: number;
  readonly maxHp: number;
  /** Last authoritative position. */
  readonly targetX: number;
  readonly targetY: number;
  /** Smoothed position the renderer draws. */
  readonly x: number;
  readonly y: number;
}

export interface Projectile {
  readonly id: number;
  readonly x: number;
  readonly y: number;
  readonly targetX: number;
  readonly targetY: number;
  readonly damage: number;
  readonly ownerId: number;
  readonly targetId: number;
  readonly projectileType: string;
  readonly active: boolean;
}

export interface InferredProjectile {
  readonly unitId: number;
  readonly sourceX: number;
  readonly sourceY: number;
  readonly targetX: number;
  readonly targetY: number;
  readonly projectileType: string;
}

export interface SpawnAnimation {
  readonly unitId: number;
  readonly name: string;
  readonly unitClass: string;
  readonly subclass: string;
  readonly startX: number;
  readonly startY: number;
  readonly targetX: number;
  readonly targetY: number;
  readonly x: number;
  readonly y: number;
  readonly startScale: number;
  readonly endScale: number;
  readonly scale: number;
  readonly progress: number;
  readonly durationSeconds: number;
  readonly active: boolean;
}

export interface MapLayout {
  readonly id: string;
  readonly obstacles: readonly MapObstacle[];
  readonly lanes: readonly MapLane[];
}

export interface WorldStateSnapshot {
  readonly units: ReadonlyMap<number, RenderUnit>;
  readonly bases: ReadonlyMap<number, BaseState>;
  readonly projectiles: ReadonlyMap<number, Projectile>;
  readonly inferredProjectiles: readonly InferredProjectile[];
  readonly spawnAnimations: ReadonlyMap<number, SpawnAnimation>;
  readonly suppressedUnitIds: ReadonlySet<number>;
  readonly mapLayout: MapLayout | null;
}

export interface WorldStateCounts {
  readonly units: number;
  readonly bases: number;
  readonly projectiles: number;
  readonly inferredProjectiles: number;
  readonly spawnAnimations: number;
}

export interface WorldStateStore {
  readonly snapshot: () => WorldStateSnapshot;
  readonly counts: () => WorldStateCounts;
  readonly applySnapshot: (snapshot: FullSnapshot) => void;
  readonly applyDelta: (delta: StateDelta) => void;
  readonly startSpawnAnimation: (event: UnitSpawnEvent) => void;
  readonly isSpawnSuppressed: (unitId: number) => boolean;
  readonly step: (dtSeconds: number) => void;
  readonly setMapLayout: (layout: MapLayout | null) => void;
  readonly isPointInObstacle: (x: number, y: number) => boolean;
  readonly reset: () => void;
}

export interface WorldStateOptions {
  readonly screenWidth?: number;
  readonly screenHeight?: number;
  readonly projectileTypes?: ProjectileTypeTable;
}

const createRenderUnit = (state: UnitState): Writable<RenderUnit> => ({
  id: state.id,
  name: state.name,
  unitClass: state.unitClass,
  ownerId: state.ownerId,
  range: state.range,
  particle: state.particle,
  facing: state.facing,
  hp: state.hp,
  maxHp: state.maxHp,
  targetX: state.x,
  targetY: state.y,
  x: state.x,
  y: state.y,
});

const easeOutCubic = (t: number): number => 1 - Math.pow(1 - t, 3);

const distanceBetween = (ax: number, ay: number, bx: number, by: number): number =>
  Math.hypot(bx - ax, by - ay);

/**
 * Client mirror of the match. Authoritative values are copied in verbatim from
 * snapshots and deltas; rendered positions, spawn animations and projectiles
 * advance only through {@link InMemoryWorldStateStore.step}.
 */
export class InMemoryWorldStateStore implements WorldStateStore {
  private units = new Map<number, Writable<RenderUnit>>();
  private bases = new Map<number, BaseState>();
  private projectiles = new Map<number, Writable<Projectile>>();
  private inferredProjectiles: InferredProjectile[] = [];
  private spawnAnimations = new Map<number, Writable<SpawnAnimation>>();
  private mapLayout: MapLayout | null = null;
  private readonly screenWidth: number;
  private readonly screenHeight: number;
  private readonly projectileTypes: ProjectileTypeTable;

  constructor(options: WorldStateOptions = {}) {
    this.screenWidth = options.screenWidth ?? SCREEN_WIDTH;
    this.screenHeight = options.screenHeight ?? SCREEN_HEIGHT;
    this.projectileTypes = options.projectileTypes ?? DEFAULT_PROJECTILE_TYPES;
  }

  snapshot(): WorldStateSnapshot {
    const units = new Map<number, RenderUnit>();
    for (const [id, unit] of this.units) {
      units.set(id, { ...unit });
    }
    const projectiles = new Map<number, Projectile>();
    for (const [id, projectile] of this.projectiles) {
      projectiles.set(id, { ...projectile });
    }
    const spawnAnimations = new Map<number, SpawnAnimation>();
    const suppressedUnitIds = new Set<number>();
    for (const [id, animation] of this.spawnAnimations) {
      spawnAnimations.set(id, { ...animation });
      if (animation.active) {
        suppressedUnitIds.add(id);
      }
    }

    return {
      units,
      bases: new Map(this.bases),
      projectiles,
      inferredProjectiles: this.inferredProjectiles.map((entry) => ({ ...entry })),
      spawnAnimations,
      suppressedUnitIds,
      mapLayout: this.mapLayout,
    };
  }

  counts(): WorldStateCounts {
    return {
      units: this.units.size,
      bases: this.bases.size,
      projectiles: this.projectiles.size,
      inferredProjectiles: this.inferredProjectiles.length,
      spawnAnimations: this.spawnAnimations.size,
    };
  }

  applySnapshot(snapshot: FullSnapshot): void {
    this.units = new Map();
    for (const state of snapshot.units) {
      this.units.set(state.id, createRenderUnit(state));
    }
    this.bases = new Map();
    for (const base of snapshot.bases) {
      this.bases.set(base.ownerId, base);
    }
  }

  applyDelta(delta: StateDelta): void {
    for (const state of delta.unitsUpsert) {
      const existing = this.units.get(state.id);
      if (!existing) {
        this.units.set(state.id, createRenderUnit(state));
        continue;
      }
      existing.targetX = state.x;
      existing.targetY = state.y;
      existing.hp = state.hp;
      existing.maxHp = state.maxHp;
      existing.name = state.name;
      existing.unitClass = state.unitClass;
      existing.range = state.range;
      existing.particle = state.particle;
      existing.facing = state.facing;
    }

    for (const id of delta.unitsRemoved) {
      this.units.delete(id);
      this.spawnAnimations.delete(id);
    }

    if (delta.projectiles.length > 0) {
      this.projectiles = new Map();
      for (const projectile of delta.projectiles) {
        if (projectile.active) {
          this.projectiles.set(projectile.id, { ...projectile });
        }
      }
    }

    for (const base of delta.bases) {
      this.bases.set(base.ownerId, base);
    }
  }

  startSpawnAnimation(event: UnitSpawnEvent): void {
    const startY = event.y - SPAWN_DROP_HEIGHT;
    this.spawnAnimations.set(event.unitId, {
      unitId: event.unitId,
      name: event.name,
      unitClass: event.unitClass,
      subclass: event.subclass,
      startX: event.x,
      startY,
      targetX: event.x,
      targetY: event.y,
      x: event.x,
      y: startY,
      startScale: SPAWN_START_SCALE,
      endScale: SPAWN_END_SCALE,
      scale: SPAWN_START_SCALE,
      progress: 0,
      durationSeconds: SPAWN_DURATION_SECONDS,
      active: true,
    });
  }

  isSpawnSuppressed(unitId: number): boolean {
    return this.spawnAnimations.get(unitId)?.active === true;
  }

  step(dtSeconds: number): void {
    if (!Number.isFinite(dtSeconds) || dtSeconds <= 0) {
      return;
    }
    this.stepUnits(dtSeconds);
    this.stepSpawnAnimations(dtSeconds);
    this.stepProjectiles(dtSeconds);
    this.inferProjectiles();
  }

  setMapLayout(layout: MapLayout | null): void {
    this.mapLayout = layout;
  }

  isPointInObstacle(x: number, y: number): boolean {
    if (!this.mapLayout) {
      return false;
    }
    return this.mapLayout.obstacles.some((obstacle) => {
      const left = obstacle.x * this.screenWidth;
      const top = obstacle.y * this.screenHeight;
      const right = left + obstacle.width * this.screenWidth;
      const bottom = top + obstacle.height * this.screenHeight;
      return x >= left && x <= right && y >= top && y <= bottom;
    });
  }

  /** Drops every match entity. The map layout belongs to the map and is kept. */
  reset(): void {
    this.units = new Map();
    this.bases = new Map();
    this.projectiles = new Map();
    this.inferredProjectiles = [];
    this.spawnAnimations = new Map();
  }

  private stepUnits(dtSeconds: number): void {
    const fraction = Math.min(1, LERP_RATE_PER_SECOND * dtSeconds);
    for (const unit of this.units.values()) {
      if (this.isSpawnSuppressed(unit.id)) {
        continue;
      }
      if (unit.x === unit.targetX && unit.y === unit.targetY) {
        continue;
      }
      unit.x += (unit.targetX - unit.x) * fraction;
      unit.y += (unit.targetY - unit.y) * fraction;
      if (distanceBetween(unit.x, unit.y, unit.targetX, unit.targetY) < SNAP_DISTANCE) {
        unit.x = unit.targetX;
        unit.y = unit.targetY;
      }
    }
  }

  private stepSpawnAnimations(dtSeconds: number): void {
    for (const [id, animation] of this.spawnAnimations) {
      if (!animation.active) {
        this.spawnAnimations.delete(id);
        continue;
      }
      animation.progress = Math.min(1, animation.progress + dtSeconds / animation.durationSeconds);
      if (animation.progress >= 1) {
        this.spawnAnimations.delete(id);
        continue;
      }
      const eased = easeOutCubic(animation.progress);
      animation.scale = animation.startScale + (animation.endScale - animation.startScale) * eased;
      animation.x = animation.startX + (animation.targetX - animation.startX) * eased;
      animation.y = animation.startY + (animation.targetY - animation.startY) * eased;
    }
  }

  private stepProjectiles(dtSeconds: number): void {
    const travel = PROJECTILE_SPEED * dtSeconds;
    for (const [id, projectile] of this.projectiles) {
      const dx = projectile.targetX - projectile.x;
      const dy = projectile.targetY - projectile.y;
      const distance = Math.hypot(dx, dy);
      if (distance <= PROJECTILE_ARRIVAL_DISTANCE || distance <= travel) {
        this.projectiles.delete(id);
        continue;
      }
      projectile.x += (dx / distance) * travel;
      projectile.y += (dy / distance) * travel;
    }
  }

  private inferProjectiles(): void {
    const inferred: InferredProjectile[] = [];
    if (this.projectiles.size === 0) {
      for (const unit of this.units.values()) {
        if (unit.unitClass.toLowerCase() !== "range" || unit.hp <= 0 || this.isSpawnSuppressed(unit.id)) {
          continue;
        }
        const target = this.findTargetForUnit(unit);
        const distance = distanceBetween(unit.x, unit.y, target.x, target.y);
        if (distance > INFERRED_MIN_DISTANCE && distance <= unit.range) {
          inferred.push({
            unitId: unit.id,
            sourceX: unit.x,
            sourceY: unit.y,
            targetX: target.x,
            targetY: target.y,
            projectileType: resolveProjectileType(unit.name, this.projectileTypes),
          });
        }
      }
    }
    this.inferredProjectiles = inferred;
  }

  private findTargetForUnit(unit: RenderUnit): { readonly x: number; readonly y: number } {
    let nearest: RenderUnit | null = null;
    let nearestDistance = Number.POSITIVE_INFINITY;
    for (const candidate of this.units.values()) {
      if (candidate.ownerId === unit.ownerId || candidate.hp <= 0) {
        continue;
      }
      const distance = distanceBetween(unit.x, unit.y, candidate.x, candidate.y);
      if (distance < nearestDistance) {
        nearest = candidate;
        nearestDistance = distance;
      }
    }
    if (nearest) {
      return { x: nearest.x, y: nearest.y };
    }

    for (const base of this.bases.values()) {
      if (base.ownerId !== unit.ownerId) {
        return { x: base.x + base.w / 2, y: base.y + base.h / 2 };
      }
    }

    return { x: this.screenWidth / 2, y: this.screenHeight / 2 };
  }
}
