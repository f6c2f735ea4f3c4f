export const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readFiniteNumber = (value: unknown, context: string): number => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${context} must be a finite number.`);
  }
  return value;
};

const readOptionalFiniteNumber = (value: unknown, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) ? value : fallback;

export const readString = (value: unknown, context: string): string => {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${context} must be a non-empty string.`);
  }
  return value;
};

const readOptionalString = (value: unknown): string => (typeof value === "string" ? value : "");

const readOptionalBoolean = (value: unknown): boolean => value === true;

const readRecord = (value: unknown, context: string): Record<string, unknown> => {
  if (!isObject(value)) {
    throw new Error(`${context} must be an object.`);
  }
  return value;
};

// Empty lists arrive as null from the server.
const mapArray = <T>(
  value: unknown,
  context: string,
  mapper: (entry: unknown, entryContext: string) => T,
): readonly T[] => {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`${context} must be an array.`);
  }
  return value.map((entry, index) => mapper(entry, `${context}[${index}]`));
};

export interface UnitState {
  readonly id: number;
  readonly name: string;
  readonly x: number;
  readonly y: number;
  readonly hp: number;
  readonly maxHp: number;
  readonly ownerId: number;
  readonly facing: number;
  readonly unitClass: string;
  readonly range: number;
  readonly particle: string;
}

export interface BaseState {
  readonly ownerId: number;
  readonly hp: number;
  readonly maxHp: number;
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

export interface ProjectileState {
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

export interface StateDelta {
  readonly tick: number;
  readonly unitsUpsert: readonly UnitState[];
  readonly unitsRemoved: readonly number[];
  readonly projectiles: readonly ProjectileState[];
  readonly bases: readonly BaseState[];
}

export interface FullSnapshot {
  readonly tick: number;
  readonly units: readonly UnitState[];
  readonly bases: readonly BaseState[];
}

export interface MiniCardView {
  readonly name: string;
  readonly portrait: string;
  readonly cost: number;
  readonly unitClass: string;
}

export interface InitMessage {
  readonly playerId: number;
  readonly mapWidth: number;
  readonly mapHeight: number;
  readonly hand: readonly MiniCardView[];
  readonly next: MiniCardView | null;
  readonly tick: number;
}

export interface HandUpdate {
  readonly hand: readonly MiniCardView[];
  readonly next: MiniCardView | null;
}

export interface GoldUpdate {
  readonly playerId: number;
  readonly gold: number;
}

export interface TimerUpdate {
  readonly remainingSeconds: number;
  readonly isPaused: boolean;
}

export interface UnitSpawnEvent {
  readonly unitId: number;
  readonly x: number;
  readonly y: number;
  readonly name: string;
  readonly unitClass: string;
  readonly subclass: string;
  readonly ownerId: number;
}

export interface MapPoint {
  readonly x: number;
  readonly y: number;
}

/** Obstacle rectangle in normalized (0..1) map coordinates. */
export interface MapObstacle {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly type: string;
}

export interface MapLane {
  readonly points: readonly MapPoint[];
  readonly direction: number;
}

export interface MapDefinition {
  readonly id: string;
  readonly name: string;
  readonly obstacles: readonly MapObstacle[];
  readonly lanes: readonly MapLane[];
  readonly isArena: boolean;
  readonly timeLimitSeconds: number | null;
}

export interface ProfileMessage {
  readonly playerId: number;
  readonly name: string;
  readonly gold: number;
  readonly accountXp: number;
  readonly pvpRating: number;
  readonly pvpRank: string;
  readonly avatar: string;
  readonly guildId: string;
}

export interface MiniInfo {
  readonly name: string;
  readonly unitClass: string;
  readonly subclass: string;
  readonly role: string;
  readonly cost: number;
}

export interface MapInfo {
  readonly id: string;
  readonly name: string;
  readonly description: string;
}

export interface RoomCreated {
  readonly roomId: string;
}

export interface GameOverMessage {
  readonly winnerId: number;
  readonly reason: string;
}

export interface VictoryEvent {
  readonly winnerId: number;
  readonly winnerName: string;
  readonly matchType: string;
  readonly durationSeconds: number;
  readonly goldEarned: number;
  readonly xpGained: number;
}

export interface DefeatEvent {
  readonly loserId: number;
  readonly loserName: string;
  readonly winnerId: number;
  readonly winnerName: string;
  readonly matchType: string;
  readonly durationSeconds: number;
}

export interface ServerError {
  readonly code: string;
  readonly message: string;
}

export const normalizeUnitState = (value: unknown, context: string): UnitState => {
  const record = readRecord(value, context);
  return {
    id: readFiniteNumber(record.id, `${context}.id`),
    name: readOptionalString(record.name),
    x: readFiniteNumber(record.x, `${context}.x`),
    y: readFiniteNumber(record.y, `${context}.y`),
    hp: readFiniteNumber(record.hp, `${context}.hp`),
    maxHp: readOptionalFiniteNumber(record.maxHp, 0),
    ownerId: readFiniteNumber(record.ownerId, `${context}.ownerId`),
    facing: readOptionalFiniteNumber(record.facing, 0),
    unitClass: readOptionalString(record.class),
    range: readOptionalFiniteNumber(record.range, 0),
    particle: readOptionalString(record.particle),
  };
};

export const normalizeBaseState = (value: unknown, context: string): BaseState => {
  const record = readRecord(value, context);
  return {
    ownerId: readFiniteNumber(record.ownerId, `${context}.ownerId`),
    hp: readFiniteNumber(record.hp, `${context}.hp`),
    maxHp: readOptionalFiniteNumber(record.maxHp, 0),
    x: readFiniteNumber(record.x, `${context}.x`),
    y: readFiniteNumber(record.y, `${context}.y`),
    w: readOptionalFiniteNumber(record.w, 0),
    h: readOptionalFiniteNumber(record.h, 0),
  };
};

export const normalizeProjectileState = (value: unknown, context: string): ProjectileState => {
  const record = readRecord(value, context);
  return {
    id: readFiniteNumber(record.id, `${context}.id`),
    x: readFiniteNumber(record.x, `${context}.x`),
    y: readFiniteNumber(record.y, `${context}.y`),
    targetX: readFiniteNumber(record.tx, `${context}.tx`),
    targetY: readFiniteNumber(record.ty, `${context}.ty`),
    damage: readOptionalFiniteNumber(record.damage, 0),
    ownerId: readOptionalFiniteNumber(record.ownerId, 0),
    targetId: readOptionalFiniteNumber(record.targetId, 0),
    projectileType: readOptionalString(record.projectileType),
    active: readOptionalBoolean(record.active),
  };
};

export const normalizeStateDelta = (value: unknown, context: string): StateDelta => {
  const record = readRecord(value, context);
  return {
    tick: readOptionalFiniteNumber(record.tick, 0),
    unitsUpsert: mapArray(record.unitsUpsert, `${context}.unitsUpsert`, normalizeUnitState),
    unitsRemoved: mapArray(record.unitsRemoved, `${context}.unitsRemoved`, readFiniteNumber),
    projectiles: mapArray(record.projectiles, `${context}.projectiles`, normalizeProjectileState),
    bases: mapArray(record.bases, `${context}.bases`, normalizeBaseState),
  };
};

export const normalizeFullSnapshot = (value: unknown, context: string): FullSnapshot => {
  const record = readRecord(value, context);
  return {
    tick: readOptionalFiniteNumber(record.tick, 0),
    units: mapArray(record.units, `${context}.units`, normalizeUnitState),
    bases: mapArray(record.bases, `${context}.bases`, normalizeBaseState),
  };
};

const normalizeMiniCardView = (value: unknown, context: string): MiniCardView => {
  const record = readRecord(value, context);
  return {
    name: readOptionalString(record.name),
    portrait: readOptionalString(record.portrait),
    cost: readOptionalFiniteNumber(record.cost, 0),
    unitClass: readOptionalString(record.class),
  };
};

const normalizeNextCard = (value: unknown, context: string): MiniCardView | null => {
  if (!isObject(value)) {
    return null;
  }
  const card = normalizeMiniCardView(value, context);
  return card.name.length > 0 ? card : null;
};

export const normalizeInit = (value: unknown, context: string): InitMessage => {
  const record = readRecord(value, context);
  return {
    playerId: readFiniteNumber(record.playerId, `${context}.playerId`),
    mapWidth: readOptionalFiniteNumber(record.mapWidth, 0),
    mapHeight: readOptionalFiniteNumber(record.mapHeight, 0),
    hand: mapArray(record.hand, `${context}.hand`, normalizeMiniCardView),
    next: normalizeNextCard(record.next, `${context}.next`),
    tick: readOptionalFiniteNumber(record.tick, 0),
  };
};

export const normalizeHandUpdate = (value: unknown, context: string): HandUpdate => {
  const record = readRecord(value, context);
  return {
    hand: mapArray(record.hand, `${context}.hand`, normalizeMiniCardView),
    next: normalizeNextCard(record.next, `${context}.next`),
  };
};

export const normalizeGoldUpdate = (value: unknown, context: string): GoldUpdate => {
  const record = readRecord(value, context);
  return {
    playerId: readFiniteNumber(record.playerId, `${context}.playerId`),
    gold: readFiniteNumber(record.gold, `${context}.gold`),
  };
};

export const normalizeTimerUpdate = (value: unknown, context: string): TimerUpdate => {
  const record = readRecord(value, context);
  return {
    remainingSeconds: Math.max(0, readFiniteNumber(record.remainingSeconds, `${context}.remainingSeconds`)),
    isPaused: readOptionalBoolean(record.isPaused),
  };
};

export const normalizeUnitSpawnEvent = (value: unknown, context: string): UnitSpawnEvent => {
  const record = readRecord(value, context);
  return {
    unitId: readFiniteNumber(record.unitId, `${context}.unitId`),
    x: readFiniteNumber(record.unitX, `${context}.unitX`),
    y: readFiniteNumber(record.unitY, `${context}.unitY`),
    name: readOptionalString(record.unitName),
    unitClass: readOptionalString(record.unitClass),
    subclass: readOptionalString(record.unitSubclass),
    ownerId: readOptionalFiniteNumber(record.ownerId, 0),
  };
};

const normalizeMapPoint = (value: unknown, context: string): MapPoint => {
  const record = readRecord(value, context);
  return {
    x: readFiniteNumber(record.x, `${context}.x`),
    y: readFiniteNumber(record.y, `${context}.y`),
  };
};

const normalizeMapObstacle = (value: unknown, context: string): MapObstacle => {
  const record = readRecord(value, context);
  return {
    x: readFiniteNumber(record.x, `${context}.x`),
    y: readFiniteNumber(record.y, `${context}.y`),
    width: readFiniteNumber(record.width, `${context}.width`),
    height: readFiniteNumber(record.height, `${context}.height`),
    type: readOptionalString(record.type),
  };
};

const normalizeMapLane = (value: unknown, context: string): MapLane => {
  const record = readRecord(value, context);
  return {
    points: mapArray(record.points, `${context}.points`, normalizeMapPoint),
    direction: readOptionalFiniteNumber(record.dir, 1),
  };
};

/** Accepts the `{ Def: {...} }` wrapper the server sends as well as a bare definition. */
export const normalizeMapDefinition = (value: unknown, context: string): MapDefinition => {
  const outer = readRecord(value, context);
  const wrapped = outer.Def ?? outer.def;
  const record = wrapped === undefined ? outer : readRecord(wrapped, `${context}.Def`);
  const timeLimit = readOptionalFiniteNumber(record.timeLimit, 0);
  return {
    id: readOptionalString(record.id),
    name: readOptionalString(record.name),
    obstacles: mapArray(record.obstacles, `${context}.obstacles`, normalizeMapObstacle),
    lanes: mapArray(record.lanes, `${context}.lanes`, normalizeMapLane),
    isArena: readOptionalBoolean(record.isArena),
    timeLimitSeconds: timeLimit > 0 ? timeLimit : null,
  };
};

export const normalizeProfile = (value: unknown, context: string): ProfileMessage => {
  const record = readRecord(value, context);
  return {
    playerId: readOptionalFiniteNumber(record.playerId, 0),
    name: readOptionalString(record.name).trim(),
    gold: readOptionalFiniteNumber(record.gold, 0),
    accountXp: readOptionalFiniteNumber(record.accountXp, 0),
    pvpRating: readOptionalFiniteNumber(record.pvp_rating, 0),
    pvpRank: readOptionalString(record.pvp_rank),
    avatar: readOptionalString(record.avatar),
    guildId: readOptionalString(record.guildId),
  };
};

const normalizeMiniInfo = (value: unknown, context: string): MiniInfo => {
  const record = readRecord(value, context);
  return {
    name: readString(record.name, `${context}.name`),
    unitClass: readOptionalString(record.class),
    subclass: readOptionalString(record.subclass),
    role: readOptionalString(record.role),
    cost: readOptionalFiniteNumber(record.cost, 0),
  };
};

const normalizeMapInfo = (value: unknown, context: string): MapInfo => {
  const record = readRecord(value, context);
  return {
    id: readString(record.id, `${context}.id`),
    name: readOptionalString(record.name),
    description: readOptionalString(record.desc),
  };
};

export const normalizeMinis = (value: unknown, context: string): readonly MiniInfo[] =>
  mapArray(readRecord(value, context).items, `${context}.items`, normalizeMiniInfo);

export const normalizeMaps = (value: unknown, context: string): readonly MapInfo[] =>
  mapArray(readRecord(value, context).items, `${context}.items`, normalizeMapInfo);

export const normalizeRoomCreated = (value: unknown, context: string): RoomCreated => {
  const record = readRecord(value, context);
  return { roomId: readString(record.roomId, `${context}.roomId`) };
};

export const normalizeGameOver = (value: unknown, context: string): GameOverMessage => {
  const record = readRecord(value, context);
  return {
    winnerId: readOptionalFiniteNumber(record.winner_id, 0),
    reason: readOptionalString(record.reason),
  };
};

export const normalizeVictoryEvent = (value: unknown, context: string): VictoryEvent => {
  const record = readRecord(value, context);
  return {
    winnerId: readFiniteNumber(record.winnerId, `${context}.winnerId`),
    winnerName: readOptionalString(record.winnerName),
    matchType: readOptionalString(record.matchType),
    durationSeconds: readOptionalFiniteNumber(record.duration, 0),
    goldEarned: readOptionalFiniteNumber(record.goldEarned, 0),
    xpGained: readOptionalFiniteNumber(record.xpGained, 0),
  };
};

export const normalizeDefeatEvent = (value: unknown, context: string): DefeatEvent => {
  const record = readRecord(value, context);
  return {
    loserId: readFiniteNumber(record.loserId, `${context}.loserId`),
    loserName: readOptionalString(record.loserName),
    winnerId: readOptionalFiniteNumber(record.winnerId, 0),
    winnerName: readOptionalString(record.winnerName),
    matchType: readOptionalString(record.matchType),
    durationSeconds: readOptionalFiniteNumber(record.duration, 0),
  };
};

export const normalizeServerError = (value: unknown, context: string): ServerError => {
  if (typeof value === "string") {
    return { code: "", message: value };
  }
  const record = readRecord(value, context);
  return {
    code: readOptionalString(record.code),
    message: readString(record.message, `${context}.message`),
  };
};

/** Payloads that carry nothing the client reads. */
export const ignorePayload = (): null => null;

type EmptyPayload = Record<string, never>;

/** Outbound messages, keyed by envelope type. */
export interface ClientMessageMap {
  readonly SetName: { readonly name: string };
  readonly GetProfile: EmptyPayload;
  readonly ListMinis: EmptyPayload;
  readonly ListMaps: EmptyPayload;
  readonly GetGuild: EmptyPayload;
  readonly GetFriends: EmptyPayload;
  readonly PauseGame: EmptyPayload;
  readonly ResumeGame: EmptyPayload;
  readonly RestartMatch: EmptyPayload;
  readonly SurrenderMatch: EmptyPayload;
  readonly LeaveRoom: EmptyPayload;
  readonly Logout: EmptyPayload;
}

export type ClientMessageType = keyof ClientMessageMap;
