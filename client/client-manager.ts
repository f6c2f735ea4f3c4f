import { ConnectionManager, type ConnectionState } from "./connection-manager";
import type {
  CredentialStore,
  CredentialValidator,
} from "./credential-store";
import { HpEffectTracker, type HpEffectState } from "./hp-effects";
import { MessageDispatcher } from "./message-dispatcher";
import {
  createWebSocketDialer,
  type EnvelopeSource,
  type SessionDialer,
  type SessionTransport,
  type TokenSource,
} from "./network";
import {
  ignorePayload,
  normalizeDefeatEvent,
  normalizeFullSnapshot,
  normalizeGameOver,
  normalizeGoldUpdate,
  normalizeHandUpdate,
  normalizeInit,
  normalizeMapDefinition,
  normalizeMaps,
  normalizeMinis,
  normalizeProfile,
  normalizeRoomCreated,
  normalizeServerError,
  normalizeStateDelta,
  normalizeTimerUpdate,
  normalizeUnitSpawnEvent,
  normalizeVictoryEvent,
  type ClientMessageMap,
  type ClientMessageType,
  type DefeatEvent,
  type GameOverMessage,
  type InitMessage,
  type MapDefinition,
  type MapInfo,
  type MiniCardView,
  type MiniInfo,
  type ProfileMessage,
  type StateDelta,
  type TimerUpdate,
  type VictoryEvent,
} from "./protocol";
import type { SessionConfiguration } from "./session-config";
import { SimulationClock } from "./simulation-clock";
import {
  InMemoryWorldStateStore,
  SCREEN_HEIGHT,
  type WorldStateSnapshot,
  type WorldStateStore,
} from "./world-state";

export const MATCH_DURATION_SECONDS = 180;
const DEFAULT_PLAYER_NAME = "Player";
const PVP_ROOM_MARKER = "pvp-";

export interface ClientLifecycleHandlers {
  readonly onReady?: () => void;
  readonly onError?: (error: Error) => void;
  readonly onLog?: (message: string) => void;
}

export interface ClientOrchestrator {
  readonly configuration: SessionConfiguration;
  readonly boot: (handlers: ClientLifecycleHandlers) => Promise<void>;
  readonly completeLogin: (username: string, token?: string) => Promise<void>;
  readonly tick: (frameElapsedMs: number) => RenderFrame;
  readonly logout: () => Promise<void>;
  readonly shutdown: () => void;
}

export interface ClientDependencies {
  readonly credentials: CredentialStore;
  readonly validator: CredentialValidator;
  /** Builds the dialer from the orchestrator's token; defaults to the ws dialer. */
  readonly createDialer?: (getToken: TokenSource) => SessionDialer;
  readonly worldState?: WorldStateStore;
  readonly now?: () => number;
}

export interface PlayerProfileState {
  readonly playerId: number | null;
  readonly name: string;
  readonly gold: number;
  readonly accountXp: number;
  readonly pvpRating: number;
  readonly pvpRank: string;
  readonly avatar: string;
  readonly guildId: string;
}

export interface LobbyState {
  readonly minis: readonly MiniInfo[];
  readonly maps: readonly MapInfo[];
}

export interface MatchState {
  readonly roomId: string | null;
  readonly active: boolean;
  readonly paused: boolean;
  readonly timerRemainingSeconds: number;
  readonly gold: number;
  readonly hand: readonly MiniCardView[];
  readonly next: MiniCardView | null;
  readonly gameOver: boolean;
  readonly victory: boolean;
  readonly endActive: boolean;
  readonly endVictory: boolean;
  readonly lastServerError: string | null;
}

export interface ViewOrientation {
  readonly pvp: boolean;
  readonly mirrored: boolean;
}

export interface HpEffectsView {
  readonly units: ReadonlyMap<number, HpEffectState>;
  readonly bases: ReadonlyMap<number, HpEffectState>;
}

export interface RenderFrame {
  readonly connectionState: ConnectionState;
  readonly status: string;
  readonly world: WorldStateSnapshot;
  readonly hpEffects: HpEffectsView;
  readonly match: MatchState;
  readonly profile: PlayerProfileState;
  readonly view: ViewOrientation;
  readonly simulatedMs: number;
}

interface MutableMatchState {
  roomId: string | null;
  active: boolean;
  timerRemainingSeconds: number;
  gold: number;
  hand: readonly MiniCardView[];
  next: MiniCardView | null;
  gameOver: boolean;
  victory: boolean;
  endActive: boolean;
  endVictory: boolean;
  lastServerError: string | null;
}

const createMatchState = (): MutableMatchState => ({
  roomId: null,
  active: false,
  timerRemainingSeconds: MATCH_DURATION_SECONDS,
  gold: 0,
  hand: [],
  next: null,
  gameOver: false,
  victory: false,
  endActive: false,
  endVictory: false,
  lastServerError: null,
});

const createProfileState = (name: string): PlayerProfileState => ({
  playerId: null,
  name,
  gold: 0,
  accountXp: 0,
  pvpRating: 0,
  pvpRank: "",
  avatar: "",
  guildId: "",
});

/**
 * Drives one client session: connection lifecycle, inbound dispatch, the
 * simulated world and its hp effects. Everything runs on the caller's tick;
 * only dials and credential I/O settle asynchronously.
 */
export class GameClientOrchestrator implements ClientOrchestrator {
  private readonly credentials: CredentialStore;
  private readonly validator: CredentialValidator;
  private readonly now: () => number;
  private readonly world: WorldStateStore;
  private readonly effects = new HpEffectTracker();
  private readonly clock: SimulationClock;
  private readonly connection: ConnectionManager;
  private readonly dispatcher: MessageDispatcher;
  private lifecycleHandlers: ClientLifecycleHandlers | null = null;
  private token: string | null = null;
  private profile: PlayerProfileState;
  private lobby: LobbyState = { minis: [], maps: [] };
  private match: MutableMatchState = createMatchState();
  private mapDefinition: MapDefinition | null = null;
  private ignoredDeltas = 0;

  constructor(
    public readonly configuration: SessionConfiguration,
    dependencies: ClientDependencies,
  ) {
    this.credentials = dependencies.credentials;
    this.validator = dependencies.validator;
    this.now = dependencies.now ?? Date.now;
    this.world = dependencies.worldState ?? new InMemoryWorldStateStore();
    this.clock = new SimulationClock({ tickRate: configuration.tickRate });
    this.profile = createProfileState(configuration.playerName);

    const createDialer =
      dependencies.createDialer ??
      ((getToken: TokenSource) => createWebSocketDialer(configuration, getToken));
    this.connection = new ConnectionManager({
      dial: createDialer(() => this.token),
      retryBackoffMs: configuration.retryBackoffMs,
      describeTarget: () => `${configuration.websocketUrl} (token length ${this.token?.length ?? 0})`,
      handlers: {
        onConnected: (transport, attempt) => {
          this.handleConnected(transport, attempt);
        },
        onLog: (message) => {
          this.emitLog(message);
        },
      },
    });

    this.dispatcher = new MessageDispatcher({
      onError: (error, envelope) => {
        this.reportError(new Error(`Failed to handle ${envelope.type}: ${error.message}`));
      },
    });
    this.registerMessageHandlers();
  }

  get connectionState(): ConnectionState {
    return this.connection.state;
  }

  get sessionToken(): string | null {
    return this.token;
  }

  get playerName(): string {
    return this.profile.name;
  }

  get lobbyState(): LobbyState {
    return this.lobby;
  }

  get currentMapDefinition(): MapDefinition | null {
    return this.mapDefinition;
  }

  get ignoredDeltaCount(): number {
    return this.ignoredDeltas;
  }

  get paused(): boolean {
    return this.clock.paused;
  }

  /**
   * Restores a session from the configured token or the store. A rejected stored
   * credential is cleared; a rejected configured token leaves the store alone.
   * Either way the client stays idle.
   */
  async boot(handlers: ClientLifecycleHandlers): Promise<void> {
    this.lifecycleHandlers = handlers;
    try {
      const stored = await this.credentials.load();
      const token = this.configuration.sessionToken ?? stored.token;
      if (!token) {
        this.emitLog("No stored session; waiting for login");
        return;
      }

      const fromStore = this.configuration.sessionToken === null;
      const validation = await this.validator.validate(token);
      if (!validation.valid) {
        this.emitLog(`${fromStore ? "Stored" : "Configured"} session rejected: ${validation.reason}`);
        this.token = null;
        if (fromStore) {
          await this.credentials.clear();
        }
        return;
      }

      this.token = token;
      if (stored.username) {
        this.profile = { ...this.profile, name: stored.username };
      }
      this.connection.beginSession();
    } catch (error) {
      this.reportError(error);
    }
  }

  async completeLogin(username: string, token?: string): Promise<void> {
    const name = username.trim();
    this.profile = { ...this.profile, name: name.length > 0 ? name : DEFAULT_PLAYER_NAME };
    if (token !== undefined) {
      this.token = token.trim() || null;
    }
    try {
      await this.credentials.save(
        this.token === null ? { username: this.profile.name } : { username: this.profile.name, token: this.token },
      );
    } catch (error) {
      this.reportError(error);
    }
    this.connection.beginSession();
  }

  tick(frameElapsedMs: number): RenderFrame {
    const now = this.now();
    let world: WorldStateSnapshot | null = null;
    try {
      this.connection.update(now);
      const transport = this.connection.transport;
      if (this.connection.state === "connected" && transport) {
        this.dispatcher.drainAndDispatch(this.sessionSource(transport));
      }
      world = this.advanceSimulation(frameElapsedMs);
    } catch (error) {
      this.reportError(error);
    }
    return this.buildRenderFrame(now, world ?? this.world.snapshot());
  }

  /** Asks the server to pause and freezes the local clock without waiting for its TimerUpdate. */
  pauseGame(): boolean {
    if (!this.canPauseMatch() || !this.sendMessage("PauseGame", {})) {
      return false;
    }
    this.clock.pause();
    return true;
  }

  resumeGame(): boolean {
    if (!this.canPauseMatch() || !this.sendMessage("ResumeGame", {})) {
      return false;
    }
    this.clock.resume();
    return true;
  }

  // Never in PvP rooms.
  private canPauseMatch(): boolean {
    return !(this.match.roomId?.includes(PVP_ROOM_MARKER) ?? false);
  }

  restartMatch(): boolean {
    return this.sendMessage("RestartMatch", {});
  }

  surrenderMatch(): boolean {
    return this.sendMessage("SurrenderMatch", {});
  }

  /** Leaves the room and drops every trace of the match. */
  leaveRoom(): void {
    this.sendMessage("LeaveRoom", {});
    this.endMatch();
  }

  async logout(): Promise<void> {
    this.sendMessage("Logout", {});
    await this.resetSession();
  }

  shutdown(): void {
    this.connection.reset();
    this.lifecycleHandlers = null;
  }

  sendMessage<K extends ClientMessageType>(type: K, payload: ClientMessageMap[K]): boolean {
    return this.connection.send(type, payload);
  }

  private registerMessageHandlers(): void {
    this.dispatcher
      .register("Profile", normalizeProfile, (profile) => {
        this.handleProfile(profile);
      })
      .register("Minis", normalizeMinis, (minis) => {
        this.lobby = { ...this.lobby, minis };
      })
      .register("Maps", normalizeMaps, (maps) => {
        this.lobby = { ...this.lobby, maps };
      })
      .register("RoomCreated", normalizeRoomCreated, ({ roomId }) => {
        this.match.roomId = roomId;
      })
      .register("Init", normalizeInit, (init) => {
        this.handleInit(init);
      })
      .register("StateDelta", normalizeStateDelta, (delta) => {
        this.handleStateDelta(delta);
      })
      .register("FullSnapshot", normalizeFullSnapshot, (snapshot) => {
        this.world.applySnapshot(snapshot);
      })
      .register("TimerUpdate", normalizeTimerUpdate, (update) => {
        this.handleTimerUpdate(update);
      })
      .register("UnitSpawnEvent", normalizeUnitSpawnEvent, (event) => {
        this.world.startSpawnAnimation(event);
      })
      .register("MapDef", normalizeMapDefinition, (definition) => {
        this.mapDefinition = definition;
        this.world.setMapLayout({
          id: definition.id,
          obstacles: definition.obstacles,
          lanes: definition.lanes,
        });
      })
      .register("GameOver", normalizeGameOver, (message) => {
        this.handleGameOver(message);
      })
      .register("VictoryEvent", normalizeVictoryEvent, (event) => {
        this.handleVictory(event);
      })
      .register("DefeatEvent", normalizeDefeatEvent, (event) => {
        this.handleDefeat(event);
      })
      .register("GoldUpdate", normalizeGoldUpdate, ({ playerId, gold }) => {
        if (playerId === this.profile.playerId) {
          this.match.gold = gold;
        }
      })
      .register("HandUpdate", normalizeHandUpdate, ({ hand, next }) => {
        this.match.hand = hand;
        this.match.next = next;
      })
      .register("Error", normalizeServerError, ({ code, message }) => {
        this.match.lastServerError = message;
        this.emitLog(code ? `Server error [${code}]: ${message}` : `Server error: ${message}`);
      })
      .register("LoggedOut", ignorePayload, () => {
        this.emitLog("Server ended the session");
        void this.resetSession();
      });
  }

  private handleConnected(_transport: SessionTransport, attempt: number): void {
    this.sendInitialRequests();
    this.emitLog(`Session ready (attempt ${attempt})`);
    this.lifecycleHandlers?.onReady?.();
  }

  /** Sent once per established connection, in this order. */
  private sendInitialRequests(): void {
    const name = this.profile.name.trim() || DEFAULT_PLAYER_NAME;
    this.sendMessage("SetName", { name });
    this.sendMessage("GetProfile", {});
    this.sendMessage("ListMinis", {});
    this.sendMessage("ListMaps", {});
    this.sendMessage("GetGuild", {});
    this.sendMessage("GetFriends", {});
  }

  private handleProfile(profile: ProfileMessage): void {
    this.profile = {
      playerId: profile.playerId > 0 ? profile.playerId : this.profile.playerId,
      name: profile.name.length > 0 ? profile.name : this.profile.name,
      gold: profile.gold,
      accountXp: profile.accountXp,
      pvpRating: profile.pvpRating,
      pvpRank: profile.pvpRank,
      avatar: profile.avatar,
      guildId: profile.guildId,
    };
  }

  private handleInit(init: InitMessage): void {
    this.profile = { ...this.profile, playerId: init.playerId };
    this.world.reset();
    this.effects.reset();
    this.clock.resume();
    const roomId = this.match.roomId;
    this.match = {
      ...createMatchState(),
      roomId,
      active: true,
      hand: init.hand,
      next: init.next,
    };
    this.emitLog(`Match started (player ${init.playerId}${roomId ? `, room ${roomId}` : ""})`);
  }

  private handleStateDelta(delta: StateDelta): void {
    if (this.clock.paused) {
      this.ignoredDeltas += 1;
      return;
    }
    this.world.applyDelta(delta);
  }

  private handleTimerUpdate(update: TimerUpdate): void {
    this.match.timerRemainingSeconds = update.remainingSeconds;
    this.clock.setPaused(update.isPaused);
  }

  private handleGameOver(message: GameOverMessage): void {
    this.match.gameOver = true;
    this.match.victory = message.winnerId !== 0 && message.winnerId === this.profile.playerId;
    const reason = message.reason ? ` (${message.reason})` : "";
    this.emitLog(`Match over: ${this.match.victory ? "victory" : "defeat"}${reason}`);
  }

  private handleVictory(event: VictoryEvent): void {
    this.match.gameOver = true;
    this.match.victory = event.winnerId === this.profile.playerId;
    this.emitLog(
      `Victory for ${event.winnerName || event.winnerId} in ${event.matchType || "match"} after ${event.durationSeconds}s ` +
        `(+${event.goldEarned} gold, +${event.xpGained} xp)`,
    );
  }

  private handleDefeat(event: DefeatEvent): void {
    this.match.gameOver = true;
    this.match.victory = event.loserId !== this.profile.playerId;
    this.emitLog(
      `Defeat for ${event.loserName || event.loserId} against ${event.winnerName || event.winnerId} ` +
        `in ${event.matchType || "match"} after ${event.durationSeconds}s`,
    );
  }

  private endMatch(): void {
    this.mapDefinition = null;
    this.world.setMapLayout(null);
    this.world.reset();
    this.effects.reset();
    this.clock.resume();
    this.match = createMatchState();
  }

  /** Back to the signed-out state; never reconnects on its own. */
  private async resetSession(): Promise<void> {
    this.connection.reset();
    this.endMatch();
    this.token = null;
    this.profile = createProfileState(this.configuration.playerName);
    this.lobby = { minis: [], maps: [] };
    try {
      await this.credentials.clear();
    } catch (error) {
      this.reportError(error);
    }
  }

  /** Stops yielding once the connection has moved on to another transport. */
  private sessionSource(transport: SessionTransport): EnvelopeSource {
    return {
      poll: () => (this.connection.transport === transport ? transport.poll() : null),
    };
  }

  private advanceSimulation(frameElapsedMs: number): WorldStateSnapshot {
    this.clock.advance(frameElapsedMs, (dtSeconds) => {
      this.world.step(dtSeconds);
      if (this.match.active) {
        this.match.timerRemainingSeconds = Math.max(0, this.match.timerRemainingSeconds - dtSeconds);
      }
    });

    const world = this.world.snapshot();
    const nowMs = this.clock.elapsedMs;
    for (const unit of world.units.values()) {
      this.effects.step("unit", unit.id, unit.hp, nowMs);
    }
    for (const base of world.bases.values()) {
      this.effects.step("base", base.ownerId, base.hp, nowMs);
    }
    this.effects.prune("unit", world.units.keys());
    this.effects.prune("base", world.bases.keys());
    this.refreshEndState(world);
    return world;
  }

  private refreshEndState(world: WorldStateSnapshot): void {
    let ownHp = -1;
    let opposingHp = -1;
    for (const base of world.bases.values()) {
      if (base.ownerId === this.profile.playerId) {
        ownHp = base.hp;
      } else {
        opposingHp = base.hp;
      }
    }
    if (ownHp >= 0 && opposingHp >= 0) {
      this.match.endActive = ownHp <= 0 || opposingHp <= 0 || this.match.timerRemainingSeconds <= 0;
      this.match.endVictory = opposingHp <= 0 && ownHp > 0;
    } else {
      this.match.endActive = false;
      this.match.endVictory = false;
    }
  }

  // Inferred from base ownership and the room id; the server sends no explicit flag.
  private inferViewOrientation(world: WorldStateSnapshot): ViewOrientation {
    let ownBaseY: number | null = null;
    let ownCount = 0;
    let opposingCount = 0;
    for (const base of world.bases.values()) {
      if (base.ownerId === this.profile.playerId) {
        ownCount += 1;
        ownBaseY = base.y;
      } else {
        opposingCount += 1;
      }
    }
    const pvp = ownCount === 1 && opposingCount === 1 && (this.match.roomId?.includes(PVP_ROOM_MARKER) ?? false);
    const mirrored = pvp && this.mapDefinition !== null && ownBaseY !== null && ownBaseY < SCREEN_HEIGHT / 2;
    return { pvp, mirrored };
  }

  private buildRenderFrame(now: number, world: WorldStateSnapshot): RenderFrame {
    return {
      connectionState: this.connection.state,
      status: this.connection.statusText(now),
      world,
      hpEffects: {
        units: this.effects.entries("unit"),
        bases: this.effects.entries("base"),
      },
      match: { ...this.match, paused: this.clock.paused },
      profile: this.profile,
      view: this.inferViewOrientation(world),
      simulatedMs: this.clock.elapsedMs,
    };
  }

  private emitLog(message: string): void {
    this.lifecycleHandlers?.onLog?.(message);
  }

  private reportError(cause: unknown): void {
    const error = cause instanceof Error ? cause : new Error(String(cause));
    this.lifecycleHandlers?.onError?.(error);
  }
}
