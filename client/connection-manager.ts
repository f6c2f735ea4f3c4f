import type { SessionDialer, SessionTransport } from "./network";

export type ConnectionState = "idle" | "connecting" | "connected" | "failed";

export type DialResult =
  | { readonly ok: true; readonly attempt: number; readonly transport: SessionTransport }
  | { readonly ok: false; readonly attempt: number; readonly error: Error };

export interface ConnectionManagerHandlers {
  readonly onConnected?: (transport: SessionTransport, attempt: number) => void;
  readonly onFailed?: (message: string) => void;
  readonly onLog?: (message: string) => void;
}

export interface ConnectionManagerOptions {
  readonly dial: SessionDialer;
  readonly retryBackoffMs?: number;
  /** Human-readable dial target for logs; must not include secrets. */
  readonly describeTarget?: () => string;
  readonly handlers?: ConnectionManagerHandlers;
}

export const DEFAULT_RETRY_BACKOFF_MS = 2000;

const toError = (cause: unknown): Error => (cause instanceof Error ? cause : new Error(String(cause)));

/**
 * Owns the session's connection state machine.
 *
 * Dials run off the tick: {@link startConnect} kicks one off and returns at
 * once, and the settled promise appends to a hand-off queue that the tick
 * consumes in {@link update}. Every dial is tagged with an attempt number;
 * results for anything but the active attempt are closed and dropped as soon as
 * they settle, so a dial outliving {@link reset} never holds a socket open.
 */
export class ConnectionManager {
  private readonly dial: SessionDialer;
  private readonly retryBackoffMs: number;
  private readonly describeTarget: () => string;
  private handlers: ConnectionManagerHandlers;
  private stateValue: ConnectionState = "idle";
  private transportValue: SessionTransport | null = null;
  private readonly completed: DialResult[] = [];
  private attemptCounter = 0;
  private activeAttempt = 0;
  private inFlight = false;
  private retryAtMs = 0;
  private lastErrorMessage: string | null = null;

  constructor(options: ConnectionManagerOptions) {
    this.dial = options.dial;
    const backoff = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
    this.retryBackoffMs = Number.isFinite(backoff) && backoff > 0 ? backoff : DEFAULT_RETRY_BACKOFF_MS;
    this.describeTarget = options.describeTarget ?? (() => "server");
    this.handlers = options.handlers ?? {};
  }

  get state(): ConnectionState {
    return this.stateValue;
  }

  get transport(): SessionTransport | null {
    return this.transportValue;
  }

  get attemptInFlight(): boolean {
    return this.inFlight;
  }

  get attempts(): number {
    return this.attemptCounter;
  }

  get retryAt(): number {
    return this.retryAtMs;
  }

  get lastError(): string | null {
    return this.lastErrorMessage;
  }

  setHandlers(handlers: ConnectionManagerHandlers): void {
    this.handlers = handlers;
  }

  /** Leaves Idle. Called once a usable credential exists. */
  beginSession(): boolean {
    if (this.stateValue !== "idle") {
      return false;
    }
    return this.startConnect();
  }

  startConnect(): boolean {
    if (this.inFlight) {
      return false;
    }

    this.attemptCounter += 1;
    const attempt = this.attemptCounter;
    this.activeAttempt = attempt;
    this.inFlight = true;
    this.stateValue = "connecting";
    this.log(`Dialing ${this.describeTarget()} (attempt ${attempt})`);

    void Promise.resolve()
      .then(() => this.dial())
      .then(
        (transport) => {
          this.settle({ ok: true, attempt, transport });
        },
        (cause: unknown) => {
          this.settle({ ok: false, attempt, error: toError(cause) });
        },
      );
    return true;
  }

  private settle(result: DialResult): void {
    if (this.isStale(result)) {
      this.discard(result);
      return;
    }
    this.completed.push(result);
  }

  private isStale(result: DialResult): boolean {
    return this.activeAttempt === 0 || result.attempt !== this.activeAttempt;
  }

  /** Consumes every settled dial; returns the active attempt's result, if it arrived. */
  pollResult(): DialResult | null {
    let current: DialResult | null = null;
    for (let result = this.completed.shift(); result; result = this.completed.shift()) {
      if (this.isStale(result)) {
        this.discard(result);
        continue;
      }
      this.inFlight = false;
      current = result;
    }
    return current;
  }

  update(now: number): void {
    if (this.stateValue === "failed" && !this.inFlight && now >= this.retryAtMs) {
      this.retryAtMs = now + this.retryBackoffMs;
      this.startConnect();
    }

    const result = this.pollResult();
    if (result) {
      if (result.ok) {
        this.transportValue = result.transport;
        this.stateValue = "connected";
        this.lastErrorMessage = null;
        this.log(`Connected (attempt ${result.attempt})`);
        this.handlers.onConnected?.(result.transport, result.attempt);
      } else {
        this.fail(result.error.message, now);
      }
    }

    if (this.stateValue === "connected" && this.transportValue?.isClosed() !== false) {
      this.transportValue = null;
      this.fail("connection lost", now);
    }
  }

  send(type: string, payload: unknown): boolean {
    const transport = this.transportValue;
    if (this.stateValue !== "connected" || !transport || transport.isClosed()) {
      this.log(`Dropped ${type}: not connected`);
      return false;
    }
    try {
      transport.send(type, payload);
      return true;
    } catch (error) {
      this.log(`Failed to send ${type}: ${toError(error).message}`);
      return false;
    }
  }

  /** Back to Idle. A dial still running is superseded and its result discarded. */
  reset(): void {
    this.transportValue?.close();
    this.transportValue = null;
    this.activeAttempt = 0;
    this.pollResult();
    this.inFlight = false;
    this.stateValue = "idle";
    this.retryAtMs = 0;
    this.lastErrorMessage = null;
  }

  statusText(now: number): string {
    switch (this.stateValue) {
      case "idle":
        return "Not signed in";
      case "connecting":
        return "Connecting…";
      case "connected":
        return "Connected";
      case "failed": {
        const seconds = Math.max(0, Math.ceil((this.retryAtMs - now) / 1000));
        return `Connection failed: ${this.lastErrorMessage ?? "unknown error"} (retrying in ${seconds}s)`;
      }
    }
  }

  private fail(message: string, now: number): void {
    this.stateValue = "failed";
    this.lastErrorMessage = message;
    this.retryAtMs = now + this.retryBackoffMs;
    this.log(`Connection failed: ${message}`);
    this.handlers.onFailed?.(message);
  }

  private discard(result: DialResult): void {
    if (result.ok) {
      result.transport.close();
    }
    this.log(`Discarded stale dial result (attempt ${result.attempt})`);
  }

  private log(message: string): void {
    this.handlers.onLog?.(message);
  }
}
