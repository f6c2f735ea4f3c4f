import type { EnvelopeSource, NetworkMessageEnvelope } from "./network";

export type PayloadNormalizer<T> = (payload: unknown, context: string) => T;

export type MessageHandler<T> = (message: T, envelope: NetworkMessageEnvelope) => void;

export interface MessageDispatcherHandlers {
  readonly onError?: (error: Error, envelope: NetworkMessageEnvelope) => void;
  readonly onUnknown?: (envelope: NetworkMessageEnvelope) => void;
}

export interface DispatchStatistics {
  readonly dispatched: number;
  readonly unknown: number;
  readonly failed: number;
}

type Route = (envelope: NetworkMessageEnvelope) => void;

/**
 * Routes envelopes to handlers by their `type`. Payloads are normalized before
 * the handler sees them, so handlers only ever receive well-formed messages.
 */
export class MessageDispatcher {
  private readonly routes = new Map<string, Route>();
  private dispatched = 0;
  private unknown = 0;
  private failed = 0;

  constructor(private readonly handlers: MessageDispatcherHandlers = {}) {}

  register<T>(type: string, normalize: PayloadNormalizer<T>, handler: MessageHandler<T>): this {
    if (this.routes.has(type)) {
      throw new Error(`A handler for ${type} is already registered.`);
    }
    this.routes.set(type, (envelope) => {
      handler(normalize(envelope.payload, envelope.type), envelope);
    });
    return this;
  }

  has(type: string): boolean {
    return this.routes.has(type);
  }

  get registeredTypes(): readonly string[] {
    return [...this.routes.keys()];
  }

  get statistics(): DispatchStatistics {
    return { dispatched: this.dispatched, unknown: this.unknown, failed: this.failed };
  }

  /** Returns whether a handler ran to completion. Unknown types are ignored. */
  dispatch(envelope: NetworkMessageEnvelope): boolean {
    const route = this.routes.get(envelope.type);
    if (!route) {
      this.unknown += 1;
      this.handlers.onUnknown?.(envelope);
      return false;
    }

    try {
      route(envelope);
      this.dispatched += 1;
      return true;
    } catch (cause) {
      this.failed += 1;
      const error = cause instanceof Error ? cause : new Error(String(cause));
      this.handlers.onError?.(error, envelope);
      return false;
    }
  }

  /** Dispatches everything queued, in arrival order. Returns the number of envelopes taken. */
  drainAndDispatch(source: EnvelopeSource): number {
    let processed = 0;
    for (let envelope = source.poll(); envelope; envelope = source.poll()) {
      this.dispatch(envelope);
      processed += 1;
    }
    return processed;
  }
}
