import WebSocket from "ws";

import { isObject } from "./protocol";
import type { SessionConfiguration } from "./session-config";

const HANDSHAKE_TIMEOUT_MS = 5000;

export interface NetworkMessageEnvelope {
  readonly type: string;
  readonly payload: unknown;
  readonly receivedAt: number;
}

/** Anything the dispatcher can drain without blocking. */
export interface EnvelopeSource {
  readonly poll: () => NetworkMessageEnvelope | null;
}

export interface SessionTransport extends EnvelopeSource {
  readonly isClosed: () => boolean;
  readonly send: (type: string, payload: unknown) => void;
  readonly close: () => void;
}

export type SessionDialer = () => Promise<SessionTransport>;

/** The slice of a ws socket the transport writes through. */
export interface SocketWriter {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
}

/**
 * Parses one text frame into an envelope. Frames that are not JSON objects
 * with a non-empty string `type` yield `null`.
 */
export const parseEnvelope = (text: string, receivedAt: number): NetworkMessageEnvelope | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isObject(parsed) || typeof parsed.type !== "string" || parsed.type.length === 0) {
    return null;
  }
  return { type: parsed.type, payload: parsed.data ?? null, receivedAt };
};

export const encodeEnvelope = (type: string, payload: unknown): string =>
  JSON.stringify({ type, data: payload ?? {} });

export const rawDataToText = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
};

/**
 * Session over one socket. Inbound frames are queued as they arrive on the
 * socket's event loop turn; the tick loop drains them with {@link poll}.
 */
export class WebSocketSessionTransport implements SessionTransport {
  private readonly inbound: NetworkMessageEnvelope[] = [];
  private closed = false;
  private closeReason: string | null = null;
  private dropped = 0;

  constructor(
    private readonly socket: SocketWriter,
    private readonly now: () => number = Date.now,
  ) {}

  get droppedFrames(): number {
    return this.dropped;
  }

  get reason(): string | null {
    return this.closeReason;
  }

  receive(text: string): void {
    if (this.closed) {
      return;
    }
    const envelope = parseEnvelope(text, this.now());
    if (!envelope) {
      this.dropped += 1;
      return;
    }
    this.inbound.push(envelope);
  }

  markClosed(reason?: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.closeReason = reason ?? null;
  }

  isClosed(): boolean {
    return this.closed || this.socket.readyState !== WebSocket.OPEN;
  }

  poll(): NetworkMessageEnvelope | null {
    return this.inbound.shift() ?? null;
  }

  send(type: string, payload: unknown): void {
    if (this.isClosed()) {
      throw new Error(`Cannot send ${type}: session transport is closed.`);
    }
    this.socket.send(encodeEnvelope(type, payload));
  }

  close(): void {
    const wasClosed = this.closed;
    this.markClosed("closed by client");
    if (!wasClosed) {
      this.socket.close();
    }
  }
}

export interface DialRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
}

/** The token travels both as a `token` query parameter and as a bearer header. */
export const buildDialRequest = (websocketUrl: string, token: string | null): DialRequest => {
  const url = new URL(websocketUrl);
  if (url.protocol === "http:" || url.protocol === "https:") {
    url.protocol = url.protocol === "https:" ? "wss:" : "ws:";
  }
  const trimmed = token?.trim() ?? "";
  if (trimmed.length === 0) {
    return { url: url.toString(), headers: {} };
  }
  url.searchParams.set("token", trimmed);
  return { url: url.toString(), headers: { Authorization: `Bearer ${trimmed}` } };
};

export type TokenSource = () => string | null;

export const createWebSocketDialer = (
  configuration: Pick<SessionConfiguration, "websocketUrl">,
  getToken: TokenSource,
): SessionDialer => {
  return () =>
    new Promise<SessionTransport>((resolve, reject) => {
      const { url, headers } = buildDialRequest(configuration.websocketUrl, getToken());
      const socket = new WebSocket(url, {
        headers,
        handshakeTimeout: HANDSHAKE_TIMEOUT_MS,
        perMessageDeflate: true,
      });
      const transport = new WebSocketSessionTransport(socket);
      let settled = false;

      const fail = (error: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        reject(error);
      };

      socket.on("open", () => {
        if (!settled) {
          settled = true;
          resolve(transport);
        }
      });

      socket.on("message", (data, isBinary) => {
        if (!isBinary) {
          transport.receive(rawDataToText(data));
        }
      });

      socket.on("unexpected-response", (_request, response) => {
        fail(new Error(`WebSocket handshake rejected with status ${response.statusCode ?? "unknown"}.`));
        socket.terminate();
      });

      socket.on("error", (error) => {
        transport.markClosed(error.message);
        fail(error);
      });

      socket.on("close", (code, reason) => {
        const reasonText = reason.length > 0 ? `, reason ${reason.toString("utf8")}` : "";
        transport.markClosed(`code ${code}${reasonText}`);
        fail(new Error(`WebSocket closed before establishing session (code ${code}${reasonText}).`));
      });
    });
};
