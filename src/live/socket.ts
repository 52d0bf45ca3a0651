import WebSocket from "ws";
import { CONNECT_TIMEOUT_MS, SOCKET_PATH_SUFFIX } from "../shared/constants.js";
import { ConnectError, TransportError, errorMessage } from "../shared/errors.js";

export interface SocketHandlers {
  message(data: Buffer, isBinary: boolean): void;
  close(code: number, reason: string): void;
  error(error: Error): void;
}

/**
 * The duplex the session drives. Implemented over `ws` in production and by an
 * in-process fake in tests.
 */
export interface LiveSocket {
  readonly isOpen: boolean;
  send(data: Buffer): Promise<void>;
  /** Graceful close handshake. */
  close(): void;
  /** Drops the connection without a close handshake. */
  terminate(): void;
  /** Events that arrived before handlers were attached are replayed. */
  attach(handlers: SocketHandlers): void;
}

export type SocketConnector = (url: string) => Promise<LiveSocket>;

/** Appends the subscription path the push service expects, unless it is already there. */
export function withSubscriptionPath(url: string): string {
  if (url.endsWith(SOCKET_PATH_SUFFIX)) return url;
  return url.endsWith("/") ? `${url}${SOCKET_PATH_SUFFIX.slice(1)}` : `${url}${SOCKET_PATH_SUFFIX}`;
}

function rawToBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(new Uint8Array(data));
}

class WsLiveSocket implements LiveSocket {
  private handlers: SocketHandlers | null = null;
  private readonly backlog: ((handlers: SocketHandlers) => void)[] = [];

  constructor(private readonly ws: WebSocket) {
    ws.on("message", (data, isBinary) => {
      const buffer = rawToBuffer(data);
      this.emit((h) => h.message(buffer, isBinary));
    });
    ws.on("close", (code, reason) => {
      this.emit((h) => h.close(code, reason.toString("utf8")));
    });
    ws.on("error", (err) => {
      this.emit((h) => h.error(err));
    });
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.ws.send(data, { binary: true }, (err) => {
        if (err) reject(new TransportError(`Socket write failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(1000);
    }
  }

  terminate(): void {
    this.ws.terminate();
  }

  attach(handlers: SocketHandlers): void {
    this.handlers = handlers;
    for (const replay of this.backlog.splice(0)) replay(handlers);
  }

  private emit(deliver: (handlers: SocketHandlers) => void): void {
    if (this.handlers) deliver(this.handlers);
    else this.backlog.push(deliver);
  }
}

export function connectWebSocket(
  url: string,
  options: { handshakeTimeoutMs?: number } = {}
): Promise<LiveSocket> {
  return new Promise((resolve, reject) => {
    let ws: WebSocket;
    try {
      ws = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs ?? CONNECT_TIMEOUT_MS });
    } catch (err) {
      reject(new ConnectError(`Invalid socket URL ${url}: ${errorMessage(err)}`, { cause: err }));
      return;
    }

    const onOpen = () => {
      ws.off("error", onError);
      resolve(new WsLiveSocket(ws));
    };
    const onError = (err: Error) => {
      ws.off("open", onOpen);
      reject(new ConnectError(`Failed to connect to ${url}: ${err.message}`, { cause: err }));
    };
    ws.once("open", onOpen);
    ws.once("error", onError);
  });
}
