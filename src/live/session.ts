/**
 * One push-socket session: connect, authenticate, then a single serial loop
 * over a merged inbox fed by two heartbeat timers, the socket and the abort
 * signal. Whatever ends the loop, `end()` is called once on the way out,
 * except after a hard `abort()`.
 */
import { EventQueue } from "../shared/channel.js";
import { SOCKET_HEARTBEAT_INTERVAL_MS } from "../shared/constants.js";
import { ConnectError, TransportError, errorMessage } from "../shared/errors.js";
import { getLogger, type Logger } from "../shared/logging.js";
import type { LiveApi, StartResult } from "./client.js";
import type { LiveEventDispatcher } from "./dispatcher.js";
import { DEFAULT_DECODE_LIMITS, Operation, decodeFrames, encodeFrame, type DecodeLimits } from "./packet.js";
import { connectWebSocket, withSubscriptionPath, type LiveSocket, type SocketConnector } from "./socket.js";

export type SessionState =
  | "starting"
  | "connected"
  | "listening"
  | "shutting-down"
  | "closed"
  | "failed";

export interface SessionInfo {
  readonly sessionId: string;
  readonly roomId: number;
  readonly anchorName: string;
  readonly anchorId?: string;
  readonly startedAt: Date;
}

export type SessionOutcome =
  | { reason: "cancelled" }
  | { reason: "remote-closed"; code: number; detail: string }
  | { reason: "transport-error"; error: TransportError }
  | { reason: "aborted" };

export interface LiveSessionOptions {
  api: LiveApi;
  started: StartResult;
  socketUrl: string;
  dispatcher: LiveEventDispatcher;
  apiHeartbeatMs: number;
  socketHeartbeatMs?: number;
  connect?: SocketConnector;
  decodeLimits?: DecodeLimits;
  now?: () => Date;
}

type TickKind = "socket-heartbeat" | "api-heartbeat";

type LoopInput =
  | { kind: TickKind }
  | { kind: "message"; data: Buffer; isBinary: boolean }
  | { kind: "closed"; code: number; reason: string }
  | { kind: "error"; error: Error }
  | { kind: "cancel" }
  | { kind: "abort" };

export class LiveSession {
  readonly info: SessionInfo;
  /** Settles once the session reaches `closed` or `failed`. Never rejects. */
  readonly closed: Promise<SessionOutcome>;

  private currentState: SessionState = "starting";
  private socket: LiveSocket | null = null;
  private readonly inbox = new EventQueue<LoopInput>();
  private readonly pendingTicks = new Set<TickKind>();
  private readonly logger: Logger;
  private settle: (outcome: SessionOutcome) => void = () => undefined;
  private hardAborted = false;

  private constructor(private readonly options: LiveSessionOptions) {
    const { started } = options;
    this.info = Object.freeze({
      sessionId: started.sessionId,
      roomId: started.anchor.roomId ?? 0,
      anchorName: started.anchor.name ?? "Unknown",
      anchorId: started.anchor.openId,
      startedAt: (options.now ?? (() => new Date()))(),
    });
    this.logger = getLogger().child({ module: "live.session", sessionId: started.sessionId });
    this.closed = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  /**
   * Connects and authenticates, then starts the loop. If either step fails the
   * upstream session is released and no handle is returned.
   */
  static async open(options: LiveSessionOptions, signal: AbortSignal): Promise<LiveSession> {
    const session = new LiveSession(options);
    await session.establish();
    session.run(signal).then(session.settle, (err: unknown) => {
      session.logger.error({ err }, "Session loop crashed");
      session.currentState = "failed";
      session.settle({
        reason: "transport-error",
        error: new TransportError(`Session loop crashed: ${errorMessage(err)}`, { cause: err }),
      });
    });
    return session;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Hard stop for teardown without a graceful shutdown: drops the socket and
   * ends the loop without calling `end()`. The upstream session is left to
   * expire on its own.
   */
  abort(): void {
    this.hardAborted = true;
    this.socket?.terminate();
    this.inbox.offer({ kind: "abort" });
  }

  private async establish(): Promise<void> {
    const { api, started } = this.options;
    const url = withSubscriptionPath(this.options.socketUrl);
    const connect = this.options.connect ?? ((target: string) => connectWebSocket(target));

    this.logger.info({ url }, "Connecting to live push socket");
    let socket: LiveSocket;
    try {
      socket = await connect(url);
    } catch (err) {
      await this.release(api);
      throw err instanceof ConnectError
        ? err
        : new ConnectError(`Failed to connect to ${url}: ${errorMessage(err)}`, { cause: err });
    }
    this.socket = socket;
    this.transition("connected");

    socket.attach({
      message: (data, isBinary) => {
        this.inbox.offer({ kind: "message", data, isBinary });
      },
      close: (code, reason) => {
        this.inbox.offer({ kind: "closed", code, reason });
      },
      error: (error) => {
        this.inbox.offer({ kind: "error", error });
      },
    });

    try {
      await socket.send(encodeFrame(Operation.AUTH, Buffer.from(started.authBody, "utf8")));
    } catch (err) {
      socket.terminate();
      await this.release(api);
      throw err instanceof TransportError
        ? err
        : new TransportError(`Failed to send auth frame: ${errorMessage(err)}`, { cause: err });
    }
    // No reply is awaited: a rejected auth shows up later as a closed socket.
    this.transition("listening");
  }

  private async run(signal: AbortSignal): Promise<SessionOutcome> {
    const onAbort = () => {
      this.inbox.offer({ kind: "cancel" });
    };
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });

    const timers = [
      setInterval(() => this.tick("socket-heartbeat"), this.options.socketHeartbeatMs ?? SOCKET_HEARTBEAT_INTERVAL_MS),
      setInterval(() => this.tick("api-heartbeat"), this.options.apiHeartbeatMs),
    ];

    let outcome: SessionOutcome = { reason: "cancelled" };
    try {
      for await (const input of this.inbox) {
        if (this.hardAborted) break;
        if (signal.aborted) {
          this.logger.info("Shutdown requested");
          break;
        }
        const finished = await this.handle(input);
        if (finished) {
          outcome = finished;
          break;
        }
      }
    } finally {
      for (const timer of timers) clearInterval(timer);
      signal.removeEventListener("abort", onAbort);
      this.inbox.close();
    }

    return this.shutdown(this.hardAborted ? { reason: "aborted" } : outcome);
  }

  private tick(kind: TickKind): void {
    // Missed ticks coalesce while the loop is busy.
    if (this.pendingTicks.has(kind)) return;
    this.pendingTicks.add(kind);
    this.inbox.offer({ kind });
  }

  private async handle(input: LoopInput): Promise<SessionOutcome | null> {
    switch (input.kind) {
      case "socket-heartbeat":
        this.pendingTicks.delete(input.kind);
        try {
          await this.requireSocket().send(encodeFrame(Operation.HEARTBEAT));
        } catch (err) {
          this.logger.warn({ err }, "Failed to send socket heartbeat");
        }
        return null;
      case "api-heartbeat":
        this.pendingTicks.delete(input.kind);
        try {
          await this.options.api.heartbeat(this.info.sessionId);
        } catch (err) {
          this.logger.warn({ err }, "Session heartbeat failed");
        }
        return null;
      case "message":
        this.handleMessage(input.data, input.isBinary);
        return null;
      case "closed":
        this.logger.info({ code: input.code, reason: input.reason }, "Push socket closed by server");
        return { reason: "remote-closed", code: input.code, detail: input.reason };
      case "error":
        this.logger.warn({ err: input.error }, "Push socket read failed");
        return {
          reason: "transport-error",
          error: new TransportError(`Socket read failed: ${input.error.message}`, { cause: input.error }),
        };
      case "cancel":
        return { reason: "cancelled" };
      case "abort":
        return { reason: "aborted" };
    }
  }

  private handleMessage(data: Buffer, isBinary: boolean): void {
    if (!isBinary) {
      this.logger.debug({ text: data.toString("utf8") }, "Ignoring text message");
      return;
    }
    try {
      const frames = decodeFrames(data, this.options.decodeLimits ?? DEFAULT_DECODE_LIMITS);
      for (const frame of frames) this.options.dispatcher.dispatch(frame);
    } catch (err) {
      this.logger.warn({ err, length: data.length }, "Dropping malformed message");
    }
  }

  private async shutdown(outcome: SessionOutcome): Promise<SessionOutcome> {
    this.transition("shutting-down");
    if (this.socket?.isOpen) this.socket.close();
    if (outcome.reason !== "aborted") {
      await this.release(this.options.api);
    }
    this.transition(outcome.reason === "transport-error" ? "failed" : "closed");
    return outcome;
  }

  private async release(api: LiveApi): Promise<void> {
    try {
      await api.end(this.info.sessionId);
    } catch (err) {
      this.logger.warn({ err }, "Failed to end upstream session");
    }
  }

  private requireSocket(): LiveSocket {
    if (!this.socket) throw new TransportError("Socket is not connected");
    return this.socket;
  }

  private transition(next: SessionState): void {
    this.logger.debug({ from: this.currentState, to: next }, "Session state change");
    this.currentState = next;
  }
}

export function sessionStatusPayload(info: SessionInfo | null, now: Date = new Date()): Record<string, unknown> {
  if (!info) return { active: false };
  return {
    active: true,
    session_id: info.sessionId,
    room_id: info.roomId,
    anchor_name: info.anchorName,
    anchor_open_id: info.anchorId ?? null,
    started_at: info.startedAt.toISOString(),
    uptime_seconds: Math.max(0, Math.floor((now.getTime() - info.startedAt.getTime()) / 1000)),
  };
}
