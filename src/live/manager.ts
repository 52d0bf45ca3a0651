import { clampHeartbeatSeconds, type LiveConfig } from "../config.js";
import type { EventQueue } from "../shared/channel.js";
import { ApiError, ConfigError, LiveError } from "../shared/errors.js";
import { getLogger } from "../shared/logging.js";
import type { LiveEventBus } from "./bus.js";
import { OpenLiveClient, type LiveApi } from "./client.js";
import { LiveEventDispatcher } from "./dispatcher.js";
import type { LiveEvent } from "./events.js";
import type { DecodeLimits } from "./packet.js";
import { LiveSession, type SessionInfo, type SessionOutcome } from "./session.js";
import type { SocketConnector } from "./socket.js";

export interface LiveManagerOptions {
  config: LiveConfig;
  /** Defaults to an OpenLiveClient built from `config`. */
  api?: LiveApi;
  bus?: LiveEventBus;
  queue?: EventQueue<LiveEvent>;
  connect?: SocketConnector;
  socketHeartbeatMs?: number;
  decodeLimits?: DecodeLimits;
  now?: () => Date;
}

type ManagerState =
  | { kind: "idle" }
  | { kind: "active"; session: LiveSession; controller: AbortController };

/**
 * Owns at most one live session. Callers serialize `start` and `stop`; there
 * is no internal lock.
 */
export class LiveManager {
  private state: ManagerState = { kind: "idle" };
  private readonly api: LiveApi;
  private readonly dispatcher: LiveEventDispatcher;
  private readonly logger = getLogger().child({ module: "live.manager" });

  constructor(private readonly options: LiveManagerOptions) {
    this.api = options.api ?? new OpenLiveClient(options.config);
    this.dispatcher = new LiveEventDispatcher({ bus: options.bus, queue: options.queue });
  }

  async start(identityCode?: string): Promise<SessionInfo> {
    if (this.state.kind === "active") {
      throw new LiveError(
        `A live session is already active (${this.state.session.info.sessionId})`,
        "SESSION_ACTIVE"
      );
    }
    const code = (identityCode ?? this.options.config.identityCode ?? "").trim();
    if (code === "") {
      throw new ConfigError("An identity code is required to start a live session");
    }

    const started = await this.api.start(code);
    const [socketUrl] = started.socketUrls;
    if (socketUrl === undefined) {
      try {
        await this.api.end(started.sessionId);
      } catch (err) {
        this.logger.warn({ err, sessionId: started.sessionId }, "Failed to end upstream session");
      }
      throw new ApiError("start response carried no socket URL");
    }

    const controller = new AbortController();
    const session = await LiveSession.open(
      {
        api: this.api,
        started,
        socketUrl,
        dispatcher: this.dispatcher,
        apiHeartbeatMs: clampHeartbeatSeconds(this.options.config.heartbeatIntervalSeconds) * 1000,
        socketHeartbeatMs: this.options.socketHeartbeatMs,
        connect: this.options.connect,
        decodeLimits: this.options.decodeLimits,
        now: this.options.now,
      },
      controller.signal
    );
    this.state = { kind: "active", session, controller };
    this.logger.info(
      { sessionId: session.info.sessionId, roomId: session.info.roomId, anchor: session.info.anchorName },
      "Live session started"
    );
    return session.info;
  }

  /** Cancels the session and waits for its shutdown. `null` when idle. */
  async stop(): Promise<SessionInfo | null> {
    if (this.state.kind === "idle") return null;
    const { session, controller } = this.state;
    controller.abort();
    const outcome = await session.closed;
    // A concurrent stop may have cleared it already.
    if (this.state.kind === "active" && this.state.session === session) {
      this.state = { kind: "idle" };
    }
    this.logger.info({ sessionId: session.info.sessionId, reason: outcome.reason }, "Live session stopped");
    return session.info;
  }

  status(): SessionInfo | null {
    return this.state.kind === "active" ? this.state.session.info : null;
  }

  /** Resolves when the active session ends for any reason; `null` when idle. */
  ended(): Promise<SessionOutcome> | null {
    return this.state.kind === "active" ? this.state.session.closed : null;
  }

  /**
   * Teardown without a graceful shutdown. The upstream session is not ended
   * and expires on its own.
   */
  dispose(): void {
    if (this.state.kind === "idle") return;
    this.state.session.abort();
    this.state = { kind: "idle" };
  }
}
