import type { EventQueue } from "../shared/channel.js";
import { getLogger } from "../shared/logging.js";
import { LIVE_EVENT, type LiveEventBus } from "./bus.js";
import { parseEvents, type LiveEvent } from "./events.js";
import { Operation, operationName, type Frame } from "./packet.js";

export interface DispatcherSinks {
  /** Fan-out bus; every listener sees every event. */
  bus?: LiveEventBus;
  /** Single-consumer queue feeding auto-response logic. */
  queue?: EventQueue<LiveEvent>;
}

/** Routes decoded frames: SEND_EVENT bodies become LiveEvents, replies are only logged. */
export class LiveEventDispatcher {
  private readonly logger = getLogger().child({ module: "live.dispatch" });

  constructor(private readonly sinks: DispatcherSinks = {}) {}

  /** Returns the events published from this frame. */
  dispatch(frame: Frame): LiveEvent[] {
    const meta = {
      totalLength: frame.totalLength,
      headerLength: frame.headerLength,
      version: frame.version,
      sequence: frame.sequence,
    };

    switch (frame.operation) {
      case Operation.AUTH_REPLY:
        this.logger.info({ ...meta, body: frame.body.toString("utf8") }, "Authenticated, receiving live events");
        return [];
      case Operation.HEARTBEAT_REPLY:
        this.logger.debug(meta, "Heartbeat reply");
        return [];
      case Operation.SEND_EVENT: {
        const events = parseEvents(frame.body, this.logger);
        for (const event of events) this.publish(event);
        return events;
      }
      default:
        this.logger.debug(
          { ...meta, operation: operationName(frame.operation), length: frame.body.length },
          "Ignoring unhandled operation"
        );
        return [];
    }
  }

  private publish(event: LiveEvent): void {
    this.sinks.bus?.publish(LIVE_EVENT, { cmd: event.cmd, data: event.data });

    const queue = this.sinks.queue;
    if (!queue) return;
    const result = queue.offer(event);
    if (result !== "ok") {
      this.logger.warn({ cmd: event.cmd, result }, "Live event dropped from consumer queue");
    }
  }
}
