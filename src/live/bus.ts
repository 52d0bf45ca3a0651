import { getLogger, maskSensitiveObject } from "../shared/logging.js";

export interface BusMessage {
  event: string;
  payload: unknown;
}

export type BusListener = (message: BusMessage) => void;

export const LIVE_EVENT = "live.event";
export const LIVE_STARTED = "live.started";
export const LIVE_STOPPED = "live.stopped";

/**
 * Multi-producer, multi-consumer fan-out. Delivery is synchronous; a listener
 * that throws is logged and the remaining listeners still receive the message.
 * Status payloads are masked; live events are delivered unchanged.
 */
export class LiveEventBus {
  private readonly listeners = new Set<BusListener>();
  private readonly logger = getLogger().child({ module: "live.bus" });

  publish(event: string, payload: unknown): void {
    const message: BusMessage = {
      event,
      payload: event === LIVE_EVENT ? payload : maskSensitiveObject(payload),
    };
    for (const listener of [...this.listeners]) {
      try {
        listener(message);
      } catch (err) {
        this.logger.warn({ err, event }, "Bus listener threw");
      }
    }
  }

  subscribe(listener: BusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
