import { describe, it, expect, vi } from "vitest";
import { Writable } from "node:stream";
import pino from "pino";
import { EventQueue } from "../../src/shared/channel.js";
import { LIVE_EVENT, LiveEventBus, type BusMessage } from "../../src/live/bus.js";
import { LiveEventDispatcher } from "../../src/live/dispatcher.js";
import { fieldNumber, fieldString, parseEvents, type LiveEvent } from "../../src/live/events.js";
import { Operation, decodeFrames, encodeFrame, type Frame } from "../../src/live/packet.js";

function frameOf(operation: number, body: string): Frame {
  const [frame] = decodeFrames(encodeFrame(operation, Buffer.from(body, "utf8")));
  if (!frame) throw new Error("frame did not decode");
  return frame;
}

describe("parseEvents", () => {
  it("splits on zero bytes and skips a malformed document", () => {
    const body = Buffer.from('{"cmd":"A","data":{"n":1}}\0not json\0{"cmd":"B"}', "utf8");
    const lines: string[] = [];
    const logger = pino(
      { level: "warn" },
      new Writable({
        write(chunk: Buffer, _enc, cb) {
          lines.push(chunk.toString("utf8"));
          cb();
        },
      })
    );
    const events = parseEvents(body, logger);
    expect(events).toEqual([
      { cmd: "A", data: { n: 1 } },
      { cmd: "B", data: null },
    ]);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("Skipping live event that is not valid JSON");
  });

  it("skips empty chunks and documents without a cmd", () => {
    const body = Buffer.from('\0\0{"data":{}}\0{"cmd":"C","data":[1]}\0', "utf8");
    expect(parseEvents(body)).toEqual([{ cmd: "C", data: [1] }]);
  });

  it("reads nested fields by path", () => {
    const event: LiveEvent = { cmd: "X", data: { user: { name: "viewer", level: 3 } } };
    expect(fieldString(event, "user", "name")).toBe("viewer");
    expect(fieldNumber(event, "user", "level")).toBe(3);
    expect(fieldString(event, "user", "level")).toBeUndefined();
    expect(fieldNumber(event, "missing", "level")).toBeUndefined();
  });
});

describe("LiveEventDispatcher", () => {
  it("publishes each event to the bus and the queue", async () => {
    const bus = new LiveEventBus();
    const queue = new EventQueue<LiveEvent>(8);
    const seen: BusMessage[] = [];
    bus.subscribe((message) => seen.push(message));

    const dispatcher = new LiveEventDispatcher({ bus, queue });
    const events = dispatcher.dispatch(
      frameOf(Operation.SEND_EVENT, '{"cmd":"A","data":{"n":1}}\0{"cmd":"B","data":{"n":2}}')
    );

    expect(events.map((e) => e.cmd)).toEqual(["A", "B"]);
    expect(seen).toEqual([
      { event: LIVE_EVENT, payload: { cmd: "A", data: { n: 1 } } },
      { event: LIVE_EVENT, payload: { cmd: "B", data: { n: 2 } } },
    ]);
    expect(queue.size).toBe(2);
    expect((await queue.next()).value).toEqual({ cmd: "A", data: { n: 1 } });
  });

  it("keeps publishing to the bus when the queue is full", () => {
    const bus = new LiveEventBus();
    const queue = new EventQueue<LiveEvent>(1);
    const listener = vi.fn();
    bus.subscribe(listener);

    new LiveEventDispatcher({ bus, queue }).dispatch(
      frameOf(Operation.SEND_EVENT, '{"cmd":"A"}\0{"cmd":"B"}\0{"cmd":"C"}')
    );

    expect(listener).toHaveBeenCalledTimes(3);
    expect(queue.size).toBe(1);
  });

  it("keeps publishing to the bus when the queue is closed", () => {
    const bus = new LiveEventBus();
    const queue = new EventQueue<LiveEvent>(4);
    queue.close();
    const listener = vi.fn();
    bus.subscribe(listener);

    new LiveEventDispatcher({ bus, queue }).dispatch(frameOf(Operation.SEND_EVENT, '{"cmd":"A"}'));
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("publishes nothing for replies and unknown operations", () => {
    const bus = new LiveEventBus();
    const listener = vi.fn();
    bus.subscribe(listener);
    const dispatcher = new LiveEventDispatcher({ bus });

    expect(dispatcher.dispatch(frameOf(Operation.AUTH_REPLY, '{"code":0}'))).toEqual([]);
    expect(dispatcher.dispatch(frameOf(Operation.HEARTBEAT_REPLY, ""))).toEqual([]);
    expect(dispatcher.dispatch(frameOf(99, '{"cmd":"A"}'))).toEqual([]);
    expect(listener).not.toHaveBeenCalled();
  });

  it("works without any sink", () => {
    const events = new LiveEventDispatcher().dispatch(frameOf(Operation.SEND_EVENT, '{"cmd":"A"}'));
    expect(events).toEqual([{ cmd: "A", data: null }]);
  });
});

describe("LiveEventBus", () => {
  it("delivers to every listener even when one throws", () => {
    const bus = new LiveEventBus();
    const after = vi.fn();
    bus.subscribe(() => {
      throw new Error("listener failed");
    });
    bus.subscribe(after);
    bus.publish("live.started", { active: true });
    expect(after).toHaveBeenCalledWith({ event: "live.started", payload: { active: true } });
  });

  it("masks credentials in status payloads", () => {
    const bus = new LiveEventBus();
    const listener = vi.fn();
    bus.subscribe(listener);
    bus.publish("live.started", { accessSecret: "test-secret", roomId: 7 });
    expect(listener).toHaveBeenCalledWith({
      event: "live.started",
      payload: { accessSecret: "[REDACTED]", roomId: 7 },
    });
  });

  it("delivers live events without rewriting viewer text", () => {
    const bus = new LiveEventBus();
    const listener = vi.fn();
    bus.subscribe(listener);
    const payload = { cmd: "LIVE_OPEN_PLATFORM_DM", data: { msg: "authorization=abc please" } };
    bus.publish(LIVE_EVENT, payload);
    expect(listener).toHaveBeenCalledWith({ event: LIVE_EVENT, payload });
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new LiveEventBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);
    unsubscribe();
    bus.publish("live.event", {});
    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount).toBe(0);
  });
});
