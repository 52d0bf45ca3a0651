import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import type { LiveConfig } from "../../src/config.js";
import { EventQueue } from "../../src/shared/channel.js";
import { ApiError, ConfigError, LiveError } from "../../src/shared/errors.js";
import { LiveEventBus } from "../../src/live/bus.js";
import type { LiveApi, StartResult } from "../../src/live/client.js";
import type { LiveEvent } from "../../src/live/events.js";
import { LiveManager } from "../../src/live/manager.js";
import { Operation, encodeFrame } from "../../src/live/packet.js";
import type { LiveSocket, SocketHandlers } from "../../src/live/socket.js";

class FakeSocket implements LiveSocket {
  isOpen = true;
  readonly sent: Buffer[] = [];
  handlers: SocketHandlers | null = null;

  async send(data: Buffer): Promise<void> {
    this.sent.push(data);
  }

  close(): void {
    this.isOpen = false;
  }

  terminate(): void {
    this.isOpen = false;
  }

  attach(handlers: SocketHandlers): void {
    this.handlers = handlers;
  }
}

const config: LiveConfig = {
  accessKey: "test-key",
  accessSecret: "test-secret",
  appId: 1001,
  heartbeatIntervalSeconds: 20,
};

function startResult(sessionId: string, socketUrls = ["wss://push.test/ws"]): StartResult {
  return { sessionId, socketUrls, authBody: "{}", anchor: { roomId: 7, name: "Host" } };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("LiveManager", () => {
  let sockets: FakeSocket[];
  let api: {
    start: Mock<LiveApi["start"]>;
    heartbeat: Mock<LiveApi["heartbeat"]>;
    end: Mock<LiveApi["end"]>;
  };
  let manager: LiveManager;

  function createManager(extra: { bus?: LiveEventBus; queue?: EventQueue<LiveEvent> } = {}): LiveManager {
    return new LiveManager({
      config,
      api,
      connect: async () => {
        const socket = new FakeSocket();
        sockets.push(socket);
        return socket;
      },
      ...extra,
    });
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    sockets = [];
    let counter = 0;
    api = {
      start: vi.fn<LiveApi["start"]>(async () => startResult(`game-${++counter}`)),
      heartbeat: vi.fn<LiveApi["heartbeat"]>(async () => undefined),
      end: vi.fn<LiveApi["end"]>(async () => undefined),
    };
    manager = createManager();
  });

  afterEach(async () => {
    manager.dispose();
    await flush();
    vi.useRealTimers();
  });

  it("is idle before start", async () => {
    expect(manager.status()).toBeNull();
    expect(manager.ended()).toBeNull();
    await expect(manager.stop()).resolves.toBeNull();
  });

  it("starts a session and reports it", async () => {
    const info = await manager.start("ID-CODE");
    expect(api.start).toHaveBeenCalledWith("ID-CODE");
    expect(info).toMatchObject({ sessionId: "game-1", roomId: 7, anchorName: "Host" });
    expect(manager.status()).toBe(info);
  });

  it("refuses a second start and leaves the first session alone", async () => {
    const first = await manager.start("ID-CODE");

    const error = await manager.start("ID-CODE").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(LiveError);
    expect(error).toMatchObject({ code: "SESSION_ACTIVE" });
    expect(api.start).toHaveBeenCalledTimes(1);
    expect(manager.status()).toBe(first);
    expect(sockets[0]?.isOpen).toBe(true);
  });

  it("uses the configured identity code when none is passed", async () => {
    const withCode = new LiveManager({
      config: { ...config, identityCode: "FROM-CONFIG" },
      api,
      connect: async () => new FakeSocket(),
    });
    await withCode.start();
    expect(api.start).toHaveBeenCalledWith("FROM-CONFIG");
    withCode.dispose();
  });

  it("rejects a blank identity code before calling the API", async () => {
    await expect(manager.start("   ")).rejects.toBeInstanceOf(ConfigError);
    await expect(manager.start()).rejects.toBeInstanceOf(ConfigError);
    expect(api.start).not.toHaveBeenCalled();
  });

  it("rejects a start response without socket URLs and ends it", async () => {
    api.start.mockResolvedValueOnce(startResult("game-empty", []));
    await expect(manager.start("ID-CODE")).rejects.toBeInstanceOf(ApiError);
    expect(api.end).toHaveBeenCalledWith("game-empty");
    expect(manager.status()).toBeNull();
  });

  it("stops the session, ends it upstream and returns its info", async () => {
    const info = await manager.start("ID-CODE");
    await expect(manager.stop()).resolves.toBe(info);
    expect(api.end).toHaveBeenCalledTimes(1);
    expect(api.end).toHaveBeenCalledWith("game-1");
    expect(manager.status()).toBeNull();
    await expect(manager.stop()).resolves.toBeNull();
  });

  it("can start again after a stop", async () => {
    await manager.start("ID-CODE");
    await manager.stop();
    const second = await manager.start("ID-CODE");
    expect(second.sessionId).toBe("game-2");
  });

  it("reports and clears a session that ended by itself", async () => {
    const info = await manager.start("ID-CODE");
    const ended = manager.ended();
    sockets[0]?.handlers?.close(1000, "bye");

    await expect(ended).resolves.toEqual({ reason: "remote-closed", code: 1000, detail: "bye" });
    await expect(manager.stop()).resolves.toBe(info);
    expect(api.end).toHaveBeenCalledTimes(1);
    expect(manager.status()).toBeNull();
  });

  it("does not end the upstream session on dispose", async () => {
    await manager.start("ID-CODE");
    manager.dispose();
    await flush();
    expect(manager.status()).toBeNull();
    expect(api.end).not.toHaveBeenCalled();
  });

  it("raises a short heartbeat interval to the five second floor", async () => {
    manager = new LiveManager({
      config: { ...config, heartbeatIntervalSeconds: 1 },
      api,
      connect: async () => new FakeSocket(),
      socketHeartbeatMs: 60_000,
    });
    await manager.start("ID-CODE");

    await vi.advanceTimersByTimeAsync(4_999);
    await flush();
    expect(api.heartbeat).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await flush();
    expect(api.heartbeat).toHaveBeenCalledTimes(1);
    expect(api.heartbeat).toHaveBeenCalledWith("game-1");
  });

  it("falls back to the default heartbeat interval for a non-finite value", async () => {
    manager = new LiveManager({
      config: { ...config, heartbeatIntervalSeconds: Number.NaN },
      api,
      connect: async () => new FakeSocket(),
      socketHeartbeatMs: 60_000,
    });
    await manager.start("ID-CODE");

    await vi.advanceTimersByTimeAsync(19_000);
    await flush();
    expect(api.heartbeat).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1_000);
    await flush();
    expect(api.heartbeat).toHaveBeenCalledTimes(1);
  });

  it("feeds pushed events to the bus and the queue", async () => {
    const bus = new LiveEventBus();
    const queue = new EventQueue<LiveEvent>(4);
    const published: string[] = [];
    bus.subscribe((message) => {
      published.push(message.event);
    });
    manager = createManager({ bus, queue });

    await manager.start("ID-CODE");
    sockets[0]?.handlers?.message(encodeFrame(Operation.SEND_EVENT, Buffer.from('{"cmd":"A"}')), true);
    await flush();

    expect(published).toEqual(["live.event"]);
    await expect(queue.next()).resolves.toEqual({ value: { cmd: "A", data: null }, done: false });
  });
});
