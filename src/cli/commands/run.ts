import chalk from "chalk";
import { type } from "arktype";
import { getDataDir, readFullConfig, resolveLiveConfig } from "../../config.js";
import { EventQueue } from "../../shared/channel.js";
import { EVENT_QUEUE_CAPACITY } from "../../shared/constants.js";
import { getEnv } from "../../shared/env.js";
import { EXIT, errorMessage, exit, exitCodeFor } from "../../shared/errors.js";
import { initLogger, type Logger } from "../../shared/logging.js";
import { LIVE_EVENT, LIVE_STARTED, LIVE_STOPPED, LiveEventBus, type BusMessage } from "../../live/bus.js";
import type { LiveEvent } from "../../live/events.js";
import { LiveManager } from "../../live/manager.js";
import { LiveMessageSchema } from "../../live/schemas.js";
import { sessionStatusPayload, type SessionInfo, type SessionOutcome } from "../../live/session.js";
import { renderEvent } from "../render.js";
import { parseLogFormat, parseLogLevel } from "../utils.js";

export interface RunOptions {
  identityCode?: string;
  logLevel?: string;
  logFormat?: string;
  dataDir?: string;
  json?: boolean;
}

function printSessionBanner(info: SessionInfo): void {
  process.stderr.write("\n");
  process.stderr.write(chalk.bold("Live session") + "\n");
  process.stderr.write("───────────────────────────────────────────────\n");
  process.stderr.write(`Session:  ${info.sessionId}\n`);
  process.stderr.write(`Room:     ${info.roomId}\n`);
  process.stderr.write(`Anchor:   ${info.anchorName}${info.anchorId ? ` (${info.anchorId})` : ""}\n`);
  process.stderr.write(`Started:  ${info.startedAt.toISOString()}\n`);
  process.stderr.write("───────────────────────────────────────────────\n\n");
}

/** Prints bus traffic: JSON lines in --json mode, rendered events otherwise. */
export function createConsoleSubscriber(
  json: boolean,
  logger: Logger,
  write: (line: string) => void = (line) => process.stdout.write(line + "\n")
): (message: BusMessage) => void {
  return (message) => {
    if (json) {
      write(JSON.stringify(message));
      return;
    }
    if (message.event !== LIVE_EVENT) return;
    const parsed = LiveMessageSchema(message.payload);
    if (parsed instanceof type.errors) return;
    const event: LiveEvent = { cmd: parsed.cmd, data: parsed.data ?? null };
    const lines = renderEvent(event);
    if (lines) {
      for (const line of lines) write(line);
    } else {
      logger.debug({ cmd: event.cmd, data: event.data }, "Live event without a renderer");
    }
  };
}

async function drainQueue(queue: EventQueue<LiveEvent>, logger: Logger): Promise<void> {
  for await (const event of queue) {
    logger.debug({ cmd: event.cmd }, "Consumer received live event");
  }
}

function waitForSignal(): { promise: Promise<NodeJS.Signals>; dispose: () => void } {
  let onSignal: (signal: NodeJS.Signals) => void = () => undefined;
  const promise = new Promise<NodeJS.Signals>((resolve) => {
    onSignal = resolve;
  });
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return {
    promise,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

export async function runLive(opts: RunOptions): Promise<void> {
  const dataDir = getDataDir(opts.dataDir);
  const file = await readFullConfig(dataDir);
  const fileLevel = file["log.level"];
  const logger = initLogger(
    parseLogLevel(opts.logLevel ?? getEnv("LOG_LEVEL") ?? (fileLevel === undefined ? undefined : String(fileLevel))),
    parseLogFormat(opts.logFormat)
  );

  let manager: LiveManager | null = null;
  try {
    const config = resolveLiveConfig(file, process.env, { identityCode: opts.identityCode });
    const bus = new LiveEventBus();
    const queue = new EventQueue<LiveEvent>(EVENT_QUEUE_CAPACITY);
    bus.subscribe(createConsoleSubscriber(opts.json ?? false, logger));
    const drained = drainQueue(queue, logger);

    manager = new LiveManager({ config, bus, queue });
    const info = await manager.start();
    if (!opts.json) printSessionBanner(info);
    bus.publish(LIVE_STARTED, sessionStatusPayload(info));

    const ended = manager.ended() ?? Promise.resolve<SessionOutcome>({ reason: "cancelled" });
    const signal = waitForSignal();
    const received = await Promise.race([signal.promise, ended.then(() => null)]);
    signal.dispose();
    if (received) logger.info({ signal: received }, "Stopping live session");
    await manager.stop();
    const outcome = await ended;

    bus.publish(LIVE_STOPPED, {
      ...sessionStatusPayload(null),
      session_id: info.sessionId,
      reason: outcome.reason,
    });
    queue.close();
    await drained;

    if (outcome.reason === "transport-error") {
      exit(EXIT.UPSTREAM_FAILURE, outcome.error.message);
    }
  } catch (error) {
    manager?.dispose();
    exit(exitCodeFor(error), errorMessage(error));
  }
}
