import { type } from "arktype";
import type { Logger } from "../shared/logging.js";
import { LiveMessageSchema } from "./schemas.js";

export interface LiveEvent {
  cmd: string;
  data: unknown;
}

/** Commands the platform pushes on SEND_EVENT frames. */
export const LiveCommand = {
  DANMAKU: "LIVE_OPEN_PLATFORM_DM",
  GIFT: "LIVE_OPEN_PLATFORM_SEND_GIFT",
  SUPER_CHAT: "LIVE_OPEN_PLATFORM_SUPER_CHAT",
  SUPER_CHAT_DELETE: "LIVE_OPEN_PLATFORM_SUPER_CHAT_DEL",
  GUARD: "LIVE_OPEN_PLATFORM_GUARD",
  LIKE: "LIVE_OPEN_PLATFORM_LIKE",
  ROOM_ENTER: "LIVE_OPEN_PLATFORM_LIVE_ROOM_ENTER",
  LIVE_START: "LIVE_OPEN_PLATFORM_LIVE_START",
  LIVE_END: "LIVE_OPEN_PLATFORM_LIVE_END",
  INTERACTION_END: "LIVE_OPEN_PLATFORM_INTERACTION_END",
} as const;

/**
 * Splits a SEND_EVENT body on zero bytes and parses each document on its own.
 * A malformed document is logged and skipped; its siblings still parse.
 */
export function parseEvents(body: Buffer, logger?: Logger): LiveEvent[] {
  const events: LiveEvent[] = [];
  let start = 0;
  while (start <= body.length) {
    let end = body.indexOf(0, start);
    if (end === -1) end = body.length;
    const chunk = body.subarray(start, end);
    start = end + 1;
    if (chunk.length === 0) continue;

    const text = chunk.toString("utf8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      logger?.warn({ err, chunk: text }, "Skipping live event that is not valid JSON");
      continue;
    }
    const message = LiveMessageSchema(parsed);
    if (message instanceof type.errors) {
      logger?.warn({ chunk: text, problem: message.summary }, "Skipping live event without a cmd");
      continue;
    }
    events.push({ cmd: message.cmd, data: message.data ?? null });
  }
  return events;
}

function fieldAt(data: unknown, path: readonly string[]): unknown {
  let current = data;
  for (const key of path) {
    if (current === null || typeof current !== "object" || Array.isArray(current)) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

export function fieldString(event: LiveEvent, ...path: string[]): string | undefined {
  const value = fieldAt(event.data, path);
  return typeof value === "string" ? value : undefined;
}

export function fieldNumber(event: LiveEvent, ...path: string[]): number | undefined {
  const value = fieldAt(event.data, path);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function fieldBoolean(event: LiveEvent, ...path: string[]): boolean | undefined {
  const value = fieldAt(event.data, path);
  return typeof value === "boolean" ? value : undefined;
}
