import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

const SECRET_NAMES = "[A-Z][A-Z0-9_]*_SECRET|access_secret|accessSecret|authorization|Authorization";

export function redactSecrets(input: string): string {
  return input
    .replace(
      new RegExp(`\\b(${SECRET_NAMES})\\s*=\\s*([^\\s]+)`, "g"),
      (_match, name: string) => `${name}=[REDACTED]`
    )
    .replace(
      new RegExp(`\\b(${SECRET_NAMES})\\b(["']?)\\s*:\\s*(["'])[^"']*\\3`, "g"),
      (_match, name: string, keyQuote: string, valueQuote: string) =>
        `${name}${keyQuote}:${valueQuote}[REDACTED]${valueQuote}`
    );
}

export function maskSensitiveObject<T>(value: T): T {
  try {
    const serialized = JSON.stringify(value);
    if (!serialized) return value;
    return JSON.parse(redactSecrets(serialized)) as T;
  } catch {
    return value;
  }
}

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isLogFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const o: unknown = JSON.parse(line);
          if (o !== null && typeof o === "object" && "msg" in o && typeof o.msg === "string") {
            process.stderr.write(redactSecrets(o.msg) + "\n");
          }
        } catch {
          process.stderr.write(redactSecrets(line) + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): pino.Logger {
  const logLevel = isLogLevel(level) ? level : "info";
  const options = { level: logLevel, name: "openlive-relay" };
  if (format === "plain") {
    rootLogger = pino(options, plainMessageStderr());
  } else if (format === "text") {
    rootLogger = pino(options, pinoPretty({ colorize: true, destination: redactingStderr() }));
  } else {
    rootLogger = pino(options, redactingStderr());
  }
  return rootLogger;
}

export function getLogger(): pino.Logger {
  return rootLogger ?? initLogger("info", "plain");
}

export type Logger = pino.Logger;
