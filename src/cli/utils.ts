import { readFileSync, existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { isLogFormat, isLogLevel, type LogFormat, type LogLevel } from "../shared/logging.js";

const here = dirname(fileURLToPath(import.meta.url));

export function getPackageJsonVersion(): string {
  // src/cli when run from sources, dist/src/cli once built.
  const candidates = [join(here, "..", "..", "package.json"), join(here, "..", "..", "..", "package.json")];
  for (const p of candidates) {
    if (!existsSync(p)) continue;
    try {
      const pkg: unknown = JSON.parse(readFileSync(p, "utf8"));
      if (pkg !== null && typeof pkg === "object" && "name" in pkg && pkg.name === "openlive-relay") {
        return "version" in pkg && typeof pkg.version === "string" ? pkg.version : "0.0.0";
      }
    } catch {
      continue;
    }
  }
  return "0.0.0";
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (value === undefined) return fallback;
  const level = value.toLowerCase();
  return isLogLevel(level) ? level : fallback;
}

export function parseLogFormat(value: string | undefined, fallback: LogFormat = "text"): LogFormat {
  if (value === undefined) return fallback;
  return isLogFormat(value) ? value : fallback;
}
