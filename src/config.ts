import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { type } from "arktype";
import {
  DEFAULT_DATA_DIR_NAME,
  DEFAULT_HEARTBEAT_INTERVAL_SECONDS,
  MIN_HEARTBEAT_INTERVAL_SECONDS,
} from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { ConfigError } from "./shared/errors.js";

const CONFIG_FILENAME = "config.json";

export function getDataDir(custom?: string): string {
  if (custom) return path.resolve(custom.replace(/^~(?=$|[\\/])/, homedir()));
  const fromEnv = getEnv("DATA_DIR");
  if (fromEnv) return path.resolve(fromEnv);
  return path.join(homedir(), DEFAULT_DATA_DIR_NAME);
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

export type ConfigKey =
  | "live.access_key"
  | "live.access_secret"
  | "live.app_id"
  | "live.identity_code"
  | "live.host"
  | "live.heartbeat_interval_seconds"
  | "log.level";

export const CONFIG_KEYS: readonly ConfigKey[] = [
  "live.access_key",
  "live.access_secret",
  "live.app_id",
  "live.identity_code",
  "live.host",
  "live.heartbeat_interval_seconds",
  "log.level",
];

export function isConfigKey(s: string): s is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(s);
}

/** Flat key/value document as stored on disk. */
export type FullConfig = Partial<Record<ConfigKey, string | number>>;

/** Credentials and tuning for one live session. Read-only once resolved. */
export interface LiveConfig {
  readonly accessKey: string;
  readonly accessSecret: string;
  readonly appId: number;
  readonly identityCode?: string;
  readonly host?: string;
  readonly heartbeatIntervalSeconds: number;
}

const LiveConfigSchema = type({
  accessKey: "string > 0",
  accessSecret: "string > 0",
  appId: "number.integer",
  "identityCode?": "string",
  "host?": "string",
  heartbeatIntervalSeconds: "number",
});

export function clampHeartbeatSeconds(seconds: number | undefined): number {
  if (seconds === undefined || !Number.isFinite(seconds)) return DEFAULT_HEARTBEAT_INTERVAL_SECONDS;
  return Math.max(MIN_HEARTBEAT_INTERVAL_SECONDS, Math.floor(seconds));
}

export async function readFullConfig(dataDir: string): Promise<FullConfig> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) return {};
    throw error;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new ConfigError(`${configPath} is not valid JSON`);
  }
  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    throw new ConfigError(`${configPath} must contain a JSON object`);
  }
  const cfg: FullConfig = {};
  for (const [key, value] of Object.entries(data)) {
    if (isConfigKey(key) && (typeof value === "string" || typeof value === "number")) {
      cfg[key] = value;
    }
  }
  return cfg;
}

export async function writeFullConfig(dataDir: string, cfg: FullConfig): Promise<void> {
  await mkdir(dataDir, { recursive: true });
  await writeFile(getConfigPath(dataDir), JSON.stringify(cfg, null, 2) + "\n", "utf8");
}

export async function configGet(dataDir: string, key: ConfigKey): Promise<string | undefined> {
  const cfg = await readFullConfig(dataDir);
  const raw = cfg[key];
  return raw === undefined ? undefined : String(raw);
}

export async function configSet(dataDir: string, key: ConfigKey, value: string): Promise<void> {
  const cfg = await readFullConfig(dataDir);
  cfg[key] = value;
  await writeFullConfig(dataDir, cfg);
}

function pick(
  env: string | undefined,
  file: string | number | undefined
): string | undefined {
  if (env !== undefined) return env;
  if (file === undefined) return undefined;
  const text = String(file).trim();
  return text === "" ? undefined : text;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Merges config.json with OPENLIVE_* environment overrides and validates the
 * result. Access key, secret and an integer app id are required.
 */
export function resolveLiveConfig(
  file: FullConfig,
  env: NodeJS.ProcessEnv = process.env,
  overrides: { identityCode?: string } = {}
): LiveConfig {
  const accessKey = pick(getEnv("ACCESS_KEY", env), file["live.access_key"]);
  const accessSecret = pick(getEnv("ACCESS_SECRET", env), file["live.access_secret"]);
  const appId = pick(getEnv("APP_ID", env), file["live.app_id"]);

  const missing = [
    accessKey === undefined ? "live.access_key" : null,
    accessSecret === undefined ? "live.access_secret" : null,
    appId === undefined ? "live.app_id" : null,
  ].filter((name): name is string => name !== null);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required config: ${missing.join(", ")}`);
  }

  const candidate = {
    accessKey,
    accessSecret,
    appId: toNumber(appId),
    identityCode: overrides.identityCode ?? pick(getEnv("IDENTITY_CODE", env), file["live.identity_code"]),
    host: pick(getEnv("HOST", env), file["live.host"]),
    heartbeatIntervalSeconds: clampHeartbeatSeconds(
      toNumber(pick(getEnv("HEARTBEAT_SECONDS", env), file["live.heartbeat_interval_seconds"]))
    ),
  };
  const out = LiveConfigSchema(candidate);
  if (out instanceof type.errors) {
    throw new ConfigError(`Invalid live config: ${out.summary}`);
  }
  const { identityCode, host, ...required } = out;
  return Object.freeze({
    ...required,
    ...(identityCode !== undefined ? { identityCode } : {}),
    ...(host !== undefined ? { host } : {}),
  });
}

/** The resolved config with the secret masked, for status output. */
export function describeLiveConfig(config: LiveConfig): Record<string, unknown> {
  return {
    accessKey: config.accessKey,
    accessSecret: "***",
    appId: config.appId,
    identityCode: config.identityCode ? "***" : "not set",
    host: config.host ?? "default",
    heartbeatIntervalSeconds: config.heartbeatIntervalSeconds,
  };
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
