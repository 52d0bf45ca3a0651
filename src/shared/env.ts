/** Environment variables that override config.json. */
export const OPENLIVE_ENV = {
  ACCESS_KEY: "OPENLIVE_ACCESS_KEY",
  ACCESS_SECRET: "OPENLIVE_ACCESS_SECRET",
  APP_ID: "OPENLIVE_APP_ID",
  IDENTITY_CODE: "OPENLIVE_IDENTITY_CODE",
  HOST: "OPENLIVE_HOST",
  HEARTBEAT_SECONDS: "OPENLIVE_HEARTBEAT_SECONDS",
  LOG_LEVEL: "OPENLIVE_LOG_LEVEL",
  DATA_DIR: "OPENLIVE_DATA_DIR",
} as const;

export type EnvKey = keyof typeof OPENLIVE_ENV;

export function getEnv(key: EnvKey, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[OPENLIVE_ENV[key]];
  return value === undefined || value === "" ? undefined : value;
}
