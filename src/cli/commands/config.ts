import {
  CONFIG_KEYS,
  configGet,
  configSet,
  getDataDir,
  isConfigKey,
  readFullConfig,
} from "../../config.js";
import { EXIT, exit } from "../../shared/errors.js";
import { maskSensitiveObject } from "../../shared/logging.js";

function requireKey(key: string) {
  if (!isConfigKey(key)) {
    exit(EXIT.INVALID_ARGS, `Unknown config key: ${key}. Known keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return key;
}

export async function runConfigGet(key: string, opts: { dataDir?: string }): Promise<void> {
  const value = await configGet(getDataDir(opts.dataDir), requireKey(key));
  process.stdout.write(`${value ?? ""}\n`);
}

export async function runConfigSet(key: string, value: string, opts: { dataDir?: string }): Promise<void> {
  await configSet(getDataDir(opts.dataDir), requireKey(key), value);
}

export async function runConfigShow(opts: { dataDir?: string }): Promise<void> {
  const cfg = await readFullConfig(getDataDir(opts.dataDir));
  process.stdout.write(JSON.stringify(maskSensitiveObject(cfg), null, 2) + "\n");
}
