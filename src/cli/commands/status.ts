import { describeLiveConfig, getConfigPath, getDataDir, readFullConfig, resolveLiveConfig } from "../../config.js";
import { errorMessage } from "../../shared/errors.js";
import { getPackageJsonVersion } from "../utils.js";

export async function runStatus(opts: { dataDir?: string }): Promise<void> {
  const dataDir = getDataDir(opts.dataDir);
  const file = await readFullConfig(dataDir);

  let live: Record<string, unknown>;
  try {
    live = { ok: true, ...describeLiveConfig(resolveLiveConfig(file)) };
  } catch (error) {
    live = { ok: false, error: errorMessage(error) };
  }

  const status = {
    version: getPackageJsonVersion(),
    configPath: getConfigPath(dataDir),
    live,
  };

  process.stdout.write(JSON.stringify(status, null, 2) + "\n");
}
