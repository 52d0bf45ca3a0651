import { Command } from "commander";
import { DEFAULT_DATA_DIR_NAME } from "../shared/constants.js";
import { LOG_FORMATS, LOG_LEVELS } from "../shared/logging.js";
import { getPackageJsonVersion } from "./utils.js";
import { runLive } from "./commands/run.js";
import { runStatus } from "./commands/status.js";
import { runConfigGet, runConfigSet, runConfigShow } from "./commands/config.js";

const DATA_DIR_DEFAULT = `~/${DEFAULT_DATA_DIR_NAME}`;

export function createProgram(): Command {
  const program = new Command();

  program
    .name("openlive-relay")
    .description("Live-room event client for the open live platform push service")
    .version(getPackageJsonVersion());

  program
    .command("run")
    .description("Start a live session and print room events until interrupted")
    .option("--identity-code <code>", "Anchor identity code (overrides live.identity_code)")
    .option("--log-level <level>", `Log level: ${LOG_LEVELS.join(", ")}`)
    .option("--log-format <format>", `Log format: ${LOG_FORMATS.join(", ")}`, "text")
    .option("--data-dir <path>", "Data directory", DATA_DIR_DEFAULT)
    .option("--json", "Print bus messages as JSON lines")
    .action((opts: { identityCode?: string; logLevel?: string; logFormat?: string; dataDir?: string; json?: boolean }) =>
      runLive(opts)
    );

  program
    .command("status")
    .description("Show resolved configuration")
    .option("--data-dir <path>", "Data directory", DATA_DIR_DEFAULT)
    .action((opts: { dataDir?: string }) => runStatus(opts));

  const config = program.command("config").description("Read and write config.json");

  config
    .command("get <key>")
    .description("Print one config value")
    .option("--data-dir <path>", "Data directory", DATA_DIR_DEFAULT)
    .action((key: string, opts: { dataDir?: string }) => runConfigGet(key, opts));

  config
    .command("set <key> <value>")
    .description("Set one config value")
    .option("--data-dir <path>", "Data directory", DATA_DIR_DEFAULT)
    .action((key: string, value: string, opts: { dataDir?: string }) => runConfigSet(key, value, opts));

  config
    .command("show")
    .description("Print config.json with secrets masked")
    .option("--data-dir <path>", "Data directory", DATA_DIR_DEFAULT)
    .action((opts: { dataDir?: string }) => runConfigShow(opts));

  return program;
}
