import fs from "node:fs";
import { Command, CommanderError } from "commander";
import { loadConfig, loadEnvWithDotenv, type NormalizeOptions } from "./config.js";
import { AppError, errorMessage, exitCodeFor } from "./errors.js";
import { HttpFetcher } from "./fetcher.js";
import { runMonitorOnce } from "./monitor.js";
import { STATUS_LABELS } from "./report.js";
import { runSelftest } from "./selftest.js";
import { SnapshotStore } from "./store.js";

interface CliOptions {
  selftest?: boolean;
  config?: string;
  state?: string;
  out?: string;
}

function buildProgram(): Command {
  return new Command()
    .name("site-change-monitor")
    .description("Fetch one web page, detect changes since the last run and render a static report")
    .option("--selftest", "Run the pipeline against a built-in fixture without network or real state")
    .option("--config <path>", "Path to the JSON configuration file")
    .option("--state <path>", "Path to the snapshot state file")
    .option("--out <dir>", "Directory for the generated site")
    .exitOverride()
    .configureOutput({ writeErr: (s) => process.stderr.write(s) });
}

function selftestNormalizeOptions(configPath: string): NormalizeOptions | undefined {
  // A present config must be valid; a missing one just means defaults
  if (!fs.existsSync(configPath)) return undefined;
  return loadConfig(configPath).normalize;
}

/** Runs the command line and resolves to the process exit code. */
export async function runCli(argv: string[]): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv);
  } catch (err) {
    // commander has already printed usage or the parse error
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 2;
    throw err;
  }
  const opts = program.opts<CliOptions>();

  try {
    const env = loadEnvWithDotenv();
    const configPath = opts.config ?? env.SITE_MONITOR_CONFIG;

    if (opts.selftest) {
      return await runSelftest({ normalize: selftestNormalizeOptions(configPath) });
    }

    const config = loadConfig(configPath);
    console.log(`[CLI] Checking ${config.targetUrl}`);

    const { result } = await runMonitorOnce({
      config,
      fetcher: new HttpFetcher({ timeoutMs: config.timeoutMs, userAgent: config.userAgent, retries: config.retries }),
      store: new SnapshotStore(opts.state ?? env.SITE_MONITOR_STATE),
      outputDir: opts.out ?? env.SITE_MONITOR_OUTPUT,
    });
    console.log(STATUS_LABELS[result.status]);
    return 0;
  } catch (err) {
    const kind = err instanceof AppError ? err.code : "UnknownError";
    console.error(`[CLI] ${kind}: ${errorMessage(err)}`);
    return opts.selftest ? 3 : exitCodeFor(err);
  }
}
