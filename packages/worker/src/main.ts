// =============================================================================
// @rss-courier/worker — Process lifecycle
// =============================================================================
// Parses flags, loads and validates config, builds the worker, then either
// runs the pipeline once or hands it to the scheduler (--watch). Returns the
// process exit code instead of exiting so tests can drive it.
//
//   0  run completed (including runs with zero new entries or entry failures)
//   1  authentication failure or an unexpected fatal error
//   2  invalid flags or configuration
// =============================================================================

import {
  ConfigError,
  DeliveryError,
  createLogger,
  createRunId,
  errorMessage,
  loadConfig,
  loadEnvFile,
  type Config,
  type LogSink,
  type Logger,
} from "@rss-courier/shared";
import { CliUsageError, USAGE, parseCliArgs, type CliOptions } from "./cli.js";
import {
  createWorker,
  type WorkerInstance,
  type WorkerOverrides,
} from "./app.js";
import { runPipeline } from "./pipeline.js";
import { assertValidSchedule, startScheduler } from "./scheduler.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface MainOptions extends WorkerOverrides {
  env?: Record<string, string | undefined>;
  cwd?: string;
  sink?: LogSink;
  /** Human-facing output (help text, usage errors) */
  print?: (text: string) => void;
  /** Resolves when watch mode should stop. Defaults to SIGINT/SIGTERM. */
  untilStopped?: () => Promise<void>;
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });
}

export async function main(
  argv: string[],
  options: MainOptions = {},
): Promise<number> {
  const print = options.print ?? ((text: string) => process.stderr.write(text));
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  // --- Flags ---
  let cli: CliOptions;
  try {
    cli = parseCliArgs(argv);
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    print(`${err.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  if (cli.help) {
    print(USAGE);
    return EXIT_OK;
  }

  // --- Config (no network activity before this succeeds) ---
  let config: Config;
  try {
    const merged = loadEnvFile(cli.configPath, env, cwd);
    config = loadConfig(merged, { dryRun: cli.dryRun, cwd });
    if (cli.watch) assertValidSchedule(config.cronSchedule);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    createLogger({ sink: options.sink }).fatal("Invalid configuration", {
      issues: err.issues,
    });
    return EXIT_USAGE;
  }

  const logger: Logger = createLogger({
    level: config.logLevel,
    sink: options.sink,
  });

  // --- Worker (Discord login happens here, before any feed is fetched) ---
  let worker: WorkerInstance;
  try {
    worker = await createWorker(config, {
      logger,
      dryRun: cli.dryRun,
      connect: options.connect,
      anthropicClient: options.anthropicClient,
      fetchFeed: options.fetchFeed,
    });
  } catch (err) {
    if (err instanceof DeliveryError) {
      logger.fatal("Discord authentication failed", { error: err.message });
      return EXIT_FATAL;
    }
    logger.fatal("Startup failed", { error: errorMessage(err) });
    return EXIT_FATAL;
  }

  const { deps } = worker;
  const runOnce = () =>
    runPipeline(
      { ...deps, logger: deps.logger.child({ run: createRunId() }) },
      { dryRun: cli.dryRun },
    );

  try {
    const report = await runOnce();
    logger.info("Run complete", {
      delivered: report.delivered,
      filtered: report.filtered,
      failed: report.failed,
      previewed: report.previewed,
      skipped: report.skipped,
      failedFeeds: report.feeds.filter((f) => f.status === "failed").length,
      durationMs: report.durationMs,
    });

    if (cli.watch) {
      const scheduler = startScheduler(config.cronSchedule, runOnce, logger);
      await (options.untilStopped ?? waitForSignal)();
      scheduler.stop();
      await scheduler.idle();
    }
    return EXIT_OK;
  } catch (err) {
    logger.fatal("Run aborted", { error: errorMessage(err) });
    return EXIT_FATAL;
  } finally {
    await worker.shutdown();
  }
}
