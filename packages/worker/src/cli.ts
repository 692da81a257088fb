import { parseArgs } from "node:util";

export interface CliOptions {
  dryRun: boolean;
  watch: boolean;
  help: boolean;
  configPath?: string;
}

export const USAGE = `Usage: rss-courier [options]

Fetch configured RSS/Atom feeds, summarize new entries, and deliver each
summary as a Discord direct message.

Options:
  --dry-run          Summarize and log; send nothing and record nothing as seen
  --config <path>    Read settings from this .env-style file (default: ./.env)
  --watch            Keep running and repeat on CRON_SCHEDULE
  -h, --help         Show this help
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        "dry-run": { type: "boolean", default: false },
        config: { type: "string" },
        watch: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      allowPositionals: false,
      strict: true,
    });

    return {
      dryRun: values["dry-run"] ?? false,
      watch: values.watch ?? false,
      help: values.help ?? false,
      configPath: values.config,
    };
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}
