import { describe, it, expect } from "vitest";
import { CliUsageError, parseCliArgs } from "../cli.js";

describe("parseCliArgs", () => {
  it("defaults every flag off", () => {
    expect(parseCliArgs([])).toEqual({
      dryRun: false,
      watch: false,
      help: false,
      configPath: undefined,
    });
  });

  it("reads all flags", () => {
    expect(parseCliArgs(["--dry-run", "--watch", "--config", "prod.env"])).toEqual({
      dryRun: true,
      watch: true,
      help: false,
      configPath: "prod.env",
    });
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });

  it("rejects unknown flags and positionals", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow(CliUsageError);
    expect(() => parseCliArgs(["feeds.txt"])).toThrow(CliUsageError);
  });

  it("rejects --config without a value", () => {
    expect(() => parseCliArgs(["--config"])).toThrow(CliUsageError);
  });
});
