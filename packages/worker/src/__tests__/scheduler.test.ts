import { describe, it, expect, vi, beforeEach } from "vitest";
import { ConfigError, createLogger } from "@rss-courier/shared";

const cron = vi.hoisted(() => ({
  validate: vi.fn((expr: string) => expr !== "not a cron"),
  schedule: vi.fn(),
  tick: (): void => {
    throw new Error("no task scheduled");
  },
  stopped: false,
}));

vi.mock("node-cron", () => ({
  default: {
    validate: cron.validate,
    schedule: cron.schedule,
  },
}));

import { assertValidSchedule, startScheduler } from "../scheduler.js";

describe("startScheduler", () => {
  let lines: Array<Record<string, unknown>>;
  const logger = createLogger({ sink: (line) => lines.push(JSON.parse(line)) });

  beforeEach(() => {
    lines = [];
    cron.stopped = false;
    cron.schedule.mockImplementation((_expr: string, fn: () => void) => {
      cron.tick = fn;
      return {
        stop: () => {
          cron.stopped = true;
        },
      };
    });
  });

  it("rejects an invalid expression", () => {
    expect(() => startScheduler("not a cron", async () => {}, logger)).toThrow(ConfigError);
    expect(cron.schedule).not.toHaveBeenCalledWith("not a cron", expect.anything());
  });

  it("validates an expression without scheduling it", () => {
    expect(() => assertValidSchedule("*/5 * * * *")).not.toThrow();
    expect(() => assertValidSchedule("not a cron")).toThrow(
      'CRON_SCHEDULE: "not a cron" is not a valid cron expression',
    );
  });

  it("skips a tick while the previous run is still going", async () => {
    let finish: () => void = () => {};
    const job = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    const handle = startScheduler("*/5 * * * *", job, logger);

    cron.tick();
    cron.tick();
    expect(job).toHaveBeenCalledTimes(1);
    expect(lines.map((l) => l.msg)).toContain("Previous run still in progress, skipping tick");

    finish();
    await handle.idle();
    cron.tick();
    expect(job).toHaveBeenCalledTimes(2);

    finish();
    handle.stop();
    await handle.idle();
    expect(cron.stopped).toBe(true);
  });

  it("logs a failed run and keeps scheduling", async () => {
    const job = vi.fn(async () => {
      throw new Error("boom");
    });
    const handle = startScheduler("*/5 * * * *", job, logger);

    cron.tick();
    await handle.idle();

    expect(lines.find((l) => l.msg === "Scheduled run failed")).toMatchObject({
      level: "error",
      error: "boom",
    });
    cron.tick();
    await handle.idle();
    expect(job).toHaveBeenCalledTimes(2);
  });
});
