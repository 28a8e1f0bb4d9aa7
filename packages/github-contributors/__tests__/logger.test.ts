import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, it, expect, vi } from "vitest";
import {
  consoleSink,
  createLogger,
  fileSink,
  formatLogLine,
  toAscii,
  type LogEntry,
} from "../src/logger";
import { RunContext } from "../src/tasks/github/run-context";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("toAscii", () => {
  it("strips accents and drops characters with no ASCII form", () => {
    expect(toAscii("Zoë Łukasz 🚀 ok")).toBe("Zoe ukasz  ok");
  });
});

describe("formatLogLine", () => {
  it("prefixes a local timestamp and the level label", () => {
    const entry: LogEntry = {
      level: "warn",
      message: "Rate limit exceeded for octo/widgets",
      timestamp: new Date(2024, 0, 15, 9, 5, 7),
    };

    expect(formatLogLine(entry)).toBe(
      "2024-01-15 09:05:07 [WARNING] Rate limit exceeded for octo/widgets"
    );
  });
});

describe("fileSink", () => {
  it("appends one line per entry", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "contributors-log-"));
    const file = path.join(dir, "run.log");
    try {
      const logger = createLogger(fileSink(file));
      logger.info("first");
      logger.error("second");

      const lines = fs.readFileSync(file, "utf8").split("\n");
      expect(lines).toHaveLength(3);
      expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[INFO\] first$/);
      expect(lines[1]).toMatch(/ \[ERROR\] second$/);
      expect(lines[2]).toBe("");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("consoleSink", () => {
  it("filters below the minimum level and routes by severity", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger(consoleSink("warn"));

    logger.debug("hidden");
    logger.info("hidden too");
    logger.warn("careful");
    logger.error("broken");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[WARNING] careful");
    expect(error).toHaveBeenCalledWith("[ERROR] broken");
  });
});

describe("RunContext", () => {
  it("records warnings and errors passing through an attached logger", () => {
    const context = new RunContext();
    const seen: string[] = [];
    const logger = context.attach(createLogger((entry) => seen.push(entry.message)));

    logger.info("fine");
    expect(context.hasIssues).toBe(false);

    logger.warn("slow", { repository: "octo/widgets", url: "https://api.github.test/x" });
    logger.error("failed", { repository: "octo/gadgets", error: new Error("boom") });

    expect(seen).toEqual(["fine", "slow", "failed"]);
    expect(context.hasIssues).toBe(true);
    expect(context.issues).toEqual([
      { level: "warn", message: "slow", repository: "octo/widgets", url: "https://api.github.test/x" },
      { level: "error", message: "failed", repository: "octo/gadgets", url: undefined },
    ]);
  });
});
