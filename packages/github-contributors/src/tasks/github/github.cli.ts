import * as fs from "fs";
import { subHours } from "date-fns";
import { GitHubClient } from "../../github-client/client";
import type { CommitPageSource } from "../../github-client/types";
import { consoleSink, createLogger, fileSink } from "../../logger";
import { describeError } from "../../utils";
import { DEFAULT_LOOKBACK_DAYS, DEFAULT_OUTPUT_FILE } from "./data-config";
import { collectContributors } from "./fetch-all";
import { exportContributors } from "./github.exports";
import { printSummary } from "./github.reports";
import { RunContext } from "./run-context";

export interface CliArgs {
  repoFile: string;
  days: number;
  token: string;
  apiUrl: string;
  output: string;
  concurrency: number;
  debug: boolean;
  help: boolean;
}

export type CliDefaults = Pick<CliArgs, "token" | "apiUrl" | "concurrency">;

export const USAGE = `Usage: github-contributors <repo-file> [options]

Fetch GitHub contributors and their last commit info.

Arguments:
  repo-file            Text file with one "owner/repo" per line

Options:
  --days <n>           Days to look back for contributions (default: ${DEFAULT_LOOKBACK_DAYS}, 0 for all history)
  --token <token>      GitHub personal access token (default: $GITHUB_TOKEN)
  --api-url <url>      GitHub API URL (default: $GITHUB_API_URL or https://api.github.com)
  --output <file>      Output CSV file (default: ${DEFAULT_OUTPUT_FILE})
  --concurrency <n>    Repositories processed in parallel (default: based on CPU count)
  --debug              Print every log line instead of progress
  --help               Show this message`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const VALUE_FLAGS = new Set(["--days", "--token", "--api-url", "--output", "--concurrency"]);

function parseCount(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

export function parseArgs(argv: readonly string[], defaults: CliDefaults): CliArgs {
  const parsed: CliArgs = {
    repoFile: "",
    days: DEFAULT_LOOKBACK_DAYS,
    token: defaults.token,
    apiUrl: defaults.apiUrl,
    output: DEFAULT_OUTPUT_FILE,
    concurrency: defaults.concurrency,
    debug: false,
    help: false,
  };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--debug") {
      parsed.debug = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const equals = arg.indexOf("=");
    const flag = equals === -1 ? arg : arg.slice(0, equals);
    if (!VALUE_FLAGS.has(flag)) {
      throw new UsageError(`Unknown option: ${flag}`);
    }

    let value = equals === -1 ? undefined : arg.slice(equals + 1);
    if (value === undefined) {
      if (i + 1 >= argv.length) throw new UsageError(`${flag} requires a value`);
      value = argv[++i];
    }

    switch (flag) {
      case "--days":
        parsed.days = parseCount(flag, value);
        break;
      case "--concurrency":
        parsed.concurrency = parseCount(flag, value);
        break;
      case "--token":
        parsed.token = value;
        break;
      case "--api-url":
        parsed.apiUrl = value;
        break;
      case "--output":
        parsed.output = value;
        break;
    }
  }

  if (parsed.help) return parsed;

  if (positionals.length !== 1) {
    throw new UsageError(
      positionals.length === 0
        ? "the following argument is required: repo-file"
        : `unexpected arguments: ${positionals.slice(1).join(" ")}`
    );
  }
  parsed.repoFile = positionals[0];

  return parsed;
}

export function parseRepositoryList(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** ISO-8601 UTC lower bound for commit dates, or undefined for all history. */
export function computeSince(days: number, now: Date): string | undefined {
  return days > 0 ? subHours(now, days * 24).toISOString() : undefined;
}

export interface RunOptions {
  logFile: string;
  timeoutMs: number;
  maxRetries: number;
  // Replaces the GitHub client, used by tests
  source?: CommitPageSource;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Run a full collection: read the repository list, walk every repository,
 * write the CSV and print the summary. Resolves with whether any warning or
 * error was logged along the way.
 */
export async function runContributorCount(
  args: CliArgs,
  options: RunOptions
): Promise<boolean> {
  const context = new RunContext();
  const baseLogger = createLogger(
    fileSink(options.logFile),
    consoleSink(args.debug ? "debug" : "warn")
  );
  const logger = context.attach(baseLogger);

  logger.info("Starting process with provided arguments");

  const now = options.now ?? Date.now;
  const since = computeSince(args.days, new Date(now()));
  logger.info(`Using cutoff date: ${since ?? "none"}`);

  logger.info(`Reading repositories from file: ${args.repoFile}`);
  let repositories: string[];
  try {
    repositories = parseRepositoryList(fs.readFileSync(args.repoFile, "utf8"));
  } catch (error) {
    logger.error(`Failed to read repository file ${args.repoFile}: ${describeError(error)}`, {
      error,
    });
    throw error;
  }

  const source =
    options.source ??
    new GitHubClient({
      authToken: args.token,
      baseUrl: args.apiUrl,
      timeoutMs: options.timeoutMs,
      logger,
    });

  const report = await collectContributors(repositories, {
    source,
    apiUrl: args.apiUrl,
    since,
    concurrency: args.concurrency,
    maxRetries: options.maxRetries,
    logger: baseLogger,
    context,
    sleep: options.sleep,
    now: options.now,
    onProgress: args.debug
      ? undefined
      : (done, total, repository) =>
          console.log(`📈 Progress: ${done}/${total} repositories (${repository})`),
  });

  logger.info(`Writing results to CSV: ${args.output}`);
  exportContributors(args.output, report.rows);

  logger.info("Calculating summary information");
  printSummary(report);
  console.log(`\nDetailed data written to ${args.output}`);

  if (context.hasIssues) {
    console.log("\nProcess completed with errors or warnings. Check the logs for details.");
    logger.info("Process completed with errors or warnings.");
  } else {
    logger.info("Process completed");
  }

  return context.hasIssues;
}
