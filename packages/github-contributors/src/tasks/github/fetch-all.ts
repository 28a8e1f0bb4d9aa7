import type { CommitPageSource } from "../../github-client/types";
import { silentLogger, type Logger } from "../../logger";
import { defaultConcurrency, describeError, forEachSettled } from "../../utils";
import { CommitWalker, parseRepositorySlug } from "./commit-walker";
import { extractContributors } from "./contributors";
import { PageFetcher } from "./page-fetcher";
import { RunContext, type RunIssue } from "./run-context";

export interface ContributorRow {
  repository: string;
  email: string;
  name: string;
  lastCommit: string;
}

export interface ContributorReport {
  rows: ContributorRow[];
  // Insertion order is job completion order
  repositoryCounts: Map<string, number>;
  totalUniqueContributors: number;
  issues: readonly RunIssue[];
  hadIssues: boolean;
}

export interface CollectOptions {
  source: CommitPageSource;
  apiUrl: string;
  since?: string;
  concurrency?: number;
  maxRetries?: number;
  logger?: Logger;
  context?: RunContext;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  onProgress?: (done: number, total: number, repository: string) => void;
}

interface RepositoryResult {
  // Normalized `owner/name`, which may differ from the input line
  repository: string;
  rows: ContributorRow[];
}

async function processRepository(
  repository: string,
  options: CollectOptions,
  logger: Logger
): Promise<RepositoryResult> {
  const slug = parseRepositorySlug(repository);
  const fullName = `${slug.owner}/${slug.name}`;
  logger.info(`Processing repository: ${fullName}`, { repository: fullName });

  const fetcher = new PageFetcher({
    source: options.source,
    logger,
    repository: fullName,
    maxRetries: options.maxRetries,
    sleep: options.sleep,
    now: options.now,
  });
  const walker = new CommitWalker({ apiUrl: options.apiUrl, fetcher, logger });

  const commits = await walker.walk(slug, options.since);
  const contributors = extractContributors(commits, fullName, logger);

  const rows = Array.from(contributors.values(), (contributor) => ({
    repository: fullName,
    email: contributor.email,
    name: contributor.name,
    lastCommit: contributor.lastCommit,
  }));
  return { repository: fullName, rows };
}

/**
 * Walk every repository concurrently and merge the per-repository
 * contributor lists. A repository that fails is logged and left out; it
 * never stops the others.
 */
export async function collectContributors(
  repositories: readonly string[],
  options: CollectOptions
): Promise<ContributorReport> {
  const context = options.context ?? new RunContext();
  const logger = context.attach(options.logger ?? silentLogger);
  const concurrency = options.concurrency || defaultConcurrency();

  const rows: ContributorRow[] = [];
  const repositoryCounts = new Map<string, number>();
  let done = 0;

  logger.info(
    `Processing ${repositories.length} repositories with ${concurrency} workers`
  );

  await forEachSettled(
    repositories,
    concurrency,
    (repository) => processRepository(repository, options, logger),
    (repository, result) => {
      done++;
      if (result.status === "fulfilled") {
        const { rows: repositoryRows } = result.value;
        rows.push(...repositoryRows);
        repositoryCounts.set(
          result.value.repository,
          new Set(repositoryRows.map((row) => row.email)).size
        );
      } else {
        logger.error(
          `Error processing repository ${repository}: ${describeError(result.reason)}`,
          { repository, error: result.reason }
        );
        if (result.reason instanceof Error && result.reason.stack) {
          logger.debug(result.reason.stack, { repository });
        }
      }
      options.onProgress?.(done, repositories.length, repository);
    }
  );

  const totalUniqueContributors = new Set(rows.map((row) => row.email)).size;

  return {
    rows,
    repositoryCounts,
    totalUniqueContributors,
    issues: context.issues,
    hadIssues: context.hasIssues,
  };
}
