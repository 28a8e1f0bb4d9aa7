export { GitHubClient, classifyRequestError } from "./github-client/client";
export type { GitHubClientOptions } from "./github-client/client";
export { LinkHeaderParseError, parseLinkHeader } from "./github-client/link-header";
export type {
  CommitListQuery,
  CommitPageResponse,
  CommitPageSource,
  CommitRecord,
} from "./github-client/types";
export {
  consoleSink,
  createLogger,
  fileSink,
  silentLogger,
} from "./logger";
export type { LogContext, LogEntry, LogLevel, LogSink, Logger } from "./logger";
export {
  CommitWalker,
  InvalidRepositoryError,
  parseRepositorySlug,
} from "./tasks/github/commit-walker";
export type { RepositorySlug } from "./tasks/github/commit-walker";
export { extractContributors, isBot } from "./tasks/github/contributors";
export type { Contributor } from "./tasks/github/contributors";
export { collectContributors } from "./tasks/github/fetch-all";
export type {
  CollectOptions,
  ContributorReport,
  ContributorRow,
} from "./tasks/github/fetch-all";
export { exportContributors, formatContributorsCsv } from "./tasks/github/github.exports";
export { formatSummary, printSummary } from "./tasks/github/github.reports";
export { PageFetcher } from "./tasks/github/page-fetcher";
export type { PageFetchResult } from "./tasks/github/page-fetcher";
export { RunContext } from "./tasks/github/run-context";
export type { RunIssue } from "./tasks/github/run-context";
