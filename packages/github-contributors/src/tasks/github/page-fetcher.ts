import { addSeconds, format } from "date-fns";
import { LinkHeaderParseError, parseLinkHeader } from "../../github-client/link-header";
import type {
  CommitListQuery,
  CommitPageSource,
  CommitRecord,
} from "../../github-client/types";
import type { Logger } from "../../logger";
import { delay, describeError } from "../../utils";
import { RATE_LIMIT_MARGIN_SECONDS } from "./data-config";

export type PageFetchResult =
  | { status: "ok"; commits: CommitRecord[]; next?: string }
  | { status: "not-found" }
  | {
      status: "failed";
      reason: "timeout" | "transport" | "forbidden";
      error?: unknown;
    };

export interface PageFetcherOptions {
  source: CommitPageSource;
  logger: Logger;
  repository: string;
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

// Two independent counters: timeouts are bounded, rate-limit waits are not.
interface AttemptState {
  timeouts: number;
  rateLimitWaits: number;
}

export class PageFetcher {
  private source: CommitPageSource;
  private logger: Logger;
  private repository: string;
  private maxRetries: number;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(options: PageFetcherOptions) {
    this.source = options.source;
    this.logger = options.logger;
    this.repository = options.repository;
    this.maxRetries = options.maxRetries ?? 5;
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? Date.now;
  }

  /**
   * Seconds to wait before retrying a rate-limited request. Without a reset
   * time the retry-after hint is used, and the margin alone as a last resort.
   */
  rateLimitWaitSeconds(resetAt?: number, retryAfter?: number): number {
    let wait = 0;
    if (resetAt !== undefined) {
      wait = Math.max(0, resetAt - Math.floor(this.now() / 1000));
    } else if (retryAfter !== undefined) {
      wait = Math.max(0, retryAfter);
    }
    return wait + RATE_LIMIT_MARGIN_SECONDS;
  }

  async fetchPage(url: string, query?: CommitListQuery): Promise<PageFetchResult> {
    const state: AttemptState = { timeouts: 0, rateLimitWaits: 0 };
    const context = { repository: this.repository, url };

    for (;;) {
      this.logger.info(`Fetching commits for ${this.repository} with URL: ${url}`, context);
      const response = await this.source.requestCommitPage(url, query);

      switch (response.kind) {
        case "page":
          return {
            status: "ok",
            commits: response.commits,
            next: this.nextPageUrl(response.link, url),
          };

        case "not-found":
          return { status: "not-found" };

        case "rate-limited": {
          state.rateLimitWaits++;
          const waitSeconds = this.rateLimitWaitSeconds(
            response.resetAt,
            response.retryAfter
          );
          const resumeAt = format(addSeconds(this.now(), waitSeconds), "HH:mm");
          this.logger.warn(
            `Rate limit exceeded for ${this.repository}. Retrying in ${waitSeconds} seconds (around ${resumeAt}), wait #${state.rateLimitWaits}...`,
            context
          );
          await this.sleep(waitSeconds * 1000);
          continue;
        }

        case "timeout": {
          state.timeouts++;
          if (state.timeouts > this.maxRetries) {
            return { status: "failed", reason: "timeout" };
          }
          const backoffSeconds = 2 ** state.timeouts;
          this.logger.warn(
            `Request timed out for ${this.repository}. Retrying in ${backoffSeconds} seconds (attempt ${state.timeouts}/${this.maxRetries})...`,
            context
          );
          await this.sleep(backoffSeconds * 1000);
          continue;
        }

        case "forbidden":
          return { status: "failed", reason: "forbidden", error: response.error };

        case "error":
          return { status: "failed", reason: "transport", error: response.error };
      }
    }
  }

  private nextPageUrl(link: string | undefined, url: string): string | undefined {
    if (!link) return undefined;

    try {
      return parseLinkHeader(link).next;
    } catch (error) {
      if (!(error instanceof LinkHeaderParseError)) throw error;
      this.logger.warn(
        `Ignoring malformed Link header for ${this.repository}: ${describeError(error)}`,
        { repository: this.repository, url }
      );
      return undefined;
    }
  }
}
