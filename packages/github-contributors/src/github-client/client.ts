import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import type { Logger } from "../logger";
import {
  CommitPageSchema,
  type CommitListQuery,
  type CommitPageResponse,
  type CommitPageSource,
} from "./types";

export interface GitHubClientOptions {
  authToken?: string;
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  // Swapped out in tests to serve canned responses
  fetch?: typeof fetch;
}

type HeaderValue = string | number | undefined;
type HeaderMap = Record<string, HeaderValue>;

function parseHeaderNumber(value: HeaderValue): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === "number" ? value : parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function isRateLimitError(error: RequestError): boolean {
  const headers: HeaderMap = error.response?.headers ?? {};
  return (
    headers["x-ratelimit-remaining"] === "0" ||
    headers["retry-after"] !== undefined ||
    error.message.toLowerCase().includes("rate limit")
  );
}

export function classifyRequestError(error: unknown): CommitPageResponse {
  if (!(error instanceof RequestError)) {
    return { kind: "error", error };
  }

  switch (error.status) {
    case 404:
      return { kind: "not-found" };
    case 403:
    case 429: {
      if (error.status === 403 && !isRateLimitError(error)) {
        return { kind: "forbidden", error };
      }
      const headers: HeaderMap = error.response?.headers ?? {};
      return {
        kind: "rate-limited",
        resetAt: parseHeaderNumber(headers["x-ratelimit-reset"]),
        retryAfter: parseHeaderNumber(headers["retry-after"]),
      };
    }
    default:
      return { kind: "error", error, status: error.status };
  }
}

/**
 * Thin Octokit wrapper that performs exactly one request per call and reports
 * what happened. Waiting and retrying are left to the caller.
 */
export class GitHubClient implements CommitPageSource {
  private octokit: Octokit;
  private timeoutMs: number;

  constructor(options: GitHubClientOptions) {
    const { logger } = options;
    this.timeoutMs = options.timeoutMs;
    this.octokit = new Octokit({
      auth: options.authToken || undefined,
      baseUrl: options.baseUrl,
      userAgent: "github-contributors v0.1.0",
      // Per-request outcomes are classified here and logged by the page
      // fetcher; only Octokit's own warnings (deprecations) pass through.
      log: {
        debug: () => {},
        info: () => {},
        warn: (message: string) => logger.warn(message),
        error: () => {},
      },
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  async requestCommitPage(
    url: string,
    query?: CommitListQuery
  ): Promise<CommitPageResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.octokit.request(`GET ${url}`, {
        ...query,
        request: { signal: controller.signal },
      });

      const parsed = CommitPageSchema.safeParse(response.data);
      if (!parsed.success) {
        return {
          kind: "error",
          error: new Error(
            `Response from ${url} is not a list of commits: ${parsed.error.message}`
          ),
          status: response.status,
        };
      }

      return { kind: "page", commits: parsed.data, link: response.headers.link };
    } catch (error) {
      if (controller.signal.aborted) {
        return { kind: "timeout" };
      }
      return classifyRequestError(error);
    } finally {
      clearTimeout(timer);
    }
  }
}
