import type { CommitListQuery, CommitRecord } from "../../github-client/types";
import type { Logger } from "../../logger";
import { describeError } from "../../utils";
import { COMMITS_PER_PAGE } from "./data-config";
import type { PageFetcher } from "./page-fetcher";

export interface RepositorySlug {
  owner: string;
  name: string;
}

export class InvalidRepositoryError extends Error {
  constructor(readonly input: string) {
    super(`Invalid repository "${input}", expected "owner/name"`);
    this.name = "InvalidRepositoryError";
  }
}

export function parseRepositorySlug(input: string): RepositorySlug {
  const parts = input.trim().split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new InvalidRepositoryError(input);
  }
  return { owner: parts[0], name: parts[1] };
}

export function commitsUrl(apiUrl: string, slug: RepositorySlug): string {
  return `${apiUrl.replace(/\/+$/, "")}/repos/${slug.owner}/${slug.name}/commits`;
}

export interface CommitWalkerOptions {
  apiUrl: string;
  fetcher: PageFetcher;
  logger: Logger;
}

/**
 * Follows the commits listing page by page. Never rejects: any failure ends
 * the walk and whatever was collected so far is returned.
 */
export class CommitWalker {
  private apiUrl: string;
  private fetcher: PageFetcher;
  private logger: Logger;

  constructor(options: CommitWalkerOptions) {
    this.apiUrl = options.apiUrl;
    this.fetcher = options.fetcher;
    this.logger = options.logger;
  }

  async walk(slug: RepositorySlug, since?: string): Promise<CommitRecord[]> {
    const repository = `${slug.owner}/${slug.name}`;
    const commits: CommitRecord[] = [];

    let url: string | undefined = commitsUrl(this.apiUrl, slug);
    // `next` links already carry the query string
    let query: CommitListQuery | undefined = since
      ? { since, per_page: COMMITS_PER_PAGE }
      : { per_page: COMMITS_PER_PAGE };

    try {
      while (url) {
        const result = await this.fetcher.fetchPage(url, query);

        if (result.status === "not-found") {
          this.logger.warn(`Repository ${repository} not found (404). Skipping.`, {
            repository,
            url,
          });
          break;
        }

        if (result.status === "failed") {
          const detail =
            result.reason === "timeout"
              ? "Max retries exceeded"
              : result.reason === "forbidden"
                ? "Access forbidden (403)"
                : `Request failed: ${describeError(result.error)}`;
          this.logger.warn(
            `${detail} for ${repository}. Keeping ${commits.length} commits fetched so far.`,
            { repository, url, error: result.error }
          );
          break;
        }

        commits.push(...result.commits);
        this.logger.info(
          `Fetched ${result.commits.length} commits for ${repository}. Total so far: ${commits.length}`,
          { repository }
        );

        url = result.next;
        query = undefined;
      }
    } catch (error) {
      this.logger.error(
        `Unexpected error fetching commits for ${repository}: ${describeError(error)}`,
        { repository, url, error }
      );
    }

    return commits;
  }
}
