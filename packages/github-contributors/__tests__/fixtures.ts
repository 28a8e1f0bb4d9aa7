import type {
  CommitListQuery,
  CommitPageResponse,
  CommitPageSource,
  CommitRecord,
} from "../src/github-client/types";
import type { LogEntry, Logger } from "../src/logger";
import { createLogger } from "../src/logger";

export const API_URL = "https://api.github.test";

export function commit(fields: {
  sha?: string;
  email?: string;
  name?: string;
  date?: string;
  login?: string;
  type?: string;
}): CommitRecord {
  return {
    sha: fields.sha ?? "0000000",
    author:
      fields.login !== undefined || fields.type !== undefined
        ? { login: fields.login ?? null, type: fields.type ?? "User" }
        : null,
    commit: {
      author: {
        name: fields.name ?? "Someone",
        email: fields.email ?? "someone@example.com",
        date: fields.date ?? "2024-01-01T00:00:00Z",
      },
    },
  };
}

export function page(commits: CommitRecord[], link?: string): CommitPageResponse {
  return { kind: "page", commits, link };
}

export interface RecordedCall {
  url: string;
  query?: CommitListQuery;
}

/** Serves responses in order; the last one repeats once the script runs out. */
export class ScriptedSource implements CommitPageSource {
  readonly calls: RecordedCall[] = [];
  private index = 0;

  constructor(private readonly script: CommitPageResponse[]) {}

  async requestCommitPage(
    url: string,
    query?: CommitListQuery
  ): Promise<CommitPageResponse> {
    this.calls.push({ url, query });
    const response = this.script[Math.min(this.index, this.script.length - 1)];
    this.index++;
    return response;
  }
}

/** Serves the same response for a URL every time it is requested. */
export class RoutedSource implements CommitPageSource {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly routes: Map<string, CommitPageResponse>,
    private readonly hooks: {
      before?: (url: string) => Promise<void>;
    } = {}
  ) {}

  async requestCommitPage(
    url: string,
    query?: CommitListQuery
  ): Promise<CommitPageResponse> {
    this.calls.push({ url, query });
    await this.hooks.before?.(url);
    const response = this.routes.get(url);
    if (!response) {
      return { kind: "not-found" };
    }
    return response;
  }
}

export function repoUrl(repository: string): string {
  return `${API_URL}/repos/${repository}/commits`;
}

/**
 * Routes for a repository served over several pages, each pointing at the
 * next through a Link header.
 */
export function paginatedRoutes(
  repository: string,
  pages: CommitRecord[][]
): Array<[string, CommitPageResponse]> {
  const base = repoUrl(repository);
  const urlFor = (index: number) => (index === 0 ? base : `${base}?page=${index + 1}`);

  return pages.map((commits, index): [string, CommitPageResponse] => {
    const isLast = index === pages.length - 1;
    const link = isLast
      ? `<${base}?page=1>; rel="first", <${urlFor(index - 1)}>; rel="prev"`
      : `<${urlFor(index + 1)}>; rel="next", <${base}?page=${pages.length}>; rel="last"`;
    return [urlFor(index), page(commits, pages.length === 1 ? undefined : link)];
  });
}

export function fakeClock(startMs = 1_700_000_000_000) {
  let current = startMs;
  const sleeps: number[] = [];

  return {
    sleeps,
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
  };
}

export function capturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: createLogger((entry) => entries.push(entry)), entries };
}
