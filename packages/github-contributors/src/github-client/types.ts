import { z } from "zod";

export const CommitAuthorSchema = z
  .object({
    name: z.string().nullish(),
    email: z.string().nullish(),
    date: z.string().nullish(),
  })
  .passthrough();

export const CommitRecordSchema = z
  .object({
    sha: z.string().optional(),
    author: z
      .object({
        login: z.string().nullish(),
        type: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    commit: z
      .object({
        author: CommitAuthorSchema.nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const CommitPageSchema = z.array(CommitRecordSchema);

export type CommitAuthor = z.infer<typeof CommitAuthorSchema>;
export type CommitRecord = z.infer<typeof CommitRecordSchema>;

export interface CommitListQuery {
  since?: string;
  per_page: number;
}

// Outcome of a single HTTP attempt against the commits endpoint
export type CommitPageResponse =
  | { kind: "page"; commits: CommitRecord[]; link?: string }
  | { kind: "not-found" }
  | { kind: "rate-limited"; resetAt?: number; retryAfter?: number }
  | { kind: "forbidden"; error: unknown }
  | { kind: "timeout" }
  | { kind: "error"; error: unknown; status?: number };

export interface CommitPageSource {
  requestCommitPage(
    url: string,
    query?: CommitListQuery
  ): Promise<CommitPageResponse>;
}
