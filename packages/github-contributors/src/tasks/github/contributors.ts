import type { CommitRecord } from "../../github-client/types";
import type { Logger } from "../../logger";

export interface Contributor {
  name: string;
  email: string;
  lastCommit: string;
}

const BOT_SUFFIX = "[bot]";
const MISSING = "N/A";

/**
 * A commit is automated when GitHub marks the linked account as a Bot, or
 * when the login or the raw commit email carries the `[bot]` suffix.
 */
export function isBot(commit: CommitRecord): boolean {
  const account = commit.author;
  if (account) {
    if (account.type === "Bot") return true;
    if ((account.login ?? "").toLowerCase().endsWith(BOT_SUFFIX)) return true;
  }

  const email = commit.commit?.author?.email ?? "";
  return email.toLowerCase().endsWith(BOT_SUFFIX);
}

/**
 * Deduplicate the human authors of one repository by lower-cased email.
 *
 * Commits are expected newest first, so the first occurrence of an email
 * holds its most recent commit date and later ones are ignored. An email
 * seen on a bot commit is dropped for the rest of the repository.
 */
export function extractContributors(
  commits: readonly CommitRecord[],
  repository: string,
  logger: Logger
): Map<string, Contributor> {
  const contributors = new Map<string, Contributor>();
  const bots = new Set<string>();

  for (const commit of commits) {
    const author = commit.commit?.author;
    if (!author || Object.keys(author).length === 0) {
      logger.info(
        `Skipping commit ${commit.sha ?? "(no sha)"} in ${repository} with no author metadata`,
        { repository }
      );
      continue;
    }

    const email = (author.email ?? MISSING).toLowerCase();
    const name = author.name ?? MISSING;

    if (isBot(commit) || bots.has(email)) {
      if (!bots.has(email)) {
        logger.info(`Contributor ${name} (${email}) to ${repository} is a bot`, {
          repository,
        });
        bots.add(email);
        contributors.delete(email);
      }
      continue;
    }

    if (!contributors.has(email)) {
      logger.info(`Adding ${name} (${email}) as contributor to ${repository}`, {
        repository,
      });
      contributors.set(email, {
        name,
        email,
        lastCommit: author.date ?? MISSING,
      });
    }
  }

  return contributors;
}
