#!/usr/bin/env node
import env from "../../env";
import { describeError } from "../../utils";
import {
  USAGE,
  UsageError,
  parseArgs,
  runContributorCount,
  type CliArgs,
} from "./github.cli";

if (require.main === module) {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2), {
      token: env.GITHUB_TOKEN,
      apiUrl: env.GITHUB_API_URL,
      concurrency: env.CONTRIBUTORS_CONCURRENCY,
    });
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`${USAGE}\n\nerror: ${error.message}`);
    process.exit(2);
  }

  if (args.help) {
    console.log(USAGE);
    process.exit(0);
  }

  runContributorCount(args, {
    logFile: env.CONTRIBUTORS_LOG_FILE,
    timeoutMs: env.GITHUB_REQUEST_TIMEOUT_MS,
    maxRetries: env.GITHUB_MAX_RETRIES,
  })
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      console.error(`Command failed: ${describeError(error)}`);
      process.exit(1);
    });
}
