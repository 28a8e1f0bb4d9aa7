import "./setup-env";
import { cleanEnv, num, str, url } from "envalid";

const env = cleanEnv(process.env, {
  // Empty token means unauthenticated requests (60/hour on github.com)
  GITHUB_TOKEN: str({ default: "" }),
  GITHUB_API_URL: url({ default: "https://api.github.com" }),
  GITHUB_REQUEST_TIMEOUT_MS: num({ default: 10_000 }),
  GITHUB_MAX_RETRIES: num({ default: 5 }),
  // 0 picks a size from the number of available CPUs
  CONTRIBUTORS_CONCURRENCY: num({ default: 0 }),
  CONTRIBUTORS_LOG_FILE: str({ default: "github_contributor_count.log" }),
});

export default env;
