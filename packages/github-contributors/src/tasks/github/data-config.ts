export const DEFAULT_LOOKBACK_DAYS = 90;
export const DEFAULT_OUTPUT_FILE = "contributors.csv";

// Commits endpoint allows at most 100 items per page
export const COMMITS_PER_PAGE = 100;

// Seconds added on top of the advertised rate-limit reset
export const RATE_LIMIT_MARGIN_SECONDS = 3;

export const SUMMARY_COLUMN = {
  DEFAULT_WIDTH: 40,
  MAX_WIDTH: 80,
  COUNT_WIDTH: 20,
};

export const CSV_HEADERS = {
  repository: "Repository",
  email: "Contributor Email",
  name: "Contributor Name",
  lastCommit: "Last Commit Timestamp",
} as const;
