import type { LogContext, LogLevel, Logger } from "../../logger";

export interface RunIssue {
  level: "warn" | "error";
  message: string;
  repository?: string;
  url?: string;
}

/**
 * Per-run record of every warning and error logged while collecting.
 * Handed back to the caller in the report instead of living in a global.
 */
export class RunContext {
  private readonly recorded: RunIssue[] = [];

  get issues(): readonly RunIssue[] {
    return this.recorded;
  }

  get hasIssues(): boolean {
    return this.recorded.length > 0;
  }

  record(level: LogLevel, message: string, context?: LogContext): void {
    if (level !== "warn" && level !== "error") return;
    this.recorded.push({
      level,
      message,
      repository: context?.repository,
      url: context?.url,
    });
  }

  /** Wrap `logger` so warnings and errors are recorded here as well. */
  attach(logger: Logger): Logger {
    const forward =
      (level: LogLevel) =>
      (message: string, context?: LogContext): void => {
        this.record(level, message, context);
        logger[level](message, context);
      };

    return {
      debug: forward("debug"),
      info: forward("info"),
      warn: forward("warn"),
      error: forward("error"),
    };
  }
}
