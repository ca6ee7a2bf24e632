/** Raised by the HTTP core for any non-2xx response. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly url: string
  ) {
    super(`API returned status ${status}: ${body.slice(0, 200)}`);
    this.name = "HttpError";
  }
}

/** Invalid or missing configuration. Fatal at startup. */
export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/** One or more jobs failed during a cycle. */
export class CycleError extends Error {
  constructor(
    readonly failedJobs: readonly string[],
    readonly errors: readonly Error[]
  ) {
    super(`${failedJobs.length} jobs failed: [${failedJobs.join(", ")}]`);
    this.name = "CycleError";
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export const toError = (err: unknown): Error =>
  err instanceof Error ? err : new Error(String(err));
