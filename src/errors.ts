/**
 * Raised by ExtractionService.submit when the caller-side wait bound elapses
 * before the job completes. Distinct from the advisory timeout a job records
 * in its own result.
 */
export class ExtractionTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly waitedMs: number,
  ) {
    super("extraction timed out");
    this.name = "ExtractionTimeoutError";
  }
}

export class ServiceClosedError extends Error {
  constructor() {
    super("service shutting down");
    this.name = "ServiceClosedError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
