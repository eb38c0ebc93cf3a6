/**
 * Error types for the assessment scraper.
 *
 * Components throw these to each other; `scrape()` converts every one of
 * them into a structured failure before it reaches the caller.
 */

export type AssessmentErrorCode =
  | "SESSION_INIT_FAILED"
  | "NAVIGATION_TIMEOUT"
  | "RATE_LIMITED"
  | "ENDPOINT_UNAVAILABLE"
  | "INVALID_REQUEST";

export class AssessmentScrapeError extends Error {
  constructor(
    message: string,
    public readonly code: AssessmentErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "AssessmentScrapeError";
  }
}

/**
 * The browser could not be launched or connected. Not retried within the
 * attempt; a fresh attempt may succeed.
 */
export class SessionInitError extends AssessmentScrapeError {
  constructor(message: string, cause?: unknown) {
    super(message, "SESSION_INIT_FAILED", cause);
    this.name = "SessionInitError";
  }
}

export class NavigationTimeout extends AssessmentScrapeError {
  constructor(
    message: string,
    public readonly waitedMs: number,
    cause?: unknown
  ) {
    super(message, "NAVIGATION_TIMEOUT", cause);
    this.name = "NavigationTimeout";
  }
}

/**
 * The portal answered with a quota notice or bot wall. Rotates to the next
 * egress endpoint when the scrape may rotate; fails the scrape otherwise.
 */
export class RateLimited extends AssessmentScrapeError {
  constructor(
    public readonly reason: string,
    public readonly endpointId?: string
  ) {
    super(`blocked: ${reason}`, "RATE_LIMITED");
    this.name = "RateLimited";
  }
}

export class EndpointUnavailable extends AssessmentScrapeError {
  constructor(
    message: string,
    public readonly endpointId?: string,
    cause?: unknown
  ) {
    super(message, "ENDPOINT_UNAVAILABLE", cause);
    this.name = "EndpointUnavailable";
  }
}

/**
 * First line of an error message, for diagnostics shown to end users.
 * Playwright errors carry multi-line call logs that are noise there.
 */
export function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.split("\n")[0].trim() || "Unknown error";
}
