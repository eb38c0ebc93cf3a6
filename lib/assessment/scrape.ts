/**
 * Scrape Entry Point
 *
 * Orchestrates one lot lookup: resolve the municipality, open a session
 * (through an egress endpoint when rotating), run the navigation state
 * machine, and format the result. Every failure comes back as a structured
 * result; nothing thrown inside escapes this function.
 */

import { randomUUID } from "crypto";
import { scrapeRequestSchema } from "./api/schemas";
import { loadScraperConfig, type ScraperConfig } from "./config";
import { BlockDetector } from "./detection/block-detector";
import { getEgressPool, type EgressPool } from "./egress/pool";
import { EgressRotation } from "./egress/rotation";
import {
  AssessmentScrapeError,
  EndpointUnavailable,
  NavigationTimeout,
  RateLimited,
  SessionInitError,
  describeError,
} from "./errors";
import { format, type ExternalFields } from "./format/result-formatter";
import { mockFields } from "./mock/mock-data";
import { runNavigation } from "./navigation/state-machine";
import type { NavigationResult, NavigationStrategy } from "./navigation/types";
import { createConsoleObserver, type ScrapeObserver } from "./observability";
import { dispatch, resolve } from "./registry";
import { createSessionManager } from "./session/browser";
import type { SessionHandle, SessionManager } from "./session/types";
import type {
  EgressEndpoint,
  ExtractionResult,
  InternalFields,
  MunicipalityProfile,
  ScrapeRequest,
} from "./types";
import { Deadline } from "./utils/timing";

// Import the sources to auto-register their navigation strategies
import "./sources/montreal";
import "./sources/acceo";

// ============================================================================
// Options & Result
// ============================================================================

export interface ScrapeOptions {
  useRotation?: boolean;
  useMock?: boolean;
  headless?: boolean;
  /** Overall budget for the call; defaults to the configured deadline. */
  deadlineMs?: number;
  /** Return synthetic fields (still marked failed) when the live scrape fails. */
  fallbackToMock?: boolean;
  observer?: ScrapeObserver;
  sessions?: SessionManager;
  /** Defaults to the process-wide pool; see releaseEgressPool(). */
  egressPool?: EgressPool;
  config?: ScraperConfig;
  detector?: BlockDetector;
}

export interface ScrapeResult {
  runId: string;
  fields: ExternalFields;
  succeeded: boolean;
  source: ExtractionResult["source"];
  error?: string;
  diagnostic?: string;
}

// ============================================================================
// Attempts
// ============================================================================

interface LiveRun {
  readonly runId: string;
  readonly request: ScrapeRequest;
  readonly profile: MunicipalityProfile;
  readonly strategy: NavigationStrategy;
  readonly config: ScraperConfig;
  readonly sessions: SessionManager;
  readonly detector: BlockDetector;
  readonly observer: ScrapeObserver;
  readonly deadline: Deadline;
}

type AttemptOutcome =
  | { kind: "navigated"; result: NavigationResult }
  | { kind: "error"; error: unknown };

/**
 * Open a session, navigate, and close the session exactly once, whatever
 * happens in between. A blocked navigation comes back as RateLimited.
 */
async function runAttempt(run: LiveRun, endpoint: EgressEndpoint | undefined, proxyPort: number): Promise<AttemptOutcome> {
  const { config, deadline, observer } = run;
  let handle: SessionHandle | undefined;

  try {
    deadline.check("session start");

    const opening = run.sessions.open({
      headless: run.request.headless,
      antiDetection: true,
      navTimeoutMs: config.navTimeoutMs,
      opTimeoutMs: config.opTimeoutMs,
      wsEndpoint: config.wsEndpoint,
      egress:
        endpoint && endpoint.address
          ? { endpointId: endpoint.id, address: endpoint.address, port: proxyPort }
          : undefined,
    });
    try {
      handle = await deadline.race(opening, "session start");
    } catch (error) {
      // A session that finishes opening after the deadline still gets closed.
      void opening.then((late) => run.sessions.close(late)).catch(() => undefined);
      throw error;
    }

    const result = await deadline.race(
      runNavigation(
        {
          runId: run.runId,
          driver: handle.driver,
          profile: run.profile,
          lotNumber: run.request.lotNumber,
          timings: config.timings,
          randomizedTiming: handle.randomizedTiming,
          detector: run.detector,
          deadline,
          observer,
        },
        run.strategy
      ),
      "navigation"
    );
    if (result.blocked) {
      throw new RateLimited(result.blockReason ?? "unrecognized block signal", endpoint?.id);
    }
    return { kind: "navigated", result };
  } catch (error) {
    return { kind: "error", error };
  } finally {
    if (handle) {
      await run.sessions.close(handle);
    }
  }
}

interface LiveOutcome {
  fields?: InternalFields;
  degraded?: boolean;
  cause?: string;
}

/**
 * Run attempts until one finishes, fails for good, or rotation runs out.
 */
async function runLive(run: LiveRun, pool: EgressPool | undefined): Promise<LiveOutcome> {
  const rotation = pool && pool.size > 0 ? new EgressRotation(pool, pool.regions()) : undefined;
  if (pool && !rotation) {
    console.warn("[Egress] Rotation requested but no egress endpoints are configured; going direct");
  }

  let lastCause: string | undefined;
  let attempt = 0;

  for (;;) {
    let endpoint: EgressEndpoint | undefined;
    if (rotation) {
      try {
        endpoint = (await run.deadline.race(rotation.next(), "egress acquisition")) ?? undefined;
      } catch (error) {
        return { cause: `timeout: ${describeError(error)}` };
      }
      if (!endpoint) {
        return { cause: `${lastCause ?? "no usable endpoint"}; egress endpoints exhausted` };
      }
    }

    attempt++;
    const started = Date.now();
    const step = `attempt-${attempt}`;
    run.observer.onStepStart({ runId: run.runId, step });
    run.observer.increment("attempts");

    const outcome = await runAttempt(run, endpoint, pool?.proxyPort ?? run.config.egress.proxyPort);
    const durationMs = Date.now() - started;
    run.observer.timing("attempt_ms", durationMs);

    if (outcome.kind === "error") {
      const { error } = outcome;
      const retryable =
        rotation !== undefined && (error instanceof SessionInitError || error instanceof EndpointUnavailable);
      const cause =
        error instanceof NavigationTimeout
          ? `timeout: ${error.message}`
          : error instanceof AssessmentScrapeError
            ? describeError(error)
            : `error: ${describeError(error)}`;

      run.observer.onStepEnd({ runId: run.runId, step, ok: false, durationMs, data: { endpoint: endpoint?.id, cause } });
      if (error instanceof RateLimited && rotation && endpoint) {
        run.observer.increment("blocked", 1, { endpoint: endpoint.id });
        rotation.markBlocked(endpoint);
        lastCause = cause;
        continue;
      }
      if (retryable) {
        lastCause = cause;
        continue;
      }
      return { cause };
    }

    const { result } = outcome;
    run.observer.onStepEnd({
      runId: run.runId,
      step,
      ok: result.currentStage === "DONE",
      durationMs,
      data: { endpoint: endpoint?.id, stage: result.currentStage, lastUrl: result.lastUrl, cause: result.cause },
    });

    if (result.currentStage === "DONE") {
      return { fields: result.fields, degraded: result.degraded };
    }

    return { cause: result.cause ?? `stopped at ${result.currentStage}` };
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

function failureMessage(lotNumber: string, municipality: string, cause: string): string {
  return `Could not retrieve lot ${lotNumber} in ${municipality}: ${cause}`;
}

/**
 * Fetch the assessment data of a cadastral lot.
 */
export async function scrape(
  lotNumber: string,
  municipality: string,
  options: ScrapeOptions = {}
): Promise<ScrapeResult> {
  const runId = randomUUID();
  const observer = options.observer || createConsoleObserver();
  const runStart = Date.now();

  observer.onRunStart({ runId, municipality, lotNumber });

  const finish = (extraction: ExtractionResult, error?: string): ScrapeResult => {
    observer.timing("scrape_ms", Date.now() - runStart);
    observer.onRunEnd({
      runId,
      ok: extraction.succeeded,
      durationMs: Date.now() - runStart,
      source: extraction.source,
      error,
    });
    return {
      runId,
      fields: format(extraction.fields),
      succeeded: extraction.succeeded,
      source: extraction.source,
      error,
      diagnostic: extraction.diagnostic,
    };
  };

  if (options.useMock) {
    return finish({
      fields: mockFields(lotNumber, municipality),
      source: "FALLBACK",
      succeeded: true,
      diagnostic: "Mock data requested",
    });
  }

  const parsed = scrapeRequestSchema.safeParse({
    lotNumber,
    municipality,
    useRotation: options.useRotation ?? false,
    headless: options.headless,
  });
  if (!parsed.success) {
    const cause = `invalid request: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`;
    return finish(
      { fields: { lot_number: lotNumber, municipality }, source: "FALLBACK", succeeded: false, diagnostic: cause },
      failureMessage(lotNumber, municipality, cause)
    );
  }
  const requested: InternalFields = { lot_number: parsed.data.lotNumber, municipality: parsed.data.municipality };

  let outcome: LiveOutcome;
  try {
    const config = options.config ?? loadScraperConfig();
    const request: ScrapeRequest = { ...parsed.data, headless: parsed.data.headless ?? config.headless };
    const profile = resolve(request.municipality);
    const strategy = dispatch(profile);
    const rotate = request.useRotation && profile.requiresRotation;

    console.log(
      `[Scrape] Lot ${request.lotNumber} in ${profile.displayName} (${profile.detailNavigationStrategy}${rotate ? ", rotating" : ""})`
    );

    outcome = await runLive(
      {
        runId,
        request,
        profile,
        strategy,
        config,
        sessions: options.sessions ?? createSessionManager(),
        detector: options.detector ?? new BlockDetector(),
        observer,
        deadline: new Deadline(options.deadlineMs ?? config.deadlineMs),
      },
      rotate ? options.egressPool ?? getEgressPool(config.egress) : undefined
    );
  } catch (error) {
    outcome = { cause: `error: ${describeError(error)}` };
  }

  if (outcome.fields) {
    return finish({
      fields: { ...outcome.fields, ...requested },
      source: "LIVE",
      succeeded: true,
      diagnostic: outcome.degraded ? "Detail page not reached; fields taken from the result listing" : undefined,
    });
  }

  const cause = outcome.cause ?? "unknown failure";
  const { lotNumber: lot, municipality: name } = parsed.data;
  return finish(
    {
      fields: options.fallbackToMock ? mockFields(lot, name) : requested,
      source: "FALLBACK",
      succeeded: false,
      diagnostic: options.fallbackToMock ? `${cause}; returning mock data` : cause,
    },
    failureMessage(lot, name, cause)
  );
}
