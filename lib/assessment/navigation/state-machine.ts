/**
 * Navigation State Machine
 *
 * Drives SEARCH → RESULTS → DETAIL → DONE for one session. Each stage has
 * one handler in the transition table; the block detector runs after every
 * handler, whether it succeeded or not.
 */

import { NavigationTimeout, describeError } from "../errors";
import { extractAll } from "../extraction/field-extractor";
import { createSnapshot } from "../extraction/page-text";
import type { EntryQuery, PageDriver } from "../session/page-driver";
import type { InternalFields, NavigationStage } from "../types";
import { pageFingerprint } from "../utils/hash";
import { foldDiacritics, lotNumberPattern } from "../utils/text";
import { jitter } from "../utils/timing";
import type { NavigationContext, NavigationResult, NavigationStrategy } from "./types";

const MAX_ACTIVATION_ATTEMPTS = 3;

/** Anything a user could click that mentions the lot number. */
const GENERIC_CLICKABLE_SELECTOR = "a, button, [role='button'], [onclick]";

type ActiveStage = "SEARCH" | "RESULTS" | "DETAIL";

interface RunState {
  readonly ctx: NavigationContext;
  readonly strategy: NavigationStrategy;
  degraded: boolean;
  fields: InternalFields;
}

type StageHandler = (state: RunState) => Promise<NavigationStage>;

/**
 * An expected dead end: the page lacks what the stage needs.
 */
export class NavigationFailure extends Error {
  constructor(readonly reason: string) {
    super(reason);
    this.name = "NavigationFailure";
  }
}

function isActive(stage: NavigationStage): stage is ActiveStage {
  return stage === "SEARCH" || stage === "RESULTS" || stage === "DETAIL";
}

function foldedIncludes(haystack: string, needle: string): boolean {
  return foldDiacritics(haystack).toLowerCase().includes(foldDiacritics(needle).toLowerCase());
}

async function fingerprint(driver: PageDriver): Promise<string> {
  return pageFingerprint(driver.url(), await driver.content());
}

// ============================================================================
// SEARCH
// ============================================================================

async function typeLotNumber(ctx: NavigationContext, selector: string): Promise<void> {
  const { keystrokeDelayMs, keystrokeJitterMs } = ctx.timings;
  for (const key of ctx.lotNumber) {
    await ctx.driver.typeKey(selector, key);
    await ctx.driver.settle(
      ctx.randomizedTiming ? jitter(keystrokeDelayMs, keystrokeJitterMs) : keystrokeDelayMs
    );
  }
}

const search: StageHandler = async ({ ctx, strategy }) => {
  const { driver, timings } = ctx;

  await driver.goto(ctx.profile.searchUrl);
  await driver.settle(timings.settleMs);

  if (strategy.preSearch) {
    await strategy.preSearch(ctx);
  }

  const input = await driver.firstVisible(strategy.lotInputSelectors);
  if (!input) {
    throw new NavigationFailure("element-not-found: lot number input");
  }

  await driver.clear(input);
  await typeLotNumber(ctx, input);

  if (strategy.beforeSubmit) {
    await strategy.beforeSubmit(ctx);
  }

  const submit = await driver.firstVisible(strategy.submitSelectors);
  if (!submit) {
    throw new NavigationFailure("element-not-found: submit control");
  }

  await driver.click(submit);
  await driver.settle(timings.resultsSettleMs);

  const snapshot = createSnapshot(await driver.content());
  if (strategy.isDetailPage(snapshot, ctx.lotNumber)) {
    console.log("[Navigation] Search landed directly on a detail page");
    return "DETAIL";
  }
  if (strategy.noResultsPhrases.some((phrase) => foldedIncludes(snapshot.text, phrase))) {
    throw new NavigationFailure("no-results");
  }
  return "RESULTS";
};

// ============================================================================
// RESULTS
// ============================================================================

interface Candidate {
  query: EntryQuery;
  index: number;
  hasSubmitControl: boolean;
}

/**
 * Entries mentioning the lot, one per distinct entry text: an entry matched
 * by several selectors is only tried once.
 */
async function collectCandidates(ctx: NavigationContext, selectors: readonly string[]): Promise<Candidate[]> {
  const candidates: Candidate[] = [];
  const seen = new Set<string>();
  for (const selector of selectors) {
    const query = { selector, containsText: lotNumberPattern(ctx.lotNumber) };
    for (const match of await ctx.driver.findEntries(query)) {
      if (seen.has(match.text)) continue;
      seen.add(match.text);
      candidates.push({ query, index: match.index, hasSubmitControl: match.hasSubmitControl });
    }
  }
  // Stable: entries exposing a submit control first, document order otherwise.
  return candidates.sort((a, b) => Number(b.hasSubmitControl) - Number(a.hasSubmitControl));
}

/**
 * Activate one entry and report whether the page changed.
 */
async function tryActivate(
  ctx: NavigationContext,
  candidate: Candidate,
  listing: string
): Promise<boolean> {
  const mode = candidate.hasSubmitControl ? "submit" : "self";
  try {
    await ctx.driver.activateEntry(candidate.query, candidate.index, mode);
  } catch (error) {
    ctx.observer.increment("activation_errors");
    console.warn(
      `[Navigation] Activation of ${candidate.query.selector}[${candidate.index}] failed: ${describeError(error)}`
    );
    return false;
  }
  await ctx.driver.settle(ctx.timings.settleMs);
  return (await fingerprint(ctx.driver)) !== listing;
}

const openDetail: StageHandler = async (state) => {
  const { ctx, strategy } = state;
  const listing = await fingerprint(ctx.driver);
  const attempts = Math.min(MAX_ACTIVATION_ATTEMPTS, Math.max(1, ctx.timings.activationAttempts));

  const candidates = await collectCandidates(ctx, strategy.resultEntrySelectors);
  console.log(`[Navigation] ${candidates.length} result entries mention lot ${ctx.lotNumber}`);

  for (const candidate of candidates) {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      ctx.deadline.check("result activation");
      ctx.observer.increment("activation_attempts");
      if (await tryActivate(ctx, candidate, listing)) {
        return "DETAIL";
      }
    }
  }

  const genericQuery = { selector: GENERIC_CLICKABLE_SELECTOR, containsText: lotNumberPattern(ctx.lotNumber) };
  for (const match of await ctx.driver.findEntries(genericQuery)) {
    ctx.deadline.check("generic activation");
    const candidate = { query: genericQuery, index: match.index, hasSubmitControl: false };
    if (await tryActivate(ctx, candidate, listing)) {
      console.log("[Navigation] Reached detail page through a generic clickable element");
      return "DETAIL";
    }
  }

  const text = createSnapshot(await ctx.driver.content()).text;
  if (!lotNumberPattern(ctx.lotNumber).test(text)) {
    throw new NavigationFailure("no-results");
  }

  console.warn("[Navigation] No entry opened a detail page; extracting from the listing");
  state.degraded = true;
  return "DETAIL";
};

// ============================================================================
// DETAIL
// ============================================================================

const extractDetail: StageHandler = async (state) => {
  const { ctx, strategy } = state;
  if (!state.degraded) {
    await ctx.driver.settle(ctx.timings.detailSettleMs);
  }
  const snapshot = createSnapshot(await ctx.driver.content());
  state.fields = extractAll(snapshot, strategy.fields);
  return "DONE";
};

const TRANSITIONS: Record<ActiveStage, StageHandler> = {
  SEARCH: search,
  RESULTS: openDetail,
  DETAIL: extractDetail,
};

// ============================================================================
// Runner
// ============================================================================

/**
 * Run the state machine to DONE, BLOCKED or FAILED.
 *
 * Expected dead ends and bounded-wait timeouts end in FAILED with a cause.
 * Any other error propagates; the caller owns session teardown.
 */
export async function runNavigation(
  ctx: NavigationContext,
  strategy: NavigationStrategy
): Promise<NavigationResult> {
  const state: RunState = { ctx, strategy, degraded: false, fields: {} };
  let stage: NavigationStage = "SEARCH";
  let cause: string | undefined;
  let blockReason: string | undefined;

  while (isActive(stage)) {
    const started = Date.now();
    ctx.observer.onStepStart({ runId: ctx.runId, step: stage });

    let next: NavigationStage;
    try {
      ctx.deadline.check(`${stage} stage`);
      next = await TRANSITIONS[stage](state);
    } catch (error) {
      if (error instanceof NavigationFailure) {
        next = "FAILED";
        cause = error.reason;
      } else if (error instanceof NavigationTimeout) {
        next = "FAILED";
        cause = `timeout: ${error.message}`;
      } else {
        ctx.observer.onStepEnd({
          runId: ctx.runId,
          step: stage,
          ok: false,
          durationMs: Date.now() - started,
          data: { error: describeError(error) },
        });
        throw error;
      }
    }

    const detection = ctx.detector.detect(createSnapshot(await ctx.driver.content()).text);
    if (detection.blocked) {
      next = "BLOCKED";
      blockReason = detection.reason;
      cause = `blocked: ${detection.reason}`;
    }

    ctx.observer.onStepEnd({
      runId: ctx.runId,
      step: stage,
      ok: next !== "FAILED" && next !== "BLOCKED",
      durationMs: Date.now() - started,
      data: { next, cause },
    });
    console.log(`[Navigation] ${stage} -> ${next}${cause && !isActive(next) && next !== "DONE" ? ` (${cause})` : ""}`);
    stage = next;
  }

  return {
    currentStage: stage,
    blocked: stage === "BLOCKED",
    lastUrl: ctx.driver.url(),
    fields: state.fields,
    degraded: state.degraded,
    cause,
    blockReason,
  };
}
