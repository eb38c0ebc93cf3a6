/**
 * Timing helpers. Every wait in the scraper goes through one of these so
 * that it has an upper bound.
 */

import { NavigationTimeout } from "../errors";

/**
 * Sleep utility for settle intervals and retry delays
 */
export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Base delay plus a uniformly random extra of up to `jitterMs`.
 */
export function jitter(baseMs: number, jitterMs: number, random: () => number = Math.random): number {
  if (jitterMs <= 0) return baseMs;
  return baseMs + Math.floor(random() * jitterMs);
}

/**
 * Poll `condition` until it returns a value other than `undefined`, or fail
 * with `NavigationTimeout` once `timeoutMs` has passed.
 */
export async function pollUntil<T>(
  condition: () => Promise<T | undefined>,
  options: { timeoutMs: number; intervalMs: number; what: string }
): Promise<T> {
  const started = Date.now();
  for (;;) {
    const value = await condition();
    if (value !== undefined) {
      return value;
    }
    const waited = Date.now() - started;
    if (waited >= options.timeoutMs) {
      throw new NavigationTimeout(`Timed out waiting for ${options.what}`, waited);
    }
    await sleep(Math.min(options.intervalMs, options.timeoutMs - waited));
  }
}

/**
 * Overall deadline for one scrape call.
 */
export class Deadline {
  private readonly expiresAt: number;

  constructor(
    readonly budgetMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = now() + budgetMs;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.remainingMs() === 0;
  }

  /**
   * Throw `NavigationTimeout` if the deadline has passed.
   */
  check(what: string): void {
    if (this.expired()) {
      throw new NavigationTimeout(`Deadline exceeded during ${what}`, this.budgetMs);
    }
  }

  /**
   * Race `work` against the remaining budget. The losing promise's eventual
   * rejection is observed so it never surfaces as unhandled.
   */
  async race<T>(work: Promise<T>, what: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expiry = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new NavigationTimeout(`Deadline exceeded during ${what}`, this.budgetMs)),
        this.remainingMs()
      );
    });
    work.catch(() => undefined);
    try {
      return await Promise.race([work, expiry]);
    } finally {
      clearTimeout(timer);
    }
  }
}
