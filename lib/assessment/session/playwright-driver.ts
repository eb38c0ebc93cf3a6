/**
 * Playwright Page Driver
 */

import { errors, type Locator, type Page } from "playwright-core";
import { NavigationTimeout } from "../errors";
import {
  SUBMIT_CONTROL_SELECTOR,
  type ActivationMode,
  type EntryMatch,
  type EntryQuery,
  type PageDriver,
} from "./page-driver";

export interface PlaywrightDriverOptions {
  navTimeoutMs: number;
  opTimeoutMs: number;
}

export class PlaywrightPageDriver implements PageDriver {
  constructor(
    private readonly page: Page,
    private readonly options: PlaywrightDriverOptions
  ) {}

  /**
   * Run a page operation, reporting Playwright timeouts as NavigationTimeout.
   */
  private async bounded<T>(what: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new NavigationTimeout(`Timed out: ${what}`, timeoutMs, error);
      }
      throw error;
    }
  }

  private entries(query: EntryQuery): Locator {
    return this.page.locator(query.selector).filter({ hasText: query.containsText });
  }

  private async afterInteraction(): Promise<void> {
    await this.page
      .waitForLoadState("domcontentloaded", { timeout: this.options.navTimeoutMs })
      .catch(() => undefined);
  }

  async goto(url: string): Promise<void> {
    const timeout = this.options.navTimeoutMs;
    await this.bounded(`loading ${url}`, timeout, () =>
      this.page.goto(url, { waitUntil: "domcontentloaded", timeout })
    );
  }

  url(): string {
    return this.page.url();
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async firstVisible(selectors: readonly string[]): Promise<string | null> {
    for (const selector of selectors) {
      const visible = await this.page
        .locator(selector)
        .first()
        .isVisible()
        .catch(() => false);
      if (visible) {
        return selector;
      }
    }
    return null;
  }

  async isChecked(selector: string): Promise<boolean> {
    return this.page
      .locator(selector)
      .first()
      .isChecked({ timeout: this.options.opTimeoutMs })
      .catch(() => false);
  }

  async clear(selector: string): Promise<void> {
    const timeout = this.options.opTimeoutMs;
    await this.bounded(`clearing ${selector}`, timeout, () =>
      this.page.locator(selector).first().fill("", { timeout })
    );
  }

  async typeKey(selector: string, key: string): Promise<void> {
    const timeout = this.options.opTimeoutMs;
    await this.bounded(`typing into ${selector}`, timeout, () =>
      this.page.locator(selector).first().pressSequentially(key, { timeout })
    );
  }

  async click(selector: string): Promise<void> {
    const timeout = this.options.opTimeoutMs;
    await this.bounded(`clicking ${selector}`, timeout, () =>
      this.page.locator(selector).first().click({ timeout })
    );
    await this.afterInteraction();
  }

  async findEntries(query: EntryQuery): Promise<EntryMatch[]> {
    const entries = this.entries(query);
    const count = await entries.count();
    const matches: EntryMatch[] = [];

    for (let index = 0; index < count; index++) {
      const entry = entries.nth(index);
      const text = await entry.innerText({ timeout: this.options.opTimeoutMs }).catch(() => "");
      const controls = await entry.locator(SUBMIT_CONTROL_SELECTOR).count();
      matches.push({ index, text: text.trim(), hasSubmitControl: controls > 0 });
    }

    return matches;
  }

  async activateEntry(query: EntryQuery, index: number, mode: ActivationMode): Promise<void> {
    const timeout = this.options.opTimeoutMs;
    const entry = this.entries(query).nth(index);
    const target = mode === "submit" ? entry.locator(SUBMIT_CONTROL_SELECTOR).first() : entry;

    await this.bounded(`activating entry ${index} of ${query.selector}`, timeout, async () => {
      await target.scrollIntoViewIfNeeded({ timeout });
      await target.click({ timeout });
    });
    await this.afterInteraction();
  }

  async settle(ms: number): Promise<void> {
    if (ms > 0) {
      await this.page.waitForTimeout(ms);
    }
  }
}
