/**
 * Fixture Site
 *
 * In-process stand-in for a browser: serves HTML fixtures by URL and
 * implements the PageDriver contract with cheerio. Links, form submits and
 * `data-fixture-href` attributes navigate between fixtures; typed values and
 * checked boxes are written back into the page markup.
 */

import { randomUUID } from "crypto";
import { readFileSync } from "fs";
import * as cheerio from "cheerio";
import { isTag, type Element } from "domhandler";
import { SessionInitError } from "../errors";
import {
  SUBMIT_CONTROL_SELECTOR,
  type ActivationMode,
  type EntryMatch,
  type EntryQuery,
  type PageDriver,
} from "../session/page-driver";
import type { SessionConfig, SessionHandle, SessionManager } from "../session/types";
import { normalizeWhitespace } from "../utils/text";

export type FixtureAction =
  | "goto"
  | "content"
  | "firstVisible"
  | "isChecked"
  | "clear"
  | "typeKey"
  | "click"
  | "findEntries"
  | "activateEntry";

export interface FixtureSite {
  /** Page markup by absolute URL. */
  pages: Record<string, string>;
  /** Errors thrown whenever the action runs. */
  faults?: Partial<Record<FixtureAction, Error>>;
  /** Make `open()` fail for sessions routed to this site. */
  failOpen?: boolean;
}

export const DIRECT_SITE = "direct";

const NOT_FOUND_PAGE = "<html><body><h1>Page introuvable</h1></body></html>";

/**
 * Read a fixture file that sits next to the calling module.
 */
export function readFixture(baseUrl: string, relativePath: string): string {
  return readFileSync(new URL(relativePath, baseUrl), "utf8");
}

function isVisible(el: Element): boolean {
  let node: Element | null = el;
  while (node) {
    const style = (node.attribs.style ?? "").replace(/\s+/g, "").toLowerCase();
    if ("hidden" in node.attribs || style.includes("display:none") || style.includes("visibility:hidden")) {
      return false;
    }
    if (node.name === "input" && node.attribs.type?.toLowerCase() === "hidden") {
      return false;
    }
    node = node.parent && isTag(node.parent) ? node.parent : null;
  }
  return true;
}

export class FixtureSiteDriver implements PageDriver {
  private currentUrl = "about:blank";
  private $ = cheerio.load(NOT_FOUND_PAGE);
  readonly visited: string[] = [];
  readonly typed: string[] = [];
  /** `selector[index]:mode` for every activateEntry call. */
  readonly activations: string[] = [];
  settledMs = 0;

  constructor(private readonly site: FixtureSite) {}

  private fault(action: FixtureAction): void {
    const error = this.site.faults?.[action];
    if (error) throw error;
  }

  private load(url: string): void {
    const withoutQuery = url.split(/[?#]/)[0];
    const html = this.site.pages[url] ?? this.site.pages[withoutQuery] ?? NOT_FOUND_PAGE;
    this.currentUrl = url;
    this.$ = cheerio.load(html);
    this.visited.push(url);
  }

  private select(selector: string): Element[] {
    return this.$(selector).toArray().filter(isTag);
  }

  private first(selector: string): Element {
    const el = this.select(selector)[0];
    if (!el) {
      throw new Error(`No element matches ${selector}`);
    }
    return el;
  }

  /**
   * Follow whatever navigation clicking `el` would trigger.
   */
  private activate(el: Element): void {
    const $el = this.$(el);
    const type = ($el.attr("type") ?? "").toLowerCase();

    if (el.name === "input" && (type === "radio" || type === "checkbox")) {
      if (type === "radio" && el.attribs.name) {
        this.$(`input[type='radio'][name='${el.attribs.name}']`).removeAttr("checked");
      }
      $el.attr("checked", "checked");
      return;
    }

    const target =
      $el.attr("data-fixture-href") ??
      (el.name === "a" ? $el.attr("href") : undefined) ??
      (el.name === "form" ? $el.attr("action") : $el.closest("form").attr("action"));

    if (target) {
      this.load(new URL(target, this.currentUrl).toString());
    }
  }

  private entries(query: EntryQuery): Element[] {
    const { containsText } = query;
    const matches =
      typeof containsText === "string"
        ? (text: string) => text.toLowerCase().includes(normalizeWhitespace(containsText).toLowerCase())
        : (text: string) => containsText.test(text);
    return this.select(query.selector).filter((el) => matches(normalizeWhitespace(this.$(el).text())));
  }

  async goto(url: string): Promise<void> {
    this.fault("goto");
    this.load(url);
  }

  url(): string {
    return this.currentUrl;
  }

  async content(): Promise<string> {
    this.fault("content");
    return this.$.html();
  }

  async firstVisible(selectors: readonly string[]): Promise<string | null> {
    this.fault("firstVisible");
    for (const selector of selectors) {
      let matches: Element[];
      try {
        matches = this.select(selector);
      } catch {
        // Invalid for cheerio; a browser would report it as not visible.
        continue;
      }
      if (matches.some(isVisible)) {
        return selector;
      }
    }
    return null;
  }

  async isChecked(selector: string): Promise<boolean> {
    this.fault("isChecked");
    return this.$(selector).first().attr("checked") !== undefined;
  }

  async clear(selector: string): Promise<void> {
    this.fault("clear");
    this.$(this.first(selector)).attr("value", "");
  }

  async typeKey(selector: string, key: string): Promise<void> {
    this.fault("typeKey");
    const $el = this.$(this.first(selector));
    $el.attr("value", ($el.attr("value") ?? "") + key);
    this.typed.push(key);
  }

  async click(selector: string): Promise<void> {
    this.fault("click");
    this.activate(this.first(selector));
  }

  async findEntries(query: EntryQuery): Promise<EntryMatch[]> {
    this.fault("findEntries");
    return this.entries(query).map((el, index) => ({
      index,
      text: normalizeWhitespace(this.$(el).text()),
      hasSubmitControl: this.$(el).find(SUBMIT_CONTROL_SELECTOR).length > 0,
    }));
  }

  async activateEntry(query: EntryQuery, index: number, mode: ActivationMode): Promise<void> {
    this.fault("activateEntry");
    this.activations.push(`${query.selector}[${index}]:${mode}`);
    const entry = this.entries(query)[index];
    if (!entry) {
      throw new Error(`No entry ${index} for ${query.selector}`);
    }
    const target = mode === "submit" ? this.$(entry).find(SUBMIT_CONTROL_SELECTOR).get(0) : entry;
    this.activate(target ?? entry);
  }

  async settle(ms: number): Promise<void> {
    this.settledMs += ms;
  }
}

class FixtureSession implements SessionHandle {
  readonly id = randomUUID();
  closed = false;
  closeCalls = 0;

  constructor(
    readonly driver: FixtureSiteDriver,
    readonly randomizedTiming: boolean,
    readonly siteKey: string,
    readonly egressEndpointId?: string
  ) {}
}

/**
 * Session manager over fixture sites. Sessions opened through an egress
 * endpoint are routed to the site keyed by the endpoint id, others to
 * `DIRECT_SITE`.
 */
export class FixtureSessionManager implements SessionManager {
  readonly opened: FixtureSession[] = [];
  readonly configs: SessionConfig[] = [];

  constructor(private readonly sites: Record<string, FixtureSite>) {}

  async open(config: SessionConfig): Promise<SessionHandle> {
    this.configs.push(config);
    const siteKey = config.egress?.endpointId ?? DIRECT_SITE;
    const site = this.sites[siteKey];
    if (!site) {
      throw new SessionInitError(`No fixture site for ${siteKey}`);
    }
    if (site.failOpen) {
      throw new SessionInitError(`Fixture browser for ${siteKey} failed to start`);
    }
    const session = new FixtureSession(
      new FixtureSiteDriver(site),
      config.antiDetection ?? true,
      siteKey,
      config.egress?.endpointId
    );
    this.opened.push(session);
    return session;
  }

  async close(handle: SessionHandle): Promise<void> {
    const session = this.opened.find((s) => s.id === handle.id);
    if (!session) return;
    session.closeCalls++;
    session.closed = true;
  }

  /** Total close() calls per opened session, in open order. */
  closeCounts(): number[] {
    return this.opened.map((session) => session.closeCalls);
  }
}
