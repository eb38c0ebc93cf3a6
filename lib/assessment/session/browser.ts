/**
 * Playwright Browser Session Manager
 *
 * One browser and one context per scrape session. Supports a local
 * Chromium launch or a remote CDP browser.
 */

import { randomUUID } from "crypto";
import { chromium, type Browser, type BrowserContext } from "playwright-core";
import { SessionInitError, describeError } from "../errors";
import { sleep } from "../utils/timing";
import { PlaywrightPageDriver } from "./playwright-driver";
import type { PageDriver } from "./page-driver";
import type { SessionConfig, SessionHandle, SessionManager } from "./types";

// Retry configuration
const MAX_CONNECTION_RETRIES = 3;
const INITIAL_RETRY_DELAY_MS = 1000;

const DEFAULT_NAV_TIMEOUT_MS = 30000;
const DEFAULT_OP_TIMEOUT_MS = 15000;
const DEFAULT_LOCALE = "fr-CA";
const DEFAULT_TIMEZONE = "America/Toronto";
const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };

/**
 * Default user agent to use (modern Chrome on Windows)
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * Hardened launch arguments for local Chromium
 */
const HARDENED_LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--disable-features=IsolateOrigins,site-per-process",
  "--disable-dev-shm-usage",
  "--disable-accelerated-2d-canvas",
  "--no-first-run",
  "--no-zygote",
  "--disable-gpu",
  "--no-sandbox",
  "--disable-setuid-sandbox",
];

const HIDE_WEBDRIVER_SCRIPT =
  "Object.defineProperty(Object.getPrototypeOf(navigator), 'webdriver', { get: () => undefined, configurable: true });";

function acceptLanguage(locale: string): string {
  const language = locale.split("-")[0];
  return language === locale ? locale : `${locale},${language};q=0.9,en;q=0.8`;
}

/**
 * Connect to remote browser with retry logic
 */
async function connectWithRetry(wsEndpoint: string, maxRetries: number = MAX_CONNECTION_RETRIES): Promise<Browser> {
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      console.log(`[Session] Connection attempt ${attempt}/${maxRetries}...`);
      const browser = await chromium.connectOverCDP(wsEndpoint);
      console.log(`[Session] Connected to remote browser on attempt ${attempt}`);
      return browser;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      console.warn(`[Session] Connection attempt ${attempt} failed: ${lastError.message}`);

      if (attempt < maxRetries) {
        const delay = INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt - 1); // Exponential backoff
        console.log(`[Session] Retrying in ${delay}ms...`);
        await sleep(delay);
      }
    }
  }

  throw new SessionInitError(
    `Failed to connect to remote browser after ${maxRetries} attempts: ${lastError?.message}`,
    lastError
  );
}

class PlaywrightSession implements SessionHandle {
  readonly id = randomUUID();
  private isClosed = false;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    readonly driver: PageDriver,
    readonly randomizedTiming: boolean,
    readonly egressEndpointId?: string
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  async teardown(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;

    try {
      await this.context.close();
    } catch (error) {
      console.warn(`[Session] Context close failed for ${this.id}: ${describeError(error)}`);
    }
    try {
      await this.browser.close();
    } catch (error) {
      console.warn(`[Session] Browser close failed for ${this.id}: ${describeError(error)}`);
    }
    console.log(`[Session] Closed ${this.id}`);
  }
}

export class PlaywrightSessionManager implements SessionManager {
  private readonly sessions = new Map<string, PlaywrightSession>();

  async open(config: SessionConfig): Promise<SessionHandle> {
    const browser = await this.startBrowser(config);
    const locale = config.locale ?? DEFAULT_LOCALE;
    const antiDetection = config.antiDetection ?? true;
    const navTimeoutMs = config.navTimeoutMs ?? DEFAULT_NAV_TIMEOUT_MS;
    const opTimeoutMs = config.opTimeoutMs ?? DEFAULT_OP_TIMEOUT_MS;

    let context: BrowserContext | null = null;
    try {
      context = await browser.newContext({
        userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
        locale,
        timezoneId: DEFAULT_TIMEZONE,
        viewport: config.viewport ?? DEFAULT_VIEWPORT,
        extraHTTPHeaders: { "Accept-Language": acceptLanguage(locale) },
        javaScriptEnabled: true,
        ignoreHTTPSErrors: true,
        proxy: config.egress ? { server: `http://${config.egress.address}:${config.egress.port}` } : undefined,
      });

      context.setDefaultTimeout(opTimeoutMs);
      context.setDefaultNavigationTimeout(navTimeoutMs);

      if (antiDetection) {
        await context.addInitScript(HIDE_WEBDRIVER_SCRIPT);
      }

      const page = await context.newPage();
      const driver = new PlaywrightPageDriver(page, { navTimeoutMs, opTimeoutMs });
      const session = new PlaywrightSession(browser, context, driver, antiDetection, config.egress?.endpointId);
      this.sessions.set(session.id, session);

      console.log(
        `[Session] Opened ${session.id}${config.egress ? ` via ${config.egress.endpointId}` : ""} (headless=${config.headless})`
      );
      return session;
    } catch (error) {
      if (context) {
        await context.close().catch(() => undefined);
      }
      await browser.close().catch(() => undefined);
      throw new SessionInitError(`Failed to prepare browser context: ${describeError(error)}`, error);
    }
  }

  async close(handle: SessionHandle): Promise<void> {
    const session = this.sessions.get(handle.id);
    if (!session) return;
    this.sessions.delete(handle.id);
    try {
      await session.teardown();
    } catch (error) {
      console.warn(`[Session] Teardown failed for ${handle.id}: ${describeError(error)}`);
    }
  }

  private async startBrowser(config: SessionConfig): Promise<Browser> {
    if (config.wsEndpoint) {
      console.log("[Session] Connecting to remote browser:", config.wsEndpoint.substring(0, 50) + "...");
      return connectWithRetry(config.wsEndpoint);
    }

    try {
      console.log("[Session] Launching local Chromium browser");
      return await chromium.launch({
        headless: config.headless,
        args: HARDENED_LAUNCH_ARGS,
      });
    } catch (error) {
      throw new SessionInitError(`Failed to launch Chromium: ${describeError(error)}`, error);
    }
  }
}

export function createSessionManager(): SessionManager {
  return new PlaywrightSessionManager();
}
