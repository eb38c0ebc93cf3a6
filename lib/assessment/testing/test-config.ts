import { loadScraperConfig, type ScraperConfig } from "../config";

/**
 * Scraper configuration with every wait set to zero.
 */
export function fastConfig(env: NodeJS.ProcessEnv = {}): ScraperConfig {
  return loadScraperConfig({
    SCRAPE_SETTLE_MS: "0",
    SCRAPE_RESULTS_SETTLE_MS: "0",
    SCRAPE_DETAIL_SETTLE_MS: "0",
    SCRAPE_KEYSTROKE_DELAY_MS: "0",
    SCRAPE_KEYSTROKE_JITTER_MS: "0",
    SCRAPE_ELEMENT_WAIT_MS: "0",
    SCRAPE_POLL_INTERVAL_MS: "1",
    ...env,
  });
}
