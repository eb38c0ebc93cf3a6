#!/usr/bin/env tsx
/**
 * Lot Assessment Lookup
 *
 * Scrapes one cadastral lot and prints the result as JSON.
 * Run with: npm run scrape -- <lot> <municipality> [flags]
 *
 * Usage:
 *   npm run scrape -- 5829908 montreal              - Live lookup
 *   npm run scrape -- 1234567 laval --rotation      - Rotate egress endpoints on blocks
 *   npm run scrape -- 1234567 laval --mock          - Synthetic data, no browser
 *   npm run scrape -- 1234567 laval --fallback-mock - Mock fields when the live lookup fails
 *   npm run scrape -- 1234567 laval --headed        - Show the browser window
 *   npm run scrape -- --list                        - List supported municipalities
 */

import { config } from "dotenv";
// Load .env.local first, then .env as fallback
config({ path: ".env.local" });
config();

import { listMunicipalities, loadScraperConfig, releaseEgressPool, scrape } from "../lib/assessment";

const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  dim: "\x1b[2m",
};

function usage(): never {
  console.error(`${colors.red}Usage: scrape-lot <lot-number> <municipality> [--mock] [--rotation] [--headed] [--fallback-mock]${colors.reset}`);
  process.exit(2);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const flags = new Set(args.filter((a) => a.startsWith("--")));
  const [lotNumber, ...rest] = args.filter((a) => !a.startsWith("--"));

  if (flags.has("--list")) {
    for (const profile of listMunicipalities()) {
      console.log(
        `${profile.key.padEnd(18)} ${profile.displayName.padEnd(18)} ${profile.detailNavigationStrategy}${profile.requiresRotation ? "" : ` ${colors.dim}(no rotation)${colors.reset}`}`
      );
    }
    return;
  }

  const municipality = rest.join(" ");
  if (!lotNumber || !municipality) {
    usage();
  }

  const scraperConfig = loadScraperConfig();

  try {
    const result = await scrape(lotNumber, municipality, {
      useMock: flags.has("--mock"),
      useRotation: flags.has("--rotation"),
      headless: !flags.has("--headed") && scraperConfig.headless,
      fallbackToMock: flags.has("--fallback-mock"),
      config: scraperConfig,
    });

    console.log(JSON.stringify(result, null, 2));
    if (result.succeeded) {
      console.error(`${colors.green}Lot ${lotNumber} retrieved (${result.source})${colors.reset}`);
    } else {
      console.error(`${colors.yellow}${result.error ?? "Lookup failed"}${colors.reset}`);
      process.exitCode = 1;
    }
  } finally {
    const failed = await releaseEgressPool();
    if (failed.length > 0) {
      console.error(`${colors.red}Could not release egress endpoints: ${failed.join(", ")}${colors.reset}`);
    }
  }
}

main().catch((error) => {
  console.error(`\n${colors.red}Fatal error:${colors.reset}`, error);
  process.exit(1);
});
