/**
 * Scraper Configuration
 *
 * Reads timings, browser settings and the egress pool from the environment.
 * Nothing here is cached; callers load it once and pass it down.
 */

import { readFileSync } from "fs";
import { z } from "zod";

// ============================================================================
// Environment
// ============================================================================

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1"));

const envSchema = z.object({
  PLAYWRIGHT_WS_ENDPOINT: z.string().url().optional(),
  PLAYWRIGHT_HEADLESS: booleanFlag(true),
  SCRAPE_NAV_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SCRAPE_OP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  SCRAPE_DEADLINE_MS: z.coerce.number().int().positive().default(180000),
  SCRAPE_SETTLE_MS: z.coerce.number().int().nonnegative().default(3000),
  SCRAPE_RESULTS_SETTLE_MS: z.coerce.number().int().nonnegative().default(5000),
  SCRAPE_DETAIL_SETTLE_MS: z.coerce.number().int().nonnegative().default(3000),
  SCRAPE_KEYSTROKE_DELAY_MS: z.coerce.number().int().nonnegative().default(100),
  SCRAPE_KEYSTROKE_JITTER_MS: z.coerce.number().int().nonnegative().default(100),
  SCRAPE_ACTIVATION_ATTEMPTS: z.coerce.number().int().min(1).max(3).default(3),
  SCRAPE_ELEMENT_WAIT_MS: z.coerce.number().int().nonnegative().default(10000),
  SCRAPE_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(500),
  EGRESS_POOL_FILE: z.string().min(1).optional(),
  EGRESS_POOL_JSON: z.string().min(1).optional(),
  EGRESS_PROXY_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  EGRESS_PROVISION_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  EGRESS_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  EGRESS_REGIONS: z.string().default("ca-central-1,us-east-1"),
});

// ============================================================================
// Egress Pool
// ============================================================================

export const egressEndpointConfigSchema = z.discriminatedUnion("provisioner", [
  z.object({
    id: z.string().min(1),
    networkRegion: z.string().min(1),
    provisioner: z.literal("static"),
    address: z.string().min(1),
  }),
  z.object({
    id: z.string().min(1),
    networkRegion: z.string().min(1),
    provisioner: z.literal("ec2"),
    instanceId: z.string().min(1),
  }),
]);

export const egressPoolConfigSchema = z.array(egressEndpointConfigSchema);

export type EgressEndpointConfig = z.infer<typeof egressEndpointConfigSchema>;

// ============================================================================
// Resolved Config
// ============================================================================

export interface NavigationTimings {
  settleMs: number;
  resultsSettleMs: number;
  detailSettleMs: number;
  keystrokeDelayMs: number;
  keystrokeJitterMs: number;
  activationAttempts: number;
  /** Upper bound for polling dynamic content into view. */
  elementWaitMs: number;
  pollIntervalMs: number;
}

export interface EgressConfig {
  endpoints: EgressEndpointConfig[];
  regions: string[];
  proxyPort: number;
  provisionTimeoutMs: number;
  pollIntervalMs: number;
}

export interface ScraperConfig {
  wsEndpoint?: string;
  headless: boolean;
  navTimeoutMs: number;
  opTimeoutMs: number;
  deadlineMs: number;
  timings: NavigationTimings;
  egress: EgressConfig;
}

function loadEgressEndpoints(file: string | undefined, json: string | undefined): EgressEndpointConfig[] {
  const raw = json ?? (file ? readFileSync(file, "utf8") : undefined);
  if (!raw) {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Egress pool is not valid JSON (${json ? "EGRESS_POOL_JSON" : file})`, { cause: error });
  }
  return egressPoolConfigSchema.parse(parsed);
}

/**
 * Parse the scraper configuration from an environment map.
 * Throws a ZodError describing every invalid variable.
 */
export function loadScraperConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const vars = envSchema.parse(env);

  return {
    wsEndpoint: vars.PLAYWRIGHT_WS_ENDPOINT,
    headless: vars.PLAYWRIGHT_HEADLESS,
    navTimeoutMs: vars.SCRAPE_NAV_TIMEOUT_MS,
    opTimeoutMs: vars.SCRAPE_OP_TIMEOUT_MS,
    deadlineMs: vars.SCRAPE_DEADLINE_MS,
    timings: {
      settleMs: vars.SCRAPE_SETTLE_MS,
      resultsSettleMs: vars.SCRAPE_RESULTS_SETTLE_MS,
      detailSettleMs: vars.SCRAPE_DETAIL_SETTLE_MS,
      keystrokeDelayMs: vars.SCRAPE_KEYSTROKE_DELAY_MS,
      keystrokeJitterMs: vars.SCRAPE_KEYSTROKE_JITTER_MS,
      activationAttempts: vars.SCRAPE_ACTIVATION_ATTEMPTS,
      elementWaitMs: vars.SCRAPE_ELEMENT_WAIT_MS,
      pollIntervalMs: vars.SCRAPE_POLL_INTERVAL_MS,
    },
    egress: {
      endpoints: loadEgressEndpoints(vars.EGRESS_POOL_FILE, vars.EGRESS_POOL_JSON),
      regions: vars.EGRESS_REGIONS.split(",")
        .map((region) => region.trim())
        .filter(Boolean),
      proxyPort: vars.EGRESS_PROXY_PORT,
      provisionTimeoutMs: vars.EGRESS_PROVISION_TIMEOUT_MS,
      pollIntervalMs: vars.EGRESS_POLL_INTERVAL_MS,
    },
  };
}
