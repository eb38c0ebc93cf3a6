/**
 * Lot Assessment Scraper
 *
 * Main entry point: `scrape()` plus the component contracts for callers
 * that assemble their own pipeline.
 */

// Core types
export * from "./types";
export * from "./errors";
export { loadScraperConfig, type ScraperConfig, type NavigationTimings, type EgressConfig } from "./config";

// Entry point
export { scrape, type ScrapeOptions, type ScrapeResult } from "./scrape";

// API schemas
export * from "./api/schemas";

// Observability
export * from "./observability";

// Registry
export * from "./registry";

// Components
export * from "./session";
export * from "./detection/block-detector";
export * from "./extraction";
export * from "./navigation";
export * from "./egress";
export * from "./format/result-formatter";
export { mockFields } from "./mock/mock-data";

// Sources (auto-registers navigation strategies)
export * from "./sources";
