/**
 * Scrape Observability Types
 */

export interface ScrapeObserver {
  onRunStart(meta: { runId: string; municipality: string; lotNumber: string }): void;
  onStepStart(meta: { runId: string; step: string }): void;
  onStepEnd(meta: {
    runId: string;
    step: string;
    ok: boolean;
    durationMs: number;
    data?: unknown;
  }): void;
  onRunEnd(meta: {
    runId: string;
    ok: boolean;
    durationMs: number;
    source: "LIVE" | "FALLBACK";
    error?: string;
  }): void;
  increment(name: string, by?: number, tags?: Record<string, string>): void;
  timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}

export interface ObserverMetrics {
  counters: Record<string, number>;
  timings: Record<string, number[]>;
  steps: Array<{
    step: string;
    ok: boolean;
    durationMs: number;
    data?: unknown;
  }>;
}
