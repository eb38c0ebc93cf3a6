/**
 * Console Observer
 *
 * Default observer implementation that logs one JSON line per event.
 */

import type { ObserverMetrics, ScrapeObserver } from "./types";

type Sink = (line: string) => void;

export class ConsoleObserver implements ScrapeObserver {
  private metrics: ObserverMetrics = {
    counters: {},
    timings: {},
    steps: [],
  };

  constructor(private readonly sink: Sink = (line) => console.log(line)) {}

  private emit(event: string, payload: Record<string, unknown>): void {
    this.sink(
      JSON.stringify({
        event: `assessment_scrape_${event}`,
        ...payload,
        timestamp: new Date().toISOString(),
      })
    );
  }

  onRunStart(meta: { runId: string; municipality: string; lotNumber: string }): void {
    this.emit("run_start", meta);
  }

  onStepStart(meta: { runId: string; step: string }): void {
    this.emit("step_start", meta);
  }

  onStepEnd(meta: {
    runId: string;
    step: string;
    ok: boolean;
    durationMs: number;
    data?: unknown;
  }): void {
    this.metrics.steps.push({
      step: meta.step,
      ok: meta.ok,
      durationMs: meta.durationMs,
      data: meta.data,
    });
    this.emit("step_end", meta);
  }

  onRunEnd(meta: {
    runId: string;
    ok: boolean;
    durationMs: number;
    source: "LIVE" | "FALLBACK";
    error?: string;
  }): void {
    this.emit("run_end", { ...meta, metrics: this.metrics });
  }

  increment(name: string, by = 1, tags?: Record<string, string>): void {
    const key = tags ? `${name}:${JSON.stringify(tags)}` : name;
    this.metrics.counters[key] = (this.metrics.counters[key] || 0) + by;
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    const key = tags ? `${name}:${JSON.stringify(tags)}` : name;
    if (!this.metrics.timings[key]) {
      this.metrics.timings[key] = [];
    }
    this.metrics.timings[key].push(durationMs);
  }

  getMetrics(): ObserverMetrics {
    return { ...this.metrics };
  }
}

/**
 * Observer that discards every event.
 */
export class NoopObserver implements ScrapeObserver {
  onRunStart(): void {}
  onStepStart(): void {}
  onStepEnd(): void {}
  onRunEnd(): void {}
  increment(): void {}
  timing(): void {}
}

/**
 * Create a new console observer instance.
 */
export function createConsoleObserver(): ConsoleObserver {
  return new ConsoleObserver();
}
