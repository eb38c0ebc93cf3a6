export type { ScrapeObserver, ObserverMetrics } from "./types";
export { ConsoleObserver, NoopObserver, createConsoleObserver } from "./console-observer";
