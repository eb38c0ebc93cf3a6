/**
 * Browser Session Types
 */

import type { PageDriver } from "./page-driver";

export interface Viewport {
  width: number;
  height: number;
}

/** Proxy the session's traffic leaves through. */
export interface SessionEgress {
  endpointId: string;
  address: string;
  port: number;
}

export interface SessionConfig {
  headless: boolean;
  locale?: string;
  viewport?: Viewport;
  userAgent?: string;
  antiDetection?: boolean;
  egress?: SessionEgress;
  navTimeoutMs?: number;
  opTimeoutMs?: number;
  /** Remote CDP endpoint; a local Chromium is launched when absent. */
  wsEndpoint?: string;
}

export interface SessionHandle {
  readonly id: string;
  readonly driver: PageDriver;
  /** Whether interaction timing should be randomized. */
  readonly randomizedTiming: boolean;
  readonly egressEndpointId?: string;
  readonly closed: boolean;
}

export interface SessionManager {
  open(config: SessionConfig): Promise<SessionHandle>;
  /** Idempotent; never throws. */
  close(handle: SessionHandle): Promise<void>;
}
