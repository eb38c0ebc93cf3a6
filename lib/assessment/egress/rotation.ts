/**
 * Egress Rotation
 *
 * Per-scrape view over the shared pool. Endpoints this scrape has used or
 * seen blocked are skipped here only; other scrapes still get them.
 */

import { EndpointUnavailable, describeError } from "../errors";
import type { EgressEndpoint } from "../types";
import type { EgressPool } from "./pool";

export class EgressRotation {
  private readonly used = new Set<string>();
  private readonly blocked = new Set<string>();
  private regionIndex = 0;

  constructor(
    private readonly pool: EgressPool,
    private readonly regions: readonly string[] = pool.regions()
  ) {}

  /**
   * Next usable endpoint, walking regions in preference order, or null once
   * every endpoint has been tried.
   */
  async next(): Promise<EgressEndpoint | null> {
    while (this.regionIndex < this.regions.length) {
      const region = this.regions[this.regionIndex];
      if (!this.pool.hasCandidates(region, this.used)) {
        this.regionIndex++;
        continue;
      }

      try {
        const endpoint = await this.pool.acquire(region, this.used);
        this.used.add(endpoint.id);
        return endpoint;
      } catch (error) {
        if (error instanceof EndpointUnavailable && error.endpointId) {
          console.warn(`[Egress] Skipping ${error.endpointId}: ${describeError(error)}`);
          this.used.add(error.endpointId);
          continue;
        }
        throw error;
      }
    }
    return null;
  }

  markBlocked(endpoint: EgressEndpoint): void {
    this.blocked.add(endpoint.id);
    console.log(`[Egress] ${endpoint.id} blocked for this scrape`);
  }

  isBlocked(endpointId: string): boolean {
    return this.blocked.has(endpointId);
  }

  blockedEndpoints(): string[] {
    return [...this.blocked];
  }
}
