/**
 * Egress Endpoint Pool
 *
 * Process-wide pool of egress endpoints loaded from configuration. The pool
 * owns lifecycle state (STOPPED → STARTING → READY); which endpoints a
 * given scrape has given up on lives in its EgressRotation, never here.
 */

import type { EgressConfig } from "../config";
import { EndpointUnavailable, describeError } from "../errors";
import type { EgressEndpoint } from "../types";
import { pollUntil } from "../utils/timing";
import { createProvisioner, type EgressProvisioner } from "./provisioners";

export interface EgressPoolEntry {
  endpoint: EgressEndpoint;
  provisioner: EgressProvisioner;
}

export interface EgressPoolOptions {
  /** Region preference order; regions not listed follow in pool order. */
  regions?: readonly string[];
  proxyPort: number;
  provisionTimeoutMs: number;
  pollIntervalMs: number;
}

interface PoolSlot extends EgressPoolEntry {
  provisioning?: Promise<EgressEndpoint>;
}

export class EgressPool {
  private readonly slots = new Map<string, PoolSlot>();
  private readonly cursors = new Map<string, number>();

  constructor(
    entries: readonly EgressPoolEntry[],
    private readonly options: EgressPoolOptions
  ) {
    for (const entry of entries) {
      if (this.slots.has(entry.endpoint.id)) {
        throw new Error(`Duplicate egress endpoint id: ${entry.endpoint.id}`);
      }
      this.slots.set(entry.endpoint.id, { ...entry });
    }
  }

  static fromConfig(config: EgressConfig): EgressPool {
    const entries = config.endpoints.map((endpoint) => ({
      endpoint: {
        id: endpoint.id,
        networkRegion: endpoint.networkRegion,
        provisioningState: "STOPPED" as const,
      },
      provisioner: createProvisioner(endpoint),
    }));
    return new EgressPool(entries, config);
  }

  get proxyPort(): number {
    return this.options.proxyPort;
  }

  get size(): number {
    return this.slots.size;
  }

  /**
   * Regions in preference order, limited to regions that have endpoints.
   */
  regions(): string[] {
    const present = new Set([...this.slots.values()].map((slot) => slot.endpoint.networkRegion));
    const preferred = (this.options.regions ?? []).filter((region) => present.has(region));
    const rest = [...present].filter((region) => !preferred.includes(region));
    return [...preferred, ...rest];
  }

  endpoints(): EgressEndpoint[] {
    return [...this.slots.values()].map((slot) => slot.endpoint);
  }

  private candidates(region: string, exclude: ReadonlySet<string>): PoolSlot[] {
    return [...this.slots.values()].filter(
      (slot) => slot.endpoint.networkRegion === region && !exclude.has(slot.endpoint.id)
    );
  }

  hasCandidates(region: string, exclude: ReadonlySet<string> = new Set()): boolean {
    return this.candidates(region, exclude).length > 0;
  }

  /**
   * Pick the next endpoint of `region` round-robin, skipping `exclude`, and
   * wait until it is READY. Concurrent callers of a STARTING endpoint share
   * one provisioning wait.
   */
  async acquire(region: string, exclude: ReadonlySet<string> = new Set()): Promise<EgressEndpoint> {
    const candidates = this.candidates(region, exclude);
    if (candidates.length === 0) {
      throw new EndpointUnavailable(`No egress endpoint available in ${region}`);
    }

    const cursor = this.cursors.get(region) ?? 0;
    this.cursors.set(region, cursor + 1);
    const slot = candidates[cursor % candidates.length];

    if (slot.endpoint.provisioningState === "READY" && slot.endpoint.address) {
      return slot.endpoint;
    }
    if (!slot.provisioning) {
      slot.provisioning = this.provision(slot).finally(() => {
        slot.provisioning = undefined;
      });
    }
    return slot.provisioning;
  }

  private async provision(slot: PoolSlot): Promise<EgressEndpoint> {
    const { endpoint, provisioner } = slot;
    const started = Date.now();
    endpoint.provisioningState = "STARTING";
    console.log(`[Egress] Provisioning ${endpoint.id} in ${endpoint.networkRegion}`);

    try {
      await provisioner.start(endpoint);
      const address = await pollUntil(() => provisioner.resolveAddress(endpoint), {
        timeoutMs: this.options.provisionTimeoutMs,
        intervalMs: this.options.pollIntervalMs,
        what: `endpoint ${endpoint.id} to get an address`,
      });
      endpoint.address = address;
      endpoint.provisioningState = "READY";
      console.log(`[Egress] ${endpoint.id} ready at ${address} after ${Date.now() - started}ms`);
      return endpoint;
    } catch (error) {
      endpoint.provisioningState = "STOPPED";
      endpoint.address = undefined;
      console.warn(`[Egress] ${endpoint.id} failed to provision: ${describeError(error)}`);
      throw new EndpointUnavailable(
        `Egress endpoint ${endpoint.id} did not become ready: ${describeError(error)}`,
        endpoint.id,
        error
      );
    }
  }

  /**
   * Stop the resource behind an endpoint. Never called during a scrape.
   */
  async release(endpoint: EgressEndpoint): Promise<void> {
    const slot = this.slots.get(endpoint.id);
    if (!slot || slot.endpoint.provisioningState === "STOPPED") {
      return;
    }
    await slot.provisioner.stop(slot.endpoint);
    slot.endpoint.provisioningState = "STOPPED";
    slot.endpoint.address = undefined;
    console.log(`[Egress] Released ${endpoint.id}`);
  }

  /**
   * Release every started endpoint. Returns the ids that failed to stop.
   */
  async releaseAll(): Promise<string[]> {
    const started = this.endpoints().filter((endpoint) => endpoint.provisioningState !== "STOPPED");
    const results = await Promise.allSettled(started.map((endpoint) => this.release(endpoint)));
    const failed: string[] = [];
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        console.warn(`[Egress] Failed to release ${started[i].id}: ${describeError(result.reason)}`);
        failed.push(started[i].id);
      }
    });
    return failed;
  }
}

// ============================================================================
// Shared Pool
// ============================================================================

let sharedPool: EgressPool | null = null;

/**
 * The process-wide pool, built from `config` on first use. Later calls get
 * the same pool, so round-robin cursors and started endpoints carry over
 * from one scrape to the next.
 */
export function getEgressPool(config: EgressConfig): EgressPool {
  if (!sharedPool) {
    sharedPool = EgressPool.fromConfig(config);
  }
  return sharedPool;
}

/**
 * Stop every endpoint the shared pool started and drop the pool; the next
 * getEgressPool() call builds a fresh one. Returns the ids that failed to stop.
 */
export async function releaseEgressPool(): Promise<string[]> {
  const pool = sharedPool;
  sharedPool = null;
  return pool ? pool.releaseAll() : [];
}
