import { afterEach, describe, expect, it, vi } from "vitest";
import { EndpointUnavailable } from "../errors";
import type { EgressEndpoint } from "../types";
import { EgressPool, getEgressPool, releaseEgressPool, type EgressPoolEntry } from "./pool";
import { StaticProvisioner, type EgressProvisioner } from "./provisioners";
import { EgressRotation } from "./rotation";

const OPTIONS = { proxyPort: 8080, provisionTimeoutMs: 50, pollIntervalMs: 1 };

function staticEntry(id: string, networkRegion: string, address = `10.0.0.${id.length}`): EgressPoolEntry {
  return {
    endpoint: { id, networkRegion, provisioningState: "STOPPED" },
    provisioner: new StaticProvisioner(address),
  };
}

class SlowProvisioner implements EgressProvisioner {
  starts = 0;
  stops = 0;
  private polls = 0;

  constructor(
    private readonly address: string | undefined,
    private readonly readyAfterPolls = 1
  ) {}

  async start(): Promise<void> {
    this.starts++;
  }

  async resolveAddress(): Promise<string | undefined> {
    this.polls++;
    return this.polls > this.readyAfterPolls ? this.address : undefined;
  }

  async stop(): Promise<void> {
    this.stops++;
  }
}

function entry(id: string, networkRegion: string, provisioner: EgressProvisioner): EgressPoolEntry {
  return { endpoint: { id, networkRegion, provisioningState: "STOPPED" }, provisioner };
}

describe("EgressPool", () => {
  it("hands out endpoints of a region round-robin", async () => {
    const pool = new EgressPool([staticEntry("a", "ca"), staticEntry("b", "ca"), staticEntry("c", "us")], OPTIONS);

    const ids: string[] = [];
    for (let i = 0; i < 3; i++) {
      ids.push((await pool.acquire("ca")).id);
    }
    expect(ids).toEqual(["a", "b", "a"]);
  });

  it("skips excluded endpoints", async () => {
    const pool = new EgressPool([staticEntry("a", "ca"), staticEntry("b", "ca")], OPTIONS);
    expect((await pool.acquire("ca", new Set(["a"]))).id).toBe("b");
    await expect(pool.acquire("ca", new Set(["a", "b"]))).rejects.toBeInstanceOf(EndpointUnavailable);
  });

  it("marks a provisioned endpoint READY with its address", async () => {
    const provisioner = new SlowProvisioner("203.0.113.7", 2);
    const pool = new EgressPool([entry("vpn-1", "ca", provisioner)], OPTIONS);

    const endpoint = await pool.acquire("ca");
    expect(endpoint).toEqual({
      id: "vpn-1",
      networkRegion: "ca",
      provisioningState: "READY",
      address: "203.0.113.7",
    });
    expect(provisioner.starts).toBe(1);
  });

  it("shares one provisioning wait between concurrent acquirers", async () => {
    const provisioner = new SlowProvisioner("203.0.113.8", 3);
    const pool = new EgressPool([entry("vpn-1", "ca", provisioner)], OPTIONS);

    const [first, second] = await Promise.all([pool.acquire("ca"), pool.acquire("ca")]);
    expect(first).toBe(second);
    expect(provisioner.starts).toBe(1);
  });

  it("fails with EndpointUnavailable and resets state when provisioning times out", async () => {
    const provisioner = new SlowProvisioner(undefined);
    const pool = new EgressPool([entry("vpn-1", "ca", provisioner)], OPTIONS);

    const error = await pool.acquire("ca").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EndpointUnavailable);
    expect(error instanceof EndpointUnavailable && error.endpointId).toBe("vpn-1");
    expect(pool.endpoints()[0].provisioningState).toBe("STOPPED");
  });

  it("releases started endpoints", async () => {
    const provisioner = new SlowProvisioner("203.0.113.9");
    const pool = new EgressPool([entry("vpn-1", "ca", provisioner), staticEntry("idle", "ca")], OPTIONS);
    await pool.acquire("ca");

    const failed = await pool.releaseAll();

    expect(failed).toEqual([]);
    expect(provisioner.stops).toBe(1);
    expect(pool.endpoints().map((e: EgressEndpoint) => e.provisioningState)).toEqual(["STOPPED", "STOPPED"]);
  });

  it("orders regions by preference and keeps unlisted ones last", () => {
    const pool = new EgressPool([staticEntry("x", "eu"), staticEntry("y", "us"), staticEntry("z", "ca")], {
      ...OPTIONS,
      regions: ["ca", "us", "ap"],
    });
    expect(pool.regions()).toEqual(["ca", "us", "eu"]);
  });
});

describe("shared egress pool", () => {
  const config = {
    endpoints: [
      { id: "vpn-ca-1", networkRegion: "ca-central-1", provisioner: "static" as const, address: "127.0.0.1" },
      { id: "vpn-ca-2", networkRegion: "ca-central-1", provisioner: "static" as const, address: "127.0.0.2" },
    ],
    regions: ["ca-central-1"],
    proxyPort: 3128,
    provisionTimeoutMs: 50,
    pollIntervalMs: 1,
  };

  afterEach(async () => {
    await releaseEgressPool();
  });

  it("returns the same pool on every call", async () => {
    const pool = getEgressPool(config);
    expect(getEgressPool({ ...config, endpoints: [] })).toBe(pool);

    expect((await getEgressPool(config).acquire("ca-central-1")).id).toBe("vpn-ca-1");
    expect((await getEgressPool(config).acquire("ca-central-1")).id).toBe("vpn-ca-2");
  });

  it("stops started endpoints and builds a new pool afterwards", async () => {
    const pool = getEgressPool(config);
    await pool.acquire("ca-central-1");

    expect(await releaseEgressPool()).toEqual([]);
    expect(pool.endpoints().map((e) => e.provisioningState)).toEqual(["STOPPED", "STOPPED"]);
    expect(getEgressPool(config)).not.toBe(pool);
  });

  it("has nothing to release before first use", async () => {
    expect(await releaseEgressPool()).toEqual([]);
  });
});

describe("EgressRotation", () => {
  it("walks every endpoint once across regions, then returns null", async () => {
    const pool = new EgressPool([staticEntry("ca-1", "ca"), staticEntry("us-1", "us")], {
      ...OPTIONS,
      regions: ["ca", "us"],
    });
    const rotation = new EgressRotation(pool);

    expect((await rotation.next())?.id).toBe("ca-1");
    expect((await rotation.next())?.id).toBe("us-1");
    expect(await rotation.next()).toBeNull();
  });

  it("skips endpoints that fail to provision", async () => {
    const broken: EgressProvisioner = {
      start: vi.fn(async () => {
        throw new Error("instance limit reached");
      }),
      resolveAddress: vi.fn(async () => undefined),
      stop: vi.fn(async () => undefined),
    };
    const pool = new EgressPool([entry("ca-1", "ca", broken), staticEntry("ca-2", "ca")], OPTIONS);
    const rotation = new EgressRotation(pool, ["ca"]);

    expect((await rotation.next())?.id).toBe("ca-2");
    expect(await rotation.next()).toBeNull();
  });

  it("keeps blocked marks out of the shared pool", async () => {
    const pool = new EgressPool([staticEntry("ca-1", "ca")], OPTIONS);
    const first = new EgressRotation(pool, ["ca"]);
    const endpoint = await first.next();
    expect(endpoint).not.toBeNull();
    if (endpoint) first.markBlocked(endpoint);

    const second = new EgressRotation(pool, ["ca"]);
    expect((await second.next())?.id).toBe("ca-1");
    expect(first.blockedEndpoints()).toEqual(["ca-1"]);
    expect(second.isBlocked("ca-1")).toBe(false);
  });
});
