/**
 * Egress Provisioners
 *
 * A provisioner owns the resource behind one endpoint: it starts it, reports
 * its address once it has one, and stops it again.
 */

import {
  DescribeInstancesCommand,
  EC2Client,
  StartInstancesCommand,
  StopInstancesCommand,
} from "@aws-sdk/client-ec2";
import type { EgressEndpointConfig } from "../config";
import type { EgressEndpoint } from "../types";

export interface EgressProvisioner {
  start(endpoint: EgressEndpoint): Promise<void>;
  /** Current address, or undefined while the resource is still coming up. */
  resolveAddress(endpoint: EgressEndpoint): Promise<string | undefined>;
  stop(endpoint: EgressEndpoint): Promise<void>;
}

/**
 * Endpoint whose address is known up front (a fixed proxy host).
 */
export class StaticProvisioner implements EgressProvisioner {
  constructor(private readonly address: string) {}

  async start(): Promise<void> {}

  async resolveAddress(): Promise<string | undefined> {
    return this.address;
  }

  async stop(): Promise<void> {}
}

/**
 * Endpoint backed by an EC2 instance running a proxy. The instance is
 * started on demand and reached through its public IP.
 */
export class Ec2InstanceProvisioner implements EgressProvisioner {
  constructor(
    private readonly instanceId: string,
    private readonly client: Pick<EC2Client, "send">
  ) {}

  async start(endpoint: EgressEndpoint): Promise<void> {
    console.log(`[Egress] Starting instance ${this.instanceId} for ${endpoint.id}`);
    await this.client.send(new StartInstancesCommand({ InstanceIds: [this.instanceId] }));
  }

  async resolveAddress(): Promise<string | undefined> {
    const response = await this.client.send(new DescribeInstancesCommand({ InstanceIds: [this.instanceId] }));
    const instance = response.Reservations?.[0]?.Instances?.[0];
    if (instance?.State?.Name !== "running") {
      return undefined;
    }
    return instance.PublicIpAddress || undefined;
  }

  async stop(endpoint: EgressEndpoint): Promise<void> {
    console.log(`[Egress] Stopping instance ${this.instanceId} for ${endpoint.id}`);
    await this.client.send(new StopInstancesCommand({ InstanceIds: [this.instanceId] }));
  }
}

const ec2Clients = new Map<string, EC2Client>();

function ec2ClientFor(region: string): EC2Client {
  let client = ec2Clients.get(region);
  if (!client) {
    client = new EC2Client({ region });
    ec2Clients.set(region, client);
  }
  return client;
}

/**
 * Build the provisioner described by an endpoint's configuration.
 */
export function createProvisioner(config: EgressEndpointConfig): EgressProvisioner {
  switch (config.provisioner) {
    case "static":
      return new StaticProvisioner(config.address);
    case "ec2":
      return new Ec2InstanceProvisioner(config.instanceId, ec2ClientFor(config.networkRegion));
  }
}
