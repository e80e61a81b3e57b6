import { DescribeInstancesCommand, EC2Client, type DescribeInstancesCommandOutput } from "@aws-sdk/client-ec2";
import { ExternalServiceError } from "../core/errors.js";

export type HostState = { kind: "present"; state: string } | { kind: "not_found" };

export interface HostLivenessProbe {
  describeHost(hostId: string): Promise<HostState>;
}

const DEAD_STATES = new Set(["terminated", "shutting-down", "stopped"]);

/** A host that no longer exists, or is terminated, shutting down or stopped. */
export function isHostDead(state: HostState): boolean {
  return state.kind === "not_found" || DEAD_STATES.has(state.state);
}

/** `host_terminated`, `host_not_found`, ... as recorded in terminal_state. */
export function hostTerminalState(state: HostState): string {
  return state.kind === "not_found" ? "host_not_found" : `host_${state.state}`;
}

export function stateFromDescribe(output: DescribeInstancesCommandOutput): HostState {
  const instance = output.Reservations?.[0]?.Instances?.[0];
  if (!instance) return { kind: "not_found" };
  return { kind: "present", state: instance.State?.Name ?? "unknown" };
}

export function isInstanceNotFound(error: unknown): boolean {
  return error instanceof Error && error.name === "InvalidInstanceID.NotFound";
}

export class Ec2HostLivenessProbe implements HostLivenessProbe {
  private readonly client: EC2Client;

  constructor(options: { region: string; client?: EC2Client }) {
    this.client = options.client ?? new EC2Client({ region: options.region });
  }

  async describeHost(hostId: string): Promise<HostState> {
    try {
      const output = await this.client.send(new DescribeInstancesCommand({ InstanceIds: [hostId] }));
      return stateFromDescribe(output);
    } catch (error) {
      if (isInstanceNotFound(error)) return { kind: "not_found" };
      throw new ExternalServiceError("infrastructure", `describe ${hostId} failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }
  }
}
