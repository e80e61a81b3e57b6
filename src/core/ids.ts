import { ulid } from "ulid";

export type RunId = string;
export type InvocationId = `sync_${string}`;

export function newInvocationId(): InvocationId {
  return `sync_${ulid()}` as const;
}

/**
 * Splits `{config_prefix}_{instance_suffix}` on the last underscore.
 * Returns null when the id carries no suffix segment.
 */
export function splitRunId(runId: RunId): { configPrefix: string; instanceSuffix: string } | null {
  const idx = runId.lastIndexOf("_");
  if (idx <= 0 || idx === runId.length - 1) return null;
  return { configPrefix: runId.slice(0, idx), instanceSuffix: runId.slice(idx + 1) };
}
