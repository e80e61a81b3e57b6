import type { RunId } from "./ids.js";
import type { RunStatus } from "./run.js";

export class DuplicateKeyError extends Error {
  constructor(readonly runId: RunId) {
    super(`run already exists: ${runId}`);
    this.name = "DuplicateKeyError";
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly entity: "run" | "objective" | "tracker_record",
    readonly key: string
  ) {
    super(`${entity} not found: ${key}`);
    this.name = "NotFoundError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly runId: RunId,
    readonly from: RunStatus,
    readonly to: RunStatus
  ) {
    super(`invalid status transition for ${runId}: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class ExternalLinkConflictError extends Error {
  constructor(
    readonly runId: RunId,
    readonly externalRunId: string,
    readonly ownerRunId: RunId
  ) {
    super(`tracker run ${externalRunId} is already linked to ${ownerRunId}`);
    this.name = "ExternalLinkConflictError";
  }
}

export class ExternalServiceError extends Error {
  constructor(
    readonly service: "tracker" | "infrastructure",
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${service}: ${message}`, options);
    this.name = "ExternalServiceError";
  }
}

export class MalformedDataError extends Error {
  constructor(
    readonly field: string,
    message: string
  ) {
    super(`malformed ${field}: ${message}`);
    this.name = "MalformedDataError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return typeof e === "string" ? e : "unknown error";
}
