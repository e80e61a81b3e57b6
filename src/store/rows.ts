import type { Selectable } from "kysely";
import type { ObjectiveDirection, ObjectiveRecord } from "../core/objective.js";
import type { RunRecord, RunStatus } from "../core/run.js";
import { isRunStatus } from "../core/run.js";
import { MalformedDataError } from "../core/errors.js";
import type { DB } from "../db/types.js";

export function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return new Date(value).toISOString();
  return new Date(String(value)).toISOString();
}

export function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

// pg returns bigint aggregates as strings; pg-mem returns numbers
export function toCount(value: unknown): number {
  const n = typeof value === "number" ? value : Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

export function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

function toStatus(value: string, runId: string): RunStatus {
  if (!isRunStatus(value)) throw new MalformedDataError(`runs.status (${runId})`, `unknown status ${value}`);
  return value;
}

function toConfigHash(value: string, runId: string): `sha256:${string}` {
  if (!isSha256(value)) throw new MalformedDataError(`runs.config_hash (${runId})`, `not a sha256 digest`);
  return value;
}

function isSha256(value: string): value is `sha256:${string}` {
  return value.startsWith("sha256:");
}

function toDirection(value: string | null): ObjectiveDirection | null {
  return value === "maximize" || value === "minimize" ? value : null;
}

export function mapRun(row: Selectable<DB["runs"]>): RunRecord {
  return {
    runId: row.run_id,
    externalRunId: row.external_run_id,
    displayName: row.display_name,
    status: toStatus(row.status, row.run_id),
    terminalState: row.terminal_state,
    chainOfCustodyId: row.chain_of_custody_id,
    configFilePath: row.config_file_path,
    configHash: toConfigHash(row.config_hash, row.run_id),
    host: row.host,
    infraHostId: row.infra_host_id,
    createdAt: toIso(row.created_at),
    startedAt: toIsoOrNull(row.started_at),
    endedAt: toIsoOrNull(row.ended_at),
    durationSeconds: row.duration_seconds,
    gradientMethod: row.gradient_method,
    batchSize: row.batch_size,
    learningRate: row.learning_rate,
    beta: row.beta,
    numGpus: row.num_gpus,
    numObjectives: row.num_objectives,
    numScaffolds: row.num_scaffolds,
    gradientAccumulationSteps: row.gradient_accumulation_steps,
    maxSteps: row.max_steps,
    maxGradNorm: row.max_grad_norm,
    mixedPrecision: row.mixed_precision,
    gradientCheckpointing: row.gradient_checkpointing,
    fp16: row.fp16,
    bf16: row.bf16,
    enableMovingTargets: row.enable_moving_targets,
    returnGroups: row.return_groups,
    nClusters: row.n_clusters,
    config: row.config_json,
    finalMetrics: row.final_metrics_json ?? null,
    history: row.history_json ?? null,
    trackerUrl: row.tracker_url,
    conversationKey: row.conversation_key,
    errorLogKey: row.error_log_key,
    crashReportKey: row.crash_report_key,
    crashAnalysisKey: row.crash_analysis_key,
    blogPostUrl: row.blog_post_url,
    updatedAt: toIso(row.updated_at)
  };
}

export function mapObjective(row: Selectable<DB["objectives"]>): ObjectiveRecord {
  return {
    id: row.id,
    runId: row.run_id,
    objectiveName: row.objective_name,
    objectiveAlias: row.objective_alias,
    uniprot: row.uniprot,
    weight: toNumberOrNull(row.weight),
    direction: toDirection(row.direction),
    rawMean: toNumberOrNull(row.raw_mean),
    normalizedMean: toNumberOrNull(row.normalized_mean),
    rawStd: toNumberOrNull(row.raw_std),
    normalizedStd: toNumberOrNull(row.normalized_std),
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at)
  };
}
