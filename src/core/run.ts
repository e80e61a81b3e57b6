import type { JsonObject } from "./json.js";
import type { RunId } from "./ids.js";

export const RUN_STATUSES = ["launched", "running", "not_running"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

/**
 * Raw reason a run left `running`: the tracker's own state (`finished`, `crashed`, ...)
 * or a local marker (`stale`, `host_<state>`). Informational only; never a status.
 */
export type TerminalState = string;

export type HistorySeries = Record<string, unknown[]>;

export interface LaunchColumns {
  gradientMethod: string | null;
  batchSize: number | null;
  learningRate: number | null;
  beta: number | null;
  numGpus: number | null;
  numObjectives: number | null;
  numScaffolds: number | null;
  gradientAccumulationSteps: number | null;
  maxSteps: number | null;
  maxGradNorm: number | null;
  mixedPrecision: boolean | null;
  gradientCheckpointing: boolean | null;
  fp16: boolean | null;
  bf16: boolean | null;
  enableMovingTargets: boolean | null;
  returnGroups: boolean | null;
  nClusters: number | null;
}

export interface RunRecord extends LaunchColumns {
  runId: RunId;
  externalRunId: string | null;
  displayName: string | null;
  status: RunStatus;
  terminalState: TerminalState | null;
  chainOfCustodyId: string | null;
  configFilePath: string | null;
  configHash: `sha256:${string}`;
  host: string | null;
  infraHostId: string | null;
  createdAt: string;
  startedAt: string | null;
  endedAt: string | null;
  durationSeconds: number | null;
  config: JsonObject;
  finalMetrics: JsonObject | null;
  history: HistorySeries | null;
  trackerUrl: string | null;
  conversationKey: string | null;
  errorLogKey: string | null;
  crashReportKey: string | null;
  crashAnalysisKey: string | null;
  blogPostUrl: string | null;
  updatedAt: string;
}

/** Fields a status update may carry. Absent keys are left untouched. */
export type RunPatch = Partial<
  Pick<
    RunRecord,
    | "externalRunId"
    | "displayName"
    | "terminalState"
    | "startedAt"
    | "endedAt"
    | "durationSeconds"
    | "finalMetrics"
    | "history"
    | "trackerUrl"
  >
>;

const PREDECESSORS: Record<RunStatus, readonly RunStatus[]> = {
  launched: ["launched"],
  running: ["launched", "running"],
  not_running: ["launched", "running", "not_running"]
};

export function allowedPredecessors(to: RunStatus): readonly RunStatus[] {
  return PREDECESSORS[to];
}

export function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUSES.some((s) => s === value);
}

// finished/failed/crashed/killed/preempted all collapse; see terminal_state for the raw value
export function mapTrackerState(state: string): RunStatus {
  return state === "running" ? "running" : "not_running";
}
