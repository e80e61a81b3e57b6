import type { RunId } from "./ids.js";

export type ObjectiveDirection = "maximize" | "minimize";

export const OBJECTIVE_METRICS = ["raw_mean", "normalized_mean", "raw_std", "normalized_std"] as const;
export type ObjectiveMetric = (typeof OBJECTIVE_METRICS)[number];

export interface ObjectiveRecord {
  id: number;
  runId: RunId;
  objectiveName: string;
  objectiveAlias: string | null;
  uniprot: string | null;
  weight: number | null;
  direction: ObjectiveDirection | null;
  rawMean: number | null;
  normalizedMean: number | null;
  rawStd: number | null;
  normalizedStd: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface ObjectiveSpec {
  name: string;
  alias: string | null;
  uniprot: string | null;
  weight: number | null;
  direction: ObjectiveDirection | null;
}

export type ObjectiveMetricValues = Partial<Record<ObjectiveMetric, number>>;

export function isObjectiveMetric(value: string): value is ObjectiveMetric {
  return OBJECTIVE_METRICS.some((m) => m === value);
}

/** `COMT_activity_maximize` -> `COMT_activity`. */
export function stripDirectionSuffix(alias: string): string {
  for (const suffix of ["_maximize", "_minimize"]) {
    if (alias.endsWith(suffix)) return alias.slice(0, -suffix.length);
  }
  return alias;
}
