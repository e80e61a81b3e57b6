import type { JsonObject } from "../core/json.js";
import type { RunId } from "../core/ids.js";
import type { RunRecord } from "../core/run.js";
import type { ObjectiveStore } from "../store/objectiveStore.js";
import type { LaunchMetadata, RunStore } from "../store/runStore.js";
import { extractLaunchColumns, parseConfigObjectives, type SkippedLaunchField } from "./launchConfig.js";

export interface LaunchRegistration {
  run: RunRecord;
  launchFieldsSkipped: SkippedLaunchField[];
  objectivesInserted: string[];
  objectivesSkipped: Array<{ index: number; reason: string }>;
}

/**
 * Launch-time registration: the run row, then one objective row per configured objective.
 * A duplicate run id fails the whole registration before any objective is written.
 */
export async function registerLaunch(
  deps: { runs: RunStore; objectives: ObjectiveStore },
  input: { runId: RunId; externalRunId?: string | null; config: JsonObject; metadata?: LaunchMetadata }
): Promise<LaunchRegistration> {
  const run = await deps.runs.insertRun(input);
  const parsed = parseConfigObjectives(input.config);

  const objectivesInserted: string[] = [];
  const objectivesSkipped = [...parsed.skipped];
  for (const { index, spec } of parsed.objectives) {
    const res = await deps.objectives.insertObjective(run.runId, spec);
    if (res.inserted) objectivesInserted.push(spec.name);
    else objectivesSkipped.push({ index, reason: `duplicate objective ${spec.name}` });
  }

  return {
    run,
    launchFieldsSkipped: extractLaunchColumns(input.config).skipped,
    objectivesInserted,
    objectivesSkipped
  };
}
