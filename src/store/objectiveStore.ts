import type { Kysely, Updateable } from "kysely";
import type { RunId } from "../core/ids.js";
import type { ObjectiveMetricValues, ObjectiveRecord, ObjectiveSpec } from "../core/objective.js";
import type { DB, ObjectivesTable } from "../db/types.js";
import { mapObjective } from "./rows.js";

export interface InsertObjectiveResult {
  inserted: boolean;
}

export interface UpdateObjectiveResult {
  updated: boolean;
}

/** Child table of per-run objectives; (run_id, objective_name) is unique. */
export class ObjectiveStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: Kysely<DB>,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async insertObjective(runId: RunId, spec: ObjectiveSpec): Promise<InsertObjectiveResult> {
    const ts = this.now().toISOString();
    const row = await this.db
      .insertInto("objectives")
      .values({
        run_id: runId,
        objective_name: spec.name,
        objective_alias: spec.alias,
        uniprot: spec.uniprot,
        weight: spec.weight,
        direction: spec.direction,
        created_at: ts,
        updated_at: ts
      })
      .onConflict((oc) => oc.columns(["run_id", "objective_name"]).doNothing())
      .returning("id")
      .executeTakeFirst();
    return { inserted: row !== undefined };
  }

  /** Writes only the metric columns present in `values`. */
  async updateObjectiveMetrics(
    runId: RunId,
    objectiveName: string,
    values: ObjectiveMetricValues
  ): Promise<UpdateObjectiveResult> {
    const updates: Updateable<ObjectivesTable> = {};
    if (values.raw_mean !== undefined) updates.raw_mean = values.raw_mean;
    if (values.normalized_mean !== undefined) updates.normalized_mean = values.normalized_mean;
    if (values.raw_std !== undefined) updates.raw_std = values.raw_std;
    if (values.normalized_std !== undefined) updates.normalized_std = values.normalized_std;
    if (!Object.keys(updates).length) return { updated: false };
    updates.updated_at = this.now().toISOString();

    const row = await this.db
      .updateTable("objectives")
      .set(updates)
      .where("run_id", "=", runId)
      .where("objective_name", "=", objectiveName)
      .returning("id")
      .executeTakeFirst();
    return { updated: row !== undefined };
  }

  async listObjectives(runId: RunId): Promise<ObjectiveRecord[]> {
    const rows = await this.db
      .selectFrom("objectives")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("objective_name", "asc")
      .execute();
    return rows.map(mapObjective);
  }

  async deleteObjectives(runId: RunId): Promise<number> {
    const rows = await this.db.deleteFrom("objectives").where("run_id", "=", runId).returning("id").execute();
    return rows.length;
  }
}
