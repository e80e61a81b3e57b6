import { sql, type Kysely, type RawBuilder, type Selectable } from "kysely";
import type { RunRecord, RunStatus } from "../core/run.js";
import type { DB, RunsTable } from "../db/types.js";
import { DEFAULT_RUN_ORDER, type RunOrder } from "../store/runStore.js";
import { mapRun, toCount, toNumberOrNull } from "../store/rows.js";

export interface ObjectiveBounds {
  min?: number;
  max?: number;
}

/** objective_name -> inclusive bounds on the objective's raw mean. */
export type ObjectiveFilters = Record<string, ObjectiveBounds>;

export interface ObjectivePredicate {
  objectiveName: string;
  bounds: ObjectiveBounds;
}

export interface RunLevelFilters {
  gradientMethod?: string;
  status?: RunStatus;
  host?: string;
}

export interface ObjectiveStatistics {
  count: number;
  mean: number | null;
  min: number | null;
  max: number | null;
  avgStd: number | null;
}

export interface GroupComparison {
  gradientMethod: string;
  count: number;
  avg: number | null;
  best: number | null;
  worst: number | null;
  avgHours: number | null;
}

export function toPredicates(filters: ObjectiveFilters): ObjectivePredicate[] {
  return Object.entries(filters).map(([objectiveName, bounds]) => ({ objectiveName, bounds }));
}

/**
 * One inner join per objective, each under its own alias, so a run qualifies only when
 * every named objective is in range at once. Every value is a bound parameter. Each join
 * pins (run_id, objective_name), which is unique, so rows come back one per run.
 */
export function buildObjectiveQuery(
  predicates: ObjectivePredicate[],
  runFilters: RunLevelFilters,
  order: RunOrder,
  limit: number
): RawBuilder<Selectable<RunsTable>> {
  const joins: RawBuilder<unknown>[] = [];
  const conditions: RawBuilder<unknown>[] = [];

  predicates.forEach((p, i) => {
    const alias = `o${i}`;
    joins.push(
      sql`inner join objectives as ${sql.id(alias)} on ${sql.ref(`${alias}.run_id`)} = ${sql.ref("r.run_id")} and ${sql.ref(
        `${alias}.objective_name`
      )} = ${p.objectiveName}`
    );
    const value = sql.ref(`${alias}.raw_mean`);
    if (p.bounds.min !== undefined) conditions.push(sql`${value} >= ${p.bounds.min}`);
    if (p.bounds.max !== undefined) conditions.push(sql`${value} <= ${p.bounds.max}`);
  });

  if (runFilters.gradientMethod !== undefined) conditions.push(sql`${sql.ref("r.gradient_method")} = ${runFilters.gradientMethod}`);
  if (runFilters.status !== undefined) conditions.push(sql`${sql.ref("r.status")} = ${runFilters.status}`);
  if (runFilters.host !== undefined) conditions.push(sql`${sql.ref("r.host")} = ${runFilters.host}`);

  const where = conditions.length ? sql`where ${sql.join(conditions, sql` and `)}` : sql``;
  const direction = order.direction === "asc" ? sql`asc` : sql`desc`;

  return sql<Selectable<RunsTable>>`select r.* from runs as r ${sql.join(joins, sql` `)} ${where} order by ${sql.ref(
    `r.${order.column}`
  )} ${direction}, ${sql.ref("r.run_id")} asc limit ${limit}`;
}

export class ObjectiveQueryEngine {
  constructor(private readonly db: Kysely<DB>) {}

  async query(
    objectiveFilters: ObjectiveFilters,
    runFilters: RunLevelFilters = {},
    order: RunOrder = DEFAULT_RUN_ORDER,
    limit = 100
  ): Promise<RunRecord[]> {
    const predicates = toPredicates(objectiveFilters);
    // no objective predicate would mean the whole table
    if (!predicates.length) return [];

    const res = await buildObjectiveQuery(predicates, runFilters, order, limit).execute(this.db);
    const seen = new Set<string>();
    const out: RunRecord[] = [];
    for (const row of res.rows) {
      if (seen.has(row.run_id)) continue;
      seen.add(row.run_id);
      out.push(mapRun(row));
    }
    return out;
  }

  async statistics(
    objectiveName: string,
    options: { gradientMethod?: string; status?: RunStatus } = {}
  ): Promise<ObjectiveStatistics> {
    let q = this.db
      .selectFrom("runs as r")
      .innerJoin("objectives as o", "o.run_id", "r.run_id")
      .select(({ fn }) => [
        fn.countAll().as("count"),
        fn.avg("o.raw_mean").as("mean"),
        fn.min("o.raw_mean").as("min"),
        fn.max("o.raw_mean").as("max"),
        fn.avg("o.raw_std").as("avg_std")
      ])
      .where("o.objective_name", "=", objectiveName)
      .where("r.status", "=", options.status ?? "not_running");
    if (options.gradientMethod !== undefined) q = q.where("r.gradient_method", "=", options.gradientMethod);

    const row = await q.executeTakeFirstOrThrow();
    return {
      count: toCount(row.count),
      mean: toNumberOrNull(row.mean),
      min: toNumberOrNull(row.min),
      max: toNumberOrNull(row.max),
      avgStd: toNumberOrNull(row.avg_std)
    };
  }

  /** One row per gradient method, best average first. `best` is the max raw mean, `worst` the min. */
  async compareGroups(objectiveName: string, status: RunStatus = "not_running"): Promise<GroupComparison[]> {
    const rows = await this.db
      .selectFrom("runs as r")
      .innerJoin("objectives as o", "o.run_id", "r.run_id")
      .select(({ fn }) => [
        "r.gradient_method",
        fn.countAll().as("count"),
        fn.avg("o.raw_mean").as("avg"),
        fn.max("o.raw_mean").as("best"),
        fn.min("o.raw_mean").as("worst"),
        fn.avg("r.duration_seconds").as("avg_duration_seconds")
      ])
      .where("o.objective_name", "=", objectiveName)
      .where("r.status", "=", status)
      .where("r.gradient_method", "is not", null)
      .groupBy("r.gradient_method")
      .execute();

    const groups: GroupComparison[] = [];
    for (const row of rows) {
      if (row.gradient_method === null) continue;
      const avgDuration = toNumberOrNull(row.avg_duration_seconds);
      groups.push({
        gradientMethod: row.gradient_method,
        count: toCount(row.count),
        avg: toNumberOrNull(row.avg),
        best: toNumberOrNull(row.best),
        worst: toNumberOrNull(row.worst),
        avgHours: avgDuration === null ? null : avgDuration / 3600
      });
    }

    return groups.sort((a, b) => {
      if (a.avg === b.avg) return a.gradientMethod.localeCompare(b.gradientMethod);
      if (a.avg === null) return 1;
      if (b.avg === null) return -1;
      return b.avg - a.avg;
    });
  }
}
