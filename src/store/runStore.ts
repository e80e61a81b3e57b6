import type { Kysely, Updateable } from "kysely";
import { configHash, stableJsonStringify } from "../core/canonicalJson.js";
import { DuplicateKeyError, ExternalLinkConflictError, InvalidTransitionError, NotFoundError } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunPatch, RunRecord, RunStatus } from "../core/run.js";
import { RUN_STATUSES, allowedPredecessors } from "../core/run.js";
import type { DB, RunsTable } from "../db/types.js";
import { extractLaunchColumns } from "../runs/launchConfig.js";
import { mapRun, toCount, toIso, toIsoOrNull } from "./rows.js";

export interface LaunchMetadata {
  displayName?: string | null;
  configFilePath?: string | null;
  host?: string | null;
  infraHostId?: string | null;
  chainOfCustodyId?: string | null;
}

export interface InsertRunInput {
  runId: RunId;
  externalRunId?: string | null;
  config: JsonObject;
  metadata?: LaunchMetadata;
}

export type RunOrderColumn = "created_at" | "started_at" | "duration_seconds" | "run_id";

export interface RunOrder {
  column: RunOrderColumn;
  direction: "asc" | "desc";
}

export const DEFAULT_RUN_ORDER: RunOrder = { column: "created_at", direction: "desc" };

export interface RunListFilter {
  status?: RunStatus | RunStatus[];
  host?: string;
  gradientMethod?: string;
  minDurationHours?: number;
  createdAfter?: string;
  configHash?: string;
  hasBlogPost?: boolean;
  hasCrashAnalysis?: boolean;
  hasHistory?: boolean;
  hasInfraHost?: boolean;
}

export interface RunStats {
  total: number;
  byStatus: Record<RunStatus, number>;
  withBlogPost: number;
  withCrashAnalysis: number;
  withHistory: number;
}

export interface CrashReportKeys {
  errorLogKey: string;
  crashReportKey: string;
  crashAnalysisKey: string;
}

export interface RunEvent {
  eventId: number;
  runId: RunId;
  ts: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}

function sameJson(a: unknown, b: unknown): boolean {
  return stableJsonStringify(a) === stableJsonStringify(b);
}

/** Columns of `patch` (and the status) whose value differs from the stored row. */
function changedColumns(existing: RunRecord, status: RunStatus | null, patch: RunPatch): Updateable<RunsTable> {
  const out: Updateable<RunsTable> = {};
  if (status && status !== existing.status) out.status = status;
  if (patch.displayName !== undefined && patch.displayName !== existing.displayName) out.display_name = patch.displayName;
  if (patch.terminalState !== undefined && patch.terminalState !== existing.terminalState) {
    out.terminal_state = patch.terminalState;
  }
  if (patch.startedAt !== undefined && toIsoOrNull(patch.startedAt) !== existing.startedAt) out.started_at = patch.startedAt;
  if (patch.endedAt !== undefined && toIsoOrNull(patch.endedAt) !== existing.endedAt) out.ended_at = patch.endedAt;
  if (patch.durationSeconds !== undefined && patch.durationSeconds !== existing.durationSeconds) {
    out.duration_seconds = patch.durationSeconds;
  }
  if (patch.finalMetrics !== undefined && !sameJson(patch.finalMetrics, existing.finalMetrics)) {
    out.final_metrics_json = patch.finalMetrics;
  }
  if (patch.history !== undefined && !sameJson(patch.history, existing.history)) out.history_json = patch.history;
  if (patch.trackerUrl !== undefined && patch.trackerUrl !== existing.trackerUrl) out.tracker_url = patch.trackerUrl;
  return out;
}

export class RunStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: Kysely<DB>,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private nowIso(): string {
    return this.now().toISOString();
  }

  /**
   * Stores the config document verbatim. Launch columns that cannot be read from it stay
   * null and are recorded as one `launch.fields_skipped` event; only a duplicate id fails.
   */
  async insertRun(input: InsertRunInput): Promise<RunRecord> {
    const { columns: launch, skipped } = extractLaunchColumns(input.config);
    const meta = input.metadata ?? {};
    const ts = this.nowIso();

    const row = await this.db
      .insertInto("runs")
      .values({
        run_id: input.runId,
        external_run_id: input.externalRunId ?? null,
        display_name: meta.displayName ?? null,
        status: "launched",
        chain_of_custody_id: meta.chainOfCustodyId ?? null,
        config_file_path: meta.configFilePath ?? null,
        config_hash: configHash(input.config),
        host: meta.host ?? null,
        infra_host_id: meta.infraHostId ?? null,
        created_at: ts,
        gradient_method: launch.gradientMethod,
        batch_size: launch.batchSize,
        learning_rate: launch.learningRate,
        beta: launch.beta,
        num_gpus: launch.numGpus,
        num_objectives: launch.numObjectives,
        num_scaffolds: launch.numScaffolds,
        gradient_accumulation_steps: launch.gradientAccumulationSteps,
        max_steps: launch.maxSteps,
        max_grad_norm: launch.maxGradNorm,
        mixed_precision: launch.mixedPrecision,
        gradient_checkpointing: launch.gradientCheckpointing,
        fp16: launch.fp16,
        bf16: launch.bf16,
        enable_moving_targets: launch.enableMovingTargets,
        return_groups: launch.returnGroups,
        n_clusters: launch.nClusters,
        config_json: input.config,
        updated_at: ts
      })
      .onConflict((oc) => oc.column("run_id").doNothing())
      .returningAll()
      .executeTakeFirst();

    if (!row) throw new DuplicateKeyError(input.runId);
    if (skipped.length) {
      await this.addRunEvent(input.runId, "launch.fields_skipped", skipped.map((s) => s.field).join(", "), {
        fields: skipped.map((s) => ({ field: s.field, reason: s.reason }))
      });
    }
    return mapRun(row);
  }

  async getRun(runId: RunId): Promise<RunRecord | null> {
    const row = await this.db.selectFrom("runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? mapRun(row) : null;
  }

  async requireRun(runId: RunId): Promise<RunRecord> {
    const run = await this.getRun(runId);
    if (!run) throw new NotFoundError("run", runId);
    return run;
  }

  /**
   * Sparse, forward-only update. Only keys present in `patch` are assigned, and the
   * status guard lives in the WHERE clause so concurrent writers cannot regress a run.
   * `status = null` enriches fields without touching status. An update that changes
   * nothing writes nothing, `updated_at` included.
   */
  async updateStatus(runId: RunId, status: RunStatus | null, patch: RunPatch = {}): Promise<RunRecord> {
    const existing = await this.requireRun(runId);
    if (status && !allowedPredecessors(status).includes(existing.status)) {
      throw new InvalidTransitionError(runId, existing.status, status);
    }

    const link = patch.externalRunId && existing.externalRunId === null ? patch.externalRunId : null;
    if (link) {
      const owner = await this.findRunIdByExternalId(link);
      if (owner !== null && owner !== runId) throw new ExternalLinkConflictError(runId, link, owner);
    }

    const updates = changedColumns(existing, status, patch);
    if (!link && !Object.keys(updates).length) return existing;

    // the link goes first: a unique violation on it leaves the row untouched
    if (link) await this.linkExternalRunId(runId, link);

    if (Object.keys(updates).length) {
      let q = this.db
        .updateTable("runs")
        .set({ ...updates, updated_at: this.nowIso() })
        .where("run_id", "=", runId);
      if (status) q = q.where("status", "in", [...allowedPredecessors(status)]);
      const updated = await q.returning("run_id").executeTakeFirst();

      if (!updated) {
        const current = await this.requireRun(runId);
        throw new InvalidTransitionError(runId, current.status, status ?? current.status);
      }
    }

    return this.requireRun(runId);
  }

  async findRunIdByExternalId(externalRunId: string): Promise<RunId | null> {
    const row = await this.db
      .selectFrom("runs")
      .select("run_id")
      .where("external_run_id", "=", externalRunId)
      .executeTakeFirst();
    return row ? row.run_id : null;
  }

  /** Sets the tracker link only while it is still empty. Returns whether it was written. */
  async linkExternalRunId(runId: RunId, externalRunId: string): Promise<boolean> {
    const row = await this.db
      .updateTable("runs")
      .set({ external_run_id: externalRunId, updated_at: this.nowIso() })
      .where("run_id", "=", runId)
      .where("external_run_id", "is", null)
      .returning("run_id")
      .executeTakeFirst();
    return row !== undefined;
  }

  /** Administrative correction of a wrong tracker link. */
  async correctExternalRunId(runId: RunId, externalRunId: string | null): Promise<RunRecord> {
    const row = await this.db
      .updateTable("runs")
      .set({ external_run_id: externalRunId, updated_at: this.nowIso() })
      .where("run_id", "=", runId)
      .returning("run_id")
      .executeTakeFirst();
    if (!row) throw new NotFoundError("run", runId);
    return this.requireRun(runId);
  }

  async attachCrashReport(runId: RunId, keys: CrashReportKeys): Promise<RunRecord> {
    await this.updateStatus(runId, "not_running", { terminalState: "crashed" });
    await this.db
      .updateTable("runs")
      .set({
        error_log_key: keys.errorLogKey,
        crash_report_key: keys.crashReportKey,
        crash_analysis_key: keys.crashAnalysisKey
      })
      .where("run_id", "=", runId)
      .execute();
    await this.db
      .updateTable("runs")
      .set({ ended_at: this.nowIso() })
      .where("run_id", "=", runId)
      .where("ended_at", "is", null)
      .execute();
    return this.requireRun(runId);
  }

  async attachBlogPost(runId: RunId, url: string): Promise<RunRecord> {
    return this.setAttachment(runId, { blog_post_url: url });
  }

  async attachConversation(runId: RunId, conversationKey: string): Promise<RunRecord> {
    return this.setAttachment(runId, { conversation_key: conversationKey });
  }

  private async setAttachment(
    runId: RunId,
    values: Pick<Updateable<RunsTable>, "blog_post_url" | "conversation_key">
  ): Promise<RunRecord> {
    const row = await this.db
      .updateTable("runs")
      .set({ ...values, updated_at: this.nowIso() })
      .where("run_id", "=", runId)
      .returning("run_id")
      .executeTakeFirst();
    if (!row) throw new NotFoundError("run", runId);
    return this.requireRun(runId);
  }

  async listRuns(filter: RunListFilter = {}, order: RunOrder = DEFAULT_RUN_ORDER, limit = 100): Promise<RunRecord[]> {
    let q = this.db.selectFrom("runs").selectAll();

    if (filter.status !== undefined) {
      const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
      if (!statuses.length) return [];
      q = q.where("status", "in", statuses);
    }
    if (filter.host !== undefined) q = q.where("host", "=", filter.host);
    if (filter.gradientMethod !== undefined) q = q.where("gradient_method", "=", filter.gradientMethod);
    if (filter.minDurationHours !== undefined) q = q.where("duration_seconds", ">=", filter.minDurationHours * 3600);
    if (filter.createdAfter !== undefined) q = q.where("created_at", ">=", toIso(filter.createdAfter));
    if (filter.configHash !== undefined) q = q.where("config_hash", "=", filter.configHash);
    if (filter.hasBlogPost !== undefined) q = q.where("blog_post_url", filter.hasBlogPost ? "is not" : "is", null);
    if (filter.hasCrashAnalysis !== undefined) {
      q = q.where("crash_analysis_key", filter.hasCrashAnalysis ? "is not" : "is", null);
    }
    if (filter.hasHistory !== undefined) q = q.where("history_json", filter.hasHistory ? "is not" : "is", null);
    if (filter.hasInfraHost !== undefined) q = q.where("infra_host_id", filter.hasInfraHost ? "is not" : "is", null);

    const rows = await q.orderBy(order.column, order.direction).orderBy("run_id", "asc").limit(limit).execute();
    return rows.map(mapRun);
  }

  /** Runs that are live, never synced, or terminal but missing their time series. */
  async listRunsNeedingSync(limit: number): Promise<RunRecord[]> {
    const rows = await this.db
      .selectFrom("runs")
      .selectAll()
      .where((eb) =>
        eb.or([
          eb("status", "=", "running"),
          eb("status", "=", "launched"),
          eb.and([eb("status", "=", "not_running"), eb("history_json", "is", null)])
        ])
      )
      .orderBy("created_at", "desc")
      .orderBy("run_id", "asc")
      .limit(limit)
      .execute();
    return rows.map(mapRun);
  }

  async stats(): Promise<RunStats> {
    const totals = await this.db
      .selectFrom("runs")
      .select(({ fn }) => [
        fn.countAll().as("total"),
        fn.count("blog_post_url").as("with_blog_post"),
        fn.count("crash_analysis_key").as("with_crash_analysis")
      ])
      .executeTakeFirstOrThrow();

    const withHistory = await this.db
      .selectFrom("runs")
      .select(({ fn }) => fn.countAll().as("count"))
      .where("history_json", "is not", null)
      .executeTakeFirstOrThrow();

    const grouped = await this.db
      .selectFrom("runs")
      .select(({ fn }) => ["status", fn.countAll().as("count")])
      .groupBy("status")
      .execute();

    const byStatus: Record<RunStatus, number> = { launched: 0, running: 0, not_running: 0 };
    for (const g of grouped) {
      const status = RUN_STATUSES.find((s) => s === g.status);
      if (status) byStatus[status] = toCount(g.count);
    }

    return {
      total: toCount(totals.total),
      byStatus,
      withBlogPost: toCount(totals.with_blog_post),
      withCrashAnalysis: toCount(totals.with_crash_analysis),
      withHistory: toCount(withHistory.count)
    };
  }

  /** Administrative cleanup. Objectives and events are removed with the run. */
  async deleteRun(runId: RunId): Promise<boolean> {
    await this.db.deleteFrom("objectives").where("run_id", "=", runId).execute();
    await this.db.deleteFrom("run_events").where("run_id", "=", runId).execute();
    const row = await this.db.deleteFrom("runs").where("run_id", "=", runId).returning("run_id").executeTakeFirst();
    return row !== undefined;
  }

  async addRunEvent(runId: RunId, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("run_events")
      .values({ run_id: runId, ts: this.nowIso(), kind, message, data: data ?? null })
      .execute();
  }

  async listRunEvents(runId: RunId): Promise<RunEvent[]> {
    const rows = await this.db
      .selectFrom("run_events")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({
      eventId: r.event_id,
      runId: r.run_id,
      ts: toIso(r.ts),
      kind: r.kind,
      message: r.message,
      data: r.data ?? null
    }));
  }
}
