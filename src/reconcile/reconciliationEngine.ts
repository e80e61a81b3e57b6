import { ExternalLinkConflictError, InvalidTransitionError, errorMessage } from "../core/errors.js";
import { newInvocationId, type InvocationId, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { Logger } from "../core/logger.js";
import { isObjectiveMetric, stripDirectionSuffix, type ObjectiveMetricValues } from "../core/objective.js";
import { mapTrackerState, type HistorySeries, type RunPatch, type RunRecord, type RunStatus } from "../core/run.js";
import { withTimeout } from "../core/timeout.js";
import { isHostDead } from "../infra/hostLiveness.js";
import type { ObjectiveStore } from "../store/objectiveStore.js";
import type { RunStore } from "../store/runStore.js";
import type { ExperimentTracker, TrackerRecord } from "../tracker/types.js";
import type { IdentityMatcher } from "./identityMatcher.js";
import type { OrphanSweeper } from "./orphanSweeper.js";

export interface ReconciliationDeps {
  runs: RunStore;
  objectives: ObjectiveStore;
  tracker: ExperimentTracker;
  logger: Logger;
  /** Third lookup step for runs with neither an external id nor a display name match. */
  matcher?: IdentityMatcher | null;
  /** Host liveness check for runs the tracker does not know. */
  orphans?: OrphanSweeper | null;
  now?: () => Date;
}

export interface ReconciliationOptions {
  staleAfterSeconds?: number;
  callTimeoutMs?: number;
  maxRunsPerInvocation?: number;
  markStale?: boolean;
}

export type LookupVia = "external_id" | "display_name" | "matcher";
export type RunOutcome = "updated" | "not_found" | "marked_stale" | "errored";

export interface RunResult {
  runId: RunId;
  outcome: RunOutcome;
  /** Status after this invocation (or what it would be under dry run). */
  status: RunStatus;
  via: LookupVia | null;
  externalRunId: string | null;
  objectivesUpdated: number;
  reason: string | null;
}

export interface ReconcileSummary {
  invocationId: InvocationId;
  dryRun: boolean;
  counts: { updated: number; notFound: number; markedStale: number; errored: number };
  results: RunResult[];
}

export interface MetricIssue {
  key: string;
  reason: string;
}

type Lookup = { record: TrackerRecord; via: LookupVia } | { record: null; reason: string };

interface InvocationContext {
  dryRun: boolean;
  log: Logger;
  candidates: () => Promise<TrackerRecord[]>;
}

/** `{metric: [v_step0, v_step1, ...]}` with every series aligned to the row order. */
export function pivotHistory(rows: readonly JsonObject[]): HistorySeries {
  const keys = new Set<string>();
  for (const row of rows) for (const k of Object.keys(row)) keys.add(k);
  const out: HistorySeries = {};
  for (const k of [...keys].sort()) out[k] = rows.map((row) => row[k] ?? null);
  return out;
}

/** Summary minus the tracker's reserved `_` keys. */
export function finalMetrics(summary: JsonObject): JsonObject {
  const out: JsonObject = {};
  for (const [k, v] of Object.entries(summary)) {
    if (!k.startsWith("_")) out[k] = v;
  }
  return out;
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

function lastFinite(series: readonly unknown[] | undefined): number | undefined {
  if (!series) return undefined;
  for (let i = series.length - 1; i >= 0; i--) {
    const v = series[i];
    if (isFiniteNumber(v)) return v;
  }
  return undefined;
}

/**
 * Reads `objectives/<segment>/<metric>` keys. The last finite history value wins, then the
 * summary value. Keys whose only value is not a finite number are reported, not thrown.
 */
export function extractObjectiveMetrics(
  summary: JsonObject,
  history: HistorySeries | null
): { bySegment: Map<string, ObjectiveMetricValues>; issues: MetricIssue[] } {
  const keys = new Set<string>(Object.keys(summary));
  if (history) for (const k of Object.keys(history)) keys.add(k);

  const bySegment = new Map<string, ObjectiveMetricValues>();
  const issues: MetricIssue[] = [];
  for (const key of [...keys].sort()) {
    const parts = key.split("/");
    if (parts.length !== 3 || parts[0] !== "objectives") continue;
    const segment = parts[1];
    const metric = parts[2];
    if (!segment || !metric || !isObjectiveMetric(metric)) continue;

    let value = lastFinite(history?.[key]);
    if (value === undefined) {
      const raw = summary[key];
      if (raw === undefined || raw === null) continue;
      if (!isFiniteNumber(raw)) {
        issues.push({ key, reason: `not a finite number: ${JSON.stringify(raw)}` });
        continue;
      }
      value = raw;
    }

    const values = bySegment.get(segment) ?? {};
    values[metric] = value;
    bySegment.set(segment, values);
  }
  return { bySegment, issues };
}

function mostRecent(records: readonly TrackerRecord[]): TrackerRecord | null {
  let best: TrackerRecord | null = null;
  for (const r of records) {
    if (!best || Date.parse(r.createdAt) > Date.parse(best.createdAt)) best = r;
  }
  return best;
}

export class ReconciliationEngine {
  private readonly now: () => Date;
  private readonly staleAfterSeconds: number;
  private readonly callTimeoutMs: number;
  private readonly maxRuns: number;
  private readonly markStale: boolean;

  constructor(
    private readonly deps: ReconciliationDeps,
    options: ReconciliationOptions = {}
  ) {
    this.now = deps.now ?? (() => new Date());
    this.staleAfterSeconds = options.staleAfterSeconds ?? 7200;
    this.callTimeoutMs = options.callTimeoutMs ?? 60_000;
    this.maxRuns = options.maxRunsPerInvocation ?? 200;
    this.markStale = options.markStale ?? true;
  }

  async reconcile(options: { limit?: number; dryRun?: boolean } = {}): Promise<ReconcileSummary> {
    const invocationId = newInvocationId();
    const dryRun = options.dryRun ?? false;
    const log = this.deps.logger.child({ component: "reconcile", invocation_id: invocationId });

    // store failures here are fatal to the invocation
    const runs = await this.deps.runs.listRunsNeedingSync(options.limit ?? this.maxRuns);
    log.info({ runs: runs.length, dry_run: dryRun }, "reconcile started");

    let listing: Promise<TrackerRecord[]> | null = null;
    const ctx: InvocationContext = {
      dryRun,
      log,
      candidates: () => (listing ??= this.call(this.deps.tracker.listAll(), "list runs"))
    };

    const summary: ReconcileSummary = {
      invocationId,
      dryRun,
      counts: { updated: 0, notFound: 0, markedStale: 0, errored: 0 },
      results: []
    };

    for (const run of runs) {
      const result = await this.reconcileOne(run, ctx);
      summary.results.push(result);
      if (result.outcome === "updated") summary.counts.updated += 1;
      else if (result.outcome === "not_found") summary.counts.notFound += 1;
      else if (result.outcome === "marked_stale") summary.counts.markedStale += 1;
      else summary.counts.errored += 1;
    }

    log.info({ counts: summary.counts }, "reconcile finished");
    return summary;
  }

  private async reconcileOne(run: RunRecord, ctx: InvocationContext): Promise<RunResult> {
    const log = ctx.log.child({ run_id: run.runId });
    try {
      const found = await this.lookup(run, ctx);
      if (found.record === null) return await this.handleNotFound(run, found.reason, ctx, log);
      return await this.applyRecord(run, found.record, found.via, ctx, log);
    } catch (e) {
      const reason = errorMessage(e);
      log.warn({ err: reason }, "run reconcile failed");
      // an unreachable store fails here too and aborts the invocation
      if (!ctx.dryRun) await this.deps.runs.addRunEvent(run.runId, "reconcile.error", reason, null);
      return {
        runId: run.runId,
        outcome: "errored",
        status: run.status,
        via: null,
        externalRunId: run.externalRunId,
        objectivesUpdated: 0,
        reason
      };
    }
  }

  private async lookup(run: RunRecord, ctx: InvocationContext): Promise<Lookup> {
    if (run.externalRunId) {
      const record = await this.call(this.deps.tracker.getById(run.externalRunId), `get ${run.externalRunId}`);
      return record ? { record, via: "external_id" } : { record: null, reason: `tracker has no run ${run.externalRunId}` };
    }

    if (run.displayName) {
      const record = mostRecent(await this.call(this.deps.tracker.searchByName(run.displayName), `search ${run.displayName}`));
      if (record) return { record, via: "display_name" };
    }

    if (this.deps.matcher) {
      const m = this.deps.matcher.match(run, await ctx.candidates());
      if (m.match) return { record: m.match, via: "matcher" };
      return { record: null, reason: m.reason };
    }

    return { record: null, reason: run.displayName ? `no tracker run named ${run.displayName}` : "no external id or display name" };
  }

  private async handleNotFound(run: RunRecord, reason: string, ctx: InvocationContext, log: Logger): Promise<RunResult> {
    const base = { runId: run.runId, via: null, externalRunId: run.externalRunId, objectivesUpdated: 0 };

    if (run.status !== "not_running" && this.deps.orphans) {
      const host = await this.deps.orphans.checkHost(run);
      if (host && isHostDead(host)) {
        if (!ctx.dryRun) await this.deps.orphans.markDead(run, host, "reconcile");
        log.info({ reason }, "not in tracker and host is dead");
        return { ...base, outcome: "marked_stale", status: "not_running", reason: `${reason}; host dead` };
      }
    }

    if (run.status === "launched" && this.markStale) {
      const ageSeconds = (this.now().getTime() - Date.parse(run.createdAt)) / 1000;
      if (ageSeconds > this.staleAfterSeconds) {
        if (!ctx.dryRun) {
          await this.deps.runs.updateStatus(run.runId, "not_running", { terminalState: "stale" });
          await this.deps.runs.addRunEvent(run.runId, "reconcile.stale", reason, {
            age_seconds: Math.round(ageSeconds),
            threshold_seconds: this.staleAfterSeconds
          });
        }
        log.info({ age_seconds: Math.round(ageSeconds) }, "launched run never reached the tracker, marked stale");
        return { ...base, outcome: "marked_stale", status: "not_running", reason };
      }
    }

    log.debug({ reason }, "no tracker record");
    return { ...base, outcome: "not_found", status: run.status, reason };
  }

  private async applyRecord(
    run: RunRecord,
    record: TrackerRecord,
    via: LookupVia,
    ctx: InvocationContext,
    log: Logger
  ): Promise<RunResult> {
    if (via !== "external_id") {
      const owner = await this.deps.runs.findRunIdByExternalId(record.id);
      if (owner !== null && owner !== run.runId) {
        return this.handleNotFound(run, `tracker run ${record.id} is already linked to ${owner}`, ctx, log);
      }
    }

    const mapped = mapTrackerState(record.state);
    const observedAt = this.now().toISOString();

    // a history failure still lets status, duration and final metrics through;
    // history stays unset so the next invocation fetches it again
    let rows: JsonObject[] | null = null;
    let historyError: string | null = null;
    try {
      rows = await this.call(this.deps.tracker.scanHistory(record.id), `history ${record.id}`);
    } catch (e) {
      historyError = errorMessage(e);
      log.warn({ err: historyError }, "history fetch failed");
    }

    const patch: RunPatch = {
      externalRunId: record.id,
      displayName: record.name,
      trackerUrl: record.url,
      startedAt: record.createdAt
    };
    const runtime = record.summary["_runtime"];
    if (isFiniteNumber(runtime) && runtime > 0) patch.durationSeconds = Math.trunc(runtime);
    if (mapped === "not_running") patch.terminalState = record.state;
    if (mapped === "not_running" && run.status !== "not_running") patch.endedAt = observedAt;
    if (rows && rows.length) patch.history = pivotHistory(rows);
    if (record.state === "finished") {
      const fm = finalMetrics(record.summary);
      if (Object.keys(fm).length) patch.finalMetrics = fm;
    }

    // a run already not_running keeps its status and is only enriched
    const target: RunStatus | null = run.status === "not_running" ? null : mapped;
    const finalStatus = target ?? run.status;

    if (ctx.dryRun) {
      return {
        runId: run.runId,
        outcome: "updated",
        status: finalStatus,
        via,
        externalRunId: record.id,
        objectivesUpdated: 0,
        reason: historyError === null ? null : `history unavailable: ${historyError}`
      };
    }

    let status = finalStatus;
    try {
      status = (await this.deps.runs.updateStatus(run.runId, target, patch)).status;
    } catch (e) {
      if (e instanceof ExternalLinkConflictError) return this.handleNotFound(run, e.message, ctx, log);
      if (!(e instanceof InvalidTransitionError)) throw e;
      // another writer moved the run on; keep its status and enrich only
      const enrichment: RunPatch = { ...patch };
      delete enrichment.endedAt;
      status = (await this.deps.runs.updateStatus(run.runId, null, enrichment)).status;
    }

    if (target && target !== run.status) {
      await this.deps.runs.addRunEvent(run.runId, "reconcile.status", `${run.status} -> ${status}`, {
        via,
        external_run_id: record.id,
        tracker_state: record.state
      });
    }

    if (historyError !== null) {
      await this.deps.runs.addRunEvent(run.runId, "reconcile.history_error", historyError, { external_run_id: record.id });
    }

    const objectivesUpdated = await this.applyObjectiveMetrics(run.runId, record.summary, patch.history ?? null, log);
    log.info({ via, tracker_state: record.state, status, objectives_updated: objectivesUpdated }, "run reconciled");

    return {
      runId: run.runId,
      outcome: "updated",
      status,
      via,
      externalRunId: record.id,
      objectivesUpdated,
      reason: historyError === null ? null : `history unavailable: ${historyError}`
    };
  }

  private async applyObjectiveMetrics(
    runId: RunId,
    summary: JsonObject,
    history: HistorySeries | null,
    log: Logger
  ): Promise<number> {
    const { bySegment, issues } = extractObjectiveMetrics(summary, history);
    for (const issue of issues) {
      log.warn({ key: issue.key, reason: issue.reason }, "skipping malformed objective metric");
      await this.deps.runs.addRunEvent(runId, "reconcile.malformed_metric", issue.reason, { key: issue.key });
    }
    if (!bySegment.size) return 0;

    const objectives = await this.deps.objectives.listObjectives(runId);
    let updated = 0;
    for (const [segment, values] of bySegment) {
      const base = stripDirectionSuffix(segment);
      const objective = objectives.find(
        (o) => o.objectiveAlias === segment || o.objectiveName === segment || o.objectiveName === base
      );
      if (!objective) {
        log.debug({ segment }, "metric for an objective this run does not declare");
        continue;
      }
      const res = await this.deps.objectives.updateObjectiveMetrics(runId, objective.objectiveName, values);
      if (res.updated) updated += 1;
    }
    return updated;
  }

  private call<T>(promise: Promise<T>, label: string): Promise<T> {
    return withTimeout(promise, this.callTimeoutMs, "tracker", label);
  }
}
