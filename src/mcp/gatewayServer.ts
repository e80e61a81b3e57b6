import { ErrorCode, McpError, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppConfig } from "../config/appConfig.js";
import {
  ConfigError,
  DuplicateKeyError,
  ExternalLinkConflictError,
  InvalidTransitionError,
  MalformedDataError,
  NotFoundError
} from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { toJsonObject } from "../core/json.js";
import type { Logger } from "../core/logger.js";
import type { ObjectiveRecord } from "../core/objective.js";
import type { RunRecord } from "../core/run.js";
import type { StorageMode } from "../db/connection.js";
import type { ObjectiveQueryEngine } from "../query/objectiveQuery.js";
import type { OrphanSweeper } from "../reconcile/orphanSweeper.js";
import type { ReconciliationEngine } from "../reconcile/reconciliationEngine.js";
import { registerLaunch } from "../runs/launch.js";
import type { ObjectiveStore } from "../store/objectiveStore.js";
import type { RunStore } from "../store/runStore.js";
import { envSnapshot } from "./envSnapshot.js";
import {
  zObjectiveCompareGroupsInput,
  zObjectiveCompareGroupsOutput,
  zObjectiveStatisticsInput,
  zObjectiveStatisticsOutput,
  zObjectivesQueryInput,
  zObjectivesQueryOutput,
  zRunAttachInput,
  zRunGetInput,
  zRunGetOutput,
  zRunListInput,
  zRunListOutput,
  zRunOutput,
  zRunRegisterInput,
  zRunRegisterOutput,
  zRunReportCrashInput,
  zRunStatsInput,
  zRunStatsOutput,
  zRunsReconcileInput,
  zRunsReconcileOutput,
  zRunsSweepOrphansInput,
  zRunsSweepOrphansOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  config: AppConfig;
  storageMode: StorageMode;
  runs: RunStore;
  objectives: ObjectiveStore;
  query: ObjectiveQueryEngine;
  logger: Logger;
  /** Null when the tracker is not configured; runs_reconcile then refuses. */
  reconciler: ReconciliationEngine | null;
  /** Null when no liveness probe is configured. */
  sweeper: OrphanSweeper | null;
}

export function toRunSummary(r: RunRecord): JsonObject {
  return {
    run_id: r.runId,
    external_run_id: r.externalRunId,
    display_name: r.displayName,
    status: r.status,
    terminal_state: r.terminalState,
    host: r.host,
    infra_host_id: r.infraHostId,
    gradient_method: r.gradientMethod,
    config_hash: r.configHash,
    created_at: r.createdAt,
    started_at: r.startedAt,
    ended_at: r.endedAt,
    duration_seconds: r.durationSeconds,
    tracker_url: r.trackerUrl,
    blog_post_url: r.blogPostUrl,
    crash_analysis_key: r.crashAnalysisKey
  };
}

function toRunDetail(r: RunRecord, includeHistory: boolean): JsonObject {
  const history = includeHistory && r.history ? toJsonObject(r.history) : null;
  return {
    ...toRunSummary(r),
    chain_of_custody_id: r.chainOfCustodyId,
    config_file_path: r.configFilePath,
    launch: {
      gradient_method: r.gradientMethod,
      batch_size: r.batchSize,
      learning_rate: r.learningRate,
      beta: r.beta,
      num_gpus: r.numGpus,
      num_objectives: r.numObjectives,
      num_scaffolds: r.numScaffolds,
      gradient_accumulation_steps: r.gradientAccumulationSteps,
      max_steps: r.maxSteps,
      max_grad_norm: r.maxGradNorm,
      mixed_precision: r.mixedPrecision,
      gradient_checkpointing: r.gradientCheckpointing,
      fp16: r.fp16,
      bf16: r.bf16,
      enable_moving_targets: r.enableMovingTargets,
      return_groups: r.returnGroups,
      n_clusters: r.nClusters
    },
    config: r.config,
    final_metrics: r.finalMetrics,
    history,
    conversation_key: r.conversationKey,
    error_log_key: r.errorLogKey,
    crash_report_key: r.crashReportKey,
    updated_at: r.updatedAt
  };
}

function toObjectiveSummary(o: ObjectiveRecord): JsonObject {
  return {
    objective_name: o.objectiveName,
    objective_alias: o.objectiveAlias,
    uniprot: o.uniprot,
    weight: o.weight,
    direction: o.direction,
    raw_mean: o.rawMean,
    normalized_mean: o.normalizedMean,
    raw_std: o.rawStd,
    normalized_std: o.normalizedStd
  };
}

export function toMcpError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (e instanceof NotFoundError || e instanceof DuplicateKeyError || e instanceof MalformedDataError) {
    return new McpError(ErrorCode.InvalidParams, e.message);
  }
  if (e instanceof InvalidTransitionError || e instanceof ExternalLinkConflictError || e instanceof ConfigError) {
    return new McpError(ErrorCode.InvalidRequest, e.message);
  }
  return e;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "run-ledger",
    version: "0.3.0"
  });
  const log = deps.logger.child({ component: "gateway" });

  async function runTool(toolName: string, fn: () => Promise<CallToolResult>): Promise<CallToolResult> {
    try {
      deps.config.assertToolAllowed(toolName);
      return await fn();
    } catch (e) {
      log.warn({ tool: toolName, err: e instanceof Error ? e.message : String(e) }, "tool failed");
      throw toMcpError(e);
    }
  }

  mcp.registerTool(
    "run_get",
    {
      description: "Fetch one run with its objectives (and optionally its history and audit events).",
      inputSchema: zRunGetInput,
      outputSchema: zRunGetOutput
    },
    async (args) =>
      runTool("run_get", async () => {
        const run = await deps.runs.requireRun(args.run_id);
        const objectives = await deps.objectives.listObjectives(run.runId);
        const events = args.include_events ? await deps.runs.listRunEvents(run.runId) : [];
        return {
          content: [{ type: "text", text: `Run ${run.runId} (${run.status})` }],
          structuredContent: {
            run: toRunDetail(run, args.include_history),
            objectives: objectives.map(toObjectiveSummary),
            events: events.map((ev) => ({ ts: ev.ts, kind: ev.kind, message: ev.message, data: ev.data }))
          }
        };
      })
  );

  mcp.registerTool(
    "run_list",
    {
      description: "List runs by status, host, gradient method, duration and attachment filters.",
      inputSchema: zRunListInput,
      outputSchema: zRunListOutput
    },
    async (args) =>
      runTool("run_list", async () => {
        const runs = await deps.runs.listRuns(
          {
            status: args.status,
            host: args.host,
            gradientMethod: args.gradient_method,
            minDurationHours: args.min_duration_hours,
            createdAfter: args.created_after,
            configHash: args.config_hash,
            hasBlogPost: args.has_blog_post,
            hasCrashAnalysis: args.has_crash_analysis,
            hasHistory: args.has_history
          },
          { column: args.order_by, direction: args.direction },
          args.limit
        );
        return {
          content: [{ type: "text", text: `Listed ${runs.length} runs` }],
          structuredContent: { count: runs.length, runs: runs.map(toRunSummary) }
        };
      })
  );

  mcp.registerTool(
    "run_stats",
    {
      description: "Counts of runs overall, per status, and with blog posts, crash analyses or history.",
      inputSchema: zRunStatsInput,
      outputSchema: zRunStatsOutput
    },
    async () =>
      runTool("run_stats", async () => {
        const s = await deps.runs.stats();
        return {
          content: [{ type: "text", text: `${s.total} runs` }],
          structuredContent: {
            total: s.total,
            by_status: s.byStatus,
            with_blog_post: s.withBlogPost,
            with_crash_analysis: s.withCrashAnalysis,
            with_history: s.withHistory,
            environment: envSnapshot(deps.config.configHash, deps.storageMode)
          }
        };
      })
  );

  mcp.registerTool(
    "run_register",
    {
      description: "Register a launched run from its launch config; objectives are read from config.objectives.",
      inputSchema: zRunRegisterInput,
      outputSchema: zRunRegisterOutput
    },
    async (args) =>
      runTool("run_register", async () => {
        const reg = await registerLaunch(
          { runs: deps.runs, objectives: deps.objectives },
          {
            runId: args.run_id,
            externalRunId: args.external_run_id ?? null,
            config: toJsonObject(args.config),
            metadata: {
              displayName: args.display_name ?? null,
              configFilePath: args.config_file_path ?? null,
              host: args.host ?? null,
              infraHostId: args.infra_host_id ?? null,
              chainOfCustodyId: args.chain_of_custody_id ?? null
            }
          }
        );
        return {
          content: [{ type: "text", text: `Registered ${reg.run.runId} with ${reg.objectivesInserted.length} objectives` }],
          structuredContent: {
            run: toRunSummary(reg.run),
            launch_fields_skipped: reg.launchFieldsSkipped,
            objectives_inserted: reg.objectivesInserted,
            objectives_skipped: reg.objectivesSkipped
          }
        };
      })
  );

  mcp.registerTool(
    "run_report_crash",
    {
      description: "Record a crash: marks the run not_running and stores the error log, report and analysis keys.",
      inputSchema: zRunReportCrashInput,
      outputSchema: zRunOutput
    },
    async (args) =>
      runTool("run_report_crash", async () => {
        const run = await deps.runs.attachCrashReport(args.run_id, {
          errorLogKey: args.error_log_key,
          crashReportKey: args.crash_report_key,
          crashAnalysisKey: args.crash_analysis_key
        });
        await deps.runs.addRunEvent(run.runId, "crash.reported", null, { crash_report_key: args.crash_report_key });
        return {
          content: [{ type: "text", text: `Crash recorded for ${run.runId}` }],
          structuredContent: { run: toRunSummary(run) }
        };
      })
  );

  mcp.registerTool(
    "run_attach",
    {
      description: "Attach a blog post URL or a conversation key to a run.",
      inputSchema: zRunAttachInput,
      outputSchema: zRunOutput
    },
    async (args) =>
      runTool("run_attach", async () => {
        const run =
          args.kind === "blog_post"
            ? await deps.runs.attachBlogPost(args.run_id, args.value)
            : await deps.runs.attachConversation(args.run_id, args.value);
        return {
          content: [{ type: "text", text: `Attached ${args.kind} to ${run.runId}` }],
          structuredContent: { run: toRunSummary(run) }
        };
      })
  );

  mcp.registerTool(
    "objectives_query",
    {
      description:
        "Runs satisfying every objective bound at once (bounds apply to raw_mean), plus optional run filters. " +
        "An empty objectives map returns no runs.",
      inputSchema: zObjectivesQueryInput,
      outputSchema: zObjectivesQueryOutput
    },
    async (args) =>
      runTool("objectives_query", async () => {
        const runs = await deps.query.query(
          args.objectives,
          { gradientMethod: args.gradient_method, status: args.status, host: args.host },
          { column: args.order_by, direction: args.direction },
          args.limit
        );
        return {
          content: [{ type: "text", text: `Matched ${runs.length} runs` }],
          structuredContent: { count: runs.length, runs: runs.map(toRunSummary) }
        };
      })
  );

  mcp.registerTool(
    "objective_statistics",
    {
      description: "count/mean/min/max of raw_mean and mean raw_std for one objective over matching runs.",
      inputSchema: zObjectiveStatisticsInput,
      outputSchema: zObjectiveStatisticsOutput
    },
    async (args) =>
      runTool("objective_statistics", async () => {
        const s = await deps.query.statistics(args.objective_name, {
          gradientMethod: args.gradient_method,
          status: args.status
        });
        return {
          content: [{ type: "text", text: `${args.objective_name}: ${s.count} rows` }],
          structuredContent: {
            objective_name: args.objective_name,
            count: s.count,
            mean: s.mean,
            min: s.min,
            max: s.max,
            avg_std: s.avgStd
          }
        };
      })
  );

  mcp.registerTool(
    "objective_compare_groups",
    {
      description: "Per gradient method: count, average, best, worst and mean hours for one objective.",
      inputSchema: zObjectiveCompareGroupsInput,
      outputSchema: zObjectiveCompareGroupsOutput
    },
    async (args) =>
      runTool("objective_compare_groups", async () => {
        const groups = await deps.query.compareGroups(args.objective_name, args.status);
        return {
          content: [{ type: "text", text: `${groups.length} groups for ${args.objective_name}` }],
          structuredContent: {
            objective_name: args.objective_name,
            groups: groups.map((g) => ({
              gradient_method: g.gradientMethod,
              count: g.count,
              avg: g.avg,
              best: g.best,
              worst: g.worst,
              avg_hours: g.avgHours
            }))
          }
        };
      })
  );

  mcp.registerTool(
    "runs_reconcile",
    {
      description: "Run one reconciliation pass against the experiment tracker.",
      inputSchema: zRunsReconcileInput,
      outputSchema: zRunsReconcileOutput
    },
    async (args) =>
      runTool("runs_reconcile", async () => {
        if (!deps.reconciler) throw new McpError(ErrorCode.InvalidRequest, "tracker not configured");
        const s = await deps.reconciler.reconcile({ limit: args.limit, dryRun: args.dry_run });
        return {
          content: [
            {
              type: "text",
              text: `updated=${s.counts.updated} not_found=${s.counts.notFound} marked_stale=${s.counts.markedStale} errored=${s.counts.errored}`
            }
          ],
          structuredContent: {
            invocation_id: s.invocationId,
            dry_run: s.dryRun,
            counts: {
              updated: s.counts.updated,
              not_found: s.counts.notFound,
              marked_stale: s.counts.markedStale,
              errored: s.counts.errored
            },
            results: s.results.map((r) => ({
              run_id: r.runId,
              outcome: r.outcome,
              status: r.status,
              via: r.via,
              external_run_id: r.externalRunId,
              objectives_updated: r.objectivesUpdated,
              reason: r.reason
            }))
          }
        };
      })
  );

  mcp.registerTool(
    "runs_sweep_orphans",
    {
      description: "Mark launched or running runs whose host is gone as not_running.",
      inputSchema: zRunsSweepOrphansInput,
      outputSchema: zRunsSweepOrphansOutput
    },
    async (args) =>
      runTool("runs_sweep_orphans", async () => {
        if (!deps.sweeper) throw new McpError(ErrorCode.InvalidRequest, "host liveness not configured");
        const s = await deps.sweeper.sweep({ limit: args.limit, dryRun: args.dry_run });
        return {
          content: [{ type: "text", text: `checked=${s.counts.checked} marked_dead=${s.counts.markedDead}` }],
          structuredContent: {
            invocation_id: s.invocationId,
            dry_run: s.dryRun,
            counts: {
              checked: s.counts.checked,
              alive: s.counts.alive,
              marked_dead: s.counts.markedDead,
              exempt: s.counts.exempt,
              errored: s.counts.errored
            },
            results: s.results.map((r) => ({
              run_id: r.runId,
              outcome: r.outcome,
              host_id: r.hostId,
              host_state: r.hostState,
              reason: r.reason
            }))
          }
        };
      })
  );

  return mcp;
}
