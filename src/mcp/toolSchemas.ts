import * as z from "zod/v4";

export const zRunId = z.string().min(1).max(512);
export const zRunStatus = z.enum(["launched", "running", "not_running"]);
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);
export const zOrderColumn = z.enum(["created_at", "started_at", "duration_seconds", "run_id"]);
export const zDirection = z.enum(["asc", "desc"]);
const zJsonObject = z.record(z.string(), z.unknown());

export const zRunSummary = z.object({
  run_id: zRunId,
  external_run_id: z.string().nullable(),
  display_name: z.string().nullable(),
  status: zRunStatus,
  terminal_state: z.string().nullable(),
  host: z.string().nullable(),
  infra_host_id: z.string().nullable(),
  gradient_method: z.string().nullable(),
  config_hash: zSha256,
  created_at: z.string(),
  started_at: z.string().nullable(),
  ended_at: z.string().nullable(),
  duration_seconds: z.number().nullable(),
  tracker_url: z.string().nullable(),
  blog_post_url: z.string().nullable(),
  crash_analysis_key: z.string().nullable()
});

export const zRunDetail = zRunSummary.extend({
  chain_of_custody_id: z.string().nullable(),
  config_file_path: z.string().nullable(),
  launch: zJsonObject,
  config: zJsonObject,
  final_metrics: zJsonObject.nullable(),
  history: z.record(z.string(), z.array(z.unknown())).nullable(),
  conversation_key: z.string().nullable(),
  error_log_key: z.string().nullable(),
  crash_report_key: z.string().nullable(),
  updated_at: z.string()
});

export const zObjectiveSummary = z.object({
  objective_name: z.string(),
  objective_alias: z.string().nullable(),
  uniprot: z.string().nullable(),
  weight: z.number().nullable(),
  direction: z.enum(["maximize", "minimize"]).nullable(),
  raw_mean: z.number().nullable(),
  normalized_mean: z.number().nullable(),
  raw_std: z.number().nullable(),
  normalized_std: z.number().nullable()
});

export const zRunEvent = z.object({
  ts: z.string(),
  kind: z.string(),
  message: z.string().nullable(),
  data: zJsonObject.nullable()
});

export const zRunGetInput = z.object({
  run_id: zRunId,
  include_history: z.boolean().default(false),
  include_events: z.boolean().default(false)
});

export const zRunGetOutput = z.object({
  run: zRunDetail,
  objectives: z.array(zObjectiveSummary),
  events: z.array(zRunEvent)
});

export const zRunListInput = z.object({
  status: z.union([zRunStatus, z.array(zRunStatus)]).optional(),
  host: z.string().min(1).optional(),
  gradient_method: z.string().min(1).optional(),
  min_duration_hours: z.number().min(0).optional(),
  created_after: z.string().optional(),
  config_hash: zSha256.optional(),
  has_blog_post: z.boolean().optional(),
  has_crash_analysis: z.boolean().optional(),
  has_history: z.boolean().optional(),
  order_by: zOrderColumn.default("created_at"),
  direction: zDirection.default("desc"),
  limit: z.number().int().min(1).max(1000).default(100)
});

export const zRunListOutput = z.object({
  count: z.number().int(),
  runs: z.array(zRunSummary)
});

export const zRunStatsInput = z.object({});

export const zRunStatsOutput = z.object({
  total: z.number().int(),
  by_status: z.object({ launched: z.number().int(), running: z.number().int(), not_running: z.number().int() }),
  with_blog_post: z.number().int(),
  with_crash_analysis: z.number().int(),
  with_history: z.number().int(),
  environment: zJsonObject
});

export const zRunRegisterInput = z.object({
  run_id: zRunId,
  external_run_id: z.string().min(1).optional(),
  display_name: z.string().min(1).optional(),
  config_file_path: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  infra_host_id: z.string().min(1).optional(),
  chain_of_custody_id: z.string().min(1).optional(),
  config: zJsonObject
});

export const zRunRegisterOutput = z.object({
  run: zRunSummary,
  launch_fields_skipped: z.array(z.object({ field: z.string(), reason: z.string() })),
  objectives_inserted: z.array(z.string()),
  objectives_skipped: z.array(z.object({ index: z.number().int(), reason: z.string() }))
});

export const zRunReportCrashInput = z.object({
  run_id: zRunId,
  error_log_key: z.string().min(1),
  crash_report_key: z.string().min(1),
  crash_analysis_key: z.string().min(1)
});

export const zRunAttachInput = z.object({
  run_id: zRunId,
  kind: z.enum(["blog_post", "conversation"]),
  value: z.string().min(1)
});

export const zRunOutput = z.object({
  run: zRunSummary
});

const zBounds = z.object({ min: z.number().optional(), max: z.number().optional() });

export const zObjectivesQueryInput = z.object({
  objectives: z.record(z.string().min(1), zBounds),
  gradient_method: z.string().min(1).optional(),
  status: zRunStatus.optional(),
  host: z.string().min(1).optional(),
  order_by: zOrderColumn.default("created_at"),
  direction: zDirection.default("desc"),
  limit: z.number().int().min(1).max(1000).default(100)
});

export const zObjectivesQueryOutput = zRunListOutput;

export const zObjectiveStatisticsInput = z.object({
  objective_name: z.string().min(1),
  gradient_method: z.string().min(1).optional(),
  status: zRunStatus.default("not_running")
});

export const zObjectiveStatisticsOutput = z.object({
  objective_name: z.string(),
  count: z.number().int(),
  mean: z.number().nullable(),
  min: z.number().nullable(),
  max: z.number().nullable(),
  avg_std: z.number().nullable()
});

export const zObjectiveCompareGroupsInput = z.object({
  objective_name: z.string().min(1),
  status: zRunStatus.default("not_running")
});

export const zObjectiveCompareGroupsOutput = z.object({
  objective_name: z.string(),
  groups: z.array(
    z.object({
      gradient_method: z.string(),
      count: z.number().int(),
      avg: z.number().nullable(),
      best: z.number().nullable(),
      worst: z.number().nullable(),
      avg_hours: z.number().nullable()
    })
  )
});

export const zRunsReconcileInput = z.object({
  limit: z.number().int().min(1).max(5000).optional(),
  dry_run: z.boolean().default(false)
});

export const zRunsReconcileOutput = z.object({
  invocation_id: z.string(),
  dry_run: z.boolean(),
  counts: z.object({
    updated: z.number().int(),
    not_found: z.number().int(),
    marked_stale: z.number().int(),
    errored: z.number().int()
  }),
  results: z.array(
    z.object({
      run_id: zRunId,
      outcome: z.enum(["updated", "not_found", "marked_stale", "errored"]),
      status: zRunStatus,
      via: z.enum(["external_id", "display_name", "matcher"]).nullable(),
      external_run_id: z.string().nullable(),
      objectives_updated: z.number().int(),
      reason: z.string().nullable()
    })
  )
});

export const zRunsSweepOrphansInput = z.object({
  limit: z.number().int().min(1).max(5000).optional(),
  dry_run: z.boolean().default(false)
});

export const zRunsSweepOrphansOutput = z.object({
  invocation_id: z.string(),
  dry_run: z.boolean(),
  counts: z.object({
    checked: z.number().int(),
    alive: z.number().int(),
    marked_dead: z.number().int(),
    exempt: z.number().int(),
    errored: z.number().int()
  }),
  results: z.array(
    z.object({
      run_id: zRunId,
      outcome: z.enum(["alive", "marked_dead", "exempt", "errored"]),
      host_id: z.string().nullable(),
      host_state: z.string().nullable(),
      reason: z.string().nullable()
    })
  )
});
