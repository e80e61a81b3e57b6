import type { ColumnType, Generated, JSONColumnType } from "kysely";
import type { JsonObject } from "../core/json.js";
import type { HistorySeries } from "../core/run.js";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
// pg hands back Date for timestamptz; we write ISO strings
type Timestamp = ColumnType<Date | string, string, string>;
type TimestampNullable = ColumnType<Date | string | null, string | null | undefined, string | null>;
type GeneratedTimestamp = ColumnType<Date | string, string | undefined, string>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;
type HistoryNullable = JSONColumnType<HistorySeries | null, HistorySeries | null | undefined, HistorySeries | null>;

export interface RunsTable {
  run_id: string;
  external_run_id: OptionalNullable<string>;
  display_name: OptionalNullable<string>;
  status: string;
  terminal_state: OptionalNullable<string>;

  chain_of_custody_id: OptionalNullable<string>;
  config_file_path: OptionalNullable<string>;
  config_hash: string;
  host: OptionalNullable<string>;
  infra_host_id: OptionalNullable<string>;

  created_at: Timestamp;
  started_at: TimestampNullable;
  ended_at: TimestampNullable;
  duration_seconds: OptionalNullable<number>;

  gradient_method: OptionalNullable<string>;
  batch_size: OptionalNullable<number>;
  learning_rate: OptionalNullable<number>;
  beta: OptionalNullable<number>;
  num_gpus: OptionalNullable<number>;
  num_objectives: OptionalNullable<number>;
  num_scaffolds: OptionalNullable<number>;
  gradient_accumulation_steps: OptionalNullable<number>;
  max_steps: OptionalNullable<number>;
  max_grad_norm: OptionalNullable<number>;
  mixed_precision: OptionalNullable<boolean>;
  gradient_checkpointing: OptionalNullable<boolean>;
  fp16: OptionalNullable<boolean>;
  bf16: OptionalNullable<boolean>;
  enable_moving_targets: OptionalNullable<boolean>;
  return_groups: OptionalNullable<boolean>;
  n_clusters: OptionalNullable<number>;

  config_json: Json;
  final_metrics_json: JsonNullable;
  history_json: HistoryNullable;
  tracker_url: OptionalNullable<string>;

  conversation_key: OptionalNullable<string>;
  error_log_key: OptionalNullable<string>;
  crash_report_key: OptionalNullable<string>;
  crash_analysis_key: OptionalNullable<string>;
  blog_post_url: OptionalNullable<string>;

  updated_at: GeneratedTimestamp;
}

export interface ObjectivesTable {
  id: Generated<number>;
  run_id: string;
  objective_name: string;
  objective_alias: OptionalNullable<string>;
  uniprot: OptionalNullable<string>;
  weight: OptionalNullable<number>;
  direction: OptionalNullable<string>;
  raw_mean: OptionalNullable<number>;
  normalized_mean: OptionalNullable<number>;
  raw_std: OptionalNullable<number>;
  normalized_std: OptionalNullable<number>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface RunEventsTable {
  event_id: Generated<number>;
  run_id: string;
  ts: GeneratedTimestamp;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  runs: RunsTable;
  objectives: ObjectivesTable;
  run_events: RunEventsTable;
}
