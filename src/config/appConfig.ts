import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { ConfigError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { isJsonObject } from "../core/json.js";

const TrackerSchema = z.object({
  entity: z.string().min(1).nullable(),
  project: z.string().min(1).nullable(),
  base_url: z.string().url(),
  app_url: z.string().url().default("https://wandb.ai"),
  api_key: z.string().min(1).nullable(),
  timeout_ms: z.number().int().positive().default(30000),
  history_page_size: z.number().int().positive().default(1000),
  list_page_size: z.number().int().positive().default(100)
});

const ReconcileSchema = z.object({
  stale_after_seconds: z.number().int().positive().default(7200),
  match_window_seconds: z.number().int().positive().default(1800),
  call_timeout_ms: z.number().int().positive().default(60000),
  max_runs_per_invocation: z.number().int().positive().default(200),
  use_identity_matcher: z.boolean().default(true)
});

const LivenessSchema = z.object({
  region: z.string().min(1),
  exempt_hosts: z.array(z.string()).default([])
});

const AppConfigSchema = z.object({
  version: z.literal(1),
  tracker: TrackerSchema,
  reconcile: ReconcileSchema,
  liveness: LivenessSchema,
  tool_allowlist: z.array(z.string()).nullable().default(null)
});

export type AppConfigData = z.infer<typeof AppConfigSchema>;
export type TrackerSettings = AppConfigData["tracker"];
export type ReconcileSettings = AppConfigData["reconcile"];
export type LivenessSettings = AppConfigData["liveness"];

export interface ResolvedTrackerSettings extends TrackerSettings {
  entity: string;
  project: string;
  api_key: string;
}

/** `${VAR}` or `$VAR` resolves from the environment; unset or blank becomes null. */
export function expandEnvToken(value: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = env[varName]?.trim();
  return v ? v : null;
}

function expandEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") return expandEnvToken(value, env);
  if (Array.isArray(value)) return value.map((v) => expandEnv(v, env));
  if (value && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, expandEnv(v, env)]));
  }
  return value;
}

export class AppConfig {
  readonly configHash: `sha256:${string}`;

  constructor(private readonly data: AppConfigData) {
    this.configHash = sha256Prefixed(stableJsonStringify(this.snapshot()));
  }

  static parse(raw: unknown, source: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = AppConfigSchema.safeParse(expandEnv(raw, env));
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? issue.path.map((p) => String(p)).join(".") || "(root)" : "(root)";
      throw new ConfigError(`invalid config at ${source}: ${where}: ${issue?.message ?? "unknown issue"}`);
    }
    return new AppConfig(result.data);
  }

  static async loadFromFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (e) {
      throw new ConfigError(`cannot read config at ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return AppConfig.parse(YAML.parse(raw) as unknown, filePath, env);
  }

  get tracker(): TrackerSettings {
    return this.data.tracker;
  }

  get reconcile(): ReconcileSettings {
    return this.data.reconcile;
  }

  get liveness(): LivenessSettings {
    return this.data.liveness;
  }

  /** Tracker settings with credentials present, or ConfigError naming what is missing. */
  requireTracker(): ResolvedTrackerSettings {
    const t = this.data.tracker;
    const missing = (["entity", "project", "api_key"] as const).filter((k) => t[k] === null);
    if (t.entity === null || t.project === null || t.api_key === null) {
      throw new ConfigError(`tracker not configured: missing ${missing.map((k) => `tracker.${k}`).join(", ")}`);
    }
    return { ...t, entity: t.entity, project: t.project, api_key: t.api_key };
  }

  /** The config without secrets, for logs and tool output. */
  snapshot(): JsonObject {
    const copy: unknown = JSON.parse(JSON.stringify({ ...this.data, tracker: { ...this.data.tracker, api_key: null } }));
    return isJsonObject(copy) ? copy : {};
  }

  isToolAllowed(toolName: string): boolean {
    return this.data.tool_allowlist === null || this.data.tool_allowlist.includes(toolName);
  }

  assertToolAllowed(toolName: string): void {
    if (!this.isToolAllowed(toolName)) {
      throw new McpError(ErrorCode.InvalidRequest, `config denied tool: ${toolName}`);
    }
  }
}
