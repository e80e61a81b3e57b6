import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ListToolsResultSchema } from "@modelcontextprotocol/sdk/types.js";

import { AppConfig } from "../src/config/appConfig.js";
import { configHash } from "../src/core/canonicalJson.js";
import { createGatewayServer, type GatewayDeps } from "../src/mcp/gatewayServer.js";
import {
  zObjectiveCompareGroupsOutput,
  zObjectiveStatisticsOutput,
  zObjectivesQueryOutput,
  zRunGetOutput,
  zRunListOutput,
  zRunOutput,
  zRunRegisterOutput,
  zRunStatsOutput,
  zRunsReconcileOutput,
  zRunsSweepOrphansOutput
} from "../src/mcp/toolSchemas.js";
import { buildServices, type Services } from "../src/services.js";
import { FakeLiveness, FakeTracker, TestClock, createTestDb, launchConfig, silentLogger, trackerRecord } from "./helpers.js";

function rawConfig(toolAllowlist: string[] | null): Record<string, unknown> {
  return {
    version: 1,
    tracker: { entity: "ent", project: "proj", base_url: "https://api.wandb.test", api_key: "test-secret" },
    reconcile: {},
    liveness: { region: "us-east-2", exempt_hosts: ["expanse"] },
    tool_allowlist: toolAllowlist
  };
}

describe.sequential("gateway (in-memory)", () => {
  let clock: TestClock;
  let config: AppConfig;
  let services: Services;
  let tracker: FakeTracker;
  let liveness: FakeLiveness;
  let client: Client;
  let transports: InMemoryTransport[] = [];

  async function connect(overrides: Partial<GatewayDeps> = {}): Promise<Client> {
    const server = createGatewayServer({
      config,
      logger: silentLogger,
      storageMode: "pg-mem",
      ...services,
      ...overrides
    });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    transports.push(clientTransport, serverTransport);
    await server.connect(serverTransport);
    const c = new Client({ name: "run-ledger-test-client", version: "0.0.0" });
    await c.connect(clientTransport);
    return c;
  }

  async function callTool(name: string, args: Record<string, unknown>, on: Client = client) {
    return on.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
  }

  async function callOk(name: string, args: Record<string, unknown>): Promise<unknown> {
    const res = await callTool(name, args);
    if (res.isError) {
      throw new Error(`${name} failed: ${res.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n")}`);
    }
    return res.structuredContent;
  }

  // tool failures reach the client either as an error result or as a rejected request
  async function toolError(name: string, args: Record<string, unknown>, on: Client = client): Promise<string> {
    let res: Awaited<ReturnType<typeof callTool>>;
    try {
      res = await callTool(name, args, on);
    } catch (e) {
      return e instanceof Error ? e.message : String(e);
    }
    expect(res.isError).toBe(true);
    return res.content.map((c) => (c.type === "text" ? c.text : "")).join("\n");
  }

  beforeEach(async () => {
    clock = new TestClock("2025-03-01T12:00:00.000Z");
    const { db } = await createTestDb();
    config = AppConfig.parse(rawConfig(null), "test", {});
    tracker = new FakeTracker();
    liveness = new FakeLiveness();
    services = buildServices({ db, config, logger: silentLogger, tracker, liveness, now: clock.now });
    client = await connect();
  });

  afterEach(async () => {
    for (const t of transports) await t.close();
    transports = [];
  });

  it("lists the run ledger tools", async () => {
    const result = await client.request({ method: "tools/list", params: {} }, ListToolsResultSchema);
    expect(result.tools.map((t) => t.name).sort()).toEqual([
      "objective_compare_groups",
      "objective_statistics",
      "objectives_query",
      "run_attach",
      "run_get",
      "run_list",
      "run_register",
      "run_report_crash",
      "run_stats",
      "runs_reconcile",
      "runs_sweep_orphans"
    ]);
  });

  it("registers a run and reads it back", async () => {
    const config1 = launchConfig();
    const reg = zRunRegisterOutput.parse(
      await callOk("run_register", {
        run_id: "gw_1_i-1",
        display_name: "gw-display",
        host: "aws",
        infra_host_id: "i-1",
        config: config1
      })
    );
    expect(reg.run.status).toBe("launched");
    expect(reg.run.config_hash).toBe(configHash(config1));
    expect(reg.objectives_inserted).toEqual(["COMT_activity", "logP"]);
    expect(reg.objectives_skipped).toEqual([]);
    expect(reg.launch_fields_skipped).toEqual([]);

    const got = zRunGetOutput.parse(await callOk("run_get", { run_id: "gw_1_i-1", include_events: true }));
    expect(got.run.display_name).toBe("gw-display");
    expect(got.run.launch["batch_size"]).toBe(8);
    expect(got.run.config).toEqual(config1);
    expect(got.run.history).toBeNull();
    expect(got.objectives.map((o) => [o.objective_name, o.direction, o.raw_mean])).toEqual([
      ["COMT_activity", "maximize", null],
      ["logP", "minimize", null]
    ]);
    expect(got.events).toEqual([]);

    const listed = zRunListOutput.parse(await callOk("run_list", { status: "launched", host: "aws" }));
    expect(listed.runs.map((r) => r.run_id)).toEqual(["gw_1_i-1"]);

    const stats = zRunStatsOutput.parse(await callOk("run_stats", {}));
    expect(stats.total).toBe(1);
    expect(stats.by_status).toEqual({ launched: 1, running: 0, not_running: 0 });
    expect(stats.environment["config_hash"]).toBe(config.configHash);
    expect(stats.environment["mode"]).toBe("pg-mem");
  });

  it("maps store errors to tool errors", async () => {
    await callOk("run_register", { run_id: "gw_dup", config: launchConfig() });
    expect(await toolError("run_register", { run_id: "gw_dup", config: launchConfig() })).toContain(
      "run already exists: gw_dup"
    );
    expect(await toolError("run_get", { run_id: "nope" })).toContain("run not found: nope");
  });

  it("registers a run whose launch fields cannot all be read", async () => {
    const reg = zRunRegisterOutput.parse(
      await callOk("run_register", { run_id: "gw_loose", config: { training: { batch_size: "x", learning_rate: "1e-4" } } })
    );
    expect(reg.run.status).toBe("launched");
    expect(reg.launch_fields_skipped).toEqual([{ field: "training.batch_size", reason: 'expected integer, got "x"' }]);

    const got = zRunGetOutput.parse(await callOk("run_get", { run_id: "gw_loose" }));
    expect(got.run.launch["batch_size"]).toBeNull();
    expect(got.run.launch["learning_rate"]).toBe(0.0001);
  });

  it("records crashes and attachments", async () => {
    await callOk("run_register", { run_id: "gw_crash", config: launchConfig() });
    const crashed = zRunOutput.parse(
      await callOk("run_report_crash", {
        run_id: "gw_crash",
        error_log_key: "logs/gw_crash.err",
        crash_report_key: "reports/gw_crash.json",
        crash_analysis_key: "analysis/gw_crash.md"
      })
    );
    expect(crashed.run.status).toBe("not_running");
    expect(crashed.run.terminal_state).toBe("crashed");
    expect(crashed.run.crash_analysis_key).toBe("analysis/gw_crash.md");

    const attached = zRunOutput.parse(
      await callOk("run_attach", { run_id: "gw_crash", kind: "blog_post", value: "https://blog.test/gw" })
    );
    expect(attached.run.blog_post_url).toBe("https://blog.test/gw");

    const got = zRunGetOutput.parse(await callOk("run_get", { run_id: "gw_crash", include_events: true }));
    expect(got.events.map((e) => [e.kind, e.data])).toEqual([
      ["crash.reported", { crash_report_key: "reports/gw_crash.json" }]
    ]);
    expect(got.run.error_log_key).toBe("logs/gw_crash.err");
  });

  it("reconciles against the tracker and answers objective queries", async () => {
    await callOk("run_register", { run_id: "gw_2", external_run_id: "t2", config: launchConfig() });
    tracker.add(
      trackerRecord({ id: "t2", state: "finished", summary: { _runtime: 3600, "objectives/logP/raw_mean": 2.5 } })
    );

    const rec = zRunsReconcileOutput.parse(await callOk("runs_reconcile", {}));
    expect(rec.dry_run).toBe(false);
    expect(rec.counts).toEqual({ updated: 1, not_found: 0, marked_stale: 0, errored: 0 });
    expect(rec.results).toEqual([
      {
        run_id: "gw_2",
        outcome: "updated",
        status: "not_running",
        via: "external_id",
        external_run_id: "t2",
        objectives_updated: 1,
        reason: null
      }
    ]);

    const matched = zObjectivesQueryOutput.parse(await callOk("objectives_query", { objectives: { logP: { min: 2 } } }));
    expect(matched.runs.map((r) => r.run_id)).toEqual(["gw_2"]);
    const none = zObjectivesQueryOutput.parse(await callOk("objectives_query", { objectives: {} }));
    expect(none.count).toBe(0);

    const stats = zObjectiveStatisticsOutput.parse(await callOk("objective_statistics", { objective_name: "logP" }));
    expect(stats).toEqual({ objective_name: "logP", count: 1, mean: 2.5, min: 2.5, max: 2.5, avg_std: null });

    const groups = zObjectiveCompareGroupsOutput.parse(
      await callOk("objective_compare_groups", { objective_name: "logP" })
    );
    expect(groups.groups).toEqual([
      { gradient_method: "grpo", count: 1, avg: 2.5, best: 2.5, worst: 2.5, avg_hours: 1 }
    ]);
  });

  it("sweeps runs whose host is gone", async () => {
    liveness.set("i-gone", { kind: "not_found" });
    await callOk("run_register", { run_id: "gw_3", host: "aws", infra_host_id: "i-gone", config: launchConfig() });

    const sweep = zRunsSweepOrphansOutput.parse(await callOk("runs_sweep_orphans", {}));
    expect(sweep.counts).toEqual({ checked: 1, alive: 0, marked_dead: 1, exempt: 0, errored: 0 });
    expect(sweep.results).toEqual([
      { run_id: "gw_3", outcome: "marked_dead", host_id: "i-gone", host_state: "not_found", reason: "host not_found" }
    ]);
  });

  it("refuses reconciliation when no tracker is configured", async () => {
    const bare = await connect({ reconciler: null });
    expect(await toolError("runs_reconcile", {}, bare)).toContain("tracker not configured");
  });

  it("refuses tools outside the configured allowlist", async () => {
    config = AppConfig.parse(rawConfig(["run_get"]), "test", {});
    const limited = await connect({ config });
    expect(await toolError("run_list", {}, limited)).toContain("config denied tool: run_list");
    expect(await toolError("run_get", { run_id: "nope" }, limited)).toContain("run not found: nope");
  });
});
