import { beforeEach, describe, expect, it } from "vitest";
import { DuplicateKeyError } from "../src/core/errors.js";
import { extractLaunchColumns, parseConfigObjectives } from "../src/runs/launchConfig.js";
import { registerLaunch } from "../src/runs/launch.js";
import type { ObjectiveStore } from "../src/store/objectiveStore.js";
import type { RunStore } from "../src/store/runStore.js";
import { TestClock, createStores, createTestDb, launchConfig } from "./helpers.js";

describe("extractLaunchColumns", () => {
  it("copies typed launch parameters and leaves missing ones null", () => {
    const { columns: cols, skipped } = extractLaunchColumns({
      reward: { gradient_method: "grpo", beta: 0, enable_moving_targets: true },
      training: { batch_size: 4, gradient_accumulation_steps: 2, bf16: true },
      distributed: { num_processes: 8 },
      generation: { scaffolds: ["c1ccccc1", "C1CCCCC1", "c1ccncc1"] },
      grouping: { return_groups: false, n_clusters: 5 },
      objectives: []
    });
    expect(cols).toEqual({
      gradientMethod: "grpo",
      batchSize: 4,
      learningRate: null,
      beta: 0,
      numGpus: 8,
      numObjectives: 0,
      numScaffolds: 3,
      gradientAccumulationSteps: 2,
      maxSteps: null,
      maxGradNorm: null,
      mixedPrecision: null,
      gradientCheckpointing: null,
      fp16: null,
      bf16: true,
      enableMovingTargets: true,
      returnGroups: false,
      nClusters: 5
    });
    expect(skipped).toEqual([]);
  });

  it("prefers training.num_processes over distributed.num_processes", () => {
    expect(extractLaunchColumns({ training: { num_processes: 2 }, distributed: { num_processes: 8 } }).columns.numGpus).toBe(2);
  });

  it("reads numeric strings and reports the fields it cannot use", () => {
    const { columns, skipped } = extractLaunchColumns({
      training: { batch_size: 2.5, learning_rate: " 3e-5 ", max_steps: "200" },
      reward: { gradient_method: 3, beta: "" }
    });
    expect(columns.learningRate).toBe(3e-5);
    expect(columns.maxSteps).toBe(200);
    expect(columns.batchSize).toBeNull();
    expect(columns.gradientMethod).toBeNull();
    expect(columns.beta).toBeNull();
    expect(skipped).toEqual([
      { field: "reward.gradient_method", reason: "expected string, got 3" },
      { field: "training.batch_size", reason: "expected integer, got 2.5" },
      { field: "reward.beta", reason: 'expected number, got ""' }
    ]);
  });
});

describe("parseConfigObjectives", () => {
  it("keeps well-formed entries and reports the rest by index", () => {
    const parsed = parseConfigObjectives({
      objectives: [
        { name: "COMT_activity", alias: "COMT_activity_maximize", direction: "maximize", weight: 2 },
        "not-an-object",
        { alias: "nameless" },
        { name: "logP", direction: "sideways" },
        { name: "QED" }
      ]
    });
    expect(parsed.objectives).toEqual([
      {
        index: 0,
        spec: { name: "COMT_activity", alias: "COMT_activity_maximize", uniprot: null, weight: 2, direction: "maximize" }
      },
      { index: 4, spec: { name: "QED", alias: null, uniprot: null, weight: null, direction: null } }
    ]);
    expect(parsed.skipped).toEqual([
      { index: 1, reason: "entry is not an object" },
      { index: 2, reason: "malformed objectives[2].name: missing" },
      { index: 3, reason: "malformed objectives[3].direction: unknown direction sideways" }
    ]);
  });

  it("returns nothing when objectives is absent", () => {
    expect(parseConfigObjectives({})).toEqual({ objectives: [], skipped: [] });
  });
});

describe("registerLaunch", () => {
  let runs: RunStore;
  let objectives: ObjectiveStore;

  beforeEach(async () => {
    const { db } = await createTestDb();
    ({ runs, objectives } = createStores(db, new TestClock("2025-03-01T12:00:00.000Z")));
  });

  it("writes the run and one objective row per configured objective", async () => {
    const reg = await registerLaunch({ runs, objectives }, { runId: "reg_1", config: launchConfig() });
    expect(reg.run.status).toBe("launched");
    expect(reg.objectivesInserted).toEqual(["COMT_activity", "logP"]);
    expect(reg.objectivesSkipped).toEqual([]);
    expect(reg.launchFieldsSkipped).toEqual([]);

    const rows = await objectives.listObjectives("reg_1");
    expect(
      rows.map((o) => [o.objectiveName, o.objectiveAlias, o.uniprot, o.weight, o.direction, o.rawMean])
    ).toEqual([
      ["COMT_activity", "COMT_activity_maximize", "P21964", 1, "maximize", null],
      ["logP", "logP_minimize", null, 0.5, "minimize", null]
    ]);
  });

  it("skips a repeated objective name", async () => {
    const reg = await registerLaunch(
      { runs, objectives },
      { runId: "reg_2", config: launchConfig({ objectives: [{ name: "QED" }, { name: "QED", weight: 3 }] }) }
    );
    expect(reg.objectivesInserted).toEqual(["QED"]);
    expect(reg.objectivesSkipped).toEqual([{ index: 1, reason: "duplicate objective QED" }]);
    expect((await objectives.listObjectives("reg_2"))[0]?.weight).toBeNull();
  });

  it("writes no objectives when the run id already exists", async () => {
    await registerLaunch({ runs, objectives }, { runId: "reg_3", config: launchConfig({ objectives: [] }) });
    await expect(
      registerLaunch({ runs, objectives }, { runId: "reg_3", config: launchConfig() })
    ).rejects.toBeInstanceOf(DuplicateKeyError);
    expect(await objectives.listObjectives("reg_3")).toEqual([]);
  });
});

describe("ObjectiveStore", () => {
  let runs: RunStore;
  let objectives: ObjectiveStore;

  beforeEach(async () => {
    const { db } = await createTestDb();
    ({ runs, objectives } = createStores(db, new TestClock("2025-03-01T12:00:00.000Z")));
    await registerLaunch({ runs, objectives }, { runId: "obj_1", config: launchConfig() });
  });

  it("writes only the metric columns given", async () => {
    expect(await objectives.updateObjectiveMetrics("obj_1", "logP", { raw_mean: 2.5 })).toEqual({ updated: true });
    expect(await objectives.updateObjectiveMetrics("obj_1", "logP", { raw_std: 0.25 })).toEqual({ updated: true });
    const logP = (await objectives.listObjectives("obj_1")).find((o) => o.objectiveName === "logP");
    expect(logP?.rawMean).toBe(2.5);
    expect(logP?.rawStd).toBe(0.25);
    expect(logP?.normalizedMean).toBeNull();
  });

  it("reports no update for empty values or an unknown objective", async () => {
    expect(await objectives.updateObjectiveMetrics("obj_1", "logP", {})).toEqual({ updated: false });
    expect(await objectives.updateObjectiveMetrics("obj_1", "nope", { raw_mean: 1 })).toEqual({ updated: false });
  });

  it("deletes a run's objectives and reports how many", async () => {
    expect(await objectives.deleteObjectives("obj_1")).toBe(2);
    expect(await objectives.deleteObjectives("obj_1")).toBe(0);
  });
});
