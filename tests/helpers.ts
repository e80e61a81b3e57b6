import path from "path";
import type { Kysely } from "kysely";
import pino from "pino";
import type * as pg from "pg";
import { createDb, createMemPool } from "../src/db/connection.js";
import { applySqlFile } from "../src/db/bootstrap.js";
import type { DB } from "../src/db/types.js";
import type { JsonObject } from "../src/core/json.js";
import type { HostLivenessProbe, HostState } from "../src/infra/hostLiveness.js";
import { ObjectiveStore } from "../src/store/objectiveStore.js";
import { RunStore } from "../src/store/runStore.js";
import type { ExperimentTracker, TrackerRecord } from "../src/tracker/types.js";

export const silentLogger = pino({ level: "silent" });

export interface TestDb {
  pool: pg.Pool;
  db: Kysely<DB>;
}

export async function createTestDb(): Promise<TestDb> {
  const pool = createMemPool();
  await applySqlFile(pool, path.resolve("db/schema.sql"));
  return { pool, db: createDb(pool) };
}

export class TestClock {
  private ms: number;

  constructor(iso: string) {
    this.ms = Date.parse(iso);
  }

  readonly now = (): Date => new Date(this.ms);

  set(iso: string): void {
    this.ms = Date.parse(iso);
  }

  advance(seconds: number): void {
    this.ms += seconds * 1000;
  }
}

export function createStores(db: Kysely<DB>, clock: TestClock): { runs: RunStore; objectives: ObjectiveStore } {
  return {
    runs: new RunStore(db, { now: clock.now }),
    objectives: new ObjectiveStore(db, { now: clock.now })
  };
}

export function trackerRecord(partial: Partial<TrackerRecord> & { id: string }): TrackerRecord {
  return {
    name: partial.id,
    url: `https://tracker.test/runs/${partial.id}`,
    createdAt: "2025-03-01T12:05:00Z",
    state: "running",
    summary: {},
    ...partial
  };
}

/** In-memory tracker. Ids in `failing` reject; ids in `hanging` never settle. */
export class FakeTracker implements ExperimentTracker {
  readonly records: TrackerRecord[] = [];
  readonly histories = new Map<string, JsonObject[]>();
  readonly failing = new Set<string>();
  readonly hanging = new Set<string>();
  readonly calls: string[] = [];
  /** Runs before history is returned, to stand in for a concurrent writer. */
  beforeHistory: ((id: string) => Promise<void>) | null = null;

  add(record: TrackerRecord, history: JsonObject[] = []): this {
    this.records.push(record);
    this.histories.set(record.id, history);
    return this;
  }

  async getById(id: string): Promise<TrackerRecord | null> {
    this.calls.push(`getById:${id}`);
    await this.gate(id);
    return this.records.find((r) => r.id === id) ?? null;
  }

  async searchByName(name: string): Promise<TrackerRecord[]> {
    this.calls.push(`searchByName:${name}`);
    await this.gate(name);
    return this.records.filter((r) => r.name === name);
  }

  async listAll(): Promise<TrackerRecord[]> {
    this.calls.push("listAll");
    return [...this.records];
  }

  async scanHistory(id: string): Promise<JsonObject[]> {
    this.calls.push(`scanHistory:${id}`);
    if (this.beforeHistory) await this.beforeHistory(id);
    return this.histories.get(id) ?? [];
  }

  private gate(key: string): Promise<void> {
    if (this.hanging.has(key)) return new Promise<void>(() => undefined);
    if (this.failing.has(key)) return Promise.reject(new Error(`tracker exploded on ${key}`));
    return Promise.resolve();
  }
}

export class FakeLiveness implements HostLivenessProbe {
  readonly states = new Map<string, HostState>();
  readonly failing = new Set<string>();
  readonly calls: string[] = [];

  set(hostId: string, state: HostState): this {
    this.states.set(hostId, state);
    return this;
  }

  async describeHost(hostId: string): Promise<HostState> {
    this.calls.push(hostId);
    if (this.failing.has(hostId)) throw new Error(`probe failed for ${hostId}`);
    return this.states.get(hostId) ?? { kind: "present", state: "running" };
  }
}

export function launchConfig(overrides: {
  gradientMethod?: string;
  objectives?: JsonObject[];
  batchSize?: number;
} = {}): JsonObject {
  return {
    reward: { gradient_method: overrides.gradientMethod ?? "grpo", beta: 0.04 },
    training: { batch_size: overrides.batchSize ?? 8, learning_rate: 0.0001, max_steps: 500 },
    objectives: overrides.objectives ?? [
      { name: "COMT_activity", alias: "COMT_activity_maximize", direction: "maximize", weight: 1, uniprot: "P21964" },
      { name: "logP", alias: "logP_minimize", direction: "minimize", weight: 0.5 }
    ]
  };
}
