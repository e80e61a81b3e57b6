import { beforeEach, describe, expect, it } from "vitest";
import type { HostLivenessProbe, HostState } from "../src/infra/hostLiveness.js";
import { OrphanSweeper } from "../src/reconcile/orphanSweeper.js";
import type { RunStore } from "../src/store/runStore.js";
import { FakeLiveness, TestClock, createStores, createTestDb, launchConfig, silentLogger } from "./helpers.js";

describe("OrphanSweeper", () => {
  let clock: TestClock;
  let runs: RunStore;
  let liveness: FakeLiveness;

  async function launch(runId: string, host: string, infraHostId: string | null): Promise<void> {
    await runs.insertRun({ runId, config: launchConfig(), metadata: { host, infraHostId } });
    clock.advance(60);
  }

  function sweeper(probe: HostLivenessProbe = liveness, callTimeoutMs?: number): OrphanSweeper {
    return new OrphanSweeper(
      { runs, liveness: probe, logger: silentLogger, now: clock.now },
      { exemptHosts: ["expanse"], callTimeoutMs }
    );
  }

  beforeEach(async () => {
    clock = new TestClock("2025-03-01T12:00:00.000Z");
    const { db } = await createTestDb();
    ({ runs } = createStores(db, clock));
    liveness = new FakeLiveness()
      .set("i-alive", { kind: "present", state: "running" })
      .set("i-dead", { kind: "present", state: "terminated" })
      .set("i-gone", { kind: "not_found" })
      .set("i-done", { kind: "present", state: "terminated" });
    liveness.failing.add("i-broken");

    await launch("o_alive", "aws", "i-alive");
    await launch("o_dead", "aws", "i-dead");
    await launch("o_gone", "aws", "i-gone");
    await launch("o_exempt", "expanse", "job-123");
    await launch("o_nohost", "aws", null);
    await launch("o_broken", "aws", "i-broken");
    await launch("o_done", "aws", "i-done");
    await runs.updateStatus("o_dead", "running");
    await runs.updateStatus("o_done", "not_running", { terminalState: "finished" });
  });

  it("marks runs on dead hosts not_running and leaves the rest", async () => {
    const summary = await sweeper().sweep();

    expect(summary.dryRun).toBe(false);
    expect(summary.counts).toEqual({ checked: 4, alive: 1, markedDead: 2, exempt: 1, errored: 1 });
    expect(summary.results).toEqual([
      { runId: "o_broken", hostId: "i-broken", outcome: "errored", hostState: null, reason: "probe failed for i-broken" },
      { runId: "o_exempt", hostId: "job-123", outcome: "exempt", hostState: null, reason: "host expanse is exempt" },
      { runId: "o_gone", hostId: "i-gone", outcome: "marked_dead", hostState: "not_found", reason: "host not_found" },
      { runId: "o_dead", hostId: "i-dead", outcome: "marked_dead", hostState: "terminated", reason: "host terminated" },
      { runId: "o_alive", hostId: "i-alive", outcome: "alive", hostState: "running", reason: null }
    ]);
    expect(liveness.calls).toEqual(["i-broken", "i-gone", "i-dead", "i-alive"]);

    const dead = await runs.requireRun("o_dead");
    expect(dead.status).toBe("not_running");
    expect(dead.terminalState).toBe("host_terminated");
    expect(dead.endedAt).toBe("2025-03-01T12:07:00.000Z");
    expect((await runs.requireRun("o_gone")).terminalState).toBe("host_not_found");
    expect((await runs.requireRun("o_alive")).status).toBe("launched");
    expect((await runs.requireRun("o_broken")).status).toBe("launched");
    expect((await runs.requireRun("o_done")).terminalState).toBe("finished");

    const events = await runs.listRunEvents("o_dead");
    expect(events.map((e) => [e.kind, e.message, e.data])).toEqual([
      [
        "host.dead",
        "host i-dead is terminated",
        { source: "sweep", from: "running", host_id: "i-dead", terminal_state: "host_terminated" }
      ]
    ]);
    expect((await runs.listRunEvents("o_broken")).map((e) => [e.kind, e.message])).toEqual([
      ["host.check_failed", "probe failed for i-broken"]
    ]);
  });

  it("does not revisit runs it already closed", async () => {
    await sweeper().sweep();
    const again = await sweeper().sweep();
    expect(again.results.map((r) => r.runId)).toEqual(["o_broken", "o_exempt", "o_alive"]);
  });

  it("writes nothing under dry run", async () => {
    const summary = await sweeper().sweep({ dryRun: true });
    expect(summary.counts.markedDead).toBe(2);
    expect((await runs.requireRun("o_dead")).status).toBe("running");
    expect((await runs.requireRun("o_gone")).status).toBe("launched");
    expect(await runs.listRunEvents("o_dead")).toEqual([]);
  });

  it("honors the per-invocation limit", async () => {
    const summary = await sweeper().sweep({ limit: 2 });
    expect(summary.results.map((r) => r.runId)).toEqual(["o_broken", "o_exempt"]);
  });

  it("treats a probe that never answers as an error for that run only", async () => {
    const stuck: HostLivenessProbe = {
      describeHost: (hostId: string): Promise<HostState> =>
        hostId === "i-alive" ? new Promise<HostState>(() => undefined) : liveness.describeHost(hostId)
    };
    const summary = await sweeper(stuck, 20).sweep();
    const alive = summary.results.find((r) => r.runId === "o_alive");
    expect(alive?.outcome).toBe("errored");
    expect(alive?.reason).toBe("infrastructure: describe i-alive timed out after 20ms");
    expect(summary.counts.markedDead).toBe(2);
  });

  it("reports exempt and host-less runs as having nothing to check", async () => {
    const s = sweeper();
    expect(await s.checkHost(await runs.requireRun("o_exempt"))).toBeNull();
    expect(await s.checkHost(await runs.requireRun("o_nohost"))).toBeNull();
    expect(await s.checkHost(await runs.requireRun("o_gone"))).toEqual({ kind: "not_found" });
  });
});
