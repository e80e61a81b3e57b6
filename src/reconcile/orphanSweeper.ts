import { errorMessage } from "../core/errors.js";
import { newInvocationId, type InvocationId, type RunId } from "../core/ids.js";
import type { Logger } from "../core/logger.js";
import type { RunRecord } from "../core/run.js";
import { withTimeout } from "../core/timeout.js";
import { hostTerminalState, isHostDead, type HostLivenessProbe, type HostState } from "../infra/hostLiveness.js";
import type { RunStore } from "../store/runStore.js";

export interface OrphanSweeperDeps {
  runs: RunStore;
  liveness: HostLivenessProbe;
  logger: Logger;
  now?: () => Date;
}

export interface OrphanSweeperOptions {
  /** Runs on these hosts carry ids the probe cannot resolve. */
  exemptHosts?: readonly string[];
  callTimeoutMs?: number;
  maxRunsPerInvocation?: number;
}

export type SweepOutcome = "alive" | "marked_dead" | "exempt" | "errored";

export interface SweepResult {
  runId: RunId;
  outcome: SweepOutcome;
  hostId: string | null;
  hostState: string | null;
  reason: string | null;
}

export interface SweepSummary {
  invocationId: InvocationId;
  dryRun: boolean;
  counts: { checked: number; alive: number; markedDead: number; exempt: number; errored: number };
  results: SweepResult[];
}

function describeState(state: HostState): string {
  return state.kind === "not_found" ? "not_found" : state.state;
}

/**
 * Infrastructure fallback: a launched or running run whose host is gone is marked
 * not_running regardless of what the tracker knows.
 */
export class OrphanSweeper {
  private readonly now: () => Date;
  private readonly exemptHosts: ReadonlySet<string>;
  private readonly callTimeoutMs: number;
  private readonly maxRuns: number;

  constructor(
    private readonly deps: OrphanSweeperDeps,
    options: OrphanSweeperOptions = {}
  ) {
    this.now = deps.now ?? (() => new Date());
    this.exemptHosts = new Set(options.exemptHosts ?? []);
    this.callTimeoutMs = options.callTimeoutMs ?? 60_000;
    this.maxRuns = options.maxRunsPerInvocation ?? 200;
  }

  isExempt(run: RunRecord): boolean {
    return run.infraHostId === null || (run.host !== null && this.exemptHosts.has(run.host));
  }

  /** Null when the run has no probe-able host. */
  async checkHost(run: RunRecord): Promise<HostState | null> {
    if (this.isExempt(run) || run.infraHostId === null) return null;
    const hostId = run.infraHostId;
    return withTimeout(this.deps.liveness.describeHost(hostId), this.callTimeoutMs, "infrastructure", `describe ${hostId}`);
  }

  async markDead(run: RunRecord, state: HostState, source: "sweep" | "reconcile"): Promise<RunRecord> {
    const terminalState = hostTerminalState(state);
    const updated = await this.deps.runs.updateStatus(run.runId, "not_running", {
      terminalState,
      endedAt: this.now().toISOString()
    });
    await this.deps.runs.addRunEvent(run.runId, "host.dead", `host ${run.infraHostId ?? "?"} is ${describeState(state)}`, {
      source,
      from: run.status,
      host_id: run.infraHostId,
      terminal_state: terminalState
    });
    return updated;
  }

  async sweep(options: { limit?: number; dryRun?: boolean } = {}): Promise<SweepSummary> {
    const invocationId = newInvocationId();
    const dryRun = options.dryRun ?? false;
    const log = this.deps.logger.child({ component: "orphan_sweeper", invocation_id: invocationId });

    const candidates = await this.deps.runs.listRuns(
      { status: ["launched", "running"], hasInfraHost: true },
      { column: "created_at", direction: "desc" },
      options.limit ?? this.maxRuns
    );
    log.info({ candidates: candidates.length, dry_run: dryRun }, "sweep started");

    const summary: SweepSummary = {
      invocationId,
      dryRun,
      counts: { checked: 0, alive: 0, markedDead: 0, exempt: 0, errored: 0 },
      results: []
    };

    for (const run of candidates) {
      const result = await this.sweepOne(run, dryRun, log);
      summary.results.push(result);
      if (result.outcome === "exempt") summary.counts.exempt += 1;
      else {
        summary.counts.checked += 1;
        if (result.outcome === "alive") summary.counts.alive += 1;
        else if (result.outcome === "marked_dead") summary.counts.markedDead += 1;
        else summary.counts.errored += 1;
      }
    }

    log.info({ counts: summary.counts }, "sweep finished");
    return summary;
  }

  private async sweepOne(run: RunRecord, dryRun: boolean, log: Logger): Promise<SweepResult> {
    const base = { runId: run.runId, hostId: run.infraHostId };
    let state: HostState | null;
    try {
      state = await this.checkHost(run);
    } catch (e) {
      const reason = errorMessage(e);
      log.warn({ run_id: run.runId, err: reason }, "host check failed");
      await this.deps.runs.addRunEvent(run.runId, "host.check_failed", reason, { host_id: run.infraHostId });
      return { ...base, outcome: "errored", hostState: null, reason };
    }

    if (!state) return { ...base, outcome: "exempt", hostState: null, reason: `host ${run.host ?? "?"} is exempt` };

    const hostState = describeState(state);
    if (!isHostDead(state)) return { ...base, outcome: "alive", hostState, reason: null };

    if (!dryRun) {
      try {
        await this.markDead(run, state, "sweep");
      } catch (e) {
        const reason = errorMessage(e);
        log.warn({ run_id: run.runId, err: reason }, "mark dead failed");
        return { ...base, outcome: "errored", hostState, reason };
      }
    }
    log.info({ run_id: run.runId, host_state: hostState, dry_run: dryRun }, "host dead, run marked not_running");
    return { ...base, outcome: "marked_dead", hostState, reason: `host ${hostState}` };
  }
}
