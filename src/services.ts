import type { Kysely } from "kysely";
import type { AppConfig } from "./config/appConfig.js";
import { ConfigError } from "./core/errors.js";
import type { Logger } from "./core/logger.js";
import type { DB } from "./db/types.js";
import { Ec2HostLivenessProbe, type HostLivenessProbe } from "./infra/hostLiveness.js";
import { ObjectiveQueryEngine } from "./query/objectiveQuery.js";
import { PrefixWindowMatcher } from "./reconcile/identityMatcher.js";
import { OrphanSweeper } from "./reconcile/orphanSweeper.js";
import { ReconciliationEngine } from "./reconcile/reconciliationEngine.js";
import { ObjectiveStore } from "./store/objectiveStore.js";
import { RunStore } from "./store/runStore.js";
import type { ExperimentTracker } from "./tracker/types.js";
import { WandbTracker } from "./tracker/wandbTracker.js";

export interface Services {
  runs: RunStore;
  objectives: ObjectiveStore;
  query: ObjectiveQueryEngine;
  reconciler: ReconciliationEngine | null;
  sweeper: OrphanSweeper;
}

/**
 * Wires stores and reconciliation from config. `tracker` and `liveness` override the
 * configured collaborators; without tracker credentials there is no reconciler.
 */
export function buildServices(input: {
  db: Kysely<DB>;
  config: AppConfig;
  logger: Logger;
  tracker?: ExperimentTracker;
  liveness?: HostLivenessProbe;
  markStale?: boolean;
  now?: () => Date;
}): Services {
  const { db, config, logger, now } = input;
  const runs = new RunStore(db, { now });
  const objectives = new ObjectiveStore(db, { now });
  const query = new ObjectiveQueryEngine(db);

  const sweeper = new OrphanSweeper(
    { runs, liveness: input.liveness ?? new Ec2HostLivenessProbe({ region: config.liveness.region }), logger, now },
    {
      exemptHosts: config.liveness.exempt_hosts,
      callTimeoutMs: config.reconcile.call_timeout_ms,
      maxRunsPerInvocation: config.reconcile.max_runs_per_invocation
    }
  );

  let tracker: ExperimentTracker | null = input.tracker ?? null;
  if (!tracker) {
    try {
      const t = config.requireTracker();
      tracker = new WandbTracker({
        entity: t.entity,
        project: t.project,
        apiKey: t.api_key,
        baseUrl: t.base_url,
        appUrl: t.app_url,
        timeoutMs: t.timeout_ms,
        historyPageSize: t.history_page_size,
        listPageSize: t.list_page_size
      });
    } catch (e) {
      if (!(e instanceof ConfigError)) throw e;
      logger.warn({ err: e.message }, "reconciliation disabled");
    }
  }

  const reconciler = tracker
    ? new ReconciliationEngine(
        {
          runs,
          objectives,
          tracker,
          logger,
          matcher: config.reconcile.use_identity_matcher
            ? new PrefixWindowMatcher(config.reconcile.match_window_seconds)
            : null,
          orphans: sweeper,
          now
        },
        {
          staleAfterSeconds: config.reconcile.stale_after_seconds,
          callTimeoutMs: config.reconcile.call_timeout_ms,
          maxRunsPerInvocation: config.reconcile.max_runs_per_invocation,
          markStale: input.markStale
        }
      )
    : null;

  return { runs, objectives, query, reconciler, sweeper };
}
