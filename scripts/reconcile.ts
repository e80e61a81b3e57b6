import { AppConfig } from "../src/config/appConfig.js";
import { createLogger } from "../src/core/logger.js";
import { createDb, createPgPool } from "../src/db/connection.js";
import { buildServices } from "../src/services.js";

const BOOLEAN_FLAGS = new Set(["help", "dry-run", "no-mark-stale", "skip-sweep"]);

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/reconcile.ts [--config <file>] [--limit <n>] [--dry-run] [--no-mark-stale] [--skip-sweep]",
    "",
    "notes:",
    "  - DATABASE_URL must point at the run ledger database",
    "  - one reconciliation pass, then one orphan sweep unless --skip-sweep",
    "  - the summary is written to stdout as JSON; logs go to stderr",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (BOOLEAN_FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

function parseLimit(raw: string | boolean | undefined): number | undefined {
  if (typeof raw !== "string") return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`--limit must be a positive integer (got ${raw})`);
  return n;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) throw new Error(`DATABASE_URL is required\n\n${usage()}`);

  const configPath = typeof args.config === "string" ? args.config : "config/default.config.yaml";
  const limit = parseLimit(args.limit);
  const dryRun = args["dry-run"] === true;

  const logger = createLogger();
  const config = await AppConfig.loadFromFile(configPath);
  const db = createDb(createPgPool(databaseUrl, 2));
  try {
    const services = buildServices({ db, config, logger, markStale: args["no-mark-stale"] !== true });
    if (!services.reconciler) throw new Error("tracker not configured; set the tracker entity, project and api key");

    const reconcile = await services.reconciler.reconcile({ limit, dryRun });
    const sweep = args["skip-sweep"] === true ? null : await services.sweeper.sweep({ limit, dryRun });
    process.stdout.write(
      `${JSON.stringify({ reconcile: { invocation_id: reconcile.invocationId, dry_run: dryRun, counts: reconcile.counts }, sweep: sweep ? { invocation_id: sweep.invocationId, counts: sweep.counts } : null })}\n`
    );
  } finally {
    await db.destroy();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
