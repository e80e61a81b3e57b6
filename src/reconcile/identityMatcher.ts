import { splitRunId } from "../core/ids.js";
import type { RunRecord } from "../core/run.js";
import type { TrackerRecord } from "../tracker/types.js";

export type MatchResult =
  | { match: TrackerRecord; reason: string; timeDiffSeconds: number }
  | { match: null; reason: string };

export interface IdentityMatcher {
  match(local: Pick<RunRecord, "runId" | "createdAt">, candidates: readonly TrackerRecord[]): MatchResult;
}

/**
 * Pairs a local run with a tracker record by config prefix and launch time. The prefix is
 * the run id minus its last `_` segment; a candidate qualifies when its name contains the
 * prefix and it was created strictly within the window. `-` and `_` compare equal, since
 * tracker names are often the hyphenated form of the run id. Closest creation time wins;
 * ties keep the candidate listed first.
 */
function foldSeparators(name: string): string {
  return name.replace(/-/g, "_");
}

export class PrefixWindowMatcher implements IdentityMatcher {
  constructor(private readonly windowSeconds = 1800) {}

  match(local: Pick<RunRecord, "runId" | "createdAt">, candidates: readonly TrackerRecord[]): MatchResult {
    const parts = splitRunId(local.runId);
    if (!parts) return { match: null, reason: `run id has no instance suffix: ${local.runId}` };

    const localMs = Date.parse(local.createdAt);
    if (Number.isNaN(localMs)) return { match: null, reason: `unparseable created_at: ${local.createdAt}` };

    const prefix = foldSeparators(parts.configPrefix);
    let best: { record: TrackerRecord; diff: number } | null = null;
    for (const c of candidates) {
      if (!foldSeparators(c.name).includes(prefix)) continue;
      const ms = Date.parse(c.createdAt);
      if (Number.isNaN(ms)) continue;
      const diff = Math.abs(ms - localMs) / 1000;
      if (diff >= this.windowSeconds) continue;
      if (!best || diff < best.diff) best = { record: c, diff };
    }

    if (!best) {
      return { match: null, reason: `no candidate named *${parts.configPrefix}* within ${this.windowSeconds}s` };
    }
    return { match: best.record, reason: `prefix ${parts.configPrefix}`, timeDiffSeconds: best.diff };
  }
}
