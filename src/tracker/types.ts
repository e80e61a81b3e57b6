import type { JsonObject } from "../core/json.js";

/** One run as the experiment tracker reports it. */
export interface TrackerRecord {
  id: string;
  name: string;
  url: string;
  createdAt: string;
  state: string;
  summary: JsonObject;
}

export interface ExperimentTracker {
  getById(id: string): Promise<TrackerRecord | null>;
  /** Exact display-name match, most recent first. */
  searchByName(name: string): Promise<TrackerRecord[]>;
  listAll(): Promise<TrackerRecord[]>;
  /** Every logged history row, in step order. */
  scanHistory(id: string): Promise<JsonObject[]>;
}
