import axios from "axios";
import type { AxiosInstance } from "axios";
import * as z from "zod/v4";
import { ExternalServiceError, MalformedDataError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { isJsonObject } from "../core/json.js";
import type { ExperimentTracker, TrackerRecord } from "./types.js";

export interface WandbTrackerOptions {
  entity: string;
  project: string;
  apiKey: string;
  baseUrl?: string;
  appUrl?: string;
  timeoutMs?: number;
  historyPageSize?: number;
  listPageSize?: number;
  /** Preconfigured client; auth and timeout are still applied per request. */
  http?: AxiosInstance;
}

const RUN_FIELDS = "name displayName state createdAt summaryMetrics";

const RUN_BY_ID = `
  query RunById($entity: String!, $project: String!, $name: String!) {
    project(name: $project, entityName: $entity) {
      run(name: $name) { ${RUN_FIELDS} }
    }
  }
`;

const RUNS_PAGE = `
  query RunsPage($entity: String!, $project: String!, $first: Int!, $cursor: String, $filters: JSONString, $order: String) {
    project(name: $project, entityName: $entity) {
      runs(first: $first, after: $cursor, filters: $filters, order: $order) {
        edges { node { ${RUN_FIELDS} } }
        pageInfo { endCursor hasNextPage }
      }
    }
  }
`;

const HISTORY_PAGE = `
  query HistoryPage($entity: String!, $project: String!, $name: String!, $minStep: Int64!, $maxStep: Int64!, $samples: Int!) {
    project(name: $project, entityName: $entity) {
      run(name: $name) { history(minStep: $minStep, maxStep: $maxStep, samples: $samples) }
    }
  }
`;

const RunNodeSchema = z.object({
  name: z.string(),
  displayName: z.string().nullable(),
  state: z.string(),
  createdAt: z.string(),
  summaryMetrics: z.string().nullable()
});
type RunNode = z.infer<typeof RunNodeSchema>;

const GraphQlErrorsSchema = z.array(z.object({ message: z.string() })).optional();

const RunByIdResponse = z.object({
  data: z.object({ project: z.object({ run: RunNodeSchema.nullable() }).nullable() }).nullable().optional(),
  errors: GraphQlErrorsSchema
});

const RunsPageResponse = z.object({
  data: z
    .object({
      project: z
        .object({
          runs: z.object({
            edges: z.array(z.object({ node: RunNodeSchema })),
            pageInfo: z.object({ endCursor: z.string().nullable(), hasNextPage: z.boolean() })
          })
        })
        .nullable()
    })
    .nullable()
    .optional(),
  errors: GraphQlErrorsSchema
});

const HistoryPageResponse = z.object({
  data: z
    .object({ project: z.object({ run: z.object({ history: z.array(z.string()) }).nullable() }).nullable() })
    .nullable()
    .optional(),
  errors: GraphQlErrorsSchema
});

function decode<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new MalformedDataError(what, issue ? `${issue.path.map((p) => String(p)).join(".")}: ${issue.message}` : "unexpected shape");
  }
  return result.data;
}

// the API reports UTC without a zone designator
function normalizeTimestamp(raw: string): string {
  return /(Z|[+-]\d{2}:?\d{2})$/.test(raw) ? raw : `${raw}Z`;
}

function parseJsonObject(raw: string | null, field: string): JsonObject {
  if (raw === null || raw === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new MalformedDataError(field, e instanceof Error ? e.message : String(e));
  }
  if (!isJsonObject(parsed)) throw new MalformedDataError(field, "expected a JSON object");
  return parsed;
}

/**
 * Experiment tracker backed by the W&B GraphQL API. Tracker run ids are the short
 * `name` field; the human-facing name is `displayName`.
 */
export class WandbTracker implements ExperimentTracker {
  private readonly client: AxiosInstance;
  private readonly appUrl: string;
  private readonly historyPageSize: number;
  private readonly listPageSize: number;

  constructor(private readonly options: WandbTrackerOptions) {
    this.client =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? "https://api.wandb.ai",
        headers: { "Content-Type": "application/json" }
      });
    this.appUrl = (options.appUrl ?? "https://wandb.ai").replace(/\/+$/, "");
    this.historyPageSize = options.historyPageSize ?? 1000;
    this.listPageSize = options.listPageSize ?? 100;
  }

  async getById(id: string): Promise<TrackerRecord | null> {
    const body = decode(RunByIdResponse, await this.post(RUN_BY_ID, this.vars({ name: id })), "tracker run response");
    this.throwOnErrors(body.errors);
    const project = this.requireProject(body.data?.project);
    return project.run ? this.toRecord(project.run) : null;
  }

  async searchByName(name: string): Promise<TrackerRecord[]> {
    return this.listRuns({ display_name: name });
  }

  async listAll(): Promise<TrackerRecord[]> {
    return this.listRuns(null);
  }

  async scanHistory(id: string): Promise<JsonObject[]> {
    const record = await this.getById(id);
    if (!record) return [];
    const lastStep = record.summary["_step"];
    if (typeof lastStep !== "number") return [];

    const rows: JsonObject[] = [];
    for (let minStep = 0; minStep <= lastStep; minStep += this.historyPageSize) {
      const maxStep = minStep + this.historyPageSize;
      const body = decode(
        HistoryPageResponse,
        await this.post(HISTORY_PAGE, this.vars({ name: id, minStep, maxStep, samples: this.historyPageSize })),
        "tracker history response"
      );
      this.throwOnErrors(body.errors);
      const run = this.requireProject(body.data?.project).run;
      if (!run) break;
      for (const line of run.history) rows.push(parseJsonObject(line, "history"));
    }
    return rows;
  }

  private async listRuns(filters: JsonObject | null): Promise<TrackerRecord[]> {
    const out: TrackerRecord[] = [];
    let cursor: string | null = null;
    for (;;) {
      const body: z.infer<typeof RunsPageResponse> = decode(
        RunsPageResponse,
        await this.post(
          RUNS_PAGE,
          this.vars({
            first: this.listPageSize,
            cursor,
            filters: filters ? JSON.stringify(filters) : null,
            order: "-created_at"
          })
        ),
        "tracker runs response"
      );
      this.throwOnErrors(body.errors);
      const runs = this.requireProject(body.data?.project).runs;
      for (const edge of runs.edges) out.push(this.toRecord(edge.node));
      if (!runs.pageInfo.hasNextPage || runs.pageInfo.endCursor === null) break;
      cursor = runs.pageInfo.endCursor;
    }
    return out;
  }

  private vars(extra: Record<string, unknown>): Record<string, unknown> {
    return { entity: this.options.entity, project: this.options.project, ...extra };
  }

  private async post(query: string, variables: Record<string, unknown>): Promise<unknown> {
    try {
      const res = await this.client.post<unknown>(
        "/graphql",
        { query, variables },
        { auth: { username: "api", password: this.options.apiKey }, timeout: this.options.timeoutMs ?? 30000 }
      );
      return res.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new ExternalServiceError("tracker", status ? `HTTP ${status}: ${error.message}` : error.message, {
          cause: error
        });
      }
      throw error;
    }
  }

  private throwOnErrors(errors: Array<{ message: string }> | undefined): void {
    if (errors && errors.length) {
      throw new ExternalServiceError("tracker", errors.map((e) => e.message).join("; "));
    }
  }

  private requireProject<T>(project: T | null | undefined): T {
    if (!project) {
      throw new ExternalServiceError("tracker", `project not found: ${this.options.entity}/${this.options.project}`);
    }
    return project;
  }

  private toRecord(node: RunNode): TrackerRecord {
    return {
      id: node.name,
      name: node.displayName ?? node.name,
      url: `${this.appUrl}/${this.options.entity}/${this.options.project}/runs/${node.name}`,
      createdAt: normalizeTimestamp(node.createdAt),
      state: node.state,
      summary: parseJsonObject(node.summaryMetrics, "summaryMetrics")
    };
  }
}
