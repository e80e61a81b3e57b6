import { MalformedDataError } from "../core/errors.js";
import { isJsonObject, type JsonObject, type JsonValue } from "../core/json.js";
import type { LaunchColumns } from "../core/run.js";
import type { ObjectiveSpec } from "../core/objective.js";

function section(config: JsonObject, key: string): JsonObject {
  const value = config[key];
  return isJsonObject(value) ? value : {};
}

export interface SkippedLaunchField {
  field: string;
  reason: string;
}

export interface LaunchExtraction {
  columns: LaunchColumns;
  skipped: SkippedLaunchField[];
}

// YAML leaves exponent forms such as 1e-4 as strings
function numeric(value: JsonValue): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Reads typed launch fields; an unusable value becomes null and is recorded, never thrown. */
class LaunchFieldReader {
  readonly skipped: SkippedLaunchField[] = [];

  private skip(field: string, reason: string): null {
    this.skipped.push({ field, reason });
    return null;
  }

  integer(value: JsonValue | undefined, field: string): number | null {
    if (value === undefined || value === null) return null;
    const n = numeric(value);
    if (n === null || !Number.isInteger(n)) return this.skip(field, `expected integer, got ${JSON.stringify(value)}`);
    return n;
  }

  number(value: JsonValue | undefined, field: string): number | null {
    if (value === undefined || value === null) return null;
    const n = numeric(value);
    if (n === null) return this.skip(field, `expected number, got ${JSON.stringify(value)}`);
    return n;
  }

  boolean(value: JsonValue | undefined, field: string): boolean | null {
    if (value === undefined || value === null) return null;
    if (typeof value !== "boolean") return this.skip(field, `expected boolean, got ${JSON.stringify(value)}`);
    return value;
  }

  string(value: JsonValue | undefined, field: string): string | null {
    if (value === undefined || value === null) return null;
    if (typeof value !== "string") return this.skip(field, `expected string, got ${JSON.stringify(value)}`);
    return value;
  }

  length(value: JsonValue | undefined, field: string): number | null {
    if (value === undefined || value === null) return null;
    if (!Array.isArray(value)) return this.skip(field, "expected list");
    return value.length;
  }
}

function stringAt(value: JsonValue | undefined, field: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") throw new MalformedDataError(field, `expected string, got ${JSON.stringify(value)}`);
  return value;
}

function numberAt(value: JsonValue | undefined, field: string): number | null {
  if (value === undefined || value === null) return null;
  const n = numeric(value);
  if (n === null) throw new MalformedDataError(field, `expected number, got ${JSON.stringify(value)}`);
  return n;
}

/**
 * Copies the queryable launch parameters out of a launch config document.
 * Missing fields stay null: zero is a real value for thresholds. Numeric strings are
 * read as numbers; any other unusable value leaves its column null and is listed in `skipped`.
 */
export function extractLaunchColumns(config: JsonObject): LaunchExtraction {
  const training = section(config, "training");
  const reward = section(config, "reward");
  const grouping = section(config, "grouping");
  const distributed = section(config, "distributed");
  const generation = section(config, "generation");
  const read = new LaunchFieldReader();

  const columns: LaunchColumns = {
    gradientMethod: read.string(reward["gradient_method"], "reward.gradient_method"),
    batchSize: read.integer(training["batch_size"], "training.batch_size"),
    learningRate: read.number(training["learning_rate"], "training.learning_rate"),
    beta: read.number(reward["beta"], "reward.beta"),
    numGpus:
      read.integer(training["num_processes"], "training.num_processes") ??
      read.integer(distributed["num_processes"], "distributed.num_processes"),
    numObjectives: read.length(config["objectives"], "objectives"),
    numScaffolds: read.length(generation["scaffolds"], "generation.scaffolds"),
    gradientAccumulationSteps: read.integer(training["gradient_accumulation_steps"], "training.gradient_accumulation_steps"),
    maxSteps: read.integer(training["max_steps"], "training.max_steps"),
    maxGradNorm: read.number(training["max_grad_norm"], "training.max_grad_norm"),
    mixedPrecision: read.boolean(training["mixed_precision"], "training.mixed_precision"),
    gradientCheckpointing: read.boolean(training["gradient_checkpointing"], "training.gradient_checkpointing"),
    fp16: read.boolean(training["fp16"], "training.fp16"),
    bf16: read.boolean(training["bf16"], "training.bf16"),
    enableMovingTargets: read.boolean(reward["enable_moving_targets"], "reward.enable_moving_targets"),
    returnGroups: read.boolean(grouping["return_groups"], "grouping.return_groups"),
    nClusters: read.integer(grouping["n_clusters"], "grouping.n_clusters")
  };
  return { columns, skipped: read.skipped };
}

export interface ParsedObjectives {
  objectives: Array<{ index: number; spec: ObjectiveSpec }>;
  skipped: Array<{ index: number; reason: string }>;
}

/** Reads `objectives: [{ name, alias, direction, weight, uniprot }]`; bad entries are skipped, not fatal. */
export function parseConfigObjectives(config: JsonObject): ParsedObjectives {
  const raw = config["objectives"];
  const out: ParsedObjectives = { objectives: [], skipped: [] };
  if (!Array.isArray(raw)) return out;

  raw.forEach((entry, index) => {
    if (!isJsonObject(entry)) {
      out.skipped.push({ index, reason: "entry is not an object" });
      return;
    }
    try {
      const name = stringAt(entry["name"], `objectives[${index}].name`);
      if (!name) throw new MalformedDataError(`objectives[${index}].name`, "missing");
      const direction = stringAt(entry["direction"], `objectives[${index}].direction`);
      if (direction !== null && direction !== "maximize" && direction !== "minimize") {
        throw new MalformedDataError(`objectives[${index}].direction`, `unknown direction ${direction}`);
      }
      out.objectives.push({
        index,
        spec: {
          name,
          alias: stringAt(entry["alias"], `objectives[${index}].alias`),
          uniprot: stringAt(entry["uniprot"], `objectives[${index}].uniprot`),
          weight: numberAt(entry["weight"], `objectives[${index}].weight`),
          direction
        }
      });
    } catch (e) {
      if (!(e instanceof MalformedDataError)) throw e;
      out.skipped.push({ index, reason: e.message });
    }
  });
  return out;
}
