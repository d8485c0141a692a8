import { z } from "zod";
import { ResponseShapeError } from "../errors";
import {
  Deployment,
  Job,
  Model,
  Page,
  Prediction,
  Training,
  Version,
} from "../types/job";

const nullableString = z.string().nullish();

const statusSchema = z.string().min(1);

const versionSchema = z.object({
  id: z.string(),
  created_at: nullableString,
  cog_version: nullableString,
  openapi_schema: z.unknown(),
});

// `version` stays a raw id at this stage; the record is attached in a second pass.
const jobSchema = z.object({
  id: z.string(),
  status: statusSchema,
  input: z.record(z.unknown()).nullish(),
  output: z.unknown(),
  logs: nullableString,
  error: nullableString,
  metrics: z.record(z.unknown()).nullish(),
  created_at: nullableString,
  started_at: nullableString,
  completed_at: nullableString,
  urls: z.record(z.string()).nullish(),
  version: nullableString,
});

const predictionSchema = jobSchema.extend({
  model: nullableString,
  source: nullableString,
});

const trainingSchema = jobSchema.extend({
  destination: nullableString,
});

const modelSchema = z.object({
  owner: z.string(),
  name: z.string(),
  url: nullableString,
  description: nullableString,
  visibility: nullableString,
  latest_version: versionSchema.nullish(),
  default_example: predictionSchema.nullish(),
});

const deploymentSchema = z.object({
  owner: z.string(),
  name: z.string(),
  current_release: z
    .object({
      number: z.number().int(),
      model: z.string(),
      version: z.string(),
      created_at: nullableString,
    })
    .nullish(),
});

function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    results: z.array(item),
    next: nullableString,
    previous: nullableString,
  });
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, entity: string, payload: unknown): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ResponseShapeError(entity, result.error.issues);
  }
  return result.data;
}

export interface KnownRelations {
  version?: Version;
}

/** Attaches a version the caller already holds, when it is the one the job refers to. */
export function attachVersion<T extends Job>(record: T, version?: Version): T & { version?: Version } {
  if (!version) {
    return record;
  }
  if (record.version_id && record.version_id !== version.id) {
    return record;
  }
  return { ...record, version };
}

function toPrediction(raw: z.infer<typeof predictionSchema>): Prediction {
  const { version, ...shallow } = raw;
  return { ...shallow, version_id: version ?? null };
}

function toTraining(raw: z.infer<typeof trainingSchema>): Training {
  const { version, ...shallow } = raw;
  return { ...shallow, version_id: version ?? null };
}

export function decodeVersion(payload: unknown): Version {
  return parseWith(versionSchema, "version", payload);
}

export function decodePrediction(payload: unknown, known: KnownRelations = {}): Prediction {
  return attachVersion(toPrediction(parseWith(predictionSchema, "prediction", payload)), known.version);
}

export function decodeTraining(payload: unknown, known: KnownRelations = {}): Training {
  return attachVersion(toTraining(parseWith(trainingSchema, "training", payload)), known.version);
}

export function decodeModel(payload: unknown): Model {
  const raw = parseWith(modelSchema, "model", payload);
  return {
    ...raw,
    default_example: raw.default_example ? toPrediction(raw.default_example) : null,
  };
}

export function decodeDeployment(payload: unknown): Deployment {
  return parseWith(deploymentSchema, "deployment", payload);
}

export function decodeVersionPage(payload: unknown): Page<Version> {
  const raw = parseWith(pageSchema(versionSchema), "version page", payload);
  return { results: raw.results, next: raw.next ?? null, previous: raw.previous ?? null };
}

export function decodePredictionPage(payload: unknown): Page<Prediction> {
  const raw = parseWith(pageSchema(predictionSchema), "prediction page", payload);
  return { results: raw.results.map(toPrediction), next: raw.next ?? null, previous: raw.previous ?? null };
}

export function decodeTrainingPage(payload: unknown): Page<Training> {
  const raw = parseWith(pageSchema(trainingSchema), "training page", payload);
  return { results: raw.results.map(toTraining), next: raw.next ?? null, previous: raw.previous ?? null };
}
