import { Version } from "../types/job";

export type OutputMode = "incremental" | "atomic";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

/**
 * Array-typed outputs grow while the job runs and are consumed element by
 * element; anything else, including a schema that is missing or malformed,
 * is read once the job is done.
 */
export function selectOutputMode(version: Pick<Version, "openapi_schema"> | null | undefined): OutputMode {
  const output = child(child(child(version?.openapi_schema, "components"), "schemas"), "Output");
  return child(output, "type") === "array" ? "incremental" : "atomic";
}
