import type { ZodIssue } from "zod";
import type { Job } from "./types/job";

export class ClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised locally, before any request is issued. */
export class ValidationError extends ClientError {}

/** The remote job reached `failed`; carries the job's own error text and, when known, the job. */
export class ModelError extends ClientError {
  readonly job?: Job;
  readonly jobId?: string;

  constructor(message: string | null | undefined, job?: Job) {
    super(message ?? "Model run failed");
    this.job = job;
    this.jobId = job?.id;
  }
}

export class RemoteAPIError extends ClientError {
  readonly status: number;
  readonly detail?: string;
  readonly body: unknown;

  constructor(status: number, body: unknown) {
    const detail = extractDetail(body);
    super(detail ?? `HTTP ${status}`);
    this.status = status;
    this.detail = detail;
    this.body = body;
  }
}

export class ResponseShapeError extends ClientError {
  readonly entity: string;
  readonly issues: ZodIssue[];

  constructor(entity: string, issues: ZodIssue[]) {
    const summary = issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    super(`Unexpected ${entity} payload (${summary})`);
    this.entity = entity;
    this.issues = issues;
  }
}

function extractDetail(body: unknown): string | undefined {
  if (typeof body === "string") {
    return body.trim() || undefined;
  }
  if (!body || typeof body !== "object") {
    return undefined;
  }
  for (const key of ["detail", "error", "title", "message"]) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === "string" && value.trim()) {
      return value;
    }
  }
  return undefined;
}
