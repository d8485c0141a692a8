export type KnownJobStatus = "starting" | "processing" | "succeeded" | "failed" | "canceled";

/** Statuses the server adds later are kept as-is and treated as non-terminal. */
export type JobStatus = KnownJobStatus | (string & {});

export type TerminalStatus = Extract<KnownJobStatus, "succeeded" | "failed" | "canceled">;

export type JobKind = "predictions" | "trainings";

export type WebhookEvent = "start" | "output" | "logs" | "completed";

export type JobInput = Record<string, unknown>;

export interface JobUrls {
  get?: string;
  cancel?: string;
  stream?: string;
  [name: string]: string | undefined;
}

export interface Job {
  id: string;
  status: JobStatus;
  input?: JobInput | null;
  output?: unknown;
  logs?: string | null;
  error?: string | null;
  metrics?: Record<string, unknown> | null;
  created_at?: string | null;
  started_at?: string | null;
  completed_at?: string | null;
  urls?: JobUrls | null;
  /** Raw version identifier as reported by the server. */
  version_id?: string | null;
  /** Attached only when the caller already holds the version record. */
  version?: Version;
}

export interface Prediction extends Job {
  model?: string | null;
  source?: string | null;
}

export interface Training extends Job {
  destination?: string | null;
}

export interface Version {
  id: string;
  created_at?: string | null;
  cog_version?: string | null;
  openapi_schema?: unknown;
}

export interface Model {
  owner: string;
  name: string;
  url?: string | null;
  description?: string | null;
  visibility?: string | null;
  latest_version?: Version | null;
  default_example?: Prediction | null;
}

export interface DeploymentRelease {
  number: number;
  model: string;
  version: string;
  created_at?: string | null;
}

export interface Deployment {
  owner: string;
  name: string;
  current_release?: DeploymentRelease | null;
}

export interface Page<T> {
  results: T[];
  next: string | null;
  previous: string | null;
}

export interface Progress {
  /** Fraction complete, between 0 and 1. */
  percentage: number;
  current: number;
  total: number;
}

export interface CreateJobOptions {
  webhook?: string;
  webhook_completed?: string;
  webhook_events_filter?: WebhookEvent[];
  stream?: boolean;
}
