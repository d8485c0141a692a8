import type { Logger } from "pino";
import { ModelError, ValidationError } from "../errors";
import { logger } from "../logger";
import { jobPollsCounter, jobTerminalCounter } from "../metrics";
import { ServerSentEvent } from "../types/events";
import { CreateJobOptions, Job, JobInput, JobKind, Page, Progress, Version } from "../types/job";
import { encodeInput } from "../utils/encodeInput";
import { parseProgress } from "../utils/progress";
import { KnownRelations } from "./entityDecoder";
import { decodeEventStream } from "./eventStream";
import { Transport } from "./httpClient";
import { PollScheduler, advanceOutput, isTerminal, timerScheduler } from "./lifecycle";

export interface JobResolverOptions<T extends Job> {
  kind: JobKind;
  transport: Transport;
  decode: (payload: unknown, known?: KnownRelations) => T;
  decodePage: (payload: unknown) => Page<T>;
  pollIntervalMs: number;
  scheduler?: PollScheduler;
}

/**
 * Lifecycle of one kind of remote job (predictions or trainings): creation,
 * re-fetching, polling until terminal, cancellation and live streaming.
 */
export class JobResolver<T extends Job> {
  protected readonly kind: JobKind;
  protected readonly transport: Transport;
  protected readonly decode: (payload: unknown, known?: KnownRelations) => T;
  protected readonly log: Logger;
  private readonly decodePage: (payload: unknown) => Page<T>;
  private readonly pollIntervalMs: number;
  private readonly scheduler: PollScheduler;

  constructor(options: JobResolverOptions<T>) {
    this.kind = options.kind;
    this.transport = options.transport;
    this.decode = options.decode;
    this.decodePage = options.decodePage;
    this.pollIntervalMs = options.pollIntervalMs;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.log = logger.child({ kind: options.kind });
  }

  async get(id: string): Promise<T> {
    if (!id) {
      throw new ValidationError(`A ${this.kind} id is required`);
    }
    const payload = await this.transport.request("GET", `/${this.kind}/${encodeURIComponent(id)}`);
    return this.decode(payload);
  }

  /** One page of jobs, newest first. Pass the previous page's `next` to continue. */
  async list(cursor?: string | null): Promise<Page<T>> {
    const payload = await this.transport.request("GET", cursor ?? `/${this.kind}`);
    return this.decodePage(payload);
  }

  /** Fresh copy of `job`; a version the caller already holds carries over. */
  async reload(job: T): Promise<T> {
    const payload = await this.transport.request("GET", `/${this.kind}/${encodeURIComponent(job.id)}`);
    return this.decode(payload, { version: job.version });
  }

  /**
   * Successive snapshots of `job`, starting with the one passed in and ending
   * with the first terminal one. Polling stops as soon as the consumer does.
   */
  async *watch(job: T): AsyncGenerator<T, void, undefined> {
    let current = job;
    for (;;) {
      if (isTerminal(current.status)) {
        jobTerminalCounter.labels(this.kind, current.status).inc();
        this.log.info({ jobId: current.id, status: current.status }, "Job reached terminal state");
        yield current;
        return;
      }
      yield current;
      await this.scheduler.sleep(this.pollIntervalMs);
      current = await this.reload(current);
      jobPollsCounter.labels(this.kind).inc();
      this.log.debug({ jobId: current.id, status: current.status }, "Polled job");
    }
  }

  /** Resolves with the terminal snapshot; a failed job is returned, not thrown. */
  async wait(job: T): Promise<T> {
    let last = job;
    for await (const snapshot of this.watch(job)) {
      last = snapshot;
    }
    return last;
  }

  /**
   * Output elements in arrival order, each exactly once. Throws `ModelError`
   * once a failed job's last elements have been handed out.
   */
  async *outputIterator(job: T): AsyncGenerator<unknown, void, undefined> {
    let seen = 0;
    for await (const snapshot of this.watch(job)) {
      const step = advanceOutput(seen, snapshot);
      seen = step.seen;
      yield* step.emit;
      if (step.kind === "fail") {
        throw new ModelError(step.error, snapshot);
      }
    }
  }

  async cancel(job: Pick<Job, "id" | "urls" | "version">): Promise<T> {
    const target = job.urls?.cancel ?? `/${this.kind}/${encodeURIComponent(job.id)}/cancel`;
    this.log.info({ jobId: job.id }, "Cancelling job");
    const payload = await this.transport.request("POST", target);
    return this.decode(payload, { version: job.version });
  }

  /** Live events for a job created with `stream: true`. */
  async *stream(job: Pick<Job, "id" | "urls">): AsyncGenerator<ServerSentEvent, void, undefined> {
    const url = job.urls?.stream;
    if (!url) {
      throw new ValidationError(`${this.kind} ${job.id} was not created with streaming enabled`);
    }
    yield* decodeEventStream(this.transport.openStream(url));
  }

  progress(job: Pick<Job, "logs">): Progress | undefined {
    return parseProgress(job.logs);
  }

  protected async submit(path: string, body: Record<string, unknown>, known: KnownRelations = {}): Promise<T> {
    const payload = await this.transport.request("POST", path, { body });
    const created = this.decode(payload, known);
    this.log.info({ jobId: created.id, status: created.status }, "Created job");
    return created;
  }
}

export function versionIdOf(version: Version | string) {
  return typeof version === "string" ? version : version.id;
}

export function requireInput(input: JobInput | null | undefined): JobInput {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    throw new ValidationError("An input object must be provided");
  }
  return input;
}

export function buildCreateBody(input: JobInput, options: CreateJobOptions = {}): Record<string, unknown> {
  const body: Record<string, unknown> = { input: encodeInput(input) };
  for (const key of ["webhook", "webhook_completed", "webhook_events_filter", "stream"] as const) {
    const value = options[key];
    if (value !== undefined && value !== null) {
      body[key] = value;
    }
  }
  return body;
}
