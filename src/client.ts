import { AppConfig, config } from "./config";
import { logger } from "./logger";
import { Catalog } from "./services/catalog";
import { FetchLike, HttpClient, RetryPolicy, Transport } from "./services/httpClient";
import { PollScheduler, timerScheduler } from "./services/lifecycle";
import { PredictionResolver } from "./services/predictions";
import { Runner } from "./services/runner";
import { TrainingResolver } from "./services/trainings";

export interface ClientOptions {
  token?: string;
  baseUrl?: string;
  userAgent?: string;
  /** Delay between status re-fetches while waiting on a job. */
  pollIntervalMs?: number;
  retry?: Partial<RetryPolicy>;
  /** Replaces the HTTP layer entirely; the options above that configure it are then ignored. */
  transport?: Transport;
  fetchImpl?: FetchLike;
  scheduler?: PollScheduler;
}

export class Client {
  readonly predictions: PredictionResolver;
  readonly trainings: TrainingResolver;
  readonly catalog: Catalog;
  readonly run: Runner["run"];
  readonly stream: Runner["stream"];

  constructor(options: ClientOptions = {}, settings: AppConfig = config) {
    const scheduler = options.scheduler ?? timerScheduler;
    const pollIntervalMs = options.pollIntervalMs ?? settings.polling.intervalMs;
    const transport =
      options.transport ??
      new HttpClient({
        baseUrl: options.baseUrl ?? settings.api.baseUrl,
        token: options.token ?? settings.api.token,
        userAgent: options.userAgent ?? settings.api.userAgent,
        retry: {
          maxRetries: options.retry?.maxRetries ?? settings.retry.maxRetries,
          baseDelayMs: options.retry?.baseDelayMs ?? settings.retry.baseDelayMs,
          maxDelayMs: options.retry?.maxDelayMs ?? settings.retry.maxDelayMs,
        },
        fetchImpl: options.fetchImpl,
        scheduler,
      });

    if (!options.transport && !(options.token ?? settings.api.token)) {
      logger.warn("No API token configured; requests will be sent unauthenticated");
    }

    this.predictions = new PredictionResolver(transport, pollIntervalMs, scheduler);
    this.trainings = new TrainingResolver(transport, pollIntervalMs, scheduler);
    this.catalog = new Catalog(transport);

    const runner = new Runner(this.catalog, this.predictions);
    this.run = runner.run.bind(runner);
    this.stream = runner.stream.bind(runner);
  }
}

export function createClient(options: ClientOptions = {}) {
  return new Client(options);
}
