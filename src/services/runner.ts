import { ModelError } from "../errors";
import { logger } from "../logger";
import { ServerSentEvent } from "../types/events";
import { CreateJobOptions, JobInput, Prediction, Version } from "../types/job";
import { ModelIdentifier, parseModelIdentifier } from "../utils/identifier";
import { Catalog } from "./catalog";
import { selectOutputMode } from "./outputMode";
import { PredictionResolver } from "./predictions";

export interface RunOptions extends Omit<CreateJobOptions, "stream"> {
  /** With `false`, return the created prediction instead of its output. */
  wait?: boolean;
}

export type StreamOptions = Omit<CreateJobOptions, "stream">;

export function isOutputIterator(value: unknown): value is AsyncGenerator<unknown, void, undefined> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

/** End-to-end runs of a model given as `owner/name` or `owner/name:version`. */
export class Runner {
  constructor(
    private readonly catalog: Catalog,
    private readonly predictions: PredictionResolver,
  ) {}

  /**
   * Runs a model. Array-typed outputs come back immediately as an async
   * iterator over their elements; any other output is awaited and returned
   * once the prediction is done.
   */
  run(
    identifier: string,
    input: JobInput | undefined,
    options: RunOptions & { wait: false },
  ): Promise<Prediction>;
  run(identifier: string, input?: JobInput, options?: RunOptions): Promise<unknown>;
  async run(identifier: string, input: JobInput = {}, options: RunOptions = {}): Promise<unknown> {
    const ref = parseModelIdentifier(identifier);
    const { wait = true, ...createOptions } = options;
    const version = await this.resolveVersion(ref);
    const prediction = await this.predictions.create(version, input, createOptions);
    if (!wait) {
      return prediction;
    }

    const mode = selectOutputMode(version);
    logger.debug({ identifier, predictionId: prediction.id, mode }, "Resolving run output");
    if (mode === "incremental") {
      return this.predictions.outputIterator(prediction);
    }

    const finished = await this.predictions.wait(prediction);
    if (finished.status === "failed") {
      throw new ModelError(finished.error, finished);
    }
    return finished.output;
  }

  /** Runs a model with streaming enabled and yields its live events. */
  async *stream(
    identifier: string,
    input: JobInput = {},
    options: StreamOptions = {},
  ): AsyncGenerator<ServerSentEvent, void, undefined> {
    const ref = parseModelIdentifier(identifier);
    const version = await this.resolveVersion(ref);
    const prediction = await this.predictions.create(version, input, { ...options, stream: true });
    for await (const event of this.predictions.stream(prediction)) {
      if (event.event === "error") {
        throw new ModelError(event.data, prediction);
      }
      yield event;
    }
  }

  private async resolveVersion(ref: ModelIdentifier): Promise<Version> {
    if (ref.version) {
      return this.catalog.getVersion(ref.owner, ref.name, ref.version);
    }
    return this.catalog.latestVersion(ref.owner, ref.name);
  }
}
