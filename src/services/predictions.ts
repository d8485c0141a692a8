import { ValidationError } from "../errors";
import { CreateJobOptions, JobInput, Prediction, Version } from "../types/job";
import { decodePrediction, decodePredictionPage } from "./entityDecoder";
import { JobResolver, buildCreateBody, requireInput, versionIdOf } from "./jobResolver";
import { Transport } from "./httpClient";
import { PollScheduler } from "./lifecycle";

export class PredictionResolver extends JobResolver<Prediction> {
  constructor(transport: Transport, pollIntervalMs: number, scheduler?: PollScheduler) {
    super({
      kind: "predictions",
      transport,
      decode: decodePrediction,
      decodePage: decodePredictionPage,
      pollIntervalMs,
      scheduler,
    });
  }

  /**
   * Starts a prediction. When `version` is a record rather than an id it is
   * attached to the returned prediction.
   */
  async create(
    version: Version | string | null | undefined,
    input: JobInput | null | undefined,
    options: CreateJobOptions = {},
  ): Promise<Prediction> {
    if (!version || (typeof version !== "string" && !version.id)) {
      throw new ValidationError("A version identifier must be provided");
    }
    const body = buildCreateBody(requireInput(input), options);
    body.version = versionIdOf(version);
    return this.submit("/predictions", body, typeof version === "string" ? {} : { version });
  }

  /** Starts a prediction on a deployment, which pins its own model version. */
  async createForDeployment(
    owner: string,
    name: string,
    input: JobInput | null | undefined,
    options: CreateJobOptions = {},
  ): Promise<Prediction> {
    if (!owner || !name) {
      throw new ValidationError("A deployment owner and name must be provided");
    }
    const body = buildCreateBody(requireInput(input), options);
    return this.submit(
      `/deployments/${encodeURIComponent(owner)}/${encodeURIComponent(name)}/predictions`,
      body,
    );
  }
}
