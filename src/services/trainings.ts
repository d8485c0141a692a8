import { ValidationError } from "../errors";
import { CreateJobOptions, JobInput, Training } from "../types/job";
import { parsePinnedIdentifier } from "../utils/identifier";
import { decodeTraining, decodeTrainingPage } from "./entityDecoder";
import { JobResolver, buildCreateBody, requireInput } from "./jobResolver";
import { Transport } from "./httpClient";
import { PollScheduler } from "./lifecycle";

export type TrainingOptions = Omit<CreateJobOptions, "stream">;

export class TrainingResolver extends JobResolver<Training> {
  constructor(transport: Transport, pollIntervalMs: number, scheduler?: PollScheduler) {
    super({
      kind: "trainings",
      transport,
      decode: decodeTraining,
      decodePage: decodeTrainingPage,
      pollIntervalMs,
      scheduler,
    });
  }

  /**
   * Trains a new version of `destination` (an `owner/name` model) starting
   * from `version`, given as `owner/name:version_id`.
   */
  async create(
    version: string | null | undefined,
    destination: string | null | undefined,
    input: JobInput | null | undefined,
    options: TrainingOptions = {},
  ): Promise<Training> {
    if (!version) {
      throw new ValidationError("A version identifier must be provided");
    }
    const base = parsePinnedIdentifier(version);
    if (!destination) {
      throw new ValidationError("A destination must be provided");
    }
    const body = buildCreateBody(requireInput(input), options);
    body.destination = destination;

    const path = [
      "/models",
      encodeURIComponent(base.owner),
      encodeURIComponent(base.name),
      "versions",
      encodeURIComponent(base.version),
      "trainings",
    ].join("/");
    return this.submit(path, body);
  }
}
