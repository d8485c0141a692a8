export { Client, createClient } from "./client";
export type { ClientOptions } from "./client";
export { config, loadConfig } from "./config";
export type { AppConfig } from "./config";
export { logger } from "./logger";
export { metricsRegistry } from "./metrics";
export { ClientError, ModelError, RemoteAPIError, ResponseShapeError, ValidationError } from "./errors";
export { Catalog } from "./services/catalog";
export {
  attachVersion,
  decodeDeployment,
  decodeModel,
  decodePrediction,
  decodeTraining,
  decodeVersion,
} from "./services/entityDecoder";
export { EventStreamDecoder, decodeEventStream } from "./services/eventStream";
export { HttpClient } from "./services/httpClient";
export type { FetchLike, HttpMethod, RequestOptions, RetryPolicy, Transport } from "./services/httpClient";
export { JobResolver } from "./services/jobResolver";
export { TERMINAL_STATUSES, advanceOutput, isTerminal, timerScheduler } from "./services/lifecycle";
export type { OutputStep, PollScheduler } from "./services/lifecycle";
export { selectOutputMode } from "./services/outputMode";
export type { OutputMode } from "./services/outputMode";
export { PredictionResolver } from "./services/predictions";
export { Runner, isOutputIterator } from "./services/runner";
export type { RunOptions, StreamOptions } from "./services/runner";
export { TrainingResolver } from "./services/trainings";
export type { TrainingOptions } from "./services/trainings";
export { encodeInput, toDataUri } from "./utils/encodeInput";
export { parseModelIdentifier, parsePinnedIdentifier } from "./utils/identifier";
export type { ModelIdentifier } from "./utils/identifier";
export { parseProgress } from "./utils/progress";
export type * from "./types/events";
export type * from "./types/job";
