import pino, { LoggerOptions } from "pino";
import { config } from "./config";

const options: LoggerOptions = {
  name: "inference-jobs-client",
  level: config.logLevel,
};

if (config.env === "development") {
  options.transport = { target: "pino-pretty" };
}

export const logger = pino(options);
