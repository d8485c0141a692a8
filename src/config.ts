import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.string().optional().default("info"),
  INFERENCE_API_TOKEN: z.string().optional(),
  INFERENCE_API_BASE_URL: z.string().url().optional().default("https://api.replicate.com/v1"),
  INFERENCE_USER_AGENT: z.string().optional().default("inference-jobs-client/0.1.0"),
  INFERENCE_POLL_INTERVAL_MS: z.coerce.number().int().min(0).optional().default(500),
  INFERENCE_MAX_RETRIES: z.coerce.number().int().min(0).optional().default(3),
  INFERENCE_RETRY_BASE_MS: z.coerce.number().int().min(0).optional().default(250),
  INFERENCE_RETRY_MAX_MS: z.coerce.number().int().min(0).optional().default(5000),
});

export type EnvInput = Record<string, string | undefined>;

export function loadConfig(source: EnvInput = process.env) {
  const env = envSchema.parse(source);
  return {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    api: {
      token: env.INFERENCE_API_TOKEN,
      baseUrl: env.INFERENCE_API_BASE_URL.replace(/\/$/, ""),
      userAgent: env.INFERENCE_USER_AGENT,
    },
    polling: {
      intervalMs: env.INFERENCE_POLL_INTERVAL_MS,
    },
    retry: {
      maxRetries: env.INFERENCE_MAX_RETRIES,
      baseDelayMs: env.INFERENCE_RETRY_BASE_MS,
      maxDelayMs: env.INFERENCE_RETRY_MAX_MS,
    },
  };
}

export const config = loadConfig();

export type AppConfig = ReturnType<typeof loadConfig>;
