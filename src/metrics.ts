import { Counter, Histogram, Registry } from "prom-client";

export const metricsRegistry = new Registry();

export const httpRequestsCounter = new Counter({
  name: "inference_client_http_requests_total",
  help: "HTTP requests issued against the inference API, by method and status",
  labelNames: ["method", "status"],
  registers: [metricsRegistry],
});

export const httpLatencyHistogram = new Histogram({
  name: "inference_client_http_request_duration_seconds",
  help: "Latency of HTTP requests against the inference API",
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  labelNames: ["method"],
  registers: [metricsRegistry],
});

export const httpRetriesCounter = new Counter({
  name: "inference_client_http_retries_total",
  help: "Retried HTTP requests, by reason",
  labelNames: ["reason"],
  registers: [metricsRegistry],
});

export const jobPollsCounter = new Counter({
  name: "inference_client_job_polls_total",
  help: "Status re-fetches issued while resolving jobs",
  labelNames: ["kind"],
  registers: [metricsRegistry],
});

export const jobTerminalCounter = new Counter({
  name: "inference_client_jobs_terminal_total",
  help: "Jobs observed reaching a terminal state, by kind and status",
  labelNames: ["kind", "status"],
  registers: [metricsRegistry],
});

export function startRequestTimer(method: string) {
  return httpLatencyHistogram.startTimer({ method });
}

export function recordRequest(method: string, status: number | "network_error") {
  httpRequestsCounter.labels(method, String(status)).inc();
}

export function recordRetry(reason: string) {
  httpRetriesCounter.labels(reason).inc();
}
