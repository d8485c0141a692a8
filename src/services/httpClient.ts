import { fetch } from "undici";
import { RemoteAPIError } from "../errors";
import { logger } from "../logger";
import { recordRequest, recordRetry, startRequestTimer } from "../metrics";
import { PollScheduler, timerScheduler } from "./lifecycle";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type FetchLike = typeof fetch;

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

export interface StreamOptions {
  headers?: Record<string, string>;
}

/**
 * What the rest of the library needs from HTTP. `path` may be relative to the
 * API base or an absolute URL handed out by the server (cancel/stream links).
 */
export interface Transport {
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
  openStream(url: string, options?: StreamOptions): AsyncIterable<Uint8Array>;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface HttpClientOptions {
  baseUrl: string;
  token?: string;
  userAgent?: string;
  retry: RetryPolicy;
  fetchImpl?: FetchLike;
  scheduler?: PollScheduler;
}

const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set(["GET", "PUT", "DELETE"]);

export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const at = Date.parse(header);
  if (!Number.isNaN(at)) {
    return Math.max(0, at - Date.now());
  }
  return undefined;
}

function parseBody(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class HttpClient implements Transport {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly userAgent?: string;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly scheduler: PollScheduler;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.token = options.token;
    this.userAgent = options.userAgent;
    this.retry = options.retry;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.scheduler = options.scheduler ?? timerScheduler;
  }

  resolveUrl(path: string) {
    if (/^https?:\/\//i.test(path)) {
      return path;
    }
    return `${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = this.resolveUrl(path);
    const headers = this.buildHeaders({ accept: "application/json", ...options.headers });
    let body: string | undefined;
    if (options.body !== undefined) {
      headers["content-type"] = "application/json";
      body = JSON.stringify(options.body);
    }

    for (let attempt = 0; ; attempt += 1) {
      const stopTimer = startRequestTimer(method);
      let response: Awaited<ReturnType<FetchLike>>;
      try {
        response = await this.fetchImpl(url, { method, headers, body });
      } catch (error) {
        recordRequest(method, "network_error");
        if (IDEMPOTENT_METHODS.has(method) && attempt < this.retry.maxRetries) {
          await this.backoff(attempt, "network_error", { method, url, error });
          continue;
        }
        logger.error({ method, url, error }, "Inference API request failed");
        throw error;
      } finally {
        stopTimer();
      }

      recordRequest(method, response.status);
      const text = await response.text();
      if (response.ok) {
        return parseBody(text);
      }

      const retryable =
        response.status === 429 || (response.status >= 500 && IDEMPOTENT_METHODS.has(method));
      if (retryable && attempt < this.retry.maxRetries) {
        await this.backoff(attempt, `status_${response.status}`, {
          method,
          url,
          status: response.status,
          retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
        });
        continue;
      }

      const parsed = parseBody(text);
      logger.error({ method, url, status: response.status, body: parsed }, "Inference API request failed");
      throw new RemoteAPIError(response.status, parsed);
    }
  }

  async *openStream(url: string, options: StreamOptions = {}): AsyncGenerator<Uint8Array, void, undefined> {
    const target = this.resolveUrl(url);
    const headers = this.buildHeaders({
      accept: "text/event-stream",
      "cache-control": "no-store",
      ...options.headers,
    });
    const response = await this.fetchImpl(target, { method: "GET", headers });
    recordRequest("GET", response.status);

    if (!response.ok) {
      const parsed = parseBody(await response.text());
      logger.error({ url: target, status: response.status, body: parsed }, "Event stream request failed");
      throw new RemoteAPIError(response.status, parsed);
    }
    if (!response.body) {
      return;
    }

    const reader = response.body.getReader();
    let drained = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          drained = true;
          return;
        }
        yield value;
      }
    } finally {
      if (!drained) {
        await reader.cancel().catch((error: unknown) => {
          logger.debug({ url: target, error }, "Failed to cancel abandoned event stream");
        });
      }
    }
  }

  private buildHeaders(extra: Record<string, string>) {
    const headers: Record<string, string> = { ...extra };
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`;
    }
    if (this.userAgent) {
      headers["user-agent"] = this.userAgent;
    }
    return headers;
  }

  private async backoff(
    attempt: number,
    reason: string,
    context: Record<string, unknown> & { retryAfterMs?: number },
  ) {
    const exponential = this.retry.baseDelayMs * 2 ** attempt;
    const jittered = exponential * (0.5 + Math.random() / 2);
    const delayMs = Math.min(this.retry.maxDelayMs, context.retryAfterMs ?? jittered);
    recordRetry(reason);
    logger.warn({ ...context, attempt: attempt + 1, delayMs }, "Retrying inference API request");
    await this.scheduler.sleep(delayMs);
  }
}
