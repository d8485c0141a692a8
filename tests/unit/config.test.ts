import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const settings = loadConfig({});

    expect(settings.env).toBeUndefined();
    expect(settings.api).toEqual({
      token: undefined,
      baseUrl: "https://api.replicate.com/v1",
      userAgent: "inference-jobs-client/0.1.0",
    });
    expect(settings.polling.intervalMs).toBe(500);
    expect(settings.retry).toEqual({ maxRetries: 3, baseDelayMs: 250, maxDelayMs: 5000 });
  });

  it("reads overrides from the environment", () => {
    const settings = loadConfig({
      INFERENCE_API_TOKEN: "test-token",
      INFERENCE_API_BASE_URL: "https://api.example.test/v1/",
      INFERENCE_POLL_INTERVAL_MS: "50",
      INFERENCE_MAX_RETRIES: "0",
    });

    expect(settings.api.token).toBe("test-token");
    expect(settings.api.baseUrl).toBe("https://api.example.test/v1");
    expect(settings.polling.intervalMs).toBe(50);
    expect(settings.retry.maxRetries).toBe(0);
  });

  it("rejects malformed values", () => {
    expect(() => loadConfig({ INFERENCE_API_BASE_URL: "not a url" })).toThrow();
    expect(() => loadConfig({ INFERENCE_POLL_INTERVAL_MS: "-1" })).toThrow();
  });
});
