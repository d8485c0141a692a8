import pino from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";

describe("logger", () => {
  const nodeEnv = process.env.NODE_ENV;

  afterEach(() => {
    if (nodeEnv === undefined) {
      delete process.env.NODE_ENV;
    } else {
      process.env.NODE_ENV = nodeEnv;
    }
    vi.resetModules();
  });

  it("writes plain JSON to stdout when NODE_ENV is unset", async () => {
    delete process.env.NODE_ENV;
    vi.resetModules();

    const { config } = await import("../../src/config");
    const { logger } = await import("../../src/logger");
    const stream = Reflect.get(logger, pino.symbols.streamSym);

    expect(config.env).toBeUndefined();
    expect(stream.constructor.name).toBe("SonicBoom");
  });
});
