import { describe, expect, it } from "vitest";
import { ValidationError } from "../../../src/errors";
import { parseModelIdentifier, parsePinnedIdentifier } from "../../../src/utils/identifier";

describe("parseModelIdentifier", () => {
  it("parses owner and name", () => {
    expect(parseModelIdentifier("acme/echo")).toEqual({ owner: "acme", name: "echo" });
  });

  it("parses a pinned version", () => {
    expect(parseModelIdentifier("acme/echo-v2:abc123")).toEqual({
      owner: "acme",
      name: "echo-v2",
      version: "abc123",
    });
  });

  it.each(["", "acme", "acme/", "/echo", "acme/echo:", "acme/echo/extra", "acme/echo:a:b", "acme /echo"])(
    "rejects %j",
    (identifier) => {
      expect(() => parseModelIdentifier(identifier)).toThrow(ValidationError);
    },
  );
});

describe("parsePinnedIdentifier", () => {
  it("requires a version", () => {
    expect(parsePinnedIdentifier("acme/echo:abc123").version).toBe("abc123");
    expect(() => parsePinnedIdentifier("acme/echo")).toThrow(
      'Invalid version identifier "acme/echo": expected owner/name:version',
    );
  });
});
