import { describe, expect, it } from "vitest";
import { EventStreamDecoder, decodeEventStream } from "../../../src/services/eventStream";
import { collect } from "../../support/fakeTransport";

async function* chunksOf(...chunks: (string | Uint8Array)[]) {
  for (const chunk of chunks) {
    yield chunk;
  }
}

describe("EventStreamDecoder", () => {
  it("emits an event only once its blank line arrives", () => {
    const decoder = new EventStreamDecoder();

    expect(decoder.push("event: output\ndata: hel")).toEqual([]);
    expect(decoder.push("lo\n")).toEqual([]);
    expect(decoder.push("\n")).toEqual([{ event: "output", data: "hello" }]);
  });

  it("joins multiple data lines with newlines", () => {
    const decoder = new EventStreamDecoder();

    expect(decoder.push("event: logs\ndata: first\ndata: second\n\n")).toEqual([
      { event: "logs", data: "first\nsecond" },
    ]);
  });

  it("defaults the event type to message and carries the id", () => {
    const decoder = new EventStreamDecoder();

    expect(decoder.push("id: 42\ndata: plain\n\n")).toEqual([{ event: "message", data: "plain", id: "42" }]);
  });

  it("skips comments and unknown fields", () => {
    const decoder = new EventStreamDecoder();

    expect(decoder.push(": keep-alive\nretry: 1000\nevent: output\ndata: x\n\n")).toEqual([
      { event: "output", data: "x" },
    ]);
  });

  it("strips only a single space after the colon", () => {
    const decoder = new EventStreamDecoder();

    expect(decoder.push("data:  two spaces\ndata:none\n\n")).toEqual([
      { event: "message", data: " two spaces\nnone" },
    ]);
  });

  it("accepts CRLF and bare CR line endings, including a CRLF split across chunks", () => {
    const decoder = new EventStreamDecoder();

    expect(decoder.push("event: output\r\ndata: a\r")).toEqual([]);
    expect(decoder.push("\n\r\n")).toEqual([{ event: "output", data: "a" }]);
    expect(decoder.push("data: b\r\r")).toEqual([{ event: "message", data: "b" }]);
  });

  it("ignores blank lines that close no event", () => {
    const decoder = new EventStreamDecoder();

    expect(decoder.push("\n\n: ping\n\n")).toEqual([]);
  });

  it("reassembles multi-byte characters split between byte chunks", () => {
    const decoder = new EventStreamDecoder();
    const bytes = new TextEncoder().encode("data: café\n\n");
    const cut = bytes.indexOf(0xc3) + 1;

    expect(decoder.push(bytes.slice(0, cut))).toEqual([]);
    expect(decoder.push(bytes.slice(cut))).toEqual([{ event: "message", data: "café" }]);
  });

  it("reports a dropped partial event on finish", () => {
    const decoder = new EventStreamDecoder();
    decoder.push("event: output\ndata: partial\n");

    expect(decoder.finish()).toBe(true);
    expect(new EventStreamDecoder().finish()).toBe(false);
  });
});

describe("decodeEventStream", () => {
  const wire = "event: output\ndata: Hello\n\nevent: output\ndata: , world\n\n";

  it("yields two events separated by one blank line, in order", async () => {
    await expect(collect(decodeEventStream(chunksOf(wire)))).resolves.toEqual([
      { event: "output", data: "Hello" },
      { event: "output", data: ", world" },
    ]);
  });

  it("reconstructs the same events wherever the bytes are split", async () => {
    const bytes = new TextEncoder().encode(wire);
    const whole = await collect(decodeEventStream(chunksOf(bytes)));

    for (let offset = 1; offset < bytes.length; offset += 1) {
      const split = await collect(decodeEventStream(chunksOf(bytes.slice(0, offset), bytes.slice(offset))));
      expect(split).toEqual(whole);
    }
  });

  it("stops at the done event", async () => {
    const events = await collect(
      decodeEventStream(chunksOf("event: output\ndata: a\n\nevent: done\ndata: {}\n\nevent: output\ndata: late\n\n")),
    );

    expect(events).toEqual([
      { event: "output", data: "a" },
      { event: "done", data: "{}" },
    ]);
  });

  it("discards an unterminated event at end of stream", async () => {
    const events = await collect(decodeEventStream(chunksOf("event: output\ndata: a\n\nevent: output\ndata: b\n")));

    expect(events).toEqual([{ event: "output", data: "a" }]);
  });

  it("passes error and custom events through", async () => {
    const events = await collect(
      decodeEventStream(chunksOf("event: error\ndata: boom\n\nevent: heartbeat\ndata: \n\n")),
    );

    expect(events).toEqual([
      { event: "error", data: "boom" },
      { event: "heartbeat", data: "" },
    ]);
  });
});
