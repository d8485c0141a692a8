import { logger } from "../logger";
import { ServerSentEvent } from "../types/events";

interface PendingEvent {
  type?: string;
  data: string[];
  id?: string;
  touched: boolean;
}

function emptyEvent(): PendingEvent {
  return { data: [], touched: false };
}

/**
 * Incremental `text/event-stream` decoder. Chunks may split lines, and byte
 * chunks may split multi-byte characters; both are buffered until complete.
 * An event is only emitted once its terminating blank line has arrived.
 */
export class EventStreamDecoder {
  private readonly text = new TextDecoder("utf-8");
  private buffer = "";
  private skipLineFeed = false;
  private pending: PendingEvent = emptyEvent();

  push(chunk: Uint8Array | string): ServerSentEvent[] {
    const decoded = typeof chunk === "string" ? chunk : this.text.decode(chunk, { stream: true });
    return this.feed(decoded);
  }

  /**
   * Ends the stream. Returns true when an unterminated line or event was
   * dropped.
   */
  finish(): boolean {
    const tail = this.text.decode();
    const dropped = this.buffer.length + tail.length > 0 || this.pending.touched;
    this.buffer = "";
    this.skipLineFeed = false;
    this.pending = emptyEvent();
    return dropped;
  }

  private feed(input: string): ServerSentEvent[] {
    let text = input;
    if (this.skipLineFeed && text.length > 0) {
      if (text.startsWith("\n")) {
        text = text.slice(1);
      }
      this.skipLineFeed = false;
    }
    this.buffer += text;

    const events: ServerSentEvent[] = [];
    let start = 0;
    for (let i = 0; i < this.buffer.length; i += 1) {
      const ch = this.buffer[i];
      if (ch !== "\n" && ch !== "\r") {
        continue;
      }
      const line = this.buffer.slice(start, i);
      if (ch === "\r") {
        if (i + 1 < this.buffer.length) {
          if (this.buffer[i + 1] === "\n") {
            i += 1;
          }
        } else {
          // a "\n" may still arrive at the head of the next chunk
          this.skipLineFeed = true;
        }
      }
      start = i + 1;
      const event = this.processLine(line);
      if (event) {
        events.push(event);
      }
    }
    this.buffer = this.buffer.slice(start);
    return events;
  }

  private processLine(line: string): ServerSentEvent | undefined {
    if (line === "") {
      return this.dispatch();
    }
    if (line.startsWith(":")) {
      return undefined;
    }

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }

    switch (field) {
      case "event":
        this.pending.type = value;
        this.pending.touched = true;
        break;
      case "data":
        this.pending.data.push(value);
        this.pending.touched = true;
        break;
      case "id":
        this.pending.id = value;
        this.pending.touched = true;
        break;
      default:
        break;
    }
    return undefined;
  }

  private dispatch(): ServerSentEvent | undefined {
    const pending = this.pending;
    this.pending = emptyEvent();
    if (!pending.touched) {
      return undefined;
    }
    const event: ServerSentEvent = {
      event: pending.type || "message",
      data: pending.data.join("\n"),
    };
    if (pending.id !== undefined) {
      event.id = pending.id;
    }
    return event;
  }
}

/**
 * Decodes a chunked event stream into discrete events. Ends with the
 * underlying stream or right after a `done` event, whichever comes first.
 */
export async function* decodeEventStream(
  chunks: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<ServerSentEvent, void, undefined> {
  const decoder = new EventStreamDecoder();
  for await (const chunk of chunks) {
    for (const event of decoder.push(chunk)) {
      yield event;
      if (event.event === "done") {
        return;
      }
    }
  }
  if (decoder.finish()) {
    logger.debug("Dropped unterminated event at end of stream");
  }
}
