export type KnownEventType = "output" | "logs" | "error" | "done";

/** Event name on the wire; unnamed events arrive as `message`. */
export type EventType = KnownEventType | "message" | (string & {});

export interface ServerSentEvent {
  event: EventType;
  data: string;
  id?: string;
}
