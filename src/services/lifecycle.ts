import { setTimeout as delay } from "node:timers/promises";
import { Job, JobStatus, TerminalStatus } from "../types/job";

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ["succeeded", "failed", "canceled"];

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.some((terminal) => terminal === status);
}

/**
 * Suspension point used between polls. Every loop that waits on a job sleeps
 * through one of these, so callers can swap the timer for a test clock or
 * their own scheduler.
 */
export interface PollScheduler {
  sleep(ms: number): Promise<void>;
}

export const timerScheduler: PollScheduler = {
  async sleep(ms: number) {
    await delay(ms);
  },
};

export function asOutputList(output: unknown): unknown[] {
  if (output === null || output === undefined) {
    return [];
  }
  return Array.isArray(output) ? output : [output];
}

export type OutputStep =
  | { kind: "continue"; emit: unknown[]; seen: number }
  | { kind: "complete"; emit: unknown[]; seen: number }
  | { kind: "fail"; emit: unknown[]; seen: number; error: string | null | undefined };

/**
 * Single transition of the incremental-output state machine: given how many
 * elements were already handed out and the latest snapshot, returns the new
 * suffix and whether the loop goes on.
 *
 * `seen` never decreases, so a snapshot that comes back shorter than an earlier
 * one emits nothing rather than replaying elements.
 */
export function advanceOutput(seen: number, job: Pick<Job, "status" | "output" | "error">): OutputStep {
  const output = asOutputList(job.output);
  const emit = output.length > seen ? output.slice(seen) : [];
  const nextSeen = Math.max(seen, output.length);

  if (!isTerminal(job.status)) {
    return { kind: "continue", emit, seen: nextSeen };
  }
  if (job.status === "failed") {
    return { kind: "fail", emit, seen: nextSeen, error: job.error };
  }
  return { kind: "complete", emit, seen: nextSeen };
}
