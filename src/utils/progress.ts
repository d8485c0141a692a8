import { Progress } from "../types/job";

const PROGRESS_LINE = /^\s*(\d+)%\s*\|.+?\|\s*(\d+)\/(\d+)/;

/**
 * Reads the most recent progress bar (`20%|██   | 1/5 [...]`) out of a job's
 * logs. The whole text is re-scanned on every call.
 */
export function parseProgress(logs: string | null | undefined): Progress | undefined {
  if (!logs) {
    return undefined;
  }

  const lines = logs.split("\n");
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    const match = PROGRESS_LINE.exec(lines[i].trim());
    if (match) {
      const [, percentage, current, total] = match;
      return {
        percentage: Number(percentage) / 100,
        current: Number(current),
        total: Number(total),
      };
    }
  }

  return undefined;
}
