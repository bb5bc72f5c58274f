// tasklog.ts
import { z } from "zod";
import { appendCsvRow, readCsvFile } from "./csv.js";

export const TASK_LOG_COLUMNS = ["date", "time", "scheduled", "days", "person", "action"] as const;

export type TaskLogRecord = Record<(typeof TASK_LOG_COLUMNS)[number], string>;

const recordSchema = z.object({
  date: z.string(),
  time: z.string(),
  scheduled: z.string(),
  days: z.string(),
  person: z.string(),
  action: z.string(),
});

export class TaskLog {
  constructor(readonly file: string) {}

  async append(record: TaskLogRecord): Promise<void> {
    await appendCsvRow(this.file, TASK_LOG_COLUMNS, record);
  }

  /** Records of tasks fired on `date` (yyyy-MM-dd). */
  async firedOn(date: string): Promise<TaskLogRecord[]> {
    const result = await readCsvFile(this.file, recordSchema);
    return result ? result.rows.filter((r) => r.date === date) : [];
  }

  /** Newest last. */
  async recent(limit: number): Promise<TaskLogRecord[]> {
    const result = await readCsvFile(this.file, recordSchema);
    if (!result) return [];
    return limit > 0 ? result.rows.slice(-limit) : [];
  }
}
