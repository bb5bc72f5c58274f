// schedule.ts
import fs from "node:fs/promises";
import { z } from "zod";
import { isNotFound, readCsvFile } from "./csv.js";
import { isValidDayRange } from "./days.js";

export const SCHEDULE_COLUMNS = ["time", "name", "days", "action", "label"] as const;

export type ScheduleEntry = {
  time: string; // HH:MM, zero padded
  participants: string[];
  participantSpec: string; // the name column as written
  days: string;
  action: string;
  label: string;
};

const TIME = /^([01]?\d|2[0-3]):([0-5]\d)$/;

export const scheduleRowSchema = z
  .object({
    time: z.string().trim().regex(TIME, "expected HH:MM"),
    name: z.string(),
    days: z.string().trim().refine(isValidDayRange, "unknown day spec"),
    action: z.string().trim().min(1, "action is required"),
    label: z.string().trim().optional(),
  })
  .transform((row, ctx): ScheduleEntry => {
    const participants = row.name.split(":").map((n) => n.trim()).filter((n) => n.length > 0);
    if (participants.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["name"], message: "at least one participant is required" });
      return z.NEVER;
    }
    const [hh, mm] = row.time.split(":");
    return {
      time: `${hh.padStart(2, "0")}:${mm}`,
      participants,
      participantSpec: row.name.trim(),
      days: row.days,
      action: row.action,
      label: row.label || row.action,
    };
  });

export function isRotating(entry: ScheduleEntry): boolean {
  return entry.participants.length > 1;
}

export class ScheduleStore {
  private loadedMtime: number | undefined;
  private current: ScheduleEntry[] = [];

  constructor(readonly file: string) {}

  get entries(): readonly ScheduleEntry[] {
    return this.current;
  }

  /** Replaces the loaded entries wholesale. Malformed rows are skipped with a warning. */
  async load(): Promise<ScheduleEntry[]> {
    this.loadedMtime = await this.mtime();
    const result = await readCsvFile(this.file, scheduleRowSchema);
    if (!result) {
      console.warn(`[schedule] ${this.file} not found, schedule is empty`);
      this.current = [];
      return this.current;
    }
    for (const r of result.rejected) {
      console.warn(`[schedule] skipping row ${r.row} (${r.reason}): ${JSON.stringify(r.raw)}`);
    }
    this.current = result.rows;
    console.log(`[schedule] loaded ${result.rows.length} entries from ${this.file}`);
    return this.current;
  }

  async hasChanged(): Promise<boolean> {
    return (await this.mtime()) !== this.loadedMtime;
  }

  async mtime(): Promise<number | undefined> {
    try {
      return (await fs.stat(this.file)).mtimeMs;
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }
}
