// config.ts
import path from "node:path";
import { z } from "zod";

export const DEFAULT_DATA_DIR = "./data";

export const POLL_INTERVAL_MS = 1000;
export const TRIGGER_WINDOW_SECONDS = 20;
export const EXPIRY_MINUTES = 60;
export const DUMP_DAYS = 14;

export const CONTENT_CATEGORIES = ["story", "quote", "joke"] as const;
export type ContentCategory = (typeof CONTENT_CATEGORIES)[number];

// Written to the schedule file on first run when none exists
export const SAMPLE_SCHEDULE = [
  { time: "07:15", name: "Frank:Alice:Tom", days: "Monday-Friday", action: "empty the dishwasher", label: "Dishes" },
  { time: "07:45", name: "Alice", days: "Monday,Wednesday,Friday", action: "feed the cat", label: "Cat" },
  { time: "08:00", name: "Everyone", days: "Saturday-Sunday", action: "quote", label: "Quote" },
  { time: "17:30", name: "Tom:Frank", days: "Tuesday,Thursday", action: "take out the recycling", label: "Recycling" },
  { time: "18:30", name: "Frank:Alice:Tom", days: "All", action: "set the table", label: "Table" },
  { time: "19:30", name: "Everyone", days: "*", action: "joke", label: "Joke" },
  { time: "20:00", name: "Frank:Alice:Tom", days: "Monday-Friday", action: "shower", label: "Shower" },
  { time: "20:30", name: "Everyone", days: "Friday-Sunday", action: "story", label: "Story" },
];

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
  SCHEDULE_FILE: z.string().min(1).optional(),
  ROTATION_FILE: z.string().min(1).optional(),
  TASK_LOG_FILE: z.string().min(1).optional(),
  CONTENT_DIR: z.string().min(1).optional(),
  POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(POLL_INTERVAL_MS),
  TRIGGER_WINDOW_SECONDS: z.coerce.number().int().min(1).max(300).default(TRIGGER_WINDOW_SECONDS),
  EXPIRY_MINUTES: z.coerce.number().int().min(1).default(EXPIRY_MINUTES),
  DUMP_DAYS: z.coerce.number().int().min(1).max(366).default(DUMP_DAYS),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  SEED_SAMPLE: flag.default("true"),
});

export type RotaConfig = {
  scheduleFile: string;
  rotationFile: string;
  taskLogFile: string;
  contentDir: string;
  pollIntervalMs: number;
  triggerWindowSeconds: number;
  expiryMinutes: number;
  dumpDays: number;
  port: number;
  seedSample: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RotaConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  const dir = e.DATA_DIR;
  return {
    scheduleFile: e.SCHEDULE_FILE ?? path.join(dir, "schedule.csv"),
    rotationFile: e.ROTATION_FILE ?? path.join(dir, "rotations.csv"),
    taskLogFile: e.TASK_LOG_FILE ?? path.join(dir, "task-log.csv"),
    contentDir: e.CONTENT_DIR ?? path.join(dir, "content"),
    pollIntervalMs: e.POLL_INTERVAL_MS,
    triggerWindowSeconds: e.TRIGGER_WINDOW_SECONDS,
    expiryMinutes: e.EXPIRY_MINUTES,
    dumpDays: e.DUMP_DAYS,
    port: e.PORT,
    seedSample: e.SEED_SAMPLE,
  };
}
