// api/src/seed.ts
import fs from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { config as loadEnv } from "dotenv";
import { SAMPLE_SCHEDULE, loadConfig } from "./config.js";
import { isNotFound, writeCsvAtomic } from "./csv.js";
import { SCHEDULE_COLUMNS } from "./schedule.js";

/** Writes the sample schedule unless a schedule already exists (or `force`). */
export async function seedSchedule(file: string, force = false): Promise<boolean> {
  if (!force) {
    try {
      await fs.stat(file);
      return false;
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }
  await writeCsvAtomic(file, SCHEDULE_COLUMNS, SAMPLE_SCHEDULE);
  return true;
}

async function main() {
  loadEnv();
  const { scheduleFile } = loadConfig();
  console.log("🌱 Seeding schedule...");
  const written = await seedSchedule(scheduleFile, process.argv.includes("--force"));
  console.log(written
    ? `✅ Wrote ${SAMPLE_SCHEDULE.length} sample entries to ${scheduleFile}`
    : `${scheduleFile} already exists, pass --force to overwrite it`);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
