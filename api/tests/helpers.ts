import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { TaskNotifier } from "../src/notify.js";
import type { ScheduleEntry } from "../src/schedule.js";

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "household-rota-"));
}

export function entry(time: string, names: string, days: string, action: string, label = action): ScheduleEntry {
  const participants = names.split(":").map((n) => n.trim());
  return { time, participants, participantSpec: names, days, action, label };
}

export function recordingNotifier() {
  return {
    onTaskFired: vi.fn(),
    onNextTaskChanged: vi.fn(),
    onLastTaskChanged: vi.fn(),
  } satisfies TaskNotifier;
}

export function quietConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    warn: vi.spyOn(console, "warn").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}
