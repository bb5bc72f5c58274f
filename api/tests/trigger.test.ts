import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ContentDecks } from "../src/content.js";
import { buildRotations } from "../src/rotation.js";
import type { ScheduleEntry } from "../src/schedule.js";
import { TaskLog } from "../src/tasklog.js";
import { buildTodaysTasks, taskKeyId, taskKeyOf } from "../src/today.js";
import { lastTask, nextTask, runTriggerPass, summarize, type TriggerDeps } from "../src/trigger.js";
import { entry, quietConsole, recordingNotifier, tempDir } from "./helpers.js";

const shower = entry("20:00", "Frank:Alice:Tom", "Monday-Friday", "shower", "Shower");
const cat = entry("07:45", "Alice", "Monday,Wednesday,Friday", "feed the cat", "Cat");

const at = (h: number, m: number, s = 0) => new Date(2023, 0, 4, h, m, s);

let dir: string;
let notifier: ReturnType<typeof recordingNotifier>;

beforeEach(async () => {
  dir = await tempDir();
  await fs.writeFile(path.join(dir, "jokes.txt"), "first joke\nsecond joke\n");
  notifier = recordingNotifier();
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

function setup(entries: ScheduleEntry[]) {
  const rotations = buildRotations(entries, new Date(2023, 0, 1));
  const instances = buildTodaysTasks(entries, rotations, at(6, 0));
  const deps: TriggerDeps = {
    rotations,
    decks: new ContentDecks(dir, () => 0),
    log: new TaskLog(path.join(dir, "task-log.csv")),
    notifier,
    options: { windowSeconds: 20, expiryMinutes: 60 },
  };
  return { instances, deps };
}

describe("runTriggerPass", () => {
  it("fires an instance once when polled inside the window", async () => {
    const { instances, deps } = setup([shower]);
    const task = instances.get(taskKeyId(taskKeyOf(shower)));

    expect((await runTriggerPass(instances, deps, at(19, 59, 30))).fired).toBeUndefined();
    expect((await runTriggerPass(instances, deps, at(19, 59, 45))).fired).toBe(task);
    expect((await runTriggerPass(instances, deps, at(19, 59, 50))).fired).toBeUndefined();

    expect(notifier.onTaskFired).toHaveBeenCalledTimes(1);
    expect(notifier.onTaskFired).toHaveBeenCalledWith(task, "Frank: Shower", "Frank, it is time to shower.");
    expect(task).toMatchObject({ called: true, completed: true, assignee: "Frank" });
    expect(await deps.log.recent(10)).toEqual([
      { date: "2023-01-04", time: "19:59:45", scheduled: "20:00", days: "Monday-Friday", person: "Frank", action: "shower" },
    ]);
  });

  it("includes the edge of the window", async () => {
    const { instances, deps } = setup([shower]);
    expect((await runTriggerPass(instances, deps, at(20, 0, 20))).fired?.key.action).toBe("shower");
  });

  it("expires stale instances without firing them", async () => {
    const { warn } = quietConsole();
    const { instances, deps } = setup([shower]);
    const task = instances.get(taskKeyId(taskKeyOf(shower)));

    const halfHourLate = await runTriggerPass(instances, deps, at(20, 30));
    expect(halfHourLate).toEqual({ fired: undefined, expired: [] });
    expect(task).toMatchObject({ called: false, completed: false });

    const hourLate = await runTriggerPass(instances, deps, at(21, 0, 1));
    expect(hourLate.fired).toBeUndefined();
    expect(hourLate.expired).toEqual([task]);
    expect(task).toMatchObject({ called: false, completed: true });
    expect(notifier.onTaskFired).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[trigger] 20:00 "shower" for Frank:Alice:Tom expired without firing');
  });

  it("fires at most one instance per pass", async () => {
    const bins = entry("20:00", "Tom", "Monday-Friday", "take out the bins", "Bins");
    const { instances, deps } = setup([shower, bins]);

    expect((await runTriggerPass(instances, deps, at(20, 0))).fired?.key.action).toBe("shower");
    expect((await runTriggerPass(instances, deps, at(20, 0, 5))).fired?.key.action).toBe("take out the bins");
    expect(notifier.onTaskFired).toHaveBeenCalledTimes(2);
  });

  it("draws from the content deck for content actions", async () => {
    const joke = entry("19:30", "Everyone", "*", "joke", "Joke");
    const { instances, deps } = setup([joke]);

    const { fired } = await runTriggerPass(instances, deps, at(19, 30, 2));
    expect(notifier.onTaskFired).toHaveBeenCalledWith(fired, "first joke", "Here is a joke. first joke");
    expect(await fs.readFile(path.join(dir, "jokes.used"), "utf8")).toBe("0\n");
    expect((await deps.log.recent(1))[0]).toMatchObject({ person: "Everyone", action: "joke", scheduled: "19:30" });
  });

  it("still fires a content action whose deck is empty", async () => {
    quietConsole();
    const story = entry("19:30", "Everyone", "*", "story", "Story");
    const { instances, deps } = setup([story]);

    const { fired } = await runTriggerPass(instances, deps, at(19, 30));
    expect(notifier.onTaskFired).toHaveBeenCalledWith(fired, "Story: nothing to share today", "I have no story for you today.");
  });

  it("completes the instance even when the notifier throws", async () => {
    const { error } = quietConsole();
    notifier.onTaskFired.mockImplementation(() => {
      throw new Error("speaker unplugged");
    });
    const { instances, deps } = setup([shower]);

    const { fired } = await runTriggerPass(instances, deps, at(20, 0));
    expect(fired).toMatchObject({ called: true, completed: true });
    expect(error).toHaveBeenCalledWith('[trigger] notifier failed for "shower": speaker unplugged');
    expect((await runTriggerPass(instances, deps, at(20, 0, 1))).fired).toBeUndefined();
  });
});

describe("next and last task", () => {
  it("tracks the earliest pending and the latest fired instance", async () => {
    quietConsole();
    const { instances, deps } = setup([shower, cat]);

    expect(nextTask(instances)?.key.action).toBe("feed the cat");
    expect(lastTask(instances)).toBeUndefined();

    await runTriggerPass(instances, deps, at(19, 59, 45));

    expect(nextTask(instances)).toBeUndefined();
    expect(summarize(lastTask(instances))).toEqual({ time: "20:00", person: "Frank", action: "shower", label: "Shower" });
    expect(summarize(undefined)).toBeNull();
  });
});
