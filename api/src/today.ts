// today.ts
import { isSameDay } from "date-fns";
import { atTimeOfDay, toDateKey } from "./dates.js";
import { dayNameOf, matchesDayRange } from "./days.js";
import { assignedPerson } from "./resolver.js";
import { rotationKeyId, rotationKeyOf, type RotationMap } from "./rotation.js";
import { isRotating, type ScheduleEntry } from "./schedule.js";

// Not the rotation key: entries that share one but differ in names stay apart
export type TaskKey = { time: string; participantSpec: string; action: string };

export type TaskInstance = {
  key: TaskKey;
  entry: ScheduleEntry;
  scheduledAt: Date;
  assignee: string | undefined;
  called: boolean;
  completed: boolean;
  injected: boolean;
};

export type TaskInstances = Map<string, TaskInstance>;

export function taskKeyOf(entry: ScheduleEntry): TaskKey {
  return { time: entry.time.trim(), participantSpec: entry.participantSpec.trim(), action: entry.action.trim() };
}

export function taskKeyId(key: TaskKey): string {
  return JSON.stringify([key.time, key.participantSpec, key.action]);
}

/** Rotating entries go through their rotation; anything unresolvable falls back to the first name. */
export function resolveAssignee(entry: ScheduleEntry, rotations: RotationMap, date: Date): string {
  if (!isRotating(entry)) return entry.participants[0];
  const id = rotationKeyId(rotationKeyOf(entry));
  const person = assignedPerson(rotations.get(id), date);
  if (person === undefined) {
    console.warn(`[today] no rotation for "${id}" (action "${entry.action}"), using ${entry.participants[0]}`);
    return entry.participants[0];
  }
  return person;
}

/**
 * Instances for every entry that runs on `today`.
 *
 * Instances in `previous` from the same calendar day are carried over: one that has already
 * fired is kept as is and one that expired keeps its flags. Of the instances with no entry in
 * the new schedule only injected and already fired ones survive; pending instances of removed
 * or edited rows are dropped.
 */
export function buildTodaysTasks(
  entries: readonly ScheduleEntry[],
  rotations: RotationMap,
  today: Date,
  previous?: TaskInstances,
): TaskInstances {
  const dayName = dayNameOf(today);
  const fresh: TaskInstances = new Map();
  for (const entry of entries) {
    if (!matchesDayRange(dayName, entry.days)) continue;
    const key = taskKeyOf(entry);
    fresh.set(taskKeyId(key), {
      key,
      entry,
      scheduledAt: atTimeOfDay(today, entry.time),
      assignee: resolveAssignee(entry, rotations, today),
      called: false,
      completed: false,
      injected: false,
    });
  }

  if (!previous) return fresh;
  let carried = 0;
  let dropped = 0;
  for (const [id, old] of previous) {
    if (!isSameDay(old.scheduledAt, today)) continue;
    const next = fresh.get(id);
    if (!next) {
      if (old.injected || old.called) {
        fresh.set(id, old);
        carried++;
      } else {
        dropped++;
      }
    } else if (old.called) {
      fresh.set(id, old);
    } else if (old.completed) {
      next.completed = true;
    }
  }
  if (carried > 0) console.log(`[today] carried ${carried} unscheduled instances forward on ${toDateKey(today)}`);
  if (dropped > 0) console.log(`[today] dropped ${dropped} pending instances no longer in the schedule`);
  return fresh;
}

export function sortedInstances(instances: TaskInstances): TaskInstance[] {
  return [...instances.values()].sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime());
}
