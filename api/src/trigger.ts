// trigger.ts
import { differenceInMilliseconds, format } from "date-fns";
import { contentCategoryOf, type ContentDecks, type DrawnItem } from "./content.js";
import { toDateKey } from "./dates.js";
import { errorMessage } from "./errors.js";
import type { TaskNotifier, TaskSummary } from "./notify.js";
import type { RotationMap } from "./rotation.js";
import type { TaskLog } from "./tasklog.js";
import { resolveAssignee, sortedInstances, type TaskInstance, type TaskInstances } from "./today.js";

export type TriggerOptions = {
  windowSeconds: number;
  expiryMinutes: number;
};

export type TriggerDeps = {
  rotations: RotationMap;
  decks: ContentDecks;
  log: TaskLog;
  notifier: TaskNotifier;
  options: TriggerOptions;
};

export type TriggerResult = {
  fired: TaskInstance | undefined;
  expired: TaskInstance[];
};

export type Alert = { person: string; displayText: string; speechText: string };

const isPending = (t: TaskInstance) => !t.called && !t.completed;

/**
 * One pass over today's instances:
 *  1. pending instances more than `expiryMinutes` old are completed without firing
 *  2. the first pending instance within ±`windowSeconds` of `now` fires; at most one per pass
 */
export async function runTriggerPass(instances: TaskInstances, deps: TriggerDeps, now: Date): Promise<TriggerResult> {
  const { windowSeconds, expiryMinutes } = deps.options;
  const expired: TaskInstance[] = [];

  for (const t of instances.values()) {
    if (isPending(t) && differenceInMilliseconds(now, t.scheduledAt) > expiryMinutes * 60_000) {
      t.completed = true;
      expired.push(t);
      console.warn(`[trigger] ${t.key.time} "${t.key.action}" for ${t.key.participantSpec} expired without firing`);
    }
  }

  for (const t of instances.values()) {
    if (!isPending(t)) continue;
    if (Math.abs(differenceInMilliseconds(now, t.scheduledAt)) > windowSeconds * 1000) continue;
    await fire(t, deps, now);
    return { fired: t, expired };
  }
  return { fired: undefined, expired };
}

async function fire(t: TaskInstance, deps: TriggerDeps, now: Date): Promise<void> {
  // flip first so a failure further down can never make it fire twice
  t.called = true;
  t.completed = true;

  const alert = await buildAlert(t, deps, now);
  try {
    await deps.log.append({
      date: toDateKey(now),
      time: format(now, "HH:mm:ss"),
      scheduled: t.key.time,
      days: t.entry.days,
      person: alert.person,
      action: t.entry.action,
    });
  } catch (err) {
    console.error(`[trigger] could not log "${t.key.action}": ${errorMessage(err)}`);
  }
  try {
    await deps.notifier.onTaskFired(t, alert.displayText, alert.speechText);
  } catch (err) {
    console.error(`[trigger] notifier failed for "${t.key.action}": ${errorMessage(err)}`);
  }
}

export async function buildAlert(t: TaskInstance, deps: Pick<TriggerDeps, "rotations" | "decks">, now: Date): Promise<Alert> {
  const category = contentCategoryOf(t.entry.action);
  if (!t.assignee) t.assignee = resolveAssignee(t.entry, deps.rotations, now);
  const person = t.assignee;

  if (category) {
    let item: DrawnItem | undefined;
    try {
      item = await deps.decks.draw(category);
    } catch (err) {
      console.error(`[trigger] could not draw a ${category}: ${errorMessage(err)}`);
    }
    if (!item) {
      return { person, displayText: `${t.entry.label}: nothing to share today`, speechText: `I have no ${category} for you today.` };
    }
    return { person, displayText: item.text, speechText: `Here is a ${category}. ${item.text}` };
  }

  return {
    person,
    displayText: `${person}: ${t.entry.label}`,
    speechText: `${person}, it is time to ${t.entry.action}.`,
  };
}

/** Earliest instance that has not been called or expired. */
export function nextTask(instances: TaskInstances): TaskInstance | undefined {
  return sortedInstances(instances).find(isPending);
}

/** Latest instance that actually fired. */
export function lastTask(instances: TaskInstances): TaskInstance | undefined {
  return sortedInstances(instances).filter((t) => t.called).pop();
}

export function summarize(t: TaskInstance | undefined): TaskSummary | null {
  if (!t) return null;
  return {
    time: t.key.time,
    person: t.assignee ?? t.entry.participants[0],
    action: t.entry.action,
    label: t.entry.label,
  };
}
