// resolver.ts
import { addDays, differenceInCalendarDays } from "date-fns";
import { fromDateKey } from "./dates.js";
import { DAY_NAMES, dayNameOf, matchesDayRange } from "./days.js";
import type { RotationDefinition } from "./rotation.js";

/**
 * Signed number of days matching `days` between `anchor` and `target`:
 * the days in (anchor, target] when target is later, minus those in (target, anchor] when earlier.
 */
export function countOccurrences(anchor: Date, target: Date, days: string): number {
  const diff = differenceInCalendarDays(target, anchor);
  if (diff === 0) return 0;
  const from = diff > 0 ? anchor : target;
  const span = Math.abs(diff);

  // every full week holds each weekday exactly once
  const weeks = Math.floor(span / 7);
  const perWeek = DAY_NAMES.filter((d) => matchesDayRange(d, days)).length;
  let count = weeks * perWeek;
  for (let i = weeks * 7 + 1; i <= span; i++) {
    if (matchesDayRange(dayNameOf(addDays(from, i)), days)) count++;
  }
  return diff > 0 ? count : -count;
}

/** Who is up on `date`. Read-only; `undefined` when there is no definition or nobody in it. */
export function assignedPerson(def: RotationDefinition | undefined, date: Date): string | undefined {
  if (!def || def.participants.length === 0) return undefined;
  const n = def.participants.length;
  const occurrences = countOccurrences(fromDateKey(def.anchor), date, def.key.days);
  return def.participants[((occurrences % n) + n) % n];
}
