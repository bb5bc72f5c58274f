// days.ts
import { getDay } from "date-fns";

export const DAY_NAMES = [
  "Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday",
] as const;

export type DayName = (typeof DAY_NAMES)[number];

const ALWAYS = new Set(["sunday-saturday", "all", "*"]);
const RANGE = /^([A-Za-z]+)\s*-\s*([A-Za-z]+)$/;

// Sunday=0..Saturday=6, or -1 for anything that is not a day name
export function dayIndex(name: string): number {
  const n = name.trim().toLowerCase();
  return DAY_NAMES.findIndex((d) => d.toLowerCase() === n);
}

export function dayNameOf(date: Date): DayName {
  return DAY_NAMES[getDay(date)];
}

/**
 * Is `currentDay` inside `spec`?
 *
 * Grammar, in precedence order:
 *  - "Sunday-Saturday", "All", "*": every day
 *  - "Monday,Wednesday,Friday": explicit set
 *  - "Friday-Monday": inclusive range, wrapping across the week boundary when start > end
 *  - anything else: exact match against the day name
 *
 * Never throws; an empty spec or unknown day names in a range log a warning and match nothing.
 */
export function matchesDayRange(currentDay: string, spec: string): boolean {
  const s = spec.trim();
  const day = currentDay.trim();
  if (!s) {
    console.warn("[days] empty day-range spec");
    return false;
  }
  if (ALWAYS.has(s.toLowerCase())) return true;

  if (s.includes(",")) {
    return s.split(",").some((part) => part.trim() === day);
  }

  const range = RANGE.exec(s);
  if (range) {
    const start = dayIndex(range[1]);
    let end = dayIndex(range[2]);
    let current = dayIndex(day);
    if (start < 0 || end < 0 || current < 0) {
      console.warn(`[days] unknown day name in range "${s}" (current day "${day}")`);
      return false;
    }
    if (start > end) end += 7;
    if (current < start) current += 7;
    return current >= start && current <= end;
  }

  return s === day;
}

// False for specs that can never match
export function isValidDayRange(spec: string): boolean {
  const s = spec.trim();
  if (!s) return false;
  if (ALWAYS.has(s.toLowerCase())) return true;
  if (s.includes(",")) {
    const parts = s.split(",").map((p) => p.trim());
    return parts.every((p) => DAY_NAMES.some((d) => d === p));
  }
  const range = RANGE.exec(s);
  if (range) return dayIndex(range[1]) >= 0 && dayIndex(range[2]) >= 0;
  return DAY_NAMES.some((d) => d === s);
}
