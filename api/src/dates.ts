// dates.ts
import { format, isValid, parse, set } from "date-fns";

const DATE_KEY = "yyyy-MM-dd";

export function toDateKey(date: Date): string {
  return format(date, DATE_KEY);
}

export function fromDateKey(key: string): Date {
  return parse(key, DATE_KEY, new Date());
}

export function isDateKey(value: string): boolean {
  const d = fromDateKey(value);
  return isValid(d) && toDateKey(d) === value;
}

/** `time` is HH:MM or HH:MM:SS; the result is on the calendar day of `day`. */
export function atTimeOfDay(day: Date, time: string): Date {
  const [h, m, s] = time.split(":").map((part) => parseInt(part, 10));
  return set(day, { hours: h, minutes: m, seconds: s || 0, milliseconds: 0 });
}
