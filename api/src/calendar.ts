// calendar.ts
import { createEvents, type EventAttributes } from "ics";
import { fromDateKey } from "./dates.js";
import type { AssignmentRow } from "./scheduler.js";

const slug = (s: string) => s.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");

/** iCalendar feed of the assignments that fall to `person`, each as a 30 minute event. */
export function personCalendar(rows: readonly AssignmentRow[], person: string): string {
  const events: EventAttributes[] = rows
    .filter((r) => r.person === person)
    .map((r): EventAttributes => {
      const day = fromDateKey(r.date);
      const [hh, mm] = r.time.split(":").map((x) => parseInt(x, 10));
      return {
        uid: `${r.date}-${r.time.replace(":", "")}-${slug(r.action)}-${slug(person)}@household-rota`,
        title: `${r.label} – ${person}`,
        description: r.rotating ? `Rotating: ${r.action}` : r.action,
        start: [day.getFullYear(), day.getMonth() + 1, day.getDate(), hh, mm || 0],
        startInputType: "local",
        startOutputType: "local",
        duration: { minutes: 30 },
      };
    });

  const { error, value } = createEvents(events);
  if (error || value === undefined) {
    throw new Error(`Could not build calendar for ${person}: ${error ? error.message : "no output"}`);
  }
  return value;
}
