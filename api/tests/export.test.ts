import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { personCalendar } from "../src/calendar.js";
import { renderRosterPdf } from "../src/pdf.js";
import type { AssignmentRow } from "../src/scheduler.js";

const rows: AssignmentRow[] = [
  { date: "2023-01-04", day: "Wednesday", time: "18:30", label: "Table", action: "set the table", person: "A", rotating: true },
  { date: "2023-01-04", day: "Wednesday", time: "20:00", label: "Shower", action: "shower", person: "Frank", rotating: true },
  { date: "2023-01-05", day: "Thursday", time: "18:30", label: "Table", action: "set the table", person: "Frank", rotating: true },
];

describe("personCalendar", () => {
  it("contains one event per assignment of that person", () => {
    const ics = personCalendar(rows, "Frank");
    expect(ics.match(/BEGIN:VEVENT/g)).toHaveLength(2);
    expect(ics).toContain("UID:2023-01-04-2000-shower-frank@household-rota");
    expect(ics).toContain("UID:2023-01-05-1830-set-the-table-frank@household-rota");
  });
});

describe("renderRosterPdf", () => {
  it("writes a complete PDF document", async () => {
    const out = new PassThrough();
    const chunks: Buffer[] = [];
    out.on("data", (c: Buffer) => chunks.push(c));
    const finished = new Promise<void>((resolve) => out.on("end", () => resolve()));

    renderRosterPdf(out, { dates: ["2023-01-04", "2023-01-05"], rows });
    await finished;

    const pdf = Buffer.concat(chunks).toString("latin1");
    expect(pdf.startsWith("%PDF-")).toBe(true);
    expect(pdf.trimEnd().endsWith("%%EOF")).toBe(true);
  });
});
