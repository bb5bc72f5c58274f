import { addDays } from "date-fns";
import { describe, expect, it } from "vitest";
import { matchesDayRange, dayNameOf } from "../src/days.js";
import { assignedPerson, countOccurrences } from "../src/resolver.js";
import { rotationKey, type RotationDefinition } from "../src/rotation.js";

const daily: RotationDefinition = {
  key: rotationKey("18:30", "All", "set the table"),
  anchor: "2023-01-10",
  participants: ["A", "B", "C"],
};

const weekdays: RotationDefinition = {
  key: rotationKey("20:00", "Monday-Friday", "shower"),
  anchor: "2023-01-01",
  participants: ["Frank", "Alice", "Tom"],
};

const D = new Date(2023, 0, 10);

function bruteForce(anchor: Date, target: Date, days: string): number {
  let n = 0;
  if (target > anchor) {
    for (let d = addDays(anchor, 1); d <= target; d = addDays(d, 1)) if (matchesDayRange(dayNameOf(d), days)) n++;
    return n;
  }
  for (let d = addDays(target, 1); d <= anchor; d = addDays(d, 1)) if (matchesDayRange(dayNameOf(d), days)) n++;
  return -n;
}

describe("assignedPerson", () => {
  it("gives the anchor day to the first participant", () => {
    expect(assignedPerson(daily, D)).toBe("A");
    expect(assignedPerson(weekdays, new Date(2023, 0, 1, 23, 59))).toBe("Frank");
  });

  it("steps one participant per matching day", () => {
    expect(assignedPerson(daily, addDays(D, 1))).toBe("B");
    expect(assignedPerson(daily, addDays(D, 2))).toBe("C");
    expect(assignedPerson(daily, addDays(D, 3))).toBe("A");
  });

  it("resolves dates before the anchor", () => {
    expect(assignedPerson(daily, addDays(D, -1))).toBe("C");
    expect(assignedPerson(daily, addDays(D, -3))).toBe("A");
  });

  it("only counts days inside the day range", () => {
    // Mon 2nd, Tue 3rd, Wed 4th
    expect(assignedPerson(weekdays, new Date(2023, 0, 2))).toBe("Alice");
    expect(assignedPerson(weekdays, new Date(2023, 0, 4))).toBe("Frank");
    // five weekdays by Friday 6th; the weekend keeps Friday's person
    expect(assignedPerson(weekdays, new Date(2023, 0, 6))).toBe("Tom");
    expect(assignedPerson(weekdays, new Date(2023, 0, 7))).toBe("Tom");
    expect(assignedPerson(weekdays, new Date(2023, 0, 9))).toBe("Frank");
  });

  it("returns undefined without a definition or participants", () => {
    expect(assignedPerson(undefined, D)).toBeUndefined();
    expect(assignedPerson({ ...daily, participants: [] }, D)).toBeUndefined();
  });
});

describe("countOccurrences", () => {
  it("is zero on the anchor", () => {
    expect(countOccurrences(D, D, "Monday-Friday")).toBe(0);
  });

  it("counts weekdays over a long span", () => {
    expect(countOccurrences(new Date(2023, 0, 1), new Date(2023, 2, 1), "Monday-Friday")).toBe(43);
  });

  it("is negative before the anchor", () => {
    // Tue..Fri of the week of Monday 2nd
    expect(countOccurrences(new Date(2023, 0, 6), new Date(2023, 0, 2), "Monday-Friday")).toBe(-4);
  });

  it("agrees with a day-by-day count", () => {
    const anchor = new Date(2023, 4, 17);
    for (const days of ["Friday-Monday", "Tuesday,Saturday", "Sunday", "All"]) {
      for (const offset of [-40, -9, -1, 1, 6, 7, 8, 15, 100]) {
        const target = addDays(anchor, offset);
        expect(countOccurrences(anchor, target, days)).toBe(bruteForce(anchor, target, days));
      }
    }
  });
});
