// rotation.ts
import fs from "node:fs/promises";
import { subDays } from "date-fns";
import { z } from "zod";
import { isNotFound, readCsvFile, writeCsvAtomic } from "./csv.js";
import { fromDateKey, isDateKey, toDateKey } from "./dates.js";
import { dayNameOf, matchesDayRange } from "./days.js";
import { RotaError, errorMessage } from "./errors.js";
import { isRotating, type ScheduleEntry } from "./schedule.js";

export type RotationKey = { time: string; days: string; action: string };

export type RotationDefinition = {
  key: RotationKey;
  anchor: string; // yyyy-MM-dd
  participants: string[];
};

// keyed by rotationKeyId
export type RotationMap = Map<string, RotationDefinition>;

export const ROTATION_COLUMNS = ["key", "anchor", "position", "name", "rotating"] as const;

const SEP = "|";

export function rotationKey(time: string, days: string, action: string): RotationKey {
  return { time: time.trim(), days: days.trim(), action: action.trim() };
}

export function rotationKeyOf(entry: ScheduleEntry): RotationKey {
  return rotationKey(entry.time, entry.days, entry.action);
}

export function rotationKeyId(key: RotationKey): string {
  return [key.time, key.days, key.action].join(SEP);
}

export function parseRotationKeyId(id: string): RotationKey | undefined {
  const first = id.indexOf(SEP);
  const second = first < 0 ? -1 : id.indexOf(SEP, first + 1);
  if (second < 0) return undefined;
  const key = rotationKey(id.slice(0, first), id.slice(first + 1, second), id.slice(second + 1));
  return key.time && key.days && key.action ? key : undefined;
}

/** One definition per rotating entry, all anchored on `today`. Later duplicates of a key win. */
export function buildRotations(entries: readonly ScheduleEntry[], today: Date): RotationMap {
  const anchor = toDateKey(today);
  const map: RotationMap = new Map();
  for (const entry of entries) {
    if (!isRotating(entry)) continue;
    const key = rotationKeyOf(entry);
    const id = rotationKeyId(key);
    if (map.has(id)) console.warn(`[rotation] duplicate rotation key "${id}", keeping the later entry`);
    map.set(id, { key, anchor, participants: [...entry.participants] });
  }
  return map;
}

/**
 * Moves the anchor back by exactly one matching day, so every resolution shifts one slot forward.
 * An anchor on a non-matching day is first snapped back to the nearest matching day.
 */
export function advanceRotation(def: RotationDefinition): RotationDefinition {
  const matches = (d: Date) => matchesDayRange(dayNameOf(d), def.key.days);
  let anchor = fromDateKey(def.anchor);
  for (let i = 0; i < 7 && !matches(anchor); i++) anchor = subDays(anchor, 1);
  if (!matches(anchor)) {
    console.warn(`[rotation] "${rotationKeyId(def.key)}" matches no day of the week, not advancing`);
    return def;
  }
  let previous = subDays(anchor, 1);
  for (let i = 0; i < 7 && !matches(previous); i++) previous = subDays(previous, 1);
  return { ...def, anchor: toDateKey(previous) };
}

export function advanceAll(map: RotationMap): RotationMap {
  const next: RotationMap = new Map();
  for (const [id, def] of map) next.set(id, advanceRotation(def));
  return next;
}

/** True when every rotating entry of the schedule has a definition with the same participants. */
export function coversSchedule(map: RotationMap, entries: readonly ScheduleEntry[]): boolean {
  return entries.filter(isRotating).every((entry) => {
    const def = map.get(rotationKeyId(rotationKeyOf(entry)));
    return def !== undefined && def.participants.join(":") === entry.participants.join(":");
  });
}

const rotationRowSchema = z.object({
  key: z.string().min(1),
  anchor: z.string().trim().refine(isDateKey, "expected yyyy-MM-dd"),
  position: z.coerce.number().int().min(1),
  name: z.string().trim().min(1),
  rotating: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((v) => v === undefined || v === "" || v === "true" || v === "1"),
});

export class RotationStateStore {
  constructor(readonly file: string) {}

  async save(map: RotationMap): Promise<void> {
    const rows = [...map.values()].flatMap((def) =>
      def.participants.map((name, i) => ({
        key: rotationKeyId(def.key),
        anchor: def.anchor,
        position: i + 1,
        name,
        rotating: "true",
      })),
    );
    await writeCsvAtomic(this.file, ROTATION_COLUMNS, rows);
  }

  /** `undefined` when there is no state file; throws `rotation_state_corrupt` on anything unreadable. */
  async load(): Promise<RotationMap | undefined> {
    const result = await readCsvFile(this.file, rotationRowSchema).catch((err: unknown) => {
      throw new RotaError("rotation_state_corrupt", `Cannot read ${this.file}: ${errorMessage(err)}`, { cause: err });
    });
    if (!result) return undefined;
    if (result.rejected.length > 0) {
      const r = result.rejected[0];
      throw new RotaError("rotation_state_corrupt", `Bad row ${r.row} in ${this.file}: ${r.reason}`);
    }

    const groups = new Map<string, { key: RotationKey; anchor: string; slots: Map<number, string> }>();
    for (const row of result.rows) {
      if (!row.rotating) continue;
      const key = parseRotationKeyId(row.key);
      if (!key) throw new RotaError("rotation_state_corrupt", `Malformed rotation key "${row.key}"`);
      const id = rotationKeyId(key);
      const group = groups.get(id) ?? { key, anchor: row.anchor, slots: new Map<number, string>() };
      if (group.anchor !== row.anchor) {
        throw new RotaError("rotation_state_corrupt", `Conflicting anchors for "${id}": ${group.anchor} and ${row.anchor}`);
      }
      if (group.slots.has(row.position)) {
        throw new RotaError("rotation_state_corrupt", `Duplicate position ${row.position} for "${id}"`);
      }
      group.slots.set(row.position, row.name);
      groups.set(id, group);
    }

    const map: RotationMap = new Map();
    for (const [id, g] of groups) {
      const participants = [...g.slots.entries()].sort((a, b) => a[0] - b[0]).map(([, name]) => name);
      map.set(id, { key: g.key, anchor: g.anchor, participants });
    }
    return map;
  }

  async mtime(): Promise<number | undefined> {
    try {
      return (await fs.stat(this.file)).mtimeMs;
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  /**
   * Reloads persisted state unless `rebuild` is set, the file is missing or corrupt, or it no
   * longer covers the schedule; otherwise rebuilds from `entries` anchored on `today` and persists.
   * A failed write is logged and the rebuilt state is still returned.
   */
  async loadOrRebuild(entries: readonly ScheduleEntry[], today: Date, rebuild = false): Promise<RotationMap> {
    if (!rebuild) {
      try {
        const loaded = await this.load();
        if (loaded && coversSchedule(loaded, entries)) {
          console.log(`[rotation] loaded ${loaded.size} rotations from ${this.file}`);
          return loaded;
        }
        console.log(loaded ? "[rotation] stored rotations do not match the schedule, rebuilding" : "[rotation] no rotation state, rebuilding");
      } catch (err) {
        if (!(err instanceof RotaError)) throw err;
        console.warn(`[rotation] ${err.message}, rebuilding`);
      }
    }
    const built = buildRotations(entries, today);
    try {
      await this.save(built);
      console.log(`[rotation] rebuilt ${built.size} rotations anchored ${toDateKey(today)}`);
    } catch (err) {
      console.error(`[rotation] ${errorMessage(err)}`);
    }
    return built;
  }
}
