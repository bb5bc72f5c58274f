// scheduler.ts
// The polling loop. Owns every piece of mutable state; ticks and operator actions run one at a time.
import { addDays, addSeconds, format } from "date-fns";
import type { ContentCategory, RotaConfig } from "./config.js";
import { ContentDecks } from "./content.js";
import { toDateKey } from "./dates.js";
import { dayNameOf, matchesDayRange, type DayName } from "./days.js";
import { RotaError, errorMessage } from "./errors.js";
import { ConsoleNotifier, type TaskNotifier, type TaskSummary } from "./notify.js";
import { RotationStateStore, advanceAll, type RotationMap } from "./rotation.js";
import { ScheduleStore, isRotating, type ScheduleEntry } from "./schedule.js";
import { seedSchedule } from "./seed.js";
import { TaskLog, type TaskLogRecord } from "./tasklog.js";
import {
  buildTodaysTasks,
  resolveAssignee,
  sortedInstances,
  taskKeyId,
  taskKeyOf,
  type TaskInstance,
  type TaskInstances,
} from "./today.js";
import { lastTask, nextTask, runTriggerPass, summarize, type TriggerResult } from "./trigger.js";

export type SchedulerPhase = "idle" | "busy";

export type SchedulerOptions = {
  config: RotaConfig;
  notifier?: TaskNotifier;
  clock?: () => Date;
  random?: () => number;
};

export type AssignmentRow = {
  date: string;
  day: DayName;
  time: string;
  label: string;
  action: string;
  person: string;
  rotating: boolean;
};

export type InjectRequest = {
  inSeconds: number;
  participant?: string;
  category?: ContentCategory;
  action?: string;
};

export type SchedulerStatus = {
  date: string | null;
  phase: SchedulerPhase;
  running: boolean;
  next: TaskSummary | null;
  last: TaskSummary | null;
};

export class HouseholdScheduler {
  readonly schedule: ScheduleStore;
  readonly rotationStore: RotationStateStore;
  readonly decks: ContentDecks;
  readonly log: TaskLog;

  private readonly config: RotaConfig;
  private readonly notifier: TaskNotifier;
  private readonly clock: () => Date;

  private inFlight = 0;
  private work: Promise<void> = Promise.resolve();
  private timer: NodeJS.Timeout | null = null;
  private ready = false;

  private day: string | null = null;
  private rotations: RotationMap = new Map();
  private instances: TaskInstances = new Map();
  private next: TaskSummary | null = null;
  private last: TaskSummary | null = null;

  constructor({ config, notifier, clock, random }: SchedulerOptions) {
    this.config = config;
    this.notifier = notifier ?? new ConsoleNotifier();
    this.clock = clock ?? (() => new Date());
    this.schedule = new ScheduleStore(config.scheduleFile);
    this.rotationStore = new RotationStateStore(config.rotationFile);
    this.decks = new ContentDecks(config.contentDir, random);
    this.log = new TaskLog(config.taskLogFile);
  }

  /** Loads the schedule and rotation state and builds today's instances. */
  async init(): Promise<void> {
    await this.exclusive(async () => {
      const now = this.clock();
      if (this.config.seedSample && (await seedSchedule(this.config.scheduleFile))) {
        console.log(`[scheduler] wrote sample schedule to ${this.config.scheduleFile}`);
      }
      const entries = await this.schedule.load();
      // a schedule edited while we were down invalidates stored rotations
      const scheduleMtime = await this.schedule.mtime();
      const stateMtime = await this.rotationStore.mtime();
      const stale = scheduleMtime !== undefined && stateMtime !== undefined && scheduleMtime > stateMtime;
      this.rotations = await this.rotationStore.loadOrRebuild(entries, now, stale);
      const day = toDateKey(now);
      this.day = day;
      this.instances = buildTodaysTasks(entries, this.rotations, now);
      await this.restoreFiredFlags(day);
      this.ready = true;
      await this.publishSummaries();
    });
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => {
        console.error(`[scheduler] tick failed: ${errorMessage(err)}`);
      });
    }, this.config.pollIntervalMs);
    console.log(`[scheduler] polling every ${this.config.pollIntervalMs}ms`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    console.log("[scheduler] stopped");
  }

  /**
   * Runs one tick unless one is already in progress.
   * Resolves to the pass result, or `undefined` when the tick was skipped.
   */
  async tick(now: Date = this.clock()): Promise<TriggerResult | undefined> {
    if (this.phase === "busy") return undefined;
    return this.exclusive(() => this.runTick(now));
  }

  private async runTick(now: Date): Promise<TriggerResult> {
    this.assertReady();
    const today = toDateKey(now);
    if (today !== this.day) {
      console.log(`[scheduler] new day ${today}`);
      this.day = today;
      // injected tasks that were scheduled past midnight move over with the day
      this.instances = buildTodaysTasks(this.schedule.entries, this.rotations, now, this.instances);
    }

    if (await this.schedule.hasChanged()) {
      console.log("[scheduler] schedule changed, reloading");
      const entries = await this.schedule.load();
      this.rotations = await this.rotationStore.loadOrRebuild(entries, now, true);
      this.instances = buildTodaysTasks(entries, this.rotations, now, this.instances);
    }

    const result = await runTriggerPass(
      this.instances,
      {
        rotations: this.rotations,
        decks: this.decks,
        log: this.log,
        notifier: this.notifier,
        options: { windowSeconds: this.config.triggerWindowSeconds, expiryMinutes: this.config.expiryMinutes },
      },
      now,
    );
    await this.publishSummaries();
    return result;
  }

  /**
   * Skips every rotation forward by one slot, persists, and re-resolves today's instances.
   * A failed write is reported to the caller; the in-memory state has already moved on.
   */
  async advanceAllRotations(): Promise<AssignmentRow[]> {
    return this.exclusive(async () => {
      this.assertReady();
      const now = this.clock();
      this.rotations = advanceAll(this.rotations);
      this.instances = buildTodaysTasks(this.schedule.entries, this.rotations, now, this.instances);
      await this.publishSummaries();
      console.log(`[scheduler] advanced ${this.rotations.size} rotations`);
      await this.rotationStore.save(this.rotations);
      return this.assignmentsOn(now).filter((r) => r.rotating);
    });
  }

  /** Adds a one-off instance `inSeconds` from now, for a person or a content category. */
  async injectTask(req: InjectRequest): Promise<TaskInstance> {
    if (!Number.isFinite(req.inSeconds) || req.inSeconds < 0 || req.inSeconds > MAX_INJECT_SECONDS) {
      throw new RotaError("invalid_request", `inSeconds must be between 0 and ${MAX_INJECT_SECONDS}`);
    }
    const name = req.participant?.trim() || (req.category ? "Everyone" : "");
    if (!name) throw new RotaError("invalid_request", "either participant or category is required");
    const action = req.category ?? (req.action?.trim() || "test task");

    return this.exclusive(async () => {
      this.assertReady();
      const at = addSeconds(this.clock(), req.inSeconds);
      const entry: ScheduleEntry = {
        time: format(at, "HH:mm:ss"),
        participants: [name],
        participantSpec: name,
        days: "All",
        action,
        label: req.category ? CATEGORY_LABEL[req.category] : action,
      };
      const key = taskKeyOf(entry);
      const id = taskKeyId(key);
      if (this.instances.has(id)) {
        throw new RotaError("duplicate_task", `"${action}" for ${name} is already scheduled at ${entry.time}`);
      }
      const instance: TaskInstance = {
        key,
        entry,
        scheduledAt: at,
        assignee: name,
        called: false,
        completed: false,
        injected: true,
      };
      this.instances.set(id, instance);
      console.log(`[scheduler] injected "${action}" for ${name} at ${entry.time}`);
      await this.publishSummaries();
      return instance;
    });
  }

  /** Who does what for `days` days starting at `from`, resolved without touching any state. */
  dumpAssignments(days: number = this.config.dumpDays, from: Date = this.clock()): AssignmentRow[] {
    this.assertReady();
    const rows: AssignmentRow[] = [];
    for (let i = 0; i < days; i++) rows.push(...this.assignmentsOn(addDays(from, i)));
    return rows;
  }

  now(): Date {
    return this.clock();
  }

  todaysTasks(): TaskInstance[] {
    return sortedInstances(this.instances);
  }

  rotationDefinitions(): RotationMap {
    return new Map(this.rotations);
  }

  status(): SchedulerStatus {
    return { date: this.day, phase: this.phase, running: this.timer !== null, next: this.next, last: this.last };
  }

  private assignmentsOn(date: Date): AssignmentRow[] {
    const day = dayNameOf(date);
    return this.schedule.entries
      .filter((e) => matchesDayRange(day, e.days))
      .map((e) => ({
        date: toDateKey(date),
        day,
        time: e.time,
        label: e.label,
        action: e.action,
        person: resolveAssignee(e, this.rotations, date),
        rotating: isRotating(e),
      }))
      .sort((a, b) => a.time.localeCompare(b.time));
  }

  // Tasks already in today's log stay fired across a restart
  private async restoreFiredFlags(day: string): Promise<void> {
    let records: TaskLogRecord[];
    try {
      records = await this.log.firedOn(day);
    } catch (err) {
      console.warn(`[scheduler] could not read the task log: ${errorMessage(err)}`);
      return;
    }
    let restored = 0;
    for (const t of this.instances.values()) {
      const logged = records.some(
        (r) => r.scheduled === t.key.time && r.action === t.entry.action && r.days === t.entry.days,
      );
      if (logged && !t.called) {
        t.called = true;
        t.completed = true;
        restored++;
      }
    }
    if (restored > 0) console.log(`[scheduler] ${restored} tasks already fired today`);
  }

  private async publishSummaries(): Promise<void> {
    const next = summarize(nextTask(this.instances));
    const last = summarize(lastTask(this.instances));
    if (JSON.stringify(next) !== JSON.stringify(this.next)) {
      this.next = next;
      await this.notifySafely(() => this.notifier.onNextTaskChanged(next));
    }
    if (JSON.stringify(last) !== JSON.stringify(this.last)) {
      this.last = last;
      await this.notifySafely(() => this.notifier.onLastTaskChanged(last));
    }
  }

  private async notifySafely(fn: () => void | Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      console.error(`[scheduler] notifier failed: ${errorMessage(err)}`);
    }
  }

  get phase(): SchedulerPhase {
    return this.inFlight > 0 ? "busy" : "idle";
  }

  private assertReady(): void {
    if (!this.ready) throw new RotaError("not_ready", "scheduler has not been initialised");
  }

  // Chains `fn` behind whatever is running so no two state changes ever interleave
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    this.inFlight++;
    const run = this.work.then(async () => {
      try {
        return await fn();
      } finally {
        this.inFlight--;
      }
    });
    this.work = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

// at most into tomorrow, which is as far as the day rollover carries injected tasks
export const MAX_INJECT_SECONDS = 24 * 60 * 60;

const CATEGORY_LABEL: Record<ContentCategory, string> = { story: "Story", quote: "Quote", joke: "Joke" };
