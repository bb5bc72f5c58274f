import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { addDays } from "date-fns";
import { z } from "zod";
import { personCalendar } from "./calendar.js";
import { CONTENT_CATEGORIES, type RotaConfig } from "./config.js";
import { toDateKey } from "./dates.js";
import { RotaError, errorMessage } from "./errors.js";
import { renderRosterPdf } from "./pdf.js";
import { rotationKeyId } from "./rotation.js";
import { MAX_INJECT_SECONDS, type HouseholdScheduler } from "./scheduler.js";
import type { TaskInstance } from "./today.js";

const daysQuery = (max: number) =>
  z.object({ days: z.coerce.number().int().min(1).max(max).optional() });

const logQuery = z.object({ limit: z.coerce.number().int().min(1).max(1000).default(50) });

export const injectBody = z
  .object({
    inSeconds: z.number().int().min(0).max(MAX_INJECT_SECONDS),
    participant: z.string().trim().min(1).optional(),
    category: z.enum(CONTENT_CATEGORIES).optional(),
    action: z.string().trim().min(1).optional(),
  })
  .refine((b) => b.participant !== undefined || b.category !== undefined, {
    message: "participant or category is required",
  });

const STATUS: Record<RotaError["code"], number> = {
  invalid_request: 400,
  invalid_schedule_row: 400,
  duplicate_task: 409,
  not_ready: 503,
  rotation_state_corrupt: 500,
  persistence_failed: 500,
};

function instanceJson(t: TaskInstance) {
  return {
    time: t.key.time,
    scheduledAt: t.scheduledAt.toISOString(),
    names: t.key.participantSpec,
    person: t.assignee ?? t.entry.participants[0],
    action: t.entry.action,
    label: t.entry.label,
    days: t.entry.days,
    called: t.called,
    completed: t.completed,
    injected: t.injected,
  };
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

// express 4 does not forward rejected promises on its own
const route = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve()
    .then(() => fn(req, res))
    .catch(next);
};

function parseOr400<S extends z.ZodTypeAny>(schema: S, input: unknown, res: Response): z.output<S> | undefined {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });
    return undefined;
  }
  return parsed.data;
}

export function createApp(scheduler: HouseholdScheduler, config: RotaConfig) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/", (_req, res) => res.send("Household rota API OK"));

  app.get("/api/status", (_req, res) => {
    res.json(scheduler.status());
  });

  app.get("/api/today", (_req, res) => {
    res.json(scheduler.todaysTasks().map(instanceJson));
  });

  app.get("/api/rotations", (_req, res) => {
    res.json([...scheduler.rotationDefinitions().values()].map((d) => ({
      key: rotationKeyId(d.key),
      anchor: d.anchor,
      participants: d.participants,
    })));
  });

  app.get("/api/assignments", route((req, res) => {
    const q = parseOr400(daysQuery(366), req.query, res);
    if (!q) return;
    res.json(scheduler.dumpAssignments(q.days ?? config.dumpDays));
  }));

  // printable roster, capped at a month so the columns stay readable
  app.get("/api/roster.pdf", route((req, res) => {
    const q = parseOr400(daysQuery(31), req.query, res);
    if (!q) return;
    const days = q.days ?? Math.min(config.dumpDays, 31);
    const now = scheduler.now();
    const dates = Array.from({ length: days }, (_, i) => toDateKey(addDays(now, i)));
    const rows = scheduler.dumpAssignments(days, now);
    res.setHeader("Content-Type", "application/pdf");
    res.setHeader("Content-Disposition", `inline; filename="rota-${dates[0]}.pdf"`);
    renderRosterPdf(res, { dates, rows });
  }));

  app.get("/api/ics/:person", route((req, res) => {
    const q = parseOr400(daysQuery(366), req.query, res);
    if (!q) return;
    const person = req.params.person;
    const ics = personCalendar(scheduler.dumpAssignments(q.days ?? config.dumpDays), person);
    res.setHeader("Content-Type", "text/calendar; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${encodeURIComponent(person)}-rota.ics"`);
    res.send(ics);
  }));

  app.get("/api/log", route(async (req, res) => {
    const q = parseOr400(logQuery, req.query, res);
    if (!q) return;
    res.json(await scheduler.log.recent(q.limit));
  }));

  app.post("/api/rotations/advance", route(async (_req, res) => {
    const today = await scheduler.advanceAllRotations();
    res.json({ ok: true, today });
  }));

  app.post("/api/tasks/inject", route(async (req, res) => {
    const body = parseOr400(injectBody, req.body, res);
    if (!body) return;
    const instance = await scheduler.injectTask(body);
    res.status(201).json(instanceJson(instance));
  }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RotaError) {
      res.status(STATUS[err.code]).json(err.toJSON());
      return;
    }
    console.error(err);
    res.status(500).json({ error: "internal", message: errorMessage(err) });
  });

  return app;
}
