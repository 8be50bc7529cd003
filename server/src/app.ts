import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { z } from "zod";
import { FocusClockError, ValidationError } from "./errors";
import type { FocusClock } from "./focusClock";
import { phaseSchema } from "./schemas";

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

const handle = (fn: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

const STATUS_BY_CODE: Record<FocusClockError["code"], number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  STATE: 409,
  PERSISTENCE: 503
};

const journalQuerySchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
  phase: phaseSchema.optional()
});

export function createApp(clock: FocusClock) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "256kb" }));

  app.use("/api", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, proxy-revalidate");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });

  app.get("/api/state", (_req, res) => res.json(clock.state()));
  app.post("/api/session/start", handle(async (req, res) => res.json(clock.start(req.body ?? {}))));
  app.post("/api/session/pause", handle(async (_req, res) => res.json(clock.pause())));
  app.post("/api/session/resume", handle(async (_req, res) => res.json(clock.resume())));
  app.post("/api/session/skip", handle(async (_req, res) => res.json({ record: clock.skip(), state: clock.state() })));
  app.post("/api/session/reset", handle(async (_req, res) => res.json({ record: clock.reset(), state: clock.state() })));
  app.put("/api/session/note", handle(async (req, res) => res.json(clock.annotate(req.body))));

  app.get("/api/stats", handle(async (_req, res) => res.json(await clock.getStats())));
  app.get("/api/stats/heatmap", handle(async (_req, res) => res.json(await clock.getHeatmap())));
  app.get("/api/stats/streak", handle(async (_req, res) => res.json(await clock.getStreak())));

  app.get("/api/journal", handle(async (req, res) => {
    const parsed = journalQuerySchema.safeParse(req.query);
    if (!parsed.success) throw ValidationError.fromZod("journal query", parsed.error);
    res.json(await clock.journal(parsed.data));
  }));
  app.get("/api/export.csv", handle(async (_req, res) => {
    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader("Content-Disposition", "attachment; filename=\"sessions.csv\"");
    res.send(await clock.exportCsv());
  }));

  app.get("/api/tasks", handle(async (_req, res) => res.json(await clock.listTasks())));
  app.post("/api/tasks", handle(async (req, res) => res.status(201).json(await clock.createTask(req.body))));
  app.put("/api/tasks/:id", handle(async (req, res) => res.json(await clock.updateTask(req.params.id, req.body))));
  app.delete("/api/tasks/:id", handle(async (req, res) => {
    await clock.deleteTask(req.params.id);
    res.status(204).send();
  }));

  app.get("/api/alarms", (_req, res) => res.json(clock.listAlarms()));
  app.post("/api/alarms", handle(async (req, res) => res.status(201).json(await clock.createAlarm(req.body))));
  app.put("/api/alarms/:id", handle(async (req, res) => res.json(await clock.updateAlarm(req.params.id, req.body))));
  app.delete("/api/alarms/:id", handle(async (req, res) => {
    await clock.deleteAlarm(req.params.id);
    res.status(204).send();
  }));

  app.get("/api/settings", (_req, res) => res.json(clock.getSettings()));
  app.put("/api/settings", handle(async (req, res) => res.json(await clock.saveSettings(req.body))));

  app.get("/api/events", (_req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const send = (event: string, data: unknown) => res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    const unsubscribe = [
      clock.events.on("state", (state) => send("state", state)),
      clock.events.on("phaseCompleted", (event) => send("phaseCompleted", event)),
      clock.events.on("alarmFired", (event) => send("alarmFired", event)),
      clock.events.on("warning", ({ error, record }) => send("warning", { code: error.code, message: error.message, recordId: record.id }))
    ];
    send("state", clock.state());
    res.on("close", () => unsubscribe.forEach((off) => off()));
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(error);
    if (error instanceof ValidationError) {
      return res.status(400).json({ error: error.message, code: error.code, issues: error.issues });
    }
    if (error instanceof FocusClockError) {
      if (error.code === "PERSISTENCE") console.error(error.message, error.cause);
      return res.status(STATUS_BY_CODE[error.code]).json({ error: error.message, code: error.code });
    }
    if (error instanceof SyntaxError) {
      return res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION" });
    }
    console.error("Unhandled request error", error);
    return res.status(500).json({ error: "Internal error" });
  });

  return app;
}
