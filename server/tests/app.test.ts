import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/app";
import { type FocusClock, openFocusClock } from "../src/focusClock";
import { taskSchema } from "../src/schemas";
import { makeTempDir, removeDir } from "./helpers";

describe("HTTP API", () => {
  let dir: string;
  let clock: FocusClock;
  let server: Server;
  let base: string;

  const send = (method: string, route: string, body?: unknown) => fetch(`${base}${route}`, {
    method,
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body)
  });

  beforeEach(async () => {
    dir = await makeTempDir();
    clock = await openFocusClock(dir, { tickMs: 3_600_000 });
    server = createApp(clock).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server did not bind a TCP port");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await clock.close();
    await removeDir(dir);
  });

  it("reports the idle state", async () => {
    const res = await send("GET", "/api/state");
    expect(res.status).toBe(200);
    expect(res.headers.get("cache-control")).toContain("no-store");
    expect(await res.json()).toEqual({ status: "idle", nextPhase: "focus", cycleCount: 0 });
  });

  it("maps illegal transitions to 409", async () => {
    const res = await send("POST", "/api/session/resume");
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: "Cannot resume while idle", code: "STATE" });
  });

  it("maps validation failures to 400 with field issues", async () => {
    const res = await send("POST", "/api/tasks", { title: " " });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid task payload",
      code: "VALIDATION",
      issues: [{ path: "title", message: "title must not be empty" }]
    });
  });

  it("rejects malformed JSON bodies", async () => {
    const res = await fetch(`${base}/api/tasks`, { method: "POST", headers: { "Content-Type": "application/json" }, body: "{" });
    expect(res.status).toBe(400);
  });

  it("creates, lists and removes tasks", async () => {
    const created = await send("POST", "/api/tasks", { title: "Inbox zero", estimatedPomodoros: 2 });
    expect(created.status).toBe(201);
    const task = taskSchema.parse(await created.json());

    const listed = await (await send("GET", "/api/tasks")).json();
    expect(listed).toEqual([{ ...task, completedPomodoros: 0, done: false }]);

    expect((await send("DELETE", `/api/tasks/${task.id}`)).status).toBe(204);
    expect((await send("PUT", `/api/tasks/${task.id}`, { title: "Again" })).status).toBe(404);
  });

  it("runs session commands", async () => {
    const started = await send("POST", "/api/session/start", { phase: "focus" });
    expect(await started.json()).toMatchObject({ status: "running", phase: "focus", remainingSeconds: 1500 });

    const paused = await send("POST", "/api/session/pause");
    expect(await paused.json()).toMatchObject({ status: "paused" });

    const reset = await send("POST", "/api/session/reset");
    expect(await reset.json()).toMatchObject({
      record: { phase: "focus", completed: false, actualDurationSeconds: 0 },
      state: { status: "idle", nextPhase: "focus", cycleCount: 0 }
    });
  });

  it("exports the journal as CSV", async () => {
    const res = await send("GET", "/api/export.csv");
    expect(res.headers.get("content-type")).toBe("text/csv; charset=utf-8");
    expect(await res.text()).toBe("date,start_time,duration_min,type,task,completed,notes\n");
  });

  it("serves stats", async () => {
    const stats = await (await send("GET", "/api/stats")).json();
    expect(stats).toMatchObject({ totalCompletedFocusSessions: 0, currentStreak: 0 });
    expect(stats).toHaveProperty("sevenDayHeatmap.length", 7);
  });
  it("streams each event once to a subscriber and unsubscribes when the stream closes", async () => {
    await clock.saveSettings({ ...clock.getSettings(), shortBreakMinutes: 1, autoStartFocus: false });
    const baseline = { state: clock.events.listenerCount("state"), phaseCompleted: clock.events.listenerCount("phaseCompleted") };
    const controller = new AbortController();
    const res = await fetch(`${base}/api/events`, { signal: controller.signal });
    expect(res.headers.get("content-type")).toBe("text/event-stream");
    if (!res.body) throw new Error("event stream has no body");
    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";
    const frames = () => buffer.split("\n\n").slice(0, -1).map((frame) => frame.split("\n")[0]);
    const readUntil = async (ready: () => boolean) => {
      while (!ready()) {
        const { value, done } = await reader.read();
        if (done) throw new Error("event stream ended early");
        buffer += decoder.decode(value, { stream: true });
      }
    };

    await readUntil(() => frames().length === 1);
    expect(clock.events.listenerCount("phaseCompleted")).toBe(baseline.phaseCompleted + 1);

    await send("POST", "/api/session/start", { phase: "shortBreak" });
    for (let i = 0; i < 60; i++) clock.machine.tick();
    // initial idle, started, 59 countdown steps, then idle again after the break
    await readUntil(() => frames().filter((line) => line === "event: state").length === 62);

    expect(frames().filter((line) => line === "event: phaseCompleted")).toHaveLength(1);
    expect(frames()).toHaveLength(63);
    expect(buffer).toContain("event: phaseCompleted\ndata: {\"phase\":\"shortBreak\"");

    await reader.cancel();
    controller.abort();
    await vi.waitFor(() => expect(clock.events.listenerCount("phaseCompleted")).toBe(baseline.phaseCompleted));
    expect(clock.events.listenerCount("state")).toBe(baseline.state);
  });
});
