import { afterEach, describe, expect, it, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { MalformedOutput, ProjectLockedError, UnsafePathError } from "../src/errors";
import { specificationSchema } from "../src/schemas/specification";
import { type PipelineLike, buildApp, logRunEvent } from "../src/serverApp";
import { RunEventLog } from "../src/services/runEventLog";
import type { RunResult } from "../src/types";

const overview = { model: "test-model", baseUrl: "http://localhost:8000/v1", projectRoot: "/tmp/project" };

const result: RunResult = {
  runId: "run-1",
  specification: specificationSchema.parse({ title: "User API" }),
  codeFiles: ["app/main.py"],
  testFiles: ["tests/test_api.py"],
  degradedStages: []
};

describe("server app", () => {
  const apps: FastifyInstance[] = [];

  afterEach(async () => {
    await Promise.all(apps.map((app) => app.close()));
    apps.length = 0;
  });

  const start = (pipeline: PipelineLike, events = new RunEventLog()): FastifyInstance => {
    const app = buildApp({ events, pipeline, overview }, { logger: false });
    apps.push(app);
    return app;
  };

  const failingWith = (error: Error): PipelineLike => ({
    run: async () => {
      throw error;
    }
  });

  it("answers health and overview", async () => {
    const server = start({ run: async () => result });

    const health = await server.inject({ method: "GET", url: "/api/health" });
    const info = await server.inject({ method: "GET", url: "/api/tools/overview" });

    expect(health.json()).toEqual({ ok: true });
    expect(info.json()).toMatchObject({ ok: true, service: "storyforge", model: "test-model", projectRoot: "/tmp/project" });
  });

  it("runs the pipeline with the trimmed story", async () => {
    const stories: string[] = [];
    const server = start({
      run: async (story) => {
        stories.push(story);
        return result;
      }
    });

    const response = await server.inject({ method: "POST", url: "/api/runs", payload: { userStory: "  users CRUD " } });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ runId: "run-1", codeFiles: ["app/main.py"] });
    expect(stories).toEqual(["users CRUD"]);
  });

  it("rejects a missing or blank story", async () => {
    const server = start({ run: async () => result });

    const missing = await server.inject({ method: "POST", url: "/api/runs", payload: {} });
    const blank = await server.inject({ method: "POST", url: "/api/runs", payload: { userStory: "   " } });

    expect(missing.statusCode).toBe(400);
    expect(blank.statusCode).toBe(400);
  });

  it("maps pipeline errors to status codes", async () => {
    const locked = await start(failingWith(new ProjectLockedError("/tmp/project/.storyforge.lock"))).inject({
      method: "POST",
      url: "/api/runs",
      payload: { userStory: "users" }
    });
    expect(locked.statusCode).toBe(409);

    const malformed = await start(failingWith(new MalformedOutput("No JSON object found in model output.", "nope"))).inject({
      method: "POST",
      url: "/api/runs",
      payload: { userStory: "users" }
    });
    expect(malformed.statusCode).toBe(422);
    expect(malformed.json()).toEqual({ error: "No JSON object found in model output.", preview: "nope" });

    const unsafe = await start(failingWith(new UnsafePathError("../x"))).inject({
      method: "POST",
      url: "/api/runs",
      payload: { userStory: "users" }
    });
    expect(unsafe.statusCode).toBe(422);
    expect(unsafe.json()).toEqual({ error: "Unsafe path rejected: ../x", path: "../x" });

    const broken = await start(failingWith(new Error("disk full"))).inject({
      method: "POST",
      url: "/api/runs",
      payload: { userStory: "users" }
    });
    expect(broken.statusCode).toBe(500);
    expect(broken.json()).toEqual({ error: "disk full" });
  });

  it("serves the events of a known run and 404 for unknown ones", async () => {
    const events = new RunEventLog();
    events.pushEvent("run-1", "orchestrator", "run_started", "Pipeline started.");
    const server = start({ run: async () => result }, events);

    const known = await server.inject({ method: "GET", url: "/api/runs/run-1/events" });
    const unknown = await server.inject({ method: "GET", url: "/api/runs/nope/events" });

    expect(known.statusCode).toBe(200);
    expect(known.json().events).toHaveLength(1);
    expect(unknown.statusCode).toBe(404);
    expect(unknown.json()).toEqual({ error: "Run not found" });
  });
});

describe("logRunEvent", () => {
  it("logs each event at its own level", () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const events = new RunEventLog();

    logRunEvent(logger, events.pushEvent("run-1", "orchestrator", "run_started", "Pipeline started."));
    logRunEvent(logger, events.pushEvent("run-1", "code", "degraded_mode", "offline", { level: "warn" }));
    logRunEvent(logger, events.pushEvent("run-1", "orchestrator", "run_failed", "disk full", { level: "error" }));

    expect(logger.info).toHaveBeenCalledWith({ runId: "run-1", role: "orchestrator", type: "run_started" }, "Pipeline started.");
    expect(logger.warn).toHaveBeenCalledWith({ runId: "run-1", role: "code", type: "degraded_mode" }, "offline");
    expect(logger.error).toHaveBeenCalledWith({ runId: "run-1", role: "orchestrator", type: "run_failed" }, "disk full");
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
