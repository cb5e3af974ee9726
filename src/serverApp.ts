import fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { MalformedOutput, ProjectLockedError, UnsafePathError, errorMessage } from "./errors";
import type { RunEventLog } from "./services/runEventLog";
import type { RunEvent, RunResult } from "./types";

export interface PipelineLike {
  run(userStory: string): Promise<RunResult>;
}

export interface ServerDeps {
  events: RunEventLog;
  pipeline: PipelineLike;
  overview: {
    model: string;
    baseUrl: string;
    projectRoot: string;
  };
}

export interface BuildAppOptions {
  logger?: boolean;
}

export interface RunEventLogger {
  info(bindings: object, message: string): void;
  warn(bindings: object, message: string): void;
  error(bindings: object, message: string): void;
}

/** Forwards a run event to the server log at the event's own level. */
export const logRunEvent = (logger: RunEventLogger, event: RunEvent): void => {
  logger[event.level]({ runId: event.runId, role: event.role, type: event.type }, event.message);
};

const runInputSchema = z.object({
  userStory: z.string().trim().min(1).max(4000)
});

export const buildApp = (deps: ServerDeps, options: BuildAppOptions = {}): FastifyInstance => {
  const app = fastify({ logger: options.logger ?? true });

  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/tools/overview", async () => ({
    ok: true,
    service: "storyforge",
    ...deps.overview,
    now: new Date().toISOString()
  }));

  app.post("/api/runs", async (request, reply) => {
    const parsed = runInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    try {
      const result = await deps.pipeline.run(parsed.data.userStory);
      return reply.code(200).send(result);
    } catch (error: unknown) {
      if (error instanceof ProjectLockedError) {
        return reply.code(409).send({ error: error.message });
      }
      if (error instanceof MalformedOutput) {
        return reply.code(422).send({ error: error.message, preview: error.preview });
      }
      if (error instanceof UnsafePathError) {
        return reply.code(422).send({ error: error.message, path: error.rejectedPath });
      }
      request.log.error(error);
      return reply.code(500).send({ error: errorMessage(error) });
    }
  });

  app.get<{ Params: { id: string } }>("/api/runs/:id/events", async (request, reply) => {
    const { id } = request.params;
    if (!deps.events.has(id)) {
      return reply.code(404).send({ error: "Run not found" });
    }
    return { events: deps.events.getEvents(id) };
  });

  return app;
};
