import fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import { z } from "zod";
import { config } from "./config";
import { ReasoningUnavailableError, SessionBusyError, SessionVersionConflictError } from "./errors";
import type { RoundInput } from "./orchestrator/spiralPipeline";
import type { SessionStore } from "./services/sessionStore";
import type { RoundResult } from "./types";

export interface RoundRunnerLike {
  runRound(input: RoundInput): Promise<RoundResult>;
}

export interface ServerDeps {
  store: SessionStore;
  pipeline: RoundRunnerLike;
}

const roundSchema = z.object({
  sessionId: z.string().trim().min(1).max(100).optional(),
  text: z.string().trim().min(1).max(4000)
});

const sendError = (reply: FastifyReply, error: unknown): FastifyReply => {
  if (error instanceof SessionBusyError) {
    return reply.code(409).send({ error: error.message, retryable: true });
  }
  if (error instanceof SessionVersionConflictError) {
    return reply.code(409).send({ error: error.message, retryable: true });
  }
  if (error instanceof ReasoningUnavailableError) {
    return reply.code(503).send({ error: error.message, stage: error.stage, retryable: true });
  }
  throw error;
};

export const buildApp = (deps: ServerDeps): FastifyInstance => {
  const app = fastify({ logger: { level: config.logLevel } });

  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/stats", async () => ({ sessions: deps.store.stats() }));

  app.post("/api/rounds", async (request, reply) => {
    const parsed = roundSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    try {
      const result = await deps.pipeline.runRound(parsed.data);
      return { sessionId: result.sessionId, result };
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.get<{ Params: { id: string } }>("/api/sessions/:id", async (request, reply) => {
    const session = deps.store.get(request.params.id);
    if (!session) {
      return reply.code(404).send({ error: "Session not found" });
    }
    return { session };
  });

  app.delete<{ Params: { id: string } }>("/api/sessions/:id", async (request, reply) => {
    if (!deps.store.reset(request.params.id)) {
      return reply.code(404).send({ error: "Session not found" });
    }
    return reply.code(204).send();
  });

  app.get<{ Params: { id: string } }>("/api/sessions/:id/events", async (request, reply) => {
    const { id } = request.params;
    if (!deps.store.has(id)) {
      return reply.code(404).send({ error: "Session not found" });
    }
    return { events: deps.store.getEvents(id) };
  });

  app.get<{ Params: { id: string } }>("/api/sessions/:id/stream", async (request, reply) => {
    const { id } = request.params;
    if (!deps.store.has(id)) {
      return reply.code(404).send({ error: "Session not found" });
    }

    reply.hijack();
    reply.raw.setHeader("Content-Type", "text/event-stream");
    reply.raw.setHeader("Cache-Control", "no-cache");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.flushHeaders?.();

    const send = (data: unknown): void => {
      reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    for (const event of deps.store.getEvents(id)) {
      send(event);
    }

    const unsubscribe = deps.store.subscribe(id, (event) => send(event));

    request.raw.on("close", () => {
      unsubscribe();
      reply.raw.end();
    });
  });

  return app;
};
