import type { FastifyInstance } from "fastify";
import { z, ZodError } from "zod";
import type { Dispatcher } from "../saga/dispatcher";
import type { OrchestrationStore } from "../saga/saga-store";
import { orchestrationStateSchema } from "../saga/saga-types";
import { getTraceIdFromRequest } from "../trace/trace";

const orchestrationParamsSchema = z.object({
  id: z.string().uuid()
});

const listQuerySchema = z.object({
  state: z
    .string()
    .optional()
    .transform((value) => (value ? value.split(",").map((state) => state.trim()) : undefined))
    .pipe(z.array(orchestrationStateSchema).optional()),
  limit: z.coerce.number().int().positive().max(500).optional()
});

export type RouteDependencies = {
  store: OrchestrationStore;
  dispatcher: Dispatcher;
};

function validationFailure(error: ZodError, traceId: string) {
  return {
    message: "Validation failed",
    issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    traceId
  };
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDependencies): Promise<void> {
  const { store, dispatcher } = deps;

  app.post("/v1/onboarding", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    try {
      const result = await dispatcher.intake(request.body, traceId);
      reply.code(result.created ? 202 : 200);
      return { ...result, traceId };
    } catch (error) {
      if (error instanceof ZodError) {
        reply.code(400);
        return validationFailure(error, traceId);
      }
      throw error;
    }
  });

  app.get("/v1/orchestrations", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const query = listQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      reply.code(400);
      return validationFailure(query.error, traceId);
    }
    const orchestrations = await store.listOrchestrations({ states: query.data.state, limit: query.data.limit });
    return { orchestrations, traceId };
  });

  app.get("/v1/orchestrations/:id", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const params = orchestrationParamsSchema.safeParse(request.params);
    if (!params.success) {
      reply.code(400);
      return validationFailure(params.error, traceId);
    }
    const orchestration = await store.getOrchestration(params.data.id);
    if (!orchestration) {
      reply.code(404);
      return { message: "Orchestration not found", orchestrationId: params.data.id, traceId };
    }
    const steps = await store.listStepRecords(orchestration.id);
    return { orchestration, steps, traceId };
  });

  app.post("/v1/orchestrations/:id/dispatch", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const params = orchestrationParamsSchema.safeParse(request.params);
    if (!params.success) {
      reply.code(400);
      return validationFailure(params.error, traceId);
    }
    const result = await dispatcher.schedule(params.data.id, traceId);
    if (!result) {
      reply.code(503);
      return { message: "Dispatch did not complete; it will be retried", orchestrationId: params.data.id, traceId };
    }
    if (result.outcome === "not_found") {
      reply.code(404);
      return { message: "Orchestration not found", orchestrationId: params.data.id, traceId };
    }
    if (result.outcome === "busy") {
      reply.code(409);
    }
    return { ...result, traceId };
  });
}
