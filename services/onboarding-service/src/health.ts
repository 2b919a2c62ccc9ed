import type { FastifyInstance } from "fastify";

export type ReadinessCheck = () => Promise<void>;

export async function registerHealthRoutes(app: FastifyInstance, checkReady?: ReadinessCheck): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async (request, reply) => {
    if (!checkReady) {
      return { status: "ready" };
    }
    try {
      await checkReady();
      return { status: "ready" };
    } catch (error) {
      reply.code(503);
      return { status: "unavailable", message: error instanceof Error ? error.message : String(error) };
    }
  });
}
