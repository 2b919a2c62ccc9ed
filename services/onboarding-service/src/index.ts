import Fastify from "fastify";
import { registerRoutes } from "./api/routes";
import { createParticipants } from "./clients";
import { config } from "./config";
import { db, migrate } from "./db";
import { runOnboardingConsumer, startConsumer, stopConsumer } from "./events/consumer";
import { createCompletionPublisher, producer, startProducer, stopProducer } from "./events/producer";
import { registerHealthRoutes } from "./health";
import { logger } from "./logger";
import { createOrchestrator } from "./saga/orchestrator";
import { createOrchestrationStore } from "./saga/saga-store";
import { startTelemetry, stopTelemetry } from "./telemetry";
import { registerTraceHook } from "./trace/trace";

const app = Fastify({ logger: false });
const store = createOrchestrationStore();
const orchestrator = createOrchestrator({
  store,
  participants: createParticipants(config.collaborators),
  onCompletion: config.kafkaEnabled ? createCompletionPublisher(producer) : undefined
});

async function start(): Promise<void> {
  await startTelemetry();
  registerTraceHook(app);

  if (!config.useInMemoryStore) {
    await migrate();
  }
  if (config.kafkaEnabled) {
    await startProducer();
    await startConsumer();
    await runOnboardingConsumer(orchestrator.dispatcher);
  }

  await registerHealthRoutes(
    app,
    config.useInMemoryStore
      ? undefined
      : async () => {
          await db.query("SELECT 1");
        }
  );
  await registerRoutes(app, { store, dispatcher: orchestrator.dispatcher });

  orchestrator.poller.start();
  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port, traceId: "system" }, "Onboarding service listening");
}

async function shutdown(): Promise<void> {
  logger.info({ traceId: "system" }, "Shutting down onboarding service");
  await orchestrator.poller.stop();
  await app.close();
  await orchestrator.dispatcher.stop();
  if (config.kafkaEnabled) {
    await stopConsumer();
    await stopProducer();
  }
  await db.end();
  await stopTelemetry();
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

start().catch((error) => {
  logger.error({ error, traceId: "system" }, "Failed to start onboarding service");
  process.exit(1);
});
