import { randomUUID } from "node:crypto";
import type { Producer } from "kafkajs";
import { config } from "../config";
import { logger as rootLogger, type Logger } from "../logger";
import type { CompletionCallback, CompletionEvent } from "../saga/engine";
import type { EventEnvelope } from "./envelope";
import { connectWithRetry, kafka } from "./kafka";
import { topics } from "./topics";

export const producer: Producer = kafka.producer();

export async function startProducer(): Promise<void> {
  await connectWithRetry(() => producer.connect(), "Kafka producer");
}

export async function stopProducer(): Promise<void> {
  await producer.disconnect();
}

export type EventSender = Pick<Producer, "send">;

type WithIsoCompletion<T> = T extends { completedAt: Date } ? Omit<T, "completedAt"> & { completedAt: string } : never;

export type CompletionPayload = WithIsoCompletion<CompletionEvent>;

export function buildCompletionEnvelope(event: CompletionEvent): EventEnvelope<CompletionPayload> {
  return {
    id: randomUUID(),
    type: event.status === "COMPLETED" ? topics.onboardingCompleted : topics.onboardingRolledBack,
    source: config.serviceName,
    time: new Date().toISOString(),
    subject: event.tenantId,
    traceId: event.orchestrationId,
    data: { ...event, completedAt: event.completedAt.toISOString() }
  };
}

/** Completion callback that announces the outcome on Kafka, keyed by tenant. */
export function createCompletionPublisher(sender: EventSender, logger: Logger = rootLogger): CompletionCallback {
  return async (event) => {
    const envelope = buildCompletionEnvelope(event);
    await sender.send({
      topic: envelope.type,
      messages: [{ key: event.tenantId, value: JSON.stringify(envelope) }]
    });
    logger.info(
      { traceId: envelope.traceId, orchestrationId: event.orchestrationId, eventType: envelope.type },
      "Event published"
    );
  };
}
