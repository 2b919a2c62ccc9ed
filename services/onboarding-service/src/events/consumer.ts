import type { Consumer, KafkaMessage } from "kafkajs";
import { ZodError } from "zod";
import { config } from "../config";
import { logger as rootLogger, type Logger } from "../logger";
import type { Dispatcher } from "../saga/dispatcher";
import { withTraceId } from "../trace/trace";
import { eventEnvelopeSchema } from "./envelope";
import { connectWithRetry, kafka } from "./kafka";
import { topics } from "./topics";

export const consumer: Consumer = kafka.consumer({ groupId: `${config.serviceName}-group` });

export async function startConsumer(): Promise<void> {
  await connectWithRetry(() => consumer.connect(), "Kafka consumer");
}

export async function stopConsumer(): Promise<void> {
  await consumer.disconnect();
}

/**
 * Feeds `onboarding.requested` events into intake. Malformed events are logged
 * and skipped; anything else is rethrown so Kafka redelivers the message.
 */
export function createOnboardingMessageHandler(
  dispatcher: Pick<Dispatcher, "intake">,
  logger: Logger = rootLogger
): (payload: { message: Pick<KafkaMessage, "value" | "offset"> }) => Promise<void> {
  return async ({ message }) => {
    if (!message.value) {
      logger.warn({ offset: message.offset }, "Received empty message");
      return;
    }
    try {
      const envelope = eventEnvelopeSchema.parse(JSON.parse(message.value.toString()));
      const result = await dispatcher.intake(envelope.data, envelope.traceId);
      withTraceId(logger, envelope.traceId).info(
        { orchestrationId: result.orchestrationId, created: result.created, eventId: envelope.id },
        "Onboarding request consumed"
      );
    } catch (error) {
      if (error instanceof ZodError || error instanceof SyntaxError) {
        logger.warn({ error, offset: message.offset }, "Discarding malformed onboarding event");
        return;
      }
      throw error;
    }
  };
}

export async function runOnboardingConsumer(dispatcher: Dispatcher): Promise<void> {
  await consumer.subscribe({ topic: topics.onboardingRequested, fromBeginning: false });
  const handle = createOnboardingMessageHandler(dispatcher);
  await consumer.run({ eachMessage: (payload) => handle(payload) });
}
