import { setTimeout as delay } from "node:timers/promises";
import { Kafka, logLevel } from "kafkajs";
import { config } from "../config";
import { logger as rootLogger, type Logger } from "../logger";
import { computeBackoff, type RetryPolicy } from "../saga/retry";

export const kafka = new Kafka({
  clientId: config.serviceName,
  brokers: config.brokerBrokers,
  logLevel: logLevel.WARN
});

export type ConnectOptions = {
  backoff?: Omit<RetryPolicy, "maxAttempts">;
  signal?: AbortSignal;
  random?: () => number;
  logger?: Logger;
};

const CONNECT_BACKOFF = { baseDelayMs: 500, maxDelayMs: 5_000 };

/**
 * Retries `connect` until the broker answers, using the same jittered backoff
 * as collaborator calls. Rejects only when `signal` aborts the wait.
 */
export async function connectWithRetry(
  connect: () => Promise<void>,
  label: string,
  options: ConnectOptions = {}
): Promise<number> {
  const log = options.logger ?? rootLogger;
  const backoff = { maxAttempts: Number.POSITIVE_INFINITY, ...(options.backoff ?? CONNECT_BACKOFF) };
  for (let attempt = 1; ; attempt += 1) {
    try {
      await connect();
      log.info({ label, attempt, traceId: "system" }, "Connected to Kafka");
      return attempt;
    } catch (error) {
      const waitMs = computeBackoff(attempt, backoff, options.random);
      log.warn({ error, label, attempt, waitMs, traceId: "system" }, "Kafka connection failed; retrying");
      await delay(waitMs, undefined, { signal: options.signal });
    }
  }
}
