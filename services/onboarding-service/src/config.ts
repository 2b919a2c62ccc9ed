import dotenv from "dotenv";

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

export const config = {
  port: parseNumber(process.env.PORT, 3006),
  serviceName: process.env.SERVICE_NAME ?? "onboarding-service",
  logLevel: process.env.LOG_LEVEL ?? "info",
  useInMemoryStore: parseBoolean(process.env.USE_INMEMORY_STORE, false),
  kafkaEnabled: parseBoolean(process.env.KAFKA_ENABLED, false),
  brokerBrokers: (process.env.BROKER_BROKERS ?? "localhost:9092").split(","),
  telemetryEnabled: parseBoolean(process.env.TELEMETRY_ENABLED, false),
  collaborators: {
    identityUrl: process.env.IDENTITY_URL ?? "http://localhost:4101",
    provisioningUrl: process.env.PROVISIONING_URL ?? "http://localhost:4102",
    drUrl: process.env.DR_URL ?? "http://localhost:4103"
  },
  saga: {
    stepTimeoutMs: parseNumber(process.env.STEP_TIMEOUT_MS, 10_000),
    claimLeaseMs: parseNumber(process.env.CLAIM_LEASE_MS, 120_000),
    retry: {
      maxAttempts: parseNumber(process.env.RETRY_MAX_ATTEMPTS, 3),
      baseDelayMs: parseNumber(process.env.RETRY_BASE_DELAY_MS, 200),
      maxDelayMs: parseNumber(process.env.RETRY_MAX_DELAY_MS, 5_000)
    }
  },
  poller: {
    intervalMs: parseNumber(process.env.POLL_INTERVAL_MS, 15_000),
    staleAfterMs: parseNumber(process.env.POLL_STALE_AFTER_MS, 60_000),
    batchSize: parseNumber(process.env.POLL_BATCH_SIZE, 25)
  },
  db: {
    host: process.env.DB_HOST ?? "localhost",
    port: parseNumber(process.env.DB_PORT, 5432),
    user: process.env.DB_USER ?? "onboarding",
    password: process.env.DB_PASSWORD ?? "onboarding",
    database: process.env.DB_NAME ?? "onboarding"
  }
};

export type ServiceConfig = typeof config;
