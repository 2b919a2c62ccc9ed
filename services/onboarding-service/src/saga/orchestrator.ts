import { config } from "../config";
import type { Logger } from "../logger";
import { CompensationRegistry } from "./compensation";
import { Dispatcher } from "./dispatcher";
import { SagaEngine, type CompletionCallback } from "./engine";
import type { SagaParticipants } from "./participant";
import { OrchestrationPoller } from "./poller";
import type { RetryPolicy } from "./retry";
import type { OrchestrationStore } from "./saga-store";
import { StepExecutor } from "./step-executor";

export type OrchestratorSettings = {
  retry: RetryPolicy;
  stepTimeoutMs: number;
  claimLeaseMs: number;
  pollIntervalMs: number;
  pollStaleAfterMs: number;
  pollBatchSize: number;
};

export type OrchestratorOptions = {
  store: OrchestrationStore;
  participants: SagaParticipants;
  onCompletion?: CompletionCallback;
  settings?: Partial<OrchestratorSettings>;
  isRetryable?: (error: unknown) => boolean;
  random?: () => number;
  workerId?: string;
  logger?: Logger;
  now?: () => Date;
};

export type Orchestrator = {
  store: OrchestrationStore;
  executor: StepExecutor;
  compensations: CompensationRegistry;
  engine: SagaEngine;
  dispatcher: Dispatcher;
  poller: OrchestrationPoller;
};

export function defaultSettings(): OrchestratorSettings {
  return {
    retry: { ...config.saga.retry },
    stepTimeoutMs: config.saga.stepTimeoutMs,
    claimLeaseMs: config.saga.claimLeaseMs,
    pollIntervalMs: config.poller.intervalMs,
    pollStaleAfterMs: config.poller.staleAfterMs,
    pollBatchSize: config.poller.batchSize
  };
}

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const settings = { ...defaultSettings(), ...options.settings };
  const executor = new StepExecutor(options.participants, {
    policy: settings.retry,
    timeoutMs: settings.stepTimeoutMs,
    isRetryable: options.isRetryable,
    random: options.random
  });
  const compensations = new CompensationRegistry(options.participants, executor);
  const engine = new SagaEngine({
    store: options.store,
    participants: options.participants,
    executor,
    compensations,
    leaseMs: settings.claimLeaseMs,
    workerId: options.workerId,
    onCompletion: options.onCompletion,
    logger: options.logger,
    now: options.now
  });
  const dispatcher = new Dispatcher({ store: options.store, engine, logger: options.logger });
  const poller = new OrchestrationPoller({
    store: options.store,
    dispatcher,
    intervalMs: settings.pollIntervalMs,
    staleAfterMs: settings.pollStaleAfterMs,
    batchSize: settings.pollBatchSize,
    logger: options.logger,
    now: options.now
  });
  return { store: options.store, executor, compensations, engine, dispatcher, poller };
}
