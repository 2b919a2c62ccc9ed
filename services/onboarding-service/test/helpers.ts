import { setTimeout as delay } from "node:timers/promises";
import pino from "pino";
import { CollaboratorError } from "../src/clients/errors";
import type { CompletionCallback } from "../src/saga/engine";
import { parseOnboardingRequest, type OnboardingRequest, type OnboardingRequestInput } from "../src/saga/onboarding-request";
import { createOrchestrator, type OrchestratorSettings } from "../src/saga/orchestrator";
import type { ParticipantCall, SagaParticipant } from "../src/saga/participant";
import { InMemoryOrchestrationStore } from "../src/saga/saga-store.memory";
import type { OrchestrationRecord, StepKind, StepOutput } from "../src/saga/saga-types";

export const silentLogger = pino({ level: "silent" });

export function buildRequestInput(tenantId = "acme"): OnboardingRequestInput {
  return {
    tenant: {
      tenantId,
      displayName: "Acme Corp",
      domain: `${tenantId}.example.com`,
      adminEmail: `admin@${tenantId}.example.com`
    },
    provisioning: { region: "eu-west-1", plan: "premium", seats: 50 },
    dr: { targetRegion: "eu-central-1", rpoMinutes: 15, rtoMinutes: 60 }
  };
}

export function buildRequest(tenantId = "acme"): OnboardingRequest {
  return parseOnboardingRequest(buildRequestInput(tenantId));
}

export function buildRecord(overrides: Partial<OrchestrationRecord> = {}): OrchestrationRecord {
  const now = new Date("2026-01-01T00:00:00.000Z");
  return {
    id: "11111111-1111-4111-8111-111111111111",
    type: "customer_onboarding",
    idempotencyKey: "key-1",
    state: "PENDING",
    payload: buildRequest(),
    context: {},
    error: null,
    rootCause: null,
    claimedBy: null,
    claimExpiresAt: null,
    createdAt: now,
    updatedAt: now,
    completedAt: null,
    ...overrides
  };
}

export function transientError(message = "upstream unavailable"): CollaboratorError {
  return new CollaboratorError(message, "identity", true, 503);
}

export function permanentError(message = "request rejected"): CollaboratorError {
  return new CollaboratorError(message, "identity", false, 400);
}

type Behaviour = "ok" | Error;

type FakeScript = {
  forward?: Behaviour[];
  compensation?: Behaviour[];
  forwardDelayMs?: number;
};

/** Scripted participant: the n-th call follows the n-th behaviour, "ok" once the script runs out. */
export class FakeParticipant implements SagaParticipant {
  forwardCalls = 0;
  compensationCalls = 0;
  readonly calls: ParticipantCall[] = [];
  readonly compensatedHandles: StepOutput[] = [];

  constructor(
    readonly step: StepKind,
    private readonly script: FakeScript = {}
  ) {}

  describeInput(record: OrchestrationRecord): StepOutput {
    return { tenantId: record.payload.tenant.tenantId };
  }

  async performForward(record: OrchestrationRecord, call: ParticipantCall): Promise<StepOutput> {
    this.forwardCalls += 1;
    this.calls.push(call);
    if (this.script.forwardDelayMs) {
      await delay(this.script.forwardDelayMs);
    }
    const behaviour = this.script.forward?.[this.forwardCalls - 1] ?? "ok";
    if (behaviour instanceof Error) {
      throw behaviour;
    }
    return { handleId: `${this.step}-${record.payload.tenant.tenantId}` };
  }

  async performCompensation(handle: StepOutput, call: ParticipantCall): Promise<void> {
    this.compensationCalls += 1;
    this.calls.push(call);
    const behaviour = this.script.compensation?.[this.compensationCalls - 1] ?? "ok";
    if (behaviour instanceof Error) {
      throw behaviour;
    }
    this.compensatedHandles.push(handle);
  }
}

export type HarnessOptions = {
  auth?: FakeParticipant;
  provisioning?: FakeParticipant;
  dr?: FakeParticipant;
  onCompletion?: CompletionCallback;
  settings?: Partial<OrchestratorSettings>;
  now?: () => Date;
};

export function buildHarness(options: HarnessOptions = {}) {
  const participants = {
    auth: options.auth ?? new FakeParticipant("auth"),
    provisioning: options.provisioning ?? new FakeParticipant("provisioning"),
    dr: options.dr ?? new FakeParticipant("dr")
  };
  const store = new InMemoryOrchestrationStore(options.now);
  const orchestrator = createOrchestrator({
    store,
    participants,
    onCompletion: options.onCompletion,
    settings: {
      retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 },
      stepTimeoutMs: 1_000,
      claimLeaseMs: 60_000,
      pollIntervalMs: 60_000,
      pollStaleAfterMs: 1_000,
      pollBatchSize: 10,
      ...options.settings
    },
    random: () => 0,
    logger: silentLogger,
    now: options.now
  });
  return { ...orchestrator, store, participants };
}

export async function createPending(store: InMemoryOrchestrationStore, tenantId = "acme"): Promise<OrchestrationRecord> {
  const { record } = await store.createOrchestration({
    type: "customer_onboarding",
    idempotencyKey: `key-${tenantId}`,
    payload: buildRequest(tenantId)
  });
  return record;
}
