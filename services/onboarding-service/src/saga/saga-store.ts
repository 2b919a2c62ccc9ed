import { config } from "../config";
import { db } from "../db";
import { InMemoryOrchestrationStore } from "./saga-store.memory";
import { PostgresOrchestrationStore } from "./saga-store.pg";
import type {
  OrchestrationContext,
  OrchestrationError,
  OrchestrationRecord,
  OrchestrationState,
  StepRecord,
  WorkflowType
} from "./saga-types";
import type { OnboardingRequest } from "./onboarding-request";

export type NewOrchestration = {
  type: WorkflowType;
  idempotencyKey: string;
  payload: OnboardingRequest;
};

export type NewStepRecord = Omit<StepRecord, "id" | "orchestrationId">;

/**
 * One atomic commit: the record moves `from` -> `to` (possibly the same state),
 * merges `contextPatch`, and appends `steps`. Applies only while `owner` holds
 * the claim and the record is still in `from`; the lease is renewed by `leaseMs`.
 */
export type OrchestrationTransition = {
  orchestrationId: string;
  owner: string;
  from: OrchestrationState;
  to: OrchestrationState;
  contextPatch?: OrchestrationContext;
  error?: OrchestrationError;
  rootCause?: OrchestrationError;
  steps: NewStepRecord[];
  leaseMs: number;
};

export type OrchestrationFilter = {
  states?: readonly OrchestrationState[];
  limit?: number;
};

export type StaleOrchestrationQuery = {
  states: readonly OrchestrationState[];
  updatedBefore: Date;
  limit: number;
};

export interface OrchestrationStore {
  /** Returns the existing record when the idempotency key is already known. */
  createOrchestration(input: NewOrchestration): Promise<{ record: OrchestrationRecord; created: boolean }>;
  getOrchestration(id: string): Promise<OrchestrationRecord | null>;
  getOrchestrationByIdempotencyKey(idempotencyKey: string): Promise<OrchestrationRecord | null>;
  listOrchestrations(filter?: OrchestrationFilter): Promise<OrchestrationRecord[]>;
  /** Non-terminal records in `states`, untouched since `updatedBefore`, whose lease is free or expired. */
  findStaleOrchestrations(query: StaleOrchestrationQuery): Promise<OrchestrationRecord[]>;
  /** Null when the record is terminal, unknown, or leased to someone else. */
  claimOrchestration(id: string, owner: string, leaseMs: number): Promise<OrchestrationRecord | null>;
  /** Extends a live claim while a step call is in flight; false once `owner` no longer holds it. */
  renewClaim(id: string, owner: string, leaseMs: number): Promise<boolean>;
  releaseOrchestration(id: string, owner: string): Promise<void>;
  commitTransition(transition: OrchestrationTransition): Promise<OrchestrationRecord>;
  listStepRecords(orchestrationId: string): Promise<StepRecord[]>;
}

export function createOrchestrationStore(): OrchestrationStore {
  if (config.useInMemoryStore) {
    return new InMemoryOrchestrationStore();
  }
  return new PostgresOrchestrationStore(db);
}
