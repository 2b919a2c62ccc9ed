import { randomUUID } from "node:crypto";
import { ClaimLostError, InvalidTransitionError, OrchestrationNotFoundError, StepRecordConflictError } from "./errors";
import type {
  NewOrchestration,
  OrchestrationFilter,
  OrchestrationStore,
  OrchestrationTransition,
  StaleOrchestrationQuery
} from "./saga-store";
import { DEFAULT_LIST_LIMIT, isTerminalState, type OrchestrationRecord, type StepRecord } from "./saga-types";
import { isAllowedTransition } from "./transitions";

function sortByUpdatedAt(a: OrchestrationRecord, b: OrchestrationRecord): number {
  const timeDiff = a.updatedAt.getTime() - b.updatedAt.getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.id.localeCompare(b.id);
}

/**
 * Same claim and commit semantics as the Postgres store. Every check-and-set
 * runs without an `await` in between, which is what makes it atomic here.
 * Records are cloned on the way in and out so callers never share state.
 */
export class InMemoryOrchestrationStore implements OrchestrationStore {
  private readonly records = new Map<string, OrchestrationRecord>();
  private readonly idsByKey = new Map<string, string>();
  private readonly steps: StepRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createOrchestration(input: NewOrchestration): Promise<{ record: OrchestrationRecord; created: boolean }> {
    const existingId = this.idsByKey.get(input.idempotencyKey);
    const existing = existingId ? this.records.get(existingId) : undefined;
    if (existing) {
      return { record: structuredClone(existing), created: false };
    }
    const now = this.now();
    const record: OrchestrationRecord = {
      id: randomUUID(),
      type: input.type,
      idempotencyKey: input.idempotencyKey,
      state: "PENDING",
      payload: structuredClone(input.payload),
      context: {},
      error: null,
      rootCause: null,
      claimedBy: null,
      claimExpiresAt: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null
    };
    this.records.set(record.id, record);
    this.idsByKey.set(record.idempotencyKey, record.id);
    return { record: structuredClone(record), created: true };
  }

  async getOrchestration(id: string): Promise<OrchestrationRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async getOrchestrationByIdempotencyKey(idempotencyKey: string): Promise<OrchestrationRecord | null> {
    const id = this.idsByKey.get(idempotencyKey);
    return id ? this.getOrchestration(id) : null;
  }

  async listOrchestrations(filter?: OrchestrationFilter): Promise<OrchestrationRecord[]> {
    const states = filter?.states;
    return [...this.records.values()]
      .filter((record) => !states || states.includes(record.state))
      .sort(sortByUpdatedAt)
      .slice(0, filter?.limit ?? DEFAULT_LIST_LIMIT)
      .map((record) => structuredClone(record));
  }

  async findStaleOrchestrations(query: StaleOrchestrationQuery): Promise<OrchestrationRecord[]> {
    const now = this.now().getTime();
    return [...this.records.values()]
      .filter(
        (record) =>
          !isTerminalState(record.state) &&
          query.states.includes(record.state) &&
          record.updatedAt.getTime() < query.updatedBefore.getTime() &&
          this.isClaimable(record, now)
      )
      .sort(sortByUpdatedAt)
      .slice(0, query.limit)
      .map((record) => structuredClone(record));
  }

  async claimOrchestration(id: string, owner: string, leaseMs: number): Promise<OrchestrationRecord | null> {
    const record = this.records.get(id);
    const now = this.now();
    if (!record || isTerminalState(record.state) || !this.isClaimable(record, now.getTime())) {
      return null;
    }
    record.claimedBy = owner;
    record.claimExpiresAt = new Date(now.getTime() + leaseMs);
    return structuredClone(record);
  }

  async renewClaim(id: string, owner: string, leaseMs: number): Promise<boolean> {
    const record = this.records.get(id);
    if (!record || record.claimedBy !== owner || isTerminalState(record.state)) {
      return false;
    }
    record.claimExpiresAt = new Date(this.now().getTime() + leaseMs);
    return true;
  }

  async releaseOrchestration(id: string, owner: string): Promise<void> {
    const record = this.records.get(id);
    if (!record || record.claimedBy !== owner) {
      return;
    }
    record.claimedBy = null;
    record.claimExpiresAt = null;
  }

  async commitTransition(transition: OrchestrationTransition): Promise<OrchestrationRecord> {
    const record = this.records.get(transition.orchestrationId);
    if (!record) {
      throw new OrchestrationNotFoundError(transition.orchestrationId);
    }
    if (record.claimedBy !== transition.owner || record.state !== transition.from) {
      throw new ClaimLostError(transition.orchestrationId, transition.owner);
    }
    if (!isAllowedTransition(transition.from, transition.to)) {
      throw new InvalidTransitionError(transition.from, transition.to);
    }
    for (const step of transition.steps) {
      if (step.status !== "completed" && step.status !== "compensated") {
        continue;
      }
      const duplicate = this.steps.some(
        (existing) =>
          existing.orchestrationId === record.id && existing.step === step.step && existing.status === step.status
      );
      if (duplicate) {
        throw new StepRecordConflictError(`Step ${step.step} is already ${step.status} for ${record.id}`);
      }
    }

    const now = this.now();
    record.state = transition.to;
    record.context = { ...record.context, ...structuredClone(transition.contextPatch ?? {}) };
    if (transition.error) {
      record.error = structuredClone(transition.error);
    }
    if (transition.rootCause && !record.rootCause) {
      record.rootCause = structuredClone(transition.rootCause);
    }
    record.updatedAt = now;
    if (isTerminalState(transition.to) && !record.completedAt) {
      record.completedAt = now;
    }
    record.claimExpiresAt = new Date(now.getTime() + transition.leaseMs);
    for (const step of transition.steps) {
      this.steps.push({ ...structuredClone(step), id: randomUUID(), orchestrationId: record.id });
    }
    return structuredClone(record);
  }

  async listStepRecords(orchestrationId: string): Promise<StepRecord[]> {
    return this.steps
      .filter((step) => step.orchestrationId === orchestrationId)
      .map((step) => structuredClone(step));
  }

  private isClaimable(record: OrchestrationRecord, now: number): boolean {
    return !record.claimedBy || (record.claimExpiresAt !== null && record.claimExpiresAt.getTime() <= now);
  }
}
