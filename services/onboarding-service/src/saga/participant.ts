import type { OrchestrationRecord, StepKind, StepOutput } from "./saga-types";

export type ParticipantCall = {
  signal: AbortSignal;
  /** Stable per orchestration and step, so a re-invoked call after a timeout is deduplicated remotely. */
  idempotencyKey: string;
  traceId?: string;
};

/**
 * One external system taking part in the onboarding saga. The engine only
 * depends on this capability; identity, provisioning and disaster recovery are
 * its three implementations.
 */
export interface SagaParticipant {
  readonly step: StepKind;
  describeInput(record: OrchestrationRecord): StepOutput;
  performForward(record: OrchestrationRecord, call: ParticipantCall): Promise<StepOutput>;
  /** Must succeed when the resource is already gone. */
  performCompensation(handle: StepOutput, call: ParticipantCall): Promise<void>;
}

export type SagaParticipants = Readonly<Record<StepKind, SagaParticipant>>;
