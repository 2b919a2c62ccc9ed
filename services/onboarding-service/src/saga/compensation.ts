import { ResourceNotFoundError } from "../clients/errors";
import type { SagaParticipants } from "./participant";
import type { OrchestrationRecord, StepKind } from "./saga-types";
import type { ExecutionScope, StepExecutor, StepOutcome } from "./step-executor";

export type CompensationResult = {
  /** The collaborator reported the resource as already gone. */
  alreadyAbsent: boolean;
  /** No handle was recorded for the step, so there was nothing to undo. */
  skipped: boolean;
};

/**
 * Inverse operations for the forward steps. Every inverse is idempotent: a
 * resource that is already gone counts as compensated, since an earlier
 * attempt may have removed it before a crash lost the bookkeeping.
 */
export class CompensationRegistry {
  constructor(
    private readonly participants: SagaParticipants,
    private readonly executor: StepExecutor
  ) {}

  async compensate(
    step: StepKind,
    record: OrchestrationRecord,
    scope: ExecutionScope = {}
  ): Promise<StepOutcome<CompensationResult>> {
    const handle = record.context[step];
    if (!handle) {
      return {
        status: "succeeded",
        value: { alreadyAbsent: false, skipped: true },
        attempt: 0,
        startedAt: new Date(),
        failures: []
      };
    }
    const participant = this.participants[step];
    return this.executor.run(
      async (call) => {
        try {
          await participant.performCompensation(handle, call);
          return { alreadyAbsent: false, skipped: false };
        } catch (error) {
          if (error instanceof ResourceNotFoundError) {
            return { alreadyAbsent: true, skipped: false };
          }
          throw error;
        }
      },
      record.id,
      step,
      "compensating",
      scope
    );
  }
}
