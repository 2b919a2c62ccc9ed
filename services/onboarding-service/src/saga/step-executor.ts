import type { ParticipantCall, SagaParticipants } from "./participant";
import { runWithRetry, type AttemptFailure, type RetryPolicy } from "./retry";
import type { OrchestrationRecord, SagaDirection, StepKind, StepOutput } from "./saga-types";

export type StepOutcome<T = StepOutput> =
  | { status: "succeeded"; value: T; attempt: number; startedAt: Date; failures: AttemptFailure[] }
  | { status: "failed"; error: unknown; attempt: number; failures: AttemptFailure[] }
  | { status: "cancelled"; attempt: number; failures: AttemptFailure[] };

export type StepExecutorOptions = {
  policy: RetryPolicy;
  timeoutMs: number;
  isRetryable?: (error: unknown) => boolean;
  random?: () => number;
};

export type ExecutionScope = {
  signal?: AbortSignal;
  traceId?: string;
};

export function buildCallIdempotencyKey(orchestrationId: string, step: StepKind, direction: SagaDirection): string {
  return `${orchestrationId}:${step}:${direction}`;
}

/**
 * Wraps one collaborator call in the timeout and retry policy. It never
 * touches the store; the engine records whatever outcome comes back.
 */
export class StepExecutor {
  constructor(
    private readonly participants: SagaParticipants,
    private readonly options: StepExecutorOptions
  ) {}

  execute(step: StepKind, record: OrchestrationRecord, scope: ExecutionScope = {}): Promise<StepOutcome> {
    const participant = this.participants[step];
    return this.run((call) => participant.performForward(record, call), record.id, step, "forward", scope);
  }

  async run<T>(
    operation: (call: ParticipantCall) => Promise<T>,
    orchestrationId: string,
    step: StepKind,
    direction: SagaDirection,
    scope: ExecutionScope = {}
  ): Promise<StepOutcome<T>> {
    const idempotencyKey = buildCallIdempotencyKey(orchestrationId, step, direction);
    const result = await runWithRetry((signal) => operation({ signal, idempotencyKey, traceId: scope.traceId }), {
      policy: this.options.policy,
      timeoutMs: this.options.timeoutMs,
      isRetryable: this.options.isRetryable,
      random: this.options.random,
      signal: scope.signal
    });
    if (result.ok) {
      return {
        status: "succeeded",
        value: result.value,
        attempt: result.attempt,
        startedAt: result.startedAt,
        failures: result.failures
      };
    }
    if (result.cancelled) {
      return { status: "cancelled", attempt: result.attempt, failures: result.failures };
    }
    return { status: "failed", error: result.error, attempt: result.attempt, failures: result.failures };
  }
}
