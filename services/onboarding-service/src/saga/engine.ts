import { randomUUID } from "node:crypto";
import { describeError, isRetryableError } from "../clients/errors";
import { logger as rootLogger, type Logger } from "../logger";
import { orchestrationLogger } from "../trace/trace";
import type { CompensationRegistry } from "./compensation";
import { ClaimLostError } from "./errors";
import type { SagaParticipants } from "./participant";
import type { AttemptFailure } from "./retry";
import type { NewStepRecord, OrchestrationStore, OrchestrationTransition } from "./saga-store";
import {
  isTerminalState,
  type OrchestrationContext,
  type OrchestrationError,
  type OrchestrationRecord,
  type OrchestrationState,
  type SagaDirection,
  type StepKind,
  type StepOutput
} from "./saga-types";
import type { ExecutionScope, StepExecutor } from "./step-executor";
import { nextAction } from "./transitions";

export type CompletionEvent =
  | {
      status: "COMPLETED";
      orchestrationId: string;
      tenantId: string;
      context: OrchestrationContext;
      completedAt: Date;
    }
  | {
      status: "ROLLED_BACK";
      orchestrationId: string;
      tenantId: string;
      failedStep: StepKind | null;
      error: OrchestrationError | null;
      completedAt: Date;
    };

export type CompletionCallback = (event: CompletionEvent) => Promise<void> | void;

export type DispatchOutcome =
  /** Unknown id. */
  | "not_found"
  /** Already COMPLETED or ROLLED_BACK; nothing was touched. */
  | "already_terminal"
  /** Another worker holds the lease. */
  | "busy"
  /** Reached a terminal state in this cycle. */
  | "finished"
  /** A compensation exhausted its retries; the record stays in its _COMPENSATING state. */
  | "stalled"
  /** Shutdown or a lost lease stopped the cycle; the poller resumes it. */
  | "interrupted";

export type DispatchResult = {
  outcome: DispatchOutcome;
  orchestrationId: string;
  state: OrchestrationState | null;
};

export type SagaEngineOptions = {
  store: OrchestrationStore;
  participants: SagaParticipants;
  executor: StepExecutor;
  compensations: CompensationRegistry;
  leaseMs: number;
  /** How often an in-flight call renews the claim; defaults to a third of the lease. */
  heartbeatMs?: number;
  workerId?: string;
  onCompletion?: CompletionCallback;
  logger?: Logger;
  now?: () => Date;
};

type Cycle = {
  owner: string;
  scope: ExecutionScope;
  log: Logger;
  /** `${direction}:${step}` whose `started` row this cycle already committed. */
  startedFor: string | null;
};

function failureRow(
  step: StepKind,
  direction: SagaDirection,
  input: StepOutput,
  failure: AttemptFailure
): NewStepRecord {
  return {
    step,
    direction,
    status: "failed",
    attempt: failure.attempt,
    input,
    output: null,
    error: describeError(failure.error).message,
    startedAt: failure.startedAt,
    completedAt: failure.finishedAt
  };
}

/**
 * Drives one orchestration from whatever state is persisted to the next
 * terminal (or stuck) state. The next move is always looked up from the stored
 * state, never from memory, so a crashed cycle resumes by dispatching again.
 */
export class SagaEngine {
  private readonly workerId: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: SagaEngineOptions) {
    this.workerId = options.workerId ?? randomUUID();
    this.logger = options.logger ?? rootLogger;
    this.now = options.now ?? (() => new Date());
  }

  async dispatch(orchestrationId: string, scope: ExecutionScope = {}): Promise<DispatchResult> {
    const { store } = this.options;
    const log = orchestrationLogger(this.logger, orchestrationId, scope.traceId);

    const current = await store.getOrchestration(orchestrationId);
    if (!current) {
      return { outcome: "not_found", orchestrationId, state: null };
    }
    if (isTerminalState(current.state)) {
      return { outcome: "already_terminal", orchestrationId, state: current.state };
    }

    const owner = `${this.workerId}:${randomUUID()}`;
    const claimed = await store.claimOrchestration(orchestrationId, owner, this.options.leaseMs);
    if (!claimed) {
      const latest = await store.getOrchestration(orchestrationId);
      if (latest && isTerminalState(latest.state)) {
        return { outcome: "already_terminal", orchestrationId, state: latest.state };
      }
      log.debug({ state: latest?.state }, "Orchestration is claimed elsewhere; backing off");
      return { outcome: "busy", orchestrationId, state: latest?.state ?? current.state };
    }

    const cycle: Cycle = { owner, scope, log, startedFor: null };
    try {
      return await this.drive(claimed, cycle);
    } catch (error) {
      if (error instanceof ClaimLostError) {
        log.warn({ owner }, "Lost claim mid-cycle; leaving orchestration to its new owner");
        return { outcome: "interrupted", orchestrationId, state: null };
      }
      throw error;
    } finally {
      await this.release(orchestrationId, owner, log);
    }
  }

  private async drive(claimed: OrchestrationRecord, cycle: Cycle): Promise<DispatchResult> {
    let record = claimed;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const action = nextAction(record.state);
      switch (action.kind) {
        case "terminal":
          return { outcome: "finished", orchestrationId: record.id, state: record.state };

        case "begin": {
          const participant = this.options.participants[action.step];
          record = await this.commit(record, cycle, {
            to: action.next,
            steps: [this.startedRow(action.step, "forward", participant.describeInput(record))]
          });
          cycle.startedFor = `forward:${action.step}`;
          break;
        }

        case "execute": {
          const next = await this.executeStep(record, action.step, action.onSuccess, action.onFailure, cycle);
          if (!next) {
            return { outcome: "interrupted", orchestrationId: record.id, state: record.state };
          }
          record = next;
          break;
        }

        case "route": {
          const steps = action.compensates
            ? [this.startedRow(action.compensates, "compensating", record.context[action.compensates] ?? {})]
            : [];
          record = await this.commit(record, cycle, { to: action.next, steps });
          cycle.startedFor = action.compensates ? `compensating:${action.compensates}` : null;
          if (action.compensates) {
            cycle.log.info({ state: record.state, step: action.compensates }, "Compensation started");
          }
          break;
        }

        case "compensate": {
          const next = await this.compensateStep(record, action.step, action.onSuccess, cycle);
          if (next.outcome) {
            return { outcome: next.outcome, orchestrationId: record.id, state: next.record.state };
          }
          record = next.record;
          break;
        }
      }

      if (isTerminalState(record.state)) {
        await this.notify(record, cycle.log);
      }
    }
  }

  private async executeStep(
    record: OrchestrationRecord,
    step: StepKind,
    onSuccess: OrchestrationState,
    onFailure: OrchestrationState,
    cycle: Cycle
  ): Promise<OrchestrationRecord | null> {
    const participant = this.options.participants[step];
    const input = participant.describeInput(record);
    let current = record;
    if (cycle.startedFor !== `forward:${step}`) {
      cycle.log.info({ state: record.state, step }, "Resuming step from persisted state");
      current = await this.commit(current, cycle, {
        to: current.state,
        steps: [this.startedRow(step, "forward", input)]
      });
    }
    cycle.startedFor = null;

    const outcome = await this.whileLeased(current.id, cycle, (scope) =>
      this.options.executor.execute(step, current, scope)
    );
    const failed = outcome.failures.map((failure) => failureRow(step, "forward", input, failure));

    if (outcome.status === "cancelled") {
      cycle.log.warn({ step, attempt: outcome.attempt }, "Step cancelled; leaving orchestration for the poller");
      return null;
    }

    if (outcome.status === "succeeded") {
      const contextPatch: OrchestrationContext = {};
      contextPatch[step] = outcome.value;
      const next = await this.commit(current, cycle, {
        to: onSuccess,
        contextPatch,
        steps: [
          ...failed,
          {
            step,
            direction: "forward",
            status: "completed",
            attempt: outcome.attempt,
            input,
            output: outcome.value,
            error: null,
            startedAt: outcome.startedAt,
            completedAt: this.now()
          }
        ]
      });
      cycle.log.info({ step, attempt: outcome.attempt, state: next.state }, "Step completed");
      return next;
    }

    const error = this.buildError(step, "forward", outcome.attempt, outcome.error);
    const next = await this.commit(current, cycle, { to: onFailure, error, rootCause: error, steps: failed });
    cycle.log.warn({ step, attempt: outcome.attempt, error, state: next.state }, "Step failed; rolling back");
    return next;
  }

  private async compensateStep(
    record: OrchestrationRecord,
    step: StepKind,
    onSuccess: OrchestrationState,
    cycle: Cycle
  ): Promise<{ record: OrchestrationRecord; outcome: DispatchOutcome | null }> {
    const handle = record.context[step] ?? {};
    let current = record;
    if (cycle.startedFor !== `compensating:${step}`) {
      current = await this.commit(current, cycle, {
        to: current.state,
        steps: [this.startedRow(step, "compensating", handle)]
      });
    }
    cycle.startedFor = null;

    const outcome = await this.whileLeased(current.id, cycle, (scope) =>
      this.options.compensations.compensate(step, current, scope)
    );
    const failed = outcome.failures.map((failure) => failureRow(step, "compensating", handle, failure));

    if (outcome.status === "cancelled") {
      cycle.log.warn({ step, attempt: outcome.attempt }, "Compensation cancelled; leaving orchestration for the poller");
      return { record: current, outcome: "interrupted" };
    }

    if (outcome.status === "succeeded") {
      const next = await this.commit(current, cycle, {
        to: onSuccess,
        steps: [
          ...failed,
          {
            step,
            direction: "compensating",
            status: "compensated",
            attempt: outcome.attempt,
            input: handle,
            output: { ...outcome.value },
            error: null,
            startedAt: outcome.startedAt,
            completedAt: this.now()
          }
        ]
      });
      cycle.log.info({ step, ...outcome.value, state: next.state }, "Step compensated");
      return { record: next, outcome: null };
    }

    // Neither completed nor cleanly rolled back: keep the state and leave the
    // details an operator needs to finish the job by hand.
    const error = this.buildError(step, "compensating", outcome.attempt, outcome.error, handle);
    const stuck = await this.commit(current, cycle, { to: current.state, error, steps: failed });
    cycle.log.error({ alert: true, step, error, state: stuck.state }, "Compensation failed; orchestration needs attention");
    return { record: stuck, outcome: "stalled" };
  }

  /**
   * Keeps the claim alive for as long as `work` runs. If a renewal is refused
   * or fails, the call in flight is aborted so no second worker can overlap it.
   */
  private async whileLeased<T>(
    orchestrationId: string,
    cycle: Cycle,
    work: (scope: ExecutionScope) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const parent = cycle.scope.signal;
    const forwardAbort = () => controller.abort(parent?.reason);
    if (parent?.aborted) {
      controller.abort(parent.reason);
    } else {
      parent?.addEventListener("abort", forwardAbort, { once: true });
    }
    const heartbeatMs = this.options.heartbeatMs ?? Math.max(1, Math.floor(this.options.leaseMs / 3));
    const timer = setInterval(() => void this.renewLease(orchestrationId, cycle, controller), heartbeatMs);
    timer.unref();
    try {
      return await work({ ...cycle.scope, signal: controller.signal });
    } finally {
      clearInterval(timer);
      parent?.removeEventListener("abort", forwardAbort);
    }
  }

  private async renewLease(orchestrationId: string, cycle: Cycle, controller: AbortController): Promise<void> {
    if (controller.signal.aborted) {
      return;
    }
    try {
      const renewed = await this.options.store.renewClaim(orchestrationId, cycle.owner, this.options.leaseMs);
      if (!renewed) {
        cycle.log.warn({ owner: cycle.owner }, "Claim renewal refused; abandoning the call in flight");
        controller.abort(new ClaimLostError(orchestrationId, cycle.owner));
      }
    } catch (error) {
      cycle.log.warn({ error }, "Claim renewal failed; abandoning the call in flight");
      controller.abort(error);
    }
  }

  private async commit(
    record: OrchestrationRecord,
    cycle: Cycle,
    change: Pick<OrchestrationTransition, "to" | "contextPatch" | "error" | "rootCause" | "steps">
  ): Promise<OrchestrationRecord> {
    return this.options.store.commitTransition({
      ...change,
      orchestrationId: record.id,
      owner: cycle.owner,
      from: record.state,
      leaseMs: this.options.leaseMs
    });
  }

  private startedRow(step: StepKind, direction: SagaDirection, input: StepOutput): NewStepRecord {
    return {
      step,
      direction,
      status: "started",
      attempt: 1,
      input,
      output: null,
      error: null,
      startedAt: this.now(),
      completedAt: null
    };
  }

  private buildError(
    step: StepKind,
    direction: SagaDirection,
    attempt: number,
    cause: unknown,
    handle?: StepOutput
  ): OrchestrationError {
    const { message, code } = describeError(cause);
    return {
      step,
      direction,
      attempt,
      message,
      ...(code ? { code } : {}),
      retryable: isRetryableError(cause),
      ...(handle ? { handle } : {}),
      occurredAt: this.now().toISOString()
    };
  }

  private async notify(record: OrchestrationRecord, log: Logger): Promise<void> {
    const { onCompletion } = this.options;
    const completedAt = record.completedAt ?? this.now();
    const tenantId = record.payload.tenant.tenantId;
    log.info({ state: record.state, tenantId }, "Orchestration reached terminal state");
    if (!onCompletion) {
      return;
    }
    const event: CompletionEvent =
      record.state === "COMPLETED"
        ? { status: "COMPLETED", orchestrationId: record.id, tenantId, context: record.context, completedAt }
        : {
            status: "ROLLED_BACK",
            orchestrationId: record.id,
            tenantId,
            failedStep: record.rootCause?.step ?? null,
            error: record.rootCause ?? record.error,
            completedAt
          };
    try {
      await onCompletion(event);
    } catch (error) {
      log.error({ error, state: record.state }, "Completion callback failed");
    }
  }

  private async release(orchestrationId: string, owner: string, log: Logger): Promise<void> {
    try {
      await this.options.store.releaseOrchestration(orchestrationId, owner);
    } catch (error) {
      log.warn({ error }, "Could not release claim; it will lapse when the lease expires");
    }
  }
}
