import { logger as rootLogger, type Logger } from "../logger";
import { orchestrationLogger } from "../trace/trace";
import type { DispatchResult, SagaEngine } from "./engine";
import { parseOnboardingRequest } from "./onboarding-request";
import { buildIdempotencyKey } from "./saga";
import type { OrchestrationStore } from "./saga-store";
import { isTerminalState, type OrchestrationState } from "./saga-types";

export type IntakeResult = {
  orchestrationId: string;
  state: OrchestrationState;
  /** False when the idempotency key matched an existing orchestration. */
  created: boolean;
};

export type DispatcherOptions = {
  store: OrchestrationStore;
  engine: SagaEngine;
  logger?: Logger;
};

/**
 * Entry point for new onboarding work. Dispatches run in the background, one
 * promise per orchestration; `drain` waits for the ones still running.
 */
export class Dispatcher {
  private readonly inFlight = new Set<Promise<DispatchResult | null>>();
  private readonly controller = new AbortController();
  private readonly logger: Logger;

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger ?? rootLogger;
  }

  async intake(input: unknown, traceId?: string): Promise<IntakeResult> {
    const request = parseOnboardingRequest(input);
    const idempotencyKey = buildIdempotencyKey("customer_onboarding", request.tenant.tenantId);
    const { record, created } = await this.options.store.createOrchestration({
      type: "customer_onboarding",
      idempotencyKey,
      payload: request
    });
    const log = orchestrationLogger(this.logger, record.id, traceId);

    if (!created) {
      log.info(
        { state: record.state, tenantId: request.tenant.tenantId },
        "Duplicate onboarding request; returning existing orchestration"
      );
      // A stalled or abandoned record gets another cycle; a running one is left alone.
      if (!isTerminalState(record.state) && record.claimedBy === null) {
        void this.schedule(record.id, traceId);
      }
      return { orchestrationId: record.id, state: record.state, created: false };
    }

    log.info({ tenantId: request.tenant.tenantId }, "Onboarding orchestration created");
    void this.schedule(record.id, traceId);
    return { orchestrationId: record.id, state: record.state, created: true };
  }

  /** Never rejects: store failures end the cycle and the poller picks the record up again. */
  schedule(orchestrationId: string, traceId?: string): Promise<DispatchResult | null> {
    if (this.controller.signal.aborted) {
      return Promise.resolve(null);
    }
    const run: Promise<DispatchResult | null> = this.runDispatch(orchestrationId, traceId).finally(() => {
      this.inFlight.delete(run);
    });
    this.inFlight.add(run);
    return run;
  }

  get activeDispatches(): number {
    return this.inFlight.size;
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /** Aborts in-flight calls and backoff waits, then waits for the cycles to wind down. */
  async stop(): Promise<void> {
    this.controller.abort(new Error("Dispatcher stopped"));
    await this.drain();
  }

  private async runDispatch(orchestrationId: string, traceId?: string): Promise<DispatchResult | null> {
    try {
      return await this.options.engine.dispatch(orchestrationId, { signal: this.controller.signal, traceId });
    } catch (error) {
      orchestrationLogger(this.logger, orchestrationId, traceId).error(
        { error },
        "Dispatch cycle failed; will resume from the last committed state"
      );
      return null;
    }
  }
}
