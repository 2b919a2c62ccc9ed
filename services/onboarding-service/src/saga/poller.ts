import { logger as rootLogger, type Logger } from "../logger";
import type { Dispatcher } from "./dispatcher";
import type { OrchestrationStore } from "./saga-store";
import { NON_TERMINAL_STATES } from "./saga-types";
import { directionOf, nextAction } from "./transitions";

export type PollerOptions = {
  store: OrchestrationStore;
  dispatcher: Dispatcher;
  intervalMs: number;
  staleAfterMs: number;
  batchSize: number;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Periodic scan for orchestrations nobody is advancing (crashed worker,
 * interrupted cycle, failed compensation) and re-dispatch of each through the
 * same claim path as new work.
 */
export class OrchestrationPoller {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: PollerOptions) {
    this.logger = (options.logger ?? rootLogger).child({ component: "poller" });
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => void this.tick(), this.options.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.options.intervalMs, traceId: "system" }, "Orchestration poller started");
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * One scan; resolves with the number of records handed to the dispatcher.
   * Their cycles run in the background, tracked by the dispatcher for `drain`.
   */
  async pollOnce(): Promise<number> {
    const updatedBefore = new Date(this.now().getTime() - this.options.staleAfterMs);
    const stale = await this.options.store.findStaleOrchestrations({
      states: NON_TERMINAL_STATES,
      updatedBefore,
      limit: this.options.batchSize
    });
    if (stale.length === 0) {
      return 0;
    }

    for (const record of stale) {
      if (directionOf(nextAction(record.state)) === "compensating" && record.error?.direction === "compensating") {
        this.logger.error(
          { alert: true, orchestrationId: record.id, state: record.state, error: record.error },
          "Retrying stuck compensation"
        );
      } else {
        this.logger.info({ orchestrationId: record.id, state: record.state }, "Resuming stale orchestration");
      }
    }
    for (const record of stale) {
      void this.options.dispatcher.schedule(record.id);
    }
    return stale.length;
  }

  private async tick(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = this.runCycle();
    await this.running;
  }

  private async runCycle(): Promise<void> {
    try {
      await this.pollOnce();
    } catch (error) {
      this.logger.error({ error }, "Poll cycle failed");
    } finally {
      this.running = null;
    }
  }
}
