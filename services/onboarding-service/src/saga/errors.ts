import type { OrchestrationState } from "./saga-types";

export class OrchestrationNotFoundError extends Error {
  public readonly statusCode = 404;

  constructor(public readonly orchestrationId: string) {
    super(`Orchestration ${orchestrationId} not found`);
    this.name = "OrchestrationNotFoundError";
  }
}

/** The caller no longer holds the lease, or the record moved on under it. */
export class ClaimLostError extends Error {
  public readonly statusCode = 409;

  constructor(
    public readonly orchestrationId: string,
    public readonly owner: string
  ) {
    super(`Claim on orchestration ${orchestrationId} is no longer held by ${owner}`);
    this.name = "ClaimLostError";
  }
}

export class InvalidTransitionError extends Error {
  public readonly statusCode = 409;

  constructor(
    public readonly from: OrchestrationState,
    public readonly to: OrchestrationState
  ) {
    super(`Transition ${from} -> ${to} is not allowed`);
    this.name = "InvalidTransitionError";
  }
}

export class StepRecordConflictError extends Error {
  public readonly statusCode = 409;

  constructor(message: string) {
    super(message);
    this.name = "StepRecordConflictError";
  }
}
