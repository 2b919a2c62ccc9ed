import type { OrchestrationState, SagaDirection, StepKind } from "./saga-types";

export type SagaAction =
  | { kind: "begin"; step: StepKind; next: OrchestrationState }
  | { kind: "execute"; step: StepKind; onSuccess: OrchestrationState; onFailure: OrchestrationState }
  | { kind: "route"; next: OrchestrationState; compensates: StepKind | null }
  | { kind: "compensate"; step: StepKind; onSuccess: OrchestrationState }
  | { kind: "terminal" };

/**
 * What the engine does next for each persisted state. Adding a step means
 * adding rows here; the engine only interprets the action kinds.
 */
export const SAGA_TRANSITIONS: Readonly<Record<OrchestrationState, SagaAction>> = {
  PENDING: { kind: "begin", step: "auth", next: "AUTH_IN_PROGRESS" },
  AUTH_IN_PROGRESS: { kind: "execute", step: "auth", onSuccess: "AUTH_COMPLETE", onFailure: "AUTH_FAILED" },
  AUTH_COMPLETE: { kind: "begin", step: "provisioning", next: "PROV_IN_PROGRESS" },
  AUTH_FAILED: { kind: "route", next: "ROLLED_BACK", compensates: null },
  PROV_IN_PROGRESS: {
    kind: "execute",
    step: "provisioning",
    onSuccess: "PROV_COMPLETE",
    onFailure: "PROV_FAILED"
  },
  PROV_COMPLETE: { kind: "begin", step: "dr", next: "DR_IN_PROGRESS" },
  PROV_FAILED: { kind: "route", next: "AUTH_COMPENSATING", compensates: "auth" },
  DR_IN_PROGRESS: { kind: "execute", step: "dr", onSuccess: "COMPLETED", onFailure: "DR_FAILED" },
  DR_FAILED: { kind: "route", next: "PROV_COMPENSATING", compensates: "provisioning" },
  PROV_COMPENSATING: { kind: "compensate", step: "provisioning", onSuccess: "AUTH_COMPENSATING" },
  AUTH_COMPENSATING: { kind: "compensate", step: "auth", onSuccess: "ROLLED_BACK" },
  COMPLETED: { kind: "terminal" },
  ROLLED_BACK: { kind: "terminal" }
};

export function nextAction(state: OrchestrationState): SagaAction {
  return SAGA_TRANSITIONS[state];
}

export function directionOf(action: SagaAction): SagaDirection {
  return action.kind === "begin" || action.kind === "execute" ? "forward" : "compensating";
}

/**
 * States reachable from `from` in one commit. `execute` and `compensate`
 * states may also commit onto themselves to record a failed or resumed
 * attempt without advancing.
 */
export function allowedNextStates(from: OrchestrationState): OrchestrationState[] {
  const action = SAGA_TRANSITIONS[from];
  switch (action.kind) {
    case "begin":
      return [action.next];
    case "execute":
      return [from, action.onSuccess, action.onFailure];
    case "route":
      return [action.next];
    case "compensate":
      return [from, action.onSuccess];
    case "terminal":
      return [];
  }
}

export function isAllowedTransition(from: OrchestrationState, to: OrchestrationState): boolean {
  return allowedNextStates(from).includes(to);
}
