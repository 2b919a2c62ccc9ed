import { z } from "zod";
import type { OnboardingRequest } from "./onboarding-request";

export const workflowTypeSchema = z.enum(["customer_onboarding"]);
export type WorkflowType = z.infer<typeof workflowTypeSchema>;

export const orchestrationStateSchema = z.enum([
  "PENDING",
  "AUTH_IN_PROGRESS",
  "AUTH_COMPLETE",
  "AUTH_FAILED",
  "PROV_IN_PROGRESS",
  "PROV_COMPLETE",
  "PROV_FAILED",
  "DR_IN_PROGRESS",
  "COMPLETED",
  "DR_FAILED",
  "AUTH_COMPENSATING",
  "PROV_COMPENSATING",
  "ROLLED_BACK"
]);
export type OrchestrationState = z.infer<typeof orchestrationStateSchema>;

export const TERMINAL_STATES: readonly OrchestrationState[] = ["COMPLETED", "ROLLED_BACK"];

export function isTerminalState(state: OrchestrationState): boolean {
  return TERMINAL_STATES.includes(state);
}

export const NON_TERMINAL_STATES: readonly OrchestrationState[] = orchestrationStateSchema.options.filter(
  (state) => !isTerminalState(state)
);

export const DEFAULT_LIST_LIMIT = 100;

export const stepKindSchema = z.enum(["auth", "provisioning", "dr"]);
export type StepKind = z.infer<typeof stepKindSchema>;

export const stepStatusSchema = z.enum(["started", "completed", "failed", "compensated"]);
export type StepStatus = z.infer<typeof stepStatusSchema>;

export const sagaDirectionSchema = z.enum(["forward", "compensating"]);
export type SagaDirection = z.infer<typeof sagaDirectionSchema>;

export const stepOutputSchema = z.record(z.unknown());
export type StepOutput = z.infer<typeof stepOutputSchema>;

export const orchestrationContextSchema = z.object({
  auth: stepOutputSchema.optional(),
  provisioning: stepOutputSchema.optional(),
  dr: stepOutputSchema.optional()
});
export type OrchestrationContext = z.infer<typeof orchestrationContextSchema>;

export const orchestrationErrorSchema = z.object({
  step: stepKindSchema,
  direction: sagaDirectionSchema,
  attempt: z.number().int().nonnegative(),
  message: z.string(),
  code: z.string().optional(),
  retryable: z.boolean(),
  handle: stepOutputSchema.optional(),
  occurredAt: z.string()
});
export type OrchestrationError = z.infer<typeof orchestrationErrorSchema>;

export type OrchestrationRecord = {
  id: string;
  type: WorkflowType;
  idempotencyKey: string;
  state: OrchestrationState;
  payload: OnboardingRequest;
  context: OrchestrationContext;
  error: OrchestrationError | null;
  rootCause: OrchestrationError | null;
  claimedBy: string | null;
  claimExpiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
};

export type StepRecord = {
  id: string;
  orchestrationId: string;
  step: StepKind;
  direction: SagaDirection;
  status: StepStatus;
  attempt: number;
  input: StepOutput;
  output: StepOutput | null;
  error: string | null;
  startedAt: Date;
  completedAt: Date | null;
};
