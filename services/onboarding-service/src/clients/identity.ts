import { z } from "zod";
import type { OnboardingRequest } from "../saga/onboarding-request";
import type { ParticipantCall, SagaParticipant } from "../saga/participant";
import type { OrchestrationRecord, StepOutput } from "../saga/saga-types";
import { requestJson } from "./http";

export const tenantHandleSchema = z.object({
  tenantId: z.string(),
  identityTenantId: z.string(),
  issuer: z.string().optional()
});
export type TenantHandle = z.infer<typeof tenantHandleSchema>;

const createTenantResponseSchema = z.object({
  id: z.string().min(1),
  issuer: z.string().optional()
});

export async function createTenant(
  baseUrl: string,
  spec: OnboardingRequest["tenant"],
  call: ParticipantCall
): Promise<TenantHandle> {
  const body = await requestJson("identity", baseUrl, {
    method: "POST",
    path: "/v1/tenants",
    body: spec,
    signal: call.signal,
    idempotencyKey: call.idempotencyKey,
    traceId: call.traceId
  });
  const created = createTenantResponseSchema.parse(body);
  return { tenantId: spec.tenantId, identityTenantId: created.id, issuer: created.issuer };
}

export async function deleteTenant(baseUrl: string, handle: TenantHandle, call: ParticipantCall): Promise<void> {
  await requestJson("identity", baseUrl, {
    method: "DELETE",
    path: `/v1/tenants/${encodeURIComponent(handle.identityTenantId)}`,
    signal: call.signal,
    idempotencyKey: call.idempotencyKey,
    traceId: call.traceId
  });
}

export class IdentityParticipant implements SagaParticipant {
  readonly step = "auth";

  constructor(private readonly baseUrl: string) {}

  describeInput(record: OrchestrationRecord): StepOutput {
    return { ...record.payload.tenant };
  }

  async performForward(record: OrchestrationRecord, call: ParticipantCall): Promise<StepOutput> {
    return createTenant(this.baseUrl, record.payload.tenant, call);
  }

  async performCompensation(handle: StepOutput, call: ParticipantCall): Promise<void> {
    return deleteTenant(this.baseUrl, tenantHandleSchema.parse(handle), call);
  }
}
