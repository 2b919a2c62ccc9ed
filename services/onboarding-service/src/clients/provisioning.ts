import { z } from "zod";
import type { ParticipantCall, SagaParticipant } from "../saga/participant";
import type { OrchestrationRecord, StepOutput } from "../saga/saga-types";
import { requestJson } from "./http";

export const resourceHandleSchema = z.object({
  environmentId: z.string(),
  region: z.string(),
  endpoint: z.string().optional()
});
export type ResourceHandle = z.infer<typeof resourceHandleSchema>;

export type ProvisionSpec = {
  tenantId: string;
  region: string;
  plan: string;
  seats?: number;
};

const provisionResponseSchema = z.object({
  environmentId: z.string().min(1),
  region: z.string().min(1),
  endpoint: z.string().optional()
});

export async function provision(baseUrl: string, spec: ProvisionSpec, call: ParticipantCall): Promise<ResourceHandle> {
  const body = await requestJson("provisioning", baseUrl, {
    method: "POST",
    path: "/v1/environments",
    body: spec,
    signal: call.signal,
    idempotencyKey: call.idempotencyKey,
    traceId: call.traceId
  });
  return provisionResponseSchema.parse(body);
}

export async function deprovision(baseUrl: string, handle: ResourceHandle, call: ParticipantCall): Promise<void> {
  await requestJson("provisioning", baseUrl, {
    method: "DELETE",
    path: `/v1/environments/${encodeURIComponent(handle.environmentId)}`,
    signal: call.signal,
    idempotencyKey: call.idempotencyKey,
    traceId: call.traceId
  });
}

export class ProvisioningParticipant implements SagaParticipant {
  readonly step = "provisioning";

  constructor(private readonly baseUrl: string) {}

  describeInput(record: OrchestrationRecord): StepOutput {
    return this.buildSpec(record);
  }

  async performForward(record: OrchestrationRecord, call: ParticipantCall): Promise<StepOutput> {
    return provision(this.baseUrl, this.buildSpec(record), call);
  }

  async performCompensation(handle: StepOutput, call: ParticipantCall): Promise<void> {
    return deprovision(this.baseUrl, resourceHandleSchema.parse(handle), call);
  }

  private buildSpec(record: OrchestrationRecord): ProvisionSpec {
    const { provisioning, tenant } = record.payload;
    return {
      tenantId: tenant.tenantId,
      region: provisioning.region,
      plan: provisioning.plan,
      ...(provisioning.seats !== undefined ? { seats: provisioning.seats } : {})
    };
  }
}
