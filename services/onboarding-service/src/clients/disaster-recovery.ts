import { z } from "zod";
import type { ParticipantCall, SagaParticipant } from "../saga/participant";
import type { OrchestrationRecord, StepOutput } from "../saga/saga-types";
import { requestJson } from "./http";
import { resourceHandleSchema } from "./provisioning";

export const replicationHandleSchema = z.object({
  replicationId: z.string(),
  sourceEnvironmentId: z.string(),
  targetRegion: z.string()
});
export type ReplicationHandle = z.infer<typeof replicationHandleSchema>;

export type ReplicationSpec = {
  tenantId: string;
  sourceEnvironmentId: string;
  sourceRegion: string;
  targetRegion: string;
  rpoMinutes: number;
  rtoMinutes: number;
};

const replicationResponseSchema = z.object({
  replicationId: z.string().min(1)
});

export async function configureReplication(
  baseUrl: string,
  spec: ReplicationSpec,
  call: ParticipantCall
): Promise<ReplicationHandle> {
  const body = await requestJson("disaster-recovery", baseUrl, {
    method: "POST",
    path: "/v1/replications",
    body: spec,
    signal: call.signal,
    idempotencyKey: call.idempotencyKey,
    traceId: call.traceId
  });
  const created = replicationResponseSchema.parse(body);
  return {
    replicationId: created.replicationId,
    sourceEnvironmentId: spec.sourceEnvironmentId,
    targetRegion: spec.targetRegion
  };
}

export async function teardownReplication(
  baseUrl: string,
  handle: ReplicationHandle,
  call: ParticipantCall
): Promise<void> {
  await requestJson("disaster-recovery", baseUrl, {
    method: "DELETE",
    path: `/v1/replications/${encodeURIComponent(handle.replicationId)}`,
    signal: call.signal,
    idempotencyKey: call.idempotencyKey,
    traceId: call.traceId
  });
}

export class DisasterRecoveryParticipant implements SagaParticipant {
  readonly step = "dr";

  constructor(private readonly baseUrl: string) {}

  describeInput(record: OrchestrationRecord): StepOutput {
    return { ...record.payload.dr, tenantId: record.payload.tenant.tenantId };
  }

  async performForward(record: OrchestrationRecord, call: ParticipantCall): Promise<StepOutput> {
    // Replication needs the environment created by the provisioning step.
    const source = resourceHandleSchema.parse(record.context.provisioning);
    return configureReplication(
      this.baseUrl,
      {
        tenantId: record.payload.tenant.tenantId,
        sourceEnvironmentId: source.environmentId,
        sourceRegion: source.region,
        targetRegion: record.payload.dr.targetRegion,
        rpoMinutes: record.payload.dr.rpoMinutes,
        rtoMinutes: record.payload.dr.rtoMinutes
      },
      call
    );
  }

  async performCompensation(handle: StepOutput, call: ParticipantCall): Promise<void> {
    return teardownReplication(this.baseUrl, replicationHandleSchema.parse(handle), call);
  }
}
