import { createHash } from "node:crypto";
import type { WorkflowType } from "./saga-types";

export function buildIdempotencyKey(type: WorkflowType, tenantId: string): string {
  return createHash("sha256").update(`${type}:${tenantId.toLowerCase()}`).digest("hex");
}
