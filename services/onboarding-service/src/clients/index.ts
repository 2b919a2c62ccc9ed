import type { SagaParticipants } from "../saga/participant";
import { DisasterRecoveryParticipant } from "./disaster-recovery";
import { IdentityParticipant } from "./identity";
import { ProvisioningParticipant } from "./provisioning";

export function createParticipants(urls: { identityUrl: string; provisioningUrl: string; drUrl: string }): SagaParticipants {
  return {
    auth: new IdentityParticipant(urls.identityUrl),
    provisioning: new ProvisioningParticipant(urls.provisioningUrl),
    dr: new DisasterRecoveryParticipant(urls.drUrl)
  };
}
