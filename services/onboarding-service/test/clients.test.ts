import { afterEach, describe, expect, test, vi } from "vitest";
import { ZodError } from "zod";
import { DisasterRecoveryParticipant } from "../src/clients/disaster-recovery";
import {
  CollaboratorError,
  ResourceNotFoundError,
  StepTimeoutError,
  describeError,
  isRetryableError
} from "../src/clients/errors";
import { IdentityParticipant, createTenant, deleteTenant } from "../src/clients/identity";
import { ProvisioningParticipant } from "../src/clients/provisioning";
import type { ParticipantCall } from "../src/saga/participant";
import { buildRecord, buildRequest } from "./helpers";

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function stubFetch(response: () => Response) {
  const fetchMock = vi.fn<Parameters<typeof fetch>, Promise<Response>>(async () => response());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function buildCall(idempotencyKey = "orch-1:auth:forward"): ParticipantCall {
  return { signal: new AbortController().signal, idempotencyKey, traceId: "trace-1" };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("identity client", () => {
  test("creates the tenant with idempotency and trace headers", async () => {
    const fetchMock = stubFetch(() => jsonResponse(201, { id: "idp-42", issuer: "https://idp.test/acme" }));
    const tenant = buildRequest().tenant;

    const handle = await createTenant("http://identity.test", tenant, buildCall());

    expect(handle).toEqual({ tenantId: "acme", identityTenantId: "idp-42", issuer: "https://idp.test/acme" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://identity.test/v1/tenants");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      accept: "application/json",
      "content-type": "application/json",
      "idempotency-key": "orch-1:auth:forward",
      "x-trace-id": "trace-1"
    });
    expect(init?.body).toBe(JSON.stringify(tenant));
  });

  test("maps a 5xx answer to a retryable error", async () => {
    stubFetch(() => new Response("upstream down", { status: 503 }));

    const error = await createTenant("http://identity.test", buildRequest().tenant, buildCall()).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(isRetryableError(error)).toBe(true);
    expect(describeError(error)).toEqual({
      message: "identity POST /v1/tenants failed (503): upstream down",
      code: "HTTP_503"
    });
  });

  test("maps a 4xx answer to a permanent error carrying the server message", async () => {
    stubFetch(() => jsonResponse(400, { message: "domain already taken" }));

    const error = await createTenant("http://identity.test", buildRequest().tenant, buildCall()).catch(
      (caught: unknown) => caught
    );

    expect(isRetryableError(error)).toBe(false);
    expect(describeError(error).message).toBe("identity POST /v1/tenants failed (400): domain already taken");
  });

  test("treats 429 as retryable", async () => {
    stubFetch(() => jsonResponse(429, { message: "slow down" }));

    const error = await createTenant("http://identity.test", buildRequest().tenant, buildCall()).catch(
      (caught: unknown) => caught
    );

    expect(isRetryableError(error)).toBe(true);
  });

  test("reports a missing tenant on delete as not found", async () => {
    const fetchMock = stubFetch(() => jsonResponse(404, { message: "no such tenant" }));

    const error = await deleteTenant(
      "http://identity.test",
      { tenantId: "acme", identityTenantId: "idp 42" },
      buildCall("orch-1:auth:compensating")
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ResourceNotFoundError);
    expect(describeError(error)).toEqual({ message: "no such tenant", code: "NOT_FOUND" });
    expect(fetchMock.mock.calls[0][0]).toBe("http://identity.test/v1/tenants/idp%2042");
    expect(fetchMock.mock.calls[0][1]?.method).toBe("DELETE");
  });

  test("accepts an empty 204 on delete", async () => {
    stubFetch(() => new Response(null, { status: 204 }));

    await expect(
      deleteTenant("http://identity.test", { tenantId: "acme", identityTenantId: "idp-42" }, buildCall())
    ).resolves.toBeUndefined();
  });

  test("turns connection failures into retryable network errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<Parameters<typeof fetch>, Promise<Response>>(async () => {
        throw new TypeError("fetch failed");
      })
    );

    const error = await createTenant("http://identity.test", buildRequest().tenant, buildCall()).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(describeError(error)).toEqual({ message: "identity unreachable: fetch failed", code: "NETWORK" });
    expect(isRetryableError(error)).toBe(true);
  });

  test("rethrows the abort reason when the call was cancelled", async () => {
    const controller = new AbortController();
    const reason = new StepTimeoutError(50);
    controller.abort(reason);
    vi.stubGlobal(
      "fetch",
      vi.fn<Parameters<typeof fetch>, Promise<Response>>(async () => {
        throw new Error("This operation was aborted");
      })
    );

    const error = await createTenant("http://identity.test", buildRequest().tenant, {
      signal: controller.signal,
      idempotencyKey: "orch-1:auth:forward"
    }).catch((caught: unknown) => caught);

    expect(error).toBe(reason);
  });

  test("participant rejects a malformed handle without calling out", async () => {
    const fetchMock = stubFetch(() => new Response(null, { status: 204 }));
    const participant = new IdentityParticipant("http://identity.test");

    const error = await participant.performCompensation({ tenantId: "acme" }, buildCall()).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ZodError);
    expect(isRetryableError(error)).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("provisioning and disaster recovery participants", () => {
  test("provisioning sends the plan for the requested region", async () => {
    const fetchMock = stubFetch(() => jsonResponse(201, { environmentId: "env-7", region: "eu-west-1" }));
    const participant = new ProvisioningParticipant("http://provisioning.test");

    const handle = await participant.performForward(buildRecord(), buildCall("orch-1:provisioning:forward"));

    expect(handle).toEqual({ environmentId: "env-7", region: "eu-west-1" });
    const init = fetchMock.mock.calls[0][1];
    expect(fetchMock.mock.calls[0][0]).toBe("http://provisioning.test/v1/environments");
    expect(JSON.parse(String(init?.body))).toEqual({
      tenantId: "acme",
      region: "eu-west-1",
      plan: "premium",
      seats: 50
    });
  });

  test("dr replicates from the provisioned environment", async () => {
    const fetchMock = stubFetch(() => jsonResponse(201, { replicationId: "rep-3" }));
    const participant = new DisasterRecoveryParticipant("http://dr.test");
    const record = buildRecord({ context: { provisioning: { environmentId: "env-7", region: "eu-west-1" } } });

    const handle = await participant.performForward(record, buildCall("orch-1:dr:forward"));

    expect(handle).toEqual({ replicationId: "rep-3", sourceEnvironmentId: "env-7", targetRegion: "eu-central-1" });
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      tenantId: "acme",
      sourceEnvironmentId: "env-7",
      sourceRegion: "eu-west-1",
      targetRegion: "eu-central-1",
      rpoMinutes: 15,
      rtoMinutes: 60
    });
  });

  test("dr fails permanently when provisioning left no environment", async () => {
    const fetchMock = stubFetch(() => jsonResponse(201, { replicationId: "rep-3" }));
    const participant = new DisasterRecoveryParticipant("http://dr.test");

    const error = await participant.performForward(buildRecord(), buildCall("orch-1:dr:forward")).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ZodError);
    expect(isRetryableError(error)).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
