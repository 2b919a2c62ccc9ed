import { describe, expect, test } from "vitest";
import { ResourceNotFoundError, StepTimeoutError } from "../src/clients/errors";
import { CompensationRegistry } from "../src/saga/compensation";
import { computeBackoff, runWithRetry } from "../src/saga/retry";
import { StepExecutor } from "../src/saga/step-executor";
import { FakeParticipant, buildRecord, permanentError, transientError } from "./helpers";

const fastPolicy = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

describe("computeBackoff", () => {
  const policy = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1_000 };

  test("doubles the ceiling per attempt and keeps half of it fixed", () => {
    expect(computeBackoff(1, policy, () => 0)).toBe(50);
    expect(computeBackoff(1, policy, () => 1)).toBe(100);
    expect(computeBackoff(4, policy, () => 0.5)).toBe(600);
  });

  test("caps the delay at maxDelayMs", () => {
    expect(computeBackoff(6, policy, () => 0)).toBe(500);
    expect(computeBackoff(6, policy, () => 1)).toBe(1_000);
  });
});

describe("runWithRetry", () => {
  test("retries transient failures until the operation succeeds", async () => {
    let calls = 0;
    const result = await runWithRetry(
      async () => {
        calls += 1;
        if (calls < 3) {
          throw transientError();
        }
        return "done";
      },
      { policy: fastPolicy, timeoutMs: 1_000, random: () => 0 }
    );

    expect(result.ok).toBe(true);
    expect(result.attempt).toBe(3);
    expect(result.failures.map((failure) => failure.attempt)).toEqual([1, 2]);
    expect(result.failures.every((failure) => failure.retryable)).toBe(true);
  });

  test("stops at the first non-retryable failure", async () => {
    let calls = 0;
    const result = await runWithRetry(
      async () => {
        calls += 1;
        throw permanentError();
      },
      { policy: fastPolicy, timeoutMs: 1_000 }
    );

    expect(calls).toBe(1);
    expect(result).toMatchObject({ ok: false, attempt: 1, cancelled: false });
  });

  test("gives up once the attempt budget is spent", async () => {
    let calls = 0;
    const result = await runWithRetry(
      async () => {
        calls += 1;
        throw transientError();
      },
      { policy: fastPolicy, timeoutMs: 1_000, random: () => 0 }
    );

    expect(calls).toBe(3);
    expect(result).toMatchObject({ ok: false, attempt: 3, cancelled: false });
    expect(result.failures).toHaveLength(3);
  });

  test("counts a timed out attempt as a retryable failure", async () => {
    const result = await runWithRetry(() => new Promise<never>(() => undefined), {
      policy: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
      timeoutMs: 20
    });

    expect(result.ok).toBe(false);
    expect(result.failures).toHaveLength(2);
    expect(result.failures[0].error).toBeInstanceOf(StepTimeoutError);
    expect(result.failures[0].retryable).toBe(true);
  });

  test("passes an abort signal that fires on timeout", async () => {
    let seen: AbortSignal | undefined;
    await runWithRetry(
      (signal) => {
        seen = signal;
        return new Promise<never>(() => undefined);
      },
      { policy: { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1 }, timeoutMs: 10 }
    );

    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(StepTimeoutError);
  });

  test("abandons the backoff wait when the caller aborts", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(new Error("stopping")), 20);

    const result = await runWithRetry(
      async () => {
        throw transientError();
      },
      {
        policy: { maxAttempts: 3, baseDelayMs: 10_000, maxDelayMs: 10_000 },
        timeoutMs: 1_000,
        signal: controller.signal,
        random: () => 0
      }
    );

    expect(Date.now() - startedAt).toBeLessThan(2_000);
    expect(result).toMatchObject({ ok: false, attempt: 1, cancelled: true });
  });

  test("does not start when the caller already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("stopping"));
    let calls = 0;

    const result = await runWithRetry(
      async () => {
        calls += 1;
        return "never";
      },
      { policy: fastPolicy, timeoutMs: 1_000, signal: controller.signal }
    );

    expect(calls).toBe(0);
    expect(result).toMatchObject({ ok: false, attempt: 0, cancelled: true });
  });
});

describe("StepExecutor", () => {
  test("sends a stable idempotency key on every attempt", async () => {
    const auth = new FakeParticipant("auth", { forward: [transientError(), "ok"] });
    const participants = { auth, provisioning: new FakeParticipant("provisioning"), dr: new FakeParticipant("dr") };
    const executor = new StepExecutor(participants, { policy: fastPolicy, timeoutMs: 1_000, random: () => 0 });
    const record = buildRecord();

    const outcome = await executor.execute("auth", record, { traceId: "trace-1" });

    expect(outcome).toMatchObject({ status: "succeeded", attempt: 2, value: { handleId: "auth-acme" } });
    expect(auth.calls.map((call) => call.idempotencyKey)).toEqual([
      `${record.id}:auth:forward`,
      `${record.id}:auth:forward`
    ]);
    expect(auth.calls[0].traceId).toBe("trace-1");
  });
});

describe("CompensationRegistry", () => {
  function buildRegistry(provisioning: FakeParticipant) {
    const participants = { auth: new FakeParticipant("auth"), provisioning, dr: new FakeParticipant("dr") };
    const executor = new StepExecutor(participants, { policy: fastPolicy, timeoutMs: 1_000, random: () => 0 });
    return new CompensationRegistry(participants, executor);
  }

  test("treats a resource that is already gone as compensated", async () => {
    const provisioning = new FakeParticipant("provisioning", {
      compensation: [new ResourceNotFoundError("environment not found", "provisioning")]
    });
    const record = buildRecord({ context: { provisioning: { environmentId: "env-1", region: "eu-west-1" } } });

    const outcome = await buildRegistry(provisioning).compensate("provisioning", record);

    expect(outcome).toMatchObject({ status: "succeeded", attempt: 1, value: { alreadyAbsent: true, skipped: false } });
    expect(provisioning.compensationCalls).toBe(1);
  });

  test("skips the collaborator when the step left no handle", async () => {
    const provisioning = new FakeParticipant("provisioning");

    const outcome = await buildRegistry(provisioning).compensate("provisioning", buildRecord());

    expect(outcome).toMatchObject({ status: "succeeded", attempt: 0, value: { alreadyAbsent: false, skipped: true } });
    expect(provisioning.compensationCalls).toBe(0);
  });

  test("uses the compensating idempotency key and passes the recorded handle", async () => {
    const provisioning = new FakeParticipant("provisioning");
    const handle = { environmentId: "env-1", region: "eu-west-1" };
    const record = buildRecord({ context: { provisioning: handle } });

    await buildRegistry(provisioning).compensate("provisioning", record);

    expect(provisioning.compensatedHandles).toEqual([handle]);
    expect(provisioning.calls[0].idempotencyKey).toBe(`${record.id}:provisioning:compensating`);
  });
});
