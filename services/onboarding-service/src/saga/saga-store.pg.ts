import { randomUUID } from "node:crypto";
import { z } from "zod";
import { logger } from "../logger";
import { ClaimLostError, InvalidTransitionError, StepRecordConflictError } from "./errors";
import { onboardingRequestSchema } from "./onboarding-request";
import type {
  NewOrchestration,
  NewStepRecord,
  OrchestrationFilter,
  OrchestrationStore,
  OrchestrationTransition,
  StaleOrchestrationQuery
} from "./saga-store";
import {
  DEFAULT_LIST_LIMIT,
  NON_TERMINAL_STATES,
  TERMINAL_STATES,
  isTerminalState,
  orchestrationContextSchema,
  orchestrationErrorSchema,
  orchestrationStateSchema,
  sagaDirectionSchema,
  stepKindSchema,
  stepOutputSchema,
  stepStatusSchema,
  workflowTypeSchema,
  type OrchestrationError,
  type OrchestrationRecord,
  type StepRecord
} from "./saga-types";
import { isAllowedTransition } from "./transitions";

/** The slice of a pg `Pool` / `PoolClient` this store relies on. */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlExecutor & { release(): void }>;
}

const ORCHESTRATION_COLUMNS =
  "id, type, idempotency_key, state, payload, context, error, root_cause, claimed_by, claim_expires_at, created_at, updated_at, completed_at";

const STEP_COLUMNS =
  "id, orchestration_id, step, direction, status, attempt, input, output, error, started_at, completed_at";

const UNIQUE_VIOLATION = "23505";

const orchestrationRowSchema = z.object({
  id: z.string(),
  type: workflowTypeSchema,
  idempotency_key: z.string(),
  state: orchestrationStateSchema,
  payload: z.unknown(),
  context: z.unknown(),
  error: z.unknown(),
  root_cause: z.unknown(),
  claimed_by: z.string().nullable(),
  claim_expires_at: z.date().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
  completed_at: z.date().nullable()
});
type OrchestrationRow = z.infer<typeof orchestrationRowSchema>;

const stepRowSchema = z.object({
  id: z.string(),
  orchestration_id: z.string(),
  step: stepKindSchema,
  direction: sagaDirectionSchema,
  status: stepStatusSchema,
  attempt: z.number().int(),
  input: z.unknown(),
  output: z.unknown(),
  error: z.string().nullable(),
  started_at: z.date(),
  completed_at: z.date().nullable()
});
type StepRow = z.infer<typeof stepRowSchema>;

function parseError(value: unknown): OrchestrationError | null {
  return value === null || value === undefined ? null : orchestrationErrorSchema.parse(value);
}

function mapOrchestration(raw: unknown): OrchestrationRecord {
  const row: OrchestrationRow = orchestrationRowSchema.parse(raw);
  return {
    id: row.id,
    type: row.type,
    idempotencyKey: row.idempotency_key,
    state: row.state,
    payload: onboardingRequestSchema.parse(row.payload),
    context: orchestrationContextSchema.parse(row.context ?? {}),
    error: parseError(row.error),
    rootCause: parseError(row.root_cause),
    claimedBy: row.claimed_by,
    claimExpiresAt: row.claim_expires_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at
  };
}

function mapStep(raw: unknown): StepRecord {
  const row: StepRow = stepRowSchema.parse(raw);
  return {
    id: row.id,
    orchestrationId: row.orchestration_id,
    step: row.step,
    direction: row.direction,
    status: row.status,
    attempt: row.attempt,
    input: stepOutputSchema.parse(row.input ?? {}),
    output: row.output === null || row.output === undefined ? null : stepOutputSchema.parse(row.output),
    error: row.error,
    startedAt: row.started_at,
    completedAt: row.completed_at
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === UNIQUE_VIOLATION;
}

function toJson(value: unknown): string | null {
  return value === undefined || value === null ? null : JSON.stringify(value);
}

export class PostgresOrchestrationStore implements OrchestrationStore {
  constructor(private readonly pool: SqlPool) {}

  async createOrchestration(input: NewOrchestration): Promise<{ record: OrchestrationRecord; created: boolean }> {
    const inserted = await this.pool.query(
      `INSERT INTO orchestrations (id, type, idempotency_key, state, payload, context, created_at, updated_at)
       VALUES ($1, $2, $3, 'PENDING', $4, '{}'::jsonb, NOW(), NOW())
       ON CONFLICT (idempotency_key) DO NOTHING
       RETURNING ${ORCHESTRATION_COLUMNS}`,
      [randomUUID(), input.type, input.idempotencyKey, JSON.stringify(input.payload)]
    );
    if (inserted.rows.length > 0) {
      return { record: mapOrchestration(inserted.rows[0]), created: true };
    }
    const existing = await this.getOrchestrationByIdempotencyKey(input.idempotencyKey);
    if (!existing) {
      throw new Error(`Orchestration for key ${input.idempotencyKey} vanished after insert conflict`);
    }
    return { record: existing, created: false };
  }

  async getOrchestration(id: string): Promise<OrchestrationRecord | null> {
    const result = await this.pool.query(
      `SELECT ${ORCHESTRATION_COLUMNS} FROM orchestrations WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : mapOrchestration(result.rows[0]);
  }

  async getOrchestrationByIdempotencyKey(idempotencyKey: string): Promise<OrchestrationRecord | null> {
    const result = await this.pool.query(
      `SELECT ${ORCHESTRATION_COLUMNS} FROM orchestrations WHERE idempotency_key = $1`,
      [idempotencyKey]
    );
    return result.rows.length === 0 ? null : mapOrchestration(result.rows[0]);
  }

  async listOrchestrations(filter?: OrchestrationFilter): Promise<OrchestrationRecord[]> {
    const states = filter?.states ?? orchestrationStateSchema.options;
    const result = await this.pool.query(
      `SELECT ${ORCHESTRATION_COLUMNS} FROM orchestrations
       WHERE state = ANY($1::text[])
       ORDER BY updated_at ASC, id ASC
       LIMIT $2`,
      [states, filter?.limit ?? DEFAULT_LIST_LIMIT]
    );
    return result.rows.map(mapOrchestration);
  }

  async findStaleOrchestrations(query: StaleOrchestrationQuery): Promise<OrchestrationRecord[]> {
    const states = query.states.filter((state) => NON_TERMINAL_STATES.includes(state));
    const result = await this.pool.query(
      `SELECT ${ORCHESTRATION_COLUMNS} FROM orchestrations
       WHERE state = ANY($1::text[])
         AND updated_at < $2
         AND (claimed_by IS NULL OR claim_expires_at <= NOW())
       ORDER BY updated_at ASC, id ASC
       LIMIT $3`,
      [states, query.updatedBefore, query.limit]
    );
    return result.rows.map(mapOrchestration);
  }

  async claimOrchestration(id: string, owner: string, leaseMs: number): Promise<OrchestrationRecord | null> {
    const result = await this.pool.query(
      `UPDATE orchestrations
       SET claimed_by = $2, claim_expires_at = NOW() + ($3::double precision * INTERVAL '1 millisecond')
       WHERE id = $1
         AND state <> ALL($4::text[])
         AND (claimed_by IS NULL OR claim_expires_at <= NOW())
       RETURNING ${ORCHESTRATION_COLUMNS}`,
      [id, owner, leaseMs, TERMINAL_STATES]
    );
    return result.rows.length === 0 ? null : mapOrchestration(result.rows[0]);
  }

  async renewClaim(id: string, owner: string, leaseMs: number): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE orchestrations
       SET claim_expires_at = NOW() + ($3::double precision * INTERVAL '1 millisecond')
       WHERE id = $1 AND claimed_by = $2 AND state <> ALL($4::text[])
       RETURNING id`,
      [id, owner, leaseMs, TERMINAL_STATES]
    );
    return result.rows.length > 0;
  }

  async releaseOrchestration(id: string, owner: string): Promise<void> {
    await this.pool.query(
      "UPDATE orchestrations SET claimed_by = NULL, claim_expires_at = NULL WHERE id = $1 AND claimed_by = $2",
      [id, owner]
    );
  }

  async commitTransition(transition: OrchestrationTransition): Promise<OrchestrationRecord> {
    if (!isAllowedTransition(transition.from, transition.to)) {
      throw new InvalidTransitionError(transition.from, transition.to);
    }
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const updated = await client.query(
        `UPDATE orchestrations
         SET state = $4,
             context = context || $5::jsonb,
             error = COALESCE($6::jsonb, error),
             root_cause = COALESCE(root_cause, $7::jsonb),
             updated_at = NOW(),
             completed_at = CASE WHEN $8::boolean AND completed_at IS NULL THEN NOW() ELSE completed_at END,
             claim_expires_at = NOW() + ($9::double precision * INTERVAL '1 millisecond')
         WHERE id = $1 AND state = $2 AND claimed_by = $3
         RETURNING ${ORCHESTRATION_COLUMNS}`,
        [
          transition.orchestrationId,
          transition.from,
          transition.owner,
          transition.to,
          JSON.stringify(transition.contextPatch ?? {}),
          toJson(transition.error),
          toJson(transition.rootCause),
          isTerminalState(transition.to),
          transition.leaseMs
        ]
      );
      if (updated.rows.length === 0) {
        throw new ClaimLostError(transition.orchestrationId, transition.owner);
      }
      for (const step of transition.steps) {
        await this.insertStep(client, transition.orchestrationId, step);
      }
      await client.query("COMMIT");
      return mapOrchestration(updated.rows[0]);
    } catch (error) {
      await this.rollback(client, transition.orchestrationId);
      if (isUniqueViolation(error)) {
        throw new StepRecordConflictError(`Duplicate terminal step record for ${transition.orchestrationId}`);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async listStepRecords(orchestrationId: string): Promise<StepRecord[]> {
    const result = await this.pool.query(
      `SELECT ${STEP_COLUMNS} FROM step_records WHERE orchestration_id = $1 ORDER BY seq ASC`,
      [orchestrationId]
    );
    return result.rows.map(mapStep);
  }

  private async insertStep(client: SqlExecutor, orchestrationId: string, step: NewStepRecord): Promise<void> {
    await client.query(
      `INSERT INTO step_records (${STEP_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        randomUUID(),
        orchestrationId,
        step.step,
        step.direction,
        step.status,
        step.attempt,
        JSON.stringify(step.input),
        toJson(step.output),
        step.error,
        step.startedAt,
        step.completedAt
      ]
    );
  }

  private async rollback(client: SqlExecutor, orchestrationId: string): Promise<void> {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      logger.warn({ rollbackError, orchestrationId }, "Rollback after failed commit did not complete");
    }
  }
}
