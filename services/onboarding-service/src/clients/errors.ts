import { ZodError } from "zod";

export type Collaborator = "identity" | "provisioning" | "disaster-recovery";

export class CollaboratorError extends Error {
  constructor(
    message: string,
    public readonly collaborator: Collaborator,
    public readonly retryable: boolean,
    public readonly statusCode?: number,
    public readonly code?: string
  ) {
    super(message);
    this.name = "CollaboratorError";
  }
}

/** The remote side no longer has the resource. Compensation treats this as done. */
export class ResourceNotFoundError extends CollaboratorError {
  constructor(message: string, collaborator: Collaborator, statusCode = 404) {
    super(message, collaborator, false, statusCode, "NOT_FOUND");
    this.name = "ResourceNotFoundError";
  }
}

export class StepTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Collaborator call timed out after ${timeoutMs}ms`);
    this.name = "StepTimeoutError";
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof CollaboratorError) {
    return error.retryable;
  }
  if (error instanceof StepTimeoutError) {
    return true;
  }
  if (error instanceof ZodError) {
    return false;
  }
  // fetch rejects with a TypeError on connection-level failures.
  return error instanceof TypeError;
}

export function describeError(error: unknown): { message: string; code?: string } {
  if (error instanceof CollaboratorError) {
    return { message: error.message, code: error.code ?? (error.statusCode ? `HTTP_${error.statusCode}` : undefined) };
  }
  if (error instanceof StepTimeoutError) {
    return { message: error.message, code: "TIMEOUT" };
  }
  if (error instanceof ZodError) {
    return { message: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "), code: "INVALID" };
  }
  if (error instanceof Error) {
    return { message: error.message };
  }
  return { message: String(error) };
}
