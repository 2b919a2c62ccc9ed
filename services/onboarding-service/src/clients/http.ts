import { traceHeaders } from "../trace/trace";
import { CollaboratorError, ResourceNotFoundError, type Collaborator } from "./errors";

export type JsonRequest = {
  method: "POST" | "PUT" | "DELETE";
  path: string;
  body?: unknown;
  signal: AbortSignal;
  idempotencyKey?: string;
  traceId?: string;
};

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text();
  if (!text) {
    return response.statusText;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === "object" && "message" in parsed && typeof parsed.message === "string") {
      return parsed.message;
    }
  } catch (error) {
    return text;
  }
  return text;
}

export async function requestJson(collaborator: Collaborator, baseUrl: string, request: JsonRequest): Promise<unknown> {
  const headers: Record<string, string> = { accept: "application/json", ...traceHeaders(request.traceId) };
  if (request.body !== undefined) {
    headers["content-type"] = "application/json";
  }
  if (request.idempotencyKey) {
    headers["idempotency-key"] = request.idempotencyKey;
  }

  let response: Response;
  try {
    response = await fetch(`${baseUrl}${request.path}`, {
      method: request.method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: request.signal
    });
  } catch (error) {
    if (request.signal.aborted) {
      throw request.signal.reason;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new CollaboratorError(`${collaborator} unreachable: ${message}`, collaborator, true, undefined, "NETWORK");
  }

  if (response.status === 404 || response.status === 410) {
    throw new ResourceNotFoundError(await readErrorMessage(response), collaborator, response.status);
  }
  if (!response.ok) {
    const message = await readErrorMessage(response);
    throw new CollaboratorError(
      `${collaborator} ${request.method} ${request.path} failed (${response.status}): ${message}`,
      collaborator,
      isRetryableStatus(response.status),
      response.status
    );
  }
  if (response.status === 204) {
    return {};
  }
  return response.json();
}
